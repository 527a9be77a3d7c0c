import test from "node:test";
import assert from "node:assert/strict";
import { AuthError, RegionUnavailableError, TimeoutError } from "../src/lib/errors";
import { InstanceFetcher, toInstanceSnapshot } from "../src/lib/instance-fetcher";
import { FakeComputeApi, record } from "./helpers/fake-compute-api";

test("fetchInstances drains every page", async () => {
  const api = new FakeComputeApi(["us-east-1"]);
  api.setPages("us-east-1", [
    [record("i-1", "running", "web")],
    [record("i-2", "stopped")],
    [record("i-3", "pending", "db")]
  ]);
  const fetcher = new InstanceFetcher(api, { now: () => 42 });

  const snapshot = await fetcher.fetchInstances("us-east-1");
  assert.deepEqual(snapshot.instances.map((item) => item.id), ["i-1", "i-2", "i-3"]);
  assert.equal(snapshot.asOf, 42);
  assert.equal(snapshot.region, "us-east-1");
  assert.deepEqual(api.describeCalls, ["us-east-1", "us-east-1", "us-east-1"]);
});

test("fetchInstances fails the region on a repeated page token", async () => {
  const api = new FakeComputeApi(["us-east-1"]);
  api.setRawPages("us-east-1", [
    { instances: [], nextToken: "page-1" },
    { instances: [], nextToken: "page-1" }
  ]);
  const fetcher = new InstanceFetcher(api);

  await assert.rejects(fetcher.fetchInstances("us-east-1"), (error: unknown) =>
    error instanceof RegionUnavailableError
      && error.message === "Region us-east-1 is unavailable: Pagination loop detected (token page-1 repeated)");
});

test("fetchInstances turns a slow region into RegionUnavailableError", async () => {
  const api = new FakeComputeApi(["ap-south-1"]);
  const gate = api.hold("ap-south-1");
  const fetcher = new InstanceFetcher(api, { timeoutMs: 20 });

  await assert.rejects(fetcher.fetchInstances("ap-south-1"), (error: unknown) =>
    error instanceof RegionUnavailableError
      && error.region === "ap-south-1"
      && error.cause instanceof TimeoutError
      && error.message === "Region ap-south-1 is unavailable: Describe instances in ap-south-1 timed out after 20ms");
  gate.resolve();
});

test("fetchInstances lets AuthError through unchanged", async () => {
  const api = new FakeComputeApi(["us-east-1"]);
  const authError = new AuthError("AuthFailure: token expired");
  api.regionErrors.set("us-east-1", authError);
  const fetcher = new InstanceFetcher(api);

  await assert.rejects(fetcher.fetchInstances("us-east-1"), (error: unknown) => error === authError);
});

test("toInstanceSnapshot defaults the name to the instance id", () => {
  const launchTime = new Date("2024-05-01T12:00:00.000Z");
  assert.deepEqual(toInstanceSnapshot("eu-west-1", {
    instanceId: "i-9",
    state: "running",
    tags: [{ key: "Name", value: "   " }],
    publicIpAddress: "203.0.113.10",
    launchTime
  }), {
    id: "i-9",
    region: "eu-west-1",
    name: "i-9",
    instanceType: "unknown",
    publicIp: "203.0.113.10",
    privateIp: undefined,
    state: "running",
    launchTime: "2024-05-01T12:00:00.000Z"
  });
  assert.equal(toInstanceSnapshot("eu-west-1", record("i-1", "running", " api "))?.name, "api");
  assert.equal(toInstanceSnapshot("eu-west-1", { instanceId: "i-2", state: "hibernating" }), null);
});
