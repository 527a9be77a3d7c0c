import test from "node:test";
import assert from "node:assert/strict";
import { AuthError, NetworkError } from "../src/lib/errors";
import { FleetEventBus, type FleetEvent } from "../src/lib/events";
import { InstanceFetcher } from "../src/lib/instance-fetcher";
import { RefreshScheduler } from "../src/lib/refresh-scheduler";
import { RegionCatalog } from "../src/lib/region-catalog";
import { StateCache } from "../src/lib/state-cache";
import { ManualTickSource } from "../src/lib/tick-source";
import { FakeComputeApi, flush, record } from "./helpers/fake-compute-api";

function setup(regions = ["us-east-1", "eu-west-1"], concurrency?: number, timeoutMs = 1_000) {
  const api = new FakeComputeApi(regions);
  const bus = new FleetEventBus();
  const events: FleetEvent[] = [];
  bus.subscribe((event) => events.push(event));
  let clock = 0;
  const cache = new StateCache({ staleAfterMs: 60_000, bus, now: () => clock });
  const fetcher = new InstanceFetcher(api, {
    timeoutMs,
    now: () => {
      clock += 1_000;
      return clock;
    }
  });
  const ticks = new ManualTickSource();
  const scheduler = new RefreshScheduler({
    catalog: new RegionCatalog(api, { displayNames: {} }),
    fetcher,
    cache,
    bus,
    tickSource: ticks,
    concurrency
  });
  return { api, cache, events, ticks, scheduler };
}

function eventsOfType<T extends FleetEvent["type"]>(events: FleetEvent[], type: T): Extract<FleetEvent, { type: T }>[] {
  return events.filter((event): event is Extract<FleetEvent, { type: T }> => event.type === type);
}

test("manualRefresh joins a scan that is already in flight", async () => {
  const { api, scheduler, cache } = setup();
  api.setInstances("us-east-1", [record("i-1", "running")]);
  api.hold("us-east-1");

  const first = scheduler.manualRefresh();
  const second = scheduler.manualRefresh();
  assert.equal(first, second);
  assert.equal(scheduler.isScanInFlight, true);

  api.release("us-east-1");
  const report = await first;
  assert.deepEqual(report.refreshed, ["eu-west-1", "us-east-1"]);
  assert.deepEqual(api.describeCalls.filter((region) => region === "us-east-1"), ["us-east-1"]);
  assert.equal(cache.currentTick, 1);
  assert.equal(scheduler.isScanInFlight, false);
});

test("a tick during a running scan is skipped", async () => {
  const { api, scheduler, events, ticks } = setup();
  scheduler.start();
  assert.equal(scheduler.state, "scanning");
  api.hold("eu-west-1");

  ticks.tick();
  await flush();
  ticks.tick();
  api.release("eu-west-1");
  await scheduler.whenIdle();

  assert.deepEqual(eventsOfType(events, "tick-skipped"), [{ type: "tick-skipped", tick: 1 }]);
  assert.equal(eventsOfType(events, "scan-started").length, 1);
  assert.equal(api.describeCalls.length, 2);
});

test("one failing region leaves the others and its own cached data intact", async () => {
  const { api, scheduler, cache, events } = setup();
  api.setInstances("us-east-1", [record("i-1", "running")]);
  api.setInstances("eu-west-1", [record("i-2", "running")]);
  await scheduler.manualRefresh();

  api.setInstances("us-east-1", [record("i-1", "stopped")]);
  api.regionErrors.set("eu-west-1", new Error("boom"));
  const report = await scheduler.manualRefresh();

  assert.deepEqual(report.refreshed, ["us-east-1"]);
  assert.deepEqual(report.failed, [{ region: "eu-west-1", reason: "Region eu-west-1 is unavailable: boom" }]);
  assert.equal(report.halted, false);
  assert.equal(cache.get("us-east-1", "i-1")?.state, "stopped");
  assert.equal(cache.get("eu-west-1", "i-2")?.state, "running");
  assert.equal(cache.isStale("eu-west-1"), true);
  assert.equal(cache.isStale("us-east-1"), false);
  assert.deepEqual(eventsOfType(events, "region-unavailable"), [
    { type: "region-unavailable", region: "eu-west-1", reason: "Region eu-west-1 is unavailable: boom" }
  ]);
});

test("pause stops future ticks but lets the running scan commit", async () => {
  const { api, scheduler, cache, ticks } = setup();
  api.setInstances("us-east-1", [record("i-1", "running")]);
  scheduler.start();
  api.hold("us-east-1");

  ticks.tick();
  await flush();
  scheduler.pause();
  assert.equal(scheduler.state, "paused");
  assert.equal(ticks.active, false);

  api.release("us-east-1");
  await scheduler.whenIdle();
  assert.equal(cache.get("us-east-1", "i-1")?.state, "running");

  ticks.tick();
  assert.equal(scheduler.isScanInFlight, false);

  scheduler.resume();
  assert.equal(scheduler.state, "scanning");
  assert.equal(ticks.active, true);
});

test("an auth failure halts refreshing after committing successful regions", async () => {
  const { api, scheduler, cache, events } = setup();
  scheduler.start();
  api.setInstances("us-east-1", [record("i-1", "running")]);
  api.regionErrors.set("eu-west-1", new AuthError("bad creds"));

  const report = await scheduler.manualRefresh();
  assert.equal(report.halted, true);
  assert.equal(report.haltReason, "bad creds");
  assert.equal(scheduler.state, "halted");
  assert.equal(cache.get("us-east-1", "i-1")?.state, "running");
  assert.deepEqual(eventsOfType(events, "halted"), [
    { type: "halted", reason: "bad creds", failures: [{ region: "eu-west-1", reason: "bad creds" }] }
  ]);
  assert.deepEqual(eventsOfType(events, "region-unavailable"), []);

  scheduler.pause();
  assert.equal(scheduler.state, "halted");
  scheduler.resume();
  assert.equal(scheduler.state, "scanning");
});

test("the halt reason names the credential failure, not an earlier region failure", async () => {
  const { api, scheduler } = setup();
  api.regionErrors.set("eu-west-1", new NetworkError("connection reset"));
  api.regionErrors.set("us-east-1", new AuthError("bad creds"));

  const report = await scheduler.manualRefresh();
  assert.equal(report.failed[0].region, "eu-west-1");
  assert.equal(report.haltReason, "bad creds");
});

test("a timed-out region fetch is aborted before the next scan", async () => {
  const { api, scheduler } = setup(["ap-south-1"], undefined, 20);
  api.hold("ap-south-1");

  const first = await scheduler.manualRefresh();
  assert.deepEqual(first.failed, [{
    region: "ap-south-1",
    reason: "Region ap-south-1 is unavailable: Describe instances in ap-south-1 timed out after 20ms"
  }]);
  await flush();
  assert.equal(api.inFlight, 0);

  await scheduler.manualRefresh();
  assert.equal(api.describeCalls.length, 2);
  assert.equal(api.maxInFlight, 1);
});

test("a region whose fetch ignores the abort gets no second call until it settles", async () => {
  const { api, scheduler } = setup(["ap-south-1"], undefined, 20);
  api.honorAbort = false;
  api.setInstances("ap-south-1", [record("i-1", "running")]);
  api.hold("ap-south-1");

  await scheduler.manualRefresh();
  assert.equal(api.inFlight, 1);

  const second = await scheduler.manualRefresh();
  assert.deepEqual(second.failed, [{
    region: "ap-south-1",
    reason: "Region ap-south-1 is unavailable: previous fetch is still in flight"
  }]);
  assert.equal(api.describeCalls.length, 1);
  assert.equal(api.maxInFlight, 1);

  api.release("ap-south-1");
  await flush();
  assert.equal(api.inFlight, 0);

  const third = await scheduler.manualRefresh();
  assert.deepEqual(third.refreshed, ["ap-south-1"]);
  assert.equal(api.describeCalls.length, 2);
  assert.equal(api.maxInFlight, 1);
});

test("a catalog failure ends the scan without touching cached data", async () => {
  const { api, scheduler, cache, events } = setup();
  api.listRegionsError = new NetworkError("offline");

  const report = await scheduler.manualRefresh();
  assert.deepEqual(report, { tick: 0, refreshed: [], failed: [], halted: false, catalogError: "offline" });
  assert.equal(cache.currentTick, 0);
  assert.deepEqual(eventsOfType(events, "scan-failed"), [{ type: "scan-failed", reason: "offline" }]);
  assert.equal(scheduler.state, "idle");
});

test("an auth failure while listing regions halts", async () => {
  const { api, scheduler } = setup();
  scheduler.start();
  api.listRegionsError = new AuthError("expired");

  const report = await scheduler.manualRefresh();
  assert.equal(report.halted, true);
  assert.equal(report.haltReason, "expired");
  assert.equal(scheduler.state, "halted");
});

test("fetches run with bounded concurrency", async () => {
  const regions = ["r-1", "r-2", "r-3", "r-4", "r-5", "r-6"];
  const { api, scheduler } = setup(regions, 2);
  for (const region of regions) {
    api.hold(region);
  }

  const scan = scheduler.manualRefresh();
  await flush();
  assert.equal(api.inFlight, 2);
  for (const region of regions) {
    api.release(region);
  }
  const report = await scan;
  assert.equal(report.refreshed.length, 6);
  assert.equal(api.maxInFlight, 2);
});

test("setAutoRefresh toggles between paused and scanning", async () => {
  const { scheduler, ticks } = setup();
  scheduler.setAutoRefresh(true);
  assert.equal(scheduler.state, "scanning");
  scheduler.setAutoRefresh(false);
  assert.equal(scheduler.state, "paused");
  scheduler.setAutoRefresh(true);
  assert.equal(scheduler.state, "scanning");

  await scheduler.stop();
  assert.equal(scheduler.state, "idle");
  assert.equal(ticks.active, false);
});

test("instances missing from three scans are evicted", async () => {
  const { api, scheduler, cache } = setup(["us-east-1"]);
  api.setInstances("us-east-1", [record("i-1", "running"), record("i-2", "running")]);
  await scheduler.manualRefresh();

  api.setInstances("us-east-1", [record("i-2", "running")]);
  await scheduler.manualRefresh();
  await scheduler.manualRefresh();
  assert.equal(cache.get("us-east-1", "i-1")?.missedFetches, 2);
  await scheduler.manualRefresh();
  assert.equal(cache.get("us-east-1", "i-1"), undefined);
});
