import test from "node:test";
import assert from "node:assert/strict";
import { createEc2Client, getAwsErrorCode, mapEc2Error, toRemoteRecord, withEc2Errors } from "../src/lib/ec2-api";
import { ActionError, AuthError, NetworkError } from "../src/lib/errors";

function awsError(name: string, message: string): Error {
  return Object.assign(new Error(message), { name });
}

test("getAwsErrorCode reads name, Code or code", () => {
  assert.equal(getAwsErrorCode(awsError("RequestLimitExceeded", "slow down")), "RequestLimitExceeded");
  assert.equal(getAwsErrorCode({ Code: "AuthFailure" }), "AuthFailure");
  assert.equal(getAwsErrorCode({ code: "ECONNRESET" }), "ECONNRESET");
  assert.equal(getAwsErrorCode("plain"), "Unknown");
});

test("mapEc2Error turns credential failures into AuthError", () => {
  const mapped = mapEc2Error(awsError("AuthFailure", "AWS was not able to validate the provided access credentials"), "read");
  assert.ok(mapped instanceof AuthError);
  assert.equal(mapped.message, "AWS was not able to validate the provided access credentials");
});

test("mapEc2Error maps read failures to NetworkError", () => {
  const mapped = mapEc2Error(awsError("RequestLimitExceeded", "Request limit exceeded."), "read");
  assert.ok(mapped instanceof NetworkError);
  assert.equal(mapped.message, "RequestLimitExceeded: Request limit exceeded.");
});

test("mapEc2Error names the cause of a failed action", () => {
  const illegal = mapEc2Error(awsError("IncorrectInstanceState", "The instance is not in a state from which it can be started."), "action");
  assert.ok(illegal instanceof ActionError);
  assert.equal(illegal.reason, "illegal transition: The instance is not in a state from which it can be started.");

  const denied = mapEc2Error(awsError("UnauthorizedOperation", "You are not authorized to perform this operation."), "action");
  assert.ok(denied instanceof ActionError);
  assert.equal(denied.reason, "permission denied: You are not authorized to perform this operation.");

  const missing = mapEc2Error(awsError("InvalidInstanceID.NotFound", "The instance ID 'i-0' does not exist"), "action");
  assert.ok(missing instanceof ActionError);
  assert.equal(missing.reason, "instance not found: The instance ID 'i-0' does not exist");
});

test("withEc2Errors passes typed errors through", async () => {
  const original = new AuthError("expired");
  await assert.rejects(withEc2Errors("action", async () => {
    throw original;
  }), (error: unknown) => error === original);
  assert.equal(await withEc2Errors("read", async () => 7), 7);
});

test("toRemoteRecord keeps tagged fields and skips records without an id", () => {
  const launchTime = new Date("2024-01-02T03:04:05.000Z");
  assert.deepEqual(toRemoteRecord({
    InstanceId: "i-1",
    InstanceType: "t3.small",
    State: { Name: "running" },
    Tags: [{ Key: "Name", Value: "web" }, { Value: "orphan" }],
    PrivateIpAddress: "10.0.0.5",
    LaunchTime: launchTime
  }), {
    instanceId: "i-1",
    instanceType: "t3.small",
    state: "running",
    tags: [{ key: "Name", value: "web" }],
    publicIpAddress: undefined,
    privateIpAddress: "10.0.0.5",
    launchTime
  });
  assert.equal(toRemoteRecord({}), null);
});

test("EC2 clients make a single attempt per request", async () => {
  const client = createEc2Client("us-east-1");
  try {
    assert.equal(await client.config.maxAttempts(), 1);
  } finally {
    client.destroy();
  }
});
