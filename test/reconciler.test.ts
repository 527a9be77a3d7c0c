import test from "node:test";
import assert from "node:assert/strict";
import {
  emptyRegionEntry,
  isOverlayExpired,
  reconcileRegion,
  resolveOverlay,
  type ReconcileContext,
  type RegionEntry
} from "../src/lib/reconciler";
import type { InstanceSnapshot, InstanceState } from "../src/lib/types";

function snap(id: string, state: InstanceState, name = id): InstanceSnapshot {
  return { id, region: "us-east-1", name, instanceType: "t3.micro", state };
}

function context(tick: number, evictionThreshold = 3): ReconcileContext {
  return { tick, evictionThreshold, isPinned: () => false };
}

function withOverlay(entry: RegionEntry, id: string, targetState: "pending" | "stopping" | "rebooting", issuedAtTick: number, expiresAfterTicks = 2): RegionEntry {
  const instances = new Map(entry.instances);
  const instance = instances.get(id);
  assert.ok(instance);
  instances.set(id, { ...instance, optimistic: { targetState, issuedAtTick, expiresAfterTicks } });
  return { ...entry, instances };
}

test("reconcileRegion inserts new instances without an overlay", () => {
  const result = reconcileRegion(emptyRegionEntry("us-east-1"), [snap("i-1", "running", "web")], 1000, context(1));
  assert.equal(result.applied, true);
  assert.deepEqual(result.summary.added, ["i-1"]);
  const instance = result.entry.instances.get("i-1");
  assert.equal(instance?.state, "running");
  assert.equal(instance?.name, "web");
  assert.equal(instance?.lastConfirmed, 1000);
  assert.equal(instance?.missedFetches, 0);
  assert.equal(instance?.optimistic, undefined);
  assert.equal(result.entry.asOf, 1000);
});

test("reconcileRegion is idempotent for a replayed snapshot", () => {
  const first = reconcileRegion(emptyRegionEntry("us-east-1"), [snap("i-1", "running"), snap("i-2", "stopped")], 1000, context(1));
  const second = reconcileRegion(first.entry, [snap("i-2", "stopped")], 2000, context(2));
  const replay = reconcileRegion(second.entry, [snap("i-2", "stopped")], 2000, context(2));

  assert.equal(replay.applied, true);
  assert.deepEqual(replay.entry, second.entry);
  assert.equal(replay.entry.instances.get("i-1")?.missedFetches, 1);
});

test("reconcileRegion ignores a snapshot older than the entry", () => {
  const first = reconcileRegion(emptyRegionEntry("us-east-1"), [snap("i-1", "running")], 2000, context(1));
  const stale = reconcileRegion(first.entry, [snap("i-1", "stopped")], 1000, context(2));
  assert.equal(stale.applied, false);
  assert.equal(stale.entry, first.entry);
  assert.equal(stale.entry.instances.get("i-1")?.state, "running");
});

test("a pending overlay is confirmed on the next tick when the instance reports pending", () => {
  const base = reconcileRegion(emptyRegionEntry("us-east-1"), [snap("i-1", "stopped")], 1000, context(5)).entry;
  const entry = withOverlay(base, "i-1", "pending", 5);

  const result = reconcileRegion(entry, [snap("i-1", "pending")], 2000, context(6));
  const instance = result.entry.instances.get("i-1");
  assert.deepEqual(result.summary.confirmed, ["i-1"]);
  assert.equal(instance?.state, "pending");
  assert.equal(instance?.optimistic, undefined);
});

test("a contradicted overlay is retained before expiry and reverted at expiry", () => {
  const base = reconcileRegion(emptyRegionEntry("us-east-1"), [snap("i-1", "stopped")], 1000, context(5)).entry;
  const entry = withOverlay(base, "i-1", "pending", 5, 2);

  const early = reconcileRegion(entry, [snap("i-1", "stopped")], 2000, context(6));
  assert.deepEqual(early.summary.reverted, []);
  assert.equal(early.entry.instances.get("i-1")?.optimistic?.targetState, "pending");

  const expired = reconcileRegion(early.entry, [snap("i-1", "stopped")], 3000, context(7));
  assert.deepEqual(expired.summary.reverted, ["i-1"]);
  assert.equal(expired.entry.instances.get("i-1")?.optimistic, undefined);
  assert.equal(expired.entry.instances.get("i-1")?.state, "stopped");
});

test("a stopping overlay accepts stopped as confirmation", () => {
  const base = reconcileRegion(emptyRegionEntry("us-east-1"), [snap("i-1", "running")], 1000, context(1)).entry;
  const entry = withOverlay(base, "i-1", "stopping", 1);
  const result = reconcileRegion(entry, [snap("i-1", "stopped")], 2000, context(2));
  assert.deepEqual(result.summary.confirmed, ["i-1"]);
  assert.deepEqual(result.summary.updated, ["i-1"]);
});

test("absent instances are evicted after three newer snapshots miss them", () => {
  let entry = reconcileRegion(emptyRegionEntry("us-east-1"), [snap("i-1", "running"), snap("i-2", "running")], 1000, context(1)).entry;

  for (const [index, asOf] of [2000, 3000].entries()) {
    const result = reconcileRegion(entry, [snap("i-2", "running")], asOf, context(index + 2));
    entry = result.entry;
    assert.equal(entry.instances.get("i-1")?.missedFetches, index + 1);
    assert.deepEqual(result.summary.evicted, []);
  }

  const final = reconcileRegion(entry, [snap("i-2", "running")], 4000, context(4));
  assert.deepEqual(final.summary.evicted, ["i-1"]);
  assert.equal(final.entry.instances.has("i-1"), false);
});

test("the miss counter resets when an instance reappears", () => {
  let entry = reconcileRegion(emptyRegionEntry("us-east-1"), [snap("i-1", "running")], 1000, context(1)).entry;
  entry = reconcileRegion(entry, [], 2000, context(2)).entry;
  entry = reconcileRegion(entry, [], 3000, context(3)).entry;
  assert.equal(entry.instances.get("i-1")?.missedFetches, 2);

  entry = reconcileRegion(entry, [snap("i-1", "running")], 4000, context(4)).entry;
  assert.equal(entry.instances.get("i-1")?.missedFetches, 0);
  assert.equal(entry.instances.get("i-1")?.lastConfirmed, 4000);
});

test("reconcileRegion keeps prior order and appends new instances", () => {
  const first = reconcileRegion(emptyRegionEntry("us-east-1"), [snap("i-b", "running"), snap("i-a", "running")], 1000, context(1));
  const second = reconcileRegion(first.entry, [snap("i-c", "running"), snap("i-a", "stopped"), snap("i-b", "running")], 2000, context(2));
  assert.deepEqual([...second.entry.instances.keys()], ["i-b", "i-a", "i-c"]);
});

test("a merge clears the region failure flag", () => {
  const entry: RegionEntry = { ...emptyRegionEntry("us-east-1"), lastFetchFailed: true, lastError: "boom" };
  const result = reconcileRegion(entry, [], 1000, context(1));
  assert.equal(result.entry.lastFetchFailed, false);
  assert.equal(result.entry.lastError, undefined);
});

test("reboot overlays only end by expiry", () => {
  const overlay = { targetState: "rebooting" as const, issuedAtTick: 3, expiresAfterTicks: 1 };
  assert.equal(resolveOverlay(overlay, "running", 3).outcome, "retained");
  assert.equal(resolveOverlay(overlay, "running", 4).outcome, "reverted");
  assert.equal(isOverlayExpired(overlay, 4), true);
});
