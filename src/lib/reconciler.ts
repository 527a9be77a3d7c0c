import type { RegionMergeSummary } from "./events";
import { confirmsOverlay } from "./lifecycle";
import type { Instance, InstanceSnapshot, InstanceState, OptimisticOverlay } from "./types";

export interface RegionEntry {
  region: string;
  // Map iteration order is the cache's "prior relative order".
  instances: Map<string, Instance>;
  asOf?: number;
  lastFetchFailed: boolean;
  lastError?: string;
  seeded: boolean;
}

export interface ReconcileContext {
  tick: number;
  evictionThreshold: number;
  isPinned: (region: string, id: string) => boolean;
}

export interface ReconcileResult {
  entry: RegionEntry;
  summary: RegionMergeSummary;
  applied: boolean;
}

export type OverlayOutcome = "confirmed" | "reverted" | "retained";

export interface OverlayResolution {
  overlay?: OptimisticOverlay;
  outcome: OverlayOutcome;
}

export function emptyRegionEntry(region: string): RegionEntry {
  return {
    region,
    instances: new Map(),
    lastFetchFailed: false,
    seeded: false
  };
}

export function isOverlayExpired(overlay: OptimisticOverlay, tick: number): boolean {
  return tick - overlay.issuedAtTick >= overlay.expiresAfterTicks;
}

export function resolveOverlay(overlay: OptimisticOverlay, fresh: InstanceState, tick: number): OverlayResolution {
  if (confirmsOverlay(overlay.targetState, fresh)) {
    return { outcome: "confirmed" };
  }
  if (isOverlayExpired(overlay, tick)) {
    return { outcome: "reverted" };
  }
  // Still plausibly in flight; the remote side may simply lag behind.
  return { overlay, outcome: "retained" };
}

/**
 * Merges one fetched snapshot into a region entry without mutating the input.
 * Snapshots older than the entry are ignored and replaying the latest one is a
 * no-op, so miss counters only move once per distinct successful fetch.
 */
export function reconcileRegion(
  entry: RegionEntry,
  fresh: InstanceSnapshot[],
  asOf: number,
  context: ReconcileContext
): ReconcileResult {
  const summary: RegionMergeSummary = { added: [], updated: [], confirmed: [], reverted: [], evicted: [] };
  if (entry.asOf !== undefined && asOf < entry.asOf) {
    return { entry, summary, applied: false };
  }

  const isNewer = entry.asOf === undefined || asOf > entry.asOf;
  const freshById = new Map(fresh.map((snapshot) => [snapshot.id, snapshot]));
  const instances = new Map<string, Instance>();

  for (const [id, previous] of entry.instances) {
    const snapshot = freshById.get(id);
    if (!snapshot) {
      if (!isNewer) {
        instances.set(id, previous);
        continue;
      }
      const missedFetches = previous.missedFetches + 1;
      if (missedFetches >= context.evictionThreshold) {
        summary.evicted.push(id);
        continue;
      }
      instances.set(id, { ...previous, missedFetches });
      continue;
    }

    let optimistic: OptimisticOverlay | undefined;
    if (previous.optimistic) {
      const resolution = resolveOverlay(previous.optimistic, snapshot.state, context.tick);
      optimistic = resolution.overlay;
      if (resolution.outcome === "confirmed") {
        summary.confirmed.push(id);
      } else if (resolution.outcome === "reverted") {
        summary.reverted.push(id);
      }
    }

    if (hasConfirmedChanges(previous, snapshot)) {
      summary.updated.push(id);
    }

    instances.set(id, {
      ...toConfirmedFields(snapshot),
      pinned: previous.pinned,
      lastConfirmed: asOf,
      ...(optimistic ? { optimistic } : {}),
      missedFetches: 0
    });
  }

  for (const snapshot of fresh) {
    if (entry.instances.has(snapshot.id) || instances.has(snapshot.id)) {
      continue;
    }
    summary.added.push(snapshot.id);
    instances.set(snapshot.id, {
      ...toConfirmedFields(snapshot),
      pinned: context.isPinned(entry.region, snapshot.id),
      lastConfirmed: asOf,
      missedFetches: 0
    });
  }

  return {
    entry: {
      region: entry.region,
      instances,
      asOf,
      lastFetchFailed: false,
      seeded: false
    },
    summary,
    applied: true
  };
}

function toConfirmedFields(snapshot: InstanceSnapshot): Omit<Instance, "pinned" | "lastConfirmed" | "missedFetches"> {
  return {
    id: snapshot.id,
    region: snapshot.region,
    name: snapshot.name,
    instanceType: snapshot.instanceType,
    publicIp: snapshot.publicIp,
    privateIp: snapshot.privateIp,
    state: snapshot.state,
    launchTime: snapshot.launchTime
  };
}

function hasConfirmedChanges(previous: Instance, snapshot: InstanceSnapshot): boolean {
  return previous.state !== snapshot.state
    || previous.name !== snapshot.name
    || previous.instanceType !== snapshot.instanceType
    || previous.publicIp !== snapshot.publicIp
    || previous.privateIp !== snapshot.privateIp
    || previous.launchTime !== snapshot.launchTime;
}
