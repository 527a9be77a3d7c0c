import { DEFAULT_EVICTION_MISS_THRESHOLD } from "./constants";
import { FleetEventBus, type RegionMergeSummary } from "./events";
import { displayState, stateSortPriority } from "./lifecycle";
import { emptyRegionEntry, reconcileRegion, type RegionEntry } from "./reconciler";
import type {
  Instance,
  InstanceSnapshot,
  OptimisticTarget,
  ReadFilter,
  RegionStatus,
  SortColumn
} from "./types";

export interface StateCacheOptions {
  staleAfterMs: number;
  evictionThreshold?: number;
  bus?: FleetEventBus;
  pinnedKeys?: Iterable<string>;
  now?: () => number;
}

export function instanceKey(region: string, id: string): string {
  return `${region}/${id}`;
}

/**
 * In-memory instance store, one entry per region.
 *
 * Every mutation is a synchronous method call, which on the single event loop
 * makes this object the only writer: a merge is always observed whole.
 */
export class StateCache {
  private readonly regions = new Map<string, RegionEntry>();
  private readonly pinned: Set<string>;
  private readonly staleAfterMs: number;
  private readonly evictionThreshold: number;
  private readonly bus: FleetEventBus;
  private readonly now: () => number;
  private tick = 0;

  constructor(options: StateCacheOptions) {
    this.staleAfterMs = options.staleAfterMs;
    this.evictionThreshold = options.evictionThreshold ?? DEFAULT_EVICTION_MISS_THRESHOLD;
    this.bus = options.bus ?? new FleetEventBus();
    this.pinned = new Set(options.pinnedKeys ?? []);
    this.now = options.now ?? Date.now;
  }

  get currentTick(): number {
    return this.tick;
  }

  advanceTick(): number {
    this.tick += 1;
    return this.tick;
  }

  read(filter: ReadFilter = {}): Instance[] {
    const regionFilter = filter.regions && filter.regions.length > 0 ? new Set(filter.regions) : undefined;
    const stateFilter = filter.states && filter.states.length > 0 ? new Set(filter.states) : undefined;

    let rows: Instance[] = [];
    for (const entry of this.regions.values()) {
      if (regionFilter && !regionFilter.has(entry.region)) {
        continue;
      }
      for (const instance of entry.instances.values()) {
        if (stateFilter && !stateFilter.has(displayState(instance))) {
          continue;
        }
        rows.push({ ...instance });
      }
    }

    if (filter.sortBy) {
      rows = sortInstances(rows, filter.sortBy, filter.descending ?? false);
    }

    return [...rows.filter((row) => row.pinned), ...rows.filter((row) => !row.pinned)];
  }

  get(region: string, id: string): Instance | undefined {
    const instance = this.regions.get(region)?.instances.get(id);
    return instance ? { ...instance } : undefined;
  }

  find(id: string): Instance[] {
    return this.read().filter((instance) => instance.id === id);
  }

  knownRegions(): string[] {
    return [...this.regions.keys()];
  }

  isStale(region: string, now = this.now()): boolean {
    const entry = this.regions.get(region);
    if (!entry || entry.seeded || entry.lastFetchFailed || entry.asOf === undefined) {
      return true;
    }
    return now - entry.asOf > this.staleAfterMs;
  }

  regionStatus(region: string): RegionStatus {
    const entry = this.regions.get(region);
    return {
      region,
      asOf: entry?.asOf,
      lastFetchFailed: entry?.lastFetchFailed ?? false,
      lastError: entry?.lastError,
      instanceCount: entry?.instances.size ?? 0
    };
  }

  applyOptimistic(region: string, id: string, targetState: OptimisticTarget, expiresAfterTicks: number): boolean {
    const entry = this.regions.get(region);
    const instance = entry?.instances.get(id);
    if (!entry || !instance) {
      return false;
    }

    entry.instances.set(id, {
      ...instance,
      optimistic: { targetState, issuedAtTick: this.tick, expiresAfterTicks }
    });
    this.bus.publish({ type: "optimistic-applied", region, id, targetState });
    return true;
  }

  mergeConfirmed(region: string, fresh: InstanceSnapshot[], asOf: number): RegionMergeSummary | null {
    const current = this.regions.get(region) ?? emptyRegionEntry(region);
    const result = reconcileRegion(current, fresh, asOf, {
      tick: this.tick,
      evictionThreshold: this.evictionThreshold,
      isPinned: (entryRegion, id) => this.pinned.has(instanceKey(entryRegion, id))
    });
    if (!result.applied) {
      return null;
    }

    this.regions.set(region, result.entry);
    this.bus.publish({ type: "region-merged", region, tick: this.tick, ...result.summary });
    return result.summary;
  }

  /** Flags the region stale after a failed fetch; cached instances stay as they are. */
  markFetchFailed(region: string, reason: string): void {
    const entry = this.regions.get(region) ?? emptyRegionEntry(region);
    this.regions.set(region, { ...entry, lastFetchFailed: true, lastError: reason });
  }

  /** Loads previously persisted instances for a region that has not been fetched yet. */
  seed(region: string, instances: InstanceSnapshot[], asOf: number): boolean {
    if (this.regions.has(region)) {
      return false;
    }

    const entry = emptyRegionEntry(region);
    for (const snapshot of instances) {
      entry.instances.set(snapshot.id, {
        ...snapshot,
        pinned: this.pinned.has(instanceKey(region, snapshot.id)),
        lastConfirmed: asOf,
        missedFetches: 0
      });
    }
    this.regions.set(region, { ...entry, asOf, seeded: true });
    this.bus.publish({ type: "region-seeded", region, count: instances.length });
    return true;
  }

  setPinned(region: string, id: string, pinned: boolean): boolean {
    const key = instanceKey(region, id);
    if (this.pinned.has(key) === pinned) {
      return false;
    }

    if (pinned) {
      this.pinned.add(key);
    } else {
      this.pinned.delete(key);
    }

    const entry = this.regions.get(region);
    const instance = entry?.instances.get(id);
    if (entry && instance) {
      entry.instances.set(id, { ...instance, pinned });
    }
    this.bus.publish({ type: "pin-changed", region, id, pinned });
    return true;
  }

  pinnedKeys(): string[] {
    return [...this.pinned];
  }

  clear(): void {
    this.regions.clear();
    this.tick = 0;
  }
}

function sortInstances(rows: Instance[], column: SortColumn, descending: boolean): Instance[] {
  const direction = descending ? -1 : 1;
  return [...rows].sort((left, right) => {
    if (column === "state") {
      return direction * (stateSortPriority(displayState(left)) - stateSortPriority(displayState(right)));
    }
    const a = sortText(left, column);
    const b = sortText(right, column);
    // Blank values sort last in both directions.
    if (!a || !b) {
      return a === b ? 0 : a ? -1 : 1;
    }
    return direction * a.localeCompare(b);
  });
}

function sortText(instance: Instance, column: Exclude<SortColumn, "state">): string {
  switch (column) {
    case "region":
      return instance.region.toLowerCase();
    case "name":
      return instance.name.toLowerCase();
    case "id":
      return instance.id.toLowerCase();
    case "type":
      return instance.instanceType.toLowerCase();
  }
}
