import { ActionDispatcher } from "../lib/action-dispatcher";
import type { ComputeApi } from "../lib/compute-api";
import type { FleetConfig } from "../lib/config";
import { CLI_NAME } from "../lib/constants";
import { Ec2ComputeApi } from "../lib/ec2-api";
import { CliError } from "../lib/errors";
import { FleetEventBus, type FleetEvent } from "../lib/events";
import { InstanceFetcher } from "../lib/instance-fetcher";
import { createLogger, type Logger } from "../lib/logger";
import { readPinnedKeys, writePinnedKeys } from "../lib/preferences";
import { RefreshScheduler } from "../lib/refresh-scheduler";
import { RegionCatalog } from "../lib/region-catalog";
import { loadSnapshots, saveSnapshots, seedCache } from "../lib/snapshot-store";
import { StateCache } from "../lib/state-cache";
import { IntervalTickSource, type TickSource } from "../lib/tick-source";
import type {
  ActionOutcome,
  Instance,
  InstanceAction,
  ReadFilter,
  Region,
  RegionStatus,
  ScanReport,
  SchedulerState,
  StatusChecks
} from "../lib/types";

export interface FleetSessionOptions {
  config: FleetConfig;
  /** Defaults to the EC2 implementation for `config.homeRegion`. */
  api?: ComputeApi;
  tickSource?: TickSource;
  logger?: Logger;
  /** Read and write pins and the instance snapshot under `config.homeDir`. */
  persist?: boolean;
  displayNames?: Record<string, string>;
  now?: () => number;
}

/**
 * One monitoring session: owns the cache, scheduler and dispatcher and wires
 * them to a single event bus. Call `init()` before use and `teardown()` once.
 */
export class FleetSession {
  readonly bus = new FleetEventBus();
  readonly cache: StateCache;
  readonly catalog: RegionCatalog;
  readonly scheduler: RefreshScheduler;
  readonly dispatcher: ActionDispatcher;
  private readonly api: ComputeApi;
  private readonly ownedApi: Ec2ComputeApi | null;
  private readonly config: FleetConfig;
  private readonly logger: Logger;
  private readonly persist: boolean;
  private initialized = false;

  constructor(options: FleetSessionOptions) {
    this.config = options.config;
    this.logger = options.logger ?? createLogger({ debug: options.config.debug });
    this.persist = options.persist ?? true;

    if (options.api) {
      this.api = options.api;
      this.ownedApi = null;
    } else {
      this.ownedApi = new Ec2ComputeApi({ homeRegion: options.config.homeRegion });
      this.api = this.ownedApi;
    }

    this.cache = new StateCache({
      staleAfterMs: this.config.staleAfterMs,
      evictionThreshold: this.config.evictionThreshold,
      bus: this.bus,
      now: options.now
    });
    this.catalog = new RegionCatalog(this.api, {
      restrictTo: this.config.regions,
      displayNames: options.displayNames
    });
    const fetcher = new InstanceFetcher(this.api, { timeoutMs: this.config.fetchTimeoutMs, now: options.now });
    this.scheduler = new RefreshScheduler({
      catalog: this.catalog,
      fetcher,
      cache: this.cache,
      bus: this.bus,
      tickSource: options.tickSource ?? new IntervalTickSource(this.config.refreshIntervalMs),
      concurrency: this.config.concurrency
    });
    this.dispatcher = new ActionDispatcher(this.api, this.cache, {
      expiryTicks: this.config.optimisticExpiryTicks,
      rebootExpiryTicks: this.config.rebootExpiryTicks
    });
  }

  async init(): Promise<void> {
    if (this.initialized) {
      return;
    }
    this.initialized = true;
    if (!this.persist) {
      return;
    }

    for (const key of await readPinnedKeys(this.config.homeDir)) {
      const separator = key.indexOf("/");
      if (separator > 0) {
        this.cache.setPinned(key.slice(0, separator), key.slice(separator + 1), true);
      }
    }

    const restrictTo = new Set(this.config.regions);
    const snapshots = (await loadSnapshots(this.config.homeDir))
      .filter((snapshot) => restrictTo.size === 0 || restrictTo.has(snapshot.region));
    const seeded = seedCache(this.cache, snapshots);
    this.logger.debug(`Seeded ${seeded} instance(s) from ${snapshots.length} cached region(s).`);
  }

  async teardown(): Promise<void> {
    await this.scheduler.stop();
    if (this.persist && this.initialized) {
      await saveSnapshots(this.config.homeDir, this.cache);
    }
    this.ownedApi?.destroy();
  }

  get schedulerState(): SchedulerState {
    return this.scheduler.state;
  }

  read(filter?: ReadFilter): Instance[] {
    return this.cache.read(filter);
  }

  isStale(region: string): boolean {
    return this.cache.isStale(region);
  }

  regionStatus(region: string): RegionStatus {
    return this.cache.regionStatus(region);
  }

  requestAction(region: string, id: string, action: InstanceAction): Promise<ActionOutcome> {
    return this.dispatcher.requestAction(region, id, action);
  }

  setAutoRefresh(enabled: boolean): void {
    this.scheduler.setAutoRefresh(enabled);
  }

  manualRefresh(): Promise<ScanReport> {
    return this.scheduler.manualRefresh();
  }

  changes(signal?: AbortSignal): AsyncGenerator<FleetEvent, void, undefined> {
    return this.bus.stream(signal);
  }

  regions(): Promise<Region[]> {
    return this.catalog.listRegions();
  }

  describeStatus(region: string, id: string): Promise<StatusChecks> {
    return this.api.describeInstanceStatus(region, id);
  }

  /** Flips the pin on a cached instance and returns the new value. */
  async togglePin(region: string, id: string): Promise<boolean> {
    const instance = this.requireInstance(id, region);
    const pinned = !instance.pinned;
    this.cache.setPinned(region, id, pinned);
    if (this.persist) {
      await writePinnedKeys(this.config.homeDir, this.cache.pinnedKeys());
    }
    return pinned;
  }

  requireInstance(id: string, region?: string): Instance {
    const matches = this.cache.find(id).filter((instance) => !region || instance.region === region);
    if (matches.length === 1) {
      return matches[0];
    }
    if (matches.length > 1) {
      throw new CliError({
        kind: "validation",
        message: `Instance '${id}' exists in several regions: ${matches.map((item) => item.region).join(", ")}.`,
        hint: "Pass --region to choose one."
      });
    }
    throw new CliError({
      kind: "not_found",
      message: formatInstanceNotFoundMessage(id, region, this.cache.read().length)
    });
  }
}

export function formatInstanceNotFoundMessage(id: string, region: string | undefined, knownCount: number): string {
  const where = region ? ` in ${region}` : "";
  if (knownCount === 0) {
    return `Instance '${id}' not found${where}. No instances are known yet.`;
  }
  return `Instance '${id}' not found${where}. Run \`${CLI_NAME} ls\` to see the ${knownCount} known instance(s).`;
}
