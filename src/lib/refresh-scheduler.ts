import { DEFAULT_FETCH_CONCURRENCY } from "./constants";
import { AuthError, describeError } from "./errors";
import type { FleetEventBus } from "./events";
import type { InstanceFetcher } from "./instance-fetcher";
import type { RegionCatalog } from "./region-catalog";
import type { StateCache } from "./state-cache";
import type { TickSource } from "./tick-source";
import type { Region, RegionFailure, ScanReport, SchedulerState } from "./types";
import { settleBounded } from "./worker-pool";

export interface RefreshSchedulerOptions {
  catalog: RegionCatalog;
  fetcher: Pick<InstanceFetcher, "fetchInstances">;
  cache: StateCache;
  bus: FleetEventBus;
  tickSource: TickSource;
  concurrency?: number;
}

/**
 * Drives refresh scans. At most one scan is in flight: ticks that arrive during
 * a scan are skipped and manual refreshes join the running scan.
 */
export class RefreshScheduler {
  private current: SchedulerState = "idle";
  private inFlight: Promise<ScanReport> | null = null;
  private readonly catalog: RegionCatalog;
  private readonly fetcher: Pick<InstanceFetcher, "fetchInstances">;
  private readonly cache: StateCache;
  private readonly bus: FleetEventBus;
  private readonly tickSource: TickSource;
  private readonly concurrency: number;

  constructor(options: RefreshSchedulerOptions) {
    this.catalog = options.catalog;
    this.fetcher = options.fetcher;
    this.cache = options.cache;
    this.bus = options.bus;
    this.tickSource = options.tickSource;
    this.concurrency = options.concurrency ?? DEFAULT_FETCH_CONCURRENCY;
  }

  get state(): SchedulerState {
    return this.current;
  }

  get isScanInFlight(): boolean {
    return this.inFlight !== null;
  }

  start(): void {
    if (this.current !== "idle") {
      return;
    }
    this.beginTicking();
  }

  /** Suppresses future ticks. A scan already in flight still commits. */
  pause(): void {
    if (this.current === "halted") {
      return;
    }
    this.tickSource.stop();
    this.current = "paused";
  }

  resume(): void {
    if (this.current !== "paused" && this.current !== "halted") {
      return;
    }
    this.beginTicking();
  }

  setAutoRefresh(enabled: boolean): void {
    if (!enabled) {
      this.pause();
    } else if (this.current === "idle") {
      this.start();
    } else {
      this.resume();
    }
  }

  manualRefresh(): Promise<ScanReport> {
    return this.inFlight ?? this.beginScan();
  }

  async whenIdle(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  async stop(): Promise<void> {
    this.tickSource.stop();
    this.current = "idle";
    await this.whenIdle();
  }

  private beginTicking(): void {
    this.current = "scanning";
    this.tickSource.start(() => this.onTick());
  }

  private onTick(): void {
    if (this.current !== "scanning") {
      return;
    }
    if (this.inFlight) {
      this.bus.publish({ type: "tick-skipped", tick: this.cache.currentTick });
      return;
    }
    this.beginScan().catch((error: unknown) => {
      this.bus.publish({ type: "scan-failed", reason: describeError(error) });
    });
  }

  private beginScan(): Promise<ScanReport> {
    const scan = this.runScan().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = scan;
    return scan;
  }

  private async runScan(): Promise<ScanReport> {
    let regions: Region[];
    try {
      regions = await this.catalog.enabledRegions();
    } catch (error) {
      const reason = describeError(error);
      const halted = error instanceof AuthError;
      this.bus.publish({ type: "scan-failed", reason });
      const report: ScanReport = { tick: this.cache.currentTick, refreshed: [], failed: [], halted, catalogError: reason };
      if (halted) {
        this.halt(reason, []);
        report.haltReason = reason;
      }
      return report;
    }

    const tick = this.cache.advanceTick();
    this.bus.publish({ type: "scan-started", tick, regions: regions.map((region) => region.code) });

    const results = await settleBounded(regions, this.concurrency, (region) => this.fetcher.fetchInstances(region.code));

    // Single synchronous commit pass.
    const refreshed: string[] = [];
    const failed: RegionFailure[] = [];
    let authFailure: AuthError | undefined;
    for (const [index, result] of results.entries()) {
      const region = regions[index].code;
      if (result.ok) {
        this.cache.mergeConfirmed(region, result.value.instances, result.value.asOf);
        refreshed.push(region);
        continue;
      }

      const reason = describeError(result.error);
      this.cache.markFetchFailed(region, reason);
      failed.push({ region, reason });
      if (result.error instanceof AuthError) {
        authFailure = authFailure ?? result.error;
      } else {
        this.bus.publish({ type: "region-unavailable", region, reason });
      }
    }

    if (authFailure) {
      this.halt(authFailure.message, failed);
    }

    const report: ScanReport = { tick, refreshed, failed, halted: authFailure !== undefined };
    if (authFailure) {
      report.haltReason = authFailure.message;
    }
    this.bus.publish({ type: "scan-completed", report });
    return report;
  }

  private halt(reason: string, failures: RegionFailure[]): void {
    this.tickSource.stop();
    this.current = "halted";
    this.bus.publish({ type: "halted", reason, failures });
  }
}
