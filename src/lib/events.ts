import type { OptimisticTarget, RegionFailure, ScanReport } from "./types";

export interface RegionMergeSummary {
  added: string[];
  updated: string[];
  confirmed: string[];
  reverted: string[];
  evicted: string[];
}

export type FleetEvent =
  | ({ type: "region-merged"; region: string; tick: number } & RegionMergeSummary)
  | { type: "region-seeded"; region: string; count: number }
  | { type: "region-unavailable"; region: string; reason: string }
  | { type: "optimistic-applied"; region: string; id: string; targetState: OptimisticTarget }
  | { type: "pin-changed"; region: string; id: string; pinned: boolean }
  | { type: "scan-started"; tick: number; regions: string[] }
  | { type: "scan-completed"; report: ScanReport }
  | { type: "scan-failed"; reason: string }
  | { type: "tick-skipped"; tick: number }
  | { type: "halted"; reason: string; failures: RegionFailure[] };

export type FleetEventListener = (event: FleetEvent) => void;

export class FleetEventBus {
  private readonly listeners = new Set<FleetEventListener>();

  publish(event: FleetEvent): void {
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }

  subscribe(listener: FleetEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  /**
   * Lazy event stream: nothing is subscribed until the first `next()`, and every
   * call returns an independent stream. Ends when `signal` aborts.
   */
  async *stream(signal?: AbortSignal): AsyncGenerator<FleetEvent, void, undefined> {
    const queue: FleetEvent[] = [];
    let wake: (() => void) | undefined;
    const unsubscribe = this.subscribe((event) => {
      queue.push(event);
      wake?.();
    });
    const onAbort = () => wake?.();
    signal?.addEventListener("abort", onAbort);

    try {
      while (!signal?.aborted) {
        const next = queue.shift();
        if (next) {
          yield next;
          continue;
        }
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
        wake = undefined;
      }
    } finally {
      signal?.removeEventListener("abort", onAbort);
      unsubscribe();
    }
  }
}
