export type TickListener = () => void;

/** Where the scheduler's periodic tick signal comes from. */
export interface TickSource {
  start(listener: TickListener): void;
  stop(): void;
}

export class IntervalTickSource implements TickSource {
  private handle: NodeJS.Timeout | undefined;

  constructor(private readonly intervalMs: number) {}

  start(listener: TickListener): void {
    this.stop();
    this.handle = setInterval(listener, this.intervalMs);
  }

  stop(): void {
    if (this.handle) {
      clearInterval(this.handle);
      this.handle = undefined;
    }
  }
}

/** Ticks only when `tick()` is called. */
export class ManualTickSource implements TickSource {
  private listener: TickListener | undefined;

  start(listener: TickListener): void {
    this.listener = listener;
  }

  stop(): void {
    this.listener = undefined;
  }

  get active(): boolean {
    return this.listener !== undefined;
  }

  tick(): void {
    this.listener?.();
  }
}
