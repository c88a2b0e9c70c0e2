import type { Aggregator } from "./aggregator.js";
import type { FlushResult, Logger } from "./types.js";

export const DEFAULT_FLUSH_INTERVAL_MS = 30 * 1000;

export interface FlushSchedulerOptions {
  intervalMs?: number;
  log?: Logger;
}

export class FlushScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private aggregator: Aggregator;
  private intervalMs: number;
  private log: Logger;
  private finalFlush: Promise<FlushResult> | null = null;

  constructor(aggregator: Aggregator, options: FlushSchedulerOptions = {}) {
    this.aggregator = aggregator;
    this.intervalMs = options.intervalMs ?? DEFAULT_FLUSH_INTERVAL_MS;
    this.log = options.log ?? (() => {});
  }

  start(): void {
    if (this.timer || this.finalFlush) return;

    this.tick();
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /** Stops the timer and runs the one final flush, after any flush in flight. */
  finish(): Promise<FlushResult> {
    this.stop();
    if (!this.finalFlush) {
      this.finalFlush = this.aggregator.flush({ final: true });
    }
    return this.finalFlush;
  }

  private tick(): void {
    // skip while a delivery is still in flight
    if (this.aggregator.isFlushing()) return;

    this.aggregator.flush().catch((e: unknown) => {
      this.log(`flush failed: ${e instanceof Error ? e.message : String(e)}`);
    });
  }
}
