export const HOUR_MS = 60 * 60 * 1000;
export const DEFAULT_MAX_PER_HOUR = 5;
export const DEFAULT_GRACE_PERIOD_MS = 60 * 1000;

export interface RateLimiterOptions {
  maxPerHour?: number;
  gracePeriodMs?: number;
  debug?: boolean;
  now?: () => number;
  startedAt?: number;
}

export class RateLimiter {
  private sent: number[] = [];
  private maxPerHour: number;
  private gracePeriodMs: number;
  private debug: boolean;
  private now: () => number;
  readonly startedAt: number;

  constructor(options: RateLimiterOptions = {}) {
    this.maxPerHour = options.maxPerHour ?? DEFAULT_MAX_PER_HOUR;
    this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
    this.debug = options.debug ?? false;
    this.now = options.now ?? Date.now;
    this.startedAt = options.startedAt ?? this.now();
  }

  prune(): void {
    const cutoff = this.now() - HOUR_MS;
    this.sent = this.sent.filter((t) => t > cutoff);
  }

  count(): number {
    this.prune();
    return this.sent.length;
  }

  isExhausted(): boolean {
    return this.count() >= this.maxPerHour;
  }

  record(): void {
    this.sent.push(this.now());
  }

  /**
   * True while a shutdown-triggered delivery should be held back: the process
   * has been up for less than the grace period and debug is off.
   */
  inGracePeriod(): boolean {
    if (this.debug) return false;
    return this.now() - this.startedAt < this.gracePeriodMs;
  }

  entries(): number[] {
    this.prune();
    return [...this.sent];
  }
}
