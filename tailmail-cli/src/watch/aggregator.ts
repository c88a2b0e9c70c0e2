import { IncidentAssembler } from "./assembler.js";
import { isBlankLine } from "./patterns.js";
import { DeliveryQueue } from "./queue.js";
import { RateLimiter } from "./rate-limiter.js";
import type {
  AggregatorOptions,
  AggregatorStats,
  FlushResult,
  Incident,
  LineMatcher,
  Logger,
  Notifier,
} from "./types.js";

export const DEFAULT_STALE_AFTER_MS = 2 * 60 * 1000;

export interface FlushOptions {
  final?: boolean;
}

/**
 * Holds every piece of state the ingest path and the flush timer share.
 *
 * `ingest` and the bookkeeping half of `flush` are synchronous, so neither
 * can observe the other half-done. Only the notifier call awaits, and it works
 * on a batch already drained from the queue.
 */
export class Aggregator {
  private assembler: IncidentAssembler;
  private queue: DeliveryQueue;
  private limiter: RateLimiter;
  private matcher: LineMatcher;
  private notifier: Notifier;
  private staleAfterMs: number;
  private now: () => number;
  private log: Logger;
  private chain: Promise<void> = Promise.resolve();
  private pending = 0;
  private stats: Omit<AggregatorStats, "queued" | "open"> = {
    linesSeen: 0,
    errorLines: 0,
    incidentsSealed: 0,
    incidentsDropped: 0,
  };

  constructor(options: AggregatorOptions) {
    this.now = options.now ?? Date.now;
    this.matcher = options.matcher;
    this.notifier = options.notifier;
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_STALE_AFTER_MS;
    this.log = options.log ?? (() => {});
    this.assembler = new IncidentAssembler({
      matcher: options.matcher,
      contextLines: options.contextLines,
      now: this.now,
    });
    this.queue = new DeliveryQueue(options.queueSize);
    this.limiter = new RateLimiter({
      maxPerHour: options.maxPerHour,
      gracePeriodMs: options.gracePeriodMs,
      debug: options.debug,
      now: this.now,
    });
  }

  ingest(line: string): void {
    if (isBlankLine(line)) return;

    this.stats.linesSeen++;
    const result = this.assembler.push(line, this.queue.isFull());
    if (result.kind === "error") this.stats.errorLines++;
    if (result.sealed) this.enqueue(result.sealed);
  }

  /**
   * Seals a stale (or, when final, any) open incident and delivers the queue.
   * Calls are chained: a flush starts only after the previous one settled.
   */
  flush(options: FlushOptions = {}): Promise<FlushResult> {
    this.pending++;
    const next = this.chain.then(() => this.flushNow(options.final ?? false));
    const settle = () => {
      this.pending--;
    };
    this.chain = next.then(settle, settle);
    return next;
  }

  isFlushing(): boolean {
    return this.pending > 0;
  }

  getStats(): AggregatorStats {
    return {
      ...this.stats,
      queued: this.queue.size(),
      open: this.assembler.isOpen(),
    };
  }

  queuedIncidents(): Incident[] {
    return this.queue.snapshot();
  }

  sentInLastHour(): number[] {
    return this.limiter.entries();
  }

  private enqueue(incident: Incident): void {
    this.stats.incidentsSealed++;
    if (!this.queue.enqueue(incident)) {
      this.stats.incidentsDropped++;
    }
  }

  private isStale(): boolean {
    const openedAt = this.assembler.openedAt();
    return openedAt !== null && this.now() - openedAt > this.staleAfterMs;
  }

  private async flushNow(final: boolean): Promise<FlushResult> {
    if (final) {
      const incident = this.assembler.sealOpen("final");
      if (incident) this.enqueue(incident);
    } else if (this.isStale()) {
      const incident = this.assembler.sealOpen("stale");
      if (incident) this.enqueue(incident);
    }

    if (this.queue.size() === 0) {
      return { status: "empty" };
    }

    if (final && this.limiter.inGracePeriod()) {
      const dropped = this.queue.drainAll().length;
      this.log(`exited within the startup grace period, not sending ${dropped} incident(s)`);
      return { status: "suppressed", dropped };
    }

    if (this.limiter.isExhausted()) {
      const dropped = this.queue.drainAll().length;
      this.log(`hourly send limit reached, dropping ${dropped} incident(s)`);
      return { status: "rate-limited", dropped };
    }

    const batch = this.queue.drainAll();
    const errorCount = countErrors(batch, this.matcher);

    try {
      await this.notifier.deliver(batch, errorCount);
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      this.log(`delivery failed, dropping ${batch.length} incident(s): ${error.message}`);
      return { status: "failed", dropped: batch.length, error };
    }

    this.limiter.record();
    this.log(`sent ${batch.length} incident(s) with ${errorCount} error(s)`);
    return { status: "delivered", incidents: batch.length, errorCount };
  }
}

/** Error lines across the batch, seeded context included. This is the count the notifier gets. */
export function countErrors(batch: Incident[], matcher: LineMatcher): number {
  let count = 0;
  for (const incident of batch) {
    for (const line of incident.lines) {
      if (matcher.isError(line)) count++;
    }
  }
  return count;
}
