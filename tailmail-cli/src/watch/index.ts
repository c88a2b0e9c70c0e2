export type {
  LineClass,
  PatternOptions,
  LineMatcher,
  SealReason,
  Incident,
  Notifier,
  Logger,
  FlushResult,
  AggregatorOptions,
  AggregatorStats,
  WatcherOptions,
} from "./types.js";

export { createMatcher, isBlankLine } from "./patterns.js";

export { createLineSplitter, type LineSplitter } from "./line-splitter.js";

export { createRingBuffer, type RingBuffer } from "./ring-buffer.js";

export { IncidentAssembler, DEFAULT_CONTEXT_LINES, type AssembleResult } from "./assembler.js";

export { DeliveryQueue, DEFAULT_QUEUE_SIZE } from "./queue.js";

export { RateLimiter, HOUR_MS, DEFAULT_MAX_PER_HOUR, DEFAULT_GRACE_PERIOD_MS } from "./rate-limiter.js";

export { Aggregator, countErrors, DEFAULT_STALE_AFTER_MS, type FlushOptions } from "./aggregator.js";

export { FlushScheduler, DEFAULT_FLUSH_INTERVAL_MS } from "./scheduler.js";

export { startWatcher, type WatchSummary } from "./watcher.js";
