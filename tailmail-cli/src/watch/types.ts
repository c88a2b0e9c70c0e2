export type LineClass = "error" | "normal";

export interface PatternOptions {
  match: string;
  ignore?: string;
  ignoreCase?: boolean;
}

export interface LineMatcher {
  classify(line: string): LineClass;
  isError(line: string): boolean;
}

export type SealReason = "window" | "cap" | "stale" | "final";

export interface Incident {
  lines: string[];
  openedAt: number;
  sealedAt: number;
  reason: SealReason;
}

export interface Notifier {
  /** Rejects when the batch could not be handed to the channel. */
  deliver(batch: Incident[], errorCount: number): Promise<void>;
}

export type Logger = (message: string) => void;

export type FlushResult =
  | { status: "empty" }
  | { status: "suppressed"; dropped: number }
  | { status: "rate-limited"; dropped: number }
  | { status: "delivered"; incidents: number; errorCount: number }
  | { status: "failed"; dropped: number; error: Error };

export interface AggregatorOptions {
  matcher: LineMatcher;
  notifier: Notifier;
  contextLines?: number;
  queueSize?: number;
  maxPerHour?: number;
  staleAfterMs?: number;
  gracePeriodMs?: number;
  debug?: boolean;
  now?: () => number;
  log?: Logger;
}

export interface AggregatorStats {
  linesSeen: number;
  errorLines: number;
  incidentsSealed: number;
  incidentsDropped: number;
  queued: number;
  open: boolean;
}

export interface WatcherOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  flushIntervalMs?: number;
  handleSignals?: boolean;
  log?: Logger;
}
