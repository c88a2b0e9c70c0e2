import type { Aggregator } from "./aggregator.js";
import { createLineSplitter } from "./line-splitter.js";
import { FlushScheduler } from "./scheduler.js";
import type { AggregatorStats, FlushResult, WatcherOptions } from "./types.js";

const NEWLINE = Buffer.from("\n");

export interface WatchSummary {
  stats: AggregatorStats;
  final: FlushResult;
  inputError: Error | null;
}

/**
 * Echoes every input line to `output` byte for byte, feeds its decoded text to
 * the aggregator and keeps the flush timer running until the input ends.
 * Resolves after the final flush.
 */
export function startWatcher(aggregator: Aggregator, options: WatcherOptions): Promise<WatchSummary> {
  const { input, output } = options;
  const log = options.log ?? (() => {});
  const scheduler = new FlushScheduler(aggregator, {
    intervalMs: options.flushIntervalMs,
    log,
  });
  const splitter = createLineSplitter();
  let inputError: Error | null = null;
  let closed = false;

  const emit = (line: Buffer) => {
    output.write(Buffer.concat([line, NEWLINE]));
    aggregator.ingest(line.toString("utf8"));
  };

  return new Promise((resolve, reject) => {
    const onData = (chunk: Buffer | string) => {
      const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
      for (const line of splitter.push(bytes)) emit(line);
    };

    const onError = (err: Error) => {
      inputError = err;
      log(`input error: ${err.message}`);
      close();
    };

    const close = () => {
      if (closed) return;
      closed = true;

      input.off("data", onData);
      input.off("end", close);
      input.off("close", close);
      if (options.handleSignals) {
        process.off("SIGTERM", close);
        process.off("SIGINT", close);
      }
      input.pause();

      const rest = splitter.end();
      if (rest) emit(rest);

      scheduler.finish().then(
        (final) => resolve({ stats: aggregator.getStats(), final, inputError }),
        reject,
      );
    };

    input.on("data", onData);
    input.on("error", onError);
    input.on("end", close);
    input.on("close", close);

    if (options.handleSignals) {
      process.on("SIGTERM", close);
      process.on("SIGINT", close);
    }

    scheduler.start();
  });
}
