import type { ResolvedConfig } from "../config/types.js";
import { createConsoleNotifier } from "../notify/console.js";
import { createMailNotifier, type MailTransport } from "../notify/mailer.js";
import { Aggregator } from "../watch/aggregator.js";
import type { Logger, Notifier } from "../watch/types.js";
import { startWatcher, type WatchSummary } from "../watch/watcher.js";

export const LOG_PREFIX = "[tailmail]";

export interface RunOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  quiet?: boolean;
  handleSignals?: boolean;
  now?: () => number;
  /** Replaces the notifier built from the config. */
  notifier?: Notifier;
  transport?: MailTransport;
}

export function createLogger(quiet: boolean): Logger {
  return quiet ? () => {} : (message) => console.error(`${LOG_PREFIX} ${message}`);
}

export function createNotifier(config: ResolvedConfig, transport?: MailTransport): Notifier {
  if (config.dryRun || !config.mail) {
    return createConsoleNotifier(config.appName);
  }
  return createMailNotifier({
    appName: config.appName,
    mail: config.mail,
    matcher: config.matcher,
    transport,
  });
}

export async function runWatch(config: ResolvedConfig, options: RunOptions = {}): Promise<WatchSummary> {
  const { quiet = false, handleSignals = true } = options;
  const log = createLogger(quiet);

  const aggregator = new Aggregator({
    matcher: config.matcher,
    notifier: options.notifier ?? createNotifier(config, options.transport),
    contextLines: config.contextLines,
    queueSize: config.queueSize,
    maxPerHour: config.maxEmailsPerHour,
    staleAfterMs: config.staleAfterMs,
    gracePeriodMs: config.gracePeriodMs,
    debug: config.debug,
    now: options.now,
    log,
  });

  if (config.debug) {
    log(`debug mode: startup grace period disabled`);
  }

  const summary = await startWatcher(aggregator, {
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
    flushIntervalMs: config.flushIntervalMs,
    handleSignals,
    log,
  });

  const { stats } = summary;
  log(
    `input closed: ${stats.linesSeen} line(s), ${stats.errorLines} error line(s), ` +
      `${stats.incidentsSealed} incident(s), ${stats.incidentsDropped} dropped`,
  );

  return summary;
}
