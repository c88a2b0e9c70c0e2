export type {
  TailmailConfig,
  MailConfig,
  SmtpConfig,
  ResolvedConfig,
  ResolvedMailConfig,
  ResolvedSmtpConfig,
} from "./config/types.js";

export { ConfigError } from "./config/errors.js";

export {
  loadConfig,
  resolveConfig,
  validateConfig,
  findConfigFile,
  describeConfig,
  type LoadConfigOptions,
} from "./config/loader.js";

export { runWatch, createNotifier, createLogger, type RunOptions } from "./core/run.js";

export * as watch from "./watch/index.js";
export * as notify from "./notify/index.js";
