import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { DEFAULT_CONTEXT_LINES } from "../watch/assembler.js";
import { DEFAULT_STALE_AFTER_MS } from "../watch/aggregator.js";
import { createMatcher } from "../watch/patterns.js";
import { DEFAULT_QUEUE_SIZE } from "../watch/queue.js";
import { DEFAULT_GRACE_PERIOD_MS, DEFAULT_MAX_PER_HOUR } from "../watch/rate-limiter.js";
import { DEFAULT_FLUSH_INTERVAL_MS } from "../watch/scheduler.js";
import { ConfigError } from "./errors.js";
import type {
	MailConfig,
	ResolvedConfig,
	ResolvedMailConfig,
	SmtpConfig,
	TailmailConfig,
} from "./types.js";

const CONFIG_NAMES = ["tailmail.config.json", ".tailmailrc.json", ".tailmailrc"];
const DEFAULT_SMTP_PORT = 25;

export interface LoadConfigOptions {
	/** Explicit config file; skips discovery. */
	configPath?: string;
	cwd?: string;
	env?: NodeJS.ProcessEnv;
	dryRun?: boolean;
	debug?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(path: string, content: string): unknown {
	try {
		return JSON.parse(content);
	} catch (e) {
		const reason = e instanceof Error ? e.message : String(e);
		throw new ConfigError("config", `Invalid JSON in ${path}: ${reason}`);
	}
}

function readPackageSection(pkgPath: string): unknown {
	try {
		const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
		return isRecord(pkg) ? pkg.tailmail : undefined;
	} catch {
		return undefined;
	}
}

export function findConfigFile(startDir: string): string | null {
	let dir = resolve(startDir);

	for (;;) {
		for (const name of CONFIG_NAMES) {
			const configPath = resolve(dir, name);
			if (existsSync(configPath)) {
				return configPath;
			}
		}

		const pkgPath = resolve(dir, "package.json");
		if (existsSync(pkgPath) && readPackageSection(pkgPath) !== undefined) {
			return pkgPath;
		}

		const parent = dirname(dir);
		if (parent === dir) return null;
		dir = parent;
	}
}

function loadConfigFromFile(configPath: string): unknown {
	const content = readFileSync(configPath, "utf-8");
	const parsed = parseJson(configPath, content);

	if (configPath.endsWith("package.json")) {
		return isRecord(parsed) ? parsed.tailmail : undefined;
	}
	return parsed;
}

function optionalString(obj: Record<string, unknown>, key: string, path: string): string | undefined {
	const value = obj[key];
	if (value === undefined) return undefined;
	if (typeof value !== "string") {
		throw new ConfigError(path, `${path} must be a string`);
	}
	return value;
}

function optionalNumber(obj: Record<string, unknown>, key: string, path: string): number | undefined {
	const value = obj[key];
	if (value === undefined) return undefined;
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new ConfigError(path, `${path} must be a number`);
	}
	return value;
}

function optionalBoolean(obj: Record<string, unknown>, key: string, path: string): boolean | undefined {
	const value = obj[key];
	if (value === undefined) return undefined;
	if (typeof value !== "boolean") {
		throw new ConfigError(path, `${path} must be true or false`);
	}
	return value;
}

function optionalRecord(obj: Record<string, unknown>, key: string, path: string): Record<string, unknown> | undefined {
	const value = obj[key];
	if (value === undefined) return undefined;
	if (!isRecord(value)) {
		throw new ConfigError(path, `${path} must be an object`);
	}
	return value;
}

function parseRecipients(value: unknown): string | string[] | undefined {
	if (value === undefined) return undefined;
	if (typeof value === "string") return value;
	if (Array.isArray(value) && value.every((v): v is string => typeof v === "string")) {
		return value;
	}
	throw new ConfigError("mail.to", "mail.to must be a string or an array of strings");
}

/** Checks the shape of a parsed config file. Every field is optional here. */
export function validateConfig(config: unknown): TailmailConfig {
	if (config === undefined || config === null) return {};
	if (!isRecord(config)) {
		throw new ConfigError("config", "Config must be a JSON object");
	}

	let mail: MailConfig | undefined;
	const mailSection = optionalRecord(config, "mail", "mail");
	if (mailSection) {
		let smtp: SmtpConfig | undefined;
		const smtpSection = optionalRecord(mailSection, "smtp", "mail.smtp");
		if (smtpSection) {
			smtp = {
				host: optionalString(smtpSection, "host", "mail.smtp.host"),
				port: optionalNumber(smtpSection, "port", "mail.smtp.port"),
				secure: optionalBoolean(smtpSection, "secure", "mail.smtp.secure"),
				username: optionalString(smtpSection, "username", "mail.smtp.username"),
				password: optionalString(smtpSection, "password", "mail.smtp.password"),
			};
		}
		mail = {
			from: optionalString(mailSection, "from", "mail.from"),
			to: parseRecipients(mailSection.to),
			smtp,
		};
	}

	return {
		appName: optionalString(config, "appName", "appName"),
		match: optionalString(config, "match", "match"),
		ignore: optionalString(config, "ignore", "ignore"),
		ignoreCase: optionalBoolean(config, "ignoreCase", "ignoreCase"),
		maxEmailsPerHour: optionalNumber(config, "maxEmailsPerHour", "maxEmailsPerHour"),
		contextLines: optionalNumber(config, "contextLines", "contextLines"),
		queueSize: optionalNumber(config, "queueSize", "queueSize"),
		staleAfterMs: optionalNumber(config, "staleAfterMs", "staleAfterMs"),
		flushIntervalMs: optionalNumber(config, "flushIntervalMs", "flushIntervalMs"),
		gracePeriodMs: optionalNumber(config, "gracePeriodMs", "gracePeriodMs"),
		debug: optionalBoolean(config, "debug", "debug"),
		mail,
	};
}

function eitherAorB(a: string | undefined, b: string | undefined): string | undefined {
	if (a !== undefined && a.trim() !== "") return a.trim();
	if (b !== undefined && b.trim() !== "") return b.trim();
	return undefined;
}

function parseIntEnv(key: string, value: string | undefined): number | undefined {
	if (value === undefined || value.trim() === "") return undefined;
	const parsed = Number(value.trim());
	if (!Number.isInteger(parsed)) {
		throw new ConfigError(key, `Error converting ${key} to integer: "${value}"`);
	}
	return parsed;
}

function requireValue(value: string | undefined, key: string, envKey: string): string {
	if (value === undefined) {
		throw new ConfigError(key, `Missing required config value: ${key} (or ${envKey})`);
	}
	return value;
}

function checkInteger(value: number, key: string, min: number): number {
	if (!Number.isInteger(value) || value < min) {
		throw new ConfigError(key, `${key} must be an integer >= ${min}, got ${value}`);
	}
	return value;
}

function toList(to: string | string[] | undefined): string[] {
	if (to === undefined) return [];
	const list = Array.isArray(to) ? to : to.split(",");
	return list.map((addr) => addr.trim()).filter((addr) => addr.length > 0);
}

function resolveMail(
	mail: MailConfig | undefined,
	env: NodeJS.ProcessEnv,
	dryRun: boolean,
): ResolvedMailConfig | null {
	const from = eitherAorB(mail?.from, env.TAILMAIL_MAIL_FROM);
	const toFromFile = toList(mail?.to);
	const to = toFromFile.length > 0 ? toFromFile : toList(env.TAILMAIL_MAIL_TO);
	const host = eitherAorB(mail?.smtp?.host, env.SMTP_HOST);

	if (dryRun && (from === undefined || to.length === 0 || host === undefined)) {
		return null;
	}

	if (to.length === 0) {
		throw new ConfigError("mail.to", "Missing required config value: mail.to (or TAILMAIL_MAIL_TO)");
	}

	const port = mail?.smtp?.port ?? parseIntEnv("SMTP_PORT", env.SMTP_PORT) ?? DEFAULT_SMTP_PORT;

	return {
		from: requireValue(from, "mail.from", "TAILMAIL_MAIL_FROM"),
		to,
		smtp: {
			host: requireValue(host, "mail.smtp.host", "SMTP_HOST"),
			port: checkInteger(port, "mail.smtp.port", 1),
			secure: mail?.smtp?.secure ?? port === 465,
			username: eitherAorB(mail?.smtp?.username, env.SMTP_USERNAME),
			password: eitherAorB(mail?.smtp?.password, env.SMTP_PASSWORD),
		},
	};
}

/**
 * Values from the config file win; the environment fills whatever the file
 * leaves out.
 */
export function resolveConfig(
	config: TailmailConfig,
	options: Omit<LoadConfigOptions, "cwd" | "configPath"> & { configPath?: string | null } = {},
): ResolvedConfig {
	const env = options.env ?? process.env;
	const dryRun = options.dryRun ?? false;

	const appName = requireValue(eitherAorB(config.appName, env.TAILMAIL_APP_NAME), "appName", "TAILMAIL_APP_NAME");
	const match = requireValue(eitherAorB(config.match, env.TAILMAIL_MATCH_PATTERN), "match", "TAILMAIL_MATCH_PATTERN");
	const ignore = eitherAorB(config.ignore, env.TAILMAIL_IGNORE_PATTERN);
	const ignoreCase = config.ignoreCase ?? false;

	const maxEmailsPerHour =
		config.maxEmailsPerHour ??
		parseIntEnv("TAILMAIL_MAX_EMAILS_PER_HOUR", env.TAILMAIL_MAX_EMAILS_PER_HOUR) ??
		DEFAULT_MAX_PER_HOUR;

	const matcher = createMatcher({ match, ignore, ignoreCase });

	return {
		configPath: options.configPath ?? null,
		appName,
		match,
		ignore,
		ignoreCase,
		maxEmailsPerHour: checkInteger(maxEmailsPerHour, "maxEmailsPerHour", 0),
		contextLines: checkInteger(config.contextLines ?? DEFAULT_CONTEXT_LINES, "contextLines", 1),
		queueSize: checkInteger(config.queueSize ?? DEFAULT_QUEUE_SIZE, "queueSize", 1),
		staleAfterMs: checkInteger(config.staleAfterMs ?? DEFAULT_STALE_AFTER_MS, "staleAfterMs", 0),
		flushIntervalMs: checkInteger(config.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS, "flushIntervalMs", 1),
		gracePeriodMs: checkInteger(config.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS, "gracePeriodMs", 0),
		debug: options.debug === true || config.debug === true || env.TAILMAIL_DEBUG === "true",
		dryRun,
		mail: resolveMail(config.mail, env, dryRun),
		matcher,
	};
}

export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
	const cwd = options.cwd ?? process.cwd();
	let configPath: string | null;

	if (options.configPath) {
		configPath = resolve(cwd, options.configPath);
		if (!existsSync(configPath)) {
			throw new ConfigError("config", `Config file not found: ${configPath}`);
		}
	} else {
		configPath = findConfigFile(cwd);
	}

	const config = configPath ? validateConfig(loadConfigFromFile(configPath)) : {};

	return resolveConfig(config, {
		env: options.env,
		dryRun: options.dryRun,
		debug: options.debug,
		configPath,
	});
}

/** Printable view of a resolved config, with the SMTP password masked. */
export function describeConfig(config: ResolvedConfig): Record<string, unknown> {
	const { matcher: _matcher, mail, ...rest } = config;
	return {
		...rest,
		mail: mail && {
			...mail,
			smtp: {
				...mail.smtp,
				password: mail.smtp.password === undefined ? undefined : "********",
			},
		},
	};
}
