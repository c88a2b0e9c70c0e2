import type { LineMatcher } from "../watch/types.js";

export interface SmtpConfig {
	host?: string;
	port?: number;
	secure?: boolean;
	username?: string;
	password?: string;
}

export interface MailConfig {
	from?: string;
	/** One address or several. */
	to?: string | string[];
	smtp?: SmtpConfig;
}

export interface TailmailConfig {
	appName?: string;
	match?: string;
	ignore?: string;
	ignoreCase?: boolean;
	maxEmailsPerHour?: number;
	/** Lines of context kept before and after an error line. */
	contextLines?: number;
	queueSize?: number;
	/** An incident open longer than this is sealed by the next flush. */
	staleAfterMs?: number;
	flushIntervalMs?: number;
	gracePeriodMs?: number;
	debug?: boolean;
	mail?: MailConfig;
}

export interface ResolvedSmtpConfig {
	host: string;
	port: number;
	secure: boolean;
	username?: string;
	password?: string;
}

export interface ResolvedMailConfig {
	from: string;
	to: string[];
	smtp: ResolvedSmtpConfig;
}

export interface ResolvedConfig {
	configPath: string | null;
	appName: string;
	match: string;
	ignore?: string;
	ignoreCase: boolean;
	maxEmailsPerHour: number;
	contextLines: number;
	queueSize: number;
	staleAfterMs: number;
	flushIntervalMs: number;
	gracePeriodMs: number;
	debug: boolean;
	dryRun: boolean;
	/** Null in dry-run mode when no mail settings were given. */
	mail: ResolvedMailConfig | null;
	matcher: LineMatcher;
}
