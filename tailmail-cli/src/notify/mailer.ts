import nodemailer from "nodemailer";
import type { ResolvedMailConfig } from "../config/types.js";
import type { Incident, LineMatcher, Notifier } from "../watch/types.js";
import { formatIncidentsText, formatSubject, renderMailHtml } from "./formatter.js";

export interface MailMessage {
  from: string;
  to: string[];
  subject: string;
  html: string;
  text: string;
}

export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

export interface MailNotifierOptions {
  appName: string;
  mail: ResolvedMailConfig;
  matcher: LineMatcher;
  /** Defaults to an SMTP transport built from `mail.smtp`. */
  transport?: MailTransport;
}

export function createSmtpTransport(mail: ResolvedMailConfig): MailTransport {
  const { host, port, secure, username, password } = mail.smtp;
  return nodemailer.createTransport({
    host,
    port,
    secure,
    auth: username && password ? { user: username, pass: password } : undefined,
  });
}

export function buildMessage(options: MailNotifierOptions, batch: Incident[], errorCount: number): MailMessage {
  return {
    from: options.mail.from,
    to: options.mail.to,
    subject: formatSubject(options.appName, errorCount),
    html: renderMailHtml(options.appName, batch, options.matcher),
    text: formatIncidentsText(batch),
  };
}

export function createMailNotifier(options: MailNotifierOptions): Notifier {
  const transport = options.transport ?? createSmtpTransport(options.mail);

  return {
    async deliver(batch, errorCount) {
      await transport.sendMail(buildMessage(options, batch, errorCount));
    },
  };
}
