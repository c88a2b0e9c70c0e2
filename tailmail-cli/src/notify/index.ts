export {
  escapeHtml,
  formatSubject,
  formatIncidentsHtml,
  formatIncidentsText,
  renderMailHtml,
} from "./formatter.js";
export {
  createMailNotifier,
  createSmtpTransport,
  buildMessage,
  type MailMessage,
  type MailTransport,
  type MailNotifierOptions,
} from "./mailer.js";
export { createConsoleNotifier } from "./console.js";
