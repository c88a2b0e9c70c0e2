import type { Incident, LineMatcher } from "../watch/types.js";

const INCIDENT_SEPARATOR_HTML = "…<br />\n";
const INCIDENT_SEPARATOR_TEXT = "…\n";

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function formatSubject(appName: string, errorCount: number): string {
  return `[Alert] ${appName} reported ${errorCount} error(s)`;
}

export function formatIncidentsHtml(batch: Incident[], matcher: LineMatcher): string {
  return batch
    .map((incident) =>
      incident.lines
        .map((line) =>
          matcher.isError(line)
            ? `<span style="color: black">${escapeHtml(line)}</span>\n`
            : `${escapeHtml(line)}\n`,
        )
        .join(""),
    )
    .join(INCIDENT_SEPARATOR_HTML);
}

export function formatIncidentsText(batch: Incident[]): string {
  return batch.map((incident) => incident.lines.map((line) => `${line}\n`).join("")).join(INCIDENT_SEPARATOR_TEXT);
}

export function renderMailHtml(appName: string, batch: Incident[], matcher: LineMatcher): string {
  return `<html>
  <meta charset="utf-8" />
  <body style="background-color: #f4f5f6; font-family: sans-serif;">
    <div style="padding-top: 20px; font: bold italic 35px arial, sans-serif; color: #b6bdc3; text-align: center;">
      ${escapeHtml(appName)}
    </div>
    <div style="padding: 30px;">
      <div style="background-color: #fff; padding: 20px; border-radius: 4px; font-size: 14px; color: #808080;">
        <pre style="font-family: monospace; white-space: pre-wrap;">${formatIncidentsHtml(batch, matcher)}</pre>
      </div>
      <div style="margin-top: 20px; padding: 10px; font-size: 15px; color: #9a9ea6; text-align: center;">
        This email alert was produced by tailmail
      </div>
    </div>
  </body>
</html>
`;
}
