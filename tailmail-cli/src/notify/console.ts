import type { Notifier } from "../watch/types.js";
import { formatIncidentsText, formatSubject } from "./formatter.js";

const RULE = "═══════════════════════════════════════";

/** Prints batches instead of mailing them (`tailmail watch --dry-run`). */
export function createConsoleNotifier(
  appName: string,
  output: NodeJS.WritableStream = process.stderr,
): Notifier {
  return {
    async deliver(batch, errorCount) {
      output.write(`${RULE}\n${formatSubject(appName, errorCount)}\n${RULE}\n`);
      output.write(formatIncidentsText(batch));
      output.write(`${RULE}\n`);
    },
  };
}
