const LF = 0x0a;
const CR = 0x0d;

export interface LineSplitter {
  /** Returns the lines completed by `chunk`, without their terminators. */
  push(chunk: Buffer): Buffer[];
  /** Returns the trailing unterminated line, if any. */
  end(): Buffer | null;
}

function dropCR(line: Buffer): Buffer {
  return line.length > 0 && line[line.length - 1] === CR ? line.subarray(0, line.length - 1) : line;
}

/**
 * Splits a byte stream on `\n`. A `\r` right before the `\n` is dropped; any
 * other `\r` stays part of the line. Bytes are never decoded.
 */
export function createLineSplitter(): LineSplitter {
  let pending: Buffer = Buffer.alloc(0);

  return {
    push(chunk) {
      const data = pending.length > 0 ? Buffer.concat([pending, chunk]) : chunk;
      const lines: Buffer[] = [];
      let start = 0;
      let newline = data.indexOf(LF, start);

      while (newline !== -1) {
        lines.push(dropCR(data.subarray(start, newline)));
        start = newline + 1;
        newline = data.indexOf(LF, start);
      }

      pending = Buffer.from(data.subarray(start));
      return lines;
    },

    end() {
      if (pending.length === 0) return null;
      const line = dropCR(pending);
      pending = Buffer.alloc(0);
      return line;
    },
  };
}
