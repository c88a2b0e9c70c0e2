import { createRingBuffer, type RingBuffer } from "./ring-buffer.js";
import type { Incident, LineClass, LineMatcher, SealReason } from "./types.js";

export const DEFAULT_CONTEXT_LINES = 8;
export const CAP_MULTIPLIER = 3;

interface OpenIncident {
  lines: string[];
  lastErrorIndex: number;
  openedAt: number;
}

export interface AssemblerOptions {
  matcher: LineMatcher;
  contextLines?: number;
  now?: () => number;
}

export interface AssembleResult {
  index: number;
  kind: LineClass;
  sealed: Incident | null;
}

/**
 * Groups error lines with the lines around them. Idle until an error line
 * arrives, then open until C lines have passed since the last error line or
 * the incident grows past 3×C lines.
 */
export class IncidentAssembler {
  private ring: RingBuffer<string>;
  private current: OpenIncident | null = null;
  private index = 0;
  private now: () => number;
  private matcher: LineMatcher;
  readonly contextLines: number;
  readonly cap: number;

  constructor(options: AssemblerOptions) {
    this.matcher = options.matcher;
    this.contextLines = options.contextLines ?? DEFAULT_CONTEXT_LINES;
    this.cap = this.contextLines * CAP_MULTIPLIER;
    this.now = options.now ?? Date.now;
    this.ring = createRingBuffer<string>(this.contextLines);
  }

  /**
   * Feeds one non-blank line. While `suspended` (the delivery queue is full)
   * the line only reaches the context ring.
   */
  push(line: string, suspended = false): AssembleResult {
    const index = ++this.index;
    const kind = this.matcher.classify(line);

    if (!suspended) {
      if (kind === "error") {
        this.appendError(line, index);
      } else if (this.current && index - this.current.lastErrorIndex <= this.contextLines) {
        this.current.lines.push(line);
      }
    }

    this.ring.push(line);

    let sealed: Incident | null = null;
    if (this.current) {
      if (index - this.current.lastErrorIndex === this.contextLines) {
        sealed = this.seal("window");
      } else if (this.current.lines.length > this.cap) {
        sealed = this.seal("cap");
      }
    }

    return { index, kind, sealed };
  }

  sealOpen(reason: SealReason): Incident | null {
    return this.current ? this.seal(reason) : null;
  }

  isOpen(): boolean {
    return this.current !== null;
  }

  openedAt(): number | null {
    return this.current?.openedAt ?? null;
  }

  context(): string[] {
    return this.ring.snapshot();
  }

  private appendError(line: string, index: number): void {
    if (!this.current) {
      this.current = {
        lines: [...this.ring.snapshot(), line],
        lastErrorIndex: index,
        openedAt: this.now(),
      };
      return;
    }

    this.current.lines.push(line);
    this.current.lastErrorIndex = index;
  }

  private seal(reason: SealReason): Incident | null {
    const open = this.current;
    if (!open) return null;
    this.current = null;

    return {
      lines: open.lines,
      openedAt: open.openedAt,
      sealedAt: this.now(),
      reason,
    };
  }
}
