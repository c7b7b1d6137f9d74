import { Writable } from "node:stream";

// =============================================================================
// TYPES
// =============================================================================

export type AntNote =
  | { kind: "target"; name: string; line: number }
  | { kind: "task"; name: string; line: number }
  | { kind: "outcome"; result: "success" | "failure"; line: number };

export type AntConsoleAnnotatorOptions = {
  onNote?: (note: AntNote) => void;
  /** Text written to the sink just before the annotated line. */
  encodeNote?: (note: AntNote) => string | undefined;
};

const NEWLINE = 0x0a;
const TASK_PATTERN = /^\s*\[([^\]\s]+)\]/;

// =============================================================================
// ANNOTATOR
// =============================================================================

/**
 * Passes Ant output through to `sink` byte for byte while recognising target headers,
 * task prefixes and the final BUILD SUCCESSFUL / BUILD FAILED line.
 */
export class AntConsoleAnnotator extends Writable {
  private pending: Buffer[] = [];
  private seenEmptyLine = false;
  private lastTask: string | null = null;
  private lineNumber = 0;

  constructor(
    private readonly sink: Writable,
    private readonly options: AntConsoleAnnotatorOptions = {},
  ) {
    super();
  }

  override _write(
    chunk: Buffer | string,
    encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    try {
      const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk, encoding);
      this.consume(bytes);
      callback();
    } catch (err) {
      callback(err instanceof Error ? err : new Error(String(err)));
    }
  }

  override _final(callback: (error?: Error | null) => void): void {
    this.forceEol();
    callback();
  }

  /**
   * Emits whatever partial line is buffered. Safe to call more than once.
   */
  forceEol(): void {
    if (this.pending.length === 0) return;
    const rest = Buffer.concat(this.pending);
    this.pending = [];
    this.eol(rest);
  }

  private consume(bytes: Buffer): void {
    let start = 0;
    let idx: number;
    while ((idx = bytes.indexOf(NEWLINE, start)) >= 0) {
      const piece = bytes.subarray(start, idx + 1);
      const line = this.pending.length > 0 ? Buffer.concat([...this.pending, piece]) : piece;
      this.pending = [];
      this.eol(line);
      start = idx + 1;
    }

    if (start < bytes.length) {
      this.pending.push(Buffer.from(bytes.subarray(start)));
    }
  }

  private eol(raw: Buffer): void {
    this.lineNumber += 1;
    const text = trimEol(raw.toString("utf8"));

    for (const note of this.recognize(text)) {
      this.options.onNote?.(note);
      const encoded = this.options.encodeNote?.(note);
      if (encoded) this.sink.write(encoded);
    }

    this.sink.write(raw);
  }

  private recognize(text: string): AntNote[] {
    const notes: AntNote[] = [];
    const line = this.lineNumber;

    if (this.seenEmptyLine && text.length > 1 && text.endsWith(":") && !text.includes(" ")) {
      notes.push({ kind: "target", name: text.slice(0, -1), line });
      this.lastTask = null;
    }

    const task = TASK_PATTERN.exec(text);
    if (task) {
      const name = task[1];
      if (name !== this.lastTask) {
        notes.push({ kind: "task", name, line });
      }
      this.lastTask = name;
    }

    if (text === "BUILD SUCCESSFUL") {
      notes.push({ kind: "outcome", result: "success", line });
    } else if (text === "BUILD FAILED") {
      notes.push({ kind: "outcome", result: "failure", line });
    }

    this.seenEmptyLine = text.length === 0;
    return notes;
  }
}

function trimEol(text: string): string {
  return text.replace(/[\r\n]+$/, "");
}
