/*
Purpose: shared error formatting helpers for logs, CLI output and build logs.
Assumptions: callers only need string representations; colour is opt-in.
Usage: formatErrorMessage(err), formatErrorLines(err, { mode: "debug" }).
*/

import { UserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan" | "green";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  bold: [1, 22],
  dim: [2, 22],
  red: [31, 39],
  green: [32, 39],
  yellow: [33, 39],
  cyan: [36, 39],
};

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];
  const debug = options.mode === "debug";

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
    if (debug) {
      lines.push({ kind: "code", text: error.code });
      lines.push({ kind: "name", text: error.name });
    }
  } else if (error instanceof Error) {
    lines.push({ kind: "title", text: error.message });
    if (debug) {
      lines.push({ kind: "name", text: error.name });
    }
  } else {
    lines.push({ kind: "title", text: String(error) });
    return lines;
  }

  if (!debug) {
    return lines;
  }

  const cause = error.cause;
  if (cause !== undefined && cause !== null) {
    lines.push({ kind: "cause", text: formatErrorMessage(cause) });
  }
  if (error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

// =============================================================================
// COLOUR
// =============================================================================

export function resolveColorEnabled(input: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
  env?: NodeJS.ProcessEnv;
}): boolean {
  if (input.useColor === false) return false;
  if (!input.stream?.isTTY) return false;

  const env = input.env ?? process.env;
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") return false;

  return true;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}
