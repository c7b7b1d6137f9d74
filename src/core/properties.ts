/**
 * Parser for properties-file text (`key=value`, `key: value`, `key value`).
 *
 * Supports `#`/`!` comments, backslash line continuations and the usual escapes
 * (`\t`, `\n`, `\r`, `\f`, `\uXXXX`). When a key repeats, the last value wins but the key
 * keeps its first position.
 */

export type PropertyEntry = {
  key: string;
  value: string;
};

const WHITESPACE = " \t\f";

export function parseProperties(text: string | undefined): PropertyEntry[] {
  if (!text) return [];

  const entries = new Map<string, string>();
  for (const line of logicalLines(text)) {
    const entry = parseLine(line);
    if (entry) {
      entries.set(entry.key, entry.value);
    }
  }

  return Array.from(entries, ([key, value]) => ({ key, value }));
}

// =============================================================================
// INTERNALS
// =============================================================================

function logicalLines(text: string): string[] {
  const natural = text.split(/\r\n|\r|\n/);
  const lines: string[] = [];
  let pending: string | null = null;

  for (const raw of natural) {
    const line: string = pending === null ? raw : pending + trimLeading(raw);
    const stripped = trimLeading(line);

    if (pending === null && (stripped.length === 0 || isComment(stripped))) {
      continue;
    }

    if (endsWithContinuation(line)) {
      pending = line.slice(0, -1);
      continue;
    }

    pending = null;
    lines.push(stripped);
  }

  if (pending !== null) {
    const stripped = trimLeading(pending);
    if (stripped.length > 0) lines.push(stripped);
  }

  return lines;
}

function parseLine(line: string): PropertyEntry | null {
  if (line.length === 0) return null;

  let keyEnd = 0;
  let escaped = false;
  while (keyEnd < line.length) {
    const c = line[keyEnd];
    if (escaped) {
      escaped = false;
    } else if (c === "\\") {
      escaped = true;
    } else if (c === "=" || c === ":" || WHITESPACE.includes(c)) {
      break;
    }
    keyEnd += 1;
  }

  let valueStart = keyEnd;
  while (valueStart < line.length && WHITESPACE.includes(line[valueStart])) {
    valueStart += 1;
  }
  if (valueStart < line.length && (line[valueStart] === "=" || line[valueStart] === ":")) {
    valueStart += 1;
    while (valueStart < line.length && WHITESPACE.includes(line[valueStart])) {
      valueStart += 1;
    }
  }

  return {
    key: unescape(line.slice(0, keyEnd)),
    value: unescape(line.slice(valueStart)),
  };
}

function unescape(text: string): string {
  let out = "";
  for (let i = 0; i < text.length; i += 1) {
    const c = text[i];
    if (c !== "\\" || i === text.length - 1) {
      out += c;
      continue;
    }

    i += 1;
    const next = text[i];
    switch (next) {
      case "t":
        out += "\t";
        break;
      case "n":
        out += "\n";
        break;
      case "r":
        out += "\r";
        break;
      case "f":
        out += "\f";
        break;
      case "u": {
        const hex = text.slice(i + 1, i + 5);
        if (/^[0-9a-fA-F]{4}$/.test(hex)) {
          out += String.fromCharCode(parseInt(hex, 16));
          i += 4;
        } else {
          out += "u";
        }
        break;
      }
      default:
        out += next;
    }
  }
  return out;
}

function endsWithContinuation(line: string): boolean {
  let count = 0;
  for (let i = line.length - 1; i >= 0 && line[i] === "\\"; i -= 1) {
    count += 1;
  }
  return count % 2 === 1;
}

function isComment(line: string): boolean {
  return line.startsWith("#") || line.startsWith("!");
}

function trimLeading(line: string): string {
  let i = 0;
  while (i < line.length && WHITESPACE.includes(line[i])) i += 1;
  return line.slice(i);
}
