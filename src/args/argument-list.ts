import { replaceMacro, type VariableResolver } from "../core/env-vars.js";
import { parseProperties } from "../core/properties.js";
import { tokenize } from "../core/tokenize.js";

// =============================================================================
// TYPES
// =============================================================================

export type Argument = {
  token: string;
  masked: boolean;
};

export const MASK_PLACEHOLDER = "********";

// Characters that force a token into quotes for cmd.exe
const WINDOWS_QUOTE_TRIGGERS = " *?,;";
const WINDOWS_SPECIAL = "^&<>|";

// =============================================================================
// BUILDER
// =============================================================================

/**
 * Ordered command-line tokens, each with a flag saying whether it must be masked in logs.
 */
export class ArgumentListBuilder {
  private readonly args: Argument[] = [];

  constructor(...tokens: string[]) {
    this.addAll(...tokens);
  }

  static fromArguments(args: readonly Argument[]): ArgumentListBuilder {
    const builder = new ArgumentListBuilder();
    for (const arg of args) {
      builder.add(arg.token, arg.masked);
    }
    return builder;
  }

  get size(): number {
    return this.args.length;
  }

  add(token: string, masked = false): this {
    this.args.push({ token, masked });
    return this;
  }

  addMasked(token: string): this {
    return this.add(token, true);
  }

  addAll(...tokens: string[]): this {
    for (const token of tokens) {
      this.add(token);
    }
    return this;
  }

  addKeyValuePair(prefix: string, key: string, value: string, masked: boolean): this {
    return this.add(`${prefix}${key}=${value}`, masked);
  }

  addKeyValuePairs(
    prefix: string,
    pairs: Readonly<Record<string, string>>,
    sensitiveKeys: ReadonlySet<string> = new Set(),
  ): this {
    for (const [key, value] of Object.entries(pairs)) {
      this.addKeyValuePair(prefix, key, value, sensitiveKeys.has(key));
    }
    return this;
  }

  /**
   * Adds one pair per entry of properties-file text. Keys and values are macro-expanded
   * against `resolve` after parsing, so backslashes in resolved values survive.
   */
  addKeyValuePairsFromPropertyString(
    prefix: string,
    properties: string | undefined,
    resolve: VariableResolver,
    sensitiveKeys: ReadonlySet<string> = new Set(),
  ): this {
    for (const entry of parseProperties(properties)) {
      const key = replaceMacro(entry.key, resolve);
      const value = replaceMacro(entry.value, resolve);
      this.addKeyValuePair(prefix, key, value, sensitiveKeys.has(key));
    }
    return this;
  }

  addTokenized(raw: string | undefined): this {
    return this.addAll(...tokenize(raw));
  }

  toList(): string[] {
    return this.args.map((arg) => arg.token);
  }

  toMaskArray(): boolean[] {
    return this.args.map((arg) => arg.masked);
  }

  toArguments(): Argument[] {
    return this.args.map((arg) => ({ ...arg }));
  }

  clone(): ArgumentListBuilder {
    return ArgumentListBuilder.fromArguments(this.args);
  }

  /**
   * Wraps the command for cmd.exe so the exit code of a batch file is reported correctly:
   * `cmd.exe /C "<args> && exit %%ERRORLEVEL%%"`. With `escapeVars`, `%NAME%` references are
   * broken up so cmd.exe does not expand them.
   */
  toWindowsCommand(escapeVars = false): ArgumentListBuilder {
    const windows = new ArgumentListBuilder("cmd.exe", "/C");

    this.args.forEach((arg, index) => {
      windows.add(quoteForCmd(arg.token, index === 0, escapeVars), arg.masked);
    });

    // %% so ERRORLEVEL expands after the batch file ran, not while cmd.exe parses the line
    return windows.addAll("&&", "exit", '%%ERRORLEVEL%%"');
  }

  toString(): string {
    return this.args
      .map((arg) => {
        const token = arg.masked ? MASK_PLACEHOLDER : arg.token;
        return token.includes(" ") || token.length === 0 ? `"${token}"` : token;
      })
      .join(" ");
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function quoteForCmd(arg: string, first: boolean, escapeVars: boolean): string {
  let quoted = false;
  let percent = false;
  let out = "";

  const startQuoting = (at: number): void => {
    out = `"${arg.slice(0, at)}`;
    quoted = true;
  };

  for (let j = 0; j < arg.length; j += 1) {
    let c = arg[j];
    if (!quoted && WINDOWS_QUOTE_TRIGGERS.includes(c)) {
      startQuoting(j);
    } else if (WINDOWS_SPECIAL.includes(c)) {
      if (!quoted) startQuoting(j);
    } else if (c === '"') {
      if (!quoted) startQuoting(j);
      out += '"';
    } else if (percent && escapeVars && /[A-Za-z]/.test(c)) {
      if (!quoted) startQuoting(j);
      out += `"${c}`;
      c = '"';
    }
    percent = c === "%";
    if (quoted) out += c;
  }

  if (first) {
    return quoted ? `"${out}"` : `"${arg}`;
  }
  return quoted ? `${out}"` : arg;
}
