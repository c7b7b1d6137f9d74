/*
Purpose: keep empty `-Dname=` properties alive when Ant runs through cmd.exe.
Assumptions: the input already went through ArgumentListBuilder.toWindowsCommand().
Usage: reescapeForWindows(args.toWindowsCommand()) or with an explicit strategy.
*/

import { ArgumentListBuilder } from "./argument-list.js";

// =============================================================================
// TYPES
// =============================================================================

/**
 * `wrapped`: the shell prefix (`cmd.exe /C`) is its own tokens and every later token is a
 * separate argument.
 * `joined`: older hosts folded the whole command into the final token.
 */
export type WindowsEscapeStrategy =
  | { kind: "wrapped"; prefixLength: number }
  | { kind: "joined" };

export const DEFAULT_SHELL_PREFIX_LENGTH = 2;

const EMPTY_PROPERTY_TOKEN = /^(-D[^" ]+)=$/;
const EMPTY_PROPERTY_IN_LINE = /(?<= )(-D[^" ]+)= /g;

// =============================================================================
// PUBLIC API
// =============================================================================

export function selectWindowsStrategy(
  args: ArgumentListBuilder,
  prefixLength = DEFAULT_SHELL_PREFIX_LENGTH,
): WindowsEscapeStrategy {
  return args.size > prefixLength + 1 ? { kind: "wrapped", prefixLength } : { kind: "joined" };
}

export function reescapeForWindows(
  args: ArgumentListBuilder,
  strategy: WindowsEscapeStrategy = selectWindowsStrategy(args),
): ArgumentListBuilder {
  switch (strategy.kind) {
    case "wrapped":
      return reescapeWrapped(args, strategy.prefixLength);
    case "joined":
      return reescapeJoined(args);
  }
}

// =============================================================================
// STRATEGIES
// =============================================================================

function reescapeWrapped(args: ArgumentListBuilder, prefixLength: number): ArgumentListBuilder {
  const source = args.toArguments();
  const result = new ArgumentListBuilder();

  source.forEach((arg, index) => {
    if (index < prefixLength) {
      result.add(arg.token);
      return;
    }
    result.add(quoteEmptyProperty(arg.token), arg.masked);
  });

  return result;
}

function reescapeJoined(args: ArgumentListBuilder): ArgumentListBuilder {
  const source = args.toArguments();
  if (source.length === 0) {
    return new ArgumentListBuilder();
  }

  const last = source[source.length - 1];
  const rewritten = last.token.replace(EMPTY_PROPERTY_IN_LINE, '$1="" ');
  source[source.length - 1] = { token: rewritten, masked: last.masked };

  return ArgumentListBuilder.fromArguments(source);
}

function quoteEmptyProperty(token: string): string {
  return EMPTY_PROPERTY_TOKEN.test(token) ? `${token}""` : token;
}
