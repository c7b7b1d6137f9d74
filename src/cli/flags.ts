import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

// =============================================================================
// FLAG PARSING
// =============================================================================

export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Parses repeated `key=value` flags. The first `=` splits; the value may be empty.
 */
export function parseKeyValueFlags(values: string[], flag: string): Record<string, string> {
  const out: Record<string, string> = {};

  for (const raw of values) {
    const eq = raw.indexOf("=");
    if (eq <= 0) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: `Invalid ${flag} value.`,
        message: `Expected key=value but got "${raw}".`,
        hint: `Pass ${flag} name=value, for example ${flag} version=1.0.`,
      });
    }
    out[raw.slice(0, eq)] = raw.slice(eq + 1);
  }

  return out;
}

/**
 * Joins CLI target words back into one targets string, re-quoting words that contain
 * whitespace or quotes so the tokenizer sees them as one token again.
 */
export function joinTargets(words: string[]): string {
  return words
    .map((word) => (/[\s"'\\]/.test(word) || word.length === 0 ? quoteTarget(word) : word))
    .join(" ");
}

function quoteTarget(word: string): string {
  return `"${word.replace(/(["\\])/g, "\\$1")}"`;
}
