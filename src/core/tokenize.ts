const DELIMITERS = " \t\n\r\f";

type TokenizerState = "between" | "token" | "single" | "double";

/**
 * Splits on whitespace while keeping quoted segments together.
 *
 * Single and double quotes are removed; inside either, a backslash escapes the next
 * character. An empty quoted string (`""`) still yields an empty token.
 */
export function tokenize(input: string | undefined): string[] {
  if (!input) return [];

  const tokens: string[] = [];
  let state: TokenizerState = "between";
  let current = "";
  let escape = false;

  for (const c of input) {
    switch (state) {
      case "between":
        if (DELIMITERS.includes(c)) break;
        current = "";
        if (c === "'") {
          state = "single";
        } else if (c === '"') {
          state = "double";
        } else {
          current = c;
          state = "token";
        }
        break;
      case "token":
        if (DELIMITERS.includes(c)) {
          tokens.push(current);
          state = "between";
        } else if (c === "'") {
          state = "single";
        } else if (c === '"') {
          state = "double";
        } else {
          current += c;
        }
        break;
      case "single":
      case "double": {
        const quote = state === "single" ? "'" : '"';
        if (escape) {
          escape = false;
          current += c;
        } else if (c === quote) {
          state = "token";
        } else if (c === "\\") {
          escape = true;
        } else {
          current += c;
        }
        break;
      }
    }
  }

  if (state !== "between") {
    tokens.push(current);
  }

  return tokens;
}
