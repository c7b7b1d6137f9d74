/**
 * Environment variables for a build step.
 *
 * Overrides follow the CI host conventions: an empty value removes the variable and a
 * `NAME+SUFFIX` key prepends its value to `NAME` (for example `PATH+JDK=/opt/jdk/bin`).
 */

export type VariableResolver = (name: string) => string | undefined;

export type EnvPlatform = "unix" | "windows";

// $NAME, ${NAME} or the $$ escape
const MACRO_PATTERN = /\$([A-Za-z0-9_]+|\{[A-Za-z0-9_.]+\}|\$)/g;

export class EnvVars {
  private readonly values = new Map<string, string>();

  constructor(
    initial: Readonly<Record<string, string | undefined>> = {},
    private readonly platform: EnvPlatform = "unix",
  ) {
    for (const [key, value] of Object.entries(initial)) {
      if (value !== undefined) {
        this.values.set(key, value);
      }
    }
  }

  put(key: string, value: string): void {
    this.values.set(key, value);
  }

  override(key: string, value: string | undefined): void {
    if (value === undefined || value.length === 0) {
      this.values.delete(key);
      return;
    }

    const plus = key.indexOf("+");
    if (plus > 0) {
      const realKey = key.slice(0, plus);
      const existing = this.values.get(realKey);
      const separator = this.platform === "windows" ? ";" : ":";
      this.values.set(realKey, existing ? `${value}${separator}${existing}` : value);
      return;
    }

    this.values.set(key, value);
  }

  overrideAll(overrides: Readonly<Record<string, string>>): void {
    for (const [key, value] of Object.entries(overrides)) {
      this.override(key, value);
    }
  }

  expand(text: string): string;
  expand(text: string | undefined): string | undefined;
  expand(text: string | undefined): string | undefined {
    if (text === undefined) return undefined;
    return replaceMacro(text, (name) => this.values.get(name));
  }

  resolver(): VariableResolver {
    return (name) => this.values.get(name);
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}

/**
 * Replaces `$NAME` and `${NAME}` with resolved values. Unknown names are left untouched and
 * `$$` collapses to a single `$`.
 */
export function replaceMacro(text: string, resolve: VariableResolver): string {
  return text.replace(MACRO_PATTERN, (match, key: string) => {
    if (key === "$") return "$";

    const name = key.startsWith("{") ? key.slice(1, -1) : key;
    const value = resolve(name);
    return value ?? match;
  });
}
