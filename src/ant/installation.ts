import path from "node:path";

import { replaceMacro, type EnvVars } from "../core/env-vars.js";
import { isDirectory, pathExists } from "../core/utils.js";
import { pathApiFor, type ExecutionNode, type NodePlatform } from "../host/node.js";

// =============================================================================
// TYPES
// =============================================================================

export type ToolProperty = {
  key: string;
  value: string;
};

export type AntInstallationInit = {
  name: string;
  home: string;
  properties?: readonly ToolProperty[];
};

export type FormValidation = { kind: "ok" } | { kind: "error"; message: string };

export const ANT_HOME_VAR = "ANT_HOME";
export const ANT_OPTS_VAR = "ANT_OPTS";

// =============================================================================
// INSTALLATION
// =============================================================================

/**
 * A named Ant distribution. Instances are immutable; specializing for a node or an
 * environment returns a new installation.
 */
export class AntInstallation {
  readonly name: string;
  readonly home: string;
  readonly properties: readonly ToolProperty[];

  constructor(init: AntInstallationInit) {
    this.name = init.name;
    this.home = launderHome(init.home);
    this.properties = Object.freeze((init.properties ?? []).map((p) => ({ ...p })));
    Object.freeze(this);
  }

  forNode(node: ExecutionNode): AntInstallation {
    return this.withHome(node.toolHome(this.name) ?? this.home);
  }

  forEnvironment(env: EnvVars): AntInstallation {
    return this.withHome(env.expand(this.home));
  }

  buildEnvVars(env: EnvVars): void {
    env.put(ANT_HOME_VAR, this.home);
  }

  /**
   * Path of the `ant` launcher on the node, or null when it does not exist there.
   */
  async getExecutable(node: ExecutionNode): Promise<string | null> {
    return node.executeOn(async (ctx) => {
      const exe = executablePath(this.home, ctx.platform, ctx.env);
      return (await ctx.exists(exe)) ? exe : null;
    });
  }

  toJSON(): AntInstallationInit {
    return { name: this.name, home: this.home, properties: this.properties.map((p) => ({ ...p })) };
  }

  private withHome(home: string): AntInstallation {
    return new AntInstallation({ name: this.name, home, properties: this.properties });
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function defaultAntCommand(platform: NodePlatform): string {
  return platform === "unix" ? "ant" : "ant.bat";
}

export function executablePath(
  home: string,
  platform: NodePlatform,
  nodeEnv: Readonly<Record<string, string>>,
): string {
  const expandedHome = replaceMacro(home, (name) => nodeEnv[name]);
  return pathApiFor(platform).join(expandedHome, "bin", defaultAntCommand(platform));
}

/**
 * Ant rejects ANT_HOME values with a trailing separator, notably on Windows.
 */
export function launderHome(home: string): string {
  return home.replace(/[\\/]+$/, "");
}

// =============================================================================
// FORM CHECKS
// =============================================================================

export function checkInstallationName(name: string | undefined): FormValidation {
  if (!name || name.trim().length === 0) {
    return { kind: "error", message: "Required" };
  }
  return { kind: "ok" };
}

export async function checkAntHome(home: string): Promise<FormValidation> {
  if (home === "") {
    return { kind: "ok" };
  }

  if (!(await isDirectory(home))) {
    return { kind: "error", message: `${home} is not a directory` };
  }

  if (!(await pathExists(path.join(home, "lib", "ant.jar")))) {
    return { kind: "error", message: `${home} doesn't look like an Ant directory` };
  }

  return { kind: "ok" };
}
