/**
 * ExecutionNode models the machine a build step runs on, which may not be the controller.
 * Purpose: keep filesystem checks and tool lookups on the node that launches the process.
 * Assumptions: `executeOn` is a single call that resolves once the remote work is done.
 * Usage: await node.executeOn((ctx) => ctx.exists(path))
 */

import path from "node:path";

import fse from "fs-extra";

import { definedEnv } from "../core/utils.js";

import type { Launcher } from "./launcher.js";

// =============================================================================
// TYPES
// =============================================================================

export type NodePlatform = "unix" | "windows";

export type NodeTaskContext = {
  platform: NodePlatform;
  env: Readonly<Record<string, string>>;
  exists(filePath: string): Promise<boolean>;
};

export type NodeTask<T> = (ctx: NodeTaskContext) => Promise<T> | T;

export interface ExecutionNode {
  readonly name: string;
  readonly platform: NodePlatform;
  readonly launcher: Launcher;
  isOnline(): boolean;
  /** Per-node override of an installation's home directory. */
  toolHome(installationName: string): string | undefined;
  executeOn<T>(task: NodeTask<T>): Promise<T>;
}

export type PathApi = typeof path.posix;

export function pathApiFor(platform: NodePlatform): PathApi {
  return platform === "windows" ? path.win32 : path.posix;
}

// =============================================================================
// LOCAL NODE
// =============================================================================

export type LocalNodeOptions = {
  name?: string;
  launcher: Launcher;
  toolLocations?: Readonly<Record<string, string>>;
  env?: NodeJS.ProcessEnv;
};

export class LocalNode implements ExecutionNode {
  readonly name: string;
  readonly platform: NodePlatform;
  readonly launcher: Launcher;
  private readonly toolLocations: Readonly<Record<string, string>>;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: LocalNodeOptions) {
    this.name = options.name ?? "built-in";
    this.platform = process.platform === "win32" ? "windows" : "unix";
    this.launcher = options.launcher;
    this.toolLocations = options.toolLocations ?? {};
    this.env = options.env ?? process.env;
  }

  isOnline(): boolean {
    return true;
  }

  toolHome(installationName: string): string | undefined {
    return this.toolLocations[installationName];
  }

  async executeOn<T>(task: NodeTask<T>): Promise<T> {
    return task({
      platform: this.platform,
      env: definedEnv(this.env),
      exists: (filePath) => fse.pathExists(filePath),
    });
  }
}
