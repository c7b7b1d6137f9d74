import type { Writable } from "node:stream";

import type { StepEventLogger } from "../core/logger.js";

import type { ExecutionNode } from "./node.js";

/**
 * Everything a build step receives from the CI host for one execution.
 */
export type BuildContext = {
  /** Base environment captured by the host for this build. */
  environment: Readonly<Record<string, string>>;
  /** Build-scoped variables; they override `environment` and become `-D` properties. */
  buildVariables: Readonly<Record<string, string>>;
  /** Keys whose values must never appear unmasked in logs. */
  sensitiveVariables: ReadonlySet<string>;
  /** Workspace root on the node, or null when the node holds no workspace. */
  workspace: string | null;
  /** Checkout root of the module being built; often equal to the workspace. */
  moduleRoot: string;
  /** The node the step runs on, or null when it has gone offline. */
  node: ExecutionNode | null;
  /** Build log. */
  output: Writable;
  events?: StepEventLogger;
  signal?: AbortSignal;
};
