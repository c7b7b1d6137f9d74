import os from "node:os";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  antStepHome: string;
};

export type ResolveAntStepHomeOptions = {
  antStepHome?: string;
  env?: NodeJS.ProcessEnv;
};

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveAntStepHome(opts: ResolveAntStepHomeOptions = {}): string {
  if (opts.antStepHome) {
    return path.resolve(opts.antStepHome);
  }

  const envHome = (opts.env ?? process.env).ANT_STEP_HOME;
  if (envHome) {
    return path.resolve(envHome);
  }

  return path.join(os.homedir(), ".ant-step");
}

export function createPathsContext(opts: ResolveAntStepHomeOptions = {}): PathsContext {
  return { antStepHome: resolveAntStepHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function antStepHome(paths?: PathsContext): string {
  return paths?.antStepHome ?? resolveAntStepHome();
}

export function installationsPath(paths?: PathsContext): string {
  return path.join(antStepHome(paths), "installations.yaml");
}

export function logsDir(paths?: PathsContext): string {
  return path.join(antStepHome(paths), "logs");
}

export function runLogPath(runId: string, paths?: PathsContext): string {
  return path.join(logsDir(paths), `run-${runId}.jsonl`);
}

export const STEP_CONFIG_FILENAME = "ant-step.yaml";

export function stepConfigPath(workspace: string): string {
  return path.join(workspace, STEP_CONFIG_FILENAME);
}
