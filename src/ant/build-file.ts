import { StepConfigurationError } from "../core/errors.js";
import { tokenize } from "../core/tokenize.js";
import { pathApiFor, type ExecutionNode, type PathApi } from "../host/node.js";

// =============================================================================
// TYPES
// =============================================================================

export const DEFAULT_BUILD_FILE = "build.xml";

const BUILD_FILE_FLAGS = new Set(["-f", "-file", "-buildfile"]);

export type ResolvedBuildFile = {
  path: string;
  exists: boolean;
};

export type ChooseBuildFileInput = {
  moduleRoot: string;
  workspace: string | null;
  buildFile?: string;
  targets: string;
  node: ExecutionNode;
};

// =============================================================================
// RESOLUTION
// =============================================================================

/**
 * Build script location relative to `base`: the explicit build file, else the value of a
 * `-f`/`-file`/`-buildfile` flag written into the targets, else `build.xml`.
 */
export function resolveBuildFile(
  base: string,
  buildFile: string | undefined,
  targets: string,
  pathApi: PathApi,
): string {
  if (buildFile !== undefined) return pathApi.resolve(base, buildFile);

  // some users put the -f option in the targets field
  const tokens = tokenize(targets);
  for (let i = 0; i < tokens.length - 1; i += 1) {
    if (BUILD_FILE_FLAGS.has(tokens[i])) {
      return pathApi.resolve(base, tokens[i + 1]);
    }
  }

  return pathApi.resolve(base, DEFAULT_BUILD_FILE);
}

/**
 * Tries the module root, then the workspace root, then the raw build file path. The first
 * candidate that exists wins; otherwise the last one tried is returned with `exists: false`.
 */
export async function chooseBuildFile(input: ChooseBuildFileInput): Promise<ResolvedBuildFile> {
  const pathApi = pathApiFor(input.node.platform);
  const exists = (candidate: string): Promise<boolean> =>
    input.node.executeOn((ctx) => ctx.exists(candidate));

  const fromModuleRoot = resolveBuildFile(
    input.moduleRoot,
    input.buildFile,
    input.targets,
    pathApi,
  );

  if (input.workspace === null) {
    throw new StepConfigurationError("Workspace is not available. Agent may be disconnected.");
  }

  if (await exists(fromModuleRoot)) {
    return { path: fromModuleRoot, exists: true };
  }

  const fromWorkspace = resolveBuildFile(input.workspace, input.buildFile, input.targets, pathApi);
  if (await exists(fromWorkspace)) {
    return { path: fromWorkspace, exists: true };
  }

  if (input.buildFile === undefined) {
    return { path: fromWorkspace, exists: false };
  }

  const raw = pathApi.resolve(input.buildFile);
  return { path: raw, exists: await exists(raw) };
}
