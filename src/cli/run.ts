import fs from "node:fs";
import path from "node:path";

import { AntStep } from "../ant/ant-step.js";
import type { AntNote } from "../ant/console-annotator.js";
import {
  InstallationRegistry,
  YamlInstallationPersistence,
} from "../ant/installation-registry.js";
import { StepConfigSchema, type StepConfig } from "../core/config.js";
import { loadStepConfig } from "../core/config-loader.js";
import {
  createAnsiFormatter,
  resolveColorEnabled,
  type AnsiFormatter,
} from "../core/error-format.js";
import { JsonlLogger } from "../core/logger.js";
import {
  createPathsContext,
  installationsPath,
  runLogPath,
  stepConfigPath,
} from "../core/paths.js";
import { defaultRunId, definedEnv } from "../core/utils.js";
import { ExecaLauncher } from "../host/launcher.js";
import { LocalNode } from "../host/node.js";

import { toUserFacingError } from "./error-format.js";
import { joinTargets, parseKeyValueFlags } from "./flags.js";
import { createStepStopSignalHandler } from "./signal-handlers.js";

export type RunCommandOptions = {
  config?: string;
  ant?: string;
  antOpts?: string;
  buildFile?: string;
  properties?: string;
  define?: string[];
  sensitive?: string[];
  workspace?: string;
  moduleRoot?: string;
  runId?: string;
  home?: string;
  color?: boolean;
};

export type RunCommandResult = {
  runId: string;
  success: boolean;
  logPath: string;
};

export async function runCommand(
  targetWords: string[],
  opts: RunCommandOptions,
): Promise<RunCommandResult> {
  try {
    const workspace = path.resolve(opts.workspace ?? process.cwd());
    const config = resolveStepConfig(workspace, opts.config);
    const paths = createPathsContext({ antStepHome: opts.home });
    const registry = await InstallationRegistry.load(
      new YamlInstallationPersistence(installationsPath(paths)),
    );

    const runId = opts.runId ?? defaultRunId();
    const logPath = runLogPath(runId, paths);
    const events = new JsonlLogger(logPath, { runId, step: "ant" });

    const format = createAnsiFormatter(
      resolveColorEnabled({ stream: process.stdout, useColor: opts.color }),
    );
    const step = new AntStep(
      {
        targets: targetWords.length > 0 ? joinTargets(targetWords) : config.targets,
        antName: opts.ant ?? config.ant_name,
        antOpts: opts.antOpts ?? config.ant_opts,
        buildFile: opts.buildFile ?? config.build_file,
        properties: opts.properties ?? config.properties,
      },
      registry,
      { encodeNote: (note) => encodeNoteForTerminal(note, format) },
    );

    const stopHandler = createStepStopSignalHandler({
      onSignal: (signal) => console.log(`Received ${signal}. Stopping Ant (run ${runId}).`),
    });

    let success: boolean;
    try {
      success = await step.perform({
        environment: definedEnv(process.env),
        buildVariables: {
          ...config.variables,
          ...parseKeyValueFlags(opts.define ?? [], "--define"),
        },
        sensitiveVariables: new Set([...config.sensitive_variables, ...(opts.sensitive ?? [])]),
        workspace,
        moduleRoot: path.resolve(opts.moduleRoot ?? config.module_root ?? workspace),
        node: new LocalNode({
          name: config.node.name,
          launcher: new ExecaLauncher(),
          toolLocations: config.node.tool_locations,
        }),
        output: process.stdout,
        events,
        signal: stopHandler.signal,
      });
    } finally {
      stopHandler.cleanup();
      events.close();
    }

    console.log(`Finished: ${success ? "SUCCESS" : "FAILURE"}`);
    if (!success) {
      process.exitCode = 1;
    }
    return { runId, success, logPath };
  } catch (error) {
    throw toUserFacingError(error);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function resolveStepConfig(workspace: string, explicitPath: string | undefined): StepConfig {
  if (explicitPath) {
    return loadStepConfig(explicitPath);
  }

  const discovered = stepConfigPath(workspace);
  if (fs.existsSync(discovered)) {
    return loadStepConfig(discovered);
  }

  return StepConfigSchema.parse({});
}

function encodeNoteForTerminal(note: AntNote, format: AnsiFormatter): string | undefined {
  switch (note.kind) {
    case "target":
      return format("> ", ["cyan", "bold"]);
    case "outcome":
      return note.result === "success" ? format("+ ", ["green"]) : format("! ", ["red", "bold"]);
    case "task":
      return undefined;
  }
}
