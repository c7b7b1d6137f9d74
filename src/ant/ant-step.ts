/**
 * AntStep runs Ant as one build step.
 * Purpose: turn a step configuration plus host context into one Ant process and a pass/fail.
 * Assumptions: the host supplies an online node, workspace paths and the build log.
 * Usage: await new AntStep(config, registry).perform(context)
 */

import { finished } from "node:stream/promises";

import { ArgumentListBuilder } from "../args/argument-list.js";
import { reescapeForWindows } from "../args/windows-command.js";
import { EnvVars } from "../core/env-vars.js";
import { formatErrorMessage } from "../core/error-format.js";
import { LaunchFailureError, StepConfigurationError } from "../core/errors.js";
import { logStepEvent, nullEventLogger, type StepEventLogger } from "../core/logger.js";
import type { BuildContext } from "../host/build-context.js";
import { pathApiFor, type ExecutionNode } from "../host/node.js";

import { chooseBuildFile } from "./build-file.js";
import { AntConsoleAnnotator, type AntNote } from "./console-annotator.js";
import { ANT_OPTS_VAR, defaultAntCommand, type AntInstallation } from "./installation.js";
import type { InstallationStore } from "./installation-registry.js";

// =============================================================================
// TYPES
// =============================================================================

export type AntStepConfig = {
  /** Targets, options and properties, separated by whitespace or newlines. */
  targets?: string;
  antName?: string;
  antOpts?: string;
  buildFile?: string;
  /** Extra `-D` properties in properties-file syntax. */
  properties?: string;
};

export type AntStepOptions = {
  encodeNote?: (note: AntNote) => string | undefined;
  now?: () => number;
};

export const MESSAGES = {
  nodeOffline: "Cannot get installation for node, since it is not online",
  executableNotFound: (name: string) =>
    `Cannot find executable from the chosen Ant installation "${name}"`,
  buildFileNotFound: (buildFile: string) => `Unable to find build script at ${buildFile}`,
  execFailed: "command execution failed.",
  globalConfigNeeded: " Maybe you need to configure where your Ant installations are?",
  projectConfigNeeded:
    " Maybe you need to configure the job to choose one of your Ant installations?",
} as const;

// failures this soon after launch usually mean `ant` is not on the PATH
const QUICK_FAILURE_MS = 1000;

// =============================================================================
// STEP
// =============================================================================

export class AntStep {
  readonly targets: string;
  readonly antName?: string;
  readonly antOpts?: string;
  readonly buildFile?: string;
  readonly properties?: string;

  constructor(
    config: AntStepConfig,
    private readonly installations: InstallationStore,
    private readonly options: AntStepOptions = {},
  ) {
    this.targets = config.targets ?? "";
    this.antName = config.antName;
    this.antOpts = fixEmptyAndTrim(config.antOpts);
    this.buildFile = fixEmptyAndTrim(config.buildFile);
    this.properties = fixEmptyAndTrim(config.properties);
  }

  /**
   * The configured installation, or undefined to run the default `ant` command.
   */
  getAnt(): AntInstallation | undefined {
    return this.installations.find(this.antName);
  }

  async perform(context: BuildContext): Promise<boolean> {
    const events = context.events ?? nullEventLogger;
    const node = context.node;
    if (!node || !node.isOnline()) {
      throw abort(events, MESSAGES.nodeOffline);
    }

    logStepEvent(events, "step.start", { node: node.name, targets: this.targets });

    const env = new EnvVars(context.environment, node.platform);
    env.overrideAll(context.buildVariables);

    const args = new ArgumentListBuilder();
    const installation = await this.resolveInstallation(node, env, events);
    args.add(installation ? installation.executable : defaultAntCommand(node.platform));

    const buildFile = env.expand(this.buildFile);
    const targets = env.expand(this.targets);

    const resolved = await chooseBuildFile({
      moduleRoot: context.moduleRoot,
      workspace: context.workspace,
      buildFile,
      targets,
      node,
    });
    if (!resolved.exists) {
      throw abort(events, MESSAGES.buildFileNotFound(resolved.path));
    }
    logStepEvent(events, "step.build_file", { path: resolved.path });

    const pathApi = pathApiFor(node.platform);
    if (buildFile !== undefined) {
      args.add("-file").add(pathApi.basename(resolved.path));
    }

    const sensitive = context.sensitiveVariables;
    args.addKeyValuePairs("-D", context.buildVariables, sensitive);
    args.addKeyValuePairsFromPropertyString("-D", this.properties, env.resolver(), sensitive);
    args.addTokenized(targets.replace(/[\t\r\n]+/g, " "));

    installation?.ant.buildEnvVars(env);
    if (this.antOpts !== undefined) {
      env.put(ANT_OPTS_VAR, env.expand(this.antOpts));
    }

    const command = node.platform === "unix" ? args : reescapeForWindows(args.toWindowsCommand());
    logStepEvent(events, "step.command", { command: command.toString() });

    const exitCode = await this.launch({
      command,
      env,
      cwd: pathApi.dirname(resolved.path),
      node,
      context,
      events,
      usedInstallation: installation !== undefined,
    });

    const success = exitCode === 0;
    logStepEvent(events, "step.complete", { exit_code: exitCode, success });
    return success;
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async resolveInstallation(
    node: ExecutionNode,
    env: EnvVars,
    events: StepEventLogger,
  ): Promise<{ ant: AntInstallation; executable: string } | undefined> {
    const configured = this.getAnt();
    if (!configured) {
      logStepEvent(events, "step.installation", { name: null, command: "default" });
      return undefined;
    }

    // node translation first: per-node homes may themselves contain variables
    const ant = configured.forNode(node).forEnvironment(env);
    const executable = await ant.getExecutable(node);
    if (executable === null) {
      throw abort(events, MESSAGES.executableNotFound(ant.name));
    }

    logStepEvent(events, "step.installation", { name: ant.name, home: ant.home, executable });
    return { ant, executable };
  }

  private async launch(input: {
    command: ArgumentListBuilder;
    env: EnvVars;
    cwd: string;
    node: ExecutionNode;
    context: BuildContext;
    events: StepEventLogger;
    usedInstallation: boolean;
  }): Promise<number | null> {
    const { context, events } = input;
    const now = this.options.now ?? Date.now;
    const annotator = new AntConsoleAnnotator(context.output, {
      encodeNote: this.options.encodeNote,
      onNote: (note) => logAntNote(events, note),
    });

    const startTime = now();
    logStepEvent(events, "step.launch", { cwd: input.cwd });

    try {
      const result = await input.node.launcher.launch({
        args: input.command.toList(),
        masks: input.command.toMaskArray(),
        env: input.env.toRecord(),
        cwd: input.cwd,
        stdout: annotator,
        signal: context.signal,
      });
      return result.exitCode;
    } catch (err) {
      if (!(err instanceof LaunchFailureError)) {
        throw err;
      }

      annotator.forceEol();
      context.output.write(`${formatErrorMessage(err)}\n`);
      let message: string = MESSAGES.execFailed;
      if (!input.usedInstallation && now() - startTime < QUICK_FAILURE_MS) {
        message +=
          this.installations.getInstallations().length === 0
            ? MESSAGES.globalConfigNeeded
            : MESSAGES.projectConfigNeeded;
      }
      logStepEvent(events, "step.abort", { reason: message });
      throw new LaunchFailureError(message, err);
    } finally {
      annotator.end();
      await finished(annotator);
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function fixEmptyAndTrim(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function abort(events: StepEventLogger, message: string): StepConfigurationError {
  logStepEvent(events, "step.abort", { reason: message });
  return new StepConfigurationError(message);
}

function logAntNote(events: StepEventLogger, note: AntNote): void {
  if (note.kind === "target") {
    logStepEvent(events, "ant.target", { name: note.name, line: note.line });
  } else if (note.kind === "outcome") {
    logStepEvent(events, "ant.outcome", { result: note.result, line: note.line });
  }
}
