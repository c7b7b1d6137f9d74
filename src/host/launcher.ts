import path from "node:path";
import type { Readable, Writable } from "node:stream";

import { execa } from "execa";

import { MASK_PLACEHOLDER } from "../args/argument-list.js";
import { LaunchFailureError, StepCancelledError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type LaunchSpec = {
  args: string[];
  masks: boolean[];
  env: Readonly<Record<string, string>>;
  cwd: string;
  stdout: Writable;
  signal?: AbortSignal;
};

export type LaunchResult = {
  exitCode: number | null;
  signal?: string;
};

export interface Launcher {
  /**
   * Runs the command to completion. Output is fully written to `spec.stdout` before the
   * returned promise settles. Rejects with LaunchFailureError when the process cannot be
   * started and with StepCancelledError when `spec.signal` aborts it.
   */
  launch(spec: LaunchSpec): Promise<LaunchResult>;
}

// =============================================================================
// COMMAND LINE
// =============================================================================

export function formatCommandLine(args: string[], masks: boolean[], cwd?: string): string {
  let line = "";
  if (cwd) {
    line += `[${path.basename(cwd) || cwd}] `;
  }
  line += "$";

  args.forEach((arg, index) => {
    const token = masks[index] ? MASK_PLACEHOLDER : arg;
    line += " ";
    if (token.includes(" ")) {
      line += token.includes('"') ? `'${token}'` : `"${token}"`;
    } else {
      line += token;
    }
  });

  return line;
}

// =============================================================================
// EXECA LAUNCHER
// =============================================================================

export class ExecaLauncher implements Launcher {
  async launch(spec: LaunchSpec): Promise<LaunchResult> {
    const [command, ...commandArgs] = spec.args;
    if (!command) {
      throw new LaunchFailureError("No command to launch.");
    }

    spec.stdout.write(`${formatCommandLine(spec.args, spec.masks, spec.cwd)}\n`);

    const subprocess = execa(command, commandArgs, {
      cwd: spec.cwd,
      env: spec.env,
      extendEnv: false,
      stdin: "ignore",
      all: true,
      buffer: false,
      signal: spec.signal,
      windowsVerbatimArguments: isCmdShell(command),
    });
    const drained = subprocess.all ? pipeUntilEnd(subprocess.all, spec.stdout) : Promise.resolve();

    try {
      const completed = await subprocess;
      await drained;
      return { exitCode: completed.exitCode };
    } catch (err) {
      const details = resolveExecaErrorDetails(err);
      if (details.exitCode !== undefined || details.signal) {
        await drained;
      }
      return classifyLaunchError(command, details, err);
    }
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

type ExecaErrorDetails = {
  message: string;
  code?: string;
  exitCode?: number;
  signal?: string;
  isCanceled: boolean;
};

function classifyLaunchError(
  command: string,
  details: ExecaErrorDetails,
  err: unknown,
): LaunchResult {
  if (details.isCanceled) {
    throw new StepCancelledError(`Build step cancelled; ${command} was terminated.`, err);
  }
  if (details.exitCode !== undefined) {
    return { exitCode: details.exitCode };
  }
  if (details.signal) {
    return { exitCode: null, signal: details.signal };
  }

  const code = details.code ? ` (${details.code})` : "";
  throw new LaunchFailureError(`Failed to start ${command}${code}: ${details.message}`, err);
}

function resolveExecaErrorDetails(err: unknown): ExecaErrorDetails {
  if (!err || typeof err !== "object") {
    return { message: String(err), isCanceled: false };
  }

  const shortMessage = readField(err, "shortMessage");
  const rawMessage = readField(err, "message");
  const message =
    typeof shortMessage === "string"
      ? shortMessage
      : typeof rawMessage === "string"
        ? rawMessage
        : String(err);

  const code = readField(err, "code");
  const exitCode = readField(err, "exitCode");
  const signal = readField(err, "signal");
  return {
    message,
    code: typeof code === "string" ? code : undefined,
    exitCode: typeof exitCode === "number" ? exitCode : undefined,
    signal: typeof signal === "string" ? signal : undefined,
    isCanceled: readField(err, "isCanceled") === true,
  };
}

function readField(record: object, key: string): unknown {
  return key in record ? Reflect.get(record, key) : undefined;
}

function isCmdShell(command: string): boolean {
  return process.platform === "win32" && /(^|[\\/])cmd(\.exe)?$/i.test(command);
}

function pipeUntilEnd(source: Readable, sink: Writable): Promise<void> {
  return new Promise((resolve) => {
    const cleanup = (): void => {
      source.off("end", onDone);
      source.off("close", onDone);
      source.off("error", onDone);
    };
    const onDone = (): void => {
      cleanup();
      resolve();
    };

    source.on("end", onDone);
    source.on("close", onDone);
    source.on("error", onDone);
    source.pipe(sink, { end: false });
  });
}
