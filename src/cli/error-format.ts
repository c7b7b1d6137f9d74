/*
Purpose: map step failures to user-facing errors and lay them out for the terminal.
Assumptions: stderr is the default stream; non-TTY output disables color.
Usage: throw toUserFacingError(err); console.error(renderCliError(err, { debug })).
*/

import {
  createAnsiFormatter,
  formatErrorMessage,
  resolveColorEnabled,
  type AnsiFormatter,
} from "../core/error-format.js";
import {
  ConfigError,
  LaunchFailureError,
  StepCancelledError,
  StepConfigurationError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type UserFacingErrorCode,
} from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type StepErrorRule = {
  matches: (error: unknown) => boolean;
  code: UserFacingErrorCode;
  title: string;
  hint?: string;
  exitCode?: number;
};

export const CANCELLED_EXIT_CODE = 130;

// Most specific first: LaunchFailureError extends StepConfigurationError.
const STEP_ERROR_RULES: StepErrorRule[] = [
  {
    matches: (error) => error instanceof StepCancelledError,
    code: USER_FACING_ERROR_CODES.step,
    title: "Ant build step cancelled.",
    exitCode: CANCELLED_EXIT_CODE,
  },
  {
    matches: (error) => error instanceof LaunchFailureError,
    code: USER_FACING_ERROR_CODES.launch,
    title: "Ant build step aborted.",
    hint: "Make sure Ant is installed on this machine and on the PATH.",
  },
  {
    matches: (error) => error instanceof StepConfigurationError,
    code: USER_FACING_ERROR_CODES.step,
    title: "Ant build step aborted.",
    hint: "Check the installation name (--ant), the build file (--build-file) and the workspace path.",
  },
  {
    matches: (error) => error instanceof ConfigError,
    code: USER_FACING_ERROR_CODES.config,
    title: "Ant build step aborted.",
  },
];

const UNKNOWN_FAILURE_TITLE = "ant-step failed.";

// =============================================================================
// NORMALIZATION
// =============================================================================

export function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  const rule = STEP_ERROR_RULES.find((candidate) => candidate.matches(error));
  return new UserFacingError({
    code: rule?.code ?? USER_FACING_ERROR_CODES.unknown,
    title: rule?.title ?? UNKNOWN_FAILURE_TITLE,
    message: formatErrorMessage(error),
    hint: rule?.hint,
    exitCode: rule?.exitCode,
    cause: error,
  });
}

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const userError = toUserFacingError(error);
  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));

  const out = [`${format("ant-step:", ["red", "bold"])} ${format(userError.title, ["bold"])}`];
  out.push(...indent(userError.message, 2));
  if (userError.hint) out.push(`  ${format("hint:", ["yellow"])} ${userError.hint}`);
  if (userError.next) out.push(`  ${format("next:", ["cyan"])} ${userError.next}`);

  if (options.debug) {
    out.push(...renderDebugDetails(userError, format));
  }
  return out.join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderDebugDetails(error: UserFacingError, format: AnsiFormatter): string[] {
  const origin = error.cause instanceof Error ? error.cause : error;
  const details = [format(`  code: ${error.code} (${origin.name})`, ["dim"])];

  if (origin !== error) {
    details.push(format(`  cause: ${origin.message}`, ["dim"]));
  } else if (error.cause !== undefined && error.cause !== null) {
    details.push(format(`  cause: ${formatErrorMessage(error.cause)}`, ["dim"]));
  }

  // The first stack line repeats name and message.
  const frames = (origin.stack ?? "").split("\n").slice(1);
  for (const frame of frames) {
    details.push(format(`    ${frame.trim()}`, ["dim"]));
  }
  return details;
}

function indent(text: string, spaces: number): string[] {
  const prefix = " ".repeat(spaces);
  return text.split("\n").map((line) => `${prefix}${line}`);
}
