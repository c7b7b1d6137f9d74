export class StepError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "StepError";
  }
}

export class ConfigError extends StepError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

/**
 * Aborts the current build step. Never retried; the message goes to the build log as-is.
 */
export class StepConfigurationError extends StepError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "StepConfigurationError";
  }
}

export class LaunchFailureError extends StepConfigurationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "LaunchFailureError";
  }
}

export class StepCancelledError extends StepError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "StepCancelledError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  installation: "INSTALLATION_ERROR",
  step: "STEP_ERROR",
  launch: "LAUNCH_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
  exitCode?: number;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;
  readonly exitCode?: number;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
    this.exitCode = input.exitCode;
  }
}
