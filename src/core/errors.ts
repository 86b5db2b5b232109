/*
Purpose: core error types used across launching and CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new LaunchError("DuplicateRunName", "..."); throw new UserFacingError({ code, title, message }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class PodlaunchError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "PodlaunchError";
  }
}

export class ConfigError extends PodlaunchError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class DriverError extends PodlaunchError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DriverError";
  }
}

export class HistoryError extends PodlaunchError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "HistoryError";
  }
}

// =============================================================================
// LAUNCH ERRORS
// =============================================================================

export const LAUNCH_ERROR_KINDS = [
  "MissingPipeline",
  "InvalidClusterName",
  "ReservedRunName",
  "MalformedRunName",
  "DuplicateRunName",
  "MissingRunName",
] as const;

export type LaunchErrorKind = (typeof LAUNCH_ERROR_KINDS)[number];

// Raised before the driver is invoked; never carries a launch status.
export class LaunchError extends PodlaunchError {
  constructor(
    public readonly kind: LaunchErrorKind,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "LaunchError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  launch: "LAUNCH_ERROR",
  driver: "DRIVER_ERROR",
  history: "HISTORY_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.cause = input.cause;
  }
}
