/*
Purpose: core error types used across materialization, deployment evaluation and CLI output.
Assumptions: UserFacingError instances are safe to display to operators.
Usage: throw new ConfigError("..."); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class ShardKeeperError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ShardKeeperError";
  }
}

export class ConfigError extends ShardKeeperError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class ScriptInvocationError extends ShardKeeperError {
  constructor(
    message: string,
    public readonly scriptPath: string,
    public readonly exitCode: number | null,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ScriptInvocationError";
  }
}

export class ArtifactWriteError extends ShardKeeperError {
  constructor(
    message: string,
    public readonly artifactPath: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ArtifactWriteError";
  }
}

export class NotificationDeliveryError extends ShardKeeperError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "NotificationDeliveryError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  script: "SCRIPT_ERROR",
  artifact: "ARTIFACT_ERROR",
  notification: "NOTIFICATION_ERROR",
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
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
