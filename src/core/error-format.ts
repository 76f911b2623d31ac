/*
Purpose: turn any thrown value into operator-readable lines, with optional ANSI styling.
Assumptions: debug mode may include stack traces; non-TTY output disables color.
Usage: formatErrorLines(err, { mode: "debug" }); createAnsiFormatter(resolveColorEnabled({ stream })).
*/

import {
  ArtifactWriteError,
  ConfigError,
  NotificationDeliveryError,
  ScriptInvocationError,
  ShardKeeperError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type UserFacingErrorCode,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type AnsiColorOptions = {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
};

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(options: AnsiColorOptions = {}): boolean {
  const stream = options.stream ?? process.stderr;
  const isTty = Boolean(stream.isTTY);

  if (options.useColor === undefined) {
    return isTty;
  }

  return options.useColor && isTty;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const normalized = toUserFacingInput(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }
  if (normalized.hint) {
    lines.push({ kind: "hint", text: normalized.hint });
  }
  if (normalized.next) {
    lines.push({ kind: "next", text: normalized.next });
  }

  if ((options.mode ?? "short") === "debug") {
    lines.push({ kind: "code", text: normalized.code });

    if (error instanceof Error) {
      lines.push({ kind: "name", text: error.name });
    }

    const cause = normalized.cause === undefined ? undefined : formatErrorMessage(normalized.cause);
    if (cause && cause !== normalized.message) {
      lines.push({ kind: "cause", text: cause });
    }

    const stack = resolveStack(error, normalized.cause);
    if (stack) {
      lines.push({ kind: "stack", text: stack });
    }
  }

  return lines;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const message = error.message.trim();
    return message.length > 0 ? message : error.name;
  }

  if (typeof error === "string") {
    return error;
  }

  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

function toUserFacingInput(error: unknown): UserFacingErrorInput {
  if (error instanceof UserFacingError) {
    return {
      code: error.code,
      title: nonEmpty(error.title) ?? DEFAULT_ERROR_TITLE,
      message: nonEmpty(error.message) ?? DEFAULT_ERROR_MESSAGE,
      hint: nonEmpty(error.hint),
      next: nonEmpty(error.next),
      cause: error.cause,
    };
  }

  // Core errors that escaped without a user-facing wrapper still get a useful title.
  if (error instanceof ConfigError) {
    return fromCoreError(error, USER_FACING_ERROR_CODES.config, "Configuration error");
  }
  if (error instanceof ScriptInvocationError) {
    return fromCoreError(error, USER_FACING_ERROR_CODES.script, "Generation script failed");
  }
  if (error instanceof ArtifactWriteError) {
    return fromCoreError(error, USER_FACING_ERROR_CODES.artifact, "Artifact write failed");
  }
  if (error instanceof NotificationDeliveryError) {
    return fromCoreError(error, USER_FACING_ERROR_CODES.notification, "Proxy reload failed");
  }

  if (error === null || error === undefined) {
    return {
      code: USER_FACING_ERROR_CODES.unknown,
      title: DEFAULT_ERROR_TITLE,
      message: DEFAULT_ERROR_MESSAGE,
    };
  }

  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message: nonEmpty(formatErrorMessage(error)) ?? DEFAULT_ERROR_MESSAGE,
    cause: error instanceof Error ? error.cause : undefined,
  };
}

function fromCoreError(
  error: ShardKeeperError,
  code: UserFacingErrorCode,
  title: string,
): UserFacingErrorInput {
  return {
    code,
    title,
    message: nonEmpty(error.message) ?? DEFAULT_ERROR_MESSAGE,
    cause: error.cause,
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function resolveStack(error: unknown, cause: unknown): string | undefined {
  if (error instanceof Error && error.stack) {
    return error.stack;
  }
  if (cause instanceof Error && cause.stack) {
    return cause.stack;
  }
  return undefined;
}
