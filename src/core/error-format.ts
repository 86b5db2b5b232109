/*
Purpose: turn any thrown value into the labelled lines the CLI prints.
Assumptions: only debug mode exposes codes, causes and stacks.
Usage: formatErrorLines(err, { mode: "debug" }); formatErrorMessage(err).
*/

import {
  ConfigError,
  DriverError,
  HistoryError,
  LaunchError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type UserFacingErrorCode,
  type UserFacingErrorInput,
} from "./errors.js";

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind = "title" | "message" | "hint" | "code" | "name" | "cause" | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

const FALLBACK_TITLE = "Unexpected error";
const FALLBACK_MESSAGE = "An unexpected error occurred.";

// =============================================================================
// LINES
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const view = toUserFacingInput(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: view.title }];

  if (view.message !== view.title) lines.push({ kind: "message", text: view.message });
  if (view.hint) lines.push({ kind: "hint", text: view.hint });

  if (options.mode !== "debug") return lines;

  lines.push({ kind: "code", text: view.code });
  const name = error instanceof Error ? trimmed(error.name) : undefined;
  if (name) lines.push({ kind: "name", text: name });

  const cause =
    view.cause === undefined || view.cause === null
      ? undefined
      : trimmed(formatErrorMessage(view.cause));
  if (cause && cause !== view.message) lines.push({ kind: "cause", text: cause });

  const stack = stackOf(error) ?? stackOf(view.cause);
  if (stack) lines.push({ kind: "stack", text: stack });

  return lines;
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return trimmed(error.message) ?? trimmed(error.name) ?? String(error);
  }
  if (typeof error === "string") return error;
  if (error && typeof error === "object" && "message" in error) {
    if (typeof error.message === "string") return trimmed(error.message) ?? String(error);
  }
  return String(error);
}

export function resolveErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof UserFacingError) return error.code;
  if (error instanceof ConfigError) return USER_FACING_ERROR_CODES.config;
  if (error instanceof LaunchError) return USER_FACING_ERROR_CODES.launch;
  if (error instanceof DriverError) return USER_FACING_ERROR_CODES.driver;
  if (error instanceof HistoryError) return USER_FACING_ERROR_CODES.history;
  return USER_FACING_ERROR_CODES.unknown;
}

// =============================================================================
// INTERNALS
// =============================================================================

function toUserFacingInput(error: unknown): UserFacingErrorInput {
  if (error instanceof UserFacingError) {
    return {
      code: error.code,
      title: trimmed(error.title) ?? FALLBACK_TITLE,
      message: trimmed(error.message) ?? FALLBACK_MESSAGE,
      hint: trimmed(error.hint),
      cause: error.cause,
    };
  }

  const message =
    error === null || error === undefined ? undefined : trimmed(formatErrorMessage(error));
  return {
    code: resolveErrorCode(error),
    title: FALLBACK_TITLE,
    message: message ?? FALLBACK_MESSAGE,
    cause: error instanceof Error ? error.cause : undefined,
  };
}

function trimmed(value: string | undefined): string | undefined {
  const text = value?.trim();
  return text ? text : undefined;
}

function stackOf(value: unknown): string | undefined {
  return value instanceof Error && value.stack ? value.stack : undefined;
}
