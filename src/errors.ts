/**
 * Unified exception hierarchy for ghreq.
 *
 * All custom exceptions inherit from GhreqError for consistent error handling.
 * CLI catches these and converts to user-friendly messages and exit codes.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 *   It may be imported by: all other ghreq modules.
 *   It should NOT import from any other ghreq modules.
 */

/**
 * Base exception for all ghreq errors.
 *
 * `exitCode` is the process exit status the CLI uses when this error
 * reaches the top level.
 */
export class GhreqError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "GhreqError";
    this.exitCode = exitCode;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * A required secret is absent or empty.
 *
 * Raised before any file is read or written, so nothing needs cleaning up.
 */
export class MissingConfigurationError extends GhreqError {
  readonly missing: readonly string[];

  constructor(missing: readonly string[]) {
    super(`${missing.join(", ")} ${missing.length === 1 ? "is" : "are"} not set in your .env file or environment`);
    this.name = "MissingConfigurationError";
    this.missing = missing;
  }
}

/** Source requirements file does not exist or cannot be read. */
export class FileNotFoundError extends GhreqError {
  readonly path: string;

  constructor(path: string, reason?: string) {
    super(reason ? `${path} not found (${reason})` : `${path} not found`);
    this.name = "FileNotFoundError";
    this.path = path;
  }
}

/** Options describing how the installer process ended. */
export interface InstallationFailure {
  exitCode: number;
  command: string;
  signal?: string;
  detail?: string;
}

/**
 * The installer exited non-zero, was killed, or never started.
 *
 * The process exit code mirrors the installer's own status.
 */
export class InstallationFailedError extends GhreqError {
  readonly command: string;
  readonly signal?: string;
  readonly detail?: string;

  constructor(failure: InstallationFailure) {
    const reason = failure.signal
      ? `terminated by ${failure.signal}`
      : `exit status ${failure.exitCode}`;
    super(
      `Failed to install requirements: ${failure.command} (${reason})${failure.detail ? `: ${failure.detail}` : ""}`,
      failure.exitCode === 0 ? 1 : failure.exitCode
    );
    this.name = "InstallationFailedError";
    this.command = failure.command;
    this.signal = failure.signal;
    this.detail = failure.detail;
  }
}

/**
 * Input validation errors.
 *
 * Examples:
 *   - Invalid environment variable name for a secret
 *   - Empty installer command
 *   - Source file that collides with the temporary file
 */
export class ValidationError extends GhreqError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Extract error details from an unknown error for user-friendly messages.
 *
 * Handles execa-style errors with stderr/shortMessage, plus standard Error objects.
 * Truncates output to maxLength to avoid overwhelming log output.
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }

  if ("stderr" in error && typeof error.stderr === "string" && error.stderr) {
    return error.stderr.slice(0, maxLength);
  }
  if ("shortMessage" in error && typeof error.shortMessage === "string" && error.shortMessage) {
    return error.shortMessage.slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}
