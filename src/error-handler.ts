/**
 * Error reporting utilities for ghreq.
 *
 * Explains installer exit codes and logs unexpected errors without
 * leaking secret values.
 */

import { GhreqError, InstallationFailedError, MissingConfigurationError } from "./errors.js";
import { log } from "./logger.js";

/** Known installer exit codes with their meanings and suggestions. */
export interface ExitCodeInfo {
  code: number;
  name: string;
  description: string;
  suggestion?: string;
  severity: "info" | "warn" | "error";
}

/** pip status codes plus the shell's conventional ones. */
const EXIT_CODES: Record<number, ExitCodeInfo> = {
  0: {
    code: 0,
    name: "SUCCESS",
    description: "Installer exited successfully",
    severity: "info",
  },
  1: {
    code: 1,
    name: "ERROR",
    description: "Installer reported an error",
    suggestion: "Check the installer output above; a rejected token shows up as an authentication failure",
    severity: "error",
  },
  2: {
    code: 2,
    name: "UNKNOWN_ERROR",
    description: "Installer failed with an unknown error",
    severity: "error",
  },
  3: {
    code: 3,
    name: "VIRTUALENV_NOT_FOUND",
    description: "Virtual environment not found",
    suggestion: "Activate the virtualenv or use --installer \"python3 -m pip\"",
    severity: "error",
  },
  4: {
    code: 4,
    name: "PREVIOUS_BUILD_DIR_ERROR",
    description: "A previous build directory is in the way",
    severity: "error",
  },
  23: {
    code: 23,
    name: "NO_MATCHES_FOUND",
    description: "No matching distribution found",
    suggestion: "Verify the package names and that the token can read the repositories",
    severity: "error",
  },
  126: {
    code: 126,
    name: "NOT_EXECUTABLE",
    description: "Installer command not executable",
    suggestion: "Check file permissions (chmod +x)",
    severity: "error",
  },
  127: {
    code: 127,
    name: "NOT_FOUND",
    description: "Installer command not found",
    suggestion: "Install pip or pass --installer \"python3 -m pip\"",
    severity: "error",
  },
  130: {
    code: 130,
    name: "SIGINT",
    description: "Interrupted by Ctrl+C",
    severity: "info",
  },
  137: {
    code: 137,
    name: "KILLED",
    description: "Installer was killed (OOM or manual stop)",
    severity: "warn",
  },
  143: {
    code: 143,
    name: "SIGTERM",
    description: "Installer terminated by signal",
    severity: "info",
  },
};

export function getExitCodeInfo(code: number): ExitCodeInfo {
  return (
    EXIT_CODES[code] ?? {
      code,
      name: "UNKNOWN",
      description: `Unknown exit code ${code}`,
      suggestion: "Check the installer output above for details",
      severity: "warn" as const,
    }
  );
}

/**
 * Check if an exit code indicates user-initiated termination (not an error).
 */
export function isUserTermination(code: number): boolean {
  return code === 130 || code === 143; // SIGINT (Ctrl+C) or SIGTERM
}

/**
 * Log an exit code with appropriate styling and suggestions.
 */
export function logExitCode(code: number, context?: string): void {
  const info = getExitCodeInfo(code);

  if (isUserTermination(code)) {
    log.dim(info.description);
    return;
  }

  if (code === 0) {
    return;
  }

  const contextStr = context ? ` (${context})` : "";

  switch (info.severity) {
    case "error":
      log.error(`${info.description}${contextStr}`);
      break;
    case "warn":
      log.warn(`${info.description}${contextStr}`);
      break;
    default:
      log.dim(`${info.description}${contextStr}`);
  }

  if (info.suggestion) {
    log.dim(info.suggestion);
  }
}

const SENSITIVE_KEY_PATTERN = /(password|secret|token|key|auth|credential|^pat$|_pat$)/i;

/**
 * Render context details for display, dropping sensitive keys.
 */
export function formatDetails(details: Record<string, unknown>): string {
  return Object.entries(details)
    .filter(([k]) => !SENSITIVE_KEY_PATTERN.test(k))
    .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
    .join(", ");
}

/**
 * Log an error with context.
 *
 * @param error - The error object
 * @param operation - What operation was being performed
 * @param details - Additional context (optional)
 */
export function logError(
  error: unknown,
  operation: string,
  details?: Record<string, unknown>
): void {
  const message = error instanceof Error ? error.message : String(error);

  log.error(`Failed to ${operation}: ${message}`);

  if (details) {
    log.dim(`Context: ${formatDetails(details)}`);
  }

  if (error instanceof Error && error.stack) {
    log.debug(error.stack);
  }
}

/**
 * Example .env line shown when a secret is missing,
 * e.g. "GITHUB_PAT=your_github_pat_here".
 */
export function envHint(name: string): string {
  return `${name}=your_${name.toLowerCase()}_here`;
}

/**
 * Report an error that reached the CLI and return the process exit code.
 */
export function reportError(error: unknown): number {
  if (error instanceof MissingConfigurationError) {
    log.error(`ERROR: ${error.message}`);
    log.info("Please add it to your .env file:");
    for (const name of error.missing) {
      log.info(`  ${envHint(name)}`);
    }
    return error.exitCode;
  }

  if (error instanceof InstallationFailedError) {
    log.error(`ERROR: ${error.message}`);
    if (!error.signal) {
      logExitCode(error.exitCode, "installer");
    }
    return error.exitCode;
  }

  if (error instanceof GhreqError) {
    log.error(`ERROR: ${error.message}`);
    return error.exitCode;
  }

  logError(error, "install requirements");
  return 1;
}
