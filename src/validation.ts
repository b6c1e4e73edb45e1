/**
 * Input validation utilities for ghreq.
 *
 * Dependency direction:
 *   This module imports from: errors.ts
 *   It should NOT import from: cli, install
 */

import { ValidationError } from "./errors.js";

/** POSIX environment variable key pattern: [A-Za-z_][A-Za-z0-9_]* */
const ENV_VAR_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Validate an environment variable key.
 *
 * Checks that the key follows POSIX naming conventions:
 * - Starts with a letter or underscore
 * - Contains only alphanumeric characters and underscores
 */
export function isValidEnvVarKey(key: string): boolean {
  return ENV_VAR_KEY_PATTERN.test(key);
}

/**
 * @throws ValidationError if key is invalid.
 */
export function validateEnvVarKey(key: string): void {
  if (!isValidEnvVarKey(key)) {
    throw new ValidationError(
      `Invalid env var key '${key}'. Must be alphanumeric/underscore, starting with letter or underscore.`
    );
  }
}

/**
 * Placeholder token for a secret name, e.g. "GITHUB_PAT" -> "${GITHUB_PAT}".
 */
export function placeholderFor(name: string): string {
  return "${" + name + "}";
}
