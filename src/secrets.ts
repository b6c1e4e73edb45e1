/**
 * Secret loading for ghreq.
 *
 * Secrets come from a .env file (parsed with dotenv) with the process
 * environment taking precedence.
 * They are read once into an immutable SecretPair and passed by parameter;
 * nothing else in ghreq reads process.env for them.
 *
 * Dependency direction:
 *   This module imports from: constants.ts, errors.ts, logger.ts, validation.ts
 *   It should NOT import from: cli, install
 */

import { existsSync, readFileSync } from "node:fs";

import { parse } from "dotenv";

import { DEFAULT_SECRET_NAMES } from "./constants.js";
import { MissingConfigurationError, ValidationError } from "./errors.js";
import { log } from "./logger.js";
import { validateEnvVarKey } from "./validation.js";

/** Key-value lookup the secrets are read from. */
export interface ConfigSource {
  get(name: string): string | undefined;
}

/** Variable names the two secrets are stored under. */
export interface SecretNames {
  readonly username: string;
  readonly token: string;
}

/** Username and token, read once at startup. Never persisted. */
export interface SecretPair {
  readonly username: string;
  readonly token: string;
  readonly names: SecretNames;
}

export interface EnvSourceOptions {
  /** Path to the .env file. A missing file is not an error. */
  envFile?: string;
  /** Overrides for the file's values (default: process.env). */
  env?: NodeJS.ProcessEnv;
}

/**
 * Read and parse a .env file. Returns an empty map when the file is absent;
 * an unreadable file is reported as a warning and treated the same way.
 */
export function readEnvFile(path: string): Record<string, string> {
  if (!existsSync(path)) {
    log.debug(`No env file at ${path}`);
    return {};
  }

  try {
    return parse(readFileSync(path, "utf-8"));
  } catch (e) {
    log.warn(`Could not read env file ${path}: ${e instanceof Error ? e.message : String(e)}`);
    return {};
  }
}

/**
 * Create a config source backed by a .env file plus environment overrides.
 *
 * A variable that is present in the environment wins over the file,
 * even when its value is empty.
 */
export function createEnvSource(options: EnvSourceOptions = {}): ConfigSource {
  const fileValues = options.envFile ? readEnvFile(options.envFile) : {};
  const env = options.env ?? process.env;

  return {
    get(name: string): string | undefined {
      return env[name] ?? fileValues[name];
    },
  };
}

/**
 * Build the SecretPair from a config source.
 *
 * Absent and empty values are both missing. Every missing name is reported
 * in a single MissingConfigurationError, username first.
 *
 * @throws ValidationError if a secret name is invalid or both names are the same.
 * @throws MissingConfigurationError if either secret is absent or empty.
 */
export function loadSecrets(source: ConfigSource, names: SecretNames = DEFAULT_SECRET_NAMES): SecretPair {
  validateEnvVarKey(names.username);
  validateEnvVarKey(names.token);
  if (names.username === names.token) {
    throw new ValidationError(`Username and token must use different variables (both are '${names.token}')`);
  }

  const username = source.get(names.username);
  const token = source.get(names.token);

  const missing: string[] = [];
  if (!username) {missing.push(names.username);}
  if (!token) {missing.push(names.token);}

  if (!username || !token) {
    throw new MissingConfigurationError(missing);
  }

  return Object.freeze({
    username,
    token,
    names: Object.freeze({ username: names.username, token: names.token }),
  });
}

/**
 * Mask a secret for display: first 4 + "..." + last 4 characters,
 * or "****" for values of 8 characters or fewer.
 */
export function maskSecret(value: string): string {
  return value.length > 8 ? `${value.slice(0, 4)}...${value.slice(-4)}` : "****";
}
