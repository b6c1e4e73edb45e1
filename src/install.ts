/**
 * Installer front-end for ghreq.
 *
 * Reads the secrets, renders the requirements file into a temporary copy,
 * runs `<installer> install -r <copy>` and removes the copy on every path.
 *
 * Dependency direction:
 *   This module imports from: constants, errors, exec, logger, render, secrets, signals
 *   It may be imported by: cli.ts, index.ts
 */

import { readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

import {
  DEFAULT_ENV_FILE,
  DEFAULT_INSTALLER,
  DEFAULT_REQUIREMENTS_FILE,
  DEFAULT_SECRET_NAMES,
  INSTALLER_NOT_FOUND_EXIT,
  TEMP_REQUIREMENTS_FILE,
} from "./constants.js";
import { FileNotFoundError, InstallationFailedError, ValidationError } from "./errors.js";
import {
  buildInstallArgs,
  execaRunner,
  parseInstallerCommand,
  type InstallerRunner,
} from "./exec.js";
import { log, style } from "./logger.js";
import { countReplacements, renderRequirements, type ReplacementCounts } from "./render.js";
import { guardSignals, signalExitCode, type SignalGuard, type SignalSource } from "./signals.js";
import {
  createEnvSource,
  loadSecrets,
  maskSecret,
  type ConfigSource,
  type SecretNames,
} from "./secrets.js";

export interface InstallOptions {
  /** Base directory for relative paths (default: process.cwd()) */
  cwd?: string;
  /** Requirements file (default: requirements.txt) */
  file?: string;
  /** .env file (default: .env) */
  envFile?: string;
  /** Installer command line (default: pip) */
  installer?: string;
  /** Variable names of the two secrets */
  names?: SecretNames;
  /** Extra installer arguments, appended after `-r <file>` */
  extraArgs?: readonly string[];
  /** Environment overriding the .env file (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/** Collaborators, replaceable in tests. */
export interface InstallDeps {
  source?: ConfigSource;
  runner?: InstallerRunner;
  /** Where SIGINT/SIGTERM/SIGHUP are observed (default: process) */
  signals?: SignalSource;
}

export interface InstallOutcome {
  sourcePath: string;
  tempPath: string;
  exitCode: 0;
  replacements: ReplacementCounts;
}

/**
 * Path of the rendered copy: requirements_temp.txt beside the source file.
 */
export function getTempPath(sourcePath: string): string {
  return join(dirname(sourcePath), TEMP_REQUIREMENTS_FILE);
}

/**
 * Read the source requirements file.
 *
 * @throws FileNotFoundError if it is missing, a directory, or unreadable.
 */
export function readRequirements(path: string): string {
  try {
    return readFileSync(path, "utf-8");
  } catch (e) {
    const code = e instanceof Error && "code" in e && typeof e.code === "string" ? e.code : undefined;
    throw new FileNotFoundError(path, code === "ENOENT" ? undefined : code ?? String(e));
  }
}

/**
 * Remove the temporary file. Best-effort: a failure is logged as a
 * cleanup warning and never thrown.
 *
 * @returns True if the file is gone afterwards.
 */
export function removeTempFile(path: string): boolean {
  try {
    rmSync(path, { force: true });
    return true;
  } catch (e) {
    log.warn(`Warning: could not remove temporary file ${path}: ${e instanceof Error ? e.message : String(e)}`);
    return false;
  }
}

/**
 * Install requirements with the GitHub username and token substituted in.
 *
 * Fails with MissingConfigurationError before touching any file when a
 * secret is missing, and with FileNotFoundError when the source is
 * unreadable. Once the temporary file is written it is removed whatever
 * the outcome.
 *
 * @throws MissingConfigurationError | FileNotFoundError | InstallationFailedError | ValidationError
 */
export async function installRequirements(
  options: InstallOptions = {},
  deps: InstallDeps = {}
): Promise<InstallOutcome> {
  const cwd = options.cwd ?? process.cwd();
  const source =
    deps.source ?? createEnvSource({ envFile: resolve(cwd, options.envFile ?? DEFAULT_ENV_FILE), env: options.env });
  const runner = deps.runner ?? execaRunner;
  const signals = deps.signals ?? process;

  const secrets = loadSecrets(source, options.names ?? DEFAULT_SECRET_NAMES);
  const installer = parseInstallerCommand(options.installer ?? DEFAULT_INSTALLER);

  const sourcePath = resolve(cwd, options.file ?? DEFAULT_REQUIREMENTS_FILE);
  const tempPath = getTempPath(sourcePath);
  if (sourcePath === tempPath) {
    throw new ValidationError(`Source file cannot be named ${TEMP_REQUIREMENTS_FILE}: ${sourcePath}`);
  }

  const content = readRequirements(sourcePath);
  const rendered = renderRequirements(content, secrets);
  const replacements = countReplacements(content, secrets);

  log.info(`Using GitHub username: ${style.cyan(secrets.username)}`);
  log.info(`Using GitHub PAT: ${style.cyan(maskSecret(secrets.token))}`);
  log.debug(
    `Replaced ${replacements.username} x \${${secrets.names.username}}, ` +
      `${replacements.token} x \${${secrets.names.token}} in ${sourcePath}`
  );
  log.newline();

  const args = buildInstallArgs(installer.args, tempPath, options.extraArgs);
  const command = [installer.command, ...args].join(" ");
  let guard: SignalGuard | undefined;
  try {
    writeFileSync(tempPath, rendered, { encoding: "utf-8", mode: 0o600 });
    // A signal may end ghreq before finally runs; remove the file right away
    guard = guardSignals(signals, (signal) => {
      log.debug(`Received ${signal}, removing ${tempPath}`);
      removeTempFile(tempPath);
    });

    log.info("Installing requirements...");
    log.debug(`Running: ${command}`);
    const result = await runner.run(installer.command, args);

    if (guard.received) {
      throw new InstallationFailedError({
        exitCode: signalExitCode(guard.received),
        command,
        signal: guard.received,
      });
    }
    if (result.exitCode !== 0) {
      throw new InstallationFailedError({
        exitCode: result.exitCode ?? (result.failedToStart ? INSTALLER_NOT_FOUND_EXIT : 1),
        command,
        signal: result.signal,
        detail: result.message,
      });
    }
  } finally {
    guard?.dispose();
    removeTempFile(tempPath);
  }

  return { sourcePath, tempPath, exitCode: 0, replacements };
}
