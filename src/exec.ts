/**
 * Installer process wrapper for ghreq.
 *
 * Runs the package installer through execa with inherited stdio so its
 * progress and errors reach the operator directly, and waits for it to exit.
 */

import { execa } from "execa";

import { extractErrorDetails, ValidationError } from "./errors.js";

export interface InstallerResult {
  /** Exit status, or null when the process was signalled or never started */
  exitCode: number | null;
  signal?: string;
  /** True when the executable could not be spawned (e.g. ENOENT) */
  failedToStart: boolean;
  message?: string;
}

/** Runs an installer command to completion. */
export interface InstallerRunner {
  run(command: string, args: readonly string[]): Promise<InstallerResult>;
}

/** An installer command split into executable and leading arguments. */
export interface InstallerCommand {
  command: string;
  args: string[];
}

/**
 * Split an installer command line on whitespace.
 *
 * @example
 * parseInstallerCommand("python3 -m pip") // => { command: "python3", args: ["-m", "pip"] }
 */
export function parseInstallerCommand(commandLine: string): InstallerCommand {
  const [command, ...args] = commandLine.trim().split(/\s+/).filter((part) => part !== "");
  if (!command) {
    throw new ValidationError("Installer command is empty");
  }
  return { command, args };
}

/**
 * Arguments for `<installer> install -r <file>`, with any extra
 * installer flags appended after the file.
 */
export function buildInstallArgs(
  baseArgs: readonly string[],
  requirementsPath: string,
  extraArgs: readonly string[] = []
): string[] {
  return [...baseArgs, "install", "-r", requirementsPath, ...extraArgs];
}

/**
 * Runner backed by execa. Never rejects (reject:false semantics);
 * spawn failures come back as failedToStart.
 */
export const execaRunner: InstallerRunner = {
  async run(command, args) {
    const result = await execa(command, [...args], {
      stdio: "inherit",
      reject: false,
    });

    const exitCode: unknown = result.exitCode;
    if (typeof exitCode === "number") {
      return { exitCode, failedToStart: false };
    }
    if (result.signal) {
      return { exitCode: null, signal: result.signal, failedToStart: false };
    }
    return { exitCode: null, failedToStart: true, message: extractErrorDetails(result) };
  },
};
