#!/usr/bin/env node
/**
 * CLI entry point for ghreq.
 *
 * Commander.js-based CLI: `ghreq [options] [-- installer args...]`.
 */

import { Command } from "commander";

import { log, enableQuietMode, setLogLevel, LogLevel } from "./logger.js";

import { DEFAULT_SECRET_NAMES, VERSION } from "./constants.js";
import { loadGhreqConfig } from "./config-file.js";
import { reportError } from "./error-handler.js";
import { installRequirements } from "./install.js";
import { resolveInstallOptions, type CliFlags } from "./options.js";

const program = new Command();

program
  .name("ghreq")
  .description("Install pip requirements with GitHub credentials from .env substituted in")
  .version(VERSION)
  .option("-f, --file <path>", "Requirements file (default: requirements.txt)")
  .option("-e, --env-file <path>", "Env file holding the secrets (default: .env)")
  .option("-i, --installer <command>", "Installer command, run as <command> install -r <file> (default: pip)")
  .option("--username-var <name>", `Variable holding the GitHub username (default: ${DEFAULT_SECRET_NAMES.username})`)
  .option("--token-var <name>", `Variable holding the GitHub token (default: ${DEFAULT_SECRET_NAMES.token})`)
  .option("-C, --chdir <dir>", "Change to directory before running (like git -C)")
  .option("-q, --quiet", "Suppress all ghreq output (exit code only)")
  .option("-v, --verbose", "Show debug output")
  .argument("[installerArgs...]", "Extra installer arguments (after --)")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts<CliFlags>();
    if (opts.quiet) {
      enableQuietMode();
    } else if (opts.verbose) {
      setLogLevel(LogLevel.DEBUG);
    }
  })
  .action(async (installerArgs: string[], options: CliFlags) => {
    try {
      if (options.chdir) {
        process.chdir(options.chdir);
      }

      const fileConfig = loadGhreqConfig(process.cwd());

      await installRequirements(resolveInstallOptions(options, fileConfig, installerArgs));
      log.newline();
      log.success("✓ Requirements installed successfully!");
    } catch (e) {
      process.exitCode = reportError(e);
    }
  });

await program.parseAsync();
