/**
 * Resolution of the install options from CLI flags and config files.
 *
 * Precedence: CLI flags > project config > global config > defaults.
 * The config files are already merged by loadGhreqConfig().
 */

import type { GhreqConfig } from "./config-file.js";
import {
  DEFAULT_ENV_FILE,
  DEFAULT_INSTALLER,
  DEFAULT_REQUIREMENTS_FILE,
  DEFAULT_SECRET_NAMES,
} from "./constants.js";
import type { InstallOptions } from "./install.js";

/** Flags accepted by the ghreq command. */
export type CliFlags = {
  file?: string;
  envFile?: string;
  installer?: string;
  usernameVar?: string;
  tokenVar?: string;
  chdir?: string;
  quiet?: boolean;
  verbose?: boolean;
};

/**
 * Build InstallOptions; installerArgs (everything after `--`) are passed
 * through to the installer unchanged.
 */
export function resolveInstallOptions(
  flags: CliFlags,
  fileConfig: GhreqConfig,
  installerArgs: readonly string[] = []
): InstallOptions {
  return {
    file: flags.file ?? fileConfig.file ?? DEFAULT_REQUIREMENTS_FILE,
    envFile: flags.envFile ?? fileConfig.envFile ?? DEFAULT_ENV_FILE,
    installer: flags.installer ?? fileConfig.installer ?? DEFAULT_INSTALLER,
    names: {
      username: flags.usernameVar ?? fileConfig.usernameVar ?? DEFAULT_SECRET_NAMES.username,
      token: flags.tokenVar ?? fileConfig.tokenVar ?? DEFAULT_SECRET_NAMES.token,
    },
    extraArgs: [...installerArgs],
  };
}
