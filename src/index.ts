/**
 * ghreq - Install pip requirements with GitHub credentials from .env.
 *
 * This is the main entry point for the ghreq package.
 */

export { VERSION, DEFAULT_SECRET_NAMES, TEMP_REQUIREMENTS_FILE } from "./constants.js";
export {
  GhreqError,
  MissingConfigurationError,
  FileNotFoundError,
  InstallationFailedError,
  ValidationError,
} from "./errors.js";
export {
  createEnvSource,
  loadSecrets,
  maskSecret,
  type ConfigSource,
  type SecretNames,
  type SecretPair,
} from "./secrets.js";
export { renderRequirements, countPlaceholders, type ReplacementCounts } from "./render.js";
export { execaRunner, parseInstallerCommand, type InstallerRunner, type InstallerResult } from "./exec.js";
export { loadGhreqConfig, type GhreqConfig } from "./config-file.js";
export { resolveInstallOptions, type CliFlags } from "./options.js";
export {
  installRequirements,
  getTempPath,
  type InstallOptions,
  type InstallDeps,
  type InstallOutcome,
} from "./install.js";
