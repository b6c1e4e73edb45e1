/**
 * Configuration file support for ghreq.
 *
 * Loads settings from ghreq.yaml or .ghreqrc files.
 * Supports both per-project and global configuration.
 *
 * Config file locations (in order of precedence):
 *   1. ./ghreq.yaml, ./ghreq.yml or ./.ghreqrc (project-specific)
 *   2. ~/.ghreq/config.yaml (global)
 *
 * Dependency direction:
 *   This module imports from: constants.ts, logger.ts
 *   It should NOT import from: cli, install
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

import { GLOBAL_CONFIG_DIR, GLOBAL_CONFIG_FILE, PROJECT_CONFIG_FILES } from "./constants.js";
import { log } from "./logger.js";

/**
 * ghreq configuration options.
 * All fields are optional - CLI flags take precedence.
 */
export interface GhreqConfig {
  /** Requirements file to render */
  file?: string;
  /** .env file holding the secrets */
  envFile?: string;
  /** Installer command, e.g. "pip" or "python3 -m pip" */
  installer?: string;
  /** Name of the username variable (default GITHUB_USERNAME) */
  usernameVar?: string;
  /** Name of the token variable (default GITHUB_PAT) */
  tokenVar?: string;
}

const STRING_KEYS = ["file", "envFile", "installer", "usernameVar", "tokenVar"] as const;

/**
 * Parse YAML-like config (simple key: value format).
 * Supports basic YAML without external dependencies.
 */
export function parseSimpleYaml(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.startsWith("#") || trimmed === "") {
      continue;
    }

    const match = trimmed.match(/^([a-zA-Z_][a-zA-Z0-9_-]*):\s*(.*)$/);
    if (match) {
      const [, key, value] = match;
      if (key && value !== undefined) {
        const cleanValue = value.replace(/^["']|["']$/g, "").trim();
        if (cleanValue !== "") {
          result[key] = cleanValue;
        }
      }
    }
  }

  return result;
}

/**
 * Load configuration from file. Returns null when the file is absent or unreadable.
 */
function loadConfigFile(path: string): GhreqConfig | null {
  if (!existsSync(path)) {
    return null;
  }

  try {
    const parsed = parseSimpleYaml(readFileSync(path, "utf-8"));
    const config: GhreqConfig = {};
    for (const key of STRING_KEYS) {
      const value = parsed[key];
      if (value !== undefined) {config[key] = value;}
    }
    return config;
  } catch (e) {
    log.debug(`Failed to parse config file ${path}: ${String(e)}`);
    return null;
  }
}

function loadProjectConfig(projectPath: string): GhreqConfig | null {
  for (const filename of PROJECT_CONFIG_FILES) {
    const configPath = join(projectPath, filename);
    const config = loadConfigFile(configPath);
    if (config) {
      log.debug(`Loaded project config: ${configPath}`);
      return config;
    }
  }
  return null;
}

function loadGlobalConfig(homeDir: string): GhreqConfig | null {
  const globalPath = join(homeDir, GLOBAL_CONFIG_DIR, GLOBAL_CONFIG_FILE);
  const config = loadConfigFile(globalPath);
  if (config) {
    log.debug(`Loaded global config: ${globalPath}`);
  }
  return config;
}

/**
 * Merge configurations with proper precedence.
 * Order: global < project < CLI flags
 */
export function mergeConfigs(...configs: (GhreqConfig | null)[]): GhreqConfig {
  const result: GhreqConfig = {};

  for (const config of configs) {
    if (!config) {continue;}
    for (const key of STRING_KEYS) {
      const value = config[key];
      if (value !== undefined) {result[key] = value;}
    }
  }

  return result;
}

/**
 * Load ghreq configuration.
 *
 * Loads and merges the global config and the project config.
 * CLI flags should be applied on top of the returned config.
 *
 * @param projectPath - Directory searched for the project config.
 * @param homeDir - Home directory holding .ghreq/config.yaml.
 */
export function loadGhreqConfig(projectPath: string, homeDir: string = homedir()): GhreqConfig {
  return mergeConfigs(loadGlobalConfig(homeDir), loadProjectConfig(projectPath));
}
