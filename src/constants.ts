/**
 * Constants module for ghreq.
 *
 * File names, secret names and defaults are defined here (SSOT).
 */

import { readFileSync } from "node:fs";

// === Version (SSOT: package.json) ===
const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
export const VERSION: string =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

// === Secret names (read from .env / process environment) ===
export const DEFAULT_SECRET_NAMES = {
  username: "GITHUB_USERNAME",
  token: "GITHUB_PAT",
} as const;

// === File names ===
export const DEFAULT_REQUIREMENTS_FILE = "requirements.txt";
export const DEFAULT_ENV_FILE = ".env";
export const TEMP_REQUIREMENTS_FILE = "requirements_temp.txt"; // Rendered copy, always deleted after install

// === Installer ===
export const DEFAULT_INSTALLER = "pip"; // Invoked as: <installer> install -r <file>
export const INSTALLER_NOT_FOUND_EXIT = 127;

// === Config file locations ===
export const PROJECT_CONFIG_FILES = ["ghreq.yaml", "ghreq.yml", ".ghreqrc"] as const;
export const GLOBAL_CONFIG_DIR = ".ghreq";
export const GLOBAL_CONFIG_FILE = "config.yaml";
