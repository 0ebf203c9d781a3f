/**
 * Configuration file support for depship.
 *
 * Loads the project's INI file (depship.ini by default):
 *
 *   [general]
 *   name = myapp
 *   executable = build/bin/myapp
 *   version = 1.2.0
 *
 *   [appimage]
 *   icon = packaging/myapp.png
 *
 *   [flatpak]
 *   app_id = org.example.MyApp
 *
 * Dependency direction:
 *   This module imports from: constants.ts, errors.ts, logger.ts
 *   It should NOT import from: cli, backends, commands
 */

import { readFileSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";

import {
  DEFAULT_APP_VERSION,
  DEFAULT_DESKTOP_CATEGORIES,
  DEFAULT_FLATPAK_RUNTIME,
  DEFAULT_FLATPAK_RUNTIME_VERSION,
  DEFAULT_FLATPAK_SDK,
  FLATPAK_APP_ID_PREFIX,
} from "./constants.js";
import { ConfigError } from "./errors.js";
import { log } from "./logger.js";

export interface AppImageConfig {
  /** Absolute path to a .png or .svg icon; the bundled icon is used when absent. */
  readonly icon?: string;
  readonly categories: string;
}

export interface FlatpakConfig {
  readonly appId: string;
  readonly runtime: string;
  readonly runtimeVersion: string;
  readonly sdk: string;
}

/** Immutable per-run deployment settings. */
export interface DeployConfig {
  /** Artifact base name. */
  readonly name: string;
  /** Absolute path to the project's built binary. */
  readonly executable: string;
  readonly version: string;
  readonly outputDir?: string;
  readonly cacheDir?: string;
  readonly appimage: AppImageConfig;
  readonly flatpak: FlatpakConfig;
}

export type IniDocument = Record<string, Record<string, string>>;

const NAME_PATTERN = /^[A-Za-z0-9._-]+$/;
const APP_ID_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*(\.[A-Za-z_][A-Za-z0-9_-]*){2,}$/;

function unquote(value: string): string {
  return value.replace(/^(["'])(.*)\1$/, "$2");
}

/**
 * Parse INI text into sections of string values.
 *
 * Supports [section] headers, `key = value` and `key: value`, full-line
 * `;`/`#` comments and quoted values. Keys before any header go to "".
 * Section and key names are lower-cased.
 */
export function parseIni(content: string): IniDocument {
  const result: IniDocument = {};
  let section = "";

  content.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith(";") || trimmed.startsWith("#")) {
      return;
    }

    const sectionName = trimmed.match(/^\[([^\]]+)\]$/)?.[1];
    if (sectionName !== undefined) {
      section = sectionName.trim().toLowerCase();
      result[section] ??= {};
      return;
    }

    const pair = trimmed.match(/^([^=:]+?)\s*[=:]\s*(.*)$/);
    const key = pair?.[1];
    const value = pair?.[2];
    if (key === undefined || value === undefined) {
      throw new ConfigError(`Invalid line ${index + 1}: ${trimmed}`);
    }
    const values = (result[section] ??= {});
    values[key.toLowerCase()] = unquote(value.trim());
  });

  return result;
}

/** Default Flatpak id for an artifact name: org.depship.<name>. */
export function defaultAppId(name: string): string {
  return `${FLATPAK_APP_ID_PREFIX}.${name.replace(/[^A-Za-z0-9_]/g, "_")}`;
}

function required(section: Record<string, string>, key: string, path: string): string {
  const value = section[key];
  if (value === undefined || value === "") {
    throw new ConfigError(`Missing '${key}' in [general] of ${path}`);
  }
  return value;
}

function optional(section: Record<string, string> | undefined, key: string): string | undefined {
  const value = section?.[key];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Build a DeployConfig from a parsed document.
 * Relative paths resolve against `baseDir`.
 */
export function toDeployConfig(doc: IniDocument, baseDir: string, path = "config"): DeployConfig {
  const general = doc.general;
  if (!general) {
    throw new ConfigError(`Missing [general] section in ${path}`);
  }

  const name = required(general, "name", path);
  if (!NAME_PATTERN.test(name)) {
    throw new ConfigError(`Invalid name '${name}': use letters, digits, '.', '_' or '-'`);
  }

  const executable = required(general, "executable", path);
  const toAbsolute = (p: string): string => (isAbsolute(p) ? p : resolve(baseDir, p));

  const appId = optional(doc.flatpak, "app_id") ?? defaultAppId(name);
  if (!APP_ID_PATTERN.test(appId)) {
    throw new ConfigError(`Invalid Flatpak app_id '${appId}': expected reverse-DNS like org.example.App`);
  }

  const icon = optional(doc.appimage, "icon");
  const outputDir = optional(general, "output_dir");
  const cacheDir = optional(general, "cache_dir");

  return {
    name,
    executable: toAbsolute(executable),
    version: optional(general, "version") ?? DEFAULT_APP_VERSION,
    ...(outputDir ? { outputDir: toAbsolute(outputDir) } : {}),
    ...(cacheDir ? { cacheDir: toAbsolute(cacheDir) } : {}),
    appimage: {
      ...(icon ? { icon: toAbsolute(icon) } : {}),
      categories: optional(doc.appimage, "categories") ?? DEFAULT_DESKTOP_CATEGORIES,
    },
    flatpak: {
      appId,
      runtime: optional(doc.flatpak, "runtime") ?? DEFAULT_FLATPAK_RUNTIME,
      runtimeVersion: optional(doc.flatpak, "runtime_version") ?? DEFAULT_FLATPAK_RUNTIME_VERSION,
      sdk: optional(doc.flatpak, "sdk") ?? DEFAULT_FLATPAK_SDK,
    },
  };
}

/**
 * Load the deployment config.
 *
 * @param configPath - INI file path (relative paths resolve against projectDir).
 * @param projectDir - Directory the project's relative paths are based on.
 * @throws ConfigError if the file is missing, unreadable or incomplete.
 */
export function loadDeployConfig(configPath: string, projectDir: string): DeployConfig {
  const path = isAbsolute(configPath) ? configPath : resolve(projectDir, configPath);

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error: unknown) {
    const code = typeof error === "object" && error !== null && "code" in error ? error.code : undefined;
    if (code === "ENOENT") {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not read config file ${path}: ${message}`);
  }

  const config = toDeployConfig(parseIni(content), projectDir, path);
  log.debug(`Loaded config: ${path}`);
  return config;
}
