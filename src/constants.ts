/**
 * Constants module for depship.
 *
 * Names, defaults, timeouts and pinned tool releases live here (SSOT).
 */

import { readFileSync } from "node:fs";

// === Version (SSOT: package.json) ===
function readPackageVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

export const VERSION: string = readPackageVersion();

// === Naming ===
export const DEPSHIP_PREFIX = "depship";
export const DEFAULT_CONFIG_FILE = "depship.ini";
export const CACHE_DIR_ENV = "DEPSHIP_CACHE_DIR";

// === Defaults for [general], [appimage] and [flatpak] ===
export const DEFAULT_APP_VERSION = "0.0.0";
export const DEFAULT_DESKTOP_CATEGORIES = "Utility;";
export const DEFAULT_FLATPAK_RUNTIME = "org.freedesktop.Platform";
export const DEFAULT_FLATPAK_RUNTIME_VERSION = "23.08";
export const DEFAULT_FLATPAK_SDK = "org.freedesktop.Sdk";
export const FLATPAK_APP_ID_PREFIX = "org.depship";

// === Dependency resolver ===
export const RESOLVER_COMMAND = "conan";
export const RESOLVER_OUTPUT_FILE = "conanbuildinfo.json";
/** Files whose content keys the cached manifest. */
export const PROJECT_DESCRIPTION_FILES = ["conanfile.py", "conanfile.txt", "conan.lock"] as const;

// === Timeouts (milliseconds) ===
export const RESOLVER_TIMEOUT = 1_800_000; // 30 min: conan may build missing packages
export const PACKAGING_TIMEOUT = 1_800_000;
export const DOWNLOAD_TIMEOUT = 60_000;

// === Launcher ===
/** Variable the self-locating launchers export for their own directory. */
export const BUNDLE_DIR_VAR = "BUNDLE_DIR";
export const SELF_LOCATING_PRELUDE = `${BUNDLE_DIR_VAR}=$(cd "$(dirname "$0")" && pwd)`;

// === Pinned third-party tools ===
export const MAKESELF_VERSION = "2.5.0";
export const APPIMAGEKIT_RELEASE = "13";
