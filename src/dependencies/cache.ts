/**
 * Manifest cache for depship.
 *
 * Caches the resolver's raw JSON so later runs skip `conan install`.
 * Keyed by a hash of the project description files and the project path:
 * editing conanfile.txt (or its lock file) yields a new key.
 */

import { createHash } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";

import { PROJECT_DESCRIPTION_FILES } from "../constants.js";
import { log } from "../logger.js";
import { getManifestCacheDir } from "../paths.js";

/**
 * Compute the cache key for a project (first 16 hex chars of SHA-256).
 * Missing description files contribute a fixed marker so adding one changes the key.
 */
export function computeManifestKey(projectDir: string): string {
  const hash = createHash("sha256");
  hash.update(`${resolve(projectDir)}\n`);

  for (const file of PROJECT_DESCRIPTION_FILES) {
    const filePath = join(projectDir, file);
    try {
      hash.update(`${file}\n${readFileSync(filePath, "utf-8")}\n`);
    } catch {
      hash.update(`${file}\n<missing>\n`);
    }
  }

  return hash.digest("hex").slice(0, 16);
}

function getCachePath(cacheDir: string, key: string): string {
  return join(getManifestCacheDir(cacheDir), `${key}.json`);
}

/**
 * Load a cached manifest. Returns null when absent or unreadable.
 */
export function loadCachedManifest(cacheDir: string, key: string): string | null {
  const cachePath = getCachePath(cacheDir, key);
  if (!existsSync(cachePath)) {
    return null;
  }
  try {
    return readFileSync(cachePath, "utf-8");
  } catch (e: unknown) {
    log.debug(`Ignoring unreadable manifest cache ${cachePath}: ${String(e)}`);
    return null;
  }
}

/**
 * Store a manifest. Failures are logged and otherwise ignored: the run
 * already has the manifest in memory.
 */
export function saveCachedManifest(cacheDir: string, key: string, content: string): void {
  const cachePath = getCachePath(cacheDir, key);
  try {
    mkdirSync(getManifestCacheDir(cacheDir), { recursive: true });
    writeFileSync(`${cachePath}.part`, content, "utf-8");
    renameSync(`${cachePath}.part`, cachePath);
  } catch (e: unknown) {
    log.debug(`Could not write manifest cache ${cachePath}: ${String(e)}`);
  }
}
