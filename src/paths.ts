/**
 * Cache directory layout for depship.
 *
 * One cache root holds resolved manifests, downloaded tools and persistent
 * Flatpak repositories. It is passed explicitly to whatever needs it;
 * nothing reads a fixed global location.
 *
 *   <cache>/manifests/<key>.json
 *   <cache>/tools/<name>/<version>/<file>
 *   <cache>/flatpak-repos/<app-id>
 */

import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { env } from "node:process";

import { CACHE_DIR_ENV, DEPSHIP_PREFIX } from "./constants.js";

/**
 * Default cache root: $DEPSHIP_CACHE_DIR, else <os tmp>/depship.
 */
export function getDefaultCacheDir(): string {
  const fromEnv = env[CACHE_DIR_ENV];
  if (fromEnv && fromEnv.trim() !== "") {
    return resolve(fromEnv);
  }
  return join(tmpdir(), DEPSHIP_PREFIX);
}

export function getManifestCacheDir(cacheDir: string): string {
  return join(cacheDir, "manifests");
}

export function getToolCacheDir(cacheDir: string, name: string, version: string): string {
  return join(cacheDir, "tools", name, version);
}

export function getFlatpakRepoDir(cacheDir: string, appId: string): string {
  return join(cacheDir, "flatpak-repos", appId);
}
