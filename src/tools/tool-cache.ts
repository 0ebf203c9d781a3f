/**
 * Versioned cache of downloaded packaging tools.
 *
 * A tool lives at <cache>/tools/<name>/<version>/<file>. The version in the
 * path is the staleness key: bumping a pinned release downloads afresh and
 * never reuses a file fetched for another version.
 */

import { chmodSync, existsSync, mkdirSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import { APPIMAGEKIT_RELEASE, MAKESELF_VERSION } from "../constants.js";
import type { Downloader } from "../http/download.js";
import { log } from "../logger.js";
import { getToolCacheDir } from "../paths.js";
import { hasPosixPermissions, type LinuxArch } from "../platform.js";

/** A pinned, downloadable tool. */
export interface ToolSpec {
  readonly name: string;
  readonly version: string;
  readonly url: string;
  readonly fileName: string;
}

export function makeselfTool(): ToolSpec {
  const fileName = `makeself-${MAKESELF_VERSION}.run`;
  return {
    name: "makeself",
    version: MAKESELF_VERSION,
    url: `https://github.com/megastep/makeself/releases/download/release-${MAKESELF_VERSION}/${fileName}`,
    fileName,
  };
}

export function appImageToolTool(arch: LinuxArch): ToolSpec {
  const fileName = `appimagetool-${arch}.AppImage`;
  return {
    name: "appimagetool",
    version: APPIMAGEKIT_RELEASE,
    url: `https://github.com/AppImage/AppImageKit/releases/download/${APPIMAGEKIT_RELEASE}/${fileName}`,
    fileName,
  };
}

export function appRunTool(arch: LinuxArch): ToolSpec {
  const fileName = `AppRun-${arch}`;
  return {
    name: "apprun",
    version: APPIMAGEKIT_RELEASE,
    url: `https://github.com/AppImage/AppImageKit/releases/download/${APPIMAGEKIT_RELEASE}/${fileName}`,
    fileName,
  };
}

/** Location of a tool inside the cache, whether or not it has been fetched. */
export function getToolPath(tool: ToolSpec, cacheDir: string): string {
  return join(getToolCacheDir(cacheDir, tool.name, tool.version), tool.fileName);
}

/**
 * Return the cached path of a tool, downloading it on first use.
 *
 * The download is written to <file>.part and renamed into place, so an
 * interrupted fetch never leaves a truncated file under the final name.
 */
export async function ensureTool(
  tool: ToolSpec,
  cacheDir: string,
  downloader: Downloader
): Promise<string> {
  const target = getToolPath(tool, cacheDir);
  if (existsSync(target)) {
    log.debug(`Using cached ${tool.name} ${tool.version}: ${target}`);
    return target;
  }

  log.dim(`Downloading ${tool.name} ${tool.version}...`);
  const data = await downloader.download(tool.url);

  mkdirSync(getToolCacheDir(cacheDir, tool.name, tool.version), { recursive: true });
  const partial = `${target}.part`;
  try {
    writeFileSync(partial, data);
    if (hasPosixPermissions()) {
      chmodSync(partial, 0o755);
    }
    renameSync(partial, target);
  } catch (error: unknown) {
    rmSync(partial, { force: true });
    throw error;
  }
  return target;
}
