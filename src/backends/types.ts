/**
 * Backend contract for depship.
 *
 * Every output format is a Backend: it stages the shared dependency layout,
 * writes a launcher, and runs one packaging step. The closed set of names
 * lives in BACKEND_NAMES; implementations are registered in index.ts.
 */

import type { DeployConfig } from "../config-file.js";
import type { DependencyLayout } from "../dependencies/dedupe.js";
import type { ToolRunner } from "../exec.js";
import type { Downloader } from "../http/download.js";

export const ARCHIVE_FORMATS = ["zip", "tar", "gztar", "bztar", "xztar"] as const;
export type ArchiveFormat = (typeof ARCHIVE_FORMATS)[number];

export const BACKEND_NAMES = ["dir", ...ARCHIVE_FORMATS, "makeself", "appimage", "flatpak"] as const;
export type BackendName = (typeof BACKEND_NAMES)[number];

/** Everything a backend run needs. Shared read-only across backends in one run. */
export interface BackendContext {
  readonly config: DeployConfig;
  readonly layout: DependencyLayout;
  /** Directory artifacts are written to. */
  readonly outputDir: string;
  /** Root of the manifest/tool/repository cache. */
  readonly cacheDir: string;
  readonly runner: ToolRunner;
  readonly downloader: Downloader;
}

export interface Backend {
  readonly name: BackendName;
  /** Human-readable format label for progress messages. */
  readonly label: string;
  /** Produce the artifact and return its path. */
  run(ctx: BackendContext): Promise<string>;
}

export function isBackendName(value: string): value is BackendName {
  const names: readonly string[] = BACKEND_NAMES;
  return names.includes(value);
}
