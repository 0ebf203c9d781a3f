/**
 * Deploy command: resolve once, then run each requested backend in order.
 *
 * The dependency layout is computed a single time and shared by every
 * backend of the run. Backends run strictly one after another; the first
 * failure stops the run and later backends are not attempted.
 */

import { existsSync, statSync } from "node:fs";
import { join, resolve } from "node:path";

import { getBackend, type BackendContext, type BackendName } from "../backends/index.js";
import { loadDeployConfig } from "../config-file.js";
import { ConanResolver, deriveLayout, type DependencyResolver } from "../dependencies/index.js";
import { ConfigError } from "../errors.js";
import { logError } from "../error-handler.js";
import { defaultToolRunner, type ToolRunner } from "../exec.js";
import { httpDownloader, type Downloader } from "../http/download.js";
import { log, style } from "../logger.js";
import { getDefaultCacheDir } from "../paths.js";

export interface DeployOptions {
  readonly generators: readonly BackendName[];
  /** Directory holding the project and its conanfile. */
  readonly projectDir: string;
  readonly configPath: string;
  /** Overrides [general] output_dir; defaults to the project directory. */
  readonly outputDir?: string;
  /** Overrides [general] cache_dir and $DEPSHIP_CACHE_DIR. */
  readonly cacheDir?: string;
  /** Read the manifest cache (default true). */
  readonly useCache?: boolean;
}

/** Injectable collaborators; the real ones are used when omitted. */
export interface DeployServices {
  readonly runner?: ToolRunner;
  readonly downloader?: Downloader;
  readonly resolver?: DependencyResolver;
}

export interface DeployResult {
  readonly backend: BackendName;
  readonly artifact: string;
}

/**
 * Run the requested backends and return the artifacts they produced.
 *
 * @throws ConfigError, ResolutionError, StagingError, ExternalToolError, DownloadError
 */
export async function deploy(
  options: DeployOptions,
  services: DeployServices = {}
): Promise<DeployResult[]> {
  const projectDir = resolve(options.projectDir);
  const config = loadDeployConfig(options.configPath, projectDir);

  if (!existsSync(config.executable)) {
    throw new ConfigError(`Executable not found: ${config.executable} (build the project first)`);
  }

  const cacheDir = resolve(options.cacheDir ?? config.cacheDir ?? getDefaultCacheDir());
  const outputDir = resolve(projectDir, options.outputDir ?? config.outputDir ?? ".");
  const generators = [...new Set(options.generators)];

  const directoryTarget = join(outputDir, config.name);
  if (generators.includes("dir") && existsSync(directoryTarget) && !statSync(directoryTarget).isDirectory()) {
    throw new ConfigError(
      `Directory output ${directoryTarget} is an existing file; choose another output directory with -o or [general] output_dir`
    );
  }

  const runner = services.runner ?? defaultToolRunner;
  const resolver = services.resolver
    ?? new ConanResolver({ runner, cacheDir, useCache: options.useCache ?? true });

  const dependencies = await resolver.resolve(projectDir);
  const layout = deriveLayout(dependencies);
  log.debug(`Library dirs: ${layout.libDirs.join(", ") || "(none)"}`);
  log.debug(`Binary dirs: ${layout.binDirs.join(", ") || "(none)"}`);
  if (layout.copyMap.size === 0) {
    log.warn("No dependency library or binary directories found; bundling the executable alone");
  }

  const ctx: BackendContext = {
    config,
    layout,
    outputDir,
    cacheDir,
    runner,
    downloader: services.downloader ?? httpDownloader,
  };

  const results: DeployResult[] = [];
  for (const name of generators) {
    const backend = getBackend(name);
    log.bold(`Running generator ${style.cyan(name)} (${backend.label})`);
    try {
      const artifact = await backend.run(ctx);
      log.success(`Created ${style.dim(artifact)}`);
      results.push({ backend: name, artifact });
    } catch (error: unknown) {
      logError(error, `run generator ${name}`, { output: outputDir });
      throw error;
    }
  }
  log.info(`${results.length} artifact(s) written to ${outputDir}`);
  return results;
}
