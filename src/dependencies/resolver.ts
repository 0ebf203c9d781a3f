/**
 * Dependency manifest reader.
 *
 * Runs `conan install <project> -g json -if <tmp>` and parses the
 * conanbuildinfo.json it writes. One resolver instance resolves at most once;
 * across runs the manifest is reused from the cache while the project
 * description files are unchanged.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { RESOLVER_COMMAND, RESOLVER_OUTPUT_FILE, RESOLVER_TIMEOUT } from "../constants.js";
import { ResolutionError, extractErrorDetails } from "../errors.js";
import type { ToolRunner } from "../exec.js";
import { log, style } from "../logger.js";
import { withTempDir } from "../staging/temp-dir.js";
import { computeManifestKey, loadCachedManifest, saveCachedManifest } from "./cache.js";
import { parseManifest, type Dependency } from "./manifest.js";

/** Contract for producing the dependency list of a project. */
export interface DependencyResolver {
  resolve(projectDir: string): Promise<Dependency[]>;
}

export interface ConanResolverOptions {
  runner: ToolRunner;
  cacheDir: string;
  /** Read the manifest cache (writing it happens regardless). */
  useCache?: boolean;
}

export class ConanResolver implements DependencyResolver {
  private readonly runner: ToolRunner;
  private readonly cacheDir: string;
  private readonly useCache: boolean;
  private resolved: Promise<Dependency[]> | null = null;

  constructor(options: ConanResolverOptions) {
    this.runner = options.runner;
    this.cacheDir = options.cacheDir;
    this.useCache = options.useCache ?? true;
  }

  resolve(projectDir: string): Promise<Dependency[]> {
    this.resolved ??= this.load(projectDir);
    return this.resolved;
  }

  private async load(projectDir: string): Promise<Dependency[]> {
    const key = computeManifestKey(projectDir);

    if (this.useCache) {
      const cached = loadCachedManifest(this.cacheDir, key);
      if (cached !== null) {
        try {
          const dependencies = parseManifest(cached, "cached dependency manifest");
          log.dim(`Using cached dependency manifest (${key})`);
          logDependencies(dependencies);
          return dependencies;
        } catch (e: unknown) {
          log.debug(`Discarding cached manifest ${key}: ${extractErrorDetails(e)}`);
        }
      }
    }

    const content = await this.runResolver(projectDir);
    const dependencies = parseManifest(content);
    saveCachedManifest(this.cacheDir, key, content);
    logDependencies(dependencies);
    return dependencies;
  }

  private runResolver(projectDir: string): Promise<string> {
    return withTempDir("install", async (installDir) => {
      log.dim(`Resolving dependencies with ${RESOLVER_COMMAND}...`);
      try {
        await this.runner.run(
          RESOLVER_COMMAND,
          ["install", projectDir, "-g", "json", "-if", installDir],
          { cwd: projectDir, timeout: RESOLVER_TIMEOUT }
        );
      } catch (error: unknown) {
        throw new ResolutionError(`Dependency resolution failed: ${extractErrorDetails(error)}`);
      }

      const outputPath = join(installDir, RESOLVER_OUTPUT_FILE);
      if (!existsSync(outputPath)) {
        throw new ResolutionError(`${RESOLVER_COMMAND} did not write ${RESOLVER_OUTPUT_FILE}`);
      }
      return readFileSync(outputPath, "utf-8");
    });
  }
}

function logDependencies(dependencies: readonly Dependency[]): void {
  log.debug(`Resolved ${dependencies.length} dependencies`);
  for (const dep of dependencies) {
    log.debug(`  ${style.cyan(dep.name || dep.rootPath)} bin=${JSON.stringify(dep.binPaths)} lib=${JSON.stringify(dep.libPaths)}`);
  }
}
