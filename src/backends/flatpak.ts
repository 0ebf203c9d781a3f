/**
 * Flatpak output.
 *
 * The staged tree becomes a single "simple" module: every file is a
 * uniquely named `file` source installed to the same relative path under
 * /app. The manifest is built, exported to a local repository kept in the
 * cache, installed for the current user, and exported as a .flatpak bundle.
 */

import { lstatSync, mkdirSync, readdirSync, writeFileSync } from "node:fs";
import { join, posix } from "node:path";

import type { DeployConfig } from "../config-file.js";
import { PACKAGING_TIMEOUT } from "../constants.js";
import { ExternalToolError } from "../errors.js";
import { log } from "../logger.js";
import { getFlatpakRepoDir } from "../paths.js";
import { prepareBundle } from "../staging/bundle.js";
import { withTempDir } from "../staging/temp-dir.js";
import type { Backend, BackendContext } from "./types.js";

/** Install root inside the Flatpak sandbox. */
export const FLATPAK_APP_ROOT = "/app";

export interface FlatpakFileSource {
  type: "file";
  path: string;
  "dest-filename": string;
}

export interface FlatpakModule {
  name: string;
  buildsystem: "simple";
  sources: FlatpakFileSource[];
  "build-commands": string[];
}

export interface FlatpakManifest {
  "app-id": string;
  runtime: string;
  "runtime-version": string;
  sdk: string;
  command: string;
  modules: FlatpakModule[];
}

/**
 * List regular files and symlinks under `root` as sorted, slash-separated
 * relative paths.
 */
export function listStagedFiles(root: string, prefix = ""): string[] {
  const files: string[] = [];
  for (const entry of readdirSync(join(root, prefix)).sort()) {
    const rel = prefix === "" ? entry : posix.join(prefix, entry);
    if (lstatSync(join(root, rel)).isDirectory()) {
      files.push(...listStagedFiles(root, rel));
    } else {
      files.push(rel);
    }
  }
  return files;
}

/** Quote a word for the POSIX shell unless it is plainly safe. */
export function shellQuote(word: string): string {
  return /^[A-Za-z0-9_./+-]+$/.test(word) ? word : `'${word.replace(/'/g, "'\\''")}'`;
}

/**
 * Build the manifest for a staged tree.
 * Source names are "<index>-<basename>" so equal basenames in different
 * directories never collide.
 */
export function buildFlatpakManifest(config: DeployConfig, stagingDir: string): FlatpakManifest {
  const files = listStagedFiles(stagingDir);
  const sources: FlatpakFileSource[] = [];
  const buildCommands: string[] = [];

  files.forEach((rel, index) => {
    const destFilename = `${index}-${posix.basename(rel)}`;
    sources.push({ type: "file", path: join(stagingDir, rel), "dest-filename": destFilename });
    buildCommands.push(`install -Dm755 ${shellQuote(destFilename)} ${shellQuote(`${FLATPAK_APP_ROOT}/${rel}`)}`);
  });

  return {
    "app-id": config.flatpak.appId,
    runtime: config.flatpak.runtime,
    "runtime-version": config.flatpak.runtimeVersion,
    sdk: config.flatpak.sdk,
    command: config.name,
    modules: [
      {
        name: config.name,
        buildsystem: "simple",
        sources,
        "build-commands": buildCommands,
      },
    ],
  };
}

export function flatpakOutputPath(ctx: BackendContext): string {
  return join(ctx.outputDir, `${ctx.config.name}.flatpak`);
}

export function flatpakRemoteName(config: DeployConfig): string {
  return `${config.name}-repo`;
}

/**
 * Register the local repository as a user remote. An existing remote of
 * the same name counts as success.
 */
export async function addFlatpakRemote(ctx: BackendContext, remote: string, repoDir: string): Promise<void> {
  try {
    await ctx.runner.run(
      "flatpak",
      ["--user", "remote-add", "--no-gpg-verify", remote, repoDir],
      { capture: true }
    );
  } catch (error: unknown) {
    if (error instanceof ExternalToolError && error.stderr.includes("already exists")) {
      log.debug(`Flatpak remote ${remote} already exists`);
      return;
    }
    throw error;
  }
}

export const flatpakBackend: Backend = {
  name: "flatpak",
  label: "Flatpak bundle",
  async run(ctx: BackendContext): Promise<string> {
    const { config, runner } = ctx;
    const { appId } = config.flatpak;
    const repoDir = getFlatpakRepoDir(ctx.cacheDir, appId);
    const remote = flatpakRemoteName(config);
    const artifact = flatpakOutputPath(ctx);
    mkdirSync(repoDir, { recursive: true });
    mkdirSync(ctx.outputDir, { recursive: true });

    await withTempDir("flatpak", async (tmp) => {
      const stagingDir = join(tmp, "stage");
      prepareBundle(ctx, stagingDir, { path: `bin/${config.name}`, baseVar: FLATPAK_APP_ROOT });

      const manifestPath = join(tmp, `${appId}.json`);
      writeFileSync(manifestPath, JSON.stringify(buildFlatpakManifest(config, stagingDir), null, 2), "utf-8");

      await runner.run(
        "flatpak-builder",
        ["--force-clean", `--repo=${repoDir}`, join(tmp, "build"), manifestPath],
        { cwd: tmp, timeout: PACKAGING_TIMEOUT }
      );
      await addFlatpakRemote(ctx, remote, repoDir);
      await runner.run("flatpak", ["--user", "install", "-y", "--reinstall", remote, appId], {
        timeout: PACKAGING_TIMEOUT,
      });
      await runner.run("flatpak", ["build-bundle", repoDir, artifact, appId], {
        timeout: PACKAGING_TIMEOUT,
      });
    });

    return artifact;
  },
};
