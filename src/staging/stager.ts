/**
 * Copies dependency directories and the project executable into a bundle tree.
 */

import { chmodSync, copyFileSync, cpSync, mkdirSync, statSync } from "node:fs";
import { basename, join } from "node:path";

import type { CopyMap } from "../dependencies/dedupe.js";
import { StagingError } from "../errors.js";
import { log } from "../logger.js";
import { hasPosixPermissions } from "../platform.js";

/** Execute bits for user, group and other. */
const EXECUTE_BITS = 0o111;

function fail(action: string, path: string, error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  throw new StagingError(`Failed to ${action} ${path}: ${message}`, path);
}

/**
 * Add execute permission for user, group and other. No-op without POSIX permissions.
 */
export function makeExecutable(path: string): void {
  if (!hasPosixPermissions()) {
    return;
  }
  try {
    chmodSync(path, statSync(path).mode | EXECUTE_BITS);
  } catch (error: unknown) {
    fail("mark executable", path, error);
  }
}

/**
 * Stage dependency files and the executable into `destination`.
 *
 * Sources are copied in copy-map order and merged into existing content:
 * nothing already present is deleted, and a later source overwrites a
 * same-named file from an earlier one. Symlinks are copied as symlinks.
 *
 * @returns Path of the staged executable.
 * @throws StagingError on any filesystem failure.
 */
export function stage(copyMap: CopyMap, destination: string, executable: string): string {
  try {
    mkdirSync(destination, { recursive: true });
  } catch (error: unknown) {
    fail("create", destination, error);
  }

  for (const [source, relDir] of copyMap) {
    const target = join(destination, relDir);
    log.debug(`Copying ${source} -> ${target}`);
    try {
      cpSync(source, target, {
        recursive: true,
        force: true,
        verbatimSymlinks: true,
      });
    } catch (error: unknown) {
      fail("copy", source, error);
    }
  }

  const stagedExecutable = join(destination, basename(executable));
  try {
    copyFileSync(executable, stagedExecutable);
  } catch (error: unknown) {
    fail("copy executable", executable, error);
  }
  makeExecutable(stagedExecutable);

  return stagedExecutable;
}
