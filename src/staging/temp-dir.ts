/**
 * Scoped temporary directories.
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { DEPSHIP_PREFIX } from "../constants.js";
import { log } from "../logger.js";

/**
 * Create a temporary directory, run `fn` with it, and remove it afterwards,
 * whether `fn` resolves or throws.
 */
export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = mkdtempSync(join(tmpdir(), `${DEPSHIP_PREFIX}-${prefix}-`));
  try {
    return await fn(dir);
  } finally {
    try {
      rmSync(dir, { recursive: true, force: true });
    } catch (e: unknown) {
      log.debug(`Could not remove temp dir ${dir}: ${String(e)}`);
    }
  }
}
