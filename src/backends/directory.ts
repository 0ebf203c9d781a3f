/**
 * Plain directory output.
 *
 * Stages straight into <output>/<name>: that directory is the deliverable,
 * so unlike every other backend nothing here is temporary. Re-running over
 * an existing directory merges into it.
 */

import { join } from "node:path";

import { prepareBundle } from "../staging/bundle.js";
import type { Backend, BackendContext } from "./types.js";

export function directoryOutputPath(ctx: BackendContext): string {
  return join(ctx.outputDir, ctx.config.name);
}

export const directoryBackend: Backend = {
  name: "dir",
  label: "directory",
  async run(ctx: BackendContext): Promise<string> {
    const destination = directoryOutputPath(ctx);
    prepareBundle(ctx, destination);
    return destination;
  },
};
