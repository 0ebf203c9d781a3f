/**
 * Self-extracting installer output (makeself).
 *
 * makeself is fetched once per version into the tool cache as its own
 * self-extracting .run, unpacked next to it, and reused on later runs.
 */

import { existsSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";

import { PACKAGING_TIMEOUT } from "../constants.js";
import { launcherFileName, prepareBundle } from "../staging/bundle.js";
import { withTempDir } from "../staging/temp-dir.js";
import { ensureTool, makeselfTool } from "../tools/tool-cache.js";
import type { Backend, BackendContext } from "./types.js";

export function makeselfOutputPath(ctx: BackendContext): string {
  return join(ctx.outputDir, `${ctx.config.name}.run`);
}

/**
 * Return the path of makeself.sh, downloading and unpacking makeself on first use.
 */
export async function ensureMakeself(ctx: BackendContext): Promise<string> {
  const installer = await ensureTool(makeselfTool(), ctx.cacheDir, ctx.downloader);
  const extractDir = join(dirname(installer), "makeself");
  const script = join(extractDir, "makeself.sh");

  if (!existsSync(script)) {
    await ctx.runner.run("sh", [installer, "--noexec", "--target", extractDir], { capture: true });
  }
  return script;
}

export const makeselfBackend: Backend = {
  name: "makeself",
  label: "self-extracting installer",
  async run(ctx: BackendContext): Promise<string> {
    const { name } = ctx.config;
    const artifact = makeselfOutputPath(ctx);
    const makeself = await ensureMakeself(ctx);
    mkdirSync(ctx.outputDir, { recursive: true });

    await withTempDir("makeself", async (stagingDir) => {
      prepareBundle(ctx, stagingDir);
      await ctx.runner.run(
        makeself,
        [stagingDir, artifact, name, `./${launcherFileName(name)}`],
        { timeout: PACKAGING_TIMEOUT }
      );
    });

    return artifact;
  },
};
