/**
 * Archive outputs: zip, tar, gztar, bztar, xztar.
 *
 * The bundle is staged into <tmp>/stage and archived with its contents at
 * the archive root. zip uses archiver; tar and gztar use the tar package;
 * bztar and xztar write a plain tar next to the stage, compress it in place
 * with the system bzip2/xz and copy the result out. Nothing but the
 * artifact itself is written to the output directory.
 */

import { copyFileSync, createWriteStream, existsSync, mkdirSync, readdirSync, rmSync } from "node:fs";
import { join } from "node:path";

import archiver from "archiver";
import * as tar from "tar";

import { PACKAGING_TIMEOUT } from "../constants.js";
import { ExternalToolError } from "../errors.js";
import { log } from "../logger.js";
import { prepareBundle } from "../staging/bundle.js";
import { withTempDir } from "../staging/temp-dir.js";
import type { ArchiveFormat, Backend, BackendContext } from "./types.js";

const EXTENSIONS: Record<ArchiveFormat, string> = {
  zip: ".zip",
  tar: ".tar",
  gztar: ".tar.gz",
  bztar: ".tar.bz2",
  xztar: ".tar.xz",
};

const LABELS: Record<ArchiveFormat, string> = {
  zip: "zip archive",
  tar: "tar archive",
  gztar: "gzip'ed tar archive",
  bztar: "bzip2'ed tar archive",
  xztar: "xz'ed tar archive",
};

export function archiveOutputPath(ctx: BackendContext, format: ArchiveFormat): string {
  return join(ctx.outputDir, `${ctx.config.name}${EXTENSIONS[format]}`);
}

/**
 * Write a zip of `sourceDir`'s contents to `zipPath`.
 */
export function writeZip(sourceDir: string, zipPath: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const output = createWriteStream(zipPath);
    const archive = archiver("zip", { zlib: { level: 9 } });

    output.on("close", () => resolve());
    output.on("error", reject);
    archive.on("error", reject);
    archive.on("warning", (err) => log.debug(`zip: ${err.message}`));

    archive.pipe(output);
    archive.directory(sourceDir, false);
    archive.finalize().catch(reject);
  });
}

/**
 * Write a tar (optionally gzip'ed) of `sourceDir`'s contents to `tarPath`.
 */
export async function writeTar(sourceDir: string, tarPath: string, gzip: boolean): Promise<void> {
  const entries = readdirSync(sourceDir).sort();
  await tar.create(
    {
      file: tarPath,
      cwd: sourceDir,
      gzip,
      portable: true,
    },
    entries
  );
}

async function writeArchive(
  ctx: BackendContext,
  format: ArchiveFormat,
  tmp: string,
  sourceDir: string,
  artifact: string
): Promise<void> {
  switch (format) {
    case "zip":
      await writeZip(sourceDir, artifact);
      return;
    case "tar":
      await writeTar(sourceDir, artifact, false);
      return;
    case "gztar":
      await writeTar(sourceDir, artifact, true);
      return;
    case "bztar":
    case "xztar": {
      const plainTar = join(tmp, `${ctx.config.name}.tar`);
      const compressor = format === "bztar" ? "bzip2" : "xz";
      const compressed = `${plainTar}${format === "bztar" ? ".bz2" : ".xz"}`;
      await writeTar(sourceDir, plainTar, false);
      // The compressor refuses to overwrite without -f.
      await ctx.runner.run(compressor, ["-f", plainTar], { timeout: PACKAGING_TIMEOUT });
      if (!existsSync(compressed)) {
        throw new ExternalToolError(compressor, 0, "", `${compressor} did not write ${compressed}`);
      }
      copyFileSync(compressed, artifact);
      return;
    }
  }
}

export class ArchiveBackend implements Backend {
  readonly name: ArchiveFormat;
  readonly label: string;

  constructor(readonly format: ArchiveFormat) {
    this.name = format;
    this.label = LABELS[format];
  }

  async run(ctx: BackendContext): Promise<string> {
    const artifact = archiveOutputPath(ctx, this.format);
    mkdirSync(ctx.outputDir, { recursive: true });
    rmSync(artifact, { force: true });

    await withTempDir(this.format, async (tmp) => {
      const stagingDir = join(tmp, "stage");
      prepareBundle(ctx, stagingDir);
      await writeArchive(ctx, this.format, tmp, stagingDir, artifact);
    });

    return artifact;
  }
}
