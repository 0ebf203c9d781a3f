/**
 * AppImage output.
 *
 * Layout of the AppDir handed to appimagetool:
 *
 *   <name>.AppDir/
 *     AppRun                 (AppImageKit runtime launcher, sets $APPDIR)
 *     <name>.desktop         (Exec=<name>.sh)
 *     <name>.png|.svg
 *     usr/bin/<staged tree>  (dependencies, executable, <name>.sh)
 */

import { copyFileSync, mkdirSync, writeFileSync } from "node:fs";
import { extname, join } from "node:path";
import { fileURLToPath } from "node:url";

import type { DeployConfig } from "../config-file.js";
import { PACKAGING_TIMEOUT } from "../constants.js";
import { ConfigError } from "../errors.js";
import { toLinuxArch } from "../platform.js";
import { launcherFileName, prepareBundle } from "../staging/bundle.js";
import { makeExecutable } from "../staging/stager.js";
import { withTempDir } from "../staging/temp-dir.js";
import { appImageToolTool, appRunTool, ensureTool } from "../tools/tool-cache.js";
import type { Backend, BackendContext } from "./types.js";

/** Launcher base inside a mounted AppImage. */
export const APPIMAGE_BASE_VAR = "$APPDIR/usr/bin";

const DEFAULT_ICON = fileURLToPath(new URL("../../assets/default-icon.svg", import.meta.url));
const ICON_EXTENSIONS = new Set([".png", ".svg"]);

export function appImageOutputPath(ctx: BackendContext, arch: string): string {
  return join(ctx.outputDir, `${ctx.config.name}-${arch}.AppImage`);
}

/**
 * Render the .desktop entry appimagetool requires at the AppDir root.
 */
export function renderDesktopEntry(config: DeployConfig): string {
  const lines = [
    "[Desktop Entry]",
    "Type=Application",
    `Name=${config.name}`,
    `Exec=${launcherFileName(config.name)}`,
    `Icon=${config.name}`,
    `Categories=${config.appimage.categories}`,
    "Terminal=false",
    `X-AppImage-Version=${config.version}`,
  ];
  return `${lines.join("\n")}\n`;
}

/**
 * Copy the configured icon (or the bundled default) to <appDir>/<name><ext>.
 */
export function installIcon(config: DeployConfig, appDir: string): string {
  const source = config.appimage.icon ?? DEFAULT_ICON;
  const ext = extname(source).toLowerCase();
  if (!ICON_EXTENSIONS.has(ext)) {
    throw new ConfigError(`AppImage icon must be a .png or .svg file: ${source}`);
  }
  const target = join(appDir, `${config.name}${ext}`);
  copyFileSync(source, target);
  return target;
}

export const appImageBackend: Backend = {
  name: "appimage",
  label: "AppImage",
  async run(ctx: BackendContext): Promise<string> {
    const { config } = ctx;
    const arch = toLinuxArch();
    const artifact = appImageOutputPath(ctx, arch);

    const appRun = await ensureTool(appRunTool(arch), ctx.cacheDir, ctx.downloader);
    const appImageTool = await ensureTool(appImageToolTool(arch), ctx.cacheDir, ctx.downloader);
    mkdirSync(ctx.outputDir, { recursive: true });

    await withTempDir("appimage", async (tmp) => {
      const appDir = join(tmp, `${config.name}.AppDir`);
      prepareBundle(ctx, join(appDir, "usr", "bin"), {
        path: launcherFileName(config.name),
        baseVar: APPIMAGE_BASE_VAR,
      });

      const appRunTarget = join(appDir, "AppRun");
      copyFileSync(appRun, appRunTarget);
      makeExecutable(appRunTarget);
      writeFileSync(join(appDir, `${config.name}.desktop`), renderDesktopEntry(config), "utf-8");
      installIcon(config, appDir);

      // appimagetool is itself an AppImage; extract-and-run avoids needing FUSE.
      await ctx.runner.run(appImageTool, [appDir, artifact], {
        env: { ARCH: arch, APPIMAGE_EXTRACT_AND_RUN: "1" },
        timeout: PACKAGING_TIMEOUT,
      });
    });

    return artifact;
  },
};
