/**
 * Shared bundle preparation: stage the layout, then write the launcher.
 * Every backend builds on this.
 */

import { mkdirSync } from "node:fs";
import { basename, dirname, join } from "node:path";

import type { BackendContext } from "../backends/types.js";
import { BUNDLE_DIR_VAR, SELF_LOCATING_PRELUDE } from "../constants.js";
import { generateLauncher } from "./launcher.js";
import { stage } from "./stager.js";

export interface LauncherPlacement {
  /** Launcher path relative to the bundle root. */
  readonly path: string;
  readonly baseVar: string;
  readonly prelude?: readonly string[];
}

export interface PreparedBundle {
  readonly root: string;
  readonly executable: string;
  readonly launcher: string;
}

/** File name of the launcher for an artifact name. */
export function launcherFileName(name: string): string {
  return `${name}.sh`;
}

/**
 * Launcher that locates its own directory at run time. Used where the
 * bundle can be unpacked anywhere (directory, archives, makeself).
 */
export function selfLocatingLauncher(name: string): LauncherPlacement {
  return {
    path: launcherFileName(name),
    baseVar: `$${BUNDLE_DIR_VAR}`,
    prelude: [SELF_LOCATING_PRELUDE],
  };
}

/**
 * Stage dependencies and the executable into `root`, then write the launcher.
 * The executable sits at the bundle root, so the launcher runs it by basename.
 */
export function prepareBundle(
  ctx: BackendContext,
  root: string,
  placement: LauncherPlacement = selfLocatingLauncher(ctx.config.name)
): PreparedBundle {
  const { layout } = ctx;
  const executable = stage(layout.copyMap, root, ctx.config.executable);
  const launcher = join(root, placement.path);
  mkdirSync(dirname(launcher), { recursive: true });

  generateLauncher(
    {
      libDirs: layout.libDirs,
      binDirs: layout.binDirs,
      baseVar: placement.baseVar,
      executable: basename(executable),
      ...(placement.prelude ? { prelude: placement.prelude } : {}),
    },
    launcher
  );

  return { root, executable, launcher };
}

