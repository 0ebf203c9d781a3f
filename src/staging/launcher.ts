/**
 * Launcher script generation.
 *
 * The launcher extends PATH and LD_LIBRARY_PATH with the bundle's binary and
 * library directories, then runs the executable from its own directory so
 * relative lookups inside it resolve against the bundle.
 *
 * The base variable is emitted verbatim; the shell resolves it at launch
 * time ($BUNDLE_DIR from a prelude, $APPDIR from AppRun, /app in Flatpak).
 */

import { writeFileSync } from "node:fs";
import { posix } from "node:path";

import { StagingError } from "../errors.js";
import { makeExecutable } from "./stager.js";

export interface LauncherOptions {
  readonly libDirs: readonly string[];
  readonly binDirs: readonly string[];
  /** Textual reference to the bundle root, e.g. "$APPDIR". */
  readonly baseVar: string;
  /** Executable path relative to the base, e.g. "bin/myapp". */
  readonly executable: string;
  /** Lines inserted right after the shebang. */
  readonly prelude?: readonly string[];
}

function underBase(baseVar: string, dir: string): string {
  return dir === "." || dir === "" ? baseVar : `${baseVar}/${dir}`;
}

function exportLine(variable: string, baseVar: string, dirs: readonly string[]): string[] {
  if (dirs.length === 0) {
    return [];
  }
  const entries = dirs.map((dir) => underBase(baseVar, dir));
  return [`export ${variable}=$${variable}:${entries.join(":")}`];
}

/**
 * Render the launcher text. Identical options always give identical output.
 */
export function renderLauncher(options: LauncherOptions): string {
  const { baseVar } = options;
  const executable = options.executable.split("\\").join("/");
  const workDir = underBase(baseVar, posix.dirname(executable));

  const lines = [
    "#!/bin/sh",
    ...(options.prelude ?? []),
    ...exportLine("PATH", baseVar, options.binDirs),
    ...exportLine("LD_LIBRARY_PATH", baseVar, options.libDirs),
    `cd "${workDir}"`,
    `./${posix.basename(executable)} "$@"`,
    "status=$?",
    "cd - > /dev/null",
    "exit $status",
  ];
  return `${lines.join("\n")}\n`;
}

/**
 * Write the launcher to `outputPath` and mark it executable.
 *
 * @throws StagingError if the file cannot be written.
 */
export function generateLauncher(options: LauncherOptions, outputPath: string): void {
  try {
    writeFileSync(outputPath, renderLauncher(options), { encoding: "utf-8", mode: 0o755 });
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new StagingError(`Failed to write launcher ${outputPath}: ${message}`, outputPath);
  }
  makeExecutable(outputPath);
}
