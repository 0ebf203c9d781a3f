/**
 * Derives the bundle layout from resolved dependencies.
 *
 * Each non-empty library or binary directory is mapped to its path relative
 * to the owning package root. Relative directories shared by several
 * packages (typically `lib` and `bin`) collapse to one entry, while every
 * contributing source stays in the copy map so staging merges them.
 */

import { readdirSync, statSync } from "node:fs";
import { relative, sep } from "node:path";

import type { Dependency } from "./manifest.js";

/** Absolute source directory → directory relative to the bundle root. */
export type CopyMap = ReadonlyMap<string, string>;

/** Distinct relative directories, sorted ascending. */
export interface RelativeDirSet {
  readonly libDirs: readonly string[];
  readonly binDirs: readonly string[];
}

export interface DependencyLayout extends RelativeDirSet {
  /** Iterates in ascending source-path order. */
  readonly copyMap: CopyMap;
}

/** True when `path` is a directory with at least one entry. */
export function isNonEmptyDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory() && readdirSync(path).length > 0;
  } catch {
    return false;
  }
}

/**
 * Relative path of `path` under `root`, with forward slashes; the root itself is ".".
 */
export function toRelativeDir(root: string, path: string): string {
  const rel = relative(root, path);
  if (rel === "") {
    return ".";
  }
  return sep === "/" ? rel : rel.split(sep).join("/");
}

/**
 * Compute relative library/binary directories and the copy map.
 *
 * Missing and empty directories are skipped silently.
 */
export function deriveLayout(dependencies: readonly Dependency[]): DependencyLayout {
  const libDirs = new Set<string>();
  const binDirs = new Set<string>();
  const copyMap = new Map<string, string>();

  const collect = (root: string, paths: readonly string[], into: Set<string>): void => {
    for (const path of paths) {
      if (!isNonEmptyDirectory(path)) {
        continue;
      }
      const rel = toRelativeDir(root, path);
      into.add(rel);
      copyMap.set(path, rel);
    }
  };

  for (const dep of dependencies) {
    collect(dep.rootPath, dep.libPaths, libDirs);
    collect(dep.rootPath, dep.binPaths, binDirs);
  }

  const sortedCopyMap = new Map(
    [...copyMap.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  );

  return {
    libDirs: [...libDirs].sort(),
    binDirs: [...binDirs].sort(),
    copyMap: sortedCopyMap,
  };
}
