/**
 * Resolver manifest schema.
 *
 * The resolver writes a JSON object with a `dependencies` array; each entry
 * names a package root and the library/binary directories inside it.
 */

import { z } from "zod";

import { ResolutionError } from "../errors.js";

const dependencyEntrySchema = z.object({
  name: z.string().default(""),
  rootpath: z.string().min(1),
  lib_paths: z.array(z.string()).default([]),
  bin_paths: z.array(z.string()).default([]),
});

const manifestSchema = z.object({
  dependencies: z.array(dependencyEntrySchema),
});

/** One resolved dependency. */
export interface Dependency {
  readonly name: string;
  readonly rootPath: string;
  readonly libPaths: readonly string[];
  readonly binPaths: readonly string[];
}

/**
 * Parse resolver output into Dependency records.
 *
 * @throws ResolutionError on invalid JSON or a schema mismatch.
 */
export function parseManifest(content: string, source = "dependency manifest"): Dependency[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ResolutionError(`Unparsable ${source}: ${message}`);
  }

  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new ResolutionError(`Invalid ${source} at ${where}: ${issue?.message ?? "unknown error"}`);
  }

  return parsed.data.dependencies.map((entry) => ({
    name: entry.name,
    rootPath: entry.rootpath,
    libPaths: entry.lib_paths,
    binPaths: entry.bin_paths,
  }));
}
