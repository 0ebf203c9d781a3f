/**
 * Dependency resolution and layout for depship.
 *
 * Re-exports from specialized sub-modules:
 * - manifest.ts: resolver JSON schema (parseManifest)
 * - resolver.ts: running the resolver (ConanResolver)
 * - cache.ts: cross-run manifest cache
 * - dedupe.ts: relative directory sets and copy map (deriveLayout)
 */

export { type Dependency, parseManifest } from "./manifest.js";

export { type DependencyResolver, ConanResolver } from "./resolver.js";

export { computeManifestKey, loadCachedManifest, saveCachedManifest } from "./cache.js";

export {
  type CopyMap,
  type DependencyLayout,
  type RelativeDirSet,
  deriveLayout,
  isNonEmptyDirectory,
  toRelativeDir,
} from "./dedupe.js";
