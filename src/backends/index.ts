/**
 * Backend registry for depship.
 *
 * Organization:
 * - directory.ts: plain directory (dir)
 * - archive.ts: zip, tar, gztar, bztar, xztar
 * - makeself.ts: self-extracting installer
 * - appimage.ts: AppImage
 * - flatpak.ts: Flatpak bundle
 */

import { appImageBackend } from "./appimage.js";
import { ArchiveBackend } from "./archive.js";
import { directoryBackend } from "./directory.js";
import { flatpakBackend } from "./flatpak.js";
import { makeselfBackend } from "./makeself.js";
import type { Backend, BackendName } from "./types.js";

export const BACKENDS: Readonly<Record<BackendName, Backend>> = {
  dir: directoryBackend,
  zip: new ArchiveBackend("zip"),
  tar: new ArchiveBackend("tar"),
  gztar: new ArchiveBackend("gztar"),
  bztar: new ArchiveBackend("bztar"),
  xztar: new ArchiveBackend("xztar"),
  makeself: makeselfBackend,
  appimage: appImageBackend,
  flatpak: flatpakBackend,
};

export function getBackend(name: BackendName): Backend {
  return BACKENDS[name];
}

export {
  type ArchiveFormat,
  type Backend,
  type BackendContext,
  type BackendName,
  ARCHIVE_FORMATS,
  BACKEND_NAMES,
  isBackendName,
} from "./types.js";
