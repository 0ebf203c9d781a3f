/**
 * Host platform detection for depship.
 *
 * Dependency direction:
 *   This module has minimal internal dependencies (near-leaf module).
 *   It may be imported by: staging, backends
 */

import { arch, platform } from "node:os";

import { ConfigError } from "./errors.js";

/** Supported host platform types. */
export type HostPlatform = "windows" | "macos" | "linux";

/** Architecture names as AppImage and Flatpak spell them. */
export type LinuxArch = "x86_64" | "aarch64";

let cachedPlatform: HostPlatform | null = null;

/**
 * Detect the host platform. Cached after the first call.
 */
export function detectHostPlatform(): HostPlatform {
  if (cachedPlatform !== null) {
    return cachedPlatform;
  }
  const os = platform();
  cachedPlatform = os === "win32" ? "windows" : os === "darwin" ? "macos" : "linux";
  return cachedPlatform;
}

/**
 * Whether the host has a POSIX permission model (chmod has an effect).
 */
export function hasPosixPermissions(): boolean {
  return detectHostPlatform() !== "windows";
}

/**
 * Map a Node.js architecture name to the Linux packaging spelling.
 *
 * @throws ConfigError for architectures no AppImage tooling is published for.
 */
export function toLinuxArch(nodeArch: string = arch()): LinuxArch {
  switch (nodeArch) {
    case "x64":
      return "x86_64";
    case "arm64":
      return "aarch64";
    default:
      throw new ConfigError(`Unsupported architecture for AppImage packaging: ${nodeArch}`);
  }
}
