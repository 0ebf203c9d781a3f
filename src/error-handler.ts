/**
 * Top-level error reporting for depship.
 *
 * Turns anything thrown out of a run into a readable message and an exit
 * code. Every failure is fatal; nothing is retried here.
 */

import {
  ConfigError,
  DepshipError,
  DownloadError,
  ExternalToolError,
  ResolutionError,
  StagingError,
} from "./errors.js";
import { log } from "./logger.js";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

/** Short label for the failure category, used as a message prefix. */
export function describeError(error: unknown): string {
  if (error instanceof ConfigError) {
    return "Configuration error";
  }
  if (error instanceof ResolutionError) {
    return "Dependency resolution failed";
  }
  if (error instanceof StagingError) {
    return "Staging failed";
  }
  if (error instanceof ExternalToolError) {
    return "Packaging tool failed";
  }
  if (error instanceof DownloadError) {
    return "Download failed";
  }
  if (error instanceof DepshipError) {
    return "Error";
  }
  return "Unexpected error";
}

/**
 * Log an error with context.
 *
 * @param error - The error object
 * @param operation - What was being done, e.g. "run generator zip"
 * @param details - Extra key/value context shown dimmed
 */
export function logError(
  error: unknown,
  operation: string,
  details?: Record<string, unknown>
): void {
  const message = error instanceof Error ? error.message : String(error);
  log.error(`Failed to ${operation}: ${message}`);

  if (details) {
    const detailsStr = Object.entries(details)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(", ");
    log.dim(`Context: ${detailsStr}`);
  }

  if (error instanceof Error && error.stack) {
    log.debug(error.stack);
  }
}

/**
 * Report a fatal error and return the process exit code.
 */
export function reportFatal(error: unknown): number {
  const message = error instanceof Error ? error.message : String(error);
  log.error(`${describeError(error)}: ${message}`);

  if (error instanceof ExternalToolError) {
    const firstLine = error.stderr.trim().split("\n")[0] ?? "";
    if (firstLine.length > 0 && firstLine.length < 200) {
      log.dim(`${error.command}: ${firstLine}`);
    }
  }

  if (error instanceof Error && error.stack && !(error instanceof DepshipError)) {
    log.debug(error.stack);
  }
  return EXIT_FAILURE;
}
