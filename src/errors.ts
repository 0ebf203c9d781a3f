/**
 * Exception hierarchy for depship.
 *
 * Every failure the tool knows how to describe inherits from DepshipError.
 * The CLI catches these at the top level and prints the message.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 */

/** Base exception for all depship errors. */
export class DepshipError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DepshipError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration errors.
 *
 * Examples:
 *   - Config file missing or unreadable
 *   - Required key absent from [general]
 *   - Invalid artifact name or Flatpak app id
 */
export class ConfigError extends DepshipError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** The dependency resolver failed or produced an unusable manifest. */
export class ResolutionError extends DepshipError {
  constructor(message: string) {
    super(message);
    this.name = "ResolutionError";
  }
}

/** Copying files into a staging tree failed. */
export class StagingError extends DepshipError {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = "StagingError";
    this.path = path;
  }
}

/** A packaging subprocess could not be started or exited non-zero. */
export class ExternalToolError extends DepshipError {
  readonly command: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stderr: string, message?: string) {
    super(message ?? `${command} exited with code ${exitCode}`);
    this.name = "ExternalToolError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/** Fetching a third-party tool failed. */
export class DownloadError extends DepshipError {
  readonly url: string;

  constructor(message: string, url: string) {
    super(message);
    this.name = "DownloadError";
    this.url = url;
  }
}

/**
 * Extract error details from an unknown error for user-facing messages.
 *
 * Prefers captured stderr of a failed tool, then the error message.
 * Output is truncated to maxLength.
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }
  if (error instanceof ExternalToolError && error.stderr.trim() !== "") {
    return `${error.message}: ${error.stderr.trim()}`.slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}
