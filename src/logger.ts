/**
 * Logging for depship.
 *
 * All console output goes through this module, styled with picocolors.
 * Never call console.log/console.error directly in other modules.
 */

import pc from "picocolors";

/** Log levels in order of verbosity (debug is most verbose). */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

interface LoggerConfig {
  level: LogLevel;
}

const config: LoggerConfig = {
  level: LogLevel.INFO,
};

function canOutput(level: LogLevel): boolean {
  return config.level <= level;
}

/**
 * Suppress all output. Only the exit code reports success or failure.
 */
export function enableQuietMode(): void {
  config.level = LogLevel.SILENT;
}

export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

export function getLogLevel(): LogLevel {
  return config.level;
}

/**
 * Level-aware logger.
 *
 * Usage:
 *   log.debug("resolved 12 dependencies")
 *   log.info("running generator zip")
 *   log.success("created dist/app.zip")
 */
export const log = {
  /** Dim, shown only at DEBUG. */
  debug(message: string): void {
    if (canOutput(LogLevel.DEBUG)) {
      console.log(pc.dim(message));
    }
  },

  info(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(message);
    }
  },

  /** Yellow, to stderr. */
  warn(message: string): void {
    if (canOutput(LogLevel.WARN)) {
      console.warn(pc.yellow(message));
    }
  },

  /** Red, to stderr. */
  error(message: string): void {
    if (canOutput(LogLevel.ERROR)) {
      console.error(pc.red(message));
    }
  },

  success(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.green(message));
    }
  },

  dim(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.dim(message));
    }
  },

  bold(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.bold(message));
    }
  },
};

/**
 * Styled string builders for composed messages.
 *
 *   log.info(`${style.cyan("zip")} -> ${style.dim(path)}`)
 */
export const style = {
  dim: (text: string) => pc.dim(text),
  cyan: (text: string) => pc.cyan(text),
};
