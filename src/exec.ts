/**
 * Subprocess execution for depship.
 *
 * Every external tool (conan, makeself, appimagetool, flatpak, bzip2, xz)
 * runs through a ToolRunner, so backends can be exercised with a recording
 * stand-in and the real runner stays a thin wrapper over execa.
 */

import { execa, ExecaError, type Options as ExecaOptions } from "execa";

import { ExternalToolError } from "./errors.js";
import { getLogLevel, log, LogLevel } from "./logger.js";

export interface ToolRunOptions {
  cwd?: string;
  /** Extra environment variables, merged over the current environment. */
  env?: Record<string, string>;
  /** Capture stdout/stderr instead of streaming them to the terminal (always on in quiet mode). */
  capture?: boolean;
  timeout?: number;
}

export interface ToolResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Contract for running external tools.
 * Implementations reject with ExternalToolError on spawn failure or non-zero exit.
 */
export interface ToolRunner {
  run(command: string, args: string[], options?: ToolRunOptions): Promise<ToolResult>;
}

function formatCommand(command: string, args: string[]): string {
  return [command, ...args.slice(0, 3)].join(" ") + (args.length > 3 ? " ..." : "");
}

/** ToolRunner backed by execa. */
export class ExecaToolRunner implements ToolRunner {
  async run(command: string, args: string[], options: ToolRunOptions = {}): Promise<ToolResult> {
    const capture = options.capture === true || getLogLevel() === LogLevel.SILENT;
    const stream = capture ? "pipe" : "inherit";
    const execaOptions: ExecaOptions = {
      cwd: options.cwd,
      env: options.env,
      timeout: options.timeout ?? 0,
      stdin: "ignore",
      stdout: stream,
      stderr: stream,
    };

    log.debug(`$ ${command} ${args.join(" ")}`);

    try {
      const result = await execa(command, args, execaOptions);
      return {
        exitCode: result.exitCode ?? 0,
        stdout: typeof result.stdout === "string" ? result.stdout : "",
        stderr: typeof result.stderr === "string" ? result.stderr : "",
      };
    } catch (error: unknown) {
      if (error instanceof ExecaError) {
        const stderr = typeof error.stderr === "string" ? error.stderr : "";
        const exitCode = error.exitCode ?? -1;
        const reason = error.timedOut
          ? `timed out after ${options.timeout ?? 0}ms`
          : error.exitCode === undefined
            ? `could not be started (${error.code ?? error.shortMessage})`
            : `exited with code ${exitCode}`;
        throw new ExternalToolError(
          command,
          exitCode,
          stderr,
          `${formatCommand(command, args)} ${reason}`
        );
      }
      throw error;
    }
  }
}

/** Shared default runner. */
export const defaultToolRunner: ToolRunner = new ExecaToolRunner();
