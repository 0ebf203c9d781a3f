/**
 * Commander program for depship.
 *
 * `runCli` parses argv, runs the deploy command and resolves to the exit
 * code instead of exiting, so the whole CLI is testable in-process.
 */

import { Command, CommanderError, InvalidArgumentError, Option } from "commander";

import { BACKEND_NAMES, isBackendName, type BackendName } from "./backends/index.js";
import { deploy, type DeployServices } from "./commands/deploy.js";
import { DEFAULT_CONFIG_FILE, VERSION } from "./constants.js";
import { EXIT_SUCCESS, reportFatal } from "./error-handler.js";
import { enableQuietMode, LogLevel, setLogLevel } from "./logger.js";

type CliOptions = {
  generator: BackendName[];
  config: string;
  output?: string;
  cacheDir?: string;
  cache: boolean;
  chdir?: string;
  debug?: boolean;
  quiet?: boolean;
};

function collectGenerator(value: string, previous: BackendName[] | undefined): BackendName[] {
  const name = value.trim().toLowerCase();
  if (!isBackendName(name)) {
    throw new InvalidArgumentError(`Allowed choices are ${BACKEND_NAMES.join(", ")}.`);
  }
  return [...(previous ?? []), name];
}

/** Build the program. The action hands parsed options to deploy(). */
export function createProgram(services: DeployServices = {}): Command {
  const program = new Command();

  program
    .name("depship")
    .description("Package a built project with its resolved runtime dependencies")
    .version(VERSION, "-v, --version", "Print the version and exit")
    .addOption(
      new Option("-g, --generator <format>", `Output format, repeatable (${BACKEND_NAMES.join(", ")})`)
        .argParser(collectGenerator)
        .makeOptionMandatory()
    )
    .option("-c, --config <file>", "Deployment config file", DEFAULT_CONFIG_FILE)
    .option("-o, --output <dir>", "Directory for artifacts (default: project directory)")
    .option("--cache-dir <dir>", "Cache for dependency manifests and downloaded tools")
    .option("--no-cache", "Always re-run the dependency resolver")
    .option("-C, --chdir <dir>", "Change to directory before running (like git -C)")
    .option("-d, --debug", "Show debug output")
    .option("-q, --quiet", "Suppress all output (exit code only)")
    .exitOverride()
    .hook("preAction", (thisCommand) => {
      const opts = thisCommand.opts<CliOptions>();
      if (opts.quiet) {
        enableQuietMode();
      } else if (opts.debug) {
        setLogLevel(LogLevel.DEBUG);
      }
    })
    .action(async (options: CliOptions) => {
      if (options.chdir) {
        process.chdir(options.chdir);
      }

      await deploy(
        {
          generators: options.generator,
          projectDir: process.cwd(),
          configPath: options.config,
          ...(options.output ? { outputDir: options.output } : {}),
          ...(options.cacheDir ? { cacheDir: options.cacheDir } : {}),
          useCache: options.cache,
        },
        services
      );
    });

  return program;
}

/**
 * Run the CLI and resolve to the process exit code.
 *
 * @param argv - Full argv, including the node and script entries.
 */
export async function runCli(argv: readonly string[], services: DeployServices = {}): Promise<number> {
  const program = createProgram(services);
  try {
    await program.parseAsync([...argv]);
    return EXIT_SUCCESS;
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // --version and --help also end up here, with exit code 0
      return error.exitCode;
    }
    return reportFatal(error);
  }
}
