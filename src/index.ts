/**
 * depship - package a built project with its resolved runtime dependencies.
 *
 * This is the main entry point for the depship npm package.
 */

export { VERSION } from "./constants.js";
export {
  DepshipError,
  ConfigError,
  ResolutionError,
  StagingError,
  ExternalToolError,
  DownloadError,
} from "./errors.js";
export {
  type DeployConfig,
  type AppImageConfig,
  type FlatpakConfig,
  parseIni,
  toDeployConfig,
  loadDeployConfig,
} from "./config-file.js";
export {
  type Dependency,
  type DependencyLayout,
  type DependencyResolver,
  ConanResolver,
  parseManifest,
  deriveLayout,
} from "./dependencies/index.js";
export { stage } from "./staging/stager.js";
export { type LauncherOptions, renderLauncher, generateLauncher } from "./staging/launcher.js";
export { withTempDir } from "./staging/temp-dir.js";
export {
  type Backend,
  type BackendContext,
  type BackendName,
  BACKEND_NAMES,
  getBackend,
} from "./backends/index.js";
export { type ToolRunner, ExecaToolRunner } from "./exec.js";
export { type Downloader } from "./http/download.js";
export { deploy, type DeployOptions, type DeployResult, type DeployServices } from "./commands/deploy.js";
export { createProgram, runCli } from "./program.js";
