/**
 * On-disk project fixtures: fake package roots, a built executable and a
 * config file, all under a throwaway directory.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

import type { BackendContext } from "../../src/backends/types.js";
import { parseIni, toDeployConfig, type DeployConfig } from "../../src/config-file.js";
import { deriveLayout } from "../../src/dependencies/dedupe.js";
import type { Dependency } from "../../src/dependencies/manifest.js";
import type { ToolRunner } from "../../src/exec.js";
import type { Downloader } from "../../src/http/download.js";

export const DEFAULT_INI = `[general]
name = myapp
executable = build/myapp
version = 1.2.0
`;

const created: string[] = [];

export function makeTempDir(prefix = "fixture"): string {
  const dir = mkdtempSync(join(tmpdir(), `depship-test-${prefix}-`));
  created.push(dir);
  return dir;
}

/** Remove every directory handed out by makeTempDir. */
export function cleanupTempDirs(): void {
  for (const dir of created.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
}

export function writeFixtureFile(path: string, content: string, mode?: number): string {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, mode === undefined ? undefined : { mode });
  return path;
}

export interface ProjectFixture {
  root: string;
  projectDir: string;
  executable: string;
  configPath: string;
  outputDir: string;
  cacheDir: string;
  /** zlib (lib), openssl (lib + bin) and a package whose lib dir is empty. */
  dependencies: Dependency[];
}

export function createProjectFixture(ini = DEFAULT_INI): ProjectFixture {
  const root = makeTempDir("project");
  const pkgs = join(root, "pkgs");

  writeFixtureFile(join(pkgs, "zlib", "lib", "libz.so.1"), "zlib");
  writeFixtureFile(join(pkgs, "zlib", "include", "zlib.h"), "header");
  writeFixtureFile(join(pkgs, "openssl", "lib", "libssl.so"), "ssl");
  writeFixtureFile(join(pkgs, "openssl", "bin", "openssl"), "openssl-bin", 0o755);
  mkdirSync(join(pkgs, "headers", "lib"), { recursive: true });

  const projectDir = join(root, "project");
  const executable = writeFixtureFile(join(projectDir, "build", "myapp"), "#!/bin/sh\necho hello\n", 0o644);
  const configPath = writeFixtureFile(join(projectDir, "depship.ini"), ini);
  writeFixtureFile(join(projectDir, "conanfile.txt"), "[requires]\nzlib/1.3\nopenssl/3.2.1\n");

  return {
    root,
    projectDir,
    executable,
    configPath,
    outputDir: join(root, "out"),
    cacheDir: join(root, "cache"),
    dependencies: [
      {
        name: "zlib",
        rootPath: join(pkgs, "zlib"),
        libPaths: [join(pkgs, "zlib", "lib")],
        binPaths: [join(pkgs, "zlib", "bin")],
      },
      {
        name: "openssl",
        rootPath: join(pkgs, "openssl"),
        libPaths: [join(pkgs, "openssl", "lib")],
        binPaths: [join(pkgs, "openssl", "bin")],
      },
      {
        name: "headers",
        rootPath: join(pkgs, "headers"),
        libPaths: [join(pkgs, "headers", "lib")],
        binPaths: [],
      },
    ],
  };
}

export function fixtureConfig(fixture: ProjectFixture, ini = DEFAULT_INI): DeployConfig {
  return toDeployConfig(parseIni(ini), fixture.projectDir, fixture.configPath);
}

export function createBackendContext(
  fixture: ProjectFixture,
  runner: ToolRunner,
  downloader: Downloader,
  config: DeployConfig = fixtureConfig(fixture)
): BackendContext {
  return {
    config,
    layout: deriveLayout(fixture.dependencies),
    outputDir: fixture.outputDir,
    cacheDir: fixture.cacheDir,
    runner,
    downloader,
  };
}

/** The launcher every self-locating bundle of the fixture gets. */
export const FIXTURE_LAUNCHER = [
  "#!/bin/sh",
  'BUNDLE_DIR=$(cd "$(dirname "$0")" && pwd)',
  "export PATH=$PATH:$BUNDLE_DIR/bin",
  "export LD_LIBRARY_PATH=$LD_LIBRARY_PATH:$BUNDLE_DIR/lib",
  'cd "$BUNDLE_DIR"',
  './myapp "$@"',
  "status=$?",
  "cd - > /dev/null",
  "exit $status",
  "",
].join("\n");
