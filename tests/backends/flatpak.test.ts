import { readFileSync } from "node:fs";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  buildFlatpakManifest,
  flatpakBackend,
  shellQuote,
  type FlatpakManifest,
} from "../../src/backends/flatpak.js";
import { ExternalToolError } from "../../src/errors.js";
import {
  cleanupTempDirs,
  createBackendContext,
  createProjectFixture,
  fixtureConfig,
  type ProjectFixture,
} from "../helpers/fixtures.js";
import { MockDownloader, ToolMockRecorder, type RecordedCall } from "../mocks/tool-mock.js";

describe("shellQuote", () => {
  it("leaves plain words alone and single-quotes the rest", () => {
    expect(shellQuote("/app/lib/libz.so.1")).toBe("/app/lib/libz.so.1");
    expect(shellQuote("my file")).toBe("'my file'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });
});

describe("flatpak backend", () => {
  let fixture: ProjectFixture;
  let runner: ToolMockRecorder;
  let manifest: FlatpakManifest | undefined;
  let written = "";
  let launcher: string;

  beforeEach(() => {
    fixture = createProjectFixture();
    manifest = undefined;
    written = "";
    launcher = "";
    runner = new ToolMockRecorder().on("flatpak-builder", (call: RecordedCall) => {
      const manifestPath = call.args[3] ?? "";
      const cwd = call.options.cwd ?? "";
      written = readFileSync(manifestPath, "utf-8");
      manifest = buildFlatpakManifest(fixtureConfig(fixture), join(cwd, "stage"));
      launcher = readFileSync(join(cwd, "stage", "bin", "myapp"), "utf-8");
    });
  });

  afterEach(cleanupTempDirs);

  const repoDir = (): string => join(fixture.cacheDir, "flatpak-repos", "org.depship.myapp");

  it("builds, installs and exports the bundle", async () => {
    const artifact = await flatpakBackend.run(createBackendContext(fixture, runner, new MockDownloader()));

    expect(artifact).toBe(join(fixture.outputDir, "myapp.flatpak"));
    expect(runner.commands()).toEqual(["flatpak-builder", "flatpak", "flatpak", "flatpak"]);
    expect(runner.calls[0]?.args.slice(0, 2)).toEqual(["--force-clean", `--repo=${repoDir()}`]);
    expect(runner.calls.slice(1).map((call) => call.args)).toEqual([
      ["--user", "remote-add", "--no-gpg-verify", "myapp-repo", repoDir()],
      ["--user", "install", "-y", "--reinstall", "myapp-repo", "org.depship.myapp"],
      ["build-bundle", repoDir(), artifact, "org.depship.myapp"],
    ]);
  });

  it("installs every staged file under /app", async () => {
    await flatpakBackend.run(createBackendContext(fixture, runner, new MockDownloader()));

    expect(written).toBe(JSON.stringify(manifest, null, 2));
    expect(manifest?.["app-id"]).toBe("org.depship.myapp");
    expect(manifest?.command).toBe("myapp");
    expect(manifest?.runtime).toBe("org.freedesktop.Platform");
    const flatpakModule = manifest?.modules[0];
    expect(flatpakModule?.sources.map((source) => source["dest-filename"])).toEqual([
      "0-myapp",
      "1-openssl",
      "2-libssl.so",
      "3-libz.so.1",
      "4-myapp",
    ]);
    expect(flatpakModule?.["build-commands"]).toEqual([
      "install -Dm755 0-myapp /app/bin/myapp",
      "install -Dm755 1-openssl /app/bin/openssl",
      "install -Dm755 2-libssl.so /app/lib/libssl.so",
      "install -Dm755 3-libz.so.1 /app/lib/libz.so.1",
      "install -Dm755 4-myapp /app/myapp",
    ]);
  });

  it("writes a launcher rooted at /app", async () => {
    await flatpakBackend.run(createBackendContext(fixture, runner, new MockDownloader()));

    expect(launcher).toBe(
      [
        "#!/bin/sh",
        "export PATH=$PATH:/app/bin",
        "export LD_LIBRARY_PATH=$LD_LIBRARY_PATH:/app/lib",
        'cd "/app"',
        './myapp "$@"',
        "status=$?",
        "cd - > /dev/null",
        "exit $status",
        "",
      ].join("\n")
    );
  });

  it("tolerates an existing remote", async () => {
    runner.on("flatpak", (call: RecordedCall) => {
      if (call.args[1] === "remote-add") {
        throw new ExternalToolError("flatpak", 1, "error: Remote \"myapp-repo\" already exists");
      }
    });

    await flatpakBackend.run(createBackendContext(fixture, runner, new MockDownloader()));

    expect(runner.calls).toHaveLength(4);
  });

  it("fails on any other remote-add error", async () => {
    runner.on("flatpak", (call: RecordedCall) => {
      if (call.args[1] === "remote-add") {
        throw new ExternalToolError("flatpak", 1, "error: permission denied");
      }
    });

    await expect(
      flatpakBackend.run(createBackendContext(fixture, runner, new MockDownloader()))
    ).rejects.toThrow(ExternalToolError);
    expect(runner.calls).toHaveLength(2);
  });
});
