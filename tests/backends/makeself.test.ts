import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { makeselfBackend } from "../../src/backends/makeself.js";
import { getToolPath, makeselfTool } from "../../src/tools/tool-cache.js";
import {
  cleanupTempDirs,
  createBackendContext,
  createProjectFixture,
  FIXTURE_LAUNCHER,
  writeFixtureFile,
  type ProjectFixture,
} from "../helpers/fixtures.js";
import { MockDownloader, ToolMockRecorder, type RecordedCall } from "../mocks/tool-mock.js";

describe("makeself backend", () => {
  let fixture: ProjectFixture;
  let runner: ToolMockRecorder;
  let downloader: MockDownloader;
  let installer: string;
  let script: string;

  beforeEach(() => {
    fixture = createProjectFixture();
    runner = new ToolMockRecorder();
    downloader = new MockDownloader();
    installer = getToolPath(makeselfTool(), fixture.cacheDir);
    script = join(dirname(installer), "makeself", "makeself.sh");
  });

  afterEach(cleanupTempDirs);

  it("packs the staged bundle with the cached makeself", async () => {
    writeFixtureFile(installer, "installer", 0o755);
    writeFixtureFile(script, "#!/bin/sh\n", 0o755);
    let launcher = "";
    runner.on("makeself.sh", (call: RecordedCall) => {
      launcher = readFileSync(join(call.args[0] ?? "", "myapp.sh"), "utf-8");
    });

    const artifact = await makeselfBackend.run(createBackendContext(fixture, runner, downloader));

    expect(artifact).toBe(join(fixture.outputDir, "myapp.run"));
    expect(downloader.urls).toEqual([]);
    expect(runner.calls).toHaveLength(1);
    const [call] = runner.calls;
    expect(call?.command).toBe(script);
    expect(call?.args.slice(1)).toEqual([artifact, "myapp", "./myapp.sh"]);
    expect(launcher).toBe(FIXTURE_LAUNCHER);
  });

  it("downloads and unpacks makeself on first use", async () => {
    runner.on("sh", () => {
      writeFixtureFile(script, "#!/bin/sh\n", 0o755);
    });

    await makeselfBackend.run(createBackendContext(fixture, runner, downloader));

    expect(downloader.urls).toEqual([
      "https://github.com/megastep/makeself/releases/download/release-2.5.0/makeself-2.5.0.run",
    ]);
    expect(runner.commands()).toEqual(["sh", "makeself.sh"]);
    expect(runner.calls[0]?.args).toEqual([installer, "--noexec", "--target", dirname(script)]);
    expect(existsSync(installer)).toBe(true);
  });
});
