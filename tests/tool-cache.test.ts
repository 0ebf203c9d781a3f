import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { dirname, join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import type { Downloader } from "../src/http/download.js";
import { DownloadError } from "../src/errors.js";
import { ensureTool, getToolPath, makeselfTool } from "../src/tools/tool-cache.js";
import { cleanupTempDirs, makeTempDir } from "./helpers/fixtures.js";
import { MockDownloader } from "./mocks/tool-mock.js";

afterEach(cleanupTempDirs);

describe("getToolPath", () => {
  it("keys the cached file by tool name and version", () => {
    expect(getToolPath(makeselfTool(), "/cache")).toBe(
      join("/cache", "tools", "makeself", "2.5.0", "makeself-2.5.0.run")
    );
  });
});

describe("ensureTool", () => {
  it("downloads once and reuses the cached file", async () => {
    const cacheDir = makeTempDir("tools");
    const downloader = new MockDownloader(Buffer.from("payload"));
    const tool = makeselfTool();

    const first = await ensureTool(tool, cacheDir, downloader);
    const second = await ensureTool(tool, cacheDir, downloader);

    expect(first).toBe(getToolPath(tool, cacheDir));
    expect(second).toBe(first);
    expect(downloader.urls).toEqual([tool.url]);
    expect(readFileSync(first, "utf-8")).toBe("payload");
    expect(readdirSync(dirname(first))).toEqual(["makeself-2.5.0.run"]);
  });

  it("marks the tool executable", async () => {
    const cacheDir = makeTempDir("tools");
    const path = await ensureTool(makeselfTool(), cacheDir, new MockDownloader());

    expect(statSync(path).mode & 0o777).toBe(0o755);
  });

  it("leaves nothing behind when the download fails", async () => {
    const cacheDir = makeTempDir("tools");
    const failing: Downloader = {
      download: async (url) => {
        throw new DownloadError("HTTP 404", url);
      },
    };

    await expect(ensureTool(makeselfTool(), cacheDir, failing)).rejects.toThrow(DownloadError);
    expect(existsSync(getToolPath(makeselfTool(), cacheDir))).toBe(false);
  });
});
