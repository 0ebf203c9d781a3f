import { mkdirSync } from "node:fs";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { deriveLayout, toRelativeDir } from "../src/dependencies/dedupe.js";
import { cleanupTempDirs, makeTempDir, writeFixtureFile } from "./helpers/fixtures.js";

afterEach(cleanupTempDirs);

describe("toRelativeDir", () => {
  it("returns the path below the root with forward slashes", () => {
    expect(toRelativeDir("/pkgs/zlib", "/pkgs/zlib/lib")).toBe("lib");
    expect(toRelativeDir("/pkgs/zlib", "/pkgs/zlib/lib/x86_64")).toBe("lib/x86_64");
  });

  it("returns '.' for the root itself", () => {
    expect(toRelativeDir("/pkgs/zlib", "/pkgs/zlib")).toBe(".");
  });
});

describe("deriveLayout", () => {
  it("collapses shared relative dirs but keeps every source in the copy map", () => {
    const root = makeTempDir("dedupe");
    const a = join(root, "a");
    const b = join(root, "b");
    writeFixtureFile(join(a, "lib", "liba.so"), "a");
    writeFixtureFile(join(b, "lib", "libb.so"), "b");
    writeFixtureFile(join(b, "bin", "tool"), "t");

    const layout = deriveLayout([
      { name: "b", rootPath: b, libPaths: [join(b, "lib")], binPaths: [join(b, "bin")] },
      { name: "a", rootPath: a, libPaths: [join(a, "lib")], binPaths: [] },
    ]);

    expect(layout.libDirs).toEqual(["lib"]);
    expect(layout.binDirs).toEqual(["bin"]);
    expect([...layout.copyMap.entries()]).toEqual([
      [join(a, "lib"), "lib"],
      [join(b, "bin"), "bin"],
      [join(b, "lib"), "lib"],
    ]);
  });

  it("skips missing and empty directories", () => {
    const root = makeTempDir("dedupe");
    const pkg = join(root, "pkg");
    writeFixtureFile(join(pkg, "lib", "libx.so"), "x");
    mkdirSync(join(pkg, "empty"), { recursive: true });

    const layout = deriveLayout([
      {
        name: "pkg",
        rootPath: pkg,
        libPaths: [join(pkg, "lib"), join(pkg, "empty"), join(pkg, "missing")],
        binPaths: [join(pkg, "bin")],
      },
    ]);

    expect(layout.libDirs).toEqual(["lib"]);
    expect(layout.binDirs).toEqual([]);
    expect([...layout.copyMap.keys()]).toEqual([join(pkg, "lib")]);
  });

  it("maps a package root listed as a library dir to '.'", () => {
    const root = makeTempDir("dedupe");
    const pkg = join(root, "flat");
    writeFixtureFile(join(pkg, "libflat.so"), "flat");
    writeFixtureFile(join(pkg, "lib", "x86_64", "libnested.so"), "nested");

    const layout = deriveLayout([
      { name: "flat", rootPath: pkg, libPaths: [join(pkg, "lib", "x86_64"), pkg], binPaths: [] },
    ]);

    expect(layout.libDirs).toEqual([".", "lib/x86_64"]);
    expect(layout.copyMap.get(pkg)).toBe(".");
  });

  it("is empty for no dependencies", () => {
    const layout = deriveLayout([]);
    expect(layout.libDirs).toEqual([]);
    expect(layout.binDirs).toEqual([]);
    expect(layout.copyMap.size).toBe(0);
  });
});
