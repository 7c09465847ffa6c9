/**
 * Tests for per-output config artifacts, written under a temp directory.
 */

import { test, describe, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { mkdtempSync, rmSync, readFileSync, readdirSync, existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { artifactPath, artifactContent, ensureConfigArtifact } from "../src/process/artifact.js";

describe("artifactPath", () => {
  test("derives a deterministic path from the output name", () => {
    const opts = { cacheDir: "/cache", baseConfig: "/base.jsonc" };
    assert.strictEqual(artifactPath(opts, "DP-1"), "/cache/bar-DP-1.jsonc");
    assert.strictEqual(artifactPath(opts, "DP-1"), artifactPath(opts, "DP-1"));
  });

  test("escapes path separators so the file stays in the cache dir", () => {
    const opts = { cacheDir: "/cache", baseConfig: "/base.jsonc", prefix: "waybar" };
    assert.strictEqual(artifactPath(opts, "../HDMI A/1"), "/cache/waybar-..%2FHDMI%20A%2F1.jsonc");
  });

  test("outputs that differ only in unsafe characters get different files", () => {
    const opts = { cacheDir: "/cache", baseConfig: "/base.jsonc" };
    assert.strictEqual(artifactPath(opts, "DP 1"), "/cache/bar-DP%201.jsonc");
    assert.strictEqual(artifactPath(opts, "DP_1"), "/cache/bar-DP_1.jsonc");
    assert.notStrictEqual(artifactPath(opts, "DP%201"), artifactPath(opts, "DP 1"));
  });
});

describe("artifactContent", () => {
  test("includes the base config and pins the output", () => {
    assert.deepStrictEqual(artifactContent("/home/u/base.jsonc", "DP-2"), {
      include: "/home/u/base.jsonc",
      output: ["DP-2"],
    });
  });
});

describe("ensureConfigArtifact", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "barsync-artifact-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("creates the cache dir and writes the JSON document", async () => {
    const cacheDir = join(dir, "nested", "cache");
    const path = await ensureConfigArtifact({ cacheDir, baseConfig: "/cfg/base.jsonc" }, "DP-1");
    assert.strictEqual(path, join(cacheDir, "bar-DP-1.jsonc"));
    assert.strictEqual(
      readFileSync(path, "utf-8"),
      '{\n  "include": "/cfg/base.jsonc",\n  "output": [\n    "DP-1"\n  ]\n}',
    );
  });

  test("is idempotent and leaves no temp files behind", async () => {
    const opts = { cacheDir: dir, baseConfig: "/cfg/base.jsonc" };
    const first = await ensureConfigArtifact(opts, "DP-1");
    const firstBody = readFileSync(first, "utf-8");
    const second = await ensureConfigArtifact(opts, "DP-1");
    assert.strictEqual(second, first);
    assert.strictEqual(readFileSync(second, "utf-8"), firstBody);
    assert.deepStrictEqual(readdirSync(dir), ["bar-DP-1.jsonc"]);
  });

  test("keeps each output's pin in its own file", async () => {
    const opts = { cacheDir: dir, baseConfig: "/cfg/base.jsonc" };
    const spaced = await ensureConfigArtifact(opts, "DP 1");
    const underscored = await ensureConfigArtifact(opts, "DP_1");
    assert.notStrictEqual(spaced, underscored);
    assert.deepStrictEqual(JSON.parse(readFileSync(spaced, "utf-8")).output, ["DP 1"]);
    assert.deepStrictEqual(JSON.parse(readFileSync(underscored, "utf-8")).output, ["DP_1"]);
  });

  test("overwrites the previous content when the base changes", async () => {
    const path = await ensureConfigArtifact({ cacheDir: dir, baseConfig: "/old.jsonc" }, "DP-1");
    await ensureConfigArtifact({ cacheDir: dir, baseConfig: "/new.jsonc" }, "DP-1");
    assert.deepStrictEqual(JSON.parse(readFileSync(path, "utf-8")), { include: "/new.jsonc", output: ["DP-1"] });
  });

  test("rejects and cleans up when the target cannot be replaced", async () => {
    // A directory where the file should go makes the rename fail
    mkdirSync(join(dir, "bar-DP-1.jsonc"));
    await assert.rejects(() => ensureConfigArtifact({ cacheDir: dir, baseConfig: "/b.jsonc" }, "DP-1"));
    assert.strictEqual(existsSync(join(dir, `bar-DP-1.jsonc.${process.pid}.tmp`)), false);
  });
});
