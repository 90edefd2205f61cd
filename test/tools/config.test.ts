import { writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { describe, expect, test } from "vitest";
import { defineConfig, loadConfig, resolveConfig } from "../../src/tools/config.js";
import { withTempDir } from "./helpers.js";

describe("resolveConfig", () => {
  test("defaults", () => {
    const root = resolve("/work");
    expect(resolveConfig({}, root, "cfg", {})).toEqual({
      root,
      sourceDir: resolve(root, "source"),
      outputDir: resolve(root, "output"),
      maxDepth: 256,
      exact: false,
      documents: [],
    });
  });

  test("directories resolve against the config root", () => {
    const root = resolve("/work");
    const config = resolveConfig(
      defineConfig({ sourceDir: "in", outputDir: "/abs/out", documents: [{ schema: "nature" }] }),
      root,
      "cfg",
      {},
    );
    expect(config.sourceDir).toBe(resolve(root, "in"));
    expect(config.outputDir).toBe(resolve("/abs/out"));
    expect(config.documents).toEqual([{ schema: "nature" }]);
  });

  test("the environment overrides maxDepth", () => {
    expect(resolveConfig({ maxDepth: 8 }, "/work", "cfg", { CFGBIN_MAX_DEPTH: "12" }).maxDepth).toBe(12);
    expect(resolveConfig({ maxDepth: 8 }, "/work", "cfg", { CFGBIN_MAX_DEPTH: "" }).maxDepth).toBe(8);
    expect(() => resolveConfig({}, "/work", "cfg", { CFGBIN_MAX_DEPTH: "abc" })).toThrow(
      'CFGBIN_MAX_DEPTH must be a positive integer, got "abc"',
    );
  });

  test("violations are listed one per line", () => {
    let message = "";
    try {
      resolveConfig({ maxDepth: -1, documents: [{}] }, "/work", "cfg", {});
    } catch (err) {
      message = err instanceof Error ? err.message : "";
    }
    const lines = message.split("\n");
    expect(lines[0]).toBe("invalid config: cfg");
    expect(lines.some((l) => l.startsWith("- maxDepth:"))).toBe(true);
    expect(lines.some((l) => l.startsWith("- documents.0.schema:"))).toBe(true);
  });

  test("unknown keys are rejected", () => {
    expect(() => resolveConfig({ sourceDirs: "x" }, "/work", "cfg", {})).toThrow("invalid config: cfg");
  });
});

describe("loadConfig", () => {
  test("reads cfgbin.config.json", async () => {
    await withTempDir(async (dir) => {
      await writeFile(join(dir, "cfgbin.config.json"), JSON.stringify({ exact: true }));
      const config = await loadConfig(dir, {});
      expect(config.root).toBe(dir);
      expect(config.exact).toBe(true);
      expect(config.sourceDir).toBe(join(dir, "source"));
    });
  });

  test("reports malformed JSON", async () => {
    await withTempDir(async (dir) => {
      await writeFile(join(dir, "cfgbin.config.json"), "{ nope");
      await expect(loadConfig(dir, {})).rejects.toThrow(`invalid JSON in ${join(dir, "cfgbin.config.json")}`);
    });
  });

  test("fails without a config file", async () => {
    await withTempDir(async (dir) => {
      await expect(loadConfig(dir, {})).rejects.toThrow(
        "No config file found. Create one of: cfgbin.config.js, cfgbin.config.mjs, cfgbin.config.json",
      );
    });
  });
});
