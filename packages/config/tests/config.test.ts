import { describe, expect, test } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { tmpdir } from "node:os";
import {
  DEFAULT_CONFIG_NAME,
  DEFAULT_EXTENSIONS,
  loadConfig,
  resolveFormatterOptions,
  validateConfig,
} from "../src/index.ts";

function createTempDir(): string {
  return fs.mkdtempSync(path.join(tmpdir(), "hclkit-config-"));
}

function writeConfig(root: string, contents: string): string {
  const configPath = path.join(root, DEFAULT_CONFIG_NAME);
  fs.writeFileSync(configPath, contents);
  return configPath;
}

describe("loadConfig", () => {
  test("falls back to defaults without hclfmt.json", () => {
    const root = createTempDir();

    expect(loadConfig({ cwd: root })).toEqual({
      rootDir: root,
      formatter: {
        indent: "  ",
        dense: false,
        compactObjects: false,
        preferIdentKeys: false,
      },
      include: [".hcl", ".tf"],
    });
  });

  test("loads hclfmt.json from the working directory", () => {
    const root = createTempDir();
    const configPath = writeConfig(
      root,
      JSON.stringify(
        { indent: 4, dense: true, include: [".hcl", ".nomad"] },
        null,
        2
      )
    );

    const config = loadConfig({ cwd: root });

    expect(config.configPath).toBe(configPath);
    expect(config.rootDir).toBe(root);
    expect(config.formatter).toEqual({
      indent: "    ",
      dense: true,
      compactObjects: false,
      preferIdentKeys: false,
    });
    expect(config.include).toEqual([".hcl", ".nomad"]);
  });

  test("resolves an explicit path against the working directory", () => {
    const root = createTempDir();
    fs.mkdirSync(path.join(root, "conf"));
    const configPath = path.join(root, "conf", "custom.json");
    fs.writeFileSync(configPath, JSON.stringify({ indent: "\t" }));

    const config = loadConfig({ cwd: root, path: "conf/custom.json" });

    expect(config.configPath).toBe(configPath);
    expect(config.rootDir).toBe(path.join(root, "conf"));
    expect(config.formatter.indent).toBe("\t");
    expect(config.include).toEqual(DEFAULT_EXTENSIONS);
  });

  test("throws when an explicit path does not exist", () => {
    const root = createTempDir();
    const missing = path.join(root, "missing.json");

    expect(() => loadConfig({ cwd: root, path: missing })).toThrow(
      `No hclfmt.json found at ${missing}`
    );
  });

  test("reports invalid JSON with the file path", () => {
    const root = createTempDir();
    const configPath = writeConfig(root, "{ indent: ");

    expect(() => loadConfig({ cwd: root })).toThrow(
      `Invalid JSON in ${configPath}`
    );
  });
});

describe("validateConfig", () => {
  test("rejects non-object configs", () => {
    expect(() => validateConfig([], "conf.json")).toThrow(
      "Config at conf.json must be an object"
    );
  });

  test("rejects a bad indent", () => {
    expect(() => validateConfig({ indent: 0 }, "conf.json")).toThrow(
      'Config field "indent" in conf.json must be a positive integer or a non-empty whitespace string'
    );
    expect(() => validateConfig({ indent: "ab" }, "conf.json")).toThrow(
      'Config field "indent"'
    );
  });

  test("rejects non-boolean flags", () => {
    expect(() => validateConfig({ dense: "yes" }, "conf.json")).toThrow(
      'Config field "dense" in conf.json must be a boolean'
    );
  });

  test("rejects include entries that are not extensions", () => {
    expect(() => validateConfig({ include: ".hcl" }, "conf.json")).toThrow(
      'Config field "include" in conf.json must be an array of file extensions'
    );
    expect(() => validateConfig({ include: ["hcl"] }, "conf.json")).toThrow(
      'Config field "include" in conf.json must only contain extensions such as ".hcl"'
    );
  });

  test("ignores unknown fields", () => {
    expect(validateConfig({ compactObjects: true, extra: 1 }, "conf.json")).toEqual({
      indent: undefined,
      dense: undefined,
      compactObjects: true,
      preferIdentKeys: undefined,
      include: undefined,
    });
  });
});

describe("resolveFormatterOptions", () => {
  test("turns a number indent into spaces", () => {
    expect(resolveFormatterOptions({ indent: 3, preferIdentKeys: true })).toEqual({
      indent: "   ",
      dense: false,
      compactObjects: false,
      preferIdentKeys: true,
    });
  });
});
