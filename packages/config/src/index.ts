import fs from "node:fs";
import path from "node:path";
import {
  defaultFormatterOptions,
  type FormatterOptions,
} from "@hclkit/format";

export interface HclfmtConfig {
  /** Indentation string, or a number of spaces */
  indent?: string | number;
  dense?: boolean;
  compactObjects?: boolean;
  preferIdentKeys?: boolean;
  /** File extensions `hclkit fmt` picks up when given no files */
  include?: string[];
}

export interface ResolvedHclfmtConfig {
  rootDir: string;
  /** Absent when no configuration file exists and defaults apply */
  configPath?: string;
  formatter: Required<FormatterOptions>;
  include: string[];
}

export interface LoadConfigOptions {
  cwd?: string;
  path?: string;
}

export const DEFAULT_CONFIG_NAME = "hclfmt.json";

export const DEFAULT_EXTENSIONS = [".hcl", ".tf"];

export function loadConfig(
  options: LoadConfigOptions = {}
): ResolvedHclfmtConfig {
  const cwd = options.cwd ?? process.cwd();
  const configPath = resolveConfigPath(options.path, cwd);

  if (!fs.existsSync(configPath)) {
    if (options.path) {
      throw new Error(`No ${DEFAULT_CONFIG_NAME} found at ${configPath}`);
    }
    return {
      rootDir: cwd,
      formatter: { ...defaultFormatterOptions },
      include: [...DEFAULT_EXTENSIONS],
    };
  }

  const rawText = fs.readFileSync(configPath, "utf8");
  let rawConfig: unknown;

  try {
    rawConfig = JSON.parse(rawText);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in ${configPath}: ${reason}`);
  }

  const config = validateConfig(rawConfig, configPath);

  return {
    rootDir: path.dirname(configPath),
    configPath,
    formatter: resolveFormatterOptions(config),
    include: config.include ?? [...DEFAULT_EXTENSIONS],
  };
}

export function resolveFormatterOptions(
  config: HclfmtConfig
): Required<FormatterOptions> {
  const indent =
    typeof config.indent === "number" ? " ".repeat(config.indent) : config.indent;

  return {
    indent: indent ?? defaultFormatterOptions.indent,
    dense: config.dense ?? defaultFormatterOptions.dense,
    compactObjects: config.compactObjects ?? defaultFormatterOptions.compactObjects,
    preferIdentKeys:
      config.preferIdentKeys ?? defaultFormatterOptions.preferIdentKeys,
  };
}

function resolveConfigPath(
  explicitPath: string | undefined,
  cwd: string
): string {
  if (explicitPath) {
    return path.isAbsolute(explicitPath)
      ? explicitPath
      : path.resolve(cwd, explicitPath);
  }
  return path.join(cwd, DEFAULT_CONFIG_NAME);
}

export function validateConfig(
  config: unknown,
  sourcePath: string
): HclfmtConfig {
  if (!isRecord(config)) {
    throw new Error(`Config at ${sourcePath} must be an object`);
  }

  return {
    indent: expectIndent(config, sourcePath),
    dense: expectBoolean(config, "dense", sourcePath),
    compactObjects: expectBoolean(config, "compactObjects", sourcePath),
    preferIdentKeys: expectBoolean(config, "preferIdentKeys", sourcePath),
    include: expectExtensions(config, "include", sourcePath),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectIndent(
  config: Record<string, unknown>,
  sourcePath: string
): string | number | undefined {
  const value = config.indent;
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === "number" && Number.isInteger(value) && value > 0) {
    return value;
  }
  if (typeof value === "string" && /^[ \t]+$/.test(value)) {
    return value;
  }
  throw new Error(
    `Config field "indent" in ${sourcePath} must be a positive integer or a non-empty whitespace string`
  );
}

function expectBoolean(
  config: Record<string, unknown>,
  key: string,
  sourcePath: string
): boolean | undefined {
  const value = config[key];
  if (value === undefined || typeof value === "boolean") {
    return value;
  }
  throw new Error(`Config field "${key}" in ${sourcePath} must be a boolean`);
}

function expectExtensions(
  config: Record<string, unknown>,
  key: string,
  sourcePath: string
): string[] | undefined {
  const value = config[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new Error(
      `Config field "${key}" in ${sourcePath} must be an array of file extensions`
    );
  }

  return value.map((entry) => {
    if (typeof entry !== "string" || !/^\.[^./\\]+$/.test(entry)) {
      throw new Error(
        `Config field "${key}" in ${sourcePath} must only contain extensions such as ".hcl"`
      );
    }
    return entry;
  });
}
