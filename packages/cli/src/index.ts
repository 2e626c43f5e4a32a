import fs from "node:fs";
import path from "node:path";
import { Command, CommanderError } from "commander";
import { lex } from "@hclkit/lexer";
import { parseBody, parseExpression, ParseError } from "@hclkit/parser";
import { format } from "@hclkit/format";
import { loadConfig, type ResolvedHclfmtConfig } from "@hclkit/config";

/** Anything output can be written to, such as `process.stdout`. */
export interface Output {
  write(chunk: string): unknown;
}

export interface CliOptions {
  cwd?: string;
  stdout?: Output;
  stderr?: Output;
}

type GlobalOptions = {
  config?: string;
  pretty: string;
  verbose?: boolean;
};

interface ParseCommandOptions {
  expr?: boolean;
}

interface FmtCommandOptions {
  write?: boolean;
  check?: boolean;
}

interface ExecuteOptions {
  cwd: string;
  stdout: Output;
  stderr: Output;
  global: GlobalOptions;
}

/** Directories `fmt` never descends into when collecting files. */
const SKIPPED_DIRECTORIES = new Set(["node_modules", ".git", ".terraform"]);

export async function run(
  args: string[],
  options: CliOptions = {}
): Promise<number> {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const cwd = options.cwd ?? process.cwd();

  let exitCode = 0;
  const program = new Command();

  program
    .name("hclkit")
    .version("0.1.0")
    .description("HCL parser, formatter and tooling")
    .option("-c, --config <path>", "Path to hclfmt.json config file")
    .option(
      "-p, --pretty <n>",
      "Pretty-print JSON output with <n> spaces",
      "2"
    )
    .option("--verbose", "Report progress for every file on stderr")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => stdout.write(text),
      writeErr: (text) => stderr.write(text),
    });

  const exec = (): ExecuteOptions => ({
    cwd,
    stdout,
    stderr,
    global: program.opts<GlobalOptions>(),
  });

  program
    .command("tokenize <file>")
    .description("Print the tokens of a file as JSON")
    .action((file: string) => {
      exitCode = tokenizeCommand(file, exec());
    });

  program
    .command("parse <file>")
    .description("Print the document model of a file as JSON")
    .option("-e, --expr", "Parse the file as a single expression")
    .action((file: string, opts: ParseCommandOptions) => {
      exitCode = parseCommand(file, opts, exec());
    });

  program
    .command("fmt [files...]")
    .description("Format files in canonical style")
    .option("-w, --write", "Rewrite files in place")
    .option("--check", "List files that are not formatted and fail")
    .action((files: string[], opts: FmtCommandOptions) => {
      exitCode = fmtCommand(files, opts, exec());
    });

  try {
    await program.parseAsync(args, { from: "user" });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    stderr.write(`${errorMessage(error)}\n`);
    return 1;
  }
}

function tokenizeCommand(file: string, exec: ExecuteOptions): number {
  const { cwd, stdout, stderr, global } = exec;
  const filePath = path.resolve(cwd, file);

  try {
    const source = fs.readFileSync(filePath, "utf8");
    stdout.write(`${JSON.stringify(lex(source), null, prettySpaces(global))}\n`);
    return 0;
  } catch (error) {
    stderr.write(`${errorMessage(error)}\n`);
    return 1;
  }
}

function parseCommand(
  file: string,
  opts: ParseCommandOptions,
  exec: ExecuteOptions
): number {
  const { cwd, stdout, stderr, global } = exec;
  const filePath = path.resolve(cwd, file);

  try {
    const source = fs.readFileSync(filePath, "utf8");
    const result = opts.expr ? parseExpression(source) : parseBody(source);
    stdout.write(`${JSON.stringify(result, null, prettySpaces(global))}\n`);
    return 0;
  } catch (error) {
    formatAndWriteError(error, file, stderr);
    return 1;
  }
}

function fmtCommand(
  files: string[],
  opts: FmtCommandOptions,
  exec: ExecuteOptions
): number {
  const { cwd, stdout, stderr, global } = exec;

  let config: ResolvedHclfmtConfig;
  try {
    config = loadConfig({ cwd, path: global.config });
  } catch (error) {
    stderr.write(`${errorMessage(error)}\n`);
    return 1;
  }

  const targets =
    files.length > 0
      ? files.map((file) => path.resolve(cwd, file))
      : collectFiles(cwd, config.include);

  let exitCode = 0;
  let unformatted = 0;

  for (const filePath of targets) {
    const display = path.relative(cwd, filePath) || filePath;

    let source: string;
    let formatted: string;
    try {
      source = fs.readFileSync(filePath, "utf8");
      formatted = format(parseBody(source), config.formatter);
    } catch (error) {
      formatAndWriteError(error, display, stderr);
      exitCode = 1;
      continue;
    }

    const changed = formatted !== source;

    if (opts.check) {
      if (changed) {
        unformatted += 1;
        stdout.write(`${display}\n`);
      }
      continue;
    }

    if (opts.write) {
      if (changed) {
        fs.writeFileSync(filePath, formatted);
      }
      if (global.verbose) {
        stderr.write(`${changed ? "formatted" : "unchanged"} ${display}\n`);
      }
      continue;
    }

    if (global.verbose) {
      stderr.write(`formatting ${display}\n`);
    }
    stdout.write(formatted);
  }

  if (opts.check && unformatted > 0) {
    stderr.write(`${unformatted} file(s) need formatting\n`);
    return 1;
  }

  return exitCode;
}

/** Files under `root` with one of `extensions`, in a stable order. */
export function collectFiles(root: string, extensions: string[]): string[] {
  const found: string[] = [];
  const entries = fs
    .readdirSync(root, { withFileTypes: true })
    .sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const entryPath = path.join(root, entry.name);
    if (entry.isDirectory()) {
      if (!SKIPPED_DIRECTORIES.has(entry.name)) {
        found.push(...collectFiles(entryPath, extensions));
      }
    } else if (entry.isFile() && extensions.includes(path.extname(entry.name))) {
      found.push(entryPath);
    }
  }

  return found;
}

function formatAndWriteError(
  error: unknown,
  filePath: string,
  stderr: Output
): void {
  if (error instanceof ParseError) {
    stderr.write(`${filePath}:${error.line}:${error.column}: error\n`);
    stderr.write(`${error.message}\n`);
  } else {
    stderr.write(`${errorMessage(error)}\n`);
  }
}

function prettySpaces(global: GlobalOptions): number {
  const parsed = Number.parseInt(global.pretty, 10);
  return Number.isNaN(parsed) ? 2 : Math.max(0, parsed);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
