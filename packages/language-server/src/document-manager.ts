/**
 * Document caching and analysis management.
 *
 * Every version of a document is lexed and parsed once; diagnostics,
 * formatting and semantic tokens all read from the cache.
 */
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import type { TextDocument } from "vscode-languageserver-textdocument";
import {
  DiagnosticSeverity,
  TextEdit,
  type Diagnostic,
  type FormattingOptions,
} from "vscode-languageserver";
import { lex } from "@hclkit/lexer";
import { tryParseBody, type ParseOptions } from "@hclkit/parser";
import { format, type FormatterOptions } from "@hclkit/format";
import { loadConfig, type ResolvedHclfmtConfig } from "@hclkit/config";
import type { DocumentCache, ParseErrorInfo, ParseResult } from "./types";
import { documentRange, splitLines, toLspRange } from "./positions";

export interface DocumentManagerOptions {
  parser?: ParseOptions;
  /** Formatter options used where no hclfmt.json applies */
  formatter?: FormatterOptions;
}

/**
 * Document manager with per-version caching.
 */
export class DocumentManager {
  /** Per-document caches */
  private documents = new Map<string, DocumentCache>();

  /** hclfmt.json lookups by directory */
  private configs = new Map<string, ResolvedHclfmtConfig>();

  private readonly parserOptions: ParseOptions;
  private readonly formatterOptions: FormatterOptions;

  constructor(options: DocumentManagerOptions = {}) {
    this.parserOptions = options.parser ?? {};
    this.formatterOptions = options.formatter ?? {};
  }

  /**
   * Update a document and reanalyze it unless this version is cached.
   */
  updateDocument(document: TextDocument): DocumentCache {
    const uri = document.uri;
    const version = document.version;

    const existing = this.documents.get(uri);
    if (existing && existing.version === version) {
      return existing;
    }

    const content = document.getText();
    const parseResult = this.parse(content);

    const cache: DocumentCache = {
      uri,
      version,
      content,
      tokens: lex(content),
      parseResult,
      diagnostics: toDiagnostics(content, parseResult.errors),
      lastAnalyzed: Date.now(),
    };

    this.documents.set(uri, cache);
    return cache;
  }

  /**
   * Get cached document data.
   */
  getDocument(uri: string): DocumentCache | undefined {
    return this.documents.get(uri);
  }

  /**
   * Remove a document from the cache.
   */
  removeDocument(uri: string): void {
    this.documents.delete(uri);
  }

  /**
   * Get all cached documents.
   */
  getAllDocuments(): DocumentCache[] {
    return Array.from(this.documents.values());
  }

  /**
   * Edits that turn the document into its canonical form: a single
   * whole-document replacement, or nothing when the document is already
   * canonical or does not parse.
   *
   * An hclfmt.json in the document's directory takes precedence over the
   * client's indentation settings.
   */
  formatDocument(uri: string, options?: FormattingOptions): TextEdit[] {
    const cache = this.documents.get(uri);
    const body = cache?.parseResult.body;
    if (!cache || !body) {
      return [];
    }

    const formatted = format(body, this.formatterOptionsFor(uri, options));
    if (formatted === cache.content) {
      return [];
    }

    return [TextEdit.replace(documentRange(cache.content), formatted)];
  }

  /** Drop cached hclfmt.json lookups, e.g. after the file changed. */
  clearConfigCache(): void {
    this.configs.clear();
  }

  private parse(content: string): ParseResult {
    const result = tryParseBody(content, this.parserOptions);
    if (result.ok) {
      return { body: result.value, errors: [] };
    }

    const { error } = result;
    const info: ParseErrorInfo = {
      message: error.summary,
      category: error.category,
      expected: error.expected,
      span: error.span,
    };
    return { errors: [info] };
  }

  private formatterOptionsFor(
    uri: string,
    options: FormattingOptions | undefined
  ): FormatterOptions {
    const config = this.configFor(uri);
    if (config?.configPath) {
      return config.formatter;
    }

    const indent = options
      ? { indent: options.insertSpaces ? " ".repeat(options.tabSize) : "\t" }
      : {};
    return { ...indent, ...this.formatterOptions };
  }

  private configFor(uri: string): ResolvedHclfmtConfig | undefined {
    if (!uri.startsWith("file://")) {
      return undefined;
    }

    const dir = path.dirname(fileURLToPath(uri));
    let config = this.configs.get(dir);
    if (!config) {
      config = loadConfig({ cwd: dir });
      this.configs.set(dir, config);
    }
    return config;
  }
}

function toDiagnostics(
  content: string,
  errors: readonly ParseErrorInfo[]
): Diagnostic[] {
  const lines = splitLines(content);

  return errors.map((error) => ({
    severity: DiagnosticSeverity.Error,
    range: toLspRange(lines, error.span),
    message: error.message,
    code: error.category,
    source: "hcl",
  }));
}
