/**
 * Core types for the HCL Language Server.
 */
import type { Body, Span, Token } from "@hclkit/syntax";
import type { Diagnostic } from "vscode-languageserver";

/**
 * Cached analysis result for a single document.
 */
export interface DocumentCache {
  /** Document URI */
  uri: string;
  /** Document version for cache invalidation */
  version: number;
  /** Document content */
  content: string;
  /** Tokenization result (always available, may contain `Invalid` tokens) */
  tokens: Token[];
  /** Parse result */
  parseResult: ParseResult;
  /** Diagnostics published for this version */
  diagnostics: Diagnostic[];
  /** Timestamp of last analysis */
  lastAnalyzed: number;
}

/**
 * Result of parsing a document.
 */
export interface ParseResult {
  /** The parsed body, absent when the document does not parse */
  body?: Body;
  /** Parse errors; the parser stops at the first one */
  errors: ParseErrorInfo[];
}

/**
 * Structured parse error information.
 */
export interface ParseErrorInfo {
  /** `<category>; expected <alternatives>` */
  message: string;
  category: string;
  expected: readonly string[];
  span: Span;
}

/**
 * Configuration for the language server.
 */
export interface ServerConfig {
  /** Enable semantic tokens */
  semanticTokens: boolean;
  /** Enable document formatting */
  formatting: boolean;
  /** Enable diagnostics */
  diagnostics: boolean;
  /** Maximum number of diagnostics per file */
  maxDiagnostics: number;
}

/**
 * Default server configuration.
 */
export const DEFAULT_CONFIG: ServerConfig = {
  semanticTokens: true,
  formatting: true,
  diagnostics: true,
  maxDiagnostics: 100,
};
