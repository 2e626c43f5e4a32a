/**
 * HCL Language Server
 *
 * LSP 3.17 server over stdio: parse diagnostics, whole-document
 * formatting and semantic tokens.
 */
import {
  createConnection,
  TextDocuments,
  ProposedFeatures,
  TextDocumentSyncKind,
} from "vscode-languageserver/node";
import type {
  Diagnostic,
  DocumentFormattingParams,
  InitializeParams,
  InitializeResult,
  SemanticTokens,
  SemanticTokensParams,
  TextEdit,
} from "vscode-languageserver/node";
import { TextDocument } from "vscode-languageserver-textdocument";

import { DocumentManager } from "./document-manager";
import {
  SEMANTIC_TOKENS_LEGEND,
  provideSemanticTokens,
} from "./semantic-tokens";
import { DEFAULT_CONFIG, type ServerConfig } from "./types";

// Create server connection (stdio, IPC or socket, from the command line)
const connection = createConnection(ProposedFeatures.all);

// Text document manager (syncs document content)
const documents = new TextDocuments(TextDocument);

// Server configuration
let config: ServerConfig = { ...DEFAULT_CONFIG };

// Our document analysis cache
const documentManager = new DocumentManager();

let hasSemanticTokensCapability = false;

/**
 * Initialize handler - negotiate capabilities with client.
 */
connection.onInitialize((params: InitializeParams): InitializeResult => {
  hasSemanticTokensCapability =
    !!params.capabilities.textDocument?.semanticTokens;

  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,

      documentFormattingProvider: true,

      // Semantic tokens (full document)
      semanticTokensProvider: hasSemanticTokensCapability
        ? {
            legend: SEMANTIC_TOKENS_LEGEND,
            full: true,
            range: false,
          }
        : undefined,
    },
    serverInfo: {
      name: "hcl-language-server",
      version: "0.1.0",
    },
  };
});

connection.onInitialized(() => {
  connection.console.log("HCL Language Server initialized");
});

// ============================================================================
// Document Synchronization
// ============================================================================

documents.onDidOpen((event) => {
  const doc = event.document;
  connection.console.log(`Document opened: ${doc.uri}`);
  const cache = documentManager.updateDocument(doc);
  sendDiagnostics(doc.uri, cache.diagnostics);
});

documents.onDidChangeContent((event) => {
  const doc = event.document;
  const cache = documentManager.updateDocument(doc);
  sendDiagnostics(doc.uri, cache.diagnostics);
});

documents.onDidClose((event) => {
  const uri = event.document.uri;
  connection.console.log(`Document closed: ${uri}`);
  documentManager.removeDocument(uri);
  // Clear diagnostics for closed document
  void connection.sendDiagnostics({ uri, diagnostics: [] });
});

function sendDiagnostics(uri: string, diagnostics: Diagnostic[]): void {
  void connection.sendDiagnostics({
    uri,
    diagnostics: config.diagnostics
      ? diagnostics.slice(0, config.maxDiagnostics)
      : [],
  });
}

// ============================================================================
// Formatting
// ============================================================================

connection.onDocumentFormatting(
  (params: DocumentFormattingParams): TextEdit[] => {
    if (!config.formatting) {
      return [];
    }
    const document = documents.get(params.textDocument.uri);
    if (document) {
      documentManager.updateDocument(document);
    }
    return documentManager.formatDocument(
      params.textDocument.uri,
      params.options
    );
  }
);

// ============================================================================
// Semantic Tokens
// ============================================================================

connection.languages.semanticTokens.on(
  (params: SemanticTokensParams): SemanticTokens => {
    const cache = documentManager.getDocument(params.textDocument.uri);

    if (!cache || !config.semanticTokens) {
      return { data: [] };
    }

    return { data: provideSemanticTokens(cache) };
  }
);

// ============================================================================
// Configuration
// ============================================================================

connection.onDidChangeConfiguration((change) => {
  const settings: unknown = change.settings;
  documentManager.clearConfigCache();
  if (isRecord(settings) && isRecord(settings.hcl)) {
    config = { ...DEFAULT_CONFIG, ...pickConfig(settings.hcl) };
    for (const document of documents.all()) {
      const cache = documentManager.updateDocument(document);
      sendDiagnostics(document.uri, cache.diagnostics);
    }
  }
});

function pickConfig(settings: Record<string, unknown>): Partial<ServerConfig> {
  const picked: Partial<ServerConfig> = {};
  if (typeof settings.semanticTokens === "boolean") {
    picked.semanticTokens = settings.semanticTokens;
  }
  if (typeof settings.formatting === "boolean") {
    picked.formatting = settings.formatting;
  }
  if (typeof settings.diagnostics === "boolean") {
    picked.diagnostics = settings.diagnostics;
  }
  if (typeof settings.maxDiagnostics === "number") {
    picked.maxDiagnostics = settings.maxDiagnostics;
  }
  return picked;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Start Server
// ============================================================================

documents.listen(connection);
connection.listen();
