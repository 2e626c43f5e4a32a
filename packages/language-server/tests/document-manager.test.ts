/**
 * Tests for the Document Manager and analysis pipeline.
 */
import { describe, test, expect, beforeEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { tmpdir } from "node:os";
import { pathToFileURL } from "node:url";
import { TextDocument } from "vscode-languageserver-textdocument";
import { DiagnosticSeverity } from "vscode-languageserver";
import { DocumentManager } from "../src/document-manager";
import { documentRange, toLspPosition } from "../src/positions";

const URI = "untitled:test.hcl";

function open(
  manager: DocumentManager,
  content: string,
  version = 1,
  uri = URI
) {
  return manager.updateDocument(TextDocument.create(uri, "hcl", version, content));
}

describe("DocumentManager", () => {
  let manager: DocumentManager;

  beforeEach(() => {
    manager = new DocumentManager();
  });

  describe("updateDocument", () => {
    test("caches content, tokens and the parsed body", () => {
      const cache = open(manager, "x = 42");

      expect(cache.uri).toBe(URI);
      expect(cache.version).toBe(1);
      expect(cache.content).toBe("x = 42");
      expect(cache.tokens.map((token) => token.lexeme)).toEqual([
        "x",
        "=",
        "42",
        "",
      ]);
      expect(cache.parseResult.body?.structures).toHaveLength(1);
      expect(cache.parseResult.errors).toEqual([]);
      expect(cache.diagnostics).toEqual([]);
    });

    test("reuses the analysis of an unchanged version", () => {
      const first = open(manager, "x = 1");

      expect(open(manager, "x = 1")).toBe(first);
      expect(open(manager, "x = 2", 2).content).toBe("x = 2");
    });

    test("reports a parse error as a diagnostic", () => {
      const cache = open(manager, "foo = 1\nbar [");

      expect(cache.parseResult.body).toBeUndefined();
      expect(cache.parseResult.errors[0]?.category).toBe("invalid structure");
      expect(cache.diagnostics).toHaveLength(1);
      expect(cache.diagnostics[0]).toMatchObject({
        severity: DiagnosticSeverity.Error,
        message: 'invalid structure; expected `{`, `=`, `"` or identifier',
        code: "invalid structure",
        source: "hcl",
      });
      expect(cache.diagnostics[0]?.range.start).toEqual({ line: 1, character: 4 });
    });

    test("counts diagnostic columns in UTF-16 code units", () => {
      const cache = open(manager, 'a = "😀" b');

      expect(cache.diagnostics[0]?.message).toBe(
        "invalid attribute; expected newline"
      );
      expect(cache.diagnostics[0]?.range.start).toEqual({ line: 0, character: 9 });
    });

    test("passes parser options through", () => {
      const limited = new DocumentManager({ parser: { maxDepth: 2 } });

      const cache = open(limited, "a = [[[[1]]]]");

      expect(cache.diagnostics[0]?.code).toBe("nesting limit exceeded");
    });
  });

  describe("document tracking", () => {
    test("removes documents", () => {
      open(manager, "a = 1");
      open(manager, "b = 1", 1, "untitled:other.hcl");

      expect(manager.getAllDocuments().map((cache) => cache.uri)).toEqual([
        URI,
        "untitled:other.hcl",
      ]);

      manager.removeDocument(URI);

      expect(manager.getDocument(URI)).toBeUndefined();
      expect(manager.getAllDocuments()).toHaveLength(1);
    });
  });

  describe("formatDocument", () => {
    test("replaces the whole document with its canonical form", () => {
      open(manager, "a=1\n");

      expect(manager.formatDocument(URI)).toEqual([
        {
          range: {
            start: { line: 0, character: 0 },
            end: { line: 1, character: 0 },
          },
          newText: "a = 1\n",
        },
      ]);
    });

    test("returns no edits for canonical, broken or unknown documents", () => {
      open(manager, "a = 1\n");
      open(manager, "a = [", 1, "untitled:broken.hcl");

      expect(manager.formatDocument(URI)).toEqual([]);
      expect(manager.formatDocument("untitled:broken.hcl")).toEqual([]);
      expect(manager.formatDocument("untitled:missing.hcl")).toEqual([]);
    });

    test("follows the client's indentation settings", () => {
      open(manager, "b {\nc=1\n}\n");

      const spaces = manager.formatDocument(URI, { tabSize: 4, insertSpaces: true });
      const tabs = manager.formatDocument(URI, { tabSize: 4, insertSpaces: false });

      expect(spaces[0]?.newText).toBe("b {\n    c = 1\n}\n");
      expect(tabs[0]?.newText).toBe("b {\n\tc = 1\n}\n");
    });

    test("prefers configured formatter options over the client's", () => {
      const configured = new DocumentManager({ formatter: { indent: " " } });
      open(configured, "b {\nc=1\n}\n");

      const edits = configured.formatDocument(URI, { tabSize: 4, insertSpaces: true });

      expect(edits[0]?.newText).toBe("b {\n c = 1\n}\n");
    });

    test("applies hclfmt.json beside a file", () => {
      const dir = fs.mkdtempSync(path.join(tmpdir(), "hclkit-lsp-"));
      fs.writeFileSync(path.join(dir, "hclfmt.json"), JSON.stringify({ indent: 3 }));
      const uri = pathToFileURL(path.join(dir, "main.hcl")).href;
      open(manager, "b {\nc=1\n}\n", 1, uri);

      const edits = manager.formatDocument(uri, { tabSize: 2, insertSpaces: true });

      expect(edits[0]?.newText).toBe("b {\n   c = 1\n}\n");
    });
  });
});

describe("positions", () => {
  test("converts code point columns to UTF-16 characters", () => {
    const lines = ["é😀x"];

    expect(toLspPosition(lines, { offset: 0, line: 1, column: 3 })).toEqual({
      line: 0,
      character: 3,
    });
  });

  test("covers the whole document", () => {
    expect(documentRange("a\n😀")).toEqual({
      start: { line: 0, character: 0 },
      end: { line: 1, character: 2 },
    });
  });
});
