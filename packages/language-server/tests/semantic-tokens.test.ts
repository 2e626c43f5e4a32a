/**
 * Tests for semantic token generation.
 */
import { describe, test, expect } from "vitest";
import { TextDocument } from "vscode-languageserver-textdocument";
import { DocumentManager } from "../src/document-manager";
import {
  SEMANTIC_TOKENS_LEGEND,
  TokenModifierFlags,
  TokenTypeIndex,
  classifyTokens,
  encodeTokens,
  provideSemanticTokens,
} from "../src/semantic-tokens";

const {
  BlockType,
  Label,
  Property,
  Variable,
  Function: Func,
  Namespace,
  Keyword,
  String: Text,
  Number: Num,
  Operator,
} = TokenTypeIndex;
const { Declaration, Readonly } = TokenModifierFlags;

function cacheFor(content: string) {
  return new DocumentManager().updateDocument(
    TextDocument.create("untitled:test.hcl", "hcl", 1, content)
  );
}

/** [line, char, length, type, modifiers] per token */
function classify(content: string): number[][] {
  return classifyTokens(cacheFor(content)).map((token) => [
    token.line,
    token.char,
    token.length,
    token.type,
    token.modifiers,
  ]);
}

describe("Semantic Tokens", () => {
  test("legend lists every token type and modifier", () => {
    expect(SEMANTIC_TOKENS_LEGEND.tokenTypes).toHaveLength(10);
    expect(SEMANTIC_TOKENS_LEGEND.tokenModifiers).toEqual([
      "declaration",
      "readonly",
    ]);
  });

  test("classifies blocks, labels and attributes", () => {
    expect(classify('resource "web" {\n  ami = var.id\n}\n')).toEqual([
      [0, 0, 8, BlockType, 0],
      [0, 9, 1, Label, 0],
      [0, 10, 3, Label, 0],
      [0, 13, 1, Label, 0],
      [1, 2, 3, Property, Declaration],
      [1, 8, 3, Variable, 0],
      [1, 12, 2, Property, 0],
    ]);
  });

  test("classifies for expressions and calls", () => {
    expect(classify("x = [for k, v in m : upper(v) if v != null]")).toEqual([
      [0, 0, 1, Property, Declaration],
      [0, 5, 3, Keyword, 0],
      [0, 9, 1, Variable, Declaration],
      [0, 12, 1, Variable, Declaration],
      [0, 14, 2, Keyword, 0],
      [0, 17, 1, Variable, 0],
      [0, 21, 5, Func, 0],
      [0, 27, 1, Variable, 0],
      [0, 30, 2, Keyword, 0],
      [0, 33, 1, Variable, 0],
      [0, 35, 2, Operator, 0],
      [0, 38, 4, Keyword, Readonly],
    ]);
  });

  test("classifies template directives", () => {
    expect(classify('a = "%{ if b }c%{ endif }"')).toEqual([
      [0, 0, 1, Property, Declaration],
      [0, 4, 1, Text, 0],
      [0, 8, 2, Keyword, 0],
      [0, 11, 1, Variable, 0],
      [0, 14, 1, Text, 0],
      [0, 18, 5, Keyword, 0],
      [0, 25, 1, Text, 0],
    ]);
  });

  test("splits heredocs into one token per line", () => {
    expect(classify("h = <<EOT\nhi\nEOT\n")).toEqual([
      [0, 0, 1, Property, Declaration],
      [0, 4, 5, Text, 0],
      [1, 0, 2, Text, 0],
      [2, 0, 3, Text, 0],
    ]);
  });

  test("classifies namespaced function names", () => {
    expect(classify("v = provider::aws::arn(x)")).toEqual([
      [0, 0, 1, Property, Declaration],
      [0, 4, 8, Namespace, 0],
      [0, 14, 3, Namespace, 0],
      [0, 19, 3, Func, 0],
      [0, 23, 1, Variable, 0],
    ]);
  });

  test("classifies object keys", () => {
    expect(classify("o = { a: 1, b = 2 }")).toEqual([
      [0, 0, 1, Property, Declaration],
      [0, 6, 1, Property, 0],
      [0, 9, 1, Num, 0],
      [0, 12, 1, Property, 0],
      [0, 16, 1, Num, 0],
    ]);
  });

  test("measures lengths in UTF-16 code units", () => {
    expect(classify('a = "😀" + b')).toEqual([
      [0, 0, 1, Property, Declaration],
      [0, 4, 1, Text, 0],
      [0, 5, 2, Text, 0],
      [0, 7, 1, Text, 0],
      [0, 9, 1, Operator, 0],
      [0, 11, 1, Variable, 0],
    ]);
  });

  test("still highlights documents that do not parse", () => {
    const cache = cacheFor("a = [1,");

    expect(cache.parseResult.body).toBeUndefined();
    expect(classify("a = [1,")).toEqual([
      [0, 0, 1, Property, Declaration],
      [0, 5, 1, Num, 0],
    ]);
  });

  test("delta-encodes tokens in document order", () => {
    expect(provideSemanticTokens(cacheFor('resource "web" {\n  ami = var.id\n}\n'))).toEqual([
      0, 0, 8, BlockType, 0,
      0, 9, 1, Label, 0,
      0, 1, 3, Label, 0,
      0, 3, 1, Label, 0,
      1, 2, 3, Property, Declaration,
      0, 6, 3, Variable, 0,
      0, 4, 2, Property, 0,
    ]);
  });

  test("encodes tokens relative to the previous one", () => {
    expect(
      encodeTokens([
        { line: 2, char: 4, length: 3, type: Variable, modifiers: 0 },
        { line: 2, char: 10, length: 1, type: Operator, modifiers: 0 },
        { line: 5, char: 1, length: 2, type: Keyword, modifiers: Readonly },
      ])
    ).toEqual([2, 4, 3, Variable, 0, 0, 6, 1, Operator, 0, 3, 1, 2, Keyword, Readonly]);
  });
});
