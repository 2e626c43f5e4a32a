import { describe, expect, test } from "vitest";
import { lex, tokenize } from "../src/index.ts";
import { TokenKind } from "@hclkit/syntax";

const kinds = (source: string) =>
  lex(source).map((token) => [token.kind, token.lexeme]);

describe("lex", () => {
  test("lexes a block with an attribute", () => {
    const source = `resource "aws_instance" web {
  ami = 42
}
`;

    expect(kinds(source)).toEqual([
      [TokenKind.Identifier, "resource"],
      [TokenKind.OQuote, '"'],
      [TokenKind.TemplateLiteral, "aws_instance"],
      [TokenKind.CQuote, '"'],
      [TokenKind.Identifier, "web"],
      [TokenKind.LBrace, "{"],
      [TokenKind.Newline, "\n"],
      [TokenKind.Identifier, "ami"],
      [TokenKind.Equals, "="],
      [TokenKind.Number, "42"],
      [TokenKind.Newline, "\n"],
      [TokenKind.RBrace, "}"],
      [TokenKind.Newline, "\n"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("skips line and block comments", () => {
    const source = `# hash comment
a = 1 // slash comment
/* block
   comment */ b = 2`;

    expect(kinds(source)).toEqual([
      [TokenKind.Newline, "\n"],
      [TokenKind.Identifier, "a"],
      [TokenKind.Equals, "="],
      [TokenKind.Number, "1"],
      [TokenKind.Newline, "\n"],
      [TokenKind.Identifier, "b"],
      [TokenKind.Equals, "="],
      [TokenKind.Number, "2"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("turns an unterminated block comment into an invalid token", () => {
    expect(kinds("a /* open")).toEqual([
      [TokenKind.Identifier, "a"],
      [TokenKind.Invalid, "/* open"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("lexes operators, longest match first", () => {
    expect(kinds("== != <= >= && || => ... :: ! < > ? : . * / % + -")).toEqual([
      [TokenKind.EqualEqual, "=="],
      [TokenKind.NotEqual, "!="],
      [TokenKind.LessEqual, "<="],
      [TokenKind.GreaterEqual, ">="],
      [TokenKind.And, "&&"],
      [TokenKind.Or, "||"],
      [TokenKind.FatArrow, "=>"],
      [TokenKind.Ellipsis, "..."],
      [TokenKind.DoubleColon, "::"],
      [TokenKind.Bang, "!"],
      [TokenKind.Less, "<"],
      [TokenKind.Greater, ">"],
      [TokenKind.Question, "?"],
      [TokenKind.Colon, ":"],
      [TokenKind.Dot, "."],
      [TokenKind.Star, "*"],
      [TokenKind.Slash, "/"],
      [TokenKind.Percent, "%"],
      [TokenKind.Plus, "+"],
      [TokenKind.Minus, "-"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("reads fractions and exponents", () => {
    expect(kinds("1.5e+3 2E9 7.")).toEqual([
      [TokenKind.Number, "1.5e+3"],
      [TokenKind.Number, "2E9"],
      [TokenKind.Number, "7"],
      [TokenKind.Dot, "."],
      [TokenKind.Eof, ""],
    ]);
  });

  test("keeps legacy index digits apart after a dot", () => {
    expect(kinds("a.0.1")).toEqual([
      [TokenKind.Identifier, "a"],
      [TokenKind.Dot, "."],
      [TokenKind.Number, "0"],
      [TokenKind.Dot, "."],
      [TokenKind.Number, "1"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("allows dashes inside identifiers", () => {
    expect(kinds("foo-bar - baz")).toEqual([
      [TokenKind.Identifier, "foo-bar"],
      [TokenKind.Minus, "-"],
      [TokenKind.Identifier, "baz"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("lexes interpolations and directives inside quoted templates", () => {
    expect(kinds('"a${b}c%{~ if x ~}d%{ endif }"')).toEqual([
      [TokenKind.OQuote, '"'],
      [TokenKind.TemplateLiteral, "a"],
      [TokenKind.TemplateInterp, "${"],
      [TokenKind.Identifier, "b"],
      [TokenKind.TemplateSeqEnd, "}"],
      [TokenKind.TemplateLiteral, "c"],
      [TokenKind.TemplateControl, "%{~"],
      [TokenKind.Identifier, "if"],
      [TokenKind.Identifier, "x"],
      [TokenKind.TemplateSeqEnd, "~}"],
      [TokenKind.TemplateLiteral, "d"],
      [TokenKind.TemplateControl, "%{"],
      [TokenKind.Identifier, "endif"],
      [TokenKind.TemplateSeqEnd, "}"],
      [TokenKind.CQuote, '"'],
      [TokenKind.Eof, ""],
    ]);
  });

  test("balances object braces inside an interpolation", () => {
    expect(kinds('"${ {a = 1}.a }"')).toEqual([
      [TokenKind.OQuote, '"'],
      [TokenKind.TemplateInterp, "${"],
      [TokenKind.LBrace, "{"],
      [TokenKind.Identifier, "a"],
      [TokenKind.Equals, "="],
      [TokenKind.Number, "1"],
      [TokenKind.RBrace, "}"],
      [TokenKind.Dot, "."],
      [TokenKind.Identifier, "a"],
      [TokenKind.TemplateSeqEnd, "}"],
      [TokenKind.CQuote, '"'],
      [TokenKind.Eof, ""],
    ]);
  });

  test("keeps escapes inside the literal text", () => {
    expect(kinds('"a\\"b$${c}"')).toEqual([
      [TokenKind.OQuote, '"'],
      [TokenKind.TemplateLiteral, 'a\\"b$${c}'],
      [TokenKind.CQuote, '"'],
      [TokenKind.Eof, ""],
    ]);
  });

  test("stops an unterminated quoted template at the line end", () => {
    expect(kinds('"abc\nx')).toEqual([
      [TokenKind.OQuote, '"'],
      [TokenKind.TemplateLiteral, "abc"],
      [TokenKind.Newline, "\n"],
      [TokenKind.Identifier, "x"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("lexes heredocs line by line", () => {
    const source = `<<-EOT
  hello \${name}
  EOT
`;

    expect(kinds(source)).toEqual([
      [TokenKind.OHeredoc, "<<-EOT\n"],
      [TokenKind.TemplateLiteral, "  hello "],
      [TokenKind.TemplateInterp, "${"],
      [TokenKind.Identifier, "name"],
      [TokenKind.TemplateSeqEnd, "}"],
      [TokenKind.TemplateLiteral, "\n"],
      [TokenKind.CHeredoc, "  EOT"],
      [TokenKind.Newline, "\n"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("treats << without a delimiter line as operators", () => {
    expect(kinds("a << b")).toEqual([
      [TokenKind.Identifier, "a"],
      [TokenKind.Less, "<"],
      [TokenKind.Less, "<"],
      [TokenKind.Identifier, "b"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("reports unknown characters as invalid tokens and continues", () => {
    expect(kinds("a @ b")).toEqual([
      [TokenKind.Identifier, "a"],
      [TokenKind.Invalid, "@"],
      [TokenKind.Identifier, "b"],
      [TokenKind.Eof, ""],
    ]);
  });

  test("tracks byte offsets and code point columns", () => {
    const tokens = lex('a = "é😀" b');
    const last = tokens.find((token) => token.lexeme === "b");

    expect(last?.span.start).toEqual({ offset: 13, line: 1, column: 10 });
  });

  test("treats CRLF as a single newline", () => {
    const tokens = lex("a\r\nb");

    expect(tokens.map((token) => token.kind)).toEqual([
      TokenKind.Identifier,
      TokenKind.Newline,
      TokenKind.Identifier,
      TokenKind.Eof,
    ]);
    expect(tokens[2]?.span.start).toEqual({ offset: 3, line: 2, column: 1 });
  });
});

describe("tokenize", () => {
  test("yields tokens lazily", () => {
    const seen: TokenKind[] = [];
    for (const token of tokenize("a = 1 +")) {
      seen.push(token.kind);
      if (seen.length === 2) break;
    }

    expect(seen).toEqual([TokenKind.Identifier, TokenKind.Equals]);
  });

  test("ends with exactly one Eof token", () => {
    const tokens = Array.from(tokenize(""));

    expect(tokens).toEqual([
      {
        kind: TokenKind.Eof,
        lexeme: "",
        span: {
          start: { offset: 0, line: 1, column: 1 },
          end: { offset: 0, line: 1, column: 1 },
        },
      },
    ]);
  });
});
