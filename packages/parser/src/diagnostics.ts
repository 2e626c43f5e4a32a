/**
 * Parse failures and their rendering.
 *
 * A failure records where the parser stopped, which production gave up
 * (its category) and what would have been accepted at that point. The
 * rendered form is a fixed, compiler-style excerpt:
 *
 *  --> HCL parse error in line 1, column 8
 *   |
 * 1 | ident {
 *   |        ^---
 *   |
 *   = invalid block body; expected `}`, newline or identifier
 */

import type { Position, Span } from "@hclkit/syntax";

/**
 * Something the parser would have accepted: a literal terminal (rendered
 * in backticks) or an abstract category such as "identifier".
 */
export type Expectation =
  | { readonly kind: "literal"; readonly text: string }
  | { readonly kind: "category"; readonly text: string };

export type Failure = {
  readonly category: string;
  readonly span: Span;
  readonly expected: readonly Expectation[];
};

export function literal(text: string): Expectation {
  return { kind: "literal", text };
}

export function category(text: string): Expectation {
  return { kind: "category", text };
}

/** Production names attached to failures. */
export const Category = {
  Structure: "invalid structure",
  Block: "invalid block",
  BlockLabel: "invalid block label",
  BlockBody: "invalid block body",
  Attribute: "invalid attribute",
  Expression: "invalid expression",
  Parenthesis: "invalid parenthesized expression",
  Conditional: "invalid conditional",
  TraversalOperator: "invalid traversal operator",
  Index: "invalid index",
  ArrayItem: "invalid array item",
  ObjectItem: "invalid object item",
  FunctionCall: "invalid function call",
  ForExpression: "invalid for expression",
  String: "invalid string",
  EscapeSequence: "invalid escape sequence",
  Interpolation: "invalid interpolation",
  Directive: "invalid template directive",
  Heredoc: "invalid heredoc",
  NestingLimit: "nesting limit exceeded",
} as const;

/** Shared expectations, so every production spells them the same way. */
export const Expect = {
  newline: category("newline"),
  identifier: category("identifier"),
  endOfInput: category("end of input"),
  unsignedInteger: category("unsigned integer"),
  letter: category("letter"),
  digit: category("digit"),
  hexDigit: category("hexadecimal digit"),
  underscore: literal("_"),
  lbrace: literal("{"),
  rbrace: literal("}"),
  lbracket: literal("["),
  rbracket: literal("]"),
  lparen: literal("("),
  rparen: literal(")"),
  comma: literal(","),
  equals: literal("="),
  colon: literal(":"),
  quote: literal('"'),
  star: literal("*"),
  minus: literal("-"),
  bang: literal("!"),
  heredoc: literal("<"),
  ellipsis: literal("..."),
  fatArrow: literal("=>"),
  interpolationStart: literal("${"),
  directiveStart: literal("%{"),
} as const;

/**
 * Combines two failures. The one further into the input wins; failures
 * at the same offset pool their expectations in first-seen order under
 * the later failure's category.
 */
export function mergeFailures(
  earlier: Failure | undefined,
  later: Failure
): Failure {
  if (!earlier) return later;
  const a = earlier.span.start.offset;
  const b = later.span.start.offset;
  if (a > b) return earlier;
  if (b > a) return later;
  return {
    category: later.category,
    span: later.span,
    expected: dedupe([...earlier.expected, ...later.expected]),
  };
}

function dedupe(items: readonly Expectation[]): Expectation[] {
  const seen = new Set<string>();
  const result: Expectation[] = [];
  for (const item of items) {
    const key = `${item.kind}:${item.text}`;
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(item);
  }
  return result;
}

/** Literals first, then categories, each group in first-seen order. */
export function orderExpectations(
  items: readonly Expectation[]
): Expectation[] {
  const unique = dedupe(items);
  return [
    ...unique.filter((item) => item.kind === "literal"),
    ...unique.filter((item) => item.kind === "category"),
  ];
}

export function describeExpectation(item: Expectation): string {
  return item.kind === "literal" ? `\`${item.text}\`` : item.text;
}

/** Joins items as natural language: `a`, `a or b`, `a, b or c`. */
export function joinAlternatives(items: readonly string[]): string {
  if (items.length <= 1) return items[0] ?? "";
  const head = items.slice(0, -1).join(", ");
  return `${head} or ${items[items.length - 1]}`;
}

export function failureMessage(failure: Failure): string {
  const expected = orderExpectations(failure.expected).map(
    describeExpectation
  );
  if (expected.length === 0) {
    return failure.category;
  }
  return `${failure.category}; expected ${joinAlternatives(expected)}`;
}

/** The physical line (without its line break) that holds `position`. */
export function sourceLine(source: string, position: Position): string {
  const lines = source.split("\n");
  const line = lines[position.line - 1] ?? "";
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

export function renderDiagnostic(failure: Failure, source: string): string {
  const { line, column } = failure.span.start;
  const lineNo = String(line);
  const gutter = " ".repeat(lineNo.length);

  return [
    `${gutter}--> HCL parse error in line ${line}, column ${column}`,
    `${gutter} |`,
    `${lineNo} | ${sourceLine(source, failure.span.start)}`,
    `${gutter} | ${" ".repeat(Math.max(0, column - 1))}^---`,
    `${gutter} |`,
    `${gutter} = ${failureMessage(failure)}`,
  ].join("\n");
}

/**
 * Error thrown when the input does not match the grammar. The message is
 * the rendered diagnostic; the structured fields let tooling build its
 * own presentation.
 */
export class ParseError extends Error {
  readonly category: string;
  readonly span: Span;
  readonly expectations: readonly Expectation[];
  /** Rendered expectations, in display order. */
  readonly expected: readonly string[];
  readonly lineText: string;

  constructor(failure: Failure, source: string) {
    super(renderDiagnostic(failure, source));
    this.name = "ParseError";
    this.category = failure.category;
    this.span = failure.span;
    this.expectations = orderExpectations(failure.expected);
    this.expected = this.expectations.map(describeExpectation);
    this.lineText = sourceLine(source, failure.span.start);
  }

  get line(): number {
    return this.span.start.line;
  }

  get column(): number {
    return this.span.start.column;
  }

  /** UTF-8 byte offset of the failure. */
  get offset(): number {
    return this.span.start.offset;
  }

  /** `<category>; expected <alternatives>` without the source excerpt. */
  get summary(): string {
    return failureMessage({
      category: this.category,
      span: this.span,
      expected: this.expectations,
    });
  }
}
