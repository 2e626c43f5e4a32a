/**
 * HCL Parser - Builds the document model from source text
 *
 * A recursive descent parser over the lazy token stream of
 * `@hclkit/lexer`. Key features:
 * - Newline-sensitive bodies and object constructors; newlines are ignored
 *   inside parentheses, brackets, interpolations and directives
 * - Operator precedence climbing for binary expressions
 * - Furthest-failure diagnostics: every production records the
 *   alternatives it peeked, so errors name what would have been accepted
 * - Bounded nesting, so hostile input cannot exhaust the call stack
 */

import { tokenize } from "@hclkit/lexer";
import {
  Identifier,
  MIN_BINARY_PRECEDENCE,
  TokenKind,
  advancePosition,
  binaryOperatorFor,
  precedenceOf,
  type Block,
  type BlockLabel,
  type Body,
  type Expression,
  type ObjectItem,
  type ObjectKey,
  type Strip,
  type Structure,
  type Template,
  type TemplateElement,
  type Token,
  type TraversalOperator,
} from "@hclkit/syntax";
import {
  Category,
  Expect,
  ParseError,
  literal,
  mergeFailures,
  type Expectation,
  type Failure,
} from "./diagnostics";
import { unescapeHeredoc, unescapeQuoted } from "./strings";

export * from "./diagnostics";
export { unescapeHeredoc, unescapeQuoted } from "./strings";
export type { EscapeFailure, UnescapeResult } from "./strings";

export const DEFAULT_MAX_DEPTH = 128;

export type ParseOptions = {
  /** Maximum nesting of expressions, blocks and template directives. */
  maxDepth?: number;
};

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ParseError };

/**
 * Parse a whole document.
 *
 * Grammar: Body = {Newline | Attribute | Block}
 */
export function parseBody(source: string, options: ParseOptions = {}): Body {
  return new Parser(source, options).parseDocument();
}

/**
 * Parse a single expression. Surrounding newlines are allowed; anything
 * else after the expression is an error.
 */
export function parseExpression(
  source: string,
  options: ParseOptions = {}
): Expression {
  return new Parser(source, options).parseStandaloneExpression();
}

export function tryParseBody(
  source: string,
  options: ParseOptions = {}
): ParseResult<Body> {
  return attempt(() => parseBody(source, options));
}

export function tryParseExpression(
  source: string,
  options: ParseOptions = {}
): ParseResult<Expression> {
  return attempt(() => parseExpression(source, options));
}

function attempt<T>(fn: () => T): ParseResult<T> {
  try {
    return { ok: true, value: fn() };
  } catch (error) {
    if (error instanceof ParseError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Buffers tokens pulled from the lexer so the parser can look ahead
 * without materializing the whole token list.
 */
class TokenStream {
  private readonly buffer: Token[] = [];
  private readonly tokens: Iterator<Token, void, undefined>;
  private exhausted = false;

  constructor(source: string) {
    this.tokens = tokenize(source);
  }

  /** The token at `index`; past the end this is the final `Eof`. */
  at(index: number): Token {
    while (!this.exhausted && this.buffer.length <= index) {
      const next = this.tokens.next();
      if (next.done) {
        this.exhausted = true;
      } else {
        this.buffer.push(next.value);
      }
    }
    const token = this.buffer[index] ?? this.buffer[this.buffer.length - 1];
    if (!token) {
      throw new Error("Token stream is empty");
    }
    return token;
  }
}

/**
 * Records every alternative a production checks at the current token, so
 * a failure can say what would have been accepted there.
 */
class Lookahead {
  private readonly expected: Expectation[] = [];

  constructor(readonly token: Token) {}

  peek(kind: TokenKind, ...expectations: Expectation[]): boolean {
    this.expected.push(...expectations);
    return this.token.kind === kind;
  }

  peekKeyword(name: string): boolean {
    this.expected.push(literal(name));
    return this.token.kind === TokenKind.Identifier && this.token.lexeme === name;
  }

  failure(category: string): Failure {
    return { category, span: this.token.span, expected: [...this.expected] };
  }
}

type TemplateContext = "quoted" | "heredoc";

class Parser {
  private readonly tokens: TokenStream;

  /** Current position in the token stream */
  private index = 0;

  /** Whether newline tokens are significant in the innermost context */
  private readonly newlineStack: boolean[] = [true];

  private depth = 0;
  private readonly maxDepth: number;

  /** Alternatives peeked before descending into a fallback production */
  private recorded: Failure | undefined;

  constructor(
    private readonly source: string,
    options: ParseOptions
  ) {
    this.tokens = new TokenStream(source);
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  parseDocument(): Body {
    const structures: Structure[] = [];

    while (true) {
      const lookahead = this.lookahead();
      if (lookahead.peek(TokenKind.Newline, Expect.newline)) {
        this.advance();
        continue;
      }
      if (lookahead.peek(TokenKind.Identifier, Expect.identifier)) {
        structures.push(this.parseStructure());
        continue;
      }
      if (lookahead.token.kind === TokenKind.Eof) {
        return { structures };
      }
      throw this.raise(lookahead.failure(Category.Structure));
    }
  }

  parseStandaloneExpression(): Expression {
    return this.withNewlines(false, () => {
      const expression = this.parseExpression();
      const end = this.lookahead();
      if (!end.peek(TokenKind.Eof, Expect.endOfInput)) {
        throw this.raise(end.failure(Category.Expression));
      }
      return expression;
    });
  }

  // ===== Structures =====

  /**
   * Parse an attribute or a block, dispatching on the token after the
   * leading identifier.
   *
   * Grammar: Structure = Identifier, ("=", Expression | {Label}, "{", BlockBody)
   */
  private parseStructure(): Structure {
    const identifier = this.advance();
    const lookahead = this.lookahead();

    if (lookahead.peek(TokenKind.LBrace, Expect.lbrace)) {
      return this.parseBlock(identifier);
    }
    if (lookahead.peek(TokenKind.Equals, Expect.equals)) {
      this.advance();
      const value = this.parseExpression();
      this.expectLineEnd(Category.Attribute);
      return { kind: "Attribute", key: this.identifier(identifier), value };
    }
    if (
      lookahead.peek(TokenKind.OQuote, Expect.quote) ||
      lookahead.peek(TokenKind.Identifier, Expect.identifier)
    ) {
      return this.parseBlock(identifier);
    }

    throw this.raise(lookahead.failure(Category.Structure));
  }

  private parseBlock(identifier: Token): Block {
    const labels: BlockLabel[] = [];

    while (true) {
      const lookahead = this.lookahead();
      if (lookahead.peek(TokenKind.LBrace, Expect.lbrace)) {
        this.advance();
        break;
      }
      if (lookahead.peek(TokenKind.OQuote, Expect.quote)) {
        labels.push(this.parseStringLabel());
        continue;
      }
      if (lookahead.peek(TokenKind.Identifier, Expect.identifier)) {
        labels.push({ kind: "Identifier", name: this.identifier(this.advance()) });
        continue;
      }
      throw this.raise(lookahead.failure(Category.Block));
    }

    const body = this.nested(() => this.parseBlockBody());
    this.expectLineEnd(Category.Block);

    return {
      kind: "Block",
      identifier: this.identifier(identifier),
      labels,
      body,
    };
  }

  private parseStringLabel(): BlockLabel {
    this.advance(); // opening quote

    let value = "";
    const content = this.current();
    if (content.kind === TokenKind.TemplateLiteral) {
      this.advance();
      value = this.unescapeQuoted(content);
    }

    const close = this.lookahead();
    if (!close.peek(TokenKind.CQuote, Expect.quote)) {
      throw this.raise(close.failure(Category.BlockLabel));
    }
    this.advance();
    return { kind: "String", value };
  }

  /**
   * Parse the body after a block's `{`: empty, multi-line, or a single
   * attribute on the same line.
   */
  private parseBlockBody(): Body {
    const lookahead = this.lookahead();

    if (lookahead.peek(TokenKind.RBrace, Expect.rbrace)) {
      this.advance();
      return { structures: [] };
    }
    if (lookahead.peek(TokenKind.Newline, Expect.newline)) {
      return this.parseMultilineBody();
    }
    if (lookahead.peek(TokenKind.Identifier, Expect.identifier)) {
      return this.parseSingleAttributeBody();
    }

    throw this.raise(lookahead.failure(Category.BlockBody));
  }

  private parseMultilineBody(): Body {
    const structures: Structure[] = [];

    while (true) {
      const lookahead = this.lookahead();
      if (lookahead.peek(TokenKind.RBrace, Expect.rbrace)) {
        this.advance();
        return { structures };
      }
      if (lookahead.peek(TokenKind.Newline, Expect.newline)) {
        this.advance();
        continue;
      }
      if (lookahead.peek(TokenKind.Identifier, Expect.identifier)) {
        structures.push(this.parseStructure());
        continue;
      }
      throw this.raise(lookahead.failure(Category.BlockBody));
    }
  }

  private parseSingleAttributeBody(): Body {
    const key = this.advance();

    const assign = this.lookahead();
    if (!assign.peek(TokenKind.Equals, Expect.equals)) {
      throw this.raise(assign.failure(Category.Attribute));
    }
    this.advance();
    const value = this.parseExpression();

    const close = this.lookahead();
    if (!close.peek(TokenKind.RBrace, Expect.rbrace)) {
      throw this.raise(close.failure(Category.BlockBody));
    }
    this.advance();

    return {
      structures: [{ kind: "Attribute", key: this.identifier(key), value }],
    };
  }

  /** A structure ends at a newline (consumed) or at the end of input. */
  private expectLineEnd(category: string): void {
    const lookahead = this.lookahead();
    if (lookahead.peek(TokenKind.Newline, Expect.newline)) {
      this.advance();
      return;
    }
    if (lookahead.token.kind === TokenKind.Eof) {
      return;
    }
    throw this.raise(lookahead.failure(category));
  }

  // ===== Expressions =====

  /**
   * Grammar: Expression = Binary, ["?", Expression, ":", Expression]
   */
  private parseExpression(): Expression {
    return this.nested(() => {
      const condition = this.parseBinary(MIN_BINARY_PRECEDENCE);
      if (this.current().kind !== TokenKind.Question) {
        return condition;
      }
      this.advance();

      const trueExpr = this.parseExpression();
      const colon = this.lookahead();
      if (!colon.peek(TokenKind.Colon, Expect.colon)) {
        throw this.raise(colon.failure(Category.Conditional));
      }
      this.advance();
      const falseExpr = this.parseExpression();

      return { kind: "Conditional", condition, trueExpr, falseExpr };
    });
  }

  /**
   * Precedence climbing; all binary operators are left associative.
   */
  private parseBinary(minPrecedence: number): Expression {
    let left = this.parseOperand();

    while (true) {
      const operator = binaryOperatorFor(this.current().kind);
      if (!operator) break;

      const precedence = precedenceOf(operator);
      if (precedence < minPrecedence) break;

      this.advance();
      const right = this.parseBinary(precedence + 1);
      left = { kind: "Binary", operator, left, right };
    }

    return left;
  }

  /**
   * Parse a unary operation or a primary expression with its traversal
   * operators.
   */
  private parseOperand(): Expression {
    const lookahead = this.lookahead();

    if (lookahead.peek(TokenKind.OQuote, Expect.quote)) {
      return this.parsePostfix(this.parseQuotedTemplate());
    }
    if (lookahead.peek(TokenKind.LBracket, Expect.lbracket)) {
      return this.parsePostfix(this.parseTuple());
    }
    if (lookahead.peek(TokenKind.LBrace, Expect.lbrace)) {
      return this.parsePostfix(this.parseObject());
    }
    const negation = lookahead.peek(TokenKind.Minus, Expect.minus);
    if (negation || lookahead.peek(TokenKind.Bang, Expect.bang)) {
      this.advance();
      const operand = this.nested(() => this.parseOperand());
      return { kind: "Unary", operator: negation ? "-" : "!", operand };
    }
    if (lookahead.peek(TokenKind.LParen, Expect.lparen)) {
      return this.parsePostfix(this.parseParenthesis());
    }
    if (
      lookahead.peek(
        TokenKind.Identifier,
        Expect.underscore,
        Expect.letter
      )
    ) {
      return this.parsePostfix(this.parseIdentifierExpression());
    }
    if (lookahead.peek(TokenKind.OHeredoc, Expect.heredoc)) {
      return this.parsePostfix(this.parseHeredoc());
    }
    if (lookahead.peek(TokenKind.Number, Expect.digit)) {
      return this.parsePostfix({ kind: "Number", value: this.advance().lexeme });
    }

    throw this.raise(lookahead.failure(Category.Expression));
  }

  /**
   * Grammar: Traversal = Primary, {"." (Identifier | Integer | "*") | "[" ("*" | Expression) "]"}
   */
  private parsePostfix(base: Expression): Expression {
    const operators: TraversalOperator[] = [];

    while (true) {
      const token = this.current();
      if (token.kind === TokenKind.Dot) {
        this.advance();
        operators.push(this.parseDotOperator());
        continue;
      }
      if (token.kind === TokenKind.LBracket) {
        this.advance();
        operators.push(this.parseIndexOperator());
        continue;
      }
      break;
    }

    return operators.length === 0
      ? base
      : { kind: "Traversal", base, operators };
  }

  private parseDotOperator(): TraversalOperator {
    const lookahead = this.lookahead();

    if (lookahead.peek(TokenKind.Star, Expect.star)) {
      this.advance();
      return { kind: "AttrSplat" };
    }
    if (lookahead.peek(TokenKind.Identifier, Expect.identifier)) {
      return { kind: "GetAttr", name: this.identifier(this.advance()) };
    }
    if (lookahead.peek(TokenKind.Number, Expect.unsignedInteger)) {
      const token = this.advance();
      const index = Number(token.lexeme);
      if (!Number.isSafeInteger(index)) {
        throw this.raise(lookahead.failure(Category.TraversalOperator));
      }
      return { kind: "LegacyIndex", index };
    }

    throw this.raise(lookahead.failure(Category.TraversalOperator));
  }

  private parseIndexOperator(): TraversalOperator {
    return this.withNewlines(false, () => {
      if (
        this.current().kind === TokenKind.Star &&
        this.peekAhead(1).kind === TokenKind.RBracket
      ) {
        this.advance();
        this.advance();
        return { kind: "FullSplat" };
      }

      const index = this.parseExpression();
      const close = this.lookahead();
      if (!close.peek(TokenKind.RBracket, Expect.rbracket)) {
        throw this.raise(close.failure(Category.Index));
      }
      this.advance();
      return { kind: "Index", index };
    });
  }

  private parseParenthesis(): Expression {
    this.advance(); // (
    return this.withNewlines(false, () => {
      const inner = this.parseExpression();
      const close = this.lookahead();
      if (!close.peek(TokenKind.RParen, Expect.rparen)) {
        throw this.raise(close.failure(Category.Parenthesis));
      }
      this.advance();
      return { kind: "Parenthesis", inner };
    });
  }

  /**
   * Variables, literal keywords and function calls.
   */
  private parseIdentifierExpression(): Expression {
    const token = this.current();
    const next = this.peekAhead(1);
    if (next.kind === TokenKind.LParen || next.kind === TokenKind.DoubleColon) {
      return this.parseFunctionCall();
    }

    this.advance();
    switch (token.lexeme) {
      case "true":
        return { kind: "Bool", value: true };
      case "false":
        return { kind: "Bool", value: false };
      case "null":
        return { kind: "Null" };
      default:
        return { kind: "Variable", name: this.identifier(token) };
    }
  }

  /**
   * Grammar: FuncCall = Identifier, {"::", Identifier}, "(", [Arguments], ")"
   */
  private parseFunctionCall(): Expression {
    const namespace: Identifier[] = [];
    let name = this.identifier(this.advance());

    while (this.current().kind === TokenKind.DoubleColon) {
      this.advance();
      const segment = this.lookahead();
      if (!segment.peek(TokenKind.Identifier, Expect.identifier)) {
        throw this.raise(segment.failure(Category.FunctionCall));
      }
      namespace.push(name);
      name = this.identifier(this.advance());
    }

    const open = this.lookahead();
    if (!open.peek(TokenKind.LParen, Expect.lparen)) {
      throw this.raise(open.failure(Category.FunctionCall));
    }
    this.advance();

    return this.withNewlines(false, () => {
      const args: Expression[] = [];
      let expandFinal = false;

      while (true) {
        const lookahead = this.lookahead();
        if (lookahead.peek(TokenKind.RParen, Expect.rparen)) {
          this.advance();
          break;
        }
        this.record(lookahead.failure(Category.FunctionCall));
        args.push(this.parseExpression());

        const separator = this.lookahead();
        if (separator.peek(TokenKind.RParen, Expect.rparen)) {
          this.advance();
          break;
        }
        if (separator.peek(TokenKind.Comma, Expect.comma)) {
          this.advance();
          continue;
        }
        if (separator.peek(TokenKind.Ellipsis, Expect.ellipsis)) {
          this.advance();
          expandFinal = true;
          const close = this.lookahead();
          if (!close.peek(TokenKind.RParen, Expect.rparen)) {
            throw this.raise(close.failure(Category.FunctionCall));
          }
          this.advance();
          break;
        }
        throw this.raise(separator.failure(Category.FunctionCall));
      }

      return {
        kind: "FuncCall",
        name: { namespace, name },
        args,
        expandFinal,
      };
    });
  }

  // ===== Collections =====

  private parseTuple(): Expression {
    this.advance(); // [
    return this.withNewlines(false, () => {
      if (this.startsForExpression()) {
        return this.parseForExpression("tuple");
      }

      const elements: Expression[] = [];
      while (true) {
        const lookahead = this.lookahead();
        if (lookahead.peek(TokenKind.RBracket, Expect.rbracket)) {
          this.advance();
          break;
        }
        this.record(lookahead.failure(Category.ArrayItem));
        elements.push(this.parseExpression());

        const separator = this.lookahead();
        if (separator.peek(TokenKind.RBracket, Expect.rbracket)) {
          this.advance();
          break;
        }
        if (separator.peek(TokenKind.Comma, Expect.comma)) {
          this.advance();
          continue;
        }
        throw this.raise(separator.failure(Category.ArrayItem));
      }

      return { kind: "Array", elements };
    });
  }

  /**
   * Grammar: Object = "{", [Item, {("," | Newline), Item}, [","]], "}"
   *          Item = (Identifier | Expression), ("=" | ":"), Expression
   */
  private parseObject(): Expression {
    this.advance(); // {
    if (this.withNewlines(false, () => this.startsForExpression())) {
      return this.withNewlines(false, () => this.parseForExpression("object"));
    }

    return this.withNewlines(true, () => {
      const items: ObjectItem[] = [];
      this.skipNewlines();

      while (true) {
        const lookahead = this.lookahead();
        if (lookahead.peek(TokenKind.RBrace, Expect.rbrace)) {
          this.advance();
          break;
        }
        this.record(lookahead.failure(Category.ObjectItem));

        const key = this.parseObjectKey();
        const assign = this.lookahead();
        if (
          !(
            assign.peek(TokenKind.Equals, Expect.equals) ||
            assign.peek(TokenKind.Colon, Expect.colon)
          )
        ) {
          throw this.raise(assign.failure(Category.ObjectItem));
        }
        this.advance();
        items.push({ key, value: this.parseExpression() });

        const separator = this.lookahead();
        if (separator.peek(TokenKind.RBrace, Expect.rbrace)) {
          this.advance();
          break;
        }
        if (separator.peek(TokenKind.Comma, Expect.comma)) {
          this.advance();
          this.skipNewlines();
          continue;
        }
        if (separator.peek(TokenKind.Newline, Expect.newline)) {
          this.skipNewlines();
          if (this.current().kind === TokenKind.Comma) {
            this.advance();
            this.skipNewlines();
          }
          continue;
        }
        throw this.raise(separator.failure(Category.ObjectItem));
      }

      return { kind: "Object", items };
    });
  }

  private parseObjectKey(): ObjectKey {
    const token = this.current();
    if (token.kind === TokenKind.Identifier) {
      const next = this.peekAhead(1);
      if (next.kind === TokenKind.Equals || next.kind === TokenKind.Colon) {
        this.advance();
        return { kind: "Identifier", name: this.identifier(token) };
      }
    }
    return { kind: "Expression", expression: this.parseExpression() };
  }

  private startsForExpression(): boolean {
    const token = this.current();
    return (
      token.kind === TokenKind.Identifier &&
      token.lexeme === "for" &&
      this.peekAhead(1).kind === TokenKind.Identifier
    );
  }

  /**
   * Grammar: For = "for", Identifier, [",", Identifier], "in", Expression, ":",
   *                [Expression, "=>"], Expression, ["..."], ["if", Expression]
   *
   * Called after the opening bracket, with newlines already ignored.
   */
  private parseForExpression(shape: "tuple" | "object"): Expression {
    this.advance(); // for

    const first = this.expectIdentifier(Category.ForExpression);
    let keyVar: Identifier | undefined;
    let valueVar = first;
    if (this.current().kind === TokenKind.Comma) {
      this.advance();
      keyVar = first;
      valueVar = this.expectIdentifier(Category.ForExpression);
    }

    this.expectKeyword("in", Category.ForExpression);
    const collection = this.parseExpression();

    const colon = this.lookahead();
    if (!colon.peek(TokenKind.Colon, Expect.colon)) {
      throw this.raise(colon.failure(Category.ForExpression));
    }
    this.advance();

    let keyExpr: Expression | undefined;
    if (shape === "object") {
      keyExpr = this.parseExpression();
      const arrow = this.lookahead();
      if (!arrow.peek(TokenKind.FatArrow, Expect.fatArrow)) {
        throw this.raise(arrow.failure(Category.ForExpression));
      }
      this.advance();
    }
    const valueExpr = this.parseExpression();

    let grouping = false;
    let condition: Expression | undefined;
    const closeKind = shape === "object" ? TokenKind.RBrace : TokenKind.RBracket;
    const closeExpect = shape === "object" ? Expect.rbrace : Expect.rbracket;

    while (true) {
      const lookahead = this.lookahead();
      if (
        shape === "object" &&
        !grouping &&
        condition === undefined &&
        lookahead.peek(TokenKind.Ellipsis, Expect.ellipsis)
      ) {
        this.advance();
        grouping = true;
        continue;
      }
      if (condition === undefined && lookahead.peekKeyword("if")) {
        this.advance();
        condition = this.parseExpression();
        continue;
      }
      if (lookahead.peek(closeKind, closeExpect)) {
        this.advance();
        break;
      }
      throw this.raise(lookahead.failure(Category.ForExpression));
    }

    return {
      kind: "For",
      keyVar,
      valueVar,
      collection,
      keyExpr,
      valueExpr,
      grouping,
      condition,
    };
  }

  // ===== Templates =====

  private parseQuotedTemplate(): Expression {
    this.advance(); // opening quote

    // An unterminated string is reported at the line break that ends it.
    const elements = this.withNewlines(true, () => {
      const parsed = this.parseTemplateElements("quoted");
      const close = this.lookahead();
      if (close.peek(TokenKind.CQuote, Expect.quote)) {
        this.advance();
        return parsed;
      }
      if (close.token.kind === TokenKind.TemplateControl) {
        throw this.unexpectedDirective();
      }
      throw this.raise(close.failure(Category.String));
    });

    const [only, ...rest] = elements;
    if (!only) {
      return { kind: "String", value: "" };
    }
    if (rest.length === 0 && only.kind === "Literal") {
      return { kind: "String", value: only.value };
    }
    return { kind: "Template", template: { elements } };
  }

  /**
   * Grammar: Heredoc = ("<<" | "<<-"), Identifier, Newline, Template, Identifier
   */
  private parseHeredoc(): Expression {
    const open = this.advance();
    const indented = open.lexeme.startsWith("<<-");
    const delimiter = open.lexeme.slice(indented ? 3 : 2).trimEnd();

    const elements = this.parseTemplateElements("heredoc");

    const close = this.lookahead();
    if (close.peek(TokenKind.CHeredoc, literal(delimiter))) {
      this.advance();
    } else if (close.token.kind === TokenKind.TemplateControl) {
      throw this.unexpectedDirective();
    } else {
      throw this.raise(close.failure(Category.Heredoc));
    }

    return {
      kind: "Heredoc",
      delimiter: new Identifier(delimiter),
      indented,
      template: { elements },
    };
  }

  /**
   * Parse template elements until a closing token or a directive keyword
   * that belongs to an enclosing directive (`else`, `endif`, `endfor`).
   */
  private parseTemplateElements(context: TemplateContext): TemplateElement[] {
    const elements: TemplateElement[] = [];

    while (true) {
      const token = this.current();

      if (token.kind === TokenKind.TemplateLiteral) {
        this.advance();
        const text =
          context === "quoted"
            ? this.unescapeQuoted(token)
            : unescapeHeredoc(token.lexeme);
        pushLiteral(elements, text);
        continue;
      }

      if (token.kind === TokenKind.TemplateInterp) {
        elements.push(this.parseInterpolation());
        continue;
      }

      if (token.kind === TokenKind.TemplateControl) {
        const keyword = this.withNewlines(false, () => this.peekAhead(1));
        if (isKeywordToken(keyword, "if")) {
          elements.push(this.nested(() => this.parseIfDirective(context)));
          continue;
        }
        if (isKeywordToken(keyword, "for")) {
          elements.push(this.nested(() => this.parseForDirective(context)));
          continue;
        }
      }

      return elements;
    }
  }

  private parseInterpolation(): TemplateElement {
    const open = this.advance();
    return this.withNewlines(false, () => {
      const expression = this.parseExpression();
      const close = this.lookahead();
      if (!close.peek(TokenKind.TemplateSeqEnd, Expect.rbrace)) {
        throw this.raise(close.failure(Category.Interpolation));
      }
      const end = this.advance();
      return {
        kind: "Interpolation",
        expression,
        strip: { start: open.lexeme.endsWith("~"), end: end.lexeme.startsWith("~") },
      };
    });
  }

  /**
   * Grammar: If = "%{" "if" Expression "}" Template
   *               ["%{" "else" "}" Template] "%{" "endif" "}"
   */
  private parseIfDirective(context: TemplateContext): TemplateElement {
    const open = this.openDirective(["if"]);
    const condition = this.withNewlines(false, () => this.parseExpression());
    const ifStrip = this.closeDirective(open.stripStart);
    const then: Template = { elements: this.parseTemplateElements(context) };

    const next = this.openDirective(["else", "endif"]);
    if (next.keyword === "endif") {
      return {
        kind: "IfDirective",
        condition,
        then,
        ifStrip,
        endifStrip: this.closeDirective(next.stripStart),
      };
    }

    const elseStrip = this.closeDirective(next.stripStart);
    const elseTemplate: Template = {
      elements: this.parseTemplateElements(context),
    };
    const end = this.openDirective(["endif"]);

    return {
      kind: "IfDirective",
      condition,
      then,
      else: elseTemplate,
      ifStrip,
      elseStrip,
      endifStrip: this.closeDirective(end.stripStart),
    };
  }

  /**
   * Grammar: For = "%{" "for" Identifier ["," Identifier] "in" Expression "}"
   *                Template "%{" "endfor" "}"
   */
  private parseForDirective(context: TemplateContext): TemplateElement {
    const open = this.openDirective(["for"]);

    const header = this.withNewlines(false, () => {
      const first = this.expectIdentifier(Category.Directive);
      let keyVar: Identifier | undefined;
      let valueVar = first;
      if (this.current().kind === TokenKind.Comma) {
        this.advance();
        keyVar = first;
        valueVar = this.expectIdentifier(Category.Directive);
      }
      this.expectKeyword("in", Category.Directive);
      return { keyVar, valueVar, collection: this.parseExpression() };
    });

    const forStrip = this.closeDirective(open.stripStart);
    const template: Template = { elements: this.parseTemplateElements(context) };
    const end = this.openDirective(["endfor"]);

    return {
      kind: "ForDirective",
      ...header,
      template,
      forStrip,
      endforStrip: this.closeDirective(end.stripStart),
    };
  }

  /** Consumes `%{` and a directive keyword out of `accepted`. */
  private openDirective(
    accepted: readonly string[]
  ): { keyword: string; stripStart: boolean } {
    const open = this.lookahead();
    if (!open.peek(TokenKind.TemplateControl, Expect.directiveStart)) {
      throw this.raise(open.failure(Category.Directive));
    }
    const marker = this.advance();

    return this.withNewlines(false, () => {
      const lookahead = this.lookahead();
      for (const keyword of accepted) {
        if (lookahead.peekKeyword(keyword)) {
          this.advance();
          return { keyword, stripStart: marker.lexeme.endsWith("~") };
        }
      }
      throw this.raise(lookahead.failure(Category.Directive));
    });
  }

  /** Consumes the `}` or `~}` ending a directive tag. */
  private closeDirective(stripStart: boolean): Strip {
    return this.withNewlines(false, () => {
      const lookahead = this.lookahead();
      if (!lookahead.peek(TokenKind.TemplateSeqEnd, Expect.rbrace)) {
        throw this.raise(lookahead.failure(Category.Directive));
      }
      const end = this.advance();
      return { start: stripStart, end: end.lexeme.startsWith("~") };
    });
  }

  /** A closing directive with no open directive to close. */
  private unexpectedDirective(): ParseError {
    this.advance(); // %{
    return this.withNewlines(false, () => {
      const lookahead = this.lookahead();
      lookahead.peekKeyword("if");
      lookahead.peekKeyword("for");
      return this.raise(lookahead.failure(Category.Directive));
    });
  }

  private unescapeQuoted(token: Token): string {
    const result = unescapeQuoted(token.lexeme);
    if (result.ok) {
      return result.value;
    }
    const start = advancePosition(
      token.span.start,
      token.lexeme.slice(0, result.failure.index)
    );
    throw this.raise({
      category: Category.EscapeSequence,
      span: { start, end: start },
      expected: result.failure.expected,
    });
  }

  // ===== Token Stream Helpers =====

  private identifier(token: Token): Identifier {
    return new Identifier(token.lexeme);
  }

  private expectIdentifier(category: string): Identifier {
    const lookahead = this.lookahead();
    if (!lookahead.peek(TokenKind.Identifier, Expect.identifier)) {
      throw this.raise(lookahead.failure(category));
    }
    return this.identifier(this.advance());
  }

  private expectKeyword(keyword: string, category: string): void {
    const lookahead = this.lookahead();
    if (!lookahead.peekKeyword(keyword)) {
      throw this.raise(lookahead.failure(category));
    }
    this.advance();
  }

  private lookahead(): Lookahead {
    return new Lookahead(this.current());
  }

  private newlinesSignificant(): boolean {
    return this.newlineStack[this.newlineStack.length - 1] ?? true;
  }

  /**
   * Get current token without consuming it. Where newlines are not
   * significant they are skipped.
   */
  private current(): Token {
    if (!this.newlinesSignificant()) {
      while (this.tokens.at(this.index).kind === TokenKind.Newline) {
        this.index += 1;
      }
    }
    return this.tokens.at(this.index);
  }

  /** Consume and return the current token */
  private advance(): Token {
    const token = this.current();
    if (token.kind !== TokenKind.Eof) {
      this.index += 1;
    }
    return token;
  }

  /** Look ahead `offset` tokens past the current one without consuming */
  private peekAhead(offset: number): Token {
    const significant = this.newlinesSignificant();
    let index = this.index;
    let remaining = offset;

    while (true) {
      const token = this.tokens.at(index);
      if (!significant && token.kind === TokenKind.Newline) {
        index += 1;
        continue;
      }
      if (remaining === 0 || token.kind === TokenKind.Eof) {
        return token;
      }
      remaining -= 1;
      index += 1;
    }
  }

  private skipNewlines(): void {
    while (this.current().kind === TokenKind.Newline) {
      this.advance();
    }
  }

  /**
   * Execute `fn` with newlines significant or not; the previous setting
   * is restored when it returns.
   */
  private withNewlines<T>(significant: boolean, fn: () => T): T {
    this.newlineStack.push(significant);
    try {
      return fn();
    } finally {
      this.newlineStack.pop();
    }
  }

  private nested<T>(fn: () => T): T {
    if (this.depth >= this.maxDepth) {
      // Not a grammar alternative, so nothing recorded is merged in.
      throw new ParseError(
        {
          category: Category.NestingLimit,
          span: this.current().span,
          expected: [],
        },
        this.source
      );
    }
    this.depth += 1;
    try {
      return fn();
    } finally {
      this.depth -= 1;
    }
  }

  /**
   * Remember the alternatives checked before falling back to another
   * production, so a failure at the same token lists them too.
   */
  private record(failure: Failure): void {
    this.recorded = mergeFailures(this.recorded, failure);
  }

  private raise(failure: Failure): ParseError {
    return new ParseError(mergeFailures(this.recorded, failure), this.source);
  }
}

function pushLiteral(elements: TemplateElement[], value: string): void {
  if (value === "") return;
  const last = elements[elements.length - 1];
  if (last && last.kind === "Literal") {
    elements[elements.length - 1] = { kind: "Literal", value: last.value + value };
    return;
  }
  elements.push({ kind: "Literal", value });
}

function isKeywordToken(token: Token, keyword: string): boolean {
  return token.kind === TokenKind.Identifier && token.lexeme === keyword;
}
