import type { Token, Position } from "@hclkit/syntax";
import {
  TokenKind,
  isIdentifierPart,
  isIdentifierStart,
  utf8Length,
} from "@hclkit/syntax";

class LexerState {
  private index = 0;
  private bytes = 0;
  private line = 1;
  private column = 1;

  constructor(private readonly source: string) {}

  position(): Position {
    return { offset: this.bytes, line: this.line, column: this.column };
  }

  offset(): number {
    return this.index;
  }

  isAtEnd(): boolean {
    return this.index >= this.source.length;
  }

  /** Code unit lookahead; enough for the ASCII punctuation the grammar uses. */
  peek(offset = 0): string | undefined {
    return this.source[this.index + offset];
  }

  /** The full code point at the cursor. */
  peekChar(): string | undefined {
    const code = this.source.codePointAt(this.index);
    return code === undefined ? undefined : String.fromCodePoint(code);
  }

  startsWith(text: string): boolean {
    return this.source.startsWith(text, this.index);
  }

  advance(): string {
    const char = this.peekChar();
    if (char === undefined) {
      return "";
    }
    this.index += char.length;
    this.bytes += utf8Length(char);
    if (char === "\n") {
      this.line += 1;
      this.column = 1;
    } else {
      this.column += 1;
    }
    return char;
  }

  advanceBy(count: number): void {
    for (let i = 0; i < count; i += 1) {
      this.advance();
    }
  }

  slice(start: number, end?: number): string {
    return this.source.slice(start, end);
  }
}

type Mode =
  | { kind: "normal"; braces: number }
  | { kind: "quoted" }
  | { kind: "heredoc"; delimiter: string; atLineStart: boolean };

/**
 * Lazily tokenizes HCL source. The sequence always ends with a single
 * `Eof` token; characters that start no token become `Invalid` tokens
 * and scanning continues after them.
 */
export function* tokenize(source: string): Generator<Token, void, undefined> {
  const lexer = new Lexer(source);
  while (true) {
    const token = lexer.next();
    yield token;
    if (token.kind === TokenKind.Eof) {
      return;
    }
  }
}

export function lex(source: string): Token[] {
  return Array.from(tokenize(source));
}

class Lexer {
  private readonly state: LexerState;
  private readonly modes: Mode[] = [{ kind: "normal", braces: 0 }];
  private previous: TokenKind | undefined;

  constructor(source: string) {
    this.state = new LexerState(source);
  }

  next(): Token {
    const token = this.scan();
    this.previous = token.kind;
    return token;
  }

  private scan(): Token {
    while (true) {
      const mode = this.mode();
      if (mode.kind === "normal") {
        return this.scanNormal(mode);
      }
      const token =
        mode.kind === "quoted"
          ? this.scanQuoted()
          : this.scanHeredoc(mode);
      if (token) {
        return token;
      }
    }
  }

  private mode(): Mode {
    const mode = this.modes[this.modes.length - 1];
    if (!mode) {
      throw new Error("Lexer mode stack is empty");
    }
    return mode;
  }

  private popMode(): void {
    if (this.modes.length > 1) {
      this.modes.pop();
    }
  }

  // ===== Normal mode =====

  private scanNormal(mode: { kind: "normal"; braces: number }): Token {
    const state = this.state;

    while (true) {
      const current = state.peek();
      if (current === " " || current === "\t") {
        state.advance();
        continue;
      }
      if (current === "\r" && state.peek(1) !== "\n") {
        state.advance();
        continue;
      }
      if (current === "#" || (current === "/" && state.peek(1) === "/")) {
        skipLineComment(state);
        continue;
      }
      if (current === "/" && state.peek(1) === "*") {
        const unterminated = skipBlockComment(state);
        if (unterminated) {
          return unterminated;
        }
        continue;
      }
      break;
    }

    const start = state.position();
    const startIndex = state.offset();
    const current = state.peekChar();

    if (current === undefined) {
      return { kind: TokenKind.Eof, lexeme: "", span: { start, end: start } };
    }

    if (current === "\n" || (current === "\r" && state.peek(1) === "\n")) {
      state.advanceBy(current === "\r" ? 2 : 1);
      return this.make(TokenKind.Newline, start, startIndex);
    }

    if (isIdentifierStart(current)) {
      readIdentifier(state);
      return this.make(TokenKind.Identifier, start, startIndex);
    }

    if (isDigit(current)) {
      readNumber(state, this.previous !== TokenKind.Dot);
      return this.make(TokenKind.Number, start, startIndex);
    }

    if (current === '"') {
      state.advance();
      this.modes.push({ kind: "quoted" });
      return this.make(TokenKind.OQuote, start, startIndex);
    }

    if (current === "<" && state.peek(1) === "<") {
      const heredoc = this.tryHeredocStart(start, startIndex);
      if (heredoc) {
        return heredoc;
      }
    }

    if (current === "{") {
      state.advance();
      mode.braces += 1;
      return this.make(TokenKind.LBrace, start, startIndex);
    }

    if (current === "}") {
      state.advance();
      if (mode.braces > 0) {
        mode.braces -= 1;
        return this.make(TokenKind.RBrace, start, startIndex);
      }
      if (this.modes.length > 1) {
        this.popMode();
        return this.make(TokenKind.TemplateSeqEnd, start, startIndex);
      }
      return this.make(TokenKind.RBrace, start, startIndex);
    }

    if (
      current === "~" &&
      state.peek(1) === "}" &&
      mode.braces === 0 &&
      this.modes.length > 1
    ) {
      state.advanceBy(2);
      this.popMode();
      return this.make(TokenKind.TemplateSeqEnd, start, startIndex);
    }

    const kind = readPunctuation(state);
    if (kind) {
      return this.make(kind, start, startIndex);
    }

    state.advance();
    return this.make(TokenKind.Invalid, start, startIndex);
  }

  /**
   * Recognizes `<<ID` or `<<-ID` followed by a line break. Anything else
   * is left for the operator scanner.
   */
  private tryHeredocStart(start: Position, startIndex: number): Token | null {
    const state = this.state;
    let cursor = 2;
    if (state.peek(cursor) === "-") cursor += 1;

    const first = state.peek(cursor);
    if (first === undefined || !isIdentifierStart(first)) {
      return null;
    }
    const nameStart = cursor;
    while (true) {
      const next = state.peek(cursor);
      if (next === undefined || !isIdentifierPart(next)) break;
      cursor += 1;
    }
    const delimiter = state.slice(
      state.offset() + nameStart,
      state.offset() + cursor
    );

    if (state.peek(cursor) === "\r" && state.peek(cursor + 1) === "\n") {
      cursor += 2;
    } else if (state.peek(cursor) === "\n") {
      cursor += 1;
    } else {
      return null;
    }

    state.advanceBy(cursor);
    this.modes.push({ kind: "heredoc", delimiter, atLineStart: true });
    return this.make(TokenKind.OHeredoc, start, startIndex);
  }

  // ===== Quoted templates =====

  private scanQuoted(): Token | null {
    const state = this.state;
    const start = state.position();
    const startIndex = state.offset();
    const current = state.peek();

    if (
      current === undefined ||
      current === "\n" ||
      (current === "\r" && state.peek(1) === "\n")
    ) {
      // Unterminated: the parser reports the missing quote right here.
      this.popMode();
      return null;
    }

    if (current === '"') {
      state.advance();
      this.popMode();
      return this.make(TokenKind.CQuote, start, startIndex);
    }

    const sequence = this.trySequenceStart(start, startIndex);
    if (sequence) {
      return sequence;
    }

    while (!state.isAtEnd()) {
      const next = state.peek();
      if (
        next === '"' ||
        next === "\n" ||
        (next === "\r" && state.peek(1) === "\n") ||
        startsSequence(state)
      ) {
        break;
      }
      if (skipLiteralEscape(state)) {
        continue;
      }
      if (next === "\\") {
        state.advance();
        const escaped = state.peek();
        if (escaped !== undefined && escaped !== "\n" && escaped !== "\r") {
          state.advance();
        }
        continue;
      }
      state.advance();
    }

    return this.make(TokenKind.TemplateLiteral, start, startIndex);
  }

  // ===== Heredoc templates =====

  private scanHeredoc(mode: {
    kind: "heredoc";
    delimiter: string;
    atLineStart: boolean;
  }): Token | null {
    const state = this.state;
    const start = state.position();
    const startIndex = state.offset();

    if (state.isAtEnd()) {
      this.popMode();
      return null;
    }

    if (mode.atLineStart) {
      const length = closingMarkerLength(state, mode.delimiter);
      if (length > 0) {
        state.advanceBy(length);
        this.popMode();
        return this.make(TokenKind.CHeredoc, start, startIndex);
      }
    }

    const sequence = this.trySequenceStart(start, startIndex);
    if (sequence) {
      mode.atLineStart = false;
      return sequence;
    }

    while (!state.isAtEnd()) {
      if (startsSequence(state)) {
        break;
      }
      if (skipLiteralEscape(state)) {
        continue;
      }
      const char = state.advance();
      if (char === "\n") {
        break;
      }
    }

    const token = this.make(TokenKind.TemplateLiteral, start, startIndex);
    mode.atLineStart = token.lexeme.endsWith("\n");
    return token;
  }

  // ===== Shared template helpers =====

  private trySequenceStart(start: Position, startIndex: number): Token | null {
    const state = this.state;
    if (!startsSequence(state)) {
      return null;
    }
    const kind =
      state.peek() === "$" ? TokenKind.TemplateInterp : TokenKind.TemplateControl;
    state.advanceBy(state.peek(2) === "~" ? 3 : 2);
    this.modes.push({ kind: "normal", braces: 0 });
    return this.make(kind, start, startIndex);
  }

  private make(kind: TokenKind, start: Position, startIndex: number): Token {
    return {
      kind,
      lexeme: this.state.slice(startIndex, this.state.offset()),
      span: { start, end: this.state.position() },
    };
  }
}

function startsSequence(state: LexerState): boolean {
  const current = state.peek();
  return (current === "$" || current === "%") && state.peek(1) === "{";
}

/** `$${` and `%%{` stand for a literal `${` and `%{`. */
function skipLiteralEscape(state: LexerState): boolean {
  if (state.startsWith("$${") || state.startsWith("%%{")) {
    state.advanceBy(3);
    return true;
  }
  return false;
}

function closingMarkerLength(state: LexerState, delimiter: string): number {
  let cursor = 0;
  while (state.peek(cursor) === " " || state.peek(cursor) === "\t") {
    cursor += 1;
  }
  for (let i = 0; i < delimiter.length; i += 1) {
    if (state.peek(cursor + i) !== delimiter[i]) {
      return 0;
    }
  }
  cursor += delimiter.length;
  const after = state.peek(cursor);
  if (
    after === undefined ||
    after === "\n" ||
    (after === "\r" && state.peek(cursor + 1) === "\n")
  ) {
    return cursor;
  }
  return 0;
}

function readIdentifier(state: LexerState) {
  state.advance();
  while (true) {
    const next = state.peekChar();
    if (next !== undefined && isIdentifierPart(next)) {
      state.advance();
      continue;
    }
    break;
  }
}

function readNumber(state: LexerState, allowFraction: boolean) {
  consumeDigits(state);

  if (!allowFraction) {
    return;
  }

  if (state.peek() === "." && isDigit(state.peek(1) ?? "")) {
    state.advance();
    consumeDigits(state);
  }

  const marker = state.peek();
  if (marker === "e" || marker === "E") {
    const sign = state.peek(1);
    const digitAt = sign === "+" || sign === "-" ? 2 : 1;
    if (isDigit(state.peek(digitAt) ?? "")) {
      state.advanceBy(digitAt);
      consumeDigits(state);
    }
  }
}

function readPunctuation(state: LexerState): TokenKind | null {
  const current = state.peek();
  const next = state.peek(1);

  const two = (kind: TokenKind) => {
    state.advanceBy(2);
    return kind;
  };
  const one = (kind: TokenKind) => {
    state.advance();
    return kind;
  };

  switch (current) {
    case "[":
      return one(TokenKind.LBracket);
    case "]":
      return one(TokenKind.RBracket);
    case "(":
      return one(TokenKind.LParen);
    case ")":
      return one(TokenKind.RParen);
    case ",":
      return one(TokenKind.Comma);
    case "?":
      return one(TokenKind.Question);
    case "+":
      return one(TokenKind.Plus);
    case "-":
      return one(TokenKind.Minus);
    case "*":
      return one(TokenKind.Star);
    case "/":
      return one(TokenKind.Slash);
    case "%":
      return one(TokenKind.Percent);
    case ":":
      return next === ":" ? two(TokenKind.DoubleColon) : one(TokenKind.Colon);
    case ".":
      if (next === "." && state.peek(2) === ".") {
        state.advanceBy(3);
        return TokenKind.Ellipsis;
      }
      return one(TokenKind.Dot);
    case "=":
      if (next === "=") return two(TokenKind.EqualEqual);
      if (next === ">") return two(TokenKind.FatArrow);
      return one(TokenKind.Equals);
    case "!":
      return next === "=" ? two(TokenKind.NotEqual) : one(TokenKind.Bang);
    case "<":
      return next === "=" ? two(TokenKind.LessEqual) : one(TokenKind.Less);
    case ">":
      return next === "=" ? two(TokenKind.GreaterEqual) : one(TokenKind.Greater);
    case "&":
      return next === "&" ? two(TokenKind.And) : null;
    case "|":
      return next === "|" ? two(TokenKind.Or) : null;
    default:
      return null;
  }
}

function skipLineComment(state: LexerState) {
  while (!state.isAtEnd()) {
    const next = state.peek();
    if (next === "\n" || (next === "\r" && state.peek(1) === "\n")) {
      break;
    }
    state.advance();
  }
}

/**
 * Skips a block comment. An unterminated comment becomes an `Invalid`
 * token spanning the rest of the input.
 */
function skipBlockComment(state: LexerState): Token | null {
  const start = state.position();
  const startIndex = state.offset();
  state.advanceBy(2);

  while (!state.isAtEnd()) {
    if (state.peek() === "*" && state.peek(1) === "/") {
      state.advanceBy(2);
      return null;
    }
    state.advance();
  }

  return {
    kind: TokenKind.Invalid,
    lexeme: state.slice(startIndex),
    span: { start, end: state.position() },
  };
}

function consumeDigits(state: LexerState) {
  while (isDigit(state.peek() ?? "")) {
    state.advance();
  }
}

function isDigit(char: string): boolean {
  return char >= "0" && char <= "9";
}

export type { Token, Position };
