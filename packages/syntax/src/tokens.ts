export type Position = {
  /** UTF-8 byte offset from the start of the source. */
  offset: number;
  /** 1-based line number. */
  line: number;
  /** 1-based column number, counted in code points. */
  column: number;
};

export type Span = {
  start: Position;
  end: Position;
};

export enum TokenKind {
  Identifier = "Identifier",
  Number = "Number",
  Newline = "Newline",
  LBrace = "LBrace",
  RBrace = "RBrace",
  LBracket = "LBracket",
  RBracket = "RBracket",
  LParen = "LParen",
  RParen = "RParen",
  Comma = "Comma",
  Dot = "Dot",
  Ellipsis = "Ellipsis",
  Equals = "Equals",
  Colon = "Colon",
  DoubleColon = "DoubleColon",
  Question = "Question",
  FatArrow = "FatArrow",
  Plus = "Plus",
  Minus = "Minus",
  Star = "Star",
  Slash = "Slash",
  Percent = "Percent",
  Bang = "Bang",
  EqualEqual = "EqualEqual",
  NotEqual = "NotEqual",
  Less = "Less",
  LessEqual = "LessEqual",
  Greater = "Greater",
  GreaterEqual = "GreaterEqual",
  And = "And",
  Or = "Or",
  OQuote = "OQuote",
  CQuote = "CQuote",
  TemplateLiteral = "TemplateLiteral",
  TemplateInterp = "TemplateInterp",
  TemplateControl = "TemplateControl",
  TemplateSeqEnd = "TemplateSeqEnd",
  OHeredoc = "OHeredoc",
  CHeredoc = "CHeredoc",
  Invalid = "Invalid",
  Eof = "Eof",
}

export type Token = {
  kind: TokenKind;
  lexeme: string;
  span: Span;
};

/** Number of bytes `char` (one code point) occupies in UTF-8. */
export function utf8Length(char: string): number {
  const code = char.codePointAt(0) ?? 0;
  if (code < 0x80) return 1;
  if (code < 0x800) return 2;
  if (code < 0x10000) return 3;
  return 4;
}

/** The position reached after reading `text` from `start`. */
export function advancePosition(start: Position, text: string): Position {
  let { offset, line, column } = start;
  for (const char of text) {
    offset += utf8Length(char);
    if (char === "\n") {
      line += 1;
      column = 1;
    } else {
      column += 1;
    }
  }
  return { offset, line, column };
}
