/**
 * Semantic Tokens Provider for HCL.
 *
 * Classifies lexer tokens using the tokens around them, so highlighting
 * keeps working while a document does not parse.
 */
import { SemanticTokenTypes, SemanticTokenModifiers } from "vscode-languageserver";
import type { SemanticTokensLegend } from "vscode-languageserver";
import { TokenKind, type Token } from "@hclkit/syntax";
import type { DocumentCache } from "./types";
import { splitLines, toLspPosition } from "./positions";

/**
 * Semantic token types supported by the HCL language server.
 */
export const TOKEN_TYPES = [
  SemanticTokenTypes.type, // 0: Block types
  SemanticTokenTypes.class, // 1: Block labels
  SemanticTokenTypes.property, // 2: Attribute and object keys, `.attr`
  SemanticTokenTypes.variable, // 3: Variables, for bindings
  SemanticTokenTypes.function, // 4: Function names
  SemanticTokenTypes.namespace, // 5: Function namespaces
  SemanticTokenTypes.keyword, // 6: Keywords
  SemanticTokenTypes.string, // 7: String and heredoc text
  SemanticTokenTypes.number, // 8: Number literals
  SemanticTokenTypes.operator, // 9: Operators
];

/**
 * Semantic token modifiers supported.
 */
export const TOKEN_MODIFIERS = [
  SemanticTokenModifiers.declaration, // 0: Attribute keys, for bindings
  SemanticTokenModifiers.readonly, // 1: true, false, null
];

/**
 * Semantic tokens legend for client registration.
 */
export const SEMANTIC_TOKENS_LEGEND: SemanticTokensLegend = {
  tokenTypes: TOKEN_TYPES,
  tokenModifiers: TOKEN_MODIFIERS,
};

/**
 * Token type indices for convenience.
 */
export const TokenTypeIndex = {
  BlockType: 0,
  Label: 1,
  Property: 2,
  Variable: 3,
  Function: 4,
  Namespace: 5,
  Keyword: 6,
  String: 7,
  Number: 8,
  Operator: 9,
} as const;

/**
 * Token modifier bit flags.
 */
export const TokenModifierFlags = {
  Declaration: 1 << 0,
  Readonly: 1 << 1,
} as const;

/**
 * Semantic token entry before encoding.
 */
export interface SemanticToken {
  line: number; // 0-based line
  char: number; // 0-based UTF-16 character
  length: number;
  type: number; // Token type index
  modifiers: number; // Modifier bit flags
}

const OPERATORS = new Set<TokenKind>([
  TokenKind.Plus,
  TokenKind.Minus,
  TokenKind.Star,
  TokenKind.Slash,
  TokenKind.Percent,
  TokenKind.Bang,
  TokenKind.EqualEqual,
  TokenKind.NotEqual,
  TokenKind.Less,
  TokenKind.LessEqual,
  TokenKind.Greater,
  TokenKind.GreaterEqual,
  TokenKind.And,
  TokenKind.Or,
  TokenKind.Question,
  TokenKind.FatArrow,
  TokenKind.Ellipsis,
]);

const STRING_PARTS = new Set<TokenKind>([
  TokenKind.OQuote,
  TokenKind.CQuote,
  TokenKind.TemplateLiteral,
  TokenKind.OHeredoc,
  TokenKind.CHeredoc,
]);

const DIRECTIVE_KEYWORDS = new Set(["if", "else", "endif", "for", "endfor"]);

const LITERAL_KEYWORDS = new Set(["true", "false", "null"]);

/**
 * Provide semantic tokens for a document, delta-encoded.
 */
export function provideSemanticTokens(cache: DocumentCache): number[] {
  const tokens = classifyTokens(cache);

  // Sort tokens by position (required by LSP spec)
  tokens.sort((a, b) => {
    if (a.line !== b.line) return a.line - b.line;
    return a.char - b.char;
  });

  return encodeTokens(tokens);
}

/**
 * Classify the cached tokens of a document.
 */
export function classifyTokens(cache: DocumentCache): SemanticToken[] {
  const lines = splitLines(cache.content);
  const source = cache.tokens;
  const result: SemanticToken[] = [];

  // One entry per open bracket: whether it opened a for expression.
  const brackets: boolean[] = [];
  let inLabels = false;
  let inForHeader = false;

  for (let i = 0; i < source.length; i++) {
    const token = source[i];
    if (!token) continue;
    const prev = source[i - 1];
    const next = source[i + 1];

    if (inLabels) {
      if (token.kind === TokenKind.Identifier || STRING_PARTS.has(token.kind)) {
        addToken(result, lines, token, TokenTypeIndex.Label, 0);
        continue;
      }
      inLabels = false;
    }

    switch (token.kind) {
      case TokenKind.LBrace:
      case TokenKind.LBracket:
      case TokenKind.LParen:
      case TokenKind.TemplateInterp:
      case TokenKind.TemplateControl:
        brackets.push(false);
        continue;
      case TokenKind.RBrace:
      case TokenKind.RBracket:
      case TokenKind.RParen:
      case TokenKind.TemplateSeqEnd:
        brackets.pop();
        continue;
      case TokenKind.Number:
        addToken(result, lines, token, TokenTypeIndex.Number, 0);
        continue;
      case TokenKind.Identifier:
        break;
      default:
        if (STRING_PARTS.has(token.kind)) {
          addToken(result, lines, token, TokenTypeIndex.String, 0);
        } else if (OPERATORS.has(token.kind)) {
          addToken(result, lines, token, TokenTypeIndex.Operator, 0);
        }
        continue;
    }

    const name = token.lexeme;

    if (prev?.kind === TokenKind.Dot) {
      addToken(result, lines, token, TokenTypeIndex.Property, 0);
    } else if (next?.kind === TokenKind.DoubleColon) {
      addToken(result, lines, token, TokenTypeIndex.Namespace, 0);
    } else if (next?.kind === TokenKind.LParen) {
      addToken(result, lines, token, TokenTypeIndex.Function, 0);
    } else if (inForHeader) {
      if (name === "in") {
        inForHeader = false;
        addToken(result, lines, token, TokenTypeIndex.Keyword, 0);
      } else {
        addToken(
          result,
          lines,
          token,
          TokenTypeIndex.Variable,
          TokenModifierFlags.Declaration
        );
      }
    } else if (prev?.kind === TokenKind.TemplateControl && DIRECTIVE_KEYWORDS.has(name)) {
      inForHeader = name === "for";
      addToken(result, lines, token, TokenTypeIndex.Keyword, 0);
    } else if (
      name === "for" &&
      (prev?.kind === TokenKind.LBracket || prev?.kind === TokenKind.LBrace) &&
      next?.kind === TokenKind.Identifier
    ) {
      brackets[brackets.length - 1] = true;
      inForHeader = true;
      addToken(result, lines, token, TokenTypeIndex.Keyword, 0);
    } else if (name === "if" && brackets[brackets.length - 1] === true) {
      addToken(result, lines, token, TokenTypeIndex.Keyword, 0);
    } else if (LITERAL_KEYWORDS.has(name)) {
      addToken(
        result,
        lines,
        token,
        TokenTypeIndex.Keyword,
        TokenModifierFlags.Readonly
      );
    } else if (next?.kind === TokenKind.Equals) {
      addToken(
        result,
        lines,
        token,
        TokenTypeIndex.Property,
        startsLine(prev) ? TokenModifierFlags.Declaration : 0
      );
    } else if (next?.kind === TokenKind.Colon && startsItem(prev)) {
      addToken(result, lines, token, TokenTypeIndex.Property, 0);
    } else if (startsLine(prev) && opensBlock(next)) {
      inLabels = true;
      addToken(result, lines, token, TokenTypeIndex.BlockType, 0);
    } else {
      addToken(result, lines, token, TokenTypeIndex.Variable, 0);
    }
  }

  return result;
}

function startsLine(prev: Token | undefined): boolean {
  return (
    prev === undefined ||
    prev.kind === TokenKind.Newline ||
    prev.kind === TokenKind.LBrace ||
    prev.kind === TokenKind.RBrace
  );
}

function startsItem(prev: Token | undefined): boolean {
  return prev?.kind === TokenKind.Comma || startsLine(prev);
}

function opensBlock(next: Token | undefined): boolean {
  return (
    next?.kind === TokenKind.Identifier ||
    next?.kind === TokenKind.OQuote ||
    next?.kind === TokenKind.LBrace
  );
}

/**
 * Add a semantic token, one entry per line the token covers.
 */
function addToken(
  tokens: SemanticToken[],
  lines: readonly string[],
  token: Token,
  type: number,
  modifiers: number
): void {
  const start = toLspPosition(lines, token.span.start);
  const segments = token.lexeme.split("\n");

  segments.forEach((segment, index) => {
    const text = segment.endsWith("\r") ? segment.slice(0, -1) : segment;
    if (text.length === 0) return;

    tokens.push({
      line: start.line + index,
      char: index === 0 ? start.character : 0,
      length: text.length,
      type,
      modifiers,
    });
  });
}

/**
 * Encode tokens as delta format.
 */
export function encodeTokens(tokens: readonly SemanticToken[]): number[] {
  const data: number[] = [];
  let prevLine = 0;
  let prevChar = 0;

  for (const token of tokens) {
    const deltaLine = token.line - prevLine;
    const deltaChar = deltaLine === 0 ? token.char - prevChar : token.char;

    data.push(deltaLine, deltaChar, token.length, token.type, token.modifiers);

    prevLine = token.line;
    prevChar = token.char;
  }

  return data;
}
