/**
 * Operator tables shared by the parser and the formatter.
 *
 * This module is the single source of truth for:
 * - Which token kinds spell which operators
 * - Binary operator precedence (higher binds tighter)
 *
 * All binary operators are left associative.
 */

import { TokenKind } from "./tokens";
import type { BinaryOperator } from "./index";

// ============================================================================
// Binary Operators
// ============================================================================

/**
 * Binary operator precedence levels:
 * 6: *, /, %
 * 5: +, -
 * 4: <, <=, >, >=
 * 3: ==, !=
 * 2: &&
 * 1: ||
 */
export const BINARY_PRECEDENCE: Readonly<Record<BinaryOperator, number>> = {
  "*": 6,
  "/": 6,
  "%": 6,
  "+": 5,
  "-": 5,
  "<": 4,
  "<=": 4,
  ">": 4,
  ">=": 4,
  "==": 3,
  "!=": 3,
  "&&": 2,
  "||": 1,
};

export const BINARY_OPERATOR_TOKENS: ReadonlyMap<TokenKind, BinaryOperator> =
  new Map<TokenKind, BinaryOperator>([
    [TokenKind.Star, "*"],
    [TokenKind.Slash, "/"],
    [TokenKind.Percent, "%"],
    [TokenKind.Plus, "+"],
    [TokenKind.Minus, "-"],
    [TokenKind.Less, "<"],
    [TokenKind.LessEqual, "<="],
    [TokenKind.Greater, ">"],
    [TokenKind.GreaterEqual, ">="],
    [TokenKind.EqualEqual, "=="],
    [TokenKind.NotEqual, "!="],
    [TokenKind.And, "&&"],
    [TokenKind.Or, "||"],
  ]);

/** Lowest binary precedence; conditionals bind looser than this. */
export const MIN_BINARY_PRECEDENCE = 1;

export function binaryOperatorFor(kind: TokenKind): BinaryOperator | undefined {
  return BINARY_OPERATOR_TOKENS.get(kind);
}

export function precedenceOf(operator: BinaryOperator): number {
  return BINARY_PRECEDENCE[operator];
}

// ============================================================================
// Unary Operators
// ============================================================================

/**
 * Unary operators bind tighter than every binary operator but looser than
 * traversals, so `-a.b` negates `a.b`.
 */
export const UNARY_PRECEDENCE = 7;
