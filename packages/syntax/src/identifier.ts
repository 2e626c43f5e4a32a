/** Identifiers with a fixed meaning in expression position. */
export const KEYWORDS = ["true", "false", "null"] as const;

export type Keyword = (typeof KEYWORDS)[number];

const KEYWORD_SET = new Set<string>(KEYWORDS);

export function isKeyword(value: string): value is Keyword {
  return KEYWORD_SET.has(value);
}

const IDENTIFIER_PATTERN = /^[\p{ID_Start}_][\p{ID_Continue}-]*$/u;

export function isIdentifierStart(char: string): boolean {
  return /^[\p{ID_Start}_]$/u.test(char);
}

export function isIdentifierPart(char: string): boolean {
  return /^[\p{ID_Continue}-]$/u.test(char);
}

/**
 * Thrown when a model node is constructed from a string that is not a
 * valid bare identifier.
 */
export class InvalidIdentifierError extends Error {
  constructor(public readonly value: string) {
    super(`Invalid identifier ${JSON.stringify(value)}`);
  }
}

/**
 * Thrown when a model node is constructed with values the grammar can
 * never produce, such as a negative number literal.
 */
export class InvalidNodeError extends Error {}

/**
 * A string that matches the bare identifier grammar: a letter or `_`,
 * followed by letters, digits, `_` or `-`.
 */
export class Identifier {
  readonly name: string;

  constructor(name: string) {
    if (!Identifier.isValid(name)) {
      throw new InvalidIdentifierError(name);
    }
    this.name = name;
  }

  static isValid(value: string): boolean {
    return IDENTIFIER_PATTERN.test(value);
  }

  toString(): string {
    return this.name;
  }
}
