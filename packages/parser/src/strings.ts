import { category, literal, Expect, type Expectation } from "./diagnostics";

export type EscapeFailure = {
  /** Code unit index of the offending backslash within the raw text. */
  readonly index: number;
  readonly expected: readonly Expectation[];
};

export type UnescapeResult =
  | { ok: true; value: string }
  | { ok: false; failure: EscapeFailure };

const ESCAPE_CHARACTERS: readonly Expectation[] = [
  literal('"'),
  literal("\\"),
  literal("n"),
  literal("r"),
  literal("t"),
  literal("u"),
  literal("U"),
];

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  n: "\n",
  r: "\r",
  t: "\t",
  '"': '"',
  "\\": "\\",
};

const HEX_DIGIT = /^[0-9a-fA-F]$/;

/**
 * Decodes the raw text of a quoted template literal: backslash escapes
 * plus the `$${` and `%%{` sequence escapes.
 */
export function unescapeQuoted(raw: string): UnescapeResult {
  let value = "";
  let i = 0;

  while (i < raw.length) {
    if (raw.startsWith("$${", i) || raw.startsWith("%%{", i)) {
      value += raw.slice(i + 1, i + 3);
      i += 3;
      continue;
    }

    const char = raw.charAt(i);
    if (char !== "\\") {
      value += char;
      i += 1;
      continue;
    }

    const escape = raw.charAt(i + 1);
    const simple = SIMPLE_ESCAPES[escape];
    if (simple !== undefined) {
      value += simple;
      i += 2;
      continue;
    }

    if (escape === "u" || escape === "U") {
      const width = escape === "u" ? 4 : 8;
      const digits = raw.slice(i + 2, i + 2 + width);
      if (digits.length < width || ![...digits].every((d) => HEX_DIGIT.test(d))) {
        return fail(i, [Expect.hexDigit]);
      }
      const code = Number.parseInt(digits, 16);
      if (code > 0x10ffff || (code >= 0xd800 && code <= 0xdfff)) {
        return fail(i, [category("unicode scalar value")]);
      }
      value += String.fromCodePoint(code);
      i += 2 + width;
      continue;
    }

    return fail(i, ESCAPE_CHARACTERS);
  }

  return { ok: true, value };
}

/** Heredoc literals only know the sequence escapes. */
export function unescapeHeredoc(raw: string): string {
  return raw.replace(/\$\$\{|%%\{/g, (match) => match.slice(1));
}

function fail(index: number, expected: readonly Expectation[]): UnescapeResult {
  return { ok: false, failure: { index, expected } };
}
