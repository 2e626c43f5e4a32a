import type { Position, Span } from "@hclkit/syntax";
import type { Position as LspPosition, Range } from "vscode-languageserver";

/**
 * Source positions count columns in code points; LSP counts UTF-16 code
 * units, so the conversion needs the text of the line.
 */
export function toLspPosition(
  lines: readonly string[],
  position: Position
): LspPosition {
  const line = Math.max(0, position.line - 1);
  const text = lines[line] ?? "";
  let character = 0;
  let column = 1;

  for (const char of text) {
    if (column >= position.column) break;
    character += char.length;
    column += 1;
  }

  // Past the end of the line (a position on the line break itself).
  character += Math.max(0, position.column - column);

  return { line, character };
}

export function toLspRange(lines: readonly string[], span: Span): Range {
  return {
    start: toLspPosition(lines, span.start),
    end: toLspPosition(lines, span.end),
  };
}

export function splitLines(content: string): string[] {
  return content.split("\n");
}

/** Range covering the whole of `content`. */
export function documentRange(content: string): Range {
  const lines = splitLines(content);
  const last = lines.length - 1;
  return {
    start: { line: 0, character: 0 },
    end: { line: last, character: (lines[last] ?? "").length },
  };
}
