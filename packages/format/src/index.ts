/**
 * HCL Formatter
 *
 * Renders document model nodes as canonical HCL text. Output is
 * deterministic and re-parses to the same tree for every tree the parser
 * can produce; programmatic trees get parentheses wherever precedence or
 * a heredoc would otherwise change the parse.
 */

import {
  Identifier,
  UNARY_PRECEDENCE,
  isBody,
  isStructure,
  precedenceOf,
  type Attribute,
  type Block,
  type BlockLabel,
  type Body,
  type Expression,
  type ExpressionOf,
  type Node,
  type ObjectItem,
  type Strip,
  type Structure,
  type Template,
  type TemplateElement,
  type TraversalOperator,
} from "@hclkit/syntax";

// ============================================================================
// Options
// ============================================================================

export interface FormatterOptions {
  /** Indentation per nesting level (default: two spaces) */
  indent?: string;
  /** Omit the blank line before blocks (default: false) */
  dense?: boolean;
  /** Render every object on a single line (default: false) */
  compactObjects?: boolean;
  /** Render string object keys that are valid identifiers bare (default: false) */
  preferIdentKeys?: boolean;
}

export const defaultFormatterOptions: Required<FormatterOptions> = {
  indent: "  ",
  dense: false,
  compactObjects: false,
  preferIdentKeys: false,
};

/** Receives formatted output chunk by chunk. */
export interface FormatSink {
  write(chunk: string): void;
}

/**
 * Raised when the sink rejects output. The original failure is kept as
 * `cause`.
 */
export class FormatError extends Error {
  constructor(cause: unknown) {
    super(
      `Failed to write formatted output: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause }
    );
    this.name = "FormatError";
  }
}

// ============================================================================
// Entry Points
// ============================================================================

export function format(node: Node, options: FormatterOptions = {}): string {
  const chunks: string[] = [];
  formatTo(node, { write: (chunk) => chunks.push(chunk) }, options);
  return chunks.join("");
}

/**
 * Format `node` into `sink`. Top-level structures are written as separate
 * chunks.
 */
export function formatTo(
  node: Node,
  sink: FormatSink,
  options: FormatterOptions = {}
): void {
  const printer = new Printer({ ...defaultFormatterOptions, ...options });
  const write = (chunk: string) => {
    try {
      sink.write(chunk);
    } catch (error) {
      throw new FormatError(error);
    }
  };

  if (isBody(node)) {
    printer.body(node, 0).forEach(write);
  } else if (isStructure(node)) {
    write(printer.structure(node, 0));
  } else {
    // A standalone expression reads like one inside parentheses.
    write(printer.withNewlines(false, () => printer.expression(node, 0, Position.Root)));
  }
}

// ============================================================================
// Printer
// ============================================================================

/**
 * Where an expression sits. Decides whether objects expand, whether a
 * heredoc needs a line break after its closing marker, and when an
 * operand needs parentheses.
 */
enum Position {
  /** Formatted on its own; objects expand as in Value */
  Root,
  /** Value of an attribute or of an expanded object item */
  Value,
  /** Element of a comma separated list, an index, key or template part */
  Item,
  /** Operand of an operator, a traversal base or a conditional part */
  Operand,
}

type ResolvedOptions = Required<FormatterOptions>;

class Printer {
  /**
   * Whether a line break ends the expression being printed, tracked the
   * way the parser tracks it: inside brackets, parentheses and template
   * sequences it does not; in bodies and object items it does.
   */
  private readonly newlines: boolean[] = [];

  constructor(private readonly options: ResolvedOptions) {}

  withNewlines<T>(significant: boolean, fn: () => T): T {
    this.newlines.push(significant);
    try {
      return fn();
    } finally {
      this.newlines.pop();
    }
  }

  private newlinesSignificant(): boolean {
    return this.newlines[this.newlines.length - 1] ?? true;
  }

  /** One chunk per structure, in order. */
  body(body: Body, level: number): string[] {
    return body.structures.map((structure, i) => {
      const separator =
        structure.kind === "Block" && i > 0 && !this.options.dense ? "\n" : "";
      return separator + this.structure(structure, level);
    });
  }

  structure(structure: Structure, level: number): string {
    return structure.kind === "Attribute"
      ? this.attribute(structure, level)
      : this.block(structure, level);
  }

  private attribute(attribute: Attribute, level: number): string {
    const value = this.expression(attribute.value, level, Position.Value);
    return `${this.pad(level)}${attribute.key.name} = ${value}\n`;
  }

  private block(block: Block, level: number): string {
    const head = [block.identifier.name, ...block.labels.map(formatLabel)].join(" ");
    const pad = this.pad(level);

    if (block.body.structures.length === 0) {
      return `${pad}${head} {}\n`;
    }
    const inner = this.body(block.body, level + 1).join("");
    return `${pad}${head} {\n${inner}${pad}}\n`;
  }

  expression(expr: Expression, level: number, position: Position): string {
    switch (expr.kind) {
      case "Null":
        return "null";
      case "Bool":
        return expr.value ? "true" : "false";
      case "Number":
        return expr.value;
      case "String":
        return quote(expr.value);
      case "Variable":
        return expr.name.name;
      case "Array":
        return `[${this.withNewlines(false, () => this.list(expr.elements, level))}]`;
      case "Object":
        return this.object(expr, level, position);
      case "Template":
        return `"${this.template(expr.template, level, "quoted")}"`;
      case "Heredoc":
        return this.heredoc(expr, level, position);
      case "FuncCall": {
        const name = [...expr.name.namespace, expr.name.name]
          .map((id) => id.name)
          .join("::");
        const expand = expr.expandFinal && expr.args.length > 0 ? "..." : "";
        const args = this.withNewlines(false, () => this.list(expr.args, level));
        return `${name}(${args}${expand})`;
      }
      case "Traversal":
        return this.traversal(expr, level);
      case "Unary": {
        const operand = this.operand(expr.operand, level, UNARY_PRECEDENCE, false);
        return `${expr.operator}${operand}`;
      }
      case "Binary": {
        const precedence = precedenceOf(expr.operator);
        const left = this.operand(expr.left, level, precedence, false);
        const right = this.operand(expr.right, level, precedence, true);
        return `${left} ${expr.operator} ${right}`;
      }
      case "Parenthesis":
        return this.parenthesized(expr.inner, level);
      case "Conditional": {
        const condition =
          expr.condition.kind === "Conditional"
            ? this.parenthesized(expr.condition, level)
            : this.expression(expr.condition, level, Position.Operand);
        const trueExpr = this.expression(expr.trueExpr, level, Position.Operand);
        const falseExpr = this.expression(expr.falseExpr, level, Position.Operand);
        return `${condition} ? ${trueExpr} : ${falseExpr}`;
      }
      case "For":
        return this.forExpression(expr, level);
    }
  }

  private list(elements: readonly Expression[], level: number): string {
    return elements
      .map((element) => this.expression(element, level, Position.Item))
      .join(", ");
  }

  private pad(level: number): string {
    return this.options.indent.repeat(level);
  }

  // ===== Operators =====

  /**
   * Render an operator operand, wrapping it when it binds looser than the
   * operator. The right operand of a left-associative operator also wraps
   * at equal precedence.
   */
  private operand(
    expr: Expression,
    level: number,
    precedence: number,
    isRight: boolean
  ): string {
    const inner = bindingPower(expr);
    const wrap = isRight ? inner <= precedence : inner < precedence;
    return wrap
      ? this.parenthesized(expr, level)
      : this.expression(expr, level, Position.Operand);
  }

  private parenthesized(expr: Expression, level: number): string {
    const inner = this.withNewlines(false, () =>
      this.expression(expr, level, Position.Item)
    );
    return `(${inner})`;
  }

  private traversal(expr: ExpressionOf<"Traversal">, level: number): string {
    const base = needsParenthesesAsBase(expr)
      ? this.parenthesized(expr.base, level)
      : this.expression(expr.base, level, Position.Operand);
    return base + expr.operators.map((op) => this.traversalOperator(op, level)).join("");
  }

  private traversalOperator(op: TraversalOperator, level: number): string {
    switch (op.kind) {
      case "GetAttr":
        return `.${op.name.name}`;
      case "Index":
        return `[${this.withNewlines(false, () =>
          this.expression(op.index, level, Position.Item)
        )}]`;
      case "LegacyIndex":
        return `.${op.index}`;
      case "AttrSplat":
        return ".*";
      case "FullSplat":
        return "[*]";
    }
  }

  // ===== Collections =====

  private object(
    expr: ExpressionOf<"Object">,
    level: number,
    position: Position
  ): string {
    return this.withNewlines(true, () => this.objectItems(expr, level, position));
  }

  private objectItems(
    expr: ExpressionOf<"Object">,
    level: number,
    position: Position
  ): string {
    if (expr.items.length === 0) {
      return "{}";
    }

    const expanded =
      (position === Position.Value || position === Position.Root) &&
      !this.options.compactObjects;
    if (!expanded) {
      const items = expr.items.map(
        (item) =>
          `${this.objectKey(item, level)} = ${this.expression(item.value, level, Position.Item)}`
      );
      return `{ ${items.join(", ")} }`;
    }

    const pad = this.pad(level + 1);
    const lines = expr.items.map(
      (item) =>
        `${pad}${this.objectKey(item, level + 1)} = ${this.expression(
          item.value,
          level + 1,
          Position.Value
        )}\n`
    );
    return `{\n${lines.join("")}${this.pad(level)}}`;
  }

  private objectKey(item: ObjectItem, level: number): string {
    const key = item.key;
    if (key.kind === "Identifier") {
      return key.name.name;
    }
    if (
      this.options.preferIdentKeys &&
      key.expression.kind === "String" &&
      Identifier.isValid(key.expression.value)
    ) {
      return key.expression.value;
    }
    return this.expression(key.expression, level, Position.Item);
  }

  private forExpression(expr: ExpressionOf<"For">, level: number): string {
    const item = (e: Expression) =>
      this.withNewlines(false, () => this.expression(e, level, Position.Item));
    const vars = expr.keyVar
      ? `${expr.keyVar.name}, ${expr.valueVar.name}`
      : expr.valueVar.name;
    const head = `for ${vars} in ${item(expr.collection)} : `;
    const condition = expr.condition ? ` if ${item(expr.condition)}` : "";

    if (expr.keyExpr) {
      const grouping = expr.grouping ? "..." : "";
      return `{${head}${item(expr.keyExpr)} => ${item(expr.valueExpr)}${grouping}${condition}}`;
    }
    return `[${head}${item(expr.valueExpr)}${condition}]`;
  }

  // ===== Templates =====

  private heredoc(
    expr: ExpressionOf<"Heredoc">,
    level: number,
    position: Position
  ): string {
    // Anything after the closing marker must start on the next line,
    // which ends an operand where line breaks are significant.
    if (position === Position.Operand && this.newlinesSignificant()) {
      return this.parenthesized(expr, level);
    }
    const marker = expr.indented ? "<<-" : "<<";
    const content = this.template(expr.template, level, "heredoc");
    const text = `${marker}${expr.delimiter.name}\n${content}${expr.delimiter.name}`;
    return position === Position.Item || position === Position.Operand
      ? `${text}\n`
      : text;
  }

  private template(
    template: Template,
    level: number,
    context: "quoted" | "heredoc"
  ): string {
    return template.elements
      .map((element) => this.templateElement(element, level, context))
      .join("");
  }

  private templateElement(
    element: TemplateElement,
    level: number,
    context: "quoted" | "heredoc"
  ): string {
    const item = (e: Expression) =>
      this.withNewlines(false, () => this.expression(e, level, Position.Item));

    switch (element.kind) {
      case "Literal":
        return context === "quoted"
          ? escapeQuoted(element.value)
          : escapeSequenceOpeners(element.value);
      case "Interpolation":
        return `\${${openStrip(element.strip)}${item(element.expression)}${closeStrip(element.strip)}}`;
      case "IfDirective": {
        const then = this.template(element.then, level, context);
        const head = directive(element.ifStrip, `if ${item(element.condition)}`);
        const tail = directive(element.endifStrip, "endif");
        if (!element.else) {
          return `${head}${then}${tail}`;
        }
        const elseTag = directive(
          element.elseStrip ?? { start: false, end: false },
          "else"
        );
        const otherwise = this.template(element.else, level, context);
        return `${head}${then}${elseTag}${otherwise}${tail}`;
      }
      case "ForDirective": {
        const vars = element.keyVar
          ? `${element.keyVar.name}, ${element.valueVar.name}`
          : element.valueVar.name;
        const head = directive(
          element.forStrip,
          `for ${vars} in ${item(element.collection)}`
        );
        const body = this.template(element.template, level, context);
        return `${head}${body}${directive(element.endforStrip, "endfor")}`;
      }
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

/** Precedence an expression binds with; primaries bind tightest. */
function bindingPower(expr: Expression): number {
  switch (expr.kind) {
    case "Conditional":
      return 0;
    case "Binary":
      return precedenceOf(expr.operator);
    case "Unary":
      return UNARY_PRECEDENCE;
    default:
      return UNARY_PRECEDENCE + 1;
  }
}

/**
 * Bases that would read back differently without parentheses. An integer
 * followed by `.0` would lex as one fractional number.
 */
function needsParenthesesAsBase(expr: ExpressionOf<"Traversal">): boolean {
  const base = expr.base;
  switch (base.kind) {
    case "Conditional":
    case "Binary":
    case "Unary":
    case "Traversal":
      return true;
    case "Number":
      return /^[0-9]+$/.test(base.value) && expr.operators[0]?.kind === "LegacyIndex";
    default:
      return false;
  }
}

function formatLabel(label: BlockLabel): string {
  return label.kind === "Identifier" ? label.name.name : quote(label.value);
}

function directive(strip: Strip, content: string): string {
  return `%{${openStrip(strip)} ${content} ${closeStrip(strip)}}`;
}

function openStrip(strip: Strip): string {
  return strip.start ? "~" : "";
}

function closeStrip(strip: Strip): string {
  return strip.end ? "~" : "";
}

export function quote(value: string): string {
  return `"${escapeQuoted(value)}"`;
}

const QUOTED_ESCAPES: Readonly<Record<string, string>> = {
  '"': '\\"',
  "\\": "\\\\",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

function escapeQuoted(value: string): string {
  let result = "";
  for (const char of value) {
    const escaped = QUOTED_ESCAPES[char];
    if (escaped !== undefined) {
      result += escaped;
      continue;
    }
    const code = char.codePointAt(0) ?? 0;
    if (code < 0x20 || code === 0x7f) {
      result += `\\u${code.toString(16).padStart(4, "0")}`;
      continue;
    }
    result += char;
  }
  return escapeSequenceOpeners(result);
}

/** `${` and `%{` in literal text are written `$${` and `%%{`. */
function escapeSequenceOpeners(value: string): string {
  return value.replace(/[$%]\{/g, (match) => `${match.charAt(0)}${match}`);
}
