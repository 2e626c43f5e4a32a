/**
 * Convenience constructors for building documents in code.
 *
 * Every constructor validates what the grammar would reject, so a tree
 * built here always formats to text that parses. Shapes the parser never
 * produces, such as `(1).0` built without the parentheses, read back
 * with a `Parenthesis` node added.
 */

import { Identifier, InvalidNodeError, isKeyword } from "./identifier";
import type {
  Attribute,
  BinaryOperator,
  Block,
  BlockLabel,
  Body,
  Expression,
  ExpressionOf,
  FuncName,
  ObjectItem,
  ObjectKey,
  Strip,
  Structure,
  Template,
  TemplateElement,
  TraversalOperator,
  UnaryOperator,
} from "./index";

/** Plain values accepted wherever an expression is expected. */
export type ExpressionLike =
  | Expression
  | string
  | number
  | boolean
  | null
  | readonly ExpressionLike[];

const NUMBER_PATTERN = /^[0-9]+(\.[0-9]+)?([eE][+-]?[0-9]+)?$/;

const NO_STRIP: Strip = { start: false, end: false };

export function ident(name: string | Identifier): Identifier {
  return name instanceof Identifier ? name : new Identifier(name);
}

// ===== Structures =====

export function attribute(
  key: string | Identifier,
  value: ExpressionLike
): Attribute {
  return { kind: "Attribute", key: ident(key), value: toExpression(value) };
}

export function block(
  identifier: string | Identifier,
  labels: ReadonlyArray<string | BlockLabel> = [],
  structures: readonly Structure[] = []
): Block {
  return {
    kind: "Block",
    identifier: ident(identifier),
    labels: labels.map(toLabel),
    body: { structures: [...structures] },
  };
}

export function body(structures: readonly Structure[] = []): Body {
  return { structures: [...structures] };
}

/** A quoted string label. */
export function label(value: string): BlockLabel {
  return { kind: "String", value };
}

/** A bare identifier label. */
export function identLabel(name: string | Identifier): BlockLabel {
  return { kind: "Identifier", name: ident(name) };
}

function toLabel(value: string | BlockLabel): BlockLabel {
  return typeof value === "string" ? label(value) : value;
}

// ===== Literals and collections =====

export function nullValue(): ExpressionOf<"Null"> {
  return { kind: "Null" };
}

export function bool(value: boolean): ExpressionOf<"Bool"> {
  return { kind: "Bool", value };
}

/**
 * A numeric literal. Strings keep their exact spelling; numbers are
 * rendered with `String(value)`.
 */
export function number(value: string | number): ExpressionOf<"Number"> {
  const text = typeof value === "number" ? String(value) : value;
  if (!NUMBER_PATTERN.test(text)) {
    throw new InvalidNodeError(`Invalid number literal ${text}`);
  }
  return { kind: "Number", value: text };
}

export function string(value: string): ExpressionOf<"String"> {
  return { kind: "String", value };
}

export function array(
  elements: readonly ExpressionLike[]
): ExpressionOf<"Array"> {
  return { kind: "Array", elements: elements.map(toExpression) };
}

/**
 * An object constructor. Record keys that are valid identifiers become
 * identifier keys; any other key becomes a quoted string key.
 */
export function object(
  items:
    | Readonly<Record<string, ExpressionLike>>
    | ReadonlyArray<readonly [string | ObjectKey, ExpressionLike]>
): ExpressionOf<"Object"> {
  const entries: ReadonlyArray<readonly [string | ObjectKey, ExpressionLike]> =
    isEntryList(items) ? items : Object.entries(items);
  const result: ObjectItem[] = entries.map(([key, value]) => ({
    key: typeof key === "string" ? objectKey(key) : key,
    value: toExpression(value),
  }));
  return { kind: "Object", items: result };
}

export function objectKey(key: string | Expression): ObjectKey {
  if (typeof key === "string") {
    return Identifier.isValid(key)
      ? { kind: "Identifier", name: new Identifier(key) }
      : { kind: "Expression", expression: string(key) };
  }
  // A bare variable key would read back as an identifier key.
  if (key.kind === "Variable") {
    return { kind: "Identifier", name: key.name };
  }
  return { kind: "Expression", expression: key };
}

// ===== References and calls =====

export function variable(name: string | Identifier): ExpressionOf<"Variable"> {
  const id = ident(name);
  if (isKeyword(id.name)) {
    throw new InvalidNodeError(
      `"${id.name}" is a literal keyword and cannot name a variable`
    );
  }
  return { kind: "Variable", name: id };
}

export function traversal(
  base: ExpressionLike,
  operators: readonly TraversalOperator[]
): ExpressionOf<"Traversal"> {
  if (operators.length === 0) {
    throw new InvalidNodeError("A traversal needs at least one operator");
  }
  return { kind: "Traversal", base: toExpression(base), operators };
}

export function getAttr(name: string | Identifier): TraversalOperator {
  return { kind: "GetAttr", name: ident(name) };
}

export function index(value: ExpressionLike): TraversalOperator {
  return { kind: "Index", index: toExpression(value) };
}

export function legacyIndex(value: number): TraversalOperator {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidNodeError(`Invalid legacy index ${value}`);
  }
  return { kind: "LegacyIndex", index: value };
}

export function attrSplat(): TraversalOperator {
  return { kind: "AttrSplat" };
}

export function fullSplat(): TraversalOperator {
  return { kind: "FullSplat" };
}

/** Parses `ns::name` style function names. */
export function funcName(name: string | FuncName): FuncName {
  if (typeof name !== "string") return name;
  const segments = name.split("::").map((segment) => ident(segment));
  const last = segments.pop();
  if (!last) {
    throw new InvalidNodeError(`Invalid function name ${name}`);
  }
  return { namespace: segments, name: last };
}

export function funcCall(
  name: string | FuncName,
  args: readonly ExpressionLike[] = [],
  expandFinal = false
): ExpressionOf<"FuncCall"> {
  if (expandFinal && args.length === 0) {
    throw new InvalidNodeError("Cannot expand the final argument of no arguments");
  }
  return {
    kind: "FuncCall",
    name: funcName(name),
    args: args.map(toExpression),
    expandFinal,
  };
}

// ===== Operations =====

export function unary(
  operator: UnaryOperator,
  operand: ExpressionLike
): ExpressionOf<"Unary"> {
  return { kind: "Unary", operator, operand: toExpression(operand) };
}

export function binary(
  left: ExpressionLike,
  operator: BinaryOperator,
  right: ExpressionLike
): ExpressionOf<"Binary"> {
  return {
    kind: "Binary",
    operator,
    left: toExpression(left),
    right: toExpression(right),
  };
}

export function parenthesis(inner: ExpressionLike): ExpressionOf<"Parenthesis"> {
  return { kind: "Parenthesis", inner: toExpression(inner) };
}

export function conditional(
  condition: ExpressionLike,
  trueExpr: ExpressionLike,
  falseExpr: ExpressionLike
): ExpressionOf<"Conditional"> {
  return {
    kind: "Conditional",
    condition: toExpression(condition),
    trueExpr: toExpression(trueExpr),
    falseExpr: toExpression(falseExpr),
  };
}

// ===== Templates =====

export function literal(value: string): TemplateElement {
  return { kind: "Literal", value };
}

export function interpolation(
  expression: ExpressionLike,
  strip: Strip = NO_STRIP
): TemplateElement {
  return { kind: "Interpolation", expression: toExpression(expression), strip };
}

/**
 * A quoted template. Adjacent literals are merged, and a template that is
 * a single literal (or empty) is a plain string, as the parser reads it.
 */
export function template(
  elements: readonly TemplateElement[]
): ExpressionOf<"Template"> | ExpressionOf<"String"> {
  const merged = mergeLiterals(elements);
  const [only, ...rest] = merged;
  if (!only) {
    return string("");
  }
  if (rest.length === 0 && only.kind === "Literal") {
    return string(only.value);
  }
  const tpl: Template = { elements: merged };
  validateSequenceOpeners(tpl, false);
  return { kind: "Template", template: tpl };
}

/**
 * A heredoc. Non-empty content must end with a newline and must not
 * contain a line consisting of the delimiter alone.
 */
export function heredoc(
  delimiter: string | Identifier,
  content: string | readonly TemplateElement[],
  options: { indented?: boolean } = {}
): ExpressionOf<"Heredoc"> {
  const id = ident(delimiter);
  const elements =
    typeof content === "string" ? mergeLiterals([literal(content)]) : mergeLiterals(content);
  const tpl: Template = { elements };
  validateHeredoc(id, tpl);
  validateSequenceOpeners(tpl, false);
  return {
    kind: "Heredoc",
    delimiter: id,
    indented: options.indented ?? false,
    template: tpl,
  };
}

function validateHeredoc(delimiter: Identifier, tpl: Template): void {
  const last = tpl.elements[tpl.elements.length - 1];
  if (last && !(last.kind === "Literal" && last.value.endsWith("\n"))) {
    throw new InvalidNodeError("Heredoc content must end with a newline");
  }
  let atLineStart = true;
  for (const element of tpl.elements) {
    if (element.kind !== "Literal") {
      atLineStart = false;
      continue;
    }
    const lines = element.value.split("\n");
    lines.forEach((line, i) => {
      const complete = i < lines.length - 1;
      const startsLine = i > 0 || atLineStart;
      if (complete && startsLine && isClosingLine(line, delimiter)) {
        throw new InvalidNodeError(
          `Heredoc content contains its delimiter ${delimiter.name}`
        );
      }
    });
    atLineStart = element.value.endsWith("\n");
  }
}

function mergeLiterals(elements: readonly TemplateElement[]): TemplateElement[] {
  const result: TemplateElement[] = [];
  for (const element of elements) {
    if (element.kind !== "Literal") {
      result.push(element);
      continue;
    }
    if (element.value === "") continue;
    const last = result[result.length - 1];
    if (last && last.kind === "Literal") {
      result[result.length - 1] = literal(last.value + element.value);
    } else {
      result.push(element);
    }
  }
  return result;
}

/**
 * A literal ending in `$` right before `${`, or in `%` right before `%{`,
 * would be written as the escape `$${` or `%%{` and read back as text.
 * `closedByDirective` marks a nested template that ends at `%{ else }`,
 * `%{ endif }` or `%{ endfor }`.
 */
function validateSequenceOpeners(tpl: Template, closedByDirective: boolean): void {
  tpl.elements.forEach((element, i) => {
    switch (element.kind) {
      case "Literal": {
        const next = tpl.elements[i + 1];
        const nextOpener =
          next === undefined
            ? closedByDirective
              ? "%"
              : undefined
            : next.kind === "Interpolation"
              ? "$"
              : next.kind === "Literal"
                ? undefined
                : "%";
        if (nextOpener !== undefined && element.value.endsWith(nextOpener)) {
          throw new InvalidNodeError(
            `Template literal ${JSON.stringify(element.value)} cannot end in "${nextOpener}" before a template sequence`
          );
        }
        return;
      }
      case "Interpolation":
        return;
      case "IfDirective":
        validateSequenceOpeners(element.then, true);
        if (element.else) {
          validateSequenceOpeners(element.else, true);
        }
        return;
      case "ForDirective":
        validateSequenceOpeners(element.template, true);
        return;
    }
  });
}

function isClosingLine(line: string, delimiter: Identifier): boolean {
  return line.replace(/^[ \t]+/, "").replace(/\r$/, "") === delimiter.name;
}

// ===== Conversion =====

export function toExpression(value: ExpressionLike): Expression {
  if (value === null) return nullValue();
  if (typeof value === "boolean") return bool(value);
  if (typeof value === "string") return string(value);
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new InvalidNodeError(`Cannot represent ${value} as a number`);
    }
    return value < 0 ? unary("-", number(-value)) : number(value);
  }
  if (isExpressionList(value)) return array(value);
  return value;
}

function isExpressionList(
  value: ExpressionLike
): value is readonly ExpressionLike[] {
  return Array.isArray(value);
}

function isEntryList(
  items:
    | Readonly<Record<string, ExpressionLike>>
    | ReadonlyArray<readonly [string | ObjectKey, ExpressionLike]>
): items is ReadonlyArray<readonly [string | ObjectKey, ExpressionLike]> {
  return Array.isArray(items);
}

// ===== Fluent builders =====

/**
 * Accumulates structures for a body.
 */
export class BodyBuilder {
  private readonly structures: Structure[] = [];

  add(structure: Structure): this {
    this.structures.push(structure);
    return this;
  }

  addAttribute(key: string | Identifier, value: ExpressionLike): this {
    return this.add(attribute(key, value));
  }

  addBlock(value: Block | BlockBuilder): this {
    return this.add(value instanceof BlockBuilder ? value.build() : value);
  }

  build(): Body {
    return { structures: [...this.structures] };
  }
}

export class BlockBuilder {
  private readonly identifier: Identifier;
  private readonly labels: BlockLabel[] = [];
  private readonly body = new BodyBuilder();

  constructor(identifier: string | Identifier) {
    this.identifier = ident(identifier);
  }

  addLabel(value: string | BlockLabel): this {
    this.labels.push(toLabel(value));
    return this;
  }

  addLabels(values: ReadonlyArray<string | BlockLabel>): this {
    for (const value of values) {
      this.addLabel(value);
    }
    return this;
  }

  addAttribute(key: string | Identifier, value: ExpressionLike): this {
    this.body.addAttribute(key, value);
    return this;
  }

  addBlock(value: Block | BlockBuilder): this {
    this.body.addBlock(value);
    return this;
  }

  add(structure: Structure): this {
    this.body.add(structure);
    return this;
  }

  build(): Block {
    return {
      kind: "Block",
      identifier: this.identifier,
      labels: [...this.labels],
      body: this.body.build(),
    };
  }
}

export class FuncCallBuilder {
  private readonly name: FuncName;
  private readonly args: Expression[] = [];
  private expand = false;

  constructor(name: string | FuncName) {
    this.name = funcName(name);
  }

  arg(value: ExpressionLike): this {
    this.args.push(toExpression(value));
    return this;
  }

  expandFinal(expand = true): this {
    this.expand = expand;
    return this;
  }

  build(): ExpressionOf<"FuncCall"> {
    return funcCall(this.name, this.args, this.expand);
  }
}
