export * from "./tokens";
export * from "./identifier";
export * from "./operators";
export * from "./builders";

import type { Identifier } from "./identifier";

// ===== Document =====

export type Body = {
  readonly structures: readonly Structure[];
};

export type Attribute = {
  readonly kind: "Attribute";
  readonly key: Identifier;
  readonly value: Expression;
};

/**
 * A block label is either a bare identifier or a quoted string. The
 * distinction survives formatting; `labelText` drops it.
 */
export type BlockLabel =
  | { readonly kind: "Identifier"; readonly name: Identifier }
  | { readonly kind: "String"; readonly value: string };

export type Block = {
  readonly kind: "Block";
  readonly identifier: Identifier;
  readonly labels: readonly BlockLabel[];
  readonly body: Body;
};

export type Structure = Attribute | Block;

export function labelText(label: BlockLabel): string {
  return label.kind === "Identifier" ? label.name.name : label.value;
}

// ===== Expressions =====

export type UnaryOperator = "-" | "!";

export type BinaryOperator =
  | "*"
  | "/"
  | "%"
  | "+"
  | "-"
  | "<"
  | "<="
  | ">"
  | ">="
  | "=="
  | "!="
  | "&&"
  | "||";

export type ObjectKey =
  | { readonly kind: "Identifier"; readonly name: Identifier }
  | { readonly kind: "Expression"; readonly expression: Expression };

export type ObjectItem = {
  readonly key: ObjectKey;
  readonly value: Expression;
};

export type TraversalOperator =
  | { readonly kind: "GetAttr"; readonly name: Identifier }
  | { readonly kind: "Index"; readonly index: Expression }
  | { readonly kind: "LegacyIndex"; readonly index: number }
  | { readonly kind: "AttrSplat" }
  | { readonly kind: "FullSplat" };

export type FuncName = {
  /** Namespace segments, as in `provider::aws::arn_parse`. */
  readonly namespace: readonly Identifier[];
  readonly name: Identifier;
};

/** Whitespace strip markers (`~`) on either side of a template sequence. */
export type Strip = {
  readonly start: boolean;
  readonly end: boolean;
};

export type TemplateElement =
  | { readonly kind: "Literal"; readonly value: string }
  | {
      readonly kind: "Interpolation";
      readonly expression: Expression;
      readonly strip: Strip;
    }
  | {
      readonly kind: "IfDirective";
      readonly condition: Expression;
      readonly then: Template;
      readonly else?: Template;
      readonly ifStrip: Strip;
      readonly elseStrip?: Strip;
      readonly endifStrip: Strip;
    }
  | {
      readonly kind: "ForDirective";
      readonly keyVar?: Identifier;
      readonly valueVar: Identifier;
      readonly collection: Expression;
      readonly template: Template;
      readonly forStrip: Strip;
      readonly endforStrip: Strip;
    };

export type Template = {
  readonly elements: readonly TemplateElement[];
};

export type Expression =
  | { readonly kind: "Null" }
  | { readonly kind: "Bool"; readonly value: boolean }
  | { readonly kind: "Number"; readonly value: string }
  | { readonly kind: "String"; readonly value: string }
  | { readonly kind: "Array"; readonly elements: readonly Expression[] }
  | { readonly kind: "Object"; readonly items: readonly ObjectItem[] }
  | { readonly kind: "Template"; readonly template: Template }
  | {
      readonly kind: "Heredoc";
      readonly delimiter: Identifier;
      /** `<<-` form, whose closing marker may be indented. */
      readonly indented: boolean;
      readonly template: Template;
    }
  | { readonly kind: "Variable"; readonly name: Identifier }
  | {
      readonly kind: "FuncCall";
      readonly name: FuncName;
      readonly args: readonly Expression[];
      /** Trailing `...` on the final argument. */
      readonly expandFinal: boolean;
    }
  | {
      readonly kind: "Traversal";
      readonly base: Expression;
      readonly operators: readonly TraversalOperator[];
    }
  | {
      readonly kind: "Unary";
      readonly operator: UnaryOperator;
      readonly operand: Expression;
    }
  | {
      readonly kind: "Binary";
      readonly operator: BinaryOperator;
      readonly left: Expression;
      readonly right: Expression;
    }
  | { readonly kind: "Parenthesis"; readonly inner: Expression }
  | {
      readonly kind: "Conditional";
      readonly condition: Expression;
      readonly trueExpr: Expression;
      readonly falseExpr: Expression;
    }
  | {
      readonly kind: "For";
      readonly keyVar?: Identifier;
      readonly valueVar: Identifier;
      readonly collection: Expression;
      /** Present for `{for ...}` object comprehensions. */
      readonly keyExpr?: Expression;
      readonly valueExpr: Expression;
      /** `...` grouping mode of object comprehensions. */
      readonly grouping: boolean;
      readonly condition?: Expression;
    };

export type ExpressionKind = Expression["kind"];

export type ExpressionOf<K extends ExpressionKind> = Extract<
  Expression,
  { kind: K }
>;

/** Any node the formatter accepts. */
export type Node = Body | Structure | Expression;

export function isBody(node: Node): node is Body {
  return "structures" in node;
}

export function isStructure(node: Node): node is Structure {
  return (
    "kind" in node && (node.kind === "Attribute" || node.kind === "Block")
  );
}

