import { describe, expect, test } from "vitest";
import {
  BlockBuilder,
  BodyBuilder,
  FuncCallBuilder,
  Identifier,
  InvalidIdentifierError,
  InvalidNodeError,
  KEYWORDS,
  advancePosition,
  array,
  attribute,
  block,
  funcCall,
  funcName,
  heredoc,
  identLabel,
  interpolation,
  isBody,
  isKeyword,
  isStructure,
  label,
  labelText,
  legacyIndex,
  literal,
  number,
  object,
  objectKey,
  string,
  template,
  toExpression,
  traversal,
  utf8Length,
  variable,
} from "../src/index.ts";

describe("Identifier", () => {
  test("accepts letters, digits, underscores and dashes", () => {
    for (const name of ["foo", "_foo", "foo-bar", "a1", "ünïcode"]) {
      expect(new Identifier(name).name).toBe(name);
    }
  });

  test("rejects strings outside the identifier grammar", () => {
    for (const name of ["", "1abc", "-foo", "foo bar", "a.b"]) {
      expect(Identifier.isValid(name)).toBe(false);
      expect(() => new Identifier(name)).toThrow(InvalidIdentifierError);
    }
  });

  test("names the rejected value", () => {
    expect(() => new Identifier("1abc")).toThrow('Invalid identifier "1abc"');
  });

  test("converts to its name", () => {
    expect(String(new Identifier("web"))).toBe("web");
  });
});

describe("keywords", () => {
  test("are the literal keywords", () => {
    expect(KEYWORDS).toEqual(["true", "false", "null"]);
    expect(isKeyword("null")).toBe(true);
    expect(isKeyword("for")).toBe(false);
  });
});

describe("positions", () => {
  test("utf8Length counts encoded bytes", () => {
    expect(utf8Length("a")).toBe(1);
    expect(utf8Length("é")).toBe(2);
    expect(utf8Length("€")).toBe(3);
    expect(utf8Length("😀")).toBe(4);
  });

  test("advancePosition walks code points and lines", () => {
    const start = { offset: 0, line: 1, column: 1 };

    expect(advancePosition(start, "ab\né")).toEqual({
      offset: 5,
      line: 2,
      column: 2,
    });
  });
});

describe("builders", () => {
  test("attribute converts plain values", () => {
    expect(attribute("count", [1, "two", true, null])).toEqual({
      kind: "Attribute",
      key: new Identifier("count"),
      value: {
        kind: "Array",
        elements: [
          { kind: "Number", value: "1" },
          { kind: "String", value: "two" },
          { kind: "Bool", value: true },
          { kind: "Null" },
        ],
      },
    });
  });

  test("negative numbers become a negation", () => {
    expect(toExpression(-2.5)).toEqual({
      kind: "Unary",
      operator: "-",
      operand: { kind: "Number", value: "2.5" },
    });
  });

  test("number rejects literals the grammar cannot spell", () => {
    expect(() => number("-1")).toThrow(InvalidNodeError);
    expect(() => number("1.")).toThrow(InvalidNodeError);
    expect(() => toExpression(Number.NaN)).toThrow(InvalidNodeError);
    expect(number("1e10").value).toBe("1e10");
  });

  test("block labels default to quoted strings", () => {
    const built = block("resource", ["aws_instance", identLabel("web")]);

    expect(built.labels).toEqual([
      { kind: "String", value: "aws_instance" },
      { kind: "Identifier", name: new Identifier("web") },
    ]);
    expect(built.labels.map(labelText)).toEqual(["aws_instance", "web"]);
  });

  test("object keys become identifiers where valid", () => {
    expect(object({ name: "a", "not valid": "b" }).items.map((i) => i.key)).toEqual([
      { kind: "Identifier", name: new Identifier("name") },
      { kind: "Expression", expression: string("not valid") },
    ]);
  });

  test("a variable key is stored as an identifier key", () => {
    expect(objectKey(variable("foo"))).toEqual({
      kind: "Identifier",
      name: new Identifier("foo"),
    });
  });

  test("variable rejects literal keywords", () => {
    expect(() => variable("true")).toThrow(InvalidNodeError);
  });

  test("traversal needs an operator", () => {
    expect(() => traversal(variable("a"), [])).toThrow(InvalidNodeError);
  });

  test("legacyIndex needs a non-negative integer", () => {
    expect(() => legacyIndex(-1)).toThrow(InvalidNodeError);
    expect(() => legacyIndex(1.5)).toThrow(InvalidNodeError);
    expect(legacyIndex(0)).toEqual({ kind: "LegacyIndex", index: 0 });
  });

  test("funcName splits namespaces", () => {
    expect(funcName("provider::aws::arn_parse")).toEqual({
      namespace: [new Identifier("provider"), new Identifier("aws")],
      name: new Identifier("arn_parse"),
    });
  });

  test("funcCall cannot expand a missing final argument", () => {
    expect(() => funcCall("f", [], true)).toThrow(InvalidNodeError);
  });

  test("heredoc content must end with a newline", () => {
    expect(() => heredoc("EOT", "no newline")).toThrow(InvalidNodeError);
    expect(heredoc("EOT", "").template.elements).toEqual([]);
  });

  test("heredoc content cannot contain its closing line", () => {
    expect(() => heredoc("EOT", "a\n  EOT\nb\n")).toThrow(
      "Heredoc content contains its delimiter EOT"
    );
    expect(() =>
      heredoc("EOT", [interpolation(variable("x")), literal("EOT\n")])
    ).not.toThrow();
  });
});

describe("template", () => {
  const x = variable("x");

  test("merges adjacent literals", () => {
    expect(
      template([literal("a"), literal(""), literal("b"), interpolation(x), literal("c")])
    ).toEqual({
      kind: "Template",
      template: {
        elements: [literal("ab"), interpolation(x), literal("c")],
      },
    });
  });

  test("reads a lone literal as a string", () => {
    expect(template([literal("a"), literal("b")])).toEqual(string("ab"));
    expect(template([])).toEqual(string(""));
    expect(template([literal("")])).toEqual(string(""));
  });

  test("rejects a literal that would merge into the next sequence", () => {
    expect(() => template([literal("a$"), interpolation(x)])).toThrow(
      'Template literal "a$" cannot end in "$" before a template sequence'
    );
    expect(() =>
      template([
        literal("50%"),
        {
          kind: "ForDirective",
          valueVar: new Identifier("v"),
          collection: x,
          template: { elements: [literal("100%")] },
          forStrip: { start: false, end: false },
          endforStrip: { start: false, end: false },
        },
      ])
    ).toThrow(InvalidNodeError);
    expect(() =>
      heredoc("EOT", [literal("cost $"), interpolation(x), literal("\n")])
    ).toThrow(InvalidNodeError);
  });

  test("accepts openers that cannot merge", () => {
    expect(() => template([literal("a%"), interpolation(x), literal("$")])).not.toThrow();
  });

  test("heredoc merges its literals", () => {
    expect(heredoc("EOT", [literal("a"), literal("\n")]).template.elements).toEqual([
      literal("a\n"),
    ]);
  });
});

describe("fluent builders", () => {
  test("BlockBuilder and BodyBuilder assemble a document", () => {
    const document = new BodyBuilder()
      .addAttribute("region", "eu-west-1")
      .addBlock(
        new BlockBuilder("resource")
          .addLabels(["aws_instance", "web"])
          .addAttribute("ami", "ami-123")
          .addBlock(new BlockBuilder("tags").addAttribute("team", "core"))
      )
      .build();

    expect(document).toEqual({
      structures: [
        attribute("region", "eu-west-1"),
        block(
          "resource",
          ["aws_instance", "web"],
          [attribute("ami", "ami-123"), block("tags", [], [attribute("team", "core")])]
        ),
      ],
    });
    expect(isBody(document)).toBe(true);
    expect(isStructure(attribute("a", 1))).toBe(true);
    expect(isStructure(string("a"))).toBe(false);
  });

  test("FuncCallBuilder collects arguments", () => {
    const call = new FuncCallBuilder("concat")
      .arg(array(["a"]))
      .arg(variable("rest"))
      .expandFinal()
      .build();

    expect(call).toEqual(
      funcCall("concat", [array(["a"]), variable("rest")], true)
    );
  });

  test("label builds a quoted label", () => {
    expect(label("x")).toEqual({ kind: "String", value: "x" });
  });
});
