/**
 * Test suite for source rendering
 */

import { describe, it, expect } from "@jest/globals";
import {
  binary,
  block,
  boundType,
  call,
  classDecl,
  compilationUnit,
  fieldDecl,
  fragment,
  ifStmt,
  importDecl,
  exprStmt,
  lit,
  methodDecl,
  name,
  param,
  ret,
  switchCase,
  switchStmt,
  typeDecl,
} from "../tooling/lib/ast";
import { NameSpeller, renderDeclaration, renderFragment, renderLiteral } from "../tooling/lib/renderer";

describe("renderLiteral", () => {
  it("should suffix numeric literals by kind", () => {
    expect(renderLiteral(lit.long(0))).toBe("0L");
    expect(renderLiteral(lit.float(0))).toBe("0.0f");
    expect(renderLiteral(lit.double(0))).toBe("0.0");
    expect(renderLiteral(lit.double(1.5))).toBe("1.5");
    expect(renderLiteral(lit.int(7))).toBe("7");
  });

  it("should escape text literals", () => {
    expect(renderLiteral(lit.char("\u0000"))).toBe("'\\0'");
    expect(renderLiteral(lit.char("'"))).toBe("'\\''");
    expect(renderLiteral(lit.string('say "hi"\n'))).toBe('"say \\"hi\\"\\n"');
    expect(renderLiteral(lit.null())).toBe("null");
  });
});

describe("NameSpeller", () => {
  const unit = compilationUnit(
    "p",
    [
      classDecl("Use", {
        members: [
          fieldDecl(boundType("q.Widget"), "w"),
          fieldDecl(boundType("r.Widget"), "v"),
          fieldDecl(boundType("r.Gadget"), "g"),
          fieldDecl(boundType("java.lang.String"), "s"),
          fieldDecl(boundType("p.Local.Inner"), "i"),
        ],
      }),
    ],
    [importDecl("q.Widget")]
  );
  const speller = new NameSpeller(unit);

  it("should use the simple name of an imported type", () => {
    expect(speller.spell("q.Widget")).toBe("Widget");
  });

  it("should qualify a type whose simple name is taken", () => {
    expect(speller.spell("r.Widget")).toBe("r.Widget");
  });

  it("should qualify a type the unit cannot see", () => {
    expect(speller.spell("r.Gadget")).toBe("r.Gadget");
  });

  it("should shorten implicitly visible types", () => {
    expect(speller.spell("java.lang.String")).toBe("String");
    expect(speller.spell("p.Local.Inner")).toBe("Local.Inner");
  });
});

describe("renderDeclaration", () => {
  it("should parenthesize by operator precedence", () => {
    const a = name("a");
    const b = name("b");
    const c = name("c");
    const unit = compilationUnit("", [
      classDecl("Calc", {
        members: [
          fieldDecl("int", "x", { initializer: binary(a, "-", binary(b, "-", c)) }),
          fieldDecl("int", "y", { initializer: binary(binary(a, "-", b), "-", c) }),
          methodDecl("int", "f", [param("a", "int"), param("b", "int"), param("c", "int")], [
            ret(binary(binary(a, "+", b), "*", c)),
          ]),
        ],
      }),
    ]);

    expect(renderDeclaration(unit, unit.types[0])).toBe(
      [
        "public class Calc {",
        "    private int x = a - (b - c);",
        "    private int y = a - b - c;",
        "",
        "    public int f(int a, int b, int c) {",
        "        return (a + b) * c;",
        "    }",
        "}",
        "",
      ].join("\n")
    );
  });

  it("should brace every branch", () => {
    const unit = compilationUnit("p", [
      classDecl("Flow", {
        members: [
          methodDecl("void", "f", [param("x", "int")], [
            ifStmt(binary(name("x"), ">", lit.int(0)), ret(), block([exprStmt(call(undefined, "g"))])),
          ]),
        ],
      }),
    ]);

    expect(renderDeclaration(unit, unit.types[0])).toBe(
      [
        "package p;",
        "",
        "public class Flow {",
        "    public void f(int x) {",
        "        if (x > 0) {",
        "            return;",
        "        } else {",
        "            g();",
        "        }",
        "    }",
        "}",
        "",
      ].join("\n")
    );
  });

  it("should indent switch case bodies", () => {
    const unit = compilationUnit("p", [
      classDecl("Pick", {
        members: [
          methodDecl("void", "f", [param("x", "int")], [
            switchStmt(name("x"), [switchCase([lit.int(1)]), switchCase([], [ret()])]),
          ]),
        ],
      }),
    ]);

    const lines = renderDeclaration(unit, unit.types[0]).split("\n");
    expect(lines.slice(4, 10)).toEqual([
      "        switch (x) {",
      "            case 1:",
      "                break;",
      "            default:",
      "                return;",
      "        }",
    ]);
  });

  it("should close an empty constant list before enum members", () => {
    const unit = compilationUnit("p", [
      typeDecl("enum", "Mode", {
        members: [fieldDecl("int", "LIMIT", { modifiers: ["public", "static", "final"], initializer: lit.int(0) })],
      }),
    ]);

    expect(renderDeclaration(unit, unit.types[0])).toBe(
      ["package p;", "", "public enum Mode {", "    ;", "", "    public static final int LIMIT = 0;", "}", ""].join("\n")
    );
  });
});

describe("renderFragment", () => {
  it("should emit one source per top-level type", () => {
    const model = fragment([
      compilationUnit("p", [classDecl("A"), classDecl("B")]),
      { ...compilationUnit("q", [classDecl("C")]), synthetic: true },
    ]);

    const sources = renderFragment(model);

    expect(sources.map((s) => [s.path, s.typeName, s.synthetic])).toEqual([
      ["p/A.java", "p.A", false],
      ["p/B.java", "p.B", false],
      ["q/C.java", "q.C", true],
    ]);
    expect(sources[2].text).toBe("package q;\n\npublic class C {\n}\n");
  });
});
