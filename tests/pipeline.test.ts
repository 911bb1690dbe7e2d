/**
 * End-to-end tests for the stub pipeline
 */

import { describe, it, expect } from "@jest/globals";
import {
  binary,
  block,
  call,
  classDecl,
  classLiteral,
  compilationUnit,
  CompilationUnit,
  dotted,
  exprStmt,
  fieldAccess,
  forEach,
  fragment,
  ImportDeclaration,
  ifStmt,
  importDecl,
  lit,
  localVar,
  methodDecl,
  MemberDeclaration,
  name,
  namedType,
  newObject,
  param,
  ret,
  switchCase,
  switchStmt,
  throwStmt,
  tryStmt,
} from "../tooling/lib/ast";
import { AmbiguousResolutionError } from "../tooling/lib/diagnostics";
import { Logger } from "../tooling/lib/logger";
import { StubPipeline, stripSynthetic } from "../tooling/lib/pipeline";
import { describePlan } from "../tooling/lib/plans";
import { formatShape } from "../tooling/lib/type-shapes";
import { SynthesisOptions } from "../tooling/lib/types";

function pipeline(options: Partial<SynthesisOptions> = {}): StubPipeline {
  return new StubPipeline({ options, logger: new Logger("debug", false) });
}

function useUnit(members: MemberDeclaration[], imports: ImportDeclaration[] = []): CompilationUnit {
  return compilationUnit("p", [classDecl("Use", { members })], imports);
}

function textOf(result: ReturnType<StubPipeline["run"]>, path: string): string | undefined {
  return result.sources.find((source) => source.path === path)?.text;
}

describe("StubPipeline", () => {
  describe("type kinds", () => {
    it("should synthesize an enum from switch labels", () => {
      const model = fragment([
        useUnit([
          methodDecl("int", "f", [param("x", "X")], [
            switchStmt(name("x"), [switchCase([name("RED")]), switchCase([name("GREEN")])]),
            ret(call(name("x"), "ordinal")),
          ]),
        ]),
      ]);

      const result = pipeline().run({ model });

      expect(result.plan.types.map((t) => [t.qualifiedName, t.kind, t.enumConstants])).toEqual([
        ["p.X", "ENUM", ["RED", "GREEN"]],
      ]);
      expect(result.plan.methods).toEqual([]);
      expect(result.plan.fields).toEqual([]);
      expect(result.plan.constructors).toEqual([]);
      expect(textOf(result, "p/X.java")).toBe("package p;\n\npublic enum X {\n    RED, GREEN\n}\n");
    });

    it("should synthesize an enum from qualified switch labels", () => {
      const model = fragment([
        useUnit([
          methodDecl("void", "f", [param("x", "X")], [
            switchStmt(name("x"), [switchCase([dotted("X.RED")]), switchCase([dotted("X.GREEN")])]),
          ]),
        ]),
      ]);

      const result = pipeline().run({ model });

      expect(result.plan.types.map((t) => [t.qualifiedName, t.kind, t.enumConstants])).toEqual([
        ["p.X", "ENUM", ["RED", "GREEN"]],
      ]);
      expect(result.plan.fields).toEqual([]);
      expect(textOf(result, "p/X.java")).toBe("package p;\n\npublic enum X {\n    RED, GREEN\n}\n");
    });

    it("should keep constants of an int switch on a class", () => {
      const model = fragment([
        useUnit([
          methodDecl("void", "f", [param("k", "int")], [
            switchStmt(name("k"), [switchCase([dotted("A.ONE")]), switchCase([dotted("B.TWO")])]),
          ]),
        ]),
      ]);

      const result = pipeline().run({ model });
      const one = result.plan.fields.find((f) => f.name === "ONE");

      expect(result.plan.types.map((t) => [t.qualifiedName, t.kind]).sort()).toEqual([
        ["p.A", "CLASS"],
        ["p.B", "CLASS"],
      ]);
      expect(one && [describePlan(one), one.isStatic, one.isFinal]).toEqual(["int p.A#ONE", true, true]);
      expect((textOf(result, "p/A.java") ?? "").split("\n").slice(0, 3)).toEqual(["package p;", "", "public class A {"]);
    });

    it("should synthesize an interface for an anonymous subclass", () => {
      const model = fragment([
        useUnit([
          methodDecl("void", "f", [], [
            localVar("X", "x", newObject("X", [], [methodDecl("int", "go", [], [ret(lit.int(1))])])),
          ]),
        ]),
      ]);

      const result = pipeline().run({ model });

      expect(result.plan.types.map((t) => [t.qualifiedName, t.kind])).toEqual([["p.X", "INTERFACE"]]);
      expect(result.plan.methods.map((m) => [m.name, formatShape(m.returnType), m.paramTypes.length, m.isAbstract])).toEqual([
        ["go", "int", 0, true],
      ]);
      expect(result.plan.constructors).toEqual([]);
      expect(textOf(result, "p/X.java")).toBe("package p;\n\npublic interface X {\n    int go();\n}\n");
    });

    it("should extend RuntimeException for a thrown type", () => {
      const model = fragment([
        useUnit([methodDecl("void", "f", [], [throwStmt(newObject("Failure", [lit.string("bad")]))])]),
      ]);

      const result = pipeline().run({ model });
      const failure = result.plan.types.find((t) => t.qualifiedName === "p.Failure");

      expect(failure?.kind).toBe("CLASS");
      expect(failure?.supertypes.map((s) => [s.relation, formatShape(s.shape)])).toEqual([
        ["extends", "java.lang.RuntimeException"],
      ]);
      expect(result.plan.constructors.map((c) => c.paramTypes.map((p) => formatShape(p)))).toEqual([["java.lang.String"]]);
    });

    it("should make resources closeable", () => {
      const model = fragment([
        useUnit([
          methodDecl("void", "f", [], [tryStmt(block(), [], { resources: [localVar("Conn", "c", newObject("Conn"))] })]),
        ]),
      ]);

      const result = pipeline().run({ model });
      const conn = result.plan.types.find((t) => t.qualifiedName === "p.Conn");

      expect(conn?.supertypes.map((s) => formatShape(s.shape))).toContain("java.lang.AutoCloseable");
      expect(result.plan.methods.map((m) => [m.owner, m.name, formatShape(m.returnType)])).toContainEqual([
        "p.Conn",
        "close",
        "void",
      ]);
    });

    it("should make iterated types iterable over the loop variable", () => {
      const model = fragment([
        useUnit([methodDecl("void", "f", [param("bag", "Bag")], [forEach("String", "s", name("bag"), block())])]),
      ]);

      const result = pipeline().run({ model });
      const bag = result.plan.types.find((t) => t.qualifiedName === "p.Bag");
      const iterator = result.plan.methods.find((m) => m.owner === "p.Bag" && m.name === "iterator");

      expect(bag?.supertypes.map((s) => formatShape(s.shape))).toContain("java.lang.Iterable<java.lang.String>");
      expect(iterator && formatShape(iterator.returnType)).toBe("java.util.Iterator<java.lang.String>");
    });
  });

  describe("records", () => {
    const model = () =>
      fragment([
        useUnit([
          methodDecl("String", "f", [param("pt", "Point")], [
            localVar("int", "x", call(name("pt"), "x")),
            ret(call(name("pt"), "toString")),
          ]),
        ]),
      ]);

    it("should plan a record when the target version has them", () => {
      const result = pipeline({ targetLanguageVersion: 17 }).run({ model: model() });
      const point = result.plan.types.find((t) => t.qualifiedName === "p.Point");

      expect(point?.kind).toBe("RECORD");
      expect(point?.recordComponents.map((c) => [c.name, formatShape(c.type)])).toEqual([["x", "int"]]);
      expect(result.plan.methods).toEqual([]);
    });

    it("should not plan a record whose accessor reads conflict", () => {
      const conflicting = fragment([
        useUnit([
          methodDecl("String", "f", [param("pt", "Point")], [
            localVar("int", "x", call(name("pt"), "x")),
            localVar("String", "y", call(name("pt"), "x")),
            ret(call(name("pt"), "toString")),
          ]),
        ]),
      ]);

      const result = pipeline({ targetLanguageVersion: 17, preserveGenerics: false }).run({ model: conflicting });

      expect(result.plan.types.map((t) => [t.qualifiedName, t.kind])).toEqual([["p.Point", "CLASS"]]);
      expect(result.plan.methods.map(describePlan)).toEqual(["java.lang.Object p.Point#x()"]);
      expect(result.plan.diagnostics).toContainEqual({
        code: "ConflictingEvidence",
        message: "method p.Point#x planned by signature-inferrer: result expected as int and java.lang.String",
        identity: "method p.Point#x",
        kept: "signature-inferrer",
        discarded: [],
      });
    });

    it("should fall back to a class with an accessor on older versions", () => {
      const result = pipeline({ targetLanguageVersion: 11 }).run({ model: model() });
      const point = result.plan.types.find((t) => t.qualifiedName === "p.Point");

      expect(point?.kind).toBe("CLASS");
      expect(result.plan.methods.map((m) => [m.name, formatShape(m.returnType)])).toEqual([["x", "int"]]);
    });
  });

  describe("members", () => {
    it("should plan one overload per arity", () => {
      const model = fragment([
        useUnit([
          methodDecl("void", "f", [param("h", "Helper")], [
            exprStmt(call(name("h"), "put", [lit.int(1)])),
            exprStmt(call(name("h"), "put", [lit.int(1), lit.string("a")])),
          ]),
        ]),
      ]);

      const result = pipeline().run({ model });

      expect(result.plan.methods.map(describePlan)).toEqual([
        "void p.Helper#put(int)",
        "void p.Helper#put(int, java.lang.String)",
      ]);
    });

    it("should merge parameters through a shared generic supertype", () => {
      const model = fragment([
        useUnit([
          methodDecl("void", "f", [param("h", "Helper")], [
            exprStmt(call(name("h"), "put", [lit.string("a")])),
            exprStmt(call(name("h"), "put", [lit.int(3)])),
          ]),
        ]),
      ]);

      const result = pipeline().run({ model });

      expect(result.plan.methods.map(describePlan)).toEqual(["void p.Helper#put(java.lang.Comparable<?>)"]);
    });

    it("should report conflicting field reads", () => {
      const model = fragment([
        useUnit([
          methodDecl("void", "f", [param("h", "Helper")], [
            localVar("int", "a", fieldAccess(name("h"), "v")),
            localVar("String", "b", fieldAccess(name("h"), "v")),
          ]),
        ]),
      ]);

      const result = pipeline().run({ model });

      expect(result.plan.fields.map(describePlan)).toEqual(["int p.Helper#v"]);
      expect(result.plan.diagnostics).toContainEqual({
        code: "ConflictingEvidence",
        message: "field p.Helper#v planned by signature-inferrer: value expected as int and java.lang.String",
        identity: "field p.Helper#v",
        kept: "signature-inferrer",
        discarded: [],
      });
    });

    it("should nest a member type inside its synthesized owner", () => {
      const model = fragment([
        useUnit([methodDecl("void", "f", [], [exprStmt(call(newObject("Outer.Inner"), "set", [lit.int(1)]))])]),
      ]);

      const result = pipeline().run({ model });
      const synthetic = result.sources.filter((source) => source.synthetic);
      const lines = (textOf(result, "p/Outer.java") ?? "").split("\n");

      expect(result.plan.types.map((t) => [t.qualifiedName, t.enclosing])).toEqual([
        ["p.Outer", undefined],
        ["p.Outer.Inner", "p.Outer"],
      ]);
      expect(result.plan.methods.map(describePlan)).toEqual(["void p.Outer.Inner#set(int)"]);
      expect(result.plan.constructors.map(describePlan)).toEqual(["p.Outer.Inner()"]);
      expect(synthetic.map((source) => source.path)).toEqual(["p/Outer.java"]);
      expect(lines).toContain("    public static class Inner {");
      expect(lines).toContain("        public Inner() {");
      expect(lines).toContain("        public void set(int arg0) {");
    });
  });

  describe("shims", () => {
    const logging = () =>
      fragment([
        compilationUnit(
          "p",
          [
            classDecl("Foo", {
              members: [
                methodDecl("void", "f", [param("obj", "Object")], [
                  localVar("Logger", "log", call(name("LoggerFactory"), "getLogger", [classLiteral(namedType("Foo"))])),
                  exprStmt(call(name("log"), "info", [lit.string("msg {}"), name("obj")])),
                ]),
              ],
            }),
          ],
          [importDecl("org.slf4j.Logger"), importDecl("org.slf4j.LoggerFactory")]
        ),
      ]);

    it("should emit the catalog blueprint with every overload", () => {
      const result = pipeline().run({ model: logging() });
      const info = result.plan.methods.filter((m) => m.owner === "org.slf4j.Logger" && m.name === "info");

      expect(result.plan.types.map((t) => [t.qualifiedName, t.kind])).toEqual([
        ["org.slf4j.Logger", "INTERFACE"],
        ["org.slf4j.LoggerFactory", "CLASS"],
      ]);
      expect(result.plan.methods.filter((m) => m.owner === "org.slf4j.Logger")).toHaveLength(31);
      expect(result.plan.methods.filter((m) => m.owner === "org.slf4j.LoggerFactory")).toHaveLength(2);
      expect(info.map(describePlan)).toEqual([
        "void org.slf4j.Logger#info(java.lang.String)",
        "void org.slf4j.Logger#info(java.lang.String, java.lang.Object)",
        "void org.slf4j.Logger#info(java.lang.String, java.lang.Object, java.lang.Object)",
        "void org.slf4j.Logger#info(java.lang.String, java.lang.Object[])",
        "void org.slf4j.Logger#info(java.lang.String, java.lang.Throwable)",
      ]);
      expect(info.filter((m) => m.varargs)).toHaveLength(1);

      const resolution = result.audit.getResolution("method org.slf4j.Logger#info");
      expect(resolution?.kept).toBe("shim-matcher");
      expect(resolution?.keptCount).toBe(5);
    });

    it("should keep only referenced members under minimal stubbing", () => {
      const result = pipeline({ minimalStubbing: true }).run({ model: logging() });

      expect(result.plan.methods.filter((m) => m.owner === "org.slf4j.Logger").map((m) => m.name)).toEqual(
        Array(5).fill("info")
      );
      expect(result.plan.methods).toHaveLength(7);
    });

    it("should emit a relocated blueprint under the referenced name", () => {
      const model = fragment([
        useUnit(
          [
            methodDecl("void", "f", [param("s", "String")], [
              ifStmt(call(name("StringUtils"), "isEmpty", [name("s")]), ret()),
            ]),
          ],
          [importDecl("org.apache.commons.lang.StringUtils")]
        ),
      ]);

      const result = pipeline().run({ model });
      const type = result.plan.types.find((t) => t.simpleName === "StringUtils");

      expect(type?.qualifiedName).toBe("org.apache.commons.lang.StringUtils");
      expect(type?.packageName).toBe("org.apache.commons.lang");
      expect(result.plan.methods.every((m) => m.owner === "org.apache.commons.lang.StringUtils")).toBe(true);
      expect(result.plan.methods.map((m) => m.name)).toContain("isEmpty");
      expect(result.sources.filter((s) => s.synthetic).map((s) => s.path)).toEqual([
        "org/apache/commons/lang/StringUtils.java",
      ]);
    });
  });

  describe("ambiguity", () => {
    const model = () =>
      fragment([
        useUnit(
          [methodDecl("void", "f", [param("w", "Widget")], [exprStmt(call(name("w"), "spin"))])],
          [importDecl("a", { onDemand: true }), importDecl("b", { onDemand: true })]
        ),
      ]);

    it("should fail when configured to", () => {
      expect(() => pipeline({ failOnAmbiguity: true }).run({ model: model() })).toThrow(AmbiguousResolutionError);
    });

    it("should pick the first candidate and report it otherwise", () => {
      const result = pipeline().run({ model: model() });

      expect(result.plan.types.map((t) => t.qualifiedName)).toEqual(["a.Widget"]);
      expect(result.report.ambiguities).toEqual([
        { simpleName: "Widget", unit: "p/Use.java", chosen: "a.Widget", candidates: ["a.Widget", "b.Widget"] },
      ]);
    });
  });

  describe("context", () => {
    const model = () =>
      fragment([useUnit([methodDecl("void", "f", [param("h", "Helper")], [exprStmt(call(name("h"), "go"))])])]);

    it("should degrade when the context loader throws", () => {
      const result = pipeline().run({
        model: model(),
        context: () => {
          throw new Error("context store offline");
        },
      });

      expect(result.report.degraded).toBe("context store offline");
      expect(result.plan.diagnostics).toContainEqual({
        code: "ContextBuildDegraded",
        message: "Context model unavailable, continuing with the fragment only: context store offline",
        cause: "context store offline",
      });
      expect(result.plan.methods.map(describePlan)).toEqual(["void p.Helper#go()"]);
    });

    it("should degrade on a cyclic supertype chain", () => {
      const context = [
        compilationUnit("q", [classDecl("A", { superclass: namedType("B") })]),
        compilationUnit("q", [classDecl("B", { superclass: namedType("A") })]),
      ];

      const result = pipeline().run({ model: model(), context });

      expect(result.report.degraded).toBe("cyclic supertype chain: q.A -> q.B -> q.A");
      expect(result.plan.types.map((t) => t.qualifiedName)).toEqual(["p.Helper"]);
    });

    it("should retry fragment-only when a context declaration cannot be read", () => {
      const stored = [compilationUnit("p", [classDecl("Helper", { members: [methodDecl("void", "go")] })])];
      // a context store that lost the parameter lists of its methods
      const context: CompilationUnit[] = JSON.parse(JSON.stringify(stored), (key, value) =>
        key === "parameters" ? undefined : value
      );

      const result = pipeline().run({ model: model(), context });

      expect(typeof result.report.degraded).toBe("string");
      expect(result.plan.diagnostics.map((d) => d.code)).toContain("ContextBuildDegraded");
      expect(result.plan.methods.map(describePlan)).toEqual(["void p.Helper#go()"]);
      expect(result.sources.filter((s) => s.synthetic).map((s) => s.path)).toEqual(["p/Helper.java"]);
    });

    it("should treat context types as already declared", () => {
      const context = [compilationUnit("p", [classDecl("Helper", { members: [methodDecl("void", "go")] })])];

      const result = pipeline().run({ model: model(), context });

      expect(result.plan.types).toEqual([]);
      expect(result.plan.methods).toEqual([]);
      expect(result.report.degraded).toBeUndefined();
    });
  });

  describe("normalization", () => {
    it("should fold an unqualified name into the nested type its sites can see", () => {
      const model = fragment([
        useUnit([
          methodDecl("void", "f", [], [
            localVar("Helper", "h", newObject("Helper")),
            exprStmt(call(name("h"), "run")),
          ]),
        ]),
        compilationUnit("p", [
          classDecl("Other", {
            members: [methodDecl("void", "g", [param("x", "Use.Helper")], [exprStmt(call(name("x"), "stop"))])],
          }),
        ]),
      ]);

      const result = pipeline().run({ model });

      expect(result.merged).toEqual([{ from: "p.Helper", to: "p.Use.Helper" }]);
      expect(result.plan.types.map((t) => t.qualifiedName)).toEqual(["p.Use.Helper"]);
      expect(result.plan.methods.map(describePlan)).toEqual(["void p.Use.Helper#run()", "void p.Use.Helper#stop()"]);
      expect(result.sources.map((s) => s.path)).toEqual(["p/Use.java", "p/Other.java"]);
      expect((textOf(result, "p/Use.java") ?? "").split("\n")).toContain("    public static class Helper {");
    });

    it("should keep an unqualified type no other declaration can stand in for", () => {
      const model = fragment([
        useUnit([
          methodDecl("void", "f", [], [
            localVar("Helper", "h", newObject("Helper")),
            exprStmt(call(name("h"), "run")),
          ]),
        ]),
        compilationUnit("p", [classDecl("Other")]),
        compilationUnit("p", [
          classDecl("Client", {
            members: [methodDecl("void", "g", [param("x", "Other.Helper")], [exprStmt(call(name("x"), "stop"))])],
          }),
        ]),
      ]);

      const result = pipeline().run({ model });

      expect(result.merged).toEqual([]);
      expect(result.plan.types.map((t) => t.qualifiedName).sort()).toEqual(["p.Helper", "p.Other.Helper"]);
      expect(result.plan.methods.map(describePlan).sort()).toEqual(["void p.Helper#run()", "void p.Other.Helper#stop()"]);
      expect(textOf(result, "p/Helper.java")?.split("\n").slice(0, 3)).toEqual(["package p;", "", "public class Helper {"]);
    });
  });

  describe("idempotence", () => {
    it("should produce the same plan when run over its own output", () => {
      const model = fragment([
        useUnit([
          methodDecl("int", "f", [param("h", "Helper")], [
            ret(binary(call(name("h"), "size"), "+", lit.int(1))),
          ]),
        ]),
      ]);

      const first = pipeline().run({ model });
      const second = pipeline().run({ model: first.model });

      expect(second.plan).toEqual(first.plan);
      expect(second.sources.map((s) => s.text)).toEqual(first.sources.map((s) => s.text));
      const names = second.model.units.flatMap((unit) => unit.types.map((t) => `${unit.packageName}.${t.name}`));
      expect(new Set(names).size).toBe(names.length);
    });

    it("should strip everything a run synthesized", () => {
      const model = fragment([useUnit([methodDecl("void", "f", [param("h", "Helper")], [exprStmt(call(name("h"), "go"))])])]);

      const result = pipeline().run({ model });

      expect(result.model.units.map((u) => u.path)).toEqual(["p/Use.java", "p/Helper.java"]);
      expect(stripSynthetic(result.model).units.map((u) => u.path)).toEqual(["p/Use.java"]);
    });
  });
});
