/**
 * Test suite for planning the abstract method of lambda and method reference targets
 */

import { describe, it, expect } from "@jest/globals";
import {
  binary,
  block,
  call,
  classDecl,
  compilationUnit,
  exprStmt,
  fragment,
  lambda,
  lit,
  localVar,
  MemberDeclaration,
  methodDecl,
  methodRef,
  name,
  param,
  ret,
  thisExpr,
} from "../tooling/lib/ast";
import { Logger } from "../tooling/lib/logger";
import { StubPipeline } from "../tooling/lib/pipeline";
import { describePlan } from "../tooling/lib/plans";

function run(members: MemberDeclaration[]): ReturnType<StubPipeline["run"]> {
  const pipeline = new StubPipeline({ logger: new Logger("debug", false) });
  return pipeline.run({ model: fragment([compilationUnit("p", [classDecl("Use", { members })])]) });
}

const len = methodDecl("int", "len", [param("s", "String")], [ret(call(name("s"), "length"))]);

describe("FunctionalInterfaceResolver", () => {
  describe("abstract method name", () => {
    it("should name the method after the first instance call", () => {
      const result = run([
        methodDecl("void", "take", [param("op", "Op")], [localVar("int", "n", call(name("op"), "eval", [lit.int(5)]))]),
        methodDecl("void", "f", [], [exprStmt(call(undefined, "take", [lambda(["v"], name("v"))]))]),
      ]);

      expect(result.plan.types.map((t) => [t.qualifiedName, t.kind])).toEqual([["p.Op", "INTERFACE"]]);
      expect(result.plan.methods.map(describePlan)).toEqual(["int p.Op#eval(int)"]);
    });

    it("should fall back to a name that fits the lambda shape", () => {
      const result = run([
        methodDecl("void", "f", [], [
          localVar("Task", "t", lambda([], block())),
          localVar("Maker", "m", lambda([], lit.string("x"))),
          localVar("Sink", "s", lambda(["x"], block())),
          localVar("Check", "c", lambda(["x"], lit.boolean(true))),
        ]),
      ]);

      expect(result.plan.methods.map(describePlan).sort()).toEqual([
        "boolean p.Check#test(java.lang.Object)",
        "java.lang.String p.Maker#get()",
        "void p.Sink#accept(java.lang.Object)",
        "void p.Task#run()",
      ]);
      expect(result.plan.methods.every((m) => m.isAbstract)).toBe(true);
    });
  });

  describe("evidence precedence", () => {
    it("should take the result from a lambda and fill parameters from a method reference", () => {
      const result = run([
        len,
        methodDecl("void", "f", [], [
          localVar("Fn", "a", lambda(["x"], lit.string("s"))),
          localVar("Fn", "b", methodRef(thisExpr(), "len")),
        ]),
      ]);

      expect(result.plan.methods.map(describePlan)).toEqual(["java.lang.String p.Fn#apply(java.lang.String)"]);
    });

    it("should not let a discarded call result make a value lambda void", () => {
      const result = run([
        methodDecl("void", "take", [param("c", "Callback")], [exprStmt(call(name("c"), "call", [lit.string("x")]))]),
        methodDecl("void", "f", [], [
          exprStmt(call(undefined, "take", [lambda(["s"], binary(name("s"), "+", lit.int(1)))])),
        ]),
      ]);

      expect(result.plan.methods.map(describePlan)).toEqual(["java.lang.Object p.Callback#call(java.lang.String)"]);
    });

    it("should report evidence dropped for a different arity", () => {
      const result = run([
        len,
        methodDecl("void", "f", [], [
          localVar("Fn", "a", lambda(["x", "y"], lit.int(2))),
          localVar("Fn", "b", methodRef(thisExpr(), "len")),
        ]),
      ]);

      expect(result.plan.methods.map(describePlan)).toEqual(["int p.Fn#apply(java.lang.Object, java.lang.Object)"]);
      expect(result.plan.diagnostics).toContainEqual({
        code: "ConflictingEvidence",
        message:
          "method p.Fn#apply planned by functional-interface-resolver: kept lambda evidence with 2 argument(s), dropped method reference evidence with 1",
        identity: "method p.Fn#apply",
        kept: "functional-interface-resolver",
        discarded: [],
      });
    });
  });

  describe("lambdas passed to unresolved methods", () => {
    it("should type them as java.util.function interfaces", () => {
      const result = run([
        methodDecl("void", "f", [param("h", "Helper")], [
          exprStmt(call(name("h"), "later", [lambda([], block())])),
          exprStmt(call(name("h"), "make", [lambda([], lit.string("x"))])),
        ]),
      ]);

      expect(result.plan.types.map((t) => [t.qualifiedName, t.kind])).toEqual([["p.Helper", "CLASS"]]);
      expect(result.plan.methods.map(describePlan)).toEqual([
        "void p.Helper#later(java.lang.Runnable)",
        "void p.Helper#make(java.util.function.Supplier<java.lang.String>)",
      ]);
    });
  });
});
