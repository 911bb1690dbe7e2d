/**
 * Test suite for building the context model
 */

import { describe, it, expect } from "@jest/globals";
import { classDecl, compilationUnit, importDecl, interfaceDecl, namedType } from "../tooling/lib/ast";
import { buildContextModel, findSupertypeCycle } from "../tooling/lib/context-index";

const budget = { maxContextTypes: 100, maxTraversalDepth: 4 };

describe("buildContextModel", () => {
  it("should accept a missing context", () => {
    expect(buildContextModel(undefined, budget)).toEqual({ status: "ok", units: [], typeCount: 0 });
  });

  it("should count nested declarations", () => {
    const units = [
      compilationUnit("q", [classDecl("Outer", { members: [classDecl("Inner")] })]),
      compilationUnit("q", [interfaceDecl("Shape")]),
    ];

    const result = buildContextModel(() => units, budget);
    expect(result.status).toBe("ok");
    expect(result.status === "ok" && result.typeCount).toBe(3);
  });

  it("should degrade when the loader throws", () => {
    const result = buildContextModel(() => {
      throw new Error("context store offline");
    }, budget);

    expect(result).toEqual({ status: "degraded", cause: "context store offline" });
  });

  it("should name recursion failures", () => {
    const result = buildContextModel(() => {
      throw new RangeError("Maximum call stack size exceeded");
    }, budget);

    expect(result).toEqual({
      status: "degraded",
      cause: "recursion limit reached while loading context: Maximum call stack size exceeded",
    });
  });

  it("should enforce the type budget", () => {
    const units = [compilationUnit("q", [classDecl("A")]), compilationUnit("q", [classDecl("B")])];

    expect(buildContextModel(units, { maxContextTypes: 1, maxTraversalDepth: 4 })).toEqual({
      status: "degraded",
      cause: "more than 1 context types",
    });
  });

  it("should enforce the nesting budget", () => {
    const units = [compilationUnit("q", [classDecl("Outer", { members: [classDecl("Inner")] })])];

    expect(buildContextModel(units, { maxContextTypes: 100, maxTraversalDepth: 1 })).toEqual({
      status: "degraded",
      cause: "nesting deeper than 1 in q/Outer.java",
    });
  });

  it("should reject cyclic supertype chains", () => {
    const units = [
      compilationUnit("q", [classDecl("A", { superclass: namedType("B") })]),
      compilationUnit("q", [classDecl("B", { superclass: namedType("A") })]),
    ];

    expect(buildContextModel(units, budget)).toEqual({
      status: "degraded",
      cause: "cyclic supertype chain: q.A -> q.B -> q.A",
    });
  });

  it("should follow imports across packages", () => {
    const units = [
      compilationUnit("q", [interfaceDecl("A", { interfaces: [namedType("B")] })], [importDecl("r.B")]),
      compilationUnit("r", [interfaceDecl("B", { interfaces: [namedType("A")] })], [importDecl("q.A")]),
    ];

    expect(buildContextModel(units, budget)).toEqual({
      status: "degraded",
      cause: "cyclic supertype chain: q.A -> r.B -> q.A",
    });
  });

  it("should ignore supertypes outside the context", () => {
    const units = [compilationUnit("q", [classDecl("A", { superclass: namedType("Missing") })])];

    expect(buildContextModel(units, budget).status).toBe("ok");
  });
});

describe("findSupertypeCycle", () => {
  it("should return undefined for a chain", () => {
    const edges = new Map([
      ["a", ["b"]],
      ["b", ["c"]],
      ["c", []],
    ]);

    expect(findSupertypeCycle(edges)).toBeUndefined();
  });

  it("should report a self edge", () => {
    expect(findSupertypeCycle(new Map([["a", ["a"]]]))).toEqual(["a", "a"]);
  });

  it("should return only the cyclic part of the path", () => {
    const edges = new Map([
      ["a", ["b"]],
      ["b", ["c"]],
      ["c", ["b"]],
    ]);

    expect(findSupertypeCycle(edges)).toEqual(["b", "c", "b"]);
  });

  it("should not mistake a diamond for a cycle", () => {
    const edges = new Map([
      ["a", ["b", "c"]],
      ["b", ["d"]],
      ["c", ["d"]],
      ["d", []],
    ]);

    expect(findSupertypeCycle(edges)).toBeUndefined();
  });
});
