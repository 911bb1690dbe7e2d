/**
 * Test suite for type shapes and compact signatures
 */

import { describe, it, expect } from "@jest/globals";
import {
  parseConstructorSignature,
  parseFieldSignature,
  parseMethodSignature,
  splitTopLevel,
} from "../tooling/lib/signatures";
import {
  arrayOf,
  BOOLEAN,
  commonSubtype,
  commonSupertype,
  erase,
  formatShape,
  INT,
  isAssignable,
  named,
  NULL,
  parseTypeShape,
  primitive,
  signatureKey,
  TOP,
  TypeHierarchy,
  typeVariable,
  wildcard,
} from "../tooling/lib/type-shapes";

const STRING = named("java.lang.String");
const OBJECT = named("java.lang.Object");
const LONG = primitive("long");

const hierarchy: TypeHierarchy = {
  directSupertypes: (qualifiedName) => (qualifiedName === "p.B" || qualifiedName === "p.C" ? [named("p.A")] : []),
};

describe("type shapes", () => {
  describe("parseTypeShape", () => {
    it("should parse nested generics, wildcards and arrays", () => {
      const shape = parseTypeShape("java.util.Map<K, java.util.List<? extends V>>[]", new Set(["K", "V"]));

      expect(shape.kind).toBe("array");
      expect(formatShape(shape)).toBe("java.util.Map<K, java.util.List<? extends V>>[]");
    });

    it("should reject trailing tokens", () => {
      expect(() => parseTypeShape("int int")).toThrow('Trailing tokens in type "int int"');
    });
  });

  describe("erasure", () => {
    it("should drop type arguments", () => {
      expect(formatShape(erase(named("java.util.List", [STRING])))).toBe("java.util.List");
    });

    it("should key signatures by erased parameters", () => {
      expect(signatureKey("take", [named("java.util.List", [STRING]), INT])).toBe("take(java.util.List,int)");
      expect(signatureKey("id", [typeVariable("T")])).toBe("id(java.lang.Object)");
    });
  });

  describe("isAssignable", () => {
    it("should follow primitive widening", () => {
      expect(isAssignable(INT, LONG)).toBe(true);
      expect(isAssignable(LONG, INT)).toBe(false);
      expect(isAssignable(primitive("char"), primitive("short"))).toBe(false);
    });

    it("should box and unbox", () => {
      expect(isAssignable(INT, named("java.lang.Integer"))).toBe(true);
      expect(isAssignable(named("java.lang.Integer"), LONG)).toBe(true);
      expect(isAssignable(INT, OBJECT)).toBe(true);
    });

    it("should treat null as any reference", () => {
      expect(isAssignable(NULL, STRING)).toBe(true);
      expect(isAssignable(NULL, INT)).toBe(false);
    });

    it("should compare arrays by element", () => {
      expect(isAssignable(arrayOf(STRING), arrayOf(OBJECT))).toBe(true);
      expect(isAssignable(arrayOf(INT), arrayOf(LONG))).toBe(false);
    });

    it("should respect wildcard bounds", () => {
      const strings = named("java.util.List", [STRING]);

      expect(isAssignable(strings, named("java.util.List", [wildcard({ variance: "extends", shape: OBJECT })]))).toBe(true);
      expect(isAssignable(strings, named("java.util.List", [named("java.lang.Integer")]))).toBe(false);
    });

    it("should walk the supplied hierarchy", () => {
      expect(isAssignable(named("p.B"), named("p.A"), hierarchy)).toBe(true);
      expect(isAssignable(named("p.A"), named("p.B"), hierarchy)).toBe(false);
    });
  });

  describe("merging", () => {
    it("should widen primitives for parameters", () => {
      expect(commonSupertype(INT, LONG)).toBe(LONG);
      expect(commonSupertype(INT, BOOLEAN)).toBe(TOP);
    });

    it("should find a shared ancestor", () => {
      expect(formatShape(commonSupertype(named("p.B"), named("p.C"), hierarchy))).toBe("p.A");
    });

    it("should keep each side's arguments on a shared generic ancestor", () => {
      const comparables: TypeHierarchy = {
        directSupertypes: (qualifiedName) =>
          qualifiedName === "p.S" || qualifiedName === "p.I" ? [named("p.Cmp", [named(qualifiedName)])] : [],
      };

      expect(formatShape(commonSupertype(named("p.S"), named("p.I"), comparables))).toBe("p.Cmp<?>");
      expect(formatShape(commonSupertype(named("p.S"), named("p.Cmp", [named("p.S")]), comparables))).toBe("p.Cmp<p.S>");
    });

    it("should wildcard disagreeing type arguments", () => {
      const merged = commonSupertype(named("java.util.List", [STRING]), named("java.util.List", [named("java.lang.Integer")]));

      expect(formatShape(merged)).toBe("java.util.List<?>");
    });

    it("should narrow returns to the more specific shape", () => {
      expect(commonSubtype(STRING, OBJECT)).toBe(STRING);
      expect(commonSubtype(TOP, INT)).toBe(INT);
      expect(commonSubtype(STRING, named("java.lang.Integer"))).toBeUndefined();
    });
  });
});

describe("compact signatures", () => {
  it("should split on top-level commas only", () => {
    expect(splitTopLevel("java.util.Map<K, V>, int")).toEqual(["java.util.Map<K, V>", "int"]);
  });

  it("should parse generic variadic methods", () => {
    const parsed = parseMethodSignature("static <T> java.util.List<T> of(T...)");

    expect(parsed.name).toBe("of");
    expect(parsed.modifiers).toEqual(["static"]);
    expect(parsed.typeParameters).toEqual(["T"]);
    expect(parsed.varargs).toBe(true);
    expect(parsed.params.map((p) => formatShape(p))).toEqual(["T[]"]);
    expect(formatShape(parsed.returns)).toBe("java.util.List<T>");
  });

  it("should parse thrown types", () => {
    const parsed = parseMethodSignature("void execute() throws java.lang.Throwable");

    expect(parsed.throws.map((t) => formatShape(t))).toEqual(["java.lang.Throwable"]);
  });

  it("should only allow a trailing variadic parameter", () => {
    expect(() => parseMethodSignature("void f(int..., int)")).toThrow("Only the last parameter may be variadic");
  });

  it("should parse fields and constructors", () => {
    const field = parseFieldSignature("static final java.io.PrintStream out");
    const ctor = parseConstructorSignature("(java.lang.String, java.lang.Throwable)");

    expect(field.modifiers).toEqual(["static", "final"]);
    expect(formatShape(field.type)).toBe("java.io.PrintStream");
    expect(ctor.params.map((p) => formatShape(p))).toEqual(["java.lang.String", "java.lang.Throwable"]);
    expect(ctor.varargs).toBe(false);
    expect(() => parseConstructorSignature("java.lang.String")).toThrow('Malformed constructor signature "java.lang.String"');
  });
});
