/**
 * Test suite for utility functions
 */

import { describe, it, expect } from "@jest/globals";
import {
  compareStrings,
  dedupeBy,
  isPlainObject,
  joinName,
  packagePath,
  pushTo,
  qualifierOf,
  simpleNameOf,
  splitQualifiedName,
  stableStringify,
  typeParameterNames,
} from "../tooling/lib/utils";

describe("Utility Functions", () => {
  describe("isPlainObject", () => {
    it("should return true for plain objects", () => {
      expect(isPlainObject({})).toBe(true);
      expect(isPlainObject({ key: "value" })).toBe(true);
    });

    it("should return false for null", () => {
      expect(isPlainObject(null)).toBe(false);
    });

    it("should return false for arrays", () => {
      expect(isPlainObject([])).toBe(false);
    });

    it("should return false for primitives", () => {
      expect(isPlainObject("string")).toBe(false);
      expect(isPlainObject(42)).toBe(false);
      expect(isPlainObject(true)).toBe(false);
    });
  });

  describe("stableStringify", () => {
    it("should produce consistent output for objects with different key orders", () => {
      const obj1 = { b: 2, a: 1 };
      const obj2 = { a: 1, b: 2 };
      expect(stableStringify(obj1)).toBe(stableStringify(obj2));
    });

    it("should handle nested objects", () => {
      const obj1 = { outer: { b: 2, a: 1 } };
      const obj2 = { outer: { a: 1, b: 2 } };
      expect(stableStringify(obj1)).toBe(stableStringify(obj2));
    });
  });

  describe("compareStrings", () => {
    it("should order by code unit, not locale", () => {
      expect(["b", "B", "a"].sort(compareStrings)).toEqual(["B", "a", "b"]);
      expect(compareStrings("x", "x")).toBe(0);
    });
  });

  describe("dedupeBy", () => {
    it("should keep the first value per key", () => {
      const values = [
        { id: 1, tag: "a" },
        { id: 2, tag: "b" },
        { id: 3, tag: "a" },
      ];
      expect(dedupeBy(values, (v) => v.tag).map((v) => v.id)).toEqual([1, 2]);
    });
  });

  describe("pushTo", () => {
    it("should create and extend keyed lists", () => {
      const map = new Map<string, number[]>();
      pushTo(map, "k", 1);
      pushTo(map, "k", 2);
      expect(map.get("k")).toEqual([1, 2]);
    });
  });

  describe("qualified names", () => {
    it("should join onto an empty qualifier without a dot", () => {
      expect(joinName("", "Foo")).toBe("Foo");
      expect(joinName("a.b", "Foo")).toBe("a.b.Foo");
    });

    it("should split simple name and qualifier", () => {
      expect(simpleNameOf("a.b.Outer.Inner")).toBe("Inner");
      expect(qualifierOf("a.b.Outer.Inner")).toBe("a.b.Outer");
      expect(qualifierOf("Foo")).toBe("");
    });

    it("should split package from nested type path", () => {
      expect(splitQualifiedName("a.b.Outer.Inner")).toEqual({ packageName: "a.b", typePath: ["Outer", "Inner"] });
      expect(splitQualifiedName("Foo")).toEqual({ packageName: "", typePath: ["Foo"] });
      expect(splitQualifiedName("a.b")).toEqual({ packageName: "a", typePath: ["b"] });
    });

    it("should turn packages into directories", () => {
      expect(packagePath("org.example.util")).toBe("org/example/util");
      expect(packagePath("")).toBe("");
    });
  });

  describe("typeParameterNames", () => {
    it("should name parameters T, U, V, W then T4 onwards", () => {
      expect(typeParameterNames(0)).toEqual([]);
      expect(typeParameterNames(2)).toEqual(["T", "U"]);
      expect(typeParameterNames(6)).toEqual(["T", "U", "V", "W", "T4", "T5"]);
    });
  });
});
