/**
 * Test suite for the shim catalog
 */

import { describe, it, expect } from "@jest/globals";
import { JdkTypes } from "../tooling/lib/jdk";
import { blueprintSelfShape, ShimCatalog } from "../tooling/lib/shim-catalog";
import { formatShape, referencedTypes } from "../tooling/lib/type-shapes";
import { StubPlan, TypeShape } from "../tooling/lib/types";

const catalog = ShimCatalog.load();

function shapesOf(member: StubPlan): TypeShape[] {
  switch (member.plan) {
    case "method":
      return [...member.paramTypes, member.returnType, ...member.thrownTypes];
    case "field":
      return [member.type];
    case "constructor":
      return member.paramTypes;
    case "type":
      return member.supertypes.map((s) => s.shape);
  }
}

describe("ShimCatalog", () => {
  describe("load", () => {
    it("should read the bundled logging blueprints", () => {
      const logger = catalog.get("org.slf4j.Logger");
      const methods = logger?.members.filter((m) => m.plan === "method") ?? [];

      expect(logger?.type.kind).toBe("INTERFACE");
      expect(methods).toHaveLength(31);
      expect(methods.filter((m) => m.name === "info")).toHaveLength(5);
      expect(methods.every((m) => m.plan === "method" && m.isAbstract)).toBe(true);
    });

    it("should mark static factory methods", () => {
      const factory = catalog.get("org.slf4j.LoggerFactory");

      expect(factory?.members.map((m) => m.plan === "method" && m.name === "getLogger" && m.isStatic)).toEqual([true, true]);
    });

    it("should cover parser, rpc, protobuf and bytecode libraries", () => {
      const names = [
        "org.antlr.v4.runtime.Lexer",
        "org.antlr.v4.runtime.Parser",
        "org.antlr.v4.runtime.tree.ParseTree",
        "org.antlr.v4.runtime.tree.ParseTreeVisitor",
        "io.grpc.Channel",
        "io.grpc.CallOptions",
        "io.grpc.MethodDescriptor",
        "io.grpc.ServerCall",
        "com.google.protobuf.MessageLite",
        "com.google.protobuf.Parser",
        "com.google.protobuf.GeneratedMessageLite",
        "org.objectweb.asm.AnnotationVisitor",
        "org.objectweb.asm.FieldVisitor",
      ];

      const message = catalog.get("com.google.protobuf.GeneratedMessageLite");

      expect(names.filter((name) => !catalog.has(name))).toEqual([]);
      expect(message && formatShape(blueprintSelfShape(message))).toBe(
        "com.google.protobuf.GeneratedMessageLite<MessageType, BuilderType>"
      );
    });

    it("should only name catalog or platform types in blueprint signatures", () => {
      const jdk = JdkTypes.load();
      const referenced = new Set<string>();
      for (const blueprint of catalog.all()) {
        for (const shape of [...shapesOf(blueprint.type), ...blueprint.members.flatMap(shapesOf)]) {
          referencedTypes(shape, referenced);
        }
      }

      expect(Array.from(referenced).filter((name) => !catalog.has(name) && !jdk.has(name))).toEqual([]);
    });

    it("should freeze blueprints", () => {
      const logger = catalog.get("org.slf4j.Logger");

      expect(logger && Object.isFrozen(logger)).toBe(true);
      expect(logger && Object.isFrozen(logger.members)).toBe(true);
    });
  });

  describe("match", () => {
    it("should match a blueprint by exact name", () => {
      const match = catalog.match("org.slf4j.Logger");

      expect(match?.via).toBe("exact");
      expect(match?.catalogName).toBe("org.slf4j.Logger");
    });

    it("should follow relocation rules", () => {
      const match = catalog.match("org.apache.commons.lang.StringUtils");

      expect(match?.via).toBe("relocated");
      expect(match?.catalogName).toBe("org.apache.commons.lang3.StringUtils");
      expect(match?.blueprint.type.qualifiedName).toBe("org.apache.commons.lang3.StringUtils");
    });

    it("should relocate a single renamed type", () => {
      expect(catalog.match("org.mockito.Matchers")?.catalogName).toBe("org.mockito.ArgumentMatchers");
    });

    it("should not match unknown types", () => {
      expect(catalog.match("com.example.Unknown")).toBeUndefined();
    });
  });

  describe("withRelocations", () => {
    it("should add rules without touching the original", () => {
      const extended = catalog.withRelocations([{ from: "com.example.log.", to: "org.slf4j." }]);

      expect(extended.match("com.example.log.Logger")?.catalogName).toBe("org.slf4j.Logger");
      expect(catalog.match("com.example.log.Logger")).toBeUndefined();
      expect(extended.size()).toBe(catalog.size());
    });

    it("should return the same catalog for no rules", () => {
      expect(catalog.withRelocations([])).toBe(catalog);
    });
  });

  describe("coversPackage", () => {
    it("should cover blueprint and relocated packages", () => {
      expect(catalog.coversPackage("org.slf4j")).toBe(true);
      expect(catalog.coversPackage("org.apache.commons.lang")).toBe(true);
      expect(catalog.coversPackage("com.example")).toBe(false);
    });
  });

  describe("fromData", () => {
    it("should parse generic blueprints", () => {
      const small = ShimCatalog.fromData({
        blueprints: [
          {
            name: "p.Box",
            kind: "CLASS",
            typeParameters: ["T"],
            methods: ["T get()", "static <U> p.Box<U> of(U)"],
            fields: ["int size"],
            constructors: ["(T)"],
          },
        ],
      });
      const box = small.get("p.Box");
      const of = box?.members.find((m) => m.plan === "method" && m.name === "of");

      expect(box && formatShape(blueprintSelfShape(box))).toBe("p.Box<T>");
      expect(box?.members.map((m) => m.plan)).toEqual(["method", "method", "field", "constructor"]);
      expect(of?.plan === "method" && of.isStatic).toBe(true);
      expect(of?.plan === "method" && of.typeParameters.map((p) => p.name)).toEqual(["U"]);
      expect(of?.plan === "method" && formatShape(of.returnType)).toBe("p.Box<U>");
    });

    it("should make interface fields constant", () => {
      const small = ShimCatalog.fromData({ blueprints: [{ name: "p.Codes", kind: "INTERFACE", fields: ["int OK"] }] });
      const field = small.get("p.Codes")?.members[0];

      expect(field?.plan === "field" && [field.isStatic, field.isFinal]).toEqual([true, true]);
    });

    it("should reject malformed data", () => {
      expect(() => ShimCatalog.fromData([])).toThrow("Shim catalog must be a JSON object");
      expect(() => ShimCatalog.fromData({ blueprints: [{ name: "p.A", kind: "STRUCT" }] })).toThrow("Malformed shim entry");
      expect(() =>
        ShimCatalog.fromData({ blueprints: [{ name: "p.A", kind: "CLASS" }, { name: "p.A", kind: "CLASS" }] })
      ).toThrow("Duplicate shim blueprint p.A");
    });

    it("should start empty", () => {
      expect(ShimCatalog.empty().size()).toBe(0);
      expect(ShimCatalog.empty().relocations()).toEqual([]);
    });
  });
});
