/**
 * Test suite for the pass orchestrator
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { classDecl, compilationUnit, methodDecl } from "../tooling/lib/ast";
import { AuditLog } from "../tooling/lib/audit";
import { conflictingEvidence } from "../tooling/lib/diagnostics";
import { JdkTypes } from "../tooling/lib/jdk";
import { Logger } from "../tooling/lib/logger";
import { PassOrchestrator } from "../tooling/lib/orchestrator";
import { ShimCatalog } from "../tooling/lib/shim-catalog";
import { INT, named } from "../tooling/lib/type-shapes";
import { TypeIndex } from "../tooling/lib/type-index";
import { TypeResolver } from "../tooling/lib/type-resolver";
import {
  candidate,
  createConstructorPlan,
  createMethodPlan,
  createTypePlan,
} from "./fixtures/plans.fixtures";

const jdk = JdkTypes.load();
const catalog = ShimCatalog.load();
const STRING = named("java.lang.String");
const OBJECT = named("java.lang.Object");

describe("PassOrchestrator", () => {
  let index: TypeIndex;
  let audit: AuditLog;
  let orchestrator: PassOrchestrator;

  beforeEach(() => {
    index = new TypeIndex(jdk);
    new TypeResolver(index, jdk, catalog);
    audit = new AuditLog();
    orchestrator = new PassOrchestrator(index, new Logger("debug", false), audit);
  });

  describe("lifecycle", () => {
    it("should move from collecting to merged", () => {
      expect(orchestrator.getState()).toBe("COLLECTING");
      orchestrator.submit([candidate(createTypePlan("p.X"), "type-kind-classifier")]);
      orchestrator.resolve();
      expect(orchestrator.getState()).toBe("MERGED");
    });

    it("should reject submissions after resolving", () => {
      orchestrator.resolve();
      expect(() => orchestrator.submit([candidate(createTypePlan("p.X"), "type-kind-classifier")])).toThrow(
        "Cannot submit candidates in state MERGED"
      );
    });

    it("should resolve only once", () => {
      orchestrator.resolve();
      expect(() => orchestrator.resolve()).toThrow("Cannot resolve in state MERGED");
    });
  });

  describe("precedence", () => {
    it("should keep the higher pass and report the disagreement", () => {
      orchestrator.submit([candidate(createTypePlan("p.X", "CLASS"), "type-kind-classifier")]);
      orchestrator.submit([candidate(createTypePlan("p.X", "INTERFACE", { functional: true }), "functional-interface-resolver")]);

      const plan = orchestrator.resolve();
      expect(plan.types).toHaveLength(1);
      expect(plan.types[0].kind).toBe("INTERFACE");
      expect(plan.diagnostics).toEqual([
        {
          code: "ConflictingEvidence",
          message: "type p.X planned by functional-interface-resolver; discarded type-kind-classifier",
          identity: "type p.X",
          kept: "functional-interface-resolver",
          discarded: ["type-kind-classifier"],
        },
      ]);
    });

    it("should log the ranking behind a disagreement", () => {
      const logger = new Logger("debug", false);
      const logged = new PassOrchestrator(index, logger, audit);
      logged.submit([candidate(createTypePlan("p.X", "CLASS"), "type-kind-classifier")]);
      logged.submit([candidate(createTypePlan("p.X", "INTERFACE", { functional: true }), "functional-interface-resolver")]);

      logged.resolve();
      const ranking = logger.getEntries().find((e) => e.message === "Conflicting candidates")?.data?.ranking;

      expect(Array.isArray(ranking) && ranking.map((r) => String(r).split("\n")[0])).toEqual([
        "Candidate 1: INTERFACE p.X",
        "Candidate 2: CLASS p.X",
      ]);
    });

    it("should stay quiet when the discarded candidate agrees", () => {
      orchestrator.submit([
        candidate(createTypePlan("p.X", "INTERFACE"), "type-kind-classifier"),
        candidate(createTypePlan("p.X", "INTERFACE", { functional: true }), "functional-interface-resolver"),
      ]);

      expect(orchestrator.resolve().diagnostics).toEqual([]);
    });

    it("should keep every overload the winning pass proposed", () => {
      orchestrator.submit([
        candidate(createMethodPlan("org.a.Log", "info", { paramTypes: [STRING] }), "shim-matcher"),
        candidate(createMethodPlan("org.a.Log", "info", { paramTypes: [STRING, OBJECT] }), "shim-matcher"),
        candidate(createMethodPlan("org.a.Log", "info", { paramTypes: [STRING] }), "signature-inferrer"),
      ]);

      const plan = orchestrator.resolve();
      expect(plan.methods.map((m) => m.paramTypes.length)).toEqual([1, 2]);
      expect(plan.diagnostics).toEqual([]);
      expect(audit.getResolution("method org.a.Log#info")?.keptCount).toBe(2);
    });

    it("should surface notes only from kept candidates", () => {
      const note = conflictingEvidence("method p.X#go", "signature-inferrer", ["type-kind-classifier"]);
      orchestrator.submit([
        { plan: createMethodPlan("p.X", "go", { returnType: INT }), source: "signature-inferrer", reason: "calls", notes: [note] },
        { plan: createMethodPlan("p.X", "go", { returnType: INT }), source: "shim-matcher", reason: "catalog" },
      ]);

      expect(orchestrator.resolve().diagnostics).toEqual([]);
    });
  });

  describe("redundancy", () => {
    it("should drop constructors on interfaces", () => {
      orchestrator.submit([
        candidate(createTypePlan("p.I", "INTERFACE"), "type-kind-classifier"),
        candidate(createConstructorPlan("p.I"), "signature-inferrer"),
      ]);

      const plan = orchestrator.resolve();
      expect(plan.constructors).toEqual([]);
      expect(audit.getDrops("constructor p.I")).toEqual([{ plan: "p.I()", reason: "constructor on interface" }]);
    });

    it("should drop members a fragment type already declares", () => {
      index.addUnits([compilationUnit("p", [classDecl("Use", { members: [methodDecl("void", "run")] })])], "fragment");
      orchestrator.submit([candidate(createMethodPlan("p.Use", "run"), "signature-inferrer")]);

      const plan = orchestrator.resolve();
      expect(plan.methods).toEqual([]);
      expect(audit.getDrops("method p.Use#run")[0].reason).toBe("already declared on p.Use");
    });

    it("should drop methods inherited from a known supertype", () => {
      orchestrator.submit([
        candidate(
          createTypePlan("p.E", "CLASS", { supertypes: [{ relation: "extends", shape: named("java.lang.Object") }] }),
          "type-kind-classifier"
        ),
        candidate(createMethodPlan("p.E", "toString", { returnType: STRING }), "signature-inferrer"),
        candidate(createMethodPlan("p.E", "reset"), "signature-inferrer"),
      ]);

      const plan = orchestrator.resolve();
      expect(plan.methods.map((m) => m.name)).toEqual(["reset"]);
      expect(audit.getDrops("method p.E#toString")[0].reason).toBe("inherited from java.lang.Object");
    });

    it("should keep interface methods a class must implement", () => {
      orchestrator.submit([
        candidate(
          createTypePlan("p.Task", "CLASS", { supertypes: [{ relation: "implements", shape: named("java.lang.Runnable") }] }),
          "type-kind-classifier"
        ),
        candidate(createMethodPlan("p.Task", "run"), "signature-inferrer"),
      ]);

      expect(orchestrator.resolve().methods.map((m) => m.name)).toEqual(["run"]);
    });

    it("should collapse members with the same erasure", () => {
      orchestrator.submit([
        candidate(
          createMethodPlan("p.X", "take", { paramTypes: [named("java.util.List", [STRING])] }),
          "signature-inferrer"
        ),
        candidate(
          createMethodPlan("p.X", "take", { paramTypes: [named("java.util.List", [named("java.lang.Integer")])] }),
          "signature-inferrer"
        ),
      ]);

      expect(orchestrator.resolve().methods).toHaveLength(1);
    });
  });
});
