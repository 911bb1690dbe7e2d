/**
 * Test suite for the resolution audit trail
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { AuditLog } from "../tooling/lib/audit";
import { rankCandidates } from "../tooling/lib/candidate-selector";
import { INT } from "../tooling/lib/type-shapes";
import { candidate, createMethodPlan, createTypePlan } from "./fixtures/plans.fixtures";

describe("AuditLog", () => {
  let audit: AuditLog;

  beforeEach(() => {
    audit = new AuditLog();
  });

  it("should record submissions with the described plan", () => {
    audit.recordSubmission("type p.X", candidate(createTypePlan("p.X", "ENUM"), "type-kind-classifier", "switch labels"));

    const entries = audit.getEntries();
    expect(entries).toHaveLength(1);
    expect(entries[0].type).toBe("candidate_submitted");
    expect(entries[0].details).toEqual({ source: "type-kind-classifier", plan: "ENUM p.X", reason: "switch labels" });
  });

  it("should keep the ranking of a resolved identity", () => {
    const shim = candidate(createMethodPlan("org.a.B", "run"), "shim-matcher");
    const inferred = candidate(createMethodPlan("org.a.B", "run", { returnType: INT }), "signature-inferrer");
    audit.recordResolution("method org.a.B#run", rankCandidates([inferred, shim]), "shim-matcher", 1, true, "precedence");

    const resolution = audit.getResolution("method org.a.B#run");
    expect(resolution?.kept).toBe("shim-matcher");
    expect(resolution?.conflict).toBe(true);
    expect(resolution?.candidateRankings.map((r) => [r.rank, r.source, r.plan])).toEqual([
      [1, "shim-matcher", "void org.a.B#run()"],
      [2, "signature-inferrer", "int org.a.B#run()"],
    ]);
  });

  it("should collect drops per identity", () => {
    audit.recordDrop("constructor p.I", { plan: "constructor", owner: "p.I", paramTypes: [], varargs: false }, "interfaces have no constructors");
    audit.recordDrop("constructor p.I", { plan: "constructor", owner: "p.I", paramTypes: [INT], varargs: false }, "interfaces have no constructors");

    expect(audit.getDrops("constructor p.I").map((d) => d.plan)).toEqual(["p.I()", "p.I(int)"]);
    expect(audit.getDrops("type p.Missing")).toEqual([]);
  });

  it("should summarize entries", () => {
    const kind = candidate(createTypePlan("p.X"), "type-kind-classifier");
    audit.recordSubmission("type p.X", kind);
    audit.recordResolution("type p.X", rankCandidates([kind]), "type-kind-classifier", 1, false, "only candidate");
    audit.recordDiscard("type p.Y", kind, "shim-matcher");
    audit.recordResolution("type p.Y", rankCandidates([kind]), "shim-matcher", 1, true, "precedence");
    audit.recordDrop("method p.X#m", createMethodPlan("p.X", "m"), "declared");

    expect(audit.getSummary()).toEqual({
      totalEntries: 5,
      totalSubmissions: 1,
      totalResolutions: 2,
      totalDiscards: 1,
      totalDrops: 1,
      conflictRate: 0.5,
    });
  });

  it("should export and clear", () => {
    audit.recordDrop("method p.X#m", createMethodPlan("p.X", "m"), "declared");

    const json = audit.toJSON();
    expect(json.drops).toEqual({ "method p.X#m": [{ plan: "void p.X#m()", reason: "declared" }] });
    expect(json.resolutions).toEqual([]);

    audit.clear();
    expect(audit.getEntries()).toEqual([]);
    expect(audit.getSummary().totalDrops).toBe(0);
  });
});
