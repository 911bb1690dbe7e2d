/**
 * Test suite for candidate selector module
 */

import { describe, it, expect } from "@jest/globals";
import {
  calculatePrecedenceScore,
  calculateSpecificityScore,
  scoreCandidate,
  rankCandidates,
  formatCandidateScore,
} from "../tooling/lib/candidate-selector";
import { INT, named } from "../tooling/lib/type-shapes";
import { candidate, createMethodPlan, createTypePlan } from "./fixtures/plans.fixtures";

describe("Candidate Selector", () => {
  describe("calculatePrecedenceScore", () => {
    it("should order passes shim > functional > signature > kind", () => {
      expect(calculatePrecedenceScore("shim-matcher")).toBe(1);
      expect(calculatePrecedenceScore("functional-interface-resolver")).toBe(0.75);
      expect(calculatePrecedenceScore("signature-inferrer")).toBe(0.5);
      expect(calculatePrecedenceScore("type-kind-classifier")).toBe(0.25);
    });
  });

  describe("calculateSpecificityScore", () => {
    it("should score a plan without shapes as zero", () => {
      expect(calculateSpecificityScore(createTypePlan("p.X"))).toBe(0);
    });

    it("should grow with the information in the signature", () => {
      const sparse = createMethodPlan("p.X", "go");
      const detailed = createMethodPlan("p.X", "go", { paramTypes: [INT], returnType: INT });

      expect(calculateSpecificityScore(sparse)).toBe(0.5);
      expect(calculateSpecificityScore(detailed)).toBeCloseTo(0.8);
    });

    it("should rate Object below a specific type", () => {
      const loose = createMethodPlan("p.X", "get", { returnType: named("java.lang.Object") });
      const tight = createMethodPlan("p.X", "get", { returnType: named("java.lang.String") });

      expect(calculateSpecificityScore(loose)).toBeLessThan(calculateSpecificityScore(tight));
    });
  });

  describe("scoreCandidate", () => {
    it("should combine precedence and specificity", () => {
      const score = scoreCandidate(candidate(createMethodPlan("p.X", "go"), "shim-matcher"));

      expect(score.totalScore).toBeCloseTo(0.9);
      expect(score.reasoning).toEqual(["proposed by shim-matcher", "Catalog blueprint"]);
    });

    it("should note sparse signatures", () => {
      const score = scoreCandidate(candidate(createTypePlan("p.X"), "type-kind-classifier"));

      expect(score.reasoning).toEqual(["proposed by type-kind-classifier", "Sparse signature"]);
    });
  });

  describe("rankCandidates", () => {
    it("should let precedence dominate specificity", () => {
      const detailed = candidate(createMethodPlan("p.X", "go", { paramTypes: [INT, INT], returnType: INT }), "signature-inferrer");
      const sparse = candidate(createMethodPlan("p.X", "go"), "shim-matcher");

      const ranked = rankCandidates([detailed, sparse]);
      expect(ranked.map((r) => r.candidate.source)).toEqual(["shim-matcher", "signature-inferrer"]);
    });

    it("should prefer the more specific plan from the same pass", () => {
      const loose = candidate(createMethodPlan("p.X", "get"), "signature-inferrer");
      const tight = candidate(createMethodPlan("p.X", "get", { returnType: INT }), "signature-inferrer");

      expect(rankCandidates([loose, tight])[0].candidate).toBe(tight);
    });

    it("should keep submission order on ties", () => {
      const first = candidate(createMethodPlan("p.X", "a"), "signature-inferrer", "first");
      const second = candidate(createMethodPlan("p.X", "b"), "signature-inferrer", "second");

      const ranked = rankCandidates([first, second]);
      expect(ranked.map((r) => r.candidate.reason)).toEqual(["first", "second"]);
      expect(ranked.map((r) => r.order)).toEqual([0, 1]);
    });
  });

  describe("formatCandidateScore", () => {
    it("should render the plan and its scores", () => {
      const score = scoreCandidate(candidate(createMethodPlan("p.X", "go"), "shim-matcher"));

      expect(formatCandidateScore(score).split("\n")).toEqual([
        "Candidate 1: void p.X#go()",
        "  Score: 90.0%",
        "    Precedence: 100%",
        "    Specificity: 50%",
        "  Notes: proposed by shim-matcher, Catalog blueprint",
      ]);
    });
  });
});
