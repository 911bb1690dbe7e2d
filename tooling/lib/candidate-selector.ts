/**
 * Candidate Plan Ranking
 * Ranks the candidate plans proposed for one identity based on:
 * - Pass precedence (shim matcher > functional-interface resolver > signature inferrer > type-kind classifier)
 * - Specificity (more type information = better)
 * - Submission order (earlier = better, for ties)
 */

import { describePlan } from "./plans";
import { informationScore } from "./type-shapes";
import { PassName, PlanCandidate, StubPlan, TypeShape } from "./types";

export const PASS_PRECEDENCE: Readonly<Record<PassName, number>> = {
  "shim-matcher": 4,
  "functional-interface-resolver": 3,
  "signature-inferrer": 2,
  "type-kind-classifier": 1,
};

const MAX_PRECEDENCE = 4;

export interface CandidateScore {
  candidate: PlanCandidate;
  order: number;                 // submission index
  precedenceScore: number;       // 0-1: higher = stronger pass
  specificityScore: number;      // 0-1: higher = more type information
  totalScore: number;            // 0-1: precedence always dominates
  reasoning: string[];           // Explanation of scores
}

function planShapes(plan: StubPlan): TypeShape[] {
  switch (plan.plan) {
    case "type":
      return [...plan.supertypes.map((s) => s.shape), ...plan.recordComponents.map((c) => c.type)];
    case "method":
      return [...plan.paramTypes, plan.returnType];
    case "field":
      return [plan.type];
    case "constructor":
      return plan.paramTypes;
  }
}

export function calculatePrecedenceScore(source: PassName): number {
  return PASS_PRECEDENCE[source] / MAX_PRECEDENCE;
}

/**
 * Specificity of a plan's signature, normalized into [0, 1)
 */
export function calculateSpecificityScore(plan: StubPlan): number {
  const total = planShapes(plan).reduce((sum, shape) => sum + informationScore(shape), 0);
  return total / (total + 1);
}

/**
 * Score a single candidate plan
 */
export function scoreCandidate(candidate: PlanCandidate, order: number = 0): CandidateScore {
  const precedenceScore = calculatePrecedenceScore(candidate.source);
  const specificityScore = calculateSpecificityScore(candidate.plan);
  // One precedence step (0.25 * 0.8) outweighs any specificity (< 0.2).
  const totalScore = precedenceScore * 0.8 + specificityScore * 0.2;

  const reasoning: string[] = [`proposed by ${candidate.source}`];
  if (candidate.source === "shim-matcher") {
    reasoning.push("Catalog blueprint");
  }
  if (specificityScore > 0.8) {
    reasoning.push("Detailed signature");
  } else if (specificityScore < 0.3) {
    reasoning.push("Sparse signature");
  }

  return {
    candidate,
    order,
    precedenceScore,
    specificityScore,
    totalScore,
    reasoning,
  };
}

/**
 * Score candidates and return them ranked, best first; ties keep submission order
 */
export function rankCandidates(candidates: readonly PlanCandidate[]): CandidateScore[] {
  const scored = candidates.map((c, i) => scoreCandidate(c, i));
  return scored.sort((a, b) => b.totalScore - a.totalScore || a.order - b.order);
}

/**
 * Format candidate scores for display
 */
export function formatCandidateScore(score: CandidateScore, index: number = 0): string {
  const lines = [
    `Candidate ${index + 1}: ${describePlan(score.candidate.plan)}`,
    `  Score: ${(score.totalScore * 100).toFixed(1)}%`,
    `    Precedence: ${(score.precedenceScore * 100).toFixed(0)}%`,
    `    Specificity: ${(score.specificityScore * 100).toFixed(0)}%`,
  ];

  if (score.reasoning.length > 0) {
    lines.push(`  Notes: ${score.reasoning.join(", ")}`);
  }

  return lines.join("\n");
}
