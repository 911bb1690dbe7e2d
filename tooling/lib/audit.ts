/**
 * Resolution Audit Trail
 * Tracks candidate submission, precedence decisions and dropped plans
 */

import { CandidateScore } from "./candidate-selector";
import { describePlan } from "./plans";
import { PassName, PlanCandidate, StubPlan } from "./types";

export interface AuditEntry {
  timestamp: string;
  type: "candidate_submitted" | "identity_resolved" | "candidate_discarded" | "plan_dropped";
  identity: string;
  details: Record<string, unknown>;
}

export interface ResolutionAudit {
  identity: string;
  candidateRankings: Array<{
    rank: number;
    source: PassName;
    plan: string;
    totalScore: number;
    precedenceScore: number;
    specificityScore: number;
    reasoning: string[];
  }>;
  kept: PassName;
  keptCount: number;
  conflict: boolean;
  selectionReason: string;
}

export interface DropAudit {
  plan: string;
  reason: string;
}

export class AuditLog {
  private entries: AuditEntry[] = [];
  private resolutions: Map<string, ResolutionAudit> = new Map();
  private drops: Map<string, DropAudit[]> = new Map();

  /**
   * Record a candidate entering the orchestrator
   */
  recordSubmission(identity: string, candidate: PlanCandidate): void {
    this.entries.push({
      timestamp: new Date().toISOString(),
      type: "candidate_submitted",
      identity,
      details: {
        source: candidate.source,
        plan: describePlan(candidate.plan),
        reason: candidate.reason,
      },
    });
  }

  /**
   * Record the ranking of an identity's candidates and the pass that won it
   */
  recordResolution(
    identity: string,
    scores: CandidateScore[],
    kept: PassName,
    keptCount: number,
    conflict: boolean,
    selectionReason: string
  ): void {
    const ranking = scores.map((score, rank) => ({
      rank: rank + 1,
      source: score.candidate.source,
      plan: describePlan(score.candidate.plan),
      totalScore: score.totalScore,
      precedenceScore: score.precedenceScore,
      specificityScore: score.specificityScore,
      reasoning: score.reasoning,
    }));

    this.resolutions.set(identity, {
      identity,
      candidateRankings: ranking,
      kept,
      keptCount,
      conflict,
      selectionReason,
    });

    this.entries.push({
      timestamp: new Date().toISOString(),
      type: "identity_resolved",
      identity,
      details: {
        candidateCount: scores.length,
        kept,
        keptCount,
        conflict,
        selectionReason,
      },
    });
  }

  recordDiscard(identity: string, candidate: PlanCandidate, kept: PassName): void {
    this.entries.push({
      timestamp: new Date().toISOString(),
      type: "candidate_discarded",
      identity,
      details: {
        source: candidate.source,
        plan: describePlan(candidate.plan),
        kept,
      },
    });
  }

  /**
   * Record a winning plan the merge removed anyway
   */
  recordDrop(identity: string, plan: StubPlan, reason: string): void {
    const audit: DropAudit = { plan: describePlan(plan), reason };
    const existing = this.drops.get(identity);
    if (existing) {
      existing.push(audit);
    } else {
      this.drops.set(identity, [audit]);
    }

    this.entries.push({
      timestamp: new Date().toISOString(),
      type: "plan_dropped",
      identity,
      details: { ...audit },
    });
  }

  /**
   * Get all entries
   */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  getResolution(identity: string): ResolutionAudit | undefined {
    return this.resolutions.get(identity);
  }

  getAllResolutions(): ResolutionAudit[] {
    return Array.from(this.resolutions.values());
  }

  getDrops(identity: string): DropAudit[] {
    return this.drops.get(identity) || [];
  }

  /**
   * Get summary statistics
   */
  getSummary(): {
    totalEntries: number;
    totalSubmissions: number;
    totalResolutions: number;
    totalDiscards: number;
    totalDrops: number;
    conflictRate: number;
  } {
    const resolutions = Array.from(this.resolutions.values());
    const conflicts = resolutions.filter((r) => r.conflict).length;
    const count = (type: AuditEntry["type"]): number => this.entries.filter((e) => e.type === type).length;

    return {
      totalEntries: this.entries.length,
      totalSubmissions: count("candidate_submitted"),
      totalResolutions: resolutions.length,
      totalDiscards: count("candidate_discarded"),
      totalDrops: Array.from(this.drops.values()).reduce((sum, drops) => sum + drops.length, 0),
      conflictRate: resolutions.length > 0 ? conflicts / resolutions.length : 0,
    };
  }

  /**
   * Export as JSON for persistence
   */
  toJSON(): {
    entries: AuditEntry[];
    resolutions: ResolutionAudit[];
    drops: Record<string, DropAudit[]>;
  } {
    const dropsObj: Record<string, DropAudit[]> = {};
    for (const [key, value] of this.drops) {
      dropsObj[key] = value;
    }

    return {
      entries: this.entries,
      resolutions: Array.from(this.resolutions.values()),
      drops: dropsObj,
    };
  }

  /**
   * Clear all audits
   */
  clear(): void {
    this.entries = [];
    this.resolutions.clear();
    this.drops.clear();
  }
}
