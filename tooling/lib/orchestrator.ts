/**
 * Pass Orchestrator: takes every pass's candidate plans, settles each
 * identity by pass precedence and merges the winners into one SynthesisPlan.
 *
 * COLLECTING → RESOLVING → MERGED. Candidates are only accepted while
 * collecting and the merge runs exactly once; a discarded candidate is never
 * reconsidered.
 */

import { AuditLog } from "./audit";
import { formatCandidateScore, rankCandidates } from "./candidate-selector";
import { conflictingEvidence, dedupeDiagnostics } from "./diagnostics";
import { Logger } from "./logger";
import { describePlan, erasedSignature, planIdentity, sameErasure, toSynthesisPlan } from "./plans";
import { TypeIndex } from "./type-index";
import {
  Diagnostic,
  MemberPlan,
  OrchestratorState,
  PassName,
  PlanCandidate,
  StubPlan,
  SynthesisPlan,
  TypeKind,
  TypePlan,
} from "./types";
import { dedupeBy } from "./utils";

type Resolution = {
  identity: string;
  kept: PlanCandidate[];
};

function supertypeNames(plan: TypePlan): string[] {
  return plan.supertypes.map((s) => `${s.relation} ${s.shape.qualifiedName}`);
}

/**
 * Whether a discarded candidate says something the kept ones do not
 */
function disagrees(discarded: StubPlan, kept: readonly StubPlan[]): boolean {
  if (discarded.plan === "type") {
    return !kept.some(
      (k) =>
        k.plan === "type" && k.kind === discarded.kind && supertypeNames(discarded).every((s) => supertypeNames(k).includes(s))
    );
  }
  const description = describePlan(discarded);
  return !kept.some((k) => describePlan(k) === description);
}

export class PassOrchestrator {
  private state: OrchestratorState = "COLLECTING";
  private intake: PlanCandidate[] = [];

  constructor(
    private readonly index: TypeIndex,
    private readonly logger: Logger,
    private readonly audit: AuditLog = new AuditLog()
  ) {}

  getState(): OrchestratorState {
    return this.state;
  }

  getAudit(): AuditLog {
    return this.audit;
  }

  submit(candidates: readonly PlanCandidate[]): void {
    if (this.state !== "COLLECTING") {
      throw new Error(`Cannot submit candidates in state ${this.state}`);
    }
    for (const candidate of candidates) {
      this.intake.push(candidate);
      this.audit.recordSubmission(planIdentity(candidate.plan), candidate);
    }
  }

  resolve(): SynthesisPlan {
    if (this.state !== "COLLECTING") {
      throw new Error(`Cannot resolve in state ${this.state}`);
    }
    this.state = "RESOLVING";

    const diagnostics: Diagnostic[] = [];
    const winners: StubPlan[] = [];
    for (const resolution of this.settle(diagnostics)) {
      for (const candidate of resolution.kept) {
        winners.push(candidate.plan);
        diagnostics.push(...(candidate.notes ?? []));
      }
    }
    const merged = this.dropRedundant(winners);

    this.state = "MERGED";
    this.logger.info("Merged candidate plans", { candidates: this.intake.length, plans: merged.length });
    return toSynthesisPlan(merged, dedupeDiagnostics(diagnostics));
  }

  /**
   * One resolution per identity: the highest-precedence pass keeps every
   * candidate it proposed; the rest are discarded
   */
  private settle(diagnostics: Diagnostic[]): Resolution[] {
    const groups = new Map<string, PlanCandidate[]>();
    for (const candidate of this.intake) {
      const identity = planIdentity(candidate.plan);
      const group = groups.get(identity);
      if (group) {
        group.push(candidate);
      } else {
        groups.set(identity, [candidate]);
      }
    }

    const resolutions: Resolution[] = [];
    for (const [identity, group] of groups) {
      const ranked = rankCandidates(group);
      const winner: PassName = ranked[0].candidate.source;
      const kept = group.filter((c) => c.source === winner);
      const discarded = group.filter((c) => c.source !== winner);
      const keptPlans = kept.map((c) => c.plan);
      const conflicting = discarded.filter((c) => disagrees(c.plan, keptPlans));

      if (conflicting.length > 0) {
        const sources = Array.from(new Set(conflicting.map((c) => c.source)));
        diagnostics.push(conflictingEvidence(identity, winner, sources));
        this.logger.debug("Conflicting candidates", {
          identity,
          kept: winner,
          discarded: sources,
          ranking: ranked.map((score, i) => formatCandidateScore(score, i)),
        });
      }
      for (const candidate of discarded) {
        this.audit.recordDiscard(identity, candidate, winner);
      }
      this.audit.recordResolution(
        identity,
        ranked,
        winner,
        kept.length,
        conflicting.length > 0,
        discarded.length === 0 ? "single pass" : `${winner} outranks ${discarded.map((c) => c.source).join(", ")}`
      );
      resolutions.push({ identity, kept });
    }
    return resolutions;
  }

  /**
   * Remove winners that would duplicate or contradict what already exists
   */
  private dropRedundant(plans: readonly StubPlan[]): StubPlan[] {
    const types = new Map<string, TypePlan>();
    for (const plan of plans) {
      if (plan.plan === "type") types.set(plan.qualifiedName, plan);
    }

    const kept = plans.filter((plan) => {
      if (plan.plan === "type") return true;
      const reason = this.redundancy(plan, types);
      if (reason) {
        this.audit.recordDrop(planIdentity(plan), plan, reason);
        this.logger.debug("Dropped planned member", { plan: describePlan(plan), reason });
        return false;
      }
      return true;
    });

    return dedupeBy(kept, (plan) => {
      if (plan.plan === "type") return `type ${plan.qualifiedName}`;
      return `${plan.plan === "field" ? "field" : "code"} ${plan.owner} ${erasedSignature(plan)}`;
    });
  }

  private redundancy(plan: MemberPlan, types: ReadonlyMap<string, TypePlan>): string | undefined {
    const ownerPlan = types.get(plan.owner);
    const declared = this.index.declaredType(plan.owner) ? this.index.lookup(plan.owner) : undefined;
    const kind: TypeKind | undefined = ownerPlan?.kind ?? declared?.kind;

    if (plan.plan === "constructor" && (kind === "INTERFACE" || kind === "ANNOTATION")) {
      return `constructor on ${kind.toLowerCase()}`;
    }

    if (declared && !ownerPlan) {
      const exists =
        plan.plan === "method"
          ? declared.methods.some((m) => m.name === plan.name && sameErasure(m.params, plan.paramTypes))
          : plan.plan === "field"
            ? declared.fields.some((f) => f.name === plan.name)
            : declared.constructors.some((c) => sameErasure(c.params, plan.paramTypes));
      if (exists) return `already declared on ${plan.owner}`;
    }

    if (ownerPlan && plan.plan !== "constructor") {
      // A class still has to implement what an interface only declares.
      const mustImplement = ownerPlan.kind !== "INTERFACE";
      for (const supertype of ownerPlan.supertypes) {
        if (!this.index.isKnown(supertype.shape.qualifiedName)) continue;
        const inherited =
          plan.plan === "method"
            ? this.index
                .findMethods(supertype.shape, plan.name)
                .some(
                  (m) =>
                    !m.member.isStatic &&
                    sameErasure(m.member.params, plan.paramTypes) &&
                    !(mustImplement && m.owner.kind === "INTERFACE")
                )
            : this.index.findField(supertype.shape, plan.name) !== undefined;
        if (inherited) return `inherited from ${supertype.shape.qualifiedName}`;
      }
    }
    return undefined;
  }
}
