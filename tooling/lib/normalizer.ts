/**
 * Post-Synthesis Normalizer: folds a synthesized top-level type that only
 * exists because a simple name could not be placed into the declaration that
 * every one of its use sites can already see.
 */

import { CompilationUnit, FragmentModel, MemberDeclaration, TypeDeclaration } from "./ast";
import { unresolvedAfterSynthesis } from "./diagnostics";
import { ReferenceSet } from "./evidence";
import { Logger } from "./logger";
import { allPlans, erasedSignature, mapPlanShapes, planIdentity, toSynthesisPlan } from "./plans";
import { SynthesizedType, SynthesisOutput } from "./synthesizer";
import { mapShape, named } from "./type-shapes";
import { TypeIndex } from "./type-index";
import { Diagnostic, ReferenceDescriptor, StubPlan, SynthesisPlan, TypeShape, UsageSite } from "./types";
import { compareStrings, dedupeBy, isPlainObject, qualifierOf } from "./utils";

export type MergedType = {
  from: string;
  to: string;
};

export type NormalizationResult = {
  plan: SynthesisPlan;
  merged: MergedType[];
};

/** A declaration a redundant type may fold into. */
type Survivor = {
  qualifiedName: string;
  packageName: string;
  enclosing?: string;
  /** Declaration members can be added to; absent for context types. */
  decl?: TypeDeclaration;
};

function rebase(qualifiedName: string, from: string, to: string): string {
  if (qualifiedName === from) return to;
  return qualifiedName.startsWith(`${from}.`) ? `${to}${qualifiedName.slice(from.length)}` : qualifiedName;
}

function rebasePlan(plan: StubPlan, from: string, to: string): StubPlan {
  const rename = (shape: TypeShape): TypeShape =>
    mapShape(shape, (s) =>
      s.kind === "named" && rebase(s.qualifiedName, from, to) !== s.qualifiedName
        ? named(rebase(s.qualifiedName, from, to), s.typeArgs.map(rename))
        : undefined
    );
  const mapped = mapPlanShapes(plan, rename);
  if (mapped.plan !== "type") return { ...mapped, owner: rebase(mapped.owner, from, to) };
  return {
    ...mapped,
    qualifiedName: rebase(mapped.qualifiedName, from, to),
    enclosing: mapped.enclosing === undefined ? undefined : rebase(mapped.enclosing, from, to),
  };
}

/**
 * Point every bound type node and qualified name expression at the survivor
 */
function rebindModel(value: unknown, from: string, to: string): void {
  if (Array.isArray(value)) {
    for (const item of value) rebindModel(item, from, to);
    return;
  }
  if (!isPlainObject(value)) return;
  if (value.type === "NamedType" && typeof value.binding === "string") {
    const rebound = rebase(value.binding, from, to);
    if (rebound !== value.binding) {
      value.binding = rebound;
      value.name = rebound;
    }
  }
  if (value.type === "Name" && typeof value.name === "string" && value.name.includes(".")) {
    value.name = rebase(value.name, from, to);
  }
  for (const child of Object.values(value)) {
    if (typeof child === "object" && child !== null) rebindModel(child, from, to);
  }
}

function memberKey(member: MemberDeclaration): string | undefined {
  switch (member.type) {
    case "FieldDeclaration":
      return `field ${member.name}`;
    case "MethodDeclaration":
      return `method ${member.name}/${member.parameters.length}`;
    case "ConstructorDeclaration":
      return `constructor ${member.parameters.length}`;
    case "TypeDeclaration":
      return `type ${member.name}`;
    default:
      return undefined;
  }
}

function referenceOf(member: MemberDeclaration, owner: string): ReferenceDescriptor | undefined {
  switch (member.type) {
    case "FieldDeclaration":
      return { kind: "FIELD", owner, simpleName: member.name };
    case "MethodDeclaration":
      return { kind: "METHOD", owner, simpleName: member.name };
    case "ConstructorDeclaration":
      return { kind: "CONSTRUCTOR", owner, simpleName: "<init>" };
    case "TypeDeclaration":
      return { kind: "TYPE", owner, simpleName: member.name };
    default:
      return undefined;
  }
}

export class PostSynthesisNormalizer {
  constructor(
    private readonly index: TypeIndex,
    private readonly references: ReferenceSet,
    private readonly logger: Logger
  ) {}

  normalize(model: FragmentModel, plan: SynthesisPlan, output: SynthesisOutput): NormalizationResult {
    const merged: MergedType[] = [];
    const diagnostics: Diagnostic[] = [];
    let plans = allPlans(plan);

    const redundant = Array.from(output.types.values())
      .filter((t) => t.unit !== undefined && t.plan.origin.kind === "unqualified")
      .sort((a, b) => compareStrings(a.plan.qualifiedName, b.plan.qualifiedName));

    for (const candidate of redundant) {
      const from = candidate.plan.qualifiedName;
      const sites = this.references.typeReference(from)?.evidence ?? [];
      if (sites.length === 0) continue;
      const survivor = this.survivors(candidate, output).find((s) => sites.every((site) => this.isVisible(s, site, model)));
      if (!survivor) continue;

      const to = survivor.qualifiedName;
      model.units = model.units.filter((unit) => unit !== candidate.unit);
      diagnostics.push(...this.moveMembers(candidate, survivor));
      rebindModel(model.units, from, to);
      plans = plans
        .filter((p) => (p.plan === "type" ? p.qualifiedName !== from : survivor.decl !== undefined || p.owner !== from))
        .map((p) => rebasePlan(p, from, to));
      output.types.delete(from);
      merged.push({ from, to });
      this.logger.info("Merged redundant declaration", { from, to });
    }

    if (merged.length === 0) return { plan, merged };
    const deduped = dedupeBy(plans, (p) => (p.plan === "type" ? planIdentity(p) : `${p.plan} ${p.owner} ${erasedSignature(p)}`));
    return { plan: toSynthesisPlan(deduped, [...plan.diagnostics, ...diagnostics]), merged };
  }

  /**
   * Same-named declarations that did not come from an unqualified name
   */
  private survivors(candidate: SynthesizedType, output: SynthesisOutput): Survivor[] {
    const simpleName = candidate.plan.simpleName;
    const found: Survivor[] = [];
    for (const declared of this.index.declaredTypes()) {
      if (declared.simpleName !== simpleName || declared.qualifiedName === candidate.plan.qualifiedName) continue;
      found.push({
        qualifiedName: declared.qualifiedName,
        packageName: declared.packageName,
        enclosing: declared.enclosing,
        decl: declared.origin === "fragment" ? declared.decl : undefined,
      });
    }
    for (const synthesized of output.types.values()) {
      const p = synthesized.plan;
      if (p.simpleName !== simpleName || p.origin.kind === "unqualified" || p.qualifiedName === candidate.plan.qualifiedName) continue;
      found.push({ qualifiedName: p.qualifiedName, packageName: p.packageName, enclosing: p.enclosing, decl: synthesized.decl });
    }
    return found.sort((a, b) => compareStrings(a.qualifiedName, b.qualifiedName));
  }

  private isVisible(survivor: Survivor, site: UsageSite, model: FragmentModel): boolean {
    const unit: CompilationUnit | undefined = model.units.find((u) => u.path === site.location.unit);
    const imports = unit?.imports.filter((i) => !i.isStatic) ?? [];
    if (imports.some((i) => !i.onDemand && i.name === survivor.qualifiedName)) return true;

    if (survivor.enclosing === undefined) {
      if (survivor.packageName === site.location.packageName) return true;
      return imports.some((i) => i.onDemand && i.name === survivor.packageName);
    }
    const enclosingType = site.location.enclosingType;
    if (enclosingType && rebase(enclosingType, survivor.enclosing, "") !== enclosingType) return true;
    return imports.some((i) => i.onDemand && i.name === qualifierOf(survivor.qualifiedName));
  }

  private moveMembers(candidate: SynthesizedType, survivor: Survivor): Diagnostic[] {
    const target = survivor.decl;
    if (!target) {
      return candidate.decl.members.flatMap((member): Diagnostic[] => {
        const reference = referenceOf(member, survivor.qualifiedName);
        return reference ? [unresolvedAfterSynthesis(reference, "owner is a context type and cannot be extended")] : [];
      });
    }
    const existing = new Set(target.members.map(memberKey));
    for (const member of candidate.decl.members) {
      const key = memberKey(member);
      if (key && existing.has(key)) continue;
      target.members.push(member);
      if (key) existing.add(key);
    }
    this.logger.debug("Moved members", {
      from: candidate.plan.qualifiedName,
      to: survivor.qualifiedName,
      count: candidate.decl.members.length,
    });
    return [];
  }
}
