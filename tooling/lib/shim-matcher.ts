/**
 * Shim Matcher: answers references to well-known external types straight
 * from the catalog, before any inference runs.
 */

import { referenceKey, ReferenceSet, typeNameOf } from "./evidence";
import { Logger } from "./logger";
import { mapPlanShapes, planReferences } from "./plans";
import { ShimCatalog } from "./shim-catalog";
import { mapShape, named } from "./type-shapes";
import { TypeIndex } from "./type-index";
import {
  MemberPlan,
  OwnerHint,
  PassName,
  PlanCandidate,
  ShimBlueprint,
  SynthesisOptions,
  TypePlan,
  TypeShape,
  UnresolvedReference,
} from "./types";
import { qualifierOf, simpleNameOf, splitQualifiedName } from "./utils";

export type ShimMatchResult = {
  candidates: PlanCandidate[];
  /** Keys of the references the catalog answered. */
  resolved: Set<string>;
  /** Referenced name → catalog name, for every matched type. */
  matched: Map<string, string>;
};

type Emission = {
  /** Name the blueprint is emitted under. */
  name: string;
  blueprint: ShimBlueprint;
  origin: OwnerHint;
  /** Member names to keep; undefined keeps all. */
  keep?: ReadonlySet<string>;
  reason: string;
};

function memberName(member: Readonly<MemberPlan>): string {
  return member.plan === "constructor" ? "<init>" : member.name;
}

export class ShimMatcher {
  readonly name: PassName = "shim-matcher";

  constructor(
    private readonly catalog: ShimCatalog,
    private readonly index: TypeIndex,
    private readonly options: Pick<SynthesisOptions, "minimalStubbing">,
    private readonly logger: Logger
  ) {}

  match(references: ReferenceSet): ShimMatchResult {
    const resolved = new Set<string>();
    const matched = new Map<string, string>();
    const emissions: Emission[] = [];

    for (const reference of references.ofKind("TYPE")) {
      const qualifiedName = typeNameOf(reference);
      const found = this.catalog.match(qualifiedName);
      if (!found) continue;

      matched.set(qualifiedName, found.catalogName);
      resolved.add(referenceKey(reference));
      const members = references.membersOf(qualifiedName);
      for (const member of members) {
        if (this.declares(found.blueprint, member)) {
          resolved.add(referenceKey(member));
        }
      }
      emissions.push({
        name: qualifiedName,
        blueprint: found.blueprint,
        origin: reference.ownerHint,
        keep: this.options.minimalStubbing ? new Set(members.map((m) => m.simpleName)) : undefined,
        reason: found.via === "exact" ? `shim ${found.catalogName}` : `shim ${found.catalogName} (relocated)`,
      });
      this.logger.debug("Matched shim blueprint", { reference: qualifiedName, blueprint: found.catalogName, via: found.via });
    }

    this.addClosure(emissions, matched);

    const rename = (shape: TypeShape): TypeShape =>
      mapShape(shape, (s) => {
        if (s.kind !== "named") return undefined;
        const target = this.emittedName(s.qualifiedName, matched);
        return target === s.qualifiedName ? undefined : named(target, s.typeArgs.map(rename));
      });

    const candidates = emissions.flatMap((emission) => this.emit(emission, rename));
    this.logger.info("Shim matching finished", { matched: matched.size, candidates: candidates.length });
    return { candidates, resolved, matched };
  }

  /**
   * Whether the blueprint answers a member reference on its type
   */
  private declares(blueprint: ShimBlueprint, member: UnresolvedReference): boolean {
    if (member.kind === "CONSTRUCTOR") {
      const constructors = blueprint.members.filter((m) => m.plan === "constructor");
      if (constructors.length > 0) return true;
      return blueprint.type.kind === "CLASS" && member.evidence.every((s) => s.argumentShapes.length === 0);
    }
    const wanted = member.kind === "FIELD" ? "field" : "method";
    return blueprint.members.some((m) => m.plan === wanted && m.name === member.simpleName);
  }

  /**
   * Name a catalog type ends up under: the referenced name for a matched
   * (possibly relocated) type, its own name otherwise
   */
  private emittedName(catalogName: string, matched: ReadonlyMap<string, string>): string {
    for (const [referenced, source] of matched) {
      if (source === catalogName) return referenced;
    }
    return catalogName;
  }

  /**
   * Blueprints of catalog types the emitted signatures mention that nothing
   * else supplies
   */
  private addClosure(emissions: Emission[], matched: ReadonlyMap<string, string>): void {
    const emitted = new Set(emissions.map((e) => e.blueprint.type.qualifiedName));
    for (let i = 0; i < emissions.length; i += 1) {
      const { blueprint, keep } = emissions[i];
      const needed = new Set<string>();
      for (const supertype of blueprint.type.supertypes) needed.add(supertype.shape.qualifiedName);
      for (const member of blueprint.members) {
        if (keep && !keep.has(memberName(member))) continue;
        planReferences(member).forEach((name) => needed.add(name));
      }
      for (const name of needed) {
        if (emitted.has(name) || this.index.isKnown(name)) continue;
        const dependency = this.catalog.get(name);
        if (!dependency) continue;
        emitted.add(name);
        const packageName = splitQualifiedName(name).packageName;
        emissions.push({
          name: this.emittedName(name, matched),
          blueprint: dependency,
          origin: dependency.type.enclosing
            ? { kind: "type", qualifiedName: dependency.type.enclosing }
            : { kind: "package", packageName },
          keep: this.options.minimalStubbing ? new Set() : undefined,
          reason: `shim ${name} (needed by ${blueprint.type.qualifiedName})`,
        });
      }
    }
  }

  private emit(emission: Emission, rename: (shape: TypeShape) => TypeShape): PlanCandidate[] {
    const { blueprint, name, keep, reason } = emission;
    const base = mapPlanShapes({ ...blueprint.type }, rename);
    const { packageName } = splitQualifiedName(name);
    const enclosing = base.enclosing === undefined ? undefined : qualifierOf(name);
    const type: TypePlan = {
      ...base,
      qualifiedName: name,
      packageName,
      simpleName: simpleNameOf(name),
      enclosing,
      origin: emission.origin,
    };
    const candidates: PlanCandidate[] = [{ plan: type, source: this.name, reason }];
    for (const member of blueprint.members) {
      if (keep && !keep.has(memberName(member))) continue;
      const plan = mapPlanShapes({ ...member }, rename);
      candidates.push({ plan: { ...plan, owner: name }, source: this.name, reason });
    }
    return candidates;
  }
}
