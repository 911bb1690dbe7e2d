/**
 * Planner context: the read-only view every planner pass shares.
 *
 * Owner kinds are decided here, once per missing type, so the passes agree on
 * whether a member lands on a class, an interface, an enum or a record.
 */

import { ownerOf, referenceKey, ReferenceSet, typeNameOf } from "./evidence";
import { ShimCatalog } from "./shim-catalog";
import { commonSubtype, informationScore, isNamed, isVoid, named, OBJECT, typeVariable } from "./type-shapes";
import { TypeIndex } from "./type-index";
import {
  NamedShape,
  PassName,
  PlanCandidate,
  RecordComponentPlan,
  SynthesisOptions,
  TypeKind,
  TypePlan,
  TypeShape,
  UnresolvedReference,
  UsageSite,
} from "./types";
import { typeParameterNames } from "./utils";

/** `name/arity` of the methods every type inherits from java.lang.Object. */
export const OBJECT_METHOD_KEYS: ReadonlySet<string> = new Set([
  "equals/1",
  "hashCode/0",
  "toString/0",
  "getClass/0",
  "notify/0",
  "notifyAll/0",
  "wait/0",
  "clone/0",
  "finalize/0",
]);

/** `name/arity` of the members the compiler gives every enum. */
export const ENUM_METHOD_KEYS: ReadonlySet<string> = new Set([
  "ordinal/0",
  "name/0",
  "compareTo/1",
  "values/0",
  "valueOf/1",
  "getDeclaringClass/0",
]);

const ENUM_SIGNALS: ReadonlySet<string> = new Set(["ordinal/0", "compareTo/1", "values/0", "valueOf/1"]);

/** Minimum language level with record declarations. */
const RECORD_VERSION = 16;

export function methodKey(name: string, arity: number): string {
  return `${name}/${arity}`;
}

export type KindDecision = {
  kind: TypeKind;
  reason: string;
  /** Known interface the type is only ever assigned to. */
  assignedInterface?: NamedShape;
  enumConstants: string[];
  recordComponents: RecordComponentPlan[];
};

/**
 * A planner pass: pure, reads the context, returns candidate plans
 */
export interface PlannerPass {
  readonly name: PassName;
  plan(context: PlannerContext): PlanCandidate[];
}

function allSites(references: readonly UnresolvedReference[]): UsageSite[] {
  return references.flatMap((reference) => reference.evidence);
}

function isFunctionalSite(site: UsageSite): boolean {
  return site.callShape === "LAMBDA_TARGET" || site.callShape === "METHOD_REFERENCE_TARGET";
}

export class PlannerContext {
  private decisions = new Map<string, KindDecision>();

  constructor(
    readonly references: ReferenceSet,
    readonly index: TypeIndex,
    readonly catalog: ShimCatalog,
    readonly options: SynthesisOptions,
    private readonly resolved: ReadonlySet<string> = new Set()
  ) {}

  /**
   * References the shim matcher has not already answered, in first-seen order
   */
  pending(kind?: UnresolvedReference["kind"]): UnresolvedReference[] {
    const all = kind ? this.references.ofKind(kind) : this.references.all();
    return all.filter((reference) => !this.resolved.has(referenceKey(reference)));
  }

  isResolved(reference: UnresolvedReference): boolean {
    return this.resolved.has(referenceKey(reference));
  }

  isMissing(qualifiedName: string): boolean {
    return this.references.typeReference(qualifiedName) !== undefined;
  }

  membersOf(qualifiedName: string, kind?: UnresolvedReference["kind"]): UnresolvedReference[] {
    const members = this.references.membersOf(qualifiedName);
    return kind ? members.filter((m) => m.kind === kind) : members;
  }

  /**
   * Kind of any type a member may be planned on: decided for missing types,
   * taken from the blueprint or the declaration otherwise
   */
  kindOf(qualifiedName: string): TypeKind | undefined {
    const reference = this.references.typeReference(qualifiedName);
    if (reference) {
      const shim = this.catalog.match(qualifiedName);
      return shim ? shim.blueprint.type.kind : this.decide(reference).kind;
    }
    return this.index.lookup(qualifiedName)?.kind;
  }

  /**
   * Package a missing type lands in; nested types share their outermost owner's
   */
  packageOf(qualifiedName: string): string {
    const reference = this.references.typeReference(qualifiedName);
    if (reference) {
      const hint = reference.ownerHint;
      return hint.kind === "type" ? this.packageOf(hint.qualifiedName) : ownerOf(hint);
    }
    const declared = this.index.declaredType(qualifiedName);
    if (declared) return declared.packageName;
    return this.index.lookup(qualifiedName)?.packageName ?? "";
  }

  // ---------------------------------------------------------------------------
  // Kind decision
  // ---------------------------------------------------------------------------

  decide(reference: UnresolvedReference): KindDecision {
    const qualifiedName = typeNameOf(reference);
    const cached = this.decisions.get(qualifiedName);
    if (cached) return cached;
    const decision = this.classify(reference, qualifiedName);
    this.decisions.set(qualifiedName, decision);
    return decision;
  }

  private classify(reference: UnresolvedReference, qualifiedName: string): KindDecision {
    const sites = reference.evidence;
    const idiom = (name: UsageSite["idioms"][number]): boolean => sites.some((s) => s.idioms.includes(name));
    const decision = (kind: TypeKind, reason: string, extra: Partial<KindDecision> = {}): KindDecision => ({
      kind,
      reason,
      enumConstants: [],
      recordComponents: [],
      ...extra,
    });

    const members = this.membersOf(qualifiedName);
    const constructors = members.filter((m) => m.kind === "CONSTRUCTOR");
    const fields = members.filter((m) => m.kind === "FIELD");
    const fieldWrites = allSites(fields).some((s) => s.idioms.includes("field-write"));

    if (idiom("annotation")) {
      return decision("ANNOTATION", "used as an annotation");
    }

    const anonymous = sites.filter((s) => s.idioms.includes("anonymous-subclass"));
    if (anonymous.length > 0 && !idiom("extends") && constructors.length === 0) {
      const overridden = new Set(
        anonymous.flatMap((s) => (s.overriddenMethods ?? []).map((m) => methodKey(m.name, m.params.length)))
      );
      if (overridden.size === 1) {
        return decision("INTERFACE", "anonymously subclassed with a single overridden method");
      }
    }

    if (idiom("implements") || idiom("interface-extends") || idiom("secondary-bound")) {
      return decision("INTERFACE", "named in an implements clause or as an interface bound");
    }
    if (sites.some(isFunctionalSite)) {
      return decision("INTERFACE", "target of a lambda or method reference");
    }

    const assignedInterface = this.assignedInterface(sites);
    const instanceFields = fields.some((f) => f.evidence.some((s) => !s.isStaticContext));
    if (assignedInterface && !idiom("constructed") && constructors.length === 0 && !fieldWrites && !instanceFields && !idiom("extends")) {
      return decision("INTERFACE", `assigned to interface ${assignedInterface.qualifiedName}`, { assignedInterface });
    }

    if (constructors.length === 0 && !fieldWrites && !idiom("extends") && anonymous.length === 0 && this.hasEnumIdioms(reference, qualifiedName)) {
      return decision("ENUM", "used through enumeration idioms", { enumConstants: this.constantsOf(qualifiedName) });
    }

    if (this.options.targetLanguageVersion >= RECORD_VERSION) {
      const components = this.recordShape(reference, qualifiedName);
      if (components) {
        return decision("RECORD", "accessor calls with value semantics", { recordComponents: components });
      }
    }

    return decision("CLASS", "default");
  }

  private assignedInterface(sites: readonly UsageSite[]): NamedShape | undefined {
    for (const site of sites) {
      if (!site.idioms.includes("assigned-to")) continue;
      const slot = site.expectedResultUsage;
      if (!slot || slot.kind !== "named") continue;
      if (this.index.lookup(slot.qualifiedName)?.kind === "INTERFACE") return slot;
    }
    return undefined;
  }

  private hasEnumIdioms(reference: UnresolvedReference, qualifiedName: string): boolean {
    if (reference.evidence.some((s) => s.idioms.includes("enum-collection") || s.idioms.includes("switch-label"))) {
      return true;
    }
    const members = this.membersOf(qualifiedName);
    const ownLabel = (s: UsageSite): boolean =>
      s.idioms.includes("switch-label") && s.expectedResultUsage !== undefined && isNamed(s.expectedResultUsage, qualifiedName);
    if (members.some((m) => m.kind === "FIELD" && m.evidence.some(ownLabel))) {
      return true;
    }
    return members.some(
      (m) => m.kind === "METHOD" && m.evidence.some((s) => ENUM_SIGNALS.has(methodKey(m.simpleName, s.argumentShapes.length)))
    );
  }

  /**
   * Static, never written fields whose value is the type itself, first seen first
   */
  private constantsOf(qualifiedName: string): string[] {
    return this.membersOf(qualifiedName, "FIELD")
      .filter((field) =>
        field.evidence.every((site) => {
          if (!site.isStaticContext || site.idioms.includes("field-write")) return false;
          const usage = site.expectedResultUsage;
          return usage === undefined || usage.kind === "top" || isNamed(usage, qualifiedName);
        })
      )
      .map((field) => field.simpleName);
  }

  /**
   * Record components when every use of the type reads like a record: zero-argument
   * accessors plus equality, hashing or string conversion, and nothing written
   */
  private recordShape(reference: UnresolvedReference, qualifiedName: string): RecordComponentPlan[] | undefined {
    const sites = reference.evidence;
    const blocked = ["extends", "implements", "interface-extends", "anonymous-subclass", "secondary-bound"] as const;
    if (sites.some((s) => blocked.some((b) => s.idioms.includes(b)))) return undefined;

    const members = this.membersOf(qualifiedName);
    if (members.some((m) => m.kind === "FIELD")) return undefined;

    const methods = members.filter((m) => m.kind === "METHOD");
    let valueSemantics = sites.some((s) => s.idioms.includes("string-conversion"));
    const accessors: UnresolvedReference[] = [];
    for (const method of methods) {
      const arities = new Set(method.evidence.map((s) => s.argumentShapes.length));
      const key = methodKey(method.simpleName, method.evidence[0]?.argumentShapes.length ?? 0);
      if (OBJECT_METHOD_KEYS.has(key) && arities.size === 1) {
        valueSemantics = valueSemantics || ["equals/1", "hashCode/0", "toString/0"].includes(key);
        continue;
      }
      const accessorLike = method.evidence.every(
        (s) => s.argumentShapes.length === 0 && !s.isStaticContext && s.callShape === "CALL" && !isVoid(s.expectedResultUsage)
      );
      if (!accessorLike) return undefined;
      accessors.push(method);
    }
    if (!valueSemantics || accessors.length === 0) return undefined;

    const constructions = members.filter((m) => m.kind === "CONSTRUCTOR").flatMap((m) => m.evidence);
    if (constructions.some((s) => s.argumentShapes.length !== accessors.length)) return undefined;

    const components: RecordComponentPlan[] = [];
    for (const [position, accessor] of accessors.entries()) {
      const type = this.componentType(accessor, constructions, position);
      // conflicting reads leave the accessor to the signature inferrer, which reports them
      if (!type) return undefined;
      components.push({ name: accessor.simpleName, type });
    }
    return components;
  }

  private componentType(accessor: UnresolvedReference, constructions: readonly UsageSite[], position: number): TypeShape | undefined {
    let merged: TypeShape | undefined;
    for (const site of accessor.evidence) {
      const usage = site.expectedResultUsage;
      if (!usage || usage.kind === "top") continue;
      if (!merged) {
        merged = usage;
        continue;
      }
      merged = commonSubtype(merged, usage, this.index);
      if (!merged) return undefined;
    }
    if (merged) return merged;
    const argument = constructions
      .map((s) => s.argumentShapes[position])
      .filter((shape): shape is TypeShape => shape !== undefined && shape.kind !== "top" && shape.kind !== "null")
      .sort((a, b) => informationScore(b) - informationScore(a))[0];
    return argument ?? named(OBJECT);
  }

  // ---------------------------------------------------------------------------
  // Generics and functional shape
  // ---------------------------------------------------------------------------

  /**
   * Number of type parameters a missing type needs: the most type arguments
   * any site gives it
   */
  arityOf(qualifiedName: string): number {
    const reference = this.references.typeReference(qualifiedName);
    if (!reference) return this.index.lookup(qualifiedName)?.typeParameters.length ?? 0;
    const shim = this.catalog.match(qualifiedName);
    if (shim) return shim.blueprint.type.typeParameters.length;
    let arity = 0;
    for (const site of reference.evidence) {
      if (site.idioms.includes("iterated")) continue;
      arity = Math.max(arity, site.typeArguments.length);
    }
    for (const site of allSites(this.membersOf(qualifiedName))) {
      arity = Math.max(arity, site.receiverTypeArguments?.length ?? 0);
    }
    return arity;
  }

  typeParameters(qualifiedName: string): string[] {
    const declared = this.index.lookup(qualifiedName);
    if (declared && !this.isMissing(qualifiedName)) return declared.typeParameters;
    const shim = this.catalog.match(qualifiedName);
    if (shim) return shim.blueprint.type.typeParameters.map((p) => p.name);
    return typeParameterNames(this.arityOf(qualifiedName));
  }

  /**
   * Owner's type variables as shapes, for rewriting receiver type arguments
   */
  typeVariables(qualifiedName: string): TypeShape[] {
    return this.typeParameters(qualifiedName).map((name) => typeVariable(name));
  }

  functionalSites(qualifiedName: string): UsageSite[] {
    return this.references.typeReference(qualifiedName)?.evidence.filter(isFunctionalSite) ?? [];
  }

  isFunctional(qualifiedName: string): boolean {
    return this.kindOf(qualifiedName) === "INTERFACE" && this.functionalSites(qualifiedName).length > 0;
  }

  /**
   * Name of the single abstract method: the first instance method called on
   * the type, else the java.util.function convention for its arity
   */
  samName(qualifiedName: string): string {
    const called = this.membersOf(qualifiedName, "METHOD").find(
      (m) =>
        m.evidence.some((s) => !s.isStaticContext) &&
        !m.evidence.some((s) => OBJECT_METHOD_KEYS.has(methodKey(m.simpleName, s.argumentShapes.length)))
    );
    if (called) return called.simpleName;

    const site = this.functionalSites(qualifiedName)[0];
    const arity = site?.argumentShapes.length ?? 0;
    const result = site?.expectedResultUsage;
    const returnsValue = result !== undefined && !isVoid(result);
    if (arity === 0) return returnsValue ? "get" : "run";
    if (!returnsValue) return "accept";
    if (result && result.kind === "primitive" && result.name === "boolean") return "test";
    return "apply";
  }

  // ---------------------------------------------------------------------------
  // Plans
  // ---------------------------------------------------------------------------

  /**
   * Type plan with the placement, generics and decided kind of a missing type
   */
  baseTypePlan(reference: UnresolvedReference): TypePlan {
    const qualifiedName = typeNameOf(reference);
    const decision = this.decide(reference);
    const hint = reference.ownerHint;
    return {
      plan: "type",
      qualifiedName,
      packageName: this.packageOf(qualifiedName),
      simpleName: reference.simpleName,
      enclosing: hint.kind === "type" ? hint.qualifiedName : undefined,
      kind: decision.kind,
      typeParameters: this.typeParameters(qualifiedName).map((name) => ({ name, bounds: [] })),
      supertypes: [],
      enumConstants: [...decision.enumConstants],
      recordComponents: decision.recordComponents.map((c) => ({ ...c })),
      origin: hint,
      functional: this.isFunctional(qualifiedName) || undefined,
    };
  }
}
