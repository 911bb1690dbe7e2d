/**
 * Signature Inferrer: merges every usage site of one member into the
 * signature(s) that keep all of them well typed.
 *
 * Methods get one overload per observed arity. Parameters take the most
 * specific common supertype of the arguments seen at a position; returns take
 * the most specific common subtype of what the callers expect.
 */

import { conflictingEvidence } from "./diagnostics";
import { ownerOf, sitesWithIdiom } from "./evidence";
import { ENUM_METHOD_KEYS, KindDecision, methodKey, OBJECT_METHOD_KEYS, PlannerContext, PlannerPass } from "./planner-context";
import {
  BOOLEAN,
  commonSubtype,
  commonSupertype,
  formatShape,
  informationScore,
  isAssignable,
  isNamed,
  isVoid,
  mapShape,
  named,
  OBJECT,
  shapesEqual,
  STRING,
  typeVariable,
  VOID,
  wildcard,
} from "./type-shapes";
import {
  ConstructorPlan,
  Diagnostic,
  FieldPlan,
  MethodPlan,
  PassName,
  PlanCandidate,
  TypeKind,
  TypeParameterPlan,
  TypeShape,
  UnresolvedReference,
  UsageSite,
  Visibility,
} from "./types";
import { pushTo } from "./utils";

const INTEGRAL_CONSTANTS: ReadonlySet<string> = new Set(["byte", "short", "int", "long"]);
const VISIBILITY_RANK: Record<Visibility, number> = { public: 3, protected: 2, package: 1, private: 0 };

/** Sites of one member that share an arity, in first-seen order. */
type ArityGroup = { arity: number; sites: UsageSite[] };

/**
 * Variables a member may mention: the owner's, bound positionally to the
 * receiver type arguments each site saw
 */
type OwnerGenerics = { variables: TypeShape[]; names: string[] };

function freshName(taken: readonly string[], base: string): string {
  if (!taken.includes(base)) return base;
  let i = 2;
  while (taken.includes(`${base}${i}`)) i += 1;
  return `${base}${i}`;
}

function groupByArity(sites: readonly UsageSite[]): ArityGroup[] {
  const byArity = new Map<number, UsageSite[]>();
  for (const site of sites) pushTo(byArity, site.argumentShapes.length, site);
  const information = (group: UsageSite[]): number =>
    group.reduce((total, site) => total + site.argumentShapes.reduce((sum, s) => sum + informationScore(s), 0), 0);
  return Array.from(byArity, ([arity, group]) => ({ arity, sites: group })).sort(
    (a, b) => b.sites.length - a.sites.length || information(b.sites) - information(a.sites) || a.arity - b.arity
  );
}

/**
 * A shape as written at a site, rewritten so that the receiver's type
 * arguments become the owner's type variables
 */
function generalize(shape: TypeShape, site: UsageSite, owner: string, generics: OwnerGenerics): TypeShape {
  const receiver = site.receiverTypeArguments ?? [];
  if (site.isStaticContext || receiver.length === 0 || generics.variables.length === 0) return shape;
  const position = receiver.findIndex((arg) => arg.kind !== "top" && shapesEqual(arg, shape));
  if (position >= 0 && position < generics.variables.length) return generics.variables[position];
  if (shape.kind === "named" && shape.qualifiedName === owner && shape.typeArgs.length === receiver.length) {
    const same = shape.typeArgs.every((arg, i) => shapesEqual(arg, receiver[i]));
    if (same) return named(owner, generics.variables.slice(0, receiver.length));
  }
  return shape;
}

/**
 * Close a shape over the variables in scope: a stray variable becomes a
 * wildcard inside type arguments and Object elsewhere
 */
function closeOver(shape: TypeShape, inScope: readonly string[]): TypeShape {
  const inArguments = (s: TypeShape): TypeShape =>
    mapShape(s, (t) => {
      if (t.kind === "typeVariable" && !inScope.includes(t.name)) return wildcard();
      if (t.kind === "named") return named(t.qualifiedName, t.typeArgs.map(inArguments));
      return undefined;
    });
  if (shape.kind === "typeVariable") return inScope.includes(shape.name) ? shape : named(OBJECT);
  if (shape.kind === "wildcard") {
    return shape.bound && shape.bound.variance === "extends" ? closeOver(shape.bound.shape, inScope) : named(OBJECT);
  }
  if (shape.kind === "array") return { kind: "array", of: closeOver(shape.of, inScope) };
  return inArguments(shape);
}

function concreteOrObject(shape: TypeShape | undefined): TypeShape {
  if (!shape || shape.kind === "top" || shape.kind === "null") return named(OBJECT);
  return shape;
}

export class SignatureInferrer implements PlannerPass {
  readonly name: PassName = "signature-inferrer";

  plan(context: PlannerContext): PlanCandidate[] {
    const candidates: PlanCandidate[] = [];
    const constants = new ConstantAllocator();
    for (const reference of context.pending()) {
      if (reference.ownerHint.kind !== "type") continue;
      const owner = ownerOf(reference.ownerHint);
      const kind = context.kindOf(owner);
      if (!kind) continue;
      switch (reference.kind) {
        case "METHOD":
          candidates.push(...this.methods(context, reference, owner, kind));
          break;
        case "FIELD": {
          const field = this.field(context, reference, owner, kind, constants);
          if (field) candidates.push(field);
          break;
        }
        case "CONSTRUCTOR":
          candidates.push(...this.constructors(context, reference, owner, kind));
          break;
        case "TYPE":
          break;
      }
    }
    return candidates;
  }

  // ---------------------------------------------------------------------------
  // Methods
  // ---------------------------------------------------------------------------

  private methods(context: PlannerContext, reference: UnresolvedReference, owner: string, kind: TypeKind): PlanCandidate[] {
    if (kind === "ANNOTATION") {
      const element = this.annotationElement(reference, owner);
      return element ? [element] : [];
    }
    const name = reference.simpleName;
    if (context.isFunctional(owner) && context.samName(owner) === name) return [];

    const accessors = kind === "RECORD" ? this.decisionOf(context, owner)?.recordComponents ?? [] : [];
    const generics = this.genericsOf(context, owner);
    const candidates: PlanCandidate[] = [];
    for (const group of groupByArity(reference.evidence)) {
      const key = methodKey(name, group.arity);
      if (OBJECT_METHOD_KEYS.has(key)) continue;
      if (kind === "ENUM" && ENUM_METHOD_KEYS.has(key)) continue;
      if (group.arity === 0 && accessors.some((c) => c.name === name)) continue;
      candidates.push(this.overload(context, reference, owner, kind, group, generics));
    }
    return candidates;
  }

  private overload(
    context: PlannerContext,
    reference: UnresolvedReference,
    owner: string,
    kind: TypeKind,
    group: ArityGroup,
    generics: OwnerGenerics
  ): PlanCandidate {
    const name = reference.simpleName;
    const isStatic = group.sites.some((s) => s.isStaticContext);
    const inScope = isStatic ? [] : generics.names;
    const overrides = group.sites.filter((s) => s.callShape === "OVERRIDE");
    const typeParameters: TypeParameterPlan[] = [];
    const notes: Diagnostic[] = [];

    const explicitArity = Math.max(0, ...group.sites.map((s) => s.typeArguments.length));
    for (let i = 0; i < explicitArity; i += 1) {
      typeParameters.push({ name: freshName([...inScope, ...typeParameters.map((p) => p.name)], "T"), bounds: [] });
    }

    let paramTypes: TypeShape[];
    let returnType: TypeShape;
    const exact = overrides[0];
    if (exact) {
      paramTypes = exact.argumentShapes.map((s) => closeOver(generalize(s, exact, owner, generics), inScope));
      returnType = closeOver(generalize(exact.expectedResultUsage ?? VOID, exact, owner, generics), inScope);
    } else {
      paramTypes = this.parameters(context, group, owner, generics, inScope);
      const result = this.returnType(context, group.sites, owner, generics, inScope);
      returnType = result.shape;
      if (result.conflict) {
        const identity = `method ${owner}#${name}`;
        if (context.options.preserveGenerics) {
          const variable = freshName([...inScope, ...typeParameters.map((p) => p.name)], "R");
          typeParameters.push({ name: variable, bounds: [] });
          returnType = typeVariable(variable);
        } else {
          notes.push(conflictingEvidence(identity, this.name, [], result.conflict));
        }
      }
    }

    const plan: MethodPlan = {
      plan: "method",
      owner,
      name,
      paramTypes,
      returnType,
      visibility: this.visibility(kind, overrides),
      isStatic,
      isAbstract: false,
      isDefault: false,
      varargs: false,
      typeParameters,
      thrownTypes: [],
    };
    if (kind === "INTERFACE" && !isStatic) {
      const key = methodKey(name, group.arity);
      if (this.interfaceMethodNeedsBody(context, owner, key)) {
        plan.isDefault = true;
      } else {
        plan.isAbstract = true;
      }
    }
    return {
      plan,
      source: this.name,
      reason: exact ? "overridden in the fragment" : `${group.sites.length} call site(s) with ${group.arity} argument(s)`,
      notes: notes.length > 0 ? notes : undefined,
    };
  }

  private parameters(
    context: PlannerContext,
    group: ArityGroup,
    owner: string,
    generics: OwnerGenerics,
    inScope: readonly string[]
  ): TypeShape[] {
    const params: TypeShape[] = [];
    for (let position = 0; position < group.arity; position += 1) {
      let merged: TypeShape | undefined;
      for (const site of group.sites) {
        const shape = generalize(site.argumentShapes[position], site, owner, generics);
        if (shape.kind === "top") continue;
        merged = merged ? commonSupertype(merged, shape, context.index) : shape;
        if (merged.kind === "top") break;
      }
      params.push(closeOver(concreteOrObject(merged), inScope));
    }
    return params;
  }

  /**
   * void when every site discards the value; otherwise the most specific
   * shape every expectation accepts
   */
  private returnType(
    context: PlannerContext,
    sites: readonly UsageSite[],
    owner: string,
    generics: OwnerGenerics,
    inScope: readonly string[]
  ): { shape: TypeShape; conflict?: string } {
    if (sites.every((s) => isVoid(s.expectedResultUsage))) return { shape: VOID };
    let merged: TypeShape | undefined;
    for (const site of sites) {
      const usage = site.expectedResultUsage;
      if (!usage || usage.kind === "top" || isVoid(usage)) continue;
      const shape = generalize(usage, site, owner, generics);
      if (!merged) {
        merged = shape;
        continue;
      }
      const narrower = commonSubtype(merged, shape, context.index);
      if (!narrower) {
        return { shape: named(OBJECT), conflict: `result expected as ${formatShape(merged)} and ${formatShape(shape)}` };
      }
      merged = narrower;
    }
    return { shape: closeOver(concreteOrObject(merged), inScope) };
  }

  /**
   * Overriding declarations cannot narrow visibility, so the planned method
   * is no more visible than the least visible override
   */
  private visibility(kind: TypeKind, overrides: readonly UsageSite[]): Visibility {
    if (kind === "INTERFACE" || overrides.length === 0) return "public";
    let visibility: Visibility = "public";
    for (const site of overrides) {
      const declared = site.declaredVisibility ?? "public";
      const usable = declared === "private" ? "package" : declared;
      if (VISIBILITY_RANK[usable] < VISIBILITY_RANK[visibility]) visibility = usable;
    }
    return visibility;
  }

  /**
   * An interface method is abstract unless something already implementing
   * the interface would be left without it
   */
  private interfaceMethodNeedsBody(context: PlannerContext, owner: string, key: string): boolean {
    if (!context.isMissing(owner)) return true;
    if (context.isFunctional(owner)) return true;
    const reference = context.references.typeReference(owner);
    if (!reference) return false;
    const implementors = [...sitesWithIdiom(reference, "implements"), ...sitesWithIdiom(reference, "anonymous-subclass")];
    return implementors.some((site) => site.implementorMethods !== undefined && !site.implementorMethods.includes(key));
  }

  private annotationElement(reference: UnresolvedReference, owner: string): PlanCandidate | undefined {
    let merged: TypeShape | undefined;
    for (const site of reference.evidence) {
      const value = site.expectedResultUsage;
      if (!value || value.kind === "top" || isVoid(value)) continue;
      merged = merged ? commonSupertype(merged, value) : value;
    }
    const plan: MethodPlan = {
      plan: "method",
      owner,
      name: reference.simpleName,
      paramTypes: [],
      returnType: this.annotationValueType(merged),
      visibility: "public",
      isStatic: false,
      isAbstract: true,
      isDefault: false,
      varargs: false,
      typeParameters: [],
      thrownTypes: [],
    };
    return { plan, source: this.name, reason: "annotation element" };
  }

  /**
   * Element types are limited to primitives, String, Class, enums,
   * annotations and arrays of those
   */
  private annotationValueType(shape: TypeShape | undefined): TypeShape {
    if (!shape || shape.kind === "top" || shape.kind === "null" || shape.kind === "wildcard" || shape.kind === "typeVariable") {
      return named(STRING);
    }
    if (shape.kind === "array") return { kind: "array", of: this.annotationValueType(shape.of) };
    if (shape.kind === "named" && shape.qualifiedName === "java.lang.Class") return named("java.lang.Class", [wildcard()]);
    if (isNamed(shape, OBJECT)) return named(STRING);
    return shape;
  }

  // ---------------------------------------------------------------------------
  // Fields
  // ---------------------------------------------------------------------------

  private field(
    context: PlannerContext,
    reference: UnresolvedReference,
    owner: string,
    kind: TypeKind,
    constants: ConstantAllocator
  ): PlanCandidate | undefined {
    if (kind === "ENUM" && this.decisionOf(context, owner)?.enumConstants.includes(reference.simpleName)) {
      return undefined;
    }
    const generics = this.genericsOf(context, owner);
    const sites = reference.evidence;
    const isStatic = kind === "INTERFACE" || kind === "ANNOTATION" || sites.some((s) => s.isStaticContext);
    const inScope = isStatic ? [] : generics.names;

    let read: TypeShape | undefined;
    let written: TypeShape | undefined;
    const notes: Diagnostic[] = [];
    for (const site of sites) {
      if (site.idioms.includes("field-write")) {
        const value = site.argumentShapes[0];
        if (!value || value.kind === "top") continue;
        const shape = generalize(value, site, owner, generics);
        written = written ? commonSupertype(written, shape, context.index) : shape;
        continue;
      }
      const usage = site.expectedResultUsage;
      if (!usage || usage.kind === "top" || isVoid(usage)) continue;
      const shape = generalize(usage, site, owner, generics);
      const narrowed = read ? commonSubtype(read, shape, context.index) : shape;
      if (read && !narrowed) {
        const detail = `value expected as ${formatShape(read)} and ${formatShape(shape)}`;
        notes.push(conflictingEvidence(`field ${owner}#${reference.simpleName}`, this.name, [], detail));
      }
      read = narrowed ?? read;
    }
    let type: TypeShape;
    if (written && written.kind !== "top") {
      type = read && !isAssignable(written, read, context.index) ? read : written;
    } else {
      type = concreteOrObject(read);
    }
    type = closeOver(concreteOrObject(type), inScope);

    const isConstant = sites.some((s) => s.idioms.includes("switch-label"));
    const plan: FieldPlan = {
      plan: "field",
      owner,
      name: reference.simpleName,
      type,
      isStatic: isStatic || isConstant,
      isFinal: isConstant || kind === "INTERFACE" || kind === "ANNOTATION",
      constantValue: isConstant ? constants.next(type, reference.simpleName) : undefined,
    };
    return {
      plan,
      source: this.name,
      reason: isConstant ? "constant used as a switch label" : `${sites.length} access(es)`,
      notes: notes.length > 0 ? notes : undefined,
    };
  }

  // ---------------------------------------------------------------------------
  // Constructors
  // ---------------------------------------------------------------------------

  private constructors(context: PlannerContext, reference: UnresolvedReference, owner: string, kind: TypeKind): PlanCandidate[] {
    if (kind !== "CLASS") return [];
    const generics = this.genericsOf(context, owner);
    return groupByArity(reference.evidence).map((group) => {
      const plan: ConstructorPlan = {
        plan: "constructor",
        owner,
        paramTypes: this.parameters(context, group, owner, generics, generics.names),
        varargs: false,
      };
      return { plan, source: this.name, reason: `${group.sites.length} construction(s) with ${group.arity} argument(s)` };
    });
  }

  // ---------------------------------------------------------------------------

  private genericsOf(context: PlannerContext, owner: string): OwnerGenerics {
    const names = context.typeParameters(owner);
    return { names, variables: names.map((n) => typeVariable(n)) };
  }

  /**
   * Kind decision of a missing owner; declared owners have none
   */
  private decisionOf(context: PlannerContext, owner: string): KindDecision | undefined {
    const reference = context.references.typeReference(owner);
    return reference ? context.decide(reference) : undefined;
  }
}

/**
 * Hands out distinct constant values so that labels of one switch never
 * collide, whichever owners they come from
 */
class ConstantAllocator {
  private nextNumber = 0;
  private nextChar = 0;
  private strings = new Set<string>();

  next(type: TypeShape, name: string): string | undefined {
    if (type.kind === "primitive") {
      if (INTEGRAL_CONSTANTS.has(type.name)) {
        const value = `${this.nextNumber}`;
        this.nextNumber += 1;
        return value;
      }
      if (type.name === "char") {
        const value = String.fromCharCode(0x41 + this.nextChar);
        this.nextChar += 1;
        return value;
      }
      if (shapesEqual(type, BOOLEAN)) return "false";
      return undefined;
    }
    if (isNamed(type, STRING)) {
      let value = name;
      let i = 2;
      while (this.strings.has(value)) {
        value = `${name}${i}`;
        i += 1;
      }
      this.strings.add(value);
      return value;
    }
    return undefined;
  }
}
