/**
 * Helpers over stub plans: identities, ordering and shape rewriting
 */

import { erase, formatShape, named, referencedTypes, signatureKey } from "./type-shapes";
import {
  ConstructorPlan,
  FieldPlan,
  MemberPlan,
  MethodPlan,
  NamedShape,
  StubPlan,
  SynthesisPlan,
  TypeParameterPlan,
  TypePlan,
  TypeShape,
} from "./types";
import { compareStrings } from "./utils";

/**
 * Merge identity: a type by qualified name, a member by owner, kind and name
 */
export function planIdentity(plan: StubPlan): string {
  switch (plan.plan) {
    case "type":
      return `type ${plan.qualifiedName}`;
    case "method":
      return `method ${plan.owner}#${plan.name}`;
    case "field":
      return `field ${plan.owner}#${plan.name}`;
    case "constructor":
      return `constructor ${plan.owner}`;
  }
}

/**
 * Erased signature: two members with the same key cannot coexist on one owner
 */
export function erasedSignature(plan: MemberPlan): string {
  switch (plan.plan) {
    case "method":
      return signatureKey(plan.name, plan.paramTypes);
    case "constructor":
      return signatureKey("<init>", plan.paramTypes);
    case "field":
      return plan.name;
  }
}

export function describePlan(plan: StubPlan): string {
  const params = (shapes: TypeShape[]): string => shapes.map((s) => formatShape(s)).join(", ");
  switch (plan.plan) {
    case "type":
      return `${plan.kind} ${plan.qualifiedName}`;
    case "method":
      return `${formatShape(plan.returnType)} ${plan.owner}#${plan.name}(${params(plan.paramTypes)})`;
    case "field":
      return `${formatShape(plan.type)} ${plan.owner}#${plan.name}`;
    case "constructor":
      return `${plan.owner}(${params(plan.paramTypes)})`;
  }
}

function mapNamed(shape: NamedShape, fn: (shape: TypeShape) => TypeShape): NamedShape {
  const mapped = fn(shape);
  return mapped.kind === "named" ? mapped : named(shape.qualifiedName);
}

function mapTypeParameters(parameters: readonly TypeParameterPlan[], fn: (shape: TypeShape) => TypeShape): TypeParameterPlan[] {
  return parameters.map((p) => ({ name: p.name, bounds: p.bounds.map(fn) }));
}

export function mapPlanShapes(plan: TypePlan, fn: (shape: TypeShape) => TypeShape): TypePlan;
export function mapPlanShapes(plan: MethodPlan, fn: (shape: TypeShape) => TypeShape): MethodPlan;
export function mapPlanShapes(plan: FieldPlan, fn: (shape: TypeShape) => TypeShape): FieldPlan;
export function mapPlanShapes(plan: ConstructorPlan, fn: (shape: TypeShape) => TypeShape): ConstructorPlan;
export function mapPlanShapes(plan: MemberPlan, fn: (shape: TypeShape) => TypeShape): MemberPlan;
export function mapPlanShapes(plan: StubPlan, fn: (shape: TypeShape) => TypeShape): StubPlan;
export function mapPlanShapes(plan: StubPlan, fn: (shape: TypeShape) => TypeShape): StubPlan {
  switch (plan.plan) {
    case "type":
      return {
        ...plan,
        typeParameters: mapTypeParameters(plan.typeParameters, fn),
        supertypes: plan.supertypes.map((s) => ({ relation: s.relation, shape: mapNamed(s.shape, fn) })),
        enumConstants: [...plan.enumConstants],
        recordComponents: plan.recordComponents.map((c) => ({ name: c.name, type: fn(c.type) })),
      };
    case "method":
      return {
        ...plan,
        paramTypes: plan.paramTypes.map(fn),
        returnType: fn(plan.returnType),
        typeParameters: mapTypeParameters(plan.typeParameters, fn),
        thrownTypes: plan.thrownTypes.map(fn),
      };
    case "field":
      return { ...plan, type: fn(plan.type) };
    case "constructor":
      return { ...plan, paramTypes: plan.paramTypes.map(fn) };
  }
}

/**
 * Qualified names of every type a plan's signatures mention
 */
export function planReferences(plan: StubPlan): Set<string> {
  const found = new Set<string>();
  mapPlanShapes(plan, (shape) => {
    referencedTypes(shape, found);
    return shape;
  });
  return found;
}

function planOwner(plan: StubPlan): string {
  return plan.plan === "type" ? plan.qualifiedName : plan.owner;
}

/**
 * Total order: by owner, then kind, then name and erased signature
 */
export function comparePlans(a: StubPlan, b: StubPlan): number {
  const byOwner = compareStrings(planOwner(a), planOwner(b));
  if (byOwner !== 0) return byOwner;
  const rank = { type: 0, field: 1, constructor: 2, method: 3 };
  if (rank[a.plan] !== rank[b.plan]) return rank[a.plan] - rank[b.plan];
  if (a.plan === "type" || b.plan === "type") return 0;
  return compareStrings(`${erasedSignature(a)} ${describePlan(a)}`, `${erasedSignature(b)} ${describePlan(b)}`);
}

/**
 * Split a flat plan list into a sorted SynthesisPlan
 */
export function toSynthesisPlan(plans: readonly StubPlan[], diagnostics: SynthesisPlan["diagnostics"]): SynthesisPlan {
  const sorted = [...plans].sort(comparePlans);
  return {
    types: sorted.filter((p): p is TypePlan => p.plan === "type"),
    methods: sorted.filter((p): p is MethodPlan => p.plan === "method"),
    fields: sorted.filter((p): p is FieldPlan => p.plan === "field"),
    constructors: sorted.filter((p): p is ConstructorPlan => p.plan === "constructor"),
    diagnostics,
  };
}

export function allPlans(plan: SynthesisPlan): StubPlan[] {
  return [...plan.types, ...plan.fields, ...plan.constructors, ...plan.methods];
}

/**
 * Erase-level equality of two parameter lists
 */
export function sameErasure(a: readonly TypeShape[], b: readonly TypeShape[]): boolean {
  return a.length === b.length && a.every((shape, i) => formatShape(erase(shape)) === formatShape(erase(b[i])));
}
