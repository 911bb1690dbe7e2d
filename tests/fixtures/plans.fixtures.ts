/**
 * Test fixtures for plan-level tests
 * Builders with sensible defaults so each test states only what it checks
 */

import { INT, named, VOID } from "../../tooling/lib/type-shapes";
import {
  ConstructorPlan,
  FieldPlan,
  MethodPlan,
  PassName,
  PlanCandidate,
  StubPlan,
  TypeKind,
  TypePlan,
} from "../../tooling/lib/types";
import { qualifierOf, simpleNameOf } from "../../tooling/lib/utils";

export function createTypePlan(qualifiedName: string, kind: TypeKind = "CLASS", overrides: Partial<TypePlan> = {}): TypePlan {
  const packageName = overrides.packageName ?? qualifierOf(qualifiedName);
  return {
    plan: "type",
    qualifiedName,
    packageName,
    simpleName: simpleNameOf(qualifiedName),
    kind,
    typeParameters: [],
    supertypes: [],
    enumConstants: [],
    recordComponents: [],
    origin: { kind: "unqualified", callerPackage: packageName },
    ...overrides,
  };
}

export function createMethodPlan(owner: string, name: string, overrides: Partial<MethodPlan> = {}): MethodPlan {
  return {
    plan: "method",
    owner,
    name,
    paramTypes: [],
    returnType: VOID,
    visibility: "public",
    isStatic: false,
    isAbstract: false,
    isDefault: false,
    varargs: false,
    typeParameters: [],
    thrownTypes: [],
    ...overrides,
  };
}

export function createFieldPlan(owner: string, name: string, overrides: Partial<FieldPlan> = {}): FieldPlan {
  return {
    plan: "field",
    owner,
    name,
    type: INT,
    isStatic: false,
    isFinal: false,
    ...overrides,
  };
}

export function createConstructorPlan(owner: string, overrides: Partial<ConstructorPlan> = {}): ConstructorPlan {
  return { plan: "constructor", owner, paramTypes: [], varargs: false, ...overrides };
}

export function candidate(plan: StubPlan, source: PassName, reason: string = "test"): PlanCandidate {
  return { plan, source, reason };
}

/** A method returning the named type, for specificity comparisons. */
export function returning(owner: string, name: string, qualifiedName: string): MethodPlan {
  return createMethodPlan(owner, name, { returnType: named(qualifiedName) });
}
