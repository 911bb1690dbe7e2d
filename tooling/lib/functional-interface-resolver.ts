/**
 * Functional-Interface Resolver: the single abstract method of every missing
 * type a lambda or method reference is passed as.
 *
 * Evidence ranks lambda > method reference > plain call. A lower source only
 * fills what the higher ones leave unknown.
 */

import { conflictingEvidence } from "./diagnostics";
import { typeNameOf } from "./evidence";
import { OBJECT_METHOD_KEYS, methodKey, PlannerContext, PlannerPass } from "./planner-context";
import { commonSubtype, commonSupertype, isVoid, named, OBJECT, shapesEqual, typeVariable, VOID } from "./type-shapes";
import { Diagnostic, MethodPlan, PassName, PlanCandidate, TypeShape, UsageSite } from "./types";

type Source = "lambda" | "method reference" | "call";

/** What one evidence source says about the method. */
type Evidence = {
  source: Source;
  sites: UsageSite[];
};

/** Result of a source: a value shape, void, or nothing known. */
type ResultEvidence = { kind: "value"; shape: TypeShape } | { kind: "void" } | { kind: "unknown"; needsValue: boolean };

function known(shape: TypeShape | undefined): shape is TypeShape {
  return shape !== undefined && shape.kind !== "top" && shape.kind !== "null";
}

export class FunctionalInterfaceResolver implements PlannerPass {
  readonly name: PassName = "functional-interface-resolver";

  plan(context: PlannerContext): PlanCandidate[] {
    const candidates: PlanCandidate[] = [];
    for (const reference of context.pending("TYPE")) {
      const qualifiedName = typeNameOf(reference);
      if (!context.isFunctional(qualifiedName)) continue;
      const { plan, notes } = this.abstractMethod(context, qualifiedName);
      candidates.push({
        plan,
        source: this.name,
        reason: `single abstract method of ${qualifiedName}`,
        notes: notes.length > 0 ? notes : undefined,
      });
    }
    return candidates;
  }

  private abstractMethod(context: PlannerContext, owner: string): { plan: MethodPlan; notes: Diagnostic[] } {
    const name = context.samName(owner);
    const variables = context.typeParameters(owner);
    const functional = context.functionalSites(owner);
    const calls = context
      .membersOf(owner, "METHOD")
      .filter((m) => m.simpleName === name)
      .flatMap((m) => m.evidence)
      .filter((s) => !s.isStaticContext && !OBJECT_METHOD_KEYS.has(methodKey(name, s.argumentShapes.length)));
    const sources: Evidence[] = [
      { source: "lambda", sites: functional.filter((s) => s.callShape === "LAMBDA_TARGET") },
      {
        source: "method reference",
        sites: functional.filter((s) => s.callShape === "METHOD_REFERENCE_TARGET" && !s.arityUnknown),
      },
      { source: "call", sites: calls },
    ];

    const first = sources.find((e) => e.sites.length > 0);
    const arity = first?.sites[0].argumentShapes.length ?? 0;
    const notes: Diagnostic[] = [];
    for (const { source, sites } of sources) {
      if (source === "call") continue;
      const other = sites.find((s) => s.argumentShapes.length !== arity);
      if (!first || !other) continue;
      const detail = `kept ${first.source} evidence with ${arity} argument(s), dropped ${source} evidence with ${other.argumentShapes.length}`;
      notes.push(conflictingEvidence(`method ${owner}#${name}`, this.name, [], detail));
    }

    const paramTypes: TypeShape[] = [];
    for (let position = 0; position < arity; position += 1) {
      const shape = this.firstKnown(sources, (site) => this.asVariable(site.argumentShapes[position], site, variables), context, arity);
      paramTypes.push(shape ?? (position < variables.length ? typeVariable(variables[position]) : named(OBJECT)));
    }

    const plan: MethodPlan = {
      plan: "method",
      owner,
      name,
      paramTypes,
      returnType: this.result(context, sources, variables, arity),
      visibility: "public",
      isStatic: false,
      isAbstract: true,
      isDefault: false,
      varargs: false,
      typeParameters: [],
      thrownTypes: [],
    };
    return { plan, notes };
  }

  /**
   * Merged shape from the highest-ranked source that knows it
   */
  private firstKnown(
    sources: readonly Evidence[],
    pick: (site: UsageSite) => TypeShape | undefined,
    context: PlannerContext,
    arity: number
  ): TypeShape | undefined {
    for (const { sites } of sources) {
      let merged: TypeShape | undefined;
      for (const site of sites) {
        if (site.argumentShapes.length !== arity) continue;
        const shape = pick(site);
        if (!known(shape)) continue;
        merged = merged ? commonSupertype(merged, shape, context.index) : shape;
      }
      if (known(merged)) return merged;
    }
    return undefined;
  }

  private result(context: PlannerContext, sources: readonly Evidence[], variables: readonly string[], arity: number): TypeShape {
    let needsValue = false;
    for (const evidence of sources) {
      const result = this.resultOf(context, evidence, variables, arity);
      if (result.kind === "value") return result.shape;
      // a call that discards the result does not make a lambda value void
      if (result.kind === "void") return needsValue ? named(OBJECT) : VOID;
      needsValue = needsValue || result.needsValue;
    }
    return needsValue ? named(OBJECT) : VOID;
  }

  private resultOf(context: PlannerContext, evidence: Evidence, variables: readonly string[], arity: number): ResultEvidence {
    const sites = evidence.sites.filter((s) => s.argumentShapes.length === arity);
    if (sites.length === 0) return { kind: "unknown", needsValue: false };
    if (evidence.source === "call") {
      if (sites.every((s) => isVoid(s.expectedResultUsage))) return { kind: "void" };
      let merged: TypeShape | undefined;
      for (const site of sites) {
        const usage = this.asVariable(site.expectedResultUsage, site, variables);
        if (!known(usage) || isVoid(usage)) continue;
        merged = merged ? commonSubtype(merged, usage, context.index) ?? merged : usage;
      }
      return merged ? { kind: "value", shape: merged } : { kind: "unknown", needsValue: true };
    }

    // A void body or void method fits only a void result.
    let merged: TypeShape | undefined;
    let anyVoid = false;
    let needsValue = false;
    for (const site of sites) {
      const result = site.expectedResultUsage;
      if (result === undefined) continue;
      if (isVoid(result)) {
        anyVoid = true;
        continue;
      }
      const shape = this.asVariable(result, site, variables);
      if (!known(shape)) {
        needsValue = true;
        continue;
      }
      merged = merged ? commonSupertype(merged, shape, context.index) : shape;
    }
    if (known(merged)) return { kind: "value", shape: merged };
    if (anyVoid && !needsValue) return { kind: "void" };
    return { kind: "unknown", needsValue };
  }

  /**
   * A shape equal to one of the target's type arguments stands for the
   * matching type variable
   */
  private asVariable(shape: TypeShape | undefined, site: UsageSite, variables: readonly string[]): TypeShape | undefined {
    if (!shape) return undefined;
    const typeArguments = site.callShape === "CALL" ? site.receiverTypeArguments ?? [] : site.typeArguments;
    if (typeArguments.length !== variables.length) return shape;
    const position = typeArguments.findIndex((arg) => known(arg) && shapesEqual(arg, shape));
    return position >= 0 ? typeVariable(variables[position]) : shape;
  }
}
