/**
 * Type-Kind Classifier: one TypePlan per missing type, with the kind the
 * planner context decided and the supertypes its idioms imply.
 */

import { hasIdiom, sitesWithIdiom, typeNameOf } from "./evidence";
import { PlannerContext, PlannerPass } from "./planner-context";
import { isObjectLike, mapShape, named, OBJECT, substitute, typeVariable, VOID } from "./type-shapes";
import { MethodPlan, NamedShape, PassName, PlanCandidate, SupertypePlan, TypePlan, TypeShape, UnresolvedReference } from "./types";

const RUNTIME_EXCEPTION = "java.lang.RuntimeException";
const AUTO_CLOSEABLE = "java.lang.AutoCloseable";
const ITERABLE = "java.lang.Iterable";
const ITERATOR = "java.util.Iterator";

/** A method a planned supertype obliges the type to declare. */
type RequiredMember = { plan: MethodPlan; supertype: string };

function methodPlan(owner: string, name: string, returnType: TypeShape, isAbstract: boolean): MethodPlan {
  return {
    plan: "method",
    owner,
    name,
    paramTypes: [],
    returnType,
    visibility: "public",
    isStatic: false,
    isAbstract,
    isDefault: false,
    varargs: false,
    typeParameters: [],
    thrownTypes: [],
  };
}

export class TypeKindClassifier implements PlannerPass {
  readonly name: PassName = "type-kind-classifier";

  plan(context: PlannerContext): PlanCandidate[] {
    const candidates: PlanCandidate[] = [];
    for (const reference of context.pending("TYPE")) {
      const decision = context.decide(reference);
      const type = context.baseTypePlan(reference);
      const members: RequiredMember[] = [];
      type.supertypes = this.supertypes(context, reference, type, members);
      candidates.push({ plan: type, source: this.name, reason: decision.reason });
      for (const { plan, supertype } of members) {
        candidates.push({ plan, source: this.name, reason: `required by ${supertype}` });
      }
    }
    return candidates;
  }

  private supertypes(context: PlannerContext, reference: UnresolvedReference, type: TypePlan, members: RequiredMember[]): SupertypePlan[] {
    const qualifiedName = typeNameOf(reference);
    const isInterface = type.kind === "INTERFACE";
    const implementsRelation = isInterface ? "extends" : "implements";
    const result: SupertypePlan[] = [];
    const add = (relation: SupertypePlan["relation"], shape: NamedShape): void => {
      if (result.some((s) => s.shape.qualifiedName === shape.qualifiedName)) return;
      result.push({ relation, shape });
    };

    if (type.kind === "CLASS" && (hasIdiom(reference, "thrown") || hasIdiom(reference, "caught"))) {
      add("extends", named(RUNTIME_EXCEPTION));
    }

    if (type.kind !== "ANNOTATION" && hasIdiom(reference, "resource")) {
      add(implementsRelation, named(AUTO_CLOSEABLE));
      if (!isInterface && !this.declaresMember(context, qualifiedName, "close")) {
        members.push({ plan: methodPlan(qualifiedName, "close", VOID, false), supertype: AUTO_CLOSEABLE });
      }
    }

    if ((type.kind === "CLASS" || isInterface) && hasIdiom(reference, "iterated")) {
      const element = this.elementType(reference, type);
      add(implementsRelation, named(ITERABLE, [element]));
      if (!isInterface && !this.declaresMember(context, qualifiedName, "iterator")) {
        members.push({ plan: methodPlan(qualifiedName, "iterator", named(ITERATOR, [element]), false), supertype: ITERABLE });
      }
    }

    const decision = context.decide(reference);
    if (decision.assignedInterface) {
      add("extends", decision.assignedInterface);
    }
    if (type.kind === "CLASS" || isInterface) {
      for (const site of sitesWithIdiom(reference, "assigned-to")) {
        const slot = site.expectedResultUsage;
        if (!slot || slot.kind !== "named" || isObjectLike(slot)) continue;
        this.addAssignedSupertype(context, type, slot, add, members);
      }
    }
    return result;
  }

  private addAssignedSupertype(
    context: PlannerContext,
    type: TypePlan,
    slot: NamedShape,
    add: (relation: SupertypePlan["relation"], shape: NamedShape) => void,
    members: RequiredMember[]
  ): void {
    const known = context.index.lookup(slot.qualifiedName);
    if (!known || slot.qualifiedName === OBJECT) return;
    if (known.kind === "CLASS") {
      if (type.kind !== "CLASS" || known.isFinal || type.supertypes.some((s) => s.relation === "extends")) return;
      add("extends", slot);
      return;
    }
    if (known.kind !== "INTERFACE") return;
    const relation = type.kind === "INTERFACE" ? "extends" : "implements";
    if (known.sam && type.kind === "CLASS") {
      const sam = context.index.findMethods(slot, known.sam)[0];
      if (!sam) return;
      const own = new Set(sam.member.typeParameters);
      const bind = (shape: TypeShape): TypeShape =>
        mapShape(substitute(shape, sam.bindings), (s) =>
          s.kind === "typeVariable" && !own.has(s.name) ? named(OBJECT) : undefined
        );
      add(relation, slot);
      members.push({
        plan: {
          ...methodPlan(type.qualifiedName, known.sam, bind(sam.member.returns), false),
          paramTypes: sam.member.params.map(bind),
          typeParameters: sam.member.typeParameters.map((name) => ({ name, bounds: [] })),
        },
        supertype: slot.qualifiedName,
      });
      return;
    }
    const marker = known.methods.length === 0 && !known.opaque;
    const closed = known.origin === "fragment" && context.index.isClosedHierarchy(slot.qualifiedName);
    if (type.kind === "INTERFACE" || marker || closed) {
      add(relation, slot);
    }
  }

  private declaresMember(context: PlannerContext, owner: string, name: string): boolean {
    return context.membersOf(owner, "METHOD").some((m) => m.simpleName === name);
  }

  /**
   * Element type of an iterated type: the first type variable when the type
   * is generic, else the loop variable's declared type
   */
  private elementType(reference: UnresolvedReference, type: TypePlan): TypeShape {
    const declared = sitesWithIdiom(reference, "iterated")
      .map((s) => s.typeArguments[0])
      .find((shape) => shape !== undefined);
    if (type.typeParameters.length > 0) return typeVariable(type.typeParameters[0].name);
    return declared ?? named(OBJECT);
  }
}
