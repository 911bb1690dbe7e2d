/**
 * Declaration Synthesizer: writes a merged SynthesisPlan into the fragment
 * model.
 *
 * Every synthesized top-level type gets its own compilation unit in the
 * package its owner hint named; nested plans land inside their enclosing
 * declaration; members planned for fragment types are appended to the
 * fragment's own declaration. Everything written is marked `synthetic`.
 */

import {
  annotation,
  arrayType,
  block,
  boundType,
  classLiteral,
  CompilationUnit,
  constructorDecl,
  ConstructorDeclaration,
  Expression,
  fieldAccess,
  FieldDeclaration,
  FragmentModel,
  importDecl,
  lit,
  Literal,
  LiteralKind,
  MethodDeclaration,
  Modifier,
  name,
  namedType,
  newArray,
  param,
  Parameter,
  primitiveType,
  ret,
  Statement,
  typeDecl,
  TypeDeclaration,
  TypeDeclarationKind,
  TypeNode,
  typeParameter,
  TypeParameter,
  wildcardType,
} from "./ast";
import { unresolvedAfterSynthesis } from "./diagnostics";
import { Logger } from "./logger";
import { isNamed, named, OBJECT, STRING } from "./type-shapes";
import { TypeIndex } from "./type-index";
import {
  ConstructorPlan,
  Diagnostic,
  FieldPlan,
  MethodPlan,
  ReferenceDescriptor,
  SynthesisPlan,
  TypeKind,
  TypeParameterPlan,
  TypePlan,
  TypeShape,
  Visibility,
} from "./types";
import { packagePath, qualifierOf } from "./utils";

const DECLARATION_KINDS: Record<TypeKind, TypeDeclarationKind> = {
  CLASS: "class",
  INTERFACE: "interface",
  ENUM: "enum",
  RECORD: "record",
  ANNOTATION: "annotation",
};

/** A declaration the synthesizer created, and where it lives. */
export type SynthesizedType = {
  plan: TypePlan;
  decl: TypeDeclaration;
  /** Set for top-level types. */
  unit?: CompilationUnit;
  /** Set for nested types. */
  parent?: TypeDeclaration;
};

export type SynthesisOutput = {
  types: Map<string, SynthesizedType>;
  diagnostics: Diagnostic[];
};

export function typeNodeOf(shape: TypeShape): TypeNode {
  switch (shape.kind) {
    case "primitive":
      return primitiveType(shape.name);
    case "named":
      return boundType(shape.qualifiedName, shape.typeArgs.map(typeNodeOf));
    case "array":
      return arrayType(typeNodeOf(shape.of));
    case "wildcard":
      return shape.bound
        ? wildcardType({ variance: shape.bound.variance, type: typeNodeOf(shape.bound.shape) })
        : wildcardType();
    case "typeVariable":
      return namedType(shape.name);
    case "null":
    case "top":
      return boundType(OBJECT);
  }
}

/**
 * Value a stub body returns: zero, false or null
 */
export function defaultValueOf(shape: TypeShape): Expression {
  if (shape.kind !== "primitive") return lit.null();
  switch (shape.name) {
    case "boolean":
      return lit.boolean(false);
    case "long":
      return lit.long(0);
    case "float":
      return lit.float(0);
    case "double":
      return lit.double(0);
    case "char":
      return lit.char("\u0000");
    default:
      return lit.int(0);
  }
}

function constantLiteral(shape: TypeShape, value: string): Literal {
  let kind: LiteralKind = "int";
  if (shape.kind === "primitive") {
    if (shape.name === "long") kind = "long";
    if (shape.name === "char") kind = "char";
    if (shape.name === "boolean") kind = "boolean";
  } else if (isNamed(shape, STRING)) {
    kind = "string";
  }
  return { type: "Literal", kind, value };
}

function visibilityModifiers(visibility: Visibility): Modifier[] {
  return visibility === "package" ? [] : [visibility];
}

function typeParametersOf(plans: readonly TypeParameterPlan[]): TypeParameter[] {
  return plans.map((p) => typeParameter(p.name, p.bounds.map(typeNodeOf)));
}

function parametersOf(types: readonly TypeShape[], varargs: boolean): Parameter[] {
  return types.map((shape, i) => {
    const last = i === types.length - 1;
    if (varargs && last && shape.kind === "array") {
      return param(`arg${i}`, typeNodeOf(shape.of), true);
    }
    return param(`arg${i}`, typeNodeOf(shape));
  });
}

function nestingDepth(plan: TypePlan): number {
  let depth = 0;
  for (let owner = plan.enclosing; owner; owner = qualifierOf(owner)) {
    if (owner === plan.packageName) break;
    depth += 1;
  }
  return depth;
}

export class DeclarationSynthesizer {
  constructor(
    private readonly index: TypeIndex,
    private readonly logger: Logger
  ) {}

  synthesize(model: FragmentModel, plan: SynthesisPlan, implicitImports: ReadonlyMap<string, string[]> = new Map()): SynthesisOutput {
    const types = new Map<string, SynthesizedType>();
    const diagnostics: Diagnostic[] = [];

    const ordered = [...plan.types].sort((a, b) => nestingDepth(a) - nestingDepth(b));
    for (const typePlan of ordered) {
      const decl = this.declarationFor(typePlan);
      if (typePlan.enclosing === undefined) {
        const unit: CompilationUnit = {
          type: "CompilationUnit",
          path: `${packagePath(typePlan.packageName) ? `${packagePath(typePlan.packageName)}/` : ""}${typePlan.simpleName}.java`,
          packageName: typePlan.packageName,
          imports: [],
          types: [decl],
          synthetic: true,
        };
        model.units.push(unit);
        types.set(typePlan.qualifiedName, { plan: typePlan, decl, unit });
        continue;
      }
      const parent = this.writableOwner(typePlan.enclosing, types);
      if (!parent) {
        diagnostics.push(this.unwritable({ kind: "TYPE", owner: typePlan.enclosing, simpleName: typePlan.simpleName }));
        continue;
      }
      if (!decl.modifiers.includes("static") && decl.kind === "class") decl.modifiers.push("static");
      parent.members.push(decl);
      types.set(typePlan.qualifiedName, { plan: typePlan, decl, parent });
    }

    for (const field of plan.fields) {
      const owner = this.writableOwner(field.owner, types);
      if (owner) owner.members.push(this.fieldFor(field, owner));
      else diagnostics.push(this.unwritable({ kind: "FIELD", owner: field.owner, simpleName: field.name }));
    }
    for (const constructor of plan.constructors) {
      const owner = this.writableOwner(constructor.owner, types);
      if (owner) owner.members.push(this.constructorFor(constructor));
      else diagnostics.push(this.unwritable({ kind: "CONSTRUCTOR", owner: constructor.owner, simpleName: "<init>" }));
    }
    for (const method of plan.methods) {
      const owner = this.writableOwner(method.owner, types);
      if (owner) owner.members.push(this.methodFor(method, owner));
      else diagnostics.push(this.unwritable({ kind: "METHOD", owner: method.owner, simpleName: method.name }));
    }

    this.addImplicitImports(model, implicitImports);
    this.logger.info("Synthesized declarations", {
      types: types.size,
      members: plan.fields.length + plan.constructors.length + plan.methods.length,
      unwritable: diagnostics.length,
    });
    return { types, diagnostics };
  }

  /**
   * Declaration members may be added to: a synthesized type or a type the
   * fragment itself declares
   */
  private writableOwner(qualifiedName: string, types: ReadonlyMap<string, SynthesizedType>): TypeDeclaration | undefined {
    const synthesized = types.get(qualifiedName);
    if (synthesized) return synthesized.decl;
    const declared = this.index.declaredType(qualifiedName);
    return declared && declared.origin === "fragment" ? declared.decl : undefined;
  }

  private unwritable(reference: ReferenceDescriptor): Diagnostic {
    const origin = this.index.originOf(reference.owner);
    const reason = origin ? `owner is a ${origin} type and cannot be extended` : "owner was not synthesized";
    this.logger.warn("Cannot place planned declaration", { owner: reference.owner, name: reference.simpleName, reason });
    return unresolvedAfterSynthesis(reference, reason);
  }

  private declarationFor(plan: TypePlan): TypeDeclaration {
    const kind = DECLARATION_KINDS[plan.kind];
    const superclass = plan.kind === "CLASS" ? plan.supertypes.find((s) => s.relation === "extends") : undefined;
    const interfaces = plan.supertypes.filter((s) => s !== superclass).map((s) => typeNodeOf(s.shape));
    const modifiers: Modifier[] = ["public"];
    if (plan.isAbstract && plan.kind === "CLASS") modifiers.push("abstract");

    return typeDecl(kind, plan.simpleName, {
      modifiers,
      annotations: plan.functional ? [annotation("FunctionalInterface")] : [],
      typeParameters: typeParametersOf(plan.typeParameters),
      superclass: superclass ? typeNodeOf(superclass.shape) : undefined,
      interfaces,
      enumConstants: plan.enumConstants.map((constant) => ({ name: constant, arguments: [] })),
      recordComponents: plan.recordComponents.map((c) => param(c.name, typeNodeOf(c.type))),
      members: [],
      synthetic: true,
    });
  }

  private fieldFor(plan: FieldPlan, owner: TypeDeclaration): FieldDeclaration {
    const onInterface = owner.kind === "interface" || owner.kind === "annotation";
    const modifiers: Modifier[] = onInterface ? [] : ["public"];
    const isFinal = plan.isFinal || onInterface;
    if (plan.isStatic && !onInterface) modifiers.push("static");
    if (isFinal && !onInterface) modifiers.push("final");

    const node: FieldDeclaration = {
      type: "FieldDeclaration",
      modifiers,
      annotations: [],
      fieldType: typeNodeOf(plan.type),
      name: plan.name,
      synthetic: true,
    };
    if (plan.constantValue !== undefined) {
      node.initializer = constantLiteral(plan.type, plan.constantValue);
    } else if (isFinal) {
      node.initializer = defaultValueOf(plan.type);
    }
    return node;
  }

  private constructorFor(plan: ConstructorPlan): ConstructorDeclaration {
    const node = constructorDecl(parametersOf(plan.paramTypes, plan.varargs));
    node.synthetic = true;
    return node;
  }

  private methodFor(plan: MethodPlan, owner: TypeDeclaration): MethodDeclaration {
    const onInterface = owner.kind === "interface";
    const node: MethodDeclaration = {
      type: "MethodDeclaration",
      modifiers: [],
      annotations: [],
      typeParameters: typeParametersOf(plan.typeParameters),
      returnType: typeNodeOf(plan.returnType),
      name: plan.name,
      parameters: parametersOf(plan.paramTypes, plan.varargs),
      throws: plan.thrownTypes.map(typeNodeOf),
      synthetic: true,
    };

    if (owner.kind === "annotation") {
      const value = this.annotationDefault(plan.returnType);
      if (value) node.defaultValue = value;
      return node;
    }
    if (onInterface) {
      if (plan.isStatic) node.modifiers.push("static");
      else if (plan.isDefault) node.modifiers.push("default");
      if (plan.isAbstract) return node;
    } else {
      node.modifiers.push(...visibilityModifiers(plan.visibility));
      if (plan.isStatic) node.modifiers.push("static");
    }
    node.body = block(this.bodyFor(plan.returnType));
    return node;
  }

  private bodyFor(returnType: TypeShape): Statement[] {
    if (returnType.kind === "primitive" && returnType.name === "void") return [];
    return [ret(defaultValueOf(returnType))];
  }

  /**
   * Element default, so that uses which leave the element out still compile
   */
  private annotationDefault(shape: TypeShape): Expression | undefined {
    if (shape.kind === "primitive") return defaultValueOf(shape);
    if (shape.kind === "array") return newArray(typeNodeOf(shape.of), [], []);
    if (shape.kind !== "named") return undefined;
    if (shape.qualifiedName === STRING) return lit.string("");
    if (shape.qualifiedName === "java.lang.Class") return classLiteral(typeNodeOf(named(OBJECT)));
    const constant = this.index.lookup(shape.qualifiedName)?.enumConstants[0];
    if (constant) return fieldAccess(name(shape.qualifiedName), constant);
    return undefined;
  }

  private addImplicitImports(model: FragmentModel, implicitImports: ReadonlyMap<string, string[]>): void {
    for (const unit of model.units) {
      for (const qualifiedName of implicitImports.get(unit.path) ?? []) {
        if (unit.imports.some((i) => !i.isStatic && !i.onDemand && i.name === qualifiedName)) continue;
        const node = importDecl(qualifiedName);
        node.synthetic = true;
        unit.imports.push(node);
      }
    }
  }
}
