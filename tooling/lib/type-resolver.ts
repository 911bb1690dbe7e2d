/**
 * Type-name resolution: turns a written type name into a qualified name, or
 * into the list of missing types it implies together with their owner hints.
 *
 * The resolver is also the TypeIndex describer: it builds member signatures
 * for fragment and context declarations on demand.
 */

import {
  CompilationUnit,
  hasModifier,
  isPrimitiveName,
  MethodDeclaration,
  Parameter,
  TypeDeclaration,
  TypeNode,
} from "./ast";
import { JdkTypes } from "./jdk";
import { ShimCatalog } from "./shim-catalog";
import { arrayOf, named, OBJECT, primitive, STRING, TOP, typeVariable, wildcard } from "./type-shapes";
import { DeclaredType, KnownConstructor, KnownField, KnownMethod, KnownType, TypeIndex } from "./type-index";
import { NamedShape, OwnerHint, TypeKind, TypeShape } from "./types";
import { isCapitalized, joinName, simpleNameOf, splitQualifiedName } from "./utils";

export type ResolutionScope = {
  unit: CompilationUnit;
  /** Qualified names of the enclosing type declarations, outermost first. */
  enclosing: readonly string[];
  typeVariables: ReadonlySet<string>;
};

export type MissingType = {
  qualifiedName: string;
  simpleName: string;
  ownerHint: OwnerHint;
};

export type AmbiguityNote = {
  simpleName: string;
  candidates: string[];
  chosen: string;
  unit: string;
};

export type NameResolution =
  | { kind: "typeVariable"; name: string }
  | { kind: "primitive"; shape: TypeShape }
  | { kind: "known"; qualifiedName: string; implicitImport?: string; ambiguity?: AmbiguityNote }
  | { kind: "missing"; qualifiedName: string; missing: MissingType[]; ambiguity?: AmbiguityNote };

type SimpleResolution =
  | { known: true; qualifiedName: string; implicitImport?: string; ambiguity?: AmbiguityNote }
  | { known: false; missing: MissingType; ambiguity?: AmbiguityNote };

const DECLARATION_KINDS: Record<TypeDeclaration["kind"], TypeKind> = {
  class: "CLASS",
  interface: "INTERFACE",
  enum: "ENUM",
  record: "RECORD",
  annotation: "ANNOTATION",
};

export function declarationKind(decl: TypeDeclaration): TypeKind {
  return DECLARATION_KINDS[decl.kind];
}

export function scopeFor(declared: DeclaredType): ResolutionScope {
  return {
    unit: declared.unit,
    enclosing: [...declared.enclosingChain, declared.qualifiedName],
    typeVariables: new Set(declared.decl.typeParameters.map((p) => p.name)),
  };
}

export function withTypeVariables(scope: ResolutionScope, names: readonly string[]): ResolutionScope {
  if (names.length === 0) return scope;
  return { ...scope, typeVariables: new Set([...scope.typeVariables, ...names]) };
}

export class TypeResolver {
  constructor(
    private readonly index: TypeIndex,
    private readonly jdk: JdkTypes,
    private readonly catalog: ShimCatalog
  ) {
    index.attachDescriber((declared) => this.describe(declared));
  }

  /**
   * Resolve a dotted type name as written inside `scope`
   */
  resolveName(dottedName: string, scope: ResolutionScope): NameResolution {
    const segments = dottedName.split(".");
    const head = segments[0];

    if (segments.length === 1) {
      if (scope.typeVariables.has(head)) {
        return { kind: "typeVariable", name: head };
      }
      if (isPrimitiveName(head)) {
        return { kind: "primitive", shape: primitive(head) };
      }
    }

    if (!isCapitalized(head) && segments.length > 1) {
      return this.resolveQualified(dottedName);
    }

    const first = this.resolveSimple(head, scope);
    const missing: MissingType[] = first.known ? [] : [first.missing];
    let current = first.known ? first.qualifiedName : first.missing.qualifiedName;
    let known = first.known;
    for (const segment of segments.slice(1)) {
      const next = this.nested(current, segment, known);
      if (!next.known) missing.push(next.missing);
      current = next.known ? next.qualifiedName : next.missing.qualifiedName;
      known = next.known;
    }

    if (missing.length === 0) {
      return {
        kind: "known",
        qualifiedName: current,
        implicitImport: first.known && segments.length === 1 ? first.implicitImport : undefined,
        ambiguity: first.ambiguity,
      };
    }
    return { kind: "missing", qualifiedName: current, missing, ambiguity: first.ambiguity };
  }

  /**
   * Resolve a name that starts with its package (`org.slf4j.Logger`, `a.b.Outer.Inner`)
   */
  resolveQualified(dottedName: string): NameResolution {
    const { packageName, typePath } = splitQualifiedName(dottedName);
    let current = joinName(packageName, typePath[0]);
    let known = this.exists(current);
    const missing: MissingType[] = known
      ? []
      : [{ qualifiedName: current, simpleName: typePath[0], ownerHint: { kind: "package", packageName } }];

    for (const segment of typePath.slice(1)) {
      const next = this.nested(current, segment, known);
      if (!next.known) missing.push(next.missing);
      current = next.known ? next.qualifiedName : next.missing.qualifiedName;
      known = next.known;
    }
    return missing.length === 0 ? { kind: "known", qualifiedName: current } : { kind: "missing", qualifiedName: current, missing };
  }

  /**
   * Shape of a syntax type node; `var` and unresolvable pieces become `top`
   */
  shapeOf(node: TypeNode, scope: ResolutionScope): TypeShape {
    switch (node.type) {
      case "PrimitiveType":
        return primitive(node.name);
      case "ArrayType":
        return arrayOf(this.shapeOf(node.elementType, scope));
      case "WildcardType":
        return node.bound ? wildcard({ variance: node.bound.variance, shape: this.shapeOf(node.bound.type, scope) }) : wildcard();
      case "VarType":
        return TOP;
      case "NamedType": {
        const args = node.typeArguments.map((arg) => this.shapeOf(arg, scope));
        if (node.binding) return named(node.binding, args);
        const resolution = this.resolveName(node.name, scope);
        switch (resolution.kind) {
          case "typeVariable":
            return typeVariable(resolution.name);
          case "primitive":
            return resolution.shape;
          default:
            return named(resolution.qualifiedName, args);
        }
      }
    }
  }

  private exists(qualifiedName: string): boolean {
    return this.index.isKnown(qualifiedName) || this.jdk.isPlatformName(qualifiedName);
  }

  private nested(
    owner: string,
    segment: string,
    ownerKnown: boolean
  ): { known: true; qualifiedName: string } | { known: false; missing: MissingType } {
    const candidate = joinName(owner, segment);
    if (ownerKnown) {
      const member = this.index.memberType(owner, segment);
      if (member) return { known: true, qualifiedName: member };
      const origin = this.index.originOf(owner);
      if (this.exists(candidate) || origin === "jdk" || origin === "classpath" || this.jdk.isPlatformName(owner)) {
        return { known: true, qualifiedName: candidate };
      }
    }
    return {
      known: false,
      missing: { qualifiedName: candidate, simpleName: segment, ownerHint: { kind: "type", qualifiedName: owner } },
    };
  }

  private resolveSimple(simpleName: string, scope: ResolutionScope): SimpleResolution {
    const { unit } = scope;

    for (let i = scope.enclosing.length - 1; i >= 0; i -= 1) {
      const enclosing = scope.enclosing[i];
      if (simpleNameOf(enclosing) === simpleName) {
        return { known: true, qualifiedName: enclosing };
      }
      const member = this.index.memberType(enclosing, simpleName);
      if (member) return { known: true, qualifiedName: member };
    }

    if (unit.types.some((decl) => decl.name === simpleName)) {
      return { known: true, qualifiedName: joinName(unit.packageName, simpleName) };
    }

    const single = unit.imports.find((imp) => !imp.isStatic && !imp.onDemand && simpleNameOf(imp.name) === simpleName);
    if (single) {
      const resolution = this.resolveQualified(single.name);
      if (resolution.kind === "missing") {
        const last = resolution.missing[resolution.missing.length - 1];
        return { known: false, missing: last };
      }
      return { known: true, qualifiedName: single.name };
    }

    const samePackage = this.index.topLevelType(unit.packageName, simpleName);
    if (samePackage) return { known: true, qualifiedName: samePackage };

    const javaLang = `java.lang.${simpleName}`;
    if (this.jdk.has(javaLang)) return { known: true, qualifiedName: javaLang };

    const containers = unit.imports.filter((imp) => imp.onDemand && !imp.isStatic).map((imp) => imp.name);
    const known = containers.map((c) => joinName(c, simpleName)).filter((candidate) => this.index.isKnown(candidate));
    if (known.length > 0) {
      return { known: true, qualifiedName: known[0], ambiguity: this.note(simpleName, known, known[0], unit) };
    }

    const implicit = this.jdk.implicitQualifiedName(simpleName);
    if (implicit) return { known: true, qualifiedName: implicit, implicitImport: implicit };

    const onDemand = this.resolveOnDemand(simpleName, containers, unit);
    if (onDemand) return onDemand;

    return {
      known: false,
      missing: {
        qualifiedName: joinName(unit.packageName, simpleName),
        simpleName,
        ownerHint: { kind: "unqualified", callerPackage: unit.packageName },
      },
    };
  }

  /**
   * On-demand imports that could supply a missing `simpleName`: catalog
   * packages first, then every non-platform package
   */
  private resolveOnDemand(simpleName: string, containers: readonly string[], unit: CompilationUnit): SimpleResolution | undefined {
    const shimmed = containers.filter((c) => this.catalog.match(joinName(c, simpleName)) !== undefined);
    const open = shimmed.length > 0 ? shimmed : containers.filter((c) => !this.jdk.isPlatformName(`${c}.`));
    if (open.length === 0) return undefined;

    const chosen = open.includes(unit.packageName) ? unit.packageName : open[0];
    const isTypeContainer = isCapitalized(simpleNameOf(chosen));
    const qualifiedName = joinName(chosen, simpleName);
    return {
      known: false,
      missing: {
        qualifiedName,
        simpleName,
        ownerHint: isTypeContainer ? { kind: "type", qualifiedName: chosen } : { kind: "package", packageName: chosen },
      },
      ambiguity: this.note(
        simpleName,
        open.map((c) => joinName(c, simpleName)),
        qualifiedName,
        unit
      ),
    };
  }

  private note(simpleName: string, candidates: string[], chosen: string, unit: CompilationUnit): AmbiguityNote | undefined {
    return candidates.length > 1 ? { simpleName, candidates, chosen, unit: unit.path } : undefined;
  }

  // ---------------------------------------------------------------------------
  // Describing declared types
  // ---------------------------------------------------------------------------

  private namedOrUndefined(node: TypeNode | undefined, scope: ResolutionScope): NamedShape | undefined {
    if (!node) return undefined;
    const shape = this.shapeOf(node, scope);
    return shape.kind === "named" ? shape : undefined;
  }

  private parameterShapes(parameters: readonly Parameter[], scope: ResolutionScope): { params: TypeShape[]; varargs: boolean } {
    const params = parameters.map((p) => {
      const shape = this.shapeOf(p.paramType, scope);
      return p.varargs ? arrayOf(shape) : shape;
    });
    return { params, varargs: parameters.some((p) => p.varargs === true) };
  }

  private describeMethod(method: MethodDeclaration, scope: ResolutionScope): KnownMethod {
    const typeParameters = method.typeParameters.map((p) => p.name);
    const methodScope = withTypeVariables(scope, typeParameters);
    const { params, varargs } = this.parameterShapes(method.parameters, methodScope);
    return {
      name: method.name,
      params,
      returns: this.shapeOf(method.returnType, methodScope),
      isStatic: hasModifier(method, "static"),
      varargs,
      typeParameters,
    };
  }

  describe(declared: DeclaredType): KnownType {
    const { decl, qualifiedName } = declared;
    const scope = scopeFor(declared);
    const kind = declarationKind(decl);
    const onInterface = kind === "INTERFACE" || kind === "ANNOTATION";
    const self = named(
      qualifiedName,
      decl.typeParameters.map((p) => typeVariable(p.name))
    );

    const methods: KnownMethod[] = [];
    const fields: KnownField[] = [];
    const constructors: KnownConstructor[] = [];
    const memberTypes: string[] = [];

    for (const member of decl.members) {
      switch (member.type) {
        case "MethodDeclaration":
          methods.push(this.describeMethod(member, scope));
          break;
        case "FieldDeclaration":
          fields.push({
            name: member.name,
            type: this.shapeOf(member.fieldType, scope),
            isStatic: onInterface || hasModifier(member, "static"),
          });
          break;
        case "ConstructorDeclaration":
          constructors.push(this.parameterShapes(member.parameters, scope));
          break;
        case "TypeDeclaration":
          memberTypes.push(joinName(qualifiedName, member.name));
          break;
        case "Initializer":
          break;
      }
    }

    let superclass: NamedShape | undefined;
    if (kind === "ENUM") {
      superclass = named("java.lang.Enum", [self]);
      for (const constant of decl.enumConstants) {
        fields.push({ name: constant.name, type: self, isStatic: true });
      }
      methods.push(
        { name: "values", params: [], returns: arrayOf(self), isStatic: true, varargs: false, typeParameters: [] },
        { name: "valueOf", params: [named(STRING)], returns: self, isStatic: true, varargs: false, typeParameters: [] }
      );
    } else if (kind === "RECORD") {
      superclass = named("java.lang.Record");
      const components = decl.recordComponents.map((c) => ({ name: c.name, type: this.shapeOf(c.paramType, scope) }));
      for (const component of components) {
        if (!methods.some((m) => m.name === component.name && m.params.length === 0)) {
          methods.push({ name: component.name, params: [], returns: component.type, isStatic: false, varargs: false, typeParameters: [] });
        }
      }
      constructors.push({ params: components.map((c) => c.type), varargs: false });
    } else if (kind === "CLASS") {
      superclass = this.namedOrUndefined(decl.superclass, scope) ?? named(OBJECT);
    }

    if (constructors.length === 0 && (kind === "CLASS" || kind === "ENUM")) {
      constructors.push({ params: [], varargs: false });
    }

    const interfaces = decl.interfaces.flatMap((node) => {
      const shape = this.namedOrUndefined(node, scope);
      return shape ? [shape] : [];
    });
    if (kind === "INTERFACE" && decl.superclass) {
      const extra = this.namedOrUndefined(decl.superclass, scope);
      if (extra) interfaces.push(extra);
    }

    const abstractMethods = decl.members.filter(
      (m): m is MethodDeclaration =>
        m.type === "MethodDeclaration" && !m.body && !hasModifier(m, "static") && !hasModifier(m, "default")
    );

    return {
      qualifiedName,
      packageName: declared.packageName,
      simpleName: declared.simpleName,
      enclosing: declared.enclosing,
      kind,
      origin: declared.origin,
      opaque: declared.origin === "context",
      isFinal: hasModifier(decl, "final") || kind === "ENUM" || kind === "RECORD",
      typeParameters: decl.typeParameters.map((p) => p.name),
      superclass,
      interfaces,
      methods,
      fields,
      constructors,
      memberTypes,
      enumConstants: decl.enumConstants.map((c) => c.name),
      sam: kind === "INTERFACE" && abstractMethods.length === 1 ? abstractMethods[0].name : undefined,
    };
  }
}
