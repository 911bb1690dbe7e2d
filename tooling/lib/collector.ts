/**
 * Reference Collector
 *
 * Walks every declaration, statement and expression of the fragment, types
 * each expression against what the surrounding code expects of it, and
 * records every type, method, field and constructor use that nothing
 * declares. The fragment is never modified.
 */

import {
  Annotation,
  Block,
  CompilationUnit,
  ConstructorDeclaration,
  Expression,
  FieldAccess,
  FragmentModel,
  hasModifier,
  isTypeNode,
  Lambda,
  MemberDeclaration,
  MethodCall,
  MethodDeclaration,
  MethodReference,
  NameExpression,
  ObjectCreation,
  Parameter,
  Statement,
  TypeDeclaration,
  TypeNode,
} from "./ast";
import { AmbiguousResolutionError } from "./diagnostics";
import { ReferenceSet } from "./evidence";
import { Logger } from "./logger";
import {
  arrayOf,
  BOOLEAN,
  boxedName,
  commonSupertype,
  INT,
  isAssignable,
  isVoid,
  mapShape,
  mentionsTypeVariable,
  named,
  NULL,
  OBJECT,
  primitive,
  STRING,
  substitute,
  TOP,
  typeVariable,
  unboxedName,
  VOID,
  wildcard,
} from "./type-shapes";
import { KnownConstructor, KnownMethod, KnownType, MemberMatch, TypeIndex } from "./type-index";
import { AmbiguityNote, MissingType, ResolutionScope, scopeFor, TypeResolver, withTypeVariables } from "./type-resolver";
import {
  CallShape,
  MethodSignatureShape,
  NamedShape,
  ReferenceKind,
  TypeShape,
  UsageIdiom,
  UsageSite,
  Visibility,
} from "./types";
import { isCapitalized, joinName, pushTo, qualifierOf, simpleNameOf } from "./utils";

export type CollectorOptions = {
  failOnAmbiguity: boolean;
};

export type CollectionResult = {
  references: ReferenceSet;
  ambiguities: AmbiguityNote[];
  /** Unit path → JDK names the unit uses by simple name without importing them. */
  implicitImports: Map<string, string[]>;
};

/**
 * What the surrounding code does with an expression's value
 */
export type Expectation =
  | { kind: "value"; shape: TypeShape; idioms?: UsageIdiom[] }
  | { kind: "condition" }
  | { kind: "discarded" }
  | { kind: "receiver" }
  | { kind: "unknown" };

const UNKNOWN: Expectation = { kind: "unknown" };
const DISCARDED: Expectation = { kind: "discarded" };
const RECEIVER: Expectation = { kind: "receiver" };
const CONDITION: Expectation = { kind: "condition" };

function expectValue(shape: TypeShape, idioms?: UsageIdiom[]): Expectation {
  return shape.kind === "top" ? UNKNOWN : { kind: "value", shape, idioms };
}

function expectedUsage(expectation: Expectation): TypeShape | undefined {
  switch (expectation.kind) {
    case "value":
      return expectation.shape;
    case "condition":
      return BOOLEAN;
    case "discarded":
      return VOID;
    default:
      return undefined;
  }
}

/** Methods every type inherits from java.lang.Object, by `name/arity`. */
const OBJECT_METHODS: ReadonlyMap<string, TypeShape> = new Map([
  ["equals/1", BOOLEAN],
  ["hashCode/0", INT],
  ["toString/0", named(STRING)],
  ["getClass/0", named("java.lang.Class", [wildcard()])],
  ["notify/0", VOID],
  ["notifyAll/0", VOID],
  ["wait/0", VOID],
]);

/** Members every enum inherits, used while its kind is still undecided. */
const ENUM_METHODS: ReadonlyMap<string, TypeShape> = new Map([
  ["ordinal/0", INT],
  ["name/0", named(STRING)],
  ["compareTo/1", INT],
]);

const ENUM_COLLECTIONS = new Set(["java.util.EnumSet", "java.util.EnumMap"]);

const OPEN_BASES = new Set([OBJECT, "java.lang.Enum", "java.lang.Record"]);

type Frame = {
  unit: CompilationUnit;
  scope: ResolutionScope;
  /** Receivers of unqualified member access, innermost first. */
  selves: NamedShape[];
  enclosingType?: string;
  member?: string;
  isStatic: boolean;
  locals: Array<Map<string, TypeShape>>;
  returnShape?: TypeShape;
  /** Collects `return` shapes while walking a lambda block body. */
  lambdaReturns?: TypeShape[];
};

type Argument = { shape: TypeShape; deferred?: Lambda | MethodReference };

/**
 * What a lambda body produces. An unknown result is void-compatible when the
 * body is a statement expression (a call, an instance creation, an assignment).
 */
type LambdaResult =
  | { kind: "void" }
  | { kind: "value"; shape: TypeShape }
  | { kind: "unknown"; voidCompatible: boolean };

type Target =
  | { kind: "type"; shape: NamedShape }
  | { kind: "value"; shape: TypeShape }
  | { kind: "super"; shape: NamedShape | undefined }
  | { kind: "none" };

function literalShape(kind: string): TypeShape {
  switch (kind) {
    case "int":
      return INT;
    case "long":
      return primitive("long");
    case "float":
      return primitive("float");
    case "double":
      return primitive("double");
    case "char":
      return primitive("char");
    case "boolean":
      return BOOLEAN;
    case "string":
      return named(STRING);
    default:
      return NULL;
  }
}

function numericPromotion(left: TypeShape, right: TypeShape): TypeShape {
  const unbox = (shape: TypeShape): string | undefined =>
    shape.kind === "primitive" ? shape.name : shape.kind === "named" ? unboxedName(shape.qualifiedName) : undefined;
  const names = [unbox(left), unbox(right)];
  for (const wide of ["double", "float", "long"] as const) {
    if (names.includes(wide)) return primitive(wide);
  }
  return INT;
}

function isStringShape(shape: TypeShape): boolean {
  return shape.kind === "named" && shape.qualifiedName === STRING;
}

/**
 * Upper bound of a type argument as seen by a lambda parameter
 */
function argumentBound(shape: TypeShape): TypeShape {
  if (shape.kind === "wildcard") return shape.bound ? shape.bound.shape : TOP;
  return shape;
}

function visibilityOf(node: { modifiers: readonly string[] }): Visibility {
  if (node.modifiers.includes("public")) return "public";
  if (node.modifiers.includes("protected")) return "protected";
  if (node.modifiers.includes("private")) return "private";
  return "package";
}

function boxed(shape: TypeShape): TypeShape {
  if (shape.kind !== "primitive") return shape;
  const box = boxedName(shape.name);
  return box ? named(box) : TOP;
}

export class ReferenceCollector {
  private references = new ReferenceSet();
  private ambiguities: AmbiguityNote[] = [];
  private ambiguityKeys = new Set<string>();
  private implicitImports = new Map<string, string[]>();
  private missingTypes = new Map<string, MissingType>();
  private current?: Frame;

  constructor(
    private readonly index: TypeIndex,
    private readonly resolver: TypeResolver,
    private readonly options: CollectorOptions,
    private readonly logger: Logger
  ) {}

  private get frame(): Frame {
    if (!this.current) {
      throw new Error("ReferenceCollector used outside collect()");
    }
    return this.current;
  }

  private set frame(frame: Frame) {
    this.current = frame;
  }

  collect(model: FragmentModel): CollectionResult {
    this.logger.startTimer("collect");
    for (const unit of model.units) {
      this.logger.withContext({ component: "collector", unit: unit.path }, () => {
        for (const decl of unit.types) {
          this.walkType(decl, unit, [], undefined, false);
        }
      });
    }
    this.logger.endTimer("collect", "Reference collection finished");
    this.logger.info("Collected unresolved references", {
      references: this.references.size(),
      ambiguities: this.ambiguities.length,
    });
    return {
      references: this.references,
      ambiguities: this.ambiguities,
      implicitImports: this.implicitImports,
    };
  }

  // ---------------------------------------------------------------------------
  // Frames and sites
  // ---------------------------------------------------------------------------

  private enter<T>(patch: Partial<Frame>, fn: () => T): T {
    const previous = this.frame;
    this.frame = { ...previous, ...patch };
    try {
      return fn();
    } finally {
      this.frame = previous;
    }
  }

  private withLocals<T>(fn: () => T): T {
    return this.enter({ locals: [...this.frame.locals, new Map()] }, fn);
  }

  private declareLocal(name: string, shape: TypeShape): void {
    this.frame.locals[this.frame.locals.length - 1]?.set(name, shape);
  }

  private localShape(name: string): TypeShape | undefined {
    for (let i = this.frame.locals.length - 1; i >= 0; i -= 1) {
      const shape = this.frame.locals[i].get(name);
      if (shape) return shape;
    }
    return undefined;
  }

  private site(callShape: CallShape, extra: Partial<UsageSite> = {}): UsageSite {
    return {
      location: {
        unit: this.frame.unit.path,
        packageName: this.frame.unit.packageName,
        enclosingType: this.frame.enclosingType,
        member: this.frame.member,
      },
      callShape,
      argumentShapes: [],
      typeArguments: [],
      isStaticContext: this.frame.isStatic,
      idioms: [],
      ...extra,
    };
  }

  private record(kind: ReferenceKind, owner: string, simpleName: string, site: UsageSite): void {
    this.references.record(kind, { kind: "type", qualifiedName: owner }, simpleName, site);
  }

  private isMissing(qualifiedName: string): boolean {
    return this.missingTypes.has(qualifiedName);
  }

  /**
   * Attach a TYPE usage site to a missing type known only by name
   */
  private noteType(shape: TypeShape | undefined, idioms: UsageIdiom[], extra: Partial<UsageSite> = {}): void {
    if (!shape || shape.kind !== "named") return;
    const missing = this.missingTypes.get(shape.qualifiedName);
    if (!missing) return;
    this.references.record("TYPE", missing.ownerHint, missing.simpleName, this.site("TYPE_USE", { idioms, ...extra }));
  }

  /**
   * A value of `valueShape` flows into a slot of `slotShape`
   */
  private noteAssignment(valueShape: TypeShape, slotShape: TypeShape | undefined): void {
    if (!slotShape || slotShape.kind !== "named" || valueShape.kind !== "named") return;
    if (slotShape.qualifiedName === valueShape.qualifiedName || slotShape.qualifiedName === OBJECT) return;
    if (!this.isMissing(valueShape.qualifiedName) || this.isMissing(slotShape.qualifiedName)) return;
    this.noteType(valueShape, ["assigned-to"], { expectedResultUsage: slotShape });
  }

  /**
   * Type whose declaration a missing member should be added to; undefined when
   * the member may exist somewhere the engine cannot see
   */
  private memberOwner(qualifiedName: string): string | undefined {
    if (this.isMissing(qualifiedName)) return qualifiedName;
    const type = this.index.lookup(qualifiedName);
    if (!type || type.origin !== "fragment") return undefined;
    const opaqueAncestor = this.index.directSupertypes(qualifiedName).length > 0 && this.hasOpaqueAncestor(qualifiedName);
    return opaqueAncestor ? undefined : qualifiedName;
  }

  private hasOpaqueAncestor(qualifiedName: string): boolean {
    const visited = new Set<string>();
    const queue = [qualifiedName];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || visited.has(current)) continue;
      visited.add(current);
      for (const parent of this.index.directSupertypes(current)) {
        if (OPEN_BASES.has(parent.qualifiedName) || this.isMissing(parent.qualifiedName)) continue;
        const type = this.index.lookup(parent.qualifiedName);
        if (!type || type.opaque) return true;
        queue.push(parent.qualifiedName);
      }
    }
    return false;
  }

  // ---------------------------------------------------------------------------
  // Type uses
  // ---------------------------------------------------------------------------

  private noteAmbiguity(note: AmbiguityNote | undefined): void {
    if (!note) return;
    if (this.options.failOnAmbiguity) {
      throw new AmbiguousResolutionError(note);
    }
    const key = `${note.unit}#${note.simpleName}`;
    if (this.ambiguityKeys.has(key)) return;
    this.ambiguityKeys.add(key);
    this.ambiguities.push(note);
    this.logger.warn(`Ambiguous simple name ${note.simpleName}`, { candidates: note.candidates, chosen: note.chosen });
  }

  private noteImplicitImport(qualifiedName: string | undefined): void {
    if (!qualifiedName) return;
    const existing = this.implicitImports.get(this.frame.unit.path) ?? [];
    if (!existing.includes(qualifiedName)) {
      pushTo(this.implicitImports, this.frame.unit.path, qualifiedName);
    }
  }

  /**
   * Resolve a dotted type name, recording every missing type it implies.
   * The last missing segment receives `idioms` and `extra`.
   */
  private resolveType(
    dottedName: string,
    typeArguments: TypeShape[],
    idioms: UsageIdiom[],
    extra: Partial<UsageSite> = {}
  ): TypeShape {
    const resolution = this.resolver.resolveName(dottedName, this.frame.scope);
    switch (resolution.kind) {
      case "typeVariable":
        return typeVariable(resolution.name);
      case "primitive":
        return resolution.shape;
      case "known":
        this.noteAmbiguity(resolution.ambiguity);
        this.noteImplicitImport(resolution.implicitImport);
        return named(resolution.qualifiedName, typeArguments);
      case "missing": {
        this.noteAmbiguity(resolution.ambiguity);
        resolution.missing.forEach((missing, i) => {
          this.missingTypes.set(missing.qualifiedName, missing);
          const last = i === resolution.missing.length - 1;
          this.references.record(
            "TYPE",
            missing.ownerHint,
            missing.simpleName,
            this.site("TYPE_USE", last ? { idioms, typeArguments, ...extra } : {})
          );
        });
        return named(resolution.qualifiedName, typeArguments);
      }
    }
  }

  private typeUse(node: TypeNode, idioms: UsageIdiom[], extra: Partial<UsageSite> = {}): TypeShape {
    switch (node.type) {
      case "PrimitiveType":
        return primitive(node.name);
      case "VarType":
        return TOP;
      case "ArrayType":
        return arrayOf(this.typeUse(node.elementType, idioms, extra));
      case "WildcardType":
        return node.bound
          ? wildcard({ variance: node.bound.variance, shape: this.typeUse(node.bound.type, ["type-argument"]) })
          : wildcard();
      case "NamedType": {
        const args = node.typeArguments.map((arg) => this.typeUse(arg, ["type-argument"]));
        if (node.binding) return named(node.binding, args);
        const shape = this.resolveType(node.name, args, idioms, extra);
        if (shape.kind === "named" && ENUM_COLLECTIONS.has(shape.qualifiedName)) {
          this.noteType(args[0], ["enum-collection"]);
        }
        return shape;
      }
    }
  }

  private annotationUse(use: Annotation): void {
    const shape = this.resolveType(use.name, [], ["annotation"]);
    if (shape.kind !== "named") return;
    const owner = this.memberOwner(shape.qualifiedName);
    for (const argument of use.arguments) {
      const values = Array.isArray(argument.value) ? argument.value : [argument.value];
      const shapes = values.map((value) => this.typeOf(value, UNKNOWN));
      const element = shapes.slice(1).reduce((a, b) => commonSupertype(a, b, this.index), shapes[0] ?? TOP);
      const valueShape = Array.isArray(argument.value) ? arrayOf(element) : element;
      if (owner && this.isMissing(owner)) {
        this.record("METHOD", owner, argument.name, this.site("ANNOTATION_ELEMENT", { expectedResultUsage: valueShape }));
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Declarations
  // ---------------------------------------------------------------------------

  /**
   * Walk one declaration. Nested declarations see the enclosing receivers;
   * only inner (non-static) ones see its type variables.
   */
  private walkType(
    decl: TypeDeclaration,
    unit: CompilationUnit,
    chain: string[],
    outer: Frame | undefined,
    inner: boolean
  ): void {
    const qualifiedName = joinName(chain[chain.length - 1] ?? unit.packageName, decl.name);
    const declared = this.index.declaredType(qualifiedName);
    const scope: ResolutionScope = declared
      ? scopeFor(declared)
      : {
          unit,
          enclosing: [...chain, qualifiedName],
          typeVariables: new Set(decl.typeParameters.map((p) => p.name)),
        };
    const self = named(
      qualifiedName,
      decl.typeParameters.map((p) => typeVariable(p.name))
    );

    this.frame = {
      unit,
      scope: outer && inner ? withTypeVariables(scope, Array.from(outer.scope.typeVariables)) : scope,
      selves: [self, ...(outer?.selves ?? [])],
      enclosingType: qualifiedName,
      member: undefined,
      isStatic: false,
      locals: [new Map()],
    };

    decl.annotations.forEach((a) => this.annotationUse(a));
    for (const parameter of decl.typeParameters) {
      parameter.bounds.forEach((bound, i) => this.typeUse(bound, [i === 0 ? "bound" : "secondary-bound"]));
    }

    const ownMethodKeys = decl.members
      .filter((m): m is MethodDeclaration => m.type === "MethodDeclaration")
      .map((m) => `${m.name}/${m.parameters.length}`);

    let superShape: TypeShape | undefined;
    if (decl.superclass) {
      const idiom: UsageIdiom = decl.kind === "interface" ? "interface-extends" : "extends";
      superShape = this.typeUse(decl.superclass, [idiom]);
    }
    for (const node of decl.interfaces) {
      const idiom: UsageIdiom = decl.kind === "interface" ? "interface-extends" : "implements";
      this.typeUse(node, [idiom], { implementorMethods: ownMethodKeys });
    }
    for (const component of decl.recordComponents) {
      component.annotations?.forEach((a) => this.annotationUse(a));
      const shape = this.typeUse(component.paramType, ["declared-type"]);
      this.declareLocal(component.name, shape);
    }

    if (decl.kind === "class" && superShape?.kind === "named" && this.isMissing(superShape.qualifiedName)) {
      this.implicitSuperCalls(decl, superShape.qualifiedName);
    }

    for (const constant of decl.enumConstants) {
      constant.arguments.forEach((arg) => this.typeOf(arg, UNKNOWN));
    }

    const frame = this.frame;
    this.walkMembers(decl.members, qualifiedName, decl.kind === "interface" || decl.kind === "annotation");

    for (const member of decl.members) {
      if (member.type === "TypeDeclaration") {
        const isInner = member.kind === "class" && !hasModifier(member, "static");
        this.walkType(member, unit, [...chain, qualifiedName], frame, isInner);
      }
    }
  }

  private implicitSuperCalls(decl: TypeDeclaration, superName: string): void {
    const constructors = decl.members.filter((m): m is ConstructorDeclaration => m.type === "ConstructorDeclaration");
    const relies =
      constructors.length === 0 ||
      constructors.some((c) => c.body.statements[0]?.type !== "ConstructorInvocation");
    if (relies) {
      this.record("CONSTRUCTOR", superName, "<init>", this.site("CONSTRUCTION", { idioms: ["constructed"] }));
    }
  }

  private walkMembers(members: readonly MemberDeclaration[], owner: string, onInterface: boolean): void {
    const base = this.frame;
    for (const member of members) {
      this.frame = base;
      switch (member.type) {
        case "FieldDeclaration": {
          member.annotations.forEach((a) => this.annotationUse(a));
          const isStatic = onInterface || hasModifier(member, "static");
          this.enter({ member: member.name, isStatic }, () => {
            const shape = this.typeUse(member.fieldType, ["declared-type"]);
            if (member.initializer) {
              const valueShape = this.typeOf(member.initializer, expectValue(shape));
              this.noteAssignment(valueShape, shape);
            }
          });
          break;
        }
        case "MethodDeclaration":
          this.walkMethod(member, owner);
          break;
        case "ConstructorDeclaration":
          this.enter({ member: "<init>", isStatic: false }, () => {
            member.annotations.forEach((a) => this.annotationUse(a));
            member.throws.forEach((t) => this.typeUse(t, ["thrown"]));
            this.withLocals(() => {
              this.declareParameters(member.parameters);
              this.walkBlock(member.body);
            });
          });
          break;
        case "Initializer":
          this.enter({ member: member.isStatic ? "<clinit>" : "<init>", isStatic: member.isStatic }, () =>
            this.walkBlock(member.body)
          );
          break;
        case "TypeDeclaration":
          break;
      }
    }
    this.frame = base;
  }

  private declareParameters(parameters: readonly Parameter[]): TypeShape[] {
    return parameters.map((p) => {
      p.annotations?.forEach((a) => this.annotationUse(a));
      const shape = this.typeUse(p.paramType, ["declared-type"]);
      const full = p.varargs ? arrayOf(shape) : shape;
      this.declareLocal(p.name, full);
      return full;
    });
  }

  private walkMethod(method: MethodDeclaration, owner: string): void {
    const scope = withTypeVariables(
      this.frame.scope,
      method.typeParameters.map((p) => p.name)
    );
    this.enter({ scope, member: method.name, isStatic: hasModifier(method, "static") }, () => {
      method.annotations.forEach((a) => this.annotationUse(a));
      for (const parameter of method.typeParameters) {
        parameter.bounds.forEach((bound, i) => this.typeUse(bound, [i === 0 ? "bound" : "secondary-bound"]));
      }
      const returnShape = this.typeUse(method.returnType, ["declared-type"]);
      method.throws.forEach((t) => this.typeUse(t, ["thrown"]));
      this.withLocals(() => {
        const params = this.declareParameters(method.parameters);
        if (method.annotations.some((a) => a.name === "Override" || a.name === "java.lang.Override")) {
          this.noteOverride(owner, { name: method.name, params, returns: returnShape }, visibilityOf(method));
        }
        if (method.defaultValue) {
          this.typeOf(method.defaultValue, expectValue(returnShape));
        }
        const body = method.body;
        if (body) {
          this.enter({ returnShape }, () => this.walkBlock(body));
        }
      });
    });
  }

  /**
   * An `@Override` method whose overridden declaration nothing visible has:
   * it belongs to the first missing supertype
   */
  private noteOverride(owner: string, signature: MethodSignatureShape, visibility: Visibility): void {
    const supertypes = this.index.directSupertypes(owner);
    const target = supertypes.find((s) => this.isMissing(s.qualifiedName));
    if (!target) return;
    const declaredOnKnown = supertypes
      .filter((s) => !this.isMissing(s.qualifiedName))
      .some((s) =>
        this.index.findMethods(s, signature.name).some((m) => m.member.params.length === signature.params.length)
      );
    if (declaredOnKnown) return;
    this.record(
      "METHOD",
      target.qualifiedName,
      signature.name,
      this.site("OVERRIDE", {
        argumentShapes: signature.params,
        expectedResultUsage: signature.returns,
        isStaticContext: false,
        receiverTypeArguments: target.typeArgs,
        declaredVisibility: visibility,
      })
    );
  }

  // ---------------------------------------------------------------------------
  // Statements
  // ---------------------------------------------------------------------------

  private walkBlock(block: Block): void {
    this.withLocals(() => block.statements.forEach((s) => this.walkStatement(s)));
  }

  private walkStatement(statement: Statement): void {
    switch (statement.type) {
      case "Block":
        this.walkBlock(statement);
        return;
      case "LocalVariable": {
        const declared = this.typeUse(statement.varType, ["declared-type"]);
        let shape = declared;
        if (statement.initializer) {
          const valueShape = this.typeOf(statement.initializer, expectValue(declared));
          this.noteAssignment(valueShape, declared);
          if (statement.varType.type === "VarType") shape = valueShape;
        }
        this.declareLocal(statement.name, shape);
        return;
      }
      case "ExpressionStatement":
        this.typeOf(statement.expression, DISCARDED);
        return;
      case "Return": {
        if (!statement.expression) return;
        const sink = this.frame.lambdaReturns;
        const expected = sink ? undefined : this.frame.returnShape;
        const shape = this.typeOf(statement.expression, expected ? expectValue(expected) : UNKNOWN);
        this.noteAssignment(shape, expected);
        sink?.push(shape);
        return;
      }
      case "If":
        this.typeOf(statement.condition, CONDITION);
        this.walkStatement(statement.then);
        if (statement.otherwise) this.walkStatement(statement.otherwise);
        return;
      case "While":
        this.typeOf(statement.condition, CONDITION);
        this.walkStatement(statement.body);
        return;
      case "For":
        this.withLocals(() => {
          statement.init.forEach((s) => this.walkStatement(s));
          if (statement.condition) this.typeOf(statement.condition, CONDITION);
          statement.update.forEach((e) => this.typeOf(e, DISCARDED));
          this.walkStatement(statement.body);
        });
        return;
      case "ForEach":
        this.withLocals(() => {
          const declared = this.typeUse(statement.varType, ["declared-type"]);
          const iterable = this.typeOf(statement.iterable, UNKNOWN);
          const element = this.elementShape(iterable);
          this.noteType(iterable, ["iterated"], {
            typeArguments: declared.kind === "top" ? [] : [boxed(declared)],
          });
          this.declareLocal(statement.name, declared.kind === "top" ? element : declared);
          this.walkStatement(statement.body);
        });
        return;
      case "Switch":
        this.walkSwitch(statement.selector, statement.cases);
        return;
      case "Try":
        this.withLocals(() => {
          for (const resource of statement.resources) {
            this.walkStatement(resource);
            this.noteType(this.localShape(resource.name), ["resource"]);
          }
          this.walkBlock(statement.block);
        });
        for (const clause of statement.catches) {
          this.withLocals(() => {
            const shapes = clause.types.map((t) => this.typeUse(t, ["caught"]));
            this.declareLocal(clause.name, shapes.length === 1 ? shapes[0] : named("java.lang.Exception"));
            this.walkBlock(clause.body);
          });
        }
        if (statement.finallyBlock) this.walkBlock(statement.finallyBlock);
        return;
      case "Throw": {
        const shape = this.typeOf(statement.expression, UNKNOWN);
        this.noteType(shape, ["thrown"]);
        return;
      }
      case "ConstructorInvocation":
        this.explicitConstructorCall(statement.kind, statement.arguments);
        return;
      case "Break":
      case "Continue":
        return;
    }
  }

  private elementShape(iterable: TypeShape): TypeShape {
    if (iterable.kind === "array") return iterable.of;
    if (iterable.kind !== "named") return TOP;
    const iterator = this.index.findMethods(iterable, "iterator")[0];
    if (iterator) {
      const returned = substitute(iterator.member.returns, iterator.bindings);
      if (returned.kind === "named" && returned.typeArgs.length === 1) {
        return this.concrete(argumentBound(returned.typeArgs[0]));
      }
    }
    return iterable.typeArgs.length === 1 ? this.concrete(argumentBound(iterable.typeArgs[0])) : TOP;
  }

  private walkSwitch(selectorExpression: Expression, cases: ReadonlyArray<{ labels: Expression[]; body: Statement[] }>): void {
    const selector = this.typeOf(selectorExpression, UNKNOWN);
    const selectorMissing = selector.kind === "named" && this.isMissing(selector.qualifiedName);
    const selectorOwner = selector.kind === "named" ? this.memberOwner(selector.qualifiedName) : undefined;
    const selectorType = selector.kind === "named" ? this.index.lookup(selector.qualifiedName) : undefined;

    if (selectorMissing) this.noteType(selector, ["switch-label"]);

    this.withLocals(() => {
      for (const switchCase of cases) {
        for (const label of switchCase.labels) {
          if (label.type === "Name" && selector.kind === "named" && (selectorMissing || selectorType?.kind === "ENUM")) {
            const exists = selectorType?.enumConstants.includes(label.name) ?? false;
            if (!exists && selectorOwner) {
              this.record(
                "FIELD",
                selectorOwner,
                label.name,
                this.site("FIELD_ACCESS", { expectedResultUsage: selector, isStaticContext: true, idioms: ["switch-label"] })
              );
            }
            continue;
          }
          this.typeOf(label, expectValue(selector, ["switch-label"]));
        }
        switchCase.body.forEach((s) => this.walkStatement(s));
      }
    });
  }

  private explicitConstructorCall(kind: "this" | "super", args: readonly Expression[]): void {
    const self = this.frame.selves[0];
    if (!self) return;
    const target = kind === "this" ? self : this.index.lookup(self.qualifiedName)?.superclass;
    if (!target) {
      args.forEach((a) => this.typeOf(a, UNKNOWN));
      return;
    }
    this.construct(target, args, undefined);
  }

  // ---------------------------------------------------------------------------
  // Expressions
  // ---------------------------------------------------------------------------

  private typeOf(expression: Expression, expectation: Expectation): TypeShape {
    switch (expression.type) {
      case "Literal":
        return literalShape(expression.kind);
      case "Name":
        return this.typeName(expression.name, expectation);
      case "FieldAccess":
        return this.typeFieldAccess(expression, expectation);
      case "MethodCall":
        return this.typeCall(expression, expectation);
      case "New":
        return this.typeNew(expression, expectation);
      case "NewArray": {
        const element = this.typeUse(expression.elementType, ["declared-type"]);
        expression.dimensions.forEach((d) => this.typeOf(d, expectValue(INT)));
        expression.initializer?.forEach((e) => this.typeOf(e, expectValue(element)));
        let shape = arrayOf(element);
        for (let i = 1; i < expression.dimensions.length; i += 1) shape = arrayOf(shape);
        return shape;
      }
      case "Lambda":
        return this.typeLambdaAgainst(expression, expectation);
      case "MethodReference":
        return this.typeMethodReferenceAgainst(expression, expectation);
      case "Cast": {
        const shape = this.typeUse(expression.castType, ["cast"]);
        this.typeOf(expression.expression, UNKNOWN);
        return shape;
      }
      case "InstanceOf": {
        this.typeOf(expression.expression, UNKNOWN);
        const shape = this.typeUse(expression.checkType, ["instanceof"]);
        if (expression.binding) this.declareLocal(expression.binding, shape);
        return BOOLEAN;
      }
      case "Binary":
        return this.typeBinary(expression.operator, expression.left, expression.right);
      case "Unary":
        if (expression.operator === "!") {
          this.typeOf(expression.operand, CONDITION);
          return BOOLEAN;
        }
        return this.typeOf(expression.operand, expectation.kind === "value" ? expectation : expectValue(INT));
      case "Assign":
        return this.typeAssignTarget(expression.target, expression.value);
      case "Conditional": {
        this.typeOf(expression.condition, CONDITION);
        const branch = expectation.kind === "value" ? expectation : UNKNOWN;
        const a = this.typeOf(expression.whenTrue, branch);
        const b = this.typeOf(expression.whenFalse, branch);
        return commonSupertype(a, b, this.index);
      }
      case "ArrayAccess": {
        const array = this.typeOf(expression.array, UNKNOWN);
        this.typeOf(expression.index, expectValue(INT));
        return array.kind === "array" ? array.of : TOP;
      }
      case "ClassLiteral": {
        const shape = this.typeUse(expression.classType, ["class-literal"]);
        return named("java.lang.Class", [boxed(shape)]);
      }
      case "This":
        return this.frame.selves[0] ?? TOP;
      case "Super": {
        const self = this.frame.selves[0];
        return (self && this.index.lookup(self.qualifiedName)?.superclass) ?? TOP;
      }
    }
  }

  private typeBinary(operator: string, left: Expression, right: Expression): TypeShape {
    switch (operator) {
      case "&&":
      case "||":
        this.typeOf(left, CONDITION);
        this.typeOf(right, CONDITION);
        return BOOLEAN;
      case "==":
      case "!=": {
        const a = this.typeOf(left, UNKNOWN);
        this.typeOf(right, a.kind === "primitive" ? expectValue(a) : UNKNOWN);
        return BOOLEAN;
      }
      case "<":
      case ">":
      case "<=":
      case ">=": {
        const a = this.typeOf(left, UNKNOWN);
        this.typeOf(right, a.kind === "primitive" ? expectValue(a) : UNKNOWN);
        return BOOLEAN;
      }
      default: {
        const a = this.typeOf(left, UNKNOWN);
        const b = this.typeOf(right, a.kind === "primitive" && operator !== "+" ? expectValue(a) : UNKNOWN);
        if (operator === "+" && (isStringShape(a) || isStringShape(b))) {
          this.noteType(isStringShape(a) ? b : a, ["string-conversion"]);
          return named(STRING);
        }
        if (a.kind === "top" && b.kind === "top") return TOP;
        // an unknown operand of + may still be a String
        if (operator === "+" && (a.kind === "top" || b.kind === "top")) return TOP;
        return numericPromotion(a, b);
      }
    }
  }

  private typeAssignTarget(target: Expression, value: Expression): TypeShape {
    if (target.type === "FieldAccess" || target.type === "Name") {
      const local = target.type === "Name" ? this.localShape(target.name) : undefined;
      if (local) {
        const valueShape = this.typeOf(value, expectValue(local));
        this.noteAssignment(valueShape, local);
        return local;
      }
      const valueShape = this.typeOf(value, UNKNOWN);
      const written = this.typeFieldTarget(target, valueShape);
      if (written) {
        this.noteAssignment(valueShape, written);
        return written;
      }
      return valueShape;
    }
    const shape = this.typeOf(target, UNKNOWN);
    this.typeOf(value, expectValue(shape));
    return shape;
  }

  /**
   * Typed name lookup for a written field; records a `field-write` site on a
   * missing field. Returns the field's shape when it is known.
   */
  private typeFieldTarget(target: FieldAccess | NameExpression, valueShape: TypeShape): TypeShape | undefined {
    const expectation: Expectation = { kind: "value", shape: valueShape, idioms: ["field-write"] };
    if (target.type === "Name") {
      return this.lookupName(target.name, expectation, true);
    }
    return this.accessField(target, expectation, true);
  }

  private concrete(shape: TypeShape): TypeShape {
    const inScope = this.frame.scope.typeVariables;
    return mapShape(shape, (s) => (s.kind === "typeVariable" && !inScope.has(s.name) ? TOP : undefined));
  }

  // -- names and fields --------------------------------------------------------

  private typeName(identifier: string, expectation: Expectation): TypeShape {
    const local = this.localShape(identifier);
    if (local) return local;
    return this.lookupName(identifier, expectation, false) ?? TOP;
  }

  private fieldSite(
    owner: string,
    expectation: Expectation,
    isStatic: boolean,
    write: boolean,
    receiverTypeArguments: TypeShape[] = []
  ): UsageSite {
    const idioms = expectation.kind === "value" ? [...(expectation.idioms ?? [])] : [];
    return this.site("FIELD_ACCESS", {
      argumentShapes: write && expectation.kind === "value" ? [expectation.shape] : [],
      expectedResultUsage: write ? undefined : this.usageOf(expectation, owner, receiverTypeArguments),
      isStaticContext: isStatic,
      idioms,
      receiverTypeArguments,
    });
  }

  /**
   * Unqualified field name: enclosing types, static imports, then the
   * innermost enclosing type gets a new field
   */
  private lookupName(identifier: string, expectation: Expectation, write: boolean): TypeShape | undefined {
    for (const self of this.frame.selves) {
      const match = this.index.findField(self, identifier);
      if (match) return this.concrete(substitute(match.member.type, match.bindings));
    }

    const imported = this.staticImportOwner(identifier, (type) => type.fields.some((f) => f.name === identifier));
    if (imported) {
      if (this.isMissing(imported)) {
        this.record("FIELD", imported, identifier, this.fieldSite(imported, expectation, true, write));
        return write ? undefined : this.resultFor(expectation, imported, []);
      }
      const match = this.index.findField(named(imported), identifier);
      return match ? this.concrete(match.member.type) : TOP;
    }

    const innermost = this.frame.selves[0];
    const owner = innermost ? this.memberOwner(innermost.qualifiedName) : undefined;
    if (!owner) return TOP;
    if (!write && isCapitalized(identifier) && !/^[A-Z0-9_]+$/.test(identifier)) {
      // A capitalized name that is neither a variable nor a constant names a type.
      return this.resolveType(identifier, [], []);
    }
    this.record("FIELD", owner, identifier, this.fieldSite(owner, expectation, this.frame.isStatic, write));
    return write ? undefined : this.resultFor(expectation, owner, []);
  }

  private accessField(expression: FieldAccess, expectation: Expectation, write: boolean): TypeShape | undefined {
    const target = this.classifyTarget(expression.target);
    if (target.kind === "none") return TOP;
    const receiver = target.shape;
    if (!receiver) return TOP;

    if (receiver.kind === "array" && expression.name === "length") return INT;
    if (receiver.kind !== "named") return TOP;

    const match = this.index.findField(receiver, expression.name);
    if (match) {
      return this.concrete(substitute(match.member.type, match.bindings));
    }

    const owner = this.memberOwner(receiver.qualifiedName);
    if (!owner) return TOP;
    const isStatic = target.kind === "type";
    const site = this.fieldSite(owner, expectation, isStatic, write, receiver.typeArgs);
    if (isStatic && !write) site.idioms.push("qualified-constant");
    this.record("FIELD", owner, expression.name, site);
    if (write) return undefined;
    return this.resultFor(expectation, owner, receiver.typeArgs);
  }

  private typeFieldAccess(expression: FieldAccess, expectation: Expectation): TypeShape {
    const dotted = this.dottedText(expression);
    if (dotted && this.startsWithType(dotted)) {
      // `Outer.Inner` or `a.b.Type` used where a value is expected is a type name.
      const asType = this.tryTypeName(dotted);
      if (asType) return asType;
    }
    return this.accessField(expression, expectation, false) ?? TOP;
  }

  private dottedText(expression: Expression): string | undefined {
    if (expression.type === "Name") return expression.name;
    if (expression.type === "FieldAccess") {
      const prefix = this.dottedText(expression.target);
      return prefix ? `${prefix}.${expression.name}` : undefined;
    }
    return undefined;
  }

  /**
   * Whether the head of a dotted name is something other than a variable or field
   */
  private startsWithType(dotted: string): boolean {
    const head = dotted.split(".")[0];
    if (this.localShape(head)) return false;
    if (this.frame.selves.some((self) => this.index.findField(self, head))) return false;
    return true;
  }

  /**
   * The dotted name as a type when every segment reads as one (`Outer.Inner`,
   * `java.util.Map.Entry`); constants (`X.RED`) are left to field access
   */
  private tryTypeName(dotted: string): TypeShape | undefined {
    const last = simpleNameOf(dotted);
    if (!isCapitalized(last) || /^[A-Z0-9_]+$/.test(last)) return undefined;
    const qualifier = qualifierOf(dotted);
    const resolution = this.resolver.resolveName(qualifier, this.frame.scope);
    if (resolution.kind === "known" && this.index.findField(named(resolution.qualifiedName), last)) {
      return undefined;
    }
    return this.resolveType(dotted, [], []);
  }

  /**
   * Decide whether an access target names a type, a value, or `super`
   */
  private classifyTarget(target: Expression | undefined): Target {
    if (!target) return { kind: "none" };
    if (target.type === "Super") {
      const self = this.frame.selves[0];
      return { kind: "super", shape: self ? this.index.lookup(self.qualifiedName)?.superclass : undefined };
    }
    const dotted = this.dottedText(target);
    if (dotted && this.startsWithType(dotted)) {
      const head = dotted.split(".")[0];
      const resolution = this.resolver.resolveName(dotted, this.frame.scope);
      const lowerHead = !isCapitalized(head);
      if (resolution.kind === "known" || resolution.kind === "missing") {
        if (lowerHead && dotted.split(".").length === 1) {
          // A lower-case single name that is no variable: an unknown field of the enclosing type.
          return { kind: "value", shape: this.typeOf(target, RECEIVER) };
        }
        const shape = this.resolveType(dotted, [], []);
        if (shape.kind === "named") return { kind: "type", shape };
      }
    }
    return { kind: "value", shape: this.typeOf(target, RECEIVER) };
  }

  private staticImportOwner(member: string, has: (type: KnownType) => boolean): string | undefined {
    const imports = this.frame.unit.imports.filter((imp) => imp.isStatic);
    const single = imports.find((imp) => !imp.onDemand && simpleNameOf(imp.name) === member);
    const candidates = single ? [qualifierOf(single.name)] : imports.filter((imp) => imp.onDemand).map((imp) => imp.name);
    let firstMissing: string | undefined;
    for (const ownerName of candidates) {
      const resolution = this.resolver.resolveQualified(ownerName);
      if (resolution.kind === "missing") {
        resolution.missing.forEach((m) => {
          if (!this.missingTypes.has(m.qualifiedName)) {
            this.missingTypes.set(m.qualifiedName, m);
            this.references.record("TYPE", m.ownerHint, m.simpleName, this.site("TYPE_USE"));
          }
        });
        firstMissing = firstMissing ?? resolution.qualifiedName;
        if (single) return resolution.qualifiedName;
        continue;
      }
      if (resolution.kind !== "known") continue;
      const type = this.index.lookup(resolution.qualifiedName);
      if (single || (type && has(type))) return resolution.qualifiedName;
    }
    return firstMissing;
  }

  /**
   * Shape of an unresolved member's value as far as the caller can tell
   */
  private resultFor(expectation: Expectation, owner: string, receiverArgs: TypeShape[]): TypeShape {
    if (expectation.kind === "receiver") return named(owner, receiverArgs);
    if (expectation.kind === "value") return expectation.shape;
    if (expectation.kind === "condition") return BOOLEAN;
    return TOP;
  }

  // -- calls ----------------------------------------------------------------------

  private typeCall(call: MethodCall, expectation: Expectation): TypeShape {
    const typeArguments = call.typeArguments.map((t) => this.typeUse(t, ["type-argument"]));
    const target = this.classifyTarget(call.target);

    if (target.kind === "none") {
      return this.unqualifiedCall(call, typeArguments, expectation);
    }
    const receiver = target.shape;
    if (!receiver || receiver.kind !== "named") {
      this.typeArguments(call.arguments);
      return TOP;
    }
    const isStatic = target.kind === "type";
    const result = this.callOn(receiver, call, typeArguments, expectation, isStatic);
    if (isStatic && ENUM_COLLECTIONS.has(receiver.qualifiedName) && result.kind === "named") {
      this.noteType(result.typeArgs[0], ["enum-collection"]);
    }
    return result;
  }

  /**
   * Type the arguments of a call nothing declares
   */
  private typeArguments(args: readonly Expression[]): Argument[] {
    return args.map((arg) => {
      if (arg.type === "Lambda") return { shape: this.functionalShapeFor(arg), deferred: arg };
      if (arg.type === "MethodReference") return { shape: this.functionalShapeForReference(arg), deferred: arg };
      return { shape: this.typeOf(arg, UNKNOWN) };
    });
  }

  private accepts(param: TypeShape, arg: Argument): boolean {
    if (arg.deferred) return param.kind === "named" || param.kind === "typeVariable";
    const shape = arg.shape;
    if (shape.kind === "top") return true;
    if (shape.kind === "named" && this.isMissing(shape.qualifiedName)) return param.kind !== "primitive";
    if (param.kind === "typeVariable") return !(shape.kind === "primitive" && shape.name === "void");
    if (mentionsTypeVariable(param)) {
      if (param.kind === "named") return isAssignable(shape, named(param.qualifiedName), this.index);
      if (param.kind === "array") return shape.kind === "array" || shape.kind === "null";
    }
    return isAssignable(shape, param, this.index);
  }

  private applicable<M extends { params: TypeShape[]; varargs: boolean }>(member: M, args: Argument[], bindings: ReadonlyMap<string, TypeShape>): boolean {
    const params = member.params.map((p) => substitute(p, bindings));
    if (args.length === params.length && params.every((p, i) => this.accepts(p, args[i]))) return true;
    if (!member.varargs || args.length < params.length - 1) return false;
    const fixed = params.slice(0, -1);
    const rest = params[params.length - 1];
    const element = rest.kind === "array" ? rest.of : TOP;
    return fixed.every((p, i) => this.accepts(p, args[i])) && args.slice(fixed.length).every((a) => this.accepts(element, a));
  }

  private chooseOverload<M extends { params: TypeShape[]; varargs: boolean }>(
    matches: MemberMatch<M>[],
    args: readonly Expression[]
  ): { match: MemberMatch<M> | undefined; typed: Argument[] } {
    const byArity = matches.filter(
      (m) => m.member.params.length === args.length || (m.member.varargs && args.length >= m.member.params.length - 1)
    );
    const exact = byArity.filter((m) => m.member.params.length === args.length);
    const sole = exact.length === 1 ? exact[0] : byArity.length === 1 ? byArity[0] : undefined;

    const typed: Argument[] = args.map((arg, i) => {
      if (arg.type === "Lambda" || arg.type === "MethodReference") return { shape: TOP, deferred: arg };
      const param = sole ? this.paramAt(sole, i) : undefined;
      return { shape: this.typeOf(arg, param ? expectValue(this.concrete(param)) : UNKNOWN) };
    });

    const match = sole && this.applicable(sole.member, typed, sole.bindings) ? sole : byArity.find((m) => this.applicable(m.member, typed, m.bindings));
    typed.forEach((arg, i) => {
      const param = match ? this.paramAt(match, i) : undefined;
      if (arg.deferred) {
        arg.shape = param ? this.typeDeferred(arg.deferred, this.bindMethodVariables(param, match, typed)) : this.typeDeferredUnknown(arg.deferred);
      } else if (param) {
        this.noteAssignment(arg.shape, this.concrete(param));
      }
    });
    return { match, typed };
  }

  private paramAt<M extends { params: TypeShape[]; varargs: boolean }>(match: MemberMatch<M>, i: number): TypeShape | undefined {
    const params = match.member.params;
    const raw = i < params.length ? params[i] : params[params.length - 1];
    if (!raw) return undefined;
    const last = i >= params.length - 1 && match.member.varargs && raw.kind === "array" ? raw.of : raw;
    return substitute(last, match.bindings);
  }

  private bindMethodVariables<M extends { params: TypeShape[]; varargs: boolean }>(
    param: TypeShape,
    match: MemberMatch<M> | undefined,
    args: Argument[]
  ): TypeShape {
    if (!match) return param;
    const bindings = this.inferBindings(match.member.params.map((p) => substitute(p, match.bindings)), args);
    return substitute(param, bindings);
  }

  /**
   * Bind method type variables from argument shapes (`T` ← arg, `Class<T>` ← `Class<X>`)
   */
  private inferBindings(params: TypeShape[], args: Argument[]): Map<string, TypeShape> {
    const bindings = new Map<string, TypeShape>();
    const unify = (param: TypeShape, arg: TypeShape): void => {
      if (arg.kind === "top" || arg.kind === "null") return;
      if (param.kind === "typeVariable") {
        if (!bindings.has(param.name)) bindings.set(param.name, boxed(arg));
        return;
      }
      if (param.kind === "array" && arg.kind === "array") return unify(param.of, arg.of);
      if (param.kind === "named" && arg.kind === "named" && param.qualifiedName === arg.qualifiedName) {
        param.typeArgs.forEach((p, i) => {
          const a = arg.typeArgs[i];
          if (a) unify(argumentBound(p), argumentBound(a));
        });
      }
    };
    args.forEach((arg, i) => {
      const param = params[Math.min(i, params.length - 1)];
      if (!param || arg.deferred) return;
      const target = i >= params.length - 1 && param.kind === "array" && arg.shape.kind !== "array" ? param.of : param;
      unify(target, arg.shape);
    });
    return bindings;
  }

  private knownResult(match: MemberMatch<KnownMethod>, args: Argument[]): TypeShape {
    const params = match.member.params.map((p) => substitute(p, match.bindings));
    const bindings = this.inferBindings(params, args);
    return this.concrete(substitute(substitute(match.member.returns, match.bindings), bindings));
  }

  /**
   * Expected result of a member access; a receiver of a further access is
   * taken to be the owner itself
   */
  private usageOf(expectation: Expectation, owner: string, receiverTypeArguments: TypeShape[]): TypeShape | undefined {
    return expectation.kind === "receiver" ? named(owner, receiverTypeArguments) : expectedUsage(expectation);
  }

  private methodSite(
    owner: string,
    args: Argument[],
    typeArguments: TypeShape[],
    expectation: Expectation,
    isStatic: boolean,
    receiverTypeArguments: TypeShape[]
  ): UsageSite {
    return this.site("CALL", {
      argumentShapes: args.map((a) => a.shape),
      expectedResultUsage: this.usageOf(expectation, owner, receiverTypeArguments),
      typeArguments,
      isStaticContext: isStatic,
      receiverTypeArguments,
    });
  }

  private callOn(
    receiver: NamedShape,
    call: MethodCall,
    typeArguments: TypeShape[],
    expectation: Expectation,
    isStatic: boolean
  ): TypeShape {
    const matches = this.index.findMethods(receiver, call.name);
    if (matches.length > 0) {
      const { match, typed } = this.chooseOverload(matches, call.arguments);
      if (match) return this.knownResult(match, typed);
      const owner = this.memberOwner(receiver.qualifiedName);
      if (!owner) return TOP;
      this.record("METHOD", owner, call.name, this.methodSite(owner, typed, typeArguments, expectation, isStatic, receiver.typeArgs));
      return this.resultFor(expectation, owner, receiver.typeArgs);
    }

    const args = this.typeArguments(call.arguments);
    const key = `${call.name}/${args.length}`;
    const builtin = OBJECT_METHODS.get(key) ?? (this.isMissing(receiver.qualifiedName) ? ENUM_METHODS.get(key) : undefined);
    const owner = this.memberOwner(receiver.qualifiedName);
    if (!owner) return builtin ?? TOP;
    this.record("METHOD", owner, call.name, this.methodSite(owner, args, typeArguments, expectation, isStatic, receiver.typeArgs));
    return builtin ?? this.resultFor(expectation, owner, receiver.typeArgs);
  }

  private unqualifiedCall(call: MethodCall, typeArguments: TypeShape[], expectation: Expectation): TypeShape {
    for (const self of this.frame.selves) {
      if (this.index.findMethods(self, call.name).length > 0) {
        return this.callOn(self, call, typeArguments, expectation, this.frame.isStatic);
      }
    }

    const imported = this.staticImportOwner(call.name, (type) => type.methods.some((m) => m.name === call.name));
    if (imported) {
      return this.callOn(named(imported), call, typeArguments, expectation, true);
    }

    const innermost = this.frame.selves[0];
    if (!innermost) {
      this.typeArguments(call.arguments);
      return TOP;
    }
    return this.callOn(innermost, call, typeArguments, expectation, this.frame.isStatic);
  }

  // -- construction -----------------------------------------------------------------

  private typeNew(creation: ObjectCreation, expectation: Expectation): TypeShape {
    let typeArgs = creation.classType.typeArguments.map((t) => this.typeUse(t, ["type-argument"]));
    const written = this.resolveType(creation.classType.name, typeArgs, ["constructed"]);
    if (written.kind !== "named") return written;
    if (typeArgs.length === 0 && expectation.kind === "value" && expectation.shape.kind === "named") {
      if (expectation.shape.qualifiedName === written.qualifiedName) typeArgs = expectation.shape.typeArgs;
    }
    const shape = named(written.qualifiedName, typeArgs);
    if (ENUM_COLLECTIONS.has(shape.qualifiedName)) {
      creation.arguments.forEach((arg) => {
        if (arg.type === "ClassLiteral") this.noteType(this.typeOf(arg, UNKNOWN), []);
      });
    }

    if (creation.body) {
      this.anonymousBody(shape, creation.body);
      if (creation.arguments.length === 0 && this.isMissing(shape.qualifiedName)) {
        return shape;
      }
    }
    this.construct(shape, creation.arguments, creation.body);
    return shape;
  }

  private construct(shape: NamedShape, args: readonly Expression[], body: MemberDeclaration[] | undefined): void {
    if (this.isMissing(shape.qualifiedName)) {
      const typed = this.typeArguments(args);
      this.record("CONSTRUCTOR", shape.qualifiedName, "<init>", this.site("CONSTRUCTION", {
        argumentShapes: typed.map((a) => a.shape),
        receiverTypeArguments: shape.typeArgs,
        isStaticContext: false,
        idioms: body ? ["anonymous-subclass"] : [],
      }));
      return;
    }
    const type = this.index.lookup(shape.qualifiedName);
    if (!type || type.kind === "INTERFACE") {
      args.forEach((a) => this.typeOf(a, UNKNOWN));
      return;
    }
    const bindings = new Map<string, TypeShape>();
    type.typeParameters.forEach((p, i) => {
      const arg = shape.typeArgs[i];
      if (arg) bindings.set(p, arg);
    });
    const matches: MemberMatch<KnownConstructor>[] = type.constructors.map((member) => ({ member, owner: type, bindings }));
    const { match, typed } = this.chooseOverload(matches, args);
    if (!match && type.origin === "fragment") {
      this.record("CONSTRUCTOR", shape.qualifiedName, "<init>", this.site("CONSTRUCTION", {
        argumentShapes: typed.map((a) => a.shape),
        isStaticContext: false,
      }));
    }
  }

  private anonymousBody(shape: NamedShape, body: MemberDeclaration[]): void {
    const methods = body.filter((m): m is MethodDeclaration => m.type === "MethodDeclaration");
    const signatures: Array<MethodSignatureShape & { visibility: Visibility }> = methods.map((m) => {
      const scope = withTypeVariables(this.frame.scope, m.typeParameters.map((p) => p.name));
      return this.enter({ scope }, () => ({
        name: m.name,
        params: m.parameters.map((p) => {
          const s = this.typeUse(p.paramType, ["declared-type"]);
          return p.varargs ? arrayOf(s) : s;
        }),
        returns: this.typeUse(m.returnType, ["declared-type"]),
        visibility: visibilityOf(m),
      }));
    });
    this.noteType(shape, ["anonymous-subclass"], {
      overriddenMethods: signatures.map(({ name, params, returns }) => ({ name, params, returns })),
      implementorMethods: signatures.map((s) => `${s.name}/${s.params.length}`),
      typeArguments: shape.typeArgs,
    });

    if (this.isMissing(shape.qualifiedName)) {
      for (const signature of signatures) {
        this.record("METHOD", shape.qualifiedName, signature.name, this.site("OVERRIDE", {
          argumentShapes: signature.params,
          expectedResultUsage: signature.returns,
          isStaticContext: false,
          receiverTypeArguments: shape.typeArgs,
          declaredVisibility: signature.visibility,
        }));
      }
    }

    const outer = this.frame;
    this.enter({ selves: [shape, ...outer.selves], isStatic: false }, () => {
      this.walkMembers(body, shape.qualifiedName, false);
    });
  }

  // -- lambdas and method references ------------------------------------------------

  private lambdaParameters(lambda: Lambda, fallback: TypeShape[] = []): TypeShape[] {
    return lambda.parameters.map((p, i) => (p.paramType ? this.typeUse(p.paramType, ["declared-type"]) : fallback[i] ?? TOP));
  }

  /**
   * Walk a lambda body with typed parameters
   */
  private walkLambda(lambda: Lambda, params: TypeShape[], expectedResult: TypeShape | undefined): LambdaResult {
    return this.withLocals((): LambdaResult => {
      lambda.parameters.forEach((p, i) => this.declareLocal(p.name, params[i] ?? TOP));
      if (lambda.body.type === "Block") {
        const returns: TypeShape[] = [];
        const block = lambda.body;
        this.enter({ lambdaReturns: returns, returnShape: expectedResult }, () => this.walkBlock(block));
        if (returns.length === 0) return { kind: "void" };
        const merged = returns.slice(1).reduce((a, b) => commonSupertype(a, b, this.index), returns[0]);
        return merged.kind === "top" ? { kind: "unknown", voidCompatible: false } : { kind: "value", shape: merged };
      }
      const body = lambda.body;
      const expectation = expectedResult ? (isVoid(expectedResult) ? DISCARDED : expectValue(expectedResult)) : UNKNOWN;
      const shape = this.typeOf(body, expectation);
      if (isVoid(shape)) return { kind: "void" };
      if (shape.kind === "top") {
        const voidCompatible = body.type === "MethodCall" || body.type === "New" || body.type === "Assign";
        return { kind: "unknown", voidCompatible };
      }
      return { kind: "value", shape };
    });
  }

  private static resultShape(result: LambdaResult): TypeShape | undefined {
    switch (result.kind) {
      case "void":
        return undefined;
      case "value":
        return result.shape;
      case "unknown":
        return result.voidCompatible ? undefined : TOP;
    }
  }

  /**
   * The java.util.function interface a lambda of this shape fits; an
   * undefined result picks the void-returning interface
   */
  private functionalFor(params: TypeShape[], result: TypeShape | undefined): TypeShape {
    const args = params.map((p) => boxed(p));
    const value = result ? [boxed(result)] : [];
    switch (params.length) {
      case 0:
        return result ? named("java.util.function.Supplier", value) : named("java.lang.Runnable");
      case 1:
        return result ? named("java.util.function.Function", [...args, ...value]) : named("java.util.function.Consumer", args);
      case 2:
        return result ? named("java.util.function.BiFunction", [...args, ...value]) : named("java.util.function.BiConsumer", args);
      default:
        return TOP;
    }
  }

  private functionalShapeFor(lambda: Lambda): TypeShape {
    const params = this.lambdaParameters(lambda);
    return this.functionalFor(params, ReferenceCollector.resultShape(this.walkLambda(lambda, params, undefined)));
  }

  private referencedMethod(reference: MethodReference): { params: TypeShape[]; returns: TypeShape } | undefined {
    let receiver: TypeShape;
    let unbound = false;
    if (isTypeNode(reference.target)) {
      receiver = this.typeUse(reference.target, []);
      unbound = true;
    } else {
      const target = this.classifyTarget(reference.target);
      receiver = target.kind === "none" ? TOP : target.shape ?? TOP;
      unbound = target.kind === "type";
    }
    if (receiver.kind !== "named") return undefined;
    if (reference.name === "new") {
      const type = this.index.lookup(receiver.qualifiedName);
      const ctor = type?.constructors[0];
      return ctor && type?.constructors.length === 1 ? { params: ctor.params, returns: receiver } : undefined;
    }
    const matches = this.index.findMethods(receiver, reference.name);
    if (matches.length !== 1) return undefined;
    const { member, bindings } = matches[0];
    const params = member.params.map((p) => this.concrete(substitute(p, bindings)));
    const returns = this.concrete(substitute(member.returns, bindings));
    return unbound && !member.isStatic ? { params: [receiver, ...params], returns } : { params, returns };
  }

  private functionalShapeForReference(reference: MethodReference): TypeShape {
    const method = this.referencedMethod(reference);
    if (!method) return named("java.util.function.Function", [TOP, TOP]);
    return this.functionalFor(method.params, isVoid(method.returns) ? undefined : method.returns);
  }

  /**
   * Type a lambda or method reference against a known parameter shape
   */
  private typeDeferred(expression: Lambda | MethodReference, param: TypeShape): TypeShape {
    const concrete = this.concrete(param);
    return expression.type === "Lambda"
      ? this.typeLambdaAgainst(expression, expectValue(concrete))
      : this.typeMethodReferenceAgainst(expression, expectValue(concrete));
  }

  private typeDeferredUnknown(expression: Lambda | MethodReference): TypeShape {
    return expression.type === "Lambda" ? this.functionalShapeFor(expression) : this.functionalShapeForReference(expression);
  }

  private samOf(shape: NamedShape): { params: TypeShape[]; returns: TypeShape } | undefined {
    const type = this.index.lookup(shape.qualifiedName);
    if (!type) return undefined;
    const samName = type.sam ?? this.inheritedSam(shape);
    if (!samName) return undefined;
    const match = this.index.findMethods(shape, samName)[0];
    if (!match) return undefined;
    return {
      params: match.member.params.map((p) => this.concrete(argumentBound(substitute(p, match.bindings)))),
      returns: this.concrete(substitute(match.member.returns, match.bindings)),
    };
  }

  private inheritedSam(shape: NamedShape): string | undefined {
    for (const parent of this.index.directSupertypes(shape.qualifiedName)) {
      const type = this.index.lookup(parent.qualifiedName);
      if (type?.sam) return type.sam;
    }
    return undefined;
  }

  private typeLambdaAgainst(lambda: Lambda, expectation: Expectation): TypeShape {
    const target = expectation.kind === "value" ? expectation.shape : undefined;
    if (!target || target.kind !== "named") {
      return this.functionalShapeFor(lambda);
    }
    if (this.isMissing(target.qualifiedName)) {
      const params = this.lambdaParameters(lambda);
      const result = this.walkLambda(lambda, params, undefined);
      // void: the body yields nothing; top: a value of unknown type; absent: either.
      this.noteType(target, [], {
        callShape: "LAMBDA_TARGET",
        argumentShapes: params,
        typeArguments: target.typeArgs,
        expectedResultUsage: result.kind === "void" ? VOID : ReferenceCollector.resultShape(result),
      });
      return target;
    }
    const sam = this.samOf(target);
    const params = this.lambdaParameters(lambda, sam?.params ?? []);
    this.walkLambda(lambda, params, sam?.returns);
    return target;
  }

  private typeMethodReferenceAgainst(reference: MethodReference, expectation: Expectation): TypeShape {
    const target = expectation.kind === "value" ? expectation.shape : undefined;
    if (!target || target.kind !== "named") {
      return this.functionalShapeForReference(reference);
    }
    const method = this.referencedMethod(reference);
    if (this.isMissing(target.qualifiedName)) {
      this.noteType(target, [], {
        callShape: "METHOD_REFERENCE_TARGET",
        argumentShapes: method?.params ?? [],
        typeArguments: target.typeArgs,
        expectedResultUsage: method?.returns,
        arityUnknown: method === undefined,
      });
    }
    return target;
  }
}
