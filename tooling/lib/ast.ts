// =============================================================================
// Fragment AST: the parsed, mutable model of a Java-syntax program fragment.
// Every node carries a `type` discriminant; builders below create nodes with
// empty defaults so fixtures stay short.
// =============================================================================

export interface Position {
  line: number;
  column: number;
}

export interface AstNode {
  type: string;
  position?: Position;
}

// -----------------------------------------------------------------------------
// Syntax type nodes
// -----------------------------------------------------------------------------

export type PrimitiveName = "boolean" | "byte" | "short" | "char" | "int" | "long" | "float" | "double" | "void";

export interface PrimitiveTypeNode extends AstNode {
  type: "PrimitiveType";
  name: PrimitiveName;
}

/**
 * A named type as written (`Map`, `java.util.Map`, `Outer.Inner`).
 * `binding` is set on nodes the synthesizer creates and holds the qualified
 * name the node stands for; the renderer decides how to spell it.
 */
export interface NamedTypeNode extends AstNode {
  type: "NamedType";
  name: string;
  typeArguments: TypeNode[];
  binding?: string;
}

export interface ArrayTypeNode extends AstNode {
  type: "ArrayType";
  elementType: TypeNode;
}

export interface WildcardTypeNode extends AstNode {
  type: "WildcardType";
  bound?: { variance: "extends" | "super"; type: TypeNode };
}

export interface VarTypeNode extends AstNode {
  type: "VarType";
}

export type TypeNode = PrimitiveTypeNode | NamedTypeNode | ArrayTypeNode | WildcardTypeNode | VarTypeNode;

export const PRIMITIVE_NAMES: readonly PrimitiveName[] = [
  "boolean",
  "byte",
  "short",
  "char",
  "int",
  "long",
  "float",
  "double",
  "void",
];

export function isPrimitiveName(name: string): name is PrimitiveName {
  return PRIMITIVE_NAMES.some((primitive) => primitive === name);
}

export function primitiveType(name: PrimitiveName): PrimitiveTypeNode {
  return { type: "PrimitiveType", name };
}

export function namedType(name: string, typeArguments: TypeNode[] = []): NamedTypeNode {
  return { type: "NamedType", name, typeArguments };
}

export function boundType(qualifiedName: string, typeArguments: TypeNode[] = []): NamedTypeNode {
  return { type: "NamedType", name: qualifiedName, typeArguments, binding: qualifiedName };
}

export function arrayType(elementType: TypeNode): ArrayTypeNode {
  return { type: "ArrayType", elementType };
}

export function wildcardType(bound?: { variance: "extends" | "super"; type: TypeNode }): WildcardTypeNode {
  return bound ? { type: "WildcardType", bound } : { type: "WildcardType" };
}

export function varType(): VarTypeNode {
  return { type: "VarType" };
}

/**
 * Shorthand used by fixtures: `"int"`, `"String"`, `"int[]"`. Generic
 * arguments still need {@link namedType}.
 */
export function typeRef(text: string): TypeNode {
  if (text.endsWith("[]")) {
    return arrayType(typeRef(text.slice(0, -2)));
  }
  if (text === "var") {
    return varType();
  }
  return isPrimitiveName(text) ? primitiveType(text) : namedType(text);
}

// -----------------------------------------------------------------------------
// Expressions
// -----------------------------------------------------------------------------

export type LiteralKind = "int" | "long" | "float" | "double" | "char" | "string" | "boolean" | "null";

export interface Literal extends AstNode {
  type: "Literal";
  kind: LiteralKind;
  value: string;
}

export interface NameExpression extends AstNode {
  type: "Name";
  name: string;
}

export interface FieldAccess extends AstNode {
  type: "FieldAccess";
  target: Expression;
  name: string;
}

export interface MethodCall extends AstNode {
  type: "MethodCall";
  target?: Expression;
  name: string;
  arguments: Expression[];
  typeArguments: TypeNode[];
}

export interface ObjectCreation extends AstNode {
  type: "New";
  classType: NamedTypeNode;
  arguments: Expression[];
  body?: MemberDeclaration[];
}

export interface ArrayCreation extends AstNode {
  type: "NewArray";
  elementType: TypeNode;
  dimensions: Expression[];
  initializer?: Expression[];
}

export interface LambdaParameter {
  name: string;
  paramType?: TypeNode;
}

export interface Lambda extends AstNode {
  type: "Lambda";
  parameters: LambdaParameter[];
  body: Expression | Block;
}

export interface MethodReference extends AstNode {
  type: "MethodReference";
  target: Expression | TypeNode;
  name: string;
}

export interface Cast extends AstNode {
  type: "Cast";
  castType: TypeNode;
  expression: Expression;
}

export interface InstanceOf extends AstNode {
  type: "InstanceOf";
  expression: Expression;
  checkType: TypeNode;
  binding?: string;
}

export type BinaryOperator =
  | "+" | "-" | "*" | "/" | "%"
  | "<" | ">" | "<=" | ">="
  | "==" | "!="
  | "&&" | "||"
  | "&" | "|" | "^"
  | "<<" | ">>" | ">>>";

export interface Binary extends AstNode {
  type: "Binary";
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

export type UnaryOperator = "!" | "-" | "+" | "~" | "++" | "--";

export interface Unary extends AstNode {
  type: "Unary";
  operator: UnaryOperator;
  operand: Expression;
  prefix: boolean;
}

export type AssignOperator = "=" | "+=" | "-=" | "*=" | "/=" | "%=" | "&=" | "|=" | "^=" | "<<=" | ">>=";

export interface Assign extends AstNode {
  type: "Assign";
  operator: AssignOperator;
  target: Expression;
  value: Expression;
}

export interface Conditional extends AstNode {
  type: "Conditional";
  condition: Expression;
  whenTrue: Expression;
  whenFalse: Expression;
}

export interface ArrayAccess extends AstNode {
  type: "ArrayAccess";
  array: Expression;
  index: Expression;
}

export interface ClassLiteral extends AstNode {
  type: "ClassLiteral";
  classType: TypeNode;
}

export interface ThisExpression extends AstNode {
  type: "This";
}

export interface SuperExpression extends AstNode {
  type: "Super";
}

export type Expression =
  | Literal
  | NameExpression
  | FieldAccess
  | MethodCall
  | ObjectCreation
  | ArrayCreation
  | Lambda
  | MethodReference
  | Cast
  | InstanceOf
  | Binary
  | Unary
  | Assign
  | Conditional
  | ArrayAccess
  | ClassLiteral
  | ThisExpression
  | SuperExpression;

export const lit = {
  int: (value: number): Literal => ({ type: "Literal", kind: "int", value: String(value) }),
  long: (value: number): Literal => ({ type: "Literal", kind: "long", value: String(value) }),
  double: (value: number): Literal => ({ type: "Literal", kind: "double", value: String(value) }),
  float: (value: number): Literal => ({ type: "Literal", kind: "float", value: String(value) }),
  char: (value: string): Literal => ({ type: "Literal", kind: "char", value }),
  string: (value: string): Literal => ({ type: "Literal", kind: "string", value }),
  boolean: (value: boolean): Literal => ({ type: "Literal", kind: "boolean", value: String(value) }),
  null: (): Literal => ({ type: "Literal", kind: "null", value: "null" }),
};

export function name(identifier: string): NameExpression {
  return { type: "Name", name: identifier };
}

/** `a.b.c` as a chain of field accesses over a leading name. */
export function dotted(path: string): NameExpression | FieldAccess {
  const [head, ...rest] = path.split(".");
  let expression: NameExpression | FieldAccess = name(head);
  for (const segment of rest) {
    expression = fieldAccess(expression, segment);
  }
  return expression;
}

export function fieldAccess(target: Expression, fieldName: string): FieldAccess {
  return { type: "FieldAccess", target, name: fieldName };
}

export function call(
  target: Expression | undefined,
  methodName: string,
  args: Expression[] = [],
  typeArguments: TypeNode[] = []
): MethodCall {
  return target
    ? { type: "MethodCall", target, name: methodName, arguments: args, typeArguments }
    : { type: "MethodCall", name: methodName, arguments: args, typeArguments };
}

export function newObject(classType: NamedTypeNode | string, args: Expression[] = [], body?: MemberDeclaration[]): ObjectCreation {
  const node: ObjectCreation = {
    type: "New",
    classType: typeof classType === "string" ? namedType(classType) : classType,
    arguments: args,
  };
  if (body) {
    node.body = body;
  }
  return node;
}

export function newArray(elementType: TypeNode, dimensions: Expression[], initializer?: Expression[]): ArrayCreation {
  return initializer
    ? { type: "NewArray", elementType, dimensions, initializer }
    : { type: "NewArray", elementType, dimensions };
}

export function lambda(parameters: Array<string | LambdaParameter>, body: Expression | Block): Lambda {
  return {
    type: "Lambda",
    parameters: parameters.map((p) => (typeof p === "string" ? { name: p } : p)),
    body,
  };
}

export function methodRef(target: Expression | TypeNode, methodName: string): MethodReference {
  return { type: "MethodReference", target, name: methodName };
}

export function cast(castType: TypeNode, expression: Expression): Cast {
  return { type: "Cast", castType, expression };
}

export function instanceOf(expression: Expression, checkType: TypeNode, binding?: string): InstanceOf {
  return binding
    ? { type: "InstanceOf", expression, checkType, binding }
    : { type: "InstanceOf", expression, checkType };
}

export function binary(left: Expression, operator: BinaryOperator, right: Expression): Binary {
  return { type: "Binary", operator, left, right };
}

export function unary(operator: UnaryOperator, operand: Expression, prefix = true): Unary {
  return { type: "Unary", operator, operand, prefix };
}

export function assign(target: Expression, value: Expression, operator: AssignOperator = "="): Assign {
  return { type: "Assign", operator, target, value };
}

export function conditional(condition: Expression, whenTrue: Expression, whenFalse: Expression): Conditional {
  return { type: "Conditional", condition, whenTrue, whenFalse };
}

export function arrayAccess(array: Expression, index: Expression): ArrayAccess {
  return { type: "ArrayAccess", array, index };
}

export function classLiteral(classType: TypeNode): ClassLiteral {
  return { type: "ClassLiteral", classType };
}

export function thisExpr(): ThisExpression {
  return { type: "This" };
}

export function superExpr(): SuperExpression {
  return { type: "Super" };
}

// -----------------------------------------------------------------------------
// Statements
// -----------------------------------------------------------------------------

export interface Block extends AstNode {
  type: "Block";
  statements: Statement[];
}

export interface LocalVariable extends AstNode {
  type: "LocalVariable";
  varType: TypeNode;
  name: string;
  initializer?: Expression;
}

export interface ExpressionStatement extends AstNode {
  type: "ExpressionStatement";
  expression: Expression;
}

export interface ReturnStatement extends AstNode {
  type: "Return";
  expression?: Expression;
}

export interface IfStatement extends AstNode {
  type: "If";
  condition: Expression;
  then: Statement;
  otherwise?: Statement;
}

export interface WhileStatement extends AstNode {
  type: "While";
  condition: Expression;
  body: Statement;
}

export interface ForStatement extends AstNode {
  type: "For";
  init: Statement[];
  condition?: Expression;
  update: Expression[];
  body: Statement;
}

export interface ForEachStatement extends AstNode {
  type: "ForEach";
  varType: TypeNode;
  name: string;
  iterable: Expression;
  body: Statement;
}

export interface SwitchCase {
  /** Empty for `default:`. */
  labels: Expression[];
  body: Statement[];
}

export interface SwitchStatement extends AstNode {
  type: "Switch";
  selector: Expression;
  cases: SwitchCase[];
}

export interface CatchClause {
  types: TypeNode[];
  name: string;
  body: Block;
}

export interface TryStatement extends AstNode {
  type: "Try";
  resources: LocalVariable[];
  block: Block;
  catches: CatchClause[];
  finallyBlock?: Block;
}

export interface ThrowStatement extends AstNode {
  type: "Throw";
  expression: Expression;
}

export interface JumpStatement extends AstNode {
  type: "Break" | "Continue";
}

export interface ConstructorInvocation extends AstNode {
  type: "ConstructorInvocation";
  kind: "this" | "super";
  arguments: Expression[];
}

export type Statement =
  | Block
  | LocalVariable
  | ExpressionStatement
  | ReturnStatement
  | IfStatement
  | WhileStatement
  | ForStatement
  | ForEachStatement
  | SwitchStatement
  | TryStatement
  | ThrowStatement
  | JumpStatement
  | ConstructorInvocation;

export function block(statements: Statement[] = []): Block {
  return { type: "Block", statements };
}

export function localVar(varType: TypeNode | string, varName: string, initializer?: Expression): LocalVariable {
  const node: LocalVariable = {
    type: "LocalVariable",
    varType: typeof varType === "string" ? typeRef(varType) : varType,
    name: varName,
  };
  if (initializer) {
    node.initializer = initializer;
  }
  return node;
}

export function exprStmt(expression: Expression): ExpressionStatement {
  return { type: "ExpressionStatement", expression };
}

export function ret(expression?: Expression): ReturnStatement {
  return expression ? { type: "Return", expression } : { type: "Return" };
}

export function ifStmt(condition: Expression, then: Statement, otherwise?: Statement): IfStatement {
  return otherwise ? { type: "If", condition, then, otherwise } : { type: "If", condition, then };
}

export function whileStmt(condition: Expression, body: Statement): WhileStatement {
  return { type: "While", condition, body };
}

export function forStmt(init: Statement[], condition: Expression | undefined, update: Expression[], body: Statement): ForStatement {
  return condition
    ? { type: "For", init, condition, update, body }
    : { type: "For", init, update, body };
}

export function forEach(varType: TypeNode | string, varName: string, iterable: Expression, body: Statement): ForEachStatement {
  return {
    type: "ForEach",
    varType: typeof varType === "string" ? typeRef(varType) : varType,
    name: varName,
    iterable,
    body,
  };
}

export function switchStmt(selector: Expression, cases: SwitchCase[]): SwitchStatement {
  return { type: "Switch", selector, cases };
}

export function switchCase(labels: Expression[], body: Statement[] = [breakStmt()]): SwitchCase {
  return { labels, body };
}

export function tryStmt(
  tryBlock: Block,
  catches: CatchClause[] = [],
  options: { resources?: LocalVariable[]; finallyBlock?: Block } = {}
): TryStatement {
  const node: TryStatement = { type: "Try", resources: options.resources ?? [], block: tryBlock, catches };
  if (options.finallyBlock) {
    node.finallyBlock = options.finallyBlock;
  }
  return node;
}

export function catchClause(types: Array<TypeNode | string>, varName: string, body: Block = block()): CatchClause {
  return { types: types.map((t) => (typeof t === "string" ? typeRef(t) : t)), name: varName, body };
}

export function throwStmt(expression: Expression): ThrowStatement {
  return { type: "Throw", expression };
}

export function breakStmt(): JumpStatement {
  return { type: "Break" };
}

export function continueStmt(): JumpStatement {
  return { type: "Continue" };
}

export function superCall(args: Expression[] = []): ConstructorInvocation {
  return { type: "ConstructorInvocation", kind: "super", arguments: args };
}

export function thisCall(args: Expression[] = []): ConstructorInvocation {
  return { type: "ConstructorInvocation", kind: "this", arguments: args };
}

// -----------------------------------------------------------------------------
// Declarations
// -----------------------------------------------------------------------------

export type Modifier =
  | "public"
  | "protected"
  | "private"
  | "static"
  | "final"
  | "abstract"
  | "default"
  | "synchronized"
  | "native"
  | "transient"
  | "volatile";

export interface AnnotationArgument {
  /** `value` for the single-element form. */
  name: string;
  value: Expression | Expression[];
}

export interface Annotation extends AstNode {
  type: "Annotation";
  name: string;
  arguments: AnnotationArgument[];
}

export interface TypeParameter {
  name: string;
  bounds: TypeNode[];
}

export interface Parameter {
  name: string;
  paramType: TypeNode;
  varargs?: boolean;
  annotations?: Annotation[];
}

export type TypeDeclarationKind = "class" | "interface" | "enum" | "record" | "annotation";

export interface EnumConstant {
  name: string;
  arguments: Expression[];
}

export interface TypeDeclaration extends AstNode {
  type: "TypeDeclaration";
  kind: TypeDeclarationKind;
  name: string;
  modifiers: Modifier[];
  annotations: Annotation[];
  typeParameters: TypeParameter[];
  superclass?: TypeNode;
  interfaces: TypeNode[];
  enumConstants: EnumConstant[];
  recordComponents: Parameter[];
  members: MemberDeclaration[];
  synthetic?: boolean;
}

export interface FieldDeclaration extends AstNode {
  type: "FieldDeclaration";
  modifiers: Modifier[];
  annotations: Annotation[];
  fieldType: TypeNode;
  name: string;
  initializer?: Expression;
  synthetic?: boolean;
}

export interface MethodDeclaration extends AstNode {
  type: "MethodDeclaration";
  modifiers: Modifier[];
  annotations: Annotation[];
  typeParameters: TypeParameter[];
  returnType: TypeNode;
  name: string;
  parameters: Parameter[];
  throws: TypeNode[];
  body?: Block;
  /** Annotation element default. */
  defaultValue?: Expression;
  synthetic?: boolean;
}

export interface ConstructorDeclaration extends AstNode {
  type: "ConstructorDeclaration";
  modifiers: Modifier[];
  annotations: Annotation[];
  parameters: Parameter[];
  throws: TypeNode[];
  body: Block;
  synthetic?: boolean;
}

export interface InitializerBlock extends AstNode {
  type: "Initializer";
  isStatic: boolean;
  body: Block;
}

export type MemberDeclaration =
  | FieldDeclaration
  | MethodDeclaration
  | ConstructorDeclaration
  | TypeDeclaration
  | InitializerBlock;

export interface ImportDeclaration {
  name: string;
  isStatic: boolean;
  onDemand: boolean;
  synthetic?: boolean;
}

export interface CompilationUnit extends AstNode {
  type: "CompilationUnit";
  path: string;
  packageName: string;
  imports: ImportDeclaration[];
  types: TypeDeclaration[];
  synthetic?: boolean;
}

export interface FragmentModel {
  units: CompilationUnit[];
}

export function annotation(annotationName: string, args: AnnotationArgument[] = []): Annotation {
  return { type: "Annotation", name: annotationName, arguments: args };
}

export function typeParameter(paramName: string, bounds: TypeNode[] = []): TypeParameter {
  return { name: paramName, bounds };
}

export function param(paramName: string, paramType: TypeNode | string, varargs = false): Parameter {
  const node: Parameter = { name: paramName, paramType: typeof paramType === "string" ? typeRef(paramType) : paramType };
  if (varargs) {
    node.varargs = true;
  }
  return node;
}

export type TypeDeclarationOptions = Partial<Omit<TypeDeclaration, "type" | "kind" | "name">>;

export function typeDecl(kind: TypeDeclarationKind, declName: string, options: TypeDeclarationOptions = {}): TypeDeclaration {
  return {
    type: "TypeDeclaration",
    kind,
    name: declName,
    modifiers: options.modifiers ?? ["public"],
    annotations: options.annotations ?? [],
    typeParameters: options.typeParameters ?? [],
    superclass: options.superclass,
    interfaces: options.interfaces ?? [],
    enumConstants: options.enumConstants ?? [],
    recordComponents: options.recordComponents ?? [],
    members: options.members ?? [],
    synthetic: options.synthetic,
  };
}

export function classDecl(declName: string, options: TypeDeclarationOptions = {}): TypeDeclaration {
  return typeDecl("class", declName, options);
}

export function interfaceDecl(declName: string, options: TypeDeclarationOptions = {}): TypeDeclaration {
  return typeDecl("interface", declName, options);
}

export function fieldDecl(
  fieldType: TypeNode | string,
  fieldName: string,
  options: { modifiers?: Modifier[]; initializer?: Expression; annotations?: Annotation[] } = {}
): FieldDeclaration {
  const node: FieldDeclaration = {
    type: "FieldDeclaration",
    modifiers: options.modifiers ?? ["private"],
    annotations: options.annotations ?? [],
    fieldType: typeof fieldType === "string" ? typeRef(fieldType) : fieldType,
    name: fieldName,
  };
  if (options.initializer) {
    node.initializer = options.initializer;
  }
  return node;
}

export type MethodDeclarationOptions = Partial<Omit<MethodDeclaration, "type" | "name" | "returnType">>;

export function methodDecl(
  returnType: TypeNode | string,
  methodName: string,
  parameters: Parameter[] = [],
  body: Statement[] | undefined = [],
  options: MethodDeclarationOptions = {}
): MethodDeclaration {
  const node: MethodDeclaration = {
    type: "MethodDeclaration",
    modifiers: options.modifiers ?? ["public"],
    annotations: options.annotations ?? [],
    typeParameters: options.typeParameters ?? [],
    returnType: typeof returnType === "string" ? typeRef(returnType) : returnType,
    name: methodName,
    parameters: options.parameters ?? parameters,
    throws: options.throws ?? [],
  };
  if (body) {
    node.body = block(body);
  }
  if (options.defaultValue) {
    node.defaultValue = options.defaultValue;
  }
  return node;
}

export function constructorDecl(
  parameters: Parameter[] = [],
  body: Statement[] = [],
  options: { modifiers?: Modifier[]; throws?: TypeNode[] } = {}
): ConstructorDeclaration {
  return {
    type: "ConstructorDeclaration",
    modifiers: options.modifiers ?? ["public"],
    annotations: [],
    parameters,
    throws: options.throws ?? [],
    body: block(body),
  };
}

export function initializer(body: Statement[], isStatic = false): InitializerBlock {
  return { type: "Initializer", isStatic, body: block(body) };
}

export function importDecl(importName: string, options: { isStatic?: boolean; onDemand?: boolean } = {}): ImportDeclaration {
  return { name: importName, isStatic: options.isStatic ?? false, onDemand: options.onDemand ?? false };
}

export function compilationUnit(
  packageName: string,
  types: TypeDeclaration[],
  imports: ImportDeclaration[] = [],
  path?: string
): CompilationUnit {
  const primary = types[0]?.name ?? "package-info";
  const directory = packageName ? packageName.replace(/\./g, "/") + "/" : "";
  return {
    type: "CompilationUnit",
    path: path ?? `${directory}${primary}.java`,
    packageName,
    imports,
    types,
  };
}

export function fragment(units: CompilationUnit[]): FragmentModel {
  return { units };
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

export function isTypeNode(node: Expression | TypeNode): node is TypeNode {
  return (
    node.type === "PrimitiveType" ||
    node.type === "NamedType" ||
    node.type === "ArrayType" ||
    node.type === "WildcardType" ||
    node.type === "VarType"
  );
}

export function hasModifier(node: { modifiers: Modifier[] }, modifier: Modifier): boolean {
  return node.modifiers.includes(modifier);
}

export function cloneModel(model: FragmentModel): FragmentModel {
  return structuredClone(model);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isUnit(value: unknown): value is CompilationUnit {
  return (
    isRecord(value) &&
    value.type === "CompilationUnit" &&
    typeof value.path === "string" &&
    typeof value.packageName === "string" &&
    Array.isArray(value.imports) &&
    Array.isArray(value.types) &&
    value.types.every((t) => isRecord(t) && t.type === "TypeDeclaration" && typeof t.name === "string")
  );
}

/**
 * Shape check for a model read from JSON: units, their imports and their
 * top-level declarations
 */
export function isFragmentModel(value: unknown): value is FragmentModel {
  return isRecord(value) && Array.isArray(value.units) && value.units.every(isUnit);
}
