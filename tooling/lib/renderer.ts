/**
 * Source rendering: prints the fragment model, original and synthesized
 * declarations alike, as Java-syntax source units.
 *
 * Bound type nodes are spelled by their simple name only where that name
 * cannot mean anything else in the unit; otherwise they stay qualified.
 */

import { CodeBlockWriter } from "ts-morph";
import {
  Annotation,
  BinaryOperator,
  Block,
  CompilationUnit,
  ConstructorDeclaration,
  Expression,
  FieldDeclaration,
  isTypeNode,
  FragmentModel,
  ImportDeclaration,
  Literal,
  LocalVariable,
  MemberDeclaration,
  MethodDeclaration,
  Parameter,
  Statement,
  TypeDeclaration,
  TypeNode,
  TypeParameter,
} from "./ast";
import { isPlainObject, joinName, packagePath, simpleNameOf, splitQualifiedName } from "./utils";

export type RenderedSource = {
  path: string;
  packageName: string;
  typeName: string;
  synthetic: boolean;
  text: string;
};

const INDENT = 4;

const BINARY_PRECEDENCE: Record<BinaryOperator, number> = {
  "||": 3,
  "&&": 4,
  "|": 5,
  "^": 6,
  "&": 7,
  "==": 8,
  "!=": 8,
  "<": 9,
  ">": 9,
  "<=": 9,
  ">=": 9,
  "<<": 10,
  ">>": 10,
  ">>>": 10,
  "+": 11,
  "-": 11,
  "*": 12,
  "/": 12,
  "%": 12,
};

const INSTANCEOF_PRECEDENCE = 9;
const UNARY_PRECEDENCE = 13;
const POSTFIX_PRECEDENCE = 14;
const PRIMARY_PRECEDENCE = 15;

function newWriter(): CodeBlockWriter {
  return new CodeBlockWriter({ indentNumberOfSpaces: INDENT, newLine: "\n", useSingleQuote: false });
}

function escapeText(value: string, quote: "'" | '"'): string {
  let escaped = "";
  for (const ch of value) {
    switch (ch) {
      case "\\":
        escaped += "\\\\";
        break;
      case "\n":
        escaped += "\\n";
        break;
      case "\r":
        escaped += "\\r";
        break;
      case "\t":
        escaped += "\\t";
        break;
      case "\b":
        escaped += "\\b";
        break;
      case "\f":
        escaped += "\\f";
        break;
      case "\u0000":
        escaped += "\\0";
        break;
      default:
        escaped += ch === quote ? `\\${ch}` : ch;
    }
  }
  return escaped;
}

function withSuffix(value: string, suffix: string): string {
  return value.toLowerCase().endsWith(suffix.toLowerCase()) ? value : `${value}${suffix}`;
}

function decimal(value: string): string {
  return /[.eE]/.test(value) || /^(NaN|-?Infinity)$/.test(value) ? value : `${value}.0`;
}

export function renderLiteral(literal: Literal): string {
  switch (literal.kind) {
    case "string":
      return `"${escapeText(literal.value, '"')}"`;
    case "char":
      return `'${escapeText(literal.value, "'")}'`;
    case "long":
      return withSuffix(literal.value, "L");
    case "float":
      return withSuffix(decimal(literal.value), "f");
    case "double":
      return decimal(literal.value);
    case "null":
      return "null";
    default:
      return literal.value;
  }
}

function boundNames(value: unknown, into: Set<string>): Set<string> {
  if (Array.isArray(value)) {
    for (const item of value) boundNames(item, into);
  } else if (isPlainObject(value)) {
    if (value.type === "NamedType" && typeof value.binding === "string") into.add(value.binding);
    for (const child of Object.values(value)) {
      if (typeof child === "object" && child !== null) boundNames(child, into);
    }
  }
  return into;
}

function topLevelOf(qualifiedName: string): { top: string; packageName: string; path: string[] } {
  const { packageName, typePath } = splitQualifiedName(qualifiedName);
  return { top: joinName(packageName, typePath[0]), packageName, path: typePath };
}

/**
 * Decides, per compilation unit, which top-level types may be written by
 * their simple name
 */
export class NameSpeller {
  private readonly simple = new Set<string>();

  constructor(private readonly unit: CompilationUnit) {
    const claims = new Map<string, string>();
    for (const decl of unit.types) {
      claims.set(decl.name, joinName(unit.packageName, decl.name));
    }
    for (const imported of unit.imports) {
      if (imported.isStatic || imported.onDemand) continue;
      const simpleName = simpleNameOf(imported.name);
      if (!claims.has(simpleName)) claims.set(simpleName, imported.name);
    }

    const bySimpleName = new Map<string, Set<string>>();
    for (const qualifiedName of boundNames(unit.types, new Set())) {
      const { top } = topLevelOf(qualifiedName);
      const simpleName = simpleNameOf(top);
      const tops = bySimpleName.get(simpleName) ?? new Set<string>();
      tops.add(top);
      bySimpleName.set(simpleName, tops);
    }

    for (const [simpleName, tops] of bySimpleName) {
      const claimed = claims.get(simpleName);
      if (claimed !== undefined) {
        if (tops.has(claimed)) this.simple.add(claimed);
        continue;
      }
      if (tops.size === 1) {
        const [top] = tops;
        if (this.reachable(top)) this.simple.add(top);
        continue;
      }
      const local = Array.from(tops).find((top) => topLevelOf(top).packageName === unit.packageName);
      if (local) this.simple.add(local);
    }
  }

  spell(qualifiedName: string): string {
    const { top, path } = topLevelOf(qualifiedName);
    return this.simple.has(top) ? path.join(".") : qualifiedName;
  }

  private reachable(top: string): boolean {
    const { packageName } = topLevelOf(top);
    if (packageName === this.unit.packageName || packageName === "java.lang" || packageName === "") return true;
    return this.unit.imports.some((i) => !i.isStatic && (i.onDemand ? i.name === packageName : i.name === top));
  }
}

class SourcePrinter {
  constructor(private readonly names: NameSpeller) {}

  // ---------------------------------------------------------------------------
  // Units and declarations
  // ---------------------------------------------------------------------------

  unit(unit: CompilationUnit, decl: TypeDeclaration): string {
    const writer = newWriter();
    if (unit.packageName) {
      writer.writeLine(`package ${unit.packageName};`);
      writer.blankLine();
    }
    if (unit.imports.length > 0) {
      for (const imported of unit.imports) writer.writeLine(this.importLine(imported));
      writer.blankLine();
    }
    this.typeDeclaration(writer, decl);
    return writer.toString();
  }

  private importLine(imported: ImportDeclaration): string {
    return `import ${imported.isStatic ? "static " : ""}${imported.name}${imported.onDemand ? ".*" : ""};`;
  }

  private typeDeclaration(writer: CodeBlockWriter, decl: TypeDeclaration): void {
    this.annotations(writer, decl.annotations);
    const keyword = decl.kind === "annotation" ? "@interface" : decl.kind;
    let header = `${this.modifiers(decl.modifiers)}${keyword} ${decl.name}${this.typeParameters(decl.typeParameters)}`;
    if (decl.kind === "record") {
      header += `(${decl.recordComponents.map((c) => this.parameter(c)).join(", ")})`;
    }
    if (decl.superclass) {
      header += ` extends ${this.type(decl.superclass)}`;
    }
    if (decl.interfaces.length > 0) {
      const relation = decl.kind === "interface" ? "extends" : "implements";
      header += ` ${relation} ${decl.interfaces.map((t) => this.type(t)).join(", ")}`;
    }
    writer.write(`${header} `);
    writer.inlineBlock(() => {
      if (decl.enumConstants.length > 0) {
        const constants = decl.enumConstants.map((c) =>
          c.arguments.length > 0 ? `${c.name}(${this.args(c.arguments)})` : c.name
        );
        writer.writeLine(`${constants.join(", ")}${decl.members.length > 0 ? ";" : ""}`);
        if (decl.members.length > 0) writer.blankLine();
      } else if (decl.kind === "enum" && decl.members.length > 0) {
        writer.writeLine(";");
        writer.blankLine();
      }
      this.members(writer, decl.members, decl);
    });
    writer.newLine();
  }

  private members(writer: CodeBlockWriter, members: readonly MemberDeclaration[], owner: TypeDeclaration | undefined): void {
    members.forEach((member, i) => {
      const previous = members[i - 1];
      if (previous && !(previous.type === "FieldDeclaration" && member.type === "FieldDeclaration")) {
        writer.blankLineIfLastNot();
      }
      this.member(writer, member, owner);
    });
  }

  private member(writer: CodeBlockWriter, member: MemberDeclaration, owner: TypeDeclaration | undefined): void {
    switch (member.type) {
      case "FieldDeclaration":
        this.field(writer, member);
        return;
      case "MethodDeclaration":
        this.method(writer, member, owner);
        return;
      case "ConstructorDeclaration":
        this.constructorDeclaration(writer, member, owner?.name ?? "");
        return;
      case "TypeDeclaration":
        this.typeDeclaration(writer, member);
        return;
      case "Initializer":
        writer.write(member.isStatic ? "static " : "");
        this.block(writer, member.body);
        writer.newLine();
        return;
    }
  }

  private field(writer: CodeBlockWriter, field: FieldDeclaration): void {
    this.annotations(writer, field.annotations);
    const initializer = field.initializer ? ` = ${this.expression(field.initializer)}` : "";
    writer.writeLine(`${this.modifiers(field.modifiers)}${this.type(field.fieldType)} ${field.name}${initializer};`);
  }

  private method(writer: CodeBlockWriter, method: MethodDeclaration, owner: TypeDeclaration | undefined): void {
    this.annotations(writer, method.annotations);
    const typeParameters = method.typeParameters.length > 0 ? `${this.typeParameters(method.typeParameters)} ` : "";
    let header = `${this.modifiers(method.modifiers)}${typeParameters}${this.type(method.returnType)} ${method.name}(${this.parameters(method.parameters)})`;
    if (method.throws.length > 0) {
      header += ` throws ${method.throws.map((t) => this.type(t)).join(", ")}`;
    }
    if (owner?.kind === "annotation" && method.defaultValue) {
      header += ` default ${this.elementValue(method.defaultValue)}`;
    }
    if (!method.body) {
      writer.writeLine(`${header};`);
      return;
    }
    writer.write(`${header} `);
    this.block(writer, method.body);
    writer.newLine();
  }

  private constructorDeclaration(writer: CodeBlockWriter, ctor: ConstructorDeclaration, ownerName: string): void {
    this.annotations(writer, ctor.annotations);
    let header = `${this.modifiers(ctor.modifiers)}${ownerName}(${this.parameters(ctor.parameters)})`;
    if (ctor.throws.length > 0) {
      header += ` throws ${ctor.throws.map((t) => this.type(t)).join(", ")}`;
    }
    writer.write(`${header} `);
    this.block(writer, ctor.body);
    writer.newLine();
  }

  private annotations(writer: CodeBlockWriter, annotations: readonly Annotation[]): void {
    for (const a of annotations) writer.writeLine(this.annotation(a));
  }

  private annotation(a: Annotation): string {
    if (a.arguments.length === 0) return `@${a.name}`;
    if (a.arguments.length === 1 && a.arguments[0].name === "value") {
      return `@${a.name}(${this.elementValue(a.arguments[0].value)})`;
    }
    return `@${a.name}(${a.arguments.map((arg) => `${arg.name} = ${this.elementValue(arg.value)}`).join(", ")})`;
  }

  private elementValue(value: Expression | Expression[]): string {
    if (Array.isArray(value)) return `{${value.map((v) => this.elementValue(v)).join(", ")}}`;
    if (value.type === "NewArray" && value.dimensions.length === 0) {
      return `{${(value.initializer ?? []).map((v) => this.expression(v)).join(", ")}}`;
    }
    return this.expression(value);
  }

  private modifiers(modifiers: readonly string[]): string {
    return modifiers.length > 0 ? `${modifiers.join(" ")} ` : "";
  }

  private typeParameters(parameters: readonly TypeParameter[]): string {
    if (parameters.length === 0) return "";
    const rendered = parameters.map((p) =>
      p.bounds.length > 0 ? `${p.name} extends ${p.bounds.map((b) => this.type(b)).join(" & ")}` : p.name
    );
    return `<${rendered.join(", ")}>`;
  }

  private parameters(parameters: readonly Parameter[]): string {
    return parameters.map((p) => this.parameter(p)).join(", ");
  }

  private parameter(p: Parameter): string {
    const annotations = (p.annotations ?? []).map((a) => `${this.annotation(a)} `).join("");
    return `${annotations}${this.type(p.paramType)}${p.varargs ? "..." : ""} ${p.name}`;
  }

  type(node: TypeNode): string {
    switch (node.type) {
      case "PrimitiveType":
        return node.name;
      case "NamedType": {
        const base = node.binding ? this.names.spell(node.binding) : node.name;
        return node.typeArguments.length > 0 ? `${base}<${node.typeArguments.map((t) => this.type(t)).join(", ")}>` : base;
      }
      case "ArrayType":
        return `${this.type(node.elementType)}[]`;
      case "WildcardType":
        return node.bound ? `? ${node.bound.variance} ${this.type(node.bound.type)}` : "?";
      case "VarType":
        return "var";
    }
  }

  // ---------------------------------------------------------------------------
  // Statements
  // ---------------------------------------------------------------------------

  private block(writer: CodeBlockWriter, block: Block): void {
    writer.inlineBlock(() => {
      for (const statement of block.statements) this.statement(writer, statement);
    });
  }

  /** A nested statement, always braced. */
  private body(writer: CodeBlockWriter, statement: Statement): void {
    if (statement.type === "Block") {
      this.block(writer, statement);
    } else {
      writer.inlineBlock(() => this.statement(writer, statement));
    }
  }

  private statement(writer: CodeBlockWriter, statement: Statement): void {
    switch (statement.type) {
      case "Block":
        this.block(writer, statement);
        writer.newLine();
        return;
      case "LocalVariable":
        writer.writeLine(`${this.localVariable(statement)};`);
        return;
      case "ExpressionStatement":
        writer.writeLine(`${this.expression(statement.expression)};`);
        return;
      case "Return":
        writer.writeLine(statement.expression ? `return ${this.expression(statement.expression)};` : "return;");
        return;
      case "If":
        writer.write(`if (${this.expression(statement.condition)}) `);
        this.body(writer, statement.then);
        if (statement.otherwise) {
          writer.write(" else ");
          if (statement.otherwise.type === "If") {
            this.statement(writer, statement.otherwise);
            return;
          }
          this.body(writer, statement.otherwise);
        }
        writer.newLine();
        return;
      case "While":
        writer.write(`while (${this.expression(statement.condition)}) `);
        this.body(writer, statement.body);
        writer.newLine();
        return;
      case "For": {
        const condition = statement.condition ? this.expression(statement.condition) : "";
        const update = statement.update.map((e) => this.expression(e)).join(", ");
        writer.write(`for (${this.forInit(statement.init)}; ${condition}; ${update}) `);
        this.body(writer, statement.body);
        writer.newLine();
        return;
      }
      case "ForEach":
        writer.write(`for (${this.type(statement.varType)} ${statement.name} : ${this.expression(statement.iterable)}) `);
        this.body(writer, statement.body);
        writer.newLine();
        return;
      case "Switch":
        writer.write(`switch (${this.expression(statement.selector)}) `);
        writer.inlineBlock(() => {
          for (const c of statement.cases) {
            if (c.labels.length === 0) {
              writer.writeLine("default:");
            } else {
              for (const label of c.labels) writer.writeLine(`case ${this.expression(label)}:`);
            }
            writer.indent(() => {
              for (const s of c.body) this.statement(writer, s);
            });
          }
        });
        writer.newLine();
        return;
      case "Try": {
        const resources = statement.resources.map((r) => this.localVariable(r)).join("; ");
        writer.write(resources ? `try (${resources}) ` : "try ");
        this.block(writer, statement.block);
        for (const c of statement.catches) {
          writer.write(` catch (${c.types.map((t) => this.type(t)).join(" | ")} ${c.name}) `);
          this.block(writer, c.body);
        }
        if (statement.finallyBlock) {
          writer.write(" finally ");
          this.block(writer, statement.finallyBlock);
        }
        writer.newLine();
        return;
      }
      case "Throw":
        writer.writeLine(`throw ${this.expression(statement.expression)};`);
        return;
      case "Break":
        writer.writeLine("break;");
        return;
      case "Continue":
        writer.writeLine("continue;");
        return;
      case "ConstructorInvocation":
        writer.writeLine(`${statement.kind}(${this.args(statement.arguments)});`);
        return;
    }
  }

  private localVariable(local: LocalVariable): string {
    const initializer = local.initializer ? ` = ${this.expression(local.initializer)}` : "";
    return `${this.type(local.varType)} ${local.name}${initializer}`;
  }

  private forInit(init: readonly Statement[]): string {
    const locals = init.filter((s): s is LocalVariable => s.type === "LocalVariable");
    if (locals.length > 0) {
      const [first, ...rest] = locals;
      const others = rest.map((l) => (l.initializer ? `${l.name} = ${this.expression(l.initializer)}` : l.name));
      return [this.localVariable(first), ...others].join(", ");
    }
    return init
      .map((s) => (s.type === "ExpressionStatement" ? this.expression(s.expression) : ""))
      .filter((text) => text.length > 0)
      .join(", ");
  }

  // ---------------------------------------------------------------------------
  // Expressions
  // ---------------------------------------------------------------------------

  private args(args: readonly Expression[]): string {
    return args.map((a) => this.expression(a)).join(", ");
  }

  private precedence(expression: Expression): number {
    switch (expression.type) {
      case "Lambda":
        return 0;
      case "Assign":
        return 1;
      case "Conditional":
        return 2;
      case "Binary":
        return BINARY_PRECEDENCE[expression.operator];
      case "InstanceOf":
        return INSTANCEOF_PRECEDENCE;
      case "Cast":
        return UNARY_PRECEDENCE;
      case "Unary":
        return expression.prefix ? UNARY_PRECEDENCE : POSTFIX_PRECEDENCE;
      default:
        return PRIMARY_PRECEDENCE;
    }
  }

  expression(expression: Expression, minimum = 0): string {
    const text = this.bareExpression(expression);
    return this.precedence(expression) < minimum ? `(${text})` : text;
  }

  private bareExpression(e: Expression): string {
    switch (e.type) {
      case "Literal":
        return renderLiteral(e);
      case "Name":
        return e.name;
      case "FieldAccess":
        return `${this.expression(e.target, PRIMARY_PRECEDENCE)}.${e.name}`;
      case "MethodCall": {
        const typeArguments = e.typeArguments.length > 0 ? `<${e.typeArguments.map((t) => this.type(t)).join(", ")}>` : "";
        const target = e.target ? `${this.expression(e.target, PRIMARY_PRECEDENCE)}.` : typeArguments ? "this." : "";
        return `${target}${typeArguments}${e.name}(${this.args(e.arguments)})`;
      }
      case "New": {
        const creation = `new ${this.type(e.classType)}(${this.args(e.arguments)})`;
        if (!e.body) return creation;
        const body = e.body;
        return `${creation} ${this.nested((writer) => writer.inlineBlock(() => this.members(writer, body, undefined)))}`;
      }
      case "NewArray": {
        if (e.initializer && e.dimensions.length === 0) {
          return `new ${this.type(e.elementType)}[] {${this.args(e.initializer)}}`;
        }
        const dimensions = e.dimensions.length > 0 ? e.dimensions.map((d) => `[${this.expression(d)}]`).join("") : "[0]";
        return `new ${this.type(e.elementType)}${dimensions}`;
      }
      case "Lambda": {
        const typed = e.parameters.some((p) => p.paramType !== undefined);
        const params =
          e.parameters.length === 1 && !typed
            ? e.parameters[0].name
            : `(${e.parameters.map((p) => (p.paramType ? `${this.type(p.paramType)} ${p.name}` : p.name)).join(", ")})`;
        const body = e.body;
        if (body.type === "Block") {
          return `${params} -> ${this.nested((writer) => this.block(writer, body))}`;
        }
        return `${params} -> ${this.expression(body, 1)}`;
      }
      case "MethodReference": {
        const target = isTypeNode(e.target) ? this.type(e.target) : this.expression(e.target, PRIMARY_PRECEDENCE);
        return `${target}::${e.name}`;
      }
      case "Cast":
        return `(${this.type(e.castType)}) ${this.expression(e.expression, UNARY_PRECEDENCE)}`;
      case "InstanceOf":
        return `${this.expression(e.expression, INSTANCEOF_PRECEDENCE)} instanceof ${this.type(e.checkType)}${e.binding ? ` ${e.binding}` : ""}`;
      case "Binary": {
        const precedence = BINARY_PRECEDENCE[e.operator];
        return `${this.expression(e.left, precedence)} ${e.operator} ${this.expression(e.right, precedence + 1)}`;
      }
      case "Unary":
        return e.prefix
          ? `${e.operator}${this.expression(e.operand, UNARY_PRECEDENCE)}`
          : `${this.expression(e.operand, POSTFIX_PRECEDENCE)}${e.operator}`;
      case "Assign":
        return `${this.expression(e.target, POSTFIX_PRECEDENCE)} ${e.operator} ${this.expression(e.value, 1)}`;
      case "Conditional":
        return `${this.expression(e.condition, 3)} ? ${this.expression(e.whenTrue, 1)} : ${this.expression(e.whenFalse, 2)}`;
      case "ArrayAccess":
        return `${this.expression(e.array, PRIMARY_PRECEDENCE)}[${this.expression(e.index)}]`;
      case "ClassLiteral":
        return `${this.type(e.classType)}.class`;
      case "This":
        return "this";
      case "Super":
        return "super";
    }
  }

  /**
   * Multi-line text rendered at indentation zero; the outer writer re-indents
   * it when written
   */
  private nested(render: (writer: CodeBlockWriter) => void): string {
    const writer = newWriter();
    render(writer);
    return writer.toString();
  }
}

/**
 * Render one top-level declaration of a unit, with the unit's package and
 * imports
 */
export function renderDeclaration(unit: CompilationUnit, decl: TypeDeclaration): string {
  return new SourcePrinter(new NameSpeller(unit)).unit(unit, decl);
}

/**
 * One source per top-level type, in model order
 */
export function renderFragment(model: FragmentModel): RenderedSource[] {
  return model.units.flatMap((unit) =>
    unit.types.map((decl) => {
      const directory = packagePath(unit.packageName);
      const path = unit.types.length === 1 ? unit.path : `${directory ? `${directory}/` : ""}${decl.name}.java`;
      return {
        path,
        packageName: unit.packageName,
        typeName: joinName(unit.packageName, decl.name),
        synthetic: unit.synthetic === true || decl.synthetic === true,
        text: renderDeclaration(unit, decl),
      };
    })
  );
}
