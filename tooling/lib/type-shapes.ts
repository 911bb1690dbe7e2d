/**
 * TypeShape algebra: construction, formatting, parsing, subtyping and merging.
 *
 * Shapes keep full structure (nested generics, wildcard bounds, arrays); merging
 * only falls back to `top` when two shapes share no useful common type.
 */

import { isPrimitiveName, PrimitiveName } from "./ast";
import { NamedShape, TypeShape, WildcardVariance } from "./types";

export const OBJECT = "java.lang.Object";
export const STRING = "java.lang.String";

export const TOP: TypeShape = { kind: "top" };
export const NULL: TypeShape = { kind: "null" };

export function primitive(name: PrimitiveName): TypeShape {
  return { kind: "primitive", name };
}

export function named(qualifiedName: string, typeArgs: TypeShape[] = []): NamedShape {
  return { kind: "named", qualifiedName, typeArgs };
}

export function arrayOf(of: TypeShape): TypeShape {
  return { kind: "array", of };
}

export function wildcard(bound?: { variance: WildcardVariance; shape: TypeShape }): TypeShape {
  return bound ? { kind: "wildcard", bound } : { kind: "wildcard" };
}

export function typeVariable(name: string): TypeShape {
  return { kind: "typeVariable", name };
}

export const VOID = primitive("void");
export const BOOLEAN = primitive("boolean");
export const INT = primitive("int");

const BOXES: Record<Exclude<PrimitiveName, "void">, string> = {
  boolean: "java.lang.Boolean",
  byte: "java.lang.Byte",
  short: "java.lang.Short",
  char: "java.lang.Character",
  int: "java.lang.Integer",
  long: "java.lang.Long",
  float: "java.lang.Float",
  double: "java.lang.Double",
};

const NUMERIC_RANK: Partial<Record<PrimitiveName, number>> = {
  byte: 1,
  short: 2,
  char: 2,
  int: 3,
  long: 4,
  float: 5,
  double: 6,
};

export function boxedName(name: PrimitiveName): string | undefined {
  return name === "void" ? undefined : BOXES[name];
}

export function unboxedName(qualifiedName: string): PrimitiveName | undefined {
  for (const [prim, box] of Object.entries(BOXES)) {
    if (box === qualifiedName && isPrimitiveName(prim)) {
      return prim;
    }
  }
  return undefined;
}

export function isReference(shape: TypeShape): boolean {
  return shape.kind !== "primitive";
}

export function isVoid(shape: TypeShape | undefined): boolean {
  return shape !== undefined && shape.kind === "primitive" && shape.name === "void";
}

export function isNamed(shape: TypeShape, qualifiedName: string): boolean {
  return shape.kind === "named" && shape.qualifiedName === qualifiedName;
}

export function isObjectLike(shape: TypeShape): boolean {
  return shape.kind === "top" || isNamed(shape, OBJECT);
}

// -----------------------------------------------------------------------------
// Formatting
// -----------------------------------------------------------------------------

/**
 * Java spelling with qualified names; `top` and `null` print as Object.
 */
export function formatShape(shape: TypeShape, nameOf: (qualifiedName: string) => string = (q) => q): string {
  switch (shape.kind) {
    case "primitive":
      return shape.name;
    case "named": {
      const base = nameOf(shape.qualifiedName);
      if (shape.typeArgs.length === 0) return base;
      return `${base}<${shape.typeArgs.map((arg) => formatShape(arg, nameOf)).join(", ")}>`;
    }
    case "array":
      return `${formatShape(shape.of, nameOf)}[]`;
    case "wildcard":
      return shape.bound ? `? ${shape.bound.variance} ${formatShape(shape.bound.shape, nameOf)}` : "?";
    case "typeVariable":
      return shape.name;
    case "null":
    case "top":
      return nameOf(OBJECT);
  }
}

/**
 * Exact identity key; unlike {@link formatShape} it keeps `top` and `null` apart from Object.
 */
export function shapeKey(shape: TypeShape): string {
  switch (shape.kind) {
    case "top":
      return "?top";
    case "null":
      return "?null";
    case "named":
      return shape.typeArgs.length === 0
        ? shape.qualifiedName
        : `${shape.qualifiedName}<${shape.typeArgs.map(shapeKey).join(",")}>`;
    case "array":
      return `${shapeKey(shape.of)}[]`;
    case "wildcard":
      return shape.bound ? `? ${shape.bound.variance} ${shapeKey(shape.bound.shape)}` : "?";
    default:
      return formatShape(shape);
  }
}

export function shapesEqual(a: TypeShape, b: TypeShape): boolean {
  return shapeKey(a) === shapeKey(b);
}

export function erase(shape: TypeShape): TypeShape {
  switch (shape.kind) {
    case "named":
      return named(shape.qualifiedName);
    case "array":
      return arrayOf(erase(shape.of));
    case "primitive":
      return shape;
    default:
      return named(OBJECT);
  }
}

export function signatureKey(name: string, params: TypeShape[]): string {
  return `${name}(${params.map((p) => formatShape(erase(p))).join(",")})`;
}

// -----------------------------------------------------------------------------
// Traversal helpers
// -----------------------------------------------------------------------------

export function mapShape(shape: TypeShape, fn: (shape: TypeShape) => TypeShape | undefined): TypeShape {
  const replaced = fn(shape);
  if (replaced) return replaced;
  switch (shape.kind) {
    case "named":
      return named(shape.qualifiedName, shape.typeArgs.map((arg) => mapShape(arg, fn)));
    case "array":
      return arrayOf(mapShape(shape.of, fn));
    case "wildcard":
      return shape.bound
        ? wildcard({ variance: shape.bound.variance, shape: mapShape(shape.bound.shape, fn) })
        : shape;
    default:
      return shape;
  }
}

export function substitute(shape: TypeShape, bindings: ReadonlyMap<string, TypeShape>): TypeShape {
  if (bindings.size === 0) return shape;
  return mapShape(shape, (s) => (s.kind === "typeVariable" ? bindings.get(s.name) : undefined));
}

export function renameType(shape: TypeShape, from: string, to: string): TypeShape {
  return mapShape(shape, (s) =>
    s.kind === "named" && s.qualifiedName === from ? named(to, s.typeArgs.map((arg) => renameType(arg, from, to))) : undefined
  );
}

export function referencedTypes(shape: TypeShape, into: Set<string> = new Set()): Set<string> {
  mapShape(shape, (s) => {
    if (s.kind === "named") into.add(s.qualifiedName);
    return undefined;
  });
  return into;
}

export function mentionsTypeVariable(shape: TypeShape): boolean {
  let found = false;
  mapShape(shape, (s) => {
    if (s.kind === "typeVariable") found = true;
    return undefined;
  });
  return found;
}

/**
 * How much a shape tells us; used for tie-breaking and specificity ranking
 */
export function informationScore(shape: TypeShape | undefined): number {
  if (!shape) return 0;
  switch (shape.kind) {
    case "top":
    case "null":
      return 0;
    case "primitive":
      return shape.name === "void" ? 1 : 2;
    case "named":
      return (shape.qualifiedName === OBJECT ? 1 : 2) + shape.typeArgs.reduce((sum, arg) => sum + informationScore(arg), 0);
    case "array":
      return 1 + informationScore(shape.of);
    case "wildcard":
      return shape.bound ? 1 + informationScore(shape.bound.shape) : 0.5;
    case "typeVariable":
      return 1;
  }
}

// -----------------------------------------------------------------------------
// Parsing
// -----------------------------------------------------------------------------

const TOKEN = /\s*([A-Za-z_$][\w$]*|[<>,?[\].])/y;

function tokenize(text: string): string[] {
  const tokens: string[] = [];
  TOKEN.lastIndex = 0;
  while (TOKEN.lastIndex < text.length) {
    if (/^\s*$/.test(text.slice(TOKEN.lastIndex))) break;
    const match = TOKEN.exec(text);
    if (!match) {
      throw new Error(`Unexpected character in type "${text}" at ${TOKEN.lastIndex}`);
    }
    tokens.push(match[1]);
  }
  return tokens;
}

/**
 * Parse `java.util.Map<K, java.util.List<? extends V>>[]`. Names listed in
 * `typeVariables` parse as type variables.
 */
export function parseTypeShape(text: string, typeVariables: ReadonlySet<string> = new Set()): TypeShape {
  const tokens = tokenize(text);
  let position = 0;

  const peek = (): string | undefined => tokens[position];
  const expect = (token: string): void => {
    if (tokens[position] !== token) {
      throw new Error(`Expected "${token}" in type "${text}"`);
    }
    position += 1;
  };

  const parseType = (): TypeShape => {
    if (peek() === "?") {
      position += 1;
      const variance = peek();
      if (variance === "extends" || variance === "super") {
        position += 1;
        return wildcard({ variance, shape: parseType() });
      }
      return wildcard();
    }

    const first = tokens[position];
    if (first === undefined) {
      throw new Error(`Unexpected end of type "${text}"`);
    }
    position += 1;
    const segments = [first];
    while (peek() === ".") {
      position += 1;
      segments.push(tokens[position]);
      position += 1;
    }
    const dottedName = segments.join(".");

    let shape: TypeShape;
    if (segments.length === 1 && isPrimitiveName(dottedName)) {
      shape = primitive(dottedName);
    } else if (segments.length === 1 && typeVariables.has(dottedName)) {
      shape = typeVariable(dottedName);
    } else {
      const args: TypeShape[] = [];
      if (peek() === "<") {
        position += 1;
        args.push(parseType());
        while (peek() === ",") {
          position += 1;
          args.push(parseType());
        }
        expect(">");
      }
      shape = named(dottedName, args);
    }

    while (peek() === "[") {
      position += 1;
      expect("]");
      shape = arrayOf(shape);
    }
    return shape;
  };

  const result = parseType();
  if (position !== tokens.length) {
    throw new Error(`Trailing tokens in type "${text}"`);
  }
  return result;
}

// -----------------------------------------------------------------------------
// Subtyping and merging
// -----------------------------------------------------------------------------

/**
 * Supertype edges known to the caller (fragment, context and JDK declarations)
 */
export interface TypeHierarchy {
  directSupertypes(qualifiedName: string): NamedShape[];
}

export const EMPTY_HIERARCHY: TypeHierarchy = {
  directSupertypes: () => [],
};

function primitiveWidens(from: PrimitiveName, to: PrimitiveName): boolean {
  if (from === to) return true;
  if (from === "char" && (to === "short" || to === "byte")) return false;
  const fromRank = NUMERIC_RANK[from];
  const toRank = NUMERIC_RANK[to];
  if (fromRank === undefined || toRank === undefined) return false;
  return fromRank < toRank;
}

/**
 * Every ancestor of `qualifiedName` in breadth-first order, without repeats
 */
export function ancestorsOf(qualifiedName: string, hierarchy: TypeHierarchy): NamedShape[] {
  const result: NamedShape[] = [];
  const visited = new Set<string>([qualifiedName]);
  const queue: string[] = [qualifiedName];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const parent of hierarchy.directSupertypes(current)) {
      if (visited.has(parent.qualifiedName)) continue;
      visited.add(parent.qualifiedName);
      result.push(parent);
      queue.push(parent.qualifiedName);
    }
  }
  return result;
}

function upperBound(shape: TypeShape): TypeShape {
  if (shape.kind === "wildcard") {
    return shape.bound && shape.bound.variance === "extends" ? shape.bound.shape : named(OBJECT);
  }
  return shape;
}

function typeArgumentContains(formal: TypeShape, actual: TypeShape, hierarchy: TypeHierarchy): boolean {
  if (formal.kind === "wildcard") {
    if (!formal.bound) return true;
    if (formal.bound.variance === "extends") return isAssignable(upperBound(actual), formal.bound.shape, hierarchy);
    return actual.kind !== "wildcard" && isAssignable(formal.bound.shape, actual, hierarchy);
  }
  return formal.kind === "top" || actual.kind === "top" || shapesEqual(formal, actual);
}

/**
 * Whether a value of shape `from` can be assigned to a slot of shape `to`
 */
export function isAssignable(from: TypeShape, to: TypeShape, hierarchy: TypeHierarchy = EMPTY_HIERARCHY): boolean {
  if (shapesEqual(from, to)) return true;
  if (to.kind === "top") return !isVoid(from);
  if (isNamed(to, OBJECT)) return from.kind !== "primitive" || !isVoid(from);

  if (from.kind === "null") return to.kind !== "primitive";
  if (from.kind === "top") return false;

  if (from.kind === "primitive" && to.kind === "primitive") {
    return primitiveWidens(from.name, to.name);
  }
  if (from.kind === "primitive") {
    const box = boxedName(from.name);
    return box !== undefined && isAssignable(named(box), to, hierarchy);
  }
  if (to.kind === "primitive") {
    const unboxed = from.kind === "named" ? unboxedName(from.qualifiedName) : undefined;
    return unboxed !== undefined && primitiveWidens(unboxed, to.name);
  }

  if (from.kind === "wildcard") return isAssignable(upperBound(from), to, hierarchy);
  if (from.kind === "typeVariable" || to.kind === "typeVariable") return false;

  if (from.kind === "array") {
    if (to.kind === "array") {
      if (from.of.kind === "primitive" || to.of.kind === "primitive") return shapesEqual(from.of, to.of);
      return isAssignable(from.of, to.of, hierarchy);
    }
    return to.kind === "named" && ["java.lang.Cloneable", "java.io.Serializable"].includes(to.qualifiedName);
  }

  if (from.kind !== "named" || to.kind !== "named") return false;

  if (from.qualifiedName === to.qualifiedName) {
    if (from.typeArgs.length === 0 || to.typeArgs.length === 0) return true;
    if (from.typeArgs.length !== to.typeArgs.length) return false;
    return to.typeArgs.every((formal, i) => typeArgumentContains(formal, from.typeArgs[i], hierarchy));
  }

  return ancestorsOf(from.qualifiedName, hierarchy).some((ancestor) => ancestor.qualifiedName === to.qualifiedName);
}

function mergeTypeArgs(a: TypeShape[], b: TypeShape[]): TypeShape[] {
  if (a.length !== b.length) return [];
  return a.map((arg, i) => (shapesEqual(arg, b[i]) ? arg : wildcard()));
}

function rawIfGeneric(shape: NamedShape): NamedShape {
  return shape.typeArgs.some(mentionsTypeVariable) ? named(shape.qualifiedName) : shape;
}

/**
 * Most specific shape both `a` and `b` can be assigned to (parameter merging)
 */
export function commonSupertype(a: TypeShape, b: TypeShape, hierarchy: TypeHierarchy = EMPTY_HIERARCHY): TypeShape {
  if (shapesEqual(a, b)) return a;
  if (a.kind === "top" || b.kind === "top") return TOP;
  if (a.kind === "null") return b.kind === "primitive" ? boxOrTop(b) : b;
  if (b.kind === "null") return a.kind === "primitive" ? boxOrTop(a) : a;

  if (a.kind === "primitive" && b.kind === "primitive") {
    if (primitiveWidens(a.name, b.name)) return b;
    if (primitiveWidens(b.name, a.name)) return a;
    if (NUMERIC_RANK[a.name] !== undefined && NUMERIC_RANK[b.name] !== undefined) return INT;
    return TOP;
  }
  if (a.kind === "primitive") return commonSupertype(boxOrTop(a), b, hierarchy);
  if (b.kind === "primitive") return commonSupertype(a, boxOrTop(b), hierarchy);

  if (a.kind === "array" && b.kind === "array") {
    if (a.of.kind === "primitive" || b.of.kind === "primitive") return TOP;
    const element = commonSupertype(a.of, b.of, hierarchy);
    return element.kind === "top" ? TOP : arrayOf(element);
  }

  if (a.kind !== "named" || b.kind !== "named") return TOP;

  if (a.qualifiedName === b.qualifiedName) {
    return named(a.qualifiedName, mergeTypeArgs(a.typeArgs, b.typeArgs));
  }
  if (isAssignable(a, b, hierarchy)) return b;
  if (isAssignable(b, a, hierarchy)) return a;

  for (const ancestor of ancestorsOf(a.qualifiedName, hierarchy)) {
    if (ancestor.qualifiedName === OBJECT) continue;
    const other = ancestorNamed(b, ancestor.qualifiedName, hierarchy);
    if (!other) continue;
    // each side reaches the ancestor with its own type arguments
    return named(ancestor.qualifiedName, mergeTypeArgs(rawIfGeneric(ancestor).typeArgs, rawIfGeneric(other).typeArgs));
  }
  return TOP;
}

function ancestorNamed(shape: NamedShape, qualifiedName: string, hierarchy: TypeHierarchy): NamedShape | undefined {
  if (shape.qualifiedName === qualifiedName) return shape;
  return ancestorsOf(shape.qualifiedName, hierarchy).find((a) => a.qualifiedName === qualifiedName);
}

function boxOrTop(shape: Extract<TypeShape, { kind: "primitive" }>): TypeShape {
  const box = boxedName(shape.name);
  return box ? named(box) : TOP;
}

/**
 * Most specific shape assignable to both `a` and `b` (return merging);
 * `undefined` when the two expectations cannot both be met
 */
export function commonSubtype(a: TypeShape, b: TypeShape, hierarchy: TypeHierarchy = EMPTY_HIERARCHY): TypeShape | undefined {
  if (shapesEqual(a, b)) return a;
  if (a.kind === "top" || a.kind === "null") return b;
  if (b.kind === "top" || b.kind === "null") return a;

  if (isAssignable(a, b, hierarchy)) return a;
  if (isAssignable(b, a, hierarchy)) return b;
  return undefined;
}

export function mergeAll(
  shapes: TypeShape[],
  merge: (a: TypeShape, b: TypeShape) => TypeShape
): TypeShape | undefined {
  if (shapes.length === 0) return undefined;
  return shapes.slice(1).reduce(merge, shapes[0]);
}
