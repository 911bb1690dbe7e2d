/**
 * Shim catalog: pre-authored declaration shapes for well-known external types,
 * loaded from tooling/data/shim-catalog.json.
 *
 * A catalog is an immutable value. Build one per process (or per test) and
 * hand it to each pipeline; nothing is cached on it after construction.
 */

import { readFileSync } from "fs";
import { join } from "path";
import { parseConstructorSignature, parseFieldSignature, parseMethodSignature } from "./signatures";
import { named, parseTypeShape, typeVariable } from "./type-shapes";
import { MemberPlan, NamedShape, RelocationRule, ShimBlueprint, SupertypePlan, TypeKind, TypePlan } from "./types";
import { compareStrings, isPlainObject, qualifierOf, simpleNameOf, splitQualifiedName } from "./utils";

export const DEFAULT_SHIM_CATALOG_PATH = join(__dirname, "..", "data", "shim-catalog.json");

export type ShimMatch = {
  blueprint: ShimBlueprint;
  /** Name the blueprint is stored under (differs from the reference after relocation). */
  catalogName: string;
  via: "exact" | "relocated";
};

const TYPE_KINDS: readonly TypeKind[] = ["CLASS", "INTERFACE", "ANNOTATION", "ENUM", "RECORD"];

function isTypeKind(value: unknown): value is TypeKind {
  return TYPE_KINDS.some((kind) => kind === value);
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

function supertype(text: string, relation: SupertypePlan["relation"], typeParameters: readonly string[]): SupertypePlan {
  const shape = parseTypeShape(text, new Set(typeParameters));
  if (shape.kind !== "named") {
    throw new Error(`Shim supertype "${text}" is not a class or interface type`);
  }
  const narrowed: NamedShape = shape;
  return { relation, shape: narrowed };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

function readBlueprint(raw: unknown): ShimBlueprint {
  if (!isPlainObject(raw) || typeof raw.name !== "string" || !isTypeKind(raw.kind)) {
    throw new Error(`Malformed shim entry: ${JSON.stringify(raw)}`);
  }
  const qualifiedName = raw.name;
  const kind = raw.kind;
  const typeParameters = stringList(raw.typeParameters);
  const { packageName, typePath } = splitQualifiedName(qualifiedName);

  const supertypes: SupertypePlan[] = [];
  if (typeof raw.superclass === "string") {
    supertypes.push(supertype(raw.superclass, "extends", typeParameters));
  }
  for (const text of stringList(raw.interfaces)) {
    supertypes.push(supertype(text, kind === "INTERFACE" ? "extends" : "implements", typeParameters));
  }

  const type: TypePlan = {
    plan: "type",
    qualifiedName,
    packageName,
    simpleName: simpleNameOf(qualifiedName),
    enclosing: typePath.length > 1 ? qualifierOf(qualifiedName) : undefined,
    kind,
    typeParameters: typeParameters.map((name) => ({ name, bounds: [] })),
    supertypes,
    enumConstants: stringList(raw.enumConstants),
    recordComponents: [],
    origin: { kind: "package", packageName },
    isAbstract: raw.abstract === true,
  };

  const members: MemberPlan[] = [];
  for (const text of stringList(raw.methods)) {
    const parsed = parseMethodSignature(text, typeParameters);
    const isStatic = parsed.modifiers.includes("static");
    const isDefault = parsed.modifiers.includes("default");
    const isAbstract =
      parsed.modifiers.includes("abstract") ||
      kind === "ANNOTATION" ||
      (kind === "INTERFACE" && !isStatic && !isDefault);
    members.push({
      plan: "method",
      owner: qualifiedName,
      name: parsed.name,
      paramTypes: parsed.params,
      returnType: parsed.returns,
      visibility: "public",
      isStatic,
      isAbstract,
      isDefault,
      varargs: parsed.varargs,
      typeParameters: parsed.typeParameters.map((name) => ({ name, bounds: [] })),
      thrownTypes: parsed.throws,
    });
  }
  for (const text of stringList(raw.fields)) {
    const parsed = parseFieldSignature(text, typeParameters);
    const onInterface = kind === "INTERFACE";
    members.push({
      plan: "field",
      owner: qualifiedName,
      name: parsed.name,
      type: parsed.type,
      isStatic: onInterface || parsed.modifiers.includes("static"),
      isFinal: onInterface || parsed.modifiers.includes("final"),
    });
  }
  for (const text of stringList(raw.constructors)) {
    const parsed = parseConstructorSignature(text, typeParameters);
    members.push({ plan: "constructor", owner: qualifiedName, paramTypes: parsed.params, varargs: parsed.varargs });
  }

  return deepFreeze({ type, members });
}

function readRelocations(value: unknown): RelocationRule[] {
  if (!Array.isArray(value)) return [];
  return value.flatMap((entry): RelocationRule[] =>
    isPlainObject(entry) && typeof entry.from === "string" && typeof entry.to === "string"
      ? [{ from: entry.from, to: entry.to }]
      : []
  );
}

export class ShimCatalog {
  private readonly blueprints: ReadonlyMap<string, ShimBlueprint>;
  private readonly rules: readonly RelocationRule[];

  constructor(blueprints: readonly ShimBlueprint[], relocations: readonly RelocationRule[] = []) {
    const byName = new Map<string, ShimBlueprint>();
    for (const blueprint of blueprints) {
      if (byName.has(blueprint.type.qualifiedName)) {
        throw new Error(`Duplicate shim blueprint ${blueprint.type.qualifiedName}`);
      }
      byName.set(blueprint.type.qualifiedName, blueprint);
    }
    this.blueprints = byName;
    this.rules = deepFreeze([...relocations]);
    Object.freeze(this);
  }

  static fromData(data: unknown, extraRelocations: readonly RelocationRule[] = []): ShimCatalog {
    if (!isPlainObject(data)) {
      throw new Error("Shim catalog must be a JSON object");
    }
    const blueprints = (Array.isArray(data.blueprints) ? data.blueprints : []).map(readBlueprint);
    return new ShimCatalog(blueprints, [...readRelocations(data.relocations), ...extraRelocations]);
  }

  static load(catalogPath: string = DEFAULT_SHIM_CATALOG_PATH, extraRelocations: readonly RelocationRule[] = []): ShimCatalog {
    return ShimCatalog.fromData(JSON.parse(readFileSync(catalogPath, "utf8")), extraRelocations);
  }

  /**
   * Empty catalog, for runs that should rely on inference alone
   */
  static empty(): ShimCatalog {
    return new ShimCatalog([]);
  }

  get(qualifiedName: string): ShimBlueprint | undefined {
    return this.blueprints.get(qualifiedName);
  }

  has(qualifiedName: string): boolean {
    return this.blueprints.has(qualifiedName);
  }

  all(): ShimBlueprint[] {
    return Array.from(this.blueprints.values()).sort((a, b) =>
      compareStrings(a.type.qualifiedName, b.type.qualifiedName)
    );
  }

  size(): number {
    return this.blueprints.size;
  }

  relocations(): readonly RelocationRule[] {
    return this.rules;
  }

  /**
   * Copy of this catalog with additional relocation rules appended
   */
  withRelocations(extra: readonly RelocationRule[]): ShimCatalog {
    if (extra.length === 0) return this;
    return new ShimCatalog(Array.from(this.blueprints.values()), [...this.rules, ...extra]);
  }

  /**
   * Blueprint for `qualifiedName`, directly or through the first relocation rule
   * whose `from` prefix matches
   */
  match(qualifiedName: string): ShimMatch | undefined {
    const exact = this.blueprints.get(qualifiedName);
    if (exact) {
      return { blueprint: exact, catalogName: qualifiedName, via: "exact" };
    }
    for (const rule of this.rules) {
      if (!qualifiedName.startsWith(rule.from)) continue;
      const catalogName = rule.to + qualifiedName.slice(rule.from.length);
      const blueprint = this.blueprints.get(catalogName);
      if (blueprint) {
        return { blueprint, catalogName, via: "relocated" };
      }
    }
    return undefined;
  }

  /**
   * Whether any blueprint or relocation lives in `packageName`
   */
  coversPackage(packageName: string): boolean {
    for (const name of this.blueprints.keys()) {
      if (splitQualifiedName(name).packageName === packageName) return true;
    }
    return this.rules.some((rule) => `${packageName}.`.startsWith(rule.from));
  }
}

/**
 * Named shape of a blueprint type with its own type parameters as arguments
 */
export function blueprintSelfShape(blueprint: ShimBlueprint): NamedShape {
  return named(
    blueprint.type.qualifiedName,
    blueprint.type.typeParameters.map((p) => typeVariable(p.name))
  );
}
