/**
 * Platform library knowledge: the JDK types the engine can type expressions
 * against, read from tooling/data/jdk-types.json.
 */

import { readFileSync } from "fs";
import { join } from "path";
import { parseConstructorSignature, parseFieldSignature, parseMethodSignature } from "./signatures";
import { named, parseTypeShape } from "./type-shapes";
import { KnownConstructor, KnownField, KnownMethod, KnownType } from "./type-index";
import { NamedShape, TypeKind } from "./types";
import { isPlainObject, qualifierOf, simpleNameOf, splitQualifiedName } from "./utils";

export const DEFAULT_JDK_TABLE_PATH = join(__dirname, "..", "data", "jdk-types.json");

const TYPE_KINDS: readonly TypeKind[] = ["CLASS", "INTERFACE", "ANNOTATION", "ENUM", "RECORD"];

function isTypeKind(value: unknown): value is TypeKind {
  return TYPE_KINDS.some((kind) => kind === value);
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

function asNamed(text: string, typeParameters: readonly string[]): NamedShape {
  const shape = parseTypeShape(text, new Set(typeParameters));
  if (shape.kind !== "named") {
    throw new Error(`Supertype "${text}" is not a class or interface type`);
  }
  return shape;
}

function readType(raw: unknown): KnownType {
  if (!isPlainObject(raw) || typeof raw.name !== "string" || !isTypeKind(raw.kind)) {
    throw new Error(`Malformed JDK type entry: ${JSON.stringify(raw)}`);
  }
  const qualifiedName = raw.name;
  const typeParameters = stringList(raw.typeParameters);
  const { packageName, typePath } = splitQualifiedName(qualifiedName);

  const methods: KnownMethod[] = stringList(raw.methods).map((text) => {
    const parsed = parseMethodSignature(text, typeParameters);
    return {
      name: parsed.name,
      params: parsed.params,
      returns: parsed.returns,
      isStatic: parsed.modifiers.includes("static"),
      varargs: parsed.varargs,
      typeParameters: parsed.typeParameters,
    };
  });
  const fields: KnownField[] = stringList(raw.fields).map((text) => {
    const parsed = parseFieldSignature(text, typeParameters);
    return { name: parsed.name, type: parsed.type, isStatic: parsed.modifiers.includes("static") };
  });
  const constructors: KnownConstructor[] = stringList(raw.constructors).map((text) =>
    parseConstructorSignature(text, typeParameters)
  );
  const enumConstants = stringList(raw.enumConstants);
  const self = named(qualifiedName);
  for (const constant of enumConstants) {
    fields.push({ name: constant, type: self, isStatic: true });
  }

  let superclass: NamedShape | undefined;
  if (typeof raw.superclass === "string") {
    superclass = asNamed(raw.superclass, typeParameters);
  } else if (raw.kind === "ENUM") {
    superclass = named("java.lang.Enum", [self]);
  } else if (raw.kind === "CLASS" && qualifiedName !== "java.lang.Object") {
    superclass = named("java.lang.Object");
  }

  return {
    qualifiedName,
    packageName,
    simpleName: simpleNameOf(qualifiedName),
    enclosing: typePath.length > 1 ? qualifierOf(qualifiedName) : undefined,
    kind: raw.kind,
    origin: "jdk",
    opaque: true,
    isFinal: raw.final === true,
    typeParameters,
    superclass,
    interfaces: stringList(raw.supertypes).map((text) => asNamed(text, typeParameters)),
    methods,
    fields,
    constructors,
    memberTypes: [],
    enumConstants,
    sam: typeof raw.sam === "string" ? raw.sam : undefined,
  };
}

export class JdkTypes {
  private types: Map<string, KnownType> = new Map();
  private implicitNames: Map<string, string> = new Map();
  private prefixes: string[] = [];

  constructor(data: unknown) {
    if (!isPlainObject(data)) {
      throw new Error("JDK table must be a JSON object");
    }
    this.prefixes = stringList(data.packagePrefixes);
    if (isPlainObject(data.implicitSimpleNames)) {
      for (const [simple, qualified] of Object.entries(data.implicitSimpleNames)) {
        if (typeof qualified === "string") {
          this.implicitNames.set(simple, qualified);
        }
      }
    }
    for (const raw of Array.isArray(data.types) ? data.types : []) {
      const type = readType(raw);
      this.types.set(type.qualifiedName, type);
    }
    for (const type of this.types.values()) {
      if (type.enclosing) {
        this.types.get(type.enclosing)?.memberTypes.push(type.qualifiedName);
      }
    }
  }

  static load(tablePath: string = DEFAULT_JDK_TABLE_PATH): JdkTypes {
    return new JdkTypes(JSON.parse(readFileSync(tablePath, "utf8")));
  }

  get(qualifiedName: string): KnownType | undefined {
    return this.types.get(qualifiedName);
  }

  has(qualifiedName: string): boolean {
    return this.types.has(qualifiedName);
  }

  all(): KnownType[] {
    return Array.from(this.types.values());
  }

  /**
   * Packages owned by the platform; types there are never synthesized
   */
  isPlatformName(qualifiedName: string): boolean {
    return this.prefixes.some((prefix) => qualifiedName.startsWith(prefix));
  }

  /**
   * Well-known simple names that resolve even without an import (`List`, `Path`, ...)
   */
  implicitQualifiedName(simpleName: string): string | undefined {
    return this.implicitNames.get(simpleName);
  }
}
