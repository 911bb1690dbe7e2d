/**
 * Index of every type that exists without synthesis: fragment declarations,
 * context declarations, the JDK table and classpath entries.
 *
 * Declarations are registered by name first; their member signatures are
 * described lazily (through the resolver) the first time something asks.
 */

import { CompilationUnit, TypeDeclaration } from "./ast";
import { JdkTypes } from "./jdk";
import { ancestorsOf, named, substitute, TypeHierarchy } from "./type-shapes";
import { NamedShape, TypeKind, TypeShape } from "./types";
import { joinName } from "./utils";

export type TypeOrigin = "fragment" | "context" | "jdk" | "classpath";

export interface KnownMethod {
  name: string;
  params: TypeShape[];
  returns: TypeShape;
  isStatic: boolean;
  varargs: boolean;
  typeParameters: string[];
}

export interface KnownField {
  name: string;
  type: TypeShape;
  isStatic: boolean;
}

export interface KnownConstructor {
  params: TypeShape[];
  varargs: boolean;
}

export interface KnownType {
  qualifiedName: string;
  packageName: string;
  simpleName: string;
  enclosing?: string;
  kind: TypeKind;
  origin: TypeOrigin;
  /** Member lists are partial; a missing member is not evidence of absence. */
  opaque: boolean;
  isFinal: boolean;
  typeParameters: string[];
  superclass?: NamedShape;
  interfaces: NamedShape[];
  methods: KnownMethod[];
  fields: KnownField[];
  constructors: KnownConstructor[];
  memberTypes: string[];
  enumConstants: string[];
  sam?: string;
}

export interface DeclaredType {
  qualifiedName: string;
  packageName: string;
  simpleName: string;
  enclosing?: string;
  origin: "fragment" | "context";
  decl: TypeDeclaration;
  unit: CompilationUnit;
  /** Qualified names of the enclosing declarations, outermost first. */
  enclosingChain: string[];
}

export interface MemberMatch<M> {
  member: M;
  owner: KnownType;
  /** Owner type parameters bound to the receiver's type arguments. */
  bindings: Map<string, TypeShape>;
}

export function matchesClasspath(entries: readonly string[], qualifiedName: string): boolean {
  return entries.some((entry) => {
    if (entry.endsWith(".*")) {
      return qualifiedName.startsWith(entry.slice(0, -1));
    }
    return qualifiedName === entry || qualifiedName.startsWith(`${entry}.`);
  });
}

export class TypeIndex implements TypeHierarchy {
  private declared: Map<string, DeclaredType> = new Map();
  private described: Map<string, KnownType> = new Map();
  private describer?: (declared: DeclaredType) => KnownType;

  constructor(
    private readonly jdk: JdkTypes,
    private readonly classpath: readonly string[] = []
  ) {}

  /**
   * Register every type declared in `units`, nested ones included
   */
  addUnits(units: readonly CompilationUnit[], origin: "fragment" | "context"): void {
    for (const unit of units) {
      const stack: Array<{ decl: TypeDeclaration; chain: string[] }> = unit.types.map((decl) => ({ decl, chain: [] }));
      while (stack.length > 0) {
        const next = stack.pop();
        if (!next) break;
        const { decl, chain } = next;
        const enclosing = chain[chain.length - 1];
        const qualifiedName = joinName(enclosing ?? unit.packageName, decl.name);
        if (!this.declared.has(qualifiedName) || (origin === "fragment" && this.declared.get(qualifiedName)?.origin === "context")) {
          this.declared.set(qualifiedName, {
            qualifiedName,
            packageName: unit.packageName,
            simpleName: decl.name,
            enclosing,
            origin,
            decl,
            unit,
            enclosingChain: chain,
          });
        }
        for (const member of decl.members) {
          if (member.type === "TypeDeclaration") {
            stack.push({ decl: member, chain: [...chain, qualifiedName] });
          }
        }
      }
    }
    this.described.clear();
  }

  attachDescriber(describer: (declared: DeclaredType) => KnownType): void {
    this.describer = describer;
    this.described.clear();
  }

  declaredType(qualifiedName: string): DeclaredType | undefined {
    return this.declared.get(qualifiedName);
  }

  declaredTypes(origin?: "fragment" | "context"): DeclaredType[] {
    const all = Array.from(this.declared.values());
    return origin ? all.filter((d) => d.origin === origin) : all;
  }

  isKnown(qualifiedName: string): boolean {
    return this.declared.has(qualifiedName) || this.jdk.has(qualifiedName) || matchesClasspath(this.classpath, qualifiedName);
  }

  originOf(qualifiedName: string): TypeOrigin | undefined {
    const declared = this.declared.get(qualifiedName);
    if (declared) return declared.origin;
    if (this.jdk.has(qualifiedName)) return "jdk";
    if (matchesClasspath(this.classpath, qualifiedName)) return "classpath";
    return undefined;
  }

  isPlatformName(qualifiedName: string): boolean {
    return this.jdk.isPlatformName(qualifiedName);
  }

  lookup(qualifiedName: string): KnownType | undefined {
    const cached = this.described.get(qualifiedName);
    if (cached) return cached;

    const declared = this.declared.get(qualifiedName);
    if (declared) {
      if (!this.describer) {
        throw new Error("TypeIndex has no describer attached");
      }
      const described = this.describer(declared);
      this.described.set(qualifiedName, described);
      return described;
    }

    const jdkType = this.jdk.get(qualifiedName);
    if (jdkType) return jdkType;

    if (matchesClasspath(this.classpath, qualifiedName)) {
      return {
        qualifiedName,
        packageName: "",
        simpleName: qualifiedName.slice(qualifiedName.lastIndexOf(".") + 1),
        kind: "CLASS",
        origin: "classpath",
        opaque: true,
        isFinal: false,
        typeParameters: [],
        interfaces: [],
        methods: [],
        fields: [],
        constructors: [],
        memberTypes: [],
        enumConstants: [],
      };
    }
    return undefined;
  }

  /**
   * Top-level type `simpleName` declared in `packageName` (fragment or context)
   */
  topLevelType(packageName: string, simpleName: string): string | undefined {
    const qualifiedName = joinName(packageName, simpleName);
    const declared = this.declared.get(qualifiedName);
    return declared && !declared.enclosing ? qualifiedName : undefined;
  }

  memberType(ownerQualifiedName: string, simpleName: string): string | undefined {
    const candidate = joinName(ownerQualifiedName, simpleName);
    const declared = this.declared.get(candidate);
    if (declared && declared.enclosing === ownerQualifiedName) return candidate;
    const jdkOwner = this.jdk.get(ownerQualifiedName);
    if (jdkOwner?.memberTypes.includes(candidate)) return candidate;
    return undefined;
  }

  directSupertypes(qualifiedName: string): NamedShape[] {
    const type = this.lookup(qualifiedName);
    if (!type) return [];
    return type.superclass ? [type.superclass, ...type.interfaces] : [...type.interfaces];
  }

  /**
   * Supertypes of `qualifiedName`, breadth first, that nothing declares
   */
  unresolvedAncestors(qualifiedName: string): NamedShape[] {
    return ancestorsOf(qualifiedName, this).filter((ancestor) => !this.isKnown(ancestor.qualifiedName));
  }

  /**
   * Walk `receiver` and its ancestors, substituting type arguments on the way,
   * and collect the members `select` picks from each type
   */
  collectMembers<M>(receiver: NamedShape, select: (type: KnownType) => M[]): MemberMatch<M>[] {
    const matches: MemberMatch<M>[] = [];
    const visited = new Set<string>();
    const queue: NamedShape[] = [receiver];

    while (queue.length > 0) {
      const current = queue.shift();
      if (!current || visited.has(current.qualifiedName)) continue;
      visited.add(current.qualifiedName);

      const type = this.lookup(current.qualifiedName);
      if (!type) continue;

      const bindings = new Map<string, TypeShape>();
      type.typeParameters.forEach((param, i) => {
        const arg = current.typeArgs[i];
        if (arg) bindings.set(param, arg);
      });

      for (const member of select(type)) {
        matches.push({ member, owner: type, bindings });
      }

      const parents = type.superclass ? [type.superclass, ...type.interfaces] : type.interfaces;
      for (const parent of parents) {
        const substituted = substitute(parent, bindings);
        queue.push(substituted.kind === "named" ? substituted : named(parent.qualifiedName));
      }
    }
    return matches;
  }

  findMethods(receiver: NamedShape, methodName: string): MemberMatch<KnownMethod>[] {
    return this.collectMembers(receiver, (type) => type.methods.filter((m) => m.name === methodName));
  }

  findField(receiver: NamedShape, fieldName: string): MemberMatch<KnownField> | undefined {
    return this.collectMembers(receiver, (type) => type.fields.filter((f) => f.name === fieldName))[0];
  }

  /**
   * Whether every type on the ancestor chain is known and fully declared,
   * so a missing member really is missing
   */
  isClosedHierarchy(qualifiedName: string): boolean {
    const own = this.lookup(qualifiedName);
    if (!own) return false;
    if (own.opaque) return false;
    return ancestorsOf(qualifiedName, this).every((ancestor) => this.isKnown(ancestor.qualifiedName));
  }
}
