/**
 * Accumulates unresolved references and their usage sites in first-seen order
 */

import { OwnerHint, ReferenceDescriptor, ReferenceKind, UnresolvedReference, UsageIdiom, UsageSite } from "./types";
import { joinName } from "./utils";

/**
 * Qualified name of the package or type an owner hint points at; an
 * unqualified hint lands in the caller's package
 */
export function ownerOf(hint: OwnerHint): string {
  switch (hint.kind) {
    case "package":
      return hint.packageName;
    case "unqualified":
      return hint.callerPackage;
    case "type":
      return hint.qualifiedName;
  }
}

export function describeHint(hint: OwnerHint): string {
  switch (hint.kind) {
    case "package":
      return `package(${hint.packageName})`;
    case "unqualified":
      return `unqualified(${hint.callerPackage})`;
    case "type":
      return `type(${hint.qualifiedName})`;
  }
}

/**
 * Qualified name a TYPE reference stands for
 */
export function typeNameOf(reference: Pick<UnresolvedReference, "ownerHint" | "simpleName">): string {
  return joinName(ownerOf(reference.ownerHint), reference.simpleName);
}

export function describeReference(reference: UnresolvedReference): ReferenceDescriptor {
  return { kind: reference.kind, owner: ownerOf(reference.ownerHint), simpleName: reference.simpleName };
}

export function hasIdiom(reference: UnresolvedReference, idiom: UsageIdiom): boolean {
  return reference.evidence.some((site) => site.idioms.includes(idiom));
}

export function sitesWithIdiom(reference: UnresolvedReference, idiom: UsageIdiom): UsageSite[] {
  return reference.evidence.filter((site) => site.idioms.includes(idiom));
}

/**
 * Identity of a reference: kind, owner and simple name
 */
export function referenceKey(reference: Pick<UnresolvedReference, "kind" | "ownerHint" | "simpleName">): string {
  return `${reference.kind} ${ownerOf(reference.ownerHint)}#${reference.simpleName}`;
}

function hintRank(hint: OwnerHint): number {
  return hint.kind === "unqualified" ? 0 : 1;
}

/**
 * References keyed by (owner, simple name, kind). `unqualified(P)` and
 * `package(P)` name the same owner; the qualified hint is kept once seen.
 */
export class ReferenceSet {
  private references: Map<string, UnresolvedReference> = new Map();

  record(kind: ReferenceKind, ownerHint: OwnerHint, simpleName: string, site?: UsageSite): UnresolvedReference {
    const key = referenceKey({ kind, ownerHint, simpleName });
    let reference = this.references.get(key);
    if (!reference) {
      reference = { kind, ownerHint, simpleName, evidence: [] };
      this.references.set(key, reference);
    } else if (hintRank(ownerHint) > hintRank(reference.ownerHint)) {
      reference.ownerHint = ownerHint;
    }
    if (site) {
      reference.evidence.push(site);
    }
    return reference;
  }

  get(kind: ReferenceKind, ownerHint: OwnerHint, simpleName: string): UnresolvedReference | undefined {
    return this.references.get(referenceKey({ kind, ownerHint, simpleName }));
  }

  /**
   * TYPE reference for a qualified name, whatever hint recorded it
   */
  typeReference(qualifiedName: string): UnresolvedReference | undefined {
    for (const reference of this.references.values()) {
      if (reference.kind === "TYPE" && typeNameOf(reference) === qualifiedName) return reference;
    }
    return undefined;
  }

  /**
   * Member references (METHOD, FIELD, CONSTRUCTOR) whose owner is `ownerName`
   */
  membersOf(ownerName: string): UnresolvedReference[] {
    return this.all().filter(
      (reference) =>
        reference.kind !== "TYPE" && reference.ownerHint.kind === "type" && reference.ownerHint.qualifiedName === ownerName
    );
  }

  ofKind(kind: ReferenceKind): UnresolvedReference[] {
    return this.all().filter((reference) => reference.kind === kind);
  }

  all(): UnresolvedReference[] {
    return Array.from(this.references.values());
  }

  size(): number {
    return this.references.size;
  }
}
