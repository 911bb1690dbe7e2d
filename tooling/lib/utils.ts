/**
 * Utility functions used across the synthesis engine
 */

/**
 * Check if value is a plain object (not null, not array)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Stable JSON stringification for consistent output
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (isPlainObject(val)) {
      return Object.keys(val)
        .sort()
        .reduce<Record<string, unknown>>((result, k) => {
          result[k] = val[k];
          return result;
        }, {});
    }
    return val;
  });
}

/**
 * Ordinal string comparison, independent of locale
 */
export function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Deduplicate while preserving first-seen order
 */
export function dedupeBy<T>(values: readonly T[], keyOf: (value: T) => string): T[] {
  const seen = new Set<string>();
  return values.filter((value) => {
    const key = keyOf(value);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Append to a keyed list, creating it on first use
 */
export function pushTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const existing = map.get(key);
  if (existing) {
    existing.push(value);
  } else {
    map.set(key, [value]);
  }
}

// -----------------------------------------------------------------------------
// Qualified names
// -----------------------------------------------------------------------------

export function joinName(qualifier: string, simpleName: string): string {
  return qualifier ? `${qualifier}.${simpleName}` : simpleName;
}

export function simpleNameOf(qualifiedName: string): string {
  const index = qualifiedName.lastIndexOf(".");
  return index < 0 ? qualifiedName : qualifiedName.slice(index + 1);
}

export function qualifierOf(qualifiedName: string): string {
  const index = qualifiedName.lastIndexOf(".");
  return index < 0 ? "" : qualifiedName.slice(0, index);
}

export function isCapitalized(segment: string): boolean {
  return /^[A-Z]/.test(segment);
}

/**
 * Split `a.b.Outer.Inner` into its package (`a.b`) and type path (`Outer`, `Inner`).
 * Package segments are the leading lower-case ones.
 */
export function splitQualifiedName(dottedName: string): { packageName: string; typePath: string[] } {
  const segments = dottedName.split(".");
  let index = 0;
  while (index < segments.length - 1 && !isCapitalized(segments[index])) {
    index += 1;
  }
  return {
    packageName: segments.slice(0, index).join("."),
    typePath: segments.slice(index),
  };
}

export function packagePath(packageName: string): string {
  return packageName ? packageName.replace(/\./g, "/") : "";
}

/**
 * Type parameter names for a declaration of the given arity: T, U, V, W, T4, T5, ...
 */
export function typeParameterNames(arity: number): string[] {
  const base = ["T", "U", "V", "W"];
  const names: string[] = [];
  for (let i = 0; i < arity; i += 1) {
    names.push(i < base.length ? base[i] : `T${i}`);
  }
  return names;
}
