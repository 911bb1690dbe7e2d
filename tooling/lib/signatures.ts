/**
 * Compact member signatures used by the JSON data tables:
 *
 *   "static <T> java.util.List<T> of(T...)"
 *   "void info(java.lang.String, java.lang.Object)"
 *   "static final java.io.PrintStream out"
 *   "void execute() throws java.lang.Throwable"
 *   "(java.lang.String, java.lang.Throwable)"      (constructor)
 */

import { arrayOf, parseTypeShape } from "./type-shapes";
import { TypeShape } from "./types";

const MODIFIERS = new Set(["static", "final", "default", "abstract", "public"]);

export type ParsedMethodSignature = {
  name: string;
  modifiers: string[];
  typeParameters: string[];
  params: TypeShape[];
  returns: TypeShape;
  varargs: boolean;
  throws: TypeShape[];
};

export type ParsedFieldSignature = {
  name: string;
  modifiers: string[];
  type: TypeShape;
};

export type ParsedConstructorSignature = {
  params: TypeShape[];
  varargs: boolean;
};

/**
 * Split on commas that are not nested inside angle brackets
 */
export function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = "";
  for (const char of text) {
    if (char === "<") depth += 1;
    if (char === ">") depth -= 1;
    if (char === "," && depth === 0) {
      parts.push(current.trim());
      current = "";
      continue;
    }
    current += char;
  }
  if (current.trim().length > 0) {
    parts.push(current.trim());
  }
  return parts;
}

function takeModifiers(text: string): { modifiers: string[]; rest: string } {
  const modifiers: string[] = [];
  let rest = text.trim();
  for (;;) {
    const match = /^([a-z]+)\s+/.exec(rest);
    if (!match || !MODIFIERS.has(match[1])) break;
    modifiers.push(match[1]);
    rest = rest.slice(match[0].length);
  }
  return { modifiers, rest };
}

function takeTypeParameters(text: string): { typeParameters: string[]; rest: string } {
  if (!text.startsWith("<")) {
    return { typeParameters: [], rest: text };
  }
  let depth = 0;
  for (let i = 0; i < text.length; i += 1) {
    if (text[i] === "<") depth += 1;
    if (text[i] === ">") depth -= 1;
    if (depth === 0) {
      const typeParameters = splitTopLevel(text.slice(1, i)).map((p) => p.split(/\s+/)[0]);
      return { typeParameters, rest: text.slice(i + 1).trim() };
    }
  }
  throw new Error(`Unbalanced type parameters in "${text}"`);
}

function parseParameterList(
  text: string,
  typeVariables: ReadonlySet<string>
): { params: TypeShape[]; varargs: boolean } {
  const raw = splitTopLevel(text);
  let varargs = false;
  const params = raw.map((param, index) => {
    if (param.endsWith("...")) {
      if (index !== raw.length - 1) {
        throw new Error(`Only the last parameter may be variadic: "${text}"`);
      }
      varargs = true;
      return arrayOf(parseTypeShape(param.slice(0, -3), typeVariables));
    }
    return parseTypeShape(param, typeVariables);
  });
  return { params, varargs };
}

export function parseMethodSignature(text: string, ownerTypeParameters: readonly string[] = []): ParsedMethodSignature {
  const open = text.indexOf("(");
  const close = text.lastIndexOf(")");
  if (open < 0 || close < open) {
    throw new Error(`Malformed method signature "${text}"`);
  }

  const head = text.slice(0, open).trim();
  const nameMatch = /([A-Za-z_$][\w$]*)$/.exec(head);
  if (!nameMatch) {
    throw new Error(`Missing method name in "${text}"`);
  }
  const name = nameMatch[1];
  const { modifiers, rest } = takeModifiers(head.slice(0, head.length - name.length));
  const { typeParameters, rest: returnText } = takeTypeParameters(rest);
  const typeVariables = new Set([...ownerTypeParameters, ...typeParameters]);
  const { params, varargs } = parseParameterList(text.slice(open + 1, close), typeVariables);
  const throwsMatch = /^\s*throws\s+(.+)$/.exec(text.slice(close + 1));

  return {
    name,
    modifiers,
    typeParameters,
    params,
    returns: parseTypeShape(returnText, typeVariables),
    varargs,
    throws: throwsMatch ? splitTopLevel(throwsMatch[1]).map((t) => parseTypeShape(t, typeVariables)) : [],
  };
}

export function parseFieldSignature(text: string, ownerTypeParameters: readonly string[] = []): ParsedFieldSignature {
  const trimmed = text.trim();
  const nameMatch = /([A-Za-z_$][\w$]*)$/.exec(trimmed);
  if (!nameMatch) {
    throw new Error(`Malformed field signature "${text}"`);
  }
  const { modifiers, rest } = takeModifiers(trimmed.slice(0, trimmed.length - nameMatch[1].length));
  return {
    name: nameMatch[1],
    modifiers,
    type: parseTypeShape(rest, new Set(ownerTypeParameters)),
  };
}

export function parseConstructorSignature(
  text: string,
  ownerTypeParameters: readonly string[] = []
): ParsedConstructorSignature {
  const trimmed = text.trim();
  if (!trimmed.startsWith("(") || !trimmed.endsWith(")")) {
    throw new Error(`Malformed constructor signature "${text}"`);
  }
  return parseParameterList(trimmed.slice(1, -1), new Set(ownerTypeParameters));
}
