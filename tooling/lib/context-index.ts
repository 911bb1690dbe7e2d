/**
 * Builds the optional context model under a budget. Anything that goes wrong
 * here (a throwing loader, runaway recursion, a budget overrun or a supertype
 * cycle) yields a degraded result and the run continues fragment-only.
 */

import { CompilationUnit, TypeDeclaration, TypeNode } from "./ast";
import { joinName, simpleNameOf } from "./utils";

export type ContextSource = readonly CompilationUnit[] | (() => readonly CompilationUnit[]);

export type ContextBudget = {
  maxContextTypes: number;
  maxTraversalDepth: number;
};

export type ContextBuildResult =
  | { status: "ok"; units: CompilationUnit[]; typeCount: number }
  | { status: "degraded"; cause: string };

export class ContextBudgetExceeded extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContextBudgetExceeded";
  }
}

function describeFailure(error: unknown): string {
  if (error instanceof RangeError) {
    return `recursion limit reached while loading context: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function writtenName(node: TypeNode | undefined): string | undefined {
  return node?.type === "NamedType" ? node.name : undefined;
}

type ContextDecl = { qualifiedName: string; decl: TypeDeclaration; unit: CompilationUnit };

/**
 * Walk every declaration with an explicit stack, enforcing the type and
 * nesting budgets
 */
function collectDeclarations(units: readonly CompilationUnit[], budget: ContextBudget): ContextDecl[] {
  const found: ContextDecl[] = [];
  for (const unit of units) {
    const stack: Array<{ decl: TypeDeclaration; owner: string; depth: number }> = unit.types.map((decl) => ({
      decl,
      owner: unit.packageName,
      depth: 1,
    }));
    while (stack.length > 0) {
      const next = stack.pop();
      if (!next) break;
      if (next.depth > budget.maxTraversalDepth) {
        throw new ContextBudgetExceeded(`nesting deeper than ${budget.maxTraversalDepth} in ${unit.path}`);
      }
      const qualifiedName = joinName(next.owner, next.decl.name);
      found.push({ qualifiedName, decl: next.decl, unit });
      if (found.length > budget.maxContextTypes) {
        throw new ContextBudgetExceeded(`more than ${budget.maxContextTypes} context types`);
      }
      for (const member of next.decl.members) {
        if (member.type === "TypeDeclaration") {
          stack.push({ decl: member, owner: qualifiedName, depth: next.depth + 1 });
        }
      }
    }
  }
  return found;
}

/**
 * Supertype edges between context declarations, matched by qualified name,
 * single-type import or same-package simple name
 */
function supertypeEdges(declarations: readonly ContextDecl[]): Map<string, string[]> {
  const byName = new Map(declarations.map((d) => [d.qualifiedName, d]));
  const edges = new Map<string, string[]>();

  for (const { qualifiedName, decl, unit } of declarations) {
    const targets: string[] = [];
    for (const written of [writtenName(decl.superclass), ...decl.interfaces.map(writtenName)]) {
      if (!written) continue;
      const imported = unit.imports.find((imp) => !imp.onDemand && !imp.isStatic && simpleNameOf(imp.name) === written);
      const candidates = [written, imported?.name, joinName(unit.packageName, written)];
      const target = candidates.find((candidate): candidate is string => candidate !== undefined && byName.has(candidate));
      if (target) targets.push(target);
    }
    edges.set(qualifiedName, targets);
  }
  return edges;
}

/**
 * Iterative three-colour DFS; returns one cycle as a list of names, or undefined
 */
export function findSupertypeCycle(edges: ReadonlyMap<string, readonly string[]>): string[] | undefined {
  const state = new Map<string, "active" | "done">();
  for (const start of edges.keys()) {
    if (state.has(start)) continue;
    const path: string[] = [];
    const stack: Array<{ node: string; next: number }> = [{ node: start, next: 0 }];
    state.set(start, "active");
    path.push(start);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const targets = edges.get(frame.node) ?? [];
      if (frame.next >= targets.length) {
        state.set(frame.node, "done");
        stack.pop();
        path.pop();
        continue;
      }
      const target = targets[frame.next];
      frame.next += 1;
      const seen = state.get(target);
      if (seen === "active") {
        return [...path.slice(path.indexOf(target)), target];
      }
      if (seen === undefined) {
        state.set(target, "active");
        path.push(target);
        stack.push({ node: target, next: 0 });
      }
    }
  }
  return undefined;
}

export function buildContextModel(source: ContextSource | undefined, budget: ContextBudget): ContextBuildResult {
  if (source === undefined) {
    return { status: "ok", units: [], typeCount: 0 };
  }
  try {
    const units = typeof source === "function" ? [...source()] : [...source];
    const declarations = collectDeclarations(units, budget);
    const cycle = findSupertypeCycle(supertypeEdges(declarations));
    if (cycle) {
      return { status: "degraded", cause: `cyclic supertype chain: ${cycle.join(" -> ")}` };
    }
    return { status: "ok", units, typeCount: declarations.length };
  } catch (error) {
    return { status: "degraded", cause: describeFailure(error) };
  }
}
