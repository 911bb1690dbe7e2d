/**
 * Diagnostics: typed records for everything the engine could not settle, and
 * the summary report a run ends with
 */

import { AmbiguityNote } from "./type-resolver";
import { Diagnostic, DiagnosticCode, PassName, ReferenceDescriptor, SynthesisPlan } from "./types";
import { stableStringify } from "./utils";

/**
 * Thrown under `failOnAmbiguity` when a simple name could come from more than
 * one on-demand import
 */
export class AmbiguousResolutionError extends Error {
  readonly note: AmbiguityNote;

  constructor(note: AmbiguityNote) {
    super(
      `Ambiguous type name ${note.simpleName} in ${note.unit}: candidates ${note.candidates.join(", ")}`
    );
    this.name = "AmbiguousResolutionError";
    this.note = note;
  }
}

export function contextDegraded(cause: string): Diagnostic {
  return {
    code: "ContextBuildDegraded",
    message: `Context model unavailable, continuing with the fragment only: ${cause}`,
    cause,
  };
}

export function unresolvedAfterSynthesis(reference: ReferenceDescriptor, reason: string): Diagnostic {
  return {
    code: "UnresolvedAfterSynthesis",
    message: `${reference.kind} ${reference.owner}#${reference.simpleName} left unresolved: ${reason}`,
    reference,
  };
}

export function ambiguousResolution(note: AmbiguityNote): Diagnostic {
  return {
    code: "AmbiguousResolution",
    message: `${note.simpleName} in ${note.unit} resolved to ${note.chosen} (candidates: ${note.candidates.join(", ")})`,
    simpleName: note.simpleName,
    candidates: [...note.candidates],
    chosen: note.chosen,
    unit: note.unit,
  };
}

export function conflictingEvidence(identity: string, kept: PassName, discarded: PassName[], detail?: string): Diagnostic {
  const suffix = detail ? `: ${detail}` : "";
  const dropped = discarded.length > 0 ? `; discarded ${discarded.join(", ")}` : "";
  return {
    code: "ConflictingEvidence",
    message: `${identity} planned by ${kept}${dropped}${suffix}`,
    identity,
    kept,
    discarded,
  };
}

/**
 * Drop repeated diagnostics, keeping the first occurrence
 */
export function dedupeDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  const seen = new Set<string>();
  return diagnostics.filter((diagnostic) => {
    const key = stableStringify(diagnostic);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function diagnosticsOfCode<C extends DiagnosticCode>(
  diagnostics: readonly Diagnostic[],
  code: C
): Array<Extract<Diagnostic, { code: C }>> {
  return diagnostics.filter((d): d is Extract<Diagnostic, { code: C }> => d.code === code);
}

export interface DiagnosticsReport {
  counts: {
    types: number;
    methods: number;
    fields: number;
    constructors: number;
  };
  unresolved: ReferenceDescriptor[];
  ambiguities: Array<{ simpleName: string; unit: string; chosen: string; candidates: string[] }>;
  conflicts: Array<{ identity: string; kept: PassName; discarded: PassName[] }>;
  degraded?: string;
}

export function buildReport(plan: SynthesisPlan): DiagnosticsReport {
  const degraded = diagnosticsOfCode(plan.diagnostics, "ContextBuildDegraded")[0];
  return {
    counts: {
      types: plan.types.length,
      methods: plan.methods.length,
      fields: plan.fields.length,
      constructors: plan.constructors.length,
    },
    unresolved: diagnosticsOfCode(plan.diagnostics, "UnresolvedAfterSynthesis").map((d) => d.reference),
    ambiguities: diagnosticsOfCode(plan.diagnostics, "AmbiguousResolution").map(({ simpleName, unit, chosen, candidates }) => ({
      simpleName,
      unit,
      chosen,
      candidates,
    })),
    conflicts: diagnosticsOfCode(plan.diagnostics, "ConflictingEvidence").map(({ identity, kept, discarded }) => ({
      identity,
      kept,
      discarded,
    })),
    degraded: degraded?.cause,
  };
}

/**
 * Human-readable report, one finding per line
 */
export function formatReport(report: DiagnosticsReport): string {
  const { counts } = report;
  const lines = [
    `Synthesized ${counts.types} types, ${counts.methods} methods, ${counts.fields} fields, ${counts.constructors} constructors`,
  ];
  if (report.degraded) {
    lines.push(`Context degraded: ${report.degraded}`);
  }
  for (const reference of report.unresolved) {
    lines.push(`Unresolved: ${reference.kind} ${reference.owner}#${reference.simpleName}`);
  }
  for (const ambiguity of report.ambiguities) {
    lines.push(`Ambiguous: ${ambiguity.simpleName} in ${ambiguity.unit} -> ${ambiguity.chosen}`);
  }
  for (const conflict of report.conflicts) {
    lines.push(`Conflict: ${conflict.identity} kept ${conflict.kept} over ${conflict.discarded.join(", ")}`);
  }
  return lines.join("\n");
}
