/**
 * Stub Pipeline: one synthesis run over a fragment.
 *
 * strip earlier output → context → collect → shim match → planner passes →
 * merge → synthesize → normalize → render → report
 *
 * Every run builds its own index, logger context, orchestrator and audit
 * trail; only the immutable JDK table and shim catalog are shared.
 */

import { cloneModel, CompilationUnit, FragmentModel, MemberDeclaration, TypeDeclaration } from "./ast";
import { AuditLog } from "./audit";
import { ReferenceCollector } from "./collector";
import { DEFAULT_SYNTHESIS_OPTIONS } from "./config";
import { buildContextModel, ContextSource } from "./context-index";
import {
  ambiguousResolution,
  AmbiguousResolutionError,
  buildReport,
  contextDegraded,
  dedupeDiagnostics,
  DiagnosticsReport,
} from "./diagnostics";
import { FunctionalInterfaceResolver } from "./functional-interface-resolver";
import { JdkTypes } from "./jdk";
import { Logger } from "./logger";
import { MergedType, PostSynthesisNormalizer } from "./normalizer";
import { PassOrchestrator } from "./orchestrator";
import { PlannerContext, PlannerPass } from "./planner-context";
import { RenderedSource, renderFragment } from "./renderer";
import { ShimCatalog } from "./shim-catalog";
import { ShimMatcher } from "./shim-matcher";
import { SignatureInferrer } from "./signature-inferrer";
import { DeclarationSynthesizer } from "./synthesizer";
import { TypeIndex } from "./type-index";
import { TypeKindClassifier } from "./type-kind-classifier";
import { TypeResolver } from "./type-resolver";
import { Diagnostic, SynthesisOptions, SynthesisPlan } from "./types";

export type PipelineInput = {
  model: FragmentModel;
  /** Surrounding sources, as units or a loader that may throw. */
  context?: ContextSource;
  /** Opaque classpath entries: `a.b.C` or `a.b.*`. */
  classpath?: string[];
};

export type PipelineResult = {
  /** The input model with every synthesized declaration written into it. */
  model: FragmentModel;
  plan: SynthesisPlan;
  sources: RenderedSource[];
  report: DiagnosticsReport;
  audit: AuditLog;
  merged: MergedType[];
};

export type PipelineSettings = {
  options?: Partial<SynthesisOptions>;
  jdk?: JdkTypes;
  catalog?: ShimCatalog;
  logger?: Logger;
};

function withoutSyntheticMembers(decl: TypeDeclaration): TypeDeclaration {
  const members = decl.members
    .filter((member) => !("synthetic" in member && member.synthetic === true))
    .map((member): MemberDeclaration => (member.type === "TypeDeclaration" ? withoutSyntheticMembers(member) : member));
  return { ...decl, members };
}

/**
 * Copy of `model` without anything an earlier run synthesized
 */
export function stripSynthetic(model: FragmentModel): FragmentModel {
  const units = model.units
    .filter((unit) => unit.synthetic !== true)
    .map(
      (unit): CompilationUnit => ({
        ...unit,
        imports: unit.imports.filter((i) => i.synthetic !== true),
        types: unit.types.filter((t) => t.synthetic !== true).map(withoutSyntheticMembers),
      })
    );
  return cloneModel({ units });
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class StubPipeline {
  readonly options: SynthesisOptions;
  private readonly jdk: JdkTypes;
  private readonly catalog: ShimCatalog;
  private readonly logger: Logger;

  constructor(settings: PipelineSettings = {}) {
    this.options = { ...DEFAULT_SYNTHESIS_OPTIONS, ...settings.options };
    this.jdk = settings.jdk ?? JdkTypes.load();
    this.catalog = (settings.catalog ?? ShimCatalog.load()).withRelocations(this.options.relocatedPackages);
    this.logger = settings.logger ?? new Logger("info", false);
  }

  getLogger(): Logger {
    return this.logger;
  }

  /**
   * Synthesize every missing declaration `input.model` uses. Only an
   * ambiguity under `failOnAmbiguity` escapes; a failure while the context
   * model is in play degrades the run to fragment-only.
   */
  run(input: PipelineInput): PipelineResult {
    const diagnostics: Diagnostic[] = [];
    const context = this.logger.withContext({ phase: "context" }, () =>
      buildContextModel(input.context, this.options)
    );
    let contextUnits: CompilationUnit[] = [];
    if (context.status === "degraded") {
      this.logger.warn("Context model degraded", { cause: context.cause });
      diagnostics.push(contextDegraded(context.cause));
    } else {
      contextUnits = context.units;
    }

    try {
      return this.synthesize(stripSynthetic(input.model), contextUnits, input.classpath ?? [], diagnostics);
    } catch (error) {
      if (error instanceof AmbiguousResolutionError || contextUnits.length === 0) {
        throw error;
      }
      const cause = describeError(error);
      this.logger.warn("Run failed with context; retrying fragment-only", { cause });
      return this.synthesize(stripSynthetic(input.model), [], input.classpath ?? [], [...diagnostics, contextDegraded(cause)]);
    }
  }

  private synthesize(
    model: FragmentModel,
    contextUnits: readonly CompilationUnit[],
    classpath: readonly string[],
    diagnostics: Diagnostic[]
  ): PipelineResult {
    const logger = this.logger;
    logger.startTimer("run");

    const index = new TypeIndex(this.jdk, classpath);
    const resolver = new TypeResolver(index, this.jdk, this.catalog);
    index.addUnits(model.units, "fragment");
    index.addUnits(contextUnits, "context");

    const collected = logger.withContext({ phase: "collect" }, () =>
      new ReferenceCollector(index, resolver, { failOnAmbiguity: this.options.failOnAmbiguity }, logger).collect(model)
    );
    const ambiguities = collected.ambiguities.map(ambiguousResolution);

    const audit = new AuditLog();
    const plan = logger.withContext({ phase: "plan" }, () => {
      const shims = new ShimMatcher(this.catalog, index, this.options, logger).match(collected.references);
      const plannerContext = new PlannerContext(collected.references, index, this.catalog, this.options, shims.resolved);
      const orchestrator = new PassOrchestrator(index, logger, audit);
      orchestrator.submit(shims.candidates);
      const passes: PlannerPass[] = [new TypeKindClassifier(), new SignatureInferrer(), new FunctionalInterfaceResolver()];
      for (const pass of passes) {
        const candidates = logger.withContext({ component: pass.name }, () => pass.plan(plannerContext));
        logger.debug("Planner pass finished", { pass: pass.name, candidates: candidates.length });
        orchestrator.submit(candidates);
      }
      return orchestrator.resolve();
    });

    const synthesized = logger.withContext({ phase: "synthesize" }, () =>
      new DeclarationSynthesizer(index, logger).synthesize(model, plan, collected.implicitImports)
    );
    const normalized = logger.withContext({ phase: "normalize" }, () =>
      new PostSynthesisNormalizer(index, collected.references, logger).normalize(model, plan, synthesized)
    );

    const finalPlan: SynthesisPlan = {
      ...normalized.plan,
      diagnostics: dedupeDiagnostics([...diagnostics, ...ambiguities, ...normalized.plan.diagnostics, ...synthesized.diagnostics]),
    };
    const sources = logger.withContext({ phase: "render" }, () => renderFragment(model));
    logger.endTimer("run", "Synthesis run finished", "info");

    return {
      model,
      plan: finalPlan,
      sources,
      report: buildReport(finalPlan),
      audit,
      merged: normalized.merged,
    };
  }
}

/**
 * Run each input through its own pipeline; nothing is shared between runs
 * except the settings
 */
export function runIsolated(inputs: readonly PipelineInput[], settings: PipelineSettings = {}): PipelineResult[] {
  return inputs.map((input) => new StubPipeline({ ...settings, logger: undefined }).run(input));
}
