#!/usr/bin/env node
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { CompilationUnit, FragmentModel, isFragmentModel } from "./lib/ast";
import { ConfigManager, DEFAULT_CONFIG_FILE } from "./lib/config";
import { formatReport } from "./lib/diagnostics";
import { Logger } from "./lib/logger";
import { StubPipeline } from "./lib/pipeline";
import { ShimCatalog } from "./lib/shim-catalog";

const PROJECT_ROOT = process.cwd();

function readModel(path: string): FragmentModel {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
  if (!isFragmentModel(parsed)) {
    throw new Error(`${path} does not contain a fragment model`);
  }
  return parsed;
}

function readContext(path: string | undefined): CompilationUnit[] | (() => CompilationUnit[]) | undefined {
  if (!path) return undefined;
  // Loaded lazily so a broken context file degrades the run instead of aborting it.
  return () => readModel(path).units;
}

async function main(): Promise<void> {
  const modelPath = process.argv[2];
  if (!modelPath) {
    console.error("usage: stubgen <fragment.json> [output-dir] [context.json]");
    process.exitCode = 1;
    return;
  }

  const config = new ConfigManager(PROJECT_ROOT, join(PROJECT_ROOT, DEFAULT_CONFIG_FILE));
  config.loadEnvironment();
  const outputDir = config.expandPath(process.argv[3] || process.env.STUBGEN_OUTPUT_DIR || config.getOutputDir());
  const catalogPath = config.getShimCatalogPath();
  const logger = new Logger(config.getLogLevel());

  const pipeline = new StubPipeline({
    options: config.getSynthesisOptions(),
    catalog: catalogPath && existsSync(catalogPath) ? ShimCatalog.load(catalogPath) : undefined,
    logger,
  });

  logger.info("Processing fragment", { model: modelPath, output: outputDir });
  const result = pipeline.run({ model: readModel(modelPath), context: readContext(process.argv[4]) });

  mkdirSync(outputDir, { recursive: true });
  for (const source of result.sources) {
    const target = join(outputDir, source.path);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, source.text, "utf8");
  }
  writeFileSync(
    join(outputDir, "stubgen-report.json"),
    JSON.stringify({ report: result.report, plan: result.plan, audit: result.audit.toJSON() }, null, 2),
    "utf8"
  );

  console.log(formatReport(result.report));
  console.log(`Wrote ${result.sources.length} source file(s) to ${outputDir}.`);
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
