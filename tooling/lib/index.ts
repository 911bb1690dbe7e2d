/**
 * Central export point for all library modules
 */

export * from "./types";
export * from "./ast";
export * from "./type-shapes";
export * from "./signatures";
export * from "./config";
export * from "./utils";
export * from "./logger";
export * from "./jdk";
export * from "./shim-catalog";
export * from "./evidence";
export * from "./type-index";
export * from "./context-index";
export * from "./type-resolver";
export * from "./collector";
export * from "./shim-matcher";
export * from "./planner-context";
export * from "./type-kind-classifier";
export * from "./signature-inferrer";
export * from "./functional-interface-resolver";
export * from "./candidate-selector";
export * from "./audit";
export * from "./orchestrator";
export * from "./plans";
export * from "./synthesizer";
export * from "./normalizer";
export * from "./renderer";
export * from "./diagnostics";
export * from "./pipeline";
