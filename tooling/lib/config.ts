/**
 * Configuration loading, environment overrides and path expansion
 */

import { existsSync, readFileSync } from "fs";
import { isAbsolute, join } from "path";
import { parse as parseEnv } from "dotenv";
import { isLogLevel, LogLevel } from "./logger";
import { Config, RelocationRule, SynthesisOptions, TargetLanguageVersion } from "./types";
import { isPlainObject } from "./utils";

export const DEFAULT_CONFIG_FILE = "stubgen.config.json";
export const DEFAULT_ENV_SEARCH_PATHS = [".env", "~/.config/stubgen/.env"];
export const DEFAULT_OUTPUT_DIR = "generated/stubs";
export const DEFAULT_TARGET_VERSION: TargetLanguageVersion = 17;
export const DEFAULT_MAX_CONTEXT_TYPES = 5000;
export const DEFAULT_MAX_TRAVERSAL_DEPTH = 64;
export const DEFAULT_LOG_LEVEL: LogLevel = "info";

export const TARGET_VERSIONS: readonly TargetLanguageVersion[] = [8, 11, 17, 21];

export const DEFAULT_SYNTHESIS_OPTIONS: SynthesisOptions = {
  failOnAmbiguity: false,
  minimalStubbing: false,
  preserveGenerics: true,
  targetLanguageVersion: DEFAULT_TARGET_VERSION,
  maxContextTypes: DEFAULT_MAX_CONTEXT_TYPES,
  maxTraversalDepth: DEFAULT_MAX_TRAVERSAL_DEPTH,
  relocatedPackages: [],
};

export function isTargetVersion(value: unknown): value is TargetLanguageVersion {
  return typeof value === "number" && TARGET_VERSIONS.some((version) => version === value);
}

function isRelocationRule(value: unknown): value is RelocationRule {
  return isPlainObject(value) && typeof value.from === "string" && typeof value.to === "string";
}

function positiveInteger(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : undefined;
}

function parseBoolean(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return undefined;
}

/**
 * Keep only well-typed keys of a parsed config file; anything else falls back to defaults
 */
export function normalizeConfig(raw: unknown): Config {
  if (!isPlainObject(raw)) {
    return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
  }

  const config: Config = {};
  if (Array.isArray(raw.envSearchPaths)) {
    config.envSearchPaths = raw.envSearchPaths.filter((p): p is string => typeof p === "string");
  }
  if (typeof raw.failOnAmbiguity === "boolean") config.failOnAmbiguity = raw.failOnAmbiguity;
  if (typeof raw.minimalStubbing === "boolean") config.minimalStubbing = raw.minimalStubbing;
  if (typeof raw.preserveGenerics === "boolean") config.preserveGenerics = raw.preserveGenerics;
  if (isTargetVersion(raw.targetLanguageVersion)) config.targetLanguageVersion = raw.targetLanguageVersion;
  if (isLogLevel(raw.logLevel)) config.logLevel = raw.logLevel;
  const maxContextTypes = positiveInteger(raw.maxContextTypes);
  if (maxContextTypes !== undefined) config.maxContextTypes = maxContextTypes;
  const maxTraversalDepth = positiveInteger(raw.maxTraversalDepth);
  if (maxTraversalDepth !== undefined) config.maxTraversalDepth = maxTraversalDepth;
  if (typeof raw.shimCatalogPath === "string") config.shimCatalogPath = raw.shimCatalogPath;
  if (typeof raw.outputDir === "string") config.outputDir = raw.outputDir;
  if (Array.isArray(raw.relocatedPackages)) {
    config.relocatedPackages = raw.relocatedPackages.filter(isRelocationRule);
  }
  return config;
}

export class ConfigManager {
  private config: Config;
  private projectRoot: string;
  private env: NodeJS.ProcessEnv;

  constructor(projectRoot: string, configPath: string, env: NodeJS.ProcessEnv = process.env) {
    this.projectRoot = projectRoot;
    this.env = env;
    this.config = this.readConfig(configPath);
  }

  private readConfig(configPath: string): Config {
    if (!existsSync(configPath)) {
      return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    }

    try {
      const raw = readFileSync(configPath, "utf8");
      return normalizeConfig(JSON.parse(raw));
    } catch {
      return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    }
  }

  expandPath(rawPath: string): string {
    if (rawPath.startsWith("~/")) {
      const home = this.env.HOME;
      if (!home) {
        return rawPath.slice(2);
      }
      return join(home, rawPath.slice(2));
    }

    if (isAbsolute(rawPath)) {
      return rawPath;
    }

    return join(this.projectRoot, rawPath);
  }

  /**
   * Load every existing .env file on the search path into the environment.
   * Values already set win over file values. Returns the files that were read.
   */
  loadEnvironment(): string[] {
    const loaded: string[] = [];
    for (const candidate of this.getEnvSearchPaths()) {
      const envPath = this.expandPath(candidate);
      if (!existsSync(envPath)) {
        continue;
      }
      const parsed = parseEnv(readFileSync(envPath));
      for (const [key, value] of Object.entries(parsed)) {
        if (this.env[key] === undefined) {
          this.env[key] = value;
        }
      }
      loaded.push(envPath);
    }
    return loaded;
  }

  getEnvSearchPaths(): string[] {
    return this.config.envSearchPaths ?? DEFAULT_ENV_SEARCH_PATHS;
  }

  getOutputDir(): string {
    return this.config.outputDir ?? DEFAULT_OUTPUT_DIR;
  }

  getShimCatalogPath(): string | undefined {
    return this.config.shimCatalogPath ? this.expandPath(this.config.shimCatalogPath) : undefined;
  }

  getLogLevel(): LogLevel {
    const fromEnv = this.env.STUBGEN_LOG_LEVEL;
    if (isLogLevel(fromEnv)) return fromEnv;
    return this.config.logLevel ?? DEFAULT_LOG_LEVEL;
  }

  /**
   * Resolved options: STUBGEN_* environment variables, then the config file, then defaults
   */
  getSynthesisOptions(): SynthesisOptions {
    const envVersion = Number(this.env.STUBGEN_TARGET_VERSION);
    return {
      failOnAmbiguity:
        parseBoolean(this.env.STUBGEN_FAIL_ON_AMBIGUITY) ??
        this.config.failOnAmbiguity ??
        DEFAULT_SYNTHESIS_OPTIONS.failOnAmbiguity,
      minimalStubbing:
        parseBoolean(this.env.STUBGEN_MINIMAL_STUBBING) ??
        this.config.minimalStubbing ??
        DEFAULT_SYNTHESIS_OPTIONS.minimalStubbing,
      preserveGenerics:
        parseBoolean(this.env.STUBGEN_PRESERVE_GENERICS) ??
        this.config.preserveGenerics ??
        DEFAULT_SYNTHESIS_OPTIONS.preserveGenerics,
      targetLanguageVersion: isTargetVersion(envVersion)
        ? envVersion
        : this.config.targetLanguageVersion ?? DEFAULT_TARGET_VERSION,
      maxContextTypes: this.config.maxContextTypes ?? DEFAULT_MAX_CONTEXT_TYPES,
      maxTraversalDepth: this.config.maxTraversalDepth ?? DEFAULT_MAX_TRAVERSAL_DEPTH,
      relocatedPackages: this.config.relocatedPackages ?? [],
    };
  }

  getConfig(): Config {
    return this.config;
  }
}
