/**
 * Test suite for ConfigManager
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import {
  ConfigManager,
  DEFAULT_ENV_SEARCH_PATHS,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_SYNTHESIS_OPTIONS,
  normalizeConfig,
} from "../tooling/lib/config";
import { writeFileSync, existsSync, mkdirSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

describe("ConfigManager", () => {
  let configPath: string;
  let projectRoot: string;

  beforeEach(() => {
    projectRoot = join(tmpdir(), `project-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(projectRoot, { recursive: true });
    configPath = join(projectRoot, "stubgen.config.json");
  });

  afterEach(() => {
    if (existsSync(projectRoot)) {
      rmSync(projectRoot, { recursive: true, force: true });
    }
  });

  it("should load default config when file does not exist", () => {
    const manager = new ConfigManager(projectRoot, configPath, {});

    expect(manager.getEnvSearchPaths()).toEqual(DEFAULT_ENV_SEARCH_PATHS);
    expect(manager.getOutputDir()).toBe(DEFAULT_OUTPUT_DIR);
    expect(manager.getLogLevel()).toBe("info");
    expect(manager.getSynthesisOptions()).toEqual(DEFAULT_SYNTHESIS_OPTIONS);
  });

  it("should load custom config from file", () => {
    const customConfig = {
      envSearchPaths: [".env.custom"],
      outputDir: "out/stubs",
      minimalStubbing: true,
      targetLanguageVersion: 11,
      relocatedPackages: [{ from: "org.old.", to: "org.new." }],
    };

    writeFileSync(configPath, JSON.stringify(customConfig), "utf8");
    const manager = new ConfigManager(projectRoot, configPath, {});
    const options = manager.getSynthesisOptions();

    expect(manager.getEnvSearchPaths()).toEqual([".env.custom"]);
    expect(manager.getOutputDir()).toBe("out/stubs");
    expect(options.minimalStubbing).toBe(true);
    expect(options.targetLanguageVersion).toBe(11);
    expect(options.relocatedPackages).toEqual([{ from: "org.old.", to: "org.new." }]);
  });

  it("should let environment variables override the file", () => {
    writeFileSync(configPath, JSON.stringify({ failOnAmbiguity: false, targetLanguageVersion: 11 }), "utf8");
    const manager = new ConfigManager(projectRoot, configPath, {
      STUBGEN_FAIL_ON_AMBIGUITY: "yes",
      STUBGEN_TARGET_VERSION: "21",
      STUBGEN_LOG_LEVEL: "debug",
    });
    const options = manager.getSynthesisOptions();

    expect(options.failOnAmbiguity).toBe(true);
    expect(options.targetLanguageVersion).toBe(21);
    expect(manager.getLogLevel()).toBe("debug");
  });

  it("should ignore unparseable environment values", () => {
    const manager = new ConfigManager(projectRoot, configPath, {
      STUBGEN_PRESERVE_GENERICS: "maybe",
      STUBGEN_TARGET_VERSION: "9",
    });
    const options = manager.getSynthesisOptions();

    expect(options.preserveGenerics).toBe(true);
    expect(options.targetLanguageVersion).toBe(17);
  });

  it("should load .env files without overwriting set variables", () => {
    writeFileSync(join(projectRoot, ".env"), "STUBGEN_MINIMAL_STUBBING=true\nSTUBGEN_LOG_LEVEL=error\n", "utf8");
    writeFileSync(configPath, JSON.stringify({ envSearchPaths: [".env", ".env.missing"] }), "utf8");
    const env: NodeJS.ProcessEnv = { STUBGEN_LOG_LEVEL: "warn" };
    const manager = new ConfigManager(projectRoot, configPath, env);

    expect(manager.loadEnvironment()).toEqual([join(projectRoot, ".env")]);
    expect(env.STUBGEN_MINIMAL_STUBBING).toBe("true");
    expect(manager.getLogLevel()).toBe("warn");
    expect(manager.getSynthesisOptions().minimalStubbing).toBe(true);
  });

  it("should expand relative paths", () => {
    const manager = new ConfigManager(projectRoot, configPath, {});
    const expanded = manager.expandPath("subdir/file.txt");

    expect(expanded).toBe(join(projectRoot, "subdir/file.txt"));
  });

  it("should expand home directory paths", () => {
    const manager = new ConfigManager(projectRoot, configPath, { HOME: "/home/tester" });
    const expanded = manager.expandPath("~/Documents/test.txt");

    expect(expanded).toBe(join("/home/tester", "Documents/test.txt"));
  });

  it("should leave absolute paths unchanged", () => {
    const manager = new ConfigManager(projectRoot, configPath, {});
    const absolutePath = "/absolute/path/to/file.txt";
    const expanded = manager.expandPath(absolutePath);

    expect(expanded).toBe(absolutePath);
  });

  it("should resolve the shim catalog path against the project root", () => {
    writeFileSync(configPath, JSON.stringify({ shimCatalogPath: "catalogs/shims.json" }), "utf8");
    const manager = new ConfigManager(projectRoot, configPath, {});

    expect(manager.getShimCatalogPath()).toBe(join(projectRoot, "catalogs/shims.json"));
  });

  it("should fall back to defaults on invalid JSON", () => {
    writeFileSync(configPath, "{ invalid json }", "utf8");
    const manager = new ConfigManager(projectRoot, configPath, {});

    expect(manager.getEnvSearchPaths()).toEqual(DEFAULT_ENV_SEARCH_PATHS);
  });
});

describe("normalizeConfig", () => {
  it("should drop keys of the wrong type", () => {
    const config = normalizeConfig({
      failOnAmbiguity: "true",
      targetLanguageVersion: 9,
      maxContextTypes: -1,
      maxTraversalDepth: 12,
      logLevel: "loud",
      relocatedPackages: [{ from: "a." }, { from: "b.", to: "c." }],
    });

    expect(config).toEqual({
      maxTraversalDepth: 12,
      relocatedPackages: [{ from: "b.", to: "c." }],
    });
  });

  it("should return the default search paths for non-objects", () => {
    expect(normalizeConfig([1, 2])).toEqual({ envSearchPaths: DEFAULT_ENV_SEARCH_PATHS });
  });
});
