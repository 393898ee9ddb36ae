/**
 * Configuration loading tests: defaults, file merge, env overrides, validation.
 */
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { deepMerge, loadAppConfig } from "@/lib/config-loader";
import { DEFAULT_APP_CONFIG } from "@/lib/config-schemas";
import { ConfigError } from "@/lib/errors";

let tmpDir: string;

function writeConfig(name: string, content: string): string {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, content);
  return file;
}

function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error("expected a ConfigError");
}

beforeAll(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "claim-verifier-config-"));
});

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("loadAppConfig", () => {
  it("loads the shipped default file, which matches the code defaults", () => {
    const { config, sourceFile, overrides } = loadAppConfig({ env: {} });
    expect(sourceFile).toBe(path.resolve("configs/app.default.json"));
    expect(config).toEqual(DEFAULT_APP_CONFIG);
    expect(overrides).toEqual([]);
  });

  it("merges a partial file over the defaults", () => {
    const file = writeConfig("partial.json", JSON.stringify({ retrieval: { localK: 8 }, search: { cache: { ttlDays: 2 } } }));
    const { config, sourceFile } = loadAppConfig({ filePath: file, env: {} });

    expect(sourceFile).toBe(file);
    expect(config.retrieval).toEqual({ ...DEFAULT_APP_CONFIG.retrieval, localK: 8 });
    expect(config.search.cache).toEqual({ ...DEFAULT_APP_CONFIG.search.cache, ttlDays: 2 });
  });

  it("reads the file named by CV_CONFIG_PATH", () => {
    const file = writeConfig("from-env.json", JSON.stringify({ pipeline: { llmProvider: "mistral" } }));
    expect(loadAppConfig({ env: { CV_CONFIG_PATH: file } }).config.pipeline.llmProvider).toBe("mistral");
  });

  it("applies environment overrides and records them", () => {
    const { config, overrides } = loadAppConfig({
      env: {
        CV_LOCAL_K: "7",
        CV_SEARCH_DOMAIN_WHITELIST: "who.int, cdc.gov",
        CV_LLM_TIERING: "TRUE",
        CV_SEARCH_CACHE_TTL_DAYS: "3",
      },
    });

    expect(config.retrieval.localK).toBe(7);
    expect(config.search.domainWhitelist).toEqual(["who.int", "cdc.gov"]);
    expect(config.pipeline.llmTiering).toBe(true);
    expect(config.search.cache.ttlDays).toBe(3);
    expect(overrides.map((o) => o.envVar)).toEqual([
      "CV_LLM_TIERING",
      "CV_LOCAL_K",
      "CV_SEARCH_DOMAIN_WHITELIST",
      "CV_SEARCH_CACHE_TTL_DAYS",
    ]);
  });

  it("ignores environment overrides when they are switched off", () => {
    const { config, overrides } = loadAppConfig({ env: { CV_CONFIG_ENV_OVERRIDES: "off", CV_LOCAL_K: "7" } });
    expect(config.retrieval.localK).toBe(5);
    expect(overrides).toEqual([]);
  });

  it("rejects invalid values with the failing path", () => {
    const err = configErrorOf(() => loadAppConfig({ env: { CV_LOCAL_K: "many", CV_LLM_PROVIDER: "acme" } }));
    expect(err.issues.map((issue) => issue.split(":")[0])).toEqual(["pipeline.llmProvider", "retrieval.localK"]);
  });

  it("rejects unreadable and non-object files", () => {
    const broken = writeConfig("broken.json", "{ not json");
    expect(configErrorOf(() => loadAppConfig({ filePath: broken, env: {} })).issues[0]).toMatch(/^.*broken\.json: /);

    const list = writeConfig("list.json", "[]");
    expect(configErrorOf(() => loadAppConfig({ filePath: list, env: {} })).issues).toEqual([
      `${list}: root must be a JSON object`,
    ]);
  });
});

describe("deepMerge", () => {
  it("merges nested objects and replaces arrays", () => {
    expect(deepMerge({ a: { b: 1, c: [1, 2] }, d: 1 }, { a: { c: [3] }, e: 2 })).toEqual({
      a: { b: 1, c: [3] },
      d: 1,
      e: 2,
    });
  });
});
