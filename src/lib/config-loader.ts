/**
 * Configuration Loader
 *
 * Resolves the effective AppConfig: code defaults, then an optional JSON file,
 * then environment variable overrides, then zod validation.
 * The result is a plain value handed to `createVerifier`; nothing is cached
 * at module level.
 *
 * @module config-loader
 */

import * as fs from "fs";
import * as path from "path";
import {
  AppConfigSchema,
  DEFAULT_APP_CONFIG,
  formatZodIssues,
  type AppConfig,
  type ConfigType,
} from "./config-schemas";
import { ConfigError, errorMessage } from "./errors";

export type { AppConfig } from "./config-schemas";

// ============================================================================
// TYPES
// ============================================================================

export interface OverrideRecord {
  envVar: string;
  fieldPath: string;
  configType: ConfigType;
  value: unknown;
}

export interface ResolvedAppConfig {
  config: AppConfig;
  /** File the config was read from, null when only defaults/env were used */
  sourceFile: string | null;
  overrides: OverrideRecord[];
}

export interface LoadConfigOptions {
  /** Explicit config file; defaults to CV_CONFIG_PATH, then configs/app.default.json */
  filePath?: string;
  env?: NodeJS.ProcessEnv;
}

const DEFAULT_CONFIG_FILE = "configs/app.default.json";

// ============================================================================
// ENVIRONMENT VARIABLE OVERRIDE MAPPING
// ============================================================================

type EnvMapping = { configType: ConfigType; fieldPath: string; parser: (v: string) => unknown };

const parseBool = (v: string): boolean => v.trim().toLowerCase() === "true";
const parseNum = (v: string): number => Number(v.trim());
const parseList = (v: string): string[] => v.split(",").map((s) => s.trim()).filter(Boolean);
const parseNullable = (v: string): string | null => (v.trim() === "" ? null : v.trim());

const ENV_MAP: Record<string, EnvMapping> = {
  CV_LLM_PROVIDER: { configType: "pipeline", fieldPath: "llmProvider", parser: (v) => v.trim().toLowerCase() },
  CV_LLM_TIERING: { configType: "pipeline", fieldPath: "llmTiering", parser: parseBool },
  CV_MODEL_EVALUATE: { configType: "pipeline", fieldPath: "modelEvaluate", parser: parseNullable },
  CV_MODEL_SYNTHESIZE: { configType: "pipeline", fieldPath: "modelSynthesize", parser: parseNullable },
  CV_MODEL_REVIEW: { configType: "pipeline", fieldPath: "modelReview", parser: parseNullable },
  CV_LLM_TIMEOUT_MS: { configType: "pipeline", fieldPath: "llmTimeoutMs", parser: parseNum },
  CV_EXTRACT_KEY_CLAIMS: { configType: "pipeline", fieldPath: "extractKeyClaims", parser: parseBool },
  CV_LOCAL_K: { configType: "retrieval", fieldPath: "localK", parser: parseNum },
  CV_SCORE_THRESHOLD: { configType: "retrieval", fieldPath: "scoreThreshold", parser: parseNum },
  CV_MIN_LOCAL_DOCS: { configType: "retrieval", fieldPath: "minLocalDocs", parser: parseNum },
  CV_WEB_SEARCH_THRESHOLD: { configType: "retrieval", fieldPath: "webSearchThreshold", parser: parseNum },
  CV_PERSIST_WEB_RESULTS: { configType: "retrieval", fieldPath: "persistWebResults", parser: parseBool },
  CV_SEARCH_ENABLED: { configType: "search", fieldPath: "enabled", parser: parseBool },
  CV_SEARCH_PROVIDER: { configType: "search", fieldPath: "provider", parser: (v) => v.trim().toLowerCase() },
  CV_SEARCH_TIMEOUT_MS: { configType: "search", fieldPath: "timeoutMs", parser: parseNum },
  CV_SEARCH_DOMAIN_WHITELIST: { configType: "search", fieldPath: "domainWhitelist", parser: parseList },
  CV_SEARCH_CACHE_ENABLED: { configType: "search", fieldPath: "cache.enabled", parser: parseBool },
  CV_SEARCH_CACHE_TTL_DAYS: { configType: "search", fieldPath: "cache.ttlDays", parser: parseNum },
  CV_SEARCH_CACHE_PATH: { configType: "search", fieldPath: "cache.dbPath", parser: (v) => v.trim() },
  CV_VECTOR_STORE_PATH: { configType: "storage", fieldPath: "vectorStorePath", parser: (v) => v.trim() },
  CV_EMBEDDING_PROVIDER: { configType: "storage", fieldPath: "embeddingProvider", parser: (v) => v.trim().toLowerCase() },
  CV_EMBEDDING_MODEL: { configType: "storage", fieldPath: "embeddingModel", parser: parseNullable },
  CV_LOG_FILE: { configType: "logging", fieldPath: "filePath", parser: parseNullable },
  CV_LOG_CONSOLE: { configType: "logging", fieldPath: "console", parser: parseBool },
};

// ============================================================================
// MERGING
// ============================================================================

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep-merge `override` onto `base`. Arrays and scalars replace; objects merge.
 */
export function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return result;
}

function setAtPath(target: PlainObject, dottedPath: string, value: unknown): PlainObject {
  const [head, ...rest] = dottedPath.split(".");
  if (rest.length === 0) {
    return { ...target, [head]: value };
  }
  const existing = target[head];
  const child = isPlainObject(existing) ? existing : {};
  return { ...target, [head]: setAtPath(child, rest.join("."), value) };
}

function applyEnvOverrides(
  base: PlainObject,
  env: NodeJS.ProcessEnv,
): { result: PlainObject; overrides: OverrideRecord[] } {
  const policy = (env.CV_CONFIG_ENV_OVERRIDES ?? "on").toLowerCase();
  if (policy === "off") {
    return { result: base, overrides: [] };
  }

  let result = base;
  const overrides: OverrideRecord[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_MAP)) {
    const raw = env[envVar];
    if (raw === undefined) continue;
    const value = mapping.parser(raw);
    result = setAtPath(result, `${mapping.configType}.${mapping.fieldPath}`, value);
    overrides.push({ envVar, fieldPath: mapping.fieldPath, configType: mapping.configType, value });
  }

  return { result, overrides };
}

// ============================================================================
// LOADING
// ============================================================================

function readConfigFile(filePath: string): PlainObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigError([`${filePath}: ${errorMessage(err)}`]);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError([`${filePath}: root must be a JSON object`]);
  }
  return parsed;
}

function resolveConfigFile(options: LoadConfigOptions, env: NodeJS.ProcessEnv): string | null {
  if (options.filePath) return path.resolve(options.filePath);
  if (env.CV_CONFIG_PATH) return path.resolve(env.CV_CONFIG_PATH);
  const fallback = path.resolve(DEFAULT_CONFIG_FILE);
  return fs.existsSync(fallback) ? fallback : null;
}

/**
 * Load and validate the effective configuration.
 *
 * @throws ConfigError when the file cannot be read or the merged result is invalid
 */
export function loadAppConfig(options: LoadConfigOptions = {}): ResolvedAppConfig {
  const env = options.env ?? process.env;
  const sourceFile = resolveConfigFile(options, env);

  let merged: PlainObject = { ...DEFAULT_APP_CONFIG };
  if (sourceFile) {
    merged = deepMerge(merged, readConfigFile(sourceFile));
  }

  const { result, overrides } = applyEnvOverrides(merged, env);

  const parsed = AppConfigSchema.safeParse(result);
  if (!parsed.success) {
    throw new ConfigError(formatZodIssues(parsed.error));
  }

  return { config: parsed.data, sourceFile, overrides };
}
