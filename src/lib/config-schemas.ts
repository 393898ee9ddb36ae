/**
 * Configuration Schemas
 *
 * Zod schemas and code defaults for every configurable part of the verifier.
 * The loader (config-loader.ts) merges file and environment overrides on top
 * of these defaults and validates the result here.
 *
 * @module config-schemas
 */

import { z } from "zod";

export type ConfigType = "pipeline" | "retrieval" | "search" | "storage" | "logging";

// ============================================================================
// PIPELINE CONFIG (model selection)
// ============================================================================

export const LLM_PROVIDERS = ["anthropic", "openai", "google", "mistral"] as const;
export type LLMProviderType = (typeof LLM_PROVIDERS)[number];

export const PipelineConfigSchema = z.object({
  llmProvider: z.enum(LLM_PROVIDERS).describe("Language model provider for all pipeline stages"),
  llmTiering: z.boolean().describe("Use cheaper models for evaluation/review, premium for synthesis"),
  modelEvaluate: z.string().min(1).nullable().describe("Model override for evidence evaluation"),
  modelSynthesize: z.string().min(1).nullable().describe("Model override for answer synthesis"),
  modelReview: z.string().min(1).nullable().describe("Model override for safety review"),
  llmTimeoutMs: z.number().int().min(1000).max(300_000),
  llmTemperature: z.number().min(0).max(1),
  extractKeyClaims: z.boolean().describe("Extract key statements from retrieved evidence"),
  maxKeyClaims: z.number().int().min(1).max(20),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  llmProvider: "google",
  llmTiering: false,
  modelEvaluate: null,
  modelSynthesize: null,
  modelReview: null,
  llmTimeoutMs: 60_000,
  llmTemperature: 0.1,
  extractKeyClaims: false,
  maxKeyClaims: 5,
};

// ============================================================================
// RETRIEVAL CONFIG (hybrid retrieval policy)
// ============================================================================

export const RetrievalConfigSchema = z
  .object({
    localK: z.number().int().min(1).max(50).describe("Nearest neighbours requested from the local index"),
    scoreThreshold: z.number().min(0).max(1).describe("Minimum relevance for a local document"),
    minLocalDocs: z.number().int().min(0).max(50).describe("Fewer local documents than this triggers web search"),
    webSearchThreshold: z.number().min(0).max(1).describe("Average-relevance bar below which web search triggers"),
    relaxedFallbackCount: z.number().int().min(1).max(50).describe("Documents kept when too few pass the threshold"),
    webMaxResults: z.number().int().min(1).max(20),
    persistWebResults: z.boolean().describe("Index newly found web evidence for future requests"),
    evidencePreviewChars: z.number().int().min(50).max(10_000),
  });

export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;

export const DEFAULT_RETRIEVAL_CONFIG: RetrievalConfig = {
  localK: 5,
  scoreThreshold: 0.6,
  minLocalDocs: 2,
  webSearchThreshold: 0.7,
  relaxedFallbackCount: 3,
  webMaxResults: 3,
  persistWebResults: true,
  evidencePreviewChars: 500,
};

// ============================================================================
// SEARCH CONFIG (live web search)
// ============================================================================

export const SEARCH_PROVIDERS = ["auto", "tavily", "brave"] as const;
export type SearchProviderName = (typeof SEARCH_PROVIDERS)[number];

export const SearchConfigSchema = z.object({
  enabled: z.boolean(),
  provider: z.enum(SEARCH_PROVIDERS),
  timeoutMs: z.number().int().min(1000).max(60_000),
  domainWhitelist: z.array(z.string().regex(/^[a-z0-9.-]+$/i)).max(50),
  cache: z.object({
    enabled: z.boolean(),
    ttlDays: z.number().int().min(1).max(365),
    dbPath: z.string().min(1),
  }),
});

export type SearchConfig = z.infer<typeof SearchConfigSchema>;

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  enabled: true,
  provider: "auto",
  timeoutMs: 12_000,
  domainWhitelist: [],
  cache: {
    enabled: true,
    ttlDays: 7,
    dbPath: "./data/search-cache.db",
  },
};

// ============================================================================
// STORAGE CONFIG (vector index + embeddings)
// ============================================================================

export const EMBEDDING_PROVIDERS = ["openai", "google", "mistral"] as const;
export type EmbeddingProviderType = (typeof EMBEDDING_PROVIDERS)[number];

export const StorageConfigSchema = z.object({
  vectorStorePath: z.string().min(1),
  embeddingProvider: z.enum(EMBEDDING_PROVIDERS),
  embeddingModel: z.string().min(1).nullable(),
});

export type StorageConfig = z.infer<typeof StorageConfigSchema>;

export const DEFAULT_STORAGE_CONFIG: StorageConfig = {
  vectorStorePath: "./data/vector-store.db",
  embeddingProvider: "google",
  embeddingModel: null,
};

// ============================================================================
// LOGGING CONFIG
// ============================================================================

export const LoggingConfigSchema = z.object({
  filePath: z.string().min(1).nullable(),
  console: z.boolean(),
  maxDataChars: z.number().int().min(100).max(100_000),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  filePath: null,
  console: true,
  maxDataChars: 8000,
};

// ============================================================================
// APP CONFIG
// ============================================================================

export const AppConfigSchema = z.object({
  pipeline: PipelineConfigSchema,
  retrieval: RetrievalConfigSchema,
  search: SearchConfigSchema,
  storage: StorageConfigSchema,
  logging: LoggingConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export const DEFAULT_APP_CONFIG: AppConfig = {
  pipeline: DEFAULT_PIPELINE_CONFIG,
  retrieval: DEFAULT_RETRIEVAL_CONFIG,
  search: DEFAULT_SEARCH_CONFIG,
  storage: DEFAULT_STORAGE_CONFIG,
  logging: DEFAULT_LOGGING_CONFIG,
};

/**
 * Flatten zod issues into `path: message` strings.
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const issuePath = issue.path.length > 0 ? issue.path.join(".") : "root";
    return `${issuePath}: ${issue.message}`;
  });
}
