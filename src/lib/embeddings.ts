/**
 * Embeddings
 *
 * Text-to-vector capability used by the SQLite vector store.
 *
 * @module embeddings
 */

import { embedMany, type EmbeddingModel } from "ai";
import { openai } from "@ai-sdk/openai";
import { google } from "@ai-sdk/google";
import { mistral } from "@ai-sdk/mistral";
import type { EmbeddingProviderType, StorageConfig } from "./config-schemas";

export type Embedder = (texts: string[]) => Promise<number[][]>;

export interface EmbeddingModelInfo {
  provider: EmbeddingProviderType;
  modelName: string;
  model: EmbeddingModel<string>;
}

const DEFAULT_EMBEDDING_MODELS: Record<EmbeddingProviderType, string> = {
  openai: "text-embedding-3-small",
  google: "text-embedding-004",
  mistral: "mistral-embed",
};

export function getEmbeddingModel(config: StorageConfig): EmbeddingModelInfo {
  const provider = config.embeddingProvider;
  const modelName = config.embeddingModel ?? DEFAULT_EMBEDDING_MODELS[provider];
  if (provider === "google") {
    return { provider, modelName, model: google.textEmbeddingModel(modelName) };
  }
  if (provider === "mistral") {
    return { provider, modelName, model: mistral.embedding(modelName) };
  }
  return { provider, modelName, model: openai.embedding(modelName) };
}

export function createAiSdkEmbedder(config: StorageConfig): Embedder {
  const { model } = getEmbeddingModel(config);
  return async (texts) => {
    if (texts.length === 0) return [];
    const { embeddings } = await embedMany({ model, values: texts });
    return embeddings;
  };
}

/**
 * Scale a vector to unit length. The zero vector is returned unchanged.
 */
export function l2Normalize(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (norm === 0) return [...vector];
  return vector.map((v) => v / norm);
}

export function euclideanDistance(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Embedding dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}
