/**
 * Claim Verifier - LLM Provider Selection
 *
 * Handles model selection per pipeline task and wraps the AI SDK behind the
 * text-in / text-out `LanguageModel` capability the stages consume.
 *
 * @module analyzer/llm
 */

import { generateText, type LanguageModel as AiSdkModel } from "ai";
import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { mistral } from "@ai-sdk/mistral";
import { DEFAULT_PIPELINE_CONFIG, type LLMProviderType, type PipelineConfig } from "../config-schemas";
import { ModelInvocationError, errorMessage, type ModelTask } from "../errors";
import type { PipelineLogger } from "./debug";
import { silentLogger } from "./debug";

export type { ModelTask } from "../errors";

/**
 * Capability consumed by the pipeline stages: given a prompt, return text.
 * Implementations throw ModelInvocationError on any failure.
 */
export interface LanguageModel {
  invoke(prompt: string, task: ModelTask): Promise<string>;
}

// ============================================================================
// MODEL SELECTION
// ============================================================================

export interface ModelInfo {
  provider: LLMProviderType;
  modelName: string;
  model: AiSdkModel;
}

export function normalizeProvider(raw: string): LLMProviderType {
  const p = (raw || "").toLowerCase().trim();
  if (p === "anthropic" || p === "claude") return "anthropic";
  if (p === "google" || p === "gemini") return "google";
  if (p === "mistral") return "mistral";
  return "openai";
}

function detectProviderFromModelName(modelName: string): LLMProviderType | null {
  const name = (modelName || "").toLowerCase();
  if (name.includes("claude")) return "anthropic";
  if (name.includes("gemini")) return "google";
  if (name.includes("mistral")) return "mistral";
  if (name.includes("gpt") || /^o\d/.test(name)) return "openai";
  return null;
}

function modelOverrideForTask(task: ModelTask, config: PipelineConfig): string | null {
  switch (task) {
    case "evaluate":
    case "extract":
      return config.modelEvaluate;
    case "synthesize":
      return config.modelSynthesize;
    case "review":
      return config.modelReview;
  }
}

function premiumModelName(provider: LLMProviderType): string {
  switch (provider) {
    case "anthropic":
      return "claude-sonnet-4-20250514";
    case "google":
      return "gemini-2.5-pro";
    case "mistral":
      return "mistral-large-latest";
    case "openai":
      return "gpt-4o";
  }
}

function defaultModelNameForTask(provider: LLMProviderType, task: ModelTask): string {
  // Synthesis is the only step that writes user-facing prose.
  if (task === "synthesize") return premiumModelName(provider);
  switch (provider) {
    case "anthropic":
      return "claude-3-5-haiku-20241022";
    case "google":
      return "gemini-2.5-flash";
    case "mistral":
      return "mistral-small-latest";
    case "openai":
      return "gpt-4o-mini";
  }
}

function buildModelInfo(provider: LLMProviderType, modelName: string): ModelInfo {
  if (provider === "anthropic") {
    return { provider, modelName, model: anthropic(modelName) };
  }
  if (provider === "google") {
    return { provider, modelName, model: google(modelName) };
  }
  if (provider === "mistral") {
    return { provider, modelName, model: mistral(modelName) };
  }
  return { provider, modelName, model: openai(modelName) };
}

/**
 * Resolve the model name for a task without constructing a client.
 *
 * Tiering off: every task uses the provider's premium model.
 * Tiering on: per-task override if it matches the provider, else the
 * task-tiered default.
 */
export function resolveModelName(
  task: ModelTask,
  config: PipelineConfig = DEFAULT_PIPELINE_CONFIG,
  logger: PipelineLogger = silentLogger,
): { provider: LLMProviderType; modelName: string } {
  const provider = normalizeProvider(config.llmProvider);
  if (!config.llmTiering) {
    return { provider, modelName: premiumModelName(provider) };
  }

  const overrideName = modelOverrideForTask(task, config);
  if (overrideName) {
    const inferredProvider = detectProviderFromModelName(overrideName);
    if (inferredProvider && inferredProvider !== provider) {
      logger.warn(`Ignoring model override "${overrideName}" for task "${task}" because provider is "${provider}"`);
    } else {
      return { provider, modelName: overrideName };
    }
  }
  return { provider, modelName: defaultModelNameForTask(provider, task) };
}

export function getModelForTask(task: ModelTask, config?: PipelineConfig, logger?: PipelineLogger): ModelInfo {
  const { provider, modelName } = resolveModelName(task, config, logger);
  return buildModelInfo(provider, modelName);
}

// ============================================================================
// AI SDK ADAPTER
// ============================================================================

/**
 * LanguageModel backed by the AI SDK. Each call is bounded by `llmTimeoutMs`.
 * An empty response is returned as-is; the stage parsers apply their defaults.
 */
export function createAiSdkLanguageModel(
  config: PipelineConfig = DEFAULT_PIPELINE_CONFIG,
  logger: PipelineLogger = silentLogger,
): LanguageModel {
  const models = new Map<ModelTask, ModelInfo>();
  const modelFor = (task: ModelTask): ModelInfo => {
    let info = models.get(task);
    if (!info) {
      info = getModelForTask(task, config, logger);
      models.set(task, info);
    }
    return info;
  };

  return {
    async invoke(prompt: string, task: ModelTask): Promise<string> {
      const { model, modelName, provider } = modelFor(task);
      const startedAt = Date.now();
      let text: string;
      try {
        const result = await generateText({
          model,
          prompt,
          temperature: config.llmTemperature,
          abortSignal: AbortSignal.timeout(config.llmTimeoutMs),
        });
        text = result.text;
      } catch (err) {
        throw new ModelInvocationError(task, `${provider}/${modelName} call failed: ${errorMessage(err)}`, { cause: err });
      }

      logger.debug(`${task}: ${provider}/${modelName} responded in ${Date.now() - startedAt}ms`, {
        chars: text.length,
      });
      if (!text.trim()) {
        logger.warn(`${task}: ${provider}/${modelName} returned an empty response`);
      }
      return text;
    },
  };
}
