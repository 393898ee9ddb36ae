/**
 * Verifier facade
 *
 * Wires configuration, collaborators and pipeline stages together and exposes
 * the public operations: verify a claim, add curated documents to the local
 * index, report status.
 *
 * @module analyzer/verifier
 */

import type { AppConfig } from "../config-schemas";
import { errorMessage, type ModelTask } from "../errors";
import { createAiSdkEmbedder } from "../embeddings";
import { SearchCache } from "../search-cache";
import { SqliteVectorStore } from "../vector-store-sqlite";
import type { IndexedDocument, VectorIndex } from "../vector-index";
import { APP_VERSION } from "../version";
import { createWebSearch, type WebSearch } from "../web-search";
import { AnswerSynthesizer } from "./answer-synthesizer";
import { createDebugLogger, type PipelineLogger } from "./debug";
import { EvidenceEvaluator, type StageModelContext } from "./evidence-evaluator";
import { LocalEvidenceSource, WebEvidenceSource } from "./evidence-sources";
import { HybridRetriever } from "./hybrid-retriever";
import { KeyClaimExtractor } from "./key-claims";
import { createAiSdkLanguageModel, normalizeProvider, resolveModelName, type LanguageModel } from "./llm";
import { SafetyReviewer } from "./safety-review";
import type { VerificationResult } from "./types";
import { VerificationPipeline } from "./verification-pipeline";

export interface CuratedDocument {
  content: string;
  source: string;
  url?: string;
}

export interface AddDocumentsResult {
  success: boolean;
  submitted: number;
}

export interface VerifierStatus {
  version: string;
  llmProvider: string;
  models: Record<ModelTask, string>;
  /** null when the index could not be read */
  indexSize: number | null;
  webSearch: { provider: string; configured: boolean };
  keyClaimsEnabled: boolean;
}

export interface VerifierDeps {
  /** Replaces the AI SDK model (tests, custom backends) */
  model?: LanguageModel;
  index?: VectorIndex;
  webSearch?: WebSearch;
  /** One logger for every component; defaults to scoped debug loggers */
  logger?: PipelineLogger;
  env?: NodeJS.ProcessEnv;
}

interface Closable {
  close(): Promise<void>;
}

export class Verifier {
  constructor(
    private readonly config: AppConfig,
    private readonly pipeline: VerificationPipeline,
    private readonly index: VectorIndex,
    private readonly webSearch: WebSearch,
    private readonly logger: PipelineLogger,
    private readonly owned: Closable[] = [],
  ) {}

  verify(claim: string): Promise<VerificationResult> {
    return this.pipeline.verify(claim);
  }

  /**
   * Add curated documents to the local index. Empty contents are skipped;
   * documents already indexed under the same source are ignored by the index.
   */
  async addDocuments(docs: CuratedDocument[]): Promise<AddDocumentsResult> {
    const items: IndexedDocument[] = docs
      .filter((doc) => doc.content.trim().length > 0)
      .map((doc): IndexedDocument => ({
        content: doc.content,
        metadata: { source: doc.source, url: doc.url, origin: "LOCAL" },
      }));
    if (items.length === 0) return { success: true, submitted: 0 };

    const success = await this.index.add(items);
    this.logger.info(`addDocuments: ${items.length} submitted, success=${success}`);
    return { success, submitted: items.length };
  }

  async status(): Promise<VerifierStatus> {
    let indexSize: number | null = null;
    try {
      indexSize = await this.index.count();
    } catch (err) {
      this.logger.warn(`Index size unavailable: ${errorMessage(err)}`);
    }

    const modelFor = (task: ModelTask) => resolveModelName(task, this.config.pipeline).modelName;
    const models: Record<ModelTask, string> = {
      evaluate: modelFor("evaluate"),
      synthesize: modelFor("synthesize"),
      review: modelFor("review"),
      extract: modelFor("extract"),
    };

    return {
      version: APP_VERSION,
      llmProvider: normalizeProvider(this.config.pipeline.llmProvider),
      models,
      indexSize,
      webSearch: { provider: this.webSearch.providerName, configured: this.webSearch.isConfigured() },
      keyClaimsEnabled: this.config.pipeline.extractKeyClaims,
    };
  }

  /** Close databases this verifier opened itself. */
  async close(): Promise<void> {
    for (const resource of this.owned) {
      await resource.close();
    }
  }
}

/**
 * Build a Verifier from a resolved configuration. Collaborators not supplied in
 * `deps` are created from config: AI SDK model, SQLite vector store with AI SDK
 * embeddings, and the configured web search provider with its cache.
 */
export function createVerifier(config: AppConfig, deps: VerifierDeps = {}): Verifier {
  const loggerFor = (scope: string): PipelineLogger => deps.logger ?? createDebugLogger(scope, config.logging);
  const owned: Closable[] = [];

  let index = deps.index;
  if (!index) {
    const store = new SqliteVectorStore(
      config.storage.vectorStorePath,
      createAiSdkEmbedder(config.storage),
      loggerFor("VectorStore"),
    );
    owned.push(store);
    index = store;
  }

  let webSearch = deps.webSearch;
  if (!webSearch) {
    const cache = config.search.cache.enabled ? new SearchCache(config.search.cache, loggerFor("SearchCache")) : null;
    if (cache) owned.push(cache);
    webSearch = createWebSearch(config.search, { env: deps.env, logger: loggerFor("WebSearch"), cache });
  }

  const model = deps.model ?? createAiSdkLanguageModel(config.pipeline, loggerFor("LLM"));
  const modelContext = (scope: string): StageModelContext => ({
    model,
    provider: normalizeProvider(config.pipeline.llmProvider),
    logger: loggerFor(scope),
  });

  const retriever = new HybridRetriever({
    local: new LocalEvidenceSource(index, loggerFor("LocalSource")),
    web: new WebEvidenceSource(webSearch, loggerFor("WebSource")),
    index,
    config: config.retrieval,
    logger: loggerFor("Retriever"),
  });

  const pipeline = new VerificationPipeline({
    retriever,
    evaluator: new EvidenceEvaluator(modelContext("SelfCheck"), config.retrieval.evidencePreviewChars),
    synthesizer: new AnswerSynthesizer(modelContext("Answer")),
    safety: new SafetyReviewer(modelContext("Safety")),
    keyClaims: config.pipeline.extractKeyClaims
      ? new KeyClaimExtractor(modelContext("KeyClaims"), config.pipeline.maxKeyClaims)
      : null,
    logger: loggerFor("Pipeline"),
  });

  return new Verifier(config, pipeline, index, webSearch, loggerFor("Verifier"), owned);
}
