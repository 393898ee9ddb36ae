/**
 * Hybrid retrieval
 *
 * Local-first evidence retrieval. The local index is always queried; live web
 * search is added only when the local evidence is too thin or too weak, and
 * newly found web pages are offered back to the index for future requests.
 *
 * @module analyzer/hybrid-retriever
 */

import type { RetrievalConfig } from "../config-schemas";
import { ProviderError, errorMessage } from "../errors";
import type { IndexedDocument, VectorIndex } from "../vector-index";
import type { PipelineLogger } from "./debug";
import { silentLogger } from "./debug";
import type { LocalEvidenceSource, WebEvidenceSource } from "./evidence-sources";
import { rerankEvidence } from "./score-normalization";
import type { EvidenceItem, EvidenceSet, RetrievalStats, SourceLabel } from "./types";

/** Below this many threshold-passing local documents the threshold is relaxed. */
const RELAX_THRESHOLD_BELOW = 2;
/** Weak-evidence-base guard: max and average both under these bars. */
const WEAK_MAX_RELEVANCE = 0.6;
const WEAK_AVG_RELEVANCE = 0.5;

export type WebSearchReason =
  | "too_few_local_docs"
  | "low_average_relevance"
  | "low_max_relevance"
  | "weak_evidence_base";

export interface RelevanceSummary {
  count: number;
  avg: number;
  max: number;
  min: number;
}

export interface WebSearchDecision {
  search: boolean;
  reason: WebSearchReason | null;
  summary: RelevanceSummary;
}

export interface RetrievalResult {
  evidence: EvidenceSet;
  sourceLabel: SourceLabel;
  stats: RetrievalStats;
  /** Set only when sourceLabel is "error" */
  error?: ProviderError;
}

type WebPolicy = Pick<RetrievalConfig, "minLocalDocs" | "webSearchThreshold">;
type LocalPolicy = Pick<RetrievalConfig, "scoreThreshold" | "relaxedFallbackCount">;

export function summarizeRelevance(items: EvidenceItem[]): RelevanceSummary {
  if (items.length === 0) return { count: 0, avg: 0, max: 0, min: 0 };
  const scores = items.map((item) => item.relevanceScore);
  return {
    count: scores.length,
    avg: scores.reduce((sum, s) => sum + s, 0) / scores.length,
    max: Math.max(...scores),
    min: Math.min(...scores),
  };
}

/**
 * Decide whether local evidence needs web support.
 *
 * One strong outlier does not hide a weak base (max bar sits 0.1 above the
 * average bar), and the count check always wins first.
 */
export function shouldSearchWeb(localSet: EvidenceItem[], policy: WebPolicy): WebSearchDecision {
  const summary = summarizeRelevance(localSet);

  if (summary.count < policy.minLocalDocs) {
    return { search: true, reason: "too_few_local_docs", summary };
  }
  if (summary.avg < policy.webSearchThreshold) {
    return { search: true, reason: "low_average_relevance", summary };
  }
  if (summary.max < policy.webSearchThreshold + 0.1) {
    return { search: true, reason: "low_max_relevance", summary };
  }
  if (summary.max < WEAK_MAX_RELEVANCE && summary.avg < WEAK_AVG_RELEVANCE) {
    return { search: true, reason: "weak_evidence_base", summary };
  }
  return { search: false, reason: null, summary };
}

/**
 * Keep local items at or above the score threshold; when fewer than two pass,
 * fall back to the best `relaxedFallbackCount` regardless of score.
 */
export function selectLocalEvidence(items: EvidenceItem[], policy: LocalPolicy): EvidenceItem[] {
  const ordered = [...items].sort((a, b) => b.relevanceScore - a.relevanceScore);
  const passing = ordered.filter((item) => item.relevanceScore >= policy.scoreThreshold);
  if (passing.length >= RELAX_THRESHOLD_BELOW) return passing;
  return ordered.slice(0, policy.relaxedFallbackCount);
}

export function labelSources(localCount: number, webCount: number, webTriggered: boolean): SourceLabel {
  if (!webTriggered || webCount === 0) return "local_only";
  return localCount === 0 ? "web_only" : "hybrid";
}

export function toIndexedDocuments(items: EvidenceItem[]): IndexedDocument[] {
  return items.map((item): IndexedDocument => ({
    content: item.content,
    metadata: { source: item.source, url: item.url, origin: "WEB" },
  }));
}

export interface HybridRetrieverDeps {
  local: LocalEvidenceSource;
  web: WebEvidenceSource | null;
  /** Persistence target for web evidence; usually the same index the local source reads */
  index: VectorIndex | null;
  config: RetrievalConfig;
  logger?: PipelineLogger;
}

export class HybridRetriever {
  private readonly logger: PipelineLogger;

  constructor(private readonly deps: HybridRetrieverDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  async retrieve(claim: string): Promise<RetrievalResult> {
    const { config } = this.deps;
    const stats: RetrievalStats = {
      localDocs: 0,
      webDocs: 0,
      webSearchTriggered: false,
      webSearchReason: null,
      searchSuccessful: false,
      persistedCount: 0,
    };

    let local: EvidenceItem[];
    try {
      local = selectLocalEvidence(await this.deps.local.lookup(claim, config.localK), config);
    } catch (err) {
      return this.failed(err, stats);
    }
    stats.localDocs = local.length;

    const decision = shouldSearchWeb(local, config);
    stats.webSearchTriggered = decision.search;
    stats.webSearchReason = decision.reason;
    this.logger.info(
      `Local evidence: ${local.length} docs (avg ${decision.summary.avg.toFixed(3)}, max ${decision.summary.max.toFixed(3)}); web search ${decision.search ? `triggered (${decision.reason})` : "not needed"}`,
    );

    let web: EvidenceItem[] = [];
    if (decision.search && this.deps.web) {
      try {
        web = await this.deps.web.lookup(claim, config.webMaxResults);
      } catch (err) {
        return this.failed(err, stats);
      }
      stats.webDocs = web.length;
      if (web.length > 0 && config.persistWebResults) {
        stats.persistedCount = await this.persist(web);
      }
    }

    const evidence = rerankEvidence(claim, [...local, ...web]);
    stats.searchSuccessful = evidence.length > 0;
    const sourceLabel = labelSources(local.length, web.length, decision.search);

    this.logger.info(`Retrieved ${evidence.length} evidence items (${sourceLabel})`);
    return { evidence, sourceLabel, stats };
  }

  /** Best-effort: a failure is logged and reported as 0 persisted. */
  private async persist(web: EvidenceItem[]): Promise<number> {
    const index = this.deps.index;
    if (!index) return 0;
    try {
      const ok = await index.add(toIndexedDocuments(web));
      if (!ok) {
        this.logger.warn(`Index rejected ${web.length} web documents`);
        return 0;
      }
      return web.length;
    } catch (err) {
      this.logger.warn(`Persisting web evidence failed: ${errorMessage(err)}`);
      return 0;
    }
  }

  private failed(err: unknown, stats: RetrievalStats): RetrievalResult {
    const error =
      err instanceof ProviderError
        ? err
        : new ProviderError("retrieval", "index", errorMessage(err), undefined, false, { cause: err });
    this.logger.error(`Retrieval failed (${error.provider}): ${error.message}`);
    return { evidence: [], sourceLabel: "error", stats, error };
  }
}
