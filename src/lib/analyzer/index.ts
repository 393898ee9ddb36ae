/**
 * Claim Verifier - Module Index
 *
 * Main entry point. Re-exports the public types, the Verifier facade and the
 * pipeline building blocks for callers that wire their own collaborators.
 *
 * @module analyzer
 */

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type {
  EvidenceItem,
  EvidenceOrigin,
  EvidenceSet,
  SourceLabel,
  RetrievalStats,
  EvidenceQuality,
  SufficiencyVerdict,
  Verdict,
  Citation,
  EvidenceSummaryEntry,
  SynthesisResult,
  SafetyDecision,
  RiskLevel,
  HarmCheck,
  SafetyReview,
  PipelineStage,
  PerStageResults,
  VerificationState,
  VerificationResult,
} from "./types";

export type { AppConfig } from "../config-schemas";
export type { VectorIndex, IndexedDocument, NeighborMatch, DocumentMetadata } from "../vector-index";
export type { WebSearch, WebSearchResult, WebSearchOptions } from "../web-search";
export type { LanguageModel, ModelTask } from "./llm";
export type { PipelineLogger } from "./debug";

// ============================================================================
// FACADE
// ============================================================================

export {
  Verifier,
  createVerifier,
  type CuratedDocument,
  type AddDocumentsResult,
  type VerifierStatus,
  type VerifierDeps,
} from "./verifier";

// ============================================================================
// CONFIG & LOGGING
// ============================================================================

export { loadAppConfig, type ResolvedAppConfig } from "../config-loader";
export { DEFAULT_APP_CONFIG } from "../config-schemas";
export { createDebugLogger, silentLogger } from "./debug";

// ============================================================================
// ERRORS
// ============================================================================

export { ProviderError, ModelInvocationError, EmptyClaimError, ConfigError } from "../errors";
export { classifyError, type ClassifiedError } from "../error-classification";

// ============================================================================
// PIPELINE BUILDING BLOCKS
// ============================================================================

export { VerificationPipeline, nextStage } from "./verification-pipeline";
export { HybridRetriever, shouldSearchWeb } from "./hybrid-retriever";
export { LocalEvidenceSource, WebEvidenceSource } from "./evidence-sources";
export { EvidenceEvaluator } from "./evidence-evaluator";
export { AnswerSynthesizer, formatCitations } from "./answer-synthesizer";
export { SafetyReviewer, STANDARD_DISCLAIMER } from "./safety-review";
export { KeyClaimExtractor } from "./key-claims";
export { localDistanceToRelevance, webRankToRelevance, rerankEvidence } from "./score-normalization";
export { SqliteVectorStore } from "../vector-store-sqlite";
export { createWebSearch } from "../web-search";
