/**
 * Claim Verifier - Type Definitions
 *
 * Types shared by the verification pipeline stages.
 *
 * @module analyzer/types
 */

import type { DocumentOrigin } from "../vector-index";
import type { ClassifiedError } from "../error-classification";

// ============================================================================
// RUNTIME VALIDATION
// ============================================================================

/**
 * Validates a relevance score.
 *
 * Relevance must be a finite number in [0, 1]. Out-of-range values indicate a
 * scoring bug, so this throws instead of clamping.
 */
export function assertValidRelevance(value: number, context?: string): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`Invalid relevance score${context ? ` (${context})` : ""}: ${value} is outside [0, 1]`);
  }
  return value;
}

// ============================================================================
// EVIDENCE
// ============================================================================

export type EvidenceOrigin = DocumentOrigin;

export interface EvidenceItem {
  content: string;
  origin: EvidenceOrigin;
  /** Identity within an evidence set: URL for web items, file path / URL for local ones */
  sourceId: string;
  /** Human-readable source name shown in citations */
  source: string;
  url?: string;
  /** Vector distance (LOCAL) or 0-based result position (WEB) */
  rawScore: number;
  relevanceScore: number;
  /** 1-based, contiguous after every re-rank */
  rank: number;
}

/** Unique by (origin, sourceId), ranks 1..n */
export type EvidenceSet = EvidenceItem[];

export type SourceLabel = "local_only" | "hybrid" | "web_only" | "error";

export interface RetrievalStats {
  localDocs: number;
  webDocs: number;
  webSearchTriggered: boolean;
  webSearchReason: string | null;
  /** False when neither source produced any evidence */
  searchSuccessful: boolean;
  /** Web items handed to the index (0 when persistence is off or failed) */
  persistedCount: number;
}

// ============================================================================
// SUFFICIENCY
// ============================================================================

export const EVIDENCE_QUALITIES = ["SUFFICIENT", "INSUFFICIENT", "CONTRADICTORY"] as const;
export type EvidenceQuality = (typeof EVIDENCE_QUALITIES)[number];

export interface SufficiencyVerdict {
  quality: EvidenceQuality;
  confidence: number;
  reasoning: string;
  /** True for SUFFICIENT and CONTRADICTORY */
  shouldProceed: boolean;
  /** The quality was upgraded from INSUFFICIENT by the relevance-keyword rule */
  escalated: boolean;
}

// ============================================================================
// ANSWER
// ============================================================================

export const VERDICTS = ["TRUE", "FALSE", "PARTIALLY_TRUE", "INSUFFICIENT", "ERROR"] as const;
export type Verdict = (typeof VERDICTS)[number];

export interface Citation {
  source: string;
  url?: string;
  relevanceScore: number;
}

export interface EvidenceSummaryEntry {
  content: string;
  source: string;
}

export interface SynthesisResult {
  verdict: Verdict;
  explanation: string;
  citations: Citation[];
  evidenceSummary: EvidenceSummaryEntry[];
  /** False for the canned insufficient-evidence answer */
  modelUsed: boolean;
}

// ============================================================================
// SAFETY
// ============================================================================

export type SafetyDecision = "APPROVE" | "MODIFY" | "REJECT";
export type RiskLevel = "LOW" | "MEDIUM" | "HIGH";
export const HARM_CATEGORIES = ["legal", "medical", "financial", "violence_hate"] as const;
export type HarmCategory = (typeof HARM_CATEGORIES)[number];

export interface HarmCheck {
  isHarmful: boolean;
  foundKeywords: string[];
  categories: HarmCategory[];
  riskLevel: RiskLevel;
}

export interface SafetyReview {
  decision: SafetyDecision;
  reason: string;
  suggestions: string[];
  disclaimer: string;
  finalAnswer: string;
  isSafe: boolean;
  requiresModification: boolean;
  harmCheck: HarmCheck;
  /** The review model call failed and the decision defaulted to APPROVE */
  reviewFailed: boolean;
}

// ============================================================================
// PIPELINE STATE
// ============================================================================

export const PIPELINE_STAGES = [
  "START",
  "SUPERVISOR",
  "RETRIEVE",
  "SELF_CHECK",
  "ANSWER",
  "SAFETY",
  "DONE",
  "ERROR",
] as const;
export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export interface StageTiming {
  durationMs: number;
}

export interface SupervisorStageResult extends StageTiming {
  valid: boolean;
  claimLength: number;
}

export interface RetrieverStageResult extends StageTiming, RetrievalStats {
  sourceLabel: SourceLabel;
  totalDocs: number;
  keyClaims: string[];
}

export interface SelfCheckStageResult extends StageTiming, SufficiencyVerdict {
  numDocuments: number;
}

export interface AnswerStageResult extends StageTiming {
  verdict: Verdict;
  citationCount: number;
  evidenceSummary: EvidenceSummaryEntry[];
  formattedCitations: string;
  modelUsed: boolean;
}

export interface SafetyStageResult extends StageTiming {
  decision: SafetyDecision;
  reason: string;
  suggestions: string[];
  isSafe: boolean;
  requiresModification: boolean;
  riskLevel: RiskLevel;
  foundKeywords: string[];
  reviewFailed: boolean;
}

export interface ErrorStageResult extends ClassifiedError {
  failedStage: PipelineStage;
}

export interface PerStageResults {
  supervisor?: SupervisorStageResult;
  retriever?: RetrieverStageResult;
  selfCheck?: SelfCheckStageResult;
  answer?: AnswerStageResult;
  safety?: SafetyStageResult;
  error?: ErrorStageResult;
}

/**
 * The single record threaded through the orchestrator for one request.
 */
export interface VerificationState {
  claim: string;
  stage: PipelineStage;
  evidenceSet: EvidenceSet;
  sourceLabel: SourceLabel | null;
  sufficiency: SufficiencyVerdict | null;
  verdict: Verdict | null;
  explanation: string | null;
  citations: Citation[];
  finalAnswer: string | null;
  perStageResults: PerStageResults;
  /** Once set, the state is pinned to the ERROR path */
  errorMessage?: string;
  /** Stages visited, in order */
  trace: PipelineStage[];
}

export interface VerificationResult {
  success: boolean;
  claim: string;
  verdict: Verdict;
  finalAnswer: string;
  citations: Citation[];
  sourceLabel: SourceLabel | null;
  perStageResults: PerStageResults;
  trace: PipelineStage[];
  error?: string;
}
