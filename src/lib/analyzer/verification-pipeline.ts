/**
 * Verification pipeline (orchestrator)
 *
 * Explicit state machine:
 *
 *   START → SUPERVISOR → RETRIEVE → SELF_CHECK → ANSWER → SAFETY → DONE
 *                                      └─(insufficient)─────────────→ DONE
 *   any stage ──(error)──→ ERROR
 *
 * Stage handlers mutate the single VerificationState of the request; the next
 * stage is chosen by a pure function of that state. Once `errorMessage` is
 * set the state is pinned to ERROR, and ERROR overwrites `finalAnswer`.
 *
 * @module analyzer/verification-pipeline
 */

import { classifyError } from "../error-classification";
import { EmptyClaimError, errorMessage } from "../errors";
import type { AnswerSynthesizer } from "./answer-synthesizer";
import { formatCitations } from "./answer-synthesizer";
import type { PipelineLogger } from "./debug";
import { silentLogger } from "./debug";
import type { EvidenceEvaluator } from "./evidence-evaluator";
import type { RetrievalResult } from "./hybrid-retriever";
import type { KeyClaimExtractor } from "./key-claims";
import type { SafetyReviewer } from "./safety-review";
import { appendDisclaimer } from "./safety-review";
import {
  PIPELINE_STAGES,
  type PipelineStage,
  type VerificationResult,
  type VerificationState,
} from "./types";

type ActiveStage = Exclude<PipelineStage, "DONE" | "ERROR">;
type StageHandler = (state: VerificationState, elapsed: () => number) => Promise<void>;

export interface Retriever {
  retrieve(claim: string): Promise<RetrievalResult>;
}

export interface VerificationPipelineDeps {
  retriever: Retriever;
  evaluator: EvidenceEvaluator;
  synthesizer: AnswerSynthesizer;
  safety: SafetyReviewer;
  /** Enables key statement extraction during RETRIEVE */
  keyClaims?: KeyClaimExtractor | null;
  logger?: PipelineLogger;
}

// ============================================================================
// TRANSITIONS
// ============================================================================

const TRANSITIONS: Record<ActiveStage, (state: VerificationState) => PipelineStage> = {
  START: () => "SUPERVISOR",
  SUPERVISOR: () => "RETRIEVE",
  RETRIEVE: () => "SELF_CHECK",
  SELF_CHECK: (state) => (state.sufficiency?.shouldProceed ? "ANSWER" : "DONE"),
  ANSWER: () => "SAFETY",
  SAFETY: () => "DONE",
};

export function isTerminal(stage: PipelineStage): stage is "DONE" | "ERROR" {
  return stage === "DONE" || stage === "ERROR";
}

/**
 * Next stage for `state`. Terminal stages map to themselves; a recorded error
 * always leads to ERROR.
 */
export function nextStage(state: VerificationState): PipelineStage {
  const { stage } = state;
  if (isTerminal(stage)) return stage;
  if (state.errorMessage !== undefined) return "ERROR";
  return TRANSITIONS[stage](state);
}

export function createInitialState(claim: string): VerificationState {
  return {
    claim,
    stage: "START",
    evidenceSet: [],
    sourceLabel: null,
    sufficiency: null,
    verdict: null,
    explanation: null,
    citations: [],
    finalAnswer: null,
    perStageResults: {},
    trace: ["START"],
  };
}

export function failureMessage(error: string): string {
  return `Sorry, the claim could not be verified because of an internal error: ${error}. Please try again later.`;
}

// ============================================================================
// PIPELINE
// ============================================================================

export class VerificationPipeline {
  private readonly logger: PipelineLogger;
  private readonly handlers: Record<ActiveStage, StageHandler>;

  constructor(private readonly deps: VerificationPipelineDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.handlers = {
      START: async () => {},
      SUPERVISOR: (state, elapsed) => this.supervise(state, elapsed),
      RETRIEVE: (state, elapsed) => this.retrieve(state, elapsed),
      SELF_CHECK: (state, elapsed) => this.selfCheck(state, elapsed),
      ANSWER: (state, elapsed) => this.answer(state, elapsed),
      SAFETY: (state, elapsed) => this.review(state, elapsed),
    };
  }

  async verify(claim: string): Promise<VerificationResult> {
    const state = createInitialState(claim);
    this.logger.info(`Verifying claim: "${claim.substring(0, 100)}"`);

    // Every stage is visited at most once.
    for (let step = 0; step < PIPELINE_STAGES.length; step++) {
      const stage = state.stage;
      if (isTerminal(stage)) break;
      const startedAt = Date.now();
      try {
        await this.handlers[stage](state, () => Date.now() - startedAt);
      } catch (err) {
        this.recordError(state, stage, err);
      }
      state.stage = nextStage(state);
      state.trace.push(state.stage);
    }

    if (state.stage === "ERROR") {
      this.finalizeError(state);
    }

    return this.toResult(state);
  }

  private async supervise(state: VerificationState, elapsed: () => number): Promise<void> {
    const valid = state.claim.trim().length > 0;
    state.perStageResults.supervisor = { valid, claimLength: state.claim.length, durationMs: elapsed() };
    if (!valid) throw new EmptyClaimError();
  }

  private async retrieve(state: VerificationState, elapsed: () => number): Promise<void> {
    const result = await this.deps.retriever.retrieve(state.claim);
    state.sourceLabel = result.sourceLabel;

    const keyClaims =
      !result.error && this.deps.keyClaims ? await this.deps.keyClaims.extract(state.claim, result.evidence) : [];

    state.perStageResults.retriever = {
      ...result.stats,
      sourceLabel: result.sourceLabel,
      totalDocs: result.evidence.length,
      keyClaims,
      durationMs: elapsed(),
    };
    if (result.error) throw result.error;

    state.evidenceSet = result.evidence;
    if (!result.stats.searchSuccessful) {
      this.logger.info("No evidence found in either source; continuing to insufficient-evidence answer");
    }
  }

  private async selfCheck(state: VerificationState, elapsed: () => number): Promise<void> {
    const sufficiency = await this.deps.evaluator.evaluate(state.claim, state.evidenceSet);
    state.sufficiency = sufficiency;
    state.perStageResults.selfCheck = { ...sufficiency, numDocuments: state.evidenceSet.length, durationMs: elapsed() };

    if (sufficiency.shouldProceed) return;

    const canned = await this.deps.synthesizer.synthesize(state.claim, state.evidenceSet, sufficiency, state.sourceLabel);
    state.verdict = canned.verdict;
    state.explanation = canned.explanation;
    state.citations = canned.citations;
    state.finalAnswer = appendDisclaimer(canned.explanation);
  }

  private async answer(state: VerificationState, elapsed: () => number): Promise<void> {
    const { sufficiency } = state;
    if (!sufficiency) throw new Error("ANSWER reached without a sufficiency verdict");

    const result = await this.deps.synthesizer.synthesize(state.claim, state.evidenceSet, sufficiency, state.sourceLabel);
    state.verdict = result.verdict;
    state.explanation = result.explanation;
    state.citations = result.citations;
    state.perStageResults.answer = {
      verdict: result.verdict,
      citationCount: result.citations.length,
      evidenceSummary: result.evidenceSummary,
      formattedCitations: formatCitations(result.citations),
      modelUsed: result.modelUsed,
      durationMs: elapsed(),
    };
  }

  private async review(state: VerificationState, elapsed: () => number): Promise<void> {
    const { verdict, explanation } = state;
    if (!verdict || explanation === null) throw new Error("SAFETY reached without a synthesized answer");

    const review = await this.deps.safety.review(state.claim, explanation, verdict);
    state.finalAnswer = review.finalAnswer;
    state.perStageResults.safety = {
      decision: review.decision,
      reason: review.reason,
      suggestions: review.suggestions,
      isSafe: review.isSafe,
      requiresModification: review.requiresModification,
      riskLevel: review.harmCheck.riskLevel,
      foundKeywords: review.harmCheck.foundKeywords,
      reviewFailed: review.reviewFailed,
      durationMs: elapsed(),
    };
  }

  private recordError(state: VerificationState, stage: PipelineStage, err: unknown): void {
    const message = errorMessage(err);
    this.logger.error(`Stage ${stage} failed: ${message}`, err);
    // The first error wins; later ones cannot replace it.
    if (state.errorMessage !== undefined) return;
    state.errorMessage = message;
    state.perStageResults.error = { ...classifyError(err), failedStage: stage };
  }

  private finalizeError(state: VerificationState): void {
    const message = state.errorMessage ?? "unknown error";
    state.verdict = "ERROR";
    state.citations = [];
    state.finalAnswer = failureMessage(message);
  }

  private toResult(state: VerificationState): VerificationResult {
    const success = state.stage === "DONE" && state.errorMessage === undefined;
    const result: VerificationResult = {
      success,
      claim: state.claim,
      verdict: state.verdict ?? (success ? "INSUFFICIENT" : "ERROR"),
      finalAnswer: state.finalAnswer ?? "",
      citations: state.citations,
      sourceLabel: state.sourceLabel,
      perStageResults: state.perStageResults,
      trace: state.trace,
    };
    if (state.errorMessage !== undefined) result.error = state.errorMessage;
    this.logger.info(`Verification finished: ${result.verdict} (success=${success})`);
    return result;
  }
}
