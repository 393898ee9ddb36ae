/**
 * Evidence sufficiency evaluation (SELF_CHECK stage)
 *
 * Judges whether the retrieved evidence is enough to answer. Empty evidence
 * short-circuits without a model call. Unparsable model output resolves to
 * INSUFFICIENT / 0.5; a failed model call propagates as ModelInvocationError.
 *
 * @module analyzer/evidence-evaluator
 */

import { ModelInvocationError, errorMessage } from "../errors";
import type { PipelineLogger } from "./debug";
import { silentLogger } from "./debug";
import { leadingToken, parseConfidence, parseLabeledOutput } from "./labeled-output";
import type { LanguageModel } from "./llm";
import { buildPrompt, type ProviderType } from "./prompts/prompt-builder";
import type { EvidenceItem, EvidenceQuality, SufficiencyVerdict } from "./types";

export interface StageModelContext {
  model: LanguageModel;
  /** Adds provider-specific format guidance to prompts */
  provider?: ProviderType;
  logger?: PipelineLogger;
}

const EVALUATION_LABELS = {
  decision: ["DECISION", "DECISÃO"],
  confidence: ["CONFIDENCE", "CONFIANÇA"],
  reasoning: ["REASONING", "JUSTIFICATION", "JUSTIFICATIVA", "REASON", "MOTIVO"],
} as const;

const DECISION_TOKENS: Record<string, EvidenceQuality> = {
  SUFFICIENT: "SUFFICIENT",
  SUFICIENTE: "SUFFICIENT",
  INSUFFICIENT: "INSUFFICIENT",
  INSUFICIENTE: "INSUFFICIENT",
  CONTRADICTORY: "CONTRADICTORY",
  CONTRADITORIO: "CONTRADICTORY",
  CONTRADITORIA: "CONTRADICTORY",
};

export const DEFAULT_CONFIDENCE = 0.5;
export const DEFAULT_REASONING = "The evaluation response could not be parsed";
export const NO_EVIDENCE_REASONING = "No documents found";

const ESCALATION_MIN_CONFIDENCE = 0.6;
const RELEVANCE_KEYWORDS = ["relevant", "related", "topic", "similar", "relevante", "relacionado", "topico", "assunto"];
const RELEVANCE_PATTERN = new RegExp(`(^|[^\\p{L}])(${RELEVANCE_KEYWORDS.join("|")})`, "u");

function stripAccents(text: string): string {
  return text.normalize("NFD").replace(/\p{M}/gu, "").toLowerCase();
}

export function mentionsRelevance(reasoning: string): boolean {
  return RELEVANCE_PATTERN.test(stripAccents(reasoning));
}

export function isProceedQuality(quality: EvidenceQuality): boolean {
  return quality === "SUFFICIENT" || quality === "CONTRADICTORY";
}

/**
 * Total parse of the evaluator's answer.
 *
 * An unrecognized or missing decision yields INSUFFICIENT with the default
 * confidence regardless of the other lines. INSUFFICIENT with confidence above
 * 0.6 and a reasoning that talks about relevance is upgraded to SUFFICIENT.
 */
export function parseEvaluation(text: string): SufficiencyVerdict {
  const fields = parseLabeledOutput(text, EVALUATION_LABELS);
  const token = leadingToken(fields.decision);
  const decided = token ? DECISION_TOKENS[token] : undefined;
  const reasoning = fields.reasoning ?? DEFAULT_REASONING;

  if (!decided) {
    return {
      quality: "INSUFFICIENT",
      confidence: DEFAULT_CONFIDENCE,
      reasoning,
      shouldProceed: false,
      escalated: false,
    };
  }

  const confidence = parseConfidence(fields.confidence) ?? DEFAULT_CONFIDENCE;
  let quality = decided;
  let escalated = false;
  if (quality === "INSUFFICIENT" && confidence > ESCALATION_MIN_CONFIDENCE && mentionsRelevance(reasoning)) {
    quality = "SUFFICIENT";
    escalated = true;
  }

  return { quality, confidence, reasoning, shouldProceed: isProceedQuality(quality), escalated };
}

/**
 * Numbered document list with each content cut to `previewChars`.
 */
export function renderDocumentPreviews(evidence: EvidenceItem[], previewChars: number): string {
  return evidence
    .map((item, i) => {
      const lines = [`Document ${i + 1}:`, `Source: ${item.source}`];
      if (item.url) lines.push(`URL: ${item.url}`);
      const preview = item.content.length > previewChars ? item.content.slice(0, previewChars) + "..." : item.content;
      lines.push(`Content: ${preview}`);
      return lines.join("\n");
    })
    .join("\n\n");
}

export class EvidenceEvaluator {
  private readonly logger: PipelineLogger;

  constructor(
    private readonly ctx: StageModelContext,
    private readonly previewChars = 500,
  ) {
    this.logger = ctx.logger ?? silentLogger;
  }

  async evaluate(claim: string, evidence: EvidenceItem[]): Promise<SufficiencyVerdict> {
    if (evidence.length === 0) {
      this.logger.info("No evidence to evaluate; skipping model call");
      return {
        quality: "INSUFFICIENT",
        confidence: 0,
        reasoning: NO_EVIDENCE_REASONING,
        shouldProceed: false,
        escalated: false,
      };
    }

    const prompt = buildPrompt(
      "evaluate",
      { claim, documents: renderDocumentPreviews(evidence, this.previewChars) },
      this.ctx.provider,
    );

    let response: string;
    try {
      response = await this.ctx.model.invoke(prompt, "evaluate");
    } catch (err) {
      if (err instanceof ModelInvocationError) throw err;
      throw new ModelInvocationError("evaluate", errorMessage(err), { cause: err });
    }

    const verdict = parseEvaluation(response);
    this.logger.info(
      `Self-check: ${verdict.quality} (confidence ${verdict.confidence}${verdict.escalated ? ", escalated" : ""})`,
    );
    return verdict;
  }
}
