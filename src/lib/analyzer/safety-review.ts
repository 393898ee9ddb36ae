/**
 * Safety review (SAFETY stage)
 *
 * Keyword scan for advice categories the service must not give, plus a model
 * review deciding APPROVE / MODIFY / REJECT. The model review fails open: any
 * failure there approves the answer. The standard disclaimer is appended in
 * every case.
 *
 * @module analyzer/safety-review
 */

import { errorMessage } from "../errors";
import type { PipelineLogger } from "./debug";
import { silentLogger } from "./debug";
import type { StageModelContext } from "./evidence-evaluator";
import { leadingToken, parseLabeledOutput, parseList } from "./labeled-output";
import { buildPrompt } from "./prompts/prompt-builder";
import { HARM_CATEGORIES } from "./types";
import type { HarmCategory, HarmCheck, RiskLevel, SafetyDecision, SafetyReview, Verdict } from "./types";

export const STANDARD_DISCLAIMER = `⚠️ **IMPORTANT DISCLAIMER** ⚠️

This information is based on publicly available data and does not replace consulting primary sources or specialists. Its purpose is an informative analysis of the sources available.

- We do not offer specific legal, medical or financial advice
- Always consult official sources and specialists
- The information may be outdated or incomplete
- Use this tool as a starting point for further investigation`;

export const SAFETY_NOTE =
  "⚠️ **SAFETY NOTICE**: This answer may contain information that requires consulting a specialist.";

export const WITHHELD_NOTICE =
  "This answer was withheld by the safety review. Please consult primary sources or specialists about this claim.";

const HARM_KEYWORDS: Record<HarmCategory, readonly string[]> = {
  legal: ["legal advice", "lawyer", "attorney", "lawsuit", "conselho legal", "advogado", "processo judicial"],
  medical: [
    "diagnosis",
    "medical treatment",
    "medication",
    "prescription",
    "diagnóstico",
    "tratamento médico",
    "medicamento",
  ],
  financial: [
    "investment",
    "buy stocks",
    "financial advice",
    "investimento",
    "compra de ações",
    "conselho financeiro",
  ],
  violence_hate: ["violence", "hate", "discrimination", "violência", "ódio", "discriminação"],
};

const REVIEW_LABELS = {
  decision: ["DECISION", "DECISÃO"],
  reason: ["REASON", "MOTIVO", "REASONING", "JUSTIFICATION"],
  suggestions: ["SUGGESTIONS", "SUGESTÕES"],
} as const;

const DECISION_TOKENS: Record<string, SafetyDecision> = {
  APPROVE: "APPROVE",
  APPROVED: "APPROVE",
  APROVAR: "APPROVE",
  APROVADO: "APPROVE",
  MODIFY: "MODIFY",
  MODIFICAR: "MODIFY",
  REJECT: "REJECT",
  REJECTED: "REJECT",
  REJEITAR: "REJECT",
};

const DEFAULT_REASON = "Answer approved";

function fold(text: string): string {
  return text.normalize("NFD").replace(/\p{M}/gu, "").toLowerCase();
}

function containsWord(haystack: string, keyword: string): boolean {
  const escaped = fold(keyword).replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`(^|[^\\p{L}])${escaped}`, "u").test(haystack);
}

export function riskLevelFor(keywordCount: number): RiskLevel {
  if (keywordCount > 2) return "HIGH";
  return keywordCount > 0 ? "MEDIUM" : "LOW";
}

export function checkHarmfulContent(text: string): HarmCheck {
  const folded = fold(text);
  const foundKeywords: string[] = [];
  const categories: HarmCategory[] = [];

  for (const category of HARM_CATEGORIES) {
    const hits = HARM_KEYWORDS[category].filter((keyword: string) => containsWord(folded, keyword));
    if (hits.length > 0) {
      categories.push(category);
      foundKeywords.push(...hits);
    }
  }

  return {
    isHarmful: foundKeywords.length > 0,
    foundKeywords,
    categories,
    riskLevel: riskLevelFor(foundKeywords.length),
  };
}

export interface ParsedSafetyDecision {
  decision: SafetyDecision;
  reason: string;
  suggestions: string[];
}

/** Total parse; unrecognized decisions default to APPROVE. */
export function parseSafetyReview(text: string): ParsedSafetyDecision {
  const fields = parseLabeledOutput(text, REVIEW_LABELS);
  const token = leadingToken(fields.decision);
  return {
    decision: (token ? DECISION_TOKENS[token] : undefined) ?? "APPROVE",
    reason: fields.reason ?? DEFAULT_REASON,
    suggestions: parseList(fields.suggestions),
  };
}

export function appendDisclaimer(text: string): string {
  return `${text}\n\n${STANDARD_DISCLAIMER}`;
}

/**
 * REJECT replaces the body with the withheld notice. The safety note is added
 * for keyword hits and for MODIFY. The disclaimer always closes the answer.
 */
export function composeFinalAnswer(answer: string, decision: SafetyDecision, harm: HarmCheck): string {
  const parts = [decision === "REJECT" ? WITHHELD_NOTICE : answer];
  if (harm.isHarmful || decision === "MODIFY") parts.push(SAFETY_NOTE);
  parts.push(STANDARD_DISCLAIMER);
  return parts.join("\n\n");
}

export class SafetyReviewer {
  private readonly logger: PipelineLogger;

  constructor(private readonly ctx: StageModelContext) {
    this.logger = ctx.logger ?? silentLogger;
  }

  async review(claim: string, answer: string, verdict: Verdict): Promise<SafetyReview> {
    const harmCheck = checkHarmfulContent(answer);
    if (harmCheck.isHarmful) {
      this.logger.warn(`Answer mentions sensitive topics (${harmCheck.riskLevel})`, harmCheck.foundKeywords);
    }

    let parsed: ParsedSafetyDecision;
    let reviewFailed = false;
    try {
      const prompt = buildPrompt("review", { claim, verdict, answer }, this.ctx.provider);
      parsed = parseSafetyReview(await this.ctx.model.invoke(prompt, "review"));
    } catch (err) {
      this.logger.warn(`Safety review unavailable, approving: ${errorMessage(err)}`);
      parsed = { decision: "APPROVE", reason: `Safety review unavailable: ${errorMessage(err)}`, suggestions: [] };
      reviewFailed = true;
    }

    const { decision } = parsed;
    this.logger.info(`Safety decision: ${decision}`);
    return {
      ...parsed,
      disclaimer: STANDARD_DISCLAIMER,
      finalAnswer: composeFinalAnswer(answer, decision, harmCheck),
      isSafe: decision === "APPROVE" || decision === "MODIFY",
      requiresModification: decision === "MODIFY",
      harmCheck,
      reviewFailed,
    };
  }
}
