/**
 * Answer synthesis (ANSWER stage)
 *
 * Turns sufficient evidence into a verdict, an explanation and citations.
 * Insufficient evidence gets a fixed "cannot verify" answer without a model
 * call. Citations are always projections of evidence items, never taken from
 * model text.
 *
 * @module analyzer/answer-synthesizer
 */

import { ModelInvocationError, errorMessage } from "../errors";
import type { PipelineLogger } from "./debug";
import { silentLogger } from "./debug";
import type { StageModelContext } from "./evidence-evaluator";
import { normalizeLabel, parseLabeledOutput } from "./labeled-output";
import { buildPrompt } from "./prompts/prompt-builder";
import type {
  Citation,
  EvidenceItem,
  EvidenceSummaryEntry,
  SourceLabel,
  SufficiencyVerdict,
  SynthesisResult,
  Verdict,
} from "./types";

const ANSWER_LABELS = {
  verdict: ["VERDICT", "CONCLUSION", "CONCLUSÃO", "VEREDITO"],
  evidence: ["EVIDENCE", "EVIDÊNCIAS"],
  citations: ["CITATIONS", "CITAÇÕES"],
  explanation: ["EXPLANATION", "EXPLICAÇÃO"],
} as const;

const SUMMARY_CHARS = 200;

export function insufficientEvidenceExplanation(claim: string): string {
  return (
    `Could not find enough information to verify the claim "${claim}" in our trusted sources. ` +
    "We recommend consulting primary sources or specialists for more accurate information."
  );
}

/**
 * Map a free-form verdict line onto the closed Verdict set.
 * "Partially true" is checked before "true"; anything unrecognized is INSUFFICIENT.
 */
export function mapVerdict(raw: string | undefined): Verdict {
  if (!raw) return "INSUFFICIENT";
  const line = normalizeLabel(raw.split("\n")[0] ?? "");
  const has = (pattern: RegExp) => pattern.test(line);

  if (has(/\bPARTIAL(LY)?\b|\bPARCIAL(MENTE)?\b|\bMIXED\b/)) return "PARTIALLY_TRUE";
  if (has(/\bINSUFFICIENT\b|\bINSUFICIENTE\b|\bUNVERIFIABLE\b/)) return "INSUFFICIENT";
  if (has(/\bNOT TRUE\b|\bFALSE\b|\bFALS[AO]\b/)) return "FALSE";
  if (has(/\bTRUE\b|\bVERDADEIR[AO]\b/)) return "TRUE";
  return "INSUFFICIENT";
}

/**
 * When a web search contributed, user-facing citations point only at web
 * items; local documents stay as background corroboration.
 */
export function filterCitableEvidence(evidence: EvidenceItem[], sourceLabel: SourceLabel | null): EvidenceItem[] {
  if (sourceLabel === "hybrid" || sourceLabel === "web_only") {
    return evidence.filter((item) => item.origin === "WEB");
  }
  return evidence;
}

export function toCitation(item: EvidenceItem): Citation {
  const citation: Citation = { source: item.source, relevanceScore: item.relevanceScore };
  if (item.url) citation.url = item.url;
  return citation;
}

export function summarizeEvidence(items: EvidenceItem[]): EvidenceSummaryEntry[] {
  return items.map((item) => ({
    content: item.content.length > SUMMARY_CHARS ? item.content.slice(0, SUMMARY_CHARS) + "..." : item.content,
    source: item.source,
  }));
}

export function formatCitations(citations: Citation[]): string {
  if (citations.length === 0) return "No citations available.";
  return citations
    .map((c, i) => {
      const score = c.relevanceScore.toFixed(2);
      return c.url ? `${i + 1}. ${c.source} - ${c.url} (relevance: ${score})` : `${i + 1}. ${c.source} (relevance: ${score})`;
    })
    .join("\n");
}

export function renderEvidence(evidence: EvidenceItem[]): string {
  return evidence
    .map((item, i) =>
      [
        `Evidence ${i + 1}:`,
        `Source: ${item.source}`,
        `URL: ${item.url ?? ""}`,
        `Relevance: ${item.relevanceScore.toFixed(2)}`,
        `Content: ${item.content}`,
      ].join("\n"),
    )
    .join("\n\n");
}

export class AnswerSynthesizer {
  private readonly logger: PipelineLogger;

  constructor(private readonly ctx: StageModelContext) {
    this.logger = ctx.logger ?? silentLogger;
  }

  async synthesize(
    claim: string,
    evidence: EvidenceItem[],
    sufficiency: SufficiencyVerdict,
    sourceLabel: SourceLabel | null,
  ): Promise<SynthesisResult> {
    if (sufficiency.quality === "INSUFFICIENT") {
      return {
        verdict: "INSUFFICIENT",
        explanation: insufficientEvidenceExplanation(claim),
        citations: [],
        evidenceSummary: [],
        modelUsed: false,
      };
    }

    const prompt = buildPrompt("synthesize", { claim, evidence: renderEvidence(evidence) }, this.ctx.provider);
    let response: string;
    try {
      response = await this.ctx.model.invoke(prompt, "synthesize");
    } catch (err) {
      if (err instanceof ModelInvocationError) throw err;
      throw new ModelInvocationError("synthesize", errorMessage(err), { cause: err });
    }

    const fields = parseLabeledOutput(response, ANSWER_LABELS);
    const verdict = mapVerdict(fields.verdict);
    const citable = filterCitableEvidence(evidence, sourceLabel);
    if (citable.length < evidence.length) {
      this.logger.debug(`Citations restricted to ${citable.length} of ${evidence.length} items (${sourceLabel})`);
    }

    this.logger.info(`Answer: ${verdict} with ${citable.length} citations`);
    return {
      verdict,
      explanation: response.trim(),
      citations: citable.map(toCitation),
      evidenceSummary: summarizeEvidence(citable),
      modelUsed: true,
    };
  }
}
