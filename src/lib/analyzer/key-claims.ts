/**
 * Key statement extraction from retrieved evidence.
 *
 * Optional enrichment of the RETRIEVE stage; any failure yields [].
 *
 * @module analyzer/key-claims
 */

import { errorMessage } from "../errors";
import type { PipelineLogger } from "./debug";
import { silentLogger } from "./debug";
import type { StageModelContext } from "./evidence-evaluator";
import { buildPrompt } from "./prompts/prompt-builder";
import type { EvidenceItem } from "./types";

const CONTENT_CHARS = 2000;

/** One statement per non-empty line; bullets and numbering are stripped. */
export function parseKeyClaims(text: string, maxClaims: number): string[] {
  const claims: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.replace(/^\s*(?:[-*•]+|\d+[.)])\s*/, "").trim();
    if (!line || line.endsWith(":")) continue;
    claims.push(line);
    if (claims.length >= maxClaims) break;
  }
  return claims;
}

export class KeyClaimExtractor {
  private readonly logger: PipelineLogger;

  constructor(
    private readonly ctx: StageModelContext,
    private readonly maxClaims = 5,
  ) {
    this.logger = ctx.logger ?? silentLogger;
  }

  async extract(claim: string, evidence: EvidenceItem[]): Promise<string[]> {
    if (evidence.length === 0) return [];

    const content = evidence
      .map((item) => item.content)
      .join("\n\n")
      .slice(0, CONTENT_CHARS);
    try {
      const prompt = buildPrompt("extract", { claim, content, maxClaims: this.maxClaims });
      const claims = parseKeyClaims(await this.ctx.model.invoke(prompt, "extract"), this.maxClaims);
      this.logger.info(`Extracted ${claims.length} key statements`);
      return claims;
    } catch (err) {
      this.logger.warn(`Key statement extraction failed: ${errorMessage(err)}`);
      return [];
    }
  }
}
