/**
 * Output Format Guidance - provider-specific reminders for labeled-line answers
 *
 * Stages parse model answers as `LABEL: value` lines. Each provider drifts from
 * that format differently (markdown headings, JSON, preambles); these short
 * suffixes counter the known tendencies.
 */

import type { LLMProviderType } from "../../../config-schemas";

export type ProviderType = LLMProviderType;

export function getOutputFormatGuidance(provider: ProviderType): string {
  switch (provider) {
    case "anthropic":
      return `
## FORMAT (Claude)
- Start directly with the first label; no preamble.
- One label per line, exactly as written in OUTPUT FORMAT.`;

    case "openai":
      return `
## FORMAT (GPT)
- Plain text only: no JSON, no code fences.
- Each label starts its own line, followed by a colon.`;

    case "google":
      return `
## FORMAT (Gemini)
- Keep the explanation under 300 words.
- Do not turn labels into markdown headings or tables.`;

    case "mistral":
      return `
## FORMAT (Mistral)
- Follow the OUTPUT FORMAT labels exactly, in the same order.
- Do not translate the labels.`;
  }
}
