/**
 * Prompt Builder - Composes prompts from base templates + provider output guidance
 *
 * Every model-backed stage asks for labeled lines; the base template carries
 * the task, and the provider suffix keeps the answer parseable.
 */

import { getEvaluateEvidenceBasePrompt } from "./base/evaluate-evidence-base";
import { getSynthesizeAnswerBasePrompt } from "./base/synthesize-answer-base";
import { getSafetyReviewBasePrompt } from "./base/safety-review-base";
import { getKeyClaimsBasePrompt } from "./base/key-claims-base";
import { getOutputFormatGuidance, type ProviderType } from "./config-adaptations/output-format";

export type { ProviderType } from "./config-adaptations/output-format";

export type PromptVariables = {
  evaluate: { claim: string; documents: string };
  synthesize: { claim: string; evidence: string };
  review: { claim: string; verdict: string; answer: string };
  extract: { claim: string; content: string; maxClaims: number };
};

export type PromptTask = keyof PromptVariables;

/**
 * Build the full prompt for `task`. Without a provider only the base template
 * is returned.
 */
export function buildPrompt<T extends PromptTask>(
  task: T,
  variables: PromptVariables[T],
  provider?: ProviderType,
): string {
  const base = renderBase(task, variables);
  // Key-claim extraction asks for bare lines, not labels
  if (!provider || task === "extract") return base;
  return base + "\n" + getOutputFormatGuidance(provider);
}

function renderBase<T extends PromptTask>(task: T, variables: PromptVariables[T]): string {
  const all: { [K in PromptTask]: (v: PromptVariables[K]) => string } = {
    evaluate: getEvaluateEvidenceBasePrompt,
    synthesize: getSynthesizeAnswerBasePrompt,
    review: getSafetyReviewBasePrompt,
    extract: getKeyClaimsBasePrompt,
  };
  const render: (v: PromptVariables[T]) => string = all[task];
  return render(variables);
}
