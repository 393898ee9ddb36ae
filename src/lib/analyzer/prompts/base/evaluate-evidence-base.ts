/**
 * Base prompt template for SELF_CHECK phase (evidence sufficiency)
 *
 * The evaluator is deliberately permissive: evidence on the same topic counts
 * as sufficient even without a direct factual match, since the answer stage
 * combines partial evidence with general domain knowledge.
 */

export function getEvaluateEvidenceBasePrompt(variables: { claim: string; documents: string }): string {
  const { claim, documents } = variables;

  return `You are an evidence analyst for a fact-checking service. Decide whether the documents below are enough to verify the claim.

## CLAIM
"${claim}"

## DOCUMENTS
${documents}

## RULES
1. If the documents are RELEVANT to the topic of the claim, answer SUFFICIENT.
2. Do not require direct evidence: indirect evidence on the same topic is enough.
3. Documents about the same subject (e.g. vaccines, health, climate) count as SUFFICIENT.
4. Use general knowledge together with the documents.
5. Answer CONTRADICTORY only when the documents disagree with each other on the claim.

## EXAMPLES
- Claim "Vaccine causes autism" + documents about "vaccines are safe" = SUFFICIENT
- Claim "Global warming is real" + documents about "climate change" = SUFFICIENT
- Claim "Exercise improves health" + documents about "COVID vaccines" = INSUFFICIENT

## CONSIDER
1. Are the documents about the same general topic as the claim?
2. Do they contain information that supports or contradicts it?
3. Are the sources reliable?

## OUTPUT FORMAT
DECISION: [SUFFICIENT/INSUFFICIENT/CONTRADICTORY]
CONFIDENCE: [0.0-1.0]
REASONING: [detailed explanation]`;
}
