/**
 * Base prompt template for key statement extraction from retrieved evidence
 */

export function getKeyClaimsBasePrompt(variables: { claim: string; content: string; maxClaims: number }): string {
  const { claim, content, maxClaims } = variables;

  return `Given the query "${claim}" and the documents below, extract the main statements or facts relevant to the query.

## DOCUMENTS
${content}

Return at most ${maxClaims} statements, one per line, without numbering or bullets.`;
}
