export function buildRelevancePrompt(substanceName: string): string {
  return `SYSTEM PROMPT (Relevance Assessment Agent)

You receive the text of pages 1-3 of a PDF. The target active pharmaceutical ingredient is "${substanceName}".

Assess the relevance of this document for regulatory research on that ingredient.

Consider:
- Does it mention the ingredient by name or by a close synonym (salt form, brand name)?
- Is it an official regulatory document (approval, assessment report, product-specific guidance)?
- Does it contain clinical, pharmacokinetic or safety information about the drug?

Answer ONLY with JSON:
{
  "relevance": "high" | "medium" | "low",
  "confidence": <number between 0.0 and 1.0>,
  "reasoning": "<one sentence>"
}`;
}
