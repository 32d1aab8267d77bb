/**
 * Prompt template for model-assisted policy generation.
 * The schema block mirrors GeneratedPolicySchema; keep the two in step.
 */

export const POLICY_SYSTEM_PROMPT =
    'You are a legal policy generator. Always respond with one valid JSON object only. No markdown, no explanation.';

export function buildPolicyGenerationPrompt(contractExcerpts: string): string {
    return `Derive a risk policy library from the contract excerpts below.

INSTRUCTIONS:
1. Write one rule per clause type that carries business risk (confidentiality, liability, data use, termination, indemnity, availability, security, refunds, governing law, dispute resolution).
2. "policy_rule" states the requirement the contract must meet, in one sentence.
3. "severity" is the risk if the requirement is violated: LOW, MEDIUM or HIGH.
4. "importance" is a business priority multiplier between 0.5 and 2.0.
5. "confidence" is your confidence in the rule, between 0 and 1.

OUTPUT FORMAT (JSON object):
{
  "policy_id": "<string>",
  "source_document": "<string>",
  "generated_at": "<ISO-8601 timestamp>",
  "rules": [
    {
      "rule_id": "<string>",
      "clause_name": "<short clause type name>",
      "policy_rule": "<requirement>",
      "explanation": "<what the excerpts say>",
      "severity": "<LOW|MEDIUM|HIGH>",
      "importance": 1.0,
      "examples": [],
      "recommended_fix": "<compliant wording>",
      "citation": "<section reference>",
      "confidence": 0.85
    }
  ],
  "summary": "<one paragraph>",
  "metadata": { "generator": "assisted" }
}

CONTRACT EXCERPTS:
---
${contractExcerpts}
---

Return ONLY the JSON object.`;
}
