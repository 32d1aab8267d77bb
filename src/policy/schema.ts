import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { RISK_LEVELS } from '../analysis/types.js';

// ─── Policy Source ───────────────────────────────────────────
// The persisted policies.json: a JSON array of rules. Severity is metadata only,
// so any string passes through.

export const PolicyRuleSchema = z.object({
    clause_name: z.string(),
    policy_rule: z.string(),
    risk_level_if_violated: z.string().default('MEDIUM'),
    importance: z.number().finite().nonnegative().default(1.0),
});

export const PolicyListSchema = z.array(PolicyRuleSchema);

export type PolicyRule = z.output<typeof PolicyRuleSchema>;

// ─── Generated Policy Document ───────────────────────────────

/** Eight hex characters, enough to tell generated rules apart in review. */
export function newRuleId(): string {
    return randomUUID().replace(/-/g, '').slice(0, 8);
}

const SeveritySchema = z.string().toUpperCase().pipe(z.enum(RISK_LEVELS));

export const GeneratedRuleSchema = z.object({
    rule_id: z.string().min(1).default(newRuleId),
    clause_name: z.string().min(1),
    policy_rule: z.string().min(1),
    explanation: z.string().default(''),
    severity: SeveritySchema.default('MEDIUM'),
    importance: z.coerce.number().finite().nonnegative().default(1.0),
    examples: z.array(z.string()).default([]),
    recommended_fix: z.string().default(''),
    citation: z.string().default('SECTION'),
    confidence: z.number().min(0).max(1).default(0.8),
});

export const GeneratedPolicySchema = z.object({
    policy_id: z.string().min(1),
    source_document: z.string(),
    generated_at: z.string().min(1),
    rules: z.array(GeneratedRuleSchema),
    summary: z.string().default(''),
    metadata: z
        .object({
            generator: z.string(),
            model: z.string().optional(),
        })
        .passthrough(),
});

export type GeneratedRule = z.output<typeof GeneratedRuleSchema>;
export type GeneratedPolicy = z.output<typeof GeneratedPolicySchema>;
