import type { RiskLevel, Section } from '../analysis/types.js';
import { createLogger } from '../lib/logger.js';
import type { PolicyGenerator } from './generator.js';
import { newRuleId, type GeneratedPolicy, type GeneratedRule } from './schema.js';

const log = createLogger('policy.deterministic');

// ─── Types ───────────────────────────────────────────────────

interface Assessment {
    explanation: string;
    severity: RiskLevel;
    importance: number;
    confidence: number;
}

interface RuleTemplate {
    clause_name: string;
    policy_rule: string;
    recommended_fix: string;
    assess: (text: string) => Assessment;
}

export interface DeterministicGeneratorOptions {
    now?: () => Date;
    newId?: () => string;
}

// ─── Rule Templates ──────────────────────────────────────────
// `text` is the whole contract, lower-cased. Each template always yields a rule;
// only severity, importance and confidence depend on what the contract says.

const CONFIDENTIALITY_TERM = /confidenti.*?(\d+)\s*years?/;

const RULE_TEMPLATES: readonly RuleTemplate[] = [
    {
        clause_name: 'Confidentiality Term',
        policy_rule: 'Confidentiality obligations must last at least 3 years.',
        recommended_fix: 'Confidentiality obligations survive for 3 years after termination.',
        assess: (text) => {
            const match = CONFIDENTIALITY_TERM.exec(text);
            if (!match?.[1]) {
                return { explanation: 'No confidentiality duration found.', severity: 'MEDIUM', importance: 1.0, confidence: 0.75 };
            }
            const years = parseInt(match[1], 10);
            return years < 3
                ? { explanation: `Confidentiality lasts ${years} year(s), below the 3 year minimum.`, severity: 'MEDIUM', importance: 1.0, confidence: 0.9 }
                : { explanation: `Confidentiality lasts ${years} year(s).`, severity: 'LOW', importance: 0.8, confidence: 0.9 };
        },
    },
    {
        clause_name: 'Liability Cap',
        policy_rule: 'Liability cap must not exceed 1.5x the total fees paid.',
        recommended_fix: 'Aggregate liability is limited to 1.5x the fees paid.',
        assess: (text) => {
            if (!text.includes('liability')) {
                return { explanation: 'No liability clause found.', severity: 'HIGH', importance: 1.5, confidence: 0.75 };
            }
            return text.includes('1.5')
                ? { explanation: 'Liability appears capped at 1.5x.', severity: 'LOW', importance: 1.0, confidence: 0.85 }
                : { explanation: 'No numeric liability cap found.', severity: 'HIGH', importance: 1.5, confidence: 0.8 };
        },
    },
    {
        clause_name: 'Data Sale Prohibition',
        policy_rule: 'Provider must not sell or commercialize Client Data.',
        recommended_fix: 'Provider shall not sell, license or commercialize Client Data.',
        assess: (text) =>
            text.includes('sell') || text.includes('commercial')
                ? { explanation: 'Contract allows client data to be sold or commercialized.', severity: 'HIGH', importance: 1.5, confidence: 0.9 }
                : { explanation: 'No data sale language found.', severity: 'LOW', importance: 0.8, confidence: 0.7 },
    },
    {
        clause_name: 'Security Responsibility',
        policy_rule: 'Provider must protect Client Data with appropriate safeguards.',
        recommended_fix: 'Provider implements encryption and access controls for Client Data.',
        assess: (text) =>
            text.includes('encrypt') || text.includes('security')
                ? { explanation: 'Security obligations mentioned.', severity: 'LOW', importance: 1.0, confidence: 0.8 }
                : { explanation: 'No security obligations found.', severity: 'HIGH', importance: 1.5, confidence: 0.85 },
    },
    {
        clause_name: 'Governing Law Validity',
        policy_rule: 'Agreement must name a recognized governing jurisdiction.',
        recommended_fix: 'This Agreement is governed by the laws of a named state or country.',
        assess: (text) =>
            text.includes('governed by')
                ? { explanation: 'Governing law stated.', severity: 'LOW', importance: 1.0, confidence: 0.8 }
                : { explanation: 'No governing law found.', severity: 'HIGH', importance: 1.5, confidence: 0.85 },
    },
];

// ─── Helpers ─────────────────────────────────────────────────

/** POLICY-YYYYMMDDHHMMSS in UTC. */
export function policyIdFor(date: Date): string {
    return `POLICY-${date.toISOString().replace(/[-:T]/g, '').slice(0, 14)}`;
}

// ─── Main Entry Point ─────────────────────────────────────────

/**
 * Build a policy document from contract text alone. Output depends only on
 * the section text plus the injected clock and id source.
 */
export function buildDeterministicPolicy(
    sections: readonly Section[],
    sourceDocument: string,
    options: DeterministicGeneratorOptions = {},
): GeneratedPolicy {
    const now = (options.now ?? (() => new Date()))();
    const newId = options.newId ?? newRuleId;

    const fullText = sections.map((s) => s.text).join('\n\n').toLowerCase();

    const rules: GeneratedRule[] = RULE_TEMPLATES.map((template) => ({
        rule_id: newId(),
        clause_name: template.clause_name,
        policy_rule: template.policy_rule,
        ...template.assess(fullText),
        examples: [],
        recommended_fix: template.recommended_fix,
        citation: 'SECTION',
    }));

    log.debug({ sourceDocument, ruleCount: rules.length }, 'Deterministic policy built');

    return {
        policy_id: policyIdFor(now),
        source_document: sourceDocument,
        generated_at: now.toISOString(),
        rules,
        summary: 'Generated from deterministic contract heuristics.',
        metadata: { generator: 'fallback' },
    };
}

export class DeterministicGenerator implements PolicyGenerator {
    readonly name = 'deterministic';

    constructor(private readonly options: DeterministicGeneratorOptions = {}) {}

    generate(sections: readonly Section[], sourceDocument: string): Promise<GeneratedPolicy> {
        return Promise.resolve(buildDeterministicPolicy(sections, sourceDocument, this.options));
    }
}
