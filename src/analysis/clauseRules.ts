import { CITATION, type RiskLevel } from './types.js';

// ─── Types ───────────────────────────────────────────────────

export const CLAUSE_CATEGORIES = [
    'confidentiality',
    'liability',
    'data_sale',
    'termination',
    'indemnity',
    'availability',
    'security',
    'refund',
    'governing_law',
    'dispute_resolution',
] as const;

export type ClauseCategory = (typeof CLAUSE_CATEGORIES)[number];

/** Lower-cased inputs of one evaluation. */
export interface ClauseContext {
    clause: string;
    rule: string;
    body: string;
}

export interface RuleOutcome {
    is_violation: boolean;
    risk_level: RiskLevel;
    reasoning: string;
}

export interface ClauseRule {
    category: ClauseCategory;
    matches: (ctx: ClauseContext) => boolean;
    evaluate: (ctx: ClauseContext) => RuleOutcome;
}

export interface ClauseVerdict extends RuleOutcome {
    category: ClauseCategory | 'unmatched';
    citation: string;
}

// ─── Thresholds ──────────────────────────────────────────────

const MIN_CONFIDENTIALITY_YEARS = 3;
const MAX_LIABILITY_MULTIPLIER = 1.5;

const YEARS_PATTERN = /\b(\d+)\s*years?/;
const MULTIPLIER_PATTERN = /\b(\d+\.?\d*)\s*(x|times)\b/;

// ─── Helpers ─────────────────────────────────────────────────

function hasAny(text: string, needles: readonly string[]): boolean {
    return needles.some((needle) => text.includes(needle));
}

function compliant(reasoning: string): RuleOutcome {
    return { is_violation: false, risk_level: 'LOW', reasoning };
}

function violation(risk_level: RiskLevel, reasoning: string): RuleOutcome {
    return { is_violation: true, risk_level, reasoning };
}

// ─── Rule Table ──────────────────────────────────────────────
// Order is priority: the first rule whose predicate matches decides the verdict.

export const CLAUSE_RULES: readonly ClauseRule[] = Object.freeze([
    {
        category: 'confidentiality',
        matches: ({ clause, body }) => clause.includes('confidential') || body.includes('confidenti'),
        evaluate: ({ body }) => {
            const match = YEARS_PATTERN.exec(body);
            if (!match?.[1]) {
                return violation('MEDIUM', 'No confidentiality duration stated.');
            }
            const years = parseInt(match[1], 10);
            return years < MIN_CONFIDENTIALITY_YEARS
                ? violation('MEDIUM', `Confidentiality lasts ${years} year(s); at least ${MIN_CONFIDENTIALITY_YEARS} required.`)
                : compliant(`Confidentiality lasts ${years} year(s).`);
        },
    },
    {
        category: 'liability',
        matches: ({ clause, rule, body }) =>
            clause.includes('liability') || rule.includes('liability') || body.includes('liability'),
        evaluate: ({ body }) => {
            const match = MULTIPLIER_PATTERN.exec(body);
            if (match?.[1]) {
                const multiplier = parseFloat(match[1]);
                return multiplier <= MAX_LIABILITY_MULTIPLIER
                    ? compliant(`Liability capped at ${multiplier}x fees.`)
                    : violation('HIGH', `Liability capped at ${multiplier}x fees, above the ${MAX_LIABILITY_MULTIPLIER}x limit.`);
            }
            // Bare "1.5" with no unit is read as the permitted multiplier.
            if (body.includes('1.5')) {
                return compliant('Liability text mentions 1.5 without a unit; read as a 1.5x cap.');
            }
            if (body.includes('total fees')) {
                return violation('HIGH', 'Liability limited to total fees with no multiplier.');
            }
            return violation('HIGH', 'No numeric liability cap found.');
        },
    },
    {
        category: 'data_sale',
        matches: ({ clause, rule }) =>
            clause.includes('data') || rule.includes('sell') || rule.includes('commercialize'),
        evaluate: ({ body }) =>
            hasAny(body, ['sell', 'commercial'])
                ? violation('HIGH', 'Client data may be sold or commercialized.')
                : compliant('No sale of client data.'),
    },
    {
        category: 'termination',
        matches: ({ clause, rule }) => clause.includes('terminat') || rule.includes('termination'),
        evaluate: ({ body }) =>
            hasAny(body, ['30 days', '30-day', 'payment in lieu'])
                ? compliant('Termination notice of 30 days or payment in lieu.')
                : violation('MEDIUM', 'No adequate termination notice.'),
    },
    {
        category: 'indemnity',
        matches: ({ clause, rule }) => clause.includes('indemn') || rule.includes('indemn'),
        evaluate: ({ body }) => {
            if (body.includes('neglig') && body.includes('client') && body.includes('indemn')) {
                return hasAny(body, ['provider', 'company'])
                    ? violation('HIGH', "Client indemnifies the provider for the provider's own negligence.")
                    : violation('MEDIUM', 'Indemnity covers negligence without limiting whose.');
            }
            return compliant('Indemnity scope is not overly broad.');
        },
    },
    {
        category: 'availability',
        matches: ({ clause, rule, body }) =>
            clause.includes('availability') || rule.includes('uptime') || body.includes('suspend'),
        evaluate: ({ body }) =>
            hasAny(body, ['99.5', 'uptime', 'guarantee', 'compens'])
                ? compliant('Uptime commitment or compensation present.')
                : violation('MEDIUM', 'Service may be suspended with no uptime commitment.'),
    },
    {
        category: 'security',
        matches: ({ clause, rule, body }) =>
            clause.includes('security') || rule.includes('protect') || body.includes('security'),
        evaluate: ({ body }) =>
            hasAny(body, ['encryption', 'access control', 'safeguard', 'implement'])
                ? compliant('Provider takes on security obligations.')
                : violation('HIGH', 'Provider disclaims responsibility for security.'),
    },
    {
        category: 'refund',
        matches: ({ clause, rule }) => clause.includes('refund') || rule.includes('refund'),
        evaluate: ({ body }) =>
            hasAny(body, ['refund', 'compens', 'remedy'])
                ? compliant('Refund or remedy terms present.')
                : violation('MEDIUM', 'No refund or remedy for outages or breaches.'),
    },
    {
        category: 'governing_law',
        matches: ({ clause, rule, body }) =>
            clause.includes('govern') || rule.includes('governing') || body.includes('law'),
        evaluate: ({ body }) =>
            hasAny(body, ['new york', 'governed by the laws of', 'state of'])
                ? compliant('Recognized jurisdiction named.')
                : violation('HIGH', 'Governing law is missing or not a recognized jurisdiction.'),
    },
    {
        category: 'dispute_resolution',
        matches: ({ clause, rule, body }) =>
            clause.includes('dispute') || rule.includes('arbitration') || body.includes('panel'),
        evaluate: ({ body }) =>
            body.includes('arbitration') && hasAny(body, ['binding', 'independent', 'judicial'])
                ? compliant('Independent arbitration or judicial review available.')
                : violation('HIGH', 'Disputes are resolved unilaterally or internally.'),
    },
] satisfies ClauseRule[]);

const UNMATCHED: RuleOutcome = compliant('not matched');

// ─── Main Entry Point ─────────────────────────────────────────

/**
 * Evaluate one policy rule against one section of text.
 *
 * Walks `rules` in order and lets the first matching category decide. Text that
 * no category claims is compliant at LOW. Never throws.
 *
 * @param rules - Rule table to walk; defaults to CLAUSE_RULES
 */
export function evaluateClause(
    clauseName: string | null | undefined,
    policyRule: string | null | undefined,
    sectionText: string | null | undefined,
    rules: readonly ClauseRule[] = CLAUSE_RULES,
): ClauseVerdict {
    const ctx: ClauseContext = {
        clause: (clauseName ?? '').toLowerCase(),
        rule: (policyRule ?? '').toLowerCase(),
        body: (sectionText ?? '').toLowerCase(),
    };

    const rule = rules.find((candidate) => candidate.matches(ctx));
    if (!rule) {
        return { ...UNMATCHED, category: 'unmatched', citation: CITATION };
    }

    return { ...rule.evaluate(ctx), category: rule.category, citation: CITATION };
}
