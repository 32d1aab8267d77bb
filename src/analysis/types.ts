/**
 * Shared types of the scoring core.
 *
 * Field names on the report side are snake_case because they are part of the
 * persisted report.json wire format.
 */

export const RISK_LEVELS = ['LOW', 'MEDIUM', 'HIGH'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

/** Severity multiplier per risk level. */
export const RISK_WEIGHTS = Object.freeze({
    LOW: 0.2,
    MEDIUM: 0.5,
    HIGH: 1.0,
} as const satisfies Record<RiskLevel, number>);

/** Weight used for a risk level outside RISK_LEVELS. */
export const UNKNOWN_RISK_WEIGHT = RISK_WEIGHTS.LOW;

export const MAX_RISK_WEIGHT = Math.max(...Object.values(RISK_WEIGHTS));

export const CITATION = 'SECTION (in-file)';
export const EXTRACT_MAX_CHARS = 1000;
export const SNIPPET_MAX_CHARS = 300;

// ─── Inputs ──────────────────────────────────────────────────

export interface Section {
    id: number;
    text: string;
}

/**
 * A policy rule as the aggregator accepts it. `importance` may be absent
 * (treated as 1.0); `risk_level_if_violated` is metadata only.
 */
export interface PolicyRuleInput {
    clause_name: string;
    policy_rule: string;
    risk_level_if_violated?: string;
    importance?: number;
}

// ─── Outputs ─────────────────────────────────────────────────

export interface Finding {
    clause_name: string;
    policy_rule: string;
    extracted_text: string;
    is_violation: boolean;
    risk_level: RiskLevel;
    citation: string;
    reasoning: string;
    section_id: number;
    importance: number;
}

export interface SectionScore {
    id: number;
    text: string;
    violations: string[];
    section_violation_weight: number;
    section_importance_total: number;
}

export interface TopSection {
    id: number;
    snippet: string;
    score: number;
}

export interface TopClause {
    clause_name: string;
    score: number;
}

export interface RiskReport {
    results: Finding[];
    section_scores: SectionScore[];
    document_risk_percentage: number;
    top_sections: TopSection[];
    top_clauses: TopClause[];
}
