import { CLAUSE_RULES, evaluateClause, type ClauseRule } from './clauseRules.js';
import { assembleReport } from './reportAssembler.js';
import {
    EXTRACT_MAX_CHARS,
    MAX_RISK_WEIGHT,
    RISK_WEIGHTS,
    SNIPPET_MAX_CHARS,
    UNKNOWN_RISK_WEIGHT,
    type Finding,
    type PolicyRuleInput,
    type RiskReport,
    type Section,
    type SectionScore,
    type TopClause,
    type TopSection,
} from './types.js';

const DEFAULT_IMPORTANCE = 1.0;

export interface AggregateOptions {
    /** Rule table handed to the evaluator; defaults to CLAUSE_RULES. */
    rules?: readonly ClauseRule[];
}

// ─── Helpers ─────────────────────────────────────────────────

/**
 * Weight of a risk level; anything outside LOW/MEDIUM/HIGH weighs as LOW.
 */
export function riskWeight(level: string): number {
    const table: Readonly<Partial<Record<string, number>>> = RISK_WEIGHTS;
    return Object.hasOwn(table, level) ? table[level] ?? UNKNOWN_RISK_WEIGHT : UNKNOWN_RISK_WEIGHT;
}

export function importanceOf(rule: PolicyRuleInput): number {
    return rule.importance ?? DEFAULT_IMPORTANCE;
}

/**
 * Round to `digits` decimals using the exact value of the double, with exact
 * ties going to the even neighbour (3.125 → 3.12, 0.0625 → 0.062).
 *
 * A double sits exactly halfway between two `digits`-place decimals only when
 * `value × 2^(digits+1)` is an odd integer. Every other value has a single
 * nearest decimal, which toFixed finds.
 */
export function roundTo(value: number, digits: number): number {
    const halves = value * 2 ** (digits + 1);
    if (Number.isInteger(halves) && Math.abs(halves % 2) === 1) {
        const factor = 10 ** digits;
        const lower = Math.floor(value * factor);
        return (lower % 2 === 0 ? lower : lower + 1) / factor;
    }
    return Number(value.toFixed(digits));
}

// ─── Main Entry Point ─────────────────────────────────────────

/**
 * Score every (section, policy rule) pair and fold the findings into a report.
 *
 * Algorithm:
 * 1. total_importance = Σ importance over the policy (missing → 1.0)
 * 2. For each section in order, for each rule in order: evaluate and record a Finding
 * 3. Per section, add every importance to section_importance_total and
 *    weight(risk_level) × importance of each violation to section_violation_weight
 * 4. document_risk_percentage = min(100, Σ violation weight / (total_importance × max weight) × 100),
 *    0 for an empty or zero-importance policy
 * 5. Rank sections and clause names by violation weight (stable, descending)
 *
 * Pure and deterministic: identical inputs always give deep-equal reports.
 */
export function aggregateRisk(
    sections: readonly Section[],
    policy: readonly PolicyRuleInput[],
    options: AggregateOptions = {},
): RiskReport {
    const rules = options.rules ?? CLAUSE_RULES;

    const totalImportance = policy.reduce((sum, rule) => sum + importanceOf(rule), 0);

    const results: Finding[] = [];
    const sectionScores: SectionScore[] = [];
    let totalViolationWeight = 0;

    for (const section of sections) {
        const text = section.text ?? '';
        const score: SectionScore = {
            id: section.id,
            text: text.slice(0, SNIPPET_MAX_CHARS),
            violations: [],
            section_violation_weight: 0,
            section_importance_total: 0,
        };

        for (const rule of policy) {
            const importance = importanceOf(rule);
            const verdict = evaluateClause(rule.clause_name, rule.policy_rule, text, rules);

            results.push({
                clause_name: rule.clause_name,
                policy_rule: rule.policy_rule,
                extracted_text: text.slice(0, EXTRACT_MAX_CHARS),
                is_violation: verdict.is_violation,
                risk_level: verdict.risk_level,
                citation: verdict.citation,
                reasoning: verdict.reasoning,
                section_id: section.id,
                importance,
            });

            score.section_importance_total += importance;
            if (verdict.is_violation) {
                score.section_violation_weight += riskWeight(verdict.risk_level) * importance;
            }
        }

        totalViolationWeight += score.section_violation_weight;
        sectionScores.push(score);
    }

    const maxPossible = totalImportance * MAX_RISK_WEIGHT;
    const riskPercentage = maxPossible > 0
        ? Math.min(100, (totalViolationWeight / maxPossible) * 100)
        : 0;

    return assembleReport({
        results,
        sectionScores,
        riskPercentage: roundTo(riskPercentage, 2),
        topSections: rankSections(sectionScores),
        topClauses: rankClauses(results),
    });
}

// ─── Ranking ─────────────────────────────────────────────────

/**
 * Sections with any violation weight, heaviest first; ties keep document order.
 * The snippet is the section score's already-truncated text.
 */
export function rankSections(sectionScores: readonly SectionScore[]): TopSection[] {
    return [...sectionScores]
        .sort((a, b) => b.section_violation_weight - a.section_violation_weight)
        .filter((s) => s.section_violation_weight > 0)
        .map((s) => ({
            id: s.id,
            snippet: s.text,
            score: roundTo(s.section_violation_weight, 3),
        }));
}

/**
 * Violation weight summed per clause name, heaviest first; ties keep the order
 * in which each name first violated.
 */
export function rankClauses(results: readonly Finding[]): TopClause[] {
    const totals = new Map<string, number>();

    for (const finding of results) {
        if (!finding.is_violation) continue;
        const weight = riskWeight(finding.risk_level) * finding.importance;
        totals.set(finding.clause_name, (totals.get(finding.clause_name) ?? 0) + weight);
    }

    return [...totals]
        .map(([clause_name, score]) => ({ clause_name, score }))
        .sort((a, b) => b.score - a.score);
}
