import type { Finding, RiskReport, SectionScore, TopClause, TopSection } from './types.js';

export interface ReportParts {
    results: Finding[];
    sectionScores: SectionScore[];
    riskPercentage: number;
    topSections: TopSection[];
    topClauses: TopClause[];
}

/**
 * Package aggregator output into the report.json shape. No computation happens
 * here; field names are fixed by the persisted format.
 */
export function assembleReport(parts: ReportParts): RiskReport {
    return {
        results: parts.results,
        section_scores: parts.sectionScores,
        document_risk_percentage: parts.riskPercentage,
        top_sections: parts.topSections,
        top_clauses: parts.topClauses,
    };
}
