import type { RiskReport } from '../analysis/types.js';

const RULE = '='.repeat(60);

/**
 * Render the console summary of a report: risk percentage, then the
 * highest-scoring sections and clause types.
 */
export function formatReport(report: RiskReport, limit = 10): string {
    const lines: string[] = [
        RULE,
        ' CLAUSE RISK REPORT',
        RULE,
        '',
        `Document Risk Percentage: ${report.document_risk_percentage}%`,
        '',
        'Top risky sections:',
    ];

    const sections = report.top_sections.slice(0, limit);
    if (sections.length === 0) lines.push(' (none)');
    for (const s of sections) {
        lines.push(` - Section ${s.id}: score ${s.score} - ${s.snippet.replace(/\s+/g, ' ')}`);
    }

    lines.push('', 'Top risky clause types:');
    const clauses = report.top_clauses.slice(0, limit);
    if (clauses.length === 0) lines.push(' (none)');
    for (const c of clauses) {
        lines.push(` - ${c.clause_name}: score ${c.score}`);
    }

    return lines.join('\n');
}
