import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { aggregateRisk } from '../analysis/riskAggregator.js';
import type { PolicyRuleInput, RiskReport, Section } from '../analysis/types.js';
import { chunkText } from '../ingestion/chunker.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('service.analysis');

export const REPORT_FILE_NAME = 'report.json';

/**
 * Chunk a contract and score it against a policy list.
 */
export function analyzeDocument(text: string, policy: readonly PolicyRuleInput[]): RiskReport {
    return analyzeSections(chunkText(text), policy);
}

export function analyzeSections(sections: readonly Section[], policy: readonly PolicyRuleInput[]): RiskReport {
    const report = aggregateRisk(sections, policy);

    log.info(
        {
            sectionCount: sections.length,
            ruleCount: policy.length,
            violations: report.results.filter((r) => r.is_violation).length,
            riskPercentage: report.document_risk_percentage,
        },
        'Document analyzed',
    );
    return report;
}

/**
 * Write the report as `<dir>/report.json`, creating the directory.
 * @returns the path written
 */
export async function saveReport(report: RiskReport, dir: string): Promise<string> {
    await mkdir(dir, { recursive: true });
    const filePath = join(dir, REPORT_FILE_NAME);
    await writeFile(filePath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');

    log.info({ filePath }, 'Report saved');
    return filePath;
}
