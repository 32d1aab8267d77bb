import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { PolicyRuleInput } from '../analysis/types.js';
import { analyzeDocument, saveReport } from './analysis.service.js';

const policy: PolicyRuleInput[] = [
    { clause_name: 'Liability Cap', policy_rule: 'Liability must not exceed 1.5x fees.', risk_level_if_violated: 'HIGH' },
    { clause_name: 'Confidentiality', policy_rule: 'Confidentiality must last at least 3 years.' },
];

const contract = 'Liability is capped at 2x fees.\n\nConfidential information is protected for 5 years.';

describe('analyzeDocument', () => {
    it('chunks the text and scores every section against every rule', () => {
        const report = analyzeDocument(contract, policy);

        expect(report.results).toHaveLength(4);
        expect(report.results.map((r) => [r.section_id, r.clause_name, r.is_violation])).toEqual([
            [0, 'Liability Cap', true],
            [0, 'Confidentiality', true],
            [1, 'Liability Cap', false],
            [1, 'Confidentiality', false],
        ]);
        expect(report.document_risk_percentage).toBe(75);
        expect(report.top_clauses).toEqual([
            { clause_name: 'Liability Cap', score: 1 },
            { clause_name: 'Confidentiality', score: 0.5 },
        ]);
    });

    it('gives an empty report for blank text', () => {
        expect(analyzeDocument('  \n\n ', policy)).toEqual({
            results: [],
            section_scores: [],
            document_risk_percentage: 0,
            top_sections: [],
            top_clauses: [],
        });
    });
});

describe('saveReport', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'reports-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('writes report.json into a created directory', async () => {
        const report = analyzeDocument(contract, policy);
        const outDir = join(dir, 'output');

        const filePath = await saveReport(report, outDir);

        expect(filePath).toBe(join(outDir, 'report.json'));
        expect(JSON.parse(await readFile(filePath, 'utf-8'))).toEqual(report);
    });
});
