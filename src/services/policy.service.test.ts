import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InputError, NotFoundError } from '../lib/errors.js';
import type { GeneratedPolicy } from '../policy/schema.js';
import {
    appendGeneratedRules,
    loadPolicies,
    parsePolicyList,
    savePolicyDocument,
    toPolicyRules,
} from './policy.service.js';

const generated: GeneratedPolicy = {
    policy_id: 'POLICY-20240305070809',
    source_document: 'msa.txt',
    generated_at: '2024-03-05T07:08:09.123Z',
    rules: [
        {
            rule_id: 'r1',
            clause_name: 'Liability Cap',
            policy_rule: 'Liability cap must not exceed 1.5x the total fees paid.',
            explanation: 'No numeric liability cap found.',
            severity: 'HIGH',
            importance: 1.5,
            examples: [],
            recommended_fix: 'Aggregate liability is limited to 1.5x the fees paid.',
            citation: 'SECTION',
            confidence: 0.8,
        },
    ],
    summary: '',
    metadata: { generator: 'fallback' },
};

describe('parsePolicyList', () => {
    it('fills defaults for missing severity and importance', () => {
        expect(parsePolicyList([{ clause_name: 'Termination', policy_rule: 'Allow 30 days notice.' }])).toEqual([
            {
                clause_name: 'Termination',
                policy_rule: 'Allow 30 days notice.',
                risk_level_if_violated: 'MEDIUM',
                importance: 1.0,
            },
        ]);
    });

    it('keeps unrecognised risk levels as metadata', () => {
        const [rule] = parsePolicyList([{ clause_name: 'X', policy_rule: 'Y', risk_level_if_violated: 'CRITICAL' }]);

        expect(rule?.risk_level_if_violated).toBe('CRITICAL');
    });

    it('reports per-field issues for a malformed list', () => {
        let caught: unknown;
        try {
            parsePolicyList([{ clause_name: 'X', policy_rule: 'Y', importance: -1 }, { policy_rule: 'Z' }]);
        } catch (err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(InputError);
        if (caught instanceof InputError) {
            expect(Object.keys(caught.issues ?? {})).toEqual(['0.importance', '1.clause_name']);
        }
    });

    it('rejects a non-array document', () => {
        expect(() => parsePolicyList({ rules: [] })).toThrow(InputError);
    });
});

describe('policy files', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'policies-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('loads a policy file', async () => {
        const file = join(dir, 'policies.json');
        await writeFile(file, JSON.stringify([{ clause_name: 'A', policy_rule: 'B', importance: 2 }]), 'utf-8');

        await expect(loadPolicies(file)).resolves.toEqual([
            { clause_name: 'A', policy_rule: 'B', risk_level_if_violated: 'MEDIUM', importance: 2 },
        ]);
    });

    it('raises NotFoundError for a missing policy file', async () => {
        await expect(loadPolicies(join(dir, 'nope.json'))).rejects.toBeInstanceOf(NotFoundError);
    });

    it('raises InputError for invalid JSON', async () => {
        const file = join(dir, 'policies.json');
        await writeFile(file, '[{"clause_name": ', 'utf-8');

        await expect(loadPolicies(file)).rejects.toBeInstanceOf(InputError);
    });

    it('saves a policy document as indented JSON', async () => {
        const file = join(dir, 'nested', 'generated_policy_msa.json');

        await savePolicyDocument(generated, file);

        const written = await readFile(file, 'utf-8');
        expect(written).toBe(`${JSON.stringify(generated, null, 2)}\n`);
    });

    it('maps generated rules onto policy rules', () => {
        expect(toPolicyRules(generated)).toEqual([
            {
                clause_name: 'Liability Cap',
                policy_rule: 'Liability cap must not exceed 1.5x the total fees paid.',
                risk_level_if_violated: 'HIGH',
                importance: 1.5,
            },
        ]);
    });

    it('appends generated rules after the existing ones', async () => {
        const file = join(dir, 'policies.json');
        await writeFile(file, JSON.stringify([{ clause_name: 'A', policy_rule: 'B' }]), 'utf-8');

        const combined = await appendGeneratedRules(generated, file);

        expect(combined.map((r) => r.clause_name)).toEqual(['A', 'Liability Cap']);
        await expect(loadPolicies(file)).resolves.toEqual(combined);
    });

    it('starts from an empty list when the policy file is missing', async () => {
        const file = join(dir, 'policies.json');

        const combined = await appendGeneratedRules(generated, file);

        expect(combined).toHaveLength(1);
        await expect(loadPolicies(file)).resolves.toEqual(combined);
    });

    it('refuses to overwrite a malformed policy file', async () => {
        const file = join(dir, 'policies.json');
        await writeFile(file, 'not json', 'utf-8');

        await expect(appendGeneratedRules(generated, file)).rejects.toBeInstanceOf(InputError);
        await expect(readFile(file, 'utf-8')).resolves.toBe('not json');
    });
});
