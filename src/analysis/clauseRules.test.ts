import { describe, expect, it } from 'vitest';
import { CLAUSE_RULES, evaluateClause, type ClauseRule } from './clauseRules.js';

describe('evaluateClause', () => {
    describe('confidentiality', () => {
        it('accepts a term of three years or more', () => {
            const verdict = evaluateClause(
                'Confidentiality Term',
                'confidentiality',
                'Confidential information shall remain confidential for 5 years',
            );

            expect(verdict).toEqual({
                category: 'confidentiality',
                is_violation: false,
                risk_level: 'LOW',
                reasoning: 'Confidentiality lasts 5 year(s).',
                citation: 'SECTION (in-file)',
            });
        });

        it('flags a term shorter than three years at MEDIUM', () => {
            const verdict = evaluateClause('Confidentiality', 'keep secrets', 'confidential, 1 year');

            expect(verdict.is_violation).toBe(true);
            expect(verdict.risk_level).toBe('MEDIUM');
        });

        it('flags a missing duration when the body mentions confidentiality', () => {
            const verdict = evaluateClause('NDA', 'keep secrets', 'All confidential material stays secret.');

            expect(verdict.category).toBe('confidentiality');
            expect(verdict.is_violation).toBe(true);
            expect(verdict.risk_level).toBe('MEDIUM');
            expect(verdict.reasoning).toBe('No confidentiality duration stated.');
        });

        it('wins over later categories', () => {
            const verdict = evaluateClause(
                'Confidentiality and Liability',
                'liability',
                'Confidential for 2 years; liability capped at 5x fees.',
            );

            expect(verdict.category).toBe('confidentiality');
            expect(verdict.risk_level).toBe('MEDIUM');
        });
    });

    describe('liability', () => {
        it('flags a multiplier above 1.5 at HIGH', () => {
            const verdict = evaluateClause('Liability Cap', 'liability', 'Liability is capped at 2x total fees');

            expect(verdict.category).toBe('liability');
            expect(verdict.is_violation).toBe(true);
            expect(verdict.risk_level).toBe('HIGH');
            expect(verdict.reasoning).toBe('Liability capped at 2x fees, above the 1.5x limit.');
        });

        it('accepts a multiplier written as "times"', () => {
            const verdict = evaluateClause('Liability Cap', 'cap', 'Liability shall not exceed 1.5 times the fees.');

            expect(verdict.is_violation).toBe(false);
            expect(verdict.reasoning).toBe('Liability capped at 1.5x fees.');
        });

        it('accepts a bare 1.5 without a unit', () => {
            const verdict = evaluateClause('Liability Cap', 'cap', 'Liability shall not exceed 1.5 of annual fees.');

            expect(verdict.is_violation).toBe(false);
            expect(verdict.risk_level).toBe('LOW');
        });

        it('flags a cap at total fees with no multiplier', () => {
            const verdict = evaluateClause('Liability Cap', 'cap', 'Liability is limited to the total fees paid.');

            expect(verdict.risk_level).toBe('HIGH');
            expect(verdict.reasoning).toBe('Liability limited to total fees with no multiplier.');
        });

        it('flags text with no cap at all', () => {
            const verdict = evaluateClause('Liability Cap', 'cap', 'Provider accepts liability for its acts.');

            expect(verdict.is_violation).toBe(true);
            expect(verdict.reasoning).toBe('No numeric liability cap found.');
        });

        it('is triggered by the body alone', () => {
            const verdict = evaluateClause('Cap', 'cap', 'Liability is unlimited.');

            expect(verdict.category).toBe('liability');
            expect(verdict.risk_level).toBe('HIGH');
        });
    });

    describe('data sale', () => {
        const clause = 'Data Sale Prohibition';
        const rule = 'Provider must not sell Client Data.';

        it('flags selling at HIGH', () => {
            const verdict = evaluateClause(clause, rule, 'Provider may sell anonymized usage records.');

            expect(verdict.category).toBe('data_sale');
            expect(verdict.risk_level).toBe('HIGH');
            expect(verdict.is_violation).toBe(true);
        });

        it('accepts text without a sale', () => {
            const verdict = evaluateClause(clause, rule, 'Provider stores records in the EU.');

            expect(verdict.is_violation).toBe(false);
        });
    });

    describe('termination', () => {
        it('accepts a 30 day notice', () => {
            const verdict = evaluateClause(
                'Termination Notice',
                'notice',
                'Either party may terminate with 30 days written notice.',
            );

            expect(verdict.category).toBe('termination');
            expect(verdict.is_violation).toBe(false);
        });

        it('flags termination at will at MEDIUM', () => {
            const verdict = evaluateClause('Termination Notice', 'notice', 'Provider may end the agreement at will.');

            expect(verdict.is_violation).toBe(true);
            expect(verdict.risk_level).toBe('MEDIUM');
        });
    });

    describe('indemnity', () => {
        const clause = 'Indemnity';
        const rule = 'Indemnity must be mutual';

        it('flags the client covering provider negligence at HIGH', () => {
            const verdict = evaluateClause(
                clause,
                rule,
                'Client shall indemnify the Provider for claims arising from Provider negligence.',
            );

            expect(verdict.category).toBe('indemnity');
            expect(verdict.risk_level).toBe('HIGH');
        });

        it('flags unscoped negligence indemnity at MEDIUM', () => {
            const verdict = evaluateClause(
                clause,
                rule,
                'Client shall indemnify the other party for all negligence claims.',
            );

            expect(verdict.is_violation).toBe(true);
            expect(verdict.risk_level).toBe('MEDIUM');
        });

        it('accepts indemnity that leaves negligence out', () => {
            const verdict = evaluateClause(clause, rule, 'Each party indemnifies the other for its own breaches.');

            expect(verdict.is_violation).toBe(false);
        });
    });

    describe('availability', () => {
        it('flags arbitrary suspension at MEDIUM', () => {
            const verdict = evaluateClause(
                'Service Availability',
                'Uptime commitment',
                'Provider may suspend the service at any time.',
            );

            expect(verdict.category).toBe('availability');
            expect(verdict.risk_level).toBe('MEDIUM');
        });

        it('is triggered by "suspend" in the body and accepts an uptime guarantee', () => {
            const verdict = evaluateClause('Misc', 'misc', 'We may suspend accounts; 99.5% uptime guaranteed.');

            expect(verdict.category).toBe('availability');
            expect(verdict.is_violation).toBe(false);
        });
    });

    describe('security', () => {
        const clause = 'Security Responsibility';
        const rule = 'Provider must protect client data.';

        it('accepts implemented safeguards', () => {
            const verdict = evaluateClause(clause, rule, 'Provider implements encryption at rest.');

            expect(verdict.category).toBe('security');
            expect(verdict.is_violation).toBe(false);
        });

        it('flags a disclaimer at HIGH', () => {
            const verdict = evaluateClause(clause, rule, 'Provider is not responsible for breaches.');

            expect(verdict.risk_level).toBe('HIGH');
        });
    });

    describe('refund', () => {
        it('flags missing remedies at MEDIUM', () => {
            const verdict = evaluateClause('Refund Policy', 'Refunds for outages', 'All fees paid are final.');

            expect(verdict.category).toBe('refund');
            expect(verdict.risk_level).toBe('MEDIUM');
        });

        it('accepts a remedy', () => {
            const verdict = evaluateClause('Refund Policy', 'Refunds for outages', 'Credits are the sole remedy.');

            expect(verdict.is_violation).toBe(false);
        });
    });

    describe('governing law', () => {
        it('accepts a recognized jurisdiction', () => {
            const verdict = evaluateClause(
                'Governing Law',
                'valid jurisdiction',
                'This agreement is governed by the laws of the State of New York.',
            );

            expect(verdict.category).toBe('governing_law');
            expect(verdict.is_violation).toBe(false);
        });

        it('is triggered by "law" in the body and flags internal policies at HIGH', () => {
            const verdict = evaluateClause('Misc', 'misc', 'Applicable law: internal company policy.');

            expect(verdict.category).toBe('governing_law');
            expect(verdict.risk_level).toBe('HIGH');
        });
    });

    describe('dispute resolution', () => {
        it('accepts binding independent arbitration', () => {
            const verdict = evaluateClause(
                'Dispute Resolution',
                'fair process',
                'Disputes go to binding arbitration before an independent arbitrator.',
            );

            expect(verdict.category).toBe('dispute_resolution');
            expect(verdict.is_violation).toBe(false);
        });

        it('flags a provider-appointed panel at HIGH', () => {
            const verdict = evaluateClause(
                'Dispute Resolution',
                'fair process',
                'Disputes are decided by a panel appointed by Provider.',
            );

            expect(verdict.risk_level).toBe('HIGH');
        });
    });

    it('falls through to a LOW "not matched" outcome', () => {
        const verdict = evaluateClause('Payment Terms', 'Invoices due monthly', 'Invoices are payable monthly.');

        expect(verdict).toEqual({
            category: 'unmatched',
            is_violation: false,
            risk_level: 'LOW',
            reasoning: 'not matched',
            citation: 'SECTION (in-file)',
        });
    });

    it('treats absent inputs as empty strings', () => {
        const verdict = evaluateClause(undefined, null, undefined);

        expect(verdict.category).toBe('unmatched');
        expect(verdict.is_violation).toBe(false);
    });

    it('walks a caller-supplied rule table', () => {
        const rules: ClauseRule[] = [
            {
                category: 'refund',
                matches: ({ body }) => body.includes('credit'),
                evaluate: () => ({ is_violation: true, risk_level: 'HIGH', reasoning: 'custom' }),
            },
        ];

        expect(evaluateClause('Anything', 'anything', 'Service CREDITS apply', rules)).toEqual({
            category: 'refund',
            is_violation: true,
            risk_level: 'HIGH',
            reasoning: 'custom',
            citation: 'SECTION (in-file)',
        });
        expect(evaluateClause('Anything', 'anything', 'nothing here', rules).category).toBe('unmatched');
    });

    it('keeps the category priority order', () => {
        expect(CLAUSE_RULES.map((rule) => rule.category)).toEqual([
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
        ]);
    });
});
