/**
 * POST /api/v1/analyze
 *
 * Scores a contract against a policy list and returns the risk report.
 *
 * Request body (JSON):
 *   {
 *     text: string            // Plaintext contract, sections separated by blank lines
 *     policies?: PolicyRule[] // Defaults to the configured policy file
 *   }
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { InputError } from '../../../lib/errors.js';
import { PolicyRuleSchema } from '../../../policy/schema.js';
import { analyzeDocument } from '../../../services/analysis.service.js';
import { loadPolicies } from '../../../services/policy.service.js';
import type { V1RouteOptions } from '../index.js';

const MAX_TEXT_CHARS = 2_000_000;

const AnalyzeBodySchema = z.object({
    text: z.string().min(1).max(MAX_TEXT_CHARS),
    policies: z.array(PolicyRuleSchema).optional(),
});

export default async function analyzeRoute(fastify: FastifyInstance, opts: V1RouteOptions) {
    fastify.post('/analyze', async (request, reply) => {
        const parsed = AnalyzeBodySchema.safeParse(request.body);
        if (!parsed.success) {
            throw InputError.fromZod('Invalid analyze request', parsed.error);
        }

        const policies = parsed.data.policies ?? (await loadPolicies(opts.config.policyFile));
        const report = analyzeDocument(parsed.data.text, policies);

        fastify.metrics?.analysesTotal.inc();
        fastify.metrics?.riskPercentage.observe(report.document_risk_percentage);

        return reply.send(report);
    });
}
