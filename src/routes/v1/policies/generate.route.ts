/**
 * POST /api/v1/policies/generate
 *
 * Derives a policy document from contract text.
 *
 * Request body (JSON):
 *   {
 *     text: string             // Plaintext contract
 *     sourceDocument?: string  // Recorded on the policy (default: "request")
 *     useModel?: boolean       // Overrides POLICY_GENERATOR for this call
 *     append?: boolean         // Also append the rules to the policy file
 *   }
 *
 * Rate limit: 10 per minute (may call the remote model)
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { chunkText } from '../../../ingestion/chunker.js';
import { InputError } from '../../../lib/errors.js';
import { createPolicyGenerator } from '../../../policy/generator.js';
import { appendGeneratedRules } from '../../../services/policy.service.js';
import type { V1RouteOptions } from '../index.js';

const GenerateBodySchema = z.object({
    text: z.string().min(1),
    sourceDocument: z.string().min(1).max(255).default('request'),
    useModel: z.boolean().optional(),
    append: z.boolean().default(false),
});

export default async function generatePolicyRoute(fastify: FastifyInstance, opts: V1RouteOptions) {
    fastify.post('/policies/generate', {
        config: { rateLimit: { max: 10, timeWindow: '1 minute' } },
    }, async (request, reply) => {
        const parsed = GenerateBodySchema.safeParse(request.body);
        if (!parsed.success) {
            throw InputError.fromZod('Invalid policy generation request', parsed.error);
        }
        const { text, sourceDocument, useModel, append } = parsed.data;

        const generator = createPolicyGenerator(opts.config, { useModel });
        const policy = await generator.generate(chunkText(text), sourceDocument);

        if (append) {
            await appendGeneratedRules(policy, opts.config.policyFile);
        }

        request.log.info(
            { generator: generator.name, policyId: policy.policy_id, ruleCount: policy.rules.length, append },
            'Policy generated',
        );

        return reply.status(201).send({ policy, appended: append });
    });
}
