/**
 * GET /api/v1/policies
 *
 * Returns the rules in the configured policy file.
 */
import type { FastifyInstance } from 'fastify';
import { loadPolicies } from '../../../services/policy.service.js';
import type { V1RouteOptions } from '../index.js';

export default async function listPoliciesRoute(fastify: FastifyInstance, opts: V1RouteOptions) {
    fastify.get('/policies', async (_request, reply) => {
        const policies = await loadPolicies(opts.config.policyFile);
        return reply.send({ policies, count: policies.length });
    });
}
