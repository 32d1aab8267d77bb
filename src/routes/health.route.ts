import type { FastifyInstance } from 'fastify';
import type { AppConfig } from '../lib/config.js';
import { loadPolicies } from '../services/policy.service.js';

interface PolicyStoreCheck {
    ok: boolean;
    ruleCount: number;
    error?: string;
}

/**
 * Health check route: GET /health
 *
 * Reports whether the configured policy file loads. 200 when it does,
 * 503 with status "degraded" otherwise.
 */
export default async function healthRoute(fastify: FastifyInstance, opts: { config: AppConfig }) {
    fastify.get(
        '/health',
        {
            config: {
                rateLimit: {
                    max: 30,
                    timeWindow: '1 minute',
                },
            },
        },
        async (request, reply) => {
            const startTime = Date.now();

            let policyStore: PolicyStoreCheck;
            try {
                const policies = await loadPolicies(opts.config.policyFile);
                policyStore = { ok: true, ruleCount: policies.length };
            } catch (err) {
                request.log.warn({ err }, 'Policy store check failed');
                policyStore = {
                    ok: false,
                    ruleCount: 0,
                    error: err instanceof Error ? err.message : String(err),
                };
            }

            const response = {
                status: policyStore.ok ? 'healthy' : 'degraded',
                timestamp: new Date().toISOString(),
                checks: { policyStore },
                version: process.env.npm_package_version ?? '1.0.0',
                uptime: Math.round(process.uptime()),
                responseTimeMs: Date.now() - startTime,
            };

            return reply.status(policyStore.ok ? 200 : 503).send(response);
        },
    );
}
