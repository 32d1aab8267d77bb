/**
 * v1 API Router
 *
 * Registered under the `/api/v1` prefix.
 *
 * Route tree:
 *   POST   /api/v1/analyze
 *
 *   GET    /api/v1/policies
 *   POST   /api/v1/policies/generate
 *
 *   POST   /api/v1/sections/search
 */
import type { FastifyInstance } from 'fastify';
import type { AppConfig } from '../../lib/config.js';

import analyzeRoute from './analysis/analyze.route.js';
import listPoliciesRoute from './policies/list.route.js';
import generatePolicyRoute from './policies/generate.route.js';
import searchSectionsRoute from './sections/search.route.js';

export interface V1RouteOptions {
    config: AppConfig;
}

// Plain encapsulated plugin: fastify-plugin would drop the `/api/v1` prefix.
export default async function v1Routes(fastify: FastifyInstance, opts: V1RouteOptions) {
    // ── Analysis ───────────────────────────────────────────
    await fastify.register(analyzeRoute, { config: opts.config });

    // ── Policies ───────────────────────────────────────────
    await fastify.register(listPoliciesRoute, { config: opts.config });
    await fastify.register(generatePolicyRoute, { config: opts.config });

    // ── Sections ───────────────────────────────────────────
    await fastify.register(searchSectionsRoute);
}
