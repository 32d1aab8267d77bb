import fp from 'fastify-plugin';
import rateLimit from '@fastify/rate-limit';
import type { FastifyInstance } from 'fastify';
import { RateLimitError } from '../lib/errors.js';

export interface RateLimitPluginOptions {
    /** Requests per client IP per minute. */
    max: number;
}

/**
 * Plugin: @fastify/rate-limit
 * In-memory, per-IP limiting. Routes may override via `config.rateLimit`.
 */
export default fp<RateLimitPluginOptions>(
    async function rateLimitPlugin(fastify: FastifyInstance, opts: RateLimitPluginOptions) {
        await fastify.register(rateLimit, {
            global: true,
            max: opts.max,
            timeWindow: '1 minute',

            // Thrown by the plugin, so it reaches the app error handler as an AppError
            errorResponseBuilder: (_request, context) =>
                new RateLimitError(Math.max(1, Math.ceil(context.ttl / 1000))),

            addHeadersOnExceeding: {
                'x-ratelimit-limit': true,
                'x-ratelimit-remaining': true,
                'x-ratelimit-reset': true,
            },
            addHeaders: {
                'x-ratelimit-limit': true,
                'x-ratelimit-remaining': true,
                'x-ratelimit-reset': true,
                'retry-after': true,
            },
        });
    },
    {
        name: 'rate-limit-plugin',
        dependencies: ['sensible-plugin'],
    },
);
