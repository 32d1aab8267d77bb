import fp from 'fastify-plugin';
import cors from '@fastify/cors';
import type { FastifyInstance } from 'fastify';

export interface CorsPluginOptions {
    origins: readonly string[];
}

/**
 * Plugin: @fastify/cors
 * Allowed origins come from config (CORS_ORIGIN, comma-separated).
 */
export default fp<CorsPluginOptions>(
    async function corsPlugin(fastify: FastifyInstance, opts: CorsPluginOptions) {
        await fastify.register(cors, {
            origin: [...opts.origins],
            methods: ['GET', 'POST', 'OPTIONS'],
            allowedHeaders: ['Content-Type'],
            exposedHeaders: ['X-Request-Id', 'Retry-After'],
            maxAge: 86400, // 24 hours preflight cache
        });
    },
    {
        name: 'cors-plugin',
    },
);
