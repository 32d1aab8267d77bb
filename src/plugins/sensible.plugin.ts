import fp from 'fastify-plugin';
import sensible from '@fastify/sensible';
import type { FastifyInstance } from 'fastify';

/**
 * Plugin: @fastify/sensible
 * Reply helpers, and no-cache headers on every response: reports, policy
 * listings and health checks are all computed per request.
 */
export default fp(
    async function sensiblePlugin(fastify: FastifyInstance) {
        await fastify.register(sensible);

        fastify.addHook('onRequest', async (_request, reply) => {
            reply.preventCache();
        });
    },
    {
        name: 'sensible-plugin',
    },
);
