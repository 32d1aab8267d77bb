import { randomUUID } from 'node:crypto';
import Fastify, { type FastifyInstance } from 'fastify';
import type { AppConfig } from './lib/config.js';
import { isAppError } from './lib/errors.js';
import { fastifyLoggerOptions } from './lib/logger.js';

// Plugins (registration order matters)
import sensiblePlugin from './plugins/sensible.plugin.js';
import corsPlugin from './plugins/cors.plugin.js';
import rateLimitPlugin from './plugins/rateLimit.plugin.js';
import metricsPlugin from './plugins/metrics.plugin.js';

// Routes
import healthRoute from './routes/health.route.js';
import v1Routes from './routes/v1/index.js';

const PROBLEM_TYPE_BASE = '/problems';

export interface BuildAppOptions {
    config: AppConfig;
}

/**
 * Build and configure the Fastify application instance.
 *
 * Plugin Registration Order:
 *  1. sensible    → HTTP helpers, no-cache headers
 *  2. cors        → Cross-origin headers
 *  3. rateLimit   → In-memory rate limiter
 *  4. metrics     → Prometheus endpoint (when enabled)
 *  5. routes      → Health and /api/v1
 */
export async function buildApp({ config }: BuildAppOptions): Promise<FastifyInstance> {
    const app = Fastify({
        logger: fastifyLoggerOptions,
        requestIdHeader: 'x-request-id',
        requestIdLogLabel: 'requestId',
        genReqId: () => randomUUID(),
        trustProxy: true,

        // Contracts arrive as JSON strings
        bodyLimit: 10 * 1024 * 1024,
    });

    // ─── 1. Plugins (in order) ──────────────────────────────
    await app.register(sensiblePlugin);
    await app.register(corsPlugin, { origins: config.corsOrigins });
    await app.register(rateLimitPlugin, { max: config.rateLimitMax });
    if (config.metricsEnabled) {
        await app.register(metricsPlugin);
    }

    // ─── 2. Global Error Handler ────────────────────────────
    app.setErrorHandler((error, request, reply) => {
        const requestId = request.id;

        // AppError subclasses carry their own RFC 7807 shape
        if (isAppError(error)) {
            if (error.isOperational) {
                request.log.warn({ err: error, requestId }, `AppError: ${error.title}`);
            } else {
                request.log.error({ err: error, requestId }, `AppError: ${error.title}`);
            }
            return reply.status(error.statusCode).send(error.toResponse(request.url, requestId));
        }

        // Malformed JSON bodies, unsupported media types, payload too large, ...
        if (error.statusCode !== undefined && error.statusCode < 500) {
            request.log.warn({ err: error, requestId }, `HTTP ${error.statusCode}`);
            return reply.status(error.statusCode).send({
                error: {
                    type: `${PROBLEM_TYPE_BASE}/client-error`,
                    title: 'Client Error',
                    status: error.statusCode,
                    detail: error.message,
                    instance: request.url,
                    requestId,
                },
            });
        }

        // Unexpected server errors: log the stack, return a generic message
        request.log.error({ err: error, requestId }, 'Unhandled server error');
        return reply.status(500).send({
            error: {
                type: `${PROBLEM_TYPE_BASE}/internal-error`,
                title: 'Internal Server Error',
                status: 500,
                detail: 'An unexpected error occurred. Please try again later.',
                instance: request.url,
                requestId,
            },
        });
    });

    // ─── 3. Not Found Handler ───────────────────────────────
    app.setNotFoundHandler((request, reply) => {
        reply.status(404).send({
            error: {
                type: `${PROBLEM_TYPE_BASE}/not-found`,
                title: 'Not Found',
                status: 404,
                detail: 'The requested resource was not found',
                instance: request.url,
                requestId: request.id,
            },
        });
    });

    // ─── 4. Routes ──────────────────────────────────────────
    await app.register(healthRoute, { config });
    await app.register(v1Routes, { prefix: '/api/v1', config });

    return app;
}
