import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import client, { type Counter, type Histogram } from 'prom-client';

const PREFIX = 'clause_risk_';

export interface AnalysisMetrics {
    analysesTotal: Counter;
    riskPercentage: Histogram;
}

declare module 'fastify' {
    interface FastifyInstance {
        /** Present only when the metrics plugin is registered. */
        metrics?: AnalysisMetrics;
    }
}

/**
 * Plugin: Prometheus Metrics
 * Exposes /metrics from a registry owned by this app instance, so several
 * apps in one process (tests) never collide on metric names.
 */
export default fp(
    async function metricsPlugin(fastify: FastifyInstance) {
        const register = new client.Registry();

        // Process metrics (CPU, memory, event loop, GC)
        client.collectDefaultMetrics({ register, prefix: PREFIX });

        // ─── HTTP Metrics ──────────────────────────────────────
        const httpRequestDuration = new client.Histogram({
            name: `${PREFIX}http_request_duration_seconds`,
            help: 'Duration of HTTP requests in seconds',
            labelNames: ['method', 'route', 'status_code'] as const,
            buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
            registers: [register],
        });

        const httpRequestsTotal = new client.Counter({
            name: `${PREFIX}http_requests_total`,
            help: 'Total number of HTTP requests',
            labelNames: ['method', 'route', 'status_code'] as const,
            registers: [register],
        });

        // ─── Domain Metrics ────────────────────────────────────
        fastify.decorate('metrics', {
            analysesTotal: new client.Counter({
                name: `${PREFIX}analyses_total`,
                help: 'Documents analyzed',
                registers: [register],
            }),
            riskPercentage: new client.Histogram({
                name: `${PREFIX}document_risk_percentage`,
                help: 'Document risk percentage of analyzed documents',
                buckets: [0, 10, 25, 50, 75, 90, 100],
                registers: [register],
            }),
        });

        // ─── Request lifecycle hooks ───────────────────────────
        fastify.addHook('onResponse', async (request, reply) => {
            // Route pattern, not the raw URL, to keep label cardinality bounded
            const route = request.routeOptions.url ?? request.url;
            const labels = {
                method: request.method,
                route,
                status_code: reply.statusCode.toString(),
            };

            httpRequestsTotal.inc(labels);
            httpRequestDuration.observe(labels, reply.elapsedTime / 1000);
        });

        // ─── /metrics endpoint ─────────────────────────────────
        fastify.get('/metrics', async (_request, reply) => {
            reply.header('Content-Type', register.contentType);
            return reply.send(await register.metrics());
        });
    },
    {
        name: 'metrics-plugin',
    },
);
