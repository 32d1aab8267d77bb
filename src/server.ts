import { buildApp } from './app.js';
import { loadConfig } from './lib/config.js';
import { createLogger } from './lib/logger.js';

const log = createLogger('server');

async function start(): Promise<void> {
    const config = loadConfig();
    const app = await buildApp({ config });

    try {
        await app.listen({ port: config.port, host: config.host });
        log.info({ port: config.port, host: config.host, policyFile: config.policyFile }, 'Clause risk API server started');
    } catch (err) {
        log.fatal({ err }, 'Failed to start server');
        process.exit(1);
    }

    // ─── Graceful Shutdown ───────────────────────────────────
    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
        if (shuttingDown) return;
        shuttingDown = true;
        log.info({ signal }, 'Received shutdown signal, closing gracefully...');

        try {
            // Stops accepting requests and waits for in-flight ones
            await app.close();
            log.info('Fastify server closed');
            process.exit(0);
        } catch (err) {
            log.error({ err }, 'Error during shutdown');
            process.exit(1);
        }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));

    process.on('uncaughtException', (err) => {
        log.fatal({ err }, 'Uncaught exception');
        void shutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason) => {
        log.fatal({ err: reason }, 'Unhandled rejection');
        void shutdown('unhandledRejection');
    });
}

start().catch((err: unknown) => {
    log.fatal({ err }, 'Server failed to boot');
    process.exit(1);
});
