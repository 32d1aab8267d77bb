import pino, { type Logger, type LoggerOptions } from 'pino';

const env = process.env.NODE_ENV ?? 'development';
const isDev = env !== 'production';
const isTest = env === 'test';

const devTransport: LoggerOptions['transport'] = {
    target: 'pino-pretty',
    options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss.l',
        ignore: 'pid,hostname',
        singleLine: false,
    },
};

function defaultLevel(): string {
    if (isTest) return 'silent';
    return isDev ? 'debug' : 'info';
}

const baseOptions: LoggerOptions = {
    level: process.env.LOG_LEVEL ?? defaultLevel(),

    base: {
        service: 'clause-risk-engine',
        env,
    },

    // Model API keys travel through generator options and request headers
    redact: {
        paths: [
            'req.headers.authorization',
            'headers.Authorization',
            'apiKey',
            'token',
            'secret',
            'config.groqApiKey',
        ],
        censor: '[REDACTED]',
    },

    serializers: {
        err: pino.stdSerializers.err,
    },

    timestamp: isDev
        ? pino.stdTimeFunctions.isoTime
        : pino.stdTimeFunctions.epochTime,

    // Pretty output for humans; the worker transport stays off under test
    ...(isDev && !isTest && { transport: devTransport }),
};

/**
 * Root application logger.
 * Use `createLogger('name')` for per-module loggers.
 */
export const logger: Logger = pino(baseOptions);

/**
 * Create a child logger with module context.
 *
 * @example
 * ```ts
 * const log = createLogger('analysis.aggregator');
 * log.info({ sectionCount }, 'Aggregation complete');
 * ```
 */
export function createLogger(module: string): Logger {
    return logger.child({ module });
}

/**
 * Options handed to Fastify so request logs share level, redaction and format
 * with the rest of the process.
 */
export const fastifyLoggerOptions: LoggerOptions = {
    ...baseOptions,
    level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isDev ? 'info' : 'warn'),
};

export default logger;
