import { z } from 'zod';
import { ConfigError, zodIssues } from './errors.js';

// ─── Environment Schema ──────────────────────────────────────

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform((v) => v === 'true' || v === '1');

const EnvSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
    HOST: z.string().min(1).default('0.0.0.0'),
    CORS_ORIGIN: z.string().default('http://localhost:5173'),

    POLICY_FILE: z.string().min(1).default('policies.json'),
    REPORT_DIR: z.string().min(1).default('output'),

    POLICY_GENERATOR: z.enum(['deterministic', 'assisted']).default('deterministic'),
    GROQ_API_KEY: z.string().min(1).optional(),
    GROQ_POLICY_MODEL: z.string().min(1).optional(),
    POLICY_MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),

    METRICS_ENABLED: booleanFlag.default('true'),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
});

// ─── Types ───────────────────────────────────────────────────

export interface AppConfig {
    readonly nodeEnv: 'development' | 'production' | 'test';
    readonly port: number;
    readonly host: string;
    readonly corsOrigins: readonly string[];
    readonly policyFile: string;
    readonly reportDir: string;
    readonly policyGenerator: 'deterministic' | 'assisted';
    readonly groqApiKey?: string;
    readonly groqPolicyModel?: string;
    readonly policyModelTimeoutMs: number;
    readonly metricsEnabled: boolean;
    readonly rateLimitMax: number;
}

// ─── Loader ──────────────────────────────────────────────────

/**
 * Parse environment variables into a typed, frozen configuration.
 * Empty strings count as unset so `FOO=` in a .env file falls back to the default.
 *
 * @throws ConfigError when any variable fails validation
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
    );

    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        throw new ConfigError(zodIssues(parsed.error));
    }

    const e = parsed.data;
    return Object.freeze({
        nodeEnv: e.NODE_ENV,
        port: e.PORT,
        host: e.HOST,
        corsOrigins: Object.freeze(e.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean)),
        policyFile: e.POLICY_FILE,
        reportDir: e.REPORT_DIR,
        policyGenerator: e.POLICY_GENERATOR,
        groqApiKey: e.GROQ_API_KEY,
        groqPolicyModel: e.GROQ_POLICY_MODEL,
        policyModelTimeoutMs: e.POLICY_MODEL_TIMEOUT_MS,
        metricsEnabled: e.METRICS_ENABLED,
        rateLimitMax: e.RATE_LIMIT_MAX,
    });
}
