import { describe, expect, it } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('loadConfig', () => {
    it('applies defaults to an empty environment', () => {
        expect(loadConfig({})).toEqual({
            nodeEnv: 'development',
            port: 3000,
            host: '0.0.0.0',
            corsOrigins: ['http://localhost:5173'],
            policyFile: 'policies.json',
            reportDir: 'output',
            policyGenerator: 'deterministic',
            groqApiKey: undefined,
            groqPolicyModel: undefined,
            policyModelTimeoutMs: 20_000,
            metricsEnabled: true,
            rateLimitMax: 100,
        });
    });

    it('parses and coerces provided values', () => {
        const config = loadConfig({
            PORT: '8080',
            CORS_ORIGIN: 'https://a.test, https://b.test',
            METRICS_ENABLED: '0',
            POLICY_GENERATOR: 'assisted',
            GROQ_API_KEY: 'test-secret',
            POLICY_MODEL_TIMEOUT_MS: '5000',
        });

        expect(config).toMatchObject({
            port: 8080,
            corsOrigins: ['https://a.test', 'https://b.test'],
            metricsEnabled: false,
            policyGenerator: 'assisted',
            groqApiKey: 'test-secret',
            policyModelTimeoutMs: 5000,
        });
    });

    it('treats empty strings as unset', () => {
        expect(loadConfig({ PORT: '', POLICY_FILE: '' })).toMatchObject({ port: 3000, policyFile: 'policies.json' });
    });

    it('returns a frozen object', () => {
        expect(Object.isFrozen(loadConfig({}))).toBe(true);
    });

    it('raises ConfigError naming every invalid variable', () => {
        let caught: unknown;
        try {
            loadConfig({ PORT: 'abc', POLICY_GENERATOR: 'magic' });
        } catch (err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(ConfigError);
        if (caught instanceof ConfigError) {
            expect(Object.keys(caught.issues)).toEqual(['PORT', 'POLICY_GENERATOR']);
            expect(caught.message).toBe('Invalid configuration: PORT, POLICY_GENERATOR');
            expect(caught.isOperational).toBe(false);
        }
    });
});
