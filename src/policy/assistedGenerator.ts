import { z } from 'zod';
import type { Section } from '../analysis/types.js';
import { PolicyGenerationError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { fetchWithTimeout, retryWithBackoff } from '../lib/timeout.js';
import { DeterministicGenerator } from './deterministicGenerator.js';
import type { PolicyGenerator } from './generator.js';
import { buildPolicyGenerationPrompt, POLICY_SYSTEM_PROMPT } from './prompts.js';
import { GeneratedPolicySchema, newRuleId, type GeneratedPolicy } from './schema.js';

const log = createLogger('policy.assisted');

// ─── Configuration ────────────────────────────────────────────

export const GROQ_API_URL = 'https://api.groq.com/openai/v1/chat/completions';

/** Tried after the configured model, in this order. */
export const DEFAULT_POLICY_MODELS = ['llama-3.1-8b-instant', 'openai/gpt-oss-120b'] as const;

const DEFAULT_TOP_K = 5;
const DEFAULT_TIMEOUT_MS = 20_000;
const DEFAULT_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 1_000;

export interface AssistedGeneratorOptions {
    apiKey?: string;
    model?: string;
    apiUrl?: string;
    /** Number of leading sections sent as context. */
    topK?: number;
    timeoutMs?: number;
    attempts?: number;
    baseDelayMs?: number;
    /** Used whenever the model path fails. Defaults to the deterministic generator. */
    fallback?: PolicyGenerator;
    now?: () => Date;
}

// ─── Zod Schemas ─────────────────────────────────────────────

const ChatCompletionSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({ content: z.string().nullable() }),
            }),
        )
        .min(1),
});

// ─── Generator ───────────────────────────────────────────────

export class AssistedGenerator implements PolicyGenerator {
    readonly name = 'assisted';

    private readonly fallback: PolicyGenerator;
    private readonly now: () => Date;

    constructor(private readonly options: AssistedGeneratorOptions = {}) {
        this.now = options.now ?? (() => new Date());
        this.fallback = options.fallback ?? new DeterministicGenerator({ now: this.now });
    }

    /** Configured model first, then the defaults, without repeats. */
    candidateModels(): string[] {
        const models = [this.options.model, ...DEFAULT_POLICY_MODELS].filter(
            (m): m is string => typeof m === 'string' && m.length > 0,
        );
        return [...new Set(models)];
    }

    async generate(sections: readonly Section[], sourceDocument: string): Promise<GeneratedPolicy> {
        try {
            return await this.generateWithModel(sections, sourceDocument);
        } catch (err) {
            log.warn({ err, sourceDocument }, 'Assisted policy generation failed, using deterministic rules');
            return this.fallback.generate(sections, sourceDocument);
        }
    }

    private async generateWithModel(sections: readonly Section[], sourceDocument: string): Promise<GeneratedPolicy> {
        const apiKey = this.options.apiKey;
        if (!apiKey) {
            throw new PolicyGenerationError('GROQ_API_KEY is not set');
        }

        const excerpts = sections
            .slice(0, this.options.topK ?? DEFAULT_TOP_K)
            .map((s) => s.text)
            .join('\n\n---\n\n');

        const { model, content } = await this.complete(buildPolicyGenerationPrompt(excerpts), apiKey);

        const raw = extractJsonObject(content);
        if (!raw) {
            throw new PolicyGenerationError(`Model ${model} returned no JSON object`, model);
        }

        const parsed = GeneratedPolicySchema.safeParse({
            policy_id: `POLICY-${newRuleId()}`,
            source_document: sourceDocument,
            generated_at: this.now().toISOString(),
            metadata: { generator: 'assisted', model },
            ...raw,
        });
        if (!parsed.success) {
            log.debug({ issues: parsed.error.issues, model }, 'Generated policy failed validation');
            throw new PolicyGenerationError(`Model ${model} returned a policy that fails validation`, model);
        }

        log.info({ model, ruleCount: parsed.data.rules.length, sourceDocument }, 'Assisted policy generated');
        return parsed.data;
    }

    private async complete(prompt: string, apiKey: string): Promise<{ model: string; content: string }> {
        let lastError: unknown = new PolicyGenerationError('No candidate models configured');

        for (const model of this.candidateModels()) {
            try {
                const content = await retryWithBackoff(() => this.callModel(prompt, model, apiKey), {
                    attempts: this.options.attempts ?? DEFAULT_ATTEMPTS,
                    baseDelayMs: this.options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS,
                    timeoutMs: this.timeoutMs(),
                    label: `Groq ${model}`,
                    isRetryable: (err) => !isModelMissing(err),
                    onRetry: (err, attempt, delayMs) => {
                        log.warn({ err, model, attempt, delayMs }, 'Retrying policy model call');
                    },
                });
                return { model, content };
            } catch (err) {
                lastError = err;
                log.warn(
                    { err, model },
                    isModelMissing(err) ? 'Model not available, trying next candidate' : 'Model failed, trying next candidate',
                );
            }
        }

        throw lastError;
    }

    private async callModel(prompt: string, model: string, apiKey: string): Promise<string> {
        const response = await fetchWithTimeout(
            this.options.apiUrl ?? GROQ_API_URL,
            {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Authorization: `Bearer ${apiKey}`,
                },
                body: JSON.stringify({
                    model,
                    messages: [
                        { role: 'system', content: POLICY_SYSTEM_PROMPT },
                        { role: 'user', content: prompt },
                    ],
                    temperature: 0.1,
                    max_tokens: 4096,
                    response_format: { type: 'json_object' },
                }),
            },
            this.timeoutMs(),
        );

        if (!response.ok) {
            const body = await response.text();
            throw new PolicyGenerationError(
                `Groq API error (${model}) ${response.status}: ${body.slice(0, 200)}`,
                model,
                response.status,
            );
        }

        const data = ChatCompletionSchema.safeParse(await response.json());
        const content = data.success ? data.data.choices[0]?.message.content : undefined;
        if (!content) {
            throw new PolicyGenerationError(`Groq model ${model} returned empty response`, model, response.status);
        }

        return content;
    }

    private timeoutMs(): number {
        return this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    }
}

// ─── Helpers ─────────────────────────────────────────────────

function isModelMissing(err: unknown): boolean {
    if (err instanceof PolicyGenerationError && err.httpStatus === 404) return true;
    if (!(err instanceof Error)) return false;
    const msg = err.message.toLowerCase();
    return msg.includes('not found') || msg.includes('not_found');
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseObject(text: string): Record<string, unknown> | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch {
        return null;
    }
    return isRecord(parsed) ? parsed : null;
}

/**
 * Pull a JSON object out of a model reply. Markdown fences are stripped first;
 * failing that, the span from the first `{` to the last `}` is cut back one
 * closing brace at a time until it parses.
 */
export function extractJsonObject(reply: string): Record<string, unknown> | null {
    const cleaned = reply
        .replace(/^```json\s*/i, '')
        .replace(/^```\s*/i, '')
        .replace(/\s*```$/i, '')
        .trim();

    const direct = parseObject(cleaned);
    if (direct) return direct;

    const start = cleaned.indexOf('{');
    const end = cleaned.lastIndexOf('}');
    if (start === -1 || end <= start) return null;

    const candidate = cleaned.slice(start, end + 1);
    let stop = candidate.length;
    while (stop > 0) {
        const parsed = parseObject(candidate.slice(0, stop));
        if (parsed) return parsed;
        stop = candidate.lastIndexOf('}', stop - 2) + 1;
    }

    return null;
}
