/**
 * timeout.ts
 *
 * Timeout and retry helpers for the remote model calls made during policy
 * generation. The scoring core never calls these.
 *
 *  - makeAbortSignal(ms)     → AbortSignal that fires after ms, with a clear()
 *  - fetchWithTimeout(...)   → fetch with a per-call timeout
 *  - withTimeout(p, ms)      → Promise.race wrapper
 *  - retryWithBackoff(fn)    → exponential backoff with a per-attempt timeout
 */

// ─── AbortSignal with explicit clear ──────────────────────────

/**
 * Returns an AbortSignal that fires after `ms` milliseconds.
 * Call clear() once the guarded work settles so no timer outlives it.
 */
export function makeAbortSignal(ms: number): {
    signal: AbortSignal;
    clear: () => void;
} {
    const controller = new AbortController();
    const handle = setTimeout(() => {
        controller.abort(new Error(`Request timed out after ${ms}ms`));
    }, ms);

    return {
        signal: controller.signal,
        clear: () => clearTimeout(handle),
    };
}

// ─── fetch with timeout ───────────────────────────────────────

/**
 * fetch() with a timeout; a caller-supplied signal still aborts the request.
 *
 * @example
 * ```ts
 * const response = await fetchWithTimeout(
 *   'https://api.groq.com/openai/v1/chat/completions',
 *   { method: 'POST', headers: {...}, body: '...' },
 *   20_000,
 * );
 * ```
 */
export async function fetchWithTimeout(
    url: string,
    options: RequestInit,
    timeoutMs: number,
): Promise<Response> {
    const { signal, clear } = makeAbortSignal(timeoutMs);

    const mergedSignal = options.signal
        ? AbortSignal.any([signal, options.signal])
        : signal;

    try {
        return await fetch(url, {
            ...options,
            signal: mergedSignal,
        });
    } finally {
        clear();
    }
}

// ─── Promise timeout wrapper ──────────────────────────────────

/**
 * Wraps any promise with a hard timeout.
 * If the promise doesn't settle within `ms`, rejects with a timeout error.
 */
export function withTimeout<T>(
    promise: Promise<T>,
    ms: number,
    label = 'Operation',
): Promise<T> {
    let handle: ReturnType<typeof setTimeout> | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
        handle = setTimeout(() => {
            reject(new Error(`${label} timed out after ${ms}ms`));
        }, ms);
    });

    return Promise.race([
        promise.finally(() => clearTimeout(handle)),
        timeoutPromise,
    ]);
}

// ─── Retry with exponential backoff ──────────────────────────

export interface RetryOptions {
    attempts: number;
    baseDelayMs: number;
    timeoutMs: number;
    label: string;
    isRetryable?: (err: unknown) => boolean;
    onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Retry an async operation with exponential backoff (base, 2×base, 4×base…).
 * Each attempt gets its own timeout. Non-retryable errors are rethrown at once.
 */
export async function retryWithBackoff<T>(
    fn: () => Promise<T>,
    options: RetryOptions,
): Promise<T> {
    const { attempts, baseDelayMs, timeoutMs, label, isRetryable = defaultIsRetryable, onRetry } = options;

    let lastError: unknown = new Error(`${label}: no attempts made`);

    for (let attempt = 1; attempt <= attempts; attempt++) {
        try {
            return await withTimeout(fn(), timeoutMs, `${label} (attempt ${attempt})`);
        } catch (err) {
            lastError = err;

            if (attempt === attempts || !isRetryable(err)) {
                throw err;
            }

            const delay = baseDelayMs * Math.pow(2, attempt - 1);
            onRetry?.(err, attempt, delay);
            await sleep(delay);
        }
    }

    throw lastError;
}

// ─── Helpers ─────────────────────────────────────────────────

export function defaultIsRetryable(err: unknown): boolean {
    if (!(err instanceof Error)) return false;

    const msg = err.message.toLowerCase();
    return (
        msg.includes('timed out') ||
        msg.includes('network') ||
        msg.includes('fetch') ||
        msg.includes('econnreset') ||
        msg.includes('econnrefused') ||
        msg.includes('503') ||
        msg.includes('502') ||
        msg.includes('429')
    );
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
