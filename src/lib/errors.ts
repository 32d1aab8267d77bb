/**
 * Error classes for the clause risk engine.
 *
 * All errors serialize to RFC 7807 problem details, so the HTTP layer and the
 * CLI report failures in one shape.
 */
import type { ZodError } from 'zod';

const PROBLEM_TYPE_BASE = '/problems';

// ─── RFC 7807 Error Response Shape ───────────────────────────────
export interface ErrorResponse {
    error: {
        type: string;
        title: string;
        status: number;
        detail: string;
        instance?: string;
        requestId?: string;
        errors?: Record<string, string[]>;
    };
}

// ─── Base Application Error ──────────────────────────────────────
export class AppError extends Error {
    public readonly statusCode: number;
    public readonly errorType: string;
    public readonly title: string;
    public readonly isOperational: boolean;

    constructor(
        message: string,
        statusCode: number,
        errorType: string,
        title: string,
        isOperational = true,
        options?: ErrorOptions,
    ) {
        super(message, options);
        this.name = this.constructor.name;
        this.statusCode = statusCode;
        this.errorType = errorType;
        this.title = title;
        this.isOperational = isOperational;

        Error.captureStackTrace?.(this, this.constructor);
    }

    /**
     * Serialize to RFC 7807 response format.
     */
    toResponse(instance?: string, requestId?: string): ErrorResponse {
        return {
            error: {
                type: `${PROBLEM_TYPE_BASE}/${this.errorType}`,
                title: this.title,
                status: this.statusCode,
                detail: this.message,
                ...(instance && { instance }),
                ...(requestId && { requestId }),
            },
        };
    }
}

// ─── 400: Input Error ────────────────────────────────────────────
/**
 * Malformed or unreadable document, policy list or request body.
 * Surfaced to the caller; never recovered inside the scoring core.
 */
export class InputError extends AppError {
    public readonly issues?: Record<string, string[]>;

    constructor(message: string, issues?: Record<string, string[]>, options?: ErrorOptions) {
        super(message, 400, 'invalid-input', 'Invalid Input', true, options);
        this.issues = issues;
    }

    /**
     * Build an InputError from a zod failure, keyed by dotted issue path.
     */
    static fromZod(message: string, error: ZodError): InputError {
        return new InputError(message, zodIssues(error), { cause: error });
    }

    override toResponse(instance?: string, requestId?: string): ErrorResponse {
        const base = super.toResponse(instance, requestId);
        if (this.issues) {
            base.error.errors = this.issues;
        }
        return base;
    }
}

// ─── 404: Not Found ──────────────────────────────────────────────
export class NotFoundError extends AppError {
    constructor(resource = 'Resource', identifier?: string) {
        const detail = identifier
            ? `${resource} '${identifier}' not found`
            : `${resource} not found`;
        super(detail, 404, 'not-found', 'Not Found');
    }
}

// ─── 429: Rate Limit Exceeded ────────────────────────────────────
export class RateLimitError extends AppError {
    public readonly retryAfterSeconds: number;

    constructor(retryAfterSeconds: number) {
        super(
            `Rate limit exceeded. Please retry after ${retryAfterSeconds} seconds.`,
            429,
            'rate-limit-exceeded',
            'Rate Limit Exceeded',
        );
        this.retryAfterSeconds = retryAfterSeconds;
    }
}

// ─── 502: Policy Generation Error ────────────────────────────────
export class PolicyGenerationError extends AppError {
    public readonly modelUsed?: string;
    public readonly httpStatus?: number;

    constructor(message: string, modelUsed?: string, httpStatus?: number) {
        super(message, 502, 'policy-generation-failed', 'Policy Generation Failed');
        this.modelUsed = modelUsed;
        this.httpStatus = httpStatus;
    }
}

// ─── 500: Configuration Error ────────────────────────────────────
export class ConfigError extends AppError {
    public readonly issues: Record<string, string[]>;

    constructor(issues: Record<string, string[]>) {
        const keys = Object.keys(issues).join(', ');
        super(
            `Invalid configuration: ${keys}`,
            500,
            'invalid-configuration',
            'Invalid Configuration',
            false, // Non-operational: the process cannot run with this environment
        );
        this.issues = issues;
    }
}

// ─── Error Type Guard ────────────────────────────────────────────
export function isAppError(error: unknown): error is AppError {
    return error instanceof AppError;
}

// ─── Helpers ─────────────────────────────────────────────────────
export function zodIssues(error: ZodError): Record<string, string[]> {
    const issues: Record<string, string[]> = {};
    for (const issue of error.issues) {
        const key = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        (issues[key] ??= []).push(issue.message);
    }
    return issues;
}
