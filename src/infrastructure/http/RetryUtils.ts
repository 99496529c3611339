import axios from 'axios';

/**
 * Exponential backoff for transient failures of outbound HTTP calls.
 */
export interface RetryOptions {
    /** Maximum number of attempts (default: 3) */
    maxAttempts?: number;
    /** Delay before the first retry in milliseconds (default: 2000) */
    initialBackoffMs?: number;
    /** Upper bound for any single delay (default: 30000) */
    maxBackoffMs?: number;
    /** Backoff multiplier (default: 2) */
    backoffMultiplier?: number;
    /** Decides whether a failure is worth another attempt (default: all errors) */
    isRetryable?: (error: unknown) => boolean;
    /** Called before each wait */
    onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
    maxAttempts: 3,
    initialBackoffMs: 2000,
    maxBackoffMs: 30000,
    backoffMultiplier: 2,
    isRetryable: () => true,
    onRetry: () => { },
};

const RETRYABLE_STATUSES = new Set([429, 502, 503, 504]);

export async function withRetry<T>(
    fn: () => Promise<T>,
    options?: RetryOptions
): Promise<T> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    let currentBackoff = opts.initialBackoffMs;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            if (attempt >= opts.maxAttempts || !opts.isRetryable(error)) {
                throw error;
            }

            const delay = Math.min(currentBackoff, opts.maxBackoffMs);
            opts.onRetry(attempt, error, delay);
            await sleep(delay);

            currentBackoff = Math.min(currentBackoff * opts.backoffMultiplier, opts.maxBackoffMs);
        }
    }
}

/**
 * Rate limits and gateway failures are retried; everything else fails fast.
 */
export function isRetryableHttpError(error: unknown): boolean {
    if (!axios.isAxiosError(error)) {
        return false;
    }
    const status = error.response?.status;
    return status !== undefined && RETRYABLE_STATUSES.has(status);
}

/**
 * Best available message for a failed HTTP call: the API's own error text when present.
 */
export function describeHttpError(error: unknown): string {
    if (axios.isAxiosError(error)) {
        const data: unknown = error.response?.data;
        if (isRecord(data)) {
            if (isRecord(data.error) && typeof data.error.message === 'string') {
                return data.error.message;
            }
            if (typeof data.detail === 'string') {
                return data.detail;
            }
        }
        return error.message;
    }
    return error instanceof Error ? error.message : String(error);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
