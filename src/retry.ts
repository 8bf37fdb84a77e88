// ============================================================================
// Herald — Retry & Timeout Utilities
// Shared exponential backoff retry logic, plus a timeout wrapper that turns a
// slow capability call into a transient failure.
// ============================================================================

import { createLogger } from './logger.js';
import { TimeoutError, errorMessage, isTransient } from './errors.js';

const log = createLogger('Retry');

export interface RetryOptions {
    /** Maximum number of attempts, first one included (default: 3) */
    maxAttempts?: number;
    /** Base delay in ms, doubled each attempt (default: 2000) */
    baseDelayMs?: number;
    /** Upper bound on a single backoff delay (default: 5 minutes) */
    maxDelayMs?: number;
    /** Custom label for log messages */
    label?: string;
    /** Lets an error dictate its own wait, e.g. a rate limiter's retry-after */
    retryAfterMs?: (error: unknown) => number | undefined;
    /** Sleep implementation; injected by tests and by the scheduler's clock */
    sleep?: (ms: number) => Promise<void>;
}

export const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Delay before retry number `attempt` (1-based): base, 2×base, 4×base, ...
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs = Number.POSITIVE_INFINITY): number {
    return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Execute an async function with exponential backoff retries.
 * Non-retryable errors are rethrown immediately.
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options?: RetryOptions,
): Promise<T> {
    const {
        maxAttempts = 3,
        baseDelayMs = 2000,
        maxDelayMs = 5 * 60 * 1000,
        label = 'operation',
        retryAfterMs,
        sleep = defaultSleep,
    } = options ?? {};

    let lastError: unknown;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            lastError = error;

            if (!isTransient(error)) {
                log.warn(`${label}: non-retryable failure — not retrying`, { error: errorMessage(error).slice(0, 200) });
                throw error;
            }

            if (attempt >= maxAttempts) {
                log.warn(`${label}: failed after ${maxAttempts} attempts`, { error: errorMessage(error).slice(0, 200) });
                throw error;
            }

            const hinted = retryAfterMs?.(error);
            const delayMs = Math.min(maxDelayMs, Math.max(hinted ?? 0, backoffDelay(attempt, baseDelayMs, maxDelayMs)));
            log.debug(`${label}: attempt ${attempt}/${maxAttempts} failed, retrying in ${delayMs}ms`, {
                error: errorMessage(error).slice(0, 200),
            });
            await sleep(delayMs);
        }
    }

    // Only reachable with maxAttempts < 1
    throw lastError ?? new Error(`${label} was never attempted`);
}

/**
 * Bound an abortable call by a timeout. On expiry the call's signal is aborted
 * and the returned promise rejects with a transient `TimeoutError`.
 */
export async function withTimeout<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    label: string,
): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = new TimeoutError(label, timeoutMs);
            controller.abort(error);
            reject(error);
        }, timeoutMs);
    });

    try {
        return await Promise.race([fn(controller.signal), timeout]);
    } finally {
        clearTimeout(timer);
    }
}
