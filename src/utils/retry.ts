import { logThought } from './logger.js';
import { errorMessage } from '../types/errors.js';

export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 3 */
    maxAttempts?: number;
    /** Delay in ms before the first retry. @default 500 */
    baseDelayMs?: number;
    /** @default 2 */
    backoffFactor?: number;
    /** @default 5000 */
    maxDelayMs?: number;
    /** Label used in log lines, e.g. `slack:chat.postMessage`. */
    label?: string;
    /** Return false to stop retrying on errors that will not go away. */
    isRetryable?: (err: unknown) => boolean;
    /** Injectable for tests. */
    sleep?: (ms: number) => Promise<void>;
}

const DEFAULTS = {
    maxAttempts: 3,
    baseDelayMs: 500,
    backoffFactor: 2,
    maxDelayMs: 5_000,
} as const;

/** Delay before retry number `attempt` (1-based), capped at `maxDelayMs`. */
export function backoffDelay(attempt: number, baseDelayMs: number, factor: number, maxDelayMs: number): number {
    return Math.min(baseDelayMs * factor ** (attempt - 1), maxDelayMs);
}

/**
 * Run `fn` with bounded exponential backoff. Resolves with the first success;
 * rejects with the last error once attempts are exhausted or the error is not
 * retryable.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const maxAttempts = options.maxAttempts ?? DEFAULTS.maxAttempts;
    const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    const label = options.label ?? 'unnamed';
    const isRetryable = options.isRetryable ?? (() => true);
    const wait = options.sleep ?? sleep;

    for (let attempt = 1; ; attempt++) {
        try {
            const value = await fn();
            if (attempt > 1) {
                void logThought(`[Retry] ${label} succeeded on attempt ${attempt}/${maxAttempts}.`);
            }
            return value;
        } catch (err) {
            if (attempt >= maxAttempts || !isRetryable(err)) {
                void logThought(`[Retry] ${label} gave up after ${attempt} attempt(s): ${errorMessage(err)}`);
                throw err;
            }
            const delay = backoffDelay(attempt, baseDelayMs, backoffFactor, maxDelayMs);
            void logThought(
                `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${errorMessage(err)}. Retrying in ${delay}ms.`,
            );
            await wait(delay);
        }
    }
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
