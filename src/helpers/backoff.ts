import { BackoffConfig } from '../config/config';
import { AbortError, isTransient } from '../domain/errors';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const DEFAULT_BACKOFF: BackoffConfig = {
    baseDelayMs: 500,
    maxDelayMs: 30_000,
    multiplier: 2,
};

/** Delay before retry number `attempt` (1-based), capped at `maxDelayMs`. */
export function backoffDelay(attempt: number, config: BackoffConfig): number {
    const exponential = config.baseDelayMs * Math.pow(config.multiplier, attempt - 1);
    return Math.min(exponential, config.maxDelayMs);
}

export const sleep: SleepFn = (ms, signal) =>
    new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(new AbortError());
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(new AbortError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });

export interface BackoffOptions {
    config: BackoffConfig;
    signal?: AbortSignal;
    sleep?: SleepFn;
    onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Runs `fn` until it resolves. Transient RPC failures are retried after an
 * exponentially growing, capped delay, with no retry budget; anything else is
 * rethrown at once. Aborting `signal` rejects with {@link AbortError}.
 */
export async function withBackoff<T>(fn: () => Promise<T>, options: BackoffOptions): Promise<T> {
    const wait = options.sleep ?? sleep;

    for (let attempt = 1; ; attempt++) {
        if (options.signal?.aborted) throw new AbortError();
        try {
            return await fn();
        } catch (error) {
            if (!isTransient(error)) throw error;

            const delayMs = backoffDelay(attempt, options.config);
            options.onRetry?.(attempt, error, delayMs);
            await wait(delayMs, options.signal);
        }
    }
}
