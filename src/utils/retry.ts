/** Exponential backoff parameters. */
export interface BackoffOptions {
    /** Delay for the first retry in ms. @default 1000 */
    baseDelayMs?: number;
    /** Multiplier applied per additional attempt. @default 2 */
    backoffFactor?: number;
    /** Upper bound for any single delay in ms. @default 60000 */
    maxDelayMs?: number;
}

const DEFAULTS: Required<BackoffOptions> = {
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 60_000,
};

/**
 * Delay before retry number `retryIndex` (0-based): `base * factor^retryIndex`,
 * capped at `maxDelayMs`.
 *
 * @example
 * ```ts
 * computeBackoffDelay(0); // 1000
 * computeBackoffDelay(3, { baseDelayMs: 500, maxDelayMs: 2000 }); // 2000
 * ```
 */
export function computeBackoffDelay(retryIndex: number, options: BackoffOptions = {}): number {
    const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;

    const index = Math.max(0, Math.floor(retryIndex));
    return Math.max(0, Math.min(baseDelayMs * backoffFactor ** index, maxDelayMs));
}

/** Raised by {@link sleep} when its signal aborts. */
export class SleepAbortedError extends Error {
    constructor() {
        super('Sleep aborted');
        this.name = 'SleepAbortedError';
    }
}

/**
 * Suspend for `ms` milliseconds. Rejects with {@link SleepAbortedError} as soon
 * as `signal` aborts, clearing the pending timer.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
        return Promise.reject(new SleepAbortedError());
    }
    if (ms <= 0) {
        return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(new SleepAbortedError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
