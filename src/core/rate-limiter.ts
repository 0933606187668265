/** Monotonic millisecond clock. */
export type Clock = () => number;

export interface RateLimiterOptions {
    /** Minimum spacing between two sends in ms. @default 2000 */
    minIntervalMs?: number;
    /** Injectable monotonic clock. Defaults to `performance.now()`. */
    now?: Clock;
}

const DEFAULT_MIN_INTERVAL_MS = 2000;

const monotonicNow: Clock = () => performance.now();

/**
 * Global send pacing for the delivery path.
 *
 * Combines a fixed minimum spacing between sends with provider-imposed
 * backoff windows. `reserve()` only computes the wait so the caller can sleep
 * at a cancellable point. All state changes go through the three mutators
 * below; Node's single thread makes each of them atomic.
 */
export class RateLimiter {
    readonly #minIntervalMs: number;
    readonly #now: Clock;
    #lastSendAt: number | null = null;
    #backoffUntil = Number.NEGATIVE_INFINITY;

    constructor(options: RateLimiterOptions = {}) {
        const interval = options.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS;
        this.#minIntervalMs = Number.isFinite(interval) ? Math.max(0, interval) : DEFAULT_MIN_INTERVAL_MS;
        this.#now = options.now ?? monotonicNow;
    }

    get minIntervalMs(): number {
        return this.#minIntervalMs;
    }

    /** Milliseconds the caller must wait before sending. Never negative. */
    reserve(): number {
        const now = this.#now();
        const spacingWait = this.#lastSendAt === null ? 0 : this.#lastSendAt + this.#minIntervalMs - now;
        const backoffWait = this.#backoffUntil - now;
        return Math.max(0, spacingWait, backoffWait);
    }

    /** Extend the provider backoff window. An active window is never shortened. */
    notifyBackoff(durationMs: number): void {
        const duration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
        const candidate = this.#now() + duration;
        if (candidate > this.#backoffUntil) {
            this.#backoffUntil = candidate;
        }
    }

    /** Record a successful send. */
    notifySent(): void {
        this.#lastSendAt = this.#now();
    }

    /** Remaining provider backoff in ms (0 when none is active). */
    backoffRemainingMs(): number {
        return Math.max(0, this.#backoffUntil - this.#now());
    }

    /** Monotonic deadline of the current backoff window, or null when none is active. */
    backoffUntil(): number | null {
        return this.backoffRemainingMs() > 0 ? this.#backoffUntil : null;
    }
}
