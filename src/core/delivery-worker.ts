import type { DeliveryOutcome, ForwardJob } from '../types/relay.js';
import type { Transport } from '../types/transport.js';
import { PermanentDeliveryError, RateLimitSignal, errorMessage } from './errors.js';
import type { RateLimiter } from './rate-limiter.js';
import type { StatsTracker } from './stats-tracker.js';
import { computeBackoffDelay, sleep, SleepAbortedError } from '../utils/retry.js';
import { logThought } from '../utils/logger.js';

export interface DeliveryWorkerOptions {
    destinationId: string;
    /** Transient failures tolerated before a job is abandoned. @default 3 */
    maxRetries?: number;
    /** First transient retry delay in ms. @default 1000 */
    retryBaseDelayMs?: number;
    /** Cap for transient retry delays in ms. @default 60000 */
    retryMaxDelayMs?: number;
}

export const SHUTDOWN_REASON = 'shutdown';
export const MAX_RETRIES_REASON = 'max retries exceeded';

const DEFAULTS = {
    maxRetries: 3,
    retryBaseDelayMs: 1000,
    retryMaxDelayMs: 60_000,
};

/**
 * Performs one delivery attempt per call and classifies the result.
 *
 * Pipeline per attempt:
 * 1. Wait for the rate limiter (cancellable through the abort signal)
 * 2. Send through the transport
 * 3. Map success / flood control / transient / permanent failures to an outcome
 *
 * Errors never escape `process`. Terminal failures are counted exactly once;
 * retries leave the counters untouched because the job is still in flight.
 */
export class DeliveryWorker {
    readonly #transport: Transport;
    readonly #limiter: RateLimiter;
    readonly #stats: StatsTracker;
    readonly #destinationId: string;
    readonly #maxRetries: number;
    readonly #retryBaseDelayMs: number;
    readonly #retryMaxDelayMs: number;

    constructor(transport: Transport, limiter: RateLimiter, stats: StatsTracker, options: DeliveryWorkerOptions) {
        this.#transport = transport;
        this.#limiter = limiter;
        this.#stats = stats;
        this.#destinationId = options.destinationId;
        this.#maxRetries = options.maxRetries ?? DEFAULTS.maxRetries;
        this.#retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULTS.retryBaseDelayMs;
        this.#retryMaxDelayMs = options.retryMaxDelayMs ?? DEFAULTS.retryMaxDelayMs;
    }

    get maxRetries(): number {
        return this.#maxRetries;
    }

    async process(job: ForwardJob, signal: AbortSignal): Promise<DeliveryOutcome> {
        try {
            await this.#waitForSlot(signal);
        } catch (err) {
            if (err instanceof SleepAbortedError) {
                return this.abandon(job, SHUTDOWN_REASON);
            }
            throw err;
        }

        try {
            await this.#transport.send(this.#destinationId, job.message);
        } catch (err) {
            return this.#classifyFailure(job, err);
        }

        this.#limiter.notifySent();
        this.#stats.incrementForwarded();
        return { kind: 'delivered' };
    }

    /** Terminate a job without sending it (shutdown, queue overflow). */
    abandon(job: ForwardJob, reason: string): DeliveryOutcome {
        this.#stats.incrementFailed(reason);
        void logThought(
            `[DeliveryWorker] Abandoned message ${job.message.messageId} after ${job.attempts} attempt(s): ${reason}`,
        );
        return { kind: 'abandoned', reason };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    /** Re-check after each sleep: a backoff may have been extended meanwhile. */
    async #waitForSlot(signal: AbortSignal): Promise<void> {
        let waitMs = this.#limiter.reserve();
        while (waitMs > 0) {
            await sleep(waitMs, signal);
            waitMs = this.#limiter.reserve();
        }
        if (signal.aborted) {
            throw new SleepAbortedError();
        }
    }

    #classifyFailure(job: ForwardJob, err: unknown): DeliveryOutcome {
        if (err instanceof RateLimitSignal) {
            this.#limiter.notifyBackoff(err.retryAfterMs);
            job.attempts += 1;
            void logThought(
                `[DeliveryWorker] Flood control on message ${job.message.messageId}; retrying in ${err.retryAfterMs}ms.`,
            );
            return { kind: 'retry_later', delayMs: err.retryAfterMs, cause: 'rate_limited' };
        }

        if (err instanceof PermanentDeliveryError) {
            job.attempts += 1;
            return this.abandon(job, err.reason);
        }

        const retryIndex = job.transientFailures;
        job.attempts += 1;
        job.transientFailures += 1;
        const message = errorMessage(err);

        if (job.transientFailures < this.#maxRetries) {
            const delayMs = computeBackoffDelay(retryIndex, {
                baseDelayMs: this.#retryBaseDelayMs,
                maxDelayMs: this.#retryMaxDelayMs,
            });
            void logThought(
                `[DeliveryWorker] Message ${job.message.messageId} failed attempt ${job.transientFailures}/${this.#maxRetries}: ${message}. Retrying in ${delayMs}ms.`,
            );
            return { kind: 'retry_later', delayMs, cause: 'transient' };
        }

        return this.abandon(job, MAX_RETRIES_REASON);
    }
}
