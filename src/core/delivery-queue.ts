import type { ForwardJob } from '../types/relay.js';
import type { Clock } from './rate-limiter.js';

export interface DeliveryQueueOptions {
    /** Maximum number of queued jobs. @default 100 */
    capacity?: number;
    /** Monotonic clock used to compare against `ForwardJob.notBefore`. */
    now?: Clock;
}

const DEFAULT_CAPACITY = 100;

/**
 * Bounded hand-off between message ingestion and the delivery lanes.
 *
 * Ingestion never blocks: when the queue is full the oldest job that has not
 * been attempted yet is evicted and handed back to the caller. Retried jobs are
 * rescheduled with {@link requeue} and wait until their `notBefore` time.
 * Ordering across retries is not preserved.
 */
export class DeliveryQueue {
    readonly #capacity: number;
    readonly #now: Clock;
    #jobs: ForwardJob[] = [];
    #closed = false;
    readonly #wakeups = new Set<() => void>();

    constructor(options: DeliveryQueueOptions = {}) {
        const capacity = options.capacity ?? DEFAULT_CAPACITY;
        this.#capacity = Number.isInteger(capacity) && capacity > 0 ? capacity : DEFAULT_CAPACITY;
        this.#now = options.now ?? (() => performance.now());
    }

    get size(): number {
        return this.#jobs.length;
    }

    get capacity(): number {
        return this.#capacity;
    }

    get closed(): boolean {
        return this.#closed;
    }

    /**
     * Enqueue a fresh job.
     * @returns The job evicted to make room, if any. This may be `job` itself
     *          when every queued job has already started.
     */
    offer(job: ForwardJob): ForwardJob | undefined {
        let evicted: ForwardJob | undefined;

        if (this.#jobs.length >= this.#capacity) {
            const index = this.#jobs.findIndex((queued) => queued.attempts === 0);
            if (index === -1) {
                return job;
            }
            evicted = this.#jobs.splice(index, 1)[0];
        }

        this.#jobs.push(job);
        this.#wake();
        return evicted;
    }

    /** Put a started job back; it becomes eligible at `job.notBefore`. */
    requeue(job: ForwardJob): void {
        this.#jobs.push(job);
        this.#wake();
    }

    /**
     * Take the next eligible job, suspending until one is due.
     * Resolves `null` once `signal` aborts, or once the queue is closed and empty.
     */
    async take(signal: AbortSignal): Promise<ForwardJob | null> {
        for (;;) {
            if (signal.aborted) return null;

            const now = this.#now();
            const index = this.#jobs.findIndex((job) => job.notBefore <= now);
            if (index !== -1) {
                return this.#jobs.splice(index, 1)[0] ?? null;
            }

            if (this.#closed && this.#jobs.length === 0) return null;

            const earliest = this.#jobs.reduce((min, job) => Math.min(min, job.notBefore), Number.POSITIVE_INFINITY);
            await this.#waitForChange(Number.isFinite(earliest) ? earliest - now : undefined, signal);
        }
    }

    /** Mark the queue closed; idle `take` calls resolve null once it is empty. */
    close(): void {
        this.#closed = true;
        this.#wake();
    }

    /** Remove and return every queued job. */
    drain(): ForwardJob[] {
        const jobs = this.#jobs;
        this.#jobs = [];
        this.#wake();
        return jobs;
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #waitForChange(waitMs: number | undefined, signal: AbortSignal): Promise<void> {
        return new Promise<void>((resolve) => {
            let timer: ReturnType<typeof setTimeout> | undefined;
            const done = (): void => {
                if (timer !== undefined) clearTimeout(timer);
                this.#wakeups.delete(done);
                signal.removeEventListener('abort', done);
                resolve();
            };

            this.#wakeups.add(done);
            signal.addEventListener('abort', done, { once: true });
            if (waitMs !== undefined) {
                timer = setTimeout(done, Math.max(0, waitMs));
            }
        });
    }

    #wake(): void {
        for (const wakeup of [...this.#wakeups]) {
            wakeup();
        }
    }
}
