import type { RelayStats } from '../types/relay.js';
import type { RelayStore } from '../types/store.js';
import type { JobScheduler } from '../services/job-scheduler.js';
import { logThought } from '../utils/logger.js';

export interface StatsTrackerOptions {
    /**
     * When provided, dirty counters are flushed on this scheduler's tick instead
     * of after every mutation.
     */
    scheduler?: JobScheduler;
    /** node-cron expression for batched flushes. @default every 2 seconds */
    flushCron?: string;
    now?: () => Date;
}

const FLUSH_JOB_ID = 'stats-flush';
const DEFAULT_FLUSH_CRON = '*/2 * * * * *';

function emptyStats(): RelayStats {
    return { received: 0, forwarded: 0, filtered: 0, failed: 0, lastError: null, lastErrorAt: null };
}

/**
 * Owner of the relay counters.
 *
 * Counters only move through the increment methods. Persistence is either
 * write-through (no scheduler) or batched on a short cron tick, so a crash
 * loses at most one flush interval of counts.
 */
export class StatsTracker {
    readonly #store: RelayStore;
    readonly #scheduler?: JobScheduler;
    readonly #flushCron: string;
    readonly #now: () => Date;
    #stats: RelayStats = emptyStats();
    #dirty = false;
    #started = false;

    constructor(store: RelayStore, options: StatsTrackerOptions = {}) {
        this.#store = store;
        this.#scheduler = options.scheduler;
        this.#flushCron = options.flushCron ?? DEFAULT_FLUSH_CRON;
        this.#now = options.now ?? (() => new Date());
    }

    /** Load persisted counters and begin batched flushing when a scheduler is configured. */
    start(): void {
        if (this.#started) return;
        this.#stats = { ...this.#store.loadStats() };
        this.#dirty = false;
        this.#started = true;

        this.#scheduler?.register({
            id: FLUSH_JOB_ID,
            cronExpression: this.#flushCron,
            description: 'Persist relay counters',
            handler: () => this.flush(),
        });
    }

    /** Stop batched flushing and persist any pending counts. */
    stop(): void {
        if (!this.#started) return;
        this.#scheduler?.unregister(FLUSH_JOB_ID);
        this.flush();
        this.#started = false;
    }

    incrementReceived(): void {
        this.#stats.received += 1;
        this.#changed();
    }

    incrementForwarded(): void {
        this.#stats.forwarded += 1;
        this.#changed();
    }

    incrementFiltered(): void {
        this.#stats.filtered += 1;
        this.#changed();
    }

    /** Count a terminal delivery failure and remember its reason. */
    incrementFailed(reason: string): void {
        this.#stats.failed += 1;
        this.#setLastError(reason);
        this.#changed();
    }

    /** Remember an error that does not correspond to a message (e.g. connection loss). */
    recordError(reason: string): void {
        this.#setLastError(reason);
        this.#changed();
    }

    /** Persist counters if anything changed since the last flush. No-op before {@link start}. */
    flush(): void {
        if (!this.#started || !this.#dirty) return;
        try {
            this.#store.saveStats({ ...this.#stats });
            this.#dirty = false;
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            console.error('[StatsTracker] Failed to persist stats:', message);
            void logThought(`[StatsTracker] Failed to persist stats: ${message}`);
        }
    }

    /** Frozen copy of the current counters. */
    snapshot(): Readonly<RelayStats> {
        return Object.freeze({ ...this.#stats });
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #setLastError(reason: string): void {
        this.#stats.lastError = reason;
        this.#stats.lastErrorAt = this.#now().toISOString();
    }

    #changed(): void {
        this.#dirty = true;
        if (this.#started && !this.#scheduler) {
            this.flush();
        }
    }
}
