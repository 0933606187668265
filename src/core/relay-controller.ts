import { randomUUID } from 'node:crypto';
import type {
    DeliveryOutcome,
    FilterRule,
    ForwardJob,
    RelayMessage,
    RelaySnapshot,
    RelayState,
    RelayStats,
} from '../types/relay.js';
import type { Transport, TransportHandlers, TransportSubscription } from '../types/transport.js';
import type { ErrorKind, RelayStore } from '../types/store.js';
import type { JobScheduler } from '../services/job-scheduler.js';
import { ConfigurationError, errorMessage, type ConnectionError } from './errors.js';
import { createFilterRule, matchedKeywords, qualifies, PASS_ALL } from './filter-engine.js';
import { RateLimiter, type Clock } from './rate-limiter.js';
import { DeliveryQueue } from './delivery-queue.js';
import { DeliveryWorker, SHUTDOWN_REASON } from './delivery-worker.js';
import { StatsTracker } from './stats-tracker.js';
import { computeBackoffDelay, sleep } from '../utils/retry.js';
import { logThought } from '../utils/logger.js';

export const QUEUE_OVERFLOW_REASON = 'queue overflow';

export interface RelayControllerOptions {
    sourceId: string;
    destinationId: string;
    /**
     * Keyword list from configuration. When given it replaces the stored rule
     * at startup; when omitted the stored rule (or pass-all) is used.
     */
    keywords?: readonly string[];
    /** Forward messages that carry media. @default true */
    forwardMedia?: boolean;
    /** Minimum spacing between sends. @default 2000 */
    minIntervalMs?: number;
    maxRetries?: number;
    retryBaseDelayMs?: number;
    retryMaxDelayMs?: number;
    queueCapacity?: number;
    /** Concurrent delivery lanes. Provider limits are global, so more than one rarely helps. @default 1 */
    parallelism?: number;
    /** Time in-flight jobs get to finish after a stop request. @default 10000 */
    drainGraceMs?: number;
    reconnectBaseDelayMs?: number;
    /** @default 60000 */
    reconnectMaxDelayMs?: number;
    /** Enables batched stats persistence. */
    scheduler?: JobScheduler;
    statsFlushCron?: string;
    /** Monotonic clock shared by the limiter and the queue. */
    now?: Clock;
    /** Wall clock for timestamps. */
    wallClock?: () => Date;
    sessionId?: string;
}

export interface StateChangeEvent {
    state: RelayState;
    previous: RelayState;
    timestamp: Date;
}

export interface OutcomeEvent {
    messageId: string;
    attempts: number;
    outcome: DeliveryOutcome;
    timestamp: Date;
}

export interface ReconnectEvent {
    /** Consecutive failed connection attempts so far. */
    failures: number;
    delayMs: number;
    error: string;
    timestamp: Date;
}

export interface RelayEventMap {
    state: StateChangeEvent;
    outcome: OutcomeEvent;
    reconnect: ReconnectEvent;
}

type ListenerSets = { [K in keyof RelayEventMap]: Set<(event: RelayEventMap[K]) => void> };

const DEFAULTS = {
    forwardMedia: true,
    parallelism: 1,
    drainGraceMs: 10_000,
    reconnectBaseDelayMs: 1000,
    reconnectMaxDelayMs: 60_000,
};

/**
 * Relay supervisor: source subscription, ingestion, delivery lanes and shutdown.
 *
 * State machine:
 *
 *   disconnected ──start──▶ connecting ──subscribed──▶ listening
 *        ▲                   │    ▲                       │
 *        │                   └────┘ failure (backoff)     │
 *        └──────────────── connection lost ◀──────────────┘
 *   listening ──stop──▶ draining ──▶ stopped
 *
 * Ingestion only counts, filters and enqueues; it never waits on delivery.
 * Delivery lanes pull from the bounded queue and feed outcomes back into it.
 */
export class RelayController {
    readonly #transport: Transport;
    readonly #store: RelayStore;
    readonly #sourceId: string;
    readonly #destinationId: string;
    readonly #configuredKeywords?: readonly string[];
    readonly #forwardMedia: boolean;
    readonly #parallelism: number;
    readonly #drainGraceMs: number;
    readonly #reconnectBaseDelayMs: number;
    readonly #reconnectMaxDelayMs: number;
    readonly #minIntervalMs: number;
    readonly #now: Clock;
    readonly #wallClock: () => Date;
    readonly #sessionId: string;

    readonly #limiter: RateLimiter;
    readonly #queue: DeliveryQueue;
    readonly #stats: StatsTracker;
    readonly #worker: DeliveryWorker;

    readonly #listeners: ListenerSets = { state: new Set(), outcome: new Set(), reconnect: new Set() };

    #state: RelayState = 'disconnected';
    #rule: FilterRule = PASS_ALL;
    #started = false;
    #generation = 0;
    #subscription: TransportSubscription | null = null;
    /** Loss reported by the handlers of a subscribe call that has not resolved yet. */
    #pendingLoss: ConnectionError | null = null;
    #connectAbort = new AbortController();
    #lifecycle = new AbortController();
    #lanes: Promise<void>[] = [];
    #inFlight = 0;
    #stopping: Promise<void> | null = null;
    #baseline: Pick<RelayStats, 'received' | 'forwarded'> = { received: 0, forwarded: 0 };

    constructor(transport: Transport, store: RelayStore, options: RelayControllerOptions) {
        this.#transport = transport;
        this.#store = store;
        this.#sourceId = options.sourceId.trim();
        this.#destinationId = options.destinationId.trim();
        this.#configuredKeywords = options.keywords;
        this.#forwardMedia = options.forwardMedia ?? DEFAULTS.forwardMedia;
        this.#parallelism = Math.max(1, Math.floor(options.parallelism ?? DEFAULTS.parallelism));
        this.#drainGraceMs = Math.max(0, options.drainGraceMs ?? DEFAULTS.drainGraceMs);
        this.#reconnectBaseDelayMs = options.reconnectBaseDelayMs ?? DEFAULTS.reconnectBaseDelayMs;
        this.#reconnectMaxDelayMs = options.reconnectMaxDelayMs ?? DEFAULTS.reconnectMaxDelayMs;
        this.#now = options.now ?? (() => performance.now());
        this.#wallClock = options.wallClock ?? (() => new Date());
        this.#sessionId = options.sessionId ?? `relay-${randomUUID()}`;

        this.#limiter = new RateLimiter({ minIntervalMs: options.minIntervalMs, now: this.#now });
        this.#minIntervalMs = this.#limiter.minIntervalMs;
        this.#queue = new DeliveryQueue({ capacity: options.queueCapacity, now: this.#now });
        this.#stats = new StatsTracker(store, {
            scheduler: options.scheduler,
            flushCron: options.statsFlushCron,
            now: this.#wallClock,
        });
        this.#worker = new DeliveryWorker(transport, this.#limiter, this.#stats, {
            destinationId: this.#destinationId,
            maxRetries: options.maxRetries,
            retryBaseDelayMs: options.retryBaseDelayMs,
            retryMaxDelayMs: options.retryMaxDelayMs,
        });
    }

    get state(): RelayState {
        return this.#state;
    }

    get sessionId(): string {
        return this.#sessionId;
    }

    get filterRule(): FilterRule {
        return this.#rule;
    }

    /**
     * Load persisted state, start the delivery lanes and begin connecting.
     * Resolves once connecting has begun; it does not wait for the subscription.
     *
     * @throws ConfigurationError when the source or destination is missing.
     */
    async start(): Promise<void> {
        if (this.#started || this.#stopping) return;

        const issues: string[] = [];
        if (!this.#sourceId) issues.push('Source channel identifier is required.');
        if (!this.#destinationId) issues.push('Destination channel identifier is required.');
        if (issues.length > 0) {
            throw new ConfigurationError(issues);
        }

        this.#started = true;
        this.#stats.start();
        const loaded = this.#stats.snapshot();
        this.#baseline = { received: loaded.received, forwarded: loaded.forwarded };
        this.#rule = this.#resolveInitialRule();

        this.#journal(() =>
            this.#store.openSession({
                sessionId: this.#sessionId,
                sourceChat: this.#sourceId,
                destinationChat: this.#destinationId,
                keywords: [...this.#rule.keywords],
                forwardMedia: this.#forwardMedia,
                delaySeconds: this.#minIntervalMs / 1000,
                startedAt: this.#wallClock().toISOString(),
            }),
        );

        for (let lane = 0; lane < this.#parallelism; lane++) {
            this.#lanes.push(this.#runLane(lane));
        }

        await logThought(
            `[RelayController] Session ${this.#sessionId} started: ${this.#sourceId} -> ${this.#destinationId} ` +
                `(${this.#rule.keywords.length} keyword(s), media ${this.#forwardMedia ? 'on' : 'off'}).`,
        );
        // stop() may have drained the relay while the log write was pending.
        if (this.#stopping) return;
        this.#beginConnecting();
    }

    /**
     * Stop accepting messages, let in-flight jobs finish within the grace
     * period, then abandon whatever is left. Safe to call more than once.
     */
    stop(): Promise<void> {
        if (!this.#stopping) {
            this.#stopping = this.#drain();
        }
        return this.#stopping;
    }

    /** Replace the keyword rule atomically and persist it. */
    reloadFilterRules(keywords: Iterable<string>): FilterRule {
        const rule = createFilterRule(keywords);
        this.#store.saveFilterRules(rule);
        this.#rule = rule;
        void logThought(`[RelayController] Filter rules reloaded (${rule.keywords.length} keyword(s)).`);
        return rule;
    }

    /** Non-blocking status export. */
    snapshot(): RelaySnapshot {
        const remaining = this.#limiter.backoffRemainingMs();
        return {
            state: this.#state,
            stats: this.#stats.snapshot(),
            backoffUntil: remaining > 0 ? new Date(this.#wallClock().getTime() + remaining).toISOString() : null,
            queueDepth: this.#queue.size,
            inFlight: this.#inFlight,
        };
    }

    /** Subscribe to controller events. Returns an unsubscribe function. */
    on<K extends keyof RelayEventMap>(type: K, listener: (event: RelayEventMap[K]) => void): () => void {
        const listeners: Set<(event: RelayEventMap[K]) => void> = this.#listeners[type];
        listeners.add(listener);
        return () => {
            listeners.delete(listener);
        };
    }

    // ── Connection ─────────────────────────────────────────────────────────────

    #beginConnecting(): void {
        this.#generation += 1;
        this.#setState('connecting');
        this.#connectLoop(this.#generation).catch((err: unknown) => {
            console.error('[RelayController] Connection loop crashed:', errorMessage(err));
            void logThought(`[RelayController] Connection loop crashed: ${errorMessage(err)}`);
        });
    }

    async #connectLoop(generation: number): Promise<void> {
        let failures = 0;
        const signal = this.#connectAbort.signal;

        while (this.#isCurrent(generation, 'connecting')) {
            this.#pendingLoss = null;
            try {
                const subscription = await this.#transport.subscribe(this.#sourceId, this.#handlersFor(generation));
                if (!this.#isCurrent(generation, 'connecting')) {
                    await this.#closeQuietly(subscription);
                    return;
                }
                const lostEarly = this.#pendingLoss;
                if (lostEarly) {
                    await this.#closeQuietly(subscription);
                    throw lostEarly;
                }
                this.#subscription = subscription;
                this.#setState('listening');
                await logThought(`[RelayController] Listening on ${this.#sourceId}.`);
                return;
            } catch (err) {
                if (!this.#isCurrent(generation, 'connecting')) return;

                const delayMs = computeBackoffDelay(failures, {
                    baseDelayMs: this.#reconnectBaseDelayMs,
                    maxDelayMs: this.#reconnectMaxDelayMs,
                });
                failures += 1;
                const message = errorMessage(err);
                this.#recordError('connection', `Connection attempt ${failures} failed: ${message}`);
                this.#emit('reconnect', { failures, delayMs, error: message, timestamp: this.#wallClock() });

                try {
                    await sleep(delayMs, signal);
                } catch {
                    return;
                }
            }
        }
    }

    #handlersFor(generation: number): TransportHandlers {
        return {
            onMessage: (message) => this.#ingest(generation, message),
            onConnectionLost: (error) => this.#handleConnectionLost(generation, error),
        };
    }

    #handleConnectionLost(generation: number, error: ConnectionError): void {
        if (this.#isCurrent(generation, 'connecting')) {
            this.#pendingLoss = error;
            return;
        }
        if (!this.#isCurrent(generation, 'listening')) return;

        const lost = this.#subscription;
        this.#subscription = null;
        this.#recordError('connection', `Connection lost: ${error.message}`);
        this.#setState('disconnected');
        if (lost) {
            void this.#closeQuietly(lost);
        }
        this.#beginConnecting();
    }

    // ── Ingestion ──────────────────────────────────────────────────────────────

    #ingest(generation: number, message: RelayMessage): void {
        if (generation !== this.#generation) return;
        if (this.#state !== 'listening' && this.#state !== 'connecting') return;

        this.#stats.incrementReceived();

        if (message.media && !this.#forwardMedia) {
            this.#stats.incrementFiltered();
            return;
        }

        const rule = this.#rule;
        if (!qualifies(message.body, rule)) {
            this.#stats.incrementFiltered();
            return;
        }

        const job: ForwardJob = {
            message,
            matchedKeywords: matchedKeywords(message.body, rule),
            attempts: 0,
            transientFailures: 0,
            notBefore: this.#now(),
        };

        const evicted = this.#queue.offer(job);
        if (evicted) {
            this.#settle(evicted, this.#worker.abandon(evicted, QUEUE_OVERFLOW_REASON));
        }
    }

    // ── Delivery ───────────────────────────────────────────────────────────────

    async #runLane(lane: number): Promise<void> {
        const signal = this.#lifecycle.signal;

        for (;;) {
            const job = await this.#queue.take(signal);
            if (!job) return;

            this.#inFlight += 1;
            try {
                const outcome = await this.#worker.process(job, signal);
                this.#settle(job, outcome);
            } catch (err) {
                console.error(`[RelayController] Lane ${lane} failed on ${job.message.messageId}:`, errorMessage(err));
                this.#settle(job, this.#worker.abandon(job, errorMessage(err)));
            } finally {
                this.#inFlight -= 1;
            }
        }
    }

    #settle(job: ForwardJob, outcome: DeliveryOutcome): void {
        let effective = outcome;

        if (outcome.kind === 'retry_later') {
            if (this.#lifecycle.signal.aborted) {
                effective = this.#worker.abandon(job, SHUTDOWN_REASON);
            } else {
                job.notBefore = this.#now() + outcome.delayMs;
                this.#queue.requeue(job);
            }
        }

        if (effective.kind === 'delivered') {
            const { message } = job;
            this.#journal(() =>
                this.#store.recordForwarded({
                    messageId: message.messageId,
                    sourceChat: message.sourceId,
                    destinationChat: this.#destinationId,
                    messageText: message.body ?? null,
                    hasMedia: message.media !== undefined,
                    mediaType: message.media?.kind ?? null,
                    keywordsMatched: [...job.matchedKeywords],
                    forwardedAt: this.#wallClock().toISOString(),
                }),
            );
        } else if (effective.kind === 'abandoned') {
            const { reason } = effective;
            this.#journal(() =>
                this.#store.recordError({
                    sessionId: this.#sessionId,
                    kind: 'forwarding',
                    message: `Message ${job.message.messageId}: ${reason}`,
                    occurredAt: this.#wallClock().toISOString(),
                }),
            );
        }

        this.#emit('outcome', {
            messageId: job.message.messageId,
            attempts: job.attempts,
            outcome: effective,
            timestamp: this.#wallClock(),
        });
    }

    // ── Shutdown ───────────────────────────────────────────────────────────────

    async #drain(): Promise<void> {
        if (!this.#started) {
            this.#setState('stopped');
            return;
        }

        this.#setState('draining');
        this.#generation += 1;
        this.#connectAbort.abort();

        const subscription = this.#subscription;
        this.#subscription = null;
        if (subscription) {
            await this.#closeQuietly(subscription);
        }

        this.#queue.close();
        const lanesDone = Promise.all(this.#lanes);
        const timedOut = await this.#withinGrace(lanesDone);
        if (timedOut) {
            await logThought(
                `[RelayController] Drain grace period (${this.#drainGraceMs}ms) elapsed; abandoning remaining jobs.`,
            );
        }

        this.#lifecycle.abort();
        await lanesDone;

        for (const job of this.#queue.drain()) {
            this.#settle(job, this.#worker.abandon(job, SHUTDOWN_REASON));
        }

        this.#stats.stop();
        const stats = this.#stats.snapshot();
        this.#journal(() =>
            this.#store.closeSession(this.#sessionId, this.#wallClock().toISOString(), {
                received: stats.received - this.#baseline.received,
                forwarded: stats.forwarded - this.#baseline.forwarded,
            }),
        );

        this.#setState('stopped');
        await logThought(
            `[RelayController] Session ${this.#sessionId} stopped (received ${stats.received}, forwarded ${stats.forwarded}, ` +
                `filtered ${stats.filtered}, failed ${stats.failed}).`,
        );
    }

    /** Resolves true when the grace period elapsed before `work` settled. */
    async #withinGrace(work: Promise<unknown>): Promise<boolean> {
        let timer: ReturnType<typeof setTimeout> | undefined;
        const deadline = new Promise<boolean>((resolve) => {
            timer = setTimeout(() => resolve(true), this.#drainGraceMs);
        });
        try {
            return await Promise.race([work.then(() => false), deadline]);
        } finally {
            clearTimeout(timer);
        }
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #resolveInitialRule(): FilterRule {
        if (this.#configuredKeywords !== undefined) {
            const rule = createFilterRule(this.#configuredKeywords);
            this.#journal(() => this.#store.saveFilterRules(rule));
            return rule;
        }
        return this.#store.loadFilterRules() ?? PASS_ALL;
    }

    #isCurrent(generation: number, state: RelayState): boolean {
        return generation === this.#generation && this.#state === state;
    }

    #setState(next: RelayState): void {
        const previous = this.#state;
        if (previous === next) return;
        this.#state = next;
        this.#emit('state', { state: next, previous, timestamp: this.#wallClock() });
    }

    #emit<K extends keyof RelayEventMap>(type: K, event: RelayEventMap[K]): void {
        const listeners: Set<(event: RelayEventMap[K]) => void> = this.#listeners[type];
        for (const listener of listeners) {
            try {
                listener(event);
            } catch (err) {
                console.error('[RelayController] Event listener threw an error:', err);
            }
        }
    }

    #recordError(kind: ErrorKind, message: string): void {
        this.#stats.recordError(message);
        console.error(`[RelayController] ${message}`);
        void logThought(`[RelayController] ${message}`);
        this.#journal(() =>
            this.#store.recordError({
                sessionId: this.#sessionId,
                kind,
                message,
                occurredAt: this.#wallClock().toISOString(),
            }),
        );
    }

    /** Journal writes are best-effort; a failing store must not stop the relay. */
    #journal(write: () => void): void {
        try {
            write();
        } catch (err) {
            console.error('[RelayController] Journal write failed:', errorMessage(err));
            void logThought(`[RelayController] Journal write failed: ${errorMessage(err)}`);
        }
    }

    async #closeQuietly(subscription: TransportSubscription): Promise<void> {
        try {
            await subscription.close();
        } catch (err) {
            void logThought(`[RelayController] Failed to close subscription: ${errorMessage(err)}`);
        }
    }
}
