/** Lifecycle states of the relay controller. */
export type RelayState = 'disconnected' | 'connecting' | 'listening' | 'draining' | 'stopped';

/** Opaque handle for media attached to a source message. */
export interface MediaReference {
    /** Provider-side kind, e.g. 'photo', 'video', 'document'. */
    kind: string;
    /** Provider file handle; never interpreted by the engine. */
    handle: string;
}

/** A message observed in the source channel. Immutable once produced by a transport. */
export interface RelayMessage {
    readonly sourceId: string;
    /** Unique within `sourceId`. */
    readonly messageId: string;
    readonly body?: string;
    readonly media?: Readonly<MediaReference>;
    /** Wall-clock arrival time (epoch ms). */
    readonly receivedAt: number;
}

/**
 * Case-insensitive keyword set. Empty means pass-all.
 * Replaced wholesale on reload, never mutated.
 */
export interface FilterRule {
    readonly keywords: readonly string[];
}

/** A qualifying message owned by the delivery path until it reaches a terminal outcome. */
export interface ForwardJob {
    readonly message: RelayMessage;
    /** Keywords the body matched when the job was created. */
    readonly matchedKeywords: readonly string[];
    /** Number of send attempts that have already completed. */
    attempts: number;
    /** Transient failures so far; flood-control retries do not count. */
    transientFailures: number;
    /** Monotonic time (ms) before which the job must not be sent. */
    notBefore: number;
}

/** Durable relay counters. */
export interface RelayStats {
    received: number;
    forwarded: number;
    filtered: number;
    failed: number;
    lastError: string | null;
    /** ISO-8601 timestamp of `lastError`. */
    lastErrorAt: string | null;
}

/**
 * Result of one delivery attempt.
 * - 'delivered'    the transport accepted the message.
 * - 'retry_later'  the job stays in flight and is rescheduled after `delayMs`.
 * - 'abandoned'    terminal failure; counted once in `failed`.
 */
export type DeliveryOutcome =
    | { kind: 'delivered' }
    | { kind: 'retry_later'; delayMs: number; cause: 'rate_limited' | 'transient' }
    | { kind: 'abandoned'; reason: string };

/** Read-only status export for dashboards. */
export interface RelaySnapshot {
    state: RelayState;
    stats: Readonly<RelayStats>;
    /** ISO-8601 wall-clock time at which the provider backoff ends, or null when none is active. */
    backoffUntil: string | null;
    queueDepth: number;
    inFlight: number;
}
