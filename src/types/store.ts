import type { FilterRule, RelayStats } from './relay.js';

/** A message the relay delivered to the destination. */
export interface ForwardedRecord {
    messageId: string;
    sourceChat: string;
    destinationChat: string;
    messageText: string | null;
    hasMedia: boolean;
    mediaType: string | null;
    keywordsMatched: string[];
    forwardedAt: string;
}

/** Category of a journaled error. */
export type ErrorKind = 'forwarding' | 'connection' | 'startup';

export interface ErrorRecord {
    sessionId: string | null;
    kind: ErrorKind;
    message: string;
    occurredAt: string;
}

/** Configuration and totals of one relay run. */
export interface SessionRecord {
    sessionId: string;
    sourceChat: string;
    destinationChat: string;
    keywords: string[];
    forwardMedia: boolean;
    delaySeconds: number;
    startedAt: string;
    stoppedAt: string | null;
    isActive: boolean;
    messagesReceived: number;
    messagesForwarded: number;
}

export type SessionStart = Omit<SessionRecord, 'stoppedAt' | 'isActive' | 'messagesReceived' | 'messagesForwarded'>;

/**
 * Durable storage used by the relay core.
 * Implementations are synchronous; every write is committed before returning.
 */
export interface RelayStore {
    loadStats(): RelayStats;
    saveStats(stats: RelayStats): void;
    /** Returns null when no rule has ever been saved. */
    loadFilterRules(): FilterRule | null;
    /** Replaces the stored rule atomically. */
    saveFilterRules(rule: FilterRule): void;
    recordForwarded(record: ForwardedRecord): void;
    recordError(record: ErrorRecord): void;
    openSession(session: SessionStart): void;
    closeSession(sessionId: string, stoppedAt: string, totals: { received: number; forwarded: number }): void;
    listForwarded(limit: number): ForwardedRecord[];
    listErrors(limit: number): ErrorRecord[];
    listSessions(limit: number): SessionRecord[];
}
