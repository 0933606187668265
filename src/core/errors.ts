/**
 * Error taxonomy for the relay.
 *
 *   - ConnectionError         recoverable; drives reconnection backoff.
 *   - RateLimitSignal         provider flood control; drives limiter backoff and job retry.
 *   - TransientDeliveryError  network/timeout class; retried up to the configured cap.
 *   - PermanentDeliveryError  rejected by the destination; abandoned immediately.
 *   - ConfigurationError      fatal at startup; the relay never starts listening.
 */

export type RelayErrorCode =
    | 'connection'
    | 'rate_limited'
    | 'transient_delivery'
    | 'permanent_delivery'
    | 'configuration';

export class RelayError extends Error {
    readonly code: RelayErrorCode;

    constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export class ConnectionError extends RelayError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('connection', message, options);
    }
}

export class RateLimitSignal extends RelayError {
    readonly retryAfterMs: number;

    constructor(retryAfterMs: number, options?: { cause?: unknown }) {
        const clamped = Number.isFinite(retryAfterMs) ? Math.max(0, retryAfterMs) : 0;
        super('rate_limited', `Provider requested a ${clamped}ms pause`, options);
        this.retryAfterMs = clamped;
    }
}

export class TransientDeliveryError extends RelayError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('transient_delivery', message, options);
    }
}

export class PermanentDeliveryError extends RelayError {
    readonly reason: string;

    constructor(reason: string, options?: { cause?: unknown }) {
        super('permanent_delivery', reason, options);
        this.reason = reason;
    }
}

export class ConfigurationError extends RelayError {
    /** Human-readable problems, already free of secret values. */
    readonly issues: readonly string[];

    constructor(issues: readonly string[]) {
        super('configuration', `Relay configuration is invalid: ${issues.join(' | ')}`);
        this.issues = issues;
    }
}

/** Render an unknown thrown value as a message string. */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
