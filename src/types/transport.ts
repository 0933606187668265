import type { ConnectionError } from '../core/errors.js';
import type { RelayMessage } from './relay.js';

/** Callbacks a transport invokes for an active subscription. */
export interface TransportHandlers {
    /** Called once per new message in the subscribed source. Must not block. */
    onMessage: (message: RelayMessage) => void;
    /** Called when the underlying connection drops or the session is invalidated. */
    onConnectionLost: (error: ConnectionError) => void;
}

/** Handle for an active source subscription. */
export interface TransportSubscription {
    close(): Promise<void>;
}

/**
 * Connection to the messaging provider.
 *
 * `send` resolves on success and rejects with a `RateLimitSignal`,
 * `TransientDeliveryError` or `PermanentDeliveryError`. Any other rejection is
 * treated as transient by the delivery worker.
 */
export interface Transport {
    subscribe(sourceId: string, handlers: TransportHandlers): Promise<TransportSubscription>;
    send(destinationId: string, message: RelayMessage): Promise<void>;
}
