import TelegramBot from 'node-telegram-bot-api';
import type { MediaReference, RelayMessage } from '../types/relay.js';
import type { Transport, TransportHandlers, TransportSubscription } from '../types/transport.js';
import {
    ConnectionError,
    PermanentDeliveryError,
    RateLimitSignal,
    TransientDeliveryError,
    errorMessage,
} from '../core/errors.js';
import { logThought } from '../utils/logger.js';

/** Fields of a node-telegram-bot-api error that drive classification. */
export interface TelegramErrorDetails {
    /** 'ETELEGRAM' | 'EFATAL' | 'EPARSE' or a socket error code. */
    code?: string;
    /** Bot API `error_code`, e.g. 429, 403. */
    status?: number;
    /** `parameters.retry_after` in seconds. */
    retryAfterSeconds?: number;
    description: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/** Pull the Bot API response details out of a thrown value. */
export function readTelegramError(err: unknown): TelegramErrorDetails {
    const details: TelegramErrorDetails = { description: errorMessage(err) };
    if (!isRecord(err)) return details;

    if (typeof err.code === 'string') details.code = err.code;

    const response = err.response;
    const body = isRecord(response) ? response.body : undefined;
    if (isRecord(body)) {
        if (typeof body.error_code === 'number') details.status = body.error_code;
        if (typeof body.description === 'string') details.description = body.description;
        const parameters = body.parameters;
        if (isRecord(parameters) && typeof parameters.retry_after === 'number') {
            details.retryAfterSeconds = parameters.retry_after;
        }
    }
    return details;
}

/**
 * Map a failed send to the relay error taxonomy:
 * 429 → flood control, 5xx and network failures → transient,
 * other Bot API rejections and unparsable responses → permanent.
 */
export function classifySendError(err: unknown): Error {
    const details = readTelegramError(err);

    if (details.status === 429) {
        return new RateLimitSignal((details.retryAfterSeconds ?? 1) * 1000, { cause: err });
    }
    if (details.status !== undefined && details.status >= 500) {
        return new TransientDeliveryError(details.description, { cause: err });
    }
    if (details.status !== undefined || details.code === 'EPARSE') {
        return new PermanentDeliveryError(details.description, { cause: err });
    }
    return new TransientDeliveryError(details.description, { cause: err });
}

/** Polling errors that mean the session is gone or the connection is down. */
export function isConnectionLoss(err: unknown): boolean {
    const details = readTelegramError(err);
    return details.code === 'EFATAL' || details.status === 401 || details.status === 409;
}

function extractMedia(msg: TelegramBot.Message): MediaReference | undefined {
    const largestPhoto = msg.photo?.[msg.photo.length - 1];
    if (largestPhoto) return { kind: 'photo', handle: largestPhoto.file_id };
    if (msg.video) return { kind: 'video', handle: msg.video.file_id };
    if (msg.animation) return { kind: 'animation', handle: msg.animation.file_id };
    if (msg.document) return { kind: 'document', handle: msg.document.file_id };
    if (msg.audio) return { kind: 'audio', handle: msg.audio.file_id };
    if (msg.voice) return { kind: 'voice', handle: msg.voice.file_id };
    if (msg.video_note) return { kind: 'video_note', handle: msg.video_note.file_id };
    if (msg.sticker) return { kind: 'sticker', handle: msg.sticker.file_id };
    return undefined;
}

/** Normalize a Bot API message or channel post. The caption is the body of media posts. */
export function toRelayMessage(msg: TelegramBot.Message, receivedAt: number = Date.now()): RelayMessage {
    const media = extractMedia(msg);
    const body = msg.text ?? msg.caption;
    return Object.freeze({
        sourceId: String(msg.chat.id),
        messageId: String(msg.message_id),
        ...(body !== undefined ? { body } : {}),
        ...(media ? { media: Object.freeze(media) } : {}),
        receivedAt,
    });
}

export interface TelegramTransportOptions {
    /** Long-polling interval in ms. @default 300 */
    pollingIntervalMs?: number;
    /** Long-polling timeout in seconds. @default 10 */
    pollingTimeoutSeconds?: number;
}

/**
 * Bot API transport.
 *
 *   - Inbound: long-polls `message` and `channel_post` updates and keeps those
 *     from the subscribed chat (numeric id or `@username`).
 *   - Outbound: forwards the original message to the destination chat.
 *
 * The bot must be a member (for channels: an administrator) of both chats.
 */
export class TelegramTransport implements Transport {
    readonly #bot: TelegramBot;

    constructor(token: string, options: TelegramTransportOptions = {}) {
        this.#bot = new TelegramBot(token, {
            polling: {
                autoStart: false,
                interval: options.pollingIntervalMs ?? 300,
                params: { timeout: options.pollingTimeoutSeconds ?? 10 },
            },
        });
    }

    async subscribe(sourceId: string, handlers: TransportHandlers): Promise<TransportSubscription> {
        let chatId: string;
        try {
            const chat = await this.#bot.getChat(sourceId);
            chatId = String(chat.id);
        } catch (err) {
            throw new ConnectionError(`Cannot resolve source chat ${sourceId}: ${readTelegramError(err).description}`, {
                cause: err,
            });
        }

        const onUpdate = (msg: TelegramBot.Message): void => {
            if (String(msg.chat.id) !== chatId) return;
            handlers.onMessage(toRelayMessage(msg));
        };
        const onPollingError = (err: Error): void => {
            if (isConnectionLoss(err)) {
                handlers.onConnectionLost(new ConnectionError(readTelegramError(err).description, { cause: err }));
                return;
            }
            console.error('[TelegramTransport] Polling error:', err.message);
            void logThought(`[TelegramTransport] Polling error: ${err.message}`);
        };

        this.#bot.on('message', onUpdate);
        this.#bot.on('channel_post', onUpdate);
        this.#bot.on('polling_error', onPollingError);

        try {
            await this.#bot.startPolling({ restart: true });
        } catch (err) {
            this.#detach(onUpdate, onPollingError);
            throw new ConnectionError(`Failed to start polling: ${errorMessage(err)}`, { cause: err });
        }

        return {
            close: async () => {
                this.#detach(onUpdate, onPollingError);
                if (this.#bot.isPolling()) {
                    await this.#bot.stopPolling({ cancel: true });
                }
            },
        };
    }

    async send(destinationId: string, message: RelayMessage): Promise<void> {
        const messageId = Number(message.messageId);
        if (!Number.isInteger(messageId)) {
            throw new PermanentDeliveryError(`Invalid message id '${message.messageId}'`);
        }

        try {
            await this.#bot.forwardMessage(destinationId, message.sourceId, messageId);
        } catch (err) {
            throw classifySendError(err);
        }
    }

    #detach(onUpdate: (msg: TelegramBot.Message) => void, onPollingError: (err: Error) => void): void {
        this.#bot.removeListener('message', onUpdate);
        this.#bot.removeListener('channel_post', onUpdate);
        this.#bot.removeListener('polling_error', onPollingError);
    }
}
