import * as fs from 'node:fs/promises';
import path from 'node:path';

/** Env keys whose values must never reach a log line. */
const SENSITIVE_ENV_KEYS = ['TELEGRAM_BOT_TOKEN'];

const REDACTED = '[REDACTED]';

/** Telegram bot tokens look like `<digits>:<35 url-safe chars>`. */
const BOT_TOKEN_PATTERN = /\d{6,12}:[A-Za-z0-9_-]{30,}/g;
const KEY_VALUE_PATTERN = /\b(token|secret|password|api[_-]?key)(\s*[=:]\s*)([^\s,;'"]+)/gi;

/** Directory holding the daily log files. */
export function getLogDir(): string {
    return path.resolve(process.env.RELAY_LOG_DIR ?? 'memory');
}

/** Absolute path of the log file for the given day. */
export function getLogFilePath(date: Date = new Date()): string {
    return path.join(getLogDir(), `${date.toISOString().slice(0, 10)}.md`);
}

/**
 * Redact credentials from free text: configured secret env values,
 * bot-token shaped strings, and `key=value` pairs with sensitive keys.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;

    for (const key of SENSITIVE_ENV_KEYS) {
        const value = process.env[key];
        if (value && value.length >= 8) {
            scrubbed = scrubbed.split(value).join(REDACTED);
        }
    }

    return scrubbed
        .replace(BOT_TOKEN_PATTERN, REDACTED)
        .replace(KEY_VALUE_PATTERN, (_match, key: string, separator: string) => `${key}${separator}${REDACTED}`);
}

/**
 * Append a timestamped entry to today's log file.
 * Failures to write are reported on stderr and never thrown.
 */
export async function logThought(message: string): Promise<void> {
    const line = `- ${new Date().toISOString()} ${scrubSensitiveText(message)}\n`;
    try {
        await fs.mkdir(getLogDir(), { recursive: true });
        await fs.appendFile(getLogFilePath(), line, 'utf8');
    } catch (err) {
        console.error('[Logger] Failed to write log entry:', err instanceof Error ? err.message : String(err));
    }
}
