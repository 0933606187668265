/**
 * Registry of every environment key consumed by the relay.
 *
 * Each entry declares:
 *   - `key`         The exact env variable name.
 *   - `type`        Whether the value is a secret or a plain env var.
 *   - `class`       'required' | 'optional'.
 *   - `format`      Value shape checked by the validator.
 *   - `description` Human-readable purpose.
 *   - `remediation` Actionable hint when the key is missing or invalid.
 */

export type ConfigKeyClass = 'required' | 'optional';

export type ConfigKeyType = 'secret' | 'env';

export type ConfigKeyFormat =
  | 'text'
  | 'chat'
  | 'boolean'
  | 'non_negative_number'
  | 'positive_integer'
  | 'non_negative_integer'
  | 'cron';

export interface ConfigKeySpec {
  key: string;
  type: ConfigKeyType;
  class: ConfigKeyClass;
  format: ConfigKeyFormat;
  description: string;
  remediation: string;
}

export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  // ── Connection ──────────────────────────────────────────────────────────────
  {
    key: 'TELEGRAM_BOT_TOKEN',
    type: 'secret',
    class: 'required',
    format: 'text',
    description: 'Bot API token used to read the source chat and post to the destination chat.',
    remediation: 'Set TELEGRAM_BOT_TOKEN to the token issued by @BotFather.',
  },
  {
    key: 'SOURCE_CHAT',
    type: 'env',
    class: 'required',
    format: 'chat',
    description: 'Chat to watch for new messages (numeric id or @username).',
    remediation: 'Set SOURCE_CHAT, e.g. SOURCE_CHAT=@source_channel or SOURCE_CHAT=-1001234567890.',
  },
  {
    key: 'DESTINATION_CHAT',
    type: 'env',
    class: 'required',
    format: 'chat',
    description: 'Chat that receives forwarded messages (numeric id or @username).',
    remediation: 'Set DESTINATION_CHAT, e.g. DESTINATION_CHAT=@destination_channel.',
  },

  // ── Forwarding policy ───────────────────────────────────────────────────────
  {
    key: 'KEYWORDS',
    type: 'env',
    class: 'optional',
    format: 'text',
    description: 'Comma-separated keywords; a message is forwarded when its text contains any of them. Empty forwards everything.',
    remediation: 'Set KEYWORDS=deal,sale to forward only matching messages, or leave it empty to forward all.',
  },
  {
    key: 'FORWARD_MEDIA',
    type: 'env',
    class: 'optional',
    format: 'boolean',
    description: 'Whether messages carrying media are forwarded (default: true).',
    remediation: "Set FORWARD_MEDIA to 'true' or 'false'.",
  },
  {
    key: 'DELAY_SECONDS',
    type: 'env',
    class: 'optional',
    format: 'non_negative_number',
    description: 'Minimum spacing between two forwards in seconds (default: 2).',
    remediation: 'Set DELAY_SECONDS to a number of seconds, e.g. DELAY_SECONDS=3.',
  },
  {
    key: 'MAX_RETRIES',
    type: 'env',
    class: 'optional',
    format: 'positive_integer',
    description: 'Transient delivery failures tolerated before a message is abandoned (default: 3).',
    remediation: 'Set MAX_RETRIES to a positive integer.',
  },
  {
    key: 'RETRY_BASE_MS',
    type: 'env',
    class: 'optional',
    format: 'non_negative_integer',
    description: 'First retry delay after a transient failure in ms (default: 1000).',
    remediation: 'Set RETRY_BASE_MS to a whole number of milliseconds.',
  },
  {
    key: 'RETRY_MAX_MS',
    type: 'env',
    class: 'optional',
    format: 'non_negative_integer',
    description: 'Cap for transient retry delays in ms (default: 60000).',
    remediation: 'Set RETRY_MAX_MS to a whole number of milliseconds.',
  },

  // ── Runtime ─────────────────────────────────────────────────────────────────
  {
    key: 'QUEUE_CAPACITY',
    type: 'env',
    class: 'optional',
    format: 'positive_integer',
    description: 'Maximum queued messages before the oldest unsent one is dropped (default: 100).',
    remediation: 'Set QUEUE_CAPACITY to a positive integer.',
  },
  {
    key: 'DELIVERY_PARALLELISM',
    type: 'env',
    class: 'optional',
    format: 'positive_integer',
    description: 'Concurrent delivery lanes (default: 1).',
    remediation: 'Set DELIVERY_PARALLELISM to a positive integer; 1 is recommended.',
  },
  {
    key: 'DRAIN_GRACE_MS',
    type: 'env',
    class: 'optional',
    format: 'non_negative_integer',
    description: 'Time in-flight messages get to finish on shutdown in ms (default: 10000).',
    remediation: 'Set DRAIN_GRACE_MS to a whole number of milliseconds.',
  },
  {
    key: 'RECONNECT_MAX_DELAY_MS',
    type: 'env',
    class: 'optional',
    format: 'positive_integer',
    description: 'Cap for reconnection backoff in ms (default: 60000).',
    remediation: 'Set RECONNECT_MAX_DELAY_MS to a positive whole number of milliseconds.',
  },
  {
    key: 'STATS_FLUSH_CRON',
    type: 'env',
    class: 'optional',
    format: 'cron',
    description: "node-cron schedule for persisting counters (default: '*/2 * * * * *').",
    remediation: "Set STATS_FLUSH_CRON to a valid node-cron expression, e.g. '*/5 * * * * *'.",
  },
  {
    key: 'RELAY_DB_PATH',
    type: 'env',
    class: 'optional',
    format: 'text',
    description: 'SQLite database file for counters and the delivery journal (default: memory/relay.db).',
    remediation: 'Set RELAY_DB_PATH to a writable file path.',
  },
  {
    key: 'RELAY_LOG_DIR',
    type: 'env',
    class: 'optional',
    format: 'text',
    description: 'Directory for daily log files (default: memory).',
    remediation: 'Set RELAY_LOG_DIR to a writable directory.',
  },
];
