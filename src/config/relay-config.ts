import { parseKeywordList } from '../core/filter-engine.js';
import { assertRuntimeConfig, type EnvSource } from './env-validator.js';

export interface RelayConfig {
  telegram: {
    botToken: string;
  };
  forwarding: {
    sourceChat: string;
    destinationChat: string;
    /** Undefined when KEYWORDS is unset; the stored rule then applies. */
    keywords: string[] | undefined;
    forwardMedia: boolean;
    delaySeconds: number;
    maxRetries: number;
    retryBaseMs: number;
    retryMaxMs: number;
  };
  runtime: {
    queueCapacity: number;
    parallelism: number;
    drainGraceMs: number;
    reconnectMaxDelayMs: number;
    statsFlushCron: string;
    dbPath: string;
  };
}

export const DEFAULT_CONFIG = {
  forwardMedia: true,
  delaySeconds: 2,
  maxRetries: 3,
  retryBaseMs: 1000,
  retryMaxMs: 60_000,
  queueCapacity: 100,
  parallelism: 1,
  drainGraceMs: 10_000,
  reconnectMaxDelayMs: 60_000,
  statsFlushCron: '*/2 * * * * *',
  dbPath: 'memory/relay.db',
} as const;

function text(env: EnvSource, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function numberOr(env: EnvSource, key: string, fallback: number): number {
  const value = text(env, key);
  return value === undefined ? fallback : Number(value);
}

function booleanOr(env: EnvSource, key: string, fallback: boolean): boolean {
  const value = text(env, key)?.toLowerCase();
  if (value === undefined) return fallback;
  return value === 'true' || value === '1' || value === 'yes';
}

/**
 * Build the typed relay configuration from the environment.
 *
 * @throws ConfigurationError when required keys are missing or malformed.
 */
export function loadRelayConfig(env: EnvSource = process.env): RelayConfig {
  assertRuntimeConfig(env);

  return {
    telegram: {
      botToken: text(env, 'TELEGRAM_BOT_TOKEN') ?? '',
    },
    forwarding: {
      sourceChat: text(env, 'SOURCE_CHAT') ?? '',
      destinationChat: text(env, 'DESTINATION_CHAT') ?? '',
      keywords: env.KEYWORDS === undefined ? undefined : parseKeywordList(env.KEYWORDS),
      forwardMedia: booleanOr(env, 'FORWARD_MEDIA', DEFAULT_CONFIG.forwardMedia),
      delaySeconds: numberOr(env, 'DELAY_SECONDS', DEFAULT_CONFIG.delaySeconds),
      maxRetries: numberOr(env, 'MAX_RETRIES', DEFAULT_CONFIG.maxRetries),
      retryBaseMs: numberOr(env, 'RETRY_BASE_MS', DEFAULT_CONFIG.retryBaseMs),
      retryMaxMs: numberOr(env, 'RETRY_MAX_MS', DEFAULT_CONFIG.retryMaxMs),
    },
    runtime: {
      queueCapacity: numberOr(env, 'QUEUE_CAPACITY', DEFAULT_CONFIG.queueCapacity),
      parallelism: numberOr(env, 'DELIVERY_PARALLELISM', DEFAULT_CONFIG.parallelism),
      drainGraceMs: numberOr(env, 'DRAIN_GRACE_MS', DEFAULT_CONFIG.drainGraceMs),
      reconnectMaxDelayMs: numberOr(env, 'RECONNECT_MAX_DELAY_MS', DEFAULT_CONFIG.reconnectMaxDelayMs),
      statsFlushCron: text(env, 'STATS_FLUSH_CRON') ?? DEFAULT_CONFIG.statsFlushCron,
      dbPath: text(env, 'RELAY_DB_PATH') ?? DEFAULT_CONFIG.dbPath,
    },
  };
}
