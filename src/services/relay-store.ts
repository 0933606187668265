import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { createFilterRule } from '../core/filter-engine.js';
import type { FilterRule, RelayStats } from '../types/relay.js';
import type {
    ErrorKind,
    ErrorRecord,
    ForwardedRecord,
    RelayStore,
    SessionRecord,
    SessionStart,
} from '../types/store.js';

/** Stored message text is truncated to this many characters. */
const MAX_STORED_TEXT = 1000;

const FILTER_RULES_SETTING = 'filter_rules_saved_at';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS relay_stats (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    received INTEGER NOT NULL DEFAULT 0,
    forwarded INTEGER NOT NULL DEFAULT 0,
    filtered INTEGER NOT NULL DEFAULT 0,
    failed INTEGER NOT NULL DEFAULT 0,
    last_error TEXT,
    last_error_at TEXT
  );

  CREATE TABLE IF NOT EXISTS relay_settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS filter_keywords (
    keyword TEXT PRIMARY KEY,
    position INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS forwarded_messages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    message_id TEXT NOT NULL,
    source_chat TEXT NOT NULL,
    destination_chat TEXT NOT NULL,
    message_text TEXT,
    has_media INTEGER NOT NULL DEFAULT 0,
    media_type TEXT,
    keywords_matched TEXT,
    forwarded_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS error_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id TEXT,
    error_type TEXT NOT NULL,
    error_message TEXT NOT NULL,
    occurred_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS relay_sessions (
    session_id TEXT PRIMARY KEY,
    source_chat TEXT NOT NULL,
    destination_chat TEXT NOT NULL,
    keywords TEXT,
    forward_media INTEGER NOT NULL DEFAULT 1,
    delay_seconds REAL NOT NULL DEFAULT 2,
    started_at TEXT NOT NULL,
    stopped_at TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    messages_received INTEGER NOT NULL DEFAULT 0,
    messages_forwarded INTEGER NOT NULL DEFAULT 0
  );

  CREATE INDEX IF NOT EXISTS idx_forwarded_messages_forwarded_at ON forwarded_messages(forwarded_at);
  CREATE INDEX IF NOT EXISTS idx_error_logs_occurred_at ON error_logs(occurred_at);
`;

interface StatsRow {
    received: number;
    forwarded: number;
    filtered: number;
    failed: number;
    last_error: string | null;
    last_error_at: string | null;
}

interface ForwardedRow {
    message_id: string;
    source_chat: string;
    destination_chat: string;
    message_text: string | null;
    has_media: number;
    media_type: string | null;
    keywords_matched: string | null;
    forwarded_at: string;
}

interface ErrorRow {
    session_id: string | null;
    error_type: ErrorKind;
    error_message: string;
    occurred_at: string;
}

interface SessionRow {
    session_id: string;
    source_chat: string;
    destination_chat: string;
    keywords: string | null;
    forward_media: number;
    delay_seconds: number;
    started_at: string;
    stopped_at: string | null;
    is_active: number;
    messages_received: number;
    messages_forwarded: number;
}

function splitCsv(value: string | null): string[] {
    return value ? value.split(',').filter(Boolean) : [];
}

function truncate(text: string | null): string | null {
    return text === null ? null : text.slice(0, MAX_STORED_TEXT);
}

/** Open (creating directories as needed) the relay database file. */
export function openRelayDatabase(dbPath: string): BetterSqlite3.Database {
    if (dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    const database = new Database(dbPath);
    database.pragma('journal_mode = WAL');
    return database;
}

/**
 * better-sqlite3 backed {@link RelayStore}.
 *
 * Keeps the running counters in a single-row `relay_stats` table plus a
 * journal of forwarded messages, errors and relay sessions.
 */
export class SqliteRelayStore implements RelayStore {
    readonly #db: BetterSqlite3.Database;

    constructor(database: BetterSqlite3.Database) {
        this.#db = database;
        this.#db.exec(SCHEMA);
        this.#db.prepare('INSERT OR IGNORE INTO relay_stats (id) VALUES (1)').run();
    }

    loadStats(): RelayStats {
        const row = this.#db
            .prepare(
                `SELECT received, forwarded, filtered, failed, last_error, last_error_at
                 FROM relay_stats WHERE id = 1`,
            )
            .get() as StatsRow | undefined;

        return {
            received: row?.received ?? 0,
            forwarded: row?.forwarded ?? 0,
            filtered: row?.filtered ?? 0,
            failed: row?.failed ?? 0,
            lastError: row?.last_error ?? null,
            lastErrorAt: row?.last_error_at ?? null,
        };
    }

    saveStats(stats: RelayStats): void {
        this.#db
            .prepare(
                `UPDATE relay_stats
                 SET received = ?, forwarded = ?, filtered = ?, failed = ?, last_error = ?, last_error_at = ?
                 WHERE id = 1`,
            )
            .run(stats.received, stats.forwarded, stats.filtered, stats.failed, stats.lastError, stats.lastErrorAt);
    }

    loadFilterRules(): FilterRule | null {
        const saved = this.#db.prepare('SELECT value FROM relay_settings WHERE key = ?').get(FILTER_RULES_SETTING);
        if (!saved) return null;

        const rows = this.#db
            .prepare('SELECT keyword FROM filter_keywords ORDER BY position ASC')
            .all() as Array<{ keyword: string }>;
        return createFilterRule(rows.map((row) => row.keyword));
    }

    saveFilterRules(rule: FilterRule): void {
        const replace = this.#db.transaction((keywords: readonly string[]) => {
            this.#db.prepare('DELETE FROM filter_keywords').run();
            const insert = this.#db.prepare('INSERT INTO filter_keywords (keyword, position) VALUES (?, ?)');
            keywords.forEach((keyword, position) => insert.run(keyword, position));
            this.#db
                .prepare(
                    `INSERT INTO relay_settings (key, value) VALUES (?, ?)
                     ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
                )
                .run(FILTER_RULES_SETTING, new Date().toISOString());
        });
        replace(rule.keywords);
    }

    recordForwarded(record: ForwardedRecord): void {
        this.#db
            .prepare(
                `INSERT INTO forwarded_messages (
                    message_id, source_chat, destination_chat, message_text,
                    has_media, media_type, keywords_matched, forwarded_at
                 ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
            )
            .run(
                record.messageId,
                record.sourceChat,
                record.destinationChat,
                truncate(record.messageText),
                record.hasMedia ? 1 : 0,
                record.mediaType,
                record.keywordsMatched.length > 0 ? record.keywordsMatched.join(',') : null,
                record.forwardedAt,
            );
    }

    recordError(record: ErrorRecord): void {
        this.#db
            .prepare(
                `INSERT INTO error_logs (session_id, error_type, error_message, occurred_at)
                 VALUES (?, ?, ?, ?)`,
            )
            .run(record.sessionId, record.kind, record.message, record.occurredAt);
    }

    openSession(session: SessionStart): void {
        this.#db
            .prepare(
                `INSERT INTO relay_sessions (
                    session_id, source_chat, destination_chat, keywords,
                    forward_media, delay_seconds, started_at, is_active
                 ) VALUES (?, ?, ?, ?, ?, ?, ?, 1)`,
            )
            .run(
                session.sessionId,
                session.sourceChat,
                session.destinationChat,
                session.keywords.length > 0 ? session.keywords.join(',') : null,
                session.forwardMedia ? 1 : 0,
                session.delaySeconds,
                session.startedAt,
            );
    }

    closeSession(sessionId: string, stoppedAt: string, totals: { received: number; forwarded: number }): void {
        this.#db
            .prepare(
                `UPDATE relay_sessions
                 SET stopped_at = ?, is_active = 0, messages_received = ?, messages_forwarded = ?
                 WHERE session_id = ?`,
            )
            .run(stoppedAt, totals.received, totals.forwarded, sessionId);
    }

    listForwarded(limit: number): ForwardedRecord[] {
        const rows = this.#db
            .prepare('SELECT * FROM forwarded_messages ORDER BY id DESC LIMIT ?')
            .all(limit) as ForwardedRow[];

        return rows.map((row) => ({
            messageId: row.message_id,
            sourceChat: row.source_chat,
            destinationChat: row.destination_chat,
            messageText: row.message_text,
            hasMedia: row.has_media === 1,
            mediaType: row.media_type,
            keywordsMatched: splitCsv(row.keywords_matched),
            forwardedAt: row.forwarded_at,
        }));
    }

    listErrors(limit: number): ErrorRecord[] {
        const rows = this.#db
            .prepare('SELECT * FROM error_logs ORDER BY id DESC LIMIT ?')
            .all(limit) as ErrorRow[];

        return rows.map((row) => ({
            sessionId: row.session_id,
            kind: row.error_type,
            message: row.error_message,
            occurredAt: row.occurred_at,
        }));
    }

    listSessions(limit: number): SessionRecord[] {
        const rows = this.#db
            .prepare('SELECT * FROM relay_sessions ORDER BY started_at DESC, rowid DESC LIMIT ?')
            .all(limit) as SessionRow[];

        return rows.map((row) => ({
            sessionId: row.session_id,
            sourceChat: row.source_chat,
            destinationChat: row.destination_chat,
            keywords: splitCsv(row.keywords),
            forwardMedia: row.forward_media === 1,
            delaySeconds: row.delay_seconds,
            startedAt: row.started_at,
            stoppedAt: row.stopped_at,
            isActive: row.is_active === 1,
            messagesReceived: row.messages_received,
            messagesForwarded: row.messages_forwarded,
        }));
    }
}
