import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type BetterSqlite3 from 'better-sqlite3';
import { mkdtemp, rm } from 'node:fs/promises';
import * as fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { SqliteRelayStore, openRelayDatabase } from '../../src/services/relay-store.js';
import { createFilterRule } from '../../src/core/filter-engine.js';
import type { ForwardedRecord } from '../../src/types/store.js';

function forwarded(overrides: Partial<ForwardedRecord> = {}): ForwardedRecord {
  return {
    messageId: '42',
    sourceChat: '-100200',
    destinationChat: '@dest',
    messageText: 'Big deal today',
    hasMedia: false,
    mediaType: null,
    keywordsMatched: ['deal'],
    forwardedAt: '2026-03-01T12:00:00.000Z',
    ...overrides,
  };
}

describe('SqliteRelayStore', () => {
  let db: BetterSqlite3.Database;
  let store: SqliteRelayStore;

  beforeEach(() => {
    db = openRelayDatabase(':memory:');
    store = new SqliteRelayStore(db);
  });

  afterEach(() => {
    db.close();
  });

  it('starts with zeroed counters', () => {
    expect(store.loadStats()).toEqual({
      received: 0,
      forwarded: 0,
      filtered: 0,
      failed: 0,
      lastError: null,
      lastErrorAt: null,
    });
  });

  it('persists counters', () => {
    const stats = {
      received: 9,
      forwarded: 5,
      filtered: 3,
      failed: 1,
      lastError: 'chat not found',
      lastErrorAt: '2026-03-01T12:00:00.000Z',
    };
    store.saveStats(stats);

    expect(store.loadStats()).toEqual(stats);
    expect(new SqliteRelayStore(db).loadStats()).toEqual(stats);
  });

  it('distinguishes a never-saved rule from an empty one', () => {
    expect(store.loadFilterRules()).toBeNull();

    store.saveFilterRules(createFilterRule([]));
    expect(store.loadFilterRules()?.keywords).toEqual([]);
  });

  it('replaces the keyword set in order', () => {
    store.saveFilterRules(createFilterRule(['sale', 'deal']));
    store.saveFilterRules(createFilterRule(['promo', 'deal']));

    expect(store.loadFilterRules()?.keywords).toEqual(['promo', 'deal']);
  });

  it('journals forwarded messages newest first', () => {
    store.recordForwarded(forwarded({ messageId: '1' }));
    store.recordForwarded(forwarded({ messageId: '2', hasMedia: true, mediaType: 'photo', keywordsMatched: [] }));

    const records = store.listForwarded(10);
    expect(records.map((record) => record.messageId)).toEqual(['2', '1']);
    expect(records[0]).toMatchObject({ hasMedia: true, mediaType: 'photo', keywordsMatched: [] });
    expect(records[1]).toMatchObject({ keywordsMatched: ['deal'], messageText: 'Big deal today' });
  });

  it('truncates long message text', () => {
    store.recordForwarded(forwarded({ messageText: 'x'.repeat(1500) }));
    expect(store.listForwarded(1)[0]?.messageText).toHaveLength(1000);
  });

  it('limits listings', () => {
    for (let i = 0; i < 5; i++) {
      store.recordError({ sessionId: 's1', kind: 'forwarding', message: `error ${i}`, occurredAt: '2026-03-01T12:00:00.000Z' });
    }

    expect(store.listErrors(2).map((record) => record.message)).toEqual(['error 4', 'error 3']);
  });

  it('tracks session lifecycle', () => {
    store.openSession({
      sessionId: 'relay-1',
      sourceChat: '@source',
      destinationChat: '@dest',
      keywords: ['deal'],
      forwardMedia: false,
      delaySeconds: 2,
      startedAt: '2026-03-01T12:00:00.000Z',
    });
    expect(store.listSessions(1)[0]).toMatchObject({ isActive: true, stoppedAt: null, forwardMedia: false });

    store.closeSession('relay-1', '2026-03-01T13:00:00.000Z', { received: 12, forwarded: 4 });

    expect(store.listSessions(1)[0]).toEqual({
      sessionId: 'relay-1',
      sourceChat: '@source',
      destinationChat: '@dest',
      keywords: ['deal'],
      forwardMedia: false,
      delaySeconds: 2,
      startedAt: '2026-03-01T12:00:00.000Z',
      stoppedAt: '2026-03-01T13:00:00.000Z',
      isActive: false,
      messagesReceived: 12,
      messagesForwarded: 4,
    });
  });
});

describe('openRelayDatabase', () => {
  let tempDir = '';

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'relay-store-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('creates missing parent directories', () => {
    const dbPath = path.join(tempDir, 'nested', 'relay.db');
    const database = openRelayDatabase(dbPath);
    new SqliteRelayStore(database).saveStats({
      received: 1,
      forwarded: 1,
      filtered: 0,
      failed: 0,
      lastError: null,
      lastErrorAt: null,
    });
    database.close();

    expect(fs.existsSync(dbPath)).toBe(true);
    const reopened = openRelayDatabase(dbPath);
    expect(new SqliteRelayStore(reopened).loadStats().received).toBe(1);
    reopened.close();
  });
});
