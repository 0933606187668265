import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { getLogFilePath, logThought, scrubSensitiveText } from '../../src/utils/logger.js';

describe('scrubSensitiveText', () => {
  const envName = 'TELEGRAM_BOT_TOKEN';
  let previousEnvValue: string | undefined;

  beforeEach(() => {
    previousEnvValue = process.env[envName];
    process.env[envName] = 'test-secret-bot-token';
  });

  afterEach(() => {
    if (previousEnvValue === undefined) {
      delete process.env[envName];
    } else {
      process.env[envName] = previousEnvValue;
    }
  });

  it('redacts the configured token wherever it appears', () => {
    const scrubbed = scrubSensitiveText('polling failed for test-secret-bot-token <= hidden');
    expect(scrubbed).toBe('polling failed for [REDACTED] <= hidden');
  });

  it('redacts bot-token shaped strings', () => {
    const fake = `123456789:${'A'.repeat(35)}`;
    expect(scrubSensitiveText(`url /bot${fake}/getUpdates`)).toBe('url /bot[REDACTED]/getUpdates');
  });

  it('redacts sensitive key=value pairs', () => {
    expect(scrubSensitiveText('password=hunter2, mode=fast')).toBe('password=[REDACTED], mode=fast');
    expect(scrubSensitiveText('api_key: placeholder')).toBe('api_key: [REDACTED]');
  });

  it('leaves ordinary text alone', () => {
    expect(scrubSensitiveText('Message 42 forwarded to @dest')).toBe('Message 42 forwarded to @dest');
  });
});

describe('logThought', () => {
  let tempDir = '';
  let previousLogDir: string | undefined;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'relay-logger-'));
    previousLogDir = process.env.RELAY_LOG_DIR;
    process.env.RELAY_LOG_DIR = path.join(tempDir, 'logs');
  });

  afterEach(async () => {
    if (previousLogDir === undefined) {
      delete process.env.RELAY_LOG_DIR;
    } else {
      process.env.RELAY_LOG_DIR = previousLogDir;
    }
    await rm(tempDir, { recursive: true, force: true });
  });

  it('appends scrubbed, timestamped entries to the daily file', async () => {
    await logThought('[Relay] started');
    await logThought('[Relay] token=abc123');

    const contents = await readFile(getLogFilePath(), 'utf8');
    const lines = contents.trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^- \d{4}-\d{2}-\d{2}T[\d:.]+Z \[Relay\] started$/);
    expect(lines[1]).toMatch(/ \[Relay\] token=\[REDACTED\]$/);
  });
});
