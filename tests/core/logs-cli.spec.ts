import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import * as fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { handleLogsCli } from '../../src/core/logs-cli.js';

function currentDateIso(): string {
  return new Date().toISOString().slice(0, 10);
}

describe('handleLogsCli', () => {
  let tempDir = '';
  let previousLogDir: string | undefined;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'relay-logs-cli-'));
    previousLogDir = process.env.RELAY_LOG_DIR;
    process.env.RELAY_LOG_DIR = tempDir;
    process.exitCode = undefined;
  });

  afterEach(async () => {
    if (previousLogDir === undefined) {
      delete process.env.RELAY_LOG_DIR;
    } else {
      process.env.RELAY_LOG_DIR = previousLogDir;
    }
    await rm(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('ignores other commands', async () => {
    expect(await handleLogsCli(['stats'])).toBe(false);
  });

  it('prints current daily logs when available', async () => {
    const logBody = '- 2026-01-01T00:00:00.000Z [RelayController] Listening on @source.\n';
    await writeFile(path.join(tempDir, `${currentDateIso()}.md`), logBody, 'utf8');

    const writes: string[] = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      writes.push(String(chunk));
      return true;
    });

    const handled = await handleLogsCli(['logs']);
    expect(handled).toBe(true);
    expect(process.exitCode).toBe(0);
    expect(writes.join('')).toBe(logBody);
  });

  it('returns failure when no log file exists for today', async () => {
    const errors: string[] = [];
    vi.spyOn(console, 'error').mockImplementation((...args) => errors.push(args.join(' ')));

    const handled = await handleLogsCli(['logs']);
    expect(handled).toBe(true);
    expect(process.exitCode).toBe(1);
    expect(errors.join('\n')).toContain('No logs found');
  });

  it('starts follow mode without crashing when log file exists', async () => {
    await writeFile(path.join(tempDir, `${currentDateIso()}.md`), '', 'utf8');

    const logs: string[] = [];
    vi.spyOn(console, 'log').mockImplementation((...args) => logs.push(args.join(' ')));
    vi.spyOn(fs, 'watch').mockImplementation(() => ({ close: () => undefined }) as fs.FSWatcher);

    const handled = await handleLogsCli(['logs', '--follow']);
    expect(handled).toBe(true);
    expect(logs.join('\n')).toContain('Following logs');
  });

  it('prints existing entries before following', async () => {
    const logBody = '- 2026-01-01T00:00:00.000Z [Relay] Session started.\n';
    await writeFile(path.join(tempDir, `${currentDateIso()}.md`), logBody, 'utf8');

    const writes: string[] = [];
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      writes.push(String(chunk));
      return true;
    });
    const watch = vi.spyOn(fs, 'watch').mockImplementation(() => ({ close: () => undefined }) as fs.FSWatcher);

    expect(await handleLogsCli(['logs', '-f'])).toBe(true);
    expect(writes.join('')).toBe(logBody);
    expect(watch).toHaveBeenCalledTimes(1);
    expect(process.exitCode).toBeUndefined();
  });
});
