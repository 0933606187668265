import { validateRuntimeConfig, type ConfigValidationResult, type EnvSource } from '../config/env-validator.js';
import type { RelayStore } from '../types/store.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: channel-relay [command] [options]

Commands:
  (none)              Start relaying from SOURCE_CHAT to DESTINATION_CHAT
  doctor              Validate configuration without connecting
  stats               Print the persisted relay counters
  history [limit]     List the most recently forwarded messages
  errors [limit]      List the most recently journaled errors
  logs                Print today's log file (--follow to tail it)

Options:
  --help, -h          Show this help message
  --json              Output in machine-readable JSON format (doctor only)

Examples:
  channel-relay doctor
  channel-relay doctor --json
  channel-relay history 50
  channel-relay logs --follow
`.trim();

const DEFAULT_LIST_LIMIT = 20;

const KNOWN_COMMANDS = new Set(['doctor', 'stats', 'history', 'errors', 'logs', '--help', '-h', '--json']);

/** An opened store plus the means to release it. */
export interface StoreHandle {
  store: RelayStore;
  close(): void;
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (!argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

function formatValidation(result: ConfigValidationResult): string {
  const lines = ['Relay configuration doctor', '══════════════════════════════════════'];
  if (result.issues.length === 0) {
    lines.push('  ✓ All required keys are present and well-formed.');
  }
  for (const issue of result.issues) {
    lines.push(`  ✗ [${issue.class}] ${issue.message}`);
    lines.push(`          → ${issue.remediation}`);
  }
  lines.push('──────────────────────────────────────');
  lines.push(`Present keys: ${result.presentKeys.join(', ') || '(none)'}`);
  lines.push(`Validated at: ${result.validatedAt}`);
  return lines.join('\n');
}

/**
 * Handle the `doctor` command.
 * Validates the environment and emits a report; exit code 1 when the relay would refuse to start.
 */
export function handleDoctorCli(argv: string[], env: EnvSource = process.env): boolean {
  if (argv[0] !== 'doctor') return false;

  const result = validateRuntimeConfig(env);
  console.log(argv.includes('--json') ? JSON.stringify(result, null, 2) : formatValidation(result));
  process.exitCode = result.ok ? 0 : 1;
  return true;
}

function parseLimit(raw: string | undefined): number | null {
  if (raw === undefined) return DEFAULT_LIST_LIMIT;
  const limit = Number(raw);
  return Number.isInteger(limit) && limit > 0 ? limit : null;
}

function printStats(store: RelayStore): void {
  const stats = store.loadStats();
  console.log(`Received:   ${stats.received}`);
  console.log(`Forwarded:  ${stats.forwarded}`);
  console.log(`Filtered:   ${stats.filtered}`);
  console.log(`Failed:     ${stats.failed}`);
  console.log(`Last error: ${stats.lastError ? `${stats.lastError} (${stats.lastErrorAt ?? 'unknown'})` : 'none'}`);
}

function printHistory(store: RelayStore, limit: number): void {
  const records = store.listForwarded(limit);
  if (records.length === 0) {
    console.log('No forwarded messages recorded.');
    return;
  }
  for (const record of records) {
    const keywords = record.keywordsMatched.length > 0 ? ` [${record.keywordsMatched.join(', ')}]` : '';
    const media = record.mediaType ? ` (${record.mediaType})` : '';
    console.log(`${record.forwardedAt}  #${record.messageId}${media}${keywords}  ${record.messageText ?? ''}`.trimEnd());
  }
}

function printErrors(store: RelayStore, limit: number): void {
  const records = store.listErrors(limit);
  if (records.length === 0) {
    console.log('No errors recorded.');
    return;
  }
  for (const record of records) {
    console.log(`${record.occurredAt}  [${record.kind}] ${record.message}`);
  }
}

/**
 * Handle the read-only store commands: `stats`, `history [limit]`, `errors [limit]`.
 * The store is opened only when one of them matched.
 */
export function handleStoreCli(argv: string[], openStore: () => StoreHandle): boolean {
  const command = argv[0];
  if (command !== 'stats' && command !== 'history' && command !== 'errors') return false;

  const limit = parseLimit(argv[1]);
  if (limit === null) {
    console.error(`[Relay] Invalid limit '${argv[1] ?? ''}': expected a positive integer.`);
    process.exitCode = 1;
    return true;
  }

  let handle: StoreHandle;
  try {
    handle = openStore();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Relay] Cannot open relay database: ${message}`);
    process.exitCode = 1;
    return true;
  }

  try {
    if (command === 'stats') printStats(handle.store);
    else if (command === 'history') printHistory(handle.store, limit);
    else printErrors(handle.store, limit);
    process.exitCode = 0;
  } finally {
    handle.close();
  }
  return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  if (argv.length === 0) return false;

  const command = argv[0];
  if (KNOWN_COMMANDS.has(command)) return false;

  console.error(`[Relay] Unknown command: '${command}'`);
  console.error(`Run 'channel-relay --help' to see available commands.`);
  process.exitCode = 1;
  return true;
}
