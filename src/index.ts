import 'dotenv/config';
import { handleDoctorCli, handleHelpCli, handleStoreCli, handleUnknownCommand } from './core/cli.js';
import { handleLogsCli } from './core/logs-cli.js';
import { ConfigurationError, errorMessage } from './core/errors.js';
import { RelayController } from './core/relay-controller.js';
import { DEFAULT_CONFIG, loadRelayConfig, type RelayConfig } from './config/relay-config.js';
import { TelegramTransport } from './interfaces/telegram-transport.js';
import { JobScheduler } from './services/job-scheduler.js';
import { SqliteRelayStore, openRelayDatabase } from './services/relay-store.js';
import { logThought } from './utils/logger.js';

const argv = process.argv.slice(2);

function dbPathFromEnv(): string {
    return process.env.RELAY_DB_PATH?.trim() || DEFAULT_CONFIG.dbPath;
}

// ── Early one-shot CLI commands (bypass relay startup) ───────────────────────

if (handleHelpCli(argv) || handleDoctorCli(argv) || handleUnknownCommand(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (
    handleStoreCli(argv, () => {
        const database = openRelayDatabase(dbPathFromEnv());
        return { store: new SqliteRelayStore(database), close: () => database.close() };
    })
) {
    process.exit(process.exitCode ?? 0);
}

if (await handleLogsCli(argv)) {
    if (!argv.includes('--follow') && !argv.includes('-f')) {
        process.exit(process.exitCode ?? 0);
    }
} else {
    await runRelay();
}

// ── Relay daemon ─────────────────────────────────────────────────────────────

async function runRelay(): Promise<void> {
    let config: RelayConfig;
    try {
        config = loadRelayConfig();
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.error('[Relay] Startup blocked by invalid configuration:');
            for (const issue of error.issues) {
                console.error(`  - ${issue}`);
            }
            console.error(`Run 'channel-relay doctor' for remediation hints.`);
            process.exit(1);
        }
        throw error;
    }

    const database = openRelayDatabase(config.runtime.dbPath);
    const store = new SqliteRelayStore(database);
    const scheduler = new JobScheduler();
    const transport = new TelegramTransport(config.telegram.botToken);
    const { forwarding, runtime } = config;

    const controller = new RelayController(transport, store, {
        sourceId: forwarding.sourceChat,
        destinationId: forwarding.destinationChat,
        keywords: forwarding.keywords,
        forwardMedia: forwarding.forwardMedia,
        minIntervalMs: forwarding.delaySeconds * 1000,
        maxRetries: forwarding.maxRetries,
        retryBaseDelayMs: forwarding.retryBaseMs,
        retryMaxDelayMs: forwarding.retryMaxMs,
        queueCapacity: runtime.queueCapacity,
        parallelism: runtime.parallelism,
        drainGraceMs: runtime.drainGraceMs,
        reconnectMaxDelayMs: runtime.reconnectMaxDelayMs,
        scheduler,
        statsFlushCron: runtime.statsFlushCron,
    });

    controller.on('state', ({ state, previous }) => {
        console.log(`[Relay] ${previous} -> ${state}`);
    });

    let shuttingDown = false;
    const shutdown = (signal: NodeJS.Signals): void => {
        if (shuttingDown) return;
        shuttingDown = true;
        console.log(`[Relay] Received ${signal}; draining...`);

        controller
            .stop()
            .then(async () => {
                scheduler.stopAll();
                database.close();
                await logThought(`[Relay] Process received ${signal}; relay stopped.`);
                process.exit(0);
            })
            .catch((error: unknown) => {
                console.error('[Relay] Shutdown failed:', errorMessage(error));
                process.exit(1);
            });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    try {
        await controller.start();
    } catch (error) {
        console.error('[Relay] Failed to start:', errorMessage(error));
        store.recordError({
            sessionId: null,
            kind: 'startup',
            message: errorMessage(error),
            occurredAt: new Date().toISOString(),
        });
        scheduler.stopAll();
        database.close();
        process.exit(1);
    }

    console.log(
        `[Relay] Session ${controller.sessionId}: ${forwarding.sourceChat} -> ${forwarding.destinationChat} ` +
            `(${controller.filterRule.keywords.length} keyword(s)).`,
    );
}
