import * as fs from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import { errorMessage } from './errors.js';
import { getLogFilePath } from '../utils/logger.js';

/** Bytes of existing content printed before following new entries. */
const TAIL_CONTEXT_BYTES = 4096;

/**
 * Handle the `logs` command.
 * Prints or follows today's relay log file.
 */
export async function handleLogsCli(argv: string[]): Promise<boolean> {
    if (argv[0] !== 'logs') return false;

    const follow = argv.includes('--follow') || argv.includes('-f');
    const logPath = getLogFilePath();

    if (!fs.existsSync(logPath)) {
        console.error(`[Relay Logs] No logs found for today at ${logPath}.`);
        process.exitCode = 1;
        return true;
    }

    if (!follow) {
        process.stdout.write(await fsPromises.readFile(logPath, 'utf8'));
        process.exitCode = 0;
        return true;
    }

    console.log(`[Relay Logs] Following logs from ${logPath}...\n`);
    try {
        await followLog(logPath);
    } catch (err) {
        console.error(`[Relay Logs] Cannot follow ${logPath}: ${errorMessage(err)}`);
        process.exitCode = 1;
    }
    return true;
}

/** Read bytes `[start, end)` of a file as UTF-8. */
async function readSlice(filePath: string, start: number, end: number): Promise<string> {
    const handle = await fsPromises.open(filePath, 'r');
    try {
        const buffer = Buffer.alloc(end - start);
        const { bytesRead } = await handle.read(buffer, 0, buffer.length, start);
        return buffer.subarray(0, bytesRead).toString('utf8');
    } finally {
        await handle.close();
    }
}

/**
 * Print the end of the log, then every append until the process exits.
 * Reads are chained so output keeps file order when change events bunch up.
 */
async function followLog(logPath: string): Promise<void> {
    let offset = Math.max(0, (await fsPromises.stat(logPath)).size - TAIL_CONTEXT_BYTES);

    const printAppended = async (): Promise<void> => {
        const { size } = await fsPromises.stat(logPath);
        if (size < offset) offset = 0; // truncated
        if (size === offset) return;
        process.stdout.write(await readSlice(logPath, offset, size));
        offset = size;
    };

    await printAppended();

    let pending = Promise.resolve();
    fs.watch(logPath, () => {
        pending = pending.then(printAppended).catch((err: unknown) => {
            console.error(`[Relay Logs] Failed to read ${logPath}: ${errorMessage(err)}`);
        });
    });
}
