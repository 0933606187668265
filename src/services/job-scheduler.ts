import cron, { type ScheduledTask } from 'node-cron';
import { logThought } from '../utils/logger.js';
import type { JobConfig, JobSnapshot, JobStatus } from '../types/scheduler.js';

interface RegisteredJob {
    config: JobConfig;
    task: ScheduledTask;
    status: JobStatus;
    lastRunAt: Date | null;
    lastError: string | null;
}

/**
 * Named periodic background jobs on top of `node-cron`.
 *
 * A job whose previous run is still in progress skips the tick. Handler
 * failures are recorded on the job and logged; they never stop the schedule.
 */
export class JobScheduler {
    readonly #jobs: Map<string, RegisteredJob> = new Map();

    /** Register and start a job. Throws if the ID is taken or the expression is invalid. */
    register(config: JobConfig): void {
        if (this.#jobs.has(config.id)) {
            throw new Error(`[JobScheduler] Job '${config.id}' is already registered.`);
        }
        if (!cron.validate(config.cronExpression)) {
            throw new Error(
                `[JobScheduler] Invalid cron expression for job '${config.id}': ${config.cronExpression}`,
            );
        }

        const entry: RegisteredJob = {
            config,
            task: cron.schedule(config.cronExpression, () => {
                void this.#execute(config.id);
            }),
            status: 'idle',
            lastRunAt: null,
            lastError: null,
        };
        this.#jobs.set(config.id, entry);
    }

    /** Stop and remove a job. Returns false when it was not registered. */
    unregister(jobId: string): boolean {
        const entry = this.#jobs.get(jobId);
        if (!entry) return false;

        entry.task.stop();
        this.#jobs.delete(jobId);
        return true;
    }

    /** Stop and remove every job. */
    stopAll(): void {
        for (const jobId of [...this.#jobs.keys()]) {
            this.unregister(jobId);
        }
    }

    getJob(jobId: string): JobSnapshot | undefined {
        const entry = this.#jobs.get(jobId);
        if (!entry) return undefined;

        return {
            id: entry.config.id,
            cronExpression: entry.config.cronExpression,
            description: entry.config.description,
            status: entry.status,
            lastRunAt: entry.lastRunAt,
            lastError: entry.lastError,
        };
    }

    /** Run a job's handler immediately, outside its schedule. */
    async runNow(jobId: string): Promise<void> {
        if (!this.#jobs.has(jobId)) {
            throw new Error(`[JobScheduler] Job '${jobId}' is not registered.`);
        }
        await this.#execute(jobId);
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #execute(jobId: string): Promise<void> {
        const entry = this.#jobs.get(jobId);
        if (!entry || entry.status === 'running') return;

        entry.status = 'running';
        entry.lastRunAt = new Date();

        try {
            await entry.config.handler();
            entry.status = 'idle';
            entry.lastError = null;
        } catch (err: unknown) {
            const message = err instanceof Error ? err.message : String(err);
            entry.status = 'error';
            entry.lastError = message;

            console.error(`[JobScheduler] Job '${jobId}' failed:`, message);
            await logThought(`[JobScheduler] Job '${jobId}' failed: ${message}`);
        }
    }
}
