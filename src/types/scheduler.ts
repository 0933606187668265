/** Status of a registered periodic job. */
export type JobStatus = 'idle' | 'running' | 'error';

/** Configuration required to register a periodic job. */
export interface JobConfig {
    /** Unique identifier, e.g. 'stats-flush'. */
    id: string;
    /** node-cron expression; six fields enable second resolution. */
    cronExpression: string;
    description: string;
    handler: () => Promise<void> | void;
}

/** Read-only view of a registered job. */
export interface JobSnapshot {
    id: string;
    cronExpression: string;
    description: string;
    status: JobStatus;
    lastRunAt: Date | null;
    lastError: string | null;
}
