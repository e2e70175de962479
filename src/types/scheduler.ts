export type JobStatus = 'idle' | 'running' | 'stopped' | 'error';

export interface JobConfig {
    /** Unique identifier, e.g. 'reminder-worker'. */
    id: string;
    /** node-cron expression; six fields give second resolution. */
    cronExpression: string;
    description: string;
    /** A rejection marks the run failed. */
    handler: () => Promise<void> | void;
    /** @default true */
    autoStart?: boolean;
}

/** What health reporting sees of a job. */
export interface JobSnapshot {
    id: string;
    cronExpression: string;
    description: string;
    status: JobStatus;
    runs: number;
    /** Ticks dropped because the previous run had not finished. */
    skippedRuns: number;
    consecutiveFailures: number;
    lastRunAt: Date | null;
    lastDurationMs: number | null;
    lastError: string | null;
}

interface JobEventBase {
    jobId: string;
    timestamp: Date;
}

export interface SchedulerEventMap {
    'job:start': JobEventBase & { type: 'job:start' };
    'job:done': JobEventBase & { type: 'job:done'; durationMs: number };
    'job:error': JobEventBase & { type: 'job:error'; durationMs: number; error: string; consecutiveFailures: number };
    'job:skipped': JobEventBase & { type: 'job:skipped'; skippedRuns: number };
}

export type SchedulerEventType = keyof SchedulerEventMap;

export type SchedulerEventListener<K extends SchedulerEventType> = (event: SchedulerEventMap[K]) => void;
