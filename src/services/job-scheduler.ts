import cron, { type ScheduledTask } from 'node-cron';
import { logThought } from '../utils/logger.js';
import { errorMessage } from '../types/errors.js';
import type {
    JobConfig,
    JobSnapshot,
    SchedulerEventListener,
    SchedulerEventMap,
    SchedulerEventType,
} from '../types/scheduler.js';

interface JobState extends Omit<JobSnapshot, 'id' | 'cronExpression' | 'description'> {
    config: JobConfig;
    task: ScheduledTask | null;
    inFlight: boolean;
}

type ListenerRegistry = { [K in keyof SchedulerEventMap]: Set<SchedulerEventListener<K>> };

export interface JobSchedulerOptions {
    /** Epoch-millisecond clock used for run timing. */
    clock?: () => number;
}

/**
 * Named repeating jobs on top of `node-cron`.
 *
 * A job never overlaps itself: a tick (or `trigger`) that arrives while the
 * previous run is in flight is dropped and counted. Handler errors are caught,
 * recorded on the job and emitted as `job:error`.
 */
export class JobScheduler {
    readonly #jobs = new Map<string, JobState>();
    readonly #listeners: ListenerRegistry = {
        'job:start': new Set(),
        'job:done': new Set(),
        'job:error': new Set(),
        'job:skipped': new Set(),
    };
    readonly #clock: () => number;

    constructor(options: JobSchedulerOptions = {}) {
        this.#clock = options.clock ?? (() => Date.now());
    }

    /** Throws if the ID is taken or the cron expression is invalid. */
    register(config: JobConfig): void {
        if (this.#jobs.has(config.id)) {
            throw new Error(`[JobScheduler] Job '${config.id}' is already registered.`);
        }
        if (!cron.validate(config.cronExpression)) {
            throw new Error(
                `[JobScheduler] Invalid cron expression for job '${config.id}': ${config.cronExpression}`,
            );
        }

        const job: JobState = {
            config,
            task: null,
            inFlight: false,
            status: 'stopped',
            runs: 0,
            skippedRuns: 0,
            consecutiveFailures: 0,
            lastRunAt: null,
            lastDurationMs: null,
            lastError: null,
        };
        this.#jobs.set(config.id, job);

        if (config.autoStart ?? true) {
            job.task = cron.schedule(config.cronExpression, () => {
                void this.#run(job);
            });
            job.status = 'idle';
        }
    }

    /** Stop and forget a job. False if it was not registered. */
    unregister(jobId: string): boolean {
        const job = this.#jobs.get(jobId);
        if (!job) return false;

        job.task?.stop();
        this.#jobs.delete(jobId);
        return true;
    }

    /** Stop every cron task; the jobs stay registered. */
    stopAll(): void {
        for (const job of this.#jobs.values()) {
            job.task?.stop();
            job.task = null;
            if (!job.inFlight) job.status = 'stopped';
        }
    }

    /**
     * Run a job's handler now, outside its cron cadence. Subject to the same
     * overlap rule as a tick; resolves once the run (or the skip) is done.
     */
    async trigger(jobId: string): Promise<void> {
        const job = this.#jobs.get(jobId);
        if (!job) {
            throw new Error(`[JobScheduler] Job '${jobId}' is not registered.`);
        }
        await this.#run(job);
    }

    getJob(jobId: string): JobSnapshot | undefined {
        const job = this.#jobs.get(jobId);
        if (!job) return undefined;
        return {
            id: job.config.id,
            cronExpression: job.config.cronExpression,
            description: job.config.description,
            status: job.status,
            runs: job.runs,
            skippedRuns: job.skippedRuns,
            consecutiveFailures: job.consecutiveFailures,
            lastRunAt: job.lastRunAt,
            lastDurationMs: job.lastDurationMs,
            lastError: job.lastError,
        };
    }

    /** Returns an unsubscribe function. */
    on<K extends SchedulerEventType>(type: K, listener: SchedulerEventListener<K>): () => void {
        const listeners = this.#listeners[type];
        listeners.add(listener);
        return () => {
            listeners.delete(listener);
        };
    }

    async #run(job: JobState): Promise<void> {
        const jobId = job.config.id;
        if (job.inFlight) {
            job.skippedRuns += 1;
            this.#emit('job:skipped', { type: 'job:skipped', jobId, timestamp: new Date(), skippedRuns: job.skippedRuns });
            return;
        }

        const startedAt = this.#clock();
        job.inFlight = true;
        job.status = 'running';
        job.runs += 1;
        job.lastRunAt = new Date(startedAt);
        this.#emit('job:start', { type: 'job:start', jobId, timestamp: new Date(startedAt) });

        try {
            await job.config.handler();
            job.lastDurationMs = this.#clock() - startedAt;
            job.lastError = null;
            job.consecutiveFailures = 0;
            this.#emit('job:done', { type: 'job:done', jobId, timestamp: new Date(), durationMs: job.lastDurationMs });
        } catch (err) {
            const message = errorMessage(err);
            job.lastDurationMs = this.#clock() - startedAt;
            job.lastError = message;
            job.consecutiveFailures += 1;

            await logThought(`[JobScheduler] Job '${jobId}' failed (${job.consecutiveFailures} in a row): ${message}`);
            this.#emit('job:error', {
                type: 'job:error',
                jobId,
                timestamp: new Date(),
                durationMs: job.lastDurationMs,
                error: message,
                consecutiveFailures: job.consecutiveFailures,
            });
        } finally {
            job.inFlight = false;
            job.status = job.lastError !== null ? 'error' : job.task ? 'idle' : 'stopped';
        }
    }

    #emit<K extends SchedulerEventType>(type: K, event: SchedulerEventMap[K]): void {
        for (const listener of this.#listeners[type]) {
            try {
                listener(event);
            } catch (listenerErr) {
                console.error('[JobScheduler] Event listener threw an error:', listenerErr);
            }
        }
    }
}
