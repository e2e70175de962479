import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import type { IncidentStore } from '../../services/incident-store.js';
import type { ReminderScheduler } from '../../services/reminder-scheduler.js';
import type { JobScheduler } from '../../services/job-scheduler.js';
import { REMINDER_WORKER_JOB_ID, type ReminderWorker } from '../../services/reminder-worker.js';
import { validateRuntimeConfig } from '../../config/config-validator.js';
import { errorMessage } from '../../types/errors.js';
import { sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    store: IncidentStore;
    reminders: ReminderScheduler;
    scheduler: JobScheduler;
    worker: ReminderWorker;
    clock?: () => number;
}

/** GET /health: store reachability, reminder stats and worker job status. */
export function handleHealth(deps: HealthDeps) {
    return (_req: Request, res: Response): void => {
        const now = (deps.clock ?? Date.now)();

        let store: HealthData['store'] = { reachable: true };
        let incidents: HealthData['incidents'] = null;
        let reminders: HealthData['reminders'] = null;
        try {
            incidents = deps.store.countByStatus();
            reminders = deps.reminders.stats(now);
        } catch (err) {
            store = { reachable: false, error: errorMessage(err) };
        }

        const job = deps.scheduler.getJob(REMINDER_WORKER_JOB_ID);
        const backoffUntil = deps.worker.backoffUntil;
        const worker: HealthData['worker'] = job
            ? { ...job, backoffUntil: backoffUntil > now ? new Date(backoffUntil).toISOString() : null }
            : null;

        const validation = validateRuntimeConfig();

        const data: HealthData = {
            status:
                !store.reachable ||
                !worker ||
                worker.status === 'error' ||
                worker.backoffUntil !== null ||
                !validation.ok
                    ? 'degraded'
                    : 'ok',
            uptimeSec: Math.floor((Date.now() - startTime) / 1000),
            memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
            store,
            incidents,
            reminders,
            worker,
            config: {
                ok: validation.ok,
                issues: validation.issues.map((issue) => ({ key: issue.key, class: issue.class })),
            },
        };

        sendOk(res, data);
    };
}
