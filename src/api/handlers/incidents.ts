import type { Request, Response } from 'express';
import type { IncidentStore } from '../../services/incident-store.js';
import type { ReminderScheduler } from '../../services/reminder-scheduler.js';
import { mapError, sendError, sendOk } from '../shared.js';

export interface IncidentQueryDeps {
    store: IncidentStore;
    reminders: ReminderScheduler;
    clock?: () => number;
}

/** GET /incidents?scope=active|all: newest first, with pending reminders. */
export function handleListIncidents(deps: IncidentQueryDeps) {
    return (req: Request, res: Response): void => {
        const scope = req.query.scope ?? 'active';
        if (scope !== 'active' && scope !== 'all') {
            sendError(res, "Invalid scope. Expected one of: active, all.", 400);
            return;
        }

        try {
            const incidents = scope === 'all' ? deps.store.listAll() : deps.store.listActive();
            sendOk(res, {
                scope,
                incidents: incidents.map((incident) => ({
                    ...incident,
                    reminders: deps.reminders.listForIncident(incident.ticketKey).map((reminder) => ({
                        kind: reminder.kind,
                        dueAt: new Date(reminder.dueAt).toISOString(),
                        intervalMinutes: reminder.intervalMinutes,
                    })),
                })),
            });
        } catch (err) {
            const mapped = mapError(err);
            sendError(res, mapped.message, mapped.status);
        }
    };
}

/** GET /reminders/stats */
export function handleReminderStats(deps: IncidentQueryDeps) {
    return (_req: Request, res: Response): void => {
        try {
            const stats = deps.reminders.stats((deps.clock ?? Date.now)());
            sendOk(res, {
                ...stats,
                nextDueAt: stats.nextDueAt === null ? null : new Date(stats.nextDueAt).toISOString(),
            });
        } catch (err) {
            const mapped = mapError(err);
            sendError(res, mapped.message, mapped.status);
        }
    };
}
