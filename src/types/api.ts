import type { IncidentStatus } from './incident.js';
import type { ReminderStats } from './reminder.js';
import type { JobSnapshot } from './scheduler.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    memoryUsageMb: number;
    store: { reachable: boolean; error?: string };
    incidents: Record<IncidentStatus, number> | null;
    reminders: ReminderStats | null;
    worker: (JobSnapshot & { backoffUntil: string | null }) | null;
    config: { ok: boolean; issues: Array<{ key: string; class: string }> };
}
