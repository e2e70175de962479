import 'dotenv/config';
import type { Server } from 'node:http';
import { startApiServer } from './api/router.js';
import { getConfigValue, readListConfig, readNumberConfig } from './config/config-loader.js';
import {
    formatValidationSummary,
    readPollIntervalMs,
    readReconcileDelayMinutes,
    readReminderIntervals,
    validateRuntimeConfig,
} from './config/config-validator.js';
import { JiraTicketTracker } from './interfaces/jira-tracker.js';
import { SlackChatAdapter } from './interfaces/slack-adapter.js';
import { openDatabase } from './services/db.js';
import { FileDutyRoster } from './services/duty-roster.js';
import { IncidentInteractions } from './services/incident-interactions.js';
import { IncidentLifecycle } from './services/incident-lifecycle.js';
import { IncidentStore } from './services/incident-store.js';
import { JobScheduler } from './services/job-scheduler.js';
import { PermissionPolicy } from './services/permission-policy.js';
import { ReminderScheduler } from './services/reminder-scheduler.js';
import { ReminderWorker } from './services/reminder-worker.js';
import { errorMessage } from './types/errors.js';
import { logThought } from './utils/logger.js';

// ── Config Preflight ─────────────────────────────────────────────────────────

const validation = validateRuntimeConfig();
console.log(formatValidationSummary(validation));
if (!validation.ok) {
    for (const issue of validation.fatalIssues) {
        console.error(`[Threadwatch] ${issue.message} ${issue.remediation}`);
    }
    process.exit(1);
}

function required(key: string): string {
    const value = getConfigValue(key);
    if (!value) {
        throw new Error(`[Threadwatch] ${key} is not configured.`);
    }
    return value;
}

// ── Services ─────────────────────────────────────────────────────────────────

const db = openDatabase(getConfigValue('DATABASE_PATH') ?? 'memory/threadwatch.db');
const store = new IncidentStore(db);
const reminders = new ReminderScheduler(db);
const intervals = readReminderIntervals();

const chat = new SlackChatAdapter({ botToken: required('SLACK_BOT_TOKEN') });
const tracker = new JiraTicketTracker({
    baseUrl: required('JIRA_URL'),
    username: required('JIRA_USERNAME'),
    apiToken: required('JIRA_API_TOKEN'),
    projectKey: required('JIRA_PROJECT_KEY'),
    issueType: getConfigValue('JIRA_ISSUE_TYPE'),
    closeTransitionId: getConfigValue('JIRA_CLOSE_TRANSITION_ID'),
});
const roster = new FileDutyRoster({
    rosterPath: getConfigValue('DUTY_ROSTER_PATH'),
    fallbackUserId: required('RESPONSIBLE_USER_ID'),
    refreshMinutes: readNumberConfig('DUTY_ROSTER_REFRESH_MINUTES', 60),
});
const permissions = new PermissionPolicy({
    allowedChannels: readListConfig('ALLOWED_CHANNELS'),
    allowedActors: readListConfig('ALLOWED_BUTTON_USERS'),
});

const lifecycle = new IncidentLifecycle({ store, reminders, tracker, intervals });
const interactions = new IncidentInteractions({
    lifecycle,
    store,
    tracker,
    chat,
    roster,
    permissions,
    workspaceUrl: getConfigValue('SLACK_WORKSPACE_URL'),
});

const scheduler = new JobScheduler();
scheduler.on('job:error', (event) => {
    console.error(`[Threadwatch] Job '${event.jobId}' failed (${event.consecutiveFailures} in a row): ${event.error}`);
});

const worker = new ReminderWorker({
    store,
    reminders,
    chat,
    roster,
    scheduler,
    intervals,
    options: {
        pollCron: getConfigValue('WORKER_POLL_CRON'),
        pollIntervalMs: readPollIntervalMs(),
        reconcileDelayMinutes: readReconcileDelayMinutes(),
    },
});

// ── Startup ──────────────────────────────────────────────────────────────────

let server: Server | null = null;

async function main(): Promise<void> {
    const restored = worker.reconcile();
    worker.start();
    server = await startApiServer({ store, reminders, scheduler, worker, interactions });
    void logThought(
        `[Threadwatch] Started: ${store.listActive().length} active incident(s), ${restored.length} reminder(s) restored.`,
    );
}

function shutdown(signal: NodeJS.Signals): void {
    worker.stop();
    scheduler.stopAll();
    server?.close();
    db.close();
    void logThought(`[Threadwatch] Received ${signal}; services stopped.`);
    process.exit(0);
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

main().catch((err) => {
    console.error(`[Threadwatch] Startup failed: ${errorMessage(err)}`);
    process.exit(1);
});
