import { existsSync, readFileSync } from 'node:fs';
import * as fs from 'node:fs/promises';
import path from 'node:path';

export interface ThreadwatchConfig {
    runtime: {
        apiPort: number;
        apiSecret: string;
        databasePath: string;
        workerPollCron: string;
        /** Spacing of poll ticks; 0 derives it from the cron expression. */
        workerPollIntervalSeconds: number;
    };
    slack: {
        botToken: string;
        workspaceUrl: string;
        allowedChannels: string[];
        allowedButtonUsers: string[];
    };
    jira: {
        url: string;
        username: string;
        apiToken: string;
        projectKey: string;
        issueType: string;
        closeTransitionId: string;
    };
    reminders: {
        notificationIntervalMinutes: number;
        awaitingResponseIntervalMinutes: number;
        reconcileDelayMinutes: number;
    };
    duty: {
        responsibleUserId: string;
        rosterPath: string;
        rosterRefreshMinutes: number;
    };
}

export const DEFAULT_CONFIG: ThreadwatchConfig = {
    runtime: {
        apiPort: 3100,
        apiSecret: '',
        databasePath: 'memory/threadwatch.db',
        workerPollCron: '*/5 * * * * *',
        workerPollIntervalSeconds: 0,
    },
    slack: {
        botToken: '',
        workspaceUrl: '',
        allowedChannels: [],
        allowedButtonUsers: [],
    },
    jira: {
        url: '',
        username: '',
        apiToken: '',
        projectKey: '',
        issueType: 'Incident',
        closeTransitionId: '91',
    },
    reminders: {
        notificationIntervalMinutes: 2,
        awaitingResponseIntervalMinutes: 2,
        reconcileDelayMinutes: 1,
    },
    duty: {
        responsibleUserId: '',
        rosterPath: '',
        rosterRefreshMinutes: 60,
    },
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.THREADWATCH_CONFIG_PATH) {
        return path.resolve(process.env.THREADWATCH_CONFIG_PATH);
    }
    return path.resolve('threadwatch.json');
}

export async function readConfig(overridePath?: string): Promise<ThreadwatchConfig> {
    const targetPath = getConfigPath(overridePath);
    try {
        const rawData = await fs.readFile(targetPath, 'utf-8');
        return mergeWithDefaults(JSON.parse(rawData));
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') return mergeWithDefaults({});
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to parse config file at ${targetPath}: ${message}`);
    }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown, fallback: string[]): string[] {
    return Array.isArray(value)
        ? value.filter((item): item is string => typeof item === 'string')
        : fallback;
}

function str(value: unknown, fallback: string): string {
    return typeof value === 'string' ? value : fallback;
}

function num(value: unknown, fallback: number): number {
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function section(record: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = record[key];
    return isRecord(value) ? value : {};
}

export function mergeWithDefaults(loaded: unknown): ThreadwatchConfig {
    const record = isRecord(loaded) ? loaded : {};
    const runtime = section(record, 'runtime');
    const slack = section(record, 'slack');
    const jira = section(record, 'jira');
    const reminders = section(record, 'reminders');
    const duty = section(record, 'duty');
    const d = DEFAULT_CONFIG;

    return {
        runtime: {
            apiPort: num(runtime.apiPort, d.runtime.apiPort),
            apiSecret: str(runtime.apiSecret, d.runtime.apiSecret),
            databasePath: str(runtime.databasePath, d.runtime.databasePath),
            workerPollCron: str(runtime.workerPollCron, d.runtime.workerPollCron),
            workerPollIntervalSeconds: num(runtime.workerPollIntervalSeconds, d.runtime.workerPollIntervalSeconds),
        },
        slack: {
            botToken: str(slack.botToken, d.slack.botToken),
            workspaceUrl: str(slack.workspaceUrl, d.slack.workspaceUrl),
            allowedChannels: stringList(slack.allowedChannels, d.slack.allowedChannels),
            allowedButtonUsers: stringList(slack.allowedButtonUsers, d.slack.allowedButtonUsers),
        },
        jira: {
            url: str(jira.url, d.jira.url),
            username: str(jira.username, d.jira.username),
            apiToken: str(jira.apiToken, d.jira.apiToken),
            projectKey: str(jira.projectKey, d.jira.projectKey),
            issueType: str(jira.issueType, d.jira.issueType),
            closeTransitionId: str(jira.closeTransitionId, d.jira.closeTransitionId),
        },
        reminders: {
            notificationIntervalMinutes: num(reminders.notificationIntervalMinutes, d.reminders.notificationIntervalMinutes),
            awaitingResponseIntervalMinutes: num(
                reminders.awaitingResponseIntervalMinutes,
                d.reminders.awaitingResponseIntervalMinutes,
            ),
            reconcileDelayMinutes: num(reminders.reconcileDelayMinutes, d.reminders.reconcileDelayMinutes),
        },
        duty: {
            responsibleUserId: str(duty.responsibleUserId, d.duty.responsibleUserId),
            rosterPath: str(duty.rosterPath, d.duty.rosterPath),
            rosterRefreshMinutes: num(duty.rosterRefreshMinutes, d.duty.rosterRefreshMinutes),
        },
    };
}

// ── Flat key adapter ────────────────────────────────────────────────────────

let cachedConfig: ThreadwatchConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

export function reloadConfigSync(): ThreadwatchConfig {
    const configPath = getConfigPath();
    try {
        if (existsSync(configPath)) {
            cachedConfig = mergeWithDefaults(JSON.parse(readFileSync(configPath, 'utf8')));
            return cachedConfig;
        }
    } catch (error) {
        console.error(`[Threadwatch Config] Failed to parse JSON config at ${configPath}:`, error);
    }
    cachedConfig = mergeWithDefaults({});
    return cachedConfig;
}

function lookupJsonValue(config: ThreadwatchConfig, key: string): unknown {
    switch (key) {
        case 'API_PORT': return config.runtime.apiPort;
        case 'API_SECRET': return config.runtime.apiSecret;
        case 'DATABASE_PATH': return config.runtime.databasePath;
        case 'WORKER_POLL_CRON': return config.runtime.workerPollCron;
        case 'WORKER_POLL_INTERVAL_SECONDS':
            return config.runtime.workerPollIntervalSeconds > 0 ? config.runtime.workerPollIntervalSeconds : undefined;

        case 'SLACK_BOT_TOKEN': return config.slack.botToken;
        case 'SLACK_WORKSPACE_URL': return config.slack.workspaceUrl;
        case 'ALLOWED_CHANNELS': return config.slack.allowedChannels.join(',');
        case 'ALLOWED_BUTTON_USERS': return config.slack.allowedButtonUsers.join(',');

        case 'JIRA_URL': return config.jira.url;
        case 'JIRA_USERNAME': return config.jira.username;
        case 'JIRA_API_TOKEN': return config.jira.apiToken;
        case 'JIRA_PROJECT_KEY': return config.jira.projectKey;
        case 'JIRA_ISSUE_TYPE': return config.jira.issueType;
        case 'JIRA_CLOSE_TRANSITION_ID': return config.jira.closeTransitionId;

        case 'NOTIFICATION_INTERVAL_MINUTES': return config.reminders.notificationIntervalMinutes;
        case 'AWAITING_RESPONSE_INTERVAL_MINUTES': return config.reminders.awaitingResponseIntervalMinutes;
        case 'RECONCILE_DELAY_MINUTES': return config.reminders.reconcileDelayMinutes;

        case 'RESPONSIBLE_USER_ID': return config.duty.responsibleUserId;
        case 'DUTY_ROSTER_PATH': return config.duty.rosterPath;
        case 'DUTY_ROSTER_REFRESH_MINUTES': return config.duty.rosterRefreshMinutes;
        default: return undefined;
    }
}

function hasText(value: unknown): boolean {
    return value !== undefined && value !== null && String(value).trim() !== '';
}

/**
 * Resolve a configuration value. Environment variables override
 * `threadwatch.json`; an empty string counts as unset.
 */
export function getConfigValue(key: string): string | undefined {
    const config = cachedConfig ?? reloadConfigSync();

    const envValue = process.env[key];
    if (hasText(envValue)) {
        return String(envValue).trim();
    }

    const jsonValue = lookupJsonValue(config, key);
    if (hasText(jsonValue)) {
        return String(jsonValue);
    }

    return undefined;
}

export function readNumberConfig(key: string, fallback: number): number {
    const raw = getConfigValue(key);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
}

export function readListConfig(key: string): string[] {
    const raw = getConfigValue(key);
    if (!raw) return [];
    return raw
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}
