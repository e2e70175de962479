import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
    clearConfigCacheForTests,
    DEFAULT_CONFIG,
    getConfigValue,
    mergeWithDefaults,
    readConfig,
    readListConfig,
} from '../../src/config/config-loader.js';

describe('config-loader', () => {
    let tempDir: string;
    let configPath: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'threadwatch-config-'));
        configPath = path.join(tempDir, 'threadwatch.json');
        vi.stubEnv('THREADWATCH_CONFIG_PATH', configPath);
        clearConfigCacheForTests();
    });

    afterEach(async () => {
        vi.unstubAllEnvs();
        clearConfigCacheForTests();
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('loads defaults when the file is missing', async () => {
        const config = await readConfig();

        expect(config).toEqual(DEFAULT_CONFIG);
        expect(config.reminders.notificationIntervalMinutes).toBe(2);
        expect(config.runtime.workerPollCron).toBe('*/5 * * * * *');
    });

    it('merges a partial file over the defaults and ignores mistyped fields', () => {
        const merged = mergeWithDefaults({
            runtime: { apiPort: 4000 },
            slack: { allowedChannels: ['C1', 42, 'C2'] },
            reminders: { awaitingResponseIntervalMinutes: 'soon' },
        });

        expect(merged.runtime.apiPort).toBe(4000);
        expect(merged.runtime.databasePath).toBe('memory/threadwatch.db');
        expect(merged.slack.allowedChannels).toEqual(['C1', 'C2']);
        expect(merged.reminders.awaitingResponseIntervalMinutes).toBe(2);
    });

    it('reports a parse failure with the file path', async () => {
        await fs.writeFile(configPath, '{ not json', 'utf8');

        await expect(readConfig()).rejects.toThrow(`Failed to parse config file at ${configPath}`);
    });

    it('prefers env values over the JSON file and treats blank env as unset', async () => {
        await fs.writeFile(
            configPath,
            JSON.stringify({ jira: { projectKey: 'OPS' }, duty: { responsibleUserId: 'U-FILE' } }),
            'utf8',
        );
        vi.stubEnv('JIRA_PROJECT_KEY', ' SUP ');
        vi.stubEnv('RESPONSIBLE_USER_ID', '');

        expect(getConfigValue('JIRA_PROJECT_KEY')).toBe('SUP');
        expect(getConfigValue('RESPONSIBLE_USER_ID')).toBe('U-FILE');
        expect(getConfigValue('NOTIFICATION_INTERVAL_MINUTES')).toBe('2');
        expect(getConfigValue('UNKNOWN_KEY')).toBeUndefined();
    });

    it('splits list values on commas', () => {
        vi.stubEnv('ALLOWED_CHANNELS', 'C1, C2,,C3 ');

        expect(readListConfig('ALLOWED_CHANNELS')).toEqual(['C1', 'C2', 'C3']);
    });
});
