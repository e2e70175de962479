/**
 * Runtime configuration validator.
 *
 * Produces structured, redaction-safe diagnostics for missing required keys and
 * malformed values. Values are resolved through `getConfigValue`, so both
 * `threadwatch.json` and env overrides are checked. No secret value is ever
 * included in the output.
 */

import cron from 'node-cron';
import { CONFIG_SCHEMA } from './env-schema.js';
import type { ConfigKeySpec } from './env-schema.js';
import { getConfigValue } from './config-loader.js';
import { InvalidIntervalError } from '../types/errors.js';
import type { ReminderIntervals } from '../types/reminder.js';

export type ConfigIssueClass = 'missing_required' | 'format_error';

export interface ConfigIssue {
  key: string;
  class: ConfigIssueClass;
  message: string;
  /** Actionable hint, never a value. */
  remediation: string;
}

export interface ConfigValidationResult {
  /** true when no fatal issue was found. */
  ok: boolean;
  presentKeys: string[];
  issues: ConfigIssue[];
  /** Subset of issues that prevent startup. */
  fatalIssues: ConfigIssue[];
  /** ISO-8601. */
  validatedAt: string;
}

function isPositiveIntegerText(raw: string): boolean {
  return /^\d+$/.test(raw) && Number(raw) >= 1;
}

function formatError(spec: ConfigKeySpec, raw: string): string | null {
  // Secret values are never echoed, so only their presence is checked.
  if (spec.type === 'secret') return null;

  switch (spec.format) {
    case 'positive_integer':
      return isPositiveIntegerText(raw)
        ? null
        : `${spec.key} must be an integer >= 1, got '${raw}'.`;
    case 'port': {
      const parsed = Number(raw);
      return Number.isInteger(parsed) && parsed >= 1 && parsed <= 65535
        ? null
        : `${spec.key} must be an integer in range 1-65535, got '${raw}'.`;
    }
    case 'url':
      return /^https?:\/\/\S+$/i.test(raw) ? null : `${spec.key} must be an http(s) URL, got '${raw}'.`;
    case 'cron':
      return cron.validate(raw) ? null : `${spec.key} is not a valid cron expression: '${raw}'.`;
    case 'text':
    case 'list':
      return null;
  }
}

/**
 * Validate the runtime configuration against the key registry.
 *
 * Missing required keys and malformed interval values are fatal; other format
 * problems are reported but do not block startup.
 */
export function validateRuntimeConfig(now: () => Date = () => new Date()): ConfigValidationResult {
  const presentKeys: string[] = [];
  const issues: ConfigIssue[] = [];
  const fatalIssues: ConfigIssue[] = [];

  for (const spec of CONFIG_SCHEMA) {
    const raw = getConfigValue(spec.key);

    if (raw === undefined) {
      if (spec.class === 'required') {
        const issue: ConfigIssue = {
          key: spec.key,
          class: 'missing_required',
          message: `Required config key '${spec.key}' is not set. ${spec.description}`,
          remediation: spec.remediation,
        };
        issues.push(issue);
        fatalIssues.push(issue);
      }
      continue;
    }

    const problem = formatError(spec, raw);
    if (problem) {
      const issue: ConfigIssue = {
        key: spec.key,
        class: 'format_error',
        message: problem,
        remediation: spec.remediation,
      };
      issues.push(issue);
      if (spec.scope === 'reminders' || spec.format === 'cron') {
        fatalIssues.push(issue);
      }
      continue;
    }

    presentKeys.push(spec.key);
  }

  return {
    ok: fatalIssues.length === 0,
    presentKeys,
    issues,
    fatalIssues,
    validatedAt: now().toISOString(),
  };
}

/** One-line summary for startup logs. Never includes values. */
export function formatValidationSummary(result: ConfigValidationResult): string {
  if (result.issues.length === 0) {
    return `[Config] ${result.presentKeys.length} keys configured, no issues.`;
  }
  const detail = result.issues.map((issue) => `${issue.key} (${issue.class})`).join(', ');
  return `[Config] ${result.issues.length} issue(s): ${detail}.`;
}

/**
 * Parse a reminder interval. Accepts integers >= 1 (number or numeric text);
 * throws `InvalidIntervalError` otherwise.
 */
export function parseIntervalMinutes(label: string, value: unknown): number {
  if (typeof value === 'number' && Number.isInteger(value) && value >= 1) {
    return value;
  }
  if (typeof value === 'string' && isPositiveIntegerText(value.trim())) {
    return Number(value.trim());
  }
  throw new InvalidIntervalError(label, value);
}

function readInterval(key: string, fallback: number): number {
  return parseIntervalMinutes(key, getConfigValue(key) ?? fallback);
}

/** Resolve the per-kind reminder intervals from config. */
export function readReminderIntervals(): ReminderIntervals {
  return {
    default: readInterval('NOTIFICATION_INTERVAL_MINUTES', 2),
    awaiting_response: readInterval('AWAITING_RESPONSE_INTERVAL_MINUTES', 2),
  };
}

/** Poll spacing override in milliseconds; undefined leaves it to the cron expression. */
export function readPollIntervalMs(): number | undefined {
  const raw = getConfigValue('WORKER_POLL_INTERVAL_SECONDS');
  return raw !== undefined && isPositiveIntegerText(raw) ? Number(raw) * 1000 : undefined;
}

export function readReconcileDelayMinutes(): number {
  return readInterval('RECONCILE_DELAY_MINUTES', 1);
}
