import * as fs from 'node:fs/promises';
import path from 'node:path';

const SENSITIVE_ENV_KEYS = ['SLACK_BOT_TOKEN', 'JIRA_API_TOKEN', 'API_SECRET'] as const;
const KEY_VALUE_PATTERN = /\b(token|secret|password|api[_-]?key)(\s*[=:]\s*)([^\s,;'"]+)/gi;
const BEARER_PATTERN = /\b(Bearer|Basic)\s+[A-Za-z0-9._~+/=-]{8,}/g;
const SLACK_TOKEN_PATTERN = /\bxox[abprs]-[A-Za-z0-9-]{10,}/g;
const REDACTED = '[REDACTED]';

function resolveLogDir(): string {
  return path.resolve(process.env.THREADWATCH_LOG_DIR ?? 'memory');
}

function currentDateIso(): string {
  return new Date().toISOString().slice(0, 10);
}

/**
 * Redact secrets from free text before it is written anywhere.
 *
 * Raw values of the configured secret env vars are replaced wherever they
 * appear, in addition to `key=value` pairs, bearer headers and Slack tokens.
 */
export function scrubSensitiveText(text: string): string {
  let scrubbed = text;

  for (const key of SENSITIVE_ENV_KEYS) {
    const value = process.env[key];
    if (value && value.trim().length >= 6) {
      scrubbed = scrubbed.split(value.trim()).join(REDACTED);
    }
  }

  return scrubbed
    .replace(SLACK_TOKEN_PATTERN, REDACTED)
    .replace(BEARER_PATTERN, (_match, scheme: string) => `${scheme} ${REDACTED}`)
    .replace(KEY_VALUE_PATTERN, (_match, key: string, separator: string) => `${key}${separator}${REDACTED}`);
}

/** Pull the leading `[Category]` tag out of a log line, if any. */
function extractCategory(message: string): string {
  const match = /^\[([^\]]+)\]/.exec(message);
  return match?.[1] ?? 'General';
}

/**
 * Append a log entry to the daily markdown log (`<logDir>/YYYY-MM-DD.md`).
 *
 * Each entry is a `## <category> @ <timestamp>` section. Logging never throws:
 * a failed write is reported on stderr and dropped.
 */
export async function logThought(message: string): Promise<void> {
  const safeMessage = scrubSensitiveText(message);
  const timestamp = new Date().toISOString();
  const entry = `\n## ${extractCategory(safeMessage)} @ ${timestamp}\n${safeMessage}\n`;
  const logDir = resolveLogDir();

  try {
    await fs.mkdir(logDir, { recursive: true });
    await fs.appendFile(path.join(logDir, `${currentDateIso()}.md`), entry, 'utf8');
  } catch (err) {
    console.error('[Logger] Failed to write log entry:', err instanceof Error ? err.message : String(err));
  }
}
