/**
 * Registry of every configuration key consumed by threadwatch.
 *
 * Each entry declares whether the value is a secret, whether startup needs it,
 * and what the operator should do when it is missing or malformed. Consumed by
 * the config validator for startup and `/health` diagnostics.
 */

export type ConfigKeyClass = 'required' | 'optional';

export type ConfigKeyType = 'secret' | 'env';

export type ConfigKeyScope = 'runtime' | 'slack' | 'jira' | 'reminders' | 'duty';

/** Expected shape of a plain value; secrets are only checked for presence. */
export type ConfigKeyFormat = 'text' | 'positive_integer' | 'port' | 'url' | 'cron' | 'list';

export interface ConfigKeySpec {
  key: string;
  type: ConfigKeyType;
  class: ConfigKeyClass;
  scope: ConfigKeyScope;
  format: ConfigKeyFormat;
  description: string;
  remediation: string;
}

export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  // ── Runtime ────────────────────────────────────────────────────────────────
  {
    key: 'API_SECRET',
    type: 'secret',
    class: 'optional',
    scope: 'runtime',
    format: 'text',
    description: 'HMAC secret for signed control-plane requests (event ingress, diagnostics).',
    remediation: 'Set API_SECRET to enable the signed /events and /incidents endpoints.',
  },
  {
    key: 'API_PORT',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    format: 'port',
    description: 'Listening port for the control-plane HTTP API (default: 3100).',
    remediation: 'Set API_PORT to a port between 1 and 65535.',
  },
  {
    key: 'DATABASE_PATH',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    format: 'text',
    description: 'SQLite file holding incidents and reminders (default: memory/threadwatch.db).',
    remediation: 'Set DATABASE_PATH to a writable file path.',
  },
  {
    key: 'WORKER_POLL_CRON',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    format: 'cron',
    description: 'Six-field cron expression for the reminder worker poll tick (default: every 5 seconds).',
    remediation: "Set WORKER_POLL_CRON to a node-cron expression, e.g. '*/5 * * * * *'.",
  },
  {
    key: 'WORKER_POLL_INTERVAL_SECONDS',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    format: 'positive_integer',
    description: 'Seconds between poll ticks, for cron expressions whose spacing cannot be read off the fields.',
    remediation: 'Set WORKER_POLL_INTERVAL_SECONDS to the largest gap between WORKER_POLL_CRON ticks, in seconds.',
  },

  // ── Slack ──────────────────────────────────────────────────────────────────
  {
    key: 'SLACK_BOT_TOKEN',
    type: 'secret',
    class: 'required',
    scope: 'slack',
    format: 'text',
    description: 'Bot token used to post reminders, update controls and manage reactions.',
    remediation: 'Set SLACK_BOT_TOKEN to the bot user OAuth token of the Slack app.',
  },
  {
    key: 'SLACK_WORKSPACE_URL',
    type: 'env',
    class: 'optional',
    scope: 'slack',
    format: 'url',
    description: 'Workspace base URL used to build thread links in tickets.',
    remediation: 'Set SLACK_WORKSPACE_URL, e.g. https://example.slack.com.',
  },
  {
    key: 'ALLOWED_CHANNELS',
    type: 'env',
    class: 'optional',
    scope: 'slack',
    format: 'list',
    description: 'Comma-separated channel IDs that may open incidents. Empty means all channels.',
    remediation: 'Set ALLOWED_CHANNELS=C0123,C0456 to restrict incident intake.',
  },
  {
    key: 'ALLOWED_BUTTON_USERS',
    type: 'env',
    class: 'optional',
    scope: 'slack',
    format: 'list',
    description: 'Comma-separated user IDs allowed to change incident status. Empty means everyone.',
    remediation: 'Set ALLOWED_BUTTON_USERS=U0123,U0456 to restrict status changes.',
  },

  // ── Jira ───────────────────────────────────────────────────────────────────
  {
    key: 'JIRA_URL',
    type: 'env',
    class: 'required',
    scope: 'jira',
    format: 'url',
    description: 'Base URL of the Jira instance.',
    remediation: 'Set JIRA_URL, e.g. https://example.atlassian.net.',
  },
  {
    key: 'JIRA_USERNAME',
    type: 'env',
    class: 'required',
    scope: 'jira',
    format: 'text',
    description: 'Jira account used for API calls.',
    remediation: 'Set JIRA_USERNAME to the email of the integration account.',
  },
  {
    key: 'JIRA_API_TOKEN',
    type: 'secret',
    class: 'required',
    scope: 'jira',
    format: 'text',
    description: 'API token of the Jira integration account.',
    remediation: 'Set JIRA_API_TOKEN to an API token of JIRA_USERNAME.',
  },
  {
    key: 'JIRA_PROJECT_KEY',
    type: 'env',
    class: 'required',
    scope: 'jira',
    format: 'text',
    description: 'Project that receives incident tickets.',
    remediation: 'Set JIRA_PROJECT_KEY, e.g. OPS.',
  },
  {
    key: 'JIRA_ISSUE_TYPE',
    type: 'env',
    class: 'optional',
    scope: 'jira',
    format: 'text',
    description: "Issue type for incident tickets (default: 'Incident').",
    remediation: 'Set JIRA_ISSUE_TYPE to an issue type that exists in the project.',
  },
  {
    key: 'JIRA_CLOSE_TRANSITION_ID',
    type: 'env',
    class: 'optional',
    scope: 'jira',
    format: 'positive_integer',
    description: 'Workflow transition used to close a ticket (default: 91).',
    remediation: 'Set JIRA_CLOSE_TRANSITION_ID to the ID of the "Done" transition.',
  },

  // ── Reminders ──────────────────────────────────────────────────────────────
  {
    key: 'NOTIFICATION_INTERVAL_MINUTES',
    type: 'env',
    class: 'optional',
    scope: 'reminders',
    format: 'positive_integer',
    description: 'Minutes between reminders to the person on duty for unassigned incidents (default: 2).',
    remediation: 'Set NOTIFICATION_INTERVAL_MINUTES to an integer >= 1.',
  },
  {
    key: 'AWAITING_RESPONSE_INTERVAL_MINUTES',
    type: 'env',
    class: 'optional',
    scope: 'reminders',
    format: 'positive_integer',
    description: 'Minutes between reminders to a reporter whose reply is awaited (default: 2).',
    remediation: 'Set AWAITING_RESPONSE_INTERVAL_MINUTES to an integer >= 1.',
  },
  {
    key: 'RECONCILE_DELAY_MINUTES',
    type: 'env',
    class: 'optional',
    scope: 'reminders',
    format: 'positive_integer',
    description: 'Initial delay of reminders restored at startup (default: 1).',
    remediation: 'Set RECONCILE_DELAY_MINUTES to an integer >= 1.',
  },

  // ── Duty roster ────────────────────────────────────────────────────────────
  {
    key: 'RESPONSIBLE_USER_ID',
    type: 'env',
    class: 'required',
    scope: 'duty',
    format: 'text',
    description: 'User pinged when the roster has nobody on duty.',
    remediation: 'Set RESPONSIBLE_USER_ID to a Slack user ID.',
  },
  {
    key: 'DUTY_ROSTER_PATH',
    type: 'env',
    class: 'optional',
    scope: 'duty',
    format: 'text',
    description: 'JSON file with duty shifts. Without it every reminder pings RESPONSIBLE_USER_ID.',
    remediation: 'Set DUTY_ROSTER_PATH to a shift file (see config/duty-roster.example.json).',
  },
  {
    key: 'DUTY_ROSTER_REFRESH_MINUTES',
    type: 'env',
    class: 'optional',
    scope: 'duty',
    format: 'positive_integer',
    description: 'How long a loaded roster is trusted before the file is read again (default: 60).',
    remediation: 'Set DUTY_ROSTER_REFRESH_MINUTES to an integer >= 1.',
  },
];
