import type { NewTicket, TicketTracker } from '../types/adapters.js';
import { AdapterFailureError, errorMessage } from '../types/errors.js';
import { logThought } from '../utils/logger.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';

export interface JiraTrackerOptions {
  baseUrl: string;
  username: string;
  apiToken: string;
  projectKey: string;
  issueType?: string;
  /** Workflow transition that moves an issue to done. */
  closeTransitionId?: string;
  fetchImpl?: typeof fetch;
  retry?: RetryOptions;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class JiraHttpError extends Error {
  readonly status: number;

  constructor(operation: string, status: number, detail: string) {
    super(`${operation} returned HTTP ${status}${detail ? `: ${detail}` : ''}`);
    this.name = 'JiraHttpError';
    this.status = status;
  }
}

/** `TicketTracker` over the Jira REST API (v2). */
export class JiraTicketTracker implements TicketTracker {
  readonly #baseUrl: string;
  readonly #authorization: string;
  readonly #projectKey: string;
  readonly #issueType: string;
  readonly #closeTransitionId: string;
  readonly #fetch: typeof fetch;
  readonly #retry: RetryOptions;

  constructor(options: JiraTrackerOptions) {
    this.#baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.#authorization = `Basic ${Buffer.from(`${options.username}:${options.apiToken}`).toString('base64')}`;
    this.#projectKey = options.projectKey;
    this.#issueType = options.issueType ?? 'Incident';
    this.#closeTransitionId = options.closeTransitionId ?? '91';
    this.#fetch = options.fetchImpl ?? fetch;
    this.#retry = options.retry ?? {};
  }

  ticketUrl(ticketKey: string): string {
    return `${this.#baseUrl}/browse/${ticketKey}`;
  }

  async createTicket(ticket: NewTicket): Promise<string> {
    const payload = await this.#send('createTicket', 'POST', '/rest/api/2/issue', {
      fields: {
        project: { key: this.#projectKey },
        summary: ticket.title,
        description: `${ticket.description}\n\nReported by: ${ticket.reporter}\nThread: ${ticket.threadUrl}`,
        issuetype: { name: this.#issueType },
      },
    });

    if (!isRecord(payload) || typeof payload.key !== 'string') {
      throw new AdapterFailureError('jira', 'createTicket', 'response carried no issue key');
    }
    void logThought(`[Jira] Created ${payload.key}.`);
    return payload.key;
  }

  /** False when Jira rejects the transition (e.g. the issue is already done). */
  async closeTicket(ticketKey: string): Promise<boolean> {
    return this.#attempt('closeTicket', async () => {
      await this.#send('closeTicket', 'POST', `/rest/api/2/issue/${encodeURIComponent(ticketKey)}/transitions`, {
        transition: { id: this.#closeTransitionId },
      });
    });
  }

  /** Assigns the Jira user whose email matches; false when no such user exists. */
  async assignTicket(ticketKey: string, assigneeIdentity: string): Promise<boolean> {
    const users = await this.#send(
      'assignTicket',
      'GET',
      `/rest/api/2/user/search?query=${encodeURIComponent(assigneeIdentity)}`,
    );
    const match = (Array.isArray(users) ? users : []).find(
      (user): user is Record<string, unknown> =>
        isRecord(user) &&
        typeof user.emailAddress === 'string' &&
        user.emailAddress.toLowerCase() === assigneeIdentity.toLowerCase(),
    );
    if (!match || typeof match.accountId !== 'string') {
      void logThought(`[Jira] No user matches ${assigneeIdentity}; ${ticketKey} left unassigned.`);
      return false;
    }

    const accountId = match.accountId;
    return this.#attempt('assignTicket', async () => {
      await this.#send('assignTicket', 'PUT', `/rest/api/2/issue/${encodeURIComponent(ticketKey)}/assignee`, {
        accountId,
      });
    });
  }

  /** Client errors (4xx) become `false`; anything else propagates. */
  async #attempt(operation: string, fn: () => Promise<void>): Promise<boolean> {
    try {
      await fn();
      return true;
    } catch (err) {
      if (err instanceof AdapterFailureError && err.cause instanceof JiraHttpError && err.cause.status < 500) {
        void logThought(`[Jira] ${operation} rejected: ${err.cause.message}`);
        return false;
      }
      throw err;
    }
  }

  async #send(operation: string, method: string, path: string, body?: unknown): Promise<unknown> {
    try {
      return await withRetry(() => this.#request(operation, method, path, body), {
        maxAttempts: 3,
        ...this.#retry,
        label: `jira:${operation}`,
        isRetryable: (err) => !(err instanceof JiraHttpError) || err.status >= 500 || err.status === 429,
      });
    } catch (err) {
      throw new AdapterFailureError('jira', operation, errorMessage(err), { cause: err });
    }
  }

  async #request(operation: string, method: string, path: string, body?: unknown): Promise<unknown> {
    const headers: Record<string, string> = {
      Authorization: this.#authorization,
      Accept: 'application/json',
    };
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    const response = await this.#fetch(`${this.#baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    if (!response.ok) {
      const detail = (await response.text()).slice(0, 200);
      throw new JiraHttpError(operation, response.status, detail);
    }
    if (response.status === 204) return null;

    const text = await response.text();
    return text ? JSON.parse(text) : null;
  }
}
