import type { KnownBlock } from '@slack/types';
import type { ChatAdapter } from '../types/adapters.js';
import { AdapterFailureError, errorMessage } from '../types/errors.js';
import { logThought } from '../utils/logger.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';

const DEFAULT_API_BASE = 'https://slack.com/api';

/** Slack errors that mean the desired end state already holds. */
const BENIGN_ERRORS: Readonly<Record<string, readonly string[]>> = {
  'reactions.add': ['already_reacted'],
  'reactions.remove': ['no_reaction'],
};

/** Slack errors worth another attempt. */
const TRANSIENT_ERRORS = new Set(['ratelimited', 'service_unavailable', 'internal_error', 'request_timeout', 'fatal_error']);

export interface SlackChatAdapterOptions {
  botToken: string;
  apiBaseUrl?: string;
  fetchImpl?: typeof fetch;
  retry?: RetryOptions;
}

type SlackPayload = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class SlackApiError extends Error {
  readonly code: string;
  readonly transient: boolean;

  constructor(method: string, code: string, transient: boolean) {
    super(`${method} returned ${code}`);
    this.name = 'SlackApiError';
    this.code = code;
    this.transient = transient;
  }
}

/** `ChatAdapter` over the Slack Web API. */
export class SlackChatAdapter implements ChatAdapter {
  readonly #botToken: string;
  readonly #apiBase: string;
  readonly #fetch: typeof fetch;
  readonly #retry: RetryOptions;
  #botId: string | null = null;

  constructor(options: SlackChatAdapterOptions) {
    this.#botToken = options.botToken;
    this.#apiBase = (options.apiBaseUrl ?? DEFAULT_API_BASE).replace(/\/+$/, '');
    this.#fetch = options.fetchImpl ?? fetch;
    this.#retry = options.retry ?? {};
  }

  async postReminder(channelId: string, threadTs: string, text: string): Promise<void> {
    await this.#call('chat.postMessage', { channel: channelId, thread_ts: threadTs, text });
  }

  async postThreadMessage(channelId: string, threadTs: string, text: string): Promise<void> {
    await this.#call('chat.postMessage', { channel: channelId, thread_ts: threadTs, text });
  }

  async postBlocks(channelId: string, threadTs: string, blocks: KnownBlock[], fallbackText: string): Promise<string> {
    const payload = await this.#call('chat.postMessage', {
      channel: channelId,
      thread_ts: threadTs,
      text: fallbackText,
      blocks,
    });
    return typeof payload.ts === 'string' ? payload.ts : '';
  }

  async updateControls(channelId: string, messageTs: string, blocks: KnownBlock[]): Promise<void> {
    await this.#call('chat.update', { channel: channelId, ts: messageTs, blocks, text: 'Incident controls' });
  }

  async findControlMessage(channelId: string, threadTs: string): Promise<string | null> {
    const botId = await this.#ownBotId();
    const payload = await this.#call('conversations.replies', { channel: channelId, ts: threadTs }, 'GET');
    const messages = Array.isArray(payload.messages) ? payload.messages : [];

    let latest: string | null = null;
    for (const message of messages) {
      if (!isRecord(message) || message.bot_id !== botId || typeof message.ts !== 'string') continue;
      const blocks = Array.isArray(message.blocks) ? message.blocks : [];
      if (blocks.some((block) => isRecord(block) && block.type === 'actions')) {
        latest = message.ts;
      }
    }
    return latest;
  }

  async addReaction(channelId: string, messageTs: string, emoji: string): Promise<void> {
    await this.#call('reactions.add', { channel: channelId, timestamp: messageTs, name: emoji });
  }

  async removeReaction(channelId: string, messageTs: string, emoji: string): Promise<void> {
    await this.#call('reactions.remove', { channel: channelId, timestamp: messageTs, name: emoji });
  }

  async lookupUserName(userId: string): Promise<string | null> {
    const user = await this.#userInfo(userId);
    if (!user) return null;
    if (typeof user.real_name === 'string' && user.real_name) return user.real_name;
    return typeof user.name === 'string' && user.name ? user.name : null;
  }

  async lookupUserEmail(userId: string): Promise<string | null> {
    const user = await this.#userInfo(userId);
    const profile = user && isRecord(user.profile) ? user.profile : null;
    return profile && typeof profile.email === 'string' && profile.email ? profile.email : null;
  }

  async #userInfo(userId: string): Promise<Record<string, unknown> | null> {
    const payload = await this.#call('users.info', { user: userId }, 'GET');
    return isRecord(payload.user) ? payload.user : null;
  }

  async #ownBotId(): Promise<string | null> {
    if (this.#botId === null) {
      const payload = await this.#call('auth.test', {});
      this.#botId = typeof payload.bot_id === 'string' ? payload.bot_id : null;
    }
    return this.#botId;
  }

  /** Call a Web API method; rejects with `AdapterFailureError` once retries are spent. */
  async #call(method: string, params: SlackPayload, httpMethod: 'GET' | 'POST' = 'POST'): Promise<SlackPayload> {
    try {
      return await withRetry(() => this.#request(method, params, httpMethod), {
        maxAttempts: 3,
        ...this.#retry,
        label: `slack:${method}`,
        isRetryable: (err) => !(err instanceof SlackApiError) || err.transient,
      });
    } catch (err) {
      void logThought(`[Slack] ${method} failed: ${errorMessage(err)}`);
      throw new AdapterFailureError('slack', method, errorMessage(err));
    }
  }

  async #request(method: string, params: SlackPayload, httpMethod: 'GET' | 'POST'): Promise<SlackPayload> {
    const headers: Record<string, string> = { Authorization: `Bearer ${this.#botToken}` };
    let url = `${this.#apiBase}/${method}`;
    let body: string | undefined;

    if (httpMethod === 'GET') {
      const query = new URLSearchParams();
      for (const [key, value] of Object.entries(params)) {
        query.set(key, String(value));
      }
      url = `${url}?${query.toString()}`;
    } else {
      headers['Content-Type'] = 'application/json; charset=utf-8';
      body = JSON.stringify(params);
    }

    const response = await this.#fetch(url, { method: httpMethod, headers, body });
    if (response.status === 429 || response.status >= 500) {
      throw new SlackApiError(method, `http_${response.status}`, true);
    }

    const payload: unknown = await response.json();
    if (!isRecord(payload)) {
      throw new SlackApiError(method, 'invalid_response', false);
    }
    if (payload.ok === true) {
      return payload;
    }

    const code = typeof payload.error === 'string' ? payload.error : 'unknown_error';
    if (BENIGN_ERRORS[method]?.includes(code)) {
      return payload;
    }
    throw new SlackApiError(method, code, TRANSIENT_ERRORS.has(code));
  }
}
