import type { KnownBlock } from '@slack/types';
import type { IncidentLifecycle } from './incident-lifecycle.js';
import { describeOutcome } from './incident-lifecycle.js';
import type { IncidentStore } from './incident-store.js';
import type { PermissionPolicy } from './permission-policy.js';
import {
  ACTION_EVENTS,
  EVENT_REACTIONS,
  PROCESSING_BLOCKS,
  isIncidentActionId,
  parseButtonValue,
  renderButtons,
  statusHeader,
  textBlock,
} from './incident-controls.js';
import { mention } from './reminder-messages.js';
import type { ChatAdapter, DutyRoster, TicketTracker } from '../types/adapters.js';
import { errorMessage } from '../types/errors.js';
import type { Incident, TransitionOutcome } from '../types/incident.js';
import { logThought } from '../utils/logger.js';

const TITLE_LIMIT = 150;
const AWAITING_REACTION = 'person_in_lotus_position';

export interface IncomingReport {
  channelId: string;
  /** Timestamp of the root message; becomes the incident thread. */
  ts: string;
  userId: string;
  userName?: string;
  text: string;
}

export interface IncomingAction {
  actionId: string;
  actorId: string;
  channelId: string;
  /** Message carrying the buttons. */
  messageTs: string;
  /** Root message of the thread. */
  threadTs: string;
  value: string;
}

export interface IncomingThreadMessage {
  channelId: string;
  threadTs?: string;
  userId?: string;
  botId?: string;
  subtype?: string;
}

export type ReportResult =
  | { kind: 'created'; incident: Incident }
  | { kind: 'ignored'; reason: 'channel_not_allowed' }
  | { kind: 'duplicate'; ticketKey: string | null }
  | { kind: 'failed'; message: string };

export type ActionResult =
  | { kind: 'ignored'; reason: 'unknown_action' | 'malformed_value' }
  | { kind: 'denied'; ticketKey: string }
  | { kind: 'transition'; outcome: TransitionOutcome };

export type ThreadMessageResult =
  | { kind: 'ignored'; reason: 'bot_message' | 'not_in_thread' | 'no_incident' | 'not_awaiting_response' }
  | { kind: 'transition'; outcome: TransitionOutcome };

export interface IncidentInteractionsDeps {
  lifecycle: IncidentLifecycle;
  store: IncidentStore;
  tracker: TicketTracker;
  chat: ChatAdapter;
  roster: DutyRoster;
  permissions: PermissionPolicy;
  /** Workspace base URL for thread links, e.g. https://example.slack.com. */
  workspaceUrl?: string;
}

/** First line of a report, flattened and capped for use as a ticket title. */
export function buildTicketTitle(text: string): string {
  const flattened = text.replace(/[\r\n]+/g, ' ').trim();
  return flattened.length > TITLE_LIMIT ? `${flattened.slice(0, TITLE_LIMIT)}...` : flattened;
}

export function buildThreadUrl(workspaceUrl: string | undefined, channelId: string, ts: string): string {
  const base = (workspaceUrl ?? '').replace(/\/+$/, '');
  return `${base}/archives/${channelId}/p${ts.replace('.', '')}`;
}

/**
 * Chat-facing glue over the lifecycle: new reports, button clicks and thread
 * replies. Chat calls made here are best effort; a failed message never undoes
 * a transition.
 */
export class IncidentInteractions {
  readonly #lifecycle: IncidentLifecycle;
  readonly #store: IncidentStore;
  readonly #tracker: TicketTracker;
  readonly #chat: ChatAdapter;
  readonly #roster: DutyRoster;
  readonly #permissions: PermissionPolicy;
  readonly #workspaceUrl: string | undefined;

  constructor(deps: IncidentInteractionsDeps) {
    this.#lifecycle = deps.lifecycle;
    this.#store = deps.store;
    this.#tracker = deps.tracker;
    this.#chat = deps.chat;
    this.#roster = deps.roster;
    this.#permissions = deps.permissions;
    this.#workspaceUrl = deps.workspaceUrl;
  }

  async handleReport(report: IncomingReport): Promise<ReportResult> {
    if (!this.#permissions.isChannelAllowed(report.channelId)) {
      void logThought(`[Interactions] Ignoring report from channel ${report.channelId}.`);
      return { kind: 'ignored', reason: 'channel_not_allowed' };
    }

    const existing = this.#store.getByThread(report.channelId, report.ts);
    if (existing.ok) {
      return { kind: 'duplicate', ticketKey: existing.incident.ticketKey };
    }

    const reporter =
      report.userName ??
      (await this.#safely('lookupUserName', () => this.#chat.lookupUserName(report.userId))) ??
      mention(report.userId);

    let ticketKey: string;
    try {
      ticketKey = await this.#tracker.createTicket({
        title: buildTicketTitle(report.text),
        description: report.text,
        reporter,
        threadUrl: buildThreadUrl(this.#workspaceUrl, report.channelId, report.ts),
      });
    } catch (err) {
      const message = errorMessage(err);
      void logThought(`[Interactions] Ticket creation failed for ${report.channelId}/${report.ts}: ${message}`);
      await this.#safely('postThreadMessage', () =>
        this.#chat.postThreadMessage(report.channelId, report.ts, `:x: Could not create the incident: ${message}`),
      );
      return { kind: 'failed', message };
    }

    const outcome = this.#lifecycle.createIncident({
      ticketKey,
      channelId: report.channelId,
      threadTs: report.ts,
      authorId: report.userId,
    });

    if (outcome.kind === 'duplicate') {
      await this.#safely('postThreadMessage', () =>
        this.#chat.postThreadMessage(
          report.channelId,
          report.ts,
          `:x: Could not register ticket ${ticketKey}: an incident already exists for this ${outcome.conflictOn === 'thread' ? 'thread' : 'ticket'}.`,
        ),
      );
      return { kind: 'duplicate', ticketKey };
    }

    const { incident } = outcome;
    await this.#safely('postBlocks', () =>
      this.#chat.postBlocks(
        report.channelId,
        report.ts,
        [textBlock(`:rotating_light: *Incident registered*\n\n*Ticket:* ${this.#tracker.ticketUrl(ticketKey)}`)],
        `Incident ${ticketKey} registered`,
      ),
    );
    const controls = await this.#controlsFor(incident);
    await this.#safely('postBlocks', () =>
      this.#chat.postBlocks(report.channelId, report.ts, controls, `Incident ${ticketKey} controls`),
    );

    return { kind: 'created', incident };
  }

  async handleAction(action: IncomingAction): Promise<ActionResult> {
    if (!isIncidentActionId(action.actionId)) {
      return { kind: 'ignored', reason: 'unknown_action' };
    }
    const parsed = parseButtonValue(action.value);
    if (!parsed) {
      return { kind: 'ignored', reason: 'malformed_value' };
    }

    const event = ACTION_EVENTS[action.actionId];
    const { ticketKey, observedStatus } = parsed;

    // Hide the buttons while the click is processed.
    await this.#safely('updateControls', () =>
      this.#chat.updateControls(action.channelId, action.messageTs, PROCESSING_BLOCKS),
    );

    if (!this.#permissions.isActorAllowed(action.actorId)) {
      void logThought(`[Interactions] ${action.actorId} is not allowed to ${event} ${ticketKey}.`);
      await this.#reply(action, `:x: ${mention(action.actorId)}, you are not allowed to change incidents.`);
      await this.#restoreControls(action, ticketKey);
      return { kind: 'denied', ticketKey };
    }

    const assigneeIdentity =
      event === 'take'
        ? (await this.#safely('lookupUserEmail', () => this.#chat.lookupUserEmail(action.actorId))) ?? undefined
        : undefined;

    let outcome: TransitionOutcome;
    try {
      outcome = await this.#lifecycle.transition(ticketKey, event, {
        actorId: action.actorId,
        observedStatus,
        assigneeIdentity,
      });
    } catch (err) {
      console.error(`[Interactions] ${event} on ${ticketKey} failed:`, errorMessage(err));
      await this.#safely('restoreControls', () => this.#restoreControls(action, ticketKey));
      throw err;
    }

    switch (outcome.kind) {
      case 'applied': {
        const blocks = [textBlock(statusHeader(event, outcome.incident)), ...(await this.#buttonsFor(outcome.incident))];
        await this.#safely('updateControls', () =>
          this.#chat.updateControls(action.channelId, action.messageTs, blocks),
        );
        const reaction = EVENT_REACTIONS[event];
        if (reaction) {
          await this.#safely('addReaction', () =>
            this.#chat.addReaction(action.channelId, action.threadTs, reaction),
          );
        }
        break;
      }
      case 'not_found':
        await this.#reply(action, `:x: ${describeOutcome(outcome)}`);
        await this.#safely('updateControls', () =>
          this.#chat.updateControls(action.channelId, action.messageTs, [textBlock(describeOutcome(outcome))]),
        );
        break;
      case 'invalid_transition':
      case 'already_handled':
      case 'adapter_failure':
        await this.#reply(action, `:x: ${describeOutcome(outcome)}`);
        await this.#restoreControls(action, ticketKey);
        break;
    }

    return { kind: 'transition', outcome };
  }

  async handleThreadMessage(message: IncomingThreadMessage): Promise<ThreadMessageResult> {
    if (message.botId || message.subtype === 'bot_message') {
      return { kind: 'ignored', reason: 'bot_message' };
    }
    if (!message.threadTs || !message.userId) {
      return { kind: 'ignored', reason: 'not_in_thread' };
    }

    const lookup = this.#store.getByThread(message.channelId, message.threadTs);
    if (!lookup.ok) {
      return { kind: 'ignored', reason: 'no_incident' };
    }
    if (lookup.incident.status !== 'awaiting_response') {
      return { kind: 'ignored', reason: 'not_awaiting_response' };
    }

    const outcome = await this.#lifecycle.transition(lookup.incident.ticketKey, 'reply_received', {
      actorId: message.userId,
      observedStatus: 'awaiting_response',
    });

    if (outcome.kind === 'applied') {
      const { channelId } = message;
      const threadTs = message.threadTs;
      const controlTs = await this.#safely('findControlMessage', () =>
        this.#chat.findControlMessage(channelId, threadTs),
      );
      if (controlTs) {
        const blocks = [
          textBlock(statusHeader('reply_received', outcome.incident)),
          ...(await this.#buttonsFor(outcome.incident)),
        ];
        await this.#safely('updateControls', () => this.#chat.updateControls(channelId, controlTs, blocks));
      } else {
        void logThought(`[Interactions] No control message found for ${outcome.incident.ticketKey}.`);
      }
      await this.#safely('removeReaction', () => this.#chat.removeReaction(channelId, threadTs, AWAITING_REACTION));
    }

    return { kind: 'transition', outcome };
  }

  /** Controls matching the incident's status; a closed incident shows its final header instead. */
  async #controlsFor(incident: Incident): Promise<KnownBlock[]> {
    return incident.status === 'closed' ? [textBlock(statusHeader('close', incident))] : this.#buttonsFor(incident);
  }

  async #buttonsFor(incident: Incident): Promise<KnownBlock[]> {
    const duty =
      incident.status === 'created'
        ? await this.#safely('currentResponsible', () => this.#roster.currentResponsible())
        : null;
    return renderButtons(incident, { dutyUserId: duty?.userId ?? null });
  }

  /** Put back the buttons for the incident's actual status. */
  async #restoreControls(action: IncomingAction, ticketKey: string): Promise<void> {
    const lookup = this.#store.get(ticketKey);
    if (!lookup.ok) return;
    const blocks = await this.#controlsFor(lookup.incident);
    await this.#safely('updateControls', () =>
      this.#chat.updateControls(action.channelId, action.messageTs, blocks),
    );
  }

  async #reply(action: IncomingAction, text: string): Promise<void> {
    await this.#safely('postThreadMessage', () =>
      this.#chat.postThreadMessage(action.channelId, action.threadTs, text),
    );
  }

  /** Run a chat or roster call; failures are logged and yield null. */
  async #safely<T>(operation: string, fn: () => Promise<T>): Promise<T | null> {
    try {
      return await fn();
    } catch (err) {
      void logThought(`[Interactions] ${operation} failed: ${errorMessage(err)}`);
      return null;
    }
  }
}
