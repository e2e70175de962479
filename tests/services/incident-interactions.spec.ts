import { beforeEach, describe, expect, it, vi } from 'vitest';
import { openDatabase } from '../../src/services/db.js';
import {
  encodeButtonValue,
  PROCESSING_BLOCKS,
  renderButtons,
  textBlock,
} from '../../src/services/incident-controls.js';
import {
  IncidentInteractions,
  buildThreadUrl,
  buildTicketTitle,
  type IncomingAction,
} from '../../src/services/incident-interactions.js';
import { IncidentLifecycle } from '../../src/services/incident-lifecycle.js';
import { IncidentStore } from '../../src/services/incident-store.js';
import { PermissionPolicy } from '../../src/services/permission-policy.js';
import { ReminderScheduler } from '../../src/services/reminder-scheduler.js';
import type { Incident, IncidentStatus } from '../../src/types/incident.js';
import { FakeChat, FakeRoster, FakeTracker } from '../helpers/fakes.js';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
  scrubSensitiveText: (text: string) => text,
}));

const THREAD = '1700000000.000100';

describe('buildTicketTitle', () => {
  it('flattens newlines', () => {
    expect(buildTicketTitle('Checkout is down\r\nsince 9am\n')).toBe('Checkout is down since 9am');
  });

  it('caps long text at 150 characters', () => {
    expect(buildTicketTitle('a'.repeat(160))).toBe(`${'a'.repeat(150)}...`);
    expect(buildTicketTitle('b'.repeat(150))).toBe('b'.repeat(150));
  });
});

describe('buildThreadUrl', () => {
  it('links to the root message', () => {
    expect(buildThreadUrl('https://example.slack.com/', 'C1', THREAD)).toBe(
      'https://example.slack.com/archives/C1/p1700000000000100',
    );
  });
});

describe('IncidentInteractions', () => {
  let store: IncidentStore;
  let reminders: ReminderScheduler;
  let tracker: FakeTracker;
  let chat: FakeChat;
  let roster: FakeRoster;
  let lifecycle: IncidentLifecycle;

  beforeEach(() => {
    const db = openDatabase(':memory:');
    store = new IncidentStore(db);
    reminders = new ReminderScheduler(db);
    tracker = new FakeTracker();
    chat = new FakeChat();
    roster = new FakeRoster();
    lifecycle = new IncidentLifecycle({ store, reminders, tracker, intervals: { default: 2, awaiting_response: 2 } });
  });

  function interactions(permissions = new PermissionPolicy()): IncidentInteractions {
    return new IncidentInteractions({
      lifecycle,
      store,
      tracker,
      chat,
      roster,
      permissions,
      workspaceUrl: 'https://example.slack.com',
    });
  }

  function current(): Incident {
    const lookup = store.get('OPS-1');
    if (!lookup.ok) throw new Error('OPS-1 missing');
    return lookup.incident;
  }

  function click(actionId: string, actorId: string, observedStatus: IncidentStatus): IncomingAction {
    return {
      actionId,
      actorId,
      channelId: 'C1',
      messageTs: 'ctrl-1',
      threadTs: THREAD,
      value: encodeButtonValue({ ticketKey: 'OPS-1', observedStatus }),
    };
  }

  async function report(handler = interactions()): Promise<void> {
    await handler.handleReport({ channelId: 'C1', ts: THREAD, userId: 'U-AUTHOR', text: 'Checkout is down\nsince 9am' });
  }

  describe('handleReport', () => {
    it('opens a ticket, registers the incident and posts the controls', async () => {
      const result = await interactions().handleReport({
        channelId: 'C1',
        ts: THREAD,
        userId: 'U-AUTHOR',
        text: 'Checkout is down\nsince 9am',
      });

      expect(result.kind).toBe('created');
      expect(tracker.created).toEqual([
        {
          title: 'Checkout is down since 9am',
          description: 'Checkout is down\nsince 9am',
          reporter: '<@U-AUTHOR>',
          threadUrl: 'https://example.slack.com/archives/C1/p1700000000000100',
        },
      ]);
      expect(current().status).toBe('created');
      expect(reminders.get('OPS-1', 'default')).not.toBeNull();

      const posted = chat.callsOf('postBlocks');
      expect(posted.map((call) => call.blocks)).toEqual([
        [textBlock(':rotating_light: *Incident registered*\n\n*Ticket:* https://jira.example.test/browse/OPS-1')],
        renderButtons(current(), { dutyUserId: 'U-DUTY' }),
      ]);
    });

    it('uses the display name from chat as the reporter when available', async () => {
      chat.userNames['U-AUTHOR'] = 'Dana Author';
      await report();

      expect(tracker.created[0]?.reporter).toBe('Dana Author');
    });

    it('ignores reports from channels outside the allow-list', async () => {
      const result = await interactions(new PermissionPolicy({ allowedChannels: ['C-OPS'] })).handleReport({
        channelId: 'C1',
        ts: THREAD,
        userId: 'U-AUTHOR',
        text: 'hello',
      });

      expect(result).toEqual({ kind: 'ignored', reason: 'channel_not_allowed' });
      expect(tracker.created).toEqual([]);
    });

    it('does not open a second ticket for the same thread', async () => {
      await report();
      const handler = interactions();

      const result = await handler.handleReport({ channelId: 'C1', ts: THREAD, userId: 'U-AUTHOR', text: 'again' });

      expect(result).toEqual({ kind: 'duplicate', ticketKey: 'OPS-1' });
      expect(tracker.created).toHaveLength(1);
    });

    it('explains a tracker failure in the thread', async () => {
      tracker.createError = new Error('jira down');

      const result = await interactions().handleReport({ channelId: 'C1', ts: THREAD, userId: 'U-AUTHOR', text: 'x' });

      expect(result).toEqual({ kind: 'failed', message: 'jira down' });
      expect(chat.callsOf('postThreadMessage').map((call) => call.text)).toEqual([
        ':x: Could not create the incident: jira down',
      ]);
      expect(store.listAll()).toEqual([]);
    });
  });

  describe('handleAction', () => {
    beforeEach(async () => {
      await report();
      chat.calls.length = 0;
    });

    it('takes the incident, swaps the controls and reacts on the root message', async () => {
      chat.userEmails['U-ENG'] = 'eng@example.test';

      const result = await interactions().handleAction(click('take_incident', 'U-ENG', 'created'));

      expect(result.kind === 'transition' && result.outcome.kind).toBe('applied');
      expect(current()).toMatchObject({ status: 'assigned', assignedTo: 'U-ENG' });
      expect(tracker.assigned).toEqual([{ ticketKey: 'OPS-1', identity: 'eng@example.test' }]);

      const updates = chat.callsOf('updateControls').map((call) => call.blocks);
      expect(updates).toEqual([
        PROCESSING_BLOCKS,
        [textBlock(':eyes: Taken in progress by <@U-ENG>'), ...renderButtons(current())],
      ]);
      expect(chat.callsOf('addReaction')).toEqual([
        { method: 'addReaction', channelId: 'C1', messageTs: THREAD, emoji: 'eyes' },
      ]);
    });

    it('refuses actors outside the allow-list and restores the controls', async () => {
      const result = await interactions(new PermissionPolicy({ allowedActors: ['U-BOSS'] })).handleAction(
        click('take_incident', 'U-ENG', 'created'),
      );

      expect(result).toEqual({ kind: 'denied', ticketKey: 'OPS-1' });
      expect(current().status).toBe('created');
      expect(chat.callsOf('postThreadMessage').map((call) => call.text)).toEqual([
        ':x: <@U-ENG>, you are not allowed to change incidents.',
      ]);
      expect(chat.callsOf('updateControls').at(-1)?.blocks).toEqual(renderButtons(current(), { dutyUserId: 'U-DUTY' }));
    });

    it('puts the controls back when the transition throws', async () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      vi.spyOn(lifecycle, 'transition').mockRejectedValue(new Error('database is locked'));

      await expect(interactions().handleAction(click('take_incident', 'U-ENG', 'created'))).rejects.toThrow(
        'database is locked',
      );

      expect(current().status).toBe('created');
      expect(chat.callsOf('updateControls').map((call) => call.blocks)).toEqual([
        PROCESSING_BLOCKS,
        renderButtons(current(), { dutyUserId: 'U-DUTY' }),
      ]);
      expect(consoleError).toHaveBeenCalledWith('[Interactions] take on OPS-1 failed:', 'database is locked');
      consoleError.mockRestore();
      vi.restoreAllMocks();
    });

    it('tells a late clicker the incident was already handled', async () => {
      const handler = interactions();
      await handler.handleAction(click('take_incident', 'U-ENG', 'created'));
      chat.calls.length = 0;

      const result = await handler.handleAction(click('take_incident', 'U-LATE', 'created'));

      expect(result.kind === 'transition' && result.outcome.kind).toBe('already_handled');
      expect(current().assignedTo).toBe('U-ENG');
      expect(chat.callsOf('postThreadMessage').map((call) => call.text)).toEqual([
        ':x: Incident OPS-1 was already handled (status: assigned).',
      ]);
      expect(chat.callsOf('updateControls').at(-1)?.blocks).toEqual(renderButtons(current()));
    });

    it('reports a tracker refusal on close and keeps the incident open', async () => {
      await lifecycle.transition('OPS-1', 'take', { actorId: 'U-ENG' });
      tracker.closeResult = false;

      const result = await interactions().handleAction(click('close_incident', 'U-ENG', 'assigned'));

      expect(result.kind === 'transition' && result.outcome.kind).toBe('adapter_failure');
      expect(current().status).toBe('assigned');
      expect(chat.callsOf('postThreadMessage').map((call) => call.text)).toEqual([
        ':x: Could not close incident OPS-1: ticket tracker did not close the ticket',
      ]);
    });

    it('closes the incident and replaces the controls with the final header', async () => {
      await lifecycle.transition('OPS-1', 'take', { actorId: 'U-ENG' });

      await interactions().handleAction(click('close_incident', 'U-ENG', 'assigned'));

      expect(current().status).toBe('closed');
      expect(chat.callsOf('updateControls').at(-1)?.blocks).toEqual([textBlock(':white_check_mark: *Resolved*')]);
      expect(chat.callsOf('addReaction').map((call) => call.emoji)).toEqual(['white_check_mark']);
    });

    it('ignores unknown buttons and malformed values without touching chat', async () => {
      const handler = interactions();

      expect(await handler.handleAction({ ...click('take_incident', 'U-ENG', 'created'), actionId: 'nope' })).toEqual({
        kind: 'ignored',
        reason: 'unknown_action',
      });
      expect(await handler.handleAction({ ...click('take_incident', 'U-ENG', 'created'), value: '' })).toEqual({
        kind: 'ignored',
        reason: 'malformed_value',
      });
      expect(chat.calls).toEqual([]);
    });
  });

  describe('handleThreadMessage', () => {
    beforeEach(async () => {
      await report();
      await lifecycle.transition('OPS-1', 'take', { actorId: 'U-ENG' });
      chat.calls.length = 0;
    });

    it('resumes an incident awaiting a reply and clears the waiting reaction', async () => {
      await lifecycle.transition('OPS-1', 'await_response');

      const result = await interactions().handleThreadMessage({ channelId: 'C1', threadTs: THREAD, userId: 'U-AUTHOR' });

      expect(result.kind === 'transition' && result.outcome.kind).toBe('applied');
      expect(current().status).toBe('assigned');
      expect(reminders.listForIncident('OPS-1')).toEqual([]);
      expect(chat.callsOf('updateControls')).toEqual([
        {
          method: 'updateControls',
          channelId: 'C1',
          messageTs: 'ctrl-1',
          blocks: [textBlock(':eyes: Back in progress (reply received)'), ...renderButtons(current())],
        },
      ]);
      expect(chat.callsOf('removeReaction')).toEqual([
        { method: 'removeReaction', channelId: 'C1', messageTs: THREAD, emoji: 'person_in_lotus_position' },
      ]);
    });

    it('ignores bot messages, unknown threads and incidents not awaiting a reply', async () => {
      const handler = interactions();

      expect(await handler.handleThreadMessage({ channelId: 'C1', threadTs: THREAD, botId: 'B1' })).toEqual({
        kind: 'ignored',
        reason: 'bot_message',
      });
      expect(await handler.handleThreadMessage({ channelId: 'C1', threadTs: 'other', userId: 'U-AUTHOR' })).toEqual({
        kind: 'ignored',
        reason: 'no_incident',
      });
      expect(await handler.handleThreadMessage({ channelId: 'C1', threadTs: THREAD, userId: 'U-AUTHOR' })).toEqual({
        kind: 'ignored',
        reason: 'not_awaiting_response',
      });
      expect(current().status).toBe('assigned');
    });
  });
});
