import { beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { openDatabase, type SqliteDatabase } from '../../src/services/db.js';
import { ReminderScheduler } from '../../src/services/reminder-scheduler.js';
import { InvalidIntervalError } from '../../src/types/errors.js';
import { snapshotOf } from '../../src/types/reminder.js';
import { logThought } from '../../src/utils/logger.js';
import { makeIncident } from '../helpers/fakes.js';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
  scrubSensitiveText: (text: string) => text,
}));

const MINUTE = 60_000;
const T0 = Date.parse('2026-03-01T09:00:00.000Z');

describe('ReminderScheduler', () => {
  let now: number;
  let db: SqliteDatabase;
  let scheduler: ReminderScheduler;
  const snapshot = snapshotOf(makeIncident());

  beforeEach(() => {
    now = T0;
    db = openDatabase(':memory:');
    scheduler = new ReminderScheduler(db, { clock: () => now, batchSize: 2 });
  });

  describe('schedule', () => {
    it('installs a reminder due one interval from now', () => {
      const reminder = scheduler.schedule('OPS-1', 'default', snapshot, 2);

      expect(reminder.dueAt).toBe(T0 + 2 * MINUTE);
      expect(scheduler.get('OPS-1', 'default')).toEqual(reminder);
    });

    it('honours an explicit first delay', () => {
      const reminder = scheduler.schedule('OPS-1', 'default', snapshot, 10, { delayMinutes: 1 });
      expect(reminder.dueAt).toBe(T0 + MINUTE);
      expect(reminder.intervalMinutes).toBe(10);
    });

    it('keeps at most one reminder per incident and kind', () => {
      const first = scheduler.schedule('OPS-1', 'default', snapshot, 2);
      now += 30_000;
      const second = scheduler.schedule('OPS-1', 'default', snapshot, 5);

      expect(second.id).not.toBe(first.id);
      expect(scheduler.listForIncident('OPS-1')).toEqual([second]);
    });

    it('keeps kinds independent', () => {
      scheduler.schedule('OPS-1', 'default', snapshot, 2);
      scheduler.schedule('OPS-1', 'awaiting_response', snapshot, 3);

      expect(scheduler.listForIncident('OPS-1').map((reminder) => reminder.kind)).toEqual([
        'awaiting_response',
        'default',
      ]);
    });

    it.each([0, -1, 1.5, Number.NaN])('rejects interval %s', (interval) => {
      expect(() => scheduler.schedule('OPS-1', 'default', snapshot, interval)).toThrow(InvalidIntervalError);
      expect(scheduler.get('OPS-1', 'default')).toBeNull();
    });

    it('rejects an invalid first delay', () => {
      expect(() => scheduler.schedule('OPS-1', 'default', snapshot, 2, { delayMinutes: 0 })).toThrow(
        InvalidIntervalError,
      );
    });
  });

  describe('cancel', () => {
    it('removes one kind and reports whether it existed', () => {
      scheduler.schedule('OPS-1', 'default', snapshot, 2);
      scheduler.schedule('OPS-1', 'awaiting_response', snapshot, 2);

      expect(scheduler.cancel('OPS-1', 'default')).toBe(true);
      expect(scheduler.cancel('OPS-1', 'default')).toBe(false);
      expect(scheduler.get('OPS-1', 'awaiting_response')).not.toBeNull();
    });

    it('cancelAll removes every kind and is a no-op when nothing is pending', () => {
      scheduler.schedule('OPS-1', 'default', snapshot, 2);
      scheduler.schedule('OPS-1', 'awaiting_response', snapshot, 2);

      expect(scheduler.cancelAll('OPS-1')).toBe(2);
      expect(scheduler.cancelAll('OPS-1')).toBe(0);
    });
  });

  describe('dueReminders', () => {
    it('yields only due reminders, ordered by due time then key, across pages', () => {
      scheduler.schedule('OPS-3', 'default', snapshot, 1);
      scheduler.schedule('OPS-1', 'default', snapshot, 1);
      scheduler.schedule('OPS-2', 'default', snapshot, 3);
      scheduler.schedule('OPS-4', 'default', snapshot, 2);
      scheduler.schedule('OPS-5', 'default', snapshot, 10);

      const due = [...scheduler.dueReminders(T0 + 3 * MINUTE)].map((reminder) => reminder.ticketKey);
      expect(due).toEqual(['OPS-1', 'OPS-3', 'OPS-4', 'OPS-2']);
    });

    it('yields nothing before the first due time', () => {
      scheduler.schedule('OPS-1', 'default', snapshot, 2);
      expect([...scheduler.dueReminders(T0 + MINUTE)]).toEqual([]);
    });

    it('does not repeat entries rescheduled while the sequence is consumed', () => {
      scheduler.schedule('OPS-1', 'default', snapshot, 1);
      scheduler.schedule('OPS-2', 'default', snapshot, 1);
      scheduler.schedule('OPS-3', 'default', snapshot, 1);

      const seen: string[] = [];
      for (const reminder of scheduler.dueReminders(T0 + 5 * MINUTE)) {
        seen.push(reminder.ticketKey);
        scheduler.reschedule(reminder, T0 + 5 * MINUTE);
      }

      expect(seen).toEqual(['OPS-1', 'OPS-2', 'OPS-3']);
    });

    it('drops an unreadable row and keeps yielding the rest', () => {
      scheduler.schedule('OPS-1', 'default', snapshot, 1);
      scheduler.schedule('OPS-2', 'default', snapshot, 1);
      scheduler.schedule('OPS-3', 'default', snapshot, 1);
      db.prepare('UPDATE reminders SET snapshot_json = ? WHERE ticket_key = ?').run('{"ticketKey":', 'OPS-2');

      const due = [...scheduler.dueReminders(T0 + MINUTE)].map((reminder) => reminder.ticketKey);

      expect(due).toEqual(['OPS-1', 'OPS-3']);
      expect(scheduler.get('OPS-2', 'default')).toBeNull();
      expect(vi.mocked(logThought)).toHaveBeenCalledWith(
        expect.stringMatching(/^\[ReminderScheduler\] Dropped unreadable reminder OPS-2\/default: /),
      );
    });
  });

  describe('reschedule', () => {
    it('moves a delivered reminder one interval past now with a new version', () => {
      const reminder = scheduler.schedule('OPS-1', 'default', snapshot, 2);
      const deliveredAt = T0 + 2 * MINUTE + 500;

      expect(scheduler.reschedule(reminder, deliveredAt)).toBe('rescheduled');

      const next = scheduler.get('OPS-1', 'default');
      expect(next?.dueAt).toBe(deliveredAt + 2 * MINUTE);
      expect(next?.id).not.toBe(reminder.id);
    });

    it('stores the snapshot it was given', () => {
      const reminder = scheduler.schedule('OPS-1', 'default', snapshot, 2);
      const refreshed = { ...snapshot, assignedTo: 'U-ENG' };

      scheduler.reschedule({ ...reminder, snapshot: refreshed }, T0);

      expect(scheduler.get('OPS-1', 'default')?.snapshot).toEqual(refreshed);
    });

    it('does not resurrect a reminder cancelled during delivery', () => {
      const reminder = scheduler.schedule('OPS-1', 'default', snapshot, 2);
      scheduler.cancel('OPS-1', 'default');

      expect(scheduler.reschedule(reminder, T0)).toBe('cancelled');
      expect(scheduler.get('OPS-1', 'default')).toBeNull();
    });

    it('does not overwrite a newer schedule', () => {
      const reminder = scheduler.schedule('OPS-1', 'default', snapshot, 2);
      const replacement = scheduler.schedule('OPS-1', 'default', snapshot, 7);

      expect(scheduler.reschedule(reminder, T0)).toBe('superseded');
      expect(scheduler.get('OPS-1', 'default')).toEqual(replacement);
    });
  });

  describe('retire', () => {
    it('deletes only the dequeued version', () => {
      const stale = scheduler.schedule('OPS-1', 'default', snapshot, 2);
      const current = scheduler.schedule('OPS-1', 'default', snapshot, 2);

      expect(scheduler.retire(stale)).toBe(false);
      expect(scheduler.retire(current)).toBe(true);
      expect(scheduler.get('OPS-1', 'default')).toBeNull();
    });
  });

  it('reports stats and the next due time', () => {
    expect(scheduler.stats(T0)).toEqual({
      total: 0,
      due: 0,
      byKind: { default: 0, awaiting_response: 0 },
      nextDueAt: null,
    });

    scheduler.schedule('OPS-1', 'default', snapshot, 1);
    scheduler.schedule('OPS-2', 'default', snapshot, 5);
    scheduler.schedule('OPS-2', 'awaiting_response', snapshot, 3);

    expect(scheduler.stats(T0 + 3 * MINUTE)).toEqual({
      total: 3,
      due: 2,
      byKind: { default: 2, awaiting_response: 1 },
      nextDueAt: T0 + MINUTE,
    });
  });

  it('keeps pending reminders across a reopen of the database file', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'threadwatch-reminders-'));
    try {
      const file = path.join(dir, 'state.db');
      const firstDb = openDatabase(file);
      const reminder = new ReminderScheduler(firstDb, { clock: () => T0 }).schedule(
        'OPS-1',
        'awaiting_response',
        snapshot,
        4,
      );
      firstDb.close();

      const secondDb = openDatabase(file);
      expect(new ReminderScheduler(secondDb).get('OPS-1', 'awaiting_response')).toEqual(reminder);
      secondDb.close();
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
