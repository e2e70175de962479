import { randomUUID } from 'node:crypto';
import type { SqliteDatabase } from './db.js';
import { InvalidIntervalError, errorMessage } from '../types/errors.js';
import { isIncidentStatus } from '../types/incident.js';
import {
  isReminderKind,
  type Reminder,
  type ReminderKind,
  type ReminderSnapshot,
  type ReminderStats,
  type RescheduleResult,
  type ScheduleOptions,
} from '../types/reminder.js';
import { logThought } from '../utils/logger.js';

const MINUTE_MS = 60_000;
const DEFAULT_BATCH_SIZE = 100;

interface ReminderRow {
  ticket_key: string;
  kind: string;
  id: string;
  due_at: number;
  interval_minutes: number;
  snapshot_json: string;
  created_at: number;
}

export interface ReminderSchedulerOptions {
  /** Epoch-millisecond clock. */
  clock?: () => number;
  /** Rows read per page by `dueReminders`. */
  batchSize?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseSnapshot(json: string, ticketKey: string): ReminderSnapshot {
  const value: unknown = JSON.parse(json);
  if (
    isRecord(value) &&
    typeof value.ticketKey === 'string' &&
    typeof value.channelId === 'string' &&
    typeof value.threadTs === 'string' &&
    typeof value.authorId === 'string' &&
    isIncidentStatus(value.status) &&
    (typeof value.assignedTo === 'string' || value.assignedTo === null) &&
    typeof value.createdAt === 'string'
  ) {
    return {
      ticketKey: value.ticketKey,
      channelId: value.channelId,
      threadTs: value.threadTs,
      authorId: value.authorId,
      status: value.status,
      assignedTo: value.assignedTo,
      createdAt: value.createdAt,
    };
  }
  throw new Error(`[ReminderScheduler] Malformed snapshot stored for '${ticketKey}'.`);
}

function toReminder(row: ReminderRow): Reminder {
  if (!isReminderKind(row.kind)) {
    throw new Error(`[ReminderScheduler] Reminder for '${row.ticket_key}' has unknown kind '${row.kind}'.`);
  }
  return {
    id: row.id,
    ticketKey: row.ticket_key,
    kind: row.kind,
    dueAt: row.due_at,
    intervalMinutes: row.interval_minutes,
    snapshot: parseSnapshot(row.snapshot_json, row.ticket_key),
    createdAt: row.created_at,
  };
}

function assertMinutes(label: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidIntervalError(label, value);
  }
}

const COLUMNS = 'ticket_key, kind, id, due_at, interval_minutes, snapshot_json, created_at';

/**
 * Durable reminder schedule: at most one row per `(ticketKey, kind)`.
 *
 * The primary key enforces the at-most-one rule and the `due_at` index serves
 * the worker's poll. Every install issues a fresh `id`, which the worker uses to
 * detect that a reminder it dequeued was cancelled or replaced in the meantime.
 */
export class ReminderScheduler {
  readonly #db: SqliteDatabase;
  readonly #clock: () => number;
  readonly #batchSize: number;

  constructor(db: SqliteDatabase, options: ReminderSchedulerOptions = {}) {
    this.#db = db;
    this.#clock = options.clock ?? (() => Date.now());
    this.#batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  /**
   * Retire whatever is pending at `(ticketKey, kind)` and install a new reminder
   * due after `delayMinutes` (defaults to the interval).
   */
  schedule(
    ticketKey: string,
    kind: ReminderKind,
    snapshot: ReminderSnapshot,
    intervalMinutes: number,
    options: ScheduleOptions = {},
  ): Reminder {
    assertMinutes('intervalMinutes', intervalMinutes);
    const delayMinutes = options.delayMinutes ?? intervalMinutes;
    assertMinutes('delayMinutes', delayMinutes);

    const now = this.#clock();
    const reminder: Reminder = {
      id: randomUUID(),
      ticketKey,
      kind,
      dueAt: now + delayMinutes * MINUTE_MS,
      intervalMinutes,
      snapshot,
      createdAt: now,
    };

    const install = this.#db.transaction(() => {
      this.#db.prepare('DELETE FROM reminders WHERE ticket_key = ? AND kind = ?').run(ticketKey, kind);
      this.#db
        .prepare(`INSERT INTO reminders (${COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?)`)
        .run(
          reminder.ticketKey,
          reminder.kind,
          reminder.id,
          reminder.dueAt,
          reminder.intervalMinutes,
          JSON.stringify(reminder.snapshot),
          reminder.createdAt,
        );
    });
    install.immediate();

    return reminder;
  }

  /** Remove the reminder at `(ticketKey, kind)`. Returns whether one existed. */
  cancel(ticketKey: string, kind: ReminderKind): boolean {
    const result = this.#db
      .prepare('DELETE FROM reminders WHERE ticket_key = ? AND kind = ?')
      .run(ticketKey, kind);
    return result.changes > 0;
  }

  /** Remove every kind for `ticketKey`. Returns the number removed. */
  cancelAll(ticketKey: string): number {
    return this.#db.prepare('DELETE FROM reminders WHERE ticket_key = ?').run(ticketKey).changes;
  }

  get(ticketKey: string, kind: ReminderKind): Reminder | null {
    const row = this.#db
      .prepare<[string, string], ReminderRow>(
        `SELECT ${COLUMNS} FROM reminders WHERE ticket_key = ? AND kind = ?`,
      )
      .get(ticketKey, kind);
    return row ? toReminder(row) : null;
  }

  listForIncident(ticketKey: string): Reminder[] {
    return this.#db
      .prepare<[string], ReminderRow>(`SELECT ${COLUMNS} FROM reminders WHERE ticket_key = ? ORDER BY kind`)
      .all(ticketKey)
      .map(toReminder);
  }

  /**
   * Lazily yield reminders due at or before `now`, ordered by
   * `(dueAt, ticketKey, kind)`.
   *
   * Pages are read with a keyset cursor, so rows retired or rescheduled while
   * the sequence is consumed neither repeat nor shift later pages. Consuming an
   * entry does not retire it. A row that cannot be decoded is deleted and
   * skipped.
   */
  *dueReminders(now: number): Generator<Reminder, void, undefined> {
    const firstPage = this.#db.prepare<[number, number], ReminderRow>(
      `SELECT ${COLUMNS} FROM reminders
       WHERE due_at <= ?
       ORDER BY due_at, ticket_key, kind
       LIMIT ?`,
    );
    const nextPage = this.#db.prepare<[number, number, string, string, number], ReminderRow>(
      `SELECT ${COLUMNS} FROM reminders
       WHERE due_at <= ? AND (due_at, ticket_key, kind) > (?, ?, ?)
       ORDER BY due_at, ticket_key, kind
       LIMIT ?`,
    );

    let cursor: ReminderRow | null = null;
    while (true) {
      const page: ReminderRow[] = cursor
        ? nextPage.all(now, cursor.due_at, cursor.ticket_key, cursor.kind, this.#batchSize)
        : firstPage.all(now, this.#batchSize);

      for (const row of page) {
        const reminder = this.#readDueRow(row);
        if (reminder) yield reminder;
      }

      const last = page.at(-1);
      if (!last || page.length < this.#batchSize) return;
      cursor = last;
    }
  }

  /**
   * Install the next occurrence of a delivered reminder, due at
   * `now + intervalMinutes`, carrying `reminder.snapshot`.
   *
   * Only replaces the row if it still holds the dequeued `id`: a reminder that
   * was cancelled (`'cancelled'`) or replaced by a newer schedule (`'superseded'`)
   * while it was being delivered stays that way.
   */
  reschedule(reminder: Reminder, now: number): RescheduleResult {
    const step = this.#db.transaction((): RescheduleResult => {
      const current = this.#db
        .prepare<[string, string], { id: string }>('SELECT id FROM reminders WHERE ticket_key = ? AND kind = ?')
        .get(reminder.ticketKey, reminder.kind);
      if (!current) return 'cancelled';
      if (current.id !== reminder.id) return 'superseded';

      this.#db
        .prepare(
          `UPDATE reminders
             SET id = ?, due_at = ?, snapshot_json = ?, created_at = ?
           WHERE ticket_key = ? AND kind = ? AND id = ?`,
        )
        .run(
          randomUUID(),
          now + reminder.intervalMinutes * MINUTE_MS,
          JSON.stringify(reminder.snapshot),
          now,
          reminder.ticketKey,
          reminder.kind,
          reminder.id,
        );
      return 'rescheduled';
    });

    return step.immediate();
  }

  /** Delete the row only if it still holds the dequeued `id`. */
  retire(reminder: Reminder): boolean {
    const result = this.#db
      .prepare('DELETE FROM reminders WHERE ticket_key = ? AND kind = ? AND id = ?')
      .run(reminder.ticketKey, reminder.kind, reminder.id);
    return result.changes > 0;
  }

  /** Earliest pending due time, or null when nothing is scheduled. */
  nextDueAt(): number | null {
    const row = this.#db
      .prepare<[], { next: number | null }>('SELECT MIN(due_at) AS next FROM reminders')
      .get();
    return row?.next ?? null;
  }

  stats(now: number): ReminderStats {
    const byKind: Record<ReminderKind, number> = { default: 0, awaiting_response: 0 };
    const rows = this.#db
      .prepare<[number], { kind: string; total: number; due: number }>(
        `SELECT kind, COUNT(*) AS total, SUM(CASE WHEN due_at <= ? THEN 1 ELSE 0 END) AS due
         FROM reminders GROUP BY kind`,
      )
      .all(now);

    let total = 0;
    let due = 0;
    for (const row of rows) {
      total += row.total;
      due += row.due;
      if (isReminderKind(row.kind)) {
        byKind[row.kind] = row.total;
      }
    }

    return { total, due, byKind, nextDueAt: this.nextDueAt() };
  }

  #readDueRow(row: ReminderRow): Reminder | null {
    try {
      return toReminder(row);
    } catch (err) {
      this.#db
        .prepare('DELETE FROM reminders WHERE ticket_key = ? AND kind = ? AND id = ?')
        .run(row.ticket_key, row.kind, row.id);
      void logThought(`[ReminderScheduler] Dropped unreadable reminder ${row.ticket_key}/${row.kind}: ${errorMessage(err)}`);
      return null;
    }
  }
}
