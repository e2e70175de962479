import type { SqliteDatabase } from './db.js';
import {
  isIncidentStatus,
  type CompareAndUpdateResult,
  type Incident,
  type IncidentCreateResult,
  type IncidentLookup,
  type IncidentStatus,
} from '../types/incident.js';

interface IncidentRow {
  ticket_key: string;
  channel_id: string;
  thread_ts: string;
  author_id: string;
  status: string;
  assigned_to: string | null;
  created_at: string;
  last_notification: string | null;
}

function toIncident(row: IncidentRow): Incident {
  if (!isIncidentStatus(row.status)) {
    throw new Error(`[IncidentStore] Incident '${row.ticket_key}' has unknown status '${row.status}'.`);
  }
  return {
    ticketKey: row.ticket_key,
    channelId: row.channel_id,
    threadTs: row.thread_ts,
    authorId: row.author_id,
    assignedTo: row.assigned_to,
    status: row.status,
    createdAt: row.created_at,
    lastNotification: row.last_notification,
  };
}

function lookup(row: IncidentRow | undefined): IncidentLookup {
  return row ? { ok: true, incident: toIncident(row) } : { ok: false, error: 'not_found' };
}

const SELECT_COLUMNS =
  'ticket_key, channel_id, thread_ts, author_id, status, assigned_to, created_at, last_notification';

/**
 * Durable incident records with compare-and-set updates.
 *
 * `compareAndUpdate` is the only mutation path after creation. It is a single
 * conditional UPDATE, so two writers racing on the same key cannot both win.
 */
export class IncidentStore {
  readonly #db: SqliteDatabase;

  constructor(db: SqliteDatabase) {
    this.#db = db;
  }

  create(incident: Incident): IncidentCreateResult {
    const tx = this.#db.transaction((): IncidentCreateResult => {
      const byKey = this.#db
        .prepare<[string], { one: number }>('SELECT 1 AS one FROM incidents WHERE ticket_key = ?')
        .get(incident.ticketKey);
      if (byKey) {
        return { ok: false, error: 'duplicate_key', conflictOn: 'ticket_key' };
      }

      const byThread = this.#db
        .prepare<[string, string], { one: number }>(
          'SELECT 1 AS one FROM incidents WHERE channel_id = ? AND thread_ts = ?',
        )
        .get(incident.channelId, incident.threadTs);
      if (byThread) {
        return { ok: false, error: 'duplicate_key', conflictOn: 'thread' };
      }

      this.#db
        .prepare(
          `INSERT INTO incidents (${SELECT_COLUMNS})
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          incident.ticketKey,
          incident.channelId,
          incident.threadTs,
          incident.authorId,
          incident.status,
          incident.assignedTo,
          incident.createdAt,
          incident.lastNotification,
        );
      return { ok: true };
    });

    return tx.immediate();
  }

  get(ticketKey: string): IncidentLookup {
    const row = this.#db
      .prepare<[string], IncidentRow>(`SELECT ${SELECT_COLUMNS} FROM incidents WHERE ticket_key = ?`)
      .get(ticketKey);
    return lookup(row);
  }

  getByThread(channelId: string, threadTs: string): IncidentLookup {
    const row = this.#db
      .prepare<[string, string], IncidentRow>(
        `SELECT ${SELECT_COLUMNS} FROM incidents WHERE channel_id = ? AND thread_ts = ?`,
      )
      .get(channelId, threadTs);
    return lookup(row);
  }

  /**
   * Write the mutable fields (`status`, `assignedTo`, `lastNotification`) only if
   * the stored status still equals `expectedStatus`.
   */
  compareAndUpdate(incident: Incident, expectedStatus: IncidentStatus): CompareAndUpdateResult {
    const result = this.#db
      .prepare(
        `UPDATE incidents
           SET status = ?, assigned_to = ?, last_notification = ?
         WHERE ticket_key = ? AND status = ?`,
      )
      .run(incident.status, incident.assignedTo, incident.lastNotification, incident.ticketKey, expectedStatus);

    if (result.changes > 0) return 'updated';
    return this.get(incident.ticketKey).ok ? 'conflict' : 'not_found';
  }

  /** Every incident, newest-created first. */
  listAll(): Incident[] {
    return this.#db
      .prepare<[], IncidentRow>(
        `SELECT ${SELECT_COLUMNS} FROM incidents ORDER BY created_at DESC, rowid DESC`,
      )
      .all()
      .map(toIncident);
  }

  /** Incidents that are not closed, newest-created first. */
  listActive(): Incident[] {
    return this.#db
      .prepare<[string], IncidentRow>(
        `SELECT ${SELECT_COLUMNS} FROM incidents WHERE status != ? ORDER BY created_at DESC, rowid DESC`,
      )
      .all('closed')
      .map(toIncident);
  }

  countByStatus(): Record<IncidentStatus, number> {
    const counts: Record<IncidentStatus, number> = {
      created: 0,
      assigned: 0,
      awaiting_response: 0,
      frozen: 0,
      closed: 0,
    };
    const rows = this.#db
      .prepare<[], { status: string; total: number }>(
        'SELECT status, COUNT(*) AS total FROM incidents GROUP BY status',
      )
      .all();
    for (const row of rows) {
      if (isIncidentStatus(row.status)) {
        counts[row.status] = row.total;
      }
    }
    return counts;
  }
}
