import type { IncidentStore } from './incident-store.js';
import type { JobScheduler } from './job-scheduler.js';
import type { ReminderScheduler } from './reminder-scheduler.js';
import { reminderKindFor } from './incident-lifecycle.js';
import { renderReminder } from './reminder-messages.js';
import type { ChatAdapter, DutyRoster, ResponsiblePerson } from '../types/adapters.js';
import { errorMessage } from '../types/errors.js';
import type { Incident } from '../types/incident.js';
import { snapshotOf, type Reminder, type ReminderIntervals, type ReminderKind } from '../types/reminder.js';
import { logThought } from '../utils/logger.js';
import { backoffDelay } from '../utils/retry.js';

export const REMINDER_WORKER_JOB_ID = 'reminder-worker';

const DEFAULTS = {
  pollCron: '*/5 * * * * *',
  /** Wake window when the cron spacing cannot be derived; a wider window only arms wakes a tick would cover. */
  fallbackPollIntervalMs: 3_600_000,
  reconcileDelayMinutes: 1,
  backoffBaseMs: 1_000,
  backoffFactor: 2,
  backoffMaxMs: 60_000,
} as const;

export interface ReminderWorkerOptions {
  /** Cron expression of the poll tick. */
  pollCron?: string;
  /**
   * Nominal spacing of poll ticks; early wakes are only armed inside this
   * window. Derived from `pollCron` when omitted.
   */
  pollIntervalMs?: number;
  /** Initial delay of reminders restored by `reconcile()`. */
  reconcileDelayMinutes?: number;
  /** Epoch-millisecond clock. */
  clock?: () => number;
  backoffBaseMs?: number;
  backoffFactor?: number;
  backoffMaxMs?: number;
}

export interface ReminderWorkerDeps {
  store: IncidentStore;
  reminders: ReminderScheduler;
  chat: ChatAdapter;
  roster: DutyRoster;
  scheduler: JobScheduler;
  intervals: ReminderIntervals;
  options?: ReminderWorkerOptions;
}

export type WorkerRunStatus = 'completed' | 'skipped_overlap' | 'skipped_backoff' | 'failed';

export interface WorkerRunReport {
  status: WorkerRunStatus;
  delivered: number;
  rescheduled: number;
  retired: number;
  deferred: number;
  error?: string;
}

export interface ReconciledReminder {
  ticketKey: string;
  kind: ReminderKind;
}

function stepOf(field: string): number | null {
  if (field === '*') return 1;
  const match = /^\*\/(\d+)$/.exec(field);
  return match ? Number(match[1]) : null;
}

/**
 * Largest gap between ticks of a cron expression of the form `*\/N` seconds or
 * minutes with every coarser field `*`; null for anything else.
 */
export function pollIntervalMsFromCron(expression: string): number | null {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5 && fields.length !== 6) return null;
  const [second = '', minute = '', ...rest] = fields.length === 6 ? fields : ['0', ...fields];
  if (rest.some((field) => field !== '*')) return null;

  if (fields.length === 6 && minute === '*') {
    const seconds = stepOf(second);
    if (seconds !== null) return seconds * 1_000;
  }
  if (/^\d+$/.test(second)) {
    const minutes = stepOf(minute);
    if (minutes !== null) return minutes * 60_000;
  }
  return null;
}

function emptyReport(status: WorkerRunStatus): WorkerRunReport {
  return { status, delivered: 0, rescheduled: 0, retired: 0, deferred: 0 };
}

/**
 * Polls the reminder schedule and delivers what is due.
 *
 * Each candidate is re-validated against the incident store before and after
 * delivery. Delivery is at-least-once: a cancel that lands while a reminder is
 * in flight can let that one delivery through, but the reschedule step will not
 * resurrect it.
 */
export class ReminderWorker {
  readonly #store: IncidentStore;
  readonly #reminders: ReminderScheduler;
  readonly #chat: ChatAdapter;
  readonly #roster: DutyRoster;
  readonly #scheduler: JobScheduler;
  readonly #intervals: ReminderIntervals;
  readonly #clock: () => number;
  readonly #pollCron: string;
  readonly #pollIntervalMs: number;
  readonly #reconcileDelayMinutes: number;
  readonly #backoffBaseMs: number;
  readonly #backoffFactor: number;
  readonly #backoffMaxMs: number;

  #running = false;
  #started = false;
  #consecutiveFailures = 0;
  #backoffUntil = 0;
  #wakeTimer: NodeJS.Timeout | null = null;
  #wakeAt: number | null = null;

  constructor(deps: ReminderWorkerDeps) {
    const options = deps.options ?? {};
    this.#store = deps.store;
    this.#reminders = deps.reminders;
    this.#chat = deps.chat;
    this.#roster = deps.roster;
    this.#scheduler = deps.scheduler;
    this.#intervals = deps.intervals;
    this.#clock = options.clock ?? (() => Date.now());
    this.#pollCron = options.pollCron ?? DEFAULTS.pollCron;
    this.#pollIntervalMs =
      options.pollIntervalMs ?? pollIntervalMsFromCron(this.#pollCron) ?? DEFAULTS.fallbackPollIntervalMs;
    this.#reconcileDelayMinutes = options.reconcileDelayMinutes ?? DEFAULTS.reconcileDelayMinutes;
    this.#backoffBaseMs = options.backoffBaseMs ?? DEFAULTS.backoffBaseMs;
    this.#backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    this.#backoffMaxMs = options.backoffMaxMs ?? DEFAULTS.backoffMaxMs;
  }

  get isStarted(): boolean {
    return this.#started;
  }

  /** Earliest time the next iteration may run after failures; 0 when not backing off. */
  get backoffUntil(): number {
    return this.#backoffUntil;
  }

  start(): void {
    if (this.#started) return;
    this.#scheduler.register({
      id: REMINDER_WORKER_JOB_ID,
      cronExpression: this.#pollCron,
      description: 'Deliver due incident reminders',
      handler: async () => {
        const report = await this.runOnce();
        if (report.status === 'failed') {
          throw new Error(report.error ?? 'reminder run failed');
        }
      },
    });
    this.#started = true;
    void logThought(`[ReminderWorker] Started (poll: ${this.#pollCron}).`);
  }

  stop(): void {
    this.#clearWake();
    if (!this.#started) return;
    this.#scheduler.unregister(REMINDER_WORKER_JOB_ID);
    this.#started = false;
    void logThought('[ReminderWorker] Stopped.');
  }

  /**
   * Restore reminder coverage after a restart: every active incident whose
   * status implies a reminder kind gets one if none is pending.
   */
  reconcile(): ReconciledReminder[] {
    const restored: ReconciledReminder[] = [];

    for (const incident of this.#store.listActive()) {
      const kind = reminderKindFor(incident.status);
      if (!kind || this.#reminders.get(incident.ticketKey, kind)) continue;

      this.#reminders.schedule(incident.ticketKey, kind, snapshotOf(incident), this.#intervals[kind], {
        delayMinutes: this.#reconcileDelayMinutes,
      });
      restored.push({ ticketKey: incident.ticketKey, kind });
    }

    if (restored.length > 0) {
      void logThought(
        `[ReminderWorker] Reconciled ${restored.length} reminder(s): ${restored
          .map((entry) => `${entry.ticketKey}/${entry.kind}`)
          .join(', ')}.`,
      );
    }
    return restored;
  }

  /** Process every reminder due now. Never rejects. */
  async runOnce(): Promise<WorkerRunReport> {
    if (this.#running) return emptyReport('skipped_overlap');
    if (this.#clock() < this.#backoffUntil) return emptyReport('skipped_backoff');

    this.#running = true;
    const report = emptyReport('completed');
    let earliestDeferred: number | null = null;

    try {
      for (const reminder of this.#reminders.dueReminders(this.#clock())) {
        if (reminder.dueAt > this.#clock()) {
          // Not actually due yet: leave it pending and wake up for it.
          report.deferred += 1;
          earliestDeferred = Math.min(earliestDeferred ?? reminder.dueAt, reminder.dueAt);
          continue;
        }
        await this.#handle(reminder, report);
      }

      this.#consecutiveFailures = 0;
      this.#backoffUntil = 0;
    } catch (err) {
      this.#consecutiveFailures += 1;
      const delay = backoffDelay(
        this.#consecutiveFailures,
        this.#backoffBaseMs,
        this.#backoffFactor,
        this.#backoffMaxMs,
      );
      this.#backoffUntil = this.#clock() + delay;
      report.status = 'failed';
      report.error = errorMessage(err);
      console.error('[ReminderWorker] Iteration failed:', report.error);
      void logThought(
        `[ReminderWorker] Iteration failed (${this.#consecutiveFailures} in a row): ${report.error}. Backing off ${delay}ms.`,
      );
    } finally {
      this.#running = false;
    }

    if (earliestDeferred !== null) {
      this.#armWake(earliestDeferred);
    }
    return report;
  }

  async #handle(reminder: Reminder, report: WorkerRunReport): Promise<void> {
    const label = `${reminder.ticketKey}/${reminder.kind}`;
    const lookup = this.#store.get(reminder.ticketKey);

    if (!lookup.ok) {
      this.#reminders.retire(reminder);
      report.retired += 1;
      void logThought(`[ReminderWorker] Dropped ${label}: incident no longer exists.`);
      return;
    }

    const incident = lookup.incident;
    if (incident.status === 'closed' || incident.status === 'frozen') {
      this.#reminders.retire(reminder);
      report.retired += 1;
      void logThought(`[ReminderWorker] Retired ${label}: incident is ${incident.status}.`);
      return;
    }

    if (reminderKindFor(incident.status) !== reminder.kind) {
      this.#reminders.retire(reminder);
      report.retired += 1;
      void logThought(`[ReminderWorker] Retired ${label}: not warranted while ${incident.status}.`);
      return;
    }

    const delivered = await this.#deliver(reminder, incident);
    if (delivered) report.delivered += 1;

    // Status may have moved while the message was in flight.
    const after = this.#store.get(reminder.ticketKey);
    if (after.ok && reminderKindFor(after.incident.status) === reminder.kind) {
      const outcome = this.#reminders.reschedule(
        { ...reminder, snapshot: snapshotOf(after.incident) },
        this.#clock(),
      );
      if (outcome === 'rescheduled') {
        report.rescheduled += 1;
      } else {
        void logThought(`[ReminderWorker] Not rescheduling ${label}: ${outcome} during delivery.`);
      }
    } else {
      this.#reminders.retire(reminder);
      report.retired += 1;
    }

    if (delivered && after.ok) {
      this.#touchLastNotification(after.incident);
    }
  }

  async #deliver(reminder: Reminder, incident: Incident): Promise<boolean> {
    const responsible = reminder.kind === 'default' ? await this.#currentResponsible() : null;
    const text = renderReminder(reminder.kind, snapshotOf(incident), responsible);
    if (text === null) {
      void logThought(`[ReminderWorker] Nobody on duty for ${reminder.ticketKey}; reminder skipped this round.`);
      return false;
    }

    try {
      await this.#chat.postReminder(incident.channelId, incident.threadTs, text);
      return true;
    } catch (err) {
      void logThought(`[ReminderWorker] Delivery of ${reminder.ticketKey}/${reminder.kind} failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async #currentResponsible(): Promise<ResponsiblePerson | null> {
    try {
      return await this.#roster.currentResponsible();
    } catch (err) {
      void logThought(`[ReminderWorker] Duty roster lookup failed: ${errorMessage(err)}`);
      return null;
    }
  }

  /** Advisory field; losing a race with a transition is fine. */
  #touchLastNotification(incident: Incident): void {
    const updated: Incident = { ...incident, lastNotification: new Date(this.#clock()).toISOString() };
    this.#store.compareAndUpdate(updated, incident.status);
  }

  #armWake(dueAt: number): void {
    const delay = Math.max(0, dueAt - this.#clock());
    if (delay >= this.#pollIntervalMs) return;
    if (this.#wakeAt !== null && this.#wakeAt <= dueAt) return;

    this.#clearWake();
    this.#wakeAt = dueAt;
    this.#wakeTimer = setTimeout(() => {
      this.#wakeTimer = null;
      this.#wakeAt = null;
      void this.runOnce();
    }, delay);
    this.#wakeTimer.unref();
  }

  #clearWake(): void {
    if (this.#wakeTimer) {
      clearTimeout(this.#wakeTimer);
    }
    this.#wakeTimer = null;
    this.#wakeAt = null;
  }
}
