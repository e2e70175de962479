import type { IncidentStore } from './incident-store.js';
import type { ReminderScheduler } from './reminder-scheduler.js';
import type { TicketTracker } from '../types/adapters.js';
import { errorMessage } from '../types/errors.js';
import type {
  CreateIncidentOutcome,
  Incident,
  IncidentEvent,
  IncidentStatus,
  NewIncident,
  TransitionOptions,
  TransitionOutcome,
} from '../types/incident.js';
import { snapshotOf, type ReminderIntervals, type ReminderKind } from '../types/reminder.js';
import { logThought } from '../utils/logger.js';

interface TransitionRule {
  from: readonly IncidentStatus[];
  to: IncidentStatus;
  /** Reminders removed once the new status is durable. */
  cancel: 'all' | readonly ReminderKind[];
  /** Reminder installed after the cancellations, if any. */
  start: ReminderKind | null;
}

export const TRANSITIONS: Readonly<Record<IncidentEvent, TransitionRule>> = {
  take: { from: ['created'], to: 'assigned', cancel: ['default'], start: null },
  await_response: {
    from: ['assigned', 'frozen'],
    to: 'awaiting_response',
    cancel: 'all',
    start: 'awaiting_response',
  },
  reply_received: { from: ['awaiting_response'], to: 'assigned', cancel: ['awaiting_response'], start: null },
  close: { from: ['assigned', 'awaiting_response', 'frozen'], to: 'closed', cancel: 'all', start: null },
  freeze: { from: ['assigned', 'awaiting_response'], to: 'frozen', cancel: 'all', start: null },
};

/** The reminder kind a status keeps alive, if any. */
export function reminderKindFor(status: IncidentStatus): ReminderKind | null {
  switch (status) {
    case 'created':
      return 'default';
    case 'awaiting_response':
      return 'awaiting_response';
    default:
      return null;
  }
}

export interface IncidentLifecycleDeps {
  store: IncidentStore;
  reminders: ReminderScheduler;
  tracker: TicketTracker;
  intervals: ReminderIntervals;
  clock?: () => Date;
}

/**
 * Incident state machine.
 *
 * Every transition is written through the store's compare-and-set before any
 * reminder is started or cancelled, so a writer that loses a race leaves the
 * reminder schedule untouched. Transitions on one ticket run one at a time in
 * this process, so a click that arrives while a tracker call is in flight is
 * judged against the status that call produced.
 */
export class IncidentLifecycle {
  readonly #store: IncidentStore;
  readonly #reminders: ReminderScheduler;
  readonly #tracker: TicketTracker;
  readonly #intervals: ReminderIntervals;
  readonly #clock: () => Date;
  readonly #queues = new Map<string, Promise<void>>();

  constructor(deps: IncidentLifecycleDeps) {
    this.#store = deps.store;
    this.#reminders = deps.reminders;
    this.#tracker = deps.tracker;
    this.#intervals = deps.intervals;
    this.#clock = deps.clock ?? (() => new Date());
  }

  /** Persist a new incident in `created` and start its `default` reminder. */
  createIncident(input: NewIncident): CreateIncidentOutcome {
    const incident: Incident = {
      ...input,
      assignedTo: null,
      status: 'created',
      createdAt: this.#clock().toISOString(),
      lastNotification: null,
    };

    const created = this.#store.create(incident);
    if (!created.ok) {
      void logThought(
        `[IncidentLifecycle] Refused to create ${input.ticketKey}: duplicate ${created.conflictOn}.`,
      );
      return { kind: 'duplicate', conflictOn: created.conflictOn };
    }

    this.#reminders.schedule(incident.ticketKey, 'default', snapshotOf(incident), this.#intervals.default);
    void logThought(`[IncidentLifecycle] Created ${incident.ticketKey} in ${incident.channelId}/${incident.threadTs}.`);
    return { kind: 'created', incident };
  }

  transition(ticketKey: string, event: IncidentEvent, options: TransitionOptions = {}): Promise<TransitionOutcome> {
    return this.#serialized(ticketKey, () => this.#apply(ticketKey, event, options));
  }

  /** Chain `fn` behind any transition still running for the ticket. */
  async #serialized<T>(ticketKey: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.#queues.get(ticketKey) ?? Promise.resolve();
    const run = previous.then(fn);
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.#queues.set(ticketKey, settled);
    try {
      return await run;
    } finally {
      if (this.#queues.get(ticketKey) === settled) {
        this.#queues.delete(ticketKey);
      }
    }
  }

  async #apply(ticketKey: string, event: IncidentEvent, options: TransitionOptions): Promise<TransitionOutcome> {
    const lookup = this.#store.get(ticketKey);
    if (!lookup.ok) {
      void logThought(`[IncidentLifecycle] ${event} on unknown incident ${ticketKey}.`);
      return { kind: 'not_found', ticketKey, event };
    }

    const current = lookup.incident;
    const rule = TRANSITIONS[event];
    const { observedStatus } = options;

    if (observedStatus !== undefined && observedStatus !== current.status) {
      // The caller acted on a status that has since changed under it.
      return rule.from.includes(observedStatus)
        ? { kind: 'already_handled', incident: current, event }
        : { kind: 'invalid_transition', incident: current, event };
    }

    if (!rule.from.includes(current.status)) {
      return { kind: 'invalid_transition', incident: current, event };
    }

    let assignedTo = current.assignedTo;
    if (event === 'take') {
      if (!options.actorId) {
        throw new Error(`[IncidentLifecycle] 'take' on ${ticketKey} requires an actorId.`);
      }
      assignedTo = options.actorId;
    }

    if (event === 'close') {
      const failure = await this.#closeTicket(ticketKey);
      if (failure !== null) {
        void logThought(`[IncidentLifecycle] Close of ${ticketKey} aborted: ${failure}`);
        return { kind: 'adapter_failure', incident: current, event, adapter: 'tracker', message: failure };
      }
    }

    const next: Incident = { ...current, status: rule.to, assignedTo };
    const result = this.#store.compareAndUpdate(next, current.status);

    if (result === 'not_found') {
      return { kind: 'not_found', ticketKey, event };
    }
    if (result === 'conflict') {
      const latest = this.#store.get(ticketKey);
      if (event === 'close') {
        const status = latest.ok ? latest.incident.status : 'missing';
        console.error(`[IncidentLifecycle] ${ticketKey} was closed in the tracker but is ${status} locally.`);
        void logThought(
          `[IncidentLifecycle] ERROR: ${ticketKey} closed in the tracker, but another writer changed it to ${status} first.`,
        );
      } else {
        void logThought(`[IncidentLifecycle] ${event} on ${ticketKey} lost a concurrent update; no reminder change.`);
      }
      return { kind: 'already_handled', incident: latest.ok ? latest.incident : null, event };
    }

    this.#applyReminderEffect(next, rule);
    void logThought(`[IncidentLifecycle] ${ticketKey}: ${current.status} -> ${next.status} (${event}).`);

    if (event === 'take' && options.actorId) {
      await this.#assignTicket(ticketKey, options.assigneeIdentity ?? options.actorId);
    }

    return { kind: 'applied', incident: next, previousStatus: current.status, event };
  }

  #applyReminderEffect(incident: Incident, rule: TransitionRule): void {
    if (rule.cancel === 'all') {
      this.#reminders.cancelAll(incident.ticketKey);
    } else {
      for (const kind of rule.cancel) {
        this.#reminders.cancel(incident.ticketKey, kind);
      }
    }

    if (rule.start) {
      this.#reminders.schedule(incident.ticketKey, rule.start, snapshotOf(incident), this.#intervals[rule.start]);
    }
  }

  /** Returns null on success, otherwise the failure text. */
  async #closeTicket(ticketKey: string): Promise<string | null> {
    try {
      const closed = await this.#tracker.closeTicket(ticketKey);
      return closed ? null : 'ticket tracker did not close the ticket';
    } catch (err) {
      return errorMessage(err);
    }
  }

  async #assignTicket(ticketKey: string, identity: string): Promise<void> {
    try {
      const assigned = await this.#tracker.assignTicket(ticketKey, identity);
      if (!assigned) {
        void logThought(`[IncidentLifecycle] Tracker did not assign ${ticketKey} to ${identity}; status kept.`);
      }
    } catch (err) {
      void logThought(`[IncidentLifecycle] Assigning ${ticketKey} failed: ${errorMessage(err)}; status kept.`);
    }
  }
}

const EVENT_LABELS: Record<IncidentEvent, string> = {
  take: 'take',
  await_response: 'mark as awaiting response',
  reply_received: 'resume',
  close: 'close',
  freeze: 'freeze',
};

export function statusLabel(status: IncidentStatus): string {
  return status.replace('_', ' ');
}

/** Short user-facing text for a transition outcome. */
export function describeOutcome(outcome: TransitionOutcome): string {
  switch (outcome.kind) {
    case 'applied':
      return `Incident ${outcome.incident.ticketKey} is now ${statusLabel(outcome.incident.status)}.`;
    case 'invalid_transition':
      if (outcome.incident.status === 'closed') {
        return `Incident ${outcome.incident.ticketKey} is already closed.`;
      }
      return `Cannot ${EVENT_LABELS[outcome.event]} incident ${outcome.incident.ticketKey} while it is ${statusLabel(outcome.incident.status)}.`;
    case 'already_handled':
      if (!outcome.incident) return 'This incident was already handled.';
      return `Incident ${outcome.incident.ticketKey} was already handled (status: ${statusLabel(outcome.incident.status)}).`;
    case 'not_found':
      return `Incident ${outcome.ticketKey} was not found.`;
    case 'adapter_failure':
      return `Could not ${EVENT_LABELS[outcome.event]} incident ${outcome.incident.ticketKey}: ${outcome.message}`;
  }
}
