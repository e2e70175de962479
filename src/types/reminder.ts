import type { IncidentStatus } from './incident.js';

/**
 * - `default`           nudge the person on duty to pick up an unassigned incident.
 * - `awaiting_response` nudge the reporter for a reply.
 */
export type ReminderKind = 'default' | 'awaiting_response';

export const REMINDER_KINDS: readonly ReminderKind[] = ['default', 'awaiting_response'];

export function isReminderKind(value: unknown): value is ReminderKind {
  return value === 'default' || value === 'awaiting_response';
}

/** Incident fields copied into a reminder so the message can be composed without a store read. */
export interface ReminderSnapshot {
  ticketKey: string;
  channelId: string;
  threadTs: string;
  authorId: string;
  status: IncidentStatus;
  assignedTo: string | null;
  createdAt: string;
}

export interface Reminder {
  /** Version token; a new one is issued on every install. */
  id: string;
  ticketKey: string;
  kind: ReminderKind;
  /** Epoch milliseconds. */
  dueAt: number;
  intervalMinutes: number;
  snapshot: ReminderSnapshot;
  /** Epoch milliseconds. */
  createdAt: number;
}

export interface ScheduleOptions {
  /** Delay before the first delivery; defaults to the interval. */
  delayMinutes?: number;
}

export type RescheduleResult = 'rescheduled' | 'superseded' | 'cancelled';

export interface ReminderStats {
  total: number;
  due: number;
  byKind: Record<ReminderKind, number>;
  nextDueAt: number | null;
}

/** Per-kind reminder intervals in whole minutes. */
export type ReminderIntervals = Record<ReminderKind, number>;

/** Copy the fields a reminder message needs out of an incident. */
export function snapshotOf(incident: {
  ticketKey: string;
  channelId: string;
  threadTs: string;
  authorId: string;
  status: IncidentStatus;
  assignedTo: string | null;
  createdAt: string;
}): ReminderSnapshot {
  return {
    ticketKey: incident.ticketKey,
    channelId: incident.channelId,
    threadTs: incident.threadTs,
    authorId: incident.authorId,
    status: incident.status,
    assignedTo: incident.assignedTo,
    createdAt: incident.createdAt,
  };
}
