import type { ResponsiblePerson } from '../types/adapters.js';
import type { ReminderKind, ReminderSnapshot } from '../types/reminder.js';

export function mention(userId: string): string {
  return `<@${userId}>`;
}

/**
 * Text of a reminder. `default` pings whoever is on duty and yields null when
 * nobody is; `awaiting_response` pings the reporter.
 */
export function renderReminder(
  kind: ReminderKind,
  snapshot: ReminderSnapshot,
  responsible: ResponsiblePerson | null,
): string | null {
  switch (kind) {
    case 'default':
      if (!responsible) return null;
      return `${mention(responsible.userId)} Incident ${snapshot.ticketKey} is waiting to be taken. Please pick it up.`;
    case 'awaiting_response':
      return `${mention(snapshot.authorId)} :person_in_lotus_position: We are waiting for your reply on incident ${snapshot.ticketKey}.`;
  }
}
