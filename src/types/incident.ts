export type IncidentStatus =
  | 'created'
  | 'assigned'
  | 'awaiting_response'
  | 'frozen'
  | 'closed';

export const INCIDENT_STATUSES: readonly IncidentStatus[] = [
  'created',
  'assigned',
  'awaiting_response',
  'frozen',
  'closed',
];

export function isIncidentStatus(value: unknown): value is IncidentStatus {
  return typeof value === 'string' && INCIDENT_STATUSES.some((status) => status === value);
}

/** Events that drive an incident between statuses. Creation is handled separately. */
export type IncidentEvent =
  | 'take'
  | 'await_response'
  | 'reply_received'
  | 'close'
  | 'freeze';

export const INCIDENT_EVENTS: readonly IncidentEvent[] = [
  'take',
  'await_response',
  'reply_received',
  'close',
  'freeze',
];

export function isIncidentEvent(value: unknown): value is IncidentEvent {
  return typeof value === 'string' && INCIDENT_EVENTS.some((event) => event === value);
}

export interface Incident {
  ticketKey: string;
  channelId: string;
  threadTs: string;
  authorId: string;
  assignedTo: string | null;
  status: IncidentStatus;
  /** ISO-8601. */
  createdAt: string;
  /** ISO-8601, advisory only. */
  lastNotification: string | null;
}

export interface NewIncident {
  ticketKey: string;
  channelId: string;
  threadTs: string;
  authorId: string;
}

// ── Store outcomes ────────────────────────────────────────────────────────────

export type IncidentLookup =
  | { ok: true; incident: Incident }
  | { ok: false; error: 'not_found' };

export type IncidentCreateResult =
  | { ok: true }
  | { ok: false; error: 'duplicate_key'; conflictOn: 'ticket_key' | 'thread' };

export type CompareAndUpdateResult = 'updated' | 'conflict' | 'not_found';

// ── Lifecycle outcomes ────────────────────────────────────────────────────────

export type TransitionOutcome =
  | { kind: 'applied'; incident: Incident; previousStatus: IncidentStatus; event: IncidentEvent }
  | { kind: 'invalid_transition'; incident: Incident; event: IncidentEvent }
  | { kind: 'already_handled'; incident: Incident | null; event: IncidentEvent }
  | { kind: 'not_found'; ticketKey: string; event: IncidentEvent }
  | { kind: 'adapter_failure'; incident: Incident; event: IncidentEvent; adapter: string; message: string };

export type CreateIncidentOutcome =
  | { kind: 'created'; incident: Incident }
  | { kind: 'duplicate'; conflictOn: 'ticket_key' | 'thread' };

export interface TransitionOptions {
  /** Identity of the person who triggered the event. Required for `take`. */
  actorId?: string;
  /** Status the caller last saw; the compare-and-set runs against it when given. */
  observedStatus?: IncidentStatus;
  /** Identity handed to the ticket tracker on `take` (e.g. an email). Defaults to `actorId`. */
  assigneeIdentity?: string;
}
