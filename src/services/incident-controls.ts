import type { ActionsBlock, Button, KnownBlock, SectionBlock } from '@slack/types';
import { mention } from './reminder-messages.js';
import { isIncidentStatus, type Incident, type IncidentEvent, type IncidentStatus } from '../types/incident.js';

export type IncidentActionId = 'take_incident' | 'awaiting_response' | 'close_incident' | 'freeze_incident';

export const ACTION_EVENTS: Readonly<Record<IncidentActionId, IncidentEvent>> = {
  take_incident: 'take',
  awaiting_response: 'await_response',
  close_incident: 'close',
  freeze_incident: 'freeze',
};

export function isIncidentActionId(value: unknown): value is IncidentActionId {
  return typeof value === 'string' && Object.hasOwn(ACTION_EVENTS, value);
}

/** What a button click carries back: the incident and the status the buttons were drawn for. */
export interface ButtonValue {
  ticketKey: string;
  observedStatus: IncidentStatus;
}

export function encodeButtonValue(value: ButtonValue): string {
  return JSON.stringify({ t: value.ticketKey, s: value.observedStatus });
}

/** Accepts encoded values and bare ticket keys (no observed status). */
export function parseButtonValue(raw: string): { ticketKey: string; observedStatus?: IncidentStatus } | null {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return raw.trim() ? { ticketKey: raw.trim() } : null;
  }
  if (typeof decoded === 'object' && decoded !== null && 't' in decoded && typeof decoded.t === 'string') {
    const status = 's' in decoded && isIncidentStatus(decoded.s) ? decoded.s : undefined;
    return status ? { ticketKey: decoded.t, observedStatus: status } : { ticketKey: decoded.t };
  }
  return null;
}

function button(
  actionId: IncidentActionId,
  label: string,
  incident: Incident,
  style?: 'primary' | 'danger',
): Button {
  return {
    type: 'button',
    text: { type: 'plain_text', text: label },
    action_id: actionId,
    value: encodeButtonValue({ ticketKey: incident.ticketKey, observedStatus: incident.status }),
    ...(style && { style }),
  };
}

function actions(...elements: Button[]): ActionsBlock {
  return { type: 'actions', elements };
}

export function textBlock(text: string): SectionBlock {
  return { type: 'section', text: { type: 'mrkdwn', text } };
}

export interface RenderButtonsOptions {
  /** Pinged above the take button. */
  dutyUserId?: string | null;
}

/** Controls for an incident. A pure function of its status; closed incidents get none. */
export function renderButtons(incident: Incident, options: RenderButtonsOptions = {}): KnownBlock[] {
  const awaitButton = button('awaiting_response', 'Awaiting response', incident, 'primary');
  const closeButton = button('close_incident', 'Resolved', incident, 'danger');
  const freezeButton = button('freeze_incident', 'Stop reminding', incident);

  switch (incident.status) {
    case 'created': {
      const prompt = options.dutyUserId
        ? `${mention(options.dutyUserId)} Please take this incident.`
        : 'Please take this incident.';
      return [textBlock(prompt), actions(button('take_incident', 'Take in progress', incident, 'primary'))];
    }
    case 'assigned':
      return [actions(awaitButton, closeButton, freezeButton)];
    case 'awaiting_response':
      return [actions(closeButton, freezeButton)];
    case 'frozen':
      return [actions(awaitButton, closeButton)];
    case 'closed':
      return [];
  }
}

/** Status line shown above the controls after a transition. */
export function statusHeader(event: IncidentEvent, incident: Incident): string {
  switch (event) {
    case 'take':
      return incident.assignedTo ? `:eyes: Taken in progress by ${mention(incident.assignedTo)}` : ':eyes: Taken in progress';
    case 'await_response':
      return `:person_in_lotus_position: Waiting for a reply from ${mention(incident.authorId)}`;
    case 'reply_received':
      return ':eyes: Back in progress (reply received)';
    case 'close':
      return ':white_check_mark: *Resolved*';
    case 'freeze':
      return ':shushing_face: Reminders stopped';
  }
}

/** Reaction added to the root message when an event applies. */
export const EVENT_REACTIONS: Readonly<Partial<Record<IncidentEvent, string>>> = {
  take: 'eyes',
  await_response: 'person_in_lotus_position',
  close: 'white_check_mark',
  freeze: 'snowflake',
};

export const PROCESSING_BLOCKS: KnownBlock[] = [textBlock(':hourglass_flowing_sand: Processing...')];
