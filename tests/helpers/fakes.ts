import type { KnownBlock } from '@slack/types';
import type { ChatAdapter, DutyRoster, NewTicket, ResponsiblePerson, TicketTracker } from '../../src/types/adapters.js';
import type { Incident } from '../../src/types/incident.js';

export type ChatCall =
  | { method: 'postReminder'; channelId: string; threadTs: string; text: string }
  | { method: 'postThreadMessage'; channelId: string; threadTs: string; text: string }
  | { method: 'postBlocks'; channelId: string; threadTs: string; blocks: KnownBlock[]; text: string }
  | { method: 'updateControls'; channelId: string; messageTs: string; blocks: KnownBlock[] }
  | { method: 'addReaction'; channelId: string; messageTs: string; emoji: string }
  | { method: 'removeReaction'; channelId: string; messageTs: string; emoji: string };

/** In-memory chat surface that records every outbound call. */
export class FakeChat implements ChatAdapter {
  readonly calls: ChatCall[] = [];
  failPosts = false;
  controlMessageTs: string | null = 'ctrl-1';
  userNames: Record<string, string> = {};
  userEmails: Record<string, string> = {};

  async postReminder(channelId: string, threadTs: string, text: string): Promise<void> {
    if (this.failPosts) throw new Error('chat unavailable');
    this.calls.push({ method: 'postReminder', channelId, threadTs, text });
  }

  async postThreadMessage(channelId: string, threadTs: string, text: string): Promise<void> {
    this.calls.push({ method: 'postThreadMessage', channelId, threadTs, text });
  }

  async postBlocks(channelId: string, threadTs: string, blocks: KnownBlock[], text: string): Promise<string> {
    this.calls.push({ method: 'postBlocks', channelId, threadTs, blocks, text });
    return `msg-${this.calls.length}`;
  }

  async updateControls(channelId: string, messageTs: string, blocks: KnownBlock[]): Promise<void> {
    this.calls.push({ method: 'updateControls', channelId, messageTs, blocks });
  }

  async findControlMessage(): Promise<string | null> {
    return this.controlMessageTs;
  }

  async addReaction(channelId: string, messageTs: string, emoji: string): Promise<void> {
    this.calls.push({ method: 'addReaction', channelId, messageTs, emoji });
  }

  async removeReaction(channelId: string, messageTs: string, emoji: string): Promise<void> {
    this.calls.push({ method: 'removeReaction', channelId, messageTs, emoji });
  }

  async lookupUserName(userId: string): Promise<string | null> {
    return this.userNames[userId] ?? null;
  }

  async lookupUserEmail(userId: string): Promise<string | null> {
    return this.userEmails[userId] ?? null;
  }

  callsOf<M extends ChatCall['method']>(method: M): Extract<ChatCall, { method: M }>[] {
    return this.calls.filter((call): call is Extract<ChatCall, { method: M }> => call.method === method);
  }
}

/** Ticket tracker that issues sequential keys and records calls. */
export class FakeTracker implements TicketTracker {
  readonly created: NewTicket[] = [];
  readonly closed: string[] = [];
  readonly assigned: Array<{ ticketKey: string; identity: string }> = [];
  closeResult: boolean | Error = true;
  /** When set, `closeTicket` waits for it before answering. */
  closeGate: Promise<void> | null = null;
  createError: Error | null = null;
  #next = 1;
  readonly #prefix: string;

  constructor(prefix = 'OPS') {
    this.#prefix = prefix;
  }

  async createTicket(ticket: NewTicket): Promise<string> {
    if (this.createError) throw this.createError;
    this.created.push(ticket);
    return `${this.#prefix}-${this.#next++}`;
  }

  async closeTicket(ticketKey: string): Promise<boolean> {
    this.closed.push(ticketKey);
    if (this.closeGate) await this.closeGate;
    if (this.closeResult instanceof Error) throw this.closeResult;
    return this.closeResult;
  }

  async assignTicket(ticketKey: string, identity: string): Promise<boolean> {
    this.assigned.push({ ticketKey, identity });
    return true;
  }

  ticketUrl(ticketKey: string): string {
    return `https://jira.example.test/browse/${ticketKey}`;
  }
}

export class FakeRoster implements DutyRoster {
  responsible: ResponsiblePerson | null = { userId: 'U-DUTY', name: 'duty' };

  async currentResponsible(): Promise<ResponsiblePerson | null> {
    return this.responsible;
  }
}

export function makeIncident(overrides: Partial<Incident> = {}): Incident {
  return {
    ticketKey: 'OPS-1',
    channelId: 'C1',
    threadTs: '1700000000.000100',
    authorId: 'U-AUTHOR',
    assignedTo: null,
    status: 'created',
    createdAt: '2026-01-01T00:00:00.000Z',
    lastNotification: null,
    ...overrides,
  };
}
