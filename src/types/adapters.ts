import type { KnownBlock } from '@slack/types';

/** Outbound chat surface. Every method rejects with `AdapterFailureError` on failure. */
export interface ChatAdapter {
  postReminder(channelId: string, threadTs: string, text: string): Promise<void>;
  postThreadMessage(channelId: string, threadTs: string, text: string): Promise<void>;
  /** Post block content into a thread; resolves to the new message timestamp. */
  postBlocks(channelId: string, threadTs: string, blocks: KnownBlock[], fallbackText: string): Promise<string>;
  /** Replace the blocks of an existing message. */
  updateControls(channelId: string, messageTs: string, blocks: KnownBlock[]): Promise<void>;
  /** Timestamp of the latest bot message in the thread that carries buttons, if any. */
  findControlMessage(channelId: string, threadTs: string): Promise<string | null>;
  addReaction(channelId: string, messageTs: string, emoji: string): Promise<void>;
  removeReaction(channelId: string, messageTs: string, emoji: string): Promise<void>;
  lookupUserName(userId: string): Promise<string | null>;
  lookupUserEmail(userId: string): Promise<string | null>;
}

export interface NewTicket {
  title: string;
  description: string;
  reporter: string;
  threadUrl: string;
}

/** External ticket tracker. */
export interface TicketTracker {
  /** Resolves to the new ticket key. */
  createTicket(ticket: NewTicket): Promise<string>;
  closeTicket(ticketKey: string): Promise<boolean>;
  assignTicket(ticketKey: string, assigneeIdentity: string): Promise<boolean>;
  ticketUrl(ticketKey: string): string;
}

export interface ResponsiblePerson {
  userId: string;
  name: string;
}

/** Who is on duty right now. Only used to compose messages. */
export interface DutyRoster {
  currentResponsible(): Promise<ResponsiblePerson | null>;
}
