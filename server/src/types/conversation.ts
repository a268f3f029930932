/**
 * Conversation and message type definitions
 */

/**
 * Role of a message sent to the LLM
 */
export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * Role stored in per-contact history: 'user' is the contact, 'assistant' is the owner
 */
export type HistoryRole = Exclude<MessageRole, 'system'>;

/**
 * Single message in an LLM prompt
 */
export interface Message {
  role: MessageRole;
  content: string;
}

/**
 * One stored history row for a contact
 */
export interface ConversationTurn {
  role: HistoryRole;
  message: string;
  createdAt: Date;
}

/**
 * New history row to append
 */
export interface HistoryEntry {
  contactId: string;
  contactName: string;
  role: HistoryRole;
  message: string;
}

/**
 * Contact listed from conversation history
 */
export interface ContactSummary {
  contactId: string;
  contactName: string;
  messageCount: number;
}
