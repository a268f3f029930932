/**
 * Conversation history store - append-only per-contact message log
 */
import type { ContactSummary, ConversationTurn, HistoryEntry, HistoryRole } from '../types/index';
import { asRow, toNumber, type SqlClient } from './database';

export interface HistoryStore {
  /**
   * Most recent rows for a contact, newest first
   */
  recent(contactId: string, limit: number): Promise<ConversationTurn[]>;
  append(entry: HistoryEntry): Promise<void>;
  listContacts(): Promise<ContactSummary[]>;
  clear(contactId: string): Promise<number>;
  countByContact(): Promise<Record<string, number>>;
}

function parseRole(value: unknown): HistoryRole {
  return value === 'assistant' ? 'assistant' : 'user';
}

function parseDate(value: unknown): Date {
  if (value instanceof Date) return value;
  return new Date(typeof value === 'string' || typeof value === 'number' ? value : 0);
}

export class PostgresHistoryStore implements HistoryStore {
  private readonly db: SqlClient;

  constructor(db: SqlClient) {
    this.db = db;
  }

  async recent(contactId: string, limit: number): Promise<ConversationTurn[]> {
    const result = await this.db.query(
      `SELECT role, message, created_at FROM conversation_history
       WHERE contact_id = $1
       ORDER BY created_at DESC, id DESC
       LIMIT $2`,
      [contactId, limit]
    );
    return result.rows.map((value) => {
      const row = asRow(value);
      return {
        role: parseRole(row.role),
        message: String(row.message ?? ''),
        createdAt: parseDate(row.created_at),
      };
    });
  }

  async append(entry: HistoryEntry): Promise<void> {
    await this.db.query(
      'INSERT INTO conversation_history (contact_id, contact_name, role, message) VALUES ($1, $2, $3, $4)',
      [entry.contactId, entry.contactName, entry.role, entry.message]
    );
  }

  async listContacts(): Promise<ContactSummary[]> {
    const result = await this.db.query(
      `SELECT contact_id, MAX(contact_name) AS contact_name, COUNT(*)::int AS message_count
       FROM conversation_history
       GROUP BY contact_id
       ORDER BY contact_id`
    );
    return result.rows.map((value) => {
      const row = asRow(value);
      return {
        contactId: String(row.contact_id),
        contactName: typeof row.contact_name === 'string' ? row.contact_name : 'Unknown',
        messageCount: toNumber(row.message_count),
      };
    });
  }

  async clear(contactId: string): Promise<number> {
    const result = await this.db.query('DELETE FROM conversation_history WHERE contact_id = $1', [
      contactId,
    ]);
    return result.rowCount ?? 0;
  }

  async countByContact(): Promise<Record<string, number>> {
    const result = await this.db.query(
      'SELECT contact_id, COUNT(*)::int AS count FROM conversation_history GROUP BY contact_id ORDER BY contact_id'
    );
    const counts: Record<string, number> = {};
    for (const value of result.rows) {
      const row = asRow(value);
      counts[String(row.contact_id)] = toNumber(row.count);
    }
    return counts;
  }
}
