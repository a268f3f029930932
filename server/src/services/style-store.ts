/**
 * Style example store - trigger/reply pairs with embeddings in pgvector
 */
import { toSql } from 'pgvector/pg';
import type { EmbeddingStats, StyleExample, StyleExampleRow } from '../types/index';
import { asRow, toNumber, type SqlClient } from './database';

/**
 * Rows per INSERT statement
 */
export const INSERT_BATCH_SIZE = 500;

export interface StyleStore {
  /**
   * Nearest stored pairs for one contact, most similar first
   */
  match(embedding: number[], contactId: string, topK: number): Promise<StyleExample[]>;
  insert(rows: StyleExampleRow[], onProgress?: (inserted: number, total: number) => void): Promise<number>;
  countByContact(): Promise<Record<string, number>>;
  clear(contactId: string): Promise<number>;
}

/**
 * Totals for GET /stats and the ingest CLI
 */
export function summarizeCounts(contacts: Record<string, number>): EmbeddingStats {
  return {
    totalEmbeddings: Object.values(contacts).reduce((sum, count) => sum + count, 0),
    contacts,
    collections: Object.keys(contacts).length,
  };
}

export class PostgresStyleStore implements StyleStore {
  private readonly db: SqlClient;

  constructor(db: SqlClient) {
    this.db = db;
  }

  async match(embedding: number[], contactId: string, topK: number): Promise<StyleExample[]> {
    const result = await this.db.query(
      'SELECT trigger_text, reply_text, similarity FROM match_chat_embeddings($1::vector, $2, $3)',
      [toSql(embedding), contactId, topK]
    );
    return result.rows.map((value) => {
      const row = asRow(value);
      return {
        triggerText: String(row.trigger_text ?? ''),
        replyText: String(row.reply_text ?? ''),
        similarity: toNumber(row.similarity),
      };
    });
  }

  async insert(
    rows: StyleExampleRow[],
    onProgress?: (inserted: number, total: number) => void
  ): Promise<number> {
    let inserted = 0;

    for (let start = 0; start < rows.length; start += INSERT_BATCH_SIZE) {
      const batch = rows.slice(start, start + INSERT_BATCH_SIZE);
      const values: unknown[] = [];
      const tuples = batch.map((row, i) => {
        const base = i * 4;
        values.push(row.contactId, row.triggerText, row.replyText, toSql(row.embedding));
        return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}::vector)`;
      });

      await this.db.query(
        `INSERT INTO chat_embeddings (contact_id, trigger_text, reply_text, embedding) VALUES ${tuples.join(', ')}`,
        values
      );
      inserted += batch.length;
      onProgress?.(inserted, rows.length);
    }

    return inserted;
  }

  async countByContact(): Promise<Record<string, number>> {
    const result = await this.db.query(
      'SELECT contact_id, COUNT(*)::int AS count FROM chat_embeddings GROUP BY contact_id ORDER BY contact_id'
    );
    const counts: Record<string, number> = {};
    for (const value of result.rows) {
      const row = asRow(value);
      counts[String(row.contact_id)] = toNumber(row.count);
    }
    return counts;
  }

  async clear(contactId: string): Promise<number> {
    const result = await this.db.query('DELETE FROM chat_embeddings WHERE contact_id = $1', [
      contactId,
    ]);
    return result.rowCount ?? 0;
  }
}
