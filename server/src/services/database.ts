/**
 * Postgres connection helpers shared by the stores
 */
import pg from 'pg';
import { isRecord } from '../utils/records';

/**
 * The part of pg's Pool/Client the stores use; tests pass an in-memory stand-in
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export function createPool(connectionString: string): pg.Pool {
  return new pg.Pool({ connectionString });
}

/**
 * Narrows a result row to a field map
 */
export function asRow(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

/**
 * Reads a numeric column; COUNT(*) arrives as a string unless cast
 */
export function toNumber(value: unknown): number {
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}
