/**
 * Reads and writes the pairs JSON file shared by the convert and ingest CLIs
 */
import path from 'path';
import { mkdir, readFile, writeFile } from 'fs/promises';
import type { TriggerReplyPair } from '../types/index';
import { PairFileError, errorMessage } from '../utils/errors';
import { isRecord } from '../utils/records';

/**
 * Validates parsed JSON as an array of pairs
 * `timestamp` may be absent in hand-written files and defaults to ''
 */
export function parsePairs(data: unknown, filePath: string): TriggerReplyPair[] {
  if (!Array.isArray(data)) {
    throw new PairFileError(filePath, 'expected a JSON array of pairs');
  }

  return data.map((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new PairFileError(filePath, `entry ${index} is not an object`);
    }
    const { trigger, reply, timestamp } = item;
    if (typeof trigger !== 'string' || typeof reply !== 'string') {
      throw new PairFileError(filePath, `entry ${index} needs string "trigger" and "reply"`);
    }
    if (timestamp !== undefined && typeof timestamp !== 'string') {
      throw new PairFileError(filePath, `entry ${index} has a non-string "timestamp"`);
    }
    return { trigger, reply, timestamp: timestamp ?? '' };
  });
}

export async function readPairFile(filePath: string): Promise<TriggerReplyPair[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new PairFileError(filePath, errorMessage(error));
  }
  return parsePairs(parsed, filePath);
}

/**
 * Writes pairs as pretty-printed UTF-8 JSON, creating parent directories
 */
export async function writePairFile(
  filePath: string,
  pairs: readonly TriggerReplyPair[]
): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(pairs, null, 2)}\n`, 'utf-8');
}
