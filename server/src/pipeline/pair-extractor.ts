/**
 * Builds trigger -> reply pairs: a contact's turn followed directly by the owner's turn
 */
import type { TriggerReplyPair, Turn } from '../types/index';
import type { NoiseFilter } from './noise-filter';

/**
 * Replies shorter than this (after trimming) carry no style
 */
export const MIN_REPLY_LENGTH = 2;

/**
 * Length in code points, so a lone emoji counts as one character
 */
export function charLength(text: string): number {
  return [...text].length;
}

/**
 * Scans adjacent turns and keeps clean non-owner -> owner transitions, in source order
 * Repeated triggers are kept; each may have been answered differently
 */
export function extractPairs(turns: readonly Turn[], filter: NoiseFilter): TriggerReplyPair[] {
  const pairs: TriggerReplyPair[] = [];

  for (let i = 0; i < turns.length - 1; i++) {
    const current = turns[i];
    const next = turns[i + 1];

    if (current.isOwner || !next.isOwner) {
      continue;
    }

    const trigger = current.text.trim();
    const reply = next.text.trim();

    if (filter.isNoise(trigger) || filter.isNoise(reply)) {
      continue;
    }
    if (charLength(reply) < MIN_REPLY_LENGTH) {
      continue;
    }

    pairs.push({
      trigger,
      reply,
      timestamp: `${current.date} ${current.time}`,
    });
  }

  return pairs;
}
