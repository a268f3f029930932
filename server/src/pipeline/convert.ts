/**
 * Export conversion pipeline: parse -> filter -> merge -> pair
 */
import type { ConversionResult, TriggerReplyPair } from '../types/index';
import { parseExportText } from './export-parser';
import type { NoiseFilter } from './noise-filter';
import { mergeConsecutive } from './turn-merger';
import { charLength, extractPairs } from './pair-extractor';

/**
 * Converts a whole export file into trigger -> reply pairs with per-stage counts
 * @param text - Export file contents
 * @param ownerName - The owner's sender name as it appears in the export
 * @param filter - Noise classifier applied before merging and again on each pair
 */
export function convertExport(
  text: string,
  ownerName: string,
  filter: NoiseFilter
): ConversionResult {
  const rawMessages = parseExportText(text, ownerName);
  const filtered = rawMessages.filter((message) => !filter.isNoise(message.text));
  const turns = mergeConsecutive(filtered);
  const pairs = extractPairs(turns, filter);

  return {
    pairs,
    counts: {
      rawMessages: rawMessages.length,
      afterFilter: filtered.length,
      turns: turns.length,
      pairs: pairs.length,
    },
  };
}

export interface PairSummary {
  total: number;
  averageTriggerLength: number;
  averageReplyLength: number;
}

/**
 * Average trigger and reply lengths, rounded to whole characters
 */
export function summarizePairs(pairs: readonly TriggerReplyPair[]): PairSummary {
  if (pairs.length === 0) {
    return { total: 0, averageTriggerLength: 0, averageReplyLength: 0 };
  }
  const triggerChars = pairs.reduce((sum, pair) => sum + charLength(pair.trigger), 0);
  const replyChars = pairs.reduce((sum, pair) => sum + charLength(pair.reply), 0);
  return {
    total: pairs.length,
    averageTriggerLength: Math.round(triggerChars / pairs.length),
    averageReplyLength: Math.round(replyChars / pairs.length),
  };
}
