/**
 * Noise filter - classifies media placeholders, system notices and empty messages
 * Patterns come from a JSON file so they can be tuned without code changes
 */
import { readFileSync } from 'fs';
import type { NoisePatterns } from '../types/index';
import { config } from '../config/index';
import { ConfigError, errorMessage } from '../utils/errors';
import { isRecord } from '../utils/records';
import { cleanLine } from './export-parser';

export interface NoiseFilter {
  isNoise(text: string): boolean;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Checks that parsed JSON has the three pattern lists
 */
export function parseNoisePatterns(data: unknown, source = 'noise patterns'): NoisePatterns {
  if (!isRecord(data)) {
    throw new ConfigError(`${source} must be a JSON object`);
  }
  const { placeholders, systemEvents, trivial } = data;
  if (!isStringArray(placeholders) || !isStringArray(systemEvents) || !isStringArray(trivial)) {
    throw new ConfigError(
      `${source} must contain string arrays "placeholders", "systemEvents" and "trivial"`
    );
  }
  return { placeholders, systemEvents, trivial };
}

/**
 * Reads pattern lists from disk
 * @param filePath - JSON file (defaults to the configured noise patterns file)
 */
export function loadNoisePatterns(filePath: string = config.filters.noisePatternsFile): NoisePatterns {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to read noise patterns from ${filePath}: ${errorMessage(error)}`);
  }
  return parseNoisePatterns(parsed, filePath);
}

/**
 * Builds a case-insensitive substring filter
 */
export function createNoiseFilter(patterns: NoisePatterns): NoiseFilter {
  const substrings = [...patterns.placeholders, ...patterns.systemEvents].map((p) =>
    p.toLowerCase()
  );
  const trivial = new Set(patterns.trivial);

  return {
    isNoise(text: string): boolean {
      const lowered = text.toLowerCase().trim();
      if (substrings.some((pattern) => lowered.includes(pattern))) {
        return true;
      }

      const cleaned = cleanLine(text);
      return cleaned === '' || trivial.has(cleaned);
    },
  };
}

/**
 * Filter built from the configured patterns file
 */
export function defaultNoiseFilter(): NoiseFilter {
  return createNoiseFilter(loadNoisePatterns());
}
