/**
 * Chat export pipeline type definitions
 */

/**
 * One message reconstructed from an export: a header line plus its continuation lines
 */
export interface RawMessage {
  readonly sender: string;
  readonly text: string;
  readonly date: string;
  readonly time: string;
  readonly isOwner: boolean;
}

/**
 * Consecutive same-sender messages joined into one unit
 */
export type Turn = RawMessage;

/**
 * What a contact said and how the owner answered
 */
export interface TriggerReplyPair {
  trigger: string;
  reply: string;
  timestamp: string;
}

/**
 * Substring lists used to classify noise messages
 */
export interface NoisePatterns {
  placeholders: string[];
  systemEvents: string[];
  trivial: string[];
}

/**
 * Message counts after each pipeline stage
 */
export interface ConversionCounts {
  rawMessages: number;
  afterFilter: number;
  turns: number;
  pairs: number;
}

export interface ConversionResult {
  pairs: TriggerReplyPair[];
  counts: ConversionCounts;
}
