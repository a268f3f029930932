/**
 * Collapses runs of messages from one sender into a single turn
 * People often send one thought as several short messages ("Hiii", "Sun", "Kha h")
 */
import type { RawMessage, Turn } from '../types/index';

/**
 * Merges consecutive same-sender messages, joining their text with newlines
 * No two adjacent turns in the result share a sender
 */
export function mergeConsecutive(messages: readonly RawMessage[]): Turn[] {
  if (messages.length === 0) {
    return [];
  }

  const turns: Turn[] = [];
  let open: Turn = { ...messages[0] };

  for (const message of messages.slice(1)) {
    if (message.sender === open.sender) {
      open = { ...open, text: `${open.text}\n${message.text}` };
    } else {
      turns.push(open);
      open = { ...message };
    }
  }

  turns.push(open);
  return turns;
}
