/**
 * Chat export parser - rebuilds discrete messages from a WhatsApp .txt export
 *
 * Accepted header shapes (locale dependent):
 *   [15/01/24, 21:45:12] Priya: hello
 *   1/15/24, 9:45 PM - Priya: hello
 *   15.01.24, 21:45 - Priya: hello
 */
import type { RawMessage } from '../types/index';

/**
 * date, time (12h or 24h, optional seconds and meridiem), optional brackets and dash, sender, text
 */
const HEADER_PATTERN =
  /^\[?(\d{1,2}[/.-]\d{1,2}[/.-]\d{2,4}),?\s+(\d{1,2}:\d{2}(?::\d{2})?(?:\s*[AaPp]\.?[Mm]\.?)?)\]?(?:\s+-)?\s+(.+?):\s(.+)$/;

/**
 * Left-to-right and right-to-left marks inserted by WhatsApp
 */
const DIRECTION_MARKS = /[\u200E\u200F]/g;

const EDITED_MARKER = /\s*<This message was edited>/g;

export interface MessageHeader {
  date: string;
  time: string;
  sender: string;
  text: string;
}

/**
 * Removes direction marks and surrounding whitespace from an export line
 */
export function cleanLine(line: string): string {
  return line.replace(DIRECTION_MARKS, '').trim();
}

function stripEditedMarker(text: string): string {
  return text.replace(EDITED_MARKER, '').trim();
}

/**
 * Matches a cleaned line against the message header pattern
 * @returns The header parts, or null for continuation lines
 */
export function parseHeader(line: string): MessageHeader | null {
  const match = HEADER_PATTERN.exec(line);
  if (!match) {
    return null;
  }
  const [, date, time, sender, text] = match;
  return {
    date,
    time: time.trim(),
    sender: sender.trim(),
    text: stripEditedMarker(text),
  };
}

/**
 * Parses export lines into messages, folding continuation lines into the message above
 * Never throws: lines that are neither headers nor continuations are dropped
 * @param lines - Raw export lines
 * @param ownerName - Sender name of the export's owner, compared exactly
 */
export function parseExport(lines: readonly string[], ownerName: string): RawMessage[] {
  const messages: RawMessage[] = [];
  let current: MessageHeader | null = null;

  const flush = (): void => {
    if (current) {
      messages.push({
        sender: current.sender,
        text: current.text,
        date: current.date,
        time: current.time,
        isOwner: current.sender === ownerName,
      });
    }
  };

  for (const rawLine of lines) {
    const line = cleanLine(rawLine);
    if (!line) {
      continue;
    }

    const header = parseHeader(line);
    if (header) {
      flush();
      current = header;
      continue;
    }

    // Continuation of a multi-line message; orphans before the first header are dropped
    if (current) {
      const continuation = stripEditedMarker(line);
      if (continuation) {
        current.text += `\n${continuation}`;
      }
    }
  }

  flush();
  return messages;
}

/**
 * Splits a whole export file and parses it
 */
export function parseExportText(text: string, ownerName: string): RawMessage[] {
  return parseExport(text.split(/\r?\n/), ownerName);
}
