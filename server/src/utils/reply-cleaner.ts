/**
 * Strips wrapping quotes and role labels models sometimes add to replies
 */

const LABEL_PREFIXES = ['Reply:', 'Reply :', 'Response:', 'Message:'];

function stripWrapping(text: string, quote: string): string {
  if (text.length >= 2 && text.startsWith(quote) && text.endsWith(quote)) {
    return text.slice(1, -1);
  }
  return text;
}

export function cleanReply(raw: string): string {
  let text = raw.trim();
  text = stripWrapping(text, '"');
  text = stripWrapping(text, "'");

  const prefix = LABEL_PREFIXES.find((label) => text.startsWith(label));
  if (prefix) {
    text = text.slice(prefix.length).trim();
  }

  return text.trim();
}
