/**
 * Prompt builder - assembles the chat messages sent to the model
 */
import type { ConversationTurn, Message, StyleExample } from '../types/index';

export interface PromptInput {
  persona: string;
  examples: readonly StyleExample[];
  /**
   * Oldest first
   */
  history: readonly ConversationTurn[];
  message: string;
}

const EXAMPLES_INTRO =
  "Here are examples of how you've replied to similar messages before. Match this EXACT style:\n\n";

/**
 * Few-shot block listing examples in retrieval order
 */
export function formatExamples(examples: readonly StyleExample[]): string {
  let content = EXAMPLES_INTRO;
  examples.forEach((example, i) => {
    content += `Example ${i + 1}:\n  They said: ${example.triggerText}\n  You replied: ${example.replyText}\n\n`;
  });
  return content;
}

/**
 * Persona, then style examples (if any), then history, then the new message
 */
export function buildPrompt(input: PromptInput): Message[] {
  const messages: Message[] = [{ role: 'system', content: input.persona }];

  if (input.examples.length > 0) {
    messages.push({ role: 'system', content: formatExamples(input.examples) });
  }

  for (const turn of input.history) {
    messages.push({ role: turn.role, content: turn.message });
  }

  messages.push({ role: 'user', content: input.message });
  return messages;
}
