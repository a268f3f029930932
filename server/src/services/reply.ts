/**
 * Reply service - generates a reply in the owner's style for one incoming message
 */
import type { AIProvider } from '../types/index';
import { buildPrompt } from '../utils/prompt-builder';
import { cleanReply } from '../utils/reply-cleaner';
import { ConversationService } from './conversation';
import { LoggerService } from './logger';
import { PersonaService } from './persona';
import { RetrievalService } from './retrieval';

export interface ReplyInput {
  contactId: string;
  contactName: string;
  message: string;
}

export interface ReplyResult {
  reply: string;
  ragExamplesUsed: number;
  responseTimeMs: number;
}

export interface ReplyServiceDeps {
  provider: AIProvider;
  retrieval: RetrievalService;
  conversation: ConversationService;
  persona: PersonaService;
  logger: LoggerService;
  topK: number;
}

export class ReplyService {
  private readonly deps: ReplyServiceDeps;

  constructor(deps: ReplyServiceDeps) {
    this.deps = deps;
  }

  /**
   * History is read before the incoming message is saved so it is not duplicated in the prompt
   * Model errors propagate to the caller
   */
  async generate(input: ReplyInput): Promise<ReplyResult> {
    const { provider, retrieval, conversation, persona, logger, topK } = this.deps;
    const startTime = Date.now();

    const history = await conversation.getRecent(input.contactId);
    await conversation.record({
      contactId: input.contactId,
      contactName: input.contactName,
      role: 'user',
      message: input.message,
    });

    const examples = await retrieval.retrieve(input.contactId, input.message, topK);
    logger.debug(`Using ${examples.length} style examples and ${history.length} history messages`);

    const messages = buildPrompt({
      persona: persona.getSystemPrompt(),
      examples,
      history,
      message: input.message,
    });

    const response = await provider.chat(messages);
    const reply = cleanReply(response.content);

    await conversation.record({
      contactId: input.contactId,
      contactName: input.contactName,
      role: 'assistant',
      message: reply,
    });

    const responseTimeMs = Date.now() - startTime;
    logger.info(
      `Reply for '${input.contactId}' in ${responseTimeMs}ms (${examples.length} style examples)`
    );

    return { reply, ragExamplesUsed: examples.length, responseTimeMs };
  }
}
