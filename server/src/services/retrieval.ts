/**
 * Retrieval service - finds how the owner replied to messages like this one
 */
import type { StyleExample } from '../types/index';
import { EmbeddingService } from './embedding';
import { LoggerService } from './logger';
import type { StyleStore } from './style-store';

export interface RetrievalOptions {
  enabled: boolean;
  globalContactId: string;
}

/**
 * Best-effort similarity search scoped to a contact with a global fallback
 * Failures are logged and yield no examples so a reply can still be generated
 */
export class RetrievalService {
  private readonly embeddings: EmbeddingService;
  private readonly store: StyleStore;
  private readonly logger: LoggerService;
  private readonly options: RetrievalOptions;

  constructor(
    embeddings: EmbeddingService,
    store: StyleStore,
    logger: LoggerService,
    options: RetrievalOptions
  ) {
    this.embeddings = embeddings;
    this.store = store;
    this.logger = logger;
    this.options = options;
  }

  get globalContactId(): string {
    return this.options.globalContactId;
  }

  /**
   * Most similar stored pairs for the message, most similar first
   * @param contactId - Contact whose examples are searched first
   * @param message - Incoming message text
   * @param topK - Maximum number of examples
   */
  async retrieve(contactId: string, message: string, topK: number): Promise<StyleExample[]> {
    if (!this.options.enabled) {
      return [];
    }

    try {
      const embedding = await this.embeddings.embed(message);
      const examples = await this.store.match(embedding, contactId, topK);
      if (examples.length > 0 || contactId === this.options.globalContactId) {
        return examples;
      }

      this.logger.info(
        `No style examples for '${contactId}', using '${this.options.globalContactId}' fallback`
      );
      return await this.store.match(embedding, this.options.globalContactId, topK);
    } catch (error) {
      this.logger.error(`Style example search failed for '${contactId}'`, error);
      return [];
    }
  }
}
