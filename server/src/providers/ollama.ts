/**
 * Ollama provider implementation for local LLM
 */
import type { Message } from '../types/index';
import { BaseAIProvider } from './base';
import { LoggerService } from '../services/logger';

export interface OllamaProviderOptions {
  baseUrl: string;
  model: string;
  maxTokens: number;
  temperature: number;
  topP: number;
  timeout: number;
}

/**
 * Ollama provider - implements chat completion using local Ollama instance
 * Uses OpenAI-compatible API endpoint
 */
export class OllamaProvider extends BaseAIProvider {
  readonly name = 'Ollama';

  constructor(options: OllamaProviderOptions, logger: LoggerService) {
    super({ ...options, apiKey: '' }, logger);
    this.logger.info(`Ollama provider initialized: model=${options.model}, baseUrl=${options.baseUrl}`);
  }

  /**
   * Ollama doesn't require API key authentication
   */
  get isConfigured(): boolean {
    return true;
  }

  /**
   * Filters out empty system messages to allow modelfile's SYSTEM directive to work
   */
  protected prepareMessages(messages: Message[]): Message[] {
    return messages.filter((msg) => msg.role !== 'system' || msg.content.trim().length > 0);
  }
}
