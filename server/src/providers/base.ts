/**
 * Base class for AI providers - shared OpenAI-compatible chat completion logic
 */
import type { AIProvider, AIProviderConfig, AIProviderResponse, Message } from '../types/index';
import { LoggerService } from '../services/logger';
import { ProviderError } from '../utils/errors';
import { JsonHttpClient } from './http';

/**
 * OpenAI-compatible chat completion response
 */
interface ChatCompletionResponse {
  choices?: Array<{
    message?: {
      content?: unknown;
    };
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

function isChatCompletionResponse(data: unknown): data is ChatCompletionResponse {
  return typeof data === 'object' && data !== null;
}

/**
 * Abstract base class for AI provider implementations
 * Subclasses choose the base URL, auth and request body extras
 */
export abstract class BaseAIProvider extends JsonHttpClient implements AIProvider {
  abstract readonly name: string;
  protected readonly config: AIProviderConfig;
  protected readonly logger: LoggerService;

  constructor(config: AIProviderConfig, logger: LoggerService) {
    super({ baseUrl: config.baseUrl, apiKey: config.apiKey, timeout: config.timeout });
    this.config = config;
    this.logger = logger;
  }

  get model(): string {
    return this.config.model;
  }

  /**
   * Checks if provider is properly configured (has API key)
   */
  get isConfigured(): boolean {
    return Boolean(this.config.apiKey);
  }

  /**
   * Hook for providers that need to drop or rewrite messages before sending
   */
  protected prepareMessages(messages: Message[]): Message[] {
    return messages;
  }

  /**
   * Builds the chat completion request body
   */
  protected buildRequestBody(messages: Message[]): Record<string, unknown> {
    return {
      messages,
      model: this.config.model,
      temperature: this.config.temperature,
      top_p: this.config.topP,
      max_tokens: this.config.maxTokens,
      stream: false,
    };
  }

  /**
   * Sends chat messages and returns the first choice
   */
  async chat(messages: Message[]): Promise<AIProviderResponse> {
    const prepared = this.prepareMessages(messages);
    this.logger.debug(`Sending request to ${this.name} (model: ${this.config.model})`, {
      messageCount: prepared.length,
    });

    const data = await this.postJson('/chat/completions', this.buildRequestBody(prepared));
    const result = this.parseResponse(data);

    this.logger.debug(`Response received from ${this.name}`, {
      contentLength: result.content.length,
      usage: result.usage,
    });
    return result;
  }

  /**
   * Parses an OpenAI-compatible response into standard format
   */
  protected parseResponse(data: unknown): AIProviderResponse {
    if (!isChatCompletionResponse(data)) {
      throw new ProviderError(`Unable to parse ${this.name} response format`);
    }

    const content = data.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new ProviderError(`Unable to parse ${this.name} response format`);
    }

    return {
      content,
      usage: data.usage
        ? {
            promptTokens: data.usage.prompt_tokens,
            completionTokens: data.usage.completion_tokens,
            totalTokens: data.usage.total_tokens,
          }
        : undefined,
    };
  }
}
