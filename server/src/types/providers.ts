/**
 * Chat model and embedding model contracts
 */
import type { Message } from './conversation';

/**
 * Settings a chat provider is built from
 */
export interface AIProviderConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  topP: number;
  baseUrl: string;
  timeout: number;
}

/**
 * A single non-streamed completion
 */
export interface AIProviderResponse {
  content: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

/**
 * Chat completion backend used to generate replies
 */
export interface AIProvider {
  readonly name: string;
  readonly model: string;
  readonly isConfigured: boolean;
  chat(messages: Message[]): Promise<AIProviderResponse>;
}

/**
 * Values accepted by AI_PROVIDER
 */
export type ProviderType = 'groq' | 'ollama';

/**
 * Turns text into fixed-length vectors
 */
export interface EmbeddingModel {
  readonly name: string;
  embed(texts: string[]): Promise<number[][]>;
}
