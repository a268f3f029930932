/**
 * Groq provider implementation (OpenAI-compatible API)
 */
import { BaseAIProvider } from './base';
import { LoggerService } from '../services/logger';

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

export interface GroqProviderOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  topP: number;
  timeout: number;
}

/**
 * Groq provider - fast hosted inference for open-weight chat models
 */
export class GroqProvider extends BaseAIProvider {
  readonly name = 'Groq';

  constructor(options: GroqProviderOptions, logger: LoggerService) {
    super({ ...options, baseUrl: GROQ_BASE_URL }, logger);
  }
}
