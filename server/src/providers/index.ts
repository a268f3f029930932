/**
 * AI provider factory - creates provider instances based on configuration
 */
import type { AIProvider, ProviderType } from '../types/index';
import { GroqProvider } from './groq';
import { OllamaProvider } from './ollama';
import { LoggerService } from '../services/logger';
import { config, type AppConfig } from '../config/index';
import { ConfigError } from '../utils/errors';

/**
 * Creates an AI provider instance of the specified type
 * @param logger - Logger service instance
 * @param type - Provider type (defaults to config value)
 * @param aiConfig - Model settings (defaults to config.ai)
 * @returns Configured AI provider instance
 */
export function createProvider(
  logger: LoggerService,
  type?: ProviderType,
  aiConfig: AppConfig['ai'] = config.ai
): AIProvider {
  const providerType = type ?? aiConfig.provider;
  const { maxTokens, temperature, topP, timeout } = aiConfig;

  switch (providerType) {
    case 'groq':
      return new GroqProvider(
        { apiKey: aiConfig.groq.apiKey, model: aiConfig.groq.model, maxTokens, temperature, topP, timeout },
        logger
      );
    case 'ollama':
      return new OllamaProvider(
        {
          baseUrl: aiConfig.ollama.baseUrl,
          model: aiConfig.ollama.model,
          maxTokens,
          temperature,
          topP,
          timeout,
        },
        logger
      );
    default:
      throw new ConfigError(`Unknown provider type: ${String(providerType)}`);
  }
}

/**
 * Gets a configured provider instance, throwing if not properly configured
 * @throws ConfigError if provider is missing required configuration (e.g., API key)
 */
export function getConfiguredProvider(
  logger: LoggerService,
  aiConfig: AppConfig['ai'] = config.ai
): AIProvider {
  const provider = createProvider(logger, undefined, aiConfig);
  if (!provider.isConfigured) {
    throw new ConfigError(`Provider ${provider.name} is not configured. Missing API key.`, [
      'GROQ_API_KEY',
    ]);
  }
  return provider;
}

export { GroqProvider } from './groq';
export { OllamaProvider } from './ollama';
export { OpenAICompatibleEmbeddingModel } from './embeddings';
