/**
 * OpenAI-compatible embeddings client (Ollama, OpenAI, or any /v1/embeddings server)
 */
import type { EmbeddingModel } from '../types/index';
import { ProviderError } from '../utils/errors';
import { isRecord } from '../utils/records';
import { JsonHttpClient } from './http';

export interface EmbeddingClientOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  dimensions: number;
  timeout: number;
}

interface EmbeddingItem {
  index: number;
  embedding: number[];
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'number');
}

/**
 * Calls POST /embeddings and returns vectors in input order
 */
export class OpenAICompatibleEmbeddingModel extends JsonHttpClient implements EmbeddingModel {
  readonly name: string;
  private readonly model: string;
  private readonly dimensions: number;

  constructor(options: EmbeddingClientOptions) {
    super({ baseUrl: options.baseUrl, apiKey: options.apiKey, timeout: options.timeout });
    this.name = options.model;
    this.model = options.model;
    this.dimensions = options.dimensions;
  }

  async embed(texts: string[]): Promise<number[][]> {
    const data = await this.postJson('/embeddings', {
      model: this.model,
      input: texts,
      dimensions: this.dimensions,
    });
    const items: unknown = isRecord(data) ? data.data : undefined;

    if (!Array.isArray(items) || items.length !== texts.length) {
      throw new ProviderError(`Unable to parse embedding response from ${this.model}`);
    }

    const parsed = items.map((item: unknown, position): EmbeddingItem => {
      if (!isRecord(item) || !isNumberArray(item.embedding)) {
        throw new ProviderError(`Embedding response from ${this.model} is missing vectors`);
      }
      return {
        index: typeof item.index === 'number' ? item.index : position,
        embedding: item.embedding,
      };
    });
    return parsed.sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }
}
