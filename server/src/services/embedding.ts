/**
 * Embedding service - lazily creates the embedding model once and reuses it
 */
import type { EmbeddingModel } from '../types/index';
import { OpenAICompatibleEmbeddingModel, type EmbeddingClientOptions } from '../providers/embeddings';
import { EmbeddingError } from '../utils/errors';
import { LoggerService } from './logger';

export type EmbeddingModelLoader = () => Promise<EmbeddingModel>;

export interface EmbeddingServiceOptions {
  loader: EmbeddingModelLoader;
  dimensions: number;
}

export const DEFAULT_EMBED_BATCH_SIZE = 64;

/**
 * Loader for an HTTP embeddings endpoint
 */
export function createHttpEmbeddingLoader(options: EmbeddingClientOptions): EmbeddingModelLoader {
  return () => Promise.resolve(new OpenAICompatibleEmbeddingModel(options));
}

/**
 * Wraps an embedding model that is initialised on first use
 * Concurrent first calls share one initialisation; a failed one is retried on the next call
 */
export class EmbeddingService {
  private readonly loader: EmbeddingModelLoader;
  private readonly dimensions: number;
  private readonly logger: LoggerService;
  private modelPromise: Promise<EmbeddingModel> | null = null;

  constructor(options: EmbeddingServiceOptions, logger: LoggerService) {
    this.loader = options.loader;
    this.dimensions = options.dimensions;
    this.logger = logger;
  }

  /**
   * Returns the shared model, creating it on first call
   */
  getModel(): Promise<EmbeddingModel> {
    if (!this.modelPromise) {
      this.logger.info('Loading embedding model');
      this.modelPromise = this.loader().then(
        (model) => {
          this.logger.info(`Embedding model ready: ${model.name}`);
          return model;
        },
        (error: unknown) => {
          this.modelPromise = null;
          throw error;
        }
      );
    }
    return this.modelPromise;
  }

  /**
   * Embeds one text
   */
  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  /**
   * Embeds texts in batches, preserving order
   * @param onProgress - Called after each batch with the number embedded so far
   */
  async embedBatch(
    texts: readonly string[],
    batchSize: number = DEFAULT_EMBED_BATCH_SIZE,
    onProgress?: (done: number, total: number) => void
  ): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const model = await this.getModel();
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += batchSize) {
      const batch = texts.slice(start, start + batchSize);
      const embedded = await model.embed(batch);
      if (embedded.length !== batch.length) {
        throw new EmbeddingError(
          `Expected ${batch.length} embeddings from ${model.name}, got ${embedded.length}`
        );
      }
      for (const vector of embedded) {
        if (vector.length !== this.dimensions) {
          throw new EmbeddingError(
            `Expected ${this.dimensions}-dimensional embeddings from ${model.name}, got ${vector.length}`
          );
        }
        vectors.push(vector);
      }
      onProgress?.(vectors.length, texts.length);
    }

    return vectors;
  }
}
