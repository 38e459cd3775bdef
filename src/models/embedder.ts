/**
 * OpenAI embeddings through the AI SDK.
 *
 * Texts go out in slices of `batchSize`; every returned vector is checked
 * against the model's dimensions before it reaches the index.
 */

import { createOpenAI } from '@ai-sdk/openai';
import { embedMany, type EmbeddingModel } from 'ai';
import { getModel, type ModelConfig } from './model-registry.js';
import type { EmbeddingProvider } from './embedding-provider.js';
import type { EmbeddingSettings } from '../config/recommender-config.js';
import { chunkArray } from '../utils/async-utils.js';
import { ConfigurationError, EmbeddingError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('embedder');

const DEFAULT_BATCH_SIZE = 64;
const DEFAULT_MAX_RETRIES = 2;

export interface EmbedderOptions {
  /** Maximum texts per request. */
  batchSize?: number;
  /** Retries per request on transient API errors. */
  maxRetries?: number;
  /** Defaults to OPENAI_API_KEY. */
  apiKey?: string;
}

export class Embedder implements EmbeddingProvider {
  private client: EmbeddingModel<string> | null = null;
  private readonly batchSize: number;
  private readonly maxRetries: number;

  constructor(
    private readonly model: ModelConfig,
    private readonly options: EmbedderOptions = {},
  ) {
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  }

  /**
   * Build a ready embedder from config.
   *
   * @throws ConfigurationError `UNKNOWN_MODEL`
   * @throws EmbeddingError `MODEL_LOAD_FAILED`
   */
  static create(settings: EmbeddingSettings): Embedder {
    const embedder = new Embedder(getModel(settings.modelId), {
      batchSize: settings.batchSize,
      maxRetries: settings.maxRetries,
    });
    embedder.load();
    return embedder;
  }

  get modelId(): string {
    return this.model.id;
  }

  get dimensions(): number {
    return this.model.dims;
  }

  get isLoaded(): boolean {
    return this.client !== null;
  }

  /**
   * Bind the provider client. There is no fallback model.
   *
   * @throws EmbeddingError `MODEL_LOAD_FAILED` when no API key is available
   */
  load(): void {
    const apiKey = this.options.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new EmbeddingError(
        `OPENAI_API_KEY is not set; cannot use ${this.model.id}`,
        'MODEL_LOAD_FAILED',
      );
    }

    const provider = createOpenAI({ apiKey });
    this.client = provider.embedding(
      this.model.apiModelId,
      this.model.shortened ? { dimensions: this.model.dims } : {},
    );
    log.info(`Using ${this.model.id}`, { model: this.model.apiModelId, dims: this.model.dims });
  }

  private requireClient(): EmbeddingModel<string> {
    if (!this.client) {
      throw new ConfigurationError('No model loaded. Call load() first.', 'MODEL_NOT_LOADED');
    }
    return this.client;
  }

  async encode(text: string, isQuery: boolean = false): Promise<number[]> {
    const [embedding] = await this.encodeBatch([text], isQuery);
    return embedding;
  }

  /**
   * @throws EmbeddingError `EMBED_FAILED` on API errors or malformed output
   */
  async encodeBatch(texts: string[], isQuery: boolean = false): Promise<number[][]> {
    const client = this.requireClient();
    if (texts.length === 0) {
      return [];
    }

    const results: number[][] = [];
    for (const batch of chunkArray(texts, this.batchSize)) {
      let embeddings: number[][];
      try {
        ({ embeddings } = await embedMany({ model: client, values: batch, maxRetries: this.maxRetries }));
      } catch (error) {
        throw new EmbeddingError(
          `Embedding request to ${this.model.apiModelId} failed: ${errorMessage(error)}`,
          'EMBED_FAILED',
          error,
        );
      }

      if (embeddings.length !== batch.length) {
        throw new EmbeddingError(
          `Expected ${batch.length} embeddings from ${this.model.apiModelId}, got ${embeddings.length}`,
          'EMBED_FAILED',
        );
      }
      for (const embedding of embeddings) {
        if (embedding.length !== this.model.dims) {
          throw new EmbeddingError(
            `Expected ${this.model.dims}-dimensional embeddings from ${this.model.apiModelId}, got ${embedding.length}`,
            'EMBED_FAILED',
          );
        }
        results.push(embedding);
      }
    }

    log.debug(`Encoded ${texts.length} texts`, { model: this.model.id, isQuery });
    return results;
  }

  /** Release the client. `load()` binds a new one. */
  dispose(): void {
    this.client = null;
  }
}
