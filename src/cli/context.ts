/**
 * Wiring shared by CLI commands: config → database → embedder → store.
 */

import type Database from 'better-sqlite3-multiple-ciphers';
import { loadCatalog } from '../catalog/catalog-loader.js';
import { loadConfig } from '../config/loader.js';
import type { RecommenderConfig } from '../config/recommender-config.js';
import { Embedder } from '../models/embedder.js';
import { getModel } from '../models/model-registry.js';
import { AnthropicExplanationGenerator } from '../recommendation/explanation-generator.js';
import { RecommendationEngine } from '../recommendation/recommendation-engine.js';
import { RetrievalEngine } from '../retrieval/retrieval-engine.js';
import { CatalogStore } from '../storage/catalog-store.js';
import { openDatabase } from '../storage/db.js';

export interface CliContext {
  config: RecommenderConfig;
  db: Database.Database;
  embedder: Embedder;
  store: CatalogStore;
  close(): void;
}

export interface OpenContextOptions {
  /** Open an existing collection (fails if never built) instead of a writable one. */
  existing?: boolean;
  /** Bind the embedding client. Commands that never encode skip this. */
  loadModel?: boolean;
  /** Rebuild the collection from this catalog file before use. */
  rebuildFrom?: string;
}

export async function openContext(options: OpenContextOptions = {}): Promise<CliContext> {
  const config = loadConfig();
  const db = openDatabase(config.storage);

  try {
    const embedder =
      options.loadModel === false
        ? new Embedder(getModel(config.embedding.modelId), {
            batchSize: config.embedding.batchSize,
            maxRetries: config.embedding.maxRetries,
          })
        : Embedder.create(config.embedding);

    const name = config.storage.collection;
    let store: CatalogStore;
    if (options.rebuildFrom) {
      store = new CatalogStore(db, embedder, name);
      await store.build(loadCatalog(options.rebuildFrom));
    } else {
      store = options.existing ? CatalogStore.open(db, embedder, name) : new CatalogStore(db, embedder, name);
    }

    return {
      config,
      db,
      embedder,
      store,
      close() {
        embedder.dispose();
        db.close();
      },
    };
  } catch (error) {
    db.close();
    throw error;
  }
}

export function createRetrieval(ctx: CliContext): RetrievalEngine {
  return new RetrievalEngine(ctx.embedder, ctx.store, ctx.config.retrieval);
}

export function createRecommender(ctx: CliContext): RecommendationEngine {
  return new RecommendationEngine(
    createRetrieval(ctx),
    new AnthropicExplanationGenerator(ctx.config.generation),
    ctx.config.generation,
  );
}

/**
 * Run `fn` with an open context and always release it.
 */
export async function withContext<T>(
  options: OpenContextOptions,
  fn: (ctx: CliContext) => Promise<T>,
): Promise<T> {
  const ctx = await openContext(options);
  try {
    return await fn(ctx);
  } finally {
    ctx.close();
  }
}
