/**
 * Runtime configuration value for the recommender.
 *
 * Every component takes the slice it needs in its constructor; nothing reads
 * a process-wide configuration.
 */

import { homedir } from 'node:os';

export interface EmbeddingSettings {
  /** Key into MODEL_REGISTRY. */
  modelId: string;
  /** Texts per embedding request during catalog builds. */
  batchSize: number;
  /** Retries per embedding request on transient API errors. */
  maxRetries: number;
}

export interface EncryptionSettings {
  enabled: boolean;
  cipher: 'chacha20' | 'sqlcipher';
}

export interface StorageSettings {
  /** SQLite file path (`~` expanded) or ':memory:'. */
  dbPath: string;
  /** Collection name inside the database. */
  collection: string;
  encryption: EncryptionSettings;
}

export interface RetrievalSettings {
  /** Default number of results per query. */
  topK: number;
}

export interface GenerationSettings {
  /** Whether recommendations request an explanation by default. */
  enabled: boolean;
  model: string;
  maxTokens: number;
  temperature: number;
  /** Per-call timeout for the explanation request. */
  timeoutMs: number;
  rateLimitPerMin: number;
  systemPrompt: string;
}

export interface EvaluationSettings {
  /** K values for Recall@K. */
  kValues: number[];
  /** Queries predicted in parallel. */
  concurrency: number;
  /** Results retrieved per query when generating predictions. */
  predictionDepth: number;
  outputDir: string;
}

export interface ServerSettings {
  port: number;
}

export interface RecommenderConfig {
  embedding: EmbeddingSettings;
  storage: StorageSettings;
  retrieval: RetrievalSettings;
  generation: GenerationSettings;
  evaluation: EvaluationSettings;
  server: ServerSettings;
}

export const DEFAULT_SYSTEM_PROMPT =
  'You are an expert HR technology consultant who recommends pre-employment assessments. ' +
  'You only recommend assessments that appear in the catalog excerpt you are given.';

export const DEFAULT_CONFIG: RecommenderConfig = {
  embedding: {
    modelId: 'openai-3-small',
    batchSize: 64,
    maxRetries: 2,
  },
  storage: {
    dbPath: '~/.assessment-recommender/catalog.db',
    collection: 'assessments',
    encryption: {
      enabled: false,
      cipher: 'chacha20',
    },
  },
  retrieval: {
    topK: 10,
  },
  generation: {
    enabled: true,
    model: 'claude-3-haiku-20240307',
    maxTokens: 1000,
    temperature: 0.7,
    timeoutMs: 20_000,
    rateLimitPerMin: 30,
    systemPrompt: DEFAULT_SYSTEM_PROMPT,
  },
  evaluation: {
    kValues: [5, 10],
    concurrency: 4,
    predictionDepth: 10,
    outputDir: './evaluation_results',
  },
  server: {
    port: 5000,
  },
};

/**
 * Expand a leading `~` to the user's home directory.
 */
export function resolvePath(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return homedir() + path.slice(1);
  }
  return path;
}
