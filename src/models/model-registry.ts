/**
 * Embedding models the recommender can use.
 */

import { ConfigurationError } from '../utils/errors.js';

export interface ModelConfig {
  /** Short identifier, stored with each collection. */
  id: string;
  /** Provider model name sent with each request. */
  apiModelId: string;
  /** Embedding dimensions. */
  dims: number;
  /**
   * Ask the API to shorten vectors to `dims`. Only the text-embedding-3
   * family supports this.
   */
  shortened: boolean;
  /** Input limit in tokens. */
  contextTokens: number;
  notes: string;
}

export const MODEL_REGISTRY: Record<string, ModelConfig> = {
  'openai-3-small': {
    id: 'openai-3-small',
    apiModelId: 'text-embedding-3-small',
    dims: 1536,
    shortened: false,
    contextTokens: 8191,
    notes: 'Default. Cheap; catalog texts fit its window.',
  },
  'openai-3-small-512': {
    id: 'openai-3-small-512',
    apiModelId: 'text-embedding-3-small',
    dims: 512,
    shortened: true,
    contextTokens: 8191,
    notes: 'Same model shortened to 512 dims. A third of the storage.',
  },
  'openai-3-large': {
    id: 'openai-3-large',
    apiModelId: 'text-embedding-3-large',
    dims: 3072,
    shortened: false,
    contextTokens: 8191,
    notes: 'Higher quality, larger vectors.',
  },
  'openai-ada-002': {
    id: 'openai-ada-002',
    apiModelId: 'text-embedding-ada-002',
    dims: 1536,
    shortened: false,
    contextTokens: 8191,
    notes: 'Previous generation.',
  },
};

export function getModel(id: string): ModelConfig {
  const config = MODEL_REGISTRY[id];
  if (!config) {
    throw new ConfigurationError(
      `Unknown model: ${id}. Available: ${Object.keys(MODEL_REGISTRY).join(', ')}`,
      'UNKNOWN_MODEL',
    );
  }
  return config;
}

export function getAllModelIds(): string[] {
  return Object.keys(MODEL_REGISTRY);
}
