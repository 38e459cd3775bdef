/**
 * Query → ranked catalog items.
 *
 * Canonicalize (structured) or trim (free text), embed as a query, search the
 * index, convert distance to similarity, number ranks. No similarity
 * threshold is applied: the index decides what comes back.
 */

import type { EmbeddingProvider } from '../models/embedding-provider.js';
import type { VectorIndex } from '../storage/types.js';
import { assertValidK } from '../storage/catalog-store.js';
import type { RetrievalSettings } from '../config/recommender-config.js';
import { RetrievalError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { buildQueryText } from './query-builder.js';
import type { Query, RetrievalOutput, RetrievalResult } from './types.js';

const log = createLogger('retrieval-engine');

/**
 * Canonical text for any query form.
 *
 * @throws RetrievalError `EMPTY_QUERY` for blank free text
 */
export function toQueryText(query: Query): string {
  if (typeof query !== 'string') {
    return buildQueryText(query);
  }
  const text = query.trim();
  if (text.length === 0) {
    throw new RetrievalError('Query text is empty', 'EMPTY_QUERY');
  }
  return text;
}

export class RetrievalEngine {
  constructor(
    private readonly embedder: EmbeddingProvider,
    private readonly index: VectorIndex,
    private readonly settings: RetrievalSettings,
  ) {}

  get defaultK(): number {
    return this.settings.topK;
  }

  async retrieve(query: Query, k: number = this.settings.topK): Promise<RetrievalResult[]> {
    const { results } = await this.retrieveWithText(query, k);
    return results;
  }

  /**
   * Like `retrieve`, also returning the canonical text that was embedded.
   */
  async retrieveWithText(query: Query, k: number = this.settings.topK): Promise<RetrievalOutput> {
    const queryText = toQueryText(query);
    assertValidK(k);
    const start = performance.now();

    const vector = await this.embedder.encode(queryText, true);
    const neighbors = await this.index.query(vector, k);

    const results = neighbors.map((n, i) => ({
      rank: i + 1,
      record: n.record,
      similarityScore: 1 - n.distance,
    }));

    log.debug(`Retrieved ${results.length} results`, {
      k,
      ms: Math.round(performance.now() - start),
    });

    return { queryText, results };
  }
}
