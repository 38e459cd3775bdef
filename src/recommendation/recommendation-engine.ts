/**
 * Retrieval plus an optional grounded explanation.
 *
 * Retrieval faults propagate. Generation faults never do: they are logged,
 * the explanation is dropped, and the retrieval results are returned as is.
 */

import type { GenerationSettings } from '../config/recommender-config.js';
import type { RetrievalEngine } from '../retrieval/retrieval-engine.js';
import type { Query, RetrievalResult, StructuredQuery } from '../retrieval/types.js';
import { GenerationError, errorMessage, isErrorWithCode } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { ExplanationGenerator } from './explanation-generator.js';

const log = createLogger('recommendation-engine');

export interface RecommendOptions {
  /** Result count. Defaults to the retrieval topK. */
  k?: number;
  /** Request an explanation. Defaults to `generation.enabled`. */
  explain?: boolean;
}

export interface RecommendationResult {
  queryText: string;
  results: RetrievalResult[];
  explanation?: string;
  /** Set when an explanation was requested but could not be produced. */
  explanationError?: string;
  retrievalCount: number;
  /** ISO timestamp. */
  generatedAt: string;
}

function abortAsTimeout(signal: AbortSignal, timeoutMs: number): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener(
      'abort',
      () => reject(new GenerationError(`Explanation timed out after ${timeoutMs}ms`, 'GENERATION_TIMEOUT')),
      { once: true },
    );
  });
}

export class RecommendationEngine {
  constructor(
    private readonly retrieval: RetrievalEngine,
    private readonly generator: ExplanationGenerator | null,
    private readonly settings: GenerationSettings,
  ) {}

  async recommend(query: StructuredQuery, options: RecommendOptions = {}): Promise<RecommendationResult> {
    return this.run(query, options);
  }

  async recommendFromText(text: string, options: RecommendOptions = {}): Promise<RecommendationResult> {
    return this.run(text, options);
  }

  private async run(query: Query, options: RecommendOptions): Promise<RecommendationResult> {
    const { queryText, results } = await this.retrieval.retrieveWithText(
      query,
      options.k ?? this.retrieval.defaultK,
    );

    const result: RecommendationResult = {
      queryText,
      results,
      retrievalCount: results.length,
      generatedAt: new Date().toISOString(),
    };

    const explain = options.explain ?? this.settings.enabled;
    if (!explain || results.length === 0) {
      return result;
    }

    if (!this.generator) {
      result.explanationError = 'No explanation generator is configured';
      return result;
    }

    try {
      result.explanation = await this.explain(this.generator, query, results);
    } catch (error) {
      log.warn('Explanation unavailable, returning retrieval results only', {
        error: errorMessage(error),
        code: error instanceof GenerationError ? error.code : undefined,
      });
      result.explanationError = errorMessage(error);
    }

    return result;
  }

  private async explain(
    generator: ExplanationGenerator,
    query: Query,
    results: RetrievalResult[],
  ): Promise<string> {
    const timeoutMs = this.settings.timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await Promise.race([
        generator.generate({ query, results }, controller.signal),
        abortAsTimeout(controller.signal, timeoutMs),
      ]);
    } catch (error) {
      if (controller.signal.aborted && !isErrorWithCode(error, 'GENERATION_TIMEOUT')) {
        throw new GenerationError(`Explanation timed out after ${timeoutMs}ms`, 'GENERATION_TIMEOUT', error);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
