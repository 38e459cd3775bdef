/**
 * Mean Recall@K over a labeled query set.
 */

import { ConfigurationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { calculateRecallAtK, summarize, type RecallSummary } from './recall.js';

const log = createLogger('evaluator');

/** queryId → relevant item URLs. */
export type GroundTruthSet = ReadonlyMap<string, readonly string[]>;

/** queryId → predicted URLs in rank order. */
export type PredictionSet = ReadonlyMap<string, readonly string[]>;

/** `recall@5`, `recall@10`, ... */
export type RecallMetric = `recall@${number}`;

export interface MeanRecallReport {
  readonly queriesEvaluated: number;
  readonly kValues: readonly number[];
  readonly perQueryRecall: Readonly<Record<string, Readonly<Record<RecallMetric, number>>>>;
  readonly summary: Readonly<Record<RecallMetric, Readonly<RecallSummary>>>;
  /** Ground-truth queries with no predictions; excluded from the figures. */
  readonly missingQueries: readonly string[];
}

export const DEFAULT_K_VALUES: readonly number[] = [5, 10];

export function recallMetric(k: number): RecallMetric {
  return `recall@${k}`;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export class MeanRecallAtKEvaluator {
  readonly kValues: readonly number[];

  /**
   * @throws ConfigurationError `INVALID_K_VALUES`
   */
  constructor(kValues: readonly number[] = DEFAULT_K_VALUES) {
    if (kValues.length === 0 || !kValues.every((k) => Number.isInteger(k) && k > 0)) {
      throw new ConfigurationError(
        `K values must be positive integers, got [${kValues.join(', ')}]`,
        'INVALID_K_VALUES',
      );
    }
    this.kValues = Object.freeze([...new Set(kValues)]);
  }

  /**
   * Score predictions against ground truth.
   *
   * Ground-truth queries absent from `predictions` are logged, listed in
   * `missingQueries`, and left out. Predictions without ground truth are
   * ignored.
   */
  evaluateSystem(predictions: PredictionSet, groundTruth: GroundTruthSet): MeanRecallReport {
    const perQueryRecall: Record<string, Record<RecallMetric, number>> = {};
    const byMetric = new Map<RecallMetric, number[]>(this.kValues.map((k) => [recallMetric(k), []]));
    const missingQueries: string[] = [];

    for (const [queryId, relevant] of groundTruth) {
      const predicted = predictions.get(queryId);
      if (!predicted) {
        log.warn(`No predictions found for query: ${queryId}`);
        missingQueries.push(queryId);
        continue;
      }

      const recalls: Record<RecallMetric, number> = {};
      for (const k of this.kValues) {
        const metric = recallMetric(k);
        const recall = calculateRecallAtK(predicted, relevant, k);
        recalls[metric] = recall;
        byMetric.get(metric)?.push(recall);
      }
      perQueryRecall[queryId] = recalls;
    }

    const queriesEvaluated = Object.keys(perQueryRecall).length;
    const summary: Record<RecallMetric, RecallSummary> = {};
    for (const [metric, values] of byMetric) {
      const stats = summarize(values);
      if (stats) {
        summary[metric] = stats;
        log.info(`${metric}: ${stats.mean.toFixed(4)} ± ${stats.std.toFixed(4)}`);
      }
    }

    return deepFreeze({
      queriesEvaluated,
      kValues: [...this.kValues],
      perQueryRecall,
      summary,
      missingQueries,
    });
  }
}
