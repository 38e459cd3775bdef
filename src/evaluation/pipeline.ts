/**
 * End-to-end evaluation: ground truth → predictions → Recall@K → files.
 *
 * Predictions run concurrently in bounded chunks. Each query is independent
 * and results are keyed by query id, so the report does not depend on
 * completion order.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { EvaluationSettings } from '../config/recommender-config.js';
import type { RetrievalEngine } from '../retrieval/retrieval-engine.js';
import { mapWithConcurrency } from '../utils/async-utils.js';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { MeanRecallAtKEvaluator, type MeanRecallReport } from './evaluator.js';
import { loadGroundTruth, loadQueries } from './ground-truth.js';
import { formatPredictionsCsv } from './prediction-export.js';
import { formatEvaluationReport } from './report.js';

const log = createLogger('evaluation-pipeline');

export const TRAINING_PREDICTIONS_FILE = 'training_predictions.csv';
export const TEST_PREDICTIONS_FILE = 'test_predictions.csv';
export const REPORT_TEXT_FILE = 'evaluation_report.txt';
export const REPORT_JSON_FILE = 'evaluation_report.json';

export interface EvaluationRunOptions {
  groundTruthPath: string;
  /** Unlabeled queries to predict into test_predictions.csv. */
  testQueriesPath?: string;
  /** Defaults to `evaluation.outputDir`. */
  outputDir?: string;
}

export interface EvaluationRunResult {
  report: MeanRecallReport;
  /** Paths written, in write order. */
  files: string[];
}

export class EvaluationPipeline {
  private readonly evaluator: MeanRecallAtKEvaluator;

  /**
   * @throws ConfigurationError `CONFIG_INVALID` when `predictionDepth` is
   *   below the largest K
   */
  constructor(
    private readonly retrieval: RetrievalEngine,
    private readonly settings: EvaluationSettings,
  ) {
    const maxK = Math.max(...settings.kValues);
    if (settings.predictionDepth < maxK) {
      throw new ConfigurationError(
        `predictionDepth (${settings.predictionDepth}) must be at least the largest K (${maxK})`,
        'CONFIG_INVALID',
      );
    }
    this.evaluator = new MeanRecallAtKEvaluator(settings.kValues);
  }

  /**
   * Retrieve `predictionDepth` URLs for each query. Output order follows
   * input order.
   */
  async predict(queries: string[]): Promise<Map<string, string[]>> {
    const start = performance.now();
    const urls = await mapWithConcurrency(queries, this.settings.concurrency, async (query) => {
      const results = await this.retrieval.retrieve(query, this.settings.predictionDepth);
      return results.map((r) => r.record.url).filter((url) => url.length > 0);
    });

    const predictions = new Map<string, string[]>();
    queries.forEach((query, i) => predictions.set(query, urls[i]));

    log.info(`Predicted ${queries.length} queries`, {
      concurrency: this.settings.concurrency,
      ms: Math.round(performance.now() - start),
    });
    return predictions;
  }

  evaluate(
    predictions: ReadonlyMap<string, readonly string[]>,
    groundTruth: ReadonlyMap<string, readonly string[]>,
  ): MeanRecallReport {
    return this.evaluator.evaluateSystem(predictions, groundTruth);
  }

  /**
   * Run the full pipeline and write its files under the output directory.
   */
  async run(options: EvaluationRunOptions): Promise<EvaluationRunResult> {
    const outputDir = options.outputDir ?? this.settings.outputDir;
    mkdirSync(outputDir, { recursive: true });

    const groundTruth = loadGroundTruth(options.groundTruthPath);
    if (groundTruth.size === 0) {
      log.warn(`No labeled queries in ${options.groundTruthPath}`);
    }

    const predictions = await this.predict([...groundTruth.keys()]);
    const report = this.evaluate(predictions, groundTruth);

    const files: string[] = [];
    const write = (name: string, content: string): void => {
      const path = join(outputDir, name);
      writeFileSync(path, content, 'utf-8');
      files.push(path);
    };

    write(TRAINING_PREDICTIONS_FILE, formatPredictionsCsv(predictions));

    if (options.testQueriesPath) {
      const testPredictions = await this.predict(loadQueries(options.testQueriesPath));
      write(TEST_PREDICTIONS_FILE, formatPredictionsCsv(testPredictions));
    }

    write(REPORT_TEXT_FILE, formatEvaluationReport(report));
    write(REPORT_JSON_FILE, JSON.stringify(report, null, 2) + '\n');

    log.info(`Evaluation complete. Results saved to ${outputDir}`, { files: files.length });
    return { report, files };
  }
}
