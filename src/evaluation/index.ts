/**
 * Evaluation exports.
 */

export { calculateRecallAtK, summarize, round4 } from './recall.js';
export type { RecallSummary } from './recall.js';
export { MeanRecallAtKEvaluator, DEFAULT_K_VALUES, recallMetric } from './evaluator.js';
export type { GroundTruthSet, PredictionSet, RecallMetric, MeanRecallReport } from './evaluator.js';
export { loadGroundTruth, loadQueries, parseGroundTruthCsv, parseGroundTruthJson, parseQueries } from './ground-truth.js';
export { formatPredictionsCsv, parsePredictionsCsv, PREDICTION_HEADER } from './prediction-export.js';
export { formatEvaluationReport } from './report.js';
export { EvaluationPipeline } from './pipeline.js';
export type { EvaluationRunOptions, EvaluationRunResult } from './pipeline.js';
