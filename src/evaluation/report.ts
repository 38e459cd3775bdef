/**
 * Plain-text evaluation report.
 */

import type { MeanRecallReport } from './evaluator.js';

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);

export function formatEvaluationReport(report: MeanRecallReport): string {
  const lines: string[] = [
    RULE,
    'ASSESSMENT RECOMMENDER - EVALUATION REPORT',
    'Mean Recall@K Metric',
    RULE,
    '',
    'SUMMARY',
    THIN_RULE,
    `Queries Evaluated: ${report.queriesEvaluated}`,
    '',
  ];

  for (const [metric, stats] of Object.entries(report.summary)) {
    lines.push(
      `${metric}:`,
      `  Mean:  ${stats.mean.toFixed(4)}`,
      `  Std:   ${stats.std.toFixed(4)}`,
      `  Min:   ${stats.min.toFixed(4)}`,
      `  Max:   ${stats.max.toFixed(4)}`,
      '',
    );
  }

  if (report.missingQueries.length > 0) {
    lines.push(`Missing Predictions: ${report.missingQueries.length}`);
    for (const queryId of report.missingQueries) {
      lines.push(`  ${queryId}`);
    }
    lines.push('');
  }

  lines.push('', 'PER-QUERY RESULTS', THIN_RULE);
  for (const [queryId, recalls] of Object.entries(report.perQueryRecall)) {
    lines.push(`${queryId}:`);
    for (const [metric, value] of Object.entries(recalls)) {
      lines.push(`  ${metric}: ${value.toFixed(4)}`);
    }
  }

  lines.push('', RULE);
  return lines.join('\n');
}
