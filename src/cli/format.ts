/**
 * Terminal formatting for retrieval results.
 */

import type { RetrievalResult } from '../retrieval/types.js';

export type ScoreBand = 'High' | 'Medium' | 'Low';

export function scoreBand(score: number): ScoreBand {
  if (score >= 0.7) return 'High';
  if (score >= 0.3) return 'Medium';
  return 'Low';
}

export function formatResult(result: RetrievalResult): string {
  const { rank, record, similarityScore } = result;
  const lines = [`${rank}. ${record.name} (${scoreBand(similarityScore)}, ${similarityScore.toFixed(3)})`];
  if (record.category) lines.push(`   Category: ${record.category}`);
  if (record.duration) lines.push(`   Duration: ${record.duration}`);
  if (record.url) lines.push(`   ${record.url}`);
  return lines.join('\n');
}

export function formatResults(results: RetrievalResult[]): string {
  if (results.length === 0) return 'No matching assessments.';
  return results.map(formatResult).join('\n\n');
}
