/**
 * Prediction CSV: header `Query,Assessment_URL`, one row per (query, item),
 * CRLF line endings. Rows keep rank order within a query block and query
 * blocks keep input order: graders read the file positionally.
 */

import { existsSync, readFileSync } from 'node:fs';
import Papa from 'papaparse';
import { IngestionError, NotFoundError } from '../utils/errors.js';

export const PREDICTION_HEADER = ['Query', 'Assessment_URL'] as const;

const NEWLINE = '\r\n';

/**
 * Serialize predictions. Empty URLs are skipped. Every row, the last
 * included, ends in CRLF.
 */
export function formatPredictionsCsv(predictions: ReadonlyMap<string, readonly string[]>): string {
  const rows: string[][] = [];
  for (const [query, urls] of predictions) {
    for (const url of urls) {
      if (url) rows.push([query, url]);
    }
  }

  // papaparse already ends a header-only document with a newline
  if (rows.length === 0) {
    return PREDICTION_HEADER.join(',') + NEWLINE;
  }

  return (
    Papa.unparse(
      { fields: [...PREDICTION_HEADER], data: rows },
      { newline: NEWLINE },
    ) + NEWLINE
  );
}

/**
 * Read a prediction CSV back into the canonical form (queryId → URLs in rank
 * order).
 *
 * @throws IngestionError `PREDICTIONS_PARSE_FAILED`
 */
export function parsePredictionsCsv(text: string): Map<string, string[]> {
  const result = Papa.parse<Record<string, string>>(text.replace(/^\uFEFF/, ''), {
    header: true,
    delimiter: ',',
    skipEmptyLines: 'greedy',
  });

  const fields = result.meta.fields ?? [];
  if (!PREDICTION_HEADER.every((h) => fields.includes(h))) {
    throw new IngestionError(
      `Prediction CSV must have columns ${PREDICTION_HEADER.join(',')}, got ${fields.join(',')}`,
      'PREDICTIONS_PARSE_FAILED',
    );
  }

  const predictions = new Map<string, string[]>();
  for (const row of result.data) {
    const query = row.Query;
    const url = row.Assessment_URL;
    if (!query || !url) continue;
    const list = predictions.get(query) ?? [];
    list.push(url);
    predictions.set(query, list);
  }
  return predictions;
}

/**
 * @throws NotFoundError `FILE_NOT_FOUND`
 * @throws IngestionError `PREDICTIONS_PARSE_FAILED`
 */
export function loadPredictions(path: string): Map<string, string[]> {
  if (!existsSync(path)) {
    throw new NotFoundError(`File not found: ${path}`, 'FILE_NOT_FOUND');
  }
  return parsePredictionsCsv(readFileSync(path, 'utf-8'));
}
