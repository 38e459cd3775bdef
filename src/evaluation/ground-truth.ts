/**
 * Ground-truth and query-list loading.
 *
 * CSV: a query column (`Query`, `query_id` or `query`) plus either one URL per
 * row (`Assessment_URL`) or a URL list per row (`Assessment_URLs`,
 * `assessment_urls` or `assessments`, as a comma list or a JSON array).
 *
 * JSON: a list of `{ query_id | id | query, assessment_urls | assessments }`
 * or a plain `{ queryId: urls }` object.
 *
 * Rows for the same query accumulate in file order; duplicate URLs collapse.
 */

import { existsSync, readFileSync } from 'node:fs';
import { extname } from 'node:path';
import Papa from 'papaparse';
import { IngestionError, NotFoundError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('ground-truth');

const QUERY_KEYS = ['Query', 'query_id', 'query', 'id'];
const SINGLE_URL_KEYS = ['Assessment_URL', 'assessment_url', 'url'];
const URL_LIST_KEYS = ['Assessment_URLs', 'assessment_urls', 'assessments'];

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstText(row: Row, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = row[key];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
  }
  return undefined;
}

function firstValue(row: Row, keys: string[]): unknown {
  for (const key of keys) {
    if (row[key] !== undefined && row[key] !== null && row[key] !== '') {
      return row[key];
    }
  }
  return undefined;
}

/**
 * Normalize a URL field: an array, a JSON array string, or a comma list.
 */
export function parseUrlList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === 'string').map((v) => v.trim()).filter(Boolean);
  }
  if (typeof value !== 'string') {
    return [];
  }

  const text = value.trim();
  if (text.startsWith('[')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new IngestionError(`Invalid URL list "${text}": ${errorMessage(error)}`, 'GROUND_TRUTH_PARSE_FAILED', error);
    }
    return parseUrlList(parsed);
  }
  return text
    .split(',')
    .map((u) => u.trim())
    .filter(Boolean);
}

class GroundTruthBuilder {
  private readonly entries = new Map<string, string[]>();

  add(queryId: string, urls: string[]): void {
    const existing = this.entries.get(queryId) ?? [];
    for (const url of urls) {
      if (!existing.includes(url)) existing.push(url);
    }
    this.entries.set(queryId, existing);
  }

  build(): Map<string, string[]> {
    return this.entries;
  }
}

function addRows(rows: unknown[], builder: GroundTruthBuilder, source: string): void {
  let skipped = 0;
  for (const row of rows) {
    if (!isRow(row)) {
      skipped++;
      continue;
    }
    const queryId = firstText(row, QUERY_KEYS);
    const single = firstText(row, SINGLE_URL_KEYS);
    const urls = single !== undefined ? [single] : parseUrlList(firstValue(row, URL_LIST_KEYS));
    if (!queryId || urls.length === 0) {
      skipped++;
      continue;
    }
    builder.add(queryId, urls);
  }
  if (skipped > 0) {
    log.warn(`Skipped ${skipped} ground-truth rows without a query or URLs`, { source });
  }
}

export function parseGroundTruthCsv(text: string, source = 'csv'): Map<string, string[]> {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    delimiter: ',',
    skipEmptyLines: 'greedy',
  });
  const quoteErrors = result.errors.filter((e) => e.type === 'Quotes');
  if (quoteErrors.length > 0) {
    throw new IngestionError(`Malformed CSV in ${source}: ${quoteErrors[0].message}`, 'GROUND_TRUTH_PARSE_FAILED');
  }

  const builder = new GroundTruthBuilder();
  addRows(result.data, builder, source);
  return builder.build();
}

export function parseGroundTruthJson(text: string, source = 'json'): Map<string, string[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new IngestionError(`Invalid JSON in ${source}: ${errorMessage(error)}`, 'GROUND_TRUTH_PARSE_FAILED', error);
  }

  const builder = new GroundTruthBuilder();
  if (Array.isArray(parsed)) {
    addRows(parsed, builder, source);
  } else if (isRow(parsed)) {
    for (const [queryId, urls] of Object.entries(parsed)) {
      const list = parseUrlList(urls);
      if (queryId.trim() && list.length > 0) {
        builder.add(queryId.trim(), list);
      }
    }
  } else {
    throw new IngestionError(`${source} must hold a list or an object`, 'GROUND_TRUTH_PARSE_FAILED');
  }
  return builder.build();
}

function readInput(path: string): { ext: string; text: string } {
  if (!existsSync(path)) {
    throw new NotFoundError(`File not found: ${path}`, 'FILE_NOT_FOUND');
  }
  return {
    ext: extname(path).toLowerCase(),
    text: readFileSync(path, 'utf-8').replace(/^\uFEFF/, ''),
  };
}

/**
 * @throws NotFoundError `FILE_NOT_FOUND`
 * @throws IngestionError `UNSUPPORTED_FORMAT` | `GROUND_TRUTH_PARSE_FAILED`
 */
export function loadGroundTruth(path: string): Map<string, string[]> {
  const { ext, text } = readInput(path);

  let groundTruth: Map<string, string[]>;
  if (ext === '.csv') {
    groundTruth = parseGroundTruthCsv(text, path);
  } else if (ext === '.json') {
    groundTruth = parseGroundTruthJson(text, path);
  } else {
    throw new IngestionError(`Unsupported ground-truth format "${ext}" (expected .csv or .json)`, 'UNSUPPORTED_FORMAT');
  }

  log.info(`Loaded ${groundTruth.size} labeled queries from ${path}`);
  return groundTruth;
}

/**
 * Parse an unlabeled query list. Any URL columns are ignored; duplicate
 * queries collapse.
 */
export function parseQueries(text: string, ext: string, source = ext): string[] {
  const queries: string[] = [];
  const add = (q: string | undefined): void => {
    if (q && !queries.includes(q)) queries.push(q);
  };

  if (ext === '.txt') {
    text.split(/\r?\n/).forEach((line) => add(line.trim()));
  } else if (ext === '.csv') {
    const result = Papa.parse<Record<string, string>>(text, {
      header: true,
      delimiter: ',',
      skipEmptyLines: 'greedy',
    });
    for (const row of result.data) add(firstText(row, QUERY_KEYS));
  } else if (ext === '.json') {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new IngestionError(`Invalid JSON in ${source}: ${errorMessage(error)}`, 'GROUND_TRUTH_PARSE_FAILED', error);
    }
    if (!Array.isArray(parsed)) {
      throw new IngestionError(`${source} must hold a list of queries`, 'GROUND_TRUTH_PARSE_FAILED');
    }
    for (const item of parsed) {
      add(typeof item === 'string' ? item.trim() : isRow(item) ? firstText(item, QUERY_KEYS) : undefined);
    }
  } else {
    throw new IngestionError(`Unsupported query file format "${ext}" (expected .csv, .json or .txt)`, 'UNSUPPORTED_FORMAT');
  }

  return queries;
}

/**
 * @throws NotFoundError `FILE_NOT_FOUND`
 */
export function loadQueries(path: string): string[] {
  const { ext, text } = readInput(path);
  const queries = parseQueries(text, ext, path);
  log.info(`Loaded ${queries.length} queries from ${path}`);
  return queries;
}
