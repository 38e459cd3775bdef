/**
 * Catalog file loading.
 *
 * Accepts a JSON array, a `{ assessments: [...] }` object, or a CSV with a
 * header row. Column names are matched case-insensitively with `_`, `-` and
 * spaces ignored, so `skills_measured`, `Skills Measured` and
 * `skillsMeasured` all resolve to the same field.
 */

import { existsSync, readFileSync } from 'node:fs';
import { extname } from 'node:path';
import Papa from 'papaparse';
import { toAssessmentRecord } from './full-text.js';
import type { AssessmentRecord, CatalogIngestionRecord } from './types.js';
import { IngestionError, NotFoundError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('catalog-loader');

type Row = Record<string, unknown>;

const FIELD_ALIASES: Record<keyof CatalogIngestionRecord, string[]> = {
  name: ['name', 'assessmentname', 'title'],
  category: ['category', 'testtype'],
  description: ['description'],
  skillsMeasured: ['skillsmeasured', 'skills'],
  jobSuitability: ['jobsuitability', 'suitablefor'],
  experienceLevel: ['experiencelevel', 'experiencelevels', 'joblevels'],
  duration: ['duration', 'assessmentlength'],
  deliveryMethod: ['deliverymethod', 'remotetesting'],
  url: ['url', 'assessmenturl', 'link'],
};

function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[\s_-]+/g, '');
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

function asList(value: unknown): string | string[] | undefined {
  if (Array.isArray(value)) {
    return value.map(asText).filter((v): v is string => v !== undefined);
  }
  return asText(value);
}

/**
 * Map a loosely keyed row onto an ingestion record. Returns null when the row
 * has no name.
 */
export function normalizeIngestionRow(row: Row): CatalogIngestionRecord | null {
  const byKey = new Map<string, unknown>();
  for (const [key, value] of Object.entries(row)) {
    byKey.set(normalizeKey(key), value);
  }

  const lookup = (field: keyof CatalogIngestionRecord): unknown => {
    for (const alias of FIELD_ALIASES[field]) {
      if (byKey.has(alias)) return byKey.get(alias);
    }
    return undefined;
  };

  const name = asText(lookup('name'))?.trim();
  if (!name) {
    return null;
  }

  return {
    name,
    category: asText(lookup('category')),
    description: asText(lookup('description')),
    skillsMeasured: asList(lookup('skillsMeasured')),
    jobSuitability: asList(lookup('jobSuitability')),
    experienceLevel: asList(lookup('experienceLevel')),
    duration: asText(lookup('duration')),
    deliveryMethod: asText(lookup('deliveryMethod')),
    url: asText(lookup('url')),
  };
}

function toRecords(rows: unknown[], source: string): AssessmentRecord[] {
  const records: AssessmentRecord[] = [];
  const seen = new Set<string>();
  let skipped = 0;

  rows.forEach((row, index) => {
    const ingestion = isRow(row) ? normalizeIngestionRow(row) : null;
    if (!ingestion) {
      skipped++;
      log.warn(`Skipping catalog row ${index + 1} in ${source}: no name`);
      return;
    }
    const record = toAssessmentRecord(ingestion);
    if (seen.has(record.id)) {
      skipped++;
      log.warn(`Skipping duplicate catalog entry "${record.name}" in ${source}`, { id: record.id });
      return;
    }
    seen.add(record.id);
    records.push(record);
  });

  log.info(`Parsed ${records.length} assessments from ${source}`, { skipped });
  return records;
}

/**
 * Parse a JSON catalog: an array of records or `{ assessments: [...] }`.
 */
export function parseCatalogJson(text: string, source = 'json'): AssessmentRecord[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new IngestionError(`Invalid JSON in ${source}: ${errorMessage(error)}`, 'CATALOG_PARSE_FAILED', error);
  }

  if (Array.isArray(parsed)) {
    return toRecords(parsed, source);
  }
  if (isRow(parsed) && Array.isArray(parsed.assessments)) {
    return toRecords(parsed.assessments, source);
  }
  throw new IngestionError(
    `${source} must hold an array of assessments or an object with an "assessments" array`,
    'CATALOG_PARSE_FAILED',
  );
}

/**
 * Parse a CSV catalog with a header row.
 */
export function parseCatalogCsv(text: string, source = 'csv'): AssessmentRecord[] {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    delimiter: ',',
    skipEmptyLines: 'greedy',
  });

  // Field-count mismatches are tolerated; quoting errors are not
  const fatal = result.errors.filter((e) => e.type === 'Quotes');
  if (fatal.length > 0) {
    const first = fatal[0];
    throw new IngestionError(
      `Malformed CSV in ${source} at row ${first.row ?? '?'}: ${first.message}`,
      'CATALOG_PARSE_FAILED',
    );
  }

  return toRecords(result.data, source);
}

/**
 * Load a catalog file by extension (.json or .csv).
 *
 * @throws NotFoundError `FILE_NOT_FOUND`
 * @throws IngestionError `UNSUPPORTED_FORMAT` | `CATALOG_PARSE_FAILED`
 */
export function loadCatalog(path: string): AssessmentRecord[] {
  if (!existsSync(path)) {
    throw new NotFoundError(`Catalog file not found: ${path}`, 'FILE_NOT_FOUND');
  }

  const ext = extname(path).toLowerCase();
  const text = readFileSync(path, 'utf-8').replace(/^\uFEFF/, '');

  switch (ext) {
    case '.json':
      return parseCatalogJson(text, path);
    case '.csv':
      return parseCatalogCsv(text, path);
    default:
      throw new IngestionError(`Unsupported catalog format "${ext}" (expected .json or .csv)`, 'UNSUPPORTED_FORMAT');
  }
}
