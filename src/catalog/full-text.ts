/**
 * Normalization of ingestion records into frozen AssessmentRecords.
 */

import { createHash } from 'node:crypto';
import type { AssessmentRecord, CatalogIngestionRecord } from './types.js';

/**
 * Collapse whitespace, drop characters outside word/space/`.,!?()-`, trim.
 */
export function cleanText(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .replace(/[^\p{L}\p{N}_\s.,!?()-]/gu, '')
    .trim();
}

/**
 * Join list-valued fields with ", ". Blank entries are dropped.
 */
export function joinList(value: string | string[] | undefined): string {
  if (value === undefined) return '';
  if (typeof value === 'string') return value.trim();
  return value
    .map((v) => v.trim())
    .filter((v) => v.length > 0)
    .join(', ');
}

type FullTextFields = Pick<
  AssessmentRecord,
  'name' | 'category' | 'description' | 'skillsMeasured' | 'jobSuitability' | 'experienceLevel'
>;

/**
 * Canonical embedding text for a record.
 */
export function buildFullText(fields: FullTextFields): string {
  return [
    `Assessment: ${fields.name}`,
    `Category: ${fields.category}`,
    `Description: ${fields.description}`,
    `Skills Measured: ${fields.skillsMeasured}`,
    `Suitable for: ${fields.jobSuitability}`,
    `Experience Levels: ${fields.experienceLevel}`,
  ].join(' | ');
}

/**
 * Deterministic id: the first 16 hex chars of sha256 over the url, or over
 * `name:<name>` when the url is empty.
 */
export function deriveRecordId(url: string, name: string): string {
  const key = url.length > 0 ? url : `name:${name}`;
  return createHash('sha256').update(key).digest('hex').slice(0, 16);
}

/**
 * Clean an ingestion record and freeze it.
 */
export function toAssessmentRecord(raw: CatalogIngestionRecord): AssessmentRecord {
  const name = cleanText(raw.name);
  const url = (raw.url ?? '').trim();
  const fields: FullTextFields = {
    name,
    category: cleanText(raw.category ?? ''),
    description: cleanText(raw.description ?? ''),
    skillsMeasured: joinList(raw.skillsMeasured),
    jobSuitability: joinList(raw.jobSuitability),
    experienceLevel: joinList(raw.experienceLevel),
  };

  return Object.freeze({
    id: deriveRecordId(url, name),
    ...fields,
    duration: cleanText(raw.duration ?? ''),
    deliveryMethod: cleanText(raw.deliveryMethod ?? ''),
    url,
    fullText: buildFullText(fields),
  });
}

const RECORD_FIELDS = [
  'id',
  'name',
  'category',
  'description',
  'skillsMeasured',
  'jobSuitability',
  'experienceLevel',
  'duration',
  'deliveryMethod',
  'url',
  'fullText',
] as const satisfies readonly (keyof AssessmentRecord)[];

/**
 * Type guard for records read back from storage.
 */
export function isAssessmentRecord(value: unknown): value is AssessmentRecord {
  if (typeof value !== 'object' || value === null) return false;
  const fields = new Map<string, unknown>(Object.entries(value));
  return RECORD_FIELDS.every((field) => typeof fields.get(field) === 'string');
}
