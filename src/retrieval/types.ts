/**
 * Types for query canonicalization and retrieval.
 */

import type { AssessmentRecord } from '../catalog/types.js';

/**
 * Structured hiring query.
 */
export interface StructuredQuery {
  title: string;
  skills: string[];
  experienceLevel: string;
  context?: string;
}

/** A structured query or free text. */
export type Query = StructuredQuery | string;

export interface RetrievalResult {
  /** 1-based position. */
  rank: number;
  record: AssessmentRecord;
  /** 1 - cosine distance. Non-increasing across ranks. */
  similarityScore: number;
}

export interface RetrievalOutput {
  /** The exact text that was embedded. */
  queryText: string;
  results: RetrievalResult[];
}
