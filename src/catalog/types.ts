/**
 * Catalog data types.
 */

/**
 * One catalog item as the pipeline sees it. Frozen after ingestion.
 */
export interface AssessmentRecord {
  /** Derived from the url (or the name when the url is empty). Stable across rebuilds. */
  readonly id: string;
  readonly name: string;
  readonly category: string;
  readonly description: string;
  /** Comma-joined list. */
  readonly skillsMeasured: string;
  /** Comma-joined list. */
  readonly jobSuitability: string;
  /** Comma-joined list. */
  readonly experienceLevel: string;
  readonly duration: string;
  readonly deliveryMethod: string;
  readonly url: string;
  /** Canonical text that gets embedded. */
  readonly fullText: string;
}

/**
 * Raw record as it arrives from a catalog file. List fields may be arrays or
 * already-joined strings.
 */
export interface CatalogIngestionRecord {
  name: string;
  category?: string;
  description?: string;
  skillsMeasured?: string | string[];
  jobSuitability?: string | string[];
  experienceLevel?: string | string[];
  duration?: string;
  deliveryMethod?: string;
  url?: string;
}

/** Shape returned over HTTP and by `search --json`. */
export interface RetrievalResultDto {
  rank: number;
  name: string;
  category: string;
  description: string;
  skillsMeasured: string;
  jobSuitability: string;
  experienceLevel: string;
  duration: string;
  deliveryMethod: string;
  url: string;
  similarityScore: number;
}
