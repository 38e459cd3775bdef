/**
 * Standardized error types for the recommender.
 *
 * All errors extend from RecommenderError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 *
 * ## Failure policy
 *
 * | Error | Effect |
 * |-------|--------|
 * | `ConfigurationError` | Fatal to the call (index not built, dimension mismatch, bad config) |
 * | `NotFoundError` | Fatal to the call (unknown collection, missing file) |
 * | `RetrievalError` | Fatal to the call (invalid query or k) |
 * | `GenerationError` | Never fatal: the recommendation engine logs it and drops the explanation |
 *
 * ## Usage
 *
 * ```typescript
 * import { ConfigurationError, StorageError } from './errors.js';
 *
 * throw new ConfigurationError('Index has not been built', 'INDEX_NOT_BUILT');
 *
 * try {
 *   openDatabase(path);
 * } catch (err) {
 *   throw new StorageError('Cannot open catalog database', 'DB_OPEN_FAILED', err);
 * }
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all recommender errors.
 */
export class RecommenderError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  override readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof RecommenderError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A precondition of the pipeline is not met.
 *
 * Common codes:
 * - `INDEX_NOT_BUILT`: Query issued before `build()`
 * - `INDEX_BUILDING`: Query issued while a build is in flight
 * - `DIMENSION_MISMATCH`: Vector length differs from the index dimension
 * - `UNKNOWN_MODEL`: Embedding model id not in the registry
 * - `MODEL_NOT_LOADED`: Embedder used before `load()`
 * - `CONFIG_INVALID`: Configuration validation failed
 * - `INVALID_K_VALUES`: Evaluator K values are not positive integers
 */
export class ConfigurationError extends RecommenderError {}

// ─────────────────────────────────────────────────────────────────────────────
// Lookup Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Common codes:
 * - `COLLECTION_NOT_FOUND`: Named collection was never built
 * - `FILE_NOT_FOUND`: Catalog, ground truth or query file missing
 */
export class NotFoundError extends RecommenderError {}

// ─────────────────────────────────────────────────────────────────────────────
// Storage Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Common codes:
 * - `DB_OPEN_FAILED`: Cannot open the SQLite database
 * - `ENCRYPTION_KEY_MISSING`: Encryption enabled but no key in the environment
 * - `ENTRY_CORRUPT`: A stored catalog entry does not decode to a record
 */
export class StorageError extends RecommenderError {}

// ─────────────────────────────────────────────────────────────────────────────
// Embedding Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Common codes:
 * - `MODEL_LOAD_FAILED`: No API key for the embedding provider
 * - `EMBED_FAILED`: The API call failed or returned malformed vectors
 */
export class EmbeddingError extends RecommenderError {}

// ─────────────────────────────────────────────────────────────────────────────
// Retrieval Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Common codes:
 * - `EMPTY_QUERY`: Free-text query is blank
 * - `INVALID_K`: k is not a finite integer
 */
export class RetrievalError extends RecommenderError {}

// ─────────────────────────────────────────────────────────────────────────────
// Generation Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Failures of the external explanation step. Always recovered locally.
 *
 * Common codes:
 * - `NO_API_KEY`: ANTHROPIC_API_KEY is not set
 * - `GENERATION_FAILED`: The API call failed (network, auth, quota)
 * - `GENERATION_TIMEOUT`: The call exceeded its timeout
 * - `EMPTY_RESPONSE`: The response carried no text
 */
export class GenerationError extends RecommenderError {}

// ─────────────────────────────────────────────────────────────────────────────
// Ingestion Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Common codes:
 * - `CATALOG_PARSE_FAILED`: Catalog file is malformed
 * - `GROUND_TRUTH_PARSE_FAILED`: Ground-truth file is malformed
 * - `PREDICTIONS_PARSE_FAILED`: Prediction CSV is malformed
 * - `UNSUPPORTED_FORMAT`: File extension is neither .json nor .csv
 */
export class IngestionError extends RecommenderError {}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof RecommenderError && error.code === code;
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

