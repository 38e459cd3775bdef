/**
 * Retrieval exports.
 */

export { RetrievalEngine, toQueryText } from './retrieval-engine.js';
export { buildQueryText, parseSkills } from './query-builder.js';
export { toRetrievalResultDto } from './dto.js';
export type { StructuredQuery, Query, RetrievalResult, RetrievalOutput } from './types.js';
