import type { RetrievalResultDto } from '../catalog/types.js';
import type { RetrievalResult } from './types.js';

/**
 * Flatten a result for JSON output.
 */
export function toRetrievalResultDto(result: RetrievalResult): RetrievalResultDto {
  const { record } = result;
  return {
    rank: result.rank,
    name: record.name,
    category: record.category,
    description: record.description,
    skillsMeasured: record.skillsMeasured,
    jobSuitability: record.jobSuitability,
    experienceLevel: record.experienceLevel,
    duration: record.duration,
    deliveryMethod: record.deliveryMethod,
    url: record.url,
    similarityScore: result.similarityScore,
  };
}
