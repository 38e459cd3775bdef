/**
 * POST /recommend
 *
 * Body: `{ query }` (free text) or `{ title, skills, experienceLevel, context? }`,
 * plus optional `k` and `explain`. `skills` may be an array or a comma list.
 */

import { Router } from 'express';
import type { RecommendationEngine } from '../../recommendation/recommendation-engine.js';
import { parseSkills } from '../../retrieval/query-builder.js';
import { toRetrievalResultDto } from '../../retrieval/dto.js';
import type { Query } from '../../retrieval/types.js';
import { asyncHandler } from '../middleware/async-handler.js';

type Body = Record<string, unknown>;

export interface RecommendRequest {
  query: Query;
  k?: number;
  explain?: boolean;
}

function isBody(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(body: Body, key: string): string | undefined {
  const value = body[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Validate a request body. Returns an error message on failure.
 */
export function parseRecommendRequest(body: unknown): RecommendRequest | string {
  if (!isBody(body)) {
    return 'Request body must be a JSON object';
  }

  const { k, explain } = body;
  if (k !== undefined && (typeof k !== 'number' || !Number.isInteger(k) || k < 1)) {
    return '"k" must be a positive integer';
  }
  if (explain !== undefined && typeof explain !== 'boolean') {
    return '"explain" must be a boolean';
  }

  const text = optionalString(body, 'query');
  if (text !== undefined) {
    if (text.trim().length === 0) {
      return '"query" must not be empty';
    }
    return { query: text, k, explain };
  }

  const title = optionalString(body, 'title');
  const experienceLevel = optionalString(body, 'experienceLevel');
  const rawSkills = body.skills;
  const skills =
    typeof rawSkills === 'string'
      ? parseSkills(rawSkills)
      : Array.isArray(rawSkills) && rawSkills.every((s) => typeof s === 'string')
        ? rawSkills.filter((s): s is string => typeof s === 'string')
        : undefined;

  if (!title?.trim() || experienceLevel === undefined || skills === undefined) {
    return 'Provide "query", or "title", "skills" and "experienceLevel"';
  }

  return {
    query: { title, skills, experienceLevel, context: optionalString(body, 'context') },
    k,
    explain,
  };
}

export function createRecommendRouter(engine: RecommendationEngine): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const parsed = parseRecommendRequest(req.body);
      if (typeof parsed === 'string') {
        res.status(400).json({ error: parsed });
        return;
      }

      const options = { k: parsed.k, explain: parsed.explain };
      const result =
        typeof parsed.query === 'string'
          ? await engine.recommendFromText(parsed.query, options)
          : await engine.recommend(parsed.query, options);

      res.json({
        queryText: result.queryText,
        recommendations: result.results.map(toRetrievalResultDto),
        explanation: result.explanation,
        explanationError: result.explanationError,
        retrievalCount: result.retrievalCount,
      });
    }),
  );

  return router;
}
