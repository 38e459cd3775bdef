import { Router } from 'express';
import type { VectorIndex } from '../../storage/types.js';
import { VERSION } from '../../version.js';
import { asyncHandler } from '../middleware/async-handler.js';

/**
 * GET /health → `{ status, version, catalogSize }`. Status is `degraded` until
 * the index has been built.
 */
export function createHealthRouter(index: VectorIndex): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const built = await index.isBuilt();
      res.json({
        status: built ? 'healthy' : 'degraded',
        version: VERSION,
        catalogSize: built ? await index.count() : 0,
      });
    }),
  );

  return router;
}
