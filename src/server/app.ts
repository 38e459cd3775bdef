import express from 'express';
import type { Express } from 'express';
import type { RecommendationEngine } from '../recommendation/recommendation-engine.js';
import type { VectorIndex } from '../storage/types.js';
import { createLogger } from '../utils/logger.js';
import { errorHandler } from './middleware/error-handler.js';
import { createHealthRouter } from './routes/health.js';
import { createRecommendRouter } from './routes/recommend.js';

const log = createLogger('server');

export interface AppDependencies {
  recommender: RecommendationEngine;
  index: VectorIndex;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();
  app.use(express.json({ limit: '100kb' }));

  app.use('/health', createHealthRouter(deps.index));
  app.use('/recommend', createRecommendRouter(deps.recommender));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Must come after all routes
  app.use(errorHandler);

  return app;
}

/**
 * Listen on `port` until SIGINT/SIGTERM.
 */
export function startServer(app: Express, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      log.info(`Recommender API listening on http://localhost:${port}`);

      const shutdown = (): void => {
        log.info('Shutting down server');
        server.close(() => resolve());
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        log.error(`Port ${port} is already in use. Try: arec serve --port ${port + 1}`);
      }
      reject(err);
    });
  });
}
