/**
 * Express error middleware: maps recommender errors to HTTP status codes and
 * answers with `{ error, code }`.
 */

import type { Request, Response, NextFunction } from 'express';
import {
  ConfigurationError,
  NotFoundError,
  RecommenderError,
  RetrievalError,
  errorMessage,
} from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('server');

export function statusForError(err: unknown): number {
  if (err instanceof NotFoundError) return 404;
  if (err instanceof RetrievalError) return 400;
  if (err instanceof ConfigurationError) return 503;
  // body-parser errors carry their own status (e.g. 400 for malformed JSON)
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const status = statusForError(err);
  const message = errorMessage(err);

  if (status >= 500) {
    log.error(message, { status });
  } else {
    log.warn(message, { status });
  }

  res.status(status).json({
    error: message,
    code: err instanceof RecommenderError ? err.code : undefined,
  });
}
