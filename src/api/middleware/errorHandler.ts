import { Request, Response, NextFunction } from 'express';
import { logger } from '../../config/logger';
import { clientErrorStatus, describeError, isBodyParseError } from '../../utils/errors';

/** Last middleware in the chain; Express recognises it by its four parameters. */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (isBodyParseError(err)) {
    res.status(400).json({ error: 'Malformed JSON body' });
    return;
  }
  // Oversized bodies (413), unsupported charsets or encodings (415) and the like.
  const status = clientErrorStatus(err);
  if (status !== undefined) {
    logger.warn('Rejected request body', { method: req.method, path: req.originalUrl, status });
    res.status(status).json({ error: describeError(err) });
    return;
  }
  logger.error('Unhandled request error', {
    method: req.method,
    path: req.originalUrl,
    error: describeError(err),
  });
  res.status(500).json({ error: 'Internal server error' });
}
