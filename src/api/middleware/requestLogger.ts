import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../config/logger';

export const REQUEST_ID_HEADER = 'X-Request-Id';

/** Inbound ids are reused only when they are short and header/log safe. */
const INBOUND_REQUEST_ID = /^[A-Za-z0-9._-]{1,64}$/;

export function resolveRequestId(inbound: string | undefined): string {
  return inbound && INBOUND_REQUEST_ID.test(inbound) ? inbound : uuidv4();
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId = resolveRequestId(req.get(REQUEST_ID_HEADER));
  const startedAt = Date.now();
  res.setHeader(REQUEST_ID_HEADER, requestId);
  res.on('finish', () => {
    logger.info('Request completed', {
      requestId,
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - startedAt,
    });
  });
  next();
}
