import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

import { asyncLocalStorage } from './log-context';
import { logger } from './logger';

export const CORRELATION_HEADER = 'x-correlation-id';

/**
 * Caller-supplied id when present, otherwise a fresh uuid
 */
export const resolveCorrelationId = (req: Request): string => {
  const supplied = req.headers[CORRELATION_HEADER];
  const value = Array.isArray(supplied) ? supplied[0] : supplied;
  return value && value.trim() !== '' ? value.trim() : uuid();
};

/**
 * Opens the request's log context. Everything logged while handling the
 * request, down to the store calls, carries the correlation id.
 */
export const correlationMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId = resolveCorrelationId(req);
  res.setHeader(CORRELATION_HEADER, correlationId);

  asyncLocalStorage.run({ correlationId }, () => {
    logger.debug({ method: req.method, path: req.path }, 'Request received');
    res.on('finish', () => {
      logger.info({ method: req.method, path: req.path, statusCode: res.statusCode }, 'Request handled');
    });
    next();
  });
};
