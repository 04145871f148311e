import { Request, Response, NextFunction } from 'express';
import { httpRequestsTotal, httpRequestDuration } from './metrics';

/**
 * Collapse the per-token and per-account segments so unmatched paths
 * do not create a label value each
 */
export const normalizePath = (path: string): string =>
  path
    .replace(/^\/tokens\/[^/]+/, '/tokens/:token')
    .replace(/^\/accounts\/[^/]+/, '/accounts/:accountNumber');

/**
 * Route template when a router matched, e.g. `/tokens/:token/use`
 */
export const routeLabel = (req: Request): string => {
  const template: unknown = req.route?.path;
  return typeof template === 'string' ? `${req.baseUrl}${template}` : normalizePath(req.path);
};

/**
 * Request count and latency per method, route and status
 */
export const metricsMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  if (req.path === '/metrics') {
    next();
    return;
  }

  const stopTimer = httpRequestDuration.startTimer();

  res.on('finish', () => {
    const labels = { method: req.method, path: routeLabel(req), status: String(res.statusCode) };
    httpRequestsTotal.inc(labels);
    stopTimer(labels);
  });

  next();
};
