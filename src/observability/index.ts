// Logger exports
export { logger, createServiceLogger } from './logger';

// Log context exports
export {
  LogContext,
  asyncLocalStorage,
  getCorrelationId,
  addLogContext,
  runWithContext,
} from './log-context';

// Correlation middleware
export { correlationMiddleware } from './correlation';

// Metrics exports
export {
  httpRequestsTotal,
  httpRequestDuration,
  paymentsTotal,
  paymentAmount,
  tokensMintedTotal,
  tokenMintCollisionsTotal,
  tokenChecksTotal,
  resetMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Metrics middleware
export { metricsMiddleware } from './metrics.middleware';
