import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'prepaid-tokens' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Payment Metrics
// ============================================

/**
 * Payments recorded, by status
 */
export const paymentsTotal = new Counter({
  name: 'payments_total',
  help: 'Payments recorded by status',
  labelNames: ['status'] as const, // completed, failed
  registers: [registry],
});

export const paymentAmount = new Histogram({
  name: 'payment_amount',
  help: 'Completed payment amounts',
  buckets: [1, 5, 10, 25, 50, 100, 500, 1000, 5000],
  registers: [registry],
});

// ============================================
// Token Metrics
// ============================================

export const tokensMintedTotal = new Counter({
  name: 'tokens_minted_total',
  help: 'Tokens minted',
  registers: [registry],
});

/**
 * Candidate identifiers discarded because they were already taken
 */
export const tokenMintCollisionsTotal = new Counter({
  name: 'token_mint_collisions_total',
  help: 'Token candidates rejected as already present',
  registers: [registry],
});

export const tokenChecksTotal = new Counter({
  name: 'token_checks_total',
  help: 'Token validate/use outcomes',
  labelNames: ['operation', 'result'] as const,
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

export const getMetricsContentType = (): string => {
  return registry.contentType;
};
