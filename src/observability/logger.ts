import pino from 'pino';

import { config } from '../config';
import { asyncLocalStorage, LogContext } from './log-context';

/**
 * Request-scoped fields (correlationId, accountNumber, operation) merged into every line
 */
export const logContextMixin = (): Partial<LogContext> => asyncLocalStorage.getStore() ?? {};

/**
 * Pino logger configuration
 * - Production: JSON logs at info level
 * - Development: Pretty printed logs at debug level
 * - Test: Silent unless LOG_LEVEL overrides it
 */
export const logger = pino({
  level: config.logging.level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  mixin: logContextMixin,
  base: {
    service: 'prepaid-tokens',
    env: config.nodeEnv,
  },
  ...(config.logging.prettyPrint && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

// Child logger factory for service-specific logging
export const createServiceLogger = (serviceName: string) => {
  return logger.child({ service: serviceName });
};
