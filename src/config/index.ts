import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  MONGODB_URI,
  MONGODB_CONFIG,
  TOKEN_CONFIG,
  DEMO_ACCOUNTS,
  API_CONFIG,
  LOG_CONFIG,
  SECURITY_CONFIG,
  validateProductionEnv,
  getEnvironmentInfo,
} from './environments';

export { isProduction, isDevelopment, isTest, validateProductionEnv, getEnvironmentInfo };

export * from './environments';

if (isProduction) {
  validateProductionEnv();
}

/**
 * Main application configuration object
 *
 * For environment-specific values, you can also import directly from './environments'
 */
export const config = {
  // Environment
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,

  // Server
  port: API_CONFIG.port,

  // MongoDB
  mongodb: {
    uri: MONGODB_URI,
    ...MONGODB_CONFIG,
  },

  // Token policy
  token: TOKEN_CONFIG,
  demoAccounts: DEMO_ACCOUNTS,

  // API
  api: {
    bodyLimit: API_CONFIG.bodyLimit,
    corsOrigins: API_CONFIG.corsOrigins,
  },

  // Logging
  logging: LOG_CONFIG,

  // Security
  security: SECURITY_CONFIG,
};
