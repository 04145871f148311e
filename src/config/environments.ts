/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, TOKEN_CONFIG } from './environments';
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

/**
 * MongoDB URI by environment
 *
 * Generate runs inside a multi-document transaction, so the target
 * must be a replica set (a single-node `rs0` is enough locally).
 */
export const MONGODB_URI = isProduction
  ? process.env.MONGODB_URI || 'mongodb://mongodb:27017/prepaid-tokens?replicaSet=rs0'
  : isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/prepaid-tokens-test?replicaSet=rs0'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/prepaid-tokens?replicaSet=rs0';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// TOKEN POLICY
// =============================================================================

/**
 * Positive integer from the environment, or the fallback when unset or malformed
 */
export const positiveIntFromEnv = (name: string, fallback: number): number => {
  const parsed = Number(process.env[name]);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

/**
 * Token lifecycle settings
 *
 * ttlMs and digits are fixed policy, not environment driven.
 * The attempt limits bound the retry loops around minting.
 */
export const TOKEN_CONFIG = {
  ttlMs: 24 * 60 * 60 * 1000,
  digits: 10,
  mintMaxAttempts: positiveIntFromEnv('TOKEN_MINT_MAX_ATTEMPTS', 20),
  generateMaxAttempts: positiveIntFromEnv('TOKEN_GENERATE_MAX_ATTEMPTS', 3),
};

/**
 * Accounts provisioned by the demo script
 */
export const DEMO_ACCOUNTS: ReadonlyArray<{ accountNumber: string; initialBalance: number }> = [
  { accountNumber: 'ACC001', initialBalance: 100.0 },
  { accountNumber: 'ACC002', initialBalance: 50.0 },
];

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: parseInt(process.env.PORT || '3000', 10),
  corsOrigins: isProduction
    ? (process.env.CORS_ORIGINS || '').split(',').filter(Boolean)
    : ['http://localhost:3000', 'http://localhost:3001', 'http://127.0.0.1:3000'],
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

/**
 * Logging configuration by environment
 */
export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: !isProduction && !isTest,
};

// =============================================================================
// SECURITY CONFIGURATION
// =============================================================================

export const SECURITY_CONFIG = {
  contentSecurityPolicy: isProduction,
  hsts: isProduction,
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = ['MONGODB_URI', 'CORS_ORIGINS'];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }
};

// =============================================================================
// DEBUG / INFO
// =============================================================================

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  mongoHost: MONGODB_URI.split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
});
