/**
 * Error Handling Middleware
 *
 * Provides centralized error handling with consistent error response format,
 * error logging, and appropriate error sanitization for production.
 */

import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { logger, getCorrelationId } from '../observability';
import { ErrorCode, ErrorResponse, errorCodeToStatus } from '../types/errors';

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
}

/**
 * Main error handler middleware
 *
 * Catches all errors and returns a consistent JSON response format.
 * Logs errors with correlation ID for traceability.
 */
export const errorHandler = (
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const errorCode = err.errorCode || ErrorCode.INTERNAL_ERROR;
  const statusCode = err.statusCode || errorCodeToStatus[errorCode] || 500;

  logger.error(
    {
      errorCode,
      statusCode,
      error: err.message,
      stack: config.isDevelopment ? err.stack : undefined,
      path: req.path,
      method: req.method,
      isOperational: err.isOperational,
    },
    `Error: ${err.message}`
  );

  // Sanitize error message for production 5xx errors
  const message =
    config.isProduction && statusCode >= 500
      ? 'Internal server error'
      : err.message || 'An error occurred';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      message,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  if (err.validationErrors) {
    response.error.details = err.validationErrors;
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: ErrorCode.RESOURCE_NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  res.status(404).json(response);
};

/**
 * API Error class for throwing operational errors
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  validationErrors?: Record<string, string[]>;

  constructor(
    errorCode: ErrorCode,
    message: string,
    options?: {
      statusCode?: number;
      isOperational?: boolean;
      validationErrors?: Record<string, string[]>;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ApiError';
    this.errorCode = errorCode;
    this.statusCode = options?.statusCode || errorCodeToStatus[errorCode] || 500;
    this.isOperational = options?.isOperational ?? true;
    this.validationErrors = options?.validationErrors;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Factory methods for common errors
   */
  static validationError(
    message: string,
    validationErrors?: Record<string, string[]>
  ): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, {
      validationErrors,
    });
  }

  static invalidAmount(message = 'Amount must be a positive number'): ApiError {
    return new ApiError(ErrorCode.INVALID_AMOUNT, message);
  }

  static accountNotFound(accountNumber: string): ApiError {
    return new ApiError(ErrorCode.ACCOUNT_NOT_FOUND, `Account ${accountNumber} not found`);
  }

  static accountAlreadyExists(accountNumber: string): ApiError {
    return new ApiError(ErrorCode.ACCOUNT_ALREADY_EXISTS, `Account ${accountNumber} already exists`);
  }

  static storageConflict(message = 'Concurrent write retries exhausted'): ApiError {
    return new ApiError(ErrorCode.STORAGE_CONFLICT, message);
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, {
      isOperational: false,
    });
  }

  static database(message = 'Database error', cause?: unknown): ApiError {
    return new ApiError(ErrorCode.DATABASE_ERROR, message, { cause });
  }
}
