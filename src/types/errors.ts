/**
 * Error Codes for the token service
 *
 * Categorized by error type:
 * - 2xxx: Validation errors
 * - 3xxx: Business logic errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,

  // Business errors (3xxx)
  ACCOUNT_NOT_FOUND = 3001,
  ACCOUNT_ALREADY_EXISTS = 3002,
  PAYMENT_REJECTED = 3003,
  TOKEN_NOT_FOUND_OR_WRONG_OWNER = 3004,
  TOKEN_ALREADY_USED = 3005,
  TOKEN_EXPIRED = 3006,
  RESOURCE_NOT_FOUND = 3010,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  DATABASE_ERROR = 5002,
  STORAGE_CONFLICT = 5003,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  // Validation errors -> 400
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,

  // Business errors -> 402/404/409/410
  [ErrorCode.ACCOUNT_NOT_FOUND]: 404,
  [ErrorCode.ACCOUNT_ALREADY_EXISTS]: 409,
  [ErrorCode.PAYMENT_REJECTED]: 402,
  [ErrorCode.TOKEN_NOT_FOUND_OR_WRONG_OWNER]: 404,
  [ErrorCode.TOKEN_ALREADY_USED]: 409,
  [ErrorCode.TOKEN_EXPIRED]: 410,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,

  // System errors -> 500/503
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.DATABASE_ERROR]: 503,
  [ErrorCode.STORAGE_CONFLICT]: 503,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, string[]>;
    timestamp: string;
    correlationId?: string;
  };
}
