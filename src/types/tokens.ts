import { ErrorCode } from './errors';

export type PaymentStatus = 'pending' | 'completed' | 'failed';

export type Operation = 'generate' | 'validate' | 'use' | 'info';

export const OPERATIONS: readonly Operation[] = ['generate', 'validate', 'use', 'info'];

/**
 * Outcome of the shared validation algorithm, in check order
 */
export enum TokenStatus {
  VALID = 'VALID',
  INVALID_OR_WRONG_OWNER = 'INVALID_OR_WRONG_OWNER',
  ALREADY_USED = 'ALREADY_USED',
  EXPIRED = 'EXPIRED',
}

export interface AccountRecord {
  accountNumber: string;
  balance: number;
}

export interface PaymentRecord {
  paymentId: number;
  accountNumber: string;
  amount: number;
  status: PaymentStatus;
  createdAt: Date;
}

export interface TokenRecord {
  token: string;
  accountNumber: string;
  amountPaid: number;
  isUsed: boolean;
  createdAt: Date;
  expiresAt: Date;
  usedAt?: Date | null;
}

// ============================================
// Operation requests
// ============================================

export interface GenerateRequest {
  operation: 'generate';
  accountNumber: string;
  amount: number;
}

export interface ValidateRequest {
  operation: 'validate';
  accountNumber: string;
  token: string;
}

export interface UseRequest {
  operation: 'use';
  accountNumber: string;
  token: string;
}

export interface InfoRequest {
  operation: 'info';
  accountNumber: string;
}

export type OperationRequest = GenerateRequest | ValidateRequest | UseRequest | InfoRequest;

// ============================================
// Operation results
// ============================================

export type GenerateResult =
  | {
      status: 'completed';
      accountNumber: string;
      token: string;
      amount: number;
      newBalance: number;
      paymentId: number;
      expiresAt: Date;
      message: string;
    }
  | {
      status: 'failed';
      accountNumber: string;
      reason: ErrorCode;
      message: string;
      paymentId?: number;
    };

export interface ValidateResult {
  valid: boolean;
  reason: TokenStatus;
  message: string;
}

export interface UseResult {
  success: boolean;
  reason: TokenStatus;
  message: string;
}

export interface TokenSummary {
  token: string;
  amount: number;
  used: boolean;
  createdAt: Date;
  expiresAt: Date;
}

export type InfoResult =
  | {
      found: true;
      accountNumber: string;
      balance: number;
      tokens: TokenSummary[];
    }
  | {
      found: false;
      accountNumber: string;
      message: string;
    };

export interface OperationResultMap {
  generate: GenerateResult;
  validate: ValidateResult;
  use: UseResult;
  info: InfoResult;
}

export type OperationResult = OperationResultMap[Operation];
