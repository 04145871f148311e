/**
 * Token Lifecycle Service
 *
 * Coordinates the ledger and the token registry for the four operations:
 * generate (payment -> token), validate, use and info. Holds no state of
 * its own; every call is a bounded sequence of store operations.
 */

import { config } from '../../config';
import { ApiError } from '../../middlewares/errorHandler';
import {
  addLogContext,
  createServiceLogger,
  paymentAmount,
  paymentsTotal,
  tokenChecksTotal,
} from '../../observability';
import { ErrorCode } from '../../types/errors';
import { DataStore } from '../../types/store';
import {
  AccountRecord,
  GenerateResult,
  InfoResult,
  PaymentRecord,
  TokenRecord,
  TokenStatus,
  UseResult,
  ValidateResult,
} from '../../types/tokens';
import { PaymentAuthorizer, simulatedPaymentAuthorizer } from '../payment';
import { TokenCollisionError } from './token.registry';
import {
  evaluateToken,
  markUsedOutcomeToStatus,
  TOKEN_CONSUMED_MESSAGE,
  tokenMessages,
} from './token.rules';

const log = createServiceLogger('token-lifecycle');

export interface TokenLifecycleOptions {
  authorizer?: PaymentAuthorizer;
  clock?: () => Date;
  maxGenerateAttempts?: number;
}

interface CaptureOutcome {
  newBalance: number;
  paymentId: number;
  minted: TokenRecord;
}

export class TokenLifecycleService {
  private readonly authorizer: PaymentAuthorizer;
  private readonly clock: () => Date;
  private readonly maxGenerateAttempts: number;

  constructor(
    private readonly store: DataStore,
    options: TokenLifecycleOptions = {}
  ) {
    this.authorizer = options.authorizer ?? simulatedPaymentAuthorizer;
    this.clock = options.clock ?? (() => new Date());
    this.maxGenerateAttempts = options.maxGenerateAttempts ?? config.token.generateMaxAttempts;
  }

  /**
   * Run a store-facing operation, surfacing driver failures as DATABASE_ERROR
   */
  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof ApiError) {
        throw error;
      }
      log.error({ err: error, operation }, 'Storage operation failed');
      throw ApiError.database(`Storage operation failed during ${operation}`, error);
    }
  }

  /**
   * Create an account with an opening balance
   */
  async openAccount(accountNumber: string, initialBalance = 0): Promise<AccountRecord> {
    return this.guard<AccountRecord>('openAccount', async () => {
      const outcome = await this.store.ledger.createAccount(accountNumber, initialBalance);
      if (outcome === 'already_exists') {
        throw ApiError.accountAlreadyExists(accountNumber);
      }
      return { accountNumber, balance: initialBalance };
    });
  }

  /**
   * Capture a payment and mint a token funded by it.
   *
   * Credit, payment record and mint commit together or not at all.
   * A rejected authorization leaves a failed payment and no token.
   */
  async generate(accountNumber: string, amount: number): Promise<GenerateResult> {
    addLogContext({ accountNumber, operation: 'generate' });

    return this.guard<GenerateResult>('generate', async () => {
      const account = await this.store.ledger.getAccount(accountNumber);
      if (!account) {
        return this.generateFailed(accountNumber, ErrorCode.ACCOUNT_NOT_FOUND, 'Account not found');
      }

      if (!Number.isFinite(amount) || amount <= 0) {
        return this.generateFailed(
          accountNumber,
          ErrorCode.INVALID_AMOUNT,
          'Amount must be greater than zero'
        );
      }

      const authorization = await this.authorizer.authorize({ accountNumber, amount });
      if (!authorization.approved) {
        const paymentId = await this.store.ledger.recordPayment(accountNumber, amount, 'failed');
        paymentsTotal.inc({ status: 'failed' });
        log.warn({ accountNumber, amount, paymentId }, 'Payment rejected');
        return {
          status: 'failed',
          accountNumber,
          reason: ErrorCode.PAYMENT_REJECTED,
          message: authorization.reason ?? 'Payment rejected',
          paymentId,
        };
      }

      const captured = await this.captureAndMint(accountNumber, amount);
      if (!captured) {
        return this.generateFailed(accountNumber, ErrorCode.ACCOUNT_NOT_FOUND, 'Account not found');
      }

      paymentsTotal.inc({ status: 'completed' });
      paymentAmount.observe(amount);
      log.info(
        { accountNumber, amount, paymentId: captured.paymentId, newBalance: captured.newBalance },
        'Payment processed and token issued'
      );

      return {
        status: 'completed',
        accountNumber,
        token: captured.minted.token,
        amount,
        newBalance: captured.newBalance,
        paymentId: captured.paymentId,
        expiresAt: captured.minted.expiresAt,
        message: 'Payment processed and token issued',
      };
    });
  }

  private generateFailed(accountNumber: string, reason: ErrorCode, message: string): GenerateResult {
    log.warn({ accountNumber, reason }, message);
    return { status: 'failed', accountNumber, reason, message };
  }

  private async captureAndMint(accountNumber: string, amount: number): Promise<CaptureOutcome | null> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.store.transaction(async ({ ledger, tokens }) => {
          const newBalance = await ledger.credit(accountNumber, amount);
          if (newBalance === null) {
            return null;
          }
          const paymentId = await ledger.recordPayment(accountNumber, amount, 'completed');
          const minted = await tokens.mint(accountNumber, amount, this.clock());
          return { newBalance, paymentId, minted };
        });
      } catch (error) {
        if (!(error instanceof TokenCollisionError)) {
          throw error;
        }
        if (attempt >= this.maxGenerateAttempts) {
          throw ApiError.storageConflict(
            `Token mint kept colliding after ${attempt} transaction attempts`
          );
        }
        log.warn({ accountNumber, attempt }, 'Token collision aborted transaction, retrying');
      }
    }
  }

  /**
   * Read-only validity check
   */
  async validate(accountNumber: string, token: string): Promise<ValidateResult> {
    addLogContext({ accountNumber, operation: 'validate' });

    return this.guard<ValidateResult>('validate', async () => {
      const record = await this.store.tokens.lookup(token, accountNumber);
      const status = evaluateToken(record, this.clock());
      tokenChecksTotal.inc({ operation: 'validate', result: status });

      return {
        valid: status === TokenStatus.VALID,
        reason: status,
        message: tokenMessages[status],
      };
    });
  }

  /**
   * Validate, then consume. The flip itself is a compare-and-set, so
   * concurrent callers racing past validation still get one winner.
   */
  async use(accountNumber: string, token: string): Promise<UseResult> {
    addLogContext({ accountNumber, operation: 'use' });

    return this.guard<UseResult>('use', async () => {
      const now = this.clock();
      const record = await this.store.tokens.lookup(token, accountNumber);
      let status = evaluateToken(record, now);

      if (status === TokenStatus.VALID) {
        status = markUsedOutcomeToStatus(
          await this.store.tokens.markUsed(token, accountNumber, now)
        );
      }
      tokenChecksTotal.inc({ operation: 'use', result: status });

      if (status !== TokenStatus.VALID) {
        log.info({ accountNumber, reason: status }, 'Token use refused');
        return { success: false, reason: status, message: tokenMessages[status] };
      }

      log.info({ accountNumber }, 'Token consumed');
      return { success: true, reason: status, message: TOKEN_CONSUMED_MESSAGE };
    });
  }

  /**
   * Balance plus the account's token history, newest first
   */
  async info(accountNumber: string): Promise<InfoResult> {
    addLogContext({ accountNumber, operation: 'info' });

    return this.guard<InfoResult>('info', async () => {
      const account = await this.store.ledger.getAccount(accountNumber);
      if (!account) {
        return { found: false, accountNumber, message: 'Account not found' };
      }

      const tokens = await this.store.tokens.listForAccount(accountNumber);
      return {
        found: true,
        accountNumber,
        balance: account.balance,
        tokens: tokens.map((t) => ({
          token: t.token,
          amount: t.amountPaid,
          used: t.isUsed,
          createdAt: t.createdAt,
          expiresAt: t.expiresAt,
        })),
      };
    });
  }

  async getPaymentHistory(accountNumber: string): Promise<PaymentRecord[]> {
    return this.guard<PaymentRecord[]>('getPaymentHistory', async () => {
      const account = await this.store.ledger.getAccount(accountNumber);
      if (!account) {
        throw ApiError.accountNotFound(accountNumber);
      }
      return this.store.ledger.listPayments(accountNumber);
    });
  }
}
