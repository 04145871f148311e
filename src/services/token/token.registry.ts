import { ClientSession } from 'mongoose';
import { Token, IToken } from '../../models/Token';
import { config } from '../../config';
import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability/logger';
import { tokenMintCollisionsTotal, tokensMintedTotal } from '../../observability/metrics';
import { isDuplicateKeyError } from '../../utils/mongo';
import { MarkUsedOutcome, TokenRegistry } from '../../types/store';
import { TokenRecord, TokenStatus } from '../../types/tokens';
import { evaluateToken, tokenExpiry } from './token.rules';
import { randomTokenGenerator, TokenGenerator } from './token.generator';

const log = createServiceLogger('token-registry');

/**
 * Raised when an insert inside a transaction hits the unique index.
 * The write error has already aborted the transaction, so the whole
 * unit of work has to be restarted with a fresh candidate.
 */
export class TokenCollisionError extends Error {
  constructor(readonly candidate: string) {
    super(`Token identifier ${candidate} was taken concurrently`);
    this.name = 'TokenCollisionError';
  }
}

export interface TokenRegistryOptions {
  generator?: TokenGenerator;
  maxAttempts?: number;
}

export const toTokenRecord = (doc: IToken): TokenRecord => ({
  token: doc.token,
  accountNumber: doc.accountNumber,
  amountPaid: doc.amountPaid,
  isUsed: doc.isUsed,
  createdAt: doc.createdAt,
  expiresAt: doc.expiresAt,
  usedAt: doc.usedAt,
});

export class MongoTokenRegistry implements TokenRegistry {
  private readonly generator: TokenGenerator;
  private readonly maxAttempts: number;

  constructor(
    private readonly session: ClientSession | null = null,
    options: TokenRegistryOptions = {}
  ) {
    this.generator = options.generator ?? randomTokenGenerator;
    this.maxAttempts = options.maxAttempts ?? config.token.mintMaxAttempts;
  }

  /**
   * Check-then-insert, repeated until a candidate is verified unused.
   * The unique index on `token` backs the check against concurrent mints.
   */
  async mint(accountNumber: string, amountPaid: number, issuedAt: Date): Promise<TokenRecord> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const candidate = this.generator();

      const taken = await Token.exists({ token: candidate }).session(this.session);
      if (taken) {
        tokenMintCollisionsTotal.inc();
        log.warn({ attempt }, 'Token candidate already present, drawing again');
        continue;
      }

      try {
        const [created] = await Token.create(
          [
            {
              token: candidate,
              accountNumber,
              amountPaid,
              isUsed: false,
              usedAt: null,
              createdAt: issuedAt,
              expiresAt: tokenExpiry(issuedAt),
            },
          ],
          { session: this.session }
        );
        tokensMintedTotal.inc();
        log.info({ accountNumber, amountPaid, attempt }, 'Token minted');
        return toTokenRecord(created);
      } catch (error) {
        if (!isDuplicateKeyError(error)) {
          throw error;
        }
        tokenMintCollisionsTotal.inc();
        if (this.session) {
          throw new TokenCollisionError(candidate);
        }
        log.warn({ attempt }, 'Token candidate inserted concurrently, drawing again');
      }
    }

    throw ApiError.storageConflict(
      `No unused token identifier found after ${this.maxAttempts} attempts`
    );
  }

  async lookup(token: string, accountNumber: string): Promise<TokenRecord | null> {
    const doc = await Token.findOne({ token, accountNumber }, null, { session: this.session });
    return doc ? toTokenRecord(doc) : null;
  }

  async markUsed(token: string, accountNumber: string, now: Date): Promise<MarkUsedOutcome> {
    const updated = await Token.findOneAndUpdate(
      { token, accountNumber, isUsed: false, expiresAt: { $gt: now } },
      { $set: { isUsed: true, usedAt: now } },
      { new: true, session: this.session }
    );
    if (updated) {
      return 'ok';
    }

    // Lost the compare-and-set: report why
    const current = await this.lookup(token, accountNumber);
    switch (evaluateToken(current, now)) {
      case TokenStatus.INVALID_OR_WRONG_OWNER:
        return 'not_found';
      case TokenStatus.ALREADY_USED:
        return 'already_used';
      case TokenStatus.EXPIRED:
        return 'expired';
      case TokenStatus.VALID:
        throw ApiError.storageConflict(`Token state changed during use of ${token}`);
    }
  }

  async listForAccount(accountNumber: string): Promise<TokenRecord[]> {
    const docs = await Token.find({ accountNumber }, null, { session: this.session }).sort({
      createdAt: -1,
      _id: -1,
    });
    return docs.map(toTokenRecord);
  }
}
