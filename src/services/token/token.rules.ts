import { config } from '../../config';
import { ErrorCode } from '../../types/errors';
import { MarkUsedOutcome } from '../../types/store';
import { TokenRecord, TokenStatus } from '../../types/tokens';

/**
 * Token validity rules
 *
 * Checks run in a fixed order and stop at the first failure:
 *
 *   exists for this owner ──► unused ──► now < expiresAt ──► VALID
 *        │                      │              │
 *        ▼                      ▼              ▼
 *   INVALID_OR_WRONG_OWNER  ALREADY_USED    EXPIRED
 *
 * Used and expired are terminal: nothing moves a token back to VALID.
 */
export function evaluateToken(record: TokenRecord | null, now: Date): TokenStatus {
  if (!record) {
    return TokenStatus.INVALID_OR_WRONG_OWNER;
  }
  if (record.isUsed) {
    return TokenStatus.ALREADY_USED;
  }
  if (now.getTime() >= record.expiresAt.getTime()) {
    return TokenStatus.EXPIRED;
  }
  return TokenStatus.VALID;
}

export const tokenMessages: Record<TokenStatus, string> = {
  [TokenStatus.VALID]: 'token is valid',
  [TokenStatus.INVALID_OR_WRONG_OWNER]: 'invalid token or wrong owner',
  [TokenStatus.ALREADY_USED]: 'already used',
  [TokenStatus.EXPIRED]: 'expired',
};

export const TOKEN_CONSUMED_MESSAGE = 'token consumed';

/**
 * Error code reported for each failing status
 */
export const tokenStatusToErrorCode: Record<Exclude<TokenStatus, TokenStatus.VALID>, ErrorCode> = {
  [TokenStatus.INVALID_OR_WRONG_OWNER]: ErrorCode.TOKEN_NOT_FOUND_OR_WRONG_OWNER,
  [TokenStatus.ALREADY_USED]: ErrorCode.TOKEN_ALREADY_USED,
  [TokenStatus.EXPIRED]: ErrorCode.TOKEN_EXPIRED,
};

export function markUsedOutcomeToStatus(outcome: MarkUsedOutcome): TokenStatus {
  switch (outcome) {
    case 'ok':
      return TokenStatus.VALID;
    case 'not_found':
      return TokenStatus.INVALID_OR_WRONG_OWNER;
    case 'already_used':
      return TokenStatus.ALREADY_USED;
    case 'expired':
      return TokenStatus.EXPIRED;
  }
}

export function tokenExpiry(issuedAt: Date): Date {
  return new Date(issuedAt.getTime() + config.token.ttlMs);
}
