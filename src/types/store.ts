import { AccountRecord, PaymentRecord, PaymentStatus, TokenRecord } from './tokens';

export type CreateAccountOutcome = 'created' | 'already_exists';

export type MarkUsedOutcome = 'ok' | 'not_found' | 'already_used' | 'expired';

/**
 * Accounts and the append-only payment history
 */
export interface LedgerStore {
  createAccount(accountNumber: string, initialBalance: number): Promise<CreateAccountOutcome>;
  getAccount(accountNumber: string): Promise<AccountRecord | null>;
  getBalance(accountNumber: string): Promise<number | null>;
  /** Atomically adds `amount`; null when the account does not exist. */
  credit(accountNumber: string, amount: number): Promise<number | null>;
  recordPayment(accountNumber: string, amount: number, status: PaymentStatus): Promise<number>;
  listPayments(accountNumber: string): Promise<PaymentRecord[]>;
}

export interface TokenRegistry {
  /**
   * Stores a token under an identifier verified to be unused.
   * `expiresAt` is derived from `issuedAt` by the fixed TTL.
   */
  mint(accountNumber: string, amountPaid: number, issuedAt: Date): Promise<TokenRecord>;
  /** Exact match on token and owner; a foreign token reads as missing. */
  lookup(token: string, accountNumber: string): Promise<TokenRecord | null>;
  /** Compare-and-set of isUsed false -> true, guarded by expiry. */
  markUsed(token: string, accountNumber: string, now: Date): Promise<MarkUsedOutcome>;
  /** Newest first by createdAt. */
  listForAccount(accountNumber: string): Promise<TokenRecord[]>;
}

export interface StoreScope {
  ledger: LedgerStore;
  tokens: TokenRegistry;
}

/**
 * Injected storage handle. The top-level stores run each call on its own;
 * `transaction` hands `work` stores bound to one session and commits
 * everything or nothing.
 */
export interface DataStore extends StoreScope {
  transaction<T>(work: (scope: StoreScope) => Promise<T>): Promise<T>;
}
