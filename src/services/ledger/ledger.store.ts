import { ClientSession } from 'mongoose';
import { Account } from '../../models/Account';
import { Payment, IPayment } from '../../models/Payment';
import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability/logger';
import { isDuplicateKeyError, nextSequence } from '../../utils/mongo';
import { CreateAccountOutcome, LedgerStore } from '../../types/store';
import { AccountRecord, PaymentRecord, PaymentStatus } from '../../types/tokens';

const log = createServiceLogger('ledger-store');

export const PAYMENT_SEQUENCE = 'paymentId';

const toPaymentRecord = (payment: IPayment): PaymentRecord => ({
  paymentId: payment.paymentId,
  accountNumber: payment.accountNumber,
  amount: payment.amount,
  status: payment.status,
  createdAt: payment.createdAt,
});

/**
 * MongoDB-backed ledger. Bound to a session when constructed inside a
 * transaction; every call writes through before returning.
 */
export class MongoLedgerStore implements LedgerStore {
  constructor(private readonly session: ClientSession | null = null) {}

  async createAccount(accountNumber: string, initialBalance: number): Promise<CreateAccountOutcome> {
    if (!Number.isFinite(initialBalance) || initialBalance < 0) {
      throw ApiError.invalidAmount('Initial balance must be zero or more');
    }

    try {
      await Account.create([{ accountNumber, balance: initialBalance }], { session: this.session });
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        return 'already_exists';
      }
      throw error;
    }

    log.info({ accountNumber, initialBalance }, 'Account created');
    return 'created';
  }

  async getAccount(accountNumber: string): Promise<AccountRecord | null> {
    const account = await Account.findOne({ accountNumber }, null, { session: this.session });
    return account ? { accountNumber: account.accountNumber, balance: account.balance } : null;
  }

  async getBalance(accountNumber: string): Promise<number | null> {
    const account = await this.getAccount(accountNumber);
    return account ? account.balance : null;
  }

  async credit(accountNumber: string, amount: number): Promise<number | null> {
    if (!Number.isFinite(amount) || amount <= 0) {
      throw ApiError.invalidAmount();
    }

    // Single $inc: concurrent credits never overwrite each other
    const account = await Account.findOneAndUpdate(
      { accountNumber },
      { $inc: { balance: amount } },
      { new: true, session: this.session }
    );

    return account ? account.balance : null;
  }

  async recordPayment(accountNumber: string, amount: number, status: PaymentStatus): Promise<number> {
    const paymentId = await nextSequence(PAYMENT_SEQUENCE, this.session);

    await Payment.create([{ paymentId, accountNumber, amount, status }], { session: this.session });

    log.debug({ paymentId, accountNumber, amount, status }, 'Payment recorded');
    return paymentId;
  }

  async listPayments(accountNumber: string): Promise<PaymentRecord[]> {
    const payments = await Payment.find({ accountNumber }, null, { session: this.session }).sort({
      createdAt: -1,
      paymentId: -1,
    });
    return payments.map(toPaymentRecord);
  }
}
