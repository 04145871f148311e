import mongoose, { Document, Schema } from 'mongoose';
import { PaymentStatus } from '../types/tokens';

export interface IPayment extends Document {
  paymentId: number;
  accountNumber: string;
  amount: number;
  status: PaymentStatus;
  createdAt: Date;
}

/**
 * Append-only payment history. Every field is immutable once written.
 */
const paymentSchema = new Schema<IPayment>(
  {
    paymentId: {
      type: Number,
      required: true,
      unique: true,
      immutable: true,
    },
    accountNumber: {
      type: String,
      required: true,
      immutable: true,
    },
    amount: {
      type: Number,
      required: true,
      immutable: true,
    },
    status: {
      type: String,
      required: true,
      enum: ['pending', 'completed', 'failed'],
      immutable: true,
    },
  },
  {
    timestamps: { createdAt: true, updatedAt: false },
  }
);

paymentSchema.index({ accountNumber: 1, createdAt: -1 });

export const Payment = mongoose.model<IPayment>('Payment', paymentSchema);
