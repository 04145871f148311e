import mongoose, { Document, Schema } from 'mongoose';

export interface IToken extends Document {
  token: string;
  accountNumber: string;
  amountPaid: number;
  isUsed: boolean;
  usedAt: Date | null;
  createdAt: Date;
  expiresAt: Date;
}

const tokenSchema = new Schema<IToken>({
  token: {
    type: String,
    required: true,
    unique: true,
    immutable: true,
    match: /^\d{10}$/,
  },
  accountNumber: {
    type: String,
    required: true,
    immutable: true,
  },
  amountPaid: {
    type: Number,
    required: true,
    min: 0,
    immutable: true,
  },
  isUsed: {
    type: Boolean,
    required: true,
    default: false,
  },
  usedAt: {
    type: Date,
    default: null,
  },
  // Set by the registry from the caller's clock, so not a schema timestamp
  createdAt: {
    type: Date,
    required: true,
    immutable: true,
  },
  expiresAt: {
    type: Date,
    required: true,
    immutable: true,
  },
});

// Token history per account, newest first
tokenSchema.index({ accountNumber: 1, createdAt: -1 });

export const Token = mongoose.model<IToken>('Token', tokenSchema);
