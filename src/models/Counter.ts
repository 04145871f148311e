import mongoose, { Document, Schema } from 'mongoose';

export interface ICounter extends Document<string> {
  seq: number;
}

const counterSchema = new Schema<ICounter>(
  {
    _id: {
      type: String,
      required: true,
    },
    seq: {
      type: Number,
      required: true,
      default: 0,
    },
  },
  {
    versionKey: false,
  }
);

export const Counter = mongoose.model<ICounter>('Counter', counterSchema);
