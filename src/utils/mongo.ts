import { ClientSession } from 'mongoose';
import { Counter } from '../models/Counter';
import { ApiError } from '../middlewares/errorHandler';

const DUPLICATE_KEY = 11000;

/**
 * True for the driver's E11000 unique-index violation
 */
export const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  error.code === DUPLICATE_KEY;

/**
 * Allocate the next value of a named monotonic sequence.
 * Runs inside the caller's session when one is given.
 */
export const nextSequence = async (
  name: string,
  session: ClientSession | null = null
): Promise<number> => {
  const counter = await Counter.findOneAndUpdate(
    { _id: name },
    { $inc: { seq: 1 } },
    { new: true, upsert: true, session }
  );
  if (!counter) {
    throw ApiError.database(`Failed to allocate next value for sequence ${name}`);
  }
  return counter.seq;
};
