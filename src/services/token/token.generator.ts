import { randomInt } from 'crypto';
import { config } from '../../config';

/**
 * Produces a candidate token identifier. Uniqueness is the registry's job.
 */
export type TokenGenerator = () => string;

const lowerBound = 10 ** (config.token.digits - 1);
const upperBound = 10 ** config.token.digits;

/**
 * Uniform draw from [1000000000, 9999999999]
 */
export const randomTokenGenerator: TokenGenerator = () =>
  randomInt(lowerBound, upperBound).toString();

