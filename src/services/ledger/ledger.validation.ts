import { body, param } from 'express-validator';

export const ACCOUNT_NUMBER_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;
export const ACCOUNT_NUMBER_MESSAGE =
  'Account number must be 1-64 characters of letters, digits, underscore or hyphen';

/**
 * Max two decimal places, as for any money amount on the wire.
 * Counted on the parsed number, so `"1.5e-1"` is read as 0.15.
 */
export const hasAtMostTwoDecimals = (value: unknown): boolean => {
  const [mantissa, exponent = '0'] = Number(value).toString().split('e');
  const decimalPlaces = (mantissa.split('.')[1] || '').length - Number(exponent);
  if (decimalPlaces > 2) {
    throw new Error('Amount can have at most 2 decimal places');
  }
  return true;
};

export const accountNumberBody = () =>
  body('accountNumber')
    .exists({ values: 'falsy' })
    .withMessage('Account number is required')
    .bail()
    .isString()
    .withMessage('Account number must be a string')
    .bail()
    .trim()
    .matches(ACCOUNT_NUMBER_PATTERN)
    .withMessage(ACCOUNT_NUMBER_MESSAGE);

export const createAccountValidation = [
  accountNumberBody(),
  body('initialBalance')
    .optional()
    .isFloat({ min: 0 })
    .withMessage('Initial balance must be zero or a positive number')
    .bail()
    .custom(hasAtMostTwoDecimals)
    .toFloat(),
];

export const accountParamValidation = [
  param('accountNumber').matches(ACCOUNT_NUMBER_PATTERN).withMessage(ACCOUNT_NUMBER_MESSAGE),
];
