import { body, param, ValidationChain } from 'express-validator';
import { OPERATIONS } from '../../types/tokens';
import { accountNumberBody, hasAtMostTwoDecimals } from '../ledger/ledger.validation';

export const TOKEN_PATTERN = /^[1-9]\d{9}$/;
const TOKEN_MESSAGE = 'Token must be a 10-digit number';

const amountRules = (chain: ValidationChain) =>
  chain
    .exists({ values: 'null' })
    .withMessage('Amount is required')
    .bail()
    .isFloat({ min: 0.01 })
    .withMessage('Amount must be a positive number greater than 0')
    .bail()
    .custom(hasAtMostTwoDecimals)
    .toFloat();

export const generateValidation = [accountNumberBody(), amountRules(body('amount'))];

export const tokenParamValidation = [
  param('token').matches(TOKEN_PATTERN).withMessage(TOKEN_MESSAGE),
  accountNumberBody(),
];

export const operationValidation = [
  body('operation')
    .isIn(OPERATIONS)
    .withMessage(`Operation must be one of: ${OPERATIONS.join(', ')}`),
  accountNumberBody(),
  amountRules(body('amount').if(body('operation').equals('generate'))),
  body('token')
    .if(body('operation').isIn(['validate', 'use']))
    .isString()
    .withMessage(TOKEN_MESSAGE)
    .bail()
    .matches(TOKEN_PATTERN)
    .withMessage(TOKEN_MESSAGE),
];
