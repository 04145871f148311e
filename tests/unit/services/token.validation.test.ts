import { Result, ValidationChain, ValidationError, validationResult } from 'express-validator';
import {
  generateValidation,
  operationValidation,
  tokenParamValidation,
} from '../../../src/services/token/token.validation';

interface FakeRequest {
  body: Record<string, unknown>;
  params: Record<string, string>;
}

// Helper to run validation and get errors
const runValidation = async (
  validations: ValidationChain[],
  body: Record<string, unknown>,
  params: Record<string, string> = {}
): Promise<{ req: FakeRequest; result: Result<ValidationError> }> => {
  const req: FakeRequest = { body, params };
  for (const validation of validations) {
    await validation.run(req);
  }
  return { req, result: validationResult(req) };
};

const messagesFor = (result: Result<ValidationError>, field: string): string[] =>
  result
    .array()
    .filter((e) => e.type === 'field' && e.path === field)
    .map((e) => String(e.msg));

describe('Token Validation', () => {
  describe('generateValidation', () => {
    it('should pass with a valid account and amount', async () => {
      const { result } = await runValidation(generateValidation, {
        accountNumber: 'ACC001',
        amount: 25,
      });
      expect(result.isEmpty()).toBe(true);
    });

    it('should convert a numeric string amount to a number', async () => {
      const { req } = await runValidation(generateValidation, {
        accountNumber: 'ACC001',
        amount: '12.50',
      });
      expect(req.body.amount).toBe(12.5);
    });

    it('should fail when amount is missing', async () => {
      const { result } = await runValidation(generateValidation, { accountNumber: 'ACC001' });
      expect(messagesFor(result, 'amount')).toEqual(['Amount is required']);
    });

    it.each([0, -10, 'abc'])('should reject amount %p', async (amount) => {
      const { result } = await runValidation(generateValidation, {
        accountNumber: 'ACC001',
        amount,
      });
      expect(messagesFor(result, 'amount')).toEqual([
        'Amount must be a positive number greater than 0',
      ]);
    });

    it('should reject more than two decimal places', async () => {
      const { result } = await runValidation(generateValidation, {
        accountNumber: 'ACC001',
        amount: 10.125,
      });
      expect(messagesFor(result, 'amount')).toEqual(['Amount can have at most 2 decimal places']);
    });

    it('should accept an exponent amount with two decimals', async () => {
      const { req, result } = await runValidation(generateValidation, {
        accountNumber: 'ACC001',
        amount: '1.5e-1',
      });
      expect(result.isEmpty()).toBe(true);
      expect(req.body.amount).toBe(0.15);
    });

    it('should fail when account number is missing', async () => {
      const { result } = await runValidation(generateValidation, { amount: 25 });
      expect(messagesFor(result, 'accountNumber')).toEqual(['Account number is required']);
    });
  });

  describe('tokenParamValidation', () => {
    it('should pass with a 10-digit token and an owner', async () => {
      const { result } = await runValidation(
        tokenParamValidation,
        { accountNumber: 'ACC001' },
        { token: '4821937560' }
      );
      expect(result.isEmpty()).toBe(true);
    });

    it.each(['123', '48219375601', '0821937560', 'abcdefghij'])(
      'should reject token %p',
      async (token) => {
        const { result } = await runValidation(
          tokenParamValidation,
          { accountNumber: 'ACC001' },
          { token }
        );
        expect(messagesFor(result, 'token')).toEqual(['Token must be a 10-digit number']);
      }
    );
  });

  describe('operationValidation', () => {
    it('should pass an info request with only an account number', async () => {
      const { result } = await runValidation(operationValidation, {
        operation: 'info',
        accountNumber: 'ACC001',
      });
      expect(result.isEmpty()).toBe(true);
    });

    it('should reject an unknown operation', async () => {
      const { result } = await runValidation(operationValidation, {
        operation: 'refund',
        accountNumber: 'ACC001',
      });
      expect(messagesFor(result, 'operation')).toEqual([
        'Operation must be one of: generate, validate, use, info',
      ]);
      expect(result.array()).toHaveLength(1);
    });

    it('should require an amount for generate', async () => {
      const { result } = await runValidation(operationValidation, {
        operation: 'generate',
        accountNumber: 'ACC001',
      });
      expect(messagesFor(result, 'amount')).toEqual(['Amount is required']);
    });

    it('should ignore the amount for use', async () => {
      const { result } = await runValidation(operationValidation, {
        operation: 'use',
        accountNumber: 'ACC001',
        token: '4821937560',
        amount: -1,
      });
      expect(result.isEmpty()).toBe(true);
    });

    it('should require a token for validate', async () => {
      const { result } = await runValidation(operationValidation, {
        operation: 'validate',
        accountNumber: 'ACC001',
      });
      expect(messagesFor(result, 'token')).toEqual(['Token must be a 10-digit number']);
    });

    it('should reject a numeric token value', async () => {
      const { result } = await runValidation(operationValidation, {
        operation: 'use',
        accountNumber: 'ACC001',
        token: 4821937560,
      });
      expect(messagesFor(result, 'token')).toEqual(['Token must be a 10-digit number']);
    });
  });
});
