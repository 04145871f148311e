/**
 * MongoTokenRegistry Unit Tests
 *
 * Token model is mocked; covers mint retries, the compare-and-set in
 * markUsed and the classification of a lost race.
 */

import { ClientSession } from 'mongoose';
import { ErrorCode } from '../../../src/types/errors';

const mockToken = {
  exists: jest.fn(),
  create: jest.fn(),
  findOne: jest.fn(),
  findOneAndUpdate: jest.fn(),
  find: jest.fn(),
};
jest.mock('../../../src/models/Token', () => ({ Token: mockToken }));

const issuedAt = new Date('2026-03-01T10:00:00.000Z');
const expiresAt = new Date('2026-03-02T10:00:00.000Z');

const tokenDoc = (overrides: Record<string, unknown> = {}) => ({
  _id: 'doc-1',
  token: '5000000001',
  accountNumber: 'ACC001',
  amountPaid: 25,
  isUsed: false,
  usedAt: null,
  createdAt: issuedAt,
  expiresAt,
  ...overrides,
});

const existsResult = (value: unknown) => ({ session: jest.fn().mockResolvedValue(value) });

const sequence = (...values: string[]) => {
  const queue = [...values];
  return jest.fn(() => queue.shift() ?? '9999999999');
};

describe('MongoTokenRegistry', () => {
  let MongoTokenRegistry: typeof import('../../../src/services/token/token.registry').MongoTokenRegistry;
  let TokenCollisionError: typeof import('../../../src/services/token/token.registry').TokenCollisionError;

  beforeAll(async () => {
    const module = await import('../../../src/services/token/token.registry');
    MongoTokenRegistry = module.MongoTokenRegistry;
    TokenCollisionError = module.TokenCollisionError;
  });

  beforeEach(() => {
    jest.clearAllMocks();
    mockToken.exists.mockReturnValue(existsResult(null));
    mockToken.create.mockImplementation(async ([doc]: Array<Record<string, unknown>>) => [
      { _id: 'doc-1', ...doc },
    ]);
  });

  describe('mint', () => {
    it('should insert an unused token expiring 24 hours after issue', async () => {
      const registry = new MongoTokenRegistry(null, { generator: sequence('5000000001') });

      const record = await registry.mint('ACC001', 25, issuedAt);

      expect(record).toEqual({
        token: '5000000001',
        accountNumber: 'ACC001',
        amountPaid: 25,
        isUsed: false,
        usedAt: null,
        createdAt: issuedAt,
        expiresAt,
      });
      expect(mockToken.exists).toHaveBeenCalledWith({ token: '5000000001' });
      expect(mockToken.create).toHaveBeenCalledWith(
        [
          {
            token: '5000000001',
            accountNumber: 'ACC001',
            amountPaid: 25,
            isUsed: false,
            usedAt: null,
            createdAt: issuedAt,
            expiresAt,
          },
        ],
        { session: null }
      );
    });

    it('should skip candidates that already exist', async () => {
      const generator = sequence('5000000001', '5000000002');
      mockToken.exists
        .mockReturnValueOnce(existsResult({ _id: 'taken' }))
        .mockReturnValueOnce(existsResult(null));
      const registry = new MongoTokenRegistry(null, { generator });

      const record = await registry.mint('ACC001', 25, issuedAt);

      expect(record.token).toBe('5000000002');
      expect(generator).toHaveBeenCalledTimes(2);
      expect(mockToken.create).toHaveBeenCalledTimes(1);
    });

    it('should draw again after a duplicate key outside a transaction', async () => {
      mockToken.create.mockRejectedValueOnce(Object.assign(new Error('E11000'), { code: 11000 }));
      const registry = new MongoTokenRegistry(null, {
        generator: sequence('5000000001', '5000000002'),
      });

      const record = await registry.mint('ACC001', 25, issuedAt);

      expect(record.token).toBe('5000000002');
      expect(mockToken.create).toHaveBeenCalledTimes(2);
    });

    it('should abort with TokenCollisionError on a duplicate key inside a transaction', async () => {
      const session = { id: 'session-1' } as unknown as ClientSession;
      mockToken.create.mockRejectedValueOnce(Object.assign(new Error('E11000'), { code: 11000 }));
      const registry = new MongoTokenRegistry(session, { generator: sequence('5000000001') });

      const attempt = registry.mint('ACC001', 25, issuedAt);

      await expect(attempt).rejects.toBeInstanceOf(TokenCollisionError);
      await expect(attempt).rejects.toMatchObject({ candidate: '5000000001' });
      expect(mockToken.create).toHaveBeenCalledWith(expect.any(Array), { session });
    });

    it('should rethrow write errors other than duplicate key', async () => {
      mockToken.create.mockRejectedValueOnce(new Error('not primary'));
      const registry = new MongoTokenRegistry(null, { generator: sequence('5000000001') });

      await expect(registry.mint('ACC001', 25, issuedAt)).rejects.toThrow('not primary');
    });

    it('should fail with STORAGE_CONFLICT once the attempts run out', async () => {
      mockToken.exists.mockReturnValue(existsResult({ _id: 'taken' }));
      const registry = new MongoTokenRegistry(null, {
        generator: sequence('5000000001', '5000000002'),
        maxAttempts: 2,
      });

      await expect(registry.mint('ACC001', 25, issuedAt)).rejects.toMatchObject({
        errorCode: ErrorCode.STORAGE_CONFLICT,
        message: 'No unused token identifier found after 2 attempts',
      });
      expect(mockToken.create).not.toHaveBeenCalled();
    });
  });

  describe('lookup', () => {
    it('should match on token and owner together', async () => {
      mockToken.findOne.mockResolvedValue(tokenDoc());

      const record = await new MongoTokenRegistry().lookup('5000000001', 'ACC001');

      expect(record).toMatchObject({ token: '5000000001', accountNumber: 'ACC001' });
      expect(mockToken.findOne).toHaveBeenCalledWith(
        { token: '5000000001', accountNumber: 'ACC001' },
        null,
        { session: null }
      );
    });

    it('should return null when nothing matches', async () => {
      mockToken.findOne.mockResolvedValue(null);

      await expect(new MongoTokenRegistry().lookup('5000000001', 'ACC002')).resolves.toBeNull();
    });
  });

  describe('markUsed', () => {
    const now = new Date('2026-03-01T12:00:00.000Z');

    it('should flip an unused, unexpired token in one conditional update', async () => {
      mockToken.findOneAndUpdate.mockResolvedValue(tokenDoc({ isUsed: true, usedAt: now }));

      const outcome = await new MongoTokenRegistry().markUsed('5000000001', 'ACC001', now);

      expect(outcome).toBe('ok');
      expect(mockToken.findOneAndUpdate).toHaveBeenCalledWith(
        { token: '5000000001', accountNumber: 'ACC001', isUsed: false, expiresAt: { $gt: now } },
        { $set: { isUsed: true, usedAt: now } },
        { new: true, session: null }
      );
      expect(mockToken.findOne).not.toHaveBeenCalled();
    });

    it.each([
      ['not_found', null],
      ['already_used', tokenDoc({ isUsed: true, usedAt: issuedAt })],
      ['expired', tokenDoc({ expiresAt: new Date('2026-03-01T11:00:00.000Z') })],
    ])('should report %s when the update matches nothing', async (expected, current) => {
      mockToken.findOneAndUpdate.mockResolvedValue(null);
      mockToken.findOne.mockResolvedValue(current);

      const outcome = await new MongoTokenRegistry().markUsed('5000000001', 'ACC001', now);

      expect(outcome).toBe(expected);
    });

    it('should raise STORAGE_CONFLICT when the token still looks valid', async () => {
      mockToken.findOneAndUpdate.mockResolvedValue(null);
      mockToken.findOne.mockResolvedValue(tokenDoc());

      await expect(
        new MongoTokenRegistry().markUsed('5000000001', 'ACC001', now)
      ).rejects.toMatchObject({ errorCode: ErrorCode.STORAGE_CONFLICT });
    });
  });

  describe('listForAccount', () => {
    it('should sort newest first', async () => {
      const sort = jest.fn().mockResolvedValue([tokenDoc()]);
      mockToken.find.mockReturnValue({ sort });

      const records = await new MongoTokenRegistry().listForAccount('ACC001');

      expect(mockToken.find).toHaveBeenCalledWith({ accountNumber: 'ACC001' }, null, {
        session: null,
      });
      expect(sort).toHaveBeenCalledWith({ createdAt: -1, _id: -1 });
      expect(records).toHaveLength(1);
      expect(records[0].token).toBe('5000000001');
    });
  });
});
