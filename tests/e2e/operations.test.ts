import request from 'supertest';
import { Application } from 'express';
import { getTestApp, MemoryDataStore } from '../helpers';
import { ErrorCode } from '../../src/types/errors';

describe('Operations Endpoint', () => {
  let app: Application;
  let store: MemoryDataStore;

  beforeEach(async () => {
    ({ app, store } = getTestApp());
    await store.ledger.createAccount('ACC001', 100);
  });

  it('should run generate and return the structured result', async () => {
    const response = await request(app)
      .post('/operations')
      .send({ operation: 'generate', accountNumber: 'ACC001', amount: 25 });

    expect(response.status).toBe(200);
    expect(response.body.data.operation).toBe('generate');
    expect(response.body.data.result).toMatchObject({
      status: 'completed',
      accountNumber: 'ACC001',
      amount: 25,
      newBalance: 125,
      message: 'Payment processed and token issued',
    });
  });

  it('should return a failed generate as a result, not an error', async () => {
    const response = await request(app)
      .post('/operations')
      .send({ operation: 'generate', accountNumber: 'ACC999', amount: 25 });

    expect(response.status).toBe(200);
    expect(response.body.data.result).toEqual({
      status: 'failed',
      accountNumber: 'ACC999',
      reason: ErrorCode.ACCOUNT_NOT_FOUND,
      message: 'Account not found',
    });
  });

  it('should validate and use a token by name', async () => {
    const generated = await request(app)
      .post('/operations')
      .send({ operation: 'generate', accountNumber: 'ACC001', amount: 25 });
    const token = generated.body.data.result.token;

    const validated = await request(app)
      .post('/operations')
      .send({ operation: 'validate', accountNumber: 'ACC001', token });
    const used = await request(app)
      .post('/operations')
      .send({ operation: 'use', accountNumber: 'ACC001', token });
    const usedAgain = await request(app)
      .post('/operations')
      .send({ operation: 'use', accountNumber: 'ACC001', token });

    expect(validated.body.data.result.message).toBe('token is valid');
    expect(used.body.data.result).toEqual({
      success: true,
      reason: 'VALID',
      message: 'token consumed',
    });
    expect(usedAgain.status).toBe(200);
    expect(usedAgain.body.data.result).toEqual({
      success: false,
      reason: 'ALREADY_USED',
      message: 'already used',
    });
  });

  it('should report info for an unknown account as not found', async () => {
    const response = await request(app)
      .post('/operations')
      .send({ operation: 'info', accountNumber: 'ACC999' });

    expect(response.body.data).toEqual({
      operation: 'info',
      result: { found: false, accountNumber: 'ACC999', message: 'Account not found' },
    });
  });

  it('should reject an unknown operation', async () => {
    const response = await request(app)
      .post('/operations')
      .send({ operation: 'refund', accountNumber: 'ACC001' });

    expect(response.status).toBe(400);
    expect(response.body.error.details.operation).toEqual([
      'Operation must be one of: generate, validate, use, info',
    ]);
  });
});
