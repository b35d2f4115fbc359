/**
 * Tests for the global error handler.
 *
 * @module middleware/errorHandler.test
 */

import { describe, it, expect, beforeEach } from 'vitest';
import express from 'express';
import request from 'supertest';
import { createMockLogCollector } from '../test/mockCollectors.js';
import {
  ConflictError,
  ForbiddenError,
  InvalidCredentialsError,
  NotFoundError,
  UnauthenticatedError,
  ValidationError,
} from '../utils/errors.js';
import { errorHandler } from './errorHandler.js';
import { requestLogger } from './requestLogger.js';

const collector = createMockLogCollector();

function appThrowing(err: unknown) {
  const app = express();
  app.use(requestLogger(collector.logger));
  app.use(express.json());
  app.post('/fail', (_req, _res, next) => {
    next(err);
  });
  app.use(errorHandler(collector.logger));
  return app;
}

beforeEach(() => {
  collector.clear();
});

describe('errorHandler', () => {
  it.each([
    [new NotFoundError('User not found'), 404, 'RBAC_NOT_FOUND'],
    [new ConflictError('Role already exists'), 409, 'RBAC_CONFLICT'],
    [new ForbiddenError(), 403, 'RBAC_FORBIDDEN'],
    [new InvalidCredentialsError(), 401, 'AUTH_INVALID_CREDENTIALS'],
  ])('renders %s with its status and code', async (err, status, code) => {
    const res = await request(appThrowing(err)).post('/fail');

    expect(res.status).toBe(status);
    expect(res.body).toMatchObject({ success: false, error: { code, message: err.message } });
  });

  it('challenges with WWW-Authenticate on 401', async () => {
    const res = await request(appThrowing(new UnauthenticatedError())).post('/fail');

    expect(res.status).toBe(401);
    expect(res.headers['www-authenticate']).toBe('Bearer');
  });

  it('does not challenge on 403', async () => {
    const res = await request(appThrowing(new ForbiddenError())).post('/fail');

    expect(res.headers['www-authenticate']).toBeUndefined();
  });

  it('includes field errors for validation failures', async () => {
    const err = new ValidationError('Invalid request body', { email: ['Invalid email format'] });

    const res = await request(appThrowing(err)).post('/fail');

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({
      code: 'RBAC_VALIDATION_ERROR',
      message: 'Invalid request body',
      fields: { email: ['Invalid email format'] },
    });
  });

  it('uses the request correlation id as requestId', async () => {
    const res = await request(appThrowing(new NotFoundError('Role not found')))
      .post('/fail')
      .set('x-correlation-id', 'corr-123');

    expect(res.body.requestId).toBe('corr-123');
  });

  it('turns a malformed JSON body into a validation error', async () => {
    const res = await request(appThrowing(new Error('unreachable')))
      .post('/fail')
      .set('Content-Type', 'application/json')
      .send('{"username": ');

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({
      code: 'RBAC_VALIDATION_ERROR',
      message: 'Malformed JSON body',
      fields: { body: ['Body is not valid JSON'] },
    });
  });

  it('hides unexpected errors behind a generic 500 and logs them', async () => {
    const res = await request(appThrowing(new Error('connection reset')))
      .post('/fail')
      .set('x-correlation-id', 'corr-500');

    expect(res.status).toBe(500);
    expect(res.body.error).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred. Please try again later.',
    });

    const logged = collector.entries.find((e) => e.message === 'Unhandled error');
    expect(logged?.level).toBe('error');
    expect(logged?.correlationId).toBe('corr-500');
    expect(logged?.error?.message).toBe('connection reset');
    expect(logged?.metadata).toEqual({ method: 'POST', url: '/fail' });
  });

  it('wraps non-Error values before logging', async () => {
    const res = await request(appThrowing('plain string')).post('/fail');

    expect(res.status).toBe(500);
    const logged = collector.entries.find((e) => e.message === 'Unhandled error');
    expect(logged?.error?.message).toBe('plain string');
  });
});
