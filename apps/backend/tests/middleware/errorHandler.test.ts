import { describe, it, expect, afterEach } from 'vitest';
import type { NextFunction, Request, Response } from 'express';
import { errorHandler } from '../../src/middleware/errorHandler.ts';
import {
  ForbiddenError,
  NotFoundError,
} from '../../src/utils/errors.ts';
import { PriorityValidationError } from '../../src/services/priorityEngine.ts';
import {
  asMocked,
  createMockNext,
  createMockRequest,
  createMockResponse,
  type MockResponse,
} from '../utils/testHelpers.ts';

function handle(err: unknown, res: MockResponse = createMockResponse()) {
  const next = createMockNext();
  errorHandler(
    err,
    asMocked<Request>(createMockRequest({ path: '/api/teams', method: 'POST' })),
    asMocked<Response>(res),
    asMocked<NextFunction>(next),
  );
  return { res, next };
}

describe('errorHandler', () => {
  const savedEnv = process.env.NODE_ENV;

  afterEach(() => {
    process.env.NODE_ENV = savedEnv;
  });

  it('should answer HTTP errors with their status and code', () => {
    const { res } = handle(new NotFoundError('Team not found'));

    expect(res.status).toHaveBeenCalledWith(404);
    expect(res.json).toHaveBeenCalledWith({
      error: 'Team not found',
      code: 'NOT_FOUND',
    });
  });

  it('should keep the specific code of subclassed errors', () => {
    const { res } = handle(new PriorityValidationError('extreme'));

    expect(res.status).toHaveBeenCalledWith(422);
    expect(res.json).toHaveBeenCalledWith({
      error: 'Invalid effort "extreme": expected one of low, medium, high',
      code: 'INVALID_PRIORITY_INPUT',
    });
  });

  it('should hide the message of unexpected errors', () => {
    const { res } = handle(new Error('SQLITE_CORRUPT: database disk image is malformed'));

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ error: 'Internal Server Error' });
  });

  it('should report malformed JSON bodies as 400', () => {
    const parseError = Object.assign(new SyntaxError('Unexpected token } in JSON'), {
      status: 400,
      type: 'entity.parse.failed',
    });

    const { res } = handle(parseError);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      error: 'Malformed JSON body',
      code: 'BAD_REQUEST',
    });
  });

  it('should use the status set by other middleware', () => {
    const tooLarge = Object.assign(new Error('request entity too large'), {
      statusCode: 413,
    });

    const { res } = handle(tooLarge);

    expect(res.status).toHaveBeenCalledWith(413);
    expect(res.json).toHaveBeenCalledWith({ error: 'request entity too large' });
  });

  it('should ignore out-of-range statuses', () => {
    const odd = Object.assign(new Error('odd'), { status: 200 });

    const { res } = handle(odd);

    expect(res.status).toHaveBeenCalledWith(500);
  });

  it('should include the stack in development only', () => {
    process.env.NODE_ENV = 'development';
    const error = new ForbiddenError('Nope');

    const { res } = handle(error);

    expect(res.json).toHaveBeenCalledWith({
      error: 'Nope',
      code: 'FORBIDDEN',
      stack: error.stack,
    });
  });

  it('should delegate when headers were already sent', () => {
    const res = createMockResponse();
    res.headersSent = true;
    const error = new Error('late failure');

    const { next } = handle(error, res);

    expect(next).toHaveBeenCalledWith(error);
    expect(res.status).not.toHaveBeenCalled();
  });
});
