import { describe, it, expect, vi } from 'vitest';
import type { NextFunction, Request, Response } from 'express';
import { asyncHandler } from '../../src/utils/asyncHandler.ts';
import { ConflictError, HttpError } from '../../src/utils/errors.ts';
import {
  asMocked,
  createMockNext,
  createMockRequest,
  createMockResponse,
} from '../utils/testHelpers.ts';

async function invoke(
  handler: ReturnType<typeof asyncHandler>,
  req = createMockRequest(),
) {
  const res = createMockResponse();
  const next = createMockNext();
  await handler(
    asMocked<Request>(req),
    asMocked<Response>(res),
    asMocked<NextFunction>(next),
  );
  return { req, res, next };
}

describe('asyncHandler', () => {
  it('should run the controller with the request', async () => {
    const controller = vi.fn(async (_req: Request, res: Response) => {
      res.json({ ok: true });
    });

    const { res } = await invoke(asyncHandler(controller, 'do things'));

    expect(controller).toHaveBeenCalledTimes(1);
    expect(res.json).toHaveBeenCalledWith({ ok: true });
  });

  it('should answer client errors with their status and code', async () => {
    const handler = asyncHandler(async () => {
      throw new ConflictError('The team code has already been taken.');
    }, 'create team');

    const { req, res } = await invoke(handler);

    expect(res.status).toHaveBeenCalledWith(409);
    expect(res.json).toHaveBeenCalledWith({
      error: 'The team code has already been taken.',
      code: 'CONFLICT',
    });
    expect(req.log.warn).toHaveBeenCalled();
    expect(req.log.error).not.toHaveBeenCalled();
  });

  it('should turn unknown errors into a 500 named after the operation', async () => {
    const handler = asyncHandler(async () => {
      throw new Error('disk full');
    }, 'export entries');

    const { req, res } = await invoke(handler);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ error: 'Failed to export entries' });
    expect(req.log.error).toHaveBeenCalledWith(
      expect.objectContaining({ operation: 'export entries' }),
      'Error export entries',
    );
  });

  it('should treat 5xx HTTP errors as unexpected', async () => {
    const handler = asyncHandler(async () => {
      throw new HttpError(503, 'Maintenance', 'BAD_REQUEST');
    }, 'list teams');

    const { res } = await invoke(handler);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ error: 'Failed to list teams' });
  });

  it('should fall back to the error message without an operation', async () => {
    const handler = asyncHandler(async () => {
      throw new Error('plain failure');
    });

    const { res } = await invoke(handler);

    expect(res.json).toHaveBeenCalledWith({ error: 'plain failure' });
  });
});
