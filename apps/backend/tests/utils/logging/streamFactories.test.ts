import { describe, it, expect, vi, afterEach, type Mock } from 'vitest';
import { asMocked } from '../testHelpers.ts';

vi.mock('pino', () => ({
  default: {
    transport: vi.fn(() => ({ kind: 'transport' })),
    destination: vi.fn(() => ({ kind: 'destination' })),
  },
}));

const pino = asMocked<{ transport: Mock; destination: Mock }>(
  (await import('pino')).default,
);
const { createConsoleStream } = await import(
  '../../../src/utils/logging/streamFactories.ts'
);

describe('createConsoleStream', () => {
  const savedIncludeModule = process.env.LOG_INCLUDE_MODULE;

  afterEach(() => {
    if (savedIncludeModule === undefined) delete process.env.LOG_INCLUDE_MODULE;
    else process.env.LOG_INCLUDE_MODULE = savedIncludeModule;
  });

  it('should pretty-print in development', () => {
    delete process.env.LOG_INCLUDE_MODULE;

    createConsoleStream('development');

    expect(pino.transport).toHaveBeenCalledWith({
      target: 'pino-pretty',
      options: expect.objectContaining({
        colorize: true,
        ignore: 'pid,hostname,module',
      }),
    });
    expect(pino.destination).not.toHaveBeenCalled();
  });

  it('should keep the module field when asked to', () => {
    process.env.LOG_INCLUDE_MODULE = 'true';

    createConsoleStream('development', ['reqId']);

    expect(pino.transport).toHaveBeenCalledWith(
      expect.objectContaining({
        options: expect.objectContaining({ ignore: 'pid,hostname,reqId' }),
      }),
    );
  });

  it('should write JSON to stdout elsewhere', () => {
    pino.destination.mockReturnValue({ kind: 'destination' });

    const stream = createConsoleStream('production');

    expect(stream).toEqual({ kind: 'destination' });
    expect(pino.destination).toHaveBeenCalledWith({ dest: 1, sync: false });
    expect(pino.transport).not.toHaveBeenCalled();
  });
});
