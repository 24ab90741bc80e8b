import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

function mockPino() {
  const mockChild = vi.fn().mockReturnValue({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  });
  const mockPinoFn = vi.fn().mockReturnValue({
    child: mockChild,
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    level: 'info',
  });
  (mockPinoFn as Record<string, unknown>).stdSerializers = { err: vi.fn() };
  vi.doMock('pino', () => ({ default: mockPinoFn }));
  return { mockPinoFn, mockChild };
}

describe('logger', () => {
  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('uses the pino-pretty transport outside production', async () => {
    vi.stubEnv('NODE_ENV', 'development');
    const { mockPinoFn } = mockPino();

    await import('../../src/utils/logger.js');

    expect(mockPinoFn).toHaveBeenCalledWith(
      expect.objectContaining({
        transport: expect.objectContaining({ target: 'pino-pretty' }),
      }),
    );
  });

  it('writes plain JSON in production', async () => {
    vi.stubEnv('NODE_ENV', 'production');
    const { mockPinoFn } = mockPino();

    await import('../../src/utils/logger.js');

    expect(mockPinoFn).toHaveBeenCalledWith(expect.objectContaining({ transport: undefined }));
  });

  it('takes the level from LOG_LEVEL', async () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    const { mockPinoFn } = mockPino();

    await import('../../src/utils/logger.js');

    expect(mockPinoFn).toHaveBeenCalledWith(expect.objectContaining({ level: 'debug' }));
  });

  it('defaults to info', async () => {
    vi.stubEnv('LOG_LEVEL', '');
    const { mockPinoFn } = mockPino();

    await import('../../src/utils/logger.js');

    expect(mockPinoFn).toHaveBeenCalledWith(expect.objectContaining({ level: 'info' }));
  });

  it('redacts credentials and tokens at the top level and one level down', async () => {
    const { mockPinoFn } = mockPino();

    await import('../../src/utils/logger.js');

    const [options] = mockPinoFn.mock.calls[0];
    expect(options.redact.censor).toBe('[REDACTED]');
    expect(options.redact.paths).toEqual(
      expect.arrayContaining(['accessToken', 'mpin', 'totpSeed', 'apiSecret', '*.accessToken', '*.mpin']),
    );
  });

  it('creates child loggers tagged with the module name', async () => {
    const { mockChild } = mockPino();

    const { createLogger } = await import('../../src/utils/logger.js');
    createLogger('session-manager');
    createLogger('token-exchanger');

    expect(mockChild).toHaveBeenCalledWith({ module: 'session-manager' });
    expect(mockChild).toHaveBeenCalledWith({ module: 'token-exchanger' });
  });
});
