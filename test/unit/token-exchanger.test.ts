import { beforeEach, describe, expect, it, vi } from 'vitest';

const mockWarn = vi.fn();
vi.mock('../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: (...args: unknown[]) => mockWarn(...args),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

vi.mock('../../src/config/manager.js', () => ({
  configManager: { get: vi.fn() },
}));

const mockGet = vi.fn();
const mockPost = vi.fn();
const mockDelete = vi.fn();
const mockCreate = vi.fn().mockReturnValue({ get: mockGet, post: mockPost, delete: mockDelete });
vi.mock('axios', () => ({
  default: { create: (...args: unknown[]) => mockCreate(...args) },
}));

import { ExchangeError } from '../../src/auth/errors.js';
import {
  buildAuthorizationUrl,
  nextDailyCutoff,
  TokenExchanger,
  type TokenExchangerOptions,
} from '../../src/auth/token-exchanger.js';
import type { CredentialBundle } from '../../src/auth/types.js';

const NOW = Date.UTC(2026, 0, 5, 4, 0); // 09:30 IST

const bundle: CredentialBundle = {
  apiKey: 'test-api-key',
  apiSecret: 'test-secret',
  redirectUri: 'https://localhost:5000/callback',
  mobileNumber: '9000000001',
  totpSeed: 'GEZDGNBVGY3TQOJQ',
  mpin: '1234',
};

function makeExchanger(overrides: Partial<TokenExchangerOptions> = {}): TokenExchanger {
  return new TokenExchanger({
    tokenUrl: 'https://broker.test/v2/login/authorization/token',
    apiBaseUrl: 'https://broker.test/v2',
    refreshSupported: false,
    timeoutMs: 15000,
    dailyExpiry: '03:30',
    utcOffsetMinutes: 330,
    now: () => NOW,
    ...overrides,
  });
}

describe('nextDailyCutoff', () => {
  it('rolls to the next day once today\'s cutoff has passed', () => {
    expect(new Date(nextDailyCutoff(NOW, '03:30', 330)).toISOString()).toBe(
      '2026-01-05T22:00:00.000Z',
    );
  });

  it('uses today\'s cutoff when it is still ahead', () => {
    const issuedAt = Date.UTC(2026, 0, 5, 20, 0); // 01:30 IST on the 6th
    expect(new Date(nextDailyCutoff(issuedAt, '03:30', 330)).toISOString()).toBe(
      '2026-01-05T22:00:00.000Z',
    );
  });

  it('is strictly after the issue time at the cutoff itself', () => {
    const issuedAt = Date.UTC(2026, 0, 5, 22, 0);
    expect(new Date(nextDailyCutoff(issuedAt, '03:30', 330)).toISOString()).toBe(
      '2026-01-06T22:00:00.000Z',
    );
  });
});

describe('buildAuthorizationUrl', () => {
  it('adds the OAuth query parameters', () => {
    const url = new URL(
      buildAuthorizationUrl('https://broker.test/v2/login/authorization/dialog', bundle),
    );
    expect(url.searchParams.get('response_type')).toBe('code');
    expect(url.searchParams.get('client_id')).toBe('test-api-key');
    expect(url.searchParams.get('redirect_uri')).toBe('https://localhost:5000/callback');
  });
});

describe('TokenExchanger', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('exchange', () => {
    it('posts the authorization code as a form', async () => {
      mockPost.mockResolvedValue({ status: 200, data: { access_token: 'test-access-token' } });

      await makeExchanger().exchange('auth-code', bundle);

      expect(mockPost).toHaveBeenCalledTimes(1);
      const [url, body, config] = mockPost.mock.calls[0];
      expect(url).toBe('https://broker.test/v2/login/authorization/token');
      expect(Object.fromEntries(new URLSearchParams(String(body)))).toEqual({
        code: 'auth-code',
        client_id: 'test-api-key',
        client_secret: 'test-secret',
        redirect_uri: 'https://localhost:5000/callback',
        grant_type: 'authorization_code',
      });
      expect(config).toMatchObject({
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      });
    });

    it('expires at the daily cutoff when the body has no expires_in', async () => {
      mockPost.mockResolvedValue({ status: 200, data: { access_token: 'test-access-token' } });

      const session = await makeExchanger().exchange('auth-code', bundle);

      expect(session).toEqual({
        accessToken: 'test-access-token',
        issuedAt: NOW,
        expiresAt: Date.UTC(2026, 0, 5, 22, 0),
        status: 'VALID',
      });
    });

    it('prefers expires_in when present', async () => {
      mockPost.mockResolvedValue({
        status: 200,
        data: { access_token: 'test-access-token', expires_in: 3600, refresh_token: 'test-refresh' },
      });

      const session = await makeExchanger().exchange('auth-code', bundle);

      expect(session.expiresAt).toBe(NOW + 3_600_000);
      expect(session.refreshToken).toBe('test-refresh');
    });

    it('raises ExchangeError with the broker message on a rejection', async () => {
      mockPost.mockResolvedValue({
        status: 400,
        data: { status: 'error', errors: [{ message: 'Invalid Auth code' }] },
      });

      const err = await makeExchanger()
        .exchange('used-code', bundle)
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ExchangeError);
      if (!(err instanceof ExchangeError)) return;
      expect(err.message).toBe('Token exchange failed (400): Invalid Auth code');
      expect(err.statusCode).toBe(400);
      expect(err.message).not.toContain('test-secret');
    });

    it('raises ExchangeError on a network failure', async () => {
      mockPost.mockRejectedValue(new Error('socket hang up'));

      await expect(makeExchanger().exchange('auth-code', bundle)).rejects.toThrow(
        'Token exchange request failed: network error',
      );
    });

    it('raises ExchangeError when access_token is missing', async () => {
      mockPost.mockResolvedValue({ status: 200, data: { status: 'success' } });

      await expect(makeExchanger().exchange('auth-code', bundle)).rejects.toThrow(
        'Token exchange response is missing access_token',
      );
    });
  });

  describe('refresh', () => {
    const session = {
      accessToken: 'old-token',
      issuedAt: NOW - 1000,
      expiresAt: NOW + 60_000,
      status: 'VALID' as const,
      refreshToken: 'test-refresh',
    };

    it('returns null when the broker has no refresh support', async () => {
      expect(await makeExchanger().refresh(session, bundle)).toBeNull();
      expect(mockPost).not.toHaveBeenCalled();
    });

    it('returns null without a refresh token', async () => {
      const { refreshToken: _unused, ...withoutRefresh } = session;
      expect(
        await makeExchanger({ refreshSupported: true }).refresh(withoutRefresh, bundle),
      ).toBeNull();
    });

    it('exchanges the refresh token and keeps it when none is returned', async () => {
      mockPost.mockResolvedValue({ status: 200, data: { access_token: 'new-token', expires_in: 600 } });

      const refreshed = await makeExchanger({ refreshSupported: true }).refresh(session, bundle);

      expect(refreshed).toEqual({
        accessToken: 'new-token',
        issuedAt: NOW,
        expiresAt: NOW + 600_000,
        status: 'VALID',
        refreshToken: 'test-refresh',
      });
      const body = new URLSearchParams(String(mockPost.mock.calls[0][1]));
      expect(body.get('grant_type')).toBe('refresh_token');
      expect(body.get('refresh_token')).toBe('test-refresh');
    });
  });

  describe('verify', () => {
    it('accepts a token the profile endpoint answers with 200', async () => {
      mockGet.mockResolvedValue({ status: 200, data: {} });

      expect(await makeExchanger().verify('test-access-token')).toBe(true);
      expect(mockGet).toHaveBeenCalledWith(
        'https://broker.test/v2/user/profile',
        expect.objectContaining({
          headers: expect.objectContaining({ Authorization: 'Bearer test-access-token' }),
        }),
      );
    });

    it('rejects on 401', async () => {
      mockGet.mockResolvedValue({ status: 401, data: {} });
      expect(await makeExchanger().verify('test-access-token')).toBe(false);
    });

    it('rejects when the request fails and logs only the message', async () => {
      const failure = Object.assign(new Error('ECONNRESET'), {
        config: { headers: { Authorization: 'Bearer test-access-token' } },
      });
      mockGet.mockRejectedValue(failure);

      expect(await makeExchanger().verify('test-access-token')).toBe(false);
      expect(mockWarn).toHaveBeenCalledWith({ err: 'ECONNRESET' }, 'Token verification request failed');
    });
  });

  describe('logout', () => {
    it('calls the logout endpoint and swallows failures', async () => {
      mockDelete.mockRejectedValue(new Error('ECONNRESET'));

      await expect(makeExchanger().logout('test-access-token')).resolves.toBeUndefined();
      expect(mockDelete).toHaveBeenCalledWith('https://broker.test/v2/logout', expect.any(Object));
      expect(mockWarn).toHaveBeenCalledWith({ err: 'ECONNRESET' }, 'Broker logout request failed');
    });
  });
});
