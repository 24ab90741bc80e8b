import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import { configManager } from '../config/manager.js';
import { createLogger } from '../utils/logger.js';
import { ExchangeError } from './errors.js';
import type { CredentialBundle, Session } from './types.js';

const log = createLogger('token-exchanger');

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().optional(),
  refresh_token: z.string().min(1).optional(),
});

export interface TokenExchangerOptions {
  tokenUrl: string;
  apiBaseUrl: string;
  refreshSupported: boolean;
  timeoutMs: number;
  /** Broker cutoff "HH:MM" used when the response carries no expires_in. */
  dailyExpiry: string;
  utcOffsetMinutes: number;
  http?: AxiosInstance;
  now?: () => number;
}

export function loadExchangerOptions(): TokenExchangerOptions {
  return {
    tokenUrl: configManager.get<string>('broker.tokenUrl'),
    apiBaseUrl: configManager.get<string>('broker.apiBaseUrl'),
    refreshSupported: configManager.get<boolean>('broker.refreshSupported'),
    timeoutMs: configManager.get<number>('broker.requestTimeoutMs'),
    dailyExpiry: configManager.get<string>('session.dailyExpiry'),
    utcOffsetMinutes: configManager.get<number>('session.utcOffsetMinutes'),
  };
}

/**
 * Next occurrence of the daily "HH:MM" cutoff (in a fixed UTC offset) strictly
 * after `issuedAt`.
 */
export function nextDailyCutoff(issuedAt: number, hhmm: string, utcOffsetMinutes: number): number {
  const [hours, minutes] = hhmm.split(':').map(Number);
  const offsetMs = utcOffsetMinutes * 60_000;
  const local = new Date(issuedAt + offsetMs);
  let cutoff =
    Date.UTC(local.getUTCFullYear(), local.getUTCMonth(), local.getUTCDate(), hours, minutes) -
    offsetMs;
  if (cutoff <= issuedAt) cutoff += 24 * 60 * 60 * 1000;
  return cutoff;
}

export function buildAuthorizationUrl(authorizeUrl: string, bundle: CredentialBundle): string {
  const url = new URL(authorizeUrl);
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('client_id', bundle.apiKey);
  url.searchParams.set('redirect_uri', bundle.redirectUri);
  return url.toString();
}

/** Message only: a request error carries its config, bearer header included. */
export function describeRequestError(err: unknown): { err: string } {
  return { err: err instanceof Error ? err.message : String(err) };
}

export class TokenExchanger {
  private http: AxiosInstance;
  private now: () => number;

  constructor(private opts: TokenExchangerOptions) {
    this.http = opts.http ?? axios.create({ timeout: opts.timeoutMs });
    this.now = opts.now ?? Date.now;
  }

  /** Trades a single-use authorization code for an access token. */
  async exchange(authCode: string, bundle: CredentialBundle): Promise<Session> {
    const form = new URLSearchParams({
      code: authCode,
      client_id: bundle.apiKey,
      client_secret: bundle.apiSecret,
      redirect_uri: bundle.redirectUri,
      grant_type: 'authorization_code',
    });
    const session = await this.postForm(form, 'Token exchange');
    log.info({ expiresAt: new Date(session.expiresAt).toISOString() }, 'Access token issued');
    return session;
  }

  /** Returns null when the broker has no refresh tokens, which means a full login is needed. */
  async refresh(session: Session, bundle: CredentialBundle): Promise<Session | null> {
    if (!this.opts.refreshSupported || !session.refreshToken) {
      return null;
    }
    const form = new URLSearchParams({
      refresh_token: session.refreshToken,
      client_id: bundle.apiKey,
      client_secret: bundle.apiSecret,
      grant_type: 'refresh_token',
    });
    const refreshed = await this.postForm(form, 'Token refresh');
    log.info({ expiresAt: new Date(refreshed.expiresAt).toISOString() }, 'Access token refreshed');
    return { ...refreshed, refreshToken: refreshed.refreshToken ?? session.refreshToken };
  }

  /** Calls the profile endpoint. Anything but a 2xx means the token cannot be trusted. */
  async verify(accessToken: string): Promise<boolean> {
    try {
      const res = await this.http.get(`${this.opts.apiBaseUrl}/user/profile`, {
        headers: { Accept: 'application/json', Authorization: `Bearer ${accessToken}` },
        validateStatus: () => true,
      });
      if (res.status >= 200 && res.status < 300) return true;
      log.info({ status: res.status }, 'Cached token rejected by broker');
      return false;
    } catch (err) {
      log.warn(describeRequestError(err), 'Token verification request failed');
      return false;
    }
  }

  async logout(accessToken: string): Promise<void> {
    try {
      const res = await this.http.delete(`${this.opts.apiBaseUrl}/logout`, {
        headers: { Accept: 'application/json', Authorization: `Bearer ${accessToken}` },
        validateStatus: () => true,
      });
      if (res.status >= 300) {
        log.warn({ status: res.status }, 'Broker logout not acknowledged');
      }
    } catch (err) {
      log.warn(describeRequestError(err), 'Broker logout request failed');
    }
  }

  private async postForm(form: URLSearchParams, label: string): Promise<Session> {
    let res: AxiosResponse;
    try {
      res = await this.http.post(this.opts.tokenUrl, form.toString(), {
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        validateStatus: () => true,
      });
    } catch (err) {
      throw new ExchangeError(`${label} request failed: network error`, undefined, { cause: err });
    }

    if (res.status < 200 || res.status >= 300) {
      const err = ExchangeError.fromResponse(res.status, res.data);
      log.error({ status: res.status, message: err.message }, `${label} rejected`);
      throw err;
    }

    const parsed = tokenResponseSchema.safeParse(res.data);
    if (!parsed.success) {
      throw new ExchangeError(`${label} response is missing access_token`, res.status);
    }

    const issuedAt = this.now();
    const expiresAt =
      parsed.data.expires_in !== undefined
        ? issuedAt + parsed.data.expires_in * 1000
        : nextDailyCutoff(issuedAt, this.opts.dailyExpiry, this.opts.utcOffsetMinutes);
    if (expiresAt <= issuedAt) {
      throw new ExchangeError(`${label} returned an already expired token`, res.status);
    }

    return {
      accessToken: parsed.data.access_token,
      issuedAt,
      expiresAt,
      status: 'VALID',
      ...(parsed.data.refresh_token ? { refreshToken: parsed.data.refresh_token } : {}),
    };
  }
}
