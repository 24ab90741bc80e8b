import { EventEmitter } from 'node:events';
import { configManager } from '../config/manager.js';
import { createLogger } from '../utils/logger.js';
import { AuthenticationError } from './errors.js';
import type { LoginOrchestrator } from './login-orchestrator.js';
import type { TokenExchanger } from './token-exchanger.js';
import type {
  CredentialBundle,
  ManagerState,
  Session,
  SessionSnapshot,
  SessionStatusEvent,
  StatusEventType,
} from './types.js';

const log = createLogger('session-manager');

export interface SessionManagerEvents {
  status: [SessionStatusEvent];
}

/** Persistence for the live token so a restart can reuse it. */
export interface TokenCache {
  load(now: number): Session | null;
  save(session: Session): void;
  clear(): void;
}

export interface SessionManagerDependencies {
  loadBundle: () => CredentialBundle;
  orchestrator: Pick<LoginOrchestrator, 'login' | 'getAttempts'>;
  exchanger: Pick<TokenExchanger, 'refresh' | 'verify' | 'logout'>;
  tokenCache?: TokenCache;
}

export interface SessionManagerOptions {
  safetyMarginMs: number;
  verifyCachedToken: boolean;
  /** When false the first call always runs a login. Defaults to true. */
  reuseCachedToken?: boolean;
  now?: () => number;
}

export function loadSessionOptions(): SessionManagerOptions {
  return {
    safetyMarginMs: configManager.get<number>('session.safetyMarginSeconds') * 1000,
    verifyCachedToken: configManager.get<boolean>('session.verifyCachedToken'),
  };
}

export class SessionManager extends EventEmitter<SessionManagerEvents> {
  private state: ManagerState = 'UNINITIALIZED';
  private session: Session | null = null;
  private inflight: Promise<Session> | null = null;
  private controller: AbortController | null = null;
  private cacheChecked = false;
  private lastError: string | null = null;
  private now: () => number;

  constructor(
    private deps: SessionManagerDependencies,
    private opts: SessionManagerOptions,
  ) {
    super();
    this.now = opts.now ?? Date.now;
  }

  /**
   * Returns an access token that is valid for at least the safety margin.
   * Concurrent callers share one authentication run.
   */
  async getValidToken(): Promise<string> {
    const current = this.session;
    if (this.state === 'VALID' && current && this.now() < current.expiresAt - this.opts.safetyMarginMs) {
      return current.accessToken;
    }

    if (!this.inflight) {
      this.controller = new AbortController();
      const signal = this.controller.signal;
      this.transition('AUTHENTICATING');
      this.inflight = this.authenticate(signal).finally(() => {
        this.inflight = null;
        this.controller = null;
      });
    }

    const session = await this.inflight;
    return session.accessToken;
  }

  /**
   * Reports a token the broker refused. A stale token (not the current one) is
   * ignored; otherwise the next getValidToken() runs a full login.
   */
  invalidate(token?: string): void {
    const current = this.session;
    if (!current) return;
    if (token !== undefined && token !== current.accessToken) {
      log.debug('Ignoring invalidation of a stale token');
      return;
    }
    current.status = 'REVOKED';
    this.useCache('clear', (cache) => cache.clear());
    this.transition('EXPIRED', 'REVOKED', 'token invalidated');
  }

  /** Cancels any in-flight login first, so the token it would issue is never left live. */
  async logout(): Promise<void> {
    await this.cancelInflight('Logging out');
    const current = this.session;
    if (current && current.status === 'VALID') {
      await this.deps.exchanger.logout(current.accessToken);
    }
    if (current) current.status = 'REVOKED';
    this.useCache('clear', (cache) => cache.clear());
    this.transition('REVOKED', 'REVOKED', 'logged out');
  }

  /** Moves a live session to EXPIRING or EXPIRED by the clock. Never starts a login. */
  checkExpiry(): ManagerState {
    const current = this.session;
    if (!current || (this.state !== 'VALID' && this.state !== 'EXPIRING')) {
      return this.state;
    }
    const now = this.now();
    if (now >= current.expiresAt) {
      current.status = 'EXPIRED';
      this.transition('EXPIRED');
    } else if (this.state === 'VALID' && now >= current.expiresAt - this.opts.safetyMarginMs) {
      this.transition('EXPIRING');
    }
    return this.state;
  }

  getStatus(): SessionSnapshot {
    const current = this.session;
    const now = this.now();
    return {
      state: this.state,
      sessionStatus: current?.status ?? 'UNINITIALIZED',
      issuedAt: current ? new Date(current.issuedAt).toISOString() : null,
      expiresAt: current ? new Date(current.expiresAt).toISOString() : null,
      expiresInSeconds: current ? Math.max(0, Math.floor((current.expiresAt - now) / 1000)) : null,
      authenticating: this.inflight !== null,
      lastError: this.lastError,
      lastAttempts: this.deps.orchestrator.getAttempts(),
    };
  }

  getState(): ManagerState {
    return this.state;
  }

  /** Cancels an in-flight login and waits for it to release the browser. */
  async shutdown(): Promise<void> {
    await this.cancelInflight('Session manager shutting down');
  }

  private async cancelInflight(reason: string): Promise<void> {
    const pending = this.inflight;
    if (!pending) return;
    this.controller?.abort(new Error(reason));
    try {
      await pending;
    } catch (err) {
      log.info({ err: err instanceof Error ? err.message : String(err) }, 'In-flight login cancelled');
    }
  }

  private async authenticate(signal: AbortSignal): Promise<Session> {
    try {
      const session = await this.acquire(signal);
      if (session.expiresAt <= this.now()) {
        throw new AuthenticationError('Broker issued a token that is already expired');
      }
      this.session = session;
      this.lastError = null;
      this.useCache('save', (cache) => cache.save(session));
      this.transition('VALID', undefined, undefined, session.expiresAt);
      return session;
    } catch (err) {
      const failure = AuthenticationError.wrap(err);
      this.lastError = failure.message;
      if (this.session) this.session.status = 'REVOKED';
      this.transition('REVOKED', 'FAILED', failure.message);
      log.error({ err: failure.message, attempts: failure.attempts.length }, 'Authentication failed');
      throw failure;
    }
  }

  private async acquire(signal: AbortSignal): Promise<Session> {
    const bundle = this.deps.loadBundle();
    const previous = this.session;

    if (!previous && !this.cacheChecked && this.opts.reuseCachedToken !== false) {
      this.cacheChecked = true;
      const cached = await this.adoptCachedToken(bundle);
      if (cached) return cached;
    }

    // Refresh only applies to a session that is still live; an invalidated token goes through a full login.
    if (previous && previous.status === 'VALID' && previous.expiresAt > this.now()) {
      const refreshed = await this.tryRefresh(previous, bundle);
      if (refreshed) return refreshed;
    }

    return this.deps.orchestrator.login(bundle, signal);
  }

  private async tryRefresh(previous: Session, bundle: CredentialBundle): Promise<Session | null> {
    try {
      return await this.deps.exchanger.refresh(previous, bundle);
    } catch (err) {
      log.warn({ err: err instanceof Error ? err.message : String(err) }, 'Token refresh failed, logging in');
      return null;
    }
  }

  private async adoptCachedToken(bundle: CredentialBundle): Promise<Session | null> {
    const now = this.now();
    const candidates: Session[] = [];
    if (bundle.cachedToken && bundle.cachedTokenExpiry !== undefined) {
      candidates.push({
        accessToken: bundle.cachedToken,
        issuedAt: now,
        expiresAt: bundle.cachedTokenExpiry,
        status: 'VALID',
      });
    }
    const persisted = this.useCache('load', (cache) => cache.load(now));
    if (persisted) candidates.push(persisted);

    for (const candidate of candidates) {
      if (now >= candidate.expiresAt - this.opts.safetyMarginMs) continue;
      if (this.opts.verifyCachedToken && !(await this.deps.exchanger.verify(candidate.accessToken))) {
        continue;
      }
      log.info({ expiresAt: new Date(candidate.expiresAt).toISOString() }, 'Reusing cached access token');
      return candidate;
    }
    return null;
  }

  // The cache only survives restarts; a failing write never costs the live session.
  private useCache<T>(action: 'load' | 'save' | 'clear', fn: (cache: TokenCache) => T): T | null {
    const cache = this.deps.tokenCache;
    if (!cache) return null;
    try {
      return fn(cache);
    } catch (err) {
      log.warn({ action, err: err instanceof Error ? err.message : String(err) }, 'Token cache failed');
      return null;
    }
  }

  private transition(
    state: Exclude<ManagerState, 'UNINITIALIZED'>,
    event: StatusEventType = state,
    reason?: string,
    expiresAt?: number,
  ): void {
    const from = this.state;
    this.state = state;
    log.info({ from, to: state, reason }, 'Session state changed');
    const payload: SessionStatusEvent = { type: event, at: this.now() };
    if (reason !== undefined) payload.reason = reason;
    if (expiresAt !== undefined) payload.expiresAt = expiresAt;
    this.emit('status', payload);
  }
}
