import { configManager } from '../config/manager.js';
import { backoffDelay, randomBetween, sleep, withTimeout } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';
import type { BrowserLauncher, BrowserSession } from './browser.js';
import type { DriverProvisioner } from './driver-provisioner.js';
import {
  type AttemptSummary,
  AuthenticationError,
  LoginFlowError,
  SessionError,
} from './errors.js';
import type { ManualCodeSource } from './manual-login.js';
import { buildAuthorizationUrl, type TokenExchanger } from './token-exchanger.js';
import { adjacentTotp, generateTotp } from './totp.js';
import type { CredentialBundle, LoginAttempt, LoginStage, Session } from './types.js';

const log = createLogger('login-orchestrator');

export interface LoginSelectors {
  mobile: string;
  requestOtp: string;
  totp: string;
  totpSubmit: string;
  pin: string;
  pinSubmit: string;
}

export interface LoginOrchestratorOptions {
  mode: 'automated' | 'manual';
  authorizeUrl: string;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  stageTimeoutMs: number;
  actionDelayMinMs: number;
  actionDelayMaxMs: number;
  lockoutPattern: RegExp;
  invalidTotpPattern: RegExp;
  invalidPinPattern: RegExp;
  selectors: LoginSelectors;
  pollIntervalMs?: number;
  /** Bound on the lockout page read and browser close once a stage has failed. */
  cleanupTimeoutMs?: number;
  now?: () => number;
  onAttemptEnd?: (attempt: LoginAttempt) => void;
}

export interface LoginDependencies {
  provisioner: Pick<DriverProvisioner, 'detectBrowserVersion' | 'ensureDriverWithRetry'>;
  launcher: BrowserLauncher;
  exchanger: Pick<TokenExchanger, 'exchange'>;
  manual?: Pick<ManualCodeSource, 'obtainRedirectUrl'>;
}

export function loadLoginOptions(): LoginOrchestratorOptions {
  const pattern = (key: string) => new RegExp(configManager.get<string>(key), 'i');
  return {
    mode: configManager.get<'automated' | 'manual'>('login.mode'),
    authorizeUrl: configManager.get<string>('broker.authorizeUrl'),
    maxAttempts: configManager.get<number>('login.maxAttempts'),
    backoffBaseMs: configManager.get<number>('login.backoffBaseMs'),
    backoffMaxMs: configManager.get<number>('login.backoffMaxMs'),
    stageTimeoutMs: configManager.get<number>('login.stageTimeoutMs'),
    actionDelayMinMs: configManager.get<number>('login.actionDelayMinMs'),
    actionDelayMaxMs: configManager.get<number>('login.actionDelayMaxMs'),
    lockoutPattern: pattern('login.lockoutPattern'),
    invalidTotpPattern: pattern('login.invalidTotpPattern'),
    invalidPinPattern: pattern('login.invalidPinPattern'),
    selectors: {
      mobile: configManager.get<string>('login.selectors.mobile'),
      requestOtp: configManager.get<string>('login.selectors.requestOtp'),
      totp: configManager.get<string>('login.selectors.totp'),
      totpSubmit: configManager.get<string>('login.selectors.totpSubmit'),
      pin: configManager.get<string>('login.selectors.pin'),
      pinSubmit: configManager.get<string>('login.selectors.pinSubmit'),
    },
  };
}

/** True when `url` points at the registered redirect (same origin and path). */
export function isRedirectUrl(url: string, redirectUri: string): boolean {
  try {
    const actual = new URL(url);
    const expected = new URL(redirectUri);
    const trim = (p: string) => p.replace(/\/+$/, '');
    return actual.origin === expected.origin && trim(actual.pathname) === trim(expected.pathname);
  } catch {
    return false;
  }
}

export function parseAuthorizationCode(url: string): string {
  let params: URLSearchParams;
  try {
    params = new URL(url).searchParams;
  } catch {
    throw new LoginFlowError('REDIRECT_CAPTURED', 'redirect is not a valid URL');
  }
  const brokerError = params.get('error');
  if (brokerError) {
    const description = params.get('error_description');
    throw new LoginFlowError(
      'REDIRECT_CAPTURED',
      description ? `${brokerError}: ${description}` : brokerError,
    );
  }
  const code = params.get('code')?.trim();
  if (!code) {
    throw new LoginFlowError('REDIRECT_CAPTURED', 'no code');
  }
  return code;
}

type Outcome = 'accepted' | 'rejected';

export class LoginOrchestrator {
  private attempts: LoginAttempt[] = [];
  private now: () => number;
  private pollIntervalMs: number;
  private cleanupTimeoutMs: number;

  constructor(
    private deps: LoginDependencies,
    private opts: LoginOrchestratorOptions,
  ) {
    this.now = opts.now ?? Date.now;
    this.pollIntervalMs = opts.pollIntervalMs ?? 250;
    this.cleanupTimeoutMs = opts.cleanupTimeoutMs ?? 5_000;
  }

  getAttempts(): LoginAttempt[] {
    return this.attempts.map((a) => ({ ...a }));
  }

  /**
   * Runs full login attempts (browser flow then token exchange) until one
   * yields a session. Each retry starts over from START.
   */
  async login(bundle: CredentialBundle, signal?: AbortSignal): Promise<Session> {
    this.attempts = [];
    const summaries: AttemptSummary[] = [];
    let lastError: Error | undefined;

    for (let n = 1; n <= this.opts.maxAttempts; n++) {
      this.throwIfCancelled(signal, summaries);

      const attempt: LoginAttempt = {
        attemptNumber: n,
        startedAt: this.now(),
        stageReached: 'START',
        lastError: null,
      };
      this.attempts.push(attempt);
      log.info({ attempt: n, maxAttempts: this.opts.maxAttempts }, 'Login attempt started');

      try {
        const code = await this.runAttempt(attempt, bundle, signal);
        const session = await this.deps.exchanger.exchange(code, bundle);
        this.opts.onAttemptEnd?.(attempt);
        return session;
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));
        attempt.lastError = lastError.message;
        summaries.push({
          attemptNumber: n,
          stageReached: attempt.stageReached,
          error: lastError.message,
        });
        this.opts.onAttemptEnd?.(attempt);
        this.throwIfCancelled(signal, summaries);

        const retryable = lastError instanceof SessionError ? lastError.retryable : true;
        log.warn(
          { attempt: n, stageReached: attempt.stageReached, retryable, err: lastError.message },
          'Login attempt failed',
        );
        if (!retryable) {
          throw new AuthenticationError(`Login aborted: ${lastError.message}`, summaries, {
            cause: lastError,
          });
        }

        if (n < this.opts.maxAttempts) {
          const delayMs = backoffDelay(n, this.opts.backoffBaseMs, this.opts.backoffMaxMs);
          log.info({ attempt: n, delayMs }, 'Backing off before next login attempt');
          try {
            await sleep(delayMs, signal);
          } catch {
            this.throwIfCancelled(signal, summaries);
          }
        }
      }
    }

    throw new AuthenticationError(
      `Login failed after ${this.opts.maxAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
      summaries,
      { cause: lastError },
    );
  }

  /** One attempt from START to DONE; resolves with the authorization code. */
  async runAttempt(
    attempt: LoginAttempt,
    bundle: CredentialBundle,
    signal?: AbortSignal,
  ): Promise<string> {
    const authUrl = buildAuthorizationUrl(this.opts.authorizeUrl, bundle);

    if (this.opts.mode === 'manual') {
      return this.runManual(attempt, authUrl, bundle, signal);
    }

    const browserVersion = await this.deps.provisioner.detectBrowserVersion();
    const driver = await this.deps.provisioner.ensureDriverWithRetry(browserVersion, signal);
    const browser = await this.deps.launcher.launch(driver);

    const onAbort = () => {
      browser.close().catch((err) => log.warn({ err }, 'Browser close on cancel failed'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      await this.stage(attempt, 'CREDENTIALS_ENTERED', browser, signal, async () => {
        const { selectors } = this.opts;
        await browser.navigate(authUrl);
        await browser.waitForElement(selectors.mobile, this.opts.stageTimeoutMs);
        await this.pause(signal);
        await browser.type(selectors.mobile, bundle.mobileNumber);
        await browser.click(selectors.requestOtp);
      });

      await this.stage(attempt, 'TOTP_SUBMITTED', browser, signal, async (deadline) => {
        await this.submitTotp(browser, bundle, deadline, signal);
      });

      await this.stage(attempt, 'CONSENT_CONFIRMED', browser, signal, async (deadline) => {
        const { selectors } = this.opts;
        await this.pause(signal);
        await browser.type(selectors.pin, bundle.mpin);
        await browser.click(selectors.pinSubmit);
        const outcome = await this.awaitOutcome(deadline, signal, async () => {
          if (isRedirectUrl(await browser.currentUrl(), bundle.redirectUri)) return 'accepted';
          if (this.opts.invalidPinPattern.test(await browser.pageText())) return 'rejected';
          return null;
        });
        if (outcome === 'rejected') {
          throw new LoginFlowError('CONSENT_CONFIRMED', 'MPIN rejected');
        }
      });

      const code = await this.stage(attempt, 'REDIRECT_CAPTURED', browser, signal, async () =>
        parseAuthorizationCode(await browser.currentUrl()),
      );

      attempt.stageReached = 'DONE';
      log.info({ attempt: attempt.attemptNumber }, 'Authorization code captured');
      return code;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await this.closeBrowser(browser);
    }
  }

  private async runManual(
    attempt: LoginAttempt,
    authUrl: string,
    bundle: CredentialBundle,
    signal?: AbortSignal,
  ): Promise<string> {
    if (!this.deps.manual) {
      throw new LoginFlowError('START', 'manual login mode has no code source');
    }
    const redirected = await this.deps.manual.obtainRedirectUrl(authUrl, signal);
    if (!isRedirectUrl(redirected, bundle.redirectUri)) {
      throw new LoginFlowError('REDIRECT_CAPTURED', 'pasted URL is not the registered redirect');
    }
    const code = parseAuthorizationCode(redirected);
    attempt.stageReached = 'DONE';
    return code;
  }

  /** Enters the current TOTP; on an "invalid code" reply tries the adjacent step once. */
  private async submitTotp(
    browser: BrowserSession,
    bundle: CredentialBundle,
    deadline: number,
    signal?: AbortSignal,
  ): Promise<void> {
    const { selectors } = this.opts;
    await browser.waitForElement(selectors.totp, Math.max(deadline - this.now(), 0));
    await this.pause(signal);

    const generatedAt = this.now();
    const codes = [generateTotp(bundle.totpSeed, generatedAt), adjacentTotp(bundle.totpSeed, generatedAt)];

    for (let i = 0; i < codes.length; i++) {
      await browser.type(selectors.totp, codes[i]);
      await browser.click(selectors.totpSubmit);
      const outcome = await this.awaitOutcome(deadline, signal, async () => {
        if (await browser.exists(selectors.pin)) return 'accepted';
        if (this.opts.invalidTotpPattern.test(await browser.pageText())) return 'rejected';
        return null;
      });
      if (outcome === 'accepted') return;
      log.warn({ retry: i === 0 }, 'TOTP rejected');
    }
    throw new LoginFlowError('TOTP_SUBMITTED', 'TOTP rejected for current and adjacent time step');
  }

  private async stage<T>(
    attempt: LoginAttempt,
    stage: LoginStage,
    browser: BrowserSession,
    signal: AbortSignal | undefined,
    fn: (deadline: number) => Promise<T>,
  ): Promise<T> {
    if (signal?.aborted) throw new LoginFlowError(stage, 'cancelled');
    const timeoutMs = this.opts.stageTimeoutMs;
    const deadline = this.now() + timeoutMs;

    try {
      const result = await withTimeout(fn(deadline), timeoutMs, () =>
        LoginFlowError.timedOut(stage, timeoutMs),
      );
      attempt.stageReached = stage;
      log.info({ attempt: attempt.attemptNumber, stage }, 'Login stage reached');
      return result;
    } catch (err) {
      if (signal?.aborted) throw new LoginFlowError(stage, 'cancelled');
      if (this.opts.lockoutPattern.test(await this.safePageText(browser))) {
        throw LoginFlowError.lockedOut(stage);
      }
      if (err instanceof LoginFlowError) throw err;
      throw new LoginFlowError(stage, err instanceof Error ? err.message : String(err));
    }
  }

  private async awaitOutcome(
    deadline: number,
    signal: AbortSignal | undefined,
    check: () => Promise<Outcome | null>,
  ): Promise<Outcome> {
    for (;;) {
      const outcome = await check();
      if (outcome) return outcome;
      if (this.now() >= deadline) {
        throw new Error('page did not respond before the stage deadline');
      }
      await sleep(this.pollIntervalMs, signal);
    }
  }

  // A hung driver queues every later command, so reads after a failure are bounded.
  private async safePageText(browser: BrowserSession): Promise<string> {
    try {
      return await withTimeout(
        browser.pageText(),
        this.cleanupTimeoutMs,
        () => new Error('Page text read timed out'),
      );
    } catch (err) {
      log.debug({ err: err instanceof Error ? err.message : String(err) }, 'Page text unavailable');
      return '';
    }
  }

  private async closeBrowser(browser: BrowserSession): Promise<void> {
    try {
      await withTimeout(browser.close(), this.cleanupTimeoutMs, () => new Error('Browser close timed out'));
    } catch (err) {
      log.warn({ err: err instanceof Error ? err.message : String(err) }, 'Browser close failed');
    }
  }

  private async pause(signal?: AbortSignal): Promise<void> {
    const ms = randomBetween(this.opts.actionDelayMinMs, this.opts.actionDelayMaxMs);
    if (ms > 0) await sleep(ms, signal);
  }

  private throwIfCancelled(signal: AbortSignal | undefined, summaries: AttemptSummary[]): void {
    if (signal?.aborted) {
      throw new AuthenticationError('Login cancelled', summaries);
    }
  }
}
