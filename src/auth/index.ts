import { configManager } from '../config/manager.js';
import { sqliteTokenCache } from '../db/repositories/session-tokens.js';
import { getAuditLogger } from '../monitoring/audit-log.js';
import { SeleniumBrowserLauncher } from './browser.js';
import { DriverProvisioner, loadProvisionerOptions } from './driver-provisioner.js';
import { LoginOrchestrator, loadLoginOptions } from './login-orchestrator.js';
import { ManualCodeSource } from './manual-login.js';
import { SecretStore } from './secret-store.js';
import { SessionManager, loadSessionOptions } from './session-manager.js';
import { TokenExchanger, loadExchangerOptions } from './token-exchanger.js';

export { AuthenticationError, ConfigError, serializeError } from './errors.js';
export type { SessionManager } from './session-manager.js';
export type { SessionSnapshot, SessionStatusEvent } from './types.js';

export interface SessionStackOptions {
  /** Force the login mode regardless of `login.mode`. */
  mode?: 'automated' | 'manual';
  persistTokens?: boolean;
  /** Skip cached tokens and always log in on first use. */
  fresh?: boolean;
}

/**
 * Builds a SessionManager wired to the configured broker, browser and token
 * cache. Requires initDatabase() and seeded config.
 */
export function createSessionManager(options: SessionStackOptions = {}): SessionManager {
  const audit = getAuditLogger();
  const secretStore = new SecretStore({
    filePath: configManager.get<string>('auth.credentialsFile'),
  });
  const exchanger = new TokenExchanger(loadExchangerOptions());
  const loginOptions = loadLoginOptions();

  const orchestrator = new LoginOrchestrator(
    {
      provisioner: new DriverProvisioner(loadProvisionerOptions()),
      launcher: new SeleniumBrowserLauncher({
        headless: configManager.get<boolean>('login.headless'),
      }),
      exchanger,
      manual: new ManualCodeSource(),
    },
    {
      ...loginOptions,
      mode: options.mode ?? loginOptions.mode,
      onAttemptEnd: (attempt) =>
        audit.logLoginAttempt(
          attempt.stageReached,
          attempt.lastError
            ? `Login attempt ${attempt.attemptNumber} failed: ${attempt.lastError}`
            : `Login attempt ${attempt.attemptNumber} succeeded`,
          attempt.lastError !== null,
          {
            attemptNumber: attempt.attemptNumber,
            startedAt: new Date(attempt.startedAt).toISOString(),
          },
        ),
    },
  );

  const manager = new SessionManager(
    {
      loadBundle: () => secretStore.load(),
      orchestrator,
      exchanger,
      ...(options.persistTokens === false ? {} : { tokenCache: sqliteTokenCache }),
    },
    { ...loadSessionOptions(), reuseCachedToken: options.fresh !== true },
  );

  manager.on('status', (event) => audit.logStatusEvent(event));
  return manager;
}
