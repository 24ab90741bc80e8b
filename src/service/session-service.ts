import { createSessionManager, type SessionManager } from '../auth/index.js';
import { formatStatusEvent } from '../auth/types.js';
import { registerSessionCallbacks } from '../api/routes.js';
import { ApiServer } from '../api/server.js';
import type { WebSocketManager } from '../api/websocket.js';
import { configManager } from '../config/manager.js';
import { initDatabase } from '../db/index.js';
import { getAuditLogger } from '../monitoring/audit-log.js';
import { createLogger } from '../utils/logger.js';
import { minutesToCron, Scheduler, timeToCron } from './scheduler.js';

const log = createLogger('service');

export class SessionService {
  private scheduler: Scheduler | null = null;
  private apiServer: ApiServer | null = null;
  private wsManager: WebSocketManager | null = null;
  private manager: SessionManager | null = null;
  private startedAt = '';

  async start(): Promise<void> {
    log.info('Starting session service...');

    // 1. Database
    initDatabase();

    // 2. Config
    await configManager.seedDefaults();
    log.info(
      {
        loginMode: configManager.get<string>('login.mode'),
        maxAttempts: configManager.get<number>('login.maxAttempts'),
      },
      'Configuration loaded',
    );

    // 3. Session manager
    const manager = createSessionManager();
    this.manager = manager;
    this.startedAt = new Date().toISOString();

    // 4. API server
    this.apiServer = new ApiServer();
    await this.apiServer.start();
    this.wsManager = this.apiServer.getWsManager();
    this.wsManager.setSnapshotProvider(() => manager.getStatus());

    manager.on('status', (event) => {
      log.info({ event: formatStatusEvent(event) }, 'Session status');
      this.wsManager?.broadcast('session_status', event);
    });
    configManager.on('changed', (key) => {
      this.wsManager?.broadcast('config_changed', { key });
    });

    registerSessionCallbacks({
      getServiceStatus: () => ({ startedAt: this.startedAt }),
      getSession: () => manager.getStatus(),
      getValidToken: () => manager.getValidToken(),
      invalidate: (token) => manager.invalidate(token),
      logout: () => manager.logout(),
    });

    // 5. Scheduler
    this.scheduler = new Scheduler(configManager.get<string>('session.timezone'));
    this.scheduler.registerJob(
      'expiry-check',
      minutesToCron(configManager.get<number>('session.expiryCheckMinutes')),
      () => {
        manager.checkExpiry();
      },
    );
    if (configManager.get<boolean>('session.preMarketLoginEnabled')) {
      this.scheduler.registerJob(
        'pre-market-login',
        timeToCron(configManager.get<string>('session.preMarketLoginTime')),
        async () => {
          await manager.getValidToken();
        },
      );
    }
    this.scheduler.start();

    getAuditLogger().logControl('Session service started');
    log.info({ startedAt: this.startedAt }, 'Session service running');
  }

  async stop(): Promise<void> {
    log.info('Shutting down, cancelling any in-flight login...');
    this.scheduler?.stop();
    configManager.removeAllListeners('changed');
    await this.manager?.shutdown();
    await this.apiServer?.stop();
    log.info('Session service stopped');
  }
}
