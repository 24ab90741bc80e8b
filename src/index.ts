import 'dotenv/config';

import { SessionService } from './service/session-service.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('main');

const service = new SessionService();

async function shutdown(signal: string): Promise<void> {
  log.info(`${signal} received, shutting down...`);
  try {
    await service.stop();
    process.exit(0);
  } catch (err) {
    log.error({ err }, 'Shutdown failed');
    process.exit(1);
  }
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

service.start().catch((err) => {
  log.fatal({ err }, 'Failed to start session service');
  process.exit(1);
});
