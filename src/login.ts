import 'dotenv/config';

import { parseArgs } from 'node:util';
import { createSessionManager, serializeError } from './auth/index.js';
import { configManager } from './config/manager.js';
import { initDatabase } from './db/index.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('login-cli');

const { values } = parseArgs({
  options: {
    manual: { type: 'boolean', default: false },
    fresh: { type: 'boolean', default: false },
    'print-token': { type: 'boolean', default: false },
  },
});

async function main(): Promise<number> {
  initDatabase();
  await configManager.seedDefaults();

  const manager = createSessionManager({
    ...(values.manual ? { mode: 'manual' as const } : {}),
    fresh: values.fresh,
  });
  const abort = () => {
    log.warn('Interrupted, cancelling login...');
    manager.shutdown().catch((err) => log.error({ err }, 'Cancel failed'));
  };
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);

  try {
    const token = await manager.getValidToken();
    const status = manager.getStatus();
    log.info({ expiresAt: status.expiresAt }, 'Access token ready');
    if (values['print-token']) {
      process.stdout.write(`${token}\n`);
    }
    return 0;
  } catch (err) {
    log.error({ error: serializeError(err) }, 'Login failed');
    return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    log.fatal({ err }, 'Login run crashed');
    process.exit(1);
  });
