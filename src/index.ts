import dotenv from 'dotenv';
import { createApp } from './http/app.js';
import { loadSettings, SettingsError, type Settings } from './config/settings.js';
import { createEventLog } from './events/event-log.js';
import { faultController } from './faults/controller.js';
import { logger } from './observability/logger.js';
import { initializeRedis, shutdownRedis, storageMode } from './persistence/redis-client.js';
import { createStateStore } from './persistence/state-store.js';
import { LedgerHost } from './runtime/ledger-host.js';
import { LedgerService } from './runtime/ledger-service.js';

dotenv.config();

function readSettings(): Settings {
  try {
    return loadSettings();
  } catch (error) {
    if (error instanceof SettingsError) {
      console.error(`FATAL: invalid configuration (${error.message})`);
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const settings = readSettings();

  faultController.initialize();
  if (faultController.isEnabled()) {
    logger.info('faults_initialization', 'FAULT INJECTION ENABLED', {
      config: faultController.getConfig(),
    });
  }

  await initializeRedis(settings.redisUrl);
  const redisEnabled = !!settings.redisUrl;

  const host = new LedgerHost({
    owner: settings.owner,
    auditor: settings.auditor,
    custody: settings.custody,
    minimumFee: settings.minimumFee,
    refundTimeoutSeconds: settings.refundTimeoutSeconds,
    registryCooldownSeconds: settings.registryCooldownSeconds,
    feeExemptTargets: settings.feeExemptTargets,
  });
  const service = new LedgerService({
    host,
    stateStore: createStateStore(redisEnabled),
    eventLog: createEventLog(redisEnabled, settings.eventHistoryLimit),
  });
  await service.initialize();

  const app = createApp(service);
  // A restored snapshot may carry a different configuration than the environment.
  const config = host.queue.getConfig();
  const server = app.listen(settings.port, () => {
    console.log(`Audit escrow listening on port ${settings.port}`);
    console.log(`Storage: ${storageMode()}`);
    console.log(`Owner: ${config.owner}, auditor: ${config.auditor}, minimum fee: ${config.minimumFee}`);
    if (faultController.isEnabled()) {
      console.log('FAULT INJECTION ENABLED');
    }
  });

  const shutdown = (signal: string) => {
    logger.info('shutdown', `${signal} received, graceful shutdown`);
    server.close(() => {
      service
        .idle()
        .then(() => shutdownRedis())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('shutdown_failed', 'Shutdown did not complete cleanly', {
            error: error instanceof Error ? error.message : 'Unknown error',
          });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('startup_failed', 'Service failed to start', {
    error: error instanceof Error ? error.message : 'Unknown error',
  });
  process.exit(1);
});
