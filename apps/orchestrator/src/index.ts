import { createServer } from 'http';
import { config } from './config.js';
import { initDb, closeDb } from './db/index.js';
import { createApi } from './api/index.js';
import { SqliteDeploymentRepository } from './repositories/deploymentRepository.js';
import { DeploymentService } from './services/deploymentService.js';
import { loadInventoryFile } from './services/deviceInventory.js';
import { LocalObjectStorage } from './storage/localStorage.js';
import { withRetry } from './lib/retry.js';
import logger from './lib/logger.js';

async function main(): Promise<void> {
  logger.info({ env: config.nodeEnv }, 'Starting deployment orchestrator');

  if (!config.storage.signingKey) {
    if (config.nodeEnv === 'production') {
      throw new Error('STORAGE_SIGNING_KEY must be set in production');
    }
    logger.warn('STORAGE_SIGNING_KEY not set, pre-signed links will not survive a restart');
  }

  const db = initDb();

  const storage = new LocalObjectStorage({
    root: config.storage.path,
    publicUrl: config.storage.publicUrl,
    signingKey: config.storage.signingKey,
    filenameSuffix: config.storage.filenameSuffix,
  });
  await withRetry(() => storage.healthCheck(), {
    onRetry: (attempt, err, delayMs) => logger.warn({ attempt, err, delayMs }, 'Object storage not ready, retrying'),
  });

  const deployments = new DeploymentService({
    repository: new SqliteDeploymentRepository(db),
    inventory: loadInventoryFile(config.inventory.path),
    storage,
  });

  const app = createApi({
    deployments,
    storage,
    linkExpireSeconds: config.storage.linkExpireSeconds,
  });

  const httpServer = createServer(app);

  httpServer.listen(config.port, '0.0.0.0', () => {
    logger.info({
      port: config.port,
      api: `http://localhost:${config.port}/api`,
    }, 'Orchestrator started');
  });

  // Graceful shutdown
  const shutdown = (): void => {
    logger.info('Shutting down...');
    httpServer.close(() => {
      closeDb();
      logger.info('Shutdown complete');
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  logger.fatal({ err }, 'Failed to start orchestrator');
  process.exit(1);
});
