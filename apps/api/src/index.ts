/**
 * RemedyOps API Server
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { ConfigurationError, createChildLogger, errorMessage, getConfig, validateConfig } from '@remedyops/shared';
import { initializeDatabase, closeDatabase, userRepository } from '@remedyops/database';
import { buildApp } from './app.js';
import { initializeServices, shutdownServices } from './services/index.js';

const logger = createChildLogger({ component: 'API' });

async function main(): Promise<void> {
  const validation = validateConfig();
  if (!validation.valid) {
    throw new ConfigurationError(`Invalid configuration: ${(validation.errors ?? []).join('; ')}`, {
      errors: validation.errors,
    });
  }
  const config = getConfig();

  if (config.database.path !== ':memory:') {
    mkdirSync(dirname(config.database.path), { recursive: true });
  }
  initializeDatabase({ path: config.database.path });

  const seeded = await userRepository.seedDefaultUsers();
  if (seeded > 0) {
    logger.info({ count: seeded }, 'Default users seeded');
  }

  const services = initializeServices(config);
  const app = await buildApp(services, config.server.corsOrigin);

  // Bring up a supervised service before the first health check
  await services.service.start();

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down');
    await app.close();
    await shutdownServices(services);
    closeDatabase();
    process.exit(0);
  };

  const onSignal = (signal: string) => () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ error: errorMessage(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal('SIGINT'));
  process.on('SIGTERM', onSignal('SIGTERM'));

  await app.listen({ port: config.server.port, host: config.server.host });
  logger.info({ host: config.server.host, port: config.server.port }, 'Server started');

  if (config.monitor.autoStart) {
    await services.orchestrator.start();
    logger.info({ intervalMs: config.monitor.intervalMs }, 'Incident monitoring started');
  }
}

main().catch((err: unknown) => {
  logger.fatal({ error: errorMessage(err) }, 'Unhandled error');
  process.exit(1);
});
