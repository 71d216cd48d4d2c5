import 'dotenv/config';

import { parseEnv } from './config/env.js';
import { getConfig } from './config/index.js';
import { getLogger } from './utils/logger.js';
import { createMergeServices, getStartupWarnings } from './services/merge-services.js';
import { buildApp } from './app.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  // Validate environment first
  parseEnv();

  const config = getConfig();
  const logger = getLogger();

  logger.info({ env: config.server.env }, 'Starting image merge service');

  const services = createMergeServices(config);

  // A broken template or unwritable storage should stop the deployment here, not on the first request
  await services.jobDescriptors.validate();
  await services.storage.ensureDirectories();

  for (const warning of getStartupWarnings(config, services)) {
    logger.warn(warning);
  }

  const app = await buildApp(services);

  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info(
      { port: config.server.port, host: config.server.host },
      'Server started successfully'
    );
    logger.info(`Documentation available at http://localhost:${config.server.port}/docs`);
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
