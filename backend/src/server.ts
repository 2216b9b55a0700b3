/**
 * Image Insight Server
 *
 * Loads configuration, creates the embedding providers of the configured
 * models and starts the HTTP server.
 *
 * @module server
 */

import type { Server } from 'http';
import { loadConfig, printConfig } from '@infrastructure/config/environment';
import { createLogger, type Logger } from '@shared/utils/logger';
import { buildApplication } from './app';

function registerShutdown(server: Server, logger: Logger): void {
  let shuttingDown = false;

  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down gracefully');

    server.close((err) => {
      if (err) {
        logger.error({ err }, 'Error during graceful shutdown');
        process.exit(1);
      }
      logger.info('HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

async function startServer(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);
  printConfig(config, logger);

  const { app, registry } = buildApplication(config, { logger });

  // Providers are created once here and shared by every request
  const providers = registry.preload();
  logger.info({ models: providers.map((provider) => provider.modelId) }, 'Embedding providers ready');
  if (!registry.has(config.defaultModelId)) {
    logger.warn({ defaultModelId: config.defaultModelId }, 'Default model is not available');
  }

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(config.port, () => resolve(listening));
  });
  logger.info({ port: config.port, environment: config.nodeEnv }, 'Server running');

  registerShutdown(server, logger);

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error({ err: reason }, 'Unhandled rejection');
  });
}

startServer().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
