/**
 * Express Application
 *
 * Builds the HTTP application from explicit dependencies so tests can run it
 * in process with fake providers.
 *
 * @module app
 */

import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import type { AppConfig } from '@infrastructure/config/environment';
import type { Logger } from '@shared/utils/logger';
import { sendNotFound } from '@shared/utils/error-response';
import {
  createClassificationPipeline,
  type ClassificationPipeline,
} from '@/domains/classification';
import { createModelRegistry, type ModelRegistry } from '@/services/embeddings/ModelRegistry';
import { createHttpLogger } from '@/middleware/logging';
import { createRequestSizeLimit } from '@/middleware/request-size';
import { createErrorHandler } from '@/middleware/error-handler';
import { createBasicRouter } from '@routes/basic.routes';
import { createImageInsightRouter } from '@routes/image-insight';

export interface AppDependencies {
  config: AppConfig;
  logger: Logger;
  pipeline: ClassificationPipeline;
}

export function createApp({ config, logger, pipeline }: AppDependencies): Express {
  const app = express();
  app.disable('x-powered-by');

  // Credentials cannot be combined with a wildcard origin
  app.use(
    cors({
      origin: config.corsOrigin,
      credentials: config.corsOrigin !== '*',
    })
  );

  // HTTP request/response logging (Pino) - EARLY in middleware chain
  app.use(createHttpLogger(logger));

  // Reject oversized requests before any body is read
  app.use(createRequestSizeLimit(config.maxRequestSizeBytes));

  app.use(express.json({ limit: config.maxRequestSizeBytes }));
  app.use(express.urlencoded({ extended: true, limit: config.maxRequestSizeBytes }));

  app.use(createBasicRouter(config.appName));
  app.use(
    createImageInsightRouter({
      pipeline,
      defaultModelId: config.defaultModelId,
      maxRequestSizeBytes: config.maxRequestSizeBytes,
    })
  );

  app.use((_req: Request, res: Response) => {
    sendNotFound(res, 'Route not found');
  });

  app.use(createErrorHandler(logger, { exposeErrors: config.nodeEnv === 'development' }));

  return app;
}

export interface Application {
  app: Express;
  registry: ModelRegistry;
  pipeline: ClassificationPipeline;
}

/**
 * Wire the registry, the pipeline and the HTTP app from configuration
 */
export function buildApplication(
  config: AppConfig,
  deps: { logger: Logger; fetch?: typeof fetch }
): Application {
  const registry = createModelRegistry(config, deps);
  const pipeline = createClassificationPipeline(config, {
    registry,
    logger: deps.logger,
    fetch: deps.fetch,
  });
  const app = createApp({ config, logger: deps.logger, pipeline });

  return { app, registry, pipeline };
}
