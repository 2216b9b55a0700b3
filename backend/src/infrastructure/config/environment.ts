/**
 * Environment Configuration
 *
 * Loads and validates environment variables into an explicit `AppConfig`
 * that is handed to the components at start-up.
 *
 * @module infrastructure/config/environment
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import type { Logger } from 'pino';
import { DEFAULT_PROMPT_TEMPLATE } from '@zeroshot/shared';
import {
  AZURE_VISION_DEFAULT_API_VERSION,
  DEFAULT_MODEL_ID,
} from '@/services/embeddings/constants';

// Load .env file (override: false preserves existing env vars for testing)
dotenv.config({ override: false });

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

/**
 * Environment variables schema for validation
 */
export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('8000').transform(Number).pipe(z.number().int().min(1).max(65535)),
  APP_NAME: z.string().min(1).default('image insight app'),
  CORS_ORIGIN: z.string().default('*'),
  MAX_REQUEST_SIZE_MB: z.string().default('100').transform(Number).pipe(z.number().positive()),

  // Logging
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),

  // Classification
  ALLOW_LOCAL_PATHS: booleanFlag,
  DEFAULT_MODEL_ID: z.string().min(1).default(DEFAULT_MODEL_ID),
  PROMPT_TEMPLATE: z.string().min(1).default(DEFAULT_PROMPT_TEMPLATE),
  LOGIT_SCALE: z.string().default('1').transform(Number).pipe(z.number().positive().finite()),

  // Azure AI Vision (multimodal embeddings)
  AZURE_VISION_ENDPOINT: z.string().url().optional(),
  AZURE_VISION_KEY: z.string().min(1).optional(),
  AZURE_VISION_API_VERSION: z.string().default(AZURE_VISION_DEFAULT_API_VERSION),
});

export interface AzureVisionConfig {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
}

/**
 * Typed application configuration
 */
export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  appName: string;
  logLevel: LogLevel;
  corsOrigin: string | string[];
  maxRequestSizeBytes: number;
  allowLocalPaths: boolean;
  defaultModelId: string;
  promptTemplate: string;
  logitScale: number;
  /** Absent unless both endpoint and key are set */
  azureVision?: AzureVisionConfig;
}

export class InvalidEnvironmentError extends Error {
  constructor(readonly fieldErrors: Record<string, string[] | undefined>) {
    super(`Invalid environment variables: ${JSON.stringify(fieldErrors)}`);
    this.name = 'InvalidEnvironmentError';
  }
}

function defaultLogLevel(nodeEnv: AppConfig['nodeEnv']): LogLevel {
  if (nodeEnv === 'test') return 'silent';
  return nodeEnv === 'development' ? 'debug' : 'info';
}

/**
 * Parse and validate environment variables
 *
 * @throws InvalidEnvironmentError with the flattened field errors
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new InvalidEnvironmentError(parsed.error.flatten().fieldErrors);
  }

  const env = parsed.data;
  const endpoint = env.AZURE_VISION_ENDPOINT?.replace(/\/+$/, '');

  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    appName: env.APP_NAME,
    logLevel: env.LOG_LEVEL ?? defaultLogLevel(env.NODE_ENV),
    corsOrigin: env.CORS_ORIGIN.includes(',')
      ? env.CORS_ORIGIN.split(',').map((o) => o.trim())
      : env.CORS_ORIGIN,
    maxRequestSizeBytes: Math.floor(env.MAX_REQUEST_SIZE_MB * 1024 * 1024),
    allowLocalPaths: env.ALLOW_LOCAL_PATHS,
    defaultModelId: env.DEFAULT_MODEL_ID,
    promptTemplate: env.PROMPT_TEMPLATE,
    logitScale: env.LOGIT_SCALE,
    azureVision:
      endpoint && env.AZURE_VISION_KEY
        ? { endpoint, apiKey: env.AZURE_VISION_KEY, apiVersion: env.AZURE_VISION_API_VERSION }
        : undefined,
  };
}

/**
 * Log configuration summary (without sensitive data)
 */
export function printConfig(config: AppConfig, logger: Logger): void {
  logger.info(
    {
      environment: config.nodeEnv,
      port: config.port,
      corsOrigin: config.corsOrigin,
      logLevel: config.logLevel,
      maxRequestSizeBytes: config.maxRequestSizeBytes,
      allowLocalPaths: config.allowLocalPaths,
      defaultModelId: config.defaultModelId,
      promptTemplate: config.promptTemplate,
      logitScale: config.logitScale,
      azureVision: config.azureVision
        ? { endpoint: config.azureVision.endpoint, apiVersion: config.azureVision.apiVersion }
        : 'not configured',
    },
    'Configuration'
  );
}
