/**
 * Logger factory using Pino
 *
 * - JSON structured logging (production) / pretty printing (development)
 * - Silent under test unless LOG_LEVEL says otherwise
 * - Standard serializers for errors, requests, responses
 * - Automatic redaction of sensitive data
 *
 * Components never create their own root logger: the root is built once from
 * `AppConfig` and each component receives it and derives a child.
 *
 * @example
 * ```typescript
 * const logger = createLogger(config);
 * const serviceLogger = logger.child({ service: 'FormatResolver' });
 * serviceLogger.debug({ source: 'url' }, 'Image input resolved');
 * ```
 *
 * @module shared/utils/logger
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import type { AppConfig } from '@/infrastructure/config/environment';

export type { Logger } from 'pino';

/** Paths removed from every log entry */
export const REDACTED_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers["ocp-apim-subscription-key"]',
  'apiKey',
  'password',
  'token',
];

/**
 * Build the transport for the configured environment
 */
function buildTransport(config: Pick<AppConfig, 'nodeEnv' | 'logLevel'>): LoggerOptions['transport'] {
  if (config.nodeEnv === 'development') {
    return {
      targets: [
        {
          level: config.logLevel,
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname,env',
            singleLine: false,
            messageFormat: '[{service}] {msg}',
          },
        },
      ],
    };
  }

  // Production: JSON to stdout
  return {
    targets: [
      {
        level: config.logLevel,
        target: 'pino/file',
        options: { destination: 1 },
      },
    ],
  };
}

/**
 * Create the root logger for the application
 */
export function createLogger(config: Pick<AppConfig, 'nodeEnv' | 'logLevel' | 'appName'>): Logger {
  const options: LoggerOptions = {
    level: config.logLevel,
    serializers: {
      err: pino.stdSerializers.err,
      req: pino.stdSerializers.req,
      res: pino.stdSerializers.res,
    },
    base: {
      env: config.nodeEnv,
      app: config.appName,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: REDACTED_PATHS,
      remove: true,
    },
  };

  if (config.nodeEnv === 'test' || config.logLevel === 'silent') {
    return pino(options);
  }

  return pino({ ...options, transport: buildTransport(config) });
}
