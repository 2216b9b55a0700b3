/**
 * HTTP request/response logging middleware using pino-http
 *
 * - Request ID reused from the X-Request-ID header or generated, and echoed back
 * - Log level follows the response status code
 * - Health probes are not logged
 *
 * @example
 * ```typescript
 * app.use(createHttpLogger(logger));
 *
 * router.post('/extract', (req, res) => {
 *   req.log.info('Classifying image');
 * });
 * ```
 *
 * @module middleware/logging
 */

import pinoHttp from 'pino-http';
import type { RequestHandler } from 'express';
import type { IncomingMessage, ServerResponse } from 'http';
import type { Logger } from '@shared/utils/logger';

const QUIET_PATHS = ['/', '/health', '/health/liveness'];

export function generateRequestId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

export function createHttpLogger(logger: Logger): RequestHandler {
  return pinoHttp({
    logger,

    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const existingId = req.headers['x-request-id'];
      const id = existingId && typeof existingId === 'string' ? existingId : generateRequestId();
      res.setHeader('X-Request-ID', id);
      return id;
    },

    // 5xx = error, 4xx = warn, everything else = info
    customLogLevel: (_req: IncomingMessage, res: ServerResponse, err?: Error) => {
      if (err || res.statusCode >= 500) return 'error';
      if (res.statusCode >= 400) return 'warn';
      return 'info';
    },

    customSuccessMessage: (req: IncomingMessage, res: ServerResponse) => {
      return `${req.method} ${req.url} ${res.statusCode}`;
    },

    customErrorMessage: (req: IncomingMessage, res: ServerResponse, err: Error) => {
      return `${req.method} ${req.url} ${res.statusCode} - ${err.message}`;
    },

    serializers: {
      req: (req: { id: unknown; method: string; url: string; headers: Record<string, unknown> }) => ({
        id: req.id,
        method: req.method,
        url: req.url,
        contentType: req.headers['content-type'],
        contentLength: req.headers['content-length'],
      }),
      res: (res: { statusCode: number }) => ({
        statusCode: res.statusCode,
      }),
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.includes(req.url ?? ''),
    },
  });
}
