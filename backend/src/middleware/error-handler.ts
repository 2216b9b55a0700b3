/**
 * Error Handling Middleware
 *
 * Final express error handler. Classification errors map to their own codes;
 * body-parser failures map to 400/413; everything else is a logged 500.
 *
 * @module middleware/error-handler
 */

import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import { ErrorCode } from '@zeroshot/shared';
import type { Logger } from '@shared/utils/logger';
import { sendError, sendInternalError, type ErrorDetails } from '@shared/utils/error-response';
import { DecodeError, isClassificationError } from '@/domains/classification/errors';

/** Shape of errors raised by express's body parsers */
interface BodyParserError extends Error {
  type: string;
  status?: number;
}

function isBodyParserError(err: Error): err is BodyParserError {
  return 'type' in err && typeof err.type === 'string';
}

export function createErrorHandler(logger: Logger, options: { exposeErrors: boolean }): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const log = req.log ?? logger;

    if (isClassificationError(err)) {
      const details: ErrorDetails | undefined =
        err instanceof DecodeError ? { variant: err.variant } : undefined;
      log.warn({ err, code: err.code }, 'Classification failed');
      sendError(res, err.code, err.message, details);
      return;
    }

    const error = err instanceof Error ? err : new Error(String(err));

    if (isBodyParserError(error)) {
      if (error.type === 'entity.too.large') {
        sendError(res, ErrorCode.PAYLOAD_TOO_LARGE, error.message);
        return;
      }
      if (error.type === 'entity.parse.failed') {
        sendError(res, ErrorCode.VALIDATION_ERROR, 'Request body is not valid JSON');
        return;
      }
    }

    log.error({ err: error }, 'Unhandled error');

    // Don't leak error details in production
    if (options.exposeErrors) {
      sendError(res, ErrorCode.INTERNAL_ERROR, error.message, { stack: error.stack ?? 'No stack trace' });
    } else {
      sendInternalError(res);
    }
  };
}
