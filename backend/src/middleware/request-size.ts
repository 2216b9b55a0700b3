/**
 * Request Size Limit Middleware
 *
 * Rejects requests whose Content-Length exceeds the configured limit with
 * 413, before any body is read. The welcome and health routes are exempt.
 *
 * @module middleware/request-size
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { sendPayloadTooLarge } from '@shared/utils/error-response';

export const SIZE_LIMIT_EXEMPT_PATHS: readonly string[] = ['/', '/health'];

export function createRequestSizeLimit(maxBytes: number): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (SIZE_LIMIT_EXEMPT_PATHS.includes(req.path)) {
      next();
      return;
    }

    const header = req.headers['content-length'];
    const contentLength = header === undefined ? NaN : Number(header);

    if (Number.isFinite(contentLength) && contentLength > maxBytes) {
      req.log?.warn({ contentLength, maxBytes }, 'Request rejected: size limit exceeded');
      sendPayloadTooLarge(res, maxBytes);
      return;
    }

    next();
  };
}
