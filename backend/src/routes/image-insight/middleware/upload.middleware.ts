/**
 * Upload Middleware
 *
 * Multer configuration and error handling for the image upload field.
 * Requests that are not multipart pass straight through.
 *
 * @module routes/image-insight/middleware/upload.middleware
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import multer, { MulterError } from 'multer';
import { ErrorCode } from '@zeroshot/shared';
import { sendError, sendPayloadTooLarge } from '@shared/utils/error-response';
import { IMAGE_FILE_FIELD, MULTER_LIMITS } from '../constants/image-insight.constants';

/**
 * Multer middleware for a single in-memory image, with Multer errors mapped
 * to 413 (size limits) or 400 (anything else)
 */
export function createImageUpload(maxBytes: number): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(), // In-memory (no disk I/O)
    limits: {
      fileSize: maxBytes,
      fieldSize: maxBytes,
      files: MULTER_LIMITS.MAX_FILES,
      fields: MULTER_LIMITS.MAX_FIELDS,
    },
  });
  const single = upload.single(IMAGE_FILE_FIELD);

  return (req: Request, res: Response, next: NextFunction): void => {
    single(req, res, (err: unknown) => {
      if (err instanceof MulterError) {
        switch (err.code) {
          case 'LIMIT_FILE_SIZE':
          case 'LIMIT_FIELD_VALUE':
            sendPayloadTooLarge(res, maxBytes);
            return;
          case 'LIMIT_FILE_COUNT':
            sendError(res, ErrorCode.VALIDATION_ERROR, `Too many files (max ${MULTER_LIMITS.MAX_FILES})`);
            return;
          case 'LIMIT_UNEXPECTED_FILE':
            sendError(res, ErrorCode.VALIDATION_ERROR, `Unexpected file field; use "${IMAGE_FILE_FIELD}"`);
            return;
          default:
            sendError(res, ErrorCode.VALIDATION_ERROR, err.message);
            return;
        }
      }
      if (err) {
        next(err);
        return;
      }
      next();
    });
  };
}
