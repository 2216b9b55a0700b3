/**
 * Error Response Utilities
 *
 * Helpers for sending standardized error responses. Routes use these
 * instead of building error bodies by hand.
 *
 * @module shared/utils/error-response
 */

import type { Response } from 'express';
import {
  ErrorCode,
  ERROR_MESSAGES,
  ERROR_STATUS_CODES,
  getHttpStatusName,
  type ApiErrorResponse,
  type ErrorResponseWithStatus,
} from '@zeroshot/shared';

export type ErrorDetails = Record<string, string | number | boolean>;

/**
 * Create error response object without sending
 *
 * @example
 * const { statusCode, body } = createErrorResponse(ErrorCode.IMAGE_DECODE_FAILED);
 * // statusCode: 422
 * // body: { error: "Unprocessable Entity", message: "Image could not be decoded", code: "IMAGE_DECODE_FAILED" }
 */
export function createErrorResponse(
  code: ErrorCode,
  customMessage?: string,
  details?: ErrorDetails
): ErrorResponseWithStatus {
  const statusCode = ERROR_STATUS_CODES[code];
  const body: ApiErrorResponse = {
    error: getHttpStatusName(statusCode),
    message: customMessage ?? ERROR_MESSAGES[code],
    code,
  };

  if (details !== undefined) {
    body.details = details;
  }

  return { statusCode, body };
}

/**
 * Send standardized error response
 *
 * @param customMessage - Overrides the default message of the code
 * @param details - Never include sensitive data
 *
 * @example
 * sendError(res, ErrorCode.UNSUPPORTED_MEDIA_TYPE);
 * // 415 { error: "Unsupported Media Type", message: "file media not supported", code: "UNSUPPORTED_MEDIA_TYPE" }
 */
export function sendError(
  res: Response,
  code: ErrorCode,
  customMessage?: string,
  details?: ErrorDetails
): void {
  const { statusCode, body } = createErrorResponse(code, customMessage, details);

  const requestId = res.getHeader('X-Request-ID');
  if (typeof requestId === 'string') {
    body.requestId = requestId;
  }

  res.status(statusCode).json(body);
}

export function sendBadRequest(res: Response, message: string, field?: string): void {
  sendError(res, ErrorCode.BAD_REQUEST, message, field ? { field } : undefined);
}

export function sendValidationError(res: Response, message: string): void {
  sendError(res, ErrorCode.VALIDATION_ERROR, message);
}

export function sendUnsupportedMediaType(res: Response, message?: string): void {
  sendError(res, ErrorCode.UNSUPPORTED_MEDIA_TYPE, message);
}

export function sendPayloadTooLarge(res: Response, limitBytes: number): void {
  sendError(
    res,
    ErrorCode.PAYLOAD_TOO_LARGE,
    `Request size exceeds ${formatMegabytes(limitBytes)}MB limit`
  );
}

export function sendNotFound(res: Response, message?: string): void {
  sendError(res, ErrorCode.NOT_FOUND, message);
}

export function sendInternalError(res: Response, message?: string): void {
  sendError(res, ErrorCode.INTERNAL_ERROR, message);
}

function formatMegabytes(bytes: number): string {
  const megabytes = bytes / (1024 * 1024);
  return Number.isInteger(megabytes) ? String(megabytes) : megabytes.toFixed(2);
}
