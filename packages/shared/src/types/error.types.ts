/**
 * Error Response Type Definitions
 *
 * Every error response of the image insight API follows these shapes.
 *
 * @module @zeroshot/shared/types/error
 */

import { ErrorCode } from '../constants/errors';

/**
 * Standard API Error Response
 *
 * @example
 * // Response body for a payload rejected by the decoder
 * {
 *   "error": "Unprocessable Entity",
 *   "message": "Image could not be decoded",
 *   "code": "IMAGE_DECODE_FAILED",
 *   "details": { "variant": "base64" }
 * }
 */
export interface ApiErrorResponse {
  /** Human-readable status name (e.g., "Bad Request") */
  error: string;

  /** Safe for display to end users */
  message: string;

  /** Machine-readable error code */
  code: ErrorCode;

  details?: Record<string, string | number | boolean>;

  /** Request ID for support */
  requestId?: string;
}

/**
 * Used internally to create error responses without sending them.
 */
export interface ErrorResponseWithStatus {
  statusCode: number;
  body: ApiErrorResponse;
}

const ERROR_CODE_VALUES: ReadonlySet<string> = new Set(Object.values(ErrorCode));

/**
 * Type guard to check if error code exists
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return ERROR_CODE_VALUES.has(code);
}

/**
 * Type guard to check if an object is an ApiErrorResponse
 */
export function isApiErrorResponse(obj: unknown): obj is ApiErrorResponse {
  if (typeof obj !== 'object' || obj === null) {
    return false;
  }
  if (!('error' in obj) || !('message' in obj) || !('code' in obj)) {
    return false;
  }

  return (
    typeof obj.error === 'string' &&
    typeof obj.message === 'string' &&
    typeof obj.code === 'string' &&
    isValidErrorCode(obj.code)
  );
}
