/**
 * Error Constants
 *
 * Centralized error codes, messages, and HTTP status mappings shared by the
 * classification core and the HTTP layer.
 *
 * @module @zeroshot/shared/constants/errors
 */

/**
 * Machine-readable error codes returned in every error response.
 */
export enum ErrorCode {
  // 400
  BAD_REQUEST = 'BAD_REQUEST',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',

  // 404
  NOT_FOUND = 'NOT_FOUND',

  // 413 / 415 / 422
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
  UNSUPPORTED_MEDIA_TYPE = 'UNSUPPORTED_MEDIA_TYPE',
  IMAGE_DECODE_FAILED = 'IMAGE_DECODE_FAILED',

  // 5xx
  NUMERIC_ERROR = 'NUMERIC_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Human-readable names for the status codes in use
 */
export const HTTP_STATUS_NAMES: Readonly<Record<number, string>> = {
  400: 'Bad Request',
  404: 'Not Found',
  413: 'Payload Too Large',
  415: 'Unsupported Media Type',
  422: 'Unprocessable Entity',
  500: 'Internal Server Error',
};

/**
 * Default messages. Safe to show to any caller.
 */
export const ERROR_MESSAGES: Readonly<Record<ErrorCode, string>> = {
  [ErrorCode.BAD_REQUEST]: 'Bad request',
  [ErrorCode.VALIDATION_ERROR]: 'Request validation failed',
  [ErrorCode.CONFIGURATION_ERROR]: 'Classification request is misconfigured',
  [ErrorCode.NOT_FOUND]: 'Resource not found',
  [ErrorCode.PAYLOAD_TOO_LARGE]: 'File size exceeds limit',
  [ErrorCode.UNSUPPORTED_MEDIA_TYPE]: 'file media not supported',
  [ErrorCode.IMAGE_DECODE_FAILED]: 'Image could not be decoded',
  [ErrorCode.NUMERIC_ERROR]: 'Embeddings could not be scored',
  [ErrorCode.INTERNAL_ERROR]: 'server error',
};

export const ERROR_STATUS_CODES: Readonly<Record<ErrorCode, number>> = {
  [ErrorCode.BAD_REQUEST]: 400,
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.CONFIGURATION_ERROR]: 400,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.PAYLOAD_TOO_LARGE]: 413,
  [ErrorCode.UNSUPPORTED_MEDIA_TYPE]: 415,
  [ErrorCode.IMAGE_DECODE_FAILED]: 422,
  [ErrorCode.NUMERIC_ERROR]: 500,
  [ErrorCode.INTERNAL_ERROR]: 500,
};

export function getHttpStatusName(statusCode: number): string {
  return HTTP_STATUS_NAMES[statusCode] ?? 'Error';
}

export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code];
}

export function getErrorStatusCode(code: ErrorCode): number {
  return ERROR_STATUS_CODES[code];
}

/**
 * Verifies every error code has a message, a status code and a status name.
 * Returns the codes that are incomplete (empty when consistent).
 */
export function validateErrorConstants(): ErrorCode[] {
  return Object.values(ErrorCode).filter((code) => {
    const status = ERROR_STATUS_CODES[code];
    return !ERROR_MESSAGES[code] || status === undefined || !HTTP_STATUS_NAMES[status];
  });
}
