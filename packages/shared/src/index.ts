/**
 * @zeroshot/shared
 *
 * Wire types and error constants shared by the classification backend and
 * any client of the image insight API.
 *
 * @module @zeroshot/shared
 *
 * @example
 * ```typescript
 * import type { ImageInsightResponse, ApiErrorResponse } from '@zeroshot/shared';
 * import { ErrorCode, getErrorStatusCode } from '@zeroshot/shared';
 * import { classificationMetadataSchema } from '@zeroshot/shared/schemas';
 * ```
 */

// ============================================
// Types
// ============================================
export type {
  ApiErrorResponse,
  ErrorResponseWithStatus,
  ScoreEntry,
  ClassificationInsight,
  ImageInsightResponse,
} from './types';

export { isApiErrorResponse, isValidErrorCode } from './types';

// ============================================
// Constants - Error codes, messages, mappings
// ============================================
export {
  ErrorCode,
  HTTP_STATUS_NAMES,
  ERROR_MESSAGES,
  ERROR_STATUS_CODES,
  getHttpStatusName,
  getErrorMessage,
  getErrorStatusCode,
  validateErrorConstants,
  DEFAULT_PROMPT_TEMPLATE,
  LABEL_PLACEHOLDER,
  DEFAULT_IMAGE_MIME_TYPE,
  ACCEPTED_UPLOAD_MIME_TYPES,
  IMAGE_INPUT_SOURCES,
} from './constants';
export type { AcceptedUploadMimeType, ImageInputSource } from './constants';

// Schemas are exported from '@zeroshot/shared/schemas' so that type-only
// consumers do not pull in zod.
