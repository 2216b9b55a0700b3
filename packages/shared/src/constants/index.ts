/**
 * Constants Index
 *
 * Barrel export for all shared constants.
 *
 * @module @zeroshot/shared/constants
 */

export {
  ErrorCode,
  HTTP_STATUS_NAMES,
  ERROR_MESSAGES,
  ERROR_STATUS_CODES,
  getHttpStatusName,
  getErrorMessage,
  getErrorStatusCode,
  validateErrorConstants,
} from './errors';

export {
  DEFAULT_PROMPT_TEMPLATE,
  LABEL_PLACEHOLDER,
  DEFAULT_IMAGE_MIME_TYPE,
  ACCEPTED_UPLOAD_MIME_TYPES,
  IMAGE_INPUT_SOURCES,
} from './classification.constants';
export type { AcceptedUploadMimeType, ImageInputSource } from './classification.constants';
