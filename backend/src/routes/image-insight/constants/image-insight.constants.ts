/**
 * Image Insight Route Constants
 *
 * @module routes/image-insight/constants
 */

/** Multipart field carrying the uploaded image */
export const IMAGE_FILE_FIELD = 'file';

/**
 * Multer limits that do not depend on configuration.
 * File and field sizes come from `MAX_REQUEST_SIZE_MB`, since a base64 field
 * can carry a whole image.
 */
export const MULTER_LIMITS = {
  /** One image per request */
  MAX_FILES: 1,
  /** Text fields (metadata, url, base64str) */
  MAX_FIELDS: 10,
} as const;
