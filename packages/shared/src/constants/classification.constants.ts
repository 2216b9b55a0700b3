/**
 * Classification Constants
 *
 * @module @zeroshot/shared/constants/classification
 */

/** Placeholder substituted with each label when building prompts */
export const LABEL_PLACEHOLDER = '{label}';

export const DEFAULT_PROMPT_TEMPLATE = `a photo of a ${LABEL_PLACEHOLDER}`;

/** Content type reported when nothing better is known */
export const DEFAULT_IMAGE_MIME_TYPE = 'image/jpeg';

/**
 * MIME types accepted for uploaded files.
 * Everything here is decodable by the image codec.
 */
export const ACCEPTED_UPLOAD_MIME_TYPES = [
  'image/jpeg',
  'image/png',
  'image/webp',
  'image/gif',
] as const;

export type AcceptedUploadMimeType = (typeof ACCEPTED_UPLOAD_MIME_TYPES)[number];

/**
 * Image input variants, in resolution precedence order
 */
export const IMAGE_INPUT_SOURCES = ['pixels', 'bytes', 'url', 'path', 'base64'] as const;

export type ImageInputSource = (typeof IMAGE_INPUT_SOURCES)[number];
