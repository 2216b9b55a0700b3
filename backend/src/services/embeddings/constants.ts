/**
 * Embedding Provider Constants
 *
 * @module services/embeddings/constants
 */

/**
 * Azure AI Vision multimodal model versions served by the registry.
 * The model id is `azure-vision/<model-version>`.
 */
export const AZURE_VISION_MODEL_VERSIONS = ['2023-04-15', '2022-04-11'] as const;

export const AZURE_VISION_MODEL_PREFIX = 'azure-vision/';

export const DEFAULT_MODEL_ID = `${AZURE_VISION_MODEL_PREFIX}${AZURE_VISION_MODEL_VERSIONS[0]}`;

export const AZURE_VISION_DEFAULT_API_VERSION = '2024-02-01';

/**
 * Upload constraints of the vectorizeImage endpoint
 */
export const AZURE_VISION_IMAGE_LIMITS = {
  /** Maximum upload size accepted by the service */
  MAX_UPLOAD_BYTES: 20 * 1024 * 1024,
  /** Longest side after downscaling an oversized upload */
  MAX_DIMENSION: 4096,
  /** JPEG quality ladder tried, in order, until the upload fits */
  JPEG_QUALITY_LEVELS: [85, 75, 65, 55, 45],
} as const;

/**
 * Retry policy for throttled (429) or failing (5xx) calls
 */
export const AZURE_VISION_RETRY = {
  MAX_RETRIES: 3,
  BASE_DELAY_MS: 500,
  MAX_DELAY_MS: 8000,
} as const;
