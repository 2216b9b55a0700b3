/**
 * Azure AI Vision Embedding Provider
 *
 * Multimodal embeddings from the Azure AI Vision retrieval API. Images go to
 * `retrieval:vectorizeImage`, prompts to `retrieval:vectorizeText`; both
 * return vectors in the same space for a given model version.
 *
 * @module services/embeddings/AzureVisionEmbeddingProvider
 */

import { z } from 'zod';
import type { Logger } from '@shared/utils/logger';
import { retryWithBackoff, type RetryOptions } from '@shared/utils/retry';
import type { PixelBuffer } from '@/domains/classification/types';
import type { Embedding } from '@/domains/classification/vector';
import { encodeImage } from '@/services/images/ImageCodec';
import { compressForUpload } from '@/services/images/ImageCompressor';
import {
  AZURE_VISION_IMAGE_LIMITS,
  AZURE_VISION_MODEL_PREFIX,
  AZURE_VISION_RETRY,
} from './constants';
import type { EmbeddingProvider } from './types';

/**
 * Response format: { "vector": [...], "modelVersion": "..." }
 */
export const vectorizeResponseSchema = z.object({
  vector: z.array(z.number()).min(1, 'vector is empty'),
  modelVersion: z.string(),
});

export type VectorizeResponse = z.infer<typeof vectorizeResponseSchema>;

export interface AzureVisionEmbeddingProviderOptions {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  modelVersion: string;
  logger: Logger;
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof fetch;
  retry?: Pick<RetryOptions, 'maxRetries' | 'baseDelay' | 'maxDelay'>;
}

/**
 * Non-2xx answer from the Vision API
 */
export class VisionApiError extends Error {
  constructor(
    readonly status: number,
    statusText: string,
    readonly body: string
  ) {
    super(`Vision API Error: ${status} ${statusText} - ${body}`);
    this.name = 'VisionApiError';
  }
}

/**
 * Throttling (429) and server failures (5xx) are worth another attempt
 */
export function isTransientVisionError(error: Error): boolean {
  return error instanceof VisionApiError && (error.status === 429 || error.status >= 500);
}

export class AzureVisionEmbeddingProvider implements EmbeddingProvider {
  readonly modelId: string;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly retryOptions: RetryOptions;

  constructor(private readonly options: AzureVisionEmbeddingProviderOptions) {
    if (!options.endpoint) {
      throw new Error('AZURE_VISION_ENDPOINT not configured');
    }
    if (!options.apiKey) {
      throw new Error('AZURE_VISION_KEY not configured');
    }

    this.modelId = `${AZURE_VISION_MODEL_PREFIX}${options.modelVersion}`;
    this.logger = options.logger.child({ service: 'AzureVisionEmbeddingProvider', modelId: this.modelId });
    this.fetchImpl = options.fetch ?? ((input: RequestInfo | URL, init?: RequestInit) => fetch(input, init));
    this.retryOptions = {
      maxRetries: options.retry?.maxRetries ?? AZURE_VISION_RETRY.MAX_RETRIES,
      baseDelay: options.retry?.baseDelay ?? AZURE_VISION_RETRY.BASE_DELAY_MS,
      maxDelay: options.retry?.maxDelay ?? AZURE_VISION_RETRY.MAX_DELAY_MS,
      isRetryable: isTransientVisionError,
      onRetry: (attempt, error, nextDelay) => {
        this.logger.warn({ attempt, err: error, nextDelayMs: nextDelay }, 'Retrying Vision API call');
      },
    };
  }

  async embedImage(pixels: PixelBuffer): Promise<Embedding> {
    const png = await encodeImage(pixels, 'png');
    const upload = await compressForUpload(
      pixels,
      png,
      {
        maxBytes: AZURE_VISION_IMAGE_LIMITS.MAX_UPLOAD_BYTES,
        maxDimension: AZURE_VISION_IMAGE_LIMITS.MAX_DIMENSION,
        qualityLevels: AZURE_VISION_IMAGE_LIMITS.JPEG_QUALITY_LEVELS,
      },
      this.logger
    );

    const data = await this.call('vectorizeImage', {
      contentType: 'application/octet-stream',
      body: new Uint8Array(upload.buffer),
    });

    this.logger.debug(
      { imageSize: upload.finalSize, wasCompressed: upload.wasCompressed, dimensions: data.vector.length },
      'Image embedding generated'
    );
    return data.vector;
  }

  async embedTexts(texts: readonly string[]): Promise<Embedding[]> {
    if (texts.length === 0) {
      return [];
    }

    // Promise.all keeps input order regardless of completion order
    const results = await Promise.all(
      texts.map((text) =>
        this.call('vectorizeText', {
          contentType: 'application/json',
          body: JSON.stringify({ text }),
        })
      )
    );

    this.logger.debug({ count: results.length }, 'Text embeddings generated');
    return results.map((result) => result.vector);
  }

  private buildUrl(operation: 'vectorizeImage' | 'vectorizeText'): string {
    const query = new URLSearchParams({
      'api-version': this.options.apiVersion,
      'model-version': this.options.modelVersion,
    });
    return `${this.options.endpoint}/computervision/retrieval:${operation}?${query.toString()}`;
  }

  private call(
    operation: 'vectorizeImage' | 'vectorizeText',
    request: { contentType: string; body: BodyInit }
  ): Promise<VectorizeResponse> {
    const url = this.buildUrl(operation);

    return retryWithBackoff(async () => {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': request.contentType,
          'Ocp-Apim-Subscription-Key': this.options.apiKey,
        },
        body: request.body,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new VisionApiError(response.status, response.statusText, errorText);
      }

      const parsed = vectorizeResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error(`Unexpected Vision API response for ${operation}: ${parsed.error.message}`);
      }
      return parsed.data;
    }, this.retryOptions);
  }
}
