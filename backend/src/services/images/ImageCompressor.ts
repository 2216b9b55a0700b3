/**
 * ImageCompressor
 *
 * Shrinks an upload that exceeds the Azure Vision size limit. Pixels are
 * downscaled to the maximum dimension and re-encoded as progressive JPEG at
 * decreasing quality until the result fits.
 *
 * @module services/images/ImageCompressor
 */

import sharp from 'sharp';
import type { Logger } from '@shared/utils/logger';
import type { PixelBuffer } from '@/domains/classification/types';

export interface CompressionLimits {
  maxBytes: number;
  maxDimension: number;
  qualityLevels: readonly number[];
}

export interface CompressionResult {
  /** Original or compressed bytes */
  buffer: Buffer;
  contentType: string;
  wasCompressed: boolean;
  originalSize: number;
  finalSize: number;
  /** JPEG quality used, when compressed */
  quality?: number;
}

export class ImageTooLargeError extends Error {
  constructor(readonly size: number, readonly limit: number) {
    super(`Image could not be compressed below ${limit} bytes (smallest attempt: ${size})`);
    this.name = 'ImageTooLargeError';
  }
}

/**
 * Return `encoded` unchanged when it fits, otherwise a compressed JPEG
 *
 * @param encoded - The PNG encoding of `pixels`
 * @throws ImageTooLargeError when the lowest quality still does not fit
 */
export async function compressForUpload(
  pixels: PixelBuffer,
  encoded: Buffer,
  limits: CompressionLimits,
  logger: Logger
): Promise<CompressionResult> {
  const originalSize = encoded.length;

  if (originalSize <= limits.maxBytes) {
    return {
      buffer: encoded,
      contentType: 'image/png',
      wasCompressed: false,
      originalSize,
      finalSize: originalSize,
    };
  }

  logger.info(
    { originalSize, sizeMB: (originalSize / (1024 * 1024)).toFixed(2) },
    'Image exceeds upload limit, starting compression'
  );

  let pipeline = sharp(pixels.data, {
    raw: { width: pixels.width, height: pixels.height, channels: pixels.channels },
  });

  // JPEG has no alpha channel
  if (pixels.channels === 2 || pixels.channels === 4) {
    pipeline = pipeline.flatten({ background: '#ffffff' });
  }

  if (Math.max(pixels.width, pixels.height) > limits.maxDimension) {
    pipeline = pipeline.resize(limits.maxDimension, limits.maxDimension, {
      fit: 'inside',
      withoutEnlargement: true,
    });
  }

  let smallest = originalSize;
  for (const quality of limits.qualityLevels) {
    const compressed = await pipeline
      .clone()
      .jpeg({ quality, mozjpeg: true, progressive: true })
      .toBuffer();

    logger.debug({ quality, compressedSize: compressed.length }, 'Compression attempt');
    smallest = Math.min(smallest, compressed.length);

    if (compressed.length <= limits.maxBytes) {
      logger.info(
        { originalSize, finalSize: compressed.length, quality },
        'Image compressed successfully'
      );
      return {
        buffer: compressed,
        contentType: 'image/jpeg',
        wasCompressed: true,
        originalSize,
        finalSize: compressed.length,
        quality,
      };
    }
  }

  throw new ImageTooLargeError(smallest, limits.maxBytes);
}
