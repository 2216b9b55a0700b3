/**
 * Image Codec
 *
 * Decodes encoded images (JPEG, PNG, WebP, GIF, TIFF, AVIF, SVG) to raw pixel
 * buffers and encodes pixel buffers back to PNG, JPEG or WebP bytes.
 *
 * @module services/images/ImageCodec
 */

import path from 'path';
import sharp from 'sharp';
import type { Channels, PixelBuffer } from '@/domains/classification/types';

export type EncodeFormat = 'png' | 'jpeg' | 'webp';

export interface EncodeOptions {
  /** JPEG/WebP quality, 1-100 */
  quality?: number;
}

const EXTENSION_MIME_TYPES: Readonly<Record<string, string>> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.jpe': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
  '.avif': 'image/avif',
  '.svg': 'image/svg+xml',
  '.bmp': 'image/bmp',
};

const CHANNEL_COUNTS: readonly number[] = [1, 2, 3, 4];

/**
 * Image format detection from magic bytes
 *
 * @returns the MIME type, or null when the signature is unknown
 */
export function detectImageFormat(bytes: Uint8Array): string | null {
  // JPEG: FF D8 FF
  if (bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return 'image/jpeg';
  }
  // PNG: 89 50 4E 47
  if (bytes[0] === 0x89 && bytes[1] === 0x50 && bytes[2] === 0x4e && bytes[3] === 0x47) {
    return 'image/png';
  }
  // GIF: 47 49 46
  if (bytes[0] === 0x47 && bytes[1] === 0x49 && bytes[2] === 0x46) {
    return 'image/gif';
  }
  // WebP: 52 49 46 46 ... 57 45 42 50
  if (
    bytes[0] === 0x52 &&
    bytes[1] === 0x49 &&
    bytes[2] === 0x46 &&
    bytes[3] === 0x46 &&
    bytes[8] === 0x57 &&
    bytes[9] === 0x45 &&
    bytes[10] === 0x42 &&
    bytes[11] === 0x50
  ) {
    return 'image/webp';
  }
  // BMP: 42 4D
  if (bytes[0] === 0x42 && bytes[1] === 0x4d) {
    return 'image/bmp';
  }
  return null;
}

export function mimeTypeFromExtension(filePath: string): string | null {
  return EXTENSION_MIME_TYPES[path.extname(filePath).toLowerCase()] ?? null;
}

export function isChannelCount(value: number): value is Channels {
  return CHANNEL_COUNTS.includes(value);
}

/**
 * Describe what is wrong with a pixel buffer, or null when it is consistent
 */
export function pixelBufferProblem(pixels: PixelBuffer): string | null {
  if (!(pixels.data instanceof Uint8Array)) {
    return 'data must be a Uint8Array';
  }
  if (!Number.isInteger(pixels.width) || pixels.width <= 0) {
    return `width must be a positive integer, got ${pixels.width}`;
  }
  if (!Number.isInteger(pixels.height) || pixels.height <= 0) {
    return `height must be a positive integer, got ${pixels.height}`;
  }
  if (!isChannelCount(pixels.channels)) {
    return `channels must be 1, 2, 3 or 4, got ${pixels.channels}`;
  }
  const expected = pixels.width * pixels.height * pixels.channels;
  if (pixels.data.length !== expected) {
    return `data has ${pixels.data.length} samples, expected ${expected}`;
  }
  return null;
}

/**
 * Decode an encoded image to raw pixels. Animated images yield their first frame.
 */
export async function decodeImage(bytes: Uint8Array): Promise<PixelBuffer> {
  const { data, info } = await sharp(bytes).raw().toBuffer({ resolveWithObject: true });

  return {
    data,
    width: info.width,
    height: info.height,
    channels: info.channels,
  };
}

export async function encodeImage(
  pixels: PixelBuffer,
  format: EncodeFormat = 'png',
  options: EncodeOptions = {}
): Promise<Buffer> {
  const image = sharp(pixels.data, {
    raw: { width: pixels.width, height: pixels.height, channels: pixels.channels },
  });

  switch (format) {
    case 'jpeg':
      return image.jpeg({ quality: options.quality ?? 90 }).toBuffer();
    case 'webp':
      return image.webp({ quality: options.quality ?? 90 }).toBuffer();
    case 'png':
      return image.png().toBuffer();
  }
}
