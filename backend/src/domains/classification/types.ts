/**
 * Classification Domain Types
 *
 * @module domains/classification/types
 */

import type { ImageInputSource } from '@zeroshot/shared';

export type Channels = 1 | 2 | 3 | 4;

/**
 * Decoded image: row-major `height x width x channels` unsigned 8-bit samples.
 * `data.length === width * height * channels`.
 */
export interface PixelBuffer {
  data: Uint8Array;
  width: number;
  height: number;
  channels: Channels;
}

/**
 * Any accepted image representation.
 *
 * Strings are an http(s) URL, a local path or base64 text (optionally a
 * data URL), tried in that order. Bytes are an encoded image such as an
 * uploaded file.
 */
export type ImageInput = PixelBuffer | Uint8Array | string;

export interface ResolvedImage {
  pixels: PixelBuffer;
  mimeType: string;
  /** Branch of the resolver that produced the pixels */
  source: ImageInputSource;
}
