/**
 * Format Resolver
 *
 * Turns any accepted image representation into one canonical pixel buffer.
 * The representation is chosen by a fixed precedence, first match wins:
 *
 * 1. pixel buffer  - passed through after a shape check
 * 2. bytes         - decoded as an encoded image
 * 3. http(s) URL   - fetched, then decoded
 * 4. local path    - read, then decoded (only when `allowLocalPaths`)
 * 5. base64 text   - optionally a `data:<mime>;base64,` URL
 *
 * A failure in the chosen branch is a `DecodeError` for that branch; no other
 * branch is tried afterwards.
 *
 * @module domains/classification/FormatResolver
 */

import { readFile, stat } from 'fs/promises';
import { DEFAULT_IMAGE_MIME_TYPE, type ImageInputSource } from '@zeroshot/shared';
import type { Logger } from '@shared/utils/logger';
import {
  decodeImage,
  detectImageFormat,
  mimeTypeFromExtension,
  pixelBufferProblem,
} from '@/services/images/ImageCodec';
import { DecodeError } from './errors';
import type { ImageInput, PixelBuffer, ResolvedImage } from './types';

const HTTP_URL_PATTERN = /^https?:\/\//i;

const DATA_URL_HEADER_PATTERN = /^data:([a-z0-9.+-]+\/[a-z0-9.+-]+)?(?:;[a-z0-9.+-]+=[^;,]*)*;base64,/i;

// Alphabet and trailing padding only; callers also require length % 4 === 0
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export interface FormatResolverOptions {
  logger: Logger;
  /**
   * Whether strings naming an existing file are read from disk. When off
   * they are treated as base64 text.
   * @default true
   */
  allowLocalPaths?: boolean;
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof fetch;
}

export function isPixelBuffer(input: ImageInput): input is PixelBuffer {
  return typeof input === 'object' && !(input instanceof Uint8Array);
}

/**
 * Lower-cased media type of a Content-Type header, parameters stripped
 */
export function parseContentType(header: string | null): string | null {
  const mediaType = header?.split(';')[0]?.trim().toLowerCase();
  return mediaType ? mediaType : null;
}

/**
 * Split base64 text into its payload and the MIME type of its data URL header
 *
 * @throws DecodeError (variant `base64`) on a malformed header or payload
 */
export function parseBase64Text(text: string): { mimeType: string | null; bytes: Buffer } {
  let payload = text.trim();
  let mimeType: string | null = null;

  if (payload.slice(0, 5).toLowerCase() === 'data:') {
    const header = DATA_URL_HEADER_PATTERN.exec(payload);
    if (!header) {
      throw new DecodeError('base64', 'Malformed data URL header');
    }
    mimeType = header[1]?.toLowerCase() ?? null;
    payload = payload.slice(header[0].length);
  }

  payload = payload.replace(/\s+/g, '');
  if (payload.length === 0 || payload.length % 4 !== 0 || !BASE64_PATTERN.test(payload)) {
    throw new DecodeError('base64', 'Input is not valid base64 text');
  }

  return { mimeType, bytes: Buffer.from(payload, 'base64') };
}

export class FormatResolver {
  private readonly logger: Logger;
  private readonly allowLocalPaths: boolean;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FormatResolverOptions) {
    this.logger = options.logger.child({ service: 'FormatResolver' });
    this.allowLocalPaths = options.allowLocalPaths ?? true;
    this.fetchImpl = options.fetch ?? ((input: RequestInfo | URL, init?: RequestInit) => fetch(input, init));
  }

  /**
   * @param mimeHint - Content type reported by the caller, used for raw bytes
   */
  async resolve(input: ImageInput, mimeHint?: string): Promise<ResolvedImage> {
    let resolved: ResolvedImage;

    if (isPixelBuffer(input)) {
      resolved = this.fromPixels(input);
    } else if (input instanceof Uint8Array) {
      resolved = await this.fromBytes(input, mimeHint);
    } else if (HTTP_URL_PATTERN.test(input)) {
      resolved = await this.fromUrl(input);
    } else if (this.allowLocalPaths && (await isExistingFile(input))) {
      resolved = await this.fromPath(input);
    } else {
      resolved = await this.fromBase64(input);
    }

    this.logger.debug(
      {
        source: resolved.source,
        mimeType: resolved.mimeType,
        width: resolved.pixels.width,
        height: resolved.pixels.height,
      },
      'Image input resolved'
    );
    return resolved;
  }

  private fromPixels(pixels: PixelBuffer): ResolvedImage {
    const problem = pixelBufferProblem(pixels);
    if (problem) {
      throw new DecodeError('pixels', `Inconsistent pixel buffer: ${problem}`);
    }
    return { pixels, mimeType: DEFAULT_IMAGE_MIME_TYPE, source: 'pixels' };
  }

  private async fromBytes(bytes: Uint8Array, mimeHint?: string): Promise<ResolvedImage> {
    const pixels = await decodeOrThrow(bytes, 'bytes');
    return { pixels, mimeType: mimeHint ?? DEFAULT_IMAGE_MIME_TYPE, source: 'bytes' };
  }

  private async fromUrl(url: string): Promise<ResolvedImage> {
    let response: Response;
    try {
      response = await this.fetchImpl(url);
    } catch (error) {
      throw new DecodeError('url', `Failed to fetch image from ${describeUrl(url)}`, error);
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new DecodeError(
        'url',
        `Fetching image from ${describeUrl(url)} returned ${response.status}`
      );
    }

    let bytes: Uint8Array;
    try {
      bytes = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw new DecodeError('url', `Failed to read image body from ${describeUrl(url)}`, error);
    }

    const pixels = await decodeOrThrow(bytes, 'url');
    const mimeType =
      parseContentType(response.headers.get('content-type')) ??
      detectImageFormat(bytes) ??
      DEFAULT_IMAGE_MIME_TYPE;

    return { pixels, mimeType, source: 'url' };
  }

  private async fromPath(filePath: string): Promise<ResolvedImage> {
    let bytes: Buffer;
    try {
      bytes = await readFile(filePath);
    } catch (error) {
      throw new DecodeError('path', `Failed to read image file ${filePath}`, error);
    }

    const pixels = await decodeOrThrow(bytes, 'path');
    const mimeType =
      mimeTypeFromExtension(filePath) ?? detectImageFormat(bytes) ?? DEFAULT_IMAGE_MIME_TYPE;

    return { pixels, mimeType, source: 'path' };
  }

  private async fromBase64(text: string): Promise<ResolvedImage> {
    const { mimeType, bytes } = parseBase64Text(text);
    const pixels = await decodeOrThrow(bytes, 'base64');

    return {
      pixels,
      mimeType: mimeType ?? detectImageFormat(bytes) ?? DEFAULT_IMAGE_MIME_TYPE,
      source: 'base64',
    };
  }
}

async function decodeOrThrow(bytes: Uint8Array, variant: ImageInputSource): Promise<PixelBuffer> {
  try {
    return await decodeImage(bytes);
  } catch (error) {
    throw new DecodeError(variant, 'Image bytes could not be decoded', error);
  }
}

/**
 * Whether the string names an existing regular file. Lookup failures
 * (missing file, invalid path) mean "not a path".
 */
async function isExistingFile(candidate: string): Promise<boolean> {
  if (candidate.length === 0 || candidate.length > 4096 || candidate.includes('\0')) {
    return false;
  }
  try {
    return (await stat(candidate)).isFile();
  } catch {
    return false;
  }
}

/** Host and path only; query strings may carry credentials */
function describeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.host}${parsed.pathname}`;
  } catch {
    return 'invalid URL';
  }
}
