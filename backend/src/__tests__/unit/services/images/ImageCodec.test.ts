/**
 * Unit Tests - ImageCodec
 *
 * @module __tests__/unit/services/images/ImageCodec
 */

import { describe, it, expect } from 'vitest';
import {
  decodeImage,
  detectImageFormat,
  encodeImage,
  isChannelCount,
  mimeTypeFromExtension,
  pixelBufferProblem,
} from '@/services/images/ImageCodec';
import { ImageFixture } from '../../../fixtures/ImageFixture';

describe('ImageCodec', () => {
  // ============================================
  // Format detection
  // ============================================
  describe('detectImageFormat', () => {
    it('should detect PNG and JPEG from real encodings', async () => {
      expect(detectImageFormat(await ImageFixture.createPng())).toBe('image/png');
      expect(detectImageFormat(await ImageFixture.createJpeg())).toBe('image/jpeg');
    });

    it('should detect GIF, WebP and BMP signatures', () => {
      expect(detectImageFormat(Buffer.from('GIF89a'))).toBe('image/gif');
      expect(detectImageFormat(Buffer.from('RIFF\0\0\0\0WEBPVP8 '))).toBe('image/webp');
      expect(detectImageFormat(Buffer.from('BM\0\0'))).toBe('image/bmp');
    });

    it('should return null for unknown or short input', () => {
      expect(detectImageFormat(Buffer.from('hello world'))).toBeNull();
      expect(detectImageFormat(new Uint8Array(0))).toBeNull();
      expect(detectImageFormat(Buffer.from('RIFF\0\0\0\0WAVE'))).toBeNull();
    });
  });

  describe('mimeTypeFromExtension', () => {
    it('should map known extensions case-insensitively', () => {
      expect(mimeTypeFromExtension('/tmp/photos/Cat.JPG')).toBe('image/jpeg');
      expect(mimeTypeFromExtension('scan.tiff')).toBe('image/tiff');
    });

    it('should return null for unknown or missing extensions', () => {
      expect(mimeTypeFromExtension('notes.txt')).toBeNull();
      expect(mimeTypeFromExtension('README')).toBeNull();
    });
  });

  // ============================================
  // Pixel buffer checks
  // ============================================
  describe('pixelBufferProblem', () => {
    it('should accept a consistent buffer', () => {
      expect(pixelBufferProblem(ImageFixture.createPixelBuffer({ channels: 4 }))).toBeNull();
    });

    it('should describe a length mismatch', () => {
      expect(pixelBufferProblem({ data: new Uint8Array(10), width: 2, height: 2, channels: 3 })).toBe(
        'data has 10 samples, expected 12'
      );
    });

    it('should describe a non-positive height', () => {
      expect(pixelBufferProblem({ data: new Uint8Array(0), width: 2, height: 0, channels: 1 })).toBe(
        'height must be a positive integer, got 0'
      );
    });
  });

  describe('isChannelCount', () => {
    it('should accept 1 to 4 channels only', () => {
      expect([0, 1, 2, 3, 4, 5].map(isChannelCount)).toEqual([false, true, true, true, true, false]);
    });
  });

  // ============================================
  // Decoding and encoding
  // ============================================
  describe('decodeImage', () => {
    it('should decode a PNG to its exact pixels', async () => {
      const pixels = ImageFixture.createPixelBuffer({ width: 5, height: 2 });

      const decoded = await decodeImage(await ImageFixture.encodePng(pixels));

      expect(decoded.width).toBe(5);
      expect(decoded.height).toBe(2);
      expect(decoded.channels).toBe(3);
      expect(Buffer.from(decoded.data)).toEqual(Buffer.from(pixels.data));
    });

    it('should keep an alpha channel', async () => {
      const pixels = ImageFixture.createPixelBuffer({ width: 2, height: 2, channels: 4 });

      const decoded = await decodeImage(await ImageFixture.encodePng(pixels));

      expect(decoded.channels).toBe(4);
      expect(decoded.data).toHaveLength(16);
    });

    it('should reject bytes that are not an image', async () => {
      await expect(decodeImage(Buffer.from('not an image'))).rejects.toThrow();
    });
  });

  describe('encodeImage', () => {
    const pixels = ImageFixture.createPixelBuffer({ width: 6, height: 4 });

    it('should encode to each supported format', async () => {
      expect(detectImageFormat(await encodeImage(pixels))).toBe('image/png');
      expect(detectImageFormat(await encodeImage(pixels, 'jpeg', { quality: 50 }))).toBe('image/jpeg');
      expect(detectImageFormat(await encodeImage(pixels, 'webp'))).toBe('image/webp');
    });
  });
});
