/**
 * Classification Request Schema Tests
 */

import { describe, it, expect } from 'vitest';
import {
  classificationMetadataSchema,
  imageInsightBodySchema,
  MAX_LABELS_PER_REQUEST,
} from '../classification.schemas';
import { formatZodIssues, validateSafe } from '../index';

describe('classificationMetadataSchema', () => {
  it('parses metadata sent as a JSON string', () => {
    const result = classificationMetadataSchema.safeParse('{"labels":["biryani","cake"]}');

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({ labels: ['biryani', 'cake'] });
    }
  });

  it('accepts metadata sent as an object with a model name', () => {
    const result = classificationMetadataSchema.safeParse({
      labels: ['cat'],
      model_name: 'azure-vision/2022-04-11',
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.model_name).toBe('azure-vision/2022-04-11');
    }
  });

  it('keeps duplicate labels and their order', () => {
    const result = classificationMetadataSchema.safeParse({ labels: ['b', 'a', 'b'] });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.labels).toEqual(['b', 'a', 'b']);
    }
  });

  it('lets an empty label list through', () => {
    expect(classificationMetadataSchema.safeParse({ labels: [] }).success).toBe(true);
  });

  it('rejects text that is not JSON', () => {
    const result = classificationMetadataSchema.safeParse('labels=cat');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors[0]?.message).toBe('metadata must be a JSON object');
    }
  });

  it('rejects metadata without labels', () => {
    const result = classificationMetadataSchema.safeParse({});

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors[0]?.path).toEqual(['labels']);
      expect(result.error.errors[0]?.message).toBe('labels is required');
    }
  });

  it('rejects empty label strings', () => {
    const result = classificationMetadataSchema.safeParse({ labels: ['cat', ''] });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors[0]?.path).toEqual(['labels', 1]);
      expect(result.error.errors[0]?.message).toBe('Labels cannot be empty strings');
    }
  });

  it('rejects non-string labels', () => {
    const result = classificationMetadataSchema.safeParse({ labels: [1] });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors[0]?.message).toBe('Labels must be strings');
    }
  });

  it('caps the number of labels', () => {
    const labels = Array.from({ length: MAX_LABELS_PER_REQUEST + 1 }, (_, i) => `label-${i}`);

    expect(classificationMetadataSchema.safeParse({ labels }).success).toBe(false);
  });
});

describe('imageInsightBodySchema', () => {
  it('accepts an http url with metadata', () => {
    const result = imageInsightBodySchema.safeParse({
      url: 'https://images.test/cat.png',
      metadata: '{"labels":["cat"]}',
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.url).toBe('https://images.test/cat.png');
      expect(result.data.metadata.labels).toEqual(['cat']);
    }
  });

  it('rejects a url with another scheme', () => {
    const result = validateSafe(imageInsightBodySchema, {
      url: 'ftp://images.test/cat.png',
      metadata: { labels: ['cat'] },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toBe('url: url must start with http:// or https://');
    }
  });

  it('requires metadata', () => {
    const result = validateSafe(imageInsightBodySchema, { base64str: 'aGVsbG8=' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toBe('metadata: metadata is required');
    }
  });
});
