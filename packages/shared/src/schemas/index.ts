/**
 * Request Validation Schemas
 *
 * Zod schemas for validating HTTP request bodies.
 *
 * @module @zeroshot/shared/schemas
 */

import type { z } from 'zod';

export {
  classificationMetadataSchema,
  imageInsightBodySchema,
  MAX_LABELS_PER_REQUEST,
  MAX_LABEL_LENGTH,
} from './classification.schemas';
export type {
  ClassificationMetadata,
  ImageInsightBody,
} from './classification.schemas';

/**
 * Safe validation helper
 *
 * @example
 * const result = validateSafe(imageInsightBodySchema, req.body);
 * if (!result.success) {
 *   return sendError(res, ErrorCode.VALIDATION_ERROR, formatZodIssues(result.error));
 * }
 */
export function validateSafe<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): { success: true; data: z.infer<T> } | { success: false; error: z.ZodError } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Joins zod issues into one message, each prefixed with its field path
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
