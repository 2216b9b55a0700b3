/**
 * Classification Request Schemas
 *
 * @module @zeroshot/shared/schemas/classification
 */

import { z } from 'zod';

/** Upper bound on labels per request */
export const MAX_LABELS_PER_REQUEST = 256;

/** Upper bound on a single label, in characters */
export const MAX_LABEL_LENGTH = 200;

/**
 * Multipart fields always arrive as text, so a metadata string is parsed as
 * JSON before validation. Unparseable text is left as is and then rejected
 * by the object schema.
 */
function parseJsonText(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

/**
 * Metadata Schema
 *
 * An empty label list passes validation on purpose: the pipeline owns that
 * rule and reports it as a configuration error.
 */
export const classificationMetadataSchema = z.preprocess(
  parseJsonText,
  z.object(
    {
      labels: z
        .array(
          z
            .string({ invalid_type_error: 'Labels must be strings' })
            .min(1, 'Labels cannot be empty strings')
            .max(MAX_LABEL_LENGTH, `Label too long (max ${MAX_LABEL_LENGTH} chars)`),
          {
            required_error: 'labels is required',
            invalid_type_error: 'labels must be an array of strings',
          }
        )
        .max(MAX_LABELS_PER_REQUEST, `Too many labels (max ${MAX_LABELS_PER_REQUEST})`),
      model_name: z.string().min(1, 'model_name cannot be empty').optional(),
    },
    {
      required_error: 'metadata is required',
      invalid_type_error: 'metadata must be a JSON object',
    }
  )
);

export type ClassificationMetadata = z.infer<typeof classificationMetadataSchema>;

/**
 * Image Insight Body Schema
 * Non-file fields of `POST /v2/image_insight/extract`, multipart or JSON
 */
export const imageInsightBodySchema = z.object({
  url: z
    .string()
    .regex(/^https?:\/\//i, 'url must start with http:// or https://')
    .optional(),
  base64str: z.string().min(1, 'base64str cannot be empty').optional(),
  metadata: classificationMetadataSchema,
});

export type ImageInsightBody = z.infer<typeof imageInsightBodySchema>;
