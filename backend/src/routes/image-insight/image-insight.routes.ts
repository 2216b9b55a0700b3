/**
 * Image Insight Routes
 *
 * POST /v2/image_insight/extract classifies one image (uploaded file, URL or
 * base64 text) against the labels given in `metadata`.
 *
 * @module routes/image-insight/image-insight.routes
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import {
  ACCEPTED_UPLOAD_MIME_TYPES,
  type ImageInsightResponse,
} from '@zeroshot/shared';
import { formatZodIssues, imageInsightBodySchema } from '@zeroshot/shared/schemas';
import {
  toClassificationInsight,
  type ClassificationPipeline,
  type ImageInput,
} from '@/domains/classification';
import { sendUnsupportedMediaType, sendValidationError } from '@shared/utils/error-response';
import { createImageUpload } from './middleware/upload.middleware';

export interface ImageInsightRouterDependencies {
  pipeline: ClassificationPipeline;
  defaultModelId: string;
  maxRequestSizeBytes: number;
}

const ACCEPTED_MIME_TYPES: readonly string[] = ACCEPTED_UPLOAD_MIME_TYPES;

/**
 * UTC timestamp as `YYYYMMDD::HHMMSS`
 */
export function formatCreatedAt(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `::${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function createImageInsightRouter(deps: ImageInsightRouterDependencies): Router {
  const router = Router();

  /**
   * POST /v2/image_insight/extract
   * Input precedence: file > url > base64str
   */
  router.post(
    '/v2/image_insight/extract',
    createImageUpload(deps.maxRequestSizeBytes),
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const file = req.file;
        if (file && !ACCEPTED_MIME_TYPES.includes(file.mimetype)) {
          sendUnsupportedMediaType(res, `Invalid file type: ${file.mimetype}`);
          return;
        }

        // Multer puts non-file FormData fields in req.body
        const validation = imageInsightBodySchema.safeParse(req.body ?? {});
        if (!validation.success) {
          sendValidationError(res, formatZodIssues(validation.error));
          return;
        }

        const { url, base64str, metadata } = validation.data;

        let imageInput: ImageInput;
        let mimeHint: string | undefined;
        if (file) {
          imageInput = file.buffer;
          mimeHint = file.mimetype;
        } else if (url) {
          imageInput = url;
        } else if (base64str) {
          imageInput = base64str;
        } else {
          sendUnsupportedMediaType(res);
          return;
        }

        const modelId = metadata.model_name ?? deps.defaultModelId;
        req.log.info(
          { source: file ? 'file' : url ? 'url' : 'base64str', labelCount: metadata.labels.length, modelId },
          'Classifying image'
        );

        const { result, image } = await deps.pipeline.classify(imageInput, metadata.labels, modelId, {
          mimeHint,
        });

        const response: ImageInsightResponse = {
          id: uuidv4(),
          insight: toClassificationInsight(result),
          image_height: image.height,
          image_width: image.width,
          status_code: 200,
          message: 'success',
          created_at: formatCreatedAt(new Date()),
        };

        res.status(200).json(response);
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
