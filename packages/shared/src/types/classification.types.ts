/**
 * Classification Wire Types
 *
 * Shapes returned by the image insight endpoint. Field names follow the
 * public JSON contract, hence the snake_case.
 *
 * @module @zeroshot/shared/types/classification
 */

/**
 * One label with its softmax confidence in [0, 1]
 */
export interface ScoreEntry {
  label: string;
  confidence: number;
}

/**
 * Serialized ranked result
 *
 * @example
 * {
 *   "prediction": { "label": "biryani", "confidence": 0.41 },
 *   "other_predictions": [
 *     { "label": "biryani", "confidence": 0.41 },
 *     { "label": "cake", "confidence": 0.30 },
 *     { "label": "other food", "confidence": 0.29 }
 *   ],
 *   "model_name": "azure-vision/2023-04-15"
 * }
 */
export interface ClassificationInsight {
  prediction: ScoreEntry;
  /** Every label, confidence descending */
  other_predictions: ScoreEntry[];
  model_name: string;
}

/**
 * Success envelope of `POST /v2/image_insight/extract`
 */
export interface ImageInsightResponse {
  id: string;
  insight: ClassificationInsight;
  image_height: number;
  image_width: number;
  status_code: 200;
  message: 'success';
  /** UTC timestamp formatted `YYYYMMDD::HHMMSS` */
  created_at: string;
}
