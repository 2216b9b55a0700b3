/**
 * Types Index
 *
 * @module @zeroshot/shared/types
 */

export type {
  ApiErrorResponse,
  ErrorResponseWithStatus,
} from './error.types';
export { isApiErrorResponse, isValidErrorCode } from './error.types';

export type {
  ScoreEntry,
  ClassificationInsight,
  ImageInsightResponse,
} from './classification.types';
