/**
 * Classification Domain
 *
 * @module domains/classification
 */

export {
  ClassificationPipeline,
  createClassificationPipeline,
  toClassificationInsight,
} from './ClassificationPipeline';
export type {
  ClassificationOutcome,
  ClassificationPipelineDependencies,
  ClassifyOptions,
  ResolvedImageInfo,
} from './ClassificationPipeline';

export { FormatResolver, isPixelBuffer, parseBase64Text, parseContentType } from './FormatResolver';
export type { FormatResolverOptions } from './FormatResolver';

export { PromptBuilder } from './PromptBuilder';
export type { Prompt, PromptBuilderOptions } from './PromptBuilder';

export { SimilarityScorer } from './SimilarityScorer';
export type { RankedResult, SimilarityScorerOptions } from './SimilarityScorer';

export {
  ClassificationError,
  ConfigurationError,
  DecodeError,
  NumericError,
  isClassificationError,
} from './errors';
export type { ClassificationErrorCode } from './errors';

export type { Channels, ImageInput, PixelBuffer, ResolvedImage } from './types';
export type { Embedding } from './vector';
