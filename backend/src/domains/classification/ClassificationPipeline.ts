/**
 * Classification Pipeline
 *
 * Request-scoped composition of the classification components:
 * labels -> provider lookup -> image resolution -> prompts -> embeddings -> scores.
 *
 * Labels and prompts only ever live in the arguments and locals of
 * `classify`, so concurrent calls on one pipeline cannot see each other's
 * label sets.
 *
 * @module domains/classification/ClassificationPipeline
 */

import type { ClassificationInsight, ImageInputSource } from '@zeroshot/shared';
import type { Logger } from '@shared/utils/logger';
import type { AppConfig } from '@/infrastructure/config/environment';
import type { ModelRegistry } from '@/services/embeddings/ModelRegistry';
import { ConfigurationError } from './errors';
import { FormatResolver } from './FormatResolver';
import { PromptBuilder } from './PromptBuilder';
import { SimilarityScorer, type RankedResult } from './SimilarityScorer';
import type { ImageInput } from './types';

export interface ClassifyOptions {
  /** Content type reported by the caller for raw bytes */
  mimeHint?: string;
}

export interface ResolvedImageInfo {
  width: number;
  height: number;
  mimeType: string;
  source: ImageInputSource;
}

export interface ClassificationOutcome {
  result: RankedResult;
  image: ResolvedImageInfo;
}

export interface ClassificationPipelineDependencies {
  registry: ModelRegistry;
  resolver: FormatResolver;
  promptBuilder: PromptBuilder;
  scorer: SimilarityScorer;
  logger: Logger;
}

export class ClassificationPipeline {
  private readonly registry: ModelRegistry;
  private readonly resolver: FormatResolver;
  private readonly promptBuilder: PromptBuilder;
  private readonly scorer: SimilarityScorer;
  private readonly logger: Logger;

  constructor(deps: ClassificationPipelineDependencies) {
    this.registry = deps.registry;
    this.resolver = deps.resolver;
    this.promptBuilder = deps.promptBuilder;
    this.scorer = deps.scorer;
    this.logger = deps.logger.child({ service: 'ClassificationPipeline' });
  }

  /**
   * Classify one image against the given labels
   *
   * @throws ConfigurationError for an empty label set or unsupported model
   * @throws DecodeError when the image input cannot be decoded
   * @throws NumericError when the embeddings cannot be scored
   */
  async classify(
    imageInput: ImageInput,
    labels: readonly string[],
    modelId: string,
    options: ClassifyOptions = {}
  ): Promise<ClassificationOutcome> {
    const startTime = Date.now();

    // Snapshot: a caller mutating its array mid-flight must not change this call
    const labelSet = [...labels];
    if (labelSet.length === 0) {
      throw new ConfigurationError('At least one label is required');
    }

    const provider = this.registry.get(modelId);
    const image = await this.resolver.resolve(imageInput, options.mimeHint);
    const prompts = this.promptBuilder.build(labelSet);

    const [imageEmbedding, textEmbeddings] = await Promise.all([
      provider.embedImage(image.pixels),
      provider.embedTexts(prompts.map((prompt) => prompt.text)),
    ]);

    const result = this.scorer.score(
      imageEmbedding,
      textEmbeddings,
      prompts.map((prompt) => prompt.label),
      modelId
    );

    this.logger.info(
      {
        modelId: result.modelId,
        labelCount: labelSet.length,
        topLabel: result.top.label,
        source: image.source,
        durationMs: Date.now() - startTime,
      },
      'Classification completed'
    );

    return {
      result,
      image: {
        width: image.pixels.width,
        height: image.pixels.height,
        mimeType: image.mimeType,
        source: image.source,
      },
    };
  }
}

/**
 * Wire format of a ranked result
 */
export function toClassificationInsight(result: RankedResult): ClassificationInsight {
  return {
    prediction: { label: result.top.label, confidence: result.top.confidence },
    other_predictions: result.all.map((entry) => ({ label: entry.label, confidence: entry.confidence })),
    model_name: result.modelId,
  };
}

/**
 * Pipeline wired from the application configuration
 */
export function createClassificationPipeline(
  config: Pick<AppConfig, 'allowLocalPaths' | 'promptTemplate' | 'logitScale'>,
  deps: { registry: ModelRegistry; logger: Logger; fetch?: typeof fetch }
): ClassificationPipeline {
  return new ClassificationPipeline({
    registry: deps.registry,
    resolver: new FormatResolver({
      logger: deps.logger,
      allowLocalPaths: config.allowLocalPaths,
      fetch: deps.fetch,
    }),
    promptBuilder: new PromptBuilder({ template: config.promptTemplate, logger: deps.logger }),
    scorer: new SimilarityScorer({ logitScale: config.logitScale }),
    logger: deps.logger,
  });
}
