/**
 * Similarity Scorer
 *
 * Turns one image embedding and one text embedding per label into a ranked
 * confidence distribution:
 *
 * 1. L2-normalize every vector
 * 2. cosine similarity = dot product of the normalized vectors
 * 3. confidence = softmax over `logitScale * similarity`
 * 4. `top` is taken at the argmax of the raw similarities, before sorting;
 *    `all` is stably sorted by confidence, descending
 *
 * @module domains/classification/SimilarityScorer
 */

import type { ScoreEntry } from '@zeroshot/shared';
import { ConfigurationError, NumericError } from './errors';
import { argmax, dot, normalize, softmax, type Embedding } from './vector';

export interface RankedResult {
  top: ScoreEntry;
  /** One entry per label, confidence descending, ties in label order */
  all: ScoreEntry[];
  modelId: string;
}

export interface SimilarityScorerOptions {
  /**
   * Multiplier applied to similarities before the softmax. Monotonic, so it
   * sharpens or flattens the distribution without changing the ranking.
   * @default 1
   */
  logitScale?: number;
}

export class SimilarityScorer {
  readonly logitScale: number;

  constructor(options: SimilarityScorerOptions = {}) {
    const logitScale = options.logitScale ?? 1;
    if (!Number.isFinite(logitScale) || logitScale <= 0) {
      throw new ConfigurationError(`logitScale must be a positive number, got ${logitScale}`);
    }
    this.logitScale = logitScale;
  }

  /**
   * Raw cosine similarity of the image against every text embedding
   */
  similarities(imageEmbedding: Embedding, textEmbeddings: readonly Embedding[]): number[] {
    const image = normalize(imageEmbedding, 'Image embedding');

    return textEmbeddings.map((embedding, index) => {
      const text = normalize(embedding, `Text embedding ${index}`);
      if (text.length !== image.length) {
        throw new NumericError(
          `Text embedding ${index} has ${text.length} dimensions, image embedding has ${image.length}`
        );
      }
      return dot(image, text);
    });
  }

  score(
    imageEmbedding: Embedding,
    textEmbeddings: readonly Embedding[],
    labels: readonly string[],
    modelId: string
  ): RankedResult {
    if (labels.length === 0) {
      throw new ConfigurationError('At least one label is required');
    }
    if (textEmbeddings.length !== labels.length) {
      throw new NumericError(
        `Expected ${labels.length} text embeddings, received ${textEmbeddings.length}`
      );
    }

    const similarities = this.similarities(imageEmbedding, textEmbeddings);
    const confidences = softmax(similarities.map((similarity) => similarity * this.logitScale));

    const entries: ScoreEntry[] = labels.map((label, index) => ({
      label,
      confidence: confidences[index] ?? 0,
    }));

    const topIndex = argmax(similarities);
    const top = entries[topIndex];
    if (!top) {
      throw new NumericError('No similarity could be computed');
    }

    // Array.prototype.sort is stable, so equal confidences keep label order
    const all = [...entries].sort((a, b) => b.confidence - a.confidence);

    return { top: { ...top }, all, modelId };
  }
}
