import type { PixelBuffer } from '@/domains/classification/types';
import type { Embedding } from '@/domains/classification/vector';

/**
 * Produces image and text embeddings in one shared vector space.
 * Implementations hold no per-request state, so one instance serves
 * concurrent requests.
 */
export interface EmbeddingProvider {
  readonly modelId: string;

  embedImage(pixels: PixelBuffer): Promise<Embedding>;

  /** One embedding per text, in input order */
  embedTexts(texts: readonly string[]): Promise<Embedding[]>;
}

export type EmbeddingProviderFactory = () => EmbeddingProvider;
