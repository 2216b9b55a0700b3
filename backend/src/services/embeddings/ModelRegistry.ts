/**
 * Model Registry
 *
 * Maps model ids to embedding providers. Providers are created on first use
 * (or by `preload`) and then shared read-only by every request.
 *
 * @module services/embeddings/ModelRegistry
 */

import type { Logger } from '@shared/utils/logger';
import type { AppConfig } from '@/infrastructure/config/environment';
import { ConfigurationError } from '@/domains/classification/errors';
import { AzureVisionEmbeddingProvider } from './AzureVisionEmbeddingProvider';
import { AZURE_VISION_MODEL_PREFIX, AZURE_VISION_MODEL_VERSIONS } from './constants';
import type { EmbeddingProvider, EmbeddingProviderFactory } from './types';

export class ModelRegistry {
  private readonly factories = new Map<string, EmbeddingProviderFactory>();
  private readonly providers = new Map<string, EmbeddingProvider>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ service: 'ModelRegistry' });
  }

  /**
   * Register a provider factory. Registering an id twice replaces the
   * factory and drops any provider already built for it.
   */
  register(modelId: string, factory: EmbeddingProviderFactory): this {
    this.factories.set(modelId, factory);
    this.providers.delete(modelId);
    return this;
  }

  has(modelId: string): boolean {
    return this.factories.has(modelId);
  }

  modelIds(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * @throws ConfigurationError when no provider is registered for the id
   */
  get(modelId: string): EmbeddingProvider {
    const existing = this.providers.get(modelId);
    if (existing) {
      return existing;
    }

    const factory = this.factories.get(modelId);
    if (!factory) {
      const supported = this.modelIds();
      throw new ConfigurationError(
        `Unsupported model "${modelId}"` +
          (supported.length > 0 ? `; supported models: ${supported.join(', ')}` : '; no models are configured')
      );
    }

    const provider = factory();
    this.providers.set(modelId, provider);
    this.logger.info({ modelId }, 'Embedding provider created');
    return provider;
  }

  /**
   * Build the providers of the given models (all registered ones by default)
   */
  preload(modelIds: readonly string[] = this.modelIds()): EmbeddingProvider[] {
    return modelIds.map((modelId) => this.get(modelId));
  }
}

export interface ModelRegistryDependencies {
  logger: Logger;
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof fetch;
}

/**
 * Registry with every model the configuration enables
 */
export function createModelRegistry(
  config: Pick<AppConfig, 'azureVision'>,
  deps: ModelRegistryDependencies
): ModelRegistry {
  const registry = new ModelRegistry(deps.logger);
  const azureVision = config.azureVision;

  if (!azureVision) {
    deps.logger.warn('Azure Vision not configured - no embedding models available');
    return registry;
  }

  for (const modelVersion of AZURE_VISION_MODEL_VERSIONS) {
    const provider = (): EmbeddingProvider =>
      new AzureVisionEmbeddingProvider({
        endpoint: azureVision.endpoint,
        apiKey: azureVision.apiKey,
        apiVersion: azureVision.apiVersion,
        modelVersion,
        logger: deps.logger,
        fetch: deps.fetch,
      });
    registry.register(`${AZURE_VISION_MODEL_PREFIX}${modelVersion}`, provider);
  }

  return registry;
}
