/**
 * Unit Tests - ModelRegistry
 *
 * @module __tests__/unit/services/embeddings/ModelRegistry
 */

import { describe, it, expect, vi } from 'vitest';
import { http, HttpResponse } from 'msw';
import { ModelRegistry, createModelRegistry } from '@/services/embeddings/ModelRegistry';
import { AzureVisionEmbeddingProvider } from '@/services/embeddings/AzureVisionEmbeddingProvider';
import { ConfigurationError } from '@/domains/classification/errors';
import { server } from '../../../mocks/server';
import { VISION_TEST_ENDPOINT } from '../../../mocks/handlers';
import { createFoodProvider } from '../../../fixtures/EmbeddingProviderFixture';
import { createSilentLogger, createTestLogger } from '../../../helpers/mockPinoFactory';

describe('ModelRegistry', () => {
  const logger = createSilentLogger();

  it('should build a provider once and reuse it', () => {
    const factory = vi.fn(() => createFoodProvider('fake/a'));
    const registry = new ModelRegistry(logger).register('fake/a', factory);

    const first = registry.get('fake/a');
    const second = registry.get('fake/a');

    expect(first).toBe(second);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('should replace a provider when an id is registered again', () => {
    const registry = new ModelRegistry(logger).register('fake/a', () => createFoodProvider('fake/a'));
    const before = registry.get('fake/a');

    registry.register('fake/a', () => createFoodProvider('fake/a'));

    expect(registry.get('fake/a')).not.toBe(before);
  });

  it('should list registered ids in registration order', () => {
    const registry = new ModelRegistry(logger)
      .register('fake/b', () => createFoodProvider('fake/b'))
      .register('fake/a', () => createFoodProvider('fake/a'));

    expect(registry.modelIds()).toEqual(['fake/b', 'fake/a']);
    expect(registry.has('fake/a')).toBe(true);
    expect(registry.has('fake/c')).toBe(false);
  });

  it('should name the supported models for an unknown id', () => {
    const registry = new ModelRegistry(logger)
      .register('fake/a', () => createFoodProvider('fake/a'))
      .register('fake/b', () => createFoodProvider('fake/b'));

    expect(() => registry.get('fake/c')).toThrow(
      new ConfigurationError('Unsupported model "fake/c"; supported models: fake/a, fake/b')
    );
  });

  it('should say when no models are configured', () => {
    expect(() => new ModelRegistry(logger).get('fake/a')).toThrow(
      'Unsupported model "fake/a"; no models are configured'
    );
  });

  it('should preload every registered provider by default', () => {
    const factoryA = vi.fn(() => createFoodProvider('fake/a'));
    const factoryB = vi.fn(() => createFoodProvider('fake/b'));
    const registry = new ModelRegistry(logger).register('fake/a', factoryA).register('fake/b', factoryB);

    const providers = registry.preload();

    expect(providers.map((provider) => provider.modelId)).toEqual(['fake/a', 'fake/b']);
    expect(factoryA).toHaveBeenCalledTimes(1);
    expect(factoryB).toHaveBeenCalledTimes(1);
  });

  it('should log provider creation', () => {
    const { testLogger, logs } = createTestLogger();
    const registry = new ModelRegistry(testLogger).register('fake/a', () => createFoodProvider('fake/a'));

    registry.get('fake/a');

    expect(logs[0]).toMatchObject({ msg: 'Embedding provider created', modelId: 'fake/a', service: 'ModelRegistry' });
  });
});

describe('createModelRegistry', () => {
  const azureVision = { endpoint: VISION_TEST_ENDPOINT, apiKey: 'test-secret', apiVersion: '2024-02-01' };

  it('should register no models without Azure Vision settings', () => {
    const { testLogger, getLogsByLevel } = createTestLogger();

    const registry = createModelRegistry({}, { logger: testLogger });

    expect(registry.modelIds()).toEqual([]);
    expect(getLogsByLevel('warn')[0]?.msg).toBe('Azure Vision not configured - no embedding models available');
  });

  it('should register every Azure Vision model version', () => {
    const registry = createModelRegistry({ azureVision }, { logger: createSilentLogger() });

    expect(registry.modelIds()).toEqual(['azure-vision/2023-04-15', 'azure-vision/2022-04-11']);
    expect(registry.get('azure-vision/2022-04-11')).toBeInstanceOf(AzureVisionEmbeddingProvider);
  });

  it('should call the API with the model version of the requested id', async () => {
    const versions: (string | null)[] = [];
    server.use(
      http.post(`${VISION_TEST_ENDPOINT}/computervision/*`, ({ request }) => {
        versions.push(new URL(request.url).searchParams.get('model-version'));
        return HttpResponse.json({ vector: [1, 0], modelVersion: '2022-04-11' });
      })
    );
    const registry = createModelRegistry({ azureVision }, { logger: createSilentLogger() });

    await registry.get('azure-vision/2022-04-11').embedTexts(['a photo of a cat']);

    expect(versions).toEqual(['2022-04-11']);
  });
});
