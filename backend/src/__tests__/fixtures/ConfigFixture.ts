/**
 * ConfigFixture - AppConfig for tests
 */

import { DEFAULT_PROMPT_TEMPLATE } from '@zeroshot/shared';
import type { AppConfig } from '@/infrastructure/config/environment';
import { FAKE_MODEL_ID } from './EmbeddingProviderFixture';

export function createTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    nodeEnv: 'test',
    port: 0,
    appName: 'image insight app',
    logLevel: 'silent',
    corsOrigin: '*',
    maxRequestSizeBytes: 100 * 1024 * 1024,
    allowLocalPaths: false,
    defaultModelId: FAKE_MODEL_ID,
    promptTemplate: DEFAULT_PROMPT_TEMPLATE,
    logitScale: 1,
    ...overrides,
  };
}
