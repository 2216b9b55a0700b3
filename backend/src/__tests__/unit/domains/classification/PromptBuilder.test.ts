/**
 * Unit Tests - PromptBuilder
 *
 * @module __tests__/unit/domains/classification/PromptBuilder
 */

import { describe, it, expect } from 'vitest';
import { PromptBuilder } from '@/domains/classification/PromptBuilder';
import { ConfigurationError } from '@/domains/classification/errors';
import { createSilentLogger, createTestLogger } from '../../../helpers/mockPinoFactory';

describe('PromptBuilder', () => {
  const logger = createSilentLogger();

  it('should use the default template', () => {
    const builder = new PromptBuilder({ logger });

    expect(builder.build(['cat', 'dog'])).toEqual([
      { label: 'cat', text: 'a photo of a cat' },
      { label: 'dog', text: 'a photo of a dog' },
    ]);
  });

  it('should fill every placeholder of a custom template', () => {
    const builder = new PromptBuilder({ template: 'an image of {label}, a kind of {label}', logger });

    expect(builder.build(['fern'])).toEqual([
      { label: 'fern', text: 'an image of fern, a kind of fern' },
    ]);
  });

  it('should insert labels literally', () => {
    const builder = new PromptBuilder({ logger });

    expect(builder.build(['$& and $1'])[0]?.text).toBe('a photo of a $& and $1');
  });

  it('should keep duplicates and label order', () => {
    const builder = new PromptBuilder({ logger });

    const prompts = builder.build(['other food', 'biryani', 'other food']);

    expect(prompts.map((prompt) => prompt.label)).toEqual(['other food', 'biryani', 'other food']);
  });

  it('should reject a template without a placeholder', () => {
    expect(() => new PromptBuilder({ template: 'a photo', logger })).toThrow(
      new ConfigurationError('Prompt template must contain {label}: "a photo"')
    );
  });

  it('should reject an empty label set', () => {
    const builder = new PromptBuilder({ logger });

    expect(() => builder.build([])).toThrow(new ConfigurationError('At least one label is required'));
  });

  it('should log the number of prompts', () => {
    const { testLogger, logs } = createTestLogger();
    const builder = new PromptBuilder({ logger: testLogger });

    builder.build(['cat', 'dog']);

    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({ msg: 'Prompts built', count: 2, service: 'PromptBuilder' });
  });
});
