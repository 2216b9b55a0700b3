/**
 * Prompt Builder
 *
 * @module domains/classification/PromptBuilder
 */

import { DEFAULT_PROMPT_TEMPLATE, LABEL_PLACEHOLDER } from '@zeroshot/shared';
import type { Logger } from '@shared/utils/logger';
import { ConfigurationError } from './errors';

export interface Prompt {
  label: string;
  text: string;
}

export interface PromptBuilderOptions {
  /** Must contain `{label}` */
  template?: string;
  logger: Logger;
}

/**
 * Maps labels to prompt texts, one per label, in label order.
 * Prompts are rebuilt on every call; nothing is cached per label.
 */
export class PromptBuilder {
  readonly template: string;
  private readonly logger: Logger;

  constructor(options: PromptBuilderOptions) {
    const template = options.template ?? DEFAULT_PROMPT_TEMPLATE;
    if (!template.includes(LABEL_PLACEHOLDER)) {
      throw new ConfigurationError(`Prompt template must contain ${LABEL_PLACEHOLDER}: "${template}"`);
    }
    this.template = template;
    this.logger = options.logger.child({ service: 'PromptBuilder' });
  }

  build(labels: readonly string[]): Prompt[] {
    if (labels.length === 0) {
      throw new ConfigurationError('At least one label is required');
    }

    // split/join: every placeholder is filled and `$&` in a label stays literal
    const prompts = labels.map((label) => ({
      label,
      text: this.template.split(LABEL_PLACEHOLDER).join(label),
    }));

    this.logger.debug({ count: prompts.length }, 'Prompts built');
    return prompts;
  }
}
