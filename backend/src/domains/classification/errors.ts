/**
 * Classification Errors
 *
 * Every failure the pipeline reports on its own is a `ClassificationError`
 * with a stable `code`. Anything else (a provider HTTP failure, for one)
 * propagates untouched.
 *
 * @module domains/classification/errors
 */

import { ErrorCode, type ImageInputSource } from '@zeroshot/shared';

export type ClassificationErrorCode =
  | ErrorCode.IMAGE_DECODE_FAILED
  | ErrorCode.CONFIGURATION_ERROR
  | ErrorCode.NUMERIC_ERROR;

export abstract class ClassificationError extends Error {
  abstract readonly code: ClassificationErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ClassificationError';
  }
}

/**
 * The image input could not be turned into pixels.
 * `variant` names the branch of the resolver that was attempted.
 */
export class DecodeError extends ClassificationError {
  readonly code = ErrorCode.IMAGE_DECODE_FAILED;

  constructor(
    readonly variant: ImageInputSource,
    message: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'DecodeError';
  }
}

/**
 * Empty label set, unsupported model id or unusable prompt template
 */
export class ConfigurationError extends ClassificationError {
  readonly code = ErrorCode.CONFIGURATION_ERROR;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Embeddings that cannot be scored: zero or non-finite vectors, mismatched
 * dimensions or counts
 */
export class NumericError extends ClassificationError {
  readonly code = ErrorCode.NUMERIC_ERROR;

  constructor(message: string) {
    super(message);
    this.name = 'NumericError';
  }
}

export function isClassificationError(error: unknown): error is ClassificationError {
  return error instanceof ClassificationError;
}
