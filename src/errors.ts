/**
 * Error taxonomy for the story pipeline.
 *
 * The orchestrator is the only place that decides retry vs. fail; it does so
 * by `kind` and `retryable`, never by parsing messages.
 */

import type { Contradiction } from './types/project.js';

export type ErrorKind =
  | 'ConfigurationError'
  | 'AuthError'
  | 'RateLimitError'
  | 'TransientError'
  | 'ContentPolicyError'
  | 'ExtractionError'
  | 'GenerationCancelled'
  | 'ProjectNotFound'
  | 'StoreIOError'
  | 'PipelineBusy'
  | 'InvalidTransition'
  | 'ContradictionBlocked';

export abstract class StoryPipelineError extends Error {
  abstract readonly kind: ErrorKind;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad provider id, missing model, empty prompt, budget too small. */
export class ConfigurationError extends StoryPipelineError {
  readonly kind = 'ConfigurationError' as const;
}

export class AuthError extends StoryPipelineError {
  readonly kind = 'AuthError' as const;
}

export class RateLimitError extends StoryPipelineError {
  readonly kind = 'RateLimitError' as const;
  override readonly retryable = true;

  constructor(message: string, readonly retryAfterMs?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Timeouts, connection resets, 5xx, empty completions. */
export class TransientError extends StoryPipelineError {
  readonly kind = 'TransientError' as const;
  override readonly retryable = true;
}

export class ContentPolicyError extends StoryPipelineError {
  readonly kind = 'ContentPolicyError' as const;
}

/** Never leaves the knowledge store: extraction degrades to an empty fact set. */
export class ExtractionError extends StoryPipelineError {
  readonly kind = 'ExtractionError' as const;
}

export class GenerationCancelledError extends StoryPipelineError {
  readonly kind = 'GenerationCancelled' as const;

  constructor(message = 'Generation cancelled') {
    super(message);
  }
}

export class ProjectNotFoundError extends StoryPipelineError {
  readonly kind = 'ProjectNotFound' as const;

  constructor(readonly projectId: string) {
    super(`Project not found: ${projectId}`);
  }
}

export class StoreIOError extends StoryPipelineError {
  readonly kind = 'StoreIOError' as const;
}

export class PipelineBusyError extends StoryPipelineError {
  readonly kind = 'PipelineBusy' as const;

  constructor(readonly projectId: string) {
    super(`Project ${projectId} already has a stage in flight`);
  }
}

export class InvalidTransitionError extends StoryPipelineError {
  readonly kind = 'InvalidTransition' as const;
}

/** A stage's facts contradict committed knowledge at or above the blocking severity. */
export class ContradictionBlockedError extends StoryPipelineError {
  readonly kind = 'ContradictionBlocked' as const;

  constructor(readonly contradictions: Contradiction[]) {
    super(
      `${contradictions.length} blocking contradiction${contradictions.length === 1 ? '' : 's'}: ` +
        contradictions.map((contradiction) => contradiction.description).join('; ')
    );
  }
}

/**
 * Errors a provider adapter may raise. Anything else escaping an adapter is a bug.
 */
export type GenerationError =
  | ConfigurationError
  | AuthError
  | RateLimitError
  | TransientError
  | ContentPolicyError;

export function isGenerationError(error: unknown): error is GenerationError {
  return (
    error instanceof ConfigurationError ||
    error instanceof AuthError ||
    error instanceof RateLimitError ||
    error instanceof TransientError ||
    error instanceof ContentPolicyError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
