/**
 * Error types for mdconf with discriminated unions using _tag property
 * These error types follow the Effect pattern for type-safe error handling
 */

import { Effect, Either } from 'effect';

/**
 * Front matter that is not valid YAML, or not a YAML mapping
 */
export class ParseError extends Error {
  readonly _tag = 'ParseError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * Schema validation errors (front matter keys, render options)
 */
export class ValidationError extends Error {
  readonly _tag = 'ValidationError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * File system operation errors
 */
export class FileSystemError extends Error {
  readonly _tag = 'FileSystemError' as const;
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'FileSystemError';
    this.path = path;
  }
}

/**
 * Union type of all error types for comprehensive error handling
 */
export type RenderError = ParseError | ValidationError | FileSystemError;

export function isRenderError(value: unknown): value is RenderError {
  return value instanceof ParseError || value instanceof ValidationError || value instanceof FileSystemError;
}

/**
 * Run a synchronous Effect, rethrowing its tagged failure as-is
 * Sync wrappers use this so callers catch ParseError etc. rather than a FiberFailure
 */
export function runSyncOrThrow<A, E extends RenderError>(effect: Effect.Effect<A, E>): A {
  const result = Effect.runSync(Effect.either(effect));
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}
