/**
 * Error hierarchy for the request-scope runtime using Effect's Data.TaggedError.
 * Every error carries a human-readable `message`.
 */

import { Data } from 'effect';

// Configuration errors
export class ConfigError extends Data.TaggedError('ConfigError')<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

// Raised when the inbound request cannot be turned into an Environment
export class EnvironmentError extends Data.TaggedError('EnvironmentError')<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

// Registry used after its drain started
export class CleanupRegistryError extends Data.TaggedError(
  'CleanupRegistryError'
)<{
  readonly message: string;
  readonly reason: 'draining' | 'drained';
}> {}

// A single cleanup action exceeded the configured timeout
export class CleanupTimeoutError extends Data.TaggedError('CleanupTimeoutError')<{
  readonly message: string;
  readonly label: string;
  readonly timeoutMs: number;
}> {}

// Externally triggered cancellation of a running handler
export class CancellationError extends Data.TaggedError('CancellationError')<{
  readonly message: string;
  readonly reason: 'timeout' | 'aborted' | 'interrupted';
}> {}

// Output accumulator written to after its builder finished
export class AccumulatorSealedError extends Data.TaggedError(
  'AccumulatorSealedError'
)<{
  readonly message: string;
  readonly operation: 'append' | 'merge';
}> {}

// Runner lifecycle moved along an edge the state machine does not have
export class IllegalTransitionError extends Data.TaggedError(
  'IllegalTransitionError'
)<{
  readonly message: string;
  readonly from: string;
  readonly to: string;
}> {}

/**
 * Union of every error the runtime itself produces
 */
export type RuntimeError =
  | ConfigError
  | EnvironmentError
  | CleanupRegistryError
  | CleanupTimeoutError
  | CancellationError
  | AccumulatorSealedError
  | IllegalTransitionError;

// ============= Type Guards =============

export const isCancellationError = (
  error: unknown
): error is CancellationError => error instanceof CancellationError;

export const isEnvironmentError = (error: unknown): error is EnvironmentError =>
  error instanceof EnvironmentError;

// ============= Message Extraction =============

/**
 * Best-effort human-readable message for an arbitrary failure value.
 */
export const messageOf = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message.length > 0 ? error.message : error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return error.message;
  }
  return String(error);
};
