/**
 * Outcome - the caller-visible result of a run.
 *
 * Cleanup failures ride along on both variants: a run can succeed while
 * some of its finalizers fail, and a failed run still reports them.
 */

import { Cause, Data, Exit, Option } from 'effect';
import type { CleanupFailure } from '../context/cleanup-registry';
import {
  CancellationError,
  isCancellationError,
  messageOf,
  type EnvironmentError,
} from '../errors';

export type FailureKind =
  | 'HandlerFailure'
  | 'CancellationFailure'
  | 'EnvironmentFailure';

export interface Success<A> {
  readonly _tag: 'Success';
  readonly value: A;
  readonly cleanupFailures: ReadonlyArray<CleanupFailure>;
}

export interface Failure<E> {
  readonly _tag: 'Failure';
  readonly kind: FailureKind;
  readonly message: string;
  readonly cause: Cause.Cause<E | CancellationError | EnvironmentError>;
  readonly cleanupFailures: ReadonlyArray<CleanupFailure>;
}

export type Outcome<A, E = unknown> = Success<A> | Failure<E>;

// ============= Constructors =============

export const success = <A>(
  value: A,
  cleanupFailures: ReadonlyArray<CleanupFailure> = []
): Success<A> =>
  Data.struct({ _tag: 'Success' as const, value, cleanupFailures });

export const failure = <E>(
  kind: FailureKind,
  message: string,
  cause: Cause.Cause<E | CancellationError | EnvironmentError>,
  cleanupFailures: ReadonlyArray<CleanupFailure> = []
): Failure<E> =>
  Data.struct({
    _tag: 'Failure' as const,
    kind,
    message,
    cause,
    cleanupFailures,
  });

export const environmentFailure = (error: EnvironmentError): Failure<never> =>
  failure<never>('EnvironmentFailure', error.message, Cause.fail(error));

const interruptedError = new CancellationError({
  reason: 'interrupted',
  message: 'Handler was interrupted',
});

/**
 * Convert a handler's exit and the drain result into an Outcome
 */
export const fromExit = <A, E>(
  exit: Exit.Exit<A, E | CancellationError>,
  cleanupFailures: ReadonlyArray<CleanupFailure>
): Outcome<A, E> =>
  Exit.match(exit, {
    onSuccess: (value): Outcome<A, E> => success(value, cleanupFailures),
    onFailure: (cause): Outcome<A, E> => {
      const primary = Cause.failureOption(cause);
      if (Option.isSome(primary) && isCancellationError(primary.value)) {
        return failure(
          'CancellationFailure',
          primary.value.message,
          cause,
          cleanupFailures
        );
      }
      // Interruption with no typed failure is a cancellation, even when a
      // finalizer of the interrupted handler died along the way.
      if (Option.isNone(primary) && Cause.isInterrupted(cause)) {
        return failure(
          'CancellationFailure',
          interruptedError.message,
          Cause.sequential(cause, Cause.fail(interruptedError)),
          cleanupFailures
        );
      }
      return failure(
        'HandlerFailure',
        messageOf(Cause.squash(cause)),
        cause,
        cleanupFailures
      );
    },
  });

// ============= Guards & Matching =============

export const isSuccess = <A, E>(outcome: Outcome<A, E>): outcome is Success<A> =>
  outcome._tag === 'Success';

export const isFailure = <A, E>(outcome: Outcome<A, E>): outcome is Failure<E> =>
  outcome._tag === 'Failure';

export const match = <A, E, B, C = B>(
  outcome: Outcome<A, E>,
  cases: {
    readonly onSuccess: (success: Success<A>) => B;
    readonly onFailure: (failure: Failure<E>) => C;
  }
): B | C =>
  outcome._tag === 'Success'
    ? cases.onSuccess(outcome)
    : cases.onFailure(outcome);

/**
 * The primary failure value, when the run failed with one
 */
export const failureValue = <A, E>(
  outcome: Outcome<A, E>
): Option.Option<E | CancellationError | EnvironmentError> =>
  isFailure(outcome) ? Cause.failureOption(outcome.cause) : Option.none();

/**
 * One-line summary, e.g. for a transport's access log
 */
export const describe = <A, E>(outcome: Outcome<A, E>): string => {
  const head =
    outcome._tag === 'Success'
      ? 'Success'
      : `${outcome.kind}: ${outcome.message}`;
  if (outcome.cleanupFailures.length === 0) {
    return head;
  }
  const details = outcome.cleanupFailures
    .map((entry) => `${entry.label} (${entry.message})`)
    .join(', ');
  return `${head}; cleanup failures: ${details}`;
};
