/**
 * CleanupRegistry - ordered finalizers drained exactly once at context teardown.
 *
 * Actions run in reverse registration order so that releases mirror
 * acquisitions. A failing action never stops the ones after it; every failure
 * comes back from `drain` as a CleanupFailure.
 */

import {
  Brand,
  Cause,
  Data,
  Duration,
  Effect,
  Either,
  Exit,
  Option,
  Ref,
} from 'effect';
import {
  CleanupRegistryError,
  CleanupTimeoutError,
  messageOf,
} from '../errors';

// ============= Types =============

export type CleanupToken = number & Brand.Brand<'CleanupToken'>;

export const CleanupToken = Brand.nominal<CleanupToken>();

/**
 * A finalizer. It may fail; the failure is collected, not propagated.
 */
export type CleanupAction = Effect.Effect<void, unknown>;

export interface RegisterOptions {
  readonly label?: string;
}

/**
 * A cleanup action that failed, timed out or died during drain
 */
export class CleanupFailure extends Data.TaggedClass('CleanupFailure')<{
  readonly token: CleanupToken;
  readonly label: string;
  readonly message: string;
  readonly cause: Cause.Cause<unknown>;
}> {}

export interface CleanupRegistry {
  /**
   * Append an action. Rejected once drain has begun.
   */
  register(
    action: CleanupAction,
    options?: RegisterOptions
  ): Effect.Effect<CleanupToken, CleanupRegistryError>;

  /**
   * Remove a pending action. False once drain has begun, or when the token
   * is unknown or was already cancelled.
   */
  cancel(token: CleanupToken): Effect.Effect<boolean>;

  readonly pending: Effect.Effect<number>;
}

/**
 * The registry as its owner sees it: the only view that can drain.
 */
export interface OwnedCleanupRegistry extends CleanupRegistry {
  /**
   * Run every pending action, newest first. Only the first call drains;
   * later calls fail.
   */
  readonly drain: Effect.Effect<
    ReadonlyArray<CleanupFailure>,
    CleanupRegistryError
  >;
}

export interface CleanupRegistryOptions {
  /**
   * Upper bound for a single action. Unbounded when absent.
   */
  readonly actionTimeout?: Duration.DurationInput;
}

interface PendingAction {
  readonly token: CleanupToken;
  readonly label: string;
  readonly action: CleanupAction;
}

type Phase = 'open' | 'draining' | 'drained';

interface RegistryState {
  readonly phase: Phase;
  readonly nextId: number;
  readonly actions: ReadonlyArray<PendingAction>;
}

// ============= Implementation =============

const closedError = (phase: Exclude<Phase, 'open'>): CleanupRegistryError =>
  new CleanupRegistryError({
    reason: phase,
    message:
      phase === 'draining'
        ? 'Cannot use the cleanup registry while it is draining'
        : 'Cleanup registry has already been drained',
  });

const runAction = (
  entry: PendingAction,
  timeout: Option.Option<Duration.Duration>
): CleanupAction =>
  Option.match(timeout, {
    onNone: () => entry.action,
    onSome: (duration) =>
      Effect.interruptible(entry.action).pipe(
        Effect.timeoutFail({
          duration,
          onTimeout: () =>
            new CleanupTimeoutError({
              label: entry.label,
              timeoutMs: Duration.toMillis(duration),
              message: `Cleanup action "${entry.label}" timed out after ${Duration.toMillis(duration)}ms`,
            }),
        })
      ),
  });

export const makeCleanupRegistry = (
  options: CleanupRegistryOptions = {}
): Effect.Effect<OwnedCleanupRegistry> =>
  Effect.gen(function* () {
    const ref = yield* Ref.make<RegistryState>({
      phase: 'open',
      nextId: 1,
      actions: [],
    });
    const timeout = Option.map(
      Option.fromNullable(options.actionTimeout),
      Duration.decode
    );

    const register = (action: CleanupAction, registerOptions?: RegisterOptions) =>
      Effect.gen(function* () {
        const result = yield* Ref.modify(
          ref,
          (
            state
          ): readonly [
            Either.Either<CleanupToken, CleanupRegistryError>,
            RegistryState,
          ] => {
            if (state.phase !== 'open') {
              return [Either.left(closedError(state.phase)), state];
            }
            const token = CleanupToken(state.nextId);
            const entry: PendingAction = {
              token,
              label: registerOptions?.label ?? `cleanup#${state.nextId}`,
              action,
            };
            return [
              Either.right(token),
              {
                ...state,
                nextId: state.nextId + 1,
                actions: [...state.actions, entry],
              },
            ];
          }
        );
        if (Either.isLeft(result)) {
          return yield* Effect.fail(result.left);
        }
        return result.right;
      });

    const cancel = (token: CleanupToken) =>
      Ref.modify(ref, (state): readonly [boolean, RegistryState] => {
        if (state.phase !== 'open') {
          return [false, state];
        }
        const remaining = state.actions.filter((entry) => entry.token !== token);
        if (remaining.length === state.actions.length) {
          return [false, state];
        }
        return [true, { ...state, actions: remaining }];
      });

    const drain = Effect.uninterruptible(
      Effect.gen(function* () {
        const claimed = yield* Ref.modify(
          ref,
          (
            state
          ): readonly [
            Either.Either<ReadonlyArray<PendingAction>, CleanupRegistryError>,
            RegistryState,
          ] =>
            state.phase === 'open'
              ? [
                  Either.right(state.actions),
                  { ...state, phase: 'draining', actions: [] },
                ]
              : [Either.left(closedError(state.phase)), state]
        );
        if (Either.isLeft(claimed)) {
          return yield* Effect.fail(claimed.left);
        }

        const failures: CleanupFailure[] = [];
        for (const entry of [...claimed.right].reverse()) {
          const exit = yield* Effect.exit(runAction(entry, timeout));
          if (Exit.isFailure(exit)) {
            failures.push(
              new CleanupFailure({
                token: entry.token,
                label: entry.label,
                message: messageOf(Cause.squash(exit.cause)),
                cause: exit.cause,
              })
            );
          }
        }

        yield* Ref.update(ref, (state): RegistryState => ({ ...state, phase: 'drained' }));
        return failures;
      })
    );

    return {
      register,
      cancel,
      drain,
      pending: Effect.map(Ref.get(ref), (state) => state.actions.length),
    };
  });

/**
 * Acquire a resource and register its release as one uninterruptible step.
 * When the registry no longer accepts actions the resource is released
 * straight away and the registry error is returned.
 */
export const acquireRelease = <A, E, R>(
  registry: CleanupRegistry,
  acquire: Effect.Effect<A, E, R>,
  release: (resource: A) => CleanupAction,
  options?: RegisterOptions
): Effect.Effect<A, E | CleanupRegistryError, R> =>
  Effect.uninterruptible(
    Effect.gen(function* () {
      const resource = yield* acquire;
      const registered = yield* Effect.either(
        registry.register(release(resource), options)
      );
      if (Either.isLeft(registered)) {
        yield* Effect.ignoreLogged(release(resource));
        return yield* Effect.fail(registered.left);
      }
      return resource;
    })
  );
