/**
 * Run lifecycle state machine.
 *
 *   Created -> Running -> Completed
 *                      -> Failed
 *   Created -> Failed            (environment could not be built)
 */

import { Effect, Either, Ref } from 'effect';
import { IllegalTransitionError, messageOf } from '../errors';
import type { LoggingService } from '../services/logging';

export type RunPhase = 'Created' | 'Running' | 'Completed' | 'Failed';

export type TransitionListener = (from: RunPhase, to: RunPhase) => void;

const transitions: { readonly [P in RunPhase]: ReadonlyArray<RunPhase> } = {
  Created: ['Running', 'Failed'],
  Running: ['Completed', 'Failed'],
  Completed: [],
  Failed: [],
};

export const canTransition = (from: RunPhase, to: RunPhase): boolean =>
  transitions[from].includes(to);

export const isTerminal = (phase: RunPhase): boolean =>
  transitions[phase].length === 0;

export interface Lifecycle {
  readonly current: Effect.Effect<RunPhase>;
  /**
   * Move to `to`. An edge the machine does not have is a defect.
   */
  advance(to: RunPhase): Effect.Effect<void>;
}

export const makeLifecycle = (
  logger: LoggingService,
  onTransition?: TransitionListener
): Effect.Effect<Lifecycle> =>
  Effect.map(Ref.make<RunPhase>('Created'), (ref): Lifecycle => ({
    current: Ref.get(ref),

    advance: (to) =>
      Effect.gen(function* () {
        const moved = yield* Ref.modify(
          ref,
          (from): readonly [Either.Either<RunPhase, RunPhase>, RunPhase] =>
            canTransition(from, to)
              ? [Either.right(from), to]
              : [Either.left(from), from]
        );
        if (Either.isLeft(moved)) {
          return yield* Effect.die(
            new IllegalTransitionError({
              from: moved.left,
              to,
              message: `Illegal run transition ${moved.left} -> ${to}`,
            })
          );
        }

        const from = moved.right;
        yield* logger.debug(`Run ${from} -> ${to}`, { from, to });
        if (onTransition !== undefined) {
          yield* Effect.try({
            try: () => onTransition(from, to),
            catch: (error) => error,
          }).pipe(
            Effect.catchAll((error) =>
              logger.warn('Transition listener failed', {
                from,
                to,
                error: messageOf(error),
              })
            )
          );
        }
      }),
  }));
