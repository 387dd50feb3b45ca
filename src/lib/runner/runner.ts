/**
 * Runner
 *
 * Owns a request context from construction to teardown. Drain happens on
 * every exit from the handler: success, failure, defect, timeout, abort and
 * interruption of the calling fiber.
 */

import { Cause, Duration, Effect, Exit, Layer, Option } from 'effect';
import { v4 as uuidv4 } from 'uuid';
import {
  BuilderContext,
  type Builder,
  type Built,
} from '../builder/builder-context';
import {
  makeRequestContext,
  RequestContext,
  type Handler,
} from '../context/request-context';
import type { StateShape } from '../context/state-cell';
import {
  CancellationError,
  ConfigError,
  EnvironmentError,
  isEnvironmentError,
  messageOf,
} from '../errors';
import { RuntimeLive } from '../layers/app';
import { ConfigService } from '../services/config';
import { LoggingService } from '../services/logging';
import { makeLifecycle, type TransitionListener } from './lifecycle';
import {
  describe,
  environmentFailure,
  fromExit,
  isFailure,
  type Outcome,
} from './outcome';

// ============= Types =============

/**
 * Produces the environment for one run. Any failure becomes an
 * EnvironmentFailure outcome.
 */
export type EnvironmentBuilder<Env> = Effect.Effect<Env, unknown>;

export interface RunOptions {
  /** Overrides `handler.timeoutMs` from configuration */
  readonly timeout?: Duration.DurationInput;
  readonly signal?: AbortSignal;
  /** Added to every log entry of the run */
  readonly runId?: string;
  readonly onTransition?: TransitionListener;
}

export type RuntimeServices = ConfigService | LoggingService;

// ============= Cancellation =============

const abortedError = (signal: AbortSignal): CancellationError =>
  new CancellationError({
    reason: 'aborted',
    message:
      signal.reason === undefined
        ? 'Handler was aborted'
        : `Handler was aborted: ${messageOf(signal.reason)}`,
  });

const awaitAbort = (
  signal: AbortSignal
): Effect.Effect<never, CancellationError> =>
  Effect.async<never, CancellationError>((resume) => {
    const onAbort = () => resume(Effect.fail(abortedError(signal)));
    signal.addEventListener('abort', onAbort, { once: true });
    return Effect.sync(() => signal.removeEventListener('abort', onAbort));
  });

/**
 * Bound `effect` by an optional timeout and an optional abort signal
 */
const guard = <A, E>(
  effect: Effect.Effect<A, E>,
  timeout: Option.Option<Duration.Duration>,
  signal: AbortSignal | undefined
): Effect.Effect<A, E | CancellationError> => {
  const timed: Effect.Effect<A, E | CancellationError> = Option.match(timeout, {
    onNone: () => effect,
    onSome: (duration) =>
      Effect.timeoutFail(effect, {
        duration,
        onTimeout: () =>
          new CancellationError({
            reason: 'timeout',
            message: `Handler timed out after ${Duration.toMillis(duration)}ms`,
          }),
      }),
  });
  if (signal === undefined) {
    return timed;
  }
  return Effect.suspend(() =>
    signal.aborted
      ? Effect.fail(abortedError(signal))
      : Effect.raceFirst(timed, awaitAbort(signal))
  );
};

const resolveTimeout = (
  options: RunOptions,
  configured: number | undefined
): Option.Option<Duration.Duration> =>
  Option.map(
    Option.fromNullable(options.timeout ?? configured),
    Duration.decode
  );

const toEnvironmentError = (cause: Cause.Cause<unknown>): EnvironmentError => {
  const error = Cause.squash(cause);
  return isEnvironmentError(error)
    ? error
    : new EnvironmentError({
        message: `Environment construction failed: ${messageOf(error)}`,
        cause: error,
      });
};

const runLogger = (options: RunOptions) =>
  Effect.map(LoggingService, (logger) =>
    logger.withContext({ runId: options.runId ?? uuidv4() })
  );

// ============= Execution =============

const execute = <Env, S extends object, A, E>(
  environment: EnvironmentBuilder<Env>,
  body: (context: RequestContext<Env, S>) => Effect.Effect<A, E>,
  options: RunOptions
): Effect.Effect<Outcome<A, E>, never, RuntimeServices> =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const settings = yield* config.getAll();
    const logger = yield* runLogger(options);
    const lifecycle = yield* makeLifecycle(logger, options.onTransition);

    yield* logger.debug('Run started');

    const built = yield* Effect.exit(environment);
    if (Exit.isFailure(built)) {
      const error = toEnvironmentError(built.cause);
      yield* lifecycle.advance('Failed');
      yield* logger.error('Environment construction failed', error);
      return environmentFailure(error);
    }

    const { context, teardown } = yield* makeRequestContext<Env, S>(
      built.value,
      { actionTimeout: settings.cleanup.actionTimeoutMs }
    );
    const timeout = resolveTimeout(options, settings.handler.timeoutMs);

    return yield* Effect.uninterruptibleMask((restore) =>
      Effect.gen(function* () {
        yield* lifecycle.advance('Running');

        const exit = yield* Effect.exit(
          restore(
            guard(
              Effect.suspend(() => body(context)),
              timeout,
              options.signal
            )
          )
        );

        // Drain is owned here and runs exactly once
        const cleanupFailures = yield* Effect.orDie(teardown);
        yield* Effect.forEach(
          cleanupFailures,
          (entry) =>
            logger.warn('Cleanup action failed', {
              label: entry.label,
              message: entry.message,
            }),
          { discard: true }
        );

        const outcome = fromExit<A, E>(exit, cleanupFailures);
        if (isFailure(outcome)) {
          yield* lifecycle.advance('Failed');
          yield* logger.error('Run failed', Cause.squash(outcome.cause), {
            kind: outcome.kind,
          });
        } else {
          yield* lifecycle.advance('Completed');
        }
        yield* logger.debug('Run finished', { outcome: describe(outcome) });
        return outcome;
      })
    );
  });

// ============= Entry Points =============

/**
 * Build an environment, run `handler` in a fresh context and tear it down.
 */
export const run = <Env, A, E, S extends object = StateShape>(
  environment: EnvironmentBuilder<Env>,
  handler: Handler<Env, S, A, E>,
  options: RunOptions = {}
): Effect.Effect<Outcome<A, E>, never, RuntimeServices> =>
  execute<Env, S, A, E>(environment, handler, options);

/**
 * Run a builder. Given an environment builder this is `run` with output
 * accumulation. Given an existing context the builder runs over it and the
 * context's owner keeps the teardown, so the outcome carries no cleanup
 * failures.
 */
export const runBuilder = <
  Env,
  A,
  E,
  S extends object = StateShape,
  F = string,
  M = unknown,
>(
  source: EnvironmentBuilder<Env> | RequestContext<Env, S>,
  builder: Builder<Env, S, F, M, A, E>,
  options: RunOptions = {}
): Effect.Effect<Outcome<Built<A, F, M>, E>, never, RuntimeServices> => {
  if (!(source instanceof RequestContext)) {
    return execute<Env, S, Built<A, F, M>, E>(
      source,
      (context) => BuilderContext.build(context, builder),
      options
    );
  }

  return Effect.gen(function* () {
    const config = yield* ConfigService;
    const handlerSettings = yield* config.get('handler');
    const logger = yield* runLogger(options);

    yield* logger.debug('Builder started over an existing context');
    const exit = yield* Effect.exit(
      guard(
        BuilderContext.build(source, builder),
        resolveTimeout(options, handlerSettings.timeoutMs),
        options.signal
      )
    );
    const outcome = fromExit<Built<A, F, M>, E>(exit, []);
    yield* logger.debug('Builder finished', { outcome: describe(outcome) });
    return outcome;
  });
};

/**
 * Run a runner effect with the live services (or `layer`) and resolve to
 * its Outcome. Rejects only when the layer itself cannot be built.
 */
export const runToPromise = <A, E>(
  program: Effect.Effect<Outcome<A, E>, never, RuntimeServices>,
  layer: Layer.Layer<RuntimeServices, ConfigError> = RuntimeLive
): Promise<Outcome<A, E>> => Effect.runPromise(Effect.provide(program, layer));
