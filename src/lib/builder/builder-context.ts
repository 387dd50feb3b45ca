/**
 * BuilderContext
 *
 * A request context extended with an output accumulator. It holds a
 * reference to the wrapped context rather than a copy: state writes and
 * cleanup registrations made through a builder are the wrapped context's own.
 * Because it satisfies `HandlerCapabilities`, any handler-level collaborator
 * can be called with a builder directly; `runAsHandler` is the explicit form.
 */

import { Effect } from 'effect';
import type { Concurrency } from 'effect/Types';
import type { CleanupRegistry } from '../context/cleanup-registry';
import type {
  Handler,
  HandlerCapabilities,
} from '../context/request-context';
import type { StateCell, StateShape } from '../context/state-cell';
import {
  makeOutputAccumulator,
  type BuilderOutput,
  type OutputAccumulator,
} from './output-accumulator';

/**
 * Output-producing unit of work
 */
export type Builder<Env, S extends object, F, M, A, E> = (
  builder: BuilderContext<Env, S, F, M>
) => Effect.Effect<A, E>;

/**
 * Result of a completed builder
 */
export interface Built<A, F, M> {
  readonly value: A;
  readonly output: BuilderOutput<F, M>;
}

export class BuilderContext<
  Env,
  S extends object = StateShape,
  F = string,
  M = unknown,
> implements HandlerCapabilities<Env, S>
{
  private constructor(
    private readonly context: HandlerCapabilities<Env, S>,
    private readonly accumulator: OutputAccumulator<F, M>
  ) {}

  /**
   * Run `builder` over `context` with a fresh accumulator. The accumulator
   * is sealed when the builder ends, whether it succeeded or not.
   */
  static build<Env, S extends object, A, E, F = string, M = unknown>(
    context: HandlerCapabilities<Env, S>,
    builder: Builder<Env, S, F, M, A, E>
  ): Effect.Effect<Built<A, F, M>, E> {
    return Effect.gen(function* () {
      const accumulator = yield* makeOutputAccumulator<F, M>();
      const value = yield* Effect.suspend(() =>
        builder(new BuilderContext(context, accumulator))
      ).pipe(Effect.ensuring(accumulator.seal));
      const output = yield* accumulator.seal;
      return { value, output };
    });
  }

  get environment(): Env {
    return this.context.environment;
  }

  get state(): StateCell<S> {
    return this.context.state;
  }

  get cleanup(): CleanupRegistry {
    return this.context.cleanup;
  }

  append(fragment: F): Effect.Effect<void> {
    return this.accumulator.append(fragment);
  }

  appendAll(fragments: Iterable<F>): Effect.Effect<void> {
    return this.accumulator.appendAll(fragments);
  }

  mergeMetadata(entry: M): Effect.Effect<void> {
    return Effect.asVoid(this.accumulator.mergeMetadata(entry));
  }

  mergeOutput(output: BuilderOutput<F, M>): Effect.Effect<void> {
    return this.accumulator.mergeOutput(output);
  }

  /**
   * Output accumulated so far
   */
  get snapshot(): Effect.Effect<BuilderOutput<F, M>> {
    return this.accumulator.snapshot;
  }

  /**
   * Run a plain handler against the wrapped context.
   */
  runAsHandler<A, E>(closure: Handler<Env, S, A, E>): Effect.Effect<A, E> {
    return Effect.suspend(() => closure(this.context));
  }

  /**
   * Run a nested builder over the same context. Its output is returned, not
   * merged; pass it to `mergeOutput` to keep it.
   */
  runBuilder<A, E>(
    nested: Builder<Env, S, F, M, A, E>
  ): Effect.Effect<readonly [A, BuilderOutput<F, M>], E> {
    return Effect.map(
      BuilderContext.build(this.context, nested),
      ({ value, output }) => [value, output] as const
    );
  }

  /**
   * Run several nested builders, results in declaration order.
   */
  runBuilders<A, E>(
    builders: Iterable<Builder<Env, S, F, M, A, E>>,
    options: { readonly concurrency?: Concurrency } = {}
  ): Effect.Effect<ReadonlyArray<Built<A, F, M>>, E> {
    return Effect.forEach(
      builders,
      (nested) => BuilderContext.build(this.context, nested),
      { concurrency: options.concurrency ?? 1 }
    );
  }
}
