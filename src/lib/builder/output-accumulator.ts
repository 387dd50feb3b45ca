/**
 * Output accumulator for builders: an ordered fragment sequence plus a
 * deduplicated metadata set, held in one Ref.
 *
 * Metadata entries collapse under Effect's `Equal`, so `Data` values (such as
 * assets) merge structurally while other objects merge by reference. The
 * first occurrence fixes an entry's position in the output.
 */

import { Chunk, Effect, Either, HashSet, Option, Ref } from 'effect';
import { AccumulatorSealedError } from '../errors';

// ============= Types =============

/**
 * Finalized output of a builder
 */
export interface BuilderOutput<F, M> {
  readonly fragments: ReadonlyArray<F>;
  readonly metadata: ReadonlyArray<M>;
}

export const emptyOutput = <F, M>(): BuilderOutput<F, M> =>
  Object.freeze({ fragments: Object.freeze([]), metadata: Object.freeze([]) });

export interface OutputAccumulator<F, M> {
  append(fragment: F): Effect.Effect<void>;
  appendAll(fragments: Iterable<F>): Effect.Effect<void>;
  /**
   * Insert a metadata entry; true when it was not present yet.
   */
  mergeMetadata(entry: M): Effect.Effect<boolean>;
  /**
   * Append another output's fragments and merge its metadata.
   */
  mergeOutput(output: BuilderOutput<F, M>): Effect.Effect<void>;
  readonly snapshot: Effect.Effect<BuilderOutput<F, M>>;
  /**
   * Finalize. Idempotent; later writes are defects.
   */
  readonly seal: Effect.Effect<BuilderOutput<F, M>>;
  readonly isSealed: Effect.Effect<boolean>;
}

interface AccumulatorState<F, M> {
  readonly fragments: Chunk.Chunk<F>;
  readonly metadata: Chunk.Chunk<M>;
  readonly seen: HashSet.HashSet<M>;
  readonly sealed: Option.Option<BuilderOutput<F, M>>;
}

// ============= Implementation =============

const addMetadata = <F, M>(
  state: AccumulatorState<F, M>,
  entry: M
): readonly [boolean, AccumulatorState<F, M>] =>
  HashSet.has(state.seen, entry)
    ? [false, state]
    : [
        true,
        {
          ...state,
          metadata: Chunk.append(state.metadata, entry),
          seen: HashSet.add(state.seen, entry),
        },
      ];

const freeze = <F, M>(state: AccumulatorState<F, M>): BuilderOutput<F, M> =>
  Object.freeze({
    fragments: Object.freeze(Array.from(state.fragments)),
    metadata: Object.freeze(Array.from(state.metadata)),
  });

export const makeOutputAccumulator = <F, M>(): Effect.Effect<
  OutputAccumulator<F, M>
> =>
  Effect.gen(function* () {
    const ref = yield* Ref.make<AccumulatorState<F, M>>({
      fragments: Chunk.empty(),
      metadata: Chunk.empty(),
      seen: HashSet.empty(),
      sealed: Option.none(),
    });

    const write = <B>(
      operation: 'append' | 'merge',
      f: (state: AccumulatorState<F, M>) => readonly [B, AccumulatorState<F, M>]
    ): Effect.Effect<B> =>
      Effect.flatMap(
        Ref.modify(
          ref,
          (
            state
          ): readonly [
            Either.Either<B, AccumulatorSealedError>,
            AccumulatorState<F, M>,
          ] => {
            if (Option.isSome(state.sealed)) {
              return [
                Either.left(
                  new AccumulatorSealedError({
                    operation,
                    message: `Cannot ${operation} output after the builder has completed`,
                  })
                ),
                state,
              ];
            }
            const [result, next] = f(state);
            return [Either.right(result), next];
          }
        ),
        (result) =>
          Either.match(result, {
            onLeft: (error) => Effect.die(error),
            onRight: (value) => Effect.succeed(value),
          })
      );

    const accumulator: OutputAccumulator<F, M> = {
      append: (fragment) =>
        write('append', (state) => [
          undefined,
          { ...state, fragments: Chunk.append(state.fragments, fragment) },
        ]),

      appendAll: (fragments) =>
        write('append', (state) => [
          undefined,
          {
            ...state,
            fragments: Chunk.appendAll(
              state.fragments,
              Chunk.fromIterable(fragments)
            ),
          },
        ]),

      mergeMetadata: (entry) => write('merge', (state) => addMetadata(state, entry)),

      mergeOutput: (output) =>
        write('merge', (state) => {
          let next: AccumulatorState<F, M> = {
            ...state,
            fragments: Chunk.appendAll(
              state.fragments,
              Chunk.fromIterable(output.fragments)
            ),
          };
          for (const entry of output.metadata) {
            next = addMetadata(next, entry)[1];
          }
          return [undefined, next];
        }),

      snapshot: Effect.map(Ref.get(ref), (state) =>
        Option.getOrElse(state.sealed, () => freeze(state))
      ),

      seal: Ref.modify(ref, (state) =>
        Option.match(state.sealed, {
          onSome: (output) => [output, state] as const,
          onNone: () => {
            const output = freeze(state);
            return [output, { ...state, sealed: Option.some(output) }] as const;
          },
        })
      ),

      isSealed: Effect.map(Ref.get(ref), (state) => Option.isSome(state.sealed)),
    };
    return accumulator;
  });
