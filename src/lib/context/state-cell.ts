/**
 * StateCell - the single mutable slot owned by a request context.
 *
 * Backed by one Ref, so every operation (including `modify`) is a single
 * atomic step. Writes are never rolled back: a handler that fails after a
 * `write` leaves the written value in place until teardown.
 */

import { Effect, Option, Ref } from 'effect';

/**
 * Default state shape: string keys to opaque values
 */
export type StateShape = Record<string, unknown>;

export type StateKey<S extends object> = Extract<keyof S, string>;

interface Entry<V> {
  readonly value: V;
}

type Entries<S extends object> = {
  readonly [K in keyof S]?: Entry<S[K]>;
};

export interface StateCell<S extends object = StateShape> {
  /**
   * Current value for `key`, or none.
   */
  read<K extends StateKey<S>>(key: K): Effect.Effect<Option.Option<S[K]>>;

  /**
   * Replace the value for `key`.
   */
  write<K extends StateKey<S>>(key: K, value: S[K]): Effect.Effect<void>;

  /**
   * Atomic read-modify-write. Returns the value that was stored.
   */
  modify<K extends StateKey<S>>(
    key: K,
    f: (current: Option.Option<S[K]>) => S[K]
  ): Effect.Effect<S[K]>;

  /**
   * Drop `key`; true when it was present.
   */
  remove<K extends StateKey<S>>(key: K): Effect.Effect<boolean>;

  /**
   * Frozen copy of every present entry
   */
  readonly snapshot: Effect.Effect<Readonly<Record<string, unknown>>>;
}

// Only own entries count; keys such as `constructor` or `__proto__` are
// ordinary state keys here.
const lookup = <S extends object, K extends StateKey<S>>(
  entries: Entries<S>,
  key: K
): Option.Option<S[K]> =>
  Object.hasOwn(entries, key)
    ? Option.map(Option.fromNullable(entries[key]), (entry) => entry.value)
    : Option.none();

export const makeStateCell = <S extends object = StateShape>(): Effect.Effect<
  StateCell<S>
> =>
  Effect.map(Ref.make<Entries<S>>({}), (ref): StateCell<S> => ({
    read: (key) => Effect.map(Ref.get(ref), (entries) => lookup(entries, key)),

    write: (key, value) =>
      Ref.update(ref, (entries) => ({ ...entries, [key]: { value } })),

    modify: (key, f) =>
      Ref.modify(ref, (entries) => {
        const next = f(lookup(entries, key));
        return [next, { ...entries, [key]: { value: next } }];
      }),

    remove: (key) =>
      Ref.modify(ref, (entries) => {
        if (Option.isNone(lookup(entries, key))) {
          return [false, entries];
        }
        return [true, { ...entries, [key]: undefined }];
      }),

    snapshot: Effect.map(Ref.get(ref), (entries) => {
      const present: Array<[string, unknown]> = [];
      for (const key in entries) {
        const entry = lookup(entries, key);
        if (Option.isSome(entry)) {
          present.push([key, entry.value]);
        }
      }
      return Object.freeze(Object.fromEntries(present));
    }),
  }));
