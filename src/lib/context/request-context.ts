/**
 * Request Context
 *
 * One flat structure holding the three per-request capabilities. Handlers and
 * collaborators are written against `HandlerCapabilities`, which both
 * `RequestContext` and `BuilderContext` satisfy, so the same function works
 * inside a plain handler and inside a builder.
 */

import { Effect } from 'effect';
import {
  acquireRelease,
  makeCleanupRegistry,
  type CleanupAction,
  type CleanupFailure,
  type CleanupRegistry,
  type CleanupRegistryOptions,
  type RegisterOptions,
} from './cleanup-registry';
import { makeStateCell, type StateCell, type StateShape } from './state-cell';
import type { CleanupRegistryError } from '../errors';

// ============= Capability Interface =============

export interface HandlerCapabilities<Env, S extends object = StateShape> {
  /** Same value for the whole request */
  readonly environment: Env;
  readonly state: StateCell<S>;
  readonly cleanup: CleanupRegistry;
}

/**
 * A unit of work run against a request's capabilities
 */
export type Handler<Env, S extends object, A, E> = (
  context: HandlerCapabilities<Env, S>
) => Effect.Effect<A, E>;

// ============= Request Context =============

export class RequestContext<Env, S extends object = StateShape>
  implements HandlerCapabilities<Env, S>
{
  readonly _tag = 'RequestContext' as const;

  constructor(
    readonly environment: Env,
    readonly state: StateCell<S>,
    readonly cleanup: CleanupRegistry
  ) {}
}

export const isRequestContext = (
  value: unknown
): value is RequestContext<unknown, object> => value instanceof RequestContext;

/**
 * A freshly built context together with the means to tear it down
 */
export interface ContextHandle<Env, S extends object> {
  readonly context: RequestContext<Env, S>;
  /** Drains the context's cleanup registry; valid once */
  readonly teardown: Effect.Effect<
    ReadonlyArray<CleanupFailure>,
    CleanupRegistryError
  >;
}

/**
 * Build a fresh context around an environment. Only the runner does this,
 * and only the runner holds the teardown.
 */
export const makeRequestContext = <Env, S extends object = StateShape>(
  environment: Env,
  options: CleanupRegistryOptions = {}
): Effect.Effect<ContextHandle<Env, S>> =>
  Effect.gen(function* () {
    const state = yield* makeStateCell<S>();
    const registry = yield* makeCleanupRegistry(options);
    return {
      context: new RequestContext(environment, state, registry),
      teardown: registry.drain,
    };
  });

/**
 * Acquire a resource for the rest of the request; its release runs at
 * teardown together with the other cleanup actions.
 */
export const acquireScoped = <Env, S extends object, A, E, R>(
  context: HandlerCapabilities<Env, S>,
  acquire: Effect.Effect<A, E, R>,
  release: (resource: A) => CleanupAction,
  options?: RegisterOptions
): Effect.Effect<A, E | CleanupRegistryError, R> =>
  acquireRelease(context.cleanup, acquire, release, options);
