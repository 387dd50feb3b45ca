/**
 * Request-scope runtime
 *
 * Runs handlers against an immutable environment, a mutable state cell and a
 * cleanup registry that is drained exactly once on every exit path.
 *
 * ```typescript
 * import { Effect } from 'effect'
 * import { buildEnvironment, run, runToPromise } from 'request-scope'
 *
 * const outcome = await runToPromise(
 *   run(
 *     buildEnvironment({ method: 'GET', path: '/' }, pool, settings),
 *     ({ environment, state, cleanup }) =>
 *       Effect.gen(function* () {
 *         yield* state.write('user', 'guest')
 *         yield* cleanup.register(Effect.log('done'))
 *         return environment.request.path
 *       })
 *   )
 * )
 * ```
 */

// Context
export {
  acquireScoped,
  buildEnvironment,
  CleanupFailure,
  CleanupToken,
  header,
  isRequestContext,
  RawRequestSchema,
  RequestContext,
  type CleanupAction,
  type CleanupRegistry,
  type Environment,
  type Handler,
  type HandlerCapabilities,
  type RawRequest,
  type RegisterOptions,
  type RequestMetadata,
  type StateCell,
  type StateKey,
  type StateShape,
} from './context';

// Builders
export {
  Asset,
  BuilderContext,
  emptyOutput,
  isScript,
  isStylesheet,
  type Builder,
  type Built,
  type BuilderOutput,
} from './builder';

// Runner
export {
  canTransition,
  describe,
  failureValue,
  isFailure,
  isSuccess,
  isTerminal,
  match,
  run,
  runBuilder,
  runToPromise,
  type EnvironmentBuilder,
  type Failure,
  type FailureKind,
  type Outcome,
  type RunOptions,
  type RunPhase,
  type RuntimeServices,
  type Success,
  type TransitionListener,
} from './runner';

// Services & layers
export {
  ConfigService,
  ConfigServiceLive,
  ConfigServiceTest,
  loadConfigFromEnv,
  type ConfigOverrides,
  type RuntimeConfig,
} from './services/config';
export {
  LoggingService,
  LoggingServiceLive,
  LoggingServiceSilent,
  LoggingServiceTest,
  type LogEntry,
  type LogFormat,
  type LogLevelType,
  type LogSink,
} from './services/logging';
export { RuntimeLive } from './layers/app';
export { RuntimeTest, RuntimeTestWithSink } from './layers/test';

// Errors
export {
  AccumulatorSealedError,
  CancellationError,
  CleanupRegistryError,
  CleanupTimeoutError,
  ConfigError,
  EnvironmentError,
  IllegalTransitionError,
  isCancellationError,
  isEnvironmentError,
  type RuntimeError,
} from './errors';
