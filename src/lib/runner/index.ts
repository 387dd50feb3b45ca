export {
  run,
  runBuilder,
  runToPromise,
  type EnvironmentBuilder,
  type RunOptions,
  type RuntimeServices,
} from './runner';
export {
  canTransition,
  isTerminal,
  makeLifecycle,
  type Lifecycle,
  type RunPhase,
  type TransitionListener,
} from './lifecycle';
export {
  describe,
  environmentFailure,
  failure,
  failureValue,
  fromExit,
  isFailure,
  isSuccess,
  match,
  success,
  type Failure,
  type FailureKind,
  type Outcome,
  type Success,
} from './outcome';
