/**
 * Context Module Exports
 */

export type { Environment, RawRequest, RequestMetadata } from './environment';
export { buildEnvironment, header, RawRequestSchema } from './environment';

export type { StateCell, StateKey, StateShape } from './state-cell';
export { makeStateCell } from './state-cell';

export type {
  CleanupAction,
  CleanupRegistry,
  CleanupRegistryOptions,
  OwnedCleanupRegistry,
  RegisterOptions,
} from './cleanup-registry';
export {
  acquireRelease,
  CleanupFailure,
  CleanupToken,
  makeCleanupRegistry,
} from './cleanup-registry';

export type {
  ContextHandle,
  Handler,
  HandlerCapabilities,
} from './request-context';
export {
  acquireScoped,
  isRequestContext,
  makeRequestContext,
  RequestContext,
} from './request-context';
