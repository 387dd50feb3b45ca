import { Layer } from 'effect';
import { ConfigServiceLive } from '../services/config';
import { LoggingServiceLive } from '../services/logging';

/**
 * Production layer: configuration from the process environment and a
 * console logger configured from it
 */
export const RuntimeLive = LoggingServiceLive.pipe(
  Layer.provideMerge(ConfigServiceLive)
);
