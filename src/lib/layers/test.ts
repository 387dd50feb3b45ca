import { Layer } from 'effect';
import { ConfigServiceTest, type ConfigOverrides } from '../services/config';
import {
  LoggingServiceSilent,
  LoggingServiceTest,
  type LogSink,
} from '../services/logging';

/**
 * Test layer: default configuration plus `overrides`, no log output
 */
export const RuntimeTest = (overrides: ConfigOverrides = {}) =>
  Layer.mergeAll(ConfigServiceTest(overrides), LoggingServiceSilent);

/**
 * Test layer whose log entries go to `sink`
 */
export const RuntimeTestWithSink = (
  sink: LogSink,
  overrides: ConfigOverrides = {}
) =>
  Layer.mergeAll(
    ConfigServiceTest(overrides),
    LoggingServiceTest('debug', 'text', sink)
  );
