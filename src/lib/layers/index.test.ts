import { describe, it, expect } from 'vitest';
import { Effect } from 'effect';
import { RuntimeLive } from './app';
import { RuntimeTest, RuntimeTestWithSink } from './test';
import { ConfigService } from '../services/config';
import { LoggingService } from '../services/logging';
import { makeRecordingSink } from '@tests/utils/effect-helpers';

const readServices = Effect.gen(function* () {
  const config = yield* ConfigService;
  const logger = yield* LoggingService;
  yield* logger.info('layer ready');
  return yield* config.getAll();
});

describe('Layers', () => {
  it('should build the live layer from the process environment', async () => {
    const config = await Effect.runPromise(Effect.provide(readServices, RuntimeLive));

    // tests/setup.ts pins LOG_LEVEL
    expect(config.logging.level).toBe('error');
  });

  it('should apply overrides in the test layer', async () => {
    const config = await Effect.runPromise(
      Effect.provide(readServices, RuntimeTest({ handler: { timeoutMs: 50 } }))
    );

    expect(config.handler).toEqual({ timeoutMs: 50 });
    expect(config.logging).toEqual({ level: 'info', format: 'json' });
  });

  it('should route log entries to the given sink', async () => {
    const { sink, entries } = makeRecordingSink();

    await Effect.runPromise(
      Effect.provide(readServices, RuntimeTestWithSink(sink))
    );

    expect(entries.map((entry) => entry.message)).toEqual(['layer ready']);
  });
});
