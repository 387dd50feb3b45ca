import { describe, it, expect } from 'vitest';
import { Effect } from 'effect';
import {
  formatJson,
  formatText,
  LoggingService,
  LoggingServiceTest,
  makeLoggingService,
  safeStringify,
  type LogEntry,
} from './logging';
import { makeRecordingSink } from '@tests/utils/effect-helpers';

const entry: LogEntry = {
  level: 'warn',
  message: 'Cleanup action failed',
  timestamp: new Date('2024-01-02T03:04:05.000Z'),
  context: { label: 'flush' },
};

describe('LoggingService', () => {
  describe('formatters', () => {
    it('should format JSON entries', () => {
      expect(formatJson(entry)).toBe(
        '{"level":"warn","message":"Cleanup action failed","timestamp":"2024-01-02T03:04:05.000Z","context":{"label":"flush"}}'
      );
    });

    it('should omit empty context from JSON', () => {
      expect(formatJson({ ...entry, context: {} })).toBe(
        '{"level":"warn","message":"Cleanup action failed","timestamp":"2024-01-02T03:04:05.000Z"}'
      );
    });

    it('should format text entries', () => {
      expect(formatText(entry)).toBe(
        '[2024-01-02T03:04:05.000Z] WARN  Cleanup action failed {"label":"flush"}'
      );
    });

    it('should render BigInt and circular values in JSON entries', () => {
      const cyclic: Record<string, unknown> = { name: 'node' };
      cyclic.self = cyclic;

      expect(
        JSON.parse(formatJson({ ...entry, context: undefined, error: { code: 1n, cyclic } }))
      ).toEqual({
        level: 'warn',
        message: 'Cleanup action failed',
        timestamp: '2024-01-02T03:04:05.000Z',
        error: { code: '1', cyclic: { name: 'node', self: '[Circular]' } },
      });
    });

    it('should render BigInt values in text entries', () => {
      expect(formatText({ ...entry, context: { total: 10n } })).toBe(
        '[2024-01-02T03:04:05.000Z] WARN  Cleanup action failed {"total":"10"}'
      );
    });

    it('should stringify values whose toJSON throws as a marker', () => {
      const broken = {
        toJSON: () => {
          throw new Error('no json');
        },
      };

      expect(safeStringify(broken)).toBe('"[Unserializable: no json]"');
    });

    it('should append a non-Error failure to text entries', () => {
      expect(formatText({ ...entry, context: undefined, error: 'timeout' })).toBe(
        '[2024-01-02T03:04:05.000Z] WARN  Cleanup action failed\n  Error: "timeout"'
      );
    });
  });

  describe('service', () => {
    it('should drop entries below the minimum level', async () => {
      const { sink, entries } = makeRecordingSink();
      const logger = makeLoggingService('warn', 'json', sink);

      await Effect.runPromise(
        Effect.all([
          logger.debug('hidden'),
          logger.info('hidden'),
          logger.warn('shown'),
          logger.error('failed', new Error('boom')),
        ])
      );

      expect(entries.map(({ level, message }) => `${level}:${message}`)).toEqual([
        'warn:shown',
        'error:failed',
      ]);
      expect(entries[1]?.error).toBeInstanceOf(Error);
    });

    it('should merge child context into every entry', async () => {
      const { sink, entries } = makeRecordingSink();
      const logger = makeLoggingService('debug', 'text', sink)
        .withContext({ runId: 'run-7' })
        .withContext({ component: 'runner' });

      await Effect.runPromise(logger.info('Run started', { step: 1 }));

      expect(entries[0]?.context).toEqual({
        runId: 'run-7',
        component: 'runner',
        step: 1,
      });
    });

    it('should time an effect and pass its value through', async () => {
      const { sink, entries } = makeRecordingSink();

      const value = await Effect.runPromise(
        Effect.provide(
          Effect.gen(function* () {
            const logger = yield* LoggingService;
            return yield* logger.timed('render', Effect.succeed('html'));
          }),
          LoggingServiceTest('debug', 'text', sink)
        )
      );

      expect(value).toBe('html');
      expect(entries.map((logged) => logged.message)).toEqual([
        'render started',
        'render completed',
      ]);
    });
  });
});
