/**
 * LoggingService - Structured logging service
 * Writes JSON or text entries through Effect's Console, or to a custom sink.
 */

import { Console, Context, Effect, Layer, pipe } from 'effect';
import { ConfigService } from './config';

// ============= Log Levels =============

export type LogLevelType = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'text';

const levelOrder: ReadonlyArray<LogLevelType> = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
];

// ============= Log Entry Schema =============

export interface LogEntry {
  readonly level: LogLevelType;
  readonly message: string;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;
  readonly error?: unknown;
}

/**
 * Destination of formatted log entries
 */
export type LogSink = (
  entry: LogEntry,
  formatted: string
) => Effect.Effect<void>;

// ============= LoggingService Interface =============

export interface LoggingService {
  readonly log: (
    level: LogLevelType,
    message: string,
    context?: Record<string, unknown>
  ) => Effect.Effect<void>;
  readonly trace: (
    message: string,
    context?: Record<string, unknown>
  ) => Effect.Effect<void>;
  readonly debug: (
    message: string,
    context?: Record<string, unknown>
  ) => Effect.Effect<void>;
  readonly info: (
    message: string,
    context?: Record<string, unknown>
  ) => Effect.Effect<void>;
  readonly warn: (
    message: string,
    context?: Record<string, unknown>
  ) => Effect.Effect<void>;
  readonly error: (
    message: string,
    error?: unknown,
    context?: Record<string, unknown>
  ) => Effect.Effect<void>;

  /**
   * Create a child logger with additional context
   */
  readonly withContext: (context: Record<string, unknown>) => LoggingService;

  /**
   * Log with performance timing
   */
  readonly timed: <A, E, R>(
    label: string,
    effect: Effect.Effect<A, E, R>
  ) => Effect.Effect<A, E, R>;
}

// ============= Context Tag =============

export const LoggingService =
  Context.GenericTag<LoggingService>('@services/Logging');

// ============= Formatters =============

const serializeError = (error: unknown): unknown =>
  error instanceof Error
    ? { name: error.name, message: error.message, stack: error.stack }
    : error;

const jsonReplacer = () => {
  const seen = new WeakSet<object>();
  return (_key: string, value: unknown): unknown => {
    if (typeof value === 'bigint') {
      return value.toString();
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  };
};

/**
 * JSON.stringify that never throws: BigInts become strings, repeated
 * references become "[Circular]", anything else unserializable is replaced
 * by a marker.
 */
export const safeStringify = (value: unknown): string => {
  try {
    return JSON.stringify(value, jsonReplacer()) ?? String(value);
  } catch (error) {
    return `"[Unserializable: ${error instanceof Error ? error.message : String(error)}]"`;
  }
};

export const formatJson = (entry: LogEntry): string => {
  const json: Record<string, unknown> = {
    level: entry.level,
    message: entry.message,
    timestamp: entry.timestamp.toISOString(),
  };

  if (entry.context && Object.keys(entry.context).length > 0) {
    json.context = entry.context;
  }

  if (entry.error !== undefined) {
    json.error = serializeError(entry.error);
  }

  return safeStringify(json);
};

export const formatText = (entry: LogEntry): string => {
  const timestamp = entry.timestamp.toISOString();
  const level = entry.level.toUpperCase().padEnd(5);
  let message = `[${timestamp}] ${level} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    message += ` ${safeStringify(entry.context)}`;
  }

  if (entry.error !== undefined) {
    if (entry.error instanceof Error) {
      message += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack) {
        message += `\n  Stack: ${entry.error.stack}`;
      }
    } else {
      message += `\n  Error: ${safeStringify(entry.error)}`;
    }
  }

  return message;
};

// ============= Output Handlers =============

export const consoleSink: LogSink = (entry, formatted) => {
  switch (entry.level) {
    case 'error':
      return Console.error(formatted);
    case 'warn':
      return Console.warn(formatted);
    case 'info':
      return Console.log(formatted);
    case 'debug':
    case 'trace':
      return Console.debug(formatted);
  }
};

// ============= Service Implementation =============

export const makeLoggingService = (
  minLevel: LogLevelType,
  format: LogFormat,
  sink: LogSink = consoleSink,
  baseContext?: Record<string, unknown>
): LoggingService => {
  const shouldLog = (level: LogLevelType): boolean =>
    levelOrder.indexOf(level) >= levelOrder.indexOf(minLevel);

  const logMessage = (
    level: LogLevelType,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): Effect.Effect<void> => {
    if (!shouldLog(level)) {
      return Effect.void;
    }

    return Effect.suspend(() => {
      const entry: LogEntry = {
        level,
        message,
        timestamp: new Date(),
        context: baseContext ? { ...baseContext, ...context } : context,
        error,
      };
      return sink(entry, format === 'json' ? formatJson(entry) : formatText(entry));
    });
  };

  return {
    log: (level, message, context) => logMessage(level, message, context),

    trace: (message, context) => logMessage('trace', message, context),

    debug: (message, context) => logMessage('debug', message, context),

    info: (message, context) => logMessage('info', message, context),

    warn: (message, context) => logMessage('warn', message, context),

    error: (message, error, context) =>
      logMessage('error', message, context, error),

    withContext: (additionalContext) =>
      makeLoggingService(
        minLevel,
        format,
        sink,
        baseContext ? { ...baseContext, ...additionalContext } : additionalContext
      ),

    timed: <A, E, R>(label: string, effect: Effect.Effect<A, E, R>) =>
      Effect.gen(function* () {
        const startTime = Date.now();

        yield* logMessage('debug', `${label} started`, { label });

        return yield* pipe(
          effect,
          Effect.tap(() =>
            logMessage('info', `${label} completed`, {
              label,
              duration: Date.now() - startTime,
            })
          ),
          Effect.tapError((error) =>
            logMessage(
              'error',
              `${label} failed`,
              { label, duration: Date.now() - startTime },
              error
            )
          )
        );
      }),
  };
};

// ============= Layer Implementations =============

/**
 * Live implementation that uses configuration
 */
export const LoggingServiceLive = Layer.effect(
  LoggingService,
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const logging = yield* config.get('logging');
    return makeLoggingService(logging.level, logging.format);
  })
);

/**
 * Test implementation with custom settings and an optional sink
 */
export const LoggingServiceTest = (
  level: LogLevelType = 'debug',
  format: LogFormat = 'text',
  sink?: LogSink
) => Layer.succeed(LoggingService, makeLoggingService(level, format, sink));

const silentLogger: LoggingService = {
  log: () => Effect.void,
  trace: () => Effect.void,
  debug: () => Effect.void,
  info: () => Effect.void,
  warn: () => Effect.void,
  error: () => Effect.void,
  withContext: () => silentLogger,
  timed: (_label, effect) => effect,
};

/**
 * Silent implementation for testing
 */
export const LoggingServiceSilent = Layer.succeed(LoggingService, silentLogger);
