/**
 * ConfigService - Centralized runtime configuration
 *
 * Configuration is validated with Effect Schema both when it is loaded from
 * the process environment and whenever it is updated.
 */

import { Context, Effect, Layer, ParseResult, pipe, Ref, Schema } from 'effect';
import { ConfigError } from '../errors';

// ============= Configuration Schema =============

export const LogLevelSchema = Schema.Literal(
  'trace',
  'debug',
  'info',
  'warn',
  'error'
);

export const LogFormatSchema = Schema.Literal('json', 'text');

const PositiveMillis = Schema.Number.pipe(Schema.positive());

export const RuntimeConfigSchema = Schema.Struct({
  logging: Schema.Struct({
    level: LogLevelSchema,
    format: LogFormatSchema,
  }),
  cleanup: Schema.Struct({
    actionTimeoutMs: Schema.optional(PositiveMillis),
  }),
  handler: Schema.Struct({
    timeoutMs: Schema.optional(PositiveMillis),
  }),
});

export type RuntimeConfig = Schema.Schema.Type<typeof RuntimeConfigSchema>;

/**
 * Per-section partial overrides
 */
export type ConfigOverrides = {
  readonly [K in keyof RuntimeConfig]?: Partial<RuntimeConfig[K]>;
};

/**
 * Environment variables understood by the runtime. Everything else in the
 * process environment is ignored.
 */
const EnvSchema = Schema.Struct({
  LOG_LEVEL: Schema.optional(LogLevelSchema),
  LOG_FORMAT: Schema.optional(LogFormatSchema),
  CLEANUP_TIMEOUT_MS: Schema.optional(
    Schema.NumberFromString.pipe(Schema.positive())
  ),
  HANDLER_TIMEOUT_MS: Schema.optional(
    Schema.NumberFromString.pipe(Schema.positive())
  ),
});

// ============= ConfigService Interface =============

export interface ConfigService {
  /**
   * Get one configuration section
   */
  readonly get: <K extends keyof RuntimeConfig>(
    key: K
  ) => Effect.Effect<RuntimeConfig[K]>;

  /**
   * Get the entire configuration
   */
  readonly getAll: () => Effect.Effect<RuntimeConfig>;

  /**
   * Update configuration (for testing)
   */
  readonly update: (
    overrides: ConfigOverrides
  ) => Effect.Effect<void, ConfigError>;
}

// ============= Context Tag =============

export const ConfigService =
  Context.GenericTag<ConfigService>('@services/Config');

// ============= Default Configuration =============

export const defaultConfig: RuntimeConfig = {
  logging: {
    level: 'info',
    format: 'json',
  },
  cleanup: {},
  handler: {},
};

// ============= Configuration Loading =============

const mergeConfigs = (
  base: RuntimeConfig,
  overrides: ConfigOverrides
): RuntimeConfig => ({
  logging: { ...base.logging, ...overrides.logging },
  cleanup: { ...base.cleanup, ...overrides.cleanup },
  handler: { ...base.handler, ...overrides.handler },
});

const toConfigError =
  (message: string) =>
  (error: ParseResult.ParseError): ConfigError =>
    new ConfigError({
      message: `${message}: ${ParseResult.TreeFormatter.formatErrorSync(error)}`,
      cause: error,
    });

const validateConfig = (
  candidate: RuntimeConfig
): Effect.Effect<RuntimeConfig, ConfigError> =>
  pipe(
    Schema.decodeUnknown(RuntimeConfigSchema)(candidate),
    Effect.mapError(toConfigError('Invalid configuration'))
  );

/**
 * Build a configuration from environment variables on top of the defaults.
 */
export const loadConfigFromEnv = (
  env: Readonly<Record<string, string | undefined>>
): Effect.Effect<RuntimeConfig, ConfigError> =>
  pipe(
    Schema.decodeUnknown(EnvSchema)(env),
    Effect.mapError(toConfigError('Invalid environment configuration')),
    Effect.map((vars) =>
      mergeConfigs(defaultConfig, {
        logging: {
          ...(vars.LOG_LEVEL !== undefined && { level: vars.LOG_LEVEL }),
          ...(vars.LOG_FORMAT !== undefined && { format: vars.LOG_FORMAT }),
        },
        cleanup: {
          ...(vars.CLEANUP_TIMEOUT_MS !== undefined && {
            actionTimeoutMs: vars.CLEANUP_TIMEOUT_MS,
          }),
        },
        handler: {
          ...(vars.HANDLER_TIMEOUT_MS !== undefined && {
            timeoutMs: vars.HANDLER_TIMEOUT_MS,
          }),
        },
      })
    )
  );

// ============= Service Implementation =============

const makeConfigService = (
  initialConfig: RuntimeConfig
): Effect.Effect<ConfigService, ConfigError> =>
  Effect.gen(function* () {
    const validated = yield* validateConfig(initialConfig);
    const configRef = yield* Ref.make(validated);

    return {
      get: <K extends keyof RuntimeConfig>(key: K) =>
        Effect.map(Ref.get(configRef), (config) => config[key]),

      getAll: () => Ref.get(configRef),

      update: (overrides: ConfigOverrides) =>
        pipe(
          Ref.get(configRef),
          Effect.flatMap((current) =>
            validateConfig(mergeConfigs(current, overrides))
          ),
          Effect.flatMap((next) => Ref.set(configRef, next))
        ),
    };
  });

// ============= Layer Implementations =============

/**
 * Live implementation that loads config from the process environment
 */
export const ConfigServiceLive = Layer.effect(
  ConfigService,
  Effect.flatMap(loadConfigFromEnv(process.env), makeConfigService)
);

/**
 * Test implementation with custom config
 */
export const ConfigServiceTest = (overrides: ConfigOverrides = {}) =>
  Layer.effect(
    ConfigService,
    makeConfigService(mergeConfigs(defaultConfig, overrides))
  );

// ============= Helper Functions =============

/**
 * Read a single section from the ambient ConfigService
 */
export const requireConfig = <K extends keyof RuntimeConfig>(key: K) =>
  Effect.flatMap(ConfigService, (config) => config.get(key));
