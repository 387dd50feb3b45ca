/**
 * Environment - immutable per-request configuration and request data.
 *
 * The runtime does not require this shape; any value can serve as a
 * handler's environment. `buildEnvironment` is the conventional way for a
 * transport collaborator to turn an inbound request into one.
 */

import { Clock, Effect, ParseResult, pipe, Schema } from 'effect';
import { v4 as uuidv4 } from 'uuid';
import { EnvironmentError } from '../errors';

// ============= Request Schema =============

const StringMap = Schema.Record({ key: Schema.String, value: Schema.String });

/**
 * What a transport hands over for one inbound request
 */
export const RawRequestSchema = Schema.Struct({
  requestId: Schema.optional(Schema.NonEmptyString),
  method: Schema.NonEmptyString,
  path: Schema.String.pipe(Schema.startsWith('/')),
  headers: Schema.optional(StringMap),
  query: Schema.optional(StringMap),
});

export type RawRequest = Schema.Schema.Encoded<typeof RawRequestSchema>;

export interface RequestMetadata {
  readonly requestId: string;
  readonly method: string;
  readonly path: string;
  /** Header names are lower-case */
  readonly headers: Readonly<Record<string, string>>;
  readonly query: Readonly<Record<string, string>>;
  readonly receivedAt: Date;
}

export interface Environment<Shared = unknown, Settings = unknown> {
  readonly request: RequestMetadata;
  /** Application-wide handles, e.g. a connection pool */
  readonly shared: Shared;
  readonly settings: Settings;
}

// ============= Construction =============

const lowerCaseKeys = (
  record: Readonly<Record<string, string>>
): Readonly<Record<string, string>> =>
  Object.freeze(
    Object.fromEntries(
      Object.entries(record).map(([key, value]) => [key.toLowerCase(), value])
    )
  );

/**
 * Decode an inbound request description into a frozen Environment.
 * Decoding is the only way this can fail.
 */
export const buildEnvironment = <Shared, Settings>(
  raw: unknown,
  shared: Shared,
  settings: Settings
): Effect.Effect<Environment<Shared, Settings>, EnvironmentError> =>
  Effect.gen(function* () {
    const decoded = yield* pipe(
      Schema.decodeUnknown(RawRequestSchema)(raw),
      Effect.mapError(
        (error) =>
          new EnvironmentError({
            message: `Invalid request: ${ParseResult.TreeFormatter.formatErrorSync(error)}`,
            cause: error,
          })
      )
    );
    const receivedAt = yield* Clock.currentTimeMillis;

    const request: RequestMetadata = Object.freeze({
      requestId: decoded.requestId ?? uuidv4(),
      method: decoded.method.toUpperCase(),
      path: decoded.path,
      headers: lowerCaseKeys(decoded.headers ?? {}),
      query: Object.freeze({ ...decoded.query }),
      receivedAt: new Date(receivedAt),
    });

    return Object.freeze({ request, shared, settings });
  });

/**
 * Case-insensitive header lookup
 */
export const header = (
  environment: Environment,
  name: string
): string | undefined => environment.request.headers[name.toLowerCase()];
