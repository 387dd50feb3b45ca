/**
 * Example: a plain handler
 *
 * Builds an environment from an inbound request, checks out a fake
 * connection for the rest of the request and counts visits in state. The
 * connection is returned during teardown, after the handler finished.
 *
 * Run: npx tsx examples/01-handler.ts
 */

import { Effect, Option } from 'effect';
import {
  acquireScoped,
  buildEnvironment,
  describe,
  run,
  runToPromise,
} from '../src/index';

const pool = {
  checkout: Effect.sync(() => {
    console.log('• checkout connection');
    return { query: (sql: string) => Effect.succeed(`rows for ${sql}`) };
  }),
  release: Effect.sync(() => console.log('• release connection')),
};

export const runExample = async () => {
  console.log('🚀 Starting handler example...');

  const outcome = await runToPromise(
    run(
      buildEnvironment(
        { method: 'get', path: '/articles', query: { page: '1' } },
        pool,
        { pageSize: 20 }
      ),
      (context) =>
        Effect.gen(function* () {
          const { request, shared } = context.environment;
          const connection = yield* acquireScoped(
            context,
            shared.checkout,
            () => shared.release,
            { label: 'db-connection' }
          );
          const visits = yield* context.state.modify('visits', (current) =>
            Option.match(current, {
              onNone: () => 1,
              onSome: (count) => (typeof count === 'number' ? count + 1 : 1),
            })
          );
          const rows = yield* connection.query(`articles page ${request.query.page}`);
          console.log(`• ${request.method} ${request.path}: ${rows} (visit ${visits})`);
          return rows;
        })
    )
  );

  console.log('Outcome:', describe(outcome));
  return outcome;
};

// Run example if this file is executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  runExample().catch((error) => {
    console.error('❌ Handler example failed:', error);
    process.exit(1);
  });
}

/**
 * Expected Output:
 * ===============
 *
 * 🚀 Starting handler example...
 * • checkout connection
 * • GET /articles: rows for articles page 1 (visit 1)
 * • release connection
 * Outcome: Success
 */
