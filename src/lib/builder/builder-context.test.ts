import { describe, it, expect } from 'vitest';
import { Effect, Option } from 'effect';
import { BuilderContext } from './builder-context';
import { Asset } from './assets';
import {
  makeRequestContext,
  type HandlerCapabilities,
} from '../context/request-context';
import { AccumulatorSealedError } from '../errors';
import { expectDefect } from '@tests/utils/effect-helpers';

interface PageEnv {
  readonly title: string;
}

interface PageState {
  user: string;
  renders: number;
}

const environment: PageEnv = { title: 'Home' };

const withContext = <A, E>(
  f: (context: HandlerCapabilities<PageEnv, PageState>) => Effect.Effect<A, E>
) =>
  Effect.gen(function* () {
    const { context } = yield* makeRequestContext<PageEnv, PageState>(environment);
    return yield* f(context);
  });

// A collaborator written against the plain capability set
const loadUser = ({ state }: HandlerCapabilities<PageEnv, PageState>) =>
  state.modify('user', (current) => Option.getOrElse(current, () => 'guest'));

describe('BuilderContext', () => {
  it('should expose the wrapped environment and accumulate output', async () => {
    const built = await Effect.runPromise(
      withContext((context) =>
        BuilderContext.build(context, (builder: BuilderContext<PageEnv, PageState, string, Asset>) =>
          Effect.gen(function* () {
            yield* builder.append(`<h1>${builder.environment.title}</h1>`);
            yield* builder.mergeMetadata(Asset.Stylesheet({ href: '/page.css' }));
            return 'rendered';
          })
        )
      )
    );

    expect(built.value).toBe('rendered');
    expect(built.output).toEqual({
      fragments: ['<h1>Home</h1>'],
      metadata: [Asset.Stylesheet({ href: '/page.css' })],
    });
  });

  it('should write state into the wrapped context', async () => {
    const user = await Effect.runPromise(
      withContext((context) =>
        Effect.gen(function* () {
          yield* BuilderContext.build(context, (builder) =>
            builder.state.write('user', 'alice')
          );
          return yield* context.state.read('user');
        })
      )
    );

    expect(user).toEqual(Option.some('alice'));
  });

  it('should run plain handlers with the wrapped capability set', async () => {
    const result = await Effect.runPromise(
      withContext((context) =>
        BuilderContext.build(context, (builder) =>
          Effect.gen(function* () {
            const viaHandler = yield* builder.runAsHandler(loadUser);
            const direct = yield* loadUser(builder);
            const seen = yield* builder.runAsHandler((inner) =>
              Effect.succeed(inner === context)
            );
            return { viaHandler, direct, seen };
          })
        )
      )
    );

    expect(result.value).toEqual({
      viaHandler: 'guest',
      direct: 'guest',
      seen: true,
    });
  });

  it('should return nested output without merging it', async () => {
    const built = await Effect.runPromise(
      withContext((context) =>
        BuilderContext.build(context, (builder: BuilderContext<PageEnv, PageState, string, Asset>) =>
          Effect.gen(function* () {
            yield* builder.append('<body>');
            const [value, nested] = yield* builder.runBuilder((inner) =>
              Effect.gen(function* () {
                yield* inner.append('<nav/>');
                yield* inner.mergeMetadata(Asset.Script({ src: '/nav.js' }));
                yield* inner.state.write('renders', 1);
                return 'nav';
              })
            );
            const before = yield* builder.snapshot;
            yield* builder.mergeOutput(nested);
            yield* builder.append('</body>');
            return { value, nested, before };
          })
        )
      )
    );

    expect(built.value.value).toBe('nav');
    expect(built.value.nested.fragments).toEqual(['<nav/>']);
    expect(built.value.before.fragments).toEqual(['<body>']);
    expect(built.output).toEqual({
      fragments: ['<body>', '<nav/>', '</body>'],
      metadata: [Asset.Script({ src: '/nav.js' })],
    });
  });

  it('should run several builders concurrently and keep declaration order', async () => {
    const built = await Effect.runPromise(
      withContext((context) =>
        BuilderContext.build(context, (builder: BuilderContext<PageEnv, PageState, string, Asset>) =>
          builder.runBuilders(
            [30, 10, 20].map((delay) => (inner: BuilderContext<PageEnv, PageState, string, Asset>) =>
              Effect.gen(function* () {
                yield* Effect.sleep(`${delay} millis`);
                yield* inner.append(`widget-${delay}`);
                yield* inner.mergeMetadata(Asset.Script({ src: '/widgets.js' }));
                yield* inner.state.modify('renders', (current) =>
                  Option.getOrElse(current, () => 0) + 1
                );
                return delay;
              })
            ),
            { concurrency: 'unbounded' }
          )
        )
      )
    );

    expect(built.value.map((entry) => entry.value)).toEqual([30, 10, 20]);
    expect(built.value.map((entry) => entry.output.fragments)).toEqual([
      ['widget-30'],
      ['widget-10'],
      ['widget-20'],
    ]);
    expect(built.output.fragments).toEqual([]);
  });

  it('should seal the accumulator when the builder fails', async () => {
    let escaped: BuilderContext<PageEnv, PageState> | undefined;

    const defect = await expectDefect(
      withContext((context) =>
        Effect.gen(function* () {
          const failed = yield* Effect.flip(
            BuilderContext.build(context, (builder) =>
              Effect.gen(function* () {
                escaped = builder;
                yield* builder.append('partial');
                return yield* Effect.fail('render failed');
              })
            )
          );
          expect(failed).toBe('render failed');
          if (escaped !== undefined) {
            yield* escaped.append('too late');
          }
        })
      )
    );

    expect(defect).toBeInstanceOf(AccumulatorSealedError);
  });
});
