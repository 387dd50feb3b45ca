/**
 * Example: rendering a page with builders
 *
 * The page builder renders a header, runs two widget builders concurrently
 * and merges their output. Widgets declare the scripts and stylesheets they
 * need; equal assets collapse into one entry.
 *
 * Run: npx tsx examples/02-page-builder.ts
 */

import { Effect } from 'effect';
import {
  Asset,
  buildEnvironment,
  isScript,
  runBuilder,
  runToPromise,
  type BuilderContext,
  type Environment,
} from '../src/index';

type PageEnv = Environment<Record<string, never>, { readonly siteName: string }>;
type Page = BuilderContext<PageEnv, Record<string, unknown>, string, Asset>;

const widget = (name: string) => (builder: Page) =>
  Effect.gen(function* () {
    yield* builder.append(`<section class="${name}">${name}</section>`);
    yield* builder.mergeMetadata(Asset.Script({ src: '/widgets.js' }));
    yield* builder.mergeMetadata(Asset.Stylesheet({ href: `/${name}.css` }));
  });

const page = (builder: Page) =>
  Effect.gen(function* () {
    yield* builder.append(`<h1>${builder.environment.settings.siteName}</h1>`);
    const widgets = yield* builder.runBuilders(
      [widget('news'), widget('weather')],
      { concurrency: 'unbounded' }
    );
    for (const { output } of widgets) {
      yield* builder.mergeOutput(output);
    }
    return widgets.length;
  });

export const runExample = async () => {
  console.log('🚀 Starting page builder example...');

  const outcome = await runToPromise(
    runBuilder(
      buildEnvironment<Record<string, never>, { readonly siteName: string }>(
        { method: 'GET', path: '/' },
        {},
        { siteName: 'Example Site' }
      ),
      page
    )
  );

  if (outcome._tag === 'Success') {
    const { fragments, metadata } = outcome.value.output;
    console.log('HTML:', fragments.join(''));
    console.log('Scripts:', metadata.filter(isScript).map((asset) => asset.src));
    console.log('Widgets:', outcome.value.value);
  } else {
    console.log('Failed:', outcome.message);
  }
  return outcome;
};

// Run example if this file is executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  runExample().catch((error) => {
    console.error('❌ Page builder example failed:', error);
    process.exit(1);
  });
}

/**
 * Expected Output:
 * ===============
 *
 * 🚀 Starting page builder example...
 * HTML: <h1>Example Site</h1><section class="news">news</section><section class="weather">weather</section>
 * Scripts: [ '/widgets.js' ]
 * Widgets: 2
 */
