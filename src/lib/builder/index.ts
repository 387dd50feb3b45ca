/**
 * Builder Module Exports
 */

export type { Builder, Built } from './builder-context';
export { BuilderContext } from './builder-context';

export type { BuilderOutput, OutputAccumulator } from './output-accumulator';
export { emptyOutput, makeOutputAccumulator } from './output-accumulator';

export { Asset, isScript, isStylesheet } from './assets';
