/**
 * Required-asset metadata entries.
 *
 * Built with Data.taggedEnum, so two equal assets are Equal and collapse when
 * merged into a builder's metadata set.
 */

import { Data } from 'effect';

export type Asset = Data.TaggedEnum<{
  Script: { readonly src: string };
  Stylesheet: { readonly href: string };
}>;

export const Asset = Data.taggedEnum<Asset>();

export const isScript = Asset.$is('Script');
export const isStylesheet = Asset.$is('Stylesheet');
