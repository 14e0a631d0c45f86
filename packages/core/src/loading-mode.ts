import type { Size } from '@loading-kit/layers';
import type { z } from 'zod';
import type { Strategy } from './strategy.js';

/**
 * Binds a strategy to its style. A mode is a static description: it creates
 * a fresh strategy per view and never holds state of its own.
 */
export interface LoadingMode<TStyle extends object> {
  readonly name: string;
  /** Parses configuration into a complete style, filling defaults */
  readonly styleSchema: z.ZodType<TStyle, z.ZodTypeDef, unknown>;
  readonly defaultStyle: Readonly<TStyle>;
  makeStrategy(): Strategy<TStyle>;
  /** Natural size for `style`, never below 1×1 */
  intrinsicContentSize(style: Readonly<TStyle>): Size;
}

/** The style type a mode binds, e.g. `ModeStyle<typeof DotsMode>` */
export type ModeStyle<M> = M extends LoadingMode<infer TStyle> ? TStyle : never;

/** Floors both dimensions at one point */
export function atLeastOne(size: Size): Size {
  return { width: Math.max(size.width, 1), height: Math.max(size.height, 1) };
}
