import type { Size } from '@loading-kit/layers';
import type { LoadingMode } from '../loading-mode.js';
import { atLeastOne } from '../loading-mode.js';
import {
  DEFAULT_SHIMMER_STYLE,
  ShimmerStrategy,
  type ShimmerStyle,
  ShimmerStyleSchema,
} from '../strategies/shimmer.js';

/** Used when the style's preferred size is 0×0 */
export const SHIMMER_FALLBACK_SIZE: Readonly<Size> = Object.freeze({ width: 120, height: 12 });

export const ShimmerMode: LoadingMode<ShimmerStyle> = {
  name: 'shimmer',
  styleSchema: ShimmerStyleSchema,
  defaultStyle: DEFAULT_SHIMMER_STYLE,
  makeStrategy: () => new ShimmerStrategy(),
  intrinsicContentSize: ({ preferredSize }) =>
    preferredSize.width === 0 && preferredSize.height === 0
      ? { ...SHIMMER_FALLBACK_SIZE }
      : atLeastOne(preferredSize),
};
