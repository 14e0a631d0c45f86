import type { Size } from '@loading-kit/layers';
import type { LoadingMode } from '../loading-mode.js';
import { DEFAULT_RING_STYLE, RingStrategy, type RingStyle, RingStyleSchema } from '../strategies/ring.js';

export const RING_INTRINSIC_SIZE: Readonly<Size> = Object.freeze({ width: 32, height: 32 });

export const RingMode: LoadingMode<RingStyle> = {
  name: 'ring',
  styleSchema: RingStyleSchema,
  defaultStyle: DEFAULT_RING_STYLE,
  makeStrategy: () => new RingStrategy(),
  intrinsicContentSize: () => ({ ...RING_INTRINSIC_SIZE }),
};
