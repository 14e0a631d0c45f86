import type { LoadingMode } from '../loading-mode.js';
import { atLeastOne } from '../loading-mode.js';
import { rowWidth } from '../strategies/dot-row.js';
import {
  DEFAULT_WAVE_DOTS_STYLE,
  WaveDotsStrategy,
  type WaveDotsStyle,
  WaveDotsStyleSchema,
} from '../strategies/wave-dots.js';

/**
 * Height covers the dot travelling `amplitude` above and below its resting
 * position.
 */
export const WaveDotsMode: LoadingMode<WaveDotsStyle> = {
  name: 'waveDots',
  styleSchema: WaveDotsStyleSchema,
  defaultStyle: DEFAULT_WAVE_DOTS_STYLE,
  makeStrategy: () => new WaveDotsStrategy(),
  intrinsicContentSize: (style) =>
    atLeastOne({
      width: rowWidth(style.count, style.size, style.spacing),
      height: style.size + style.amplitude * 2,
    }),
};
