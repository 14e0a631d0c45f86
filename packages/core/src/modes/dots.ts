import type { LoadingMode } from '../loading-mode.js';
import { atLeastOne } from '../loading-mode.js';
import { rowWidth } from '../strategies/dot-row.js';
import { DEFAULT_DOTS_STYLE, DotsStrategy, type DotsStyle, DotsStyleSchema } from '../strategies/dots.js';

export const DotsMode: LoadingMode<DotsStyle> = {
  name: 'dots',
  styleSchema: DotsStyleSchema,
  defaultStyle: DEFAULT_DOTS_STYLE,
  makeStrategy: () => new DotsStrategy(),
  intrinsicContentSize: (style) =>
    atLeastOne({
      width: rowWidth(style.count, style.size, style.spacing),
      height: style.size,
    }),
};
