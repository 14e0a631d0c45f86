/**
 * @loading-kit/core - loading indicators built from interchangeable strategies.
 *
 * @example
 * ```ts
 * import { LoadingView, RingMode } from '@loading-kit/core';
 *
 * const ring = new LoadingView(RingMode);
 * ring.updateStyle({ lineWidth: 4, gapRatio: 0.2 });
 * ring.startAnimating();
 * ```
 *
 * @module
 */

export { InvalidStyleError, type StyleIssue } from './errors.js';
export {
  type AccessibilityState,
  type AccessibilityTrait,
  DEFAULT_ANIMATION_KEY,
  isAnimating,
  LOADING_ACCESSIBILITY_LABEL,
  type LoadingAnimatable,
  startAnimating,
  stopAnimating,
} from './loading-animatable.js';
export { atLeastOne, type LoadingMode, type ModeStyle } from './loading-mode.js';
export { LoadingView, type LoadingViewChange, type LoadingViewOptions } from './loading-view.js';
export { DotsMode } from './modes/dots.js';
export { RING_INTRINSIC_SIZE, RingMode } from './modes/ring.js';
export { SHIMMER_FALLBACK_SIZE, ShimmerMode } from './modes/shimmer.js';
export { WaveDotsMode } from './modes/wave-dots.js';
export { resolveStyle } from './resolve-style.js';
export { replicationStagger, rowWidth } from './strategies/dot-row.js';
export { DEFAULT_DOTS_STYLE, DotsStrategy, type DotsStyle, DotsStyleSchema } from './strategies/dots.js';
export {
  clampGapRatio,
  DEFAULT_RING_STYLE,
  MAX_GAP_RATIO,
  RingStrategy,
  type RingStyle,
  RingStyleSchema,
  ringArcAngles,
} from './strategies/ring.js';
export {
  clampWidthRatio,
  DEFAULT_SHIMMER_STYLE,
  MAX_WIDTH_RATIO,
  MIN_WIDTH_RATIO,
  ShimmerStrategy,
  type ShimmerStyle,
  ShimmerStyleSchema,
  shimmerRestLocations,
  shimmerSweepLocations,
} from './strategies/shimmer.js';
export {
  DEFAULT_WAVE_DOTS_STYLE,
  WaveDotsStrategy,
  type WaveDotsStyle,
  WaveDotsStyleSchema,
} from './strategies/wave-dots.js';
export type { LayoutHost, Strategy } from './strategy.js';
