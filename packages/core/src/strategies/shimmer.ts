import {
  type AnimationDescription,
  basicAnimation,
  GradientLayer,
  Layer,
  localBounds,
  roundedRectPath,
  ShapeLayer,
  type Size,
} from '@loading-kit/layers';
import { SHIMMER_SWEEP_MS } from '@loading-kit/shared';
import { z } from 'zod';
import { logger } from '../logger.js';
import type { LayoutHost, Strategy } from '../strategy.js';

export const ShimmerStyleSchema = z.object({
  /** Mode tag */
  kind: z.literal('shimmer').default('shimmer'),
  baseColor: z.string().min(1).default('rgba(0, 0, 0, 0.12)'),
  highlightColor: z.string().min(1).default('rgba(0, 0, 0, 0.28)'),
  cornerRadius: z.number().finite().default(6),
  /** Natural size; 0×0 means the mode's fallback size */
  preferredSize: z
    .object({ width: z.number().finite(), height: z.number().finite() })
    .default({ width: 120, height: 12 }),
  /** Highlight band width as a fraction of the element, clamped to [0.05, 0.9] */
  widthRatio: z.number().finite().default(0.2),
  /** One sweep, milliseconds */
  duration: z.number().finite().default(SHIMMER_SWEEP_MS),
});

export type ShimmerStyle = z.infer<typeof ShimmerStyleSchema>;

export const DEFAULT_SHIMMER_STYLE: Readonly<ShimmerStyle> = Object.freeze(ShimmerStyleSchema.parse({}));

export const MIN_WIDTH_RATIO = 0.05;
export const MAX_WIDTH_RATIO = 0.9;

export function clampWidthRatio(widthRatio: number): number {
  if (Number.isNaN(widthRatio)) return MIN_WIDTH_RATIO;
  return Math.max(MIN_WIDTH_RATIO, Math.min(widthRatio, MAX_WIDTH_RATIO));
}

/**
 * Gradient stops with the band centred: base, band leading edge, band
 * trailing edge, base.
 */
export function shimmerRestLocations(widthRatio: number): number[] {
  const w = clampWidthRatio(widthRatio);
  return [0, Math.max(0, 0.5 - w / 2), Math.min(1, 0.5 + w / 2), 1];
}

/**
 * Start and end stops of one sweep: the rest arrangement shifted left, then
 * right, by the band width. Stops may fall outside [0, 1].
 */
export function shimmerSweepLocations(widthRatio: number): { from: number[]; to: number[] } {
  const w = clampWidthRatio(widthRatio);
  const rest = shimmerRestLocations(w);
  return {
    from: rest.map((stop) => stop - w),
    to: rest.map((stop) => stop + w),
  };
}

/**
 * A rounded placeholder bar with a highlight band sweeping left to right.
 */
export class ShimmerStrategy implements Strategy<ShimmerStyle> {
  private baseColor = DEFAULT_SHIMMER_STYLE.baseColor;
  private highlightColor = DEFAULT_SHIMMER_STYLE.highlightColor;
  private cornerRadius = DEFAULT_SHIMMER_STYLE.cornerRadius;
  private preferredSize: Size = { ...DEFAULT_SHIMMER_STYLE.preferredSize };
  private widthRatio = DEFAULT_SHIMMER_STYLE.widthRatio;
  private shimmerDuration = DEFAULT_SHIMMER_STYLE.duration;

  private readonly backgroundLayer = new Layer('shimmer.background');
  private readonly gradientLayer = new GradientLayer('shimmer.gradient');
  private readonly maskLayer = new ShapeLayer('shimmer.mask');
  private didBuild = false;

  apply(style: ShimmerStyle): void {
    this.baseColor = style.baseColor;
    this.highlightColor = style.highlightColor;
    this.cornerRadius = style.cornerRadius;
    this.preferredSize = { ...style.preferredSize };
    this.widthRatio = style.widthRatio;
    this.shimmerDuration = style.duration;
  }

  hostLayer(_host: LayoutHost): Layer {
    return this.gradientLayer;
  }

  build(host: LayoutHost): void {
    if (this.didBuild) return;

    host.layer.addSublayer(this.backgroundLayer);
    host.layer.addSublayer(this.gradientLayer);
    this.gradientLayer.mask = this.maskLayer;

    this.gradientLayer.startPoint = { x: 0, y: 0.5 };
    this.gradientLayer.endPoint = { x: 1, y: 0.5 };
    this.gradientLayer.colors = this.bandColors();
    this.maskLayer.fillColor = '#000';

    this.didBuild = true;
    logger.debug({ strategy: 'shimmer', preferredSize: this.preferredSize }, 'Built layer tree');
  }

  layout(host: LayoutHost): void {
    if (!this.didBuild) return;

    const bounds = localBounds(host.bounds);

    this.backgroundLayer.frame = bounds;
    this.backgroundLayer.backgroundColor = this.baseColor;
    this.backgroundLayer.cornerRadius = this.cornerRadius;

    this.gradientLayer.frame = { ...bounds };
    this.gradientLayer.locations = shimmerRestLocations(this.widthRatio);
    this.gradientLayer.colors = this.bandColors();

    this.maskLayer.frame = { ...bounds };
    this.maskLayer.path = roundedRectPath(bounds, this.cornerRadius);
  }

  makeAnimation(_host: LayoutHost): AnimationDescription {
    const { from, to } = shimmerSweepLocations(this.widthRatio);
    return basicAnimation('locations', from, to, {
      duration: this.shimmerDuration,
      repeatCount: Number.POSITIVE_INFINITY,
      timingFunction: 'linear',
    });
  }

  private bandColors(): string[] {
    return [this.baseColor, this.highlightColor, this.highlightColor, this.baseColor];
  }
}
