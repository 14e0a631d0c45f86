import {
  type AnimationDescription,
  arcPath,
  basicAnimation,
  Layer,
  localBounds,
  rectCenter,
  ShapeLayer,
} from '@loading-kit/layers';
import { RING_ROTATION_MS } from '@loading-kit/shared';
import { z } from 'zod';
import { logger } from '../logger.js';
import type { LayoutHost, Strategy } from '../strategy.js';

export const RingStyleSchema = z.object({
  /** Mode tag */
  kind: z.literal('ring').default('ring'),
  lineWidth: z.number().finite().default(3),
  strokeColor: z.string().min(1).default('currentColor'),
  /** Fraction of the circle left unstroked, clamped to [0, 0.95] */
  gapRatio: z.number().finite().default(0.25),
  /** One full turn, milliseconds */
  rotationDuration: z.number().finite().default(RING_ROTATION_MS),
});

export type RingStyle = z.infer<typeof RingStyleSchema>;

export const DEFAULT_RING_STYLE: Readonly<RingStyle> = Object.freeze(RingStyleSchema.parse({}));

/** Always leave some gap so the rotation stays visible */
export const MAX_GAP_RATIO = 0.95;

/** 12 o'clock */
const ARC_START = -Math.PI / 2;

export function clampGapRatio(gapRatio: number): number {
  if (Number.isNaN(gapRatio)) return 0;
  return Math.max(0, Math.min(gapRatio, MAX_GAP_RATIO));
}

export function ringArcAngles(gapRatio: number): { startAngle: number; endAngle: number } {
  return {
    startAngle: ARC_START,
    endAngle: ARC_START + 2 * Math.PI * (1 - clampGapRatio(gapRatio)),
  };
}

/**
 * A stroked arc with a gap, spinning at constant speed.
 */
export class RingStrategy implements Strategy<RingStyle> {
  private lineWidth = DEFAULT_RING_STYLE.lineWidth;
  private strokeColor = DEFAULT_RING_STYLE.strokeColor;
  private gapRatio = DEFAULT_RING_STYLE.gapRatio;
  private rotationDuration = DEFAULT_RING_STYLE.rotationDuration;

  private readonly shape = new ShapeLayer('ring.arc');
  private readonly rotationLayer = new Layer('ring.rotation');
  private didBuild = false;

  apply(style: RingStyle): void {
    this.lineWidth = style.lineWidth;
    this.strokeColor = style.strokeColor;
    this.gapRatio = style.gapRatio;
    this.rotationDuration = style.rotationDuration;
  }

  hostLayer(_host: LayoutHost): Layer {
    return this.rotationLayer;
  }

  build(host: LayoutHost): void {
    if (this.didBuild) return;
    host.layer.addSublayer(this.rotationLayer);
    this.rotationLayer.addSublayer(this.shape);

    this.shape.fillColor = null;
    this.shape.strokeColor = this.strokeColor;
    this.shape.lineCap = 'round';
    this.shape.lineWidth = this.lineWidth;

    this.didBuild = true;
    logger.debug({ strategy: 'ring' }, 'Built layer tree');
  }

  layout(host: LayoutHost): void {
    if (!this.didBuild) return;

    const bounds = localBounds(host.bounds);
    this.rotationLayer.frame = bounds;

    const side = Math.min(bounds.width, bounds.height);
    const { startAngle, endAngle } = ringArcAngles(this.gapRatio);

    this.shape.frame = { ...bounds };
    this.shape.path = arcPath(rectCenter(bounds), (side - this.lineWidth) / 2, startAngle, endAngle);
    this.shape.lineWidth = this.lineWidth;
    this.shape.strokeColor = this.strokeColor;
  }

  makeAnimation(_host: LayoutHost): AnimationDescription {
    return basicAnimation('transform.rotation.z', 0, 2 * Math.PI, {
      duration: this.rotationDuration,
      repeatCount: Number.POSITIVE_INFINITY,
      timingFunction: 'linear',
    });
  }
}
