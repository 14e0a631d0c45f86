import {
  type AnimationDescription,
  animationGroup,
  basicAnimation,
  Layer,
  ReplicatorLayer,
} from '@loading-kit/layers';
import { DOTS_PULSE_MS } from '@loading-kit/shared';
import { z } from 'zod';
import { logger } from '../logger.js';
import type { LayoutHost, Strategy } from '../strategy.js';
import { buildDotRow, type DotRow, layoutDotRow, toDotRow } from './dot-row.js';

export const DotsStyleSchema = z.object({
  /** Mode tag */
  kind: z.literal('dots').default('dots'),
  /** Dot colour */
  color: z.string().min(1).default('currentColor'),
  /** Diameter of each dot, px */
  size: z.number().finite().default(8),
  count: z.number().int().default(3),
  /** Gap between neighbouring dots, px */
  spacing: z.number().finite().default(10),
  /** One pulse, milliseconds */
  duration: z.number().finite().default(DOTS_PULSE_MS),
});

export type DotsStyle = z.infer<typeof DotsStyleSchema>;

export const DEFAULT_DOTS_STYLE: Readonly<DotsStyle> = Object.freeze(DotsStyleSchema.parse({}));

const PULSE_SCALE = { from: 0.6, to: 1 } as const;
const PULSE_OPACITY = { from: 0.3, to: 1 } as const;

/**
 * A row of dots that pulse in scale and opacity one after another.
 */
export class DotsStrategy implements Strategy<DotsStyle> {
  private row: DotRow = toDotRow(DEFAULT_DOTS_STYLE);

  private readonly replicator = new ReplicatorLayer('dots.replicator');
  private readonly dotLayer = new Layer('dots.dot');
  private didBuild = false;

  apply(style: DotsStyle): void {
    this.row = toDotRow(style);
  }

  hostLayer(_host: LayoutHost): Layer {
    return this.dotLayer;
  }

  build(host: LayoutHost): void {
    if (this.didBuild) return;
    buildDotRow(host.layer, this.replicator, this.dotLayer, this.row);
    this.didBuild = true;
    logger.debug({ strategy: 'dots', count: this.row.count }, 'Built layer tree');
  }

  layout(host: LayoutHost): void {
    if (!this.didBuild) return;
    layoutDotRow(host.bounds, this.replicator, this.dotLayer, this.row);
  }

  makeAnimation(_host: LayoutHost): AnimationDescription {
    const timing = {
      duration: this.row.duration,
      autoreverses: true,
      repeatCount: Number.POSITIVE_INFINITY,
      timingFunction: 'easeInEaseOut',
    } as const;

    return animationGroup(
      [
        basicAnimation('transform.scale', PULSE_SCALE.from, PULSE_SCALE.to, timing),
        basicAnimation('opacity', PULSE_OPACITY.from, PULSE_OPACITY.to, timing),
      ],
      timing
    );
  }
}
