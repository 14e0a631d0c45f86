import {
  type AnimationDescription,
  animationGroup,
  basicAnimation,
  Layer,
  ReplicatorLayer,
} from '@loading-kit/layers';
import { WAVE_TRAVEL_MS } from '@loading-kit/shared';
import { z } from 'zod';
import { logger } from '../logger.js';
import type { LayoutHost, Strategy } from '../strategy.js';
import { buildDotRow, type DotRow, layoutDotRow, toDotRow } from './dot-row.js';

export const WaveDotsStyleSchema = z.object({
  /** Mode tag */
  kind: z.literal('waveDots').default('waveDots'),
  color: z.string().min(1).default('currentColor'),
  /** Colour each dot fades to at the top of its travel */
  secondaryColor: z.string().min(1).default('currentColor'),
  size: z.number().finite().default(8),
  count: z.number().int().default(5),
  spacing: z.number().finite().default(8),
  /** Vertical travel either side of the resting position, px */
  amplitude: z.number().finite().default(6),
  /** One up or down travel, milliseconds */
  duration: z.number().finite().default(WAVE_TRAVEL_MS),
});

export type WaveDotsStyle = z.infer<typeof WaveDotsStyleSchema>;

export const DEFAULT_WAVE_DOTS_STYLE: Readonly<WaveDotsStyle> = Object.freeze(WaveDotsStyleSchema.parse({}));

/**
 * A row of dots that bob up and down in sequence while fading between two
 * colours, giving a travelling wave.
 */
export class WaveDotsStrategy implements Strategy<WaveDotsStyle> {
  private row: DotRow = toDotRow(DEFAULT_WAVE_DOTS_STYLE);
  private secondaryColor = DEFAULT_WAVE_DOTS_STYLE.secondaryColor;
  private amplitude = DEFAULT_WAVE_DOTS_STYLE.amplitude;

  private readonly replicator = new ReplicatorLayer('wave.replicator');
  private readonly dotLayer = new Layer('wave.dot');
  private didBuild = false;

  apply(style: WaveDotsStyle): void {
    this.row = toDotRow(style);
    this.secondaryColor = style.secondaryColor;
    this.amplitude = style.amplitude;
  }

  hostLayer(_host: LayoutHost): Layer {
    return this.dotLayer;
  }

  build(host: LayoutHost): void {
    if (this.didBuild) return;
    buildDotRow(host.layer, this.replicator, this.dotLayer, this.row);
    this.didBuild = true;
    logger.debug({ strategy: 'waveDots', count: this.row.count }, 'Built layer tree');
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
        basicAnimation('transform.translation.y', this.amplitude, -this.amplitude, timing),
        basicAnimation('backgroundColor', this.row.color, this.secondaryColor, timing),
      ],
      timing
    );
  }
}
