import type { AnimationDescription, Layer, Rect } from '@loading-kit/layers';

/**
 * What a strategy sees of the element hosting it: the layer its own layers
 * are inserted under, and that element's bounds.
 */
export interface LayoutHost {
  readonly layer: Layer;
  readonly bounds: Rect;
}

/**
 * One loading animation.
 *
 * A strategy is owned by exactly one host. It mirrors the last style it was
 * given, builds its layer tree once, and recomputes geometry on every layout
 * pass.
 */
export interface Strategy<TStyle> {
  /** The layer the running animation is attached to */
  hostLayer(host: LayoutHost): Layer;

  /** Insert the strategy's layers under `host.layer`. Idempotent. */
  build(host: LayoutHost): void;

  /** Recompute geometry from `host.bounds`. Does nothing before `build`. */
  layout(host: LayoutHost): void;

  /** Describe the animation for the mirrored style. Has no side effects. */
  makeAnimation(host: LayoutHost): AnimationDescription;

  /** Mirror every field of `style`. The caller requests the next layout pass. */
  apply(style: Readonly<TStyle>): void;
}
