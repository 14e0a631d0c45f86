/**
 * @loading-kit/layers - retained render tree and declarative animation values.
 *
 * The core strategies build and mutate these objects; a host backend such as
 * `@loading-kit/dom` turns them into pixels.
 *
 * @module
 */

export {
  type AnimatableKeyPath,
  type AnimationDescription,
  type AnimationGroup,
  type AnimationValue,
  animationGroup,
  type BasicAnimation,
  basicAnimation,
  leafAnimations,
  type TimingFunction,
  type TimingOptions,
} from './animation.js';
export { assertNever } from './assert-never.js';
export {
  localBounds,
  type Point,
  type Rect,
  rectCenter,
  rectsEqual,
  type Size,
  ZERO_RECT,
} from './geometry.js';
export { GradientLayer, Layer, type LineCap, ReplicatorLayer, ShapeLayer } from './layer.js';
export {
  type ArcPath,
  arcPath,
  arcSweep,
  type Path,
  type RoundedRectPath,
  roundedRectPath,
  toSvgPathData,
} from './path.js';
