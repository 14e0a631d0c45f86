/**
 * Translation of layer animation descriptions into Web Animations keyframes.
 */

import {
  type AnimationDescription,
  type AnimationValue,
  assertNever,
  type BasicAnimation,
  type GradientLayer,
  leafAnimations,
  type Point,
  type TimingFunction,
} from '@loading-kit/layers';

/** Number of steps a `locations` sweep is sampled into */
export const GRADIENT_SAMPLES = 30;

const EASING: Record<TimingFunction, string> = {
  linear: 'linear',
  easeIn: 'ease-in',
  easeOut: 'ease-out',
  easeInEaseOut: 'ease-in-out',
};

export interface WebAnimation {
  keyframes: Keyframe[];
  options: KeyframeAnimationOptions;
}

export interface WebAnimationContext {
  /** Becomes the `id` of every produced animation */
  key: string;
  /** Start delay, milliseconds */
  delay?: number;
  /** Colours and direction for `locations` animations */
  gradient?: Pick<GradientLayer, 'colors' | 'startPoint' | 'endPoint'>;
}

function fmt(value: number): string {
  const rounded = Math.round(value * 1000) / 1000;
  return Object.is(rounded, -0) ? '0' : String(rounded);
}

function numberValue(animation: BasicAnimation, value: AnimationValue): number {
  if (typeof value !== 'number') {
    throw new TypeError(`${animation.keyPath} animates numbers, got ${JSON.stringify(value)}`);
  }
  return value;
}

function stopsValue(animation: BasicAnimation, value: AnimationValue): readonly number[] {
  if (typeof value === 'number' || typeof value === 'string') {
    throw new TypeError(`${animation.keyPath} animates stop lists, got ${JSON.stringify(value)}`);
  }
  return value;
}

/** CSS angle of the line from `start` to `end`, in unit coordinates with y pointing down */
export function gradientAngle(start: Point, end: Point): number {
  const degrees = (Math.atan2(end.x - start.x, start.y - end.y) * 180) / Math.PI;
  return degrees < 0 ? degrees + 360 : degrees;
}

/**
 * CSS `linear-gradient()` for colours at the given stops. Stops outside
 * [0, 1] are kept; CSS places them beyond the box edge.
 */
export function linearGradient(
  colors: readonly string[],
  locations: readonly number[] | null,
  start: Point,
  end: Point
): string {
  const stops = colors.map((color, index) => {
    const location = locations?.[index];
    return location === undefined ? color : `${color} ${fmt(location * 100)}%`;
  });
  return `linear-gradient(${fmt(gradientAngle(start, end))}deg, ${stops.join(', ')})`;
}

function sampleLocations(
  animation: BasicAnimation,
  gradient: NonNullable<WebAnimationContext['gradient']>
): Keyframe[] {
  const from = stopsValue(animation, animation.from);
  const to = stopsValue(animation, animation.to);
  const keyframes: Keyframe[] = [];

  for (let step = 0; step <= GRADIENT_SAMPLES; step++) {
    const t = step / GRADIENT_SAMPLES;
    const locations = from.map((stop, index) => stop + ((to[index] ?? stop) - stop) * t);
    keyframes.push({
      offset: t,
      backgroundImage: linearGradient(gradient.colors, locations, gradient.startPoint, gradient.endPoint),
    });
  }
  return keyframes;
}

function keyframesFor(animation: BasicAnimation, context: WebAnimationContext): Keyframe[] | null {
  const { keyPath } = animation;
  switch (keyPath) {
    case 'transform.scale':
      return [animation.from, animation.to].map((value) => ({
        transform: `scale(${fmt(numberValue(animation, value))})`,
      }));
    case 'transform.rotation.z':
      return [animation.from, animation.to].map((value) => ({
        transform: `rotate(${fmt(numberValue(animation, value))}rad)`,
      }));
    case 'transform.translation.y':
      return [animation.from, animation.to].map((value) => ({
        transform: `translateY(${fmt(numberValue(animation, value))}px)`,
      }));
    case 'opacity':
      return [animation.from, animation.to].map((value) => ({ opacity: numberValue(animation, value) }));
    case 'backgroundColor':
      return [animation.from, animation.to].map((value) => ({ backgroundColor: String(value) }));
    case 'locations':
      return context.gradient ? sampleLocations(animation, context.gradient) : null;
    default:
      return assertNever(keyPath);
  }
}

/**
 * One Web Animation per leaf of `description`, each with its own timing.
 *
 * A forward pass followed by its reverse counts as one repeat, so
 * autoreversing animations play twice as many alternate iterations.
 * `locations` animations are skipped when no gradient is given.
 */
export function toWebAnimations(description: AnimationDescription, context: WebAnimationContext): WebAnimation[] {
  const result: WebAnimation[] = [];

  for (const animation of leafAnimations(description)) {
    const keyframes = keyframesFor(animation, context);
    if (!keyframes) continue;

    result.push({
      keyframes,
      options: {
        id: context.key,
        duration: animation.duration,
        delay: context.delay ?? 0,
        iterations: animation.autoreverses ? animation.repeatCount * 2 : animation.repeatCount,
        direction: animation.autoreverses ? 'alternate' : 'normal',
        easing: EASING[animation.timingFunction],
      },
    });
  }
  return result;
}
