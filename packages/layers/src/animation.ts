/**
 * Declarative animation descriptions.
 *
 * A description is a plain value handed to the host once per start; the host
 * interpolates it on its own schedule. Nothing here ticks.
 */

/**
 * Animatable properties.
 *
 * - `transform.scale`, `transform.rotation.z` (radians) and
 *   `transform.translation.y` (px, relative to the layer's resting position)
 *   take numbers.
 * - `opacity` takes a number in [0, 1].
 * - `backgroundColor` takes CSS colour strings.
 * - `locations` takes gradient stop positions; values outside [0, 1] are valid
 *   and place a stop beyond the layer's edge.
 */
export type AnimatableKeyPath =
  | 'transform.scale'
  | 'transform.rotation.z'
  | 'transform.translation.y'
  | 'opacity'
  | 'backgroundColor'
  | 'locations';

export type AnimationValue = number | string | readonly number[];

export type TimingFunction = 'linear' | 'easeIn' | 'easeOut' | 'easeInEaseOut';

interface Timing {
  /** Duration of one forward pass, milliseconds */
  duration: number;
  /** Play backwards after each forward pass */
  autoreverses: boolean;
  /** `Infinity` loops until removed */
  repeatCount: number;
  timingFunction: TimingFunction;
}

export interface BasicAnimation extends Timing {
  kind: 'basic';
  keyPath: AnimatableKeyPath;
  from: AnimationValue;
  to: AnimationValue;
}

export interface AnimationGroup extends Timing {
  kind: 'group';
  animations: readonly BasicAnimation[];
}

export type AnimationDescription = BasicAnimation | AnimationGroup;

export type TimingOptions = Partial<Timing> & Pick<Timing, 'duration'>;

const DEFAULT_TIMING: Omit<Timing, 'duration'> = {
  autoreverses: false,
  repeatCount: 1,
  timingFunction: 'linear',
};

export function basicAnimation(
  keyPath: AnimatableKeyPath,
  from: AnimationValue,
  to: AnimationValue,
  timing: TimingOptions
): BasicAnimation {
  return { kind: 'basic', keyPath, from, to, ...DEFAULT_TIMING, ...timing };
}

export function animationGroup(animations: readonly BasicAnimation[], timing: TimingOptions): AnimationGroup {
  return { kind: 'group', animations, ...DEFAULT_TIMING, ...timing };
}

/** Flatten a description to the basic animations the host plays */
export function leafAnimations(description: AnimationDescription): readonly BasicAnimation[] {
  return description.kind === 'group' ? description.animations : [description];
}
