/**
 * Start/stop lifecycle shared by anything that hosts a loading animation.
 *
 * "Animating" is not stored: it means an animation is attached to the host
 * layer under `animationKey`, so it stays correct when something else removes
 * the animation.
 */

import type { AnimationDescription, Layer } from '@loading-kit/layers';

export const DEFAULT_ANIMATION_KEY = 'loading.anim';
export const LOADING_ACCESSIBILITY_LABEL = 'Loading';

export type AccessibilityTrait = 'updatesFrequently';

export interface AccessibilityState {
  /** Exposed to assistive technology */
  isElement: boolean;
  label: string | null;
  traits: ReadonlySet<AccessibilityTrait>;
}

export interface LoadingAnimatable {
  readonly animationHostLayer: Layer;
  readonly animationKey: string;
  accessibility: AccessibilityState;
  buildLayersIfNeeded(): void;
  makeAnimation(): AnimationDescription;
}

export function isAnimating(target: LoadingAnimatable): boolean {
  return target.animationHostLayer.animation(target.animationKey) !== undefined;
}

/**
 * Build if needed and attach a fresh animation. The first activation also
 * announces the element as a frequently updating status.
 *
 * @returns false when an animation was already attached
 */
export function startAnimating(target: LoadingAnimatable): boolean {
  if (isAnimating(target)) return false;

  target.buildLayersIfNeeded();
  target.animationHostLayer.addAnimation(target.makeAnimation(), target.animationKey);

  if (!target.accessibility.isElement) {
    target.accessibility = {
      isElement: true,
      label: LOADING_ACCESSIBILITY_LABEL,
      traits: new Set<AccessibilityTrait>([...target.accessibility.traits, 'updatesFrequently']),
    };
  }
  return true;
}

/**
 * @returns false when nothing was attached
 */
export function stopAnimating(target: LoadingAnimatable): boolean {
  if (!isAnimating(target)) return false;
  return target.animationHostLayer.removeAnimation(target.animationKey);
}
