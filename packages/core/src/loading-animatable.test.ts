import { basicAnimation, Layer } from '@loading-kit/layers';
import { describe, expect, it, vi } from 'vitest';
import {
  type AccessibilityState,
  type AccessibilityTrait,
  DEFAULT_ANIMATION_KEY,
  isAnimating,
  type LoadingAnimatable,
  startAnimating,
  stopAnimating,
} from './loading-animatable.js';

function createTarget(
  accessibility: AccessibilityState = { isElement: false, label: null, traits: new Set<AccessibilityTrait>() }
) {
  const target = {
    animationHostLayer: new Layer('host'),
    animationKey: DEFAULT_ANIMATION_KEY,
    accessibility,
    buildLayersIfNeeded: vi.fn(),
    makeAnimation: vi.fn(() => basicAnimation('opacity', 0, 1, { duration: 100 })),
  } satisfies LoadingAnimatable;
  return target;
}

describe('loading lifecycle', () => {
  it('starts idle', () => {
    expect(isAnimating(createTarget())).toBe(false);
  });

  it('builds and attaches one animation under the reserved key', () => {
    const target = createTarget();

    expect(startAnimating(target)).toBe(true);

    expect(target.buildLayersIfNeeded).toHaveBeenCalledTimes(1);
    expect(target.animationHostLayer.animationKeys()).toEqual(['loading.anim']);
    expect(isAnimating(target)).toBe(true);
  });

  it('ignores start while animating', () => {
    const target = createTarget();
    startAnimating(target);

    expect(startAnimating(target)).toBe(false);

    expect(target.makeAnimation).toHaveBeenCalledTimes(1);
    expect(target.animationHostLayer.animationKeys()).toEqual(['loading.anim']);
  });

  it('detaches on stop', () => {
    const target = createTarget();
    startAnimating(target);

    expect(stopAnimating(target)).toBe(true);

    expect(isAnimating(target)).toBe(false);
    expect(target.animationHostLayer.animationKeys()).toEqual([]);
  });

  it('ignores stop while idle', () => {
    expect(stopAnimating(createTarget())).toBe(false);
  });

  it('notices an animation removed by someone else', () => {
    const target = createTarget();
    startAnimating(target);

    target.animationHostLayer.removeAllAnimations();

    expect(isAnimating(target)).toBe(false);
    expect(startAnimating(target)).toBe(true);
  });

  it('leaves other keys alone', () => {
    const target = createTarget();
    target.animationHostLayer.addAnimation(basicAnimation('opacity', 1, 0, { duration: 50 }), 'fade');
    startAnimating(target);

    stopAnimating(target);

    expect(target.animationHostLayer.animationKeys()).toEqual(['fade']);
  });

  describe('accessibility', () => {
    it('announces a frequently updating loading status on first start', () => {
      const target = createTarget();

      startAnimating(target);

      expect(target.accessibility.isElement).toBe(true);
      expect(target.accessibility.label).toBe('Loading');
      expect([...target.accessibility.traits]).toEqual(['updatesFrequently']);
    });

    it('keeps settings made by the host', () => {
      const custom: AccessibilityState = { isElement: true, label: 'Fetching results', traits: new Set() };
      const target = createTarget(custom);

      startAnimating(target);

      expect(target.accessibility).toBe(custom);
    });

    it('is not reset by stop', () => {
      const target = createTarget();
      startAnimating(target);

      stopAnimating(target);

      expect(target.accessibility.label).toBe('Loading');
    });
  });
});
