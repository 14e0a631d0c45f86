import { describe, expect, it } from 'vitest';
import { createHost, onlyReplicator } from '../test-utils/host.js';
import { DEFAULT_WAVE_DOTS_STYLE, WaveDotsStrategy } from './wave-dots.js';

describe('WaveDotsStrategy', () => {
  it('does not insert layers twice', () => {
    const host = createHost();
    const strategy = new WaveDotsStrategy();

    strategy.build(host);
    strategy.build(host);

    expect(host.layer.sublayers).toHaveLength(1);
  });

  it('does nothing on layout before build', () => {
    const host = createHost();
    const strategy = new WaveDotsStrategy();

    strategy.layout(host);

    expect(host.layer.sublayers).toHaveLength(0);
  });

  it('lays the row out like the dots strategy', () => {
    const host = createHost(100, 40);
    const strategy = new WaveDotsStrategy();
    strategy.build(host);

    strategy.layout(host);

    // 5 dots of 8 with 8 between: 72 wide
    expect(strategy.hostLayer(host).frame).toEqual({ x: 14, y: 16, width: 8, height: 8 });
    expect(onlyReplicator(host).instanceTranslation).toEqual({ x: 16, y: 0 });
  });

  it.each([
    [0, 400],
    [1, 400],
    [5, 80],
    [100, 4],
  ])('staggers %i dots by %ims', (count, expected) => {
    const host = createHost();
    const strategy = new WaveDotsStrategy();
    strategy.apply({ ...DEFAULT_WAVE_DOTS_STYLE, count, duration: 400 });

    strategy.build(host);

    expect(onlyReplicator(host).instanceDelay).toBe(expected);
  });

  it('bobs either side of rest while fading between colours', () => {
    const strategy = new WaveDotsStrategy();
    strategy.apply({ ...DEFAULT_WAVE_DOTS_STYLE, color: 'black', secondaryColor: 'red', amplitude: 10 });

    const animation = strategy.makeAnimation(createHost());

    if (animation.kind !== 'group') throw new Error('Expected a group');
    expect(animation.repeatCount).toBe(Number.POSITIVE_INFINITY);
    expect(animation.animations.map(({ keyPath, from, to }) => ({ keyPath, from, to }))).toEqual([
      { keyPath: 'transform.translation.y', from: 10, to: -10 },
      { keyPath: 'backgroundColor', from: 'black', to: 'red' },
    ]);
    for (const child of animation.animations) {
      expect(child.autoreverses).toBe(true);
      expect(child.timingFunction).toBe('easeInEaseOut');
      expect(child.duration).toBe(400);
    }
  });
});
