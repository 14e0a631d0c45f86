import { arcSweep, ShapeLayer, ZERO_RECT } from '@loading-kit/layers';
import { describe, expect, it } from 'vitest';
import type { LayoutHost } from '../strategy.js';
import { createHost } from '../test-utils/host.js';
import { clampGapRatio, DEFAULT_RING_STYLE, RingStrategy, ringArcAngles } from './ring.js';

function arcOf(strategy: RingStrategy, host: LayoutHost): ShapeLayer {
  const [shape] = strategy.hostLayer(host).sublayers;
  if (!(shape instanceof ShapeLayer)) throw new Error('Expected the arc shape layer');
  return shape;
}

describe('clampGapRatio', () => {
  it('keeps the gap within [0, 0.95]', () => {
    expect(clampGapRatio(-1)).toBe(0);
    expect(clampGapRatio(0.3)).toBe(0.3);
    expect(clampGapRatio(1)).toBe(0.95);
    expect(clampGapRatio(Number.NaN)).toBe(0);
  });
});

describe('ringArcAngles', () => {
  it('starts at 12 o\'clock', () => {
    expect(ringArcAngles(0.25).startAngle).toBe(-Math.PI / 2);
  });

  it('spans the full circle without a gap', () => {
    const { startAngle, endAngle } = ringArcAngles(0);

    expect(endAngle - startAngle).toBeCloseTo(2 * Math.PI, 10);
  });

  it('spans 5% of the circle at the clamp boundary', () => {
    const { startAngle, endAngle } = ringArcAngles(0.95);

    expect(endAngle - startAngle).toBeCloseTo(0.05 * 2 * Math.PI, 10);
  });

  it('never spans less than 5%', () => {
    const { startAngle, endAngle } = ringArcAngles(3);

    expect(endAngle - startAngle).toBeCloseTo(0.05 * 2 * Math.PI, 10);
  });
});

describe('RingStrategy', () => {
  it('nests the arc in the rotation layer once', () => {
    const host = createHost();
    const strategy = new RingStrategy();

    strategy.build(host);
    strategy.build(host);

    expect(host.layer.sublayers).toEqual([strategy.hostLayer(host)]);
    expect(strategy.hostLayer(host).sublayers).toHaveLength(1);
  });

  it('does nothing on layout before build', () => {
    const host = createHost();
    const strategy = new RingStrategy();

    strategy.layout(host);

    expect(host.layer.sublayers).toHaveLength(0);
    expect(strategy.hostLayer(host).frame).toEqual(ZERO_RECT);
  });

  it('fits the arc inside the shorter side', () => {
    const host = createHost(40, 32);
    const strategy = new RingStrategy();
    strategy.apply({ ...DEFAULT_RING_STYLE, lineWidth: 4, strokeColor: 'navy' });
    strategy.build(host);

    strategy.layout(host);

    const arc = arcOf(strategy, host);
    expect(strategy.hostLayer(host).frame).toEqual({ x: 0, y: 0, width: 40, height: 32 });
    expect(arc.path).toMatchObject({ kind: 'arc', center: { x: 20, y: 16 }, radius: 14 });
    expect(arc.lineWidth).toBe(4);
    expect(arc.strokeColor).toBe('navy');
    expect(arc.fillColor).toBeNull();
    expect(arc.lineCap).toBe('round');
  });

  it('leaves the configured gap unstroked', () => {
    const host = createHost(32, 32);
    const strategy = new RingStrategy();
    strategy.build(host);

    strategy.layout(host);

    const { path } = arcOf(strategy, host);
    if (path?.kind !== 'arc') throw new Error('Expected an arc');
    expect(arcSweep(path)).toBeCloseTo(0.75 * 2 * Math.PI, 10);
  });

  it('spins one full turn per rotation duration', () => {
    const strategy = new RingStrategy();

    expect(strategy.makeAnimation(createHost())).toEqual({
      kind: 'basic',
      keyPath: 'transform.rotation.z',
      from: 0,
      to: 2 * Math.PI,
      duration: 900,
      autoreverses: false,
      repeatCount: Number.POSITIVE_INFINITY,
      timingFunction: 'linear',
    });
  });
});
