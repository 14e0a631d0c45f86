import { describe, expect, it } from 'vitest';
import { arcPath, arcSweep, roundedRectPath, toSvgPathData } from './path.js';

describe('arcPath', () => {
  it('floors a negative radius at zero', () => {
    expect(arcPath({ x: 0, y: 0 }, -4, 0, 1).radius).toBe(0);
  });

  it('reports the clockwise sweep', () => {
    const path = arcPath({ x: 0, y: 0 }, 5, -Math.PI / 2, Math.PI);

    expect(arcSweep(path)).toBeCloseTo(1.5 * Math.PI);
  });
});

describe('toSvgPathData', () => {
  it('draws a quarter arc with the small-arc flag', () => {
    const path = arcPath({ x: 10, y: 10 }, 5, -Math.PI / 2, 0);

    expect(toSvgPathData(path)).toBe('M 10 5 A 5 5 0 0 1 15 10');
  });

  it('sets the large-arc flag past half a turn', () => {
    const path = arcPath({ x: 0, y: 0 }, 5, -Math.PI / 2, Math.PI);

    expect(toSvgPathData(path)).toBe('M 0 -5 A 5 5 0 1 1 -5 0');
  });

  it('splits a full circle into two half arcs', () => {
    const path = arcPath({ x: 10, y: 10 }, 5, 0, 2 * Math.PI);

    expect(toSvgPathData(path)).toBe('M 15 10 A 5 5 0 1 1 5 10 A 5 5 0 1 1 15 10');
  });

  it('closes a circle whose gap is smaller than the output precision', () => {
    const path = arcPath({ x: 16, y: 16 }, 14.5, -Math.PI / 2, -Math.PI / 2 + 2 * Math.PI * (1 - 1e-6));

    expect(toSvgPathData(path)).toBe('M 16 1.5 A 14.5 14.5 0 1 1 16 30.5 A 14.5 14.5 0 1 1 16 1.5');
  });

  it('draws rounded corners', () => {
    const path = roundedRectPath({ x: 0, y: 0, width: 20, height: 10 }, 3);

    expect(toSvgPathData(path)).toBe(
      'M 3 0 H 17 A 3 3 0 0 1 20 3 V 7 A 3 3 0 0 1 17 10 H 3 A 3 3 0 0 1 0 7 V 3 A 3 3 0 0 1 3 0 Z'
    );
  });

  it('limits the corner radius to half the shorter side', () => {
    const path = roundedRectPath({ x: 0, y: 0, width: 20, height: 10 }, 50);

    expect(toSvgPathData(path)).toBe(
      'M 5 0 H 15 A 5 5 0 0 1 20 5 V 5 A 5 5 0 0 1 15 10 H 5 A 5 5 0 0 1 0 5 V 5 A 5 5 0 0 1 5 0 Z'
    );
  });

  it('draws square corners without a radius', () => {
    const path = roundedRectPath({ x: 0, y: 0, width: 20, height: 10 }, 0);

    expect(toSvgPathData(path)).toBe('M 0 0 H 20 V 10 H 0 Z');
  });
});
