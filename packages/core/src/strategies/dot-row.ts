/**
 * Shared layout for strategies that draw a horizontal row of dots as one
 * prototype dot copied by a replicator.
 */

import type { Layer, Rect, ReplicatorLayer } from '@loading-kit/layers';

export interface DotRow {
  color: string;
  size: number;
  count: number;
  spacing: number;
  /** Cycle length of one dot, milliseconds */
  duration: number;
}

/** Pick the row fields out of a larger style */
export function toDotRow(style: DotRow): DotRow {
  return {
    color: style.color,
    size: style.size,
    count: style.count,
    spacing: style.spacing,
    duration: style.duration,
  };
}

/** Width of `count` dots of diameter `size` separated by `spacing` */
export function rowWidth(count: number, size: number, spacing: number): number {
  return count * size + (count - 1) * spacing;
}

/**
 * Start offset between neighbouring dots. Spreads one cycle across the row;
 * counts below one divide by one.
 */
export function replicationStagger(duration: number, count: number): number {
  return duration / Math.max(count, 1);
}

function configure(replicator: ReplicatorLayer, dot: Layer, row: DotRow): void {
  dot.backgroundColor = row.color;
  dot.cornerRadius = row.size / 2;
  replicator.instanceCount = row.count;
  replicator.instanceDelay = replicationStagger(row.duration, row.count);
  replicator.instanceTranslation = { x: row.size + row.spacing, y: 0 };
}

export function buildDotRow(parent: Layer, replicator: ReplicatorLayer, dot: Layer, row: DotRow): void {
  parent.addSublayer(replicator);
  replicator.addSublayer(dot);
  configure(replicator, dot, row);
}

/** Centre the row in `bounds` and re-apply the style in case it changed after build */
export function layoutDotRow(bounds: Rect, replicator: ReplicatorLayer, dot: Layer, row: DotRow): void {
  replicator.frame = { ...bounds };

  const totalWidth = rowWidth(row.count, row.size, row.spacing);
  dot.frame = {
    x: (bounds.width - totalWidth) / 2,
    y: (bounds.height - row.size) / 2,
    width: row.size,
    height: row.size,
  };

  configure(replicator, dot, row);
}
