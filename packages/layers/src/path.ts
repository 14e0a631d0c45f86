/**
 * Vector paths for shape layers and masks.
 *
 * Angles are radians, measured clockwise from the positive x axis in a y-down
 * coordinate space, so `-Math.PI / 2` is 12 o'clock.
 */

import { assertNever } from './assert-never.js';
import type { Point, Rect } from './geometry.js';

export interface ArcPath {
  kind: 'arc';
  center: Point;
  radius: number;
  startAngle: number;
  endAngle: number;
}

export interface RoundedRectPath {
  kind: 'roundedRect';
  rect: Rect;
  cornerRadius: number;
}

export type Path = ArcPath | RoundedRectPath;

const FULL_TURN = 2 * Math.PI;

export function arcPath(center: Point, radius: number, startAngle: number, endAngle: number): ArcPath {
  return { kind: 'arc', center, radius: Math.max(0, radius), startAngle, endAngle };
}

export function roundedRectPath(rect: Rect, cornerRadius: number): RoundedRectPath {
  return { kind: 'roundedRect', rect, cornerRadius: Math.max(0, cornerRadius) };
}

/** Clockwise angle covered by an arc */
export function arcSweep(path: ArcPath): number {
  return path.endAngle - path.startAngle;
}

function fmt(value: number): string {
  const rounded = Math.round(value * 1000) / 1000;
  return Object.is(rounded, -0) ? '0' : String(rounded);
}

function pointOnArc(center: Point, radius: number, angle: number): Point {
  return { x: center.x + radius * Math.cos(angle), y: center.y + radius * Math.sin(angle) };
}

function arcToSvg(path: ArcPath): string {
  const { center, radius, startAngle } = path;
  const sweep = Math.min(Math.max(arcSweep(path), 0), FULL_TURN);
  const start = pointOnArc(center, radius, startAngle);
  const end = pointOnArc(center, radius, startAngle + sweep);
  const r = fmt(radius);
  const from = `${fmt(start.x)} ${fmt(start.y)}`;
  const to = `${fmt(end.x)} ${fmt(end.y)}`;

  // An arc command whose endpoints coincide draws nothing, so a closed or
  // nearly closed circle is drawn as two half arcs
  if (sweep >= FULL_TURN || (sweep > Math.PI && from === to)) {
    const mid = pointOnArc(center, radius, startAngle + Math.PI);
    return `M ${from} A ${r} ${r} 0 1 1 ${fmt(mid.x)} ${fmt(mid.y)} A ${r} ${r} 0 1 1 ${from}`;
  }

  const largeArc = sweep > Math.PI ? 1 : 0;
  return `M ${from} A ${r} ${r} 0 ${largeArc} 1 ${to}`;
}

function roundedRectToSvg(path: RoundedRectPath): string {
  const { x, y, width, height } = path.rect;
  const r = Math.min(path.cornerRadius, width / 2, height / 2);
  if (r <= 0) {
    return `M ${fmt(x)} ${fmt(y)} H ${fmt(x + width)} V ${fmt(y + height)} H ${fmt(x)} Z`;
  }
  const right = x + width;
  const bottom = y + height;
  const rr = fmt(r);
  return [
    `M ${fmt(x + r)} ${fmt(y)}`,
    `H ${fmt(right - r)}`,
    `A ${rr} ${rr} 0 0 1 ${fmt(right)} ${fmt(y + r)}`,
    `V ${fmt(bottom - r)}`,
    `A ${rr} ${rr} 0 0 1 ${fmt(right - r)} ${fmt(bottom)}`,
    `H ${fmt(x + r)}`,
    `A ${rr} ${rr} 0 0 1 ${fmt(x)} ${fmt(bottom - r)}`,
    `V ${fmt(y + r)}`,
    `A ${rr} ${rr} 0 0 1 ${fmt(x + r)} ${fmt(y)}`,
    'Z',
  ].join(' ');
}

/**
 * SVG `d` attribute for a path. Coordinates are rounded to three decimals.
 */
export function toSvgPathData(path: Path): string {
  switch (path.kind) {
    case 'arc':
      return arcToSvg(path);
    case 'roundedRect':
      return roundedRectToSvg(path);
    default:
      return assertNever(path);
  }
}
