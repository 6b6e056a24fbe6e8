/**
 * Angle and radius helpers shared by the ring generators.
 */

import type { Point, Rect } from '@/types/geometry';

export const TAU = Math.PI * 2;

/**
 * Largest axis-aligned square centered within `rect`.
 * Every ring generator reduces its bounds to this square first so that
 * radius-based math does not depend on the aspect ratio.
 */
export function centeredSquare(rect: Rect): Rect {
  const dim = Math.min(rect.width, rect.height);
  const dx = (rect.width - dim) / 2;
  const dy = (rect.height - dim) / 2;
  return { x: rect.x + dx, y: rect.y + dy, width: dim, height: dim };
}

export function rectCenter(rect: Rect): Point {
  return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}

/**
 * Shrink `rect` by `dx` on the left and right and `dy` on the top and bottom.
 * Sizes never go below zero; the center is preserved.
 */
export function insetRect(rect: Rect, dx: number, dy: number = dx): Rect {
  const width = Math.max(0, rect.width - dx * 2);
  const height = Math.max(0, rect.height - dy * 2);
  const center = rectCenter(rect);
  return { x: center.x - width / 2, y: center.y - height / 2, width, height };
}

export function pointOnCircle(center: Point, radius: number, angle: number): Point {
  return {
    x: center.x + radius * Math.cos(angle),
    y: center.y + radius * Math.sin(angle),
  };
}

/**
 * The two points at `distance` along the tangent of the circle at `angle`.
 *
 * The first point lies in the direction of increasing angle, `(-sin a, cos a)`,
 * the second in the opposite direction.
 */
export function tangentPoints(
  center: Point,
  radius: number,
  angle: number,
  distance: number
): [forward: Point, backward: Point] {
  const onCircle = pointOnCircle(center, radius, angle);
  const tx = -Math.sin(angle) * distance;
  const ty = Math.cos(angle) * distance;
  return [
    { x: onCircle.x + tx, y: onCircle.y + ty },
    { x: onCircle.x - tx, y: onCircle.y - ty },
  ];
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Clamp a ratio into `[min, max]`. NaN falls back to `min`.
 */
export function clampRatio(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.max(min, Math.min(value, max));
}

/**
 * Floor a count and clamp it into `[min, max]`. NaN falls back to `min`, and so
 * does +Infinity when there is no finite `max`.
 */
export function clampCount(value: number, min: number, max: number = Number.POSITIVE_INFINITY): number {
  if (!Number.isFinite(value)) {
    return value > 0 && Number.isFinite(max) ? max : min;
  }
  return Math.max(min, Math.min(Math.floor(value), max));
}
