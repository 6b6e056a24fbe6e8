/**
 * Span and arc value helpers
 */

import type { Arc, Span } from '@/types/geometry';
import { TAU } from './geometry';

export const EMPTY_ARC: Arc = { start: 0, end: 0, counterclockwise: false };
export const FULL_CIRCLE_ARC: Arc = { start: 0, end: TAU, counterclockwise: false };

export function makeSpan(start: number, end: number): Span {
  return { start, end };
}

export function makeArc(start: number, end: number, counterclockwise = false): Arc {
  return { start, end, counterclockwise };
}

/**
 * Returns a new arc rotated by `angle`, keeping its winding.
 */
export function offsetArc(arc: Arc, angle: number): Arc {
  return { start: arc.start + angle, end: arc.end + angle, counterclockwise: arc.counterclockwise };
}

export function spanWidth(span: Span): number {
  return span.end - span.start;
}

/**
 * Flatten spans into the raw `[start0, end0, start1, end1, ...]` form used by
 * the notch rings.
 */
export function flattenSpans(spans: readonly Span[]): number[] {
  return spans.flatMap((span) => [span.start, span.end]);
}

/**
 * Signed angle swept when drawing from `start` to `end`.
 *
 * Matches `CanvasRenderingContext2D.arc`: a difference of a full turn or more
 * in the drawing direction is a full circle, anything else wraps modulo 2π.
 */
export function arcSweep(start: number, end: number, counterclockwise: boolean): number {
  const delta = counterclockwise ? start - end : end - start;
  if (delta >= TAU) {
    return counterclockwise ? -TAU : TAU;
  }
  const wrapped = ((delta % TAU) + TAU) % TAU;
  return counterclockwise ? -wrapped : wrapped;
}
