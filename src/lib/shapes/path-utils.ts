/**
 * Path output and inspection utilities
 *
 * Converts ring command lists into SVG path data or replays them onto any
 * Canvas 2D path sink (a rendering context or a Path2D).
 */

import type { PathCommand, Point, ShapePath } from '@/types/geometry';
import { TAU, pointOnCircle } from './geometry';
import { arcSweep } from './spans';

const SWEEP_EPSILON = 1e-9;

/**
 * The subset of the Canvas 2D path API that tracePath() draws with.
 * Both CanvasRenderingContext2D and Path2D satisfy it.
 */
export type PathSink = Pick<CanvasPath, 'moveTo' | 'lineTo' | 'arc' | 'bezierCurveTo' | 'closePath'>;

function formatNumber(value: number): string {
  const rounded = Math.round(value * 1000) / 1000;
  return Object.is(rounded, -0) ? '0' : String(rounded);
}

function formatPoint(point: Point): string {
  return `${formatNumber(point.x)} ${formatNumber(point.y)}`;
}

function arcToSvg(command: Extract<PathCommand, { type: 'arc' }>): string[] {
  const { center, radius, startAngle, counterclockwise } = command;
  const sweep = arcSweep(startAngle, command.endAngle, counterclockwise);
  if (Math.abs(sweep) < SWEEP_EPSILON) return [];

  const r = formatNumber(radius);
  const sweepFlag = sweep > 0 ? 1 : 0;

  // A single SVG arc cannot describe a full turn: split it into two halves
  if (Math.abs(sweep) >= TAU - SWEEP_EPSILON) {
    const mid = pointOnCircle(center, radius, startAngle + sweep / 2);
    const end = pointOnCircle(center, radius, startAngle + sweep);
    return [
      `A ${r} ${r} 0 0 ${sweepFlag} ${formatPoint(mid)}`,
      `A ${r} ${r} 0 0 ${sweepFlag} ${formatPoint(end)}`,
    ];
  }

  const largeArc = Math.abs(sweep) > Math.PI ? 1 : 0;
  const end = pointOnCircle(center, radius, startAngle + sweep);
  return [`A ${r} ${r} 0 ${largeArc} ${sweepFlag} ${formatPoint(end)}`];
}

/**
 * Serialize a path as SVG path data (the `d` attribute).
 * Coordinates are rounded to three decimals.
 */
export function toSvgPath(path: ShapePath): string {
  const parts: string[] = [];

  for (const command of path.commands) {
    switch (command.type) {
      case 'move':
        parts.push(`M ${formatPoint(command.to)}`);
        break;
      case 'line':
        parts.push(`L ${formatPoint(command.to)}`);
        break;
      case 'cubic':
        parts.push(
          `C ${formatPoint(command.control1)} ${formatPoint(command.control2)} ${formatPoint(command.to)}`
        );
        break;
      case 'arc':
        parts.push(...arcToSvg(command));
        break;
      case 'close':
        parts.push('Z');
        break;
    }
  }

  return parts.join(' ');
}

/**
 * Replay a path onto a canvas context or Path2D.
 * Filling with `path.fillRule` is left to the caller.
 */
export function tracePath(sink: PathSink, path: ShapePath): void {
  for (const command of path.commands) {
    switch (command.type) {
      case 'move':
        sink.moveTo(command.to.x, command.to.y);
        break;
      case 'line':
        sink.lineTo(command.to.x, command.to.y);
        break;
      case 'cubic':
        sink.bezierCurveTo(
          command.control1.x,
          command.control1.y,
          command.control2.x,
          command.control2.y,
          command.to.x,
          command.to.y
        );
        break;
      case 'arc':
        sink.arc(
          command.center.x,
          command.center.y,
          command.radius,
          command.startAngle,
          command.endAngle,
          command.counterclockwise
        );
        break;
      case 'close':
        sink.closePath();
        break;
    }
  }
}

/**
 * On-curve points of a path: segment endpoints plus arc start and end points.
 * Bezier control points are excluded.
 */
export function anchorPoints(path: ShapePath): Point[] {
  const points: Point[] = [];
  for (const command of path.commands) {
    if (command.type === 'arc') {
      points.push(
        pointOnCircle(command.center, command.radius, command.startAngle),
        pointOnCircle(command.center, command.radius, command.endAngle)
      );
    } else if (command.type !== 'close') {
      points.push(command.to);
    }
  }
  return points;
}

export function countSubpaths(path: ShapePath): number {
  return path.commands.filter((command) => command.type === 'move').length;
}
