/**
 * Path construction
 *
 * Builds the portable command lists returned by every ring generator. The
 * builder follows Canvas 2D current-point rules so that a command list can be
 * replayed onto a canvas unchanged, but it makes every implicit segment
 * explicit: an arc that does not start at the current point is preceded by a
 * `line` (or a `move` when there is no current point).
 */

import type { FillRule, PathCommand, Point, ShapePath } from '@/types/geometry';
import { TAU, distance, pointOnCircle } from './geometry';

const JOIN_EPSILON = 1e-6;

export const EMPTY_PATH: ShapePath = { commands: [], fillRule: 'nonzero' };

export class PathBuilder {
  private readonly commands: PathCommand[] = [];
  private current: Point | null = null;

  moveTo(to: Point): this {
    return this.push({ type: 'move', to });
  }

  lineTo(to: Point): this {
    if (!this.current) return this.moveTo(to);
    return this.push({ type: 'line', to });
  }

  /**
   * Arc around `center` from `startAngle` to `endAngle`.
   * With `counterclockwise` false the arc sweeps toward increasing angles.
   */
  arc(center: Point, radius: number, startAngle: number, endAngle: number, counterclockwise = false): this {
    const start = pointOnCircle(center, radius, startAngle);
    if (!this.current) {
      this.moveTo(start);
    } else if (distance(this.current, start) > JOIN_EPSILON) {
      this.lineTo(start);
    }
    return this.push({ type: 'arc', center, radius, startAngle, endAngle, counterclockwise });
  }

  curveTo(control1: Point, control2: Point, to: Point): this {
    if (!this.current) this.moveTo(control1);
    return this.push({ type: 'cubic', control1, control2, to });
  }

  /**
   * Full circle as its own closed subpath, starting at angle 0.
   */
  circle(center: Point, radius: number): this {
    this.moveTo(pointOnCircle(center, radius, 0));
    this.push({ type: 'arc', center, radius, startAngle: 0, endAngle: TAU, counterclockwise: false });
    return this.close();
  }

  /**
   * Closes the open subpath. The next drawing command starts a new subpath.
   */
  close(): this {
    if (this.current) {
      this.commands.push({ type: 'close' });
      this.current = null;
    }
    return this;
  }

  addPath(path: ShapePath): this {
    for (const command of path.commands) {
      this.push(command);
    }
    return this;
  }

  get isEmpty(): boolean {
    return this.commands.length === 0;
  }

  build(fillRule: FillRule = 'nonzero'): ShapePath {
    return { commands: [...this.commands], fillRule };
  }

  private push(command: PathCommand): this {
    this.commands.push(command);
    this.current = endPoint(command);
    return this;
  }
}

/**
 * Where the pen rests after `command`; null once a subpath is closed.
 */
export function endPoint(command: PathCommand): Point | null {
  switch (command.type) {
    case 'move':
    case 'line':
    case 'cubic':
      return command.to;
    case 'arc':
      return pointOnCircle(command.center, command.radius, command.endAngle);
    case 'close':
      return null;
  }
}

/**
 * Combine paths into one compound path painted with the even-odd rule.
 *
 * Every non-empty input is closed, so overlapping contours cancel out: an
 * inset ring becomes a hole, spoke slots become cutouts. The boolean itself is
 * performed by the host (SVG `fill-rule`, canvas `fill(path, 'evenodd')`).
 */
export function composeEvenOdd(...paths: ShapePath[]): ShapePath {
  const builder = new PathBuilder();
  for (const path of paths) {
    if (path.commands.length === 0) continue;
    builder.addPath(path).close();
  }
  return builder.build('evenodd');
}

export function isEmptyPath(path: ShapePath): boolean {
  return path.commands.length === 0;
}
