/**
 * Geometry primitives shared by every ring generator.
 *
 * Angles are in radians unless a name says otherwise. Coordinates follow the
 * browser convention: y grows downward, so increasing angles sweep clockwise
 * on screen.
 */

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/**
 * An angular interval `[start, end)` of a ring.
 */
export interface Span {
  readonly start: number;
  readonly end: number;
}

/**
 * A span with a winding direction.
 * `counterclockwise` has canvas semantics: `false` sweeps toward increasing angles.
 */
export interface Arc extends Span {
  readonly counterclockwise: boolean;
}

export type PathCommand =
  | { readonly type: 'move'; readonly to: Point }
  | { readonly type: 'line'; readonly to: Point }
  | {
      readonly type: 'arc';
      readonly center: Point;
      readonly radius: number;
      readonly startAngle: number;
      readonly endAngle: number;
      readonly counterclockwise: boolean;
    }
  | {
      readonly type: 'cubic';
      readonly control1: Point;
      readonly control2: Point;
      readonly to: Point;
    }
  | { readonly type: 'close' };

export type PathCommandType = PathCommand['type'];

export type FillRule = 'nonzero' | 'evenodd';

/**
 * The result of every generator: an ordered command list plus the fill rule
 * the host must use to paint it.
 */
export interface ShapePath {
  readonly commands: readonly PathCommand[];
  readonly fillRule: FillRule;
}
