import { expect } from 'vitest';
import type { PathCommand, PathCommandType, Point, ShapePath } from '@/types/geometry';

export function commandTypes(path: ShapePath): PathCommandType[] {
  return path.commands.map((command) => command.type);
}

export function commandsOfType<T extends PathCommandType>(
  path: ShapePath,
  type: T
): Extract<PathCommand, { type: T }>[] {
  return path.commands.filter((command): command is Extract<PathCommand, { type: T }> => command.type === type);
}

/**
 * Split a compound path at every `move` into its subpaths.
 */
export function subpaths(path: ShapePath): ShapePath[] {
  const result: PathCommand[][] = [];
  for (const command of path.commands) {
    const current = result[result.length - 1];
    if (command.type === 'move' || !current) {
      result.push([command]);
    } else {
      current.push(command);
    }
  }
  return result.map((commands) => ({ commands, fillRule: path.fillRule }));
}

export function radiusOf(point: Point, center: Point): number {
  return Math.hypot(point.x - center.x, point.y - center.y);
}

export function expectPointClose(actual: Point, expected: Point, digits = 6): void {
  expect(actual.x).toBeCloseTo(expected.x, digits);
  expect(actual.y).toBeCloseTo(expected.y, digits);
}
