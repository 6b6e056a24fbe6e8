import { describe, expect, it } from 'vitest';
import { EMPTY_PATH, PathBuilder, composeEvenOdd, endPoint, isEmptyPath } from './path-builder';
import { commandTypes, expectPointClose } from '@/test/path-helpers';

const origin = { x: 0, y: 0 };

describe('PathBuilder', () => {
  it('starts a subpath when drawing a line without a current point', () => {
    const path = new PathBuilder().lineTo({ x: 1, y: 2 }).build();
    expect(path.commands).toEqual([{ type: 'move', to: { x: 1, y: 2 } }]);
  });

  it('moves to the start of an arc when there is no current point', () => {
    const path = new PathBuilder().arc(origin, 10, 0, Math.PI / 2).build();
    expect(commandTypes(path)).toEqual(['move', 'arc']);
    expect(path.commands[0]).toEqual({ type: 'move', to: { x: 10, y: 0 } });
  });

  it('connects the current point to a detached arc with a line', () => {
    const path = new PathBuilder().moveTo(origin).arc(origin, 10, 0, Math.PI / 2).build();
    expect(commandTypes(path)).toEqual(['move', 'line', 'arc']);
    expect(path.commands[1]).toEqual({ type: 'line', to: { x: 10, y: 0 } });
  });

  it('does not insert a segment between contiguous arcs', () => {
    const path = new PathBuilder()
      .arc(origin, 10, 0, Math.PI / 2)
      .arc(origin, 10, Math.PI / 2, Math.PI)
      .build();
    expect(commandTypes(path)).toEqual(['move', 'arc', 'arc']);
  });

  it('moves to the first control point of a curve without a current point', () => {
    const path = new PathBuilder().curveTo({ x: 1, y: 1 }, { x: 2, y: 2 }, { x: 3, y: 3 }).build();
    expect(path.commands[0]).toEqual({ type: 'move', to: { x: 1, y: 1 } });
    expect(commandTypes(path)).toEqual(['move', 'cubic']);
  });

  it('draws a circle as a closed subpath', () => {
    const path = new PathBuilder().circle({ x: 5, y: 5 }, 2).build();
    expect(commandTypes(path)).toEqual(['move', 'arc', 'close']);
    expect(path.commands[1]).toEqual({
      type: 'arc',
      center: { x: 5, y: 5 },
      radius: 2,
      startAngle: 0,
      endAngle: 2 * Math.PI,
      counterclockwise: false,
    });
  });

  it('ignores a close without an open subpath', () => {
    expect(new PathBuilder().close().isEmpty).toBe(true);
    const path = new PathBuilder().moveTo(origin).lineTo({ x: 1, y: 0 }).close().close().build();
    expect(commandTypes(path)).toEqual(['move', 'line', 'close']);
  });

  it('builds independent snapshots with the requested fill rule', () => {
    const builder = new PathBuilder().moveTo(origin);
    const first = builder.build();
    builder.lineTo({ x: 1, y: 1 });
    expect(first.commands).toHaveLength(1);
    expect(first.fillRule).toBe('nonzero');
    expect(builder.build('evenodd').fillRule).toBe('evenodd');
  });
});

describe('endPoint', () => {
  it('resolves the pen position after each command', () => {
    expect(endPoint({ type: 'line', to: { x: 4, y: 5 } })).toEqual({ x: 4, y: 5 });
    expect(endPoint({ type: 'close' })).toBeNull();
    const arcEnd = endPoint({
      type: 'arc',
      center: origin,
      radius: 10,
      startAngle: 0,
      endAngle: Math.PI / 2,
      counterclockwise: false,
    });
    expect(arcEnd).not.toBeNull();
    if (arcEnd) expectPointClose(arcEnd, { x: 0, y: 10 });
  });
});

describe('composeEvenOdd', () => {
  it('closes every input and skips empty ones', () => {
    const open = new PathBuilder().moveTo(origin).lineTo({ x: 1, y: 0 }).lineTo({ x: 1, y: 1 }).build();
    const circle = new PathBuilder().circle(origin, 3).build();
    const composed = composeEvenOdd(open, EMPTY_PATH, circle);

    expect(composed.fillRule).toBe('evenodd');
    expect(commandTypes(composed)).toEqual(['move', 'line', 'line', 'close', 'move', 'arc', 'close']);
  });

  it('is empty when every input is empty', () => {
    expect(isEmptyPath(composeEvenOdd(EMPTY_PATH, EMPTY_PATH))).toBe(true);
  });
});
