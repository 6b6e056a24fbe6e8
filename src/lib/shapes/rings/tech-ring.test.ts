import { afterEach, describe, expect, it, vi } from 'vitest';
import { generateNotchSpans, hollowTechRingPath, techRingPath, transitionAngle } from './tech-ring';
import { TAU } from '../geometry';
import { isEmptyPath } from '../path-builder';
import { createSeededRandom } from '../random';
import { flattenSpans } from '../spans';
import { config } from '@/lib/config';
import { commandTypes, commandsOfType, radiusOf, subpaths } from '@/test/path-helpers';

const rect = { x: 0, y: 0, width: 200, height: 200 };
const center = { x: 100, y: 100 };

describe('techRingPath', () => {
  afterEach(() => {
    config.geometry.strictDiagnostics = false;
    vi.restoreAllMocks();
  });

  it('draws nothing for empty or odd notch lists', () => {
    expect(isEmptyPath(techRingPath(rect, { notches: [] }))).toBe(true);
    expect(isEmptyPath(techRingPath(rect, { notches: [0] }))).toBe(true);
    expect(isEmptyPath(techRingPath(rect, { notches: [0, 1, 2] }))).toBe(true);
  });

  it('warns about bad notch lists in strict mode', () => {
    config.geometry.strictDiagnostics = true;
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    techRingPath(rect, { notches: [0] });

    expect(warn).toHaveBeenCalledWith(
      '[TechRing] Notch list needs an even number of angles (at least 2); drawing nothing',
      { length: 1 }
    );
  });

  it('walks each notch as chamfer, inner arc, chamfer, outer arc', () => {
    const path = techRingPath(rect, { notches: [0, 1, 2, 3] });
    expect(commandTypes(path)).toEqual([
      'move',
      'line',
      'arc',
      'line',
      'arc',
      'line',
      'arc',
      'line',
      'arc',
      'close',
    ]);

    const arcs = commandsOfType(path, 'arc');
    expect(arcs.map((arc) => arc.radius)).toEqual([90, 100, 90, 100]);
    const transition = transitionAngle(100, 10);
    expect(arcs[0]?.startAngle).toBeCloseTo(transition, 12);
    expect(arcs[0]?.endAngle).toBeCloseTo(1 - transition, 12);
    expect(arcs[3]).toMatchObject({ startAngle: 3, endAngle: 0 });
  });

  it('leaves the rim whole with a zero inset', () => {
    const arcs = commandsOfType(techRingPath(rect, { insetRatio: 0, notches: [0, 1] }), 'arc');
    expect(arcs.map((arc) => arc.radius)).toEqual([100, 100]);
  });
});

describe('transitionAngle', () => {
  it('matches the chord of the inset on the outer circle', () => {
    expect(transitionAngle(100, 10)).toBeCloseTo(Math.acos(0.995), 12);
    expect(transitionAngle(100, 0)).toBe(0);
  });
});

describe('hollowTechRingPath', () => {
  it('cuts the inner notch ring out of the outer one', () => {
    const path = hollowTechRingPath(rect, { outerNotches: [0, 1], innerNotches: [2, 3] });
    const [outer, inner] = subpaths(path);

    expect(path.fillRule).toBe('evenodd');
    expect(subpaths(path)).toHaveLength(2);
    expect(outer?.commands[0]).toEqual({ type: 'move', to: { x: 200, y: 100 } });
    const innerStart = inner?.commands[0];
    expect(innerStart?.type).toBe('move');
    if (innerStart?.type === 'move') expect(radiusOf(innerStart.to, center)).toBeCloseTo(85, 9);
  });

  it('keeps the outer ring when the inner notch list is invalid', () => {
    const path = hollowTechRingPath(rect, { outerNotches: [0, 1], innerNotches: [1] });
    expect(subpaths(path)).toHaveLength(1);
  });
});

describe('generateNotchSpans', () => {
  it('yields ordered notches that fit their slots', () => {
    const spans = generateNotchSpans(createSeededRandom(5));
    expect(spans.length).toBeGreaterThanOrEqual(2);
    expect(spans.length).toBeLessThanOrEqual(5);
    const slot = TAU / spans.length;
    const notches = flattenSpans(spans);
    for (let i = 1; i < notches.length; i++) {
      expect(notches[i]).toBeGreaterThan(notches[i - 1] ?? Number.NEGATIVE_INFINITY);
    }
    for (const span of spans) expect(span.end - span.start).toBeLessThan(slot);
  });

  it('derives positions from the random source', () => {
    const [first] = generateNotchSpans(() => 0.5, { countRange: [4, 4] });
    const slot = Math.PI / 2;
    const width = slot * 0.5;
    expect(first?.start).toBeCloseTo(Math.PI + 0.5 * (slot - width), 12);
    expect(first?.end).toBeCloseTo(Math.PI + 0.5 * (slot - width) + width, 12);
  });
});
