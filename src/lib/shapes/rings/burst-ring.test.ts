import { describe, expect, it } from 'vitest';
import {
  burstRingPath,
  burstRingPaths,
  drawBurstRing,
  generateBurstSpokes,
  type BurstRingSurface,
} from './burst-ring';
import { commandTypes, commandsOfType, subpaths } from '@/test/path-helpers';

const rect = { x: 0, y: 0, width: 100, height: 100 };

describe('generateBurstSpokes', () => {
  it('walks the full circle from the sampled offset', () => {
    const spokes = generateBurstSpokes(() => 0.5);

    expect(spokes).toHaveLength(117);
    expect(spokes[0]?.angle).toBe(180);
    expect(spokes[0]?.width).toBeCloseTo(0.85, 12);
    expect(spokes[1]?.angle).toBeCloseTo(183.1, 9);
  });

  it('still terminates when widths and gaps are zero', () => {
    const spokes = generateBurstSpokes(() => 0, { widthRange: [0, 0], spacingRange: [0, 0] });
    expect(spokes.length).toBeGreaterThanOrEqual(3600);
    expect(spokes.length).toBeLessThanOrEqual(3601);
  });
});

describe('burstRingPaths', () => {
  const spokes = [{ angle: 0, width: 2 }];

  it('builds the band clip, the disc and one wedge per spoke', () => {
    const { clip, background, rays } = burstRingPaths(rect, { thickness: 10, spokes });

    expect(clip.fillRule).toBe('evenodd');
    expect(subpaths(clip).map((part) => commandsOfType(part, 'arc')[0]?.radius)).toEqual([50, 40]);
    expect(commandTypes(background)).toEqual(['move', 'arc', 'close']);
    expect(commandTypes(rays)).toEqual(['move', 'line', 'arc', 'close']);
    expect(rays.commands[0]).toEqual({ type: 'move', to: { x: 50, y: 50 } });

    const [wedge] = commandsOfType(rays, 'arc');
    expect(wedge?.startAngle).toBeCloseTo((-1 * Math.PI) / 180, 12);
    expect(wedge?.endAngle).toBeCloseTo(Math.PI / 180, 12);
  });

  it('never lets the hole radius go negative', () => {
    const { clip } = burstRingPaths(rect, { thickness: 80, spokes });
    expect(commandsOfType(clip, 'arc').map((arc) => arc.radius)).toEqual([50, 0]);
  });
});

describe('burstRingPath', () => {
  it('draws each spoke as an annular sector', () => {
    const path = burstRingPath(rect, { thickness: 10, spokes: [{ angle: 90, width: 4 }] });
    const arcs = commandsOfType(path, 'arc');

    expect(path.fillRule).toBe('nonzero');
    expect(commandTypes(path)).toEqual(['move', 'arc', 'line', 'arc', 'close']);
    expect(arcs.map((arc) => [arc.radius, arc.counterclockwise])).toEqual([
      [50, false],
      [40, true],
    ]);
    expect(arcs[1]?.startAngle).toBe(arcs[0]?.endAngle);
  });

  it('draws nothing without spokes', () => {
    expect(burstRingPath(rect, { thickness: 10, spokes: [] }).commands).toEqual([]);
  });
});

class RecordingSurface implements BurstRingSurface {
  readonly calls: string[] = [];
  fillStyle: string | CanvasGradient | CanvasPattern = '';

  save(): void {
    this.calls.push('save');
  }
  restore(): void {
    this.calls.push('restore');
  }
  beginPath(): void {
    this.calls.push('beginPath');
  }
  clip(fillRule?: CanvasFillRule): void {
    this.calls.push(`clip:${fillRule ?? 'nonzero'}`);
  }
  fill(fillRule?: CanvasFillRule): void {
    const style = typeof this.fillStyle === 'string' ? this.fillStyle : 'pattern';
    this.calls.push(`fill:${fillRule ?? 'nonzero'}:${style}`);
  }
  moveTo(): void {
    this.calls.push('moveTo');
  }
  lineTo(): void {
    this.calls.push('lineTo');
  }
  arc(): void {
    this.calls.push('arc');
  }
  bezierCurveTo(): void {
    this.calls.push('bezierCurveTo');
  }
  closePath(): void {
    this.calls.push('closePath');
  }
}

const PATH_CALLS = new Set(['moveTo', 'lineTo', 'arc', 'bezierCurveTo', 'closePath']);

describe('drawBurstRing', () => {
  const style = {
    thickness: 10,
    spokes: [{ angle: 0, width: 2 }],
    backgroundColor: '#111111',
    foregroundColor: '#eeeeee',
  };

  it('clips to the band, then paints the disc and the rays', () => {
    const surface = new RecordingSurface();
    drawBurstRing(surface, { width: 100, height: 100 }, style);

    expect(surface.calls.filter((call) => !PATH_CALLS.has(call))).toEqual([
      'save',
      'beginPath',
      'clip:evenodd',
      'beginPath',
      'fill:nonzero:#111111',
      'beginPath',
      'fill:nonzero:#eeeeee',
      'restore',
    ]);
  });

  it('restores the surface when drawing fails', () => {
    const surface = new RecordingSurface();
    surface.arc = () => {
      throw new Error('lost context');
    };

    expect(() => drawBurstRing(surface, { width: 100, height: 100 }, style)).toThrow('lost context');
    expect(surface.calls[surface.calls.length - 1]).toBe('restore');
  });
});
