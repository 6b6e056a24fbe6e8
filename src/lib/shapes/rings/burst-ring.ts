import type { Rect, ShapePath } from '@/types/geometry';
import type { BurstRingParams, NumberRange, Spoke } from '@/types/rings';
import { centeredSquare, clampRatio, degreesToRadians, rectCenter } from '../geometry';
import { composeEvenOdd, PathBuilder } from '../path-builder';
import { tracePath, type PathSink } from '../path-utils';
import { randomBetween, type RandomSource } from '../random';

// Smallest advance between spokes, in degrees; keeps degenerate ranges finite
const MIN_SPOKE_STEP = 0.1;

export interface BurstSpokeOptions {
  widthRange?: NumberRange; // Spoke width in degrees, default [0.5, 1.2]
  spacingRange?: NumberRange; // Gap after each spoke in degrees, default [0.5, 4]
}

/**
 * Walk once around the circle from a random offset, emitting spokes of random
 * width separated by random gaps. Angles are in degrees.
 */
export function generateBurstSpokes(random: RandomSource, options: BurstSpokeOptions = {}): Spoke[] {
  const widthRange = options.widthRange ?? [0.5, 1.2];
  const spacingRange = options.spacingRange ?? [0.5, 4];

  const offset = randomBetween(random, [0, 360]);
  const spokes: Spoke[] = [];
  let a = 0;
  while (a < 360) {
    const width = Math.max(0, randomBetween(random, widthRange));
    const spacing = Math.max(0, randomBetween(random, spacingRange));
    spokes.push({ angle: a + offset, width });
    a += Math.max(spacing + width, MIN_SPOKE_STEP);
  }
  return spokes;
}

export interface BurstRingPaths {
  /** Annulus between the outer circle and the circle inset by `thickness` (even-odd). */
  clip: ShapePath;
  /** The full outer disc. */
  background: ShapePath;
  /** One pie wedge per spoke, from the center out to the rim. */
  rays: ShapePath;
}

/**
 * The three paths a burst ring is painted with. Painting `rays` over
 * `background` while clipped to `clip` confines the wedges to the band.
 */
export function burstRingPaths(rect: Rect, params: BurstRingParams): BurstRingPaths {
  const drawRect = centeredSquare(rect);
  const center = rectCenter(drawRect);
  const radius = drawRect.width / 2;
  const thickness = clampRatio(params.thickness, 0, radius);

  const background = new PathBuilder().circle(center, radius).build();
  const hole = new PathBuilder().circle(center, radius - thickness).build();

  const rays = new PathBuilder();
  for (const spoke of params.spokes) {
    const half = spoke.width / 2;
    rays
      .moveTo(center)
      .arc(center, radius, degreesToRadians(spoke.angle - half), degreesToRadians(spoke.angle + half))
      .close();
  }

  return {
    clip: composeEvenOdd(background, hole),
    background,
    rays: rays.build(),
  };
}

/**
 * The slice of a Canvas 2D context drawBurstRing() needs.
 * CanvasRenderingContext2D and OffscreenCanvasRenderingContext2D satisfy it.
 */
export interface BurstRingSurface extends PathSink {
  fillStyle: string | CanvasGradient | CanvasPattern;
  save(): void;
  restore(): void;
  beginPath(): void;
  clip(fillRule?: CanvasFillRule): void;
  fill(fillRule?: CanvasFillRule): void;
}

export interface BurstRingStyle extends BurstRingParams {
  backgroundColor: string;
  foregroundColor: string;
}

/**
 * Paint a burst ring into the centered square of a `width x height` surface.
 */
export function drawBurstRing(
  ctx: BurstRingSurface,
  size: { width: number; height: number },
  style: BurstRingStyle
): void {
  const { clip, background, rays } = burstRingPaths({ x: 0, y: 0, ...size }, style);

  ctx.save();
  try {
    ctx.beginPath();
    tracePath(ctx, clip);
    ctx.clip(clip.fillRule);

    ctx.beginPath();
    tracePath(ctx, background);
    ctx.fillStyle = style.backgroundColor;
    ctx.fill(background.fillRule);

    ctx.beginPath();
    tracePath(ctx, rays);
    ctx.fillStyle = style.foregroundColor;
    ctx.fill(rays.fillRule);
  } finally {
    ctx.restore();
  }
}

/**
 * Single-path form of the spokes: each wedge already intersected with the
 * band, as an annular sector. This is what the clipped `rays` paint, without
 * needing a clip; the background band is left to the host.
 */
export function burstRingPath(rect: Rect, params: BurstRingParams): ShapePath {
  const drawRect = centeredSquare(rect);
  const center = rectCenter(drawRect);
  const radius = drawRect.width / 2;
  const innerRadius = radius - clampRatio(params.thickness, 0, radius);

  const builder = new PathBuilder();
  for (const spoke of params.spokes) {
    const start = degreesToRadians(spoke.angle - spoke.width / 2);
    const end = degreesToRadians(spoke.angle + spoke.width / 2);
    builder.arc(center, radius, start, end).arc(center, innerRadius, end, start, true).close();
  }
  return builder.build();
}
