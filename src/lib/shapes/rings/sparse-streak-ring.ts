import type { Rect, ShapePath, Span } from '@/types/geometry';
import type { NumberRange, SparseStreakRingParams } from '@/types/rings';
import { centeredSquare, clampCount, clampRatio, pointOnCircle, rectCenter, TAU } from '../geometry';
import { PathBuilder } from '../path-builder';
import { randomBetween, randomInt, type RandomSource } from '../random';

// Each streak end is trimmed by less than half its slice, so neighbours never touch
const MAX_TRIM_RATIO = 0.49;

export interface SparseStreakOptions {
  layerCount?: number; // Minimum 1, default 6
  streaksPerLayer?: NumberRange; // Inclusive streak count range per layer, default [1, 6]
}

/**
 * Sample the streaks of a sparse streak ring, one span list per layer.
 *
 * Each layer splits the circle into a random number of equal slices starting
 * at a random offset, and keeps a random sub-span strictly inside every slice.
 */
export function generateSparseStreaks(random: RandomSource, options: SparseStreakOptions = {}): Span[][] {
  const layerCount = clampCount(options.layerCount ?? 6, 1);
  const [minStreaks, maxStreaks] = options.streaksPerLayer ?? [1, 6];
  const streakRange: NumberRange = [clampCount(minStreaks, 1), clampCount(maxStreaks, 1)];

  const layers: Span[][] = [];
  for (let layer = 0; layer < layerCount; layer++) {
    const streakCount = randomInt(random, streakRange);
    const offset = randomBetween(random, [0, TAU]);
    const slice = TAU / streakCount;
    const maxTrim = slice * MAX_TRIM_RATIO;

    const spans: Span[] = [];
    for (let i = 0; i < streakCount; i++) {
      const a0 = slice * i + offset;
      const a1 = a0 + slice;
      const start = a0 + randomBetween(random, [0, maxTrim]);
      const end = a1 - randomBetween(random, [0, maxTrim]);
      spans.push({ start, end });
    }
    layers.push(spans);
  }
  return layers;
}

/**
 * Concentric layers of streaks; layer 0 is the innermost.
 */
export function sparseStreakRingPath(rect: Rect, params: SparseStreakRingParams): ShapePath {
  const thicknessRatio = clampRatio(params.thicknessRatio ?? 0.25, 0, 1);
  const { layers } = params;
  const builder = new PathBuilder();
  if (layers.length === 0) return builder.build();

  const drawRect = centeredSquare(rect);
  const center = rectCenter(drawRect);
  const radius = drawRect.width * 0.5;
  const r0 = radius * (1 - thicknessRatio);
  const dr = (radius - r0) / layers.length;

  layers.forEach((streaks, layerIndex) => {
    const r = r0 + dr * layerIndex;
    for (const streak of streaks) {
      builder.moveTo(pointOnCircle(center, r, streak.start)).arc(center, r, streak.start, streak.end);
    }
  });
  return builder.build();
}
