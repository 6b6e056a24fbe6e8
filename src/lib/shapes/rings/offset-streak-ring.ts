import type { Rect, ShapePath } from '@/types/geometry';
import type { OffsetStreakRingParams } from '@/types/rings';
import { centeredSquare, clampCount, clampRatio, pointOnCircle, rectCenter } from '../geometry';
import { PathBuilder } from '../path-builder';

/**
 * Concentric streaks of equal length whose start angle advances by
 * `streakOffset` per layer, giving a swirling cascade.
 */
export function offsetStreakRingPath(rect: Rect, params: OffsetStreakRingParams = {}): ShapePath {
  const thicknessRatio = clampRatio(params.thicknessRatio ?? 0.25, 0, 1);
  const streakCount = clampCount(params.streakCount ?? 8, 1);
  const streakArc = params.streakArc ?? Math.PI;
  const streakOffset = params.streakOffset ?? Math.PI * 0.2;
  const direction = params.counterclockwise ? -1 : 1;

  const drawRect = centeredSquare(rect);
  const center = rectCenter(drawRect);
  const radius = drawRect.width * 0.5;
  const r0 = radius * (1 - thicknessRatio);
  const dr = (radius - r0) / streakCount;

  const builder = new PathBuilder();
  for (let i = 0; i < streakCount; i++) {
    const r = r0 + dr * i;
    const a0 = streakOffset * (i + 1) * direction;
    builder.moveTo(pointOnCircle(center, r, a0)).arc(center, r, a0, a0 + streakArc);
  }
  return builder.build();
}
