import type { Rect, ShapePath } from '@/types/geometry';
import type { GaugeRingParams } from '@/types/rings';
import { centeredSquare, clampCount, clampRatio, pointOnCircle, rectCenter, TAU } from '../geometry';
import { PathBuilder } from '../path-builder';

/**
 * Evenly spaced radial ticks, like a clock face or gauge dial.
 * The first tick points along angle 0.
 */
export function gaugeRingPath(rect: Rect, params: GaugeRingParams = {}): ShapePath {
  const tickCount = clampCount(params.tickCount ?? 60, 1);
  const thicknessRatio = clampRatio(params.thicknessRatio ?? 0.1, 0, 1);

  const drawRect = centeredSquare(rect);
  const center = rectCenter(drawRect);
  const radius = drawRect.width * 0.5;
  const rInner = radius * (1 - thicknessRatio);
  const step = TAU / tickCount;

  const builder = new PathBuilder();
  for (let i = 0; i < tickCount; i++) {
    const angle = step * i;
    builder.moveTo(pointOnCircle(center, rInner, angle)).lineTo(pointOnCircle(center, radius, angle));
  }
  return builder.build();
}
