import type { Point, Rect, ShapePath } from '@/types/geometry';
import type { HollowWaveRingParams, WaveRingParams } from '@/types/rings';
import { clampCount, clampRatio, insetRect, pointOnCircle, rectCenter, tangentPoints, TAU } from '../geometry';
import { composeEvenOdd, PathBuilder } from '../path-builder';

interface ResolvedWave {
  amplitudeRatio: number;
  frequency: number;
  outerControlRatio: number;
  innerControlRatio: number;
}

function resolveWave(params: WaveRingParams): ResolvedWave {
  return {
    amplitudeRatio: clampRatio(params.amplitudeRatio ?? 0.8, 0.1, 0.95),
    frequency: clampCount(params.frequency ?? 6, 1, 60),
    outerControlRatio: params.outerControlRatio ?? 0.25,
    innerControlRatio: params.innerControlRatio ?? 0.275,
  };
}

/**
 * Bezier approximation of a sine-modulated radius.
 *
 * Each period runs peak -> valley -> peak with two cubic segments. Control
 * points sit on the tangent of each anchor's circle, at a distance
 * proportional to the arc length of one period on that circle.
 */
function bezierWave(center: Point, outerRadius: number, wave: ResolvedWave): ShapePath {
  const { frequency, amplitudeRatio } = wave;
  const innerRadius = outerRadius * amplitudeRatio;
  const theta = TAU / frequency;
  const halfTheta = theta * 0.5;
  const outerDistance = ((TAU * outerRadius) / frequency) * wave.outerControlRatio;
  const innerDistance = ((TAU * innerRadius) / frequency) * wave.innerControlRatio;

  const builder = new PathBuilder().moveTo(pointOnCircle(center, outerRadius, 0));

  for (let i = 0; i < frequency; i++) {
    const peak = theta * i;
    const valley = peak + halfTheta;
    const nextPeak = peak + theta;

    const [leavePeak] = tangentPoints(center, outerRadius, peak, outerDistance);
    const [leaveValley, enterValley] = tangentPoints(center, innerRadius, valley, innerDistance);
    const [, enterNextPeak] = tangentPoints(center, outerRadius, nextPeak, outerDistance);

    builder
      .curveTo(leavePeak, enterValley, pointOnCircle(center, innerRadius, valley))
      .curveTo(leaveValley, enterNextPeak, pointOnCircle(center, outerRadius, nextPeak));
  }

  return builder.close().build();
}

/**
 * A disc whose edge undulates between the full radius and
 * `radius * amplitudeRatio`, `frequency` times around the circle.
 */
export function waveRingPath(rect: Rect, params: WaveRingParams = {}): ShapePath {
  const outerRadius = Math.min(rect.width, rect.height) / 2;
  return bezierWave(rectCenter(rect), outerRadius, resolveWave(params));
}

/**
 * A wavy band: the wave ring minus the same wave on a rect inset by the
 * band thickness, composed with the even-odd rule.
 */
export function hollowWaveRingPath(rect: Rect, params: HollowWaveRingParams = {}): ShapePath {
  const thicknessRatio = clampRatio(params.thicknessRatio ?? 0.2, 0.01, 0.99);
  const thickness = Math.min(rect.width, rect.height) * 0.5 * thicknessRatio;

  return composeEvenOdd(waveRingPath(rect, params), waveRingPath(insetRect(rect, thickness), params));
}
