import type { Point, Rect, ShapePath, Span } from '@/types/geometry';
import type { HollowTechRingParams, NumberRange, TechRingParams } from '@/types/rings';
import { createLogger } from '@/lib/logger';
import { centeredSquare, clampCount, clampRatio, insetRect, pointOnCircle, rectCenter, TAU } from '../geometry';
import { reportDegenerateInput } from '../diagnostics';
import { composeEvenOdd, EMPTY_PATH, PathBuilder } from '../path-builder';
import { randomBetween, randomInt, type RandomSource } from '../random';

const log = createLogger('TechRing');

export interface NotchSpanOptions {
  countRange?: NumberRange; // Inclusive notch count range, default [2, 5]
  widthRatioRange?: NumberRange; // Notch width as a fraction of its slot, default [0.25, 0.75]
  placementRange?: NumberRange; // Where the notch sits in the room its slot leaves free, default [0.2, 0.8]
}

/**
 * Sample notches for a tech ring.
 *
 * The circle is split into a random number of equal slots from a random
 * offset; each slot receives one notch of random width at a random position.
 * Use flattenSpans() to turn the result into a notch list.
 */
export function generateNotchSpans(random: RandomSource, options: NotchSpanOptions = {}): Span[] {
  const [minCount, maxCount] = options.countRange ?? [2, 5];
  const widthRatioRange = options.widthRatioRange ?? [0.25, 0.75];
  const placementRange = options.placementRange ?? [0.2, 0.8];

  const offset = randomBetween(random, [0, TAU]);
  const notchCount = randomInt(random, [clampCount(minCount, 1), clampCount(maxCount, 1)]);
  const slot = TAU / notchCount;

  const spans: Span[] = [];
  for (let i = 0; i < notchCount; i++) {
    const slotStart = slot * i + offset;
    const width = slot * randomBetween(random, widthRatioRange);
    const room = slot - width;
    const start = randomBetween(random, placementRange) * room + slotStart;
    spans.push({ start, end: start + width });
  }
  return spans;
}

/**
 * Angle by which a notch wall leans so that the step from `outerRadius` down
 * by `inset` reads as a straight chamfer (law of cosines on the chord).
 */
export function transitionAngle(outerRadius: number, inset: number): number {
  const r0Squared = outerRadius * outerRadius;
  const cosine = (2 * r0Squared - inset * inset) / (2 * r0Squared);
  return Math.acos(clampRatio(cosine, -1, 1));
}

function notchRing(notches: readonly number[], center: Point, radius: number, inset: number): ShapePath {
  if (notches.length < 2 || notches.length % 2 !== 0) {
    reportDegenerateInput(log, 'Notch list needs an even number of angles (at least 2); drawing nothing', {
      length: notches.length,
    });
    return EMPTY_PATH;
  }
  if (!(radius > 0)) {
    reportDegenerateInput(log, 'Bounds have no area; drawing nothing', { radius });
    return EMPTY_PATH;
  }

  const r0 = radius;
  const r1 = radius - inset;
  const transition = transitionAngle(r0, Math.abs(r0 - r1));
  const first = notches[0] ?? 0;
  const builder = new PathBuilder().moveTo(pointOnCircle(center, r0, first));

  for (let i = 0; i < notches.length; i += 2) {
    const a0 = notches[i] ?? 0;
    const a3 = notches[i + 1] ?? 0;
    const a1 = a0 + transition;
    const a2 = a3 - transition;

    builder
      .lineTo(pointOnCircle(center, r1, a1))
      .arc(center, r1, a1, a2)
      .lineTo(pointOnCircle(center, r0, a3));

    const nextStart = notches[i + 2];
    if (nextStart !== undefined) {
      builder.arc(center, r0, a3, nextStart);
    }
  }

  const last = notches[notches.length - 1] ?? 0;
  return builder.arc(center, r0, last, first).close().build();
}

/**
 * A filled disc with chamfered notches cut into its rim.
 *
 * `notches` is a flat list of start/end angle pairs. Odd-length lists and
 * lists shorter than two angles produce an empty path.
 */
export function techRingPath(rect: Rect, params: TechRingParams): ShapePath {
  const insetRatio = clampRatio(params.insetRatio ?? 0.1, 0, 1);
  const drawRect = centeredSquare(rect);
  const radius = drawRect.width * 0.5;
  return notchRing(params.notches, rectCenter(drawRect), radius, radius * insetRatio);
}

/**
 * A ring whose outer and inner edges carry independent notch patterns.
 * The inner tech ring is drawn on the square inset by `thickness - inset`
 * and cut out with the even-odd rule.
 */
export function hollowTechRingPath(rect: Rect, params: HollowTechRingParams): ShapePath {
  const insetRatio = clampRatio(params.insetRatio ?? 0.1, 0, 1);
  const thicknessRatio = clampRatio(params.thicknessRatio ?? 0.25, 0, 1);

  const drawRect = centeredSquare(rect);
  const radius = drawRect.width * 0.5;
  const inset = radius * insetRatio;
  const thickness = radius * thicknessRatio;
  const innerRect = insetRect(drawRect, thickness - inset);

  const outer = techRingPath(drawRect, { insetRatio, notches: params.outerNotches });
  const inner = techRingPath(innerRect, { insetRatio, notches: params.innerNotches });
  return composeEvenOdd(outer, inner);
}
