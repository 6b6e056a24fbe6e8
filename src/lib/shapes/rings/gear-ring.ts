import type { Rect, ShapePath } from '@/types/geometry';
import type { GearRingParams } from '@/types/rings';
import { centeredSquare, clampCount, clampRatio, pointOnCircle, rectCenter, TAU } from '../geometry';
import { PathBuilder } from '../path-builder';

// Spoke slots sit between these fractions of the tooth root radius
const SLOT_OUTER_MARGIN = 0.1;
const SLOT_INNER_RATIO = 0.35;
const HUB_HOLE_RATIO = 0.4;
const PLAIN_HOLE_RATIO = 0.1;

/**
 * A gear silhouette with optional spoke cutouts and center hole.
 *
 * The tooth outline is a single closed contour of `4 * toothCount` vertices.
 * Spoke slots and holes are further contours; the result is painted with the
 * even-odd rule so they subtract from the body.
 */
export function gearRingPath(rect: Rect, params: GearRingParams = {}): ShapePath {
  const toothCount = clampCount(params.toothCount ?? 24, 2, 64);
  const toothDepthRatio = clampRatio(params.toothDepthRatio ?? 0.8, 0.65, 1);
  const spokeCount = clampCount(params.spokeCount ?? 6, 0, 12);
  const spokeWidthRatio = clampRatio(params.spokeWidthRatio ?? 0.7, 0.2, 0.9);
  const includeCenterHole = params.includeCenterHole ?? true;

  const drawRect = centeredSquare(rect);
  const center = rectCenter(drawRect);
  const rOuter = drawRect.width * 0.5;
  const rInner = rOuter * toothDepthRatio;
  const toothAngle = TAU / toothCount;
  const segmentAngle = toothAngle / 4;

  const builder = new PathBuilder().moveTo(pointOnCircle(center, rInner, 0));
  for (let i = 0; i < toothCount; i++) {
    const a = toothAngle * i;
    // Root, tip, tip, root; the final root vertex is the starting point
    for (let j = 1; j <= 4; j++) {
      if (i === toothCount - 1 && j === 4) break;
      const r = Math.floor(j / 2) % 2 === 0 ? rInner : rOuter;
      builder.lineTo(pointOnCircle(center, r, a + segmentAngle * j));
    }
  }
  builder.close();

  if (spokeCount >= 2) {
    const slotAngle = TAU / spokeCount;
    const holeWidth = slotAngle * spokeWidthRatio;
    const taper = holeWidth * 0.25 * spokeWidthRatio;
    const sOuter = rOuter * (toothDepthRatio - SLOT_OUTER_MARGIN);
    const sInner = sOuter * SLOT_INNER_RATIO;

    for (let i = 0; i < spokeCount; i++) {
      const a0 = slotAngle * i;
      const a1 = a0 + holeWidth;
      const a2 = a1 - taper;
      const a3 = a0 + taper;
      builder
        .moveTo(pointOnCircle(center, sOuter, a0))
        .arc(center, sOuter, a0, a1)
        .lineTo(pointOnCircle(center, sInner, a2))
        .arc(center, sInner, a2, a3, true)
        .close();
    }

    if (includeCenterHole) {
      builder.circle(center, sInner * HUB_HOLE_RATIO);
    }
  } else if (includeCenterHole) {
    builder.circle(center, rOuter * PLAIN_HOLE_RATIO);
  }

  return builder.build('evenodd');
}
