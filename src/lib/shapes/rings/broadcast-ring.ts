import type { Rect, ShapePath, Span } from '@/types/geometry';
import type { BroadcastRingParams, NumberRange } from '@/types/rings';
import { centeredSquare, clampCount, clampRatio, pointOnCircle, rectCenter, TAU } from '../geometry';
import { PathBuilder } from '../path-builder';
import { randomBetween, randomInt, type RandomSource } from '../random';

export interface BroadcastSpanOptions {
  rayCountRange?: NumberRange; // default [2, 6]
  spanWidthRatioRange?: NumberRange; // Fraction of each ray slot covered, default [0.1, 0.9]
  uniformSpacing?: boolean; // Center each span in its slot (true) or place it randomly (false), default true
}

/**
 * Sample the spans of a broadcast ring.
 *
 * The circle is divided into a random number of equal ray slots starting at a
 * random offset. With uniform spacing every span is centered on its slot
 * start; otherwise it is pushed a random distance into the room its width
 * leaves free.
 */
export function generateBroadcastSpans(random: RandomSource, options: BroadcastSpanOptions = {}): Span[] {
  const [minRays, maxRays] = options.rayCountRange ?? [2, 6];
  const widthRange = options.spanWidthRatioRange ?? [0.1, 0.9];
  const uniformSpacing = options.uniformSpacing ?? true;

  const rayCount = randomInt(random, [clampCount(minRays, 1), clampCount(maxRays, 1)]);
  const anglePerRay = TAU / rayCount;
  const offset = randomBetween(random, [0, TAU]);

  const spans: Span[] = [];
  for (let i = 0; i < rayCount; i++) {
    const slotStart = anglePerRay * i + offset;
    if (uniformSpacing) {
      const halfWidth = (randomBetween(random, widthRange) / 2) * anglePerRay;
      spans.push({ start: slotStart - halfWidth, end: slotStart + halfWidth });
    } else {
      const width = randomBetween(random, widthRange) * anglePerRay;
      const start = slotStart + randomBetween(random, [0, anglePerRay - width]);
      spans.push({ start, end: start + width });
    }
  }
  return spans;
}

/**
 * Every span drawn once per layer, stepping outward like a signal icon.
 */
export function broadcastRingPath(rect: Rect, params: BroadcastRingParams): ShapePath {
  const thicknessRatio = clampRatio(params.thicknessRatio ?? 0.8, 0, 1);
  const layerCount = clampCount(params.layerCount ?? 6, 1);

  const drawRect = centeredSquare(rect);
  const center = rectCenter(drawRect);
  const radius = drawRect.width * 0.5;
  const r0 = radius * (1 - thicknessRatio);
  const dr = (radius - r0) / (layerCount + 1);

  const builder = new PathBuilder();
  for (const span of params.spans) {
    for (let layer = 0; layer < layerCount; layer++) {
      const r = r0 + dr * layer;
      builder.moveTo(pointOnCircle(center, r, span.start)).arc(center, r, span.start, span.end);
    }
  }
  return builder.build();
}
