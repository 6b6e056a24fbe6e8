/**
 * Single entry point mapping a tagged ring spec to its path generator.
 */

import type { Rect, ShapePath } from '@/types/geometry';
import type { RingKind, RingSpec } from '@/types/rings';
import { broadcastRingPath } from './rings/broadcast-ring';
import { burstRingPath } from './rings/burst-ring';
import { gaugeRingPath } from './rings/gauge-ring';
import { gearRingPath } from './rings/gear-ring';
import { offsetStreakRingPath } from './rings/offset-streak-ring';
import { sparseStreakRingPath } from './rings/sparse-streak-ring';
import { hollowTechRingPath, techRingPath } from './rings/tech-ring';
import { hollowWaveRingPath, waveRingPath } from './rings/wave-ring';

export const RING_KINDS: readonly RingKind[] = [
  'gauge',
  'offset-streak',
  'sparse-streak',
  'broadcast',
  'tech',
  'hollow-tech',
  'wave',
  'hollow-wave',
  'gear',
  'burst',
];

/**
 * Build the path of any ring kind inside `rect`.
 */
export function pathFor(spec: RingSpec, rect: Rect): ShapePath {
  switch (spec.kind) {
    case 'gauge':
      return gaugeRingPath(rect, spec);
    case 'offset-streak':
      return offsetStreakRingPath(rect, spec);
    case 'sparse-streak':
      return sparseStreakRingPath(rect, spec);
    case 'broadcast':
      return broadcastRingPath(rect, spec);
    case 'tech':
      return techRingPath(rect, spec);
    case 'hollow-tech':
      return hollowTechRingPath(rect, spec);
    case 'wave':
      return waveRingPath(rect, spec);
    case 'hollow-wave':
      return hollowWaveRingPath(rect, spec);
    case 'gear':
      return gearRingPath(rect, spec);
    case 'burst':
      return burstRingPath(rect, spec);
  }
}
