/**
 * Decorative ring shapes
 *
 * Path generators, path output helpers and SVG components.
 */

export type { Point, Rect, Span, Arc, PathCommand, PathCommandType, FillRule, ShapePath } from '@/types/geometry';
export type {
  NumberRange,
  GaugeRingParams,
  OffsetStreakRingParams,
  SparseStreakRingParams,
  BroadcastRingParams,
  TechRingParams,
  HollowTechRingParams,
  WaveRingParams,
  HollowWaveRingParams,
  GearRingParams,
  Spoke,
  BurstRingParams,
  RingSpec,
  RingKind,
} from '@/types/rings';

// Geometry and span helpers
export {
  TAU,
  centeredSquare,
  rectCenter,
  insetRect,
  pointOnCircle,
  tangentPoints,
  degreesToRadians,
  clampRatio,
  clampCount,
} from './geometry';
export { EMPTY_ARC, FULL_CIRCLE_ARC, makeSpan, makeArc, offsetArc, spanWidth, flattenSpans, arcSweep } from './spans';

// Path construction and output
export { PathBuilder, EMPTY_PATH, endPoint, composeEvenOdd, isEmptyPath } from './path-builder';
export { toSvgPath, tracePath, anchorPoints, countSubpaths, type PathSink } from './path-utils';
export { createSeededRandom, defaultRandom, randomBetween, randomInt, type RandomSource } from './random';

// Ring generators
export { gaugeRingPath } from './rings/gauge-ring';
export { offsetStreakRingPath } from './rings/offset-streak-ring';
export { generateSparseStreaks, sparseStreakRingPath, type SparseStreakOptions } from './rings/sparse-streak-ring';
export { generateBroadcastSpans, broadcastRingPath, type BroadcastSpanOptions } from './rings/broadcast-ring';
export {
  generateNotchSpans,
  transitionAngle,
  techRingPath,
  hollowTechRingPath,
  type NotchSpanOptions,
} from './rings/tech-ring';
export { waveRingPath, hollowWaveRingPath } from './rings/wave-ring';
export { gearRingPath } from './rings/gear-ring';
export {
  generateBurstSpokes,
  burstRingPaths,
  burstRingPath,
  drawBurstRing,
  type BurstSpokeOptions,
  type BurstRingPaths,
  type BurstRingSurface,
  type BurstRingStyle,
} from './rings/burst-ring';

// Dispatch and validation
export { pathFor, RING_KINDS } from './shape-registry';
export { ringSpecSchema, parseRingSpec, formatSpecErrors } from './shape-schema';

// SVG components
export {
  GaugeRing,
  OffsetStreakRing,
  SparseStreakRing,
  BroadcastRing,
  TechRing,
  HollowTechRing,
  WaveRing,
  HollowWaveRing,
  GearRing,
  BurstRing,
} from './components';
