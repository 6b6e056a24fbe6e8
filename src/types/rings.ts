import type { Span } from './geometry';

// Inclusive [min, max] range sampled by the randomized generators
export type NumberRange = readonly [min: number, max: number];

export type GaugeRingParams = {
  tickCount?: number; // Minimum 1, default 60
  thicknessRatio?: number; // Tick length as a fraction of the radius, default 0.1
};

export type OffsetStreakRingParams = {
  thicknessRatio?: number; // default 0.25
  streakCount?: number; // Minimum 1, default 8
  streakArc?: number; // Angular length of every streak, default π
  streakOffset?: number; // Start offset added per layer, default 0.2π
  counterclockwise?: boolean; // Flips the offset direction, default false
};

export type SparseStreakRingParams = {
  thicknessRatio?: number; // default 0.25
  layers: readonly (readonly Span[])[]; // One span list per concentric layer, innermost first
};

export type BroadcastRingParams = {
  thicknessRatio?: number; // default 0.8
  layerCount?: number; // Minimum 1, default 6
  spans: readonly Span[];
};

export type TechRingParams = {
  insetRatio?: number; // Notch depth as a fraction of the radius, default 0.1
  notches: readonly number[]; // Flat [start0, end0, start1, end1, ...] in radians
};

export type HollowTechRingParams = {
  insetRatio?: number; // default 0.1
  thicknessRatio?: number; // default 0.25
  outerNotches: readonly number[];
  innerNotches: readonly number[];
};

export type WaveRingParams = {
  amplitudeRatio?: number; // Valley radius / peak radius, clamped 0.1-0.95, default 0.8
  frequency?: number; // Full waves around the circle, clamped 1-60, default 6
  outerControlRatio?: number; // Control distance / arc length at peaks, default 0.25
  innerControlRatio?: number; // Control distance / arc length at valleys, default 0.275
};

export type HollowWaveRingParams = WaveRingParams & {
  thicknessRatio?: number; // Clamped 0.01-0.99, default 0.2
};

export type GearRingParams = {
  toothCount?: number; // Clamped 2-64, default 24
  toothDepthRatio?: number; // Root radius / tip radius, clamped 0.65-1, default 0.8
  spokeCount?: number; // Clamped 0-12, default 6; fewer than 2 cuts no spokes
  spokeWidthRatio?: number; // Clamped 0.2-0.9, default 0.7
  includeCenterHole?: boolean; // default true
};

/**
 * A burst ring spoke. Unlike the other generators, spokes are in degrees.
 */
export type Spoke = {
  readonly angle: number; // Center angle in degrees
  readonly width: number; // Angular width in degrees
};

export type BurstRingParams = {
  thickness: number; // Band thickness in the same units as the bounding rect
  spokes: readonly Spoke[];
};

// Discriminated union of every shape kind accepted by pathFor()
export type RingSpec =
  | ({ kind: 'gauge' } & GaugeRingParams)
  | ({ kind: 'offset-streak' } & OffsetStreakRingParams)
  | ({ kind: 'sparse-streak' } & SparseStreakRingParams)
  | ({ kind: 'broadcast' } & BroadcastRingParams)
  | ({ kind: 'tech' } & TechRingParams)
  | ({ kind: 'hollow-tech' } & HollowTechRingParams)
  | ({ kind: 'wave' } & WaveRingParams)
  | ({ kind: 'hollow-wave' } & HollowWaveRingParams)
  | ({ kind: 'gear' } & GearRingParams)
  | ({ kind: 'burst' } & BurstRingParams);

export type RingKind = RingSpec['kind'];
