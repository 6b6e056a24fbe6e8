/**
 * Zod Validation Schemas for Ring Specs
 *
 * Validates plain records (e.g. parsed JSON) before they reach pathFor().
 * Only the structure is checked: numeric ranges are left to the generators,
 * which clamp out-of-range values instead of rejecting them.
 */

import { z } from 'zod';
import type { RingSpec } from '@/types/rings';

const spanSchema = z.object({
  start: z.number(),
  end: z.number(),
});

const spokeSchema = z.object({
  angle: z.number(),
  width: z.number(),
});

const gaugeSchema = z.object({
  kind: z.literal('gauge'),
  tickCount: z.number().optional(),
  thicknessRatio: z.number().optional(),
});

const offsetStreakSchema = z.object({
  kind: z.literal('offset-streak'),
  thicknessRatio: z.number().optional(),
  streakCount: z.number().optional(),
  streakArc: z.number().optional(),
  streakOffset: z.number().optional(),
  counterclockwise: z.boolean().optional(),
});

const sparseStreakSchema = z.object({
  kind: z.literal('sparse-streak'),
  thicknessRatio: z.number().optional(),
  layers: z.array(z.array(spanSchema)),
});

const broadcastSchema = z.object({
  kind: z.literal('broadcast'),
  thicknessRatio: z.number().optional(),
  layerCount: z.number().optional(),
  spans: z.array(spanSchema),
});

const techSchema = z.object({
  kind: z.literal('tech'),
  insetRatio: z.number().optional(),
  notches: z.array(z.number()),
});

const hollowTechSchema = z.object({
  kind: z.literal('hollow-tech'),
  insetRatio: z.number().optional(),
  thicknessRatio: z.number().optional(),
  outerNotches: z.array(z.number()),
  innerNotches: z.array(z.number()),
});

const waveFields = {
  amplitudeRatio: z.number().optional(),
  frequency: z.number().optional(),
  outerControlRatio: z.number().optional(),
  innerControlRatio: z.number().optional(),
};

const waveSchema = z.object({
  kind: z.literal('wave'),
  ...waveFields,
});

const hollowWaveSchema = z.object({
  kind: z.literal('hollow-wave'),
  ...waveFields,
  thicknessRatio: z.number().optional(),
});

const gearSchema = z.object({
  kind: z.literal('gear'),
  toothCount: z.number().optional(),
  toothDepthRatio: z.number().optional(),
  spokeCount: z.number().optional(),
  spokeWidthRatio: z.number().optional(),
  includeCenterHole: z.boolean().optional(),
});

const burstSchema = z.object({
  kind: z.literal('burst'),
  thickness: z.number(),
  spokes: z.array(spokeSchema),
});

export const ringSpecSchema = z.discriminatedUnion('kind', [
  gaugeSchema,
  offsetStreakSchema,
  sparseStreakSchema,
  broadcastSchema,
  techSchema,
  hollowTechSchema,
  waveSchema,
  hollowWaveSchema,
  gearSchema,
  burstSchema,
]);

/**
 * Validate a ring spec
 */
export function parseRingSpec(data: unknown): {
  success: boolean;
  data?: RingSpec;
  errors?: z.ZodError;
} {
  const result = ringSpecSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: result.error };
}

/**
 * Format Zod errors into human-readable messages
 */
export function formatSpecErrors(errors: z.ZodError): string[] {
  return errors.issues.map((issue) => {
    const path = issue.path.join('.');
    return `${path ? `${path}: ` : ''}${issue.message}`;
  });
}
