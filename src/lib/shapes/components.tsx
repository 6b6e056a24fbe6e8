/**
 * SVG ring components
 *
 * Each component renders a `width x height` <svg> with the ring path of the
 * matching generator. Randomized rings sample their spans once per mount,
 * from `random` if given, else from `seed`, else from the configured default
 * seed, else from Math.random. Passing precomputed spans skips sampling.
 */

import React, { useId, useState } from 'react';
import type { Rect, ShapePath, Span } from '@/types/geometry';
import type {
  GaugeRingParams,
  GearRingParams,
  HollowWaveRingParams,
  OffsetStreakRingParams,
  Spoke,
  WaveRingParams,
} from '@/types/rings';
import { config } from '@/lib/config';
import { toSvgPath } from './path-utils';
import { createSeededRandom, defaultRandom, type RandomSource } from './random';
import { flattenSpans } from './spans';
import { broadcastRingPath, generateBroadcastSpans, type BroadcastSpanOptions } from './rings/broadcast-ring';
import { burstRingPaths, generateBurstSpokes, type BurstSpokeOptions } from './rings/burst-ring';
import { gaugeRingPath } from './rings/gauge-ring';
import { gearRingPath } from './rings/gear-ring';
import { offsetStreakRingPath } from './rings/offset-streak-ring';
import { generateSparseStreaks, sparseStreakRingPath, type SparseStreakOptions } from './rings/sparse-streak-ring';
import { generateNotchSpans, hollowTechRingPath, techRingPath, type NotchSpanOptions } from './rings/tech-ring';
import { hollowWaveRingPath, waveRingPath } from './rings/wave-ring';

interface BaseShapeProps {
  width: number;
  height: number;
  fill?: string;
  stroke?: string;
  strokeWidth?: number;
  strokeLinecap?: 'butt' | 'round' | 'square';
  style?: React.CSSProperties;
  className?: string;
}

interface RandomizedProps {
  seed?: number;
  random?: RandomSource;
}

// Line-only rings are stroked by default, solid rings are filled
const STROKED_DEFAULTS = { fill: 'none', stroke: 'currentColor', strokeWidth: 2 };
const FILLED_DEFAULTS = { fill: 'currentColor' };

function resolveRandom({ seed, random }: RandomizedProps): RandomSource {
  if (random) return random;
  const effectiveSeed = seed ?? config.geometry.defaultSeed;
  return effectiveSeed === null ? defaultRandom : createSeededRandom(effectiveSeed);
}

/**
 * Sample once on mount, like a layout that is fixed for the component's lifetime.
 */
function useSampled<T>(precomputed: T | undefined, sample: (random: RandomSource) => T, source: RandomizedProps): T {
  const [sampled] = useState(() => precomputed ?? sample(resolveRandom(source)));
  return precomputed ?? sampled;
}

function boundsOf({ width, height }: BaseShapeProps): Rect {
  return { x: 0, y: 0, width, height };
}

const RingSvg: React.FC<BaseShapeProps & { path: ShapePath }> = ({
  path,
  width,
  height,
  fill,
  stroke,
  strokeWidth,
  strokeLinecap,
  style,
  className,
}) => (
  <svg width={width} height={height} viewBox={`0 0 ${width} ${height}`} style={style} className={className}>
    <path
      d={toSvgPath(path)}
      fillRule={path.fillRule}
      fill={fill}
      stroke={stroke}
      strokeWidth={strokeWidth}
      strokeLinecap={strokeLinecap}
    />
  </svg>
);

/**
 * Gauge ring component
 */
export const GaugeRing: React.FC<BaseShapeProps & GaugeRingParams> = (props) => (
  <RingSvg {...STROKED_DEFAULTS} {...props} path={gaugeRingPath(boundsOf(props), props)} />
);

/**
 * Offset streak ring component
 */
export const OffsetStreakRing: React.FC<BaseShapeProps & OffsetStreakRingParams> = (props) => (
  <RingSvg {...STROKED_DEFAULTS} {...props} path={offsetStreakRingPath(boundsOf(props), props)} />
);

/**
 * Sparse streak ring component
 */
export const SparseStreakRing: React.FC<
  BaseShapeProps &
    RandomizedProps &
    SparseStreakOptions & {
      thicknessRatio?: number;
      layers?: Span[][];
    }
> = (props) => {
  const { layers, layerCount, streaksPerLayer, thicknessRatio } = props;
  const sampled = useSampled(layers, (random) => generateSparseStreaks(random, { layerCount, streaksPerLayer }), props);
  const path = sparseStreakRingPath(boundsOf(props), { thicknessRatio, layers: sampled });
  return <RingSvg {...STROKED_DEFAULTS} {...props} path={path} />;
};

/**
 * Broadcast ring component
 */
export const BroadcastRing: React.FC<
  BaseShapeProps &
    RandomizedProps &
    BroadcastSpanOptions & {
      thicknessRatio?: number;
      layerCount?: number;
      spans?: Span[];
    }
> = (props) => {
  const { spans, rayCountRange, spanWidthRatioRange, uniformSpacing, thicknessRatio, layerCount } = props;
  const sampled = useSampled(
    spans,
    (random) => generateBroadcastSpans(random, { rayCountRange, spanWidthRatioRange, uniformSpacing }),
    props
  );
  const path = broadcastRingPath(boundsOf(props), { thicknessRatio, layerCount, spans: sampled });
  return <RingSvg {...STROKED_DEFAULTS} {...props} path={path} />;
};

/**
 * Tech ring component
 */
export const TechRing: React.FC<
  BaseShapeProps &
    RandomizedProps &
    NotchSpanOptions & {
      insetRatio?: number;
      notches?: number[];
    }
> = (props) => {
  const { notches, countRange, widthRatioRange, placementRange, insetRatio } = props;
  const sampled = useSampled(
    notches,
    (random) => flattenSpans(generateNotchSpans(random, { countRange, widthRatioRange, placementRange })),
    props
  );
  const path = techRingPath(boundsOf(props), { insetRatio, notches: sampled });
  return <RingSvg {...FILLED_DEFAULTS} {...props} path={path} />;
};

/**
 * Hollow tech ring component
 */
export const HollowTechRing: React.FC<
  BaseShapeProps &
    RandomizedProps & {
      insetRatio?: number;
      thicknessRatio?: number;
      outerCountRange?: [number, number];
      innerCountRange?: [number, number];
      outerNotches?: number[];
      innerNotches?: number[];
    }
> = (props) => {
  const { insetRatio, thicknessRatio, outerCountRange = [2, 5], innerCountRange = [1, 4] } = props;
  const precomputed =
    props.outerNotches && props.innerNotches
      ? { outer: props.outerNotches, inner: props.innerNotches }
      : undefined;
  const notches = useSampled(
    precomputed,
    (random) => ({
      outer: flattenSpans(generateNotchSpans(random, { countRange: outerCountRange, widthRatioRange: [0.2, 0.8] })),
      inner: flattenSpans(generateNotchSpans(random, { countRange: innerCountRange, widthRatioRange: [0.2, 0.8] })),
    }),
    props
  );
  const path = hollowTechRingPath(boundsOf(props), {
    insetRatio,
    thicknessRatio,
    outerNotches: notches.outer,
    innerNotches: notches.inner,
  });
  return <RingSvg {...FILLED_DEFAULTS} {...props} path={path} />;
};

/**
 * Wave ring component
 */
export const WaveRing: React.FC<BaseShapeProps & WaveRingParams> = (props) => (
  <RingSvg {...FILLED_DEFAULTS} {...props} path={waveRingPath(boundsOf(props), props)} />
);

/**
 * Hollow wave ring component
 */
export const HollowWaveRing: React.FC<BaseShapeProps & HollowWaveRingParams> = (props) => (
  <RingSvg {...FILLED_DEFAULTS} {...props} path={hollowWaveRingPath(boundsOf(props), props)} />
);

/**
 * Gear ring component
 */
export const GearRing: React.FC<BaseShapeProps & GearRingParams> = (props) => (
  <RingSvg {...FILLED_DEFAULTS} {...props} path={gearRingPath(boundsOf(props), props)} />
);

/**
 * Burst ring component: spokes painted over a background band.
 */
export const BurstRing: React.FC<
  Omit<BaseShapeProps, 'fill' | 'stroke' | 'strokeWidth' | 'strokeLinecap'> &
    RandomizedProps &
    BurstSpokeOptions & {
      thickness: number;
      backgroundColor: string;
      foregroundColor: string;
      spokes?: Spoke[];
    }
> = (props) => {
  const { width, height, thickness, backgroundColor, foregroundColor, widthRange, spacingRange, style, className } =
    props;
  const clipId = useId();
  const spokes = useSampled(props.spokes, (random) => generateBurstSpokes(random, { widthRange, spacingRange }), props);
  const { clip, background, rays } = burstRingPaths({ x: 0, y: 0, width, height }, { thickness, spokes });

  return (
    <svg width={width} height={height} viewBox={`0 0 ${width} ${height}`} style={style} className={className}>
      <defs>
        <clipPath id={clipId}>
          <path d={toSvgPath(clip)} clipRule={clip.fillRule} />
        </clipPath>
      </defs>
      <g clipPath={`url(#${clipId})`}>
        <path d={toSvgPath(background)} fill={backgroundColor} />
        <path d={toSvgPath(rays)} fill={foregroundColor} />
      </g>
    </svg>
  );
};
