/**
 * Library configuration from environment variables
 *
 * Variables must be prefixed with VITE_ to be exposed by Vite.
 * See: https://vite.dev/guide/env-and-mode.html
 *
 * Usage:
 *   import { config } from '@/lib/config';
 *   if (config.geometry.strictDiagnostics) { ... }
 */

interface GeometryConfig {
  /** Log degenerate inputs (empty notch lists and the like) as warnings instead of debug output. */
  strictDiagnostics: boolean;
  /** Seed used by randomized components that receive neither `seed` nor `random`. */
  defaultSeed: number | null;
}

interface AppConfig {
  geometry: GeometryConfig;
  isDev: boolean;
  isProd: boolean;
}

function getEnvVar(key: string, defaultValue: string): string {
  const value: unknown = import.meta.env[key];
  return typeof value === 'string' ? value : defaultValue;
}

export function parseBooleanFlag(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function parseSeed(value: string): number | null {
  if (value.trim() === '') return null;
  const seed = Number(value);
  return Number.isFinite(seed) ? Math.floor(seed) : null;
}

export const config: AppConfig = {
  geometry: {
    strictDiagnostics: parseBooleanFlag(getEnvVar('VITE_STRICT_GEOMETRY', 'false')),
    defaultSeed: parseSeed(getEnvVar('VITE_RING_SEED', '')),
  },
  isDev: import.meta.env.DEV,
  isProd: import.meta.env.PROD,
};
