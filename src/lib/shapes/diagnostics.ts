import { config } from '@/lib/config';
import type { Logger } from '@/lib/logger';

/**
 * Report an input that degraded to an empty or partial path.
 * Debug output normally, a warning when strict diagnostics are on.
 */
export function reportDegenerateInput(log: Logger, message: string, details?: Record<string, unknown>): void {
  if (config.geometry.strictDiagnostics) {
    log.warn(message, details);
  } else {
    log.debug(message, details);
  }
}
