import type { Duration } from '../types/timer.js';

const MULTIPLIERS: Record<string, number> = {
  'ms': 1,
  's': 1000,
  'm': 60 * 1000,
  'h': 60 * 60 * 1000,
  'd': 24 * 60 * 60 * 1000,
  'w': 7 * 24 * 60 * 60 * 1000
};

/**
 * Parses a duration into milliseconds.
 * Accepted formats: "500ms", "30s", "15m", "24h", "7d", "1w", "1.5h" or a number in ms.
 */
export function parseDuration(duration: Duration): number {
  if (typeof duration === 'number') {
    if (!Number.isFinite(duration) || duration < 0) {
      throw new Error(`Invalid duration: ${duration}`);
    }
    return duration;
  }

  const match = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h|d|w)$/.exec(duration.trim());
  if (!match) throw new Error(`Invalid duration: ${duration}`);

  const [, value, unit] = match;
  const multiplier = unit === undefined ? undefined : MULTIPLIERS[unit];

  if (value === undefined || multiplier === undefined) {
    throw new Error(`Unknown duration unit: ${unit}`);
  }

  return Math.round(parseFloat(value) * multiplier);
}

/**
 * Like {@link parseDuration}, but passes `undefined` through.
 */
export function parseOptionalDuration(duration: Duration | undefined): number | undefined {
  return duration === undefined ? undefined : parseDuration(duration);
}

/**
 * Formats milliseconds into a readable string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60 * 1000) return `${Math.round(ms / 1000)}s`;
  if (ms < 60 * 60 * 1000) return `${Math.round(ms / (60 * 1000))}m`;
  if (ms < 24 * 60 * 60 * 1000) return `${Math.round(ms / (60 * 60 * 1000))}h`;
  return `${Math.round(ms / (24 * 60 * 60 * 1000))}d`;
}
