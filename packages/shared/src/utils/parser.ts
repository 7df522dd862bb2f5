import msLib from 'ms';
import bytesLib from 'bytes';

const PLAIN_NUMBER = /^\d+(\.\d+)?$/;

/**
 * Parse a duration to milliseconds.
 * Numbers, and strings holding only a number, are taken as seconds, matching
 * the configuration file format; other strings accept '30s', '5m', '1h', '100ms', etc.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') return value * 1000;
  if (PLAIN_NUMBER.test(value.trim())) return Number(value.trim()) * 1000;

  const result = msLib(value);
  if (result === undefined || Number.isNaN(result)) {
    throw new Error(`Invalid duration string: "${value}"`);
  }
  return result;
}

/**
 * Format milliseconds to a human-readable duration string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  if (ms < 3_600_000) return `${Math.round(ms / 60_000)}m`;
  if (ms < 86_400_000) return `${Math.round(ms / 3_600_000)}h`;
  return `${Math.round(ms / 86_400_000)}d`;
}

/**
 * Format bytes to a human-readable string.
 */
export function formatBytes(value: number): string {
  return bytesLib.format(value, { unitSeparator: ' ' }) ?? '0 B';
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}
