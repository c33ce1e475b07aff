/**
 * Shared text and time helpers used by the playlist filter, the EPG reducer
 * and the worker.
 */

export const MS_PER_HOUR = 60 * 60 * 1000;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

/**
 * Format bytes to human readable string
 */
export function formatBytes(bytes: number, decimals = 2): string {
  if (bytes === 0) return '0 Bytes';

  const k = 1024;
  const dm = decimals < 0 ? 0 : decimals;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB', 'PB'];

  const i = Math.floor(Math.log(bytes) / Math.log(k));

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(dm))} ${sizes[i]}`;
}

/**
 * Collapse runs of whitespace into single spaces and trim
 */
export function collapseWhitespace(value: string): string {
  return value.split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Build a lower-cased lookup set, dropping blank values
 */
export function toLowerCaseSet(values: Iterable<string>): Set<string> {
  const result = new Set<string>();
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed) {
      result.add(trimmed.toLowerCase());
    }
  }
  return result;
}

/**
 * Escapes special regex characters in a string
 */
export function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Resolve a clock argument to epoch milliseconds
 */
export function toEpochMs(now: Date | number): number {
  return typeof now === 'number' ? now : now.getTime();
}
