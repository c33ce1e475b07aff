import { describe, it, expect } from 'vitest';
import {
  formatBytes,
  collapseWhitespace,
  toLowerCaseSet,
  escapeRegex,
  toEpochMs,
  MS_PER_DAY,
  MS_PER_HOUR,
} from './utils';

describe('formatBytes', () => {
  it('should return "0 Bytes" for 0', () => {
    expect(formatBytes(0)).toBe('0 Bytes');
  });

  it('should format bytes correctly', () => {
    expect(formatBytes(1024)).toBe('1 KB');
    expect(formatBytes(1048576)).toBe('1 MB');
    expect(formatBytes(1073741824)).toBe('1 GB');
  });

  it('should respect decimals', () => {
    expect(formatBytes(1536, 1)).toBe('1.5 KB');
  });
});

describe('collapseWhitespace', () => {
  it('should collapse inner runs and trim', () => {
    expect(collapseWhitespace('  Первый   канал \t HD ')).toBe('Первый канал HD');
  });

  it('should return empty string for blank input', () => {
    expect(collapseWhitespace('   ')).toBe('');
  });
});

describe('toLowerCaseSet', () => {
  it('should lower-case, trim and drop blanks', () => {
    const set = toLowerCaseSet(['Кино', ' News ', '', '  ']);
    expect([...set]).toEqual(['кино', 'news']);
  });
});

describe('escapeRegex', () => {
  it('should escape special characters', () => {
    expect(escapeRegex('a+b (c)')).toBe('a\\+b \\(c\\)');
  });
});

describe('toEpochMs', () => {
  it('should accept numbers and dates', () => {
    expect(toEpochMs(42)).toBe(42);
    expect(toEpochMs(new Date(Date.UTC(2024, 0, 1)))).toBe(1704067200000);
  });

  it('should expose time constants', () => {
    expect(MS_PER_DAY).toBe(24 * MS_PER_HOUR);
  });
});
