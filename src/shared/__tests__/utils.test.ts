import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';
import {
  generateHash,
  generateId,
  getPackageRoot,
  normalizeDate,
  resolvePath,
  todayISO,
} from '../utils.js';

describe('generateHash', () => {
  it('matches known digests', () => {
    expect(generateHash('https://example.com/a')).toBe('Lc4KTF');
    expect(generateHash('https://example.com/b')).toBe('1_5Wiz');
    expect(generateHash('hello')).toBe('LPJNul');
  });

  it('is deterministic', () => {
    expect(generateHash('Episode One')).toBe(generateHash('Episode One'));
  });

  it('always yields six URL-safe characters', () => {
    for (const value of ['', 'a', 'Some raw text', 'ünïcödé', 'x'.repeat(10_000)]) {
      const hash = generateHash(value);
      expect(hash).toHaveLength(6);
      expect(hash).toMatch(/^[A-Za-z0-9_-]{6}$/);
    }
  });

  it('hashes the empty string', () => {
    expect(generateHash('')).toBe('47DEQp');
  });
});

describe('normalizeDate', () => {
  it('keeps a valid date', () => {
    expect(normalizeDate('2024-02-29')).toBe('2024-02-29');
  });

  it('zero-pads single-digit month and day', () => {
    expect(normalizeDate('2024-3-7')).toBe('2024-03-07');
  });

  it('drops impossible calendar dates', () => {
    expect(normalizeDate('2024-02-30')).toBeNull();
    expect(normalizeDate('2023-02-29')).toBeNull();
    expect(normalizeDate('2024-13-01')).toBeNull();
    expect(normalizeDate('2024-00-10')).toBeNull();
  });

  it('drops other formats', () => {
    expect(normalizeDate('March 3, 2024')).toBeNull();
    expect(normalizeDate('2024/03/03')).toBeNull();
    expect(normalizeDate('2024-03-03T10:00:00Z')).toBeNull();
  });

  it('treats missing values as unset', () => {
    expect(normalizeDate(undefined)).toBeNull();
    expect(normalizeDate(null)).toBeNull();
    expect(normalizeDate('')).toBeNull();
  });
});

describe('todayISO', () => {
  it('formats the local calendar date', () => {
    expect(todayISO(new Date(2024, 0, 5, 23, 59))).toBe('2024-01-05');
  });

  it('defaults to now', () => {
    expect(todayISO()).toMatch(/^\d{4}-\d{2}-\d{2}$/);
  });
});

describe('resolvePath', () => {
  it('expands ~ to home directory', () => {
    expect(resolvePath('~/archive.db')).toBe(path.join(homedir(), 'archive.db'));
  });

  it('returns absolute paths as-is', () => {
    expect(resolvePath('/absolute/path')).toBe('/absolute/path');
  });
});

describe('generateId', () => {
  it('generates string of default length', () => {
    expect(generateId()).toHaveLength(21);
  });

  it('generates unique IDs', () => {
    expect(generateId()).not.toBe(generateId());
  });
});

describe('getPackageRoot', () => {
  it('returns the directory holding package.json', () => {
    expect(fs.existsSync(path.join(getPackageRoot(), 'package.json'))).toBe(true);
  });
});
