import { createHash } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';
import { nanoid } from 'nanoid';

const HASH_LENGTH = 6;
const DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

export function generateId(size = 21): string {
  return nanoid(size);
}

/**
 * Content-addressed id: SHA-256 of the UTF-8 bytes, URL-safe Base64,
 * first six characters. Roughly 36 bits of entropy, fine for a personal
 * archive but not for anything multi-tenant.
 */
export function generateHash(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('base64url').slice(0, HASH_LENGTH);
}

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local calendar date as YYYY-MM-DD. */
export function todayISO(now: Date = new Date()): string {
  return `${now.getFullYear()}-${pad2(now.getMonth() + 1)}-${pad2(now.getDate())}`;
}

/**
 * Lenient publication-date normalisation: a real calendar date comes back
 * zero-padded, anything else (missing, malformed, 2024-02-30) becomes null.
 */
export function normalizeDate(value: string | null | undefined): string | null {
  if (!value) return null;

  const match = DATE_PATTERN.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1 || month < 1 || month > 12 || day < 1) return null;

  const utc = new Date(Date.UTC(year, month - 1, day));
  if (utc.getUTCMonth() !== month - 1 || utc.getUTCDate() !== day) return null;

  return `${match[1]}-${pad2(month)}-${pad2(day)}`;
}

export function getPackageRoot(): string {
  // Walk up from the current file to the directory holding package.json.
  // Works from both src/shared/utils.ts and dist/shared/utils.js.
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
}

export function getArchiveDir(): string {
  return resolvePath('~/.readaloud');
}
