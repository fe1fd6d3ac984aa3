import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { ValidationError } from '../../shared/errors.js';
import { addAuthor, getAuthor, findAuthorByName, findOrCreateAuthor } from '../authorDb.js';

let db: Database.Database;

beforeEach(() => {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
});

afterEach(() => {
  db.close();
});

describe('addAuthor', () => {
  it('adds an author', () => {
    const result = addAuthor(db, { id: 'ada', name: 'Ada Lovelace' });
    expect(result).toEqual({ created: true, author: { id: 'ada', name: 'Ada Lovelace' } });
    expect(getAuthor(db, 'ada')).toEqual({ id: 'ada', name: 'Ada Lovelace' });
  });

  it('reports an existing id without throwing', () => {
    addAuthor(db, { id: 'ada', name: 'Ada Lovelace' });
    expect(addAuthor(db, { id: 'ada', name: 'Someone Else' })).toEqual({ created: false, reason: 'exists' });
    expect(getAuthor(db, 'ada')?.name).toBe('Ada Lovelace');
  });

  it('reports an existing name without throwing', () => {
    addAuthor(db, { id: 'ada', name: 'Ada Lovelace' });
    expect(addAuthor(db, { id: 'ada-2', name: 'Ada Lovelace' })).toEqual({ created: false, reason: 'exists' });
    expect(getAuthor(db, 'ada-2')).toBeUndefined();
  });

  it('rejects blank ids and names', () => {
    expect(() => addAuthor(db, { id: '', name: 'Nobody' })).toThrow(ValidationError);
    expect(() => addAuthor(db, { id: 'x', name: '' })).toThrow(ValidationError);
  });
});

describe('getAuthor', () => {
  it('returns undefined for an unknown id', () => {
    expect(getAuthor(db, 'nobody')).toBeUndefined();
  });
});

describe('findOrCreateAuthor', () => {
  it('returns the existing id for a known name', () => {
    addAuthor(db, { id: 'ada', name: 'Ada Lovelace' });
    expect(findOrCreateAuthor(db, 'Ada Lovelace')).toBe('ada');
  });

  it('creates an author with a generated id for a new name', () => {
    const id = findOrCreateAuthor(db, 'Grace Hopper');
    expect(id).toHaveLength(21);
    expect(findAuthorByName(db, 'Grace Hopper')).toEqual({ id, name: 'Grace Hopper' });
    expect(findOrCreateAuthor(db, 'Grace Hopper')).toBe(id);
  });

  it('matches names exactly', () => {
    addAuthor(db, { id: 'ada', name: 'Ada Lovelace' });
    expect(findOrCreateAuthor(db, 'ada lovelace')).not.toBe('ada');
  });
});
