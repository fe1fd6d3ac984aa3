import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';
import { pendingMigrations, runMigrations } from '../migrate.js';
import { DbError } from '../../shared/errors.js';

let db: Database.Database;

beforeEach(() => {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
});

afterEach(() => {
  db.close();
});

describe('runMigrations', () => {
  it('creates all tables from 001_init.sql', () => {
    const { applied } = runMigrations(db);
    expect(applied).toContain('001_init.sql');

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all() as Array<{ name: string }>;

    expect(tables.map((t) => t.name)).toEqual([
      '_migrations',
      'article_author',
      'articles',
      'authors',
      'podcasts',
      'seed_text',
      'texts',
    ]);
  });

  it('is idempotent (second run applies nothing)', () => {
    runMigrations(db);
    const second = runMigrations(db);
    expect(second.applied).toEqual([]);
    expect(second.skipped).toContain('001_init.sql');
  });

  it('creates the listing indexes', () => {
    runMigrations(db);

    const indexes = db
      .prepare("SELECT name FROM sqlite_master WHERE type='index' AND name LIKE 'idx_%'")
      .all() as Array<{ name: string }>;

    const indexNames = indexes.map((i) => i.name);
    expect(indexNames).toContain('idx_articles_date_added');
    expect(indexNames).toContain('idx_article_author_author');
    expect(indexNames).toContain('idx_seed_text_podcast');
  });

  it('wraps a failing migration in DbError and records nothing', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'readaloud-migrations-'));
    fs.writeFileSync(path.join(dir, '001_broken.sql'), 'CREATE TABLE oops (;', 'utf-8');

    expect(() => runMigrations(db, dir)).toThrow(DbError);
    const rows = db.prepare('SELECT name FROM _migrations').all();
    expect(rows).toEqual([]);

    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('fails when the migrations directory is missing', () => {
    expect(() => runMigrations(db, path.join(os.tmpdir(), 'readaloud-no-such-dir'))).toThrow(
      /Migrations directory not found/,
    );
  });
});

describe('pendingMigrations', () => {
  it('lists unapplied files without creating any table', () => {
    expect(pendingMigrations(db)).toEqual(['001_init.sql']);

    const tables = db.prepare("SELECT name FROM sqlite_master WHERE type='table'").all();
    expect(tables).toEqual([]);
  });

  it('is empty once migrations have run', () => {
    runMigrations(db);
    expect(pendingMigrations(db)).toEqual([]);
  });
});
