import type Database from 'better-sqlite3';
import { generateId } from '../shared/utils.js';
import { logger } from '../shared/logger.js';
import { AuthorSchema } from './schema.js';
import { isDuplicateKeyViolation, parseInput, toStorageError } from './statements.js';
import type { AddAuthorResult, Author } from './types.js';

/**
 * Insert an author with a caller-supplied id. An id or name that is already
 * taken is reported as `{ created: false }`, not thrown.
 */
export function addAuthor(db: Database.Database, input: Author): AddAuthorResult {
  const author = parseInput(AuthorSchema, input, 'author');

  try {
    db.prepare('INSERT INTO authors (id, name) VALUES (?, ?)').run(author.id, author.name);
  } catch (err) {
    if (isDuplicateKeyViolation(err)) {
      logger.debug({ id: author.id, name: author.name }, 'Author already exists');
      return { created: false, reason: 'exists' };
    }
    throw toStorageError(err, 'author', author.id, 'add');
  }

  logger.debug({ id: author.id }, 'Author added');
  return { created: true, author };
}

export function getAuthor(db: Database.Database, id: string): Author | undefined {
  return db.prepare('SELECT id, name FROM authors WHERE id = ?').get(id) as Author | undefined;
}

export function findAuthorByName(db: Database.Database, name: string): Author | undefined {
  return db.prepare('SELECT id, name FROM authors WHERE name = ?').get(name) as Author | undefined;
}

/**
 * Exact-name lookup, inserting a fresh author when none matches.
 * Callers run this inside their own transaction.
 */
export function findOrCreateAuthor(db: Database.Database, name: string): string {
  const existing = findAuthorByName(db, name);
  if (existing) return existing.id;

  const id = generateId();
  db.prepare('INSERT INTO authors (id, name) VALUES (?, ?)').run(id, name);
  return id;
}
