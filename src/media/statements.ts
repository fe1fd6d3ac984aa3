import Database from 'better-sqlite3';
import type { z } from 'zod';
import {
  ArchiveError,
  DbError,
  DuplicateKeyError,
  ValidationError,
  type EntityKind,
} from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { UpdateResult } from './types.js';

export type MediaTable = 'articles' | 'texts' | 'podcasts';

const CONSTRAINT_DUPLICATE_CODES = new Set(['SQLITE_CONSTRAINT_PRIMARYKEY', 'SQLITE_CONSTRAINT_UNIQUE']);

export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${what}`, {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export function isDuplicateKeyViolation(err: unknown): boolean {
  return err instanceof Database.SqliteError && CONSTRAINT_DUPLICATE_CODES.has(err.code);
}

/**
 * Map a failure from inside a create/update to the archive error taxonomy.
 * Errors already in the taxonomy pass through untouched.
 */
export function toStorageError(
  err: unknown,
  entity: EntityKind,
  id: string,
  action: string,
): ArchiveError {
  if (err instanceof ArchiveError) return err;
  if (isDuplicateKeyViolation(err)) return new DuplicateKeyError(entity, id);
  return new DbError(`Failed to ${action} ${entity}: ${err instanceof Error ? err.message : String(err)}`, {
    entity,
    id,
    code: err instanceof Database.SqliteError ? err.code : undefined,
  });
}

/**
 * Partial update over a closed set of columns. Only names in `columns`
 * ever reach the SQL text; values whose key is undefined are skipped.
 */
export function runUpdate<C extends string>(
  db: Database.Database,
  table: MediaTable,
  entity: EntityKind,
  columns: readonly C[],
  id: string,
  data: { [K in C]?: unknown },
): UpdateResult {
  const touched = columns.filter((column) => data[column] !== undefined);

  if (touched.length === 0) {
    logger.debug({ table, id }, 'Nothing to update');
    return { status: 'noop' };
  }

  const sets = touched.map((column) => `${column} = ?`).join(', ');
  const values = touched.map((column) => data[column]);

  try {
    const result = db.transaction(() =>
      db.prepare(`UPDATE ${table} SET ${sets} WHERE id = ?`).run(...values, id),
    )();
    logger.debug({ table, id, changes: result.changes }, 'Row updated');
    return { status: 'applied', changes: result.changes };
  } catch (err) {
    throw toStorageError(err, entity, id, 'update');
  }
}
