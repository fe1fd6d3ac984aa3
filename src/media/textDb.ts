import type Database from 'better-sqlite3';
import { generateHash, todayISO } from '../shared/utils.js';
import { logger } from '../shared/logger.js';
import {
  TEXT_UPDATABLE_COLUMNS,
  TextInputSchema,
  TextUpdateSchema,
  type TextInput,
  type TextUpdate,
} from './schema.js';
import { parseInput, runUpdate, toStorageError } from './statements.js';
import type { TextRow, UpdateResult } from './types.js';

/** Insert a standalone text keyed by the hash of its raw text. */
export function createText(db: Database.Database, input: TextInput): string {
  const data = parseInput(TextInputSchema, input, 'text');
  const id = generateHash(data.text);

  try {
    db.transaction(() => {
      db.prepare(
        `INSERT INTO texts (id, text, date_added, language, plain_text, audio_file)
         VALUES (?, ?, ?, ?, ?, ?)`,
      ).run(
        id,
        data.text,
        data.date_added ?? todayISO(),
        data.language ?? null,
        data.plain_text ?? null,
        data.audio_file ?? null,
      );
    })();
  } catch (err) {
    throw toStorageError(err, 'text', id, 'create');
  }

  logger.debug({ id }, 'Text created');
  return id;
}

export function updateText(db: Database.Database, id: string, fields: TextUpdate): UpdateResult {
  const data = parseInput(TextUpdateSchema, fields, 'text update');
  return runUpdate(db, 'texts', 'text', TEXT_UPDATABLE_COLUMNS, id, data);
}

export function getText(db: Database.Database, id: string): TextRow | undefined {
  return db.prepare('SELECT * FROM texts WHERE id = ?').get(id) as TextRow | undefined;
}

export function textExists(db: Database.Database, id: string): boolean {
  return db.prepare('SELECT 1 FROM texts WHERE id = ?').get(id) !== undefined;
}
