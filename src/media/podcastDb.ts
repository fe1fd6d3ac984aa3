import type Database from 'better-sqlite3';
import { generateHash, todayISO } from '../shared/utils.js';
import { ValidationError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import {
  PODCAST_UPDATABLE_COLUMNS,
  PodcastInputSchema,
  PodcastUpdateSchema,
  type PodcastInput,
  type PodcastUpdate,
} from './schema.js';
import { parseInput, runUpdate, toStorageError } from './statements.js';
import { articleExists } from './articleDb.js';
import { textExists } from './textDb.js';
import type { PodcastRow, PodcastSeed, UpdateResult } from './types.js';

export interface PodcastSeedRef {
  seedTextId?: string | null;
  seedArticleId?: string | null;
}

/**
 * Insert a podcast keyed by the hash of its title, optionally linked to the
 * article or text it was generated from. A podcast has at most one seed.
 */
export function createPodcast(
  db: Database.Database,
  input: PodcastInput,
  seed: PodcastSeedRef = {},
): string {
  const data = parseInput(PodcastInputSchema, input, 'podcast');
  const id = generateHash(data.title);
  const seedTextId = seed.seedTextId || null;
  const seedArticleId = seed.seedArticleId || null;

  if (seedTextId && seedArticleId) {
    throw new ValidationError('A podcast can be seeded by an article or a text, not both', {
      seedTextId,
      seedArticleId,
    });
  }

  try {
    db.transaction(() => {
      if (seedArticleId && !articleExists(db, seedArticleId)) {
        throw new ValidationError(`Seed article not found: ${seedArticleId}`, { seedArticleId });
      }
      if (seedTextId && !textExists(db, seedTextId)) {
        throw new ValidationError(`Seed text not found: ${seedTextId}`, { seedTextId });
      }

      db.prepare(
        `INSERT INTO podcasts (id, title, text, date_added, language, plain_text, audio_file, markdown_file)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      ).run(
        id,
        data.title,
        data.text ?? null,
        data.date_added ?? todayISO(),
        data.language ?? null,
        data.plain_text ?? null,
        data.audio_file ?? null,
        data.markdown_file ?? null,
      );

      if (seedArticleId || seedTextId) {
        db.prepare('INSERT INTO seed_text (podcast_id, article_id, text_id) VALUES (?, ?, ?)').run(
          id,
          seedArticleId,
          seedTextId,
        );
      }
    })();
  } catch (err) {
    throw toStorageError(err, 'podcast', id, 'create');
  }

  logger.debug({ id, seedArticleId, seedTextId }, 'Podcast created');
  return id;
}

export function updatePodcast(
  db: Database.Database,
  id: string,
  fields: PodcastUpdate,
): UpdateResult {
  const data = parseInput(PodcastUpdateSchema, fields, 'podcast update');
  return runUpdate(db, 'podcasts', 'podcast', PODCAST_UPDATABLE_COLUMNS, id, data);
}

export function getPodcast(db: Database.Database, id: string): PodcastRow | undefined {
  return db.prepare('SELECT * FROM podcasts WHERE id = ?').get(id) as PodcastRow | undefined;
}

export function podcastExists(db: Database.Database, id: string): boolean {
  return db.prepare('SELECT 1 FROM podcasts WHERE id = ?').get(id) !== undefined;
}

export function getPodcastSeed(db: Database.Database, id: string): PodcastSeed | undefined {
  return db
    .prepare('SELECT article_id, text_id FROM seed_text WHERE podcast_id = ? LIMIT 1')
    .get(id) as PodcastSeed | undefined;
}
