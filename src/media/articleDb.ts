import type Database from 'better-sqlite3';
import { generateHash, normalizeDate, todayISO } from '../shared/utils.js';
import { ValidationError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import {
  ARTICLE_UPDATABLE_COLUMNS,
  ArticleInputSchema,
  ArticleUpdateSchema,
  type ArticleInput,
  type ArticleUpdate,
} from './schema.js';
import { parseInput, runUpdate, toStorageError } from './statements.js';
import { findOrCreateAuthor } from './authorDb.js';
import type { ArticleRow, ArticleSummary, UpdateResult } from './types.js';

export const DEFAULT_PAGE_LIMIT = 100;

/**
 * Insert an article keyed by the hash of its URL and link its authors,
 * creating any author not yet known by exact name. Returns the new id.
 * A URL that is already stored raises DuplicateKeyError and writes nothing.
 */
export function createArticle(
  db: Database.Database,
  input: ArticleInput,
  authorNames: readonly string[] = [],
): string {
  const data = parseInput(ArticleInputSchema, input, 'article');
  const id = generateHash(data.url);
  const names = [...new Set(authorNames.filter((name) => name.length > 0))];

  try {
    db.transaction(() => {
      db.prepare(
        `INSERT INTO articles
         (id, url, title, date_published, date_added, language, plain_text, markdown_text,
          tl_dr, audio_file, markdown_file, vtt_file)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      ).run(
        id,
        data.url,
        data.title ?? null,
        normalizeDate(data.date_published),
        data.date_added ?? todayISO(),
        data.language ?? null,
        data.plain_text ?? null,
        data.markdown_text ?? null,
        data.tl_dr ?? null,
        data.audio_file ?? null,
        data.markdown_file ?? null,
        data.vtt_file ?? null,
      );

      const link = db.prepare('INSERT INTO article_author (article_id, author_id) VALUES (?, ?)');
      for (const name of names) {
        link.run(id, findOrCreateAuthor(db, name));
      }
    })();
  } catch (err) {
    throw toStorageError(err, 'article', id, 'create');
  }

  logger.debug({ id, url: data.url, authors: names.length }, 'Article created');
  return id;
}

export function updateArticle(
  db: Database.Database,
  id: string,
  fields: ArticleUpdate,
): UpdateResult {
  const data = parseInput(ArticleUpdateSchema, fields, 'article update');
  if (data.date_published !== undefined) {
    data.date_published = normalizeDate(data.date_published);
  }
  return runUpdate(db, 'articles', 'article', ARTICLE_UPDATABLE_COLUMNS, id, data);
}

export function getArticles(
  db: Database.Database,
  opts: { skip?: number; limit?: number } = {},
): ArticleRow[] {
  const skip = opts.skip ?? 0;
  const limit = opts.limit ?? DEFAULT_PAGE_LIMIT;

  if (!Number.isInteger(skip) || skip < 0) {
    throw new ValidationError('skip must be a non-negative integer', { skip });
  }
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError('limit must be a positive integer', { limit });
  }

  return db
    .prepare('SELECT * FROM articles ORDER BY date_added DESC, rowid DESC LIMIT ? OFFSET ?')
    .all(limit, skip) as ArticleRow[];
}

export function getArticle(db: Database.Database, id: string): ArticleRow | undefined {
  return db.prepare('SELECT * FROM articles WHERE id = ?').get(id) as ArticleRow | undefined;
}

export function getTotalArticles(db: Database.Database): number {
  const row = db.prepare('SELECT COUNT(*) AS count FROM articles').get() as { count: number };
  return row.count;
}

export function articleExists(db: Database.Database, id: string): boolean {
  return db.prepare('SELECT 1 FROM articles WHERE id = ?').get(id) !== undefined;
}

export function getArticleAuthors(db: Database.Database, id: string): string[] {
  const rows = db
    .prepare(
      `SELECT authors.name FROM article_author
       JOIN authors ON authors.id = article_author.author_id
       WHERE article_author.article_id = ?
       ORDER BY authors.name`,
    )
    .all(id) as Array<{ name: string }>;
  return rows.map((r) => r.name);
}

export function listArticleSummaries(db: Database.Database): ArticleSummary[] {
  return db
    .prepare(
      `SELECT articles.id, articles.title, authors.name AS author, articles.date_published, articles.url
       FROM articles
       LEFT JOIN article_author ON articles.id = article_author.article_id
       LEFT JOIN authors ON article_author.author_id = authors.id
       ORDER BY articles.date_added DESC, articles.rowid DESC, authors.name`,
    )
    .all() as ArticleSummary[];
}

/**
 * Remove an article. Its author links and any podcast seed links pointing
 * at it go with it (ON DELETE CASCADE); author rows stay.
 */
export function deleteArticle(db: Database.Database, id: string): number {
  let changes: number;
  try {
    changes = db.transaction(() => db.prepare('DELETE FROM articles WHERE id = ?').run(id).changes)();
  } catch (err) {
    throw toStorageError(err, 'article', id, 'delete');
  }
  logger.debug({ id, changes }, 'Article delete');
  return changes;
}
