import type Database from 'better-sqlite3';
import type { AvailableMedia, MediaType } from './types.js';

// Must match the char(31) passed to group_concat below.
const AUTHOR_SEPARATOR = '\u001f';

interface MediaRow {
  id: string;
  title: string | null;
  date_added: string;
  date_published: string | null;
  authors: string | null;
  text: string | null;
  type: MediaType;
}

/**
 * Everything with a finished audio artifact, as one listing:
 * articles first, then podcasts, then texts.
 */
export function fetchAvailableMedia(db: Database.Database): AvailableMedia[] {
  const articles = db
    .prepare(
      `SELECT articles.id, articles.title, articles.date_added, articles.date_published,
              group_concat(authors.name, char(31)) AS authors,
              articles.plain_text AS text, 'article' AS type
       FROM articles
       LEFT JOIN article_author ON articles.id = article_author.article_id
       LEFT JOIN authors ON article_author.author_id = authors.id
       WHERE articles.audio_file IS NOT NULL
       GROUP BY articles.id
       ORDER BY articles.date_added DESC, articles.rowid DESC`,
    )
    .all() as MediaRow[];

  const podcasts = db
    .prepare(
      `SELECT id, title, date_added, NULL AS date_published, NULL AS authors, text, 'podcast' AS type
       FROM podcasts
       WHERE audio_file IS NOT NULL
       ORDER BY date_added DESC, rowid DESC`,
    )
    .all() as MediaRow[];

  const texts = db
    .prepare(
      `SELECT id, NULL AS title, date_added, NULL AS date_published, NULL AS authors,
              plain_text AS text, 'text' AS type
       FROM texts
       WHERE audio_file IS NOT NULL
       ORDER BY date_added DESC, rowid DESC`,
    )
    .all() as MediaRow[];

  return [...articles, ...podcasts, ...texts].map((row) => ({
    id: row.id,
    title: row.title,
    date_added: row.date_added,
    date_published: row.date_published,
    authors: row.authors ? row.authors.split(AUTHOR_SEPARATOR) : [],
    text: row.text,
    type: row.type,
  }));
}
