/**
 * Database row shape for the articles table.
 */
export interface ArticleRow {
  id: string;
  url: string;
  title: string | null;
  date_published: string | null;
  date_added: string;
  language: string | null;
  plain_text: string | null;
  markdown_text: string | null;
  tl_dr: string | null;
  audio_file: string | null;
  markdown_file: string | null;
  vtt_file: string | null;
}

/**
 * Database row shape for the texts table.
 */
export interface TextRow {
  id: string;
  text: string;
  date_added: string;
  language: string | null;
  plain_text: string | null;
  audio_file: string | null;
}

/**
 * Database row shape for the podcasts table.
 */
export interface PodcastRow {
  id: string;
  title: string;
  text: string | null;
  date_added: string;
  language: string | null;
  plain_text: string | null;
  audio_file: string | null;
  markdown_file: string | null;
}

export interface Author {
  id: string;
  name: string;
}

/** Where a podcast was generated from. At most one side is set. */
export interface PodcastSeed {
  article_id: string | null;
  text_id: string | null;
}

export type MediaType = 'article' | 'podcast' | 'text';

/**
 * Unified listing entry for anything with a finished audio artifact.
 */
export interface AvailableMedia {
  id: string;
  title: string | null;
  date_added: string;
  date_published: string | null;
  authors: string[];
  text: string | null;
  type: MediaType;
}

/** One row per article/author pair; articles without authors get author = null. */
export interface ArticleSummary {
  id: string;
  title: string | null;
  author: string | null;
  date_published: string | null;
  url: string;
}

export type UpdateResult = { status: 'noop' } | { status: 'applied'; changes: number };

export type AddAuthorResult =
  | { created: true; author: Author }
  | { created: false; reason: 'exists' };
