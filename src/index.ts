export { initDb, getDb, closeDb } from './db/db.js';
export { runMigrations } from './db/migrate.js';
export { loadConfig, type Config } from './shared/config.js';
export {
  ArchiveError,
  ConfigError,
  DbError,
  DuplicateKeyError,
  ValidationError,
} from './shared/errors.js';
export { generateHash } from './shared/utils.js';
export {
  createArticle,
  updateArticle,
  getArticles,
  getArticle,
  getTotalArticles,
  articleExists,
  getArticleAuthors,
  listArticleSummaries,
  deleteArticle,
} from './media/articleDb.js';
export { createText, updateText, getText, textExists } from './media/textDb.js';
export {
  createPodcast,
  updatePodcast,
  getPodcast,
  podcastExists,
  getPodcastSeed,
} from './media/podcastDb.js';
export { addAuthor, getAuthor, findAuthorByName } from './media/authorDb.js';
export { fetchAvailableMedia } from './media/availableMedia.js';
export type * from './media/types.js';
export type {
  ArticleInput,
  ArticleUpdate,
  TextInput,
  TextUpdate,
  PodcastInput,
  PodcastUpdate,
} from './media/schema.js';
