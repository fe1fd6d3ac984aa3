import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import { ArchiveError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { loadConfig } from '../shared/config.js';
import { systemRoutes } from './routes/system.js';
import { mediaRoutes } from './routes/media.js';
import { articleRoutes } from './routes/articles.js';
import { textRoutes } from './routes/texts.js';
import { podcastRoutes } from './routes/podcasts.js';
import { authorRoutes } from './routes/authors.js';

export interface AppContext {
  db: Database.Database;
  config: Config;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.use('*', cors());

  app.route('/api', systemRoutes(ctx));
  app.route('/api', mediaRoutes(ctx));
  app.route('/api', articleRoutes(ctx));
  app.route('/api', textRoutes(ctx));
  app.route('/api', podcastRoutes(ctx));
  app.route('/api', authorRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof ArchiveError) {
      const status = errorCodeToHttpStatus(err.code);
      if (status >= 500) {
        logger.error({ code: err.code, error: err.message, details: err.details }, 'Request failed');
      }
      return c.json({ error: err.message, code: err.code, details: err.details }, status);
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'CONFIG_ERROR':
    case 'VALIDATION_ERROR':
      return 400;
    case 'DUPLICATE_KEY':
      return 409;
    case 'DB_ERROR':
    default:
      return 500;
  }
}

export async function startServer(opts: { port?: number } = {}): Promise<void> {
  const config = await loadConfig();
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const db = initDb(config.db.path, { busyTimeoutMs: config.db.busy_timeout_ms });
  runMigrations(db);

  const app = createApp({ db, config });

  serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ port: info.port, host }, 'Archive API listening');
  });

  const shutdown = () => {
    logger.info('Shutting down...');
    closeDb();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
