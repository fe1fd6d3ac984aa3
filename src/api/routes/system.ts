import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { getTotalArticles } from '../../media/articleDb.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health: basic health check
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      articles: getTotalArticles(ctx.db),
      uptime: process.uptime(),
    });
  });

  return app;
}
