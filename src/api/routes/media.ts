import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { fetchAvailableMedia } from '../../media/availableMedia.js';

export function mediaRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/media: everything that has audio, across articles, podcasts and texts
  app.get('/media', (c) => {
    return c.json(fetchAvailableMedia(ctx.db));
  });

  return app;
}
