import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { createPodcast, getPodcast, getPodcastSeed, updatePodcast } from '../../media/podcastDb.js';
import { PodcastInputSchema, PodcastUpdateSchema } from '../../media/schema.js';
import { parseInput } from '../../media/statements.js';

const CreatePodcastBody = PodcastInputSchema.extend({
  seed_text_id: z.string().nullish(),
  seed_article_id: z.string().nullish(),
});

export function podcastRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  /**
   * POST /api/podcasts
   * Body: podcast fields plus at most one of seed_text_id / seed_article_id.
   */
  app.post('/podcasts', async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const { seed_text_id, seed_article_id, ...podcast } = parseInput(CreatePodcastBody, body, 'podcast');
    const id = createPodcast(ctx.db, podcast, {
      seedTextId: seed_text_id,
      seedArticleId: seed_article_id,
    });
    return c.json({ id }, 201);
  });

  app.get('/podcasts/:id', (c) => {
    const id = c.req.param('id');
    const podcast = getPodcast(ctx.db, id);
    if (!podcast) {
      return c.json({ error: `Podcast not found: ${id}` }, 404);
    }
    return c.json({ ...podcast, seed: getPodcastSeed(ctx.db, id) ?? null });
  });

  app.patch('/podcasts/:id', async (c) => {
    const body: unknown = await c.req.json().catch(() => ({}));
    const fields = parseInput(PodcastUpdateSchema, body, 'podcast update');
    return c.json(updatePodcast(ctx.db, c.req.param('id'), fields));
  });

  return app;
}
