import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import {
  createArticle,
  updateArticle,
  getArticles,
  getArticle,
  getArticleAuthors,
  getTotalArticles,
  deleteArticle,
} from '../../media/articleDb.js';
import { ArticleInputSchema, ArticleUpdateSchema } from '../../media/schema.js';
import { parseInput } from '../../media/statements.js';

const CreateArticleBody = ArticleInputSchema.extend({
  authors: z.array(z.string()).default([]),
});

const PageQuery = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).optional(),
});

export function articleRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/articles?skip=&limit=: newest first
  app.get('/articles', (c) => {
    const query = parseInput(PageQuery, c.req.query(), 'pagination');
    const { default_limit, max_limit } = ctx.config.pagination;
    const limit = Math.min(query.limit ?? default_limit, max_limit);

    return c.json({
      total: getTotalArticles(ctx.db),
      skip: query.skip,
      limit,
      items: getArticles(ctx.db, { skip: query.skip, limit }),
    });
  });

  // GET /api/articles/:id: single article with its author names
  app.get('/articles/:id', (c) => {
    const id = c.req.param('id');
    const article = getArticle(ctx.db, id);
    if (!article) {
      return c.json({ error: `Article not found: ${id}` }, 404);
    }
    return c.json({ ...article, authors: getArticleAuthors(ctx.db, id) });
  });

  /**
   * POST /api/articles
   * Body: article fields plus optional `authors: string[]`.
   * 409 when the URL is already archived.
   */
  app.post('/articles', async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const { authors, ...article } = parseInput(CreateArticleBody, body, 'article');
    const id = createArticle(ctx.db, article, authors);
    return c.json({ id }, 201);
  });

  // PATCH /api/articles/:id: partial update; { status: 'noop' } for an empty body
  app.patch('/articles/:id', async (c) => {
    const body: unknown = await c.req.json().catch(() => ({}));
    const fields = parseInput(ArticleUpdateSchema, body, 'article update');
    return c.json(updateArticle(ctx.db, c.req.param('id'), fields));
  });

  // DELETE /api/articles/:id: { deleted: 0 } when nothing matched
  app.delete('/articles/:id', (c) => {
    return c.json({ deleted: deleteArticle(ctx.db, c.req.param('id')) });
  });

  return app;
}
