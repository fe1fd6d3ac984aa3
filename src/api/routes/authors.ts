import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { addAuthor, getAuthor } from '../../media/authorDb.js';
import { AuthorSchema } from '../../media/schema.js';
import { parseInput } from '../../media/statements.js';

export function authorRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/authors: 201 when created, 200 { created: false } when id or name is taken
  app.post('/authors', async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const result = addAuthor(ctx.db, parseInput(AuthorSchema, body, 'author'));
    return c.json(result, result.created ? 201 : 200);
  });

  app.get('/authors/:id', (c) => {
    const id = c.req.param('id');
    const author = getAuthor(ctx.db, id);
    if (!author) {
      return c.json({ error: `Author not found: ${id}` }, 404);
    }
    return c.json(author);
  });

  return app;
}
