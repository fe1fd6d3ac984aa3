import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { createText, getText, updateText } from '../../media/textDb.js';
import { TextInputSchema, TextUpdateSchema } from '../../media/schema.js';
import { parseInput } from '../../media/statements.js';

export function textRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  app.post('/texts', async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const id = createText(ctx.db, parseInput(TextInputSchema, body, 'text'));
    return c.json({ id }, 201);
  });

  app.get('/texts/:id', (c) => {
    const id = c.req.param('id');
    const text = getText(ctx.db, id);
    if (!text) {
      return c.json({ error: `Text not found: ${id}` }, 404);
    }
    return c.json(text);
  });

  app.patch('/texts/:id', async (c) => {
    const body: unknown = await c.req.json().catch(() => ({}));
    const fields = parseInput(TextUpdateSchema, body, 'text update');
    return c.json(updateText(ctx.db, c.req.param('id'), fields));
  });

  return app;
}
