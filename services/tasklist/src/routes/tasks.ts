import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { TaskStore } from '../contracts/taskStore';
import { renderTaskListPage } from '../views/taskList';

// Missing fields read as empty, which the store treats as a no-op.
const addSchema = z.object({
  name: z.string().optional().default(''),
  task: z.string().optional().default(''),
});

export async function registerTaskRoutes(app: FastifyInstance, store: TaskStore) {
  // List
  app.get('/', async (_req, reply) => {
    const items = await store.listItems();
    return reply.type('text/html; charset=utf-8').send(renderTaskListPage(items));
  });

  // Create, then back to the list either way
  app.post('/add', async (req, reply) => {
    const parsed = addSchema.safeParse(req.body ?? {});
    if (parsed.success) {
      const result = await store.createItem(parsed.data);
      if (result.created) req.log.info({ id: result.item.id }, 'Todo created');
    } else {
      req.log.debug({ issues: parsed.error.flatten() }, 'Ignoring malformed add form');
    }
    return reply.redirect('/');
  });
}
