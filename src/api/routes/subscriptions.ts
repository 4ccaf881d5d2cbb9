import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { listSubscriptions, subscribe, unsubscribe } from '../../store/subscriptionStore.js';
import { parseBody } from './body.js';

const SubscribeBody = z.object({
  destination_id: z.string().min(1),
  handles: z.array(z.string()).min(1),
  topic_id: z.string().min(1).nullish(),
});

const UnsubscribeBody = z.object({
  destination_id: z.string().min(1),
  handles: z.array(z.string()).min(1),
});

export function subscriptionRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/subscriptions?destination=<id>
  app.get('/subscriptions', (c) => {
    const destination = c.req.query('destination');
    return c.json(listSubscriptions(ctx.runtime.db, destination || undefined));
  });

  // POST /api/subscriptions: add handles to a destination
  app.post('/subscriptions', async (c) => {
    const body = await parseBody(c, SubscribeBody);
    const added = subscribe(ctx.runtime.db, body.destination_id, body.handles, body.topic_id);
    return c.json(
      { added, subscriptions: listSubscriptions(ctx.runtime.db, body.destination_id) },
      added.length > 0 ? 201 : 200,
    );
  });

  // DELETE /api/subscriptions: remove handles from a destination
  app.delete('/subscriptions', async (c) => {
    const body = await parseBody(c, UnsubscribeBody);
    return c.json(unsubscribe(ctx.runtime.db, body.destination_id, body.handles));
  });

  return app;
}
