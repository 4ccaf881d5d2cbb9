import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { isActionKind } from '../../push/channel.js';
import { ActionError } from '../../shared/errors.js';
import { parseBody } from './body.js';

const ActionBody = z.object({
  requester_id: z.string().min(1),
  source_handle: z.string().min(1),
});

const FetchBody = z.object({
  destination_id: z.string().min(1),
  topic_id: z.string().min(1).nullish(),
  source_handle: z.string().min(1),
  item_id: z.string().regex(/^\d+$/, 'item_id must be numeric'),
});

export function actionRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/actions/:kind/:token: fulfil a button press
  app.post('/actions/:kind/:token', async (c) => {
    const kind = c.req.param('kind');
    if (!isActionKind(kind)) {
      throw new ActionError(`Unknown action: ${kind}`, false, { kind });
    }
    const body = await parseBody(c, ActionBody);
    const outcome = await ctx.runtime.actions.handle({
      kind,
      token: c.req.param('token'),
      requesterId: body.requester_id,
      sourceHandle: body.source_handle.replace(/^@/, ''),
    });
    if (outcome.expired) {
      throw new ActionError(outcome.message, true, { kind });
    }
    return c.json(outcome, outcome.ok ? 200 : 502);
  });

  // POST /api/fetch: fetch and deliver one item now
  app.post('/fetch', async (c) => {
    const body = await parseBody(c, FetchBody);
    const outcome = await ctx.runtime.engine.fetchNow(
      { destinationId: body.destination_id, topicId: body.topic_id ?? null },
      body.source_handle.replace(/^@/, ''),
      body.item_id,
    );
    if (outcome.ok) return c.json(outcome, 200);
    const conflict = outcome.status === 'already_delivered' || outcome.status === 'in_progress';
    return c.json(outcome, conflict ? 409 : 502);
  });

  return app;
}
