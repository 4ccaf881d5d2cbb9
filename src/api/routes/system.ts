import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import type { PassStats } from '../../push/scheduler.js';
import { listDestinations, listSubscriptions } from '../../store/subscriptionStore.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();
  let lastPassStats: PassStats | null = null;

  // GET /api/health: basic health check
  app.get('/health', (c) => {
    const { runtime } = ctx;
    return c.json({
      status: 'ok',
      version: '0.1.0',
      uptime: process.uptime(),
      scheduler: runtime.scheduler.running ? 'running' : 'stopped',
      destinations: listDestinations(runtime.db).length,
      subscriptions: listSubscriptions(runtime.db).length,
      in_flight: runtime.guard.size,
      open_tokens: runtime.tokens.size,
    });
  });

  // POST /api/tick: run one polling pass now
  app.post('/tick', async (c) => {
    lastPassStats = await ctx.runtime.scheduler.runPass();
    return c.json(lastPassStats);
  });

  // GET /api/tick/status: stats of the last manually triggered pass
  app.get('/tick/status', (c) => {
    if (!lastPassStats) {
      return c.json({ message: 'No pass has been run yet' }, 404);
    }
    return c.json(lastPassStats);
  });

  return app;
}
