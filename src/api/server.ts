import fs from 'node:fs';
import path from 'node:path';
import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { Runtime } from '../engine/runtime.js';
import { createRuntime } from '../engine/runtime.js';
import { ActionError, RelayError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import { resolvePath, getRelayDir } from '../shared/utils.js';
import { subscriptionRoutes } from './routes/subscriptions.js';
import { actionRoutes } from './routes/actions.js';
import { systemRoutes } from './routes/system.js';

export interface AppContext {
  runtime: Runtime;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.route('/api', subscriptionRoutes(ctx));
  app.route('/api', actionRoutes(ctx));
  app.route('/api', systemRoutes(ctx));

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof RelayError) {
      const status = errorToHttpStatus(err);
      return c.json({ error: err.message, code: err.code, details: err.details }, status);
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

export function errorToHttpStatus(err: RelayError): ContentfulStatusCode {
  if (err instanceof ActionError) {
    return err.expired ? 410 : 400;
  }
  switch (err.code) {
    case 'BAD_REQUEST':
    case 'CONFIG_ERROR':
      return 400;
    case 'SOURCE_ERROR':
    case 'DELIVERY_ERROR':
      return 502;
    case 'DB_ERROR':
      return 500;
    default:
      return 500;
  }
}

/**
 * First-run setup: write a default config if none exists. Idempotent.
 */
function autoInit(): void {
  const configPath = path.join(getRelayDir(), 'config.yaml');
  if (!process.env['REELRELAY_CONFIG'] && !fs.existsSync(configPath)) {
    writeDefaultConfig(configPath);
    logger.info({ path: configPath }, 'First run: created default config');
  }
}

export async function startServer(opts: { port?: number; schedule?: boolean } = {}): Promise<void> {
  autoInit();

  const config = await loadConfig();
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const db = initDb(resolvePath(config.db.path));
  runMigrations(db);

  if (!config.delivery.telegram.bot_token) {
    logger.warn('delivery.telegram.bot_token is empty; every send will be rejected');
  }

  const runtime = createRuntime(db, config);
  const app = createApp({ runtime });

  logger.info({ port, host }, 'Starting reelrelay server');
  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ url: `http://${host}:${info.port}` }, 'Listening');
  });

  if (opts.schedule !== false) {
    runtime.scheduler.start();
  }

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down...');
    await runtime.scheduler.stop();
    server.close();
    closeDb();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}
