#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getRelayDir, resolvePath } from '../shared/utils.js';
import { errorMessage } from '../shared/errors.js';
import { initDb, closeDb } from '../db/db.js';
import { pendingMigrations, runMigrations } from '../db/migrate.js';
import {
  listSubscriptions,
  normalizeHandles,
  subscribe,
  unsubscribe,
} from '../store/subscriptionStore.js';
import { createRuntime } from '../engine/runtime.js';
import { startServer } from '../api/server.js';

const program = new Command();

program
  .name('reelrelay')
  .description('Relay new posts from video creators to chat groups')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create the default config and database')
  .action(async () => {
    const configPath = path.join(getRelayDir(), 'config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig();
    const db = initDb(resolvePath(config.db.path));
    const { applied } = runMigrations(db);
    log(
      applied.length > 0
        ? `✓ database created (${applied.length} migrations applied)`
        : '✓ database already up to date',
    );
    fs.mkdirSync(resolvePath(config.downloads_dir), { recursive: true });
    log(`✓ downloads directory: ${resolvePath(config.downloads_dir)}`);
    closeDb();
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, database and delivery settings')
  .action(async () => {
    const results: string[] = [];
    try {
      const config = await loadConfig();
      results.push('Config: ok');

      const dbPath = resolvePath(config.db.path);
      if (!fs.existsSync(dbPath)) {
        results.push('DB: missing (run reelrelay init)');
      } else {
        try {
          const db = initDb(dbPath);
          const pending = pendingMigrations(db);
          runMigrations(db);
          results.push(pending.length > 0 ? `DB: ok (applied ${pending.join(', ')})` : 'DB: ok');
          results.push(`Subscriptions: ${listSubscriptions(db).length}`);
          closeDb();
        } catch (err) {
          results.push(`DB: error (${errorMessage(err)})`);
        }
      }

      results.push(
        config.delivery.telegram.bot_token ? 'Telegram: configured' : 'Telegram: (no bot token)',
      );
      results.push(`Poll schedule: ${config.schedule.poll_cron}`);
    } catch (err) {
      results.push(`Config: error (${errorMessage(err)})`);
    }
    for (const line of results) log(line);
  });

// === serve ===
program
  .command('serve')
  .description('Start the HTTP API and the polling scheduler')
  .option('-p, --port <port>', 'Port to listen on')
  .option('--no-schedule', 'Do not start the polling scheduler')
  .action(async (opts: { port?: string; schedule: boolean }) => {
    await startServer({
      port: opts.port ? Number.parseInt(opts.port, 10) : undefined,
      schedule: opts.schedule,
    });
  });

// === subscribe ===
program
  .command('subscribe')
  .description('Subscribe a destination to one or more handles')
  .argument('<destination>', 'Chat or user id')
  .argument('<handles...>', 'Handles, space or comma separated')
  .option('-t, --topic <id>', 'Topic (thread) id inside the destination')
  .action(async (destination: string, handles: string[], opts: { topic?: string }) => {
    const { db, cleanup } = await openDb();
    try {
      const added = subscribe(db, destination, handles, opts.topic);
      const requested = normalizeHandles(handles);
      log(`✓ ${destination}: ${added.length} added, ${requested.length - added.length} already subscribed`);
    } finally {
      cleanup();
    }
  });

// === unsubscribe ===
program
  .command('unsubscribe')
  .description('Remove handles from a destination')
  .argument('<destination>', 'Chat or user id')
  .argument('<handles...>', 'Handles, space or comma separated')
  .action(async (destination: string, handles: string[]) => {
    const { db, cleanup } = await openDb();
    try {
      const { removed, notFound } = unsubscribe(db, destination, handles);
      if (removed.length > 0) log(`✓ Removed: ${removed.join(', ')}`);
      if (notFound.length > 0) log(`⚠ Not found: ${notFound.join(', ')}`);
    } finally {
      cleanup();
    }
  });

// === list ===
program
  .command('list')
  .description('List subscriptions')
  .argument('[destination]', 'Only this destination')
  .action(async (destination: string | undefined) => {
    const { db, cleanup } = await openDb();
    try {
      const subs = listSubscriptions(db, destination);
      if (subs.length === 0) {
        log('No subscriptions.');
        return;
      }
      for (const sub of subs) {
        const topic = sub.topicId ? ` topic=${sub.topicId}` : '';
        const mark = sub.lastDeliveredId || '-';
        log(`${sub.destinationId}${topic}  @${sub.sourceHandle}  last=${mark}`);
      }
    } finally {
      cleanup();
    }
  });

// === tick ===
program
  .command('tick')
  .description('Run one polling pass over every subscription and exit')
  .action(async () => {
    const { db, config, cleanup } = await openDb();
    try {
      const runtime = createRuntime(db, config);
      const stats = await runtime.scheduler.runPass();
      log(`Pass complete in ${stats.durationMs}ms`);
      log(`  Subscriptions: ${stats.subscriptions}`);
      log(`  Items delivered: ${stats.delivered}`);
      for (const [status, count] of Object.entries(stats.byStatus)) {
        log(`  ${status}: ${count}`);
      }
    } finally {
      cleanup();
    }
  });

async function openDb(): Promise<{
  db: ReturnType<typeof initDb>;
  config: Config;
  cleanup: () => void;
}> {
  const config = await loadConfig();
  const dbPath = resolvePath(config.db.path);

  if (!fs.existsSync(dbPath)) {
    log('Database not found. Run reelrelay init first.');
    process.exit(1);
  }

  const db = initDb(dbPath);
  runMigrations(db);
  return { db, config, cleanup: closeDb };
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
