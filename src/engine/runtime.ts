import path from 'node:path';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { VideoPlatform } from '../source/adapter.js';
import type { NotificationChannel } from '../push/channel.js';
import { HttpVideoPlatform } from '../source/platform.js';
import { SqliteProcessedStore } from '../store/processedStore.js';
import { InFlightGuard } from '../fetch/inflight.js';
import { FetchPipeline } from '../fetch/pipeline.js';
import { TokenRegistry } from '../push/tokens.js';
import { TelegramChannel } from '../push/telegram.js';
import { DeliveryDispatcher } from '../push/dispatcher.js';
import { SubscriptionScheduler } from '../push/scheduler.js';
import { RelayEngine } from './relay.js';
import { ActionService } from './actions.js';
import { resolvePath } from '../shared/utils.js';

/**
 * Every long-lived service, built once at start-up and passed around explicitly.
 */
export interface Runtime {
  db: Database.Database;
  config: Config;
  platform: VideoPlatform;
  processed: SqliteProcessedStore;
  guard: InFlightGuard;
  tokens: TokenRegistry;
  channel: NotificationChannel;
  engine: RelayEngine;
  actions: ActionService;
  scheduler: SubscriptionScheduler;
}

export interface RuntimeOverrides {
  platform?: VideoPlatform;
  channel?: NotificationChannel;
  now?: () => number;
}

export function createRuntime(
  db: Database.Database,
  config: Config,
  overrides: RuntimeOverrides = {},
): Runtime {
  const downloadsDir = resolvePath(config.downloads_dir);
  const platform = overrides.platform ?? new HttpVideoPlatform(db, config.platform);
  const channel = overrides.channel ?? new TelegramChannel(config.delivery.telegram);

  const processed = SqliteProcessedStore.hydrate(db);
  const guard = new InFlightGuard();
  const tokens = new TokenRegistry({
    suffixLength: config.tokens.suffix_length,
    maxEntries: config.tokens.max_entries,
  });
  const retry = {
    attempts: config.delivery.retry.attempts,
    delayMs: config.delivery.retry.delay_ms,
  };

  const pipeline = new FetchPipeline({
    resolver: platform,
    downloader: platform,
    guard,
    downloadsDir,
    blockedMediaHosts: platform.blockedMediaHosts,
  });

  const dispatcher = new DeliveryDispatcher(channel, tokens, {
    maxBatch: config.delivery.max_batch,
    retry,
    albumPauseMs: config.delivery.album_pause_ms,
  });

  const engine = new RelayEngine({
    db,
    platform,
    processed,
    pipeline,
    dispatcher,
    freshnessSeconds: Math.round(config.schedule.freshness_hours * 3600),
    now: overrides.now,
  });

  const actions = new ActionService({
    links: platform,
    downloader: platform,
    tokens,
    channel,
    scratchDir: path.join(downloadsDir, 'actions'),
    retry,
  });

  const scheduler = new SubscriptionScheduler(db, engine, {
    cronExpression: config.schedule.poll_cron,
    batchSize: config.schedule.batch_size,
    batchPauseMs: config.schedule.batch_pause_ms,
  });

  return { db, config, platform, processed, guard, tokens, channel, engine, actions, scheduler };
}
