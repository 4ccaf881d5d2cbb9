/**
 * node-cron driven polling passes over every subscription.
 * Started by `reelrelay serve`.
 */

import cron from 'node-cron';
import type Database from 'better-sqlite3';
import type { RelayEngine, TickResult, TickStatus } from '../engine/relay.js';
import { listSubscriptions } from '../store/subscriptionStore.js';
import { chunk, sleep } from '../shared/utils.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface SchedulerOptions {
  cronExpression: string;
  batchSize: number;
  batchPauseMs: number;
}

export interface PassStats {
  subscriptions: number;
  delivered: number;
  byStatus: Partial<Record<TickStatus | 'crashed', number>>;
  durationMs: number;
  aborted: boolean;
}

export class SubscriptionScheduler {
  private task: cron.ScheduledTask | null = null;
  private controller = new AbortController();
  private currentPass: Promise<PassStats> | null = null;

  constructor(
    private readonly db: Database.Database,
    private readonly engine: RelayEngine,
    private readonly opts: SchedulerOptions,
  ) {}

  get running(): boolean {
    return this.task !== null;
  }

  /**
   * Run one pass now. If a pass is already in progress, its result is returned
   * instead of starting a second one.
   */
  runPass(): Promise<PassStats> {
    if (this.currentPass) return this.currentPass;
    this.currentPass = this.pass(this.controller.signal).finally(() => {
      this.currentPass = null;
    });
    return this.currentPass;
  }

  start(): boolean {
    if (this.task) return true;
    if (!cron.validate(this.opts.cronExpression)) {
      logger.warn({ poll_cron: this.opts.cronExpression }, 'Invalid poll_cron expression, scheduler not started');
      return false;
    }
    if (this.controller.signal.aborted) this.controller = new AbortController();

    this.task = cron.schedule(this.opts.cronExpression, () => {
      if (this.currentPass) {
        logger.debug('Previous pass still running, skipping this firing');
        return;
      }
      this.runPass().catch((err: unknown) => {
        logger.error({ error: errorMessage(err) }, 'Polling pass crashed');
      });
    });

    logger.info({ poll_cron: this.opts.cronExpression }, 'Scheduler started');
    return true;
  }

  /**
   * Stop firing, abort the pass in progress at its next checkpoint, and wait for it.
   */
  async stop(): Promise<void> {
    this.task?.stop();
    this.task = null;
    this.controller.abort();
    if (this.currentPass) {
      await this.currentPass.catch((err: unknown) => {
        logger.error({ error: errorMessage(err) }, 'Polling pass failed during shutdown');
      });
    }
    logger.info('Scheduler stopped');
  }

  private async pass(signal: AbortSignal): Promise<PassStats> {
    const startTime = Date.now();
    const stats: PassStats = {
      subscriptions: 0,
      delivered: 0,
      byStatus: {},
      durationMs: 0,
      aborted: false,
    };

    // Re-read every pass; subscriptions are never cached across passes.
    const subscriptions = listSubscriptions(this.db);
    const batches = chunk(subscriptions, this.opts.batchSize);
    logger.info({ subscriptions: subscriptions.length }, 'Polling pass starting');

    for (const [i, batch] of batches.entries()) {
      for (const sub of batch) {
        if (signal.aborted) break;
        stats.subscriptions++;
        let result: TickResult | null = null;
        try {
          result = await this.engine.runSubscriptionTick(sub, signal);
        } catch (err) {
          logger.error(
            { destination: sub.destinationId, source: sub.sourceHandle, error: errorMessage(err) },
            'Subscription tick crashed',
          );
        }
        const status = result?.status ?? 'crashed';
        stats.byStatus[status] = (stats.byStatus[status] ?? 0) + 1;
        stats.delivered += result?.delivered.length ?? 0;
      }
      if (signal.aborted) {
        stats.aborted = true;
        break;
      }
      if (i < batches.length - 1) {
        await sleep(this.opts.batchPauseMs, signal);
      }
    }

    stats.durationMs = Date.now() - startTime;
    logger.info(stats, 'Polling pass complete');
    return stats;
  }
}
