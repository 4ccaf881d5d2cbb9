import type Database from 'better-sqlite3';
import { nowISO } from '../shared/utils.js';
import { DbError, errorMessage } from '../shared/errors.js';

/**
 * One (destination, source) pair and its delivery watermark.
 * `lastDeliveredAt` is the creation time (unix seconds) of `lastDeliveredId`.
 */
export interface Subscription {
  destinationId: string;
  sourceHandle: string;
  topicId: string | null;
  lastDeliveredId: string;
  lastDeliveredAt: number | null;
  createdAt: string;
}

interface SubscriptionRow {
  destination_id: string;
  source_handle: string;
  topic_id: string | null;
  last_delivered_id: string;
  last_delivered_at: number | null;
  created_at: string;
}

function toSubscription(row: SubscriptionRow): Subscription {
  return {
    destinationId: row.destination_id,
    sourceHandle: row.source_handle,
    topicId: row.topic_id,
    lastDeliveredId: row.last_delivered_id,
    lastDeliveredAt: row.last_delivered_at,
    createdAt: row.created_at,
  };
}

export function normalizeHandles(raw: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const entry of raw) {
    for (const part of entry.split(',')) {
      const handle = part.trim().replace(/^@/, '');
      if (handle) seen.add(handle);
    }
  }
  return [...seen];
}

// ================================================================
// Subscribe / unsubscribe
// ================================================================

/**
 * Add handles to a destination. Existing subscriptions keep their watermark;
 * the topic is updated on every listed handle when one is given.
 * Returns the handles that were newly added.
 */
export function subscribe(
  db: Database.Database,
  destinationId: string,
  handles: readonly string[],
  topicId?: string | null,
): string[] {
  const added: string[] = [];
  const insert = db.prepare(
    `INSERT OR IGNORE INTO subscriptions (destination_id, source_handle, topic_id, created_at)
     VALUES (?, ?, ?, ?)`,
  );
  const setTopic = db.prepare(
    'UPDATE subscriptions SET topic_id = ? WHERE destination_id = ? AND source_handle = ?',
  );

  const run = db.transaction(() => {
    for (const handle of normalizeHandles(handles)) {
      const result = insert.run(destinationId, handle, topicId ?? null, nowISO());
      if (result.changes > 0) {
        added.push(handle);
      } else if (topicId !== undefined) {
        setTopic.run(topicId, destinationId, handle);
      }
    }
  });

  try {
    run();
  } catch (err) {
    throw new DbError(`Failed to subscribe: ${errorMessage(err)}`, { destinationId });
  }
  return added;
}

export function unsubscribe(
  db: Database.Database,
  destinationId: string,
  handles: readonly string[],
): { removed: string[]; notFound: string[] } {
  const removed: string[] = [];
  const notFound: string[] = [];
  const del = db.prepare('DELETE FROM subscriptions WHERE destination_id = ? AND source_handle = ?');

  db.transaction(() => {
    for (const handle of normalizeHandles(handles)) {
      if (del.run(destinationId, handle).changes > 0) {
        removed.push(handle);
      } else {
        notFound.push(handle);
      }
    }
  })();

  return { removed, notFound };
}

// ================================================================
// Reads
// ================================================================

export function listSubscriptions(db: Database.Database, destinationId?: string): Subscription[] {
  const rows = destinationId
    ? db
        .prepare<[string], SubscriptionRow>(
          'SELECT * FROM subscriptions WHERE destination_id = ? ORDER BY created_at, source_handle',
        )
        .all(destinationId)
    : db
        .prepare<[], SubscriptionRow>(
          'SELECT * FROM subscriptions ORDER BY destination_id, created_at, source_handle',
        )
        .all();
  return rows.map(toSubscription);
}

export function getSubscription(
  db: Database.Database,
  destinationId: string,
  sourceHandle: string,
): Subscription | undefined {
  const row = db
    .prepare<[string, string], SubscriptionRow>(
      'SELECT * FROM subscriptions WHERE destination_id = ? AND source_handle = ?',
    )
    .get(destinationId, sourceHandle);
  return row ? toSubscription(row) : undefined;
}

export function listDestinations(db: Database.Database): string[] {
  return db
    .prepare<[], { destination_id: string }>(
      'SELECT DISTINCT destination_id FROM subscriptions ORDER BY destination_id',
    )
    .all()
    .map((r) => r.destination_id);
}

// ================================================================
// Watermark
// ================================================================

/**
 * Advance the watermark. Ignored (returns false) when the subscription is gone or
 * `createdAt` is not newer than the stored watermark, so it never moves backwards.
 */
export function commitWatermark(
  db: Database.Database,
  destinationId: string,
  sourceHandle: string,
  itemId: string,
  createdAt: number,
): boolean {
  const result = db
    .prepare(
      `UPDATE subscriptions
       SET last_delivered_id = ?, last_delivered_at = ?
       WHERE destination_id = ? AND source_handle = ?
         AND (last_delivered_at IS NULL OR last_delivered_at < ?)`,
    )
    .run(itemId, createdAt, destinationId, sourceHandle, createdAt);
  return result.changes > 0;
}
