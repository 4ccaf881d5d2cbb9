import type Database from 'better-sqlite3';
import { nowISO } from '../shared/utils.js';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type ProcessedState = 'reserved' | 'delivered' | 'skipped';

interface ProcessedRow {
  destination_id: string;
  item_id: string;
  state: ProcessedState;
}

/**
 * Per-destination set of item IDs that are reserved (download in progress),
 * delivered, or skipped for good (media that will never be downloadable). Membership reads come from memory; every mutation is written to
 * SQLite before the call returns.
 */
export interface ProcessedSet {
  isNew(destination: string, itemId: string): boolean;
  /** Returns true if this call took the reservation; false if the ID was already present. */
  reserve(destination: string, itemId: string): boolean;
  /** Drops a reservation. No-op for unknown or delivered IDs. Returns whether anything changed. */
  release(destination: string, itemId: string): boolean;
  /** Marks a reserved (or unseen) ID as delivered. */
  confirm(destination: string, itemId: string): void;
  /** Marks a reserved (or unseen) ID as handled without delivery. */
  skip(destination: string, itemId: string): void;
  stateOf(destination: string, itemId: string): ProcessedState | undefined;
}

export class SqliteProcessedStore implements ProcessedSet {
  private readonly entries = new Map<string, Map<string, ProcessedState>>();

  private constructor(private readonly db: Database.Database) {}

  /**
   * Load every row into memory. Reservations left behind by a process that died
   * mid-download were never delivered, so they are released here unless
   * `keepStaleReservations` is set.
   */
  static hydrate(
    db: Database.Database,
    opts: { keepStaleReservations?: boolean } = {},
  ): SqliteProcessedStore {
    const store = new SqliteProcessedStore(db);

    if (!opts.keepStaleReservations) {
      const released = db.prepare("DELETE FROM processed_items WHERE state = 'reserved'").run();
      if (released.changes > 0) {
        logger.warn({ count: released.changes }, 'Released reservations left by a previous run');
      }
    }

    const rows = db
      .prepare<[], ProcessedRow>('SELECT destination_id, item_id, state FROM processed_items')
      .all();
    for (const row of rows) {
      store.bucket(row.destination_id).set(row.item_id, row.state);
    }
    logger.debug({ rows: rows.length }, 'Processed set hydrated');
    return store;
  }

  isNew(destination: string, itemId: string): boolean {
    return !this.entries.get(destination)?.has(itemId);
  }

  stateOf(destination: string, itemId: string): ProcessedState | undefined {
    return this.entries.get(destination)?.get(itemId);
  }

  reserve(destination: string, itemId: string): boolean {
    const bucket = this.bucket(destination);
    if (bucket.has(itemId)) return false;

    this.write(
      () =>
        this.db
          .prepare(
            `INSERT OR IGNORE INTO processed_items (destination_id, item_id, state, updated_at)
             VALUES (?, ?, 'reserved', ?)`,
          )
          .run(destination, itemId, nowISO()),
      { destination, item: itemId, op: 'reserve' },
    );
    bucket.set(itemId, 'reserved');
    return true;
  }

  release(destination: string, itemId: string): boolean {
    const bucket = this.entries.get(destination);
    if (bucket?.get(itemId) !== 'reserved') return false;

    this.write(
      () =>
        this.db
          .prepare(
            "DELETE FROM processed_items WHERE destination_id = ? AND item_id = ? AND state = 'reserved'",
          )
          .run(destination, itemId),
      { destination, item: itemId, op: 'release' },
    );
    bucket.delete(itemId);
    return true;
  }

  confirm(destination: string, itemId: string): void {
    this.settle(destination, itemId, 'delivered');
  }

  skip(destination: string, itemId: string): void {
    this.settle(destination, itemId, 'skipped');
  }

  /** Forget everything recorded for a destination. */
  clearDestination(destination: string): number {
    const result = this.write(
      () => this.db.prepare('DELETE FROM processed_items WHERE destination_id = ?').run(destination),
      { destination, op: 'clear' },
    );
    this.entries.delete(destination);
    return result.changes;
  }

  size(destination: string): number {
    return this.entries.get(destination)?.size ?? 0;
  }

  private settle(destination: string, itemId: string, state: 'delivered' | 'skipped'): void {
    const bucket = this.bucket(destination);
    const current = bucket.get(itemId);
    if (current === state || current === 'delivered') return;

    this.write(
      () =>
        this.db
          .prepare(
            `INSERT INTO processed_items (destination_id, item_id, state, updated_at)
             VALUES (?, ?, ?, ?)
             ON CONFLICT(destination_id, item_id) DO UPDATE SET
               state = excluded.state, updated_at = excluded.updated_at`,
          )
          .run(destination, itemId, state, nowISO()),
      { destination, item: itemId, op: state === 'delivered' ? 'confirm' : 'skip' },
    );
    bucket.set(itemId, state);
  }

  private bucket(destination: string): Map<string, ProcessedState> {
    let bucket = this.entries.get(destination);
    if (!bucket) {
      bucket = new Map();
      this.entries.set(destination, bucket);
    }
    return bucket;
  }

  private write<T>(op: () => T, details: Record<string, unknown>): T {
    try {
      return op();
    } catch (err) {
      throw new DbError(`Processed set write failed: ${errorMessage(err)}`, details);
    }
  }
}
