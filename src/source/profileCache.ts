import type Database from 'better-sqlite3';
import type { SourceProfile } from './adapter.js';
import { nowISO } from '../shared/utils.js';

interface ProfileRow {
  handle: string;
  internal_id: string;
  source_uid: string;
  resolved_at: string;
}

export function getCachedProfile(db: Database.Database, handle: string): SourceProfile | undefined {
  const row = db
    .prepare<[string], ProfileRow>('SELECT * FROM source_profiles WHERE handle = ?')
    .get(handle);
  if (!row) return undefined;
  return { handle: row.handle, internalId: row.internal_id, sourceUid: row.source_uid };
}

export function saveProfile(db: Database.Database, profile: SourceProfile): void {
  db.prepare(
    `INSERT INTO source_profiles (handle, internal_id, source_uid, resolved_at)
     VALUES (?, ?, ?, ?)
     ON CONFLICT(handle) DO UPDATE SET
       internal_id = excluded.internal_id,
       source_uid = excluded.source_uid,
       resolved_at = excluded.resolved_at`,
  ).run(profile.handle, profile.internalId, profile.sourceUid, nowISO());
}
