import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

export function defaultMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

/** `.sql` files in lexical order; the numeric prefix sets the order. */
export function listMigrationFiles(dir = defaultMigrationsDir()): string[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`, { dir });
  }
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

function appliedMigrations(db: Database.Database): Set<string> {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
  const rows = db.prepare<[], { name: string }>('SELECT name FROM _migrations').all();
  return new Set(rows.map((r) => r.name));
}

export function pendingMigrations(db: Database.Database, dir = defaultMigrationsDir()): string[] {
  const applied = appliedMigrations(db);
  return listMigrationFiles(dir).filter((f) => !applied.has(f));
}

/**
 * Apply every pending migration, each in its own transaction together with its
 * `_migrations` row.
 */
export function runMigrations(db: Database.Database, dir = defaultMigrationsDir()): MigrationResult {
  const skipped = [...appliedMigrations(db)];
  const applied: string[] = [];
  const record = db.prepare('INSERT INTO _migrations (name) VALUES (?)');

  for (const name of pendingMigrations(db, dir)) {
    const sql = fs.readFileSync(path.join(dir, name), 'utf-8');
    const apply = db.transaction(() => {
      db.exec(sql);
      record.run(name);
    });

    try {
      apply();
    } catch (err) {
      throw new DbError(`Migration failed: ${name}`, { migration: name, cause: errorMessage(err) });
    }
    applied.push(name);
    logger.info({ migration: name }, 'Migration applied');
  }

  return { applied, skipped };
}
