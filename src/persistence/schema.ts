/**
 * Database schema migrations
 *
 * The applied version is kept in PRAGMA user_version.
 */

import type Database from 'better-sqlite3';
import type { Migration } from './types';

export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: 'samples and events tables',
    up: function(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS samples (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          timestamp TEXT NOT NULL,
          device_id TEXT NOT NULL,
          pressure REAL,
          speed REAL,
          ready INTEGER NOT NULL CHECK (ready IN (0, 1)),
          running INTEGER NOT NULL CHECK (running IN (0, 1)),
          trip INTEGER NOT NULL CHECK (trip IN (0, 1))
        );
        CREATE INDEX IF NOT EXISTS idx_samples_timestamp ON samples (timestamp);
        CREATE INDEX IF NOT EXISTS idx_samples_device_id ON samples (device_id);

        CREATE TABLE IF NOT EXISTS events (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          timestamp TEXT NOT NULL,
          device_id TEXT NOT NULL,
          event TEXT NOT NULL,
          pressure REAL,
          speed REAL
        );
        CREATE INDEX IF NOT EXISTS idx_events_timestamp ON events (timestamp);
        CREATE INDEX IF NOT EXISTS idx_events_device_id ON events (device_id);
      `);
    }
  }
];

/**
 * Current schema version of a database
 */
export function schemaVersion(db: Database.Database): number {
  const version = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

/**
 * Apply every migration newer than the database's version
 * Each step runs in its own transaction together with the version bump.
 *
 * @returns Versions applied, oldest first
 */
export function migrate(db: Database.Database, migrations: readonly Migration[] = MIGRATIONS): number[] {
  const applied: number[] = [];
  const current = schemaVersion(db);

  for (const migration of migrations) {
    if (migration.version <= current) continue;
    db.transaction(function() {
      migration.up(db);
      db.pragma('user_version = ' + migration.version);
    })();
    applied.push(migration.version);
  }
  return applied;
}
