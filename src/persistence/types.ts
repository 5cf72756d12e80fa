/**
 * Persistence type definitions
 */

import type Database from 'better-sqlite3';

// ═══════════════════════════════════════════════════════════════
// RECORDS
// ═══════════════════════════════════════════════════════════════

/**
 * One periodic sample of a pump
 * timestamp is UTC "YYYY-MM-DD HH:MM:SS"
 */
export interface SampleRecord {
  timestamp: string;
  deviceId: string;
  pressure: number | null;
  speed: number | null;
  ready: boolean;
  running: boolean;
  trip: boolean;
}

export type EventKind = 'TRIP';

/**
 * A discrete state transition with the analog values at that moment
 */
export interface EventRecord {
  timestamp: string;
  deviceId: string;
  event: EventKind;
  pressure: number | null;
  speed: number | null;
}

// ═══════════════════════════════════════════════════════════════
// ROWS (column names as stored)
// ═══════════════════════════════════════════════════════════════

export interface SampleRow {
  timestamp: string;
  device_id: string;
  pressure: number | null;
  speed: number | null;
  ready: number;
  running: number;
  trip: number;
}

export interface EventRow {
  timestamp: string;
  device_id: string;
  event: string;
  pressure: number | null;
  speed: number | null;
}

// ═══════════════════════════════════════════════════════════════
// STORE
// ═══════════════════════════════════════════════════════════════

export type AppendResult = { ok: true; id: number } | { ok: false; message: string };

/**
 * Append-only sample and event storage with half-open range queries
 */
export interface PersistenceStore {
  /** Never throws; failures are logged and returned */
  appendSample(record: SampleRecord): AppendResult;
  /** Never throws; failures are logged and returned */
  appendEvent(record: EventRecord): AppendResult;
  /**
   * Samples with from <= timestamp < to, ordered by timestamp then insertion
   * @param device - Device id or "all"
   */
  querySamples(device: string, from: string, to: string): SampleRecord[];
  queryEvents(device: string, from: string, to: string): EventRecord[];
  close(): void;
}

export interface DatabaseOptions {
  /** Open an existing file without creating or migrating it */
  readonly: boolean;
}

/**
 * One schema step, applied in version order
 */
export interface Migration {
  version: number;
  description: string;
  up: (db: Database.Database) => void;
}
