/**
 * SQLite persistence store
 *
 * Samples and events live in two append-only tables indexed by timestamp
 * and device id. The writer runs in WAL mode so report processes can read
 * committed rows while the poller appends.
 */

import Database from 'better-sqlite3';

import { ALL_DEVICES } from '$types/common';
import { describeError } from '$types/errors';

import { fromEventRow, fromSampleRow, isStorageTimestamp, toEventRow, toSampleRow } from './helpers';
import { migrate } from './schema';

import type { Logger } from '@logging';
import type {
  AppendResult,
  DatabaseOptions,
  EventRecord,
  EventRow,
  PersistenceStore,
  SampleRecord,
  SampleRow
} from './types';

const SAMPLE_COLUMNS = 'timestamp, device_id, pressure, speed, ready, running, trip';
const EVENT_COLUMNS = 'timestamp, device_id, event, pressure, speed';

/**
 * Open the telemetry database
 *
 * A writable handle creates the file if needed, switches to WAL and brings
 * the schema up to date. A read-only handle requires an existing file.
 *
 * @param path - File path, or ":memory:"
 * @param options - Open mode
 */
export function openDatabase(path: string, options: DatabaseOptions = { readonly: false }): Database.Database {
  if (options.readonly) {
    return new Database(path, { readonly: true, fileMustExist: true });
  }

  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  migrate(db);
  return db;
}

/**
 * Create the store on an open database
 *
 * @param db - Handle from openDatabase
 * @param logger - Append failures are logged at WARNING
 * @returns Persistence store
 *
 * @example
 * ```typescript
 * const store = createSqliteStore(openDatabase('logs.db'), logger);
 * store.appendSample({ timestamp: '2024-01-01 10:00:00', deviceId: 'pump1', pressure: 5.23, speed: 42, ready: true, running: true, trip: false });
 * store.querySamples('pump1', '2024-01-01 00:00:00', '2024-01-02 00:00:00');
 * ```
 */
export function createSqliteStore(db: Database.Database, logger: Logger): PersistenceStore {
  // Prepared on first append; read-only handles never append
  let insertSample: Database.Statement<[SampleRow]> | null = null;
  let insertEvent: Database.Statement<[EventRow]> | null = null;

  const samplesAll = db.prepare<[string, string], SampleRow>(
    `SELECT ${SAMPLE_COLUMNS} FROM samples WHERE timestamp >= ? AND timestamp < ? ORDER BY timestamp, id`
  );
  const samplesByDevice = db.prepare<[string, string, string], SampleRow>(
    `SELECT ${SAMPLE_COLUMNS} FROM samples WHERE device_id = ? AND timestamp >= ? AND timestamp < ? ORDER BY timestamp, id`
  );
  const eventsAll = db.prepare<[string, string], EventRow>(
    `SELECT ${EVENT_COLUMNS} FROM events WHERE timestamp >= ? AND timestamp < ? ORDER BY timestamp, id`
  );
  const eventsByDevice = db.prepare<[string, string, string], EventRow>(
    `SELECT ${EVENT_COLUMNS} FROM events WHERE device_id = ? AND timestamp >= ? AND timestamp < ? ORDER BY timestamp, id`
  );

  function append(
    what: string,
    record: { timestamp: string; deviceId: string },
    run: () => Database.RunResult
  ): AppendResult {
    if (!isStorageTimestamp(record.timestamp)) {
      const message = 'Invalid timestamp "' + record.timestamp + '"';
      logger.warning('Failed to append ' + what + ' for ' + record.deviceId + ': ' + message);
      return { ok: false, message: message };
    }
    try {
      const result = run();
      return { ok: true, id: Number(result.lastInsertRowid) };
    } catch (err) {
      const message = describeError(err);
      logger.warning('Failed to append ' + what + ' for ' + record.deviceId + ': ' + message);
      return { ok: false, message: message };
    }
  }

  function appendSample(record: SampleRecord): AppendResult {
    return append('sample', record, function() {
      if (insertSample === null) {
        insertSample = db.prepare<SampleRow>(
          `INSERT INTO samples (${SAMPLE_COLUMNS}) VALUES (@timestamp, @device_id, @pressure, @speed, @ready, @running, @trip)`
        );
      }
      return insertSample.run(toSampleRow(record));
    });
  }

  function appendEvent(record: EventRecord): AppendResult {
    return append('event', record, function() {
      if (insertEvent === null) {
        insertEvent = db.prepare<EventRow>(
          `INSERT INTO events (${EVENT_COLUMNS}) VALUES (@timestamp, @device_id, @event, @pressure, @speed)`
        );
      }
      return insertEvent.run(toEventRow(record));
    });
  }

  function querySamples(device: string, from: string, to: string): SampleRecord[] {
    const rows = device === ALL_DEVICES
      ? samplesAll.all(from, to)
      : samplesByDevice.all(device, from, to);
    return rows.map(fromSampleRow);
  }

  function queryEvents(device: string, from: string, to: string): EventRecord[] {
    const rows = device === ALL_DEVICES
      ? eventsAll.all(from, to)
      : eventsByDevice.all(device, from, to);
    const records: EventRecord[] = [];
    for (const row of rows) {
      const record = fromEventRow(row);
      if (record !== null) records.push(record);
    }
    return records;
  }

  return {
    appendSample: appendSample,
    appendEvent: appendEvent,
    querySamples: querySamples,
    queryEvents: queryEvents,
    close: function() {
      if (db.open) db.close();
    }
  };
}
