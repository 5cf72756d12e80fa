/**
 * Persistence helper functions
 * Mapping between records and stored rows
 */

import type { EventRecord, EventRow, SampleRecord, SampleRow } from './types';

const STORAGE_TIMESTAMP = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

/**
 * Check the "YYYY-MM-DD HH:MM:SS" shape used for every stored timestamp
 * Lexical order of such strings is chronological order.
 */
export function isStorageTimestamp(text: string): boolean {
  return STORAGE_TIMESTAMP.test(text);
}

function bit(value: boolean): number {
  return value ? 1 : 0;
}

export function toSampleRow(record: SampleRecord): SampleRow {
  return {
    timestamp: record.timestamp,
    device_id: record.deviceId,
    pressure: record.pressure,
    speed: record.speed,
    ready: bit(record.ready),
    running: bit(record.running),
    trip: bit(record.trip)
  };
}

export function fromSampleRow(row: SampleRow): SampleRecord {
  return {
    timestamp: row.timestamp,
    deviceId: row.device_id,
    pressure: row.pressure,
    speed: row.speed,
    ready: row.ready === 1,
    running: row.running === 1,
    trip: row.trip === 1
  };
}

export function toEventRow(record: EventRecord): EventRow {
  return {
    timestamp: record.timestamp,
    device_id: record.deviceId,
    event: record.event,
    pressure: record.pressure,
    speed: record.speed
  };
}

/**
 * Rows with an event kind this version does not know are skipped by the caller
 */
export function fromEventRow(row: EventRow): EventRecord | null {
  if (row.event !== 'TRIP') {
    return null;
  }
  return {
    timestamp: row.timestamp,
    deviceId: row.device_id,
    event: row.event,
    pressure: row.pressure,
    speed: row.speed
  };
}
