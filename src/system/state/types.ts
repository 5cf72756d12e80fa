/**
 * State store type definitions
 */

import type { DeviceKind } from '$types/common';

// ═══════════════════════════════════════════════════════════════
// SNAPSHOT
// ═══════════════════════════════════════════════════════════════

/**
 * Plant-wide values as display strings
 */
export interface HomeState {
  /** Two decimals, "--" until first read */
  readonly kwh: string;
  /** Two decimals, "--" until first read */
  readonly level: string;
  /** One decimal, "--" until first read */
  readonly temp: string;
  readonly alarm: boolean;
  /** Local time of the last successful read, "--" or "read error" */
  readonly ts: string;
}

/**
 * Latest known values of one pump or chiller
 * Each field reflects the most recent successful read of that signal.
 */
export interface DeviceState {
  readonly id: string;
  readonly kind: DeviceKind;
  readonly label: string;
  readonly ready: boolean;
  readonly running: boolean;
  readonly trip: boolean;
  /** Two decimals; always null for chillers */
  readonly pressure: number | null;
  /** Two decimals; always null for chillers */
  readonly speed: number | null;
  readonly ts: string;
}

/**
 * Immutable, deeply frozen view of the whole plant
 */
export interface PlantSnapshot {
  /** Incremented on every publish */
  readonly version: number;
  readonly home: HomeState;
  /** Configuration order */
  readonly pumps: readonly DeviceState[];
  readonly chillers: readonly DeviceState[];
}

// ═══════════════════════════════════════════════════════════════
// UPDATES
// Undefined fields are "no value" and leave the stored value alone
// ═══════════════════════════════════════════════════════════════

export interface HomeFields {
  kwh?: number;
  level?: number;
  temp?: number;
  alarm?: boolean;
}

export interface DeviceFields {
  ready?: boolean;
  running?: boolean;
  trip?: boolean;
  pressure?: number;
  speed?: number;
}

export interface DeviceUpdate {
  id: string;
  fields: DeviceFields;
}

/**
 * Everything one poll cycle read, applied as a unit
 */
export interface CycleBatch {
  /** Display timestamp of the cycle */
  ts: string;
  home: HomeFields;
  pumps: DeviceUpdate[];
  chillers: DeviceUpdate[];
}

// ═══════════════════════════════════════════════════════════════
// STORE
// ═══════════════════════════════════════════════════════════════

export type SnapshotListener = (snapshot: PlantSnapshot) => void;

/**
 * Single-writer, multi-reader holder of the current snapshot
 */
export interface StateStore {
  applyHomeUpdate(fields: HomeFields, ts: string): void;
  applyDeviceUpdate(kind: DeviceKind, id: string, fields: DeviceFields, ts: string): void;
  applyCycle(batch: CycleBatch): void;
  /** Set the home timestamp to the read-error marker */
  markReadError(): void;
  snapshot(): PlantSnapshot;
  /** Called after every publish; returns an unsubscribe function */
  subscribe(listener: SnapshotListener): () => void;
}
