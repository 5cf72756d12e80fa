/**
 * State store helper functions
 * Pure merges from one snapshot to the next
 */

import { PLACEHOLDER } from '$types/common';
import { roundTo } from '@utils/number';

import type { DeviceKind } from '$types/common';
import type { DeviceFields, DeviceState, HomeFields, HomeState } from './types';

/**
 * Home timestamp after a connection fault
 */
export const READ_ERROR_MARKER = 'read error';

/**
 * Home state before the first successful read
 */
export function initialHomeState(): HomeState {
  return { kwh: PLACEHOLDER, level: PLACEHOLDER, temp: PLACEHOLDER, alarm: false, ts: PLACEHOLDER };
}

/**
 * Device state before the first successful read
 */
export function initialDeviceState(kind: DeviceKind, id: string, label: string): DeviceState {
  return {
    id: id,
    kind: kind,
    label: label,
    ready: false,
    running: false,
    trip: false,
    pressure: null,
    speed: null,
    ts: PLACEHOLDER
  };
}

function hasAnyValue(fields: HomeFields | DeviceFields): boolean {
  return Object.values(fields).some(function(value) { return value !== undefined; });
}

/**
 * Merge home readings into the previous home state
 *
 * kwh and level are stored with two decimals and temp with one.
 * ts moves only when at least one reading is present.
 *
 * @param current - Previous home state
 * @param fields - This cycle's readings
 * @param ts - Display timestamp of the cycle
 */
export function mergeHome(current: HomeState, fields: HomeFields, ts: string): HomeState {
  return {
    kwh: fields.kwh !== undefined ? fields.kwh.toFixed(2) : current.kwh,
    level: fields.level !== undefined ? fields.level.toFixed(2) : current.level,
    temp: fields.temp !== undefined ? fields.temp.toFixed(1) : current.temp,
    alarm: fields.alarm !== undefined ? fields.alarm : current.alarm,
    ts: hasAnyValue(fields) ? ts : current.ts
  };
}

/**
 * Merge device readings into the previous device state
 *
 * Pressure and speed are rounded to two decimals. Chillers ignore them.
 *
 * @param current - Previous device state
 * @param fields - This cycle's readings
 * @param ts - Display timestamp of the cycle
 */
export function mergeDevice(current: DeviceState, fields: DeviceFields, ts: string): DeviceState {
  const analog = current.kind === 'pump';
  return {
    ...current,
    ready: fields.ready !== undefined ? fields.ready : current.ready,
    running: fields.running !== undefined ? fields.running : current.running,
    trip: fields.trip !== undefined ? fields.trip : current.trip,
    pressure: analog && fields.pressure !== undefined ? roundTo(fields.pressure, 2) : current.pressure,
    speed: analog && fields.speed !== undefined ? roundTo(fields.speed, 2) : current.speed,
    ts: hasAnyValue(fields) ? ts : current.ts
  };
}
