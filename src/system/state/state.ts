/**
 * State store
 *
 * Holds the latest known value of every signal. Each update builds a new
 * deeply frozen PlantSnapshot and swaps a single reference, so a reader
 * always sees whole cycles and never waits on the poller.
 */

import { describeError } from '$types/errors';
import { deepFreeze } from '@utils/object';

import { READ_ERROR_MARKER, initialDeviceState, initialHomeState, mergeDevice, mergeHome } from './helpers';

import type { DeviceKind } from '$types/common';
import type { TagMap } from '@core/tag-map';
import type { Logger } from '@logging';
import type {
  CycleBatch,
  DeviceFields,
  DeviceState,
  DeviceUpdate,
  HomeFields,
  PlantSnapshot,
  SnapshotListener,
  StateStore
} from './types';

export * from './types';

/**
 * Build the placeholder snapshot for a tag map
 * @param tagMap - Pumps and chillers in configuration order
 */
export function createInitialSnapshot(tagMap: Pick<TagMap, 'pumps' | 'chillers'>): PlantSnapshot {
  return deepFreeze({
    version: 0,
    home: initialHomeState(),
    pumps: tagMap.pumps.map(function(pump) { return initialDeviceState('pump', pump.id, pump.label); }),
    chillers: tagMap.chillers.map(function(chiller) { return initialDeviceState('chiller', chiller.id, chiller.label); })
  });
}

/**
 * Apply updates to a device list; unknown ids are ignored
 */
function mergeDevices(
  devices: readonly DeviceState[],
  updates: readonly DeviceUpdate[],
  ts: string
): readonly DeviceState[] {
  if (updates.length === 0) {
    return devices;
  }
  const byId = new Map<string, DeviceFields>();
  for (const update of updates) {
    byId.set(update.id, update.fields);
  }
  return devices.map(function(device) {
    const fields = byId.get(device.id);
    return fields === undefined ? device : mergeDevice(device, fields, ts);
  });
}

/**
 * Create the state store
 *
 * @param tagMap - Devices to track, in configuration order
 * @param logger - Receives listener failures
 * @returns State store seeded with placeholder values
 *
 * @example
 * ```typescript
 * const store = createStateStore(config.tags, logger);
 * store.applyCycle({ ts: '05/01/2024 07:08:09', home: { kwh: 1234.5 }, pumps: [], chillers: [] });
 * store.snapshot().home.kwh; // '1234.50'
 * ```
 */
export function createStateStore(tagMap: Pick<TagMap, 'pumps' | 'chillers'>, logger: Logger): StateStore {
  let current = createInitialSnapshot(tagMap);
  const listeners = new Set<SnapshotListener>();

  function publish(next: Omit<PlantSnapshot, 'version'>): void {
    current = deepFreeze({ ...next, version: current.version + 1 });
    const published = current;
    for (const listener of listeners) {
      try {
        listener(published);
      } catch (err) {
        logger.warning('Snapshot listener failed: ' + describeError(err));
      }
    }
  }

  function applyHomeUpdate(fields: HomeFields, ts: string): void {
    publish({ ...current, home: mergeHome(current.home, fields, ts) });
  }

  function applyDeviceUpdate(kind: DeviceKind, id: string, fields: DeviceFields, ts: string): void {
    const updates = [{ id: id, fields: fields }];
    if (kind === 'pump') {
      publish({ ...current, pumps: mergeDevices(current.pumps, updates, ts) });
    } else {
      publish({ ...current, chillers: mergeDevices(current.chillers, updates, ts) });
    }
  }

  function applyCycle(batch: CycleBatch): void {
    publish({
      home: mergeHome(current.home, batch.home, batch.ts),
      pumps: mergeDevices(current.pumps, batch.pumps, batch.ts),
      chillers: mergeDevices(current.chillers, batch.chillers, batch.ts)
    });
  }

  function markReadError(): void {
    publish({ ...current, home: { ...current.home, ts: READ_ERROR_MARKER } });
  }

  return {
    applyHomeUpdate: applyHomeUpdate,
    applyDeviceUpdate: applyDeviceUpdate,
    applyCycle: applyCycle,
    markReadError: markReadError,
    snapshot: function() { return current; },
    subscribe: function(listener) {
      listeners.add(listener);
      return function() { listeners.delete(listener); };
    }
  };
}

/**
 * Look up one device in a snapshot
 * @returns Device state, or null when the id is not configured
 */
export function findDevice(snapshot: PlantSnapshot, kind: DeviceKind, id: string): DeviceState | null {
  const devices = kind === 'pump' ? snapshot.pumps : snapshot.chillers;
  const found = devices.find(function(device) { return device.id === id; });
  return found === undefined ? null : found;
}
