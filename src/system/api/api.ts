/**
 * Plant API
 *
 * Facade over the state store and the report service.
 */

import { findDevice } from '@system/state';

import type { DeviceKind } from '$types/common';
import type { ChillerDefinition, PumpDefinition, TagMap } from '@core/tag-map';
import type { ReportService } from '@features/reports';
import type { StateStore } from '@system/state';
import type { DeviceInfo, PlantApi } from './types';

function definitions(
  tagMap: Pick<TagMap, 'pumps' | 'chillers'>,
  kind: DeviceKind
): readonly (PumpDefinition | ChillerDefinition)[] {
  return kind === 'pump' ? tagMap.pumps : tagMap.chillers;
}

/**
 * Create the plant API
 *
 * @param tagMap - Configured devices and their colours
 * @param store - Live state
 * @param reports - History queries
 */
export function createPlantApi(
  tagMap: Pick<TagMap, 'pumps' | 'chillers'>,
  store: StateStore,
  reports: ReportService
): PlantApi {
  return {
    getHomeSnapshot: function() { return store.snapshot().home; },
    getDeviceSnapshot: function(kind, id) { return findDevice(store.snapshot(), kind, id); },
    listDeviceIds: function(kind) {
      return definitions(tagMap, kind).map(function(device) { return device.id; });
    },
    listDevices: function(kind) {
      return definitions(tagMap, kind).map(function(device): DeviceInfo {
        return { id: device.id, label: device.label, colors: { ...device.colors } };
      });
    },
    getSnapshot: function() { return store.snapshot(); },
    subscribe: function(listener) { return store.subscribe(listener); },
    runReport: function(device, startDate, endDate) { return reports.report(device, startDate, endDate); },
    exportCsv: function(device, startDate, endDate) { return reports.exportCsv(device, startDate, endDate); }
  };
}
