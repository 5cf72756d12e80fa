/**
 * Plant API type definitions
 */

import type { DeviceKind } from '$types/common';
import type { StatusColors } from '@core/tag-map';
import type { CsvExportResult, ReportResult } from '@features/reports';
import type { DeviceState, HomeState, PlantSnapshot, SnapshotListener } from '@system/state';

/**
 * A configured device as shown in pickers and legends
 */
export interface DeviceInfo {
  id: string;
  label: string;
  colors: StatusColors;
}

/**
 * Read-only entry point for presentation code
 * Never blocks on the poller.
 */
export interface PlantApi {
  getHomeSnapshot(): HomeState;
  /** null when the id is not configured */
  getDeviceSnapshot(kind: DeviceKind, id: string): DeviceState | null;
  listDeviceIds(kind: DeviceKind): string[];
  listDevices(kind: DeviceKind): DeviceInfo[];
  getSnapshot(): PlantSnapshot;
  subscribe(listener: SnapshotListener): () => void;
  runReport(device: string, startDate: string, endDate: string): ReportResult;
  exportCsv(device: string, startDate: string, endDate: string): CsvExportResult;
}
