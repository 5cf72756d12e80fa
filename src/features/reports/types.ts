/**
 * Reporting type definitions
 */

import type { EventRecord, PersistenceStore, SampleRecord } from '@persistence';

/**
 * Read side of the persistence store
 */
export type HistoryReader = Pick<PersistenceStore, 'querySamples' | 'queryEvents'>;

/**
 * A validated request: calendar dates plus the half-open storage bounds
 */
export interface ReportRange {
  device: string;
  startDate: string;
  endDate: string;
  /** Inclusive, startDate 00:00:00 */
  from: string;
  /** Exclusive, the day after endDate at 00:00:00 */
  to: string;
}

export interface SeriesPoint {
  timestamp: string;
  pressure: number | null;
  speed: number | null;
}

/**
 * Pressure and speed over time for one device
 */
export interface DeviceSeries {
  deviceId: string;
  points: SeriesPoint[];
}

export interface InvalidRange {
  status: 'invalid-range';
  message: string;
}

export interface EmptyReport {
  status: 'empty';
  range: ReportRange;
}

export interface ReportData {
  status: 'ok';
  range: ReportRange;
  samples: SampleRecord[];
  events: EventRecord[];
  series: DeviceSeries[];
}

export type ReportResult = InvalidRange | EmptyReport | ReportData;

export interface CsvExport {
  status: 'ok';
  range: ReportRange;
  filename: string;
  content: string;
}

export type CsvExportResult = InvalidRange | EmptyReport | CsvExport;

export type ReportPreset = 'yesterday' | 'last-7-days';

export interface DateRange {
  startDate: string;
  endDate: string;
}

export interface ReportService {
  /**
   * Samples and events of a device (or "all") between two calendar dates, both inclusive
   */
  report(device: string, startDate: string, endDate: string): ReportResult;
  /** Samples of the same range as CSV */
  exportCsv(device: string, startDate: string, endDate: string): CsvExportResult;
  /** Dates of a quick preset relative to today (UTC) */
  presetRange(preset: ReportPreset): DateRange;
}
