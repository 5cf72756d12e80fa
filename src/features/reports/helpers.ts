/**
 * Reporting helper functions
 */

import { addDays, formatCalendarDate, parseCalendarDate, startOfDayTimestamp } from '@utils/time';

import type { SampleRecord } from '@persistence';
import type { DateRange, DeviceSeries, ReportPreset, ReportRange } from './types';

export const CSV_HEADER = 'timestamp,device_id,pressure,speed,ready,running,trip';

export const REPORT_PRESETS: readonly ReportPreset[] = ['yesterday', 'last-7-days'];

/**
 * Turn a device and two calendar dates into storage bounds
 *
 * The end date is inclusive for the caller, so the exclusive upper bound
 * is midnight of the following day.
 *
 * @param device - Device id or "all"
 * @param startDate - First day, `YYYY-MM-DD`
 * @param endDate - Last day, `YYYY-MM-DD`
 * @returns Range, or a message describing the problem
 */
export function resolveRange(device: string, startDate: string, endDate: string): ReportRange | string {
  if (device.trim() === '') {
    return 'A device id or "all" is required';
  }
  const start = parseCalendarDate(startDate);
  if (start === null) {
    return 'Invalid start date "' + startDate + '" (expected YYYY-MM-DD)';
  }
  const end = parseCalendarDate(endDate);
  if (end === null) {
    return 'Invalid end date "' + endDate + '" (expected YYYY-MM-DD)';
  }
  if (start.getTime() > end.getTime()) {
    return 'Start date ' + formatCalendarDate(start) + ' is after end date ' + formatCalendarDate(end);
  }

  return {
    device: device.trim(),
    startDate: formatCalendarDate(start),
    endDate: formatCalendarDate(end),
    from: startOfDayTimestamp(start),
    to: startOfDayTimestamp(addDays(end, 1))
  };
}

/**
 * Dates of a quick preset
 *
 * - yesterday: yesterday to yesterday
 * - last-7-days: seven days ago to today
 *
 * @param preset - Preset name
 * @param today - Current moment; its UTC day counts as today
 */
export function presetDates(preset: ReportPreset, today: Date): DateRange {
  if (preset === 'yesterday') {
    const yesterday = formatCalendarDate(addDays(today, -1));
    return { startDate: yesterday, endDate: yesterday };
  }
  return { startDate: formatCalendarDate(addDays(today, -7)), endDate: formatCalendarDate(today) };
}

/**
 * Check a preset name from the command line
 */
export function isReportPreset(value: string): value is ReportPreset {
  return value === 'yesterday' || value === 'last-7-days';
}

/**
 * Group samples into per-device pressure/speed series, first-seen order
 */
export function buildSeries(samples: readonly SampleRecord[]): DeviceSeries[] {
  const byDevice = new Map<string, DeviceSeries>();
  for (const s of samples) {
    let series = byDevice.get(s.deviceId);
    if (series === undefined) {
      series = { deviceId: s.deviceId, points: [] };
      byDevice.set(s.deviceId, series);
    }
    series.points.push({ timestamp: s.timestamp, pressure: s.pressure, speed: s.speed });
  }
  return Array.from(byDevice.values());
}

function csvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return '"' + value.replace(/"/g, '""') + '"';
  }
  return value;
}

function csvNumber(value: number | null): string {
  return value === null ? '' : String(value);
}

function csvBit(value: boolean): string {
  return value ? '1' : '0';
}

/**
 * Serialize samples with a header row, one line per sample, trailing newline
 */
export function samplesToCsv(samples: readonly SampleRecord[]): string {
  const lines = [CSV_HEADER];
  for (const s of samples) {
    lines.push([
      csvField(s.timestamp),
      csvField(s.deviceId),
      csvNumber(s.pressure),
      csvNumber(s.speed),
      csvBit(s.ready),
      csvBit(s.running),
      csvBit(s.trip)
    ].join(','));
  }
  return lines.join('\n') + '\n';
}

/**
 * Download name carrying the device and the date range
 */
export function csvFilename(range: Pick<ReportRange, 'device' | 'startDate' | 'endDate'>): string {
  const device = range.device.replace(/[^A-Za-z0-9_-]/g, '_');
  return 'pump_logs_' + device + '_' + range.startDate + '_to_' + range.endDate + '.csv';
}
