/**
 * Reporting query service
 *
 * Translates device and calendar-date requests into persistence queries.
 * A malformed request yields an invalid-range result and an empty window
 * yields an empty result; neither throws.
 */

import { buildSeries, csvFilename, presetDates, resolveRange, samplesToCsv } from './helpers';

import type { Clock } from '$types/common';
import type { CsvExportResult, HistoryReader, ReportResult, ReportService } from './types';

/**
 * Create the report service
 *
 * @param history - Persistence read side
 * @param clock - Source of "today" for the presets
 *
 * @example
 * ```typescript
 * const reports = createReportService(store, function() { return new Date(); });
 * const result = reports.report('all', '2024-01-01', '2024-01-01');
 * if (result.status === 'ok') console.log(result.samples.length);
 * ```
 */
export function createReportService(history: HistoryReader, clock: Clock): ReportService {
  function report(device: string, startDate: string, endDate: string): ReportResult {
    const range = resolveRange(device, startDate, endDate);
    if (typeof range === 'string') {
      return { status: 'invalid-range', message: range };
    }

    const samples = history.querySamples(range.device, range.from, range.to);
    const events = history.queryEvents(range.device, range.from, range.to);
    if (samples.length === 0 && events.length === 0) {
      return { status: 'empty', range: range };
    }

    return {
      status: 'ok',
      range: range,
      samples: samples,
      events: events,
      series: buildSeries(samples)
    };
  }

  function exportCsv(device: string, startDate: string, endDate: string): CsvExportResult {
    const range = resolveRange(device, startDate, endDate);
    if (typeof range === 'string') {
      return { status: 'invalid-range', message: range };
    }

    const samples = history.querySamples(range.device, range.from, range.to);
    if (samples.length === 0) {
      return { status: 'empty', range: range };
    }

    return {
      status: 'ok',
      range: range,
      filename: csvFilename(range),
      content: samplesToCsv(samples)
    };
  }

  return {
    report: report,
    exportCsv: exportCsv,
    presetRange: function(preset) { return presetDates(preset, clock()); }
  };
}
