export { createReportService } from './reports';
export {
  CSV_HEADER,
  REPORT_PRESETS,
  resolveRange,
  presetDates,
  isReportPreset,
  buildSeries,
  samplesToCsv,
  csvFilename
} from './helpers';
export type {
  HistoryReader,
  ReportRange,
  SeriesPoint,
  DeviceSeries,
  InvalidRange,
  EmptyReport,
  ReportData,
  ReportResult,
  CsvExport,
  CsvExportResult,
  ReportPreset,
  DateRange,
  ReportService
} from './types';
