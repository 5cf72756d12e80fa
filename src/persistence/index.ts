export { openDatabase, createSqliteStore } from './sqlite-store';
export { MIGRATIONS, migrate, schemaVersion } from './schema';
export { isStorageTimestamp, toSampleRow, fromSampleRow, toEventRow, fromEventRow } from './helpers';
export type {
  SampleRecord,
  EventRecord,
  EventKind,
  SampleRow,
  EventRow,
  AppendResult,
  PersistenceStore,
  DatabaseOptions,
  Migration
} from './types';
