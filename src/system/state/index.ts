export { createStateStore, createInitialSnapshot, findDevice } from './state';
export { READ_ERROR_MARKER, initialHomeState, initialDeviceState, mergeHome, mergeDevice } from './helpers';
export type {
  HomeState,
  DeviceState,
  PlantSnapshot,
  HomeFields,
  DeviceFields,
  DeviceUpdate,
  CycleBatch,
  SnapshotListener,
  StateStore
} from './types';
