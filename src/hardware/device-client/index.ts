export { createDeviceClient } from './device-client';
export { validateAddress, decodeReal, decodeBool, readFailure } from './helpers';
export type { DeviceClient, ConnectResult, ReadResult, ReadSuccess, ReadFailure, ReadFailureKind } from './types';
