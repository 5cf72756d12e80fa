export { createS7Transport, createNodeS7Driver } from './s7-transport';
export { ISO_CONNECTED, realAddress, bitAddress, withTimeout } from './helpers';
export type { RegisterTransport, S7Driver, S7DriverFactory } from './types';
