/**
 * Common type definitions used throughout the project
 */

/**
 * Kinds of field device that carry per-device state
 */
export type DeviceKind = 'pump' | 'chiller';

/**
 * Selector value meaning "every device"
 */
export const ALL_DEVICES = 'all';

/**
 * Wall-clock source, injected so tests can pin time
 */
export type Clock = () => Date;

/**
 * Display placeholder for values that have never been read
 */
export const PLACEHOLDER = '--';

/**
 * Connection target of one field controller
 */
export interface DeviceEndpoint {
  host: string;
  /** ISO-on-TCP port, 102 on every S7 controller */
  port: number;
  rack: number;
  slot: number;
  /** Connect and per-read timeout */
  timeoutMs: number;
}
