/**
 * Register transport type definitions
 */

import type NodeS7 from 'nodes7';

/**
 * Low-level register access to one controller
 *
 * Implementations throw TransportError on any failure. Only the device
 * client talks to a transport; it turns those errors into result values.
 */
export interface RegisterTransport {
  /** Open the link; no-op when already connected */
  connect(): Promise<void>;
  /** Read a 4-byte big-endian float from a data block */
  readReal(block: number, offset: number): Promise<unknown>;
  /** Read a single bit from a data block */
  readBit(block: number, byte: number, bit: number): Promise<unknown>;
  isConnected(): boolean;
  /** Drop the link; resolves even if the controller never answers */
  disconnect(): Promise<void>;
}

/**
 * The part of the nodes7 connection object the transport uses
 */
export type S7Driver = Pick<
  NodeS7,
  'isoConnectionState' | 'initiateConnection' | 'dropConnection' | 'addItems' | 'removeItems' | 'readAllItems'
>;

/**
 * Creates a fresh driver for every connection attempt
 */
export type S7DriverFactory = () => S7Driver;
