/**
 * Device client type definitions
 */

/**
 * Why a read produced no value
 * - address: malformed block/byte/bit, rejected before any I/O
 * - read: the controller refused or timed out on this tag, link still up
 * - decode: the controller answered with a value of the wrong type
 * - connection: the link is down; the rest of the cycle is pointless
 */
export type ReadFailureKind = 'address' | 'read' | 'decode' | 'connection';

/**
 * Successful read
 */
export interface ReadSuccess<T> {
  ok: true;
  value: T;
}

/**
 * Failed read
 */
export interface ReadFailure {
  ok: false;
  kind: ReadFailureKind;
  message: string;
}

export type ReadResult<T> = ReadSuccess<T> | ReadFailure;

export type ConnectResult = { ok: true } | { ok: false; message: string };

/**
 * Typed register reads against one controller
 * Nothing thrown by the transport escapes these methods.
 */
export interface DeviceClient {
  /** Open the link; no-op on a live connection */
  connect(): Promise<ConnectResult>;
  readReal(block: number, offset: number): Promise<ReadResult<number>>;
  readBool(block: number, byte: number, bit: number): Promise<ReadResult<boolean>>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
}
