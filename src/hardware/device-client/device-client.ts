/**
 * Device client
 * Typed, non-throwing register reads on top of a register transport
 */

import { bitAddress, realAddress } from '@hardware/s7';
import { describeError } from '$types/errors';

import { decodeBool, decodeReal, readFailure, validateAddress } from './helpers';

import type { RegisterTransport } from '@hardware/s7';
import type { ConnectResult, DeviceClient, ReadResult } from './types';

/**
 * Create a device client
 *
 * The connection is lazy and persistent: the poller calls connect() and the
 * link is reused across cycles until a read finds it down. Transport errors
 * are classified after the fact: if the transport still reports the link
 * up, the failure belongs to that tag only, otherwise it is a connection
 * fault.
 *
 * @param transport - Register transport for the controller
 * @returns Device client
 */
export function createDeviceClient(transport: RegisterTransport): DeviceClient {
  async function connect(): Promise<ConnectResult> {
    try {
      await transport.connect();
      return { ok: true };
    } catch (err) {
      return { ok: false, message: describeError(err) };
    }
  }

  async function read<T>(
    address: string,
    addressProblem: string | null,
    load: () => Promise<unknown>,
    decode: (raw: unknown, address: string) => ReadResult<T>
  ): Promise<ReadResult<T>> {
    if (addressProblem !== null) {
      return readFailure('address', addressProblem);
    }
    if (!transport.isConnected()) {
      return readFailure('connection', 'Not connected');
    }

    let raw: unknown;
    try {
      raw = await load();
    } catch (err) {
      const kind = transport.isConnected() ? 'read' : 'connection';
      return readFailure(kind, describeError(err));
    }
    return decode(raw, address);
  }

  return {
    connect: connect,
    readReal: function(block, offset) {
      return read(
        realAddress(block, offset),
        validateAddress(block, offset),
        function() { return transport.readReal(block, offset); },
        decodeReal
      );
    },
    readBool: function(block, byte, bit) {
      return read(
        bitAddress(block, byte, bit),
        validateAddress(block, byte, bit),
        function() { return transport.readBit(block, byte, bit); },
        decodeBool
      );
    },
    disconnect: function() { return transport.disconnect(); },
    isConnected: function() { return transport.isConnected(); }
  };
}
